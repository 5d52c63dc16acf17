#!/usr/bin/env node
import sodium from 'libsodium-wrappers-sumo'
import {loadConfig, type AppConfig} from '../src/config.js'
import {humanReadableMessage} from '../src/errors.js'
import {setVerbose} from '../src/log.js'
import {USAGE, parseCommand, type Command} from './args.js'
import {runReceive} from './receive.js'
import {runSend} from './send.js'

const EXIT_OK = 0
const EXIT_FAILURE = 1
const EXIT_USAGE = 2

function usageError(message: string): number {
  console.error(`Error: ${message}`)
  console.error('')
  console.error(USAGE)
  return EXIT_USAGE
}

type RunCommand = Exclude<Command, {kind: 'help'}>

// Returns an exit code when nothing is left to run.
function prepare(argv: string[]): {command: RunCommand, config: AppConfig} | number {
  try {
    const command = parseCommand(argv)
    if (command.kind === 'help') {
      console.log(USAGE)
      return EXIT_OK
    }
    return {command, config: loadConfig({server: command.server})}
  } catch (e) {
    // Bad flags and bad environment values are both usage errors.
    if (e instanceof Error) return usageError(e.message)
    throw e
  }
}

async function main(argv: string[]): Promise<number> {
  const prepared = prepare(argv)
  if (typeof prepared === 'number') return prepared
  const {command, config} = prepared

  setVerbose(command.verbose)
  await sodium.ready
  try {
    if (command.kind === 'send') await runSend(command, config)
    else await runReceive(command, config)
    return EXIT_OK
  } catch (e) {
    console.error(`Error: ${humanReadableMessage(e)}`)
    return EXIT_FAILURE
  }
}

// The WebRTC stack can leave sockets open after close; exit explicitly.
main(process.argv.slice(2)).then(
  code => process.exit(code),
  err => {
    console.error(err)
    process.exit(EXIT_FAILURE)
  }
)
