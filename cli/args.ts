// Command line parsing. Kept apart from main.ts so it can be tested without
// running a command.

import {parseArgs} from 'node:util'

export const USAGE = `Usage:
  sendfile [--server HOST[:PORT]] [--verbose] send <file> [--peer-id ID]
  sendfile [--server HOST[:PORT]] [--verbose] receive <peer-id> --key KEY [--output DIR]

Options:
  -s, --server HOST[:PORT]  Signaling server (env SENDFILE_SERVER)
  -v, --verbose             Print debug output
      --peer-id ID          Peer ID to register as when sending
  -k, --key KEY             Base64 encryption key printed by the sender
  -o, --output DIR          Directory to save the received file (default .)
  -h, --help                Show this help

Environment:
  SENDFILE_TIMEOUT_MS       Negotiation timeout in milliseconds (default 30000)`

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

interface GlobalOptions {
  server?: string
  verbose: boolean
}

export type Command =
  | {kind: 'help'}
  | {kind: 'send', file: string, peerId?: string} & GlobalOptions
  | {kind: 'receive', peerId: string, key: string, output: string} & GlobalOptions

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        server: {type: 'string', short: 's'},
        verbose: {type: 'boolean', short: 'v'},
        'peer-id': {type: 'string'},
        key: {type: 'string', short: 'k'},
        output: {type: 'string', short: 'o'},
        help: {type: 'boolean', short: 'h'}
      }
    })
  } catch (e) {
    throw new UsageError(e instanceof Error ? e.message : String(e))
  }
}

export function parseCommand(argv: string[]): Command {
  const {values, positionals} = readArgs(argv)
  if (values.help) return {kind: 'help'}

  const [command, ...rest] = positionals
  const global: GlobalOptions = {server: values.server, verbose: values.verbose ?? false}
  switch (command) {
    case 'send': {
      if (rest.length !== 1) throw new UsageError('send takes exactly one file')
      if (values.key !== undefined || values.output !== undefined) {
        throw new UsageError('--key and --output only apply to receive')
      }
      return {kind: 'send', file: rest[0], peerId: values['peer-id'], ...global}
    }
    case 'receive': {
      if (rest.length !== 1) throw new UsageError('receive takes exactly one peer ID')
      if (values.key === undefined) throw new UsageError('receive requires --key')
      if (values['peer-id'] !== undefined) throw new UsageError('--peer-id only applies to send')
      return {kind: 'receive', peerId: rest[0], key: values.key, output: values.output ?? '.', ...global}
    }
    case undefined:
      throw new UsageError('missing command')
    default:
      throw new UsageError('unknown command: ' + command)
  }
}
