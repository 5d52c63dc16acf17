import {stat} from 'node:fs/promises'
import {resolve} from 'node:path'
import type {AppConfig} from '../src/config.js'
import {IoError, categorizeError} from '../src/errors.js'
import {generatePeerId} from '../src/identity.js'
import {createLogger} from '../src/log.js'
import type {PeerTransport} from '../src/rtc/transport.js'
import {createWeriftTransport} from '../src/rtc/werift.js'
import {negotiate} from '../src/session/negotiate.js'
import {closeRendezvous, connectRendezvous, relayKeepalives, waitForOpen} from '../src/signaling/client.js'
import {keyFromBase64} from '../src/transfer/crypto.js'
import {receiveFile} from '../src/transfer/receiver.js'
import {createProgressBar, formatSize} from './progress.js'
import {closeTransport} from './shared.js'

const log = createLogger('CLI')

export interface ReceiveArgs {
  peerId: string
  key: string
  output: string
}

export async function runReceive(args: ReceiveArgs, config: AppConfig): Promise<void> {
  // Reject a bad key before touching the network.
  const key = keyFromBase64(args.key)
  const outputDir = resolve(args.output)
  let isDir: boolean
  try {
    isDir = (await stat(outputDir)).isDirectory()
  } catch (e) {
    throw categorizeError(e)
  }
  if (!isDir) throw new IoError(`${outputDir}: not a directory`)

  const client = await connectRendezvous(generatePeerId(), config.rendezvous)
  let transport: PeerTransport | null = null
  try {
    await waitForOpen(client)
    log.info('Connecting to %s...', args.peerId)

    transport = createWeriftTransport(config.iceServers)
    const session = await negotiate(client, transport, {
      role: 'offerer',
      remotePeer: args.peerId,
      deadlineMs: config.negotiationTimeoutMs
    })
    log.info('Connected to %s', session.remotePeer)

    const keepalive = new AbortController()
    const relaying = relayKeepalives(client, keepalive.signal)
      .catch(e => log.warn('Keepalive stopped: %s', e instanceof Error ? e.message : e))
    const progress = createProgressBar('Receiving')
    try {
      const saved = await receiveFile(outputDir, session, key, {
        onFileInfo: info => log.info('Incoming file: %s (%s)', info.filename, formatSize(info.size)),
        onProgress: (written, total) => progress.update(written, total)
      })
      progress.finish()
      console.log(`Saved to: ${saved}`)
    } finally {
      progress.finish()
      keepalive.abort()
      await relaying
    }
  } finally {
    if (transport) await closeTransport(transport)
    closeRendezvous(client)
  }
}
