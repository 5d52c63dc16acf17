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
import {generateKey, keyToBase64} from '../src/transfer/crypto.js'
import {waitForPeerClose} from '../src/transfer/link.js'
import {sendFile} from '../src/transfer/sender.js'
import {createProgressBar, formatSize} from './progress.js'
import {closeTransport} from './shared.js'

const log = createLogger('CLI')

// How long Done may take to reach the receiver before the connection drops.
const DONE_GRACE_MS = 5000

export interface SendArgs {
  file: string
  peerId?: string
}

export async function runSend(args: SendArgs, config: AppConfig): Promise<void> {
  const path = resolve(args.file)
  let isFile: boolean
  try {
    isFile = (await stat(path)).isFile()
  } catch (e) {
    throw categorizeError(e)
  }
  if (!isFile) throw new IoError(`${path}: not a regular file`)

  const peerId = args.peerId ?? generatePeerId()
  const client = await connectRendezvous(peerId, config.rendezvous)
  let transport: PeerTransport | null = null
  try {
    await waitForOpen(client)
    const key = generateKey()
    const encodedKey = keyToBase64(key)
    console.log(`Your peer ID: ${peerId}`)
    console.log(`Encryption key: ${encodedKey}`)
    console.log('')
    console.log('On the receiving machine run:')
    console.log(`  sendfile receive ${peerId} --key ${encodedKey}`)
    log.info('Waiting for receiver to connect...')

    transport = createWeriftTransport(config.iceServers)
    const session = await negotiate(client, transport, {
      role: 'answerer',
      deadlineMs: config.negotiationTimeoutMs
    })
    log.info('Connected to %s', session.remotePeer)

    const keepalive = new AbortController()
    const relaying = relayKeepalives(client, keepalive.signal)
      .catch(e => log.warn('Keepalive stopped: %s', e instanceof Error ? e.message : e))
    const progress = createProgressBar('Sending')
    try {
      const result = await sendFile(path, session, key, {
        onProgress: (sent, total) => progress.update(sent, total)
      })
      log.info('Sent %s (%s)', result.filename, formatSize(result.size))
      if (!(await waitForPeerClose(session, DONE_GRACE_MS))) {
        log.warn('Receiver did not close the connection; it may not have saved the file')
      }
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
