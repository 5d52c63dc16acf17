import {createLogger} from '../src/log.js'
import type {PeerTransport} from '../src/rtc/transport.js'

const log = createLogger('CLI')

export async function closeTransport(transport: PeerTransport): Promise<void> {
  try {
    await transport.close()
  } catch (e) {
    log.warn('Failed to close peer connection: %s', e instanceof Error ? e.message : e)
  }
}
