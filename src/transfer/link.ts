// Shared plumbing for both transfer roles: framed send/receive over a data
// channel the engine owns exclusively once negotiation hands it over.

import type {Channel} from "../channel.js"
import {ChannelClosedError, TransferError, categorizeError} from "../errors.js"
import type {Logger} from "../log.js"
import type {DataChannel} from "../rtc/transport.js"
import {encodeControl, parseFrame, type ParsedFrame, type TransferMessage} from "./protocol.js"

// The peer sent a control `error`; nothing to report back.
export class PeerAbortError extends TransferError {
  constructor(role: string, message: string) {
    super(`${role} error: ${message}`)
    this.name = "PeerAbortError"
  }
}

export interface TransferLink {
  channel: DataChannel
  inbox: Channel<Uint8Array>
}

export function sendFrame(link: TransferLink, frame: Uint8Array): void {
  try {
    link.channel.send(frame)
  } catch (e) {
    throw new TransferError(`Failed to send data: ${e instanceof Error ? e.message : e}`, {cause: e})
  }
}

export function sendControl(link: TransferLink, msg: TransferMessage): void {
  sendFrame(link, encodeControl(msg))
}

// Next well-formed frame. Malformed frames are logged and skipped.
export async function nextFrame(link: TransferLink, log: Logger): Promise<ParsedFrame> {
  for (;;) {
    const data = await link.inbox.recv()
    if (data === null) throw new ChannelClosedError("Data channel closed")
    const frame = parseFrame(data)
    if (frame) return frame
    log.warn("Dropping unparseable frame (%d bytes)", data.length)
  }
}

// Best-effort notice to the peer before a local failure propagates.
export function reportFailure(link: TransferLink, err: unknown, log: Logger): void {
  if (err instanceof ChannelClosedError || err instanceof PeerAbortError) return
  if (link.channel.readyState() !== "open") return
  const message = categorizeError(err).message
  try {
    link.channel.send(encodeControl({type: "error", message}))
  } catch (e) {
    log.debug("Could not report failure to peer: %s", e instanceof Error ? e.message : e)
  }
}

// After Done the sender keeps the channel up until the receiver, having
// flushed its file, closes it. Resolves false if that does not happen within
// `graceMs`. Anything the peer sends meanwhile is discarded.
export async function waitForPeerClose(link: TransferLink, graceMs: number): Promise<boolean> {
  const signal = AbortSignal.timeout(graceMs)
  for (;;) {
    const data = await link.inbox.recv(signal)
    if (data === null) return !signal.aborted
  }
}

// Used on paths that are already failing or finished, so a close error is
// logged rather than raised over the result.
export async function closeQuietly(handle: {close(): Promise<void>}, log: Logger): Promise<void> {
  try {
    await handle.close()
  } catch (e) {
    log.warn("Failed to close file: %s", e instanceof Error ? e.message : e)
  }
}
