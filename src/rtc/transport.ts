// Peer transport capability.
//
// The negotiation and transfer layers only see these interfaces; the WebRTC
// engine behind them (werift.ts in production, linked fakes in tests) is
// interchangeable.

import {createChannel, createNotify, type Channel} from "../channel.js"
import {createLogger} from "../log.js"
import type {CandidateRecord, SessionDescriptor} from "../signaling/messages.js"

const log = createLogger("RTC")

export type DataChannelState = "connecting" | "open" | "closing" | "closed"

export type ConnectionState = "new" | "connecting" | "connected" | "disconnected" | "failed" | "closed"

export interface DataChannel {
  readonly label: string
  readyState(): DataChannelState
  send(data: Uint8Array): void
  onOpen(cb: () => void): void
  onMessage(cb: (data: Uint8Array) => void): void
  onClose(cb: () => void): void
  onError(cb: (err: Error) => void): void
  close(): void
}

export interface PeerTransport {
  createDataChannel(label: string): Promise<DataChannel>
  createOffer(): Promise<SessionDescriptor>
  createAnswer(): Promise<SessionDescriptor>
  setLocalDescription(desc: SessionDescriptor): Promise<void>
  setRemoteDescription(desc: SessionDescriptor): Promise<void>
  addCandidate(candidate: CandidateRecord): Promise<void>
  onCandidate(cb: (candidate: CandidateRecord) => void): void
  onConnectionStateChange(cb: (state: ConnectionState) => void): void
  onIncomingDataChannel(cb: (channel: DataChannel) => void): void
  close(): Promise<void>
}

// -- Message pipe

// A data channel with its inbound messages queued. Attach the pipe as soon as
// the channel exists so nothing delivered before the consumer starts is lost.
export interface ChannelPipe {
  channel: DataChannel
  inbox: Channel<Uint8Array>
  opened: Promise<void>
}

export function attachPipe(channel: DataChannel): ChannelPipe {
  const inbox = createChannel<Uint8Array>()
  const open = createNotify()
  const label = channel.label

  channel.onOpen(() => {
    log.info("Data channel '%s' opened", label)
    open.fire()
  })
  channel.onMessage(data => {
    log.debug("Received %d bytes on channel '%s'", data.length, label)
    inbox.send(data)
  })
  channel.onError(err => {
    log.error("Data channel '%s' error: %s", label, err.message)
  })
  channel.onClose(() => {
    log.info("Data channel '%s' closed", label)
    inbox.close()
  })
  if (channel.readyState() === "open") open.fire()

  return {channel, inbox, opened: open.promise}
}
