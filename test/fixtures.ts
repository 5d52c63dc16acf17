// In-process stand-ins for the network: data channel pairs, linked peer
// transports and a rendezvous relay that routes messages between sockets.

import {createChannel} from '../src/channel.js'
import {DEFAULT_RENDEZVOUS_CONFIG} from '../src/config.js'
import type {
  ConnectionState, DataChannel, DataChannelState, PeerTransport
} from '../src/rtc/transport.js'
import type {OpenSocket, RendezvousClient, SocketHandlers} from '../src/signaling/client.js'
import type {CandidateRecord, ServerEvent, SessionDescriptor} from '../src/signaling/messages.js'

// -- Data channels

export class MemoryDataChannel implements DataChannel {
  state: DataChannelState = 'connecting'
  peer: MemoryDataChannel | null = null
  readonly sent: Uint8Array[] = []
  private openCbs: Array<() => void> = []
  private messageCbs: Array<(data: Uint8Array) => void> = []
  private closeCbs: Array<() => void> = []

  constructor(readonly label: string) {}

  readyState(): DataChannelState {
    return this.state
  }

  send(data: Uint8Array): void {
    if (this.state !== 'open') throw new Error('channel not open')
    const copy = data.slice()
    this.sent.push(copy)
    const peer = this.peer
    queueMicrotask(() => peer?.deliver(copy))
  }

  deliver(data: Uint8Array): void {
    if (this.state !== 'open') return
    for (const cb of this.messageCbs) cb(data)
  }

  open(): void {
    if (this.state !== 'connecting') return
    this.state = 'open'
    for (const cb of this.openCbs) cb()
  }

  onOpen(cb: () => void): void { this.openCbs.push(cb) }
  onMessage(cb: (data: Uint8Array) => void): void { this.messageCbs.push(cb) }
  onClose(cb: () => void): void { this.closeCbs.push(cb) }
  onError(): void {}

  close(): void {
    for (const dc of [this, this.peer]) {
      if (!dc || dc.state === 'closed') continue
      dc.state = 'closed'
      const cbs = dc.closeCbs
      queueMicrotask(() => { for (const cb of cbs) cb() })
    }
  }
}

export function linkChannels(a: MemoryDataChannel, b: MemoryDataChannel): void {
  a.peer = b
  b.peer = a
}

export function createOpenChannelPair(label = 'file-transfer'): [MemoryDataChannel, MemoryDataChannel] {
  const a = new MemoryDataChannel(label)
  const b = new MemoryDataChannel(label)
  linkChannels(a, b)
  a.open()
  b.open()
  return [a, b]
}

// -- Peer transports

// Two fake transports that "connect" once both sides hold a local and a
// remote description. Each emits its scripted candidates after its local
// description is set.
export class FakeTransport implements PeerTransport {
  readonly calls: string[] = []
  readonly added: CandidateRecord[] = []
  readonly channels: MemoryDataChannel[] = []
  local: SessionDescriptor | null = null
  remote: SessionDescriptor | null = null
  peer: FakeTransport | null = null
  connected = false
  closed = false
  private candidateCbs: Array<(c: CandidateRecord) => void> = []
  private stateCbs: Array<(s: ConnectionState) => void> = []
  private incomingCbs: Array<(dc: DataChannel) => void> = []

  constructor(readonly name: string, readonly localCandidates: CandidateRecord[] = []) {}

  async createDataChannel(label: string): Promise<DataChannel> {
    this.calls.push('createDataChannel')
    const dc = new MemoryDataChannel(label)
    this.channels.push(dc)
    return dc
  }

  async createOffer(): Promise<SessionDescriptor> {
    this.calls.push('createOffer')
    return {type: 'offer', sdp: `offer-from-${this.name}`}
  }

  async createAnswer(): Promise<SessionDescriptor> {
    this.calls.push('createAnswer')
    if (!this.remote) throw new Error('no remote offer')
    return {type: 'answer', sdp: `answer-from-${this.name}`}
  }

  async setLocalDescription(desc: SessionDescriptor): Promise<void> {
    this.calls.push('setLocal:' + desc.type)
    this.local = desc
    for (const c of this.localCandidates) queueMicrotask(() => this.emitCandidate(c))
    this.maybeConnect()
  }

  async setRemoteDescription(desc: SessionDescriptor): Promise<void> {
    this.calls.push('setRemote:' + desc.type)
    this.remote = desc
    this.maybeConnect()
  }

  async addCandidate(candidate: CandidateRecord): Promise<void> {
    this.calls.push('addCandidate:' + candidate.candidate)
    if (!this.remote) throw new Error('remote description not set')
    this.added.push(candidate)
  }

  onCandidate(cb: (c: CandidateRecord) => void): void { this.candidateCbs.push(cb) }
  onConnectionStateChange(cb: (s: ConnectionState) => void): void { this.stateCbs.push(cb) }
  onIncomingDataChannel(cb: (dc: DataChannel) => void): void { this.incomingCbs.push(cb) }

  emitCandidate(c: CandidateRecord): void {
    for (const cb of this.candidateCbs) cb(c)
  }

  emitState(s: ConnectionState): void {
    for (const cb of this.stateCbs) cb(s)
  }

  emitIncoming(dc: DataChannel): void {
    for (const cb of this.incomingCbs) cb(dc)
  }

  async close(): Promise<void> {
    this.calls.push('close')
    this.closed = true
    for (const dc of this.channels) dc.close()
  }

  private maybeConnect(): void {
    const peer = this.peer
    if (!peer || this.connected || !this.local || !this.remote || !peer.local || !peer.remote) return
    this.connected = true
    peer.connected = true
    const offerer = this.local.type === 'offer' ? this : peer
    const answerer = offerer === this ? peer : this
    for (const dc of offerer.channels) {
      const remote = new MemoryDataChannel(dc.label)
      linkChannels(dc, remote)
      answerer.channels.push(remote)
      queueMicrotask(() => {
        answerer.emitIncoming(remote)
        dc.open()
        remote.open()
      })
    }
  }
}

export function createTransportPair(
  offererCandidates: CandidateRecord[] = [],
  answererCandidates: CandidateRecord[] = []
): [FakeTransport, FakeTransport] {
  const a = new FakeTransport('offerer', offererCandidates)
  const b = new FakeTransport('answerer', answererCandidates)
  a.peer = b
  b.peer = a
  return [a, b]
}

// -- Rendezvous

export interface SentMessage {
  from: string
  type: string
  dst?: string
  payload?: unknown
}

// Routes OFFER/ANSWER/CANDIDATE by `dst` the way the rendezvous server does;
// answers OPEN on connect and EXPIRE for unknown destinations.
export function createMemoryRelay() {
  const peers = new Map<string, SocketHandlers>()
  const sent: SentMessage[] = []
  const urls: string[] = []

  const openSocket: OpenSocket = async (url, handlers) => {
    urls.push(url)
    const id = new URL(url).searchParams.get('id') ?? ''
    if (peers.has(id)) {
      queueMicrotask(() => handlers.onMessage(JSON.stringify({type: 'ID-TAKEN', payload: {msg: 'ID is taken'}})))
    } else {
      peers.set(id, handlers)
      queueMicrotask(() => handlers.onMessage(JSON.stringify({type: 'OPEN'})))
    }
    return {
      async send(text) {
        const msg: {type: string, dst?: string, payload?: unknown} = JSON.parse(text)
        sent.push({from: id, ...msg})
        if (msg.dst === undefined) return
        const target = peers.get(msg.dst)
        if (!target) {
          queueMicrotask(() => handlers.onMessage(JSON.stringify({type: 'EXPIRE', src: msg.dst})))
          return
        }
        const forwarded = JSON.stringify({type: msg.type, src: id, dst: msg.dst, payload: msg.payload})
        queueMicrotask(() => target.onMessage(forwarded))
      },
      close() {
        if (peers.get(id) === handlers) peers.delete(id)
      }
    }
  }

  return {openSocket, sent, urls, peers}
}

// A client whose events are pushed by the test and whose outbound messages are
// recorded as parsed JSON.
export interface FakeClient {
  client: RendezvousClient
  sent: Array<{type: string, dst?: string, payload?: unknown}>
  push(event: ServerEvent): void
  failSends: boolean
}

export function createFakeClient(peerId = 'test-peer'): FakeClient {
  const events = createChannel<ServerEvent>()
  const fake: FakeClient = {
    client: {
      peerId,
      config: {...DEFAULT_RENDEZVOUS_CONFIG, heartbeatIntervalMs: 0},
      socket: {
        async send(text) {
          if (fake.failSends) throw new Error('socket closed')
          fake.sent.push(JSON.parse(text))
        },
        close() {
          events.close()
        }
      },
      events,
      heartbeatTimer: null
    },
    sent: [],
    push: event => { events.send(event) },
    failSends: false
  }
  return fake
}

// -- Misc

export function tick(ms = 0): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}
