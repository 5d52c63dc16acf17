// Negotiation orchestrator: turns a rendezvous client and a peer transport
// into an open data channel, or a definitive failure.
//
// Offerer: create channel -> offer -> set local -> send OFFER -> loop.
// Answerer: loop until OFFER -> set remote -> answer -> set local -> send
// ANSWER -> keep looping, also watching for the incoming data channel.
//
// The loop races one pending receive per source (signaling events, local
// candidates, incoming channels, transport failure, channel ready, deadline).
// A source that loses a round keeps its pending receive for the next one, so
// nothing is dropped; on exit the receives are withdrawn through an
// AbortSignal.

import {randomUUID} from "node:crypto"
import {createChannel, createNotify, type Channel} from "../channel.js"
import {DEFAULT_CHANNEL_LABEL, DEFAULT_NEGOTIATION_TIMEOUT_MS} from "../config.js"
import {ConnectionError, SignalingError, TimeoutError, categorizeError} from "../errors.js"
import {createLogger} from "../log.js"
import {attachPipe, type ChannelPipe, type DataChannel, type PeerTransport} from "../rtc/transport.js"
import {
  recvEvent, sendAnswer, sendCandidate, sendHeartbeat, sendOffer,
  type RendezvousClient
} from "../signaling/client.js"
import type {CandidateRecord, ServerEvent, SessionDescriptor} from "../signaling/messages.js"

const log = createLogger("SESSION")

// -- Types

export type Role = "offerer" | "answerer"

interface CommonOptions {
  deadlineMs?: number
  channelLabel?: string
}

export interface OffererOptions extends CommonOptions {
  role: "offerer"
  remotePeer: string
  connectionId?: string
}

export interface AnswererOptions extends CommonOptions {
  role: "answerer"
  expectedPeer?: string  // ignore offers from anyone else
}

export type NegotiationOptions = OffererOptions | AnswererOptions

// The established channel. The orchestrator never touches it again.
export interface Session {
  channel: DataChannel
  inbox: Channel<Uint8Array>
  remotePeer: string
  connectionId: string
}

interface NegotiationState {
  role: Role
  client: RendezvousClient
  transport: PeerTransport
  remotePeer: string | null
  connectionId: string | null
  expectedPeer: string | null
  localSet: boolean
  remoteSet: boolean
  remoteCandidates: CandidateRecord[]  // arrived before the remote descriptor
  localCandidates: CandidateRecord[]   // gathered before the remote peer is known
  pipe: ChannelPipe | null
}

type LoopInput =
  | {source: "signal", event: ServerEvent}
  | {source: "candidate", candidate: CandidateRecord | null}
  | {source: "channel", pipe: ChannelPipe | null}
  | {source: "ready", pipe: ChannelPipe}
  | {source: "failed"}
  | {source: "deadline"}

// -- Descriptor bookkeeping (write-once each way)

async function setLocal(st: NegotiationState, desc: SessionDescriptor): Promise<void> {
  if (st.localSet) throw new ConnectionError("Local description already set")
  st.localSet = true
  try {
    await st.transport.setLocalDescription(desc)
  } catch (e) {
    throw new ConnectionError(`Failed to set local ${desc.type}: ${errorText(e)}`, {cause: e})
  }
}

async function setRemote(st: NegotiationState, desc: SessionDescriptor): Promise<void> {
  if (st.remoteSet) throw new ConnectionError(`Remote description already set; unexpected second ${desc.type}`)
  st.remoteSet = true
  try {
    await st.transport.setRemoteDescription(desc)
  } catch (e) {
    throw new ConnectionError(`Failed to set remote ${desc.type}: ${errorText(e)}`, {cause: e})
  }
  const buffered = st.remoteCandidates.splice(0)
  for (const c of buffered) await addRemoteCandidate(st, c)
}

async function createDescriptor(st: NegotiationState, type: "offer" | "answer"): Promise<SessionDescriptor> {
  try {
    return type === "offer" ? await st.transport.createOffer() : await st.transport.createAnswer()
  } catch (e) {
    throw new ConnectionError(`Failed to create ${type}: ${errorText(e)}`, {cause: e})
  }
}

// -- Candidates

async function addRemoteCandidate(st: NegotiationState, candidate: CandidateRecord): Promise<void> {
  if (!st.remoteSet) {
    st.remoteCandidates.push(candidate)
    return
  }
  try {
    await st.transport.addCandidate(candidate)
  } catch (e) {
    log.warn("Failed to add remote candidate: %s", errorText(e))
  }
}

async function relayLocalCandidate(st: NegotiationState, candidate: CandidateRecord): Promise<void> {
  if (st.remotePeer === null || st.connectionId === null) {
    st.localCandidates.push(candidate)
    return
  }
  try {
    await sendCandidate(st.client, st.remotePeer, candidate, st.connectionId)
  } catch (e) {
    log.warn("Failed to send candidate: %s", errorText(e))
  }
}

async function flushLocalCandidates(st: NegotiationState): Promise<void> {
  const pending = st.localCandidates.splice(0)
  for (const c of pending) await relayLocalCandidate(st, c)
}

// -- Signaling events

function fromRemote(st: NegotiationState, src: string, connectionId: string): boolean {
  return src === st.remotePeer && connectionId === st.connectionId
}

async function handleSignal(st: NegotiationState, event: ServerEvent): Promise<void> {
  switch (event.type) {
    case "HEARTBEAT":
      await sendHeartbeat(st.client)
      return
    case "ERROR":
      throw new SignalingError("SERVER", event.message)
    case "EXPIRE":
      throw new ConnectionError("Connection expired - peer not found")
    case "LEAVE":
      if (event.src === st.remotePeer) throw new ConnectionError(`Peer ${event.src} left`)
      log.debug("Ignoring LEAVE from %s", event.src)
      return
    case "OFFER":
      if (st.role === "answerer") return acceptOffer(st, event.src, event.descriptor, event.connectionId)
      if (fromRemote(st, event.src, event.connectionId)) {
        throw new ConnectionError("Unexpected OFFER from the answering peer")
      }
      log.debug("Ignoring OFFER from %s", event.src)
      return
    case "ANSWER":
      if (st.role === "offerer" && fromRemote(st, event.src, event.connectionId)) {
        log.info("Received answer from: %s", event.src)
        await setRemote(st, event.descriptor)
        return
      }
      log.debug("Ignoring ANSWER from %s (%s)", event.src, event.connectionId)
      return
    case "CANDIDATE":
      if (fromRemote(st, event.src, event.connectionId)) {
        await addRemoteCandidate(st, event.candidate)
        return
      }
      log.debug("Ignoring CANDIDATE from %s (%s)", event.src, event.connectionId)
      return
    default:
      log.debug("Ignoring %s during negotiation", event.type)
  }
}

async function acceptOffer(
  st: NegotiationState, src: string, offer: SessionDescriptor, connectionId: string
): Promise<void> {
  if (st.remotePeer !== null) {
    if (fromRemote(st, src, connectionId)) return setRemote(st, offer)
    log.debug("Ignoring OFFER from %s; already negotiating with %s", src, st.remotePeer)
    return
  }
  if (st.expectedPeer !== null && src !== st.expectedPeer) {
    log.debug("Ignoring OFFER from unexpected peer %s", src)
    return
  }
  log.info("Received offer from: %s", src)
  st.remotePeer = src
  st.connectionId = connectionId
  await setRemote(st, offer)
  const answer = await createDescriptor(st, "answer")
  await setLocal(st, answer)
  await sendAnswer(st.client, src, answer.sdp, connectionId)
  await flushLocalCandidates(st)
}

// -- Entry point

export async function negotiate(
  client: RendezvousClient,
  transport: PeerTransport,
  options: NegotiationOptions
): Promise<Session> {
  const deadlineMs = options.deadlineMs ?? DEFAULT_NEGOTIATION_TIMEOUT_MS
  const label = options.channelLabel ?? DEFAULT_CHANNEL_LABEL
  const st: NegotiationState = {
    role: options.role,
    client,
    transport,
    remotePeer: options.role === "offerer" ? options.remotePeer : null,
    connectionId: options.role === "offerer" ? options.connectionId ?? "dc_" + randomUUID() : null,
    expectedPeer: options.role === "answerer" ? options.expectedPeer ?? null : null,
    localSet: false,
    remoteSet: false,
    remoteCandidates: [],
    localCandidates: [],
    pipe: null
  }

  const abort = new AbortController()
  const candidates = createChannel<CandidateRecord>()
  const incoming = createChannel<ChannelPipe>()
  const failed = createNotify()

  transport.onCandidate(c => {
    if (!candidates.send(c)) log.debug("Dropping local candidate gathered after negotiation ended")
  })
  transport.onConnectionStateChange(state => {
    if (state === "failed") failed.fire()
  })
  transport.onIncomingDataChannel(dc => {
    // Attach handlers before anything else can arrive on the channel.
    if (st.role !== "answerer" || st.pipe !== null || incoming.isClosed()) {
      log.info("Closing extra data channel '%s'", dc.label)
      dc.close()
      return
    }
    st.pipe = attachPipe(dc)
    incoming.send(st.pipe)
  })

  // The deadline covers the exchange itself: the offerer arms it once the
  // offer is out, the answerer once its answer is. An answerer waits for an
  // offer indefinitely.
  let timer: ReturnType<typeof setTimeout> | undefined
  let deadline: Promise<LoopInput> | null = null
  const armDeadline = () => new Promise<LoopInput>(resolve => {
    timer = setTimeout(() => resolve({source: "deadline"}), deadlineMs)
  })
  const transportFailed = failed.promise.then((): LoopInput => ({source: "failed"}))

  let signalP: Promise<LoopInput> | null = null
  let candidateP: Promise<LoopInput> | null = null
  let incomingP: Promise<LoopInput> | null = null
  let readyP: Promise<LoopInput> | null = null
  let candidatesOpen = true
  let succeeded = false

  try {
    if (st.role === "offerer" && st.remotePeer !== null && st.connectionId !== null) {
      const pipe = attachPipe(await createChannelFor(transport, label))
      st.pipe = pipe
      readyP = pipe.opened.then((): LoopInput => ({source: "ready", pipe}))
      const offer = await createDescriptor(st, "offer")
      await setLocal(st, offer)
      await sendOffer(client, st.remotePeer, offer.sdp, st.connectionId)
      log.info("Sent offer to %s", st.remotePeer)
    } else {
      log.info("Waiting for an offer...")
    }

    for (;;) {
      signalP ??= recvEvent(client, abort.signal).then((event): LoopInput => ({source: "signal", event}))
      if (candidatesOpen) {
        candidateP ??= candidates.recv(abort.signal).then((candidate): LoopInput => ({source: "candidate", candidate}))
      }
      if (st.role === "answerer" && readyP === null) {
        incomingP ??= incoming.recv(abort.signal).then((pipe): LoopInput => ({source: "channel", pipe}))
      }
      if (deadline === null && st.localSet) deadline = armDeadline()
      const racers = [signalP, transportFailed]
      if (deadline) racers.push(deadline)
      if (candidateP) racers.push(candidateP)
      if (incomingP) racers.push(incomingP)
      if (readyP) racers.push(readyP)

      const input = await Promise.race(racers)
      switch (input.source) {
        case "signal":
          signalP = null
          await handleSignal(st, input.event)
          break
        case "candidate":
          candidateP = null
          if (input.candidate) await relayLocalCandidate(st, input.candidate)
          else candidatesOpen = false
          break
        case "channel": {
          incomingP = null
          const pipe = input.pipe
          if (pipe) {
            log.info("Received data channel: %s", pipe.channel.label)
            readyP = pipe.opened.then((): LoopInput => ({source: "ready", pipe}))
          }
          break
        }
        case "ready": {
          if (st.remotePeer === null || st.connectionId === null) {
            throw new ConnectionError("Data channel opened before the remote peer was known")
          }
          log.info("Data channel opened!")
          succeeded = true
          return {
            channel: input.pipe.channel,
            inbox: input.pipe.inbox,
            remotePeer: st.remotePeer,
            connectionId: st.connectionId
          }
        }
        case "failed":
          throw new ConnectionError("Peer connection failed")
        case "deadline":
          throw new TimeoutError()
      }
    }
  } catch (e) {
    const err = categorizeError(e)
    log.debug("Negotiation failed: %s", err.message)
    throw err
  } finally {
    clearTimeout(timer)
    abort.abort()
    candidates.close()
    incoming.close()
    await drainSignal(st, signalP, abort.signal, succeeded)
    if (!succeeded) await closeQuietly(transport)
  }
}

async function createChannelFor(transport: PeerTransport, label: string): Promise<DataChannel> {
  try {
    return await transport.createDataChannel(label)
  } catch (e) {
    throw new ConnectionError(`Failed to create data channel: ${errorText(e)}`, {cause: e})
  }
}

// A signaling receive still pending at exit is withdrawn by the abort. One
// that already took an event must not lose it silently: a HEARTBEAT is still
// answered once the session is up; anything else is logged.
async function drainSignal(
  st: NegotiationState, pending: Promise<LoopInput> | null, signal: AbortSignal, succeeded: boolean
): Promise<void> {
  if (!pending) return
  let input: LoopInput
  try {
    input = await pending
  } catch (e) {
    if (e !== signal.reason) log.debug("Signaling receive ended: %s", errorText(e))
    return
  }
  if (input.source !== "signal") return
  if (input.event.type === "HEARTBEAT" && succeeded) {
    try {
      await sendHeartbeat(st.client)
    } catch (e) {
      log.warn("Heartbeat failed: %s", errorText(e))
    }
    return
  }
  log.debug("Dropping %s received as negotiation ended", input.event.type)
}

async function closeQuietly(transport: PeerTransport): Promise<void> {
  try {
    await transport.close()
  } catch (e) {
    log.warn("Failed to close peer transport: %s", errorText(e))
  }
}

function errorText(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}
