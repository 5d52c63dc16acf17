// Rendezvous protocol client.
//
// Keeps one WebSocket to the relay server open for the life of a session.
// Inbound frames are decoded by socket handlers into `events`; callers pull
// them with recvEvent. Outbound messages are written straight to the socket.

import {randomUUID} from "node:crypto"
import WebSocket from "ws"
import {createChannel, type Channel} from "../channel.js"
import {DEFAULT_RENDEZVOUS_CONFIG, type RendezvousConfig} from "../config.js"
import {ChannelClosedError, SignalingError} from "../errors.js"
import {isValidPeerId} from "../identity.js"
import {createLogger} from "../log.js"
import {
  decodeServerMessage, serializeClientMessage,
  encodeOffer, encodeAnswer, encodeCandidate, encodeHeartbeat,
  type ServerEvent, type CandidateRecord, type ClientMessage
} from "./messages.js"

const log = createLogger("SIGNAL")

// -- Socket seam

export interface SignalingSocket {
  send(text: string): Promise<void>
  close(): void
}

export interface SocketHandlers {
  onMessage(text: string): void
  onClose(reason: string): void
}

export type OpenSocket = (url: string, handlers: SocketHandlers) => Promise<SignalingSocket>

function rawDataToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8")
  if (Buffer.isBuffer(data)) return data.toString("utf-8")
  return Buffer.from(data).toString("utf-8")
}

export function rawDataLength(data: WebSocket.RawData): number {
  if (Array.isArray(data)) return data.reduce((n, part) => n + part.length, 0)
  return data.byteLength
}

export function openWebSocket(url: string, handlers: SocketHandlers): Promise<SignalingSocket> {
  return new Promise((resolve, reject) => {
    const ws = new WebSocket(url)
    let opened = false
    ws.on("open", () => {
      opened = true
      resolve({
        send(text: string): Promise<void> {
          if (ws.readyState !== WebSocket.OPEN) return Promise.reject(new Error("WebSocket not open"))
          return new Promise((res, rej) => ws.send(text, err => err ? rej(err) : res()))
        },
        close() {
          ws.close()
        }
      })
    })
    ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
      if (isBinary) {
        log.debug("Ignoring binary frame (%d bytes)", rawDataLength(data))
        return
      }
      handlers.onMessage(rawDataToString(data))
    })
    ws.on("error", (err: Error) => {
      if (!opened) reject(err)
      else log.error("WebSocket error: %s", err.message)
    })
    ws.on("close", (code: number, reason: Buffer) => {
      if (!opened) {
        reject(new Error(`WebSocket closed before open (code ${code})`))
        return
      }
      handlers.onClose(reason.length > 0 ? reason.toString("utf-8") : `code ${code}`)
    })
  })
}

// -- Client

export interface RendezvousClient {
  peerId: string
  config: RendezvousConfig
  socket: SignalingSocket
  events: Channel<ServerEvent>
  heartbeatTimer: ReturnType<typeof setInterval> | null
}

export function rendezvousUrl(config: RendezvousConfig, peerId: string, token: string): string {
  const scheme = config.secure ? "wss" : "ws"
  const defaultPort = config.secure ? 443 : 80
  const hostPort = config.port === defaultPort ? config.host : `${config.host}:${config.port}`
  const query = new URLSearchParams({key: config.apiKey, id: peerId, token})
  return `${scheme}://${hostPort}${config.path}?${query.toString()}`
}

export async function connectRendezvous(
  peerId: string,
  config?: Partial<RendezvousConfig>,
  openSocket: OpenSocket = openWebSocket
): Promise<RendezvousClient> {
  if (!isValidPeerId(peerId)) throw new SignalingError("INVALID_ID", JSON.stringify(peerId))
  const cfg: RendezvousConfig = {...DEFAULT_RENDEZVOUS_CONFIG, ...config}
  const url = rendezvousUrl(cfg, peerId, randomUUID())
  const events = createChannel<ServerEvent>()

  log.info("Connecting to signaling server: %s", cfg.host)
  log.debug("WebSocket URL: %s", url)

  let socket: SignalingSocket
  try {
    socket = await openSocket(url, {
      onMessage(text) {
        log.debug("Received: %s", text)
        const event = decodeServerMessage(text)
        if (!event) {
          log.warn("Failed to parse server message: %s", text)
          return
        }
        events.send(event)
      },
      onClose(reason) {
        log.info("WebSocket closed by server (%s)", reason)
        events.close()
      }
    })
  } catch (e) {
    throw new SignalingError("TRANSPORT", e instanceof Error ? e.message : String(e), {cause: e})
  }

  const client: RendezvousClient = {peerId, config: cfg, socket, events, heartbeatTimer: null}
  if (cfg.heartbeatIntervalMs > 0) {
    client.heartbeatTimer = setInterval(() => {
      sendHeartbeat(client).catch(e => log.warn("Heartbeat failed: %s", e instanceof Error ? e.message : e))
    }, cfg.heartbeatIntervalMs)
    client.heartbeatTimer.unref()
  }
  return client
}

export function closeRendezvous(client: RendezvousClient): void {
  if (client.heartbeatTimer) {
    clearInterval(client.heartbeatTimer)
    client.heartbeatTimer = null
  }
  client.socket.close()
  client.events.close()
}

// -- Receiving

export async function recvEvent(client: RendezvousClient, signal?: AbortSignal): Promise<ServerEvent> {
  const event = await client.events.recv(signal)
  if (event === null) {
    if (signal?.aborted) throw signal.reason
    throw new ChannelClosedError("Signaling connection closed")
  }
  return event
}

export async function waitForOpen(client: RendezvousClient): Promise<void> {
  for (;;) {
    const event = await recvEvent(client)
    switch (event.type) {
      case "OPEN":
        log.info("Connected to signaling server as: %s", client.peerId)
        return
      case "ID-TAKEN":
        throw new SignalingError("ID_TAKEN", `Peer ID already taken: ${client.peerId}`)
      case "INVALID-KEY":
        throw new SignalingError("INVALID_KEY", "Invalid API key")
      case "ERROR":
        throw new SignalingError("SERVER", event.message)
      case "HEARTBEAT":
        await sendHeartbeat(client)
        break
      default:
        log.debug("Ignoring %s while waiting for OPEN", event.type)
    }
  }
}

// Answers HEARTBEAT events while the transfer owns the process, so the
// registration stays alive after negotiation stops reading events.
// Returns when `signal` aborts or the connection closes.
export async function relayKeepalives(client: RendezvousClient, signal: AbortSignal): Promise<void> {
  while (!signal.aborted) {
    const event = await client.events.recv(signal)
    if (event === null) return
    if (event.type === "HEARTBEAT") {
      await sendHeartbeat(client)
    } else {
      log.debug("Ignoring %s during transfer", event.type)
    }
  }
}

// -- Sending

async function sendMessage(client: RendezvousClient, msg: ClientMessage): Promise<void> {
  const json = serializeClientMessage(msg)
  log.debug("Sending: %s", json)
  try {
    await client.socket.send(json)
  } catch (e) {
    throw new SignalingError("TRANSPORT", `Failed to send ${msg.type}: ${e instanceof Error ? e.message : e}`, {cause: e})
  }
}

export function sendHeartbeat(client: RendezvousClient): Promise<void> {
  return sendMessage(client, encodeHeartbeat())
}

export function sendOffer(client: RendezvousClient, dst: string, sdp: string, connectionId: string): Promise<void> {
  return sendMessage(client, encodeOffer(client.peerId, dst, sdp, connectionId))
}

export function sendAnswer(client: RendezvousClient, dst: string, sdp: string, connectionId: string): Promise<void> {
  return sendMessage(client, encodeAnswer(client.peerId, dst, sdp, connectionId))
}

export function sendCandidate(
  client: RendezvousClient, dst: string, candidate: CandidateRecord, connectionId: string
): Promise<void> {
  return sendMessage(client, encodeCandidate(client.peerId, dst, candidate, connectionId))
}
