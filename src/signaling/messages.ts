// Rendezvous wire vocabulary (PeerJS server protocol).
//
// Inbound frames: {type, src?, dst?, payload?}. Outbound OFFER / ANSWER /
// CANDIDATE / HEARTBEAT mirror that shape. Decoding is total: anything that
// does not match the vocabulary decodes to null and is dropped by the caller.

// -- Shared types

export type SdpType = "offer" | "answer"

export interface SessionDescriptor {
  type: SdpType
  sdp: string
}

export interface CandidateRecord {
  candidate: string
  sdpMid?: string
  sdpMLineIndex?: number
}

export type ServerEvent =
  | {type: "OPEN"}
  | {type: "ID-TAKEN"}
  | {type: "INVALID-KEY"}
  | {type: "ERROR", message: string}
  | {type: "OFFER", src: string, descriptor: SessionDescriptor, connectionId: string}
  | {type: "ANSWER", src: string, descriptor: SessionDescriptor, connectionId: string}
  | {type: "CANDIDATE", src: string, candidate: CandidateRecord, connectionId: string}
  | {type: "LEAVE", src: string}
  | {type: "EXPIRE"}
  | {type: "HEARTBEAT"}

export type ServerEventType = ServerEvent["type"]

// Identifies this implementation in the `browser` field of SDP payloads.
export const CLIENT_NAME = "sendfile-p2p"

// -- Decoding

type JsonObject = {[key: string]: unknown}

function isObject(v: unknown): v is JsonObject {
  return typeof v === "object" && v !== null && !Array.isArray(v)
}

function optString(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined
}

function decodeDescriptor(payload: JsonObject, expected: SdpType): SessionDescriptor | null {
  const inner = payload.sdp
  if (!isObject(inner)) return null
  const sdp = optString(inner.sdp)
  if (sdp === undefined) return null
  // Some clients omit the inner type; the message type already says which it is.
  if (inner.type !== undefined && inner.type !== expected) return null
  return {type: expected, sdp}
}

function decodeCandidate(payload: JsonObject): CandidateRecord | null {
  const c = payload.candidate
  if (!isObject(c)) return null
  const candidate = optString(c.candidate)
  if (candidate === undefined) return null
  const record: CandidateRecord = {candidate}
  const mid = optString(c.sdpMid)
  if (mid !== undefined) record.sdpMid = mid
  const index = c.sdpMLineIndex
  if (typeof index === "number" && Number.isInteger(index) && index >= 0) record.sdpMLineIndex = index
  return record
}

export function decodeServerMessage(text: string): ServerEvent | null {
  let msg: unknown
  try {
    msg = JSON.parse(text)
  } catch {
    return null
  }
  if (!isObject(msg)) return null
  const type = msg.type
  if (typeof type !== "string") return null
  const src = optString(msg.src)
  const rawPayload = msg.payload
  const payload = isObject(rawPayload) ? rawPayload : null
  const connectionId = payload ? optString(payload.connectionId) : undefined
  switch (type) {
    case "OPEN":
    case "ID-TAKEN":
    case "INVALID-KEY":
    case "EXPIRE":
    case "HEARTBEAT":
      return {type}
    case "ERROR": {
      const message = payload ? optString(payload.msg) : undefined
      return {type: "ERROR", message: message ?? "Unknown error"}
    }
    case "LEAVE":
      return src === undefined ? null : {type: "LEAVE", src}
    case "OFFER":
    case "ANSWER": {
      if (src === undefined || !payload || connectionId === undefined) return null
      const descriptor = decodeDescriptor(payload, type === "OFFER" ? "offer" : "answer")
      if (!descriptor) return null
      return {type, src, descriptor, connectionId}
    }
    case "CANDIDATE": {
      if (src === undefined || !payload || connectionId === undefined) return null
      const candidate = decodeCandidate(payload)
      if (!candidate) return null
      return {type: "CANDIDATE", src, candidate, connectionId}
    }
    default:
      return null
  }
}

// -- Encoding

export interface ClientMessage {
  type: "OFFER" | "ANSWER" | "CANDIDATE" | "HEARTBEAT"
  src?: string
  dst?: string
  payload?: JsonObject
}

export function encodeHeartbeat(): ClientMessage {
  return {type: "HEARTBEAT"}
}

export function encodeOffer(src: string, dst: string, sdp: string, connectionId: string): ClientMessage {
  return {
    type: "OFFER", src, dst,
    payload: {
      sdp: {sdp, type: "offer"},
      type: "data",
      connectionId,
      browser: CLIENT_NAME,
      label: connectionId,
      reliable: true,
      serialization: "binary"
    }
  }
}

export function encodeAnswer(src: string, dst: string, sdp: string, connectionId: string): ClientMessage {
  return {
    type: "ANSWER", src, dst,
    payload: {
      sdp: {sdp, type: "answer"},
      type: "data",
      connectionId,
      browser: CLIENT_NAME
    }
  }
}

export function encodeCandidate(src: string, dst: string, candidate: CandidateRecord, connectionId: string): ClientMessage {
  const c: JsonObject = {candidate: candidate.candidate}
  c.sdpMLineIndex = candidate.sdpMLineIndex ?? null
  c.sdpMid = candidate.sdpMid ?? null
  return {
    type: "CANDIDATE", src, dst,
    payload: {candidate: c, type: "data", connectionId}
  }
}

export function serializeClientMessage(msg: ClientMessage): string {
  return JSON.stringify(msg)
}
