// Data channel framing for the transfer protocol.
//
// Every message starts with a one-byte discriminant:
//   0  control     [0x00][UTF-8 JSON]
//   1  raw chunk   [0x01][8B index BE][payload]             (legacy, unencrypted)
//   2  enc. chunk  [0x02][8B index BE][12B nonce][ciphertext || 16B tag]
//
// parseFrame never throws: malformed input yields null.

import sodium from "libsodium-wrappers-sumo"
import {INDEX_SIZE, NONCE_SIZE, TAG_SIZE, parseFileInfoFields, type EncryptedChunk, type FileInfo} from "./crypto.js"

export const CHUNK_SIZE = 16 * 1024

export const FRAME_CONTROL = 0
export const FRAME_CHUNK = 1
export const FRAME_ENCRYPTED_CHUNK = 2

export const MIN_CHUNK_FRAME = 1 + INDEX_SIZE
export const MIN_ENCRYPTED_CHUNK_FRAME = 1 + INDEX_SIZE + NONCE_SIZE + TAG_SIZE  // 37

// -- Control messages

export type TransferMessage =
  | {type: "file_info", info: FileInfo}
  | {type: "encrypted_file_info", nonce: Uint8Array, ciphertext: Uint8Array}
  | {type: "ready"}
  | {type: "chunk", index: number}
  | {type: "ack", index: number}
  | {type: "done"}
  | {type: "error", message: string}

export interface ChunkData {
  index: number
  data: Uint8Array
}

export type ParsedFrame =
  | {kind: "control", message: TransferMessage}
  | {kind: "chunk", chunk: ChunkData}
  | {kind: "encrypted_chunk", chunk: EncryptedChunk}

export function totalChunksFor(size: number, chunkSize: number = CHUNK_SIZE): number {
  return Math.ceil(size / chunkSize)
}

export function fileInfo(filename: string, size: number): FileInfo {
  return {filename, size, chunkSize: CHUNK_SIZE, totalChunks: totalChunksFor(size)}
}

// -- Encoding

function b64(bytes: Uint8Array): string {
  return sodium.to_base64(bytes, sodium.base64_variants.ORIGINAL)
}

function controlJson(msg: TransferMessage): object {
  switch (msg.type) {
    case "file_info":
      return {
        type: "file_info",
        filename: msg.info.filename,
        size: msg.info.size,
        chunk_size: msg.info.chunkSize,
        total_chunks: msg.info.totalChunks
      }
    case "encrypted_file_info":
      return {type: "encrypted_file_info", nonce: b64(msg.nonce), ciphertext: b64(msg.ciphertext)}
    case "chunk":
    case "ack":
      return {type: msg.type, index: msg.index}
    case "error":
      return {type: "error", message: msg.message}
    case "ready":
    case "done":
      return {type: msg.type}
  }
}

export function encodeControl(msg: TransferMessage): Uint8Array {
  const json = new TextEncoder().encode(JSON.stringify(controlJson(msg)))
  const frame = new Uint8Array(1 + json.length)
  frame[0] = FRAME_CONTROL
  frame.set(json, 1)
  return frame
}

function writeIndex(frame: Uint8Array, index: number): void {
  new DataView(frame.buffer, frame.byteOffset, frame.byteLength).setBigUint64(1, BigInt(index), false)
}

export function encodeChunk(chunk: ChunkData): Uint8Array {
  const frame = new Uint8Array(MIN_CHUNK_FRAME + chunk.data.length)
  frame[0] = FRAME_CHUNK
  writeIndex(frame, chunk.index)
  frame.set(chunk.data, MIN_CHUNK_FRAME)
  return frame
}

export function encodeEncryptedChunk(chunk: EncryptedChunk): Uint8Array {
  const frame = new Uint8Array(1 + INDEX_SIZE + NONCE_SIZE + chunk.ciphertext.length)
  frame[0] = FRAME_ENCRYPTED_CHUNK
  writeIndex(frame, chunk.index)
  frame.set(chunk.nonce, 1 + INDEX_SIZE)
  frame.set(chunk.ciphertext, 1 + INDEX_SIZE + NONCE_SIZE)
  return frame
}

// -- Decoding

function readIndex(frame: Uint8Array): number | null {
  const big = new DataView(frame.buffer, frame.byteOffset, frame.byteLength).getBigUint64(1, false)
  return big > BigInt(Number.MAX_SAFE_INTEGER) ? null : Number(big)
}

function fromB64(v: unknown): Uint8Array | null {
  if (typeof v !== "string") return null
  try {
    return sodium.from_base64(v, sodium.base64_variants.ORIGINAL)
  } catch {
    return null
  }
}

function isIndex(v: unknown): v is number {
  return typeof v === "number" && Number.isSafeInteger(v) && v >= 0
}

export function decodeControl(json: unknown): TransferMessage | null {
  if (typeof json !== "object" || json === null || Array.isArray(json)) return null
  const o: {[key: string]: unknown} = {...json}
  switch (o.type) {
    case "file_info": {
      const info = parseFileInfoFields(o)
      return info ? {type: "file_info", info} : null
    }
    case "encrypted_file_info": {
      const nonce = fromB64(o.nonce)
      const ciphertext = fromB64(o.ciphertext)
      return nonce && ciphertext ? {type: "encrypted_file_info", nonce, ciphertext} : null
    }
    case "ready":
      return {type: "ready"}
    case "done":
      return {type: "done"}
    case "chunk":
    case "ack": {
      const index = o.index
      if (!isIndex(index)) return null
      return o.type === "chunk" ? {type: "chunk", index} : {type: "ack", index}
    }
    case "error": {
      const message = o.message
      return typeof message === "string" ? {type: "error", message} : null
    }
    default:
      return null
  }
}

export function parseFrame(frame: Uint8Array): ParsedFrame | null {
  if (frame.length === 0) return null
  switch (frame[0]) {
    case FRAME_CONTROL: {
      let json: unknown
      try {
        json = JSON.parse(new TextDecoder("utf-8", {fatal: true}).decode(frame.subarray(1)))
      } catch {
        return null
      }
      const message = decodeControl(json)
      return message ? {kind: "control", message} : null
    }
    case FRAME_CHUNK: {
      if (frame.length < MIN_CHUNK_FRAME) return null
      const index = readIndex(frame)
      if (index === null) return null
      return {kind: "chunk", chunk: {index, data: frame.slice(MIN_CHUNK_FRAME)}}
    }
    case FRAME_ENCRYPTED_CHUNK: {
      if (frame.length < MIN_ENCRYPTED_CHUNK_FRAME) return null
      const index = readIndex(frame)
      if (index === null) return null
      const nonce = frame.slice(1 + INDEX_SIZE, 1 + INDEX_SIZE + NONCE_SIZE)
      const ciphertext = frame.slice(1 + INDEX_SIZE + NONCE_SIZE)
      return {kind: "encrypted_chunk", chunk: {index, nonce, ciphertext}}
    }
    default:
      return null
  }
}
