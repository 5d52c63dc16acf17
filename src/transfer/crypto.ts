// Per-chunk authenticated encryption -- ChaCha20-Poly1305 (IETF) via libsodium.
//
// Nonce layout (12 bytes): [8B chunk index, big-endian][4B per-transfer salt].
// Nonces are unique as long as the salt is fresh per transfer and the sender
// never reuses an index. The 16-byte Poly1305 tag trails the ciphertext.
//
// Callers must `await sodium.ready` before using anything here.

import sodium from "libsodium-wrappers-sumo"
import {EncryptionError} from "../errors.js"

export const KEY_SIZE = 32
export const NONCE_SIZE = 12
export const TAG_SIZE = 16
export const SALT_SIZE = 4
export const INDEX_SIZE = 8

// -- Key material

export function generateKey(): Uint8Array {
  return sodium.randombytes_buf(KEY_SIZE)
}

export function generateSalt(): Uint8Array {
  return sodium.randombytes_buf(SALT_SIZE)
}

export function keyToBase64(key: Uint8Array): string {
  return sodium.to_base64(key, sodium.base64_variants.ORIGINAL)
}

export function keyFromBase64(encoded: string): Uint8Array {
  let bytes: Uint8Array
  try {
    bytes = sodium.from_base64(encoded.trim(), sodium.base64_variants.ORIGINAL)
  } catch (e) {
    throw new EncryptionError("Invalid base64 key", {cause: e})
  }
  if (bytes.length !== KEY_SIZE) {
    throw new EncryptionError(`Invalid key length: expected ${KEY_SIZE} bytes, got ${bytes.length}`)
  }
  return bytes
}

// -- Nonces

export function createNonce(index: number, salt: Uint8Array): Uint8Array {
  if (!Number.isSafeInteger(index) || index < 0) throw new EncryptionError("Invalid chunk index: " + index)
  if (salt.length !== SALT_SIZE) throw new EncryptionError(`Salt must be ${SALT_SIZE} bytes`)
  const nonce = new Uint8Array(NONCE_SIZE)
  new DataView(nonce.buffer).setBigUint64(0, BigInt(index), false)
  nonce.set(salt, INDEX_SIZE)
  return nonce
}

export function nonceIndex(nonce: Uint8Array): bigint {
  return new DataView(nonce.buffer, nonce.byteOffset, nonce.byteLength).getBigUint64(0, false)
}

// -- Chunks

export interface EncryptedChunk {
  index: number
  nonce: Uint8Array       // 12 bytes
  ciphertext: Uint8Array  // includes the 16-byte tag
}

function checkKey(key: Uint8Array): void {
  if (key.length !== KEY_SIZE) throw new EncryptionError(`Key must be ${KEY_SIZE} bytes, got ${key.length}`)
}

function seal(key: Uint8Array, nonce: Uint8Array, plaintext: Uint8Array): Uint8Array {
  return sodium.crypto_aead_chacha20poly1305_ietf_encrypt(plaintext, null, null, nonce, key)
}

function open(key: Uint8Array, nonce: Uint8Array, ciphertext: Uint8Array, what: string): Uint8Array {
  if (nonce.length !== NONCE_SIZE) throw new EncryptionError(`${what}: nonce must be ${NONCE_SIZE} bytes`)
  if (ciphertext.length < TAG_SIZE) throw new EncryptionError(`${what}: ciphertext shorter than tag`)
  try {
    return sodium.crypto_aead_chacha20poly1305_ietf_decrypt(null, ciphertext, null, nonce, key)
  } catch (e) {
    throw new EncryptionError(`${what}: authentication tag mismatch`, {cause: e})
  }
}

export function encryptChunk(key: Uint8Array, index: number, salt: Uint8Array, plaintext: Uint8Array): EncryptedChunk {
  checkKey(key)
  const nonce = createNonce(index, salt)
  return {index, nonce, ciphertext: seal(key, nonce, plaintext)}
}

// The nonce's index prefix must agree with the frame index, so a relabelled
// chunk is rejected even though its tag is valid.
export function decryptChunk(key: Uint8Array, chunk: EncryptedChunk): Uint8Array {
  checkKey(key)
  if (chunk.nonce.length === NONCE_SIZE && nonceIndex(chunk.nonce) !== BigInt(chunk.index)) {
    throw new EncryptionError(`Chunk ${chunk.index}: nonce does not match chunk index`)
  }
  return open(key, chunk.nonce, chunk.ciphertext, `Chunk ${chunk.index}`)
}

// -- File metadata

export interface FileInfo {
  filename: string
  size: number
  chunkSize: number
  totalChunks: number
}

export interface EncryptedMetadata {
  nonce: Uint8Array
  ciphertext: Uint8Array
}

function encodeFileInfoJson(info: FileInfo): string {
  return JSON.stringify({
    filename: info.filename,
    size: info.size,
    chunk_size: info.chunkSize,
    total_chunks: info.totalChunks
  })
}

export function parseFileInfoFields(v: unknown): FileInfo | null {
  if (typeof v !== "object" || v === null) return null
  const o: {[key: string]: unknown} = {...v}
  const {filename, size, chunk_size, total_chunks} = o
  if (typeof filename !== "string") return null
  if (!isCount(size) || !isCount(chunk_size) || !isCount(total_chunks)) return null
  return {filename, size, chunkSize: chunk_size, totalChunks: total_chunks}
}

function isCount(v: unknown): v is number {
  return typeof v === "number" && Number.isSafeInteger(v) && v >= 0
}

export function encryptMetadata(key: Uint8Array, info: FileInfo): EncryptedMetadata {
  checkKey(key)
  const nonce = sodium.randombytes_buf(NONCE_SIZE)
  const plaintext = new TextEncoder().encode(encodeFileInfoJson(info))
  return {nonce, ciphertext: seal(key, nonce, plaintext)}
}

export function decryptMetadata(key: Uint8Array, metadata: EncryptedMetadata): FileInfo {
  checkKey(key)
  const plaintext = open(key, metadata.nonce, metadata.ciphertext, "File metadata")
  let parsed: unknown
  try {
    parsed = JSON.parse(new TextDecoder().decode(plaintext))
  } catch (e) {
    throw new EncryptionError("File metadata is not valid JSON", {cause: e})
  }
  const info = parseFileInfoFields(parsed)
  if (!info) throw new EncryptionError("File metadata has an unexpected shape")
  return info
}
