// Source role: encrypted, stop-and-wait chunk transfer.
//
// FileInfo (encrypted) -> wait Ready -> for each chunk: send, wait for its Ack
// -> Done. At most one chunk is unacknowledged at any time, which keeps index
// based progress exact without windows or resends. No timeout applies once
// the transfer has started; a stalled peer stalls the sender.

import {open, type FileHandle} from "node:fs/promises"
import {basename} from "node:path"
import {IoError, categorizeError} from "../errors.js"
import {createLogger} from "../log.js"
import {encryptChunk, encryptMetadata, generateSalt} from "./crypto.js"
import {encodeEncryptedChunk, fileInfo} from "./protocol.js"
import {
  closeQuietly, nextFrame, reportFailure, sendControl, sendFrame, PeerAbortError,
  type TransferLink
} from "./link.js"

const log = createLogger("SEND")

export type SenderState =
  | {state: "idle"}
  | {state: "awaiting_ready"}
  | {state: "sending", index: number}
  | {state: "awaiting_ack", index: number}
  | {state: "done"}
  | {state: "failed", error: Error}

export interface SendOptions {
  onProgress?: (sent: number, total: number) => void
  onState?: (state: SenderState) => void
}

export interface SendResult {
  filename: string
  size: number
  totalChunks: number
}

async function readChunk(handle: FileHandle, buffer: Uint8Array, length: number, position: number): Promise<Uint8Array> {
  let filled = 0
  while (filled < length) {
    const {bytesRead} = await handle.read(buffer, filled, length - filled, position + filled)
    if (bytesRead === 0) throw new IoError(`File shrank while reading (expected ${length} bytes at offset ${position})`)
    filled += bytesRead
  }
  return buffer.subarray(0, length)
}

async function waitForReady(link: TransferLink): Promise<void> {
  for (;;) {
    const frame = await nextFrame(link, log)
    if (frame.kind !== "control") continue
    const msg = frame.message
    if (msg.type === "ready") return
    if (msg.type === "error") throw new PeerAbortError("Receiver", msg.message)
    log.debug("Ignoring %s while waiting for ready", msg.type)
  }
}

async function waitForAck(link: TransferLink, index: number): Promise<void> {
  for (;;) {
    const frame = await nextFrame(link, log)
    if (frame.kind !== "control") continue
    const msg = frame.message
    if (msg.type === "ack") {
      if (msg.index === index) return
      log.debug("Ignoring ack %d while waiting for %d", msg.index, index)
      continue
    }
    if (msg.type === "error") throw new PeerAbortError("Receiver", msg.message)
  }
}

export async function sendFile(
  path: string,
  link: TransferLink,
  key: Uint8Array,
  options: SendOptions = {}
): Promise<SendResult> {
  const {onProgress, onState} = options
  onState?.({state: "idle"})

  let handle: FileHandle
  try {
    handle = await open(path, "r")
  } catch (e) {
    throw categorizeError(e)
  }

  try {
    const {size} = await handle.stat()
    const info = fileInfo(basename(path), size)
    log.info("Sending file: %s (%d bytes, %d chunks)", info.filename, info.size, info.totalChunks)

    const salt = generateSalt()
    const metadata = encryptMetadata(key, info)
    sendControl(link, {type: "encrypted_file_info", nonce: metadata.nonce, ciphertext: metadata.ciphertext})

    log.info("Waiting for receiver to be ready...")
    onState?.({state: "awaiting_ready"})
    await waitForReady(link)
    log.info("Receiver is ready")

    const buffer = new Uint8Array(info.chunkSize)
    let sent = 0
    for (let index = 0; index < info.totalChunks; index++) {
      onState?.({state: "sending", index})
      const length = Math.min(info.chunkSize, size - sent)
      const plaintext = await readChunk(handle, buffer, length, sent)
      sendFrame(link, encodeEncryptedChunk(encryptChunk(key, index, salt, plaintext)))
      log.debug("Sent chunk %d (%d bytes)", index, length)

      onState?.({state: "awaiting_ack", index})
      await waitForAck(link, index)
      sent += length
      onProgress?.(sent, size)
    }

    sendControl(link, {type: "done"})
    onState?.({state: "done"})
    log.info("File transfer complete: %d bytes sent", sent)
    return {filename: info.filename, size, totalChunks: info.totalChunks}
  } catch (e) {
    const err = categorizeError(e)
    reportFailure(link, err, log)
    onState?.({state: "failed", error: err})
    throw err
  } finally {
    await closeQuietly(handle, log)
  }
}
