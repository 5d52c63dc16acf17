// Sink role of the transfer.
//
// Waits for encrypted metadata (a cleartext FileInfo is refused), creates the
// destination file, then acknowledges each chunk after writing it at
// `index * chunkSize`. Positional writes keep the file correct even if the
// channel ever delivered chunks out of order; such arrivals are logged.

import {open, unlink, type FileHandle} from "node:fs/promises"
import {basename, join} from "node:path"
import {TransferError, categorizeError} from "../errors.js"
import {createLogger} from "../log.js"
import {decryptChunk, decryptMetadata, type FileInfo} from "./crypto.js"
import {totalChunksFor} from "./protocol.js"
import {
  closeQuietly, nextFrame, reportFailure, sendControl, PeerAbortError,
  type TransferLink
} from "./link.js"

const log = createLogger("RECV")

export const MAX_CHUNK_SIZE = 1024 * 1024

export type ReceiverState =
  | {state: "awaiting_metadata"}
  | {state: "ready"}
  | {state: "receiving", expected: number}
  | {state: "done"}
  | {state: "failed", error: Error}

export interface ReceiveOptions {
  onProgress?: (written: number, total: number) => void
  onState?: (state: ReceiverState) => void
  onFileInfo?: (info: FileInfo) => void
}

// Only the final path component of a peer-supplied name is used.
export function sanitizeFilename(name: string): string {
  const base = basename(name.replace(/\\/g, "/"))
  if (base === "" || base === "." || base === ".." || base.includes("\0")) {
    throw new TransferError("Invalid file name: " + JSON.stringify(name))
  }
  return base
}

function validateFileInfo(info: FileInfo): void {
  if (info.chunkSize === 0 || info.chunkSize > MAX_CHUNK_SIZE) {
    throw new TransferError("Invalid chunk size: " + info.chunkSize)
  }
  if (info.totalChunks !== totalChunksFor(info.size, info.chunkSize)) {
    throw new TransferError(`Chunk count ${info.totalChunks} does not match size ${info.size}`)
  }
}

function expectedChunkLength(info: FileInfo, index: number): number {
  return index === info.totalChunks - 1 ? info.size - index * info.chunkSize : info.chunkSize
}

async function waitForMetadata(link: TransferLink, key: Uint8Array): Promise<FileInfo> {
  for (;;) {
    const frame = await nextFrame(link, log)
    if (frame.kind !== "control") {
      log.debug("Ignoring %s before file info", frame.kind)
      continue
    }
    const msg = frame.message
    switch (msg.type) {
      case "encrypted_file_info":
        return decryptMetadata(key, {nonce: msg.nonce, ciphertext: msg.ciphertext})
      case "file_info":
        throw new TransferError("Received unencrypted file metadata; please update the sender")
      case "error":
        throw new PeerAbortError("Sender", msg.message)
      default:
        log.debug("Ignoring %s before file info", msg.type)
    }
  }
}

export async function receiveFile(
  outputDir: string,
  link: TransferLink,
  key: Uint8Array,
  options: ReceiveOptions = {}
): Promise<string> {
  const {onProgress, onState, onFileInfo} = options
  onState?.({state: "awaiting_metadata"})
  log.info("Waiting for file info...")

  let handle: FileHandle | null = null
  let outputPath: string | null = null
  try {
    const info = await waitForMetadata(link, key)
    validateFileInfo(info)
    const filename = sanitizeFilename(info.filename)
    log.info("Receiving file: %s (%d bytes, %d chunks)", filename, info.size, info.totalChunks)
    onFileInfo?.({...info, filename})

    outputPath = join(outputDir, filename)
    const fh = await open(outputPath, "wx")
    handle = fh

    sendControl(link, {type: "ready"})
    onState?.({state: "ready"})
    log.info("Ready to receive")

    const received = new Set<number>()
    let written = 0
    let expected = 0
    receiving: for (;;) {
      onState?.({state: "receiving", expected})
      const frame = await nextFrame(link, log)
      switch (frame.kind) {
        case "encrypted_chunk": {
          const chunk = frame.chunk
          if (chunk.index >= info.totalChunks) {
            throw new TransferError(`Chunk index ${chunk.index} out of range (total ${info.totalChunks})`)
          }
          if (chunk.index !== expected) {
            log.warn("Received out-of-order chunk: expected %d, got %d", expected, chunk.index)
          }
          const plaintext = decryptChunk(key, chunk)
          if (plaintext.length !== expectedChunkLength(info, chunk.index)) {
            throw new TransferError(`Chunk ${chunk.index} has ${plaintext.length} bytes, expected ${expectedChunkLength(info, chunk.index)}`)
          }
          await fh.write(plaintext, 0, plaintext.length, chunk.index * info.chunkSize)
          if (!received.has(chunk.index)) {
            received.add(chunk.index)
            written += plaintext.length
          }
          onProgress?.(written, info.size)
          log.debug("Received and decrypted chunk %d (%d bytes)", chunk.index, plaintext.length)

          sendControl(link, {type: "ack", index: chunk.index})
          expected = chunk.index + 1
          break
        }
        case "chunk":
          throw new TransferError(`Received unencrypted chunk ${frame.chunk.index}; refusing cleartext data`)
        case "control": {
          const msg = frame.message
          if (msg.type === "done") {
            log.info("Transfer complete signal received")
            break receiving
          }
          if (msg.type === "error") throw new PeerAbortError("Sender", msg.message)
          log.debug("Ignoring %s during transfer", msg.type)
        }
      }
    }

    if (received.size !== info.totalChunks || written !== info.size) {
      throw new TransferError(`Incomplete transfer: ${received.size}/${info.totalChunks} chunks, ${written}/${info.size} bytes`)
    }
    await fh.sync()
    handle = null
    await fh.close()
    onState?.({state: "done"})
    log.info("File received: %s (%d bytes)", outputPath, written)
    return outputPath
  } catch (e) {
    const err = categorizeError(e)
    reportFailure(link, err, log)
    onState?.({state: "failed", error: err})
    if (handle) {
      await closeQuietly(handle, log)
      handle = null
      if (outputPath) await removePartial(outputPath)
    }
    throw err
  }
}

async function removePartial(path: string): Promise<void> {
  try {
    await unlink(path)
  } catch (e) {
    log.warn("Could not remove partial file %s: %s", path, e instanceof Error ? e.message : e)
  }
}
