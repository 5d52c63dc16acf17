// Error taxonomy shared by every layer.
//
// Each class carries a `kind` so callers can branch without instanceof chains,
// and keeps the underlying failure as `cause`.

export type ErrorKind =
  | "SIGNALING"
  | "CONNECTION"
  | "TIMEOUT"
  | "TRANSFER"
  | "ENCRYPTION"
  | "IO"
  | "CHANNEL_CLOSED"

export class SendfileError extends Error {
  constructor(public readonly kind: ErrorKind, message: string, options?: {cause?: unknown}) {
    super(message, options)
    this.name = "SendfileError"
  }
}

export type SignalingReason = "TRANSPORT" | "ID_TAKEN" | "INVALID_KEY" | "INVALID_ID" | "SERVER"

export class SignalingError extends SendfileError {
  constructor(public readonly reason: SignalingReason, message: string, options?: {cause?: unknown}) {
    super("SIGNALING", message, options)
    this.name = "SignalingError"
  }
}

export class ConnectionError extends SendfileError {
  constructor(message: string, options?: {cause?: unknown}) {
    super("CONNECTION", message, options)
    this.name = "ConnectionError"
  }
}

export class TimeoutError extends SendfileError {
  constructor(message = "Connection timeout") {
    super("TIMEOUT", message)
    this.name = "TimeoutError"
  }
}

export class TransferError extends SendfileError {
  constructor(message: string, options?: {cause?: unknown}) {
    super("TRANSFER", message, options)
    this.name = "TransferError"
  }
}

export class EncryptionError extends SendfileError {
  constructor(message: string, options?: {cause?: unknown}) {
    super("ENCRYPTION", message, options)
    this.name = "EncryptionError"
  }
}

export class IoError extends SendfileError {
  constructor(message: string, options?: {cause?: unknown}) {
    super("IO", message, options)
    this.name = "IoError"
  }
}

export class ChannelClosedError extends SendfileError {
  constructor(message = "Channel closed") {
    super("CHANNEL_CLOSED", message)
    this.name = "ChannelClosedError"
  }
}

// -- Classification

function isSystemError(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e && typeof e.code === "string"
}

// Map anything thrown by a dependency onto the taxonomy. Filesystem errors
// become IoError; everything else not already classified is a connection
// failure of the underlying transport.
export function categorizeError(e: unknown): SendfileError {
  if (e instanceof SendfileError) return e
  if (isSystemError(e) && e.code?.startsWith("E")) {
    const where = e.path ? `${e.path}: ` : ""
    return new IoError(where + e.message, {cause: e})
  }
  const message = e instanceof Error ? e.message : String(e)
  return new ConnectionError(message, {cause: e})
}

export function humanReadableMessage(e: unknown): string {
  if (!(e instanceof SendfileError)) return e instanceof Error ? e.message : String(e)
  switch (e.kind) {
    case "SIGNALING":
      if (e instanceof SignalingError) {
        switch (e.reason) {
          case "ID_TAKEN": return "Peer ID already taken, choose another with --peer-id"
          case "INVALID_KEY": return "Signaling server rejected the API key"
          case "INVALID_ID": return "Invalid peer ID format: " + e.message
          case "SERVER": return "Signaling server error: " + e.message
          case "TRANSPORT": return "Signaling connection failed: " + e.message
        }
      }
      return "Signaling error: " + e.message
    case "CONNECTION": return "Connection error: " + e.message
    case "TIMEOUT": return "Timed out waiting for the peer to connect"
    case "TRANSFER": return "Transfer failed: " + e.message
    case "ENCRYPTION": return "Encryption error: " + e.message
    case "IO": return "File error: " + e.message
    case "CHANNEL_CLOSED": return "Peer disconnected before the transfer finished"
  }
}
