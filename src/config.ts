// Runtime configuration with defaults.
//
// Every layer takes `Partial<...>` overrides merged over its defaults, the
// same shape the CLI fills from flags and environment variables.

export interface RendezvousConfig {
  host: string
  port: number
  path: string
  apiKey: string
  secure: boolean
  heartbeatIntervalMs: number  // 0 disables the periodic heartbeat
}

export const DEFAULT_RENDEZVOUS_CONFIG: RendezvousConfig = {
  host: "0.peerjs.com",
  port: 443,
  path: "/peerjs",
  apiKey: "peerjs",
  secure: true,
  heartbeatIntervalMs: 5000
}

export interface IceServer {
  urls: string
  username?: string
  credential?: string
}

export const DEFAULT_ICE_SERVERS: IceServer[] = [
  {urls: "stun:stun.l.google.com:19302"},
  {urls: "turn:eu-0.turn.peerjs.com:3478", username: "peerjs", credential: "peerjsp"},
  {urls: "turn:us-0.turn.peerjs.com:3478", username: "peerjs", credential: "peerjsp"}
]

export const DEFAULT_NEGOTIATION_TIMEOUT_MS = 30000
export const DEFAULT_CHANNEL_LABEL = "file-transfer"

export interface AppConfig {
  rendezvous: RendezvousConfig
  iceServers: IceServer[]
  negotiationTimeoutMs: number
}

// Accepts "host" or "host:port"; the port must be a valid TCP port.
export function parseServerAddress(address: string): {host: string, port?: number} {
  const trimmed = address.trim()
  if (trimmed === "") throw new Error("server address is empty")
  const colon = trimmed.lastIndexOf(":")
  if (colon <= 0) return {host: trimmed}
  const portText = trimmed.substring(colon + 1)
  const port = Number(portText)
  if (!/^\d+$/.test(portText) || port < 1 || port > 65535) {
    throw new Error("invalid server port: " + portText)
  }
  return {host: trimmed.substring(0, colon), port}
}

export interface ConfigOverrides {
  server?: string
  timeoutMs?: number
}

export function loadConfig(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const rendezvous = {...DEFAULT_RENDEZVOUS_CONFIG}
  const server = overrides.server ?? env.SENDFILE_SERVER
  if (server) {
    const {host, port} = parseServerAddress(server)
    rendezvous.host = host
    if (port !== undefined) rendezvous.port = port
  }
  let negotiationTimeoutMs = DEFAULT_NEGOTIATION_TIMEOUT_MS
  const timeout = overrides.timeoutMs ?? (env.SENDFILE_TIMEOUT_MS ? Number(env.SENDFILE_TIMEOUT_MS) : undefined)
  if (timeout !== undefined) {
    if (!Number.isFinite(timeout) || timeout <= 0) throw new Error("invalid negotiation timeout: " + timeout)
    negotiationTimeoutMs = timeout
  }
  return {rendezvous, iceServers: DEFAULT_ICE_SERVERS, negotiationTimeoutMs}
}
