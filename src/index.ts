// Library entry point.

export * from "./errors.js"
export {createLogger, setVerbose, isVerbose, type Logger} from "./log.js"
export {createChannel, createNotify, type Channel, type Notify} from "./channel.js"
export * from "./config.js"
export {generatePeerId, isValidPeerId, MAX_PEER_ID_LENGTH} from "./identity.js"
export * from "./signaling/messages.js"
export {
  connectRendezvous, closeRendezvous, rendezvousUrl, openWebSocket,
  recvEvent, waitForOpen, relayKeepalives,
  sendHeartbeat, sendOffer, sendAnswer, sendCandidate,
  type RendezvousClient, type SignalingSocket, type SocketHandlers, type OpenSocket
} from "./signaling/client.js"
export * from "./rtc/transport.js"
export {createWeriftTransport} from "./rtc/werift.js"
export {negotiate, type Role, type Session, type NegotiationOptions, type OffererOptions, type AnswererOptions} from "./session/negotiate.js"
export * from "./transfer/crypto.js"
export * from "./transfer/protocol.js"
export {PeerAbortError, closeQuietly, waitForPeerClose, type TransferLink} from "./transfer/link.js"
export {sendFile, type SendOptions, type SendResult, type SenderState} from "./transfer/sender.js"
export {receiveFile, sanitizeFilename, MAX_CHUNK_SIZE, type ReceiveOptions, type ReceiverState} from "./transfer/receiver.js"
