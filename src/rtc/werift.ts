// PeerTransport backed by werift, a WebRTC implementation in TypeScript.

import {
  RTCPeerConnection, RTCSessionDescription, RTCIceCandidate,
  type RTCDataChannel
} from "werift"
import type {IceServer} from "../config.js"
import {DEFAULT_ICE_SERVERS} from "../config.js"
import {createLogger} from "../log.js"
import type {CandidateRecord, SessionDescriptor, SdpType} from "../signaling/messages.js"
import type {ConnectionState, DataChannel, DataChannelState, PeerTransport} from "./transport.js"

const log = createLogger("RTC")

function toDataChannelState(state: string): DataChannelState {
  switch (state) {
    case "connecting":
    case "open":
    case "closing":
    case "closed":
      return state
    default:
      return "connecting"
  }
}

function toConnectionState(state: string): ConnectionState {
  switch (state) {
    case "new":
    case "connecting":
    case "connected":
    case "disconnected":
    case "failed":
    case "closed":
      return state
    default:
      return "new"
  }
}

function toSdpType(type: string): SdpType {
  if (type === "offer" || type === "answer") return type
  throw new Error("unsupported session description type: " + type)
}

function wrapDataChannel(dc: RTCDataChannel): DataChannel {
  return {
    label: dc.label,
    readyState: () => toDataChannelState(dc.readyState),
    send(data: Uint8Array) {
      dc.send(Buffer.from(data.buffer, data.byteOffset, data.byteLength))
    },
    onOpen(cb) {
      dc.stateChanged.subscribe(state => {
        if (state === "open") cb()
      })
    },
    onMessage(cb) {
      dc.onMessage.subscribe(data => {
        cb(typeof data === "string" ? new TextEncoder().encode(data) : new Uint8Array(data))
      })
    },
    onClose(cb) {
      dc.stateChanged.subscribe(state => {
        if (state === "closed") cb()
      })
    },
    onError(cb) {
      dc.error.subscribe(err => cb(err))
    },
    close() {
      dc.close()
    }
  }
}

export function createWeriftTransport(iceServers: IceServer[] = DEFAULT_ICE_SERVERS): PeerTransport {
  const pc = new RTCPeerConnection({iceServers})

  pc.connectionStateChange.subscribe(state => {
    log.info("Peer connection state changed: %s", state)
  })

  return {
    async createDataChannel(label) {
      const dc = pc.createDataChannel(label)
      log.info("Created data channel: %s", label)
      return wrapDataChannel(dc)
    },
    async createOffer() {
      const offer = await pc.createOffer()
      log.debug("Created offer")
      return {type: toSdpType(offer.type), sdp: offer.sdp}
    },
    async createAnswer() {
      const answer = await pc.createAnswer()
      log.debug("Created answer")
      return {type: toSdpType(answer.type), sdp: answer.sdp}
    },
    async setLocalDescription(desc: SessionDescriptor) {
      await pc.setLocalDescription(new RTCSessionDescription(desc.sdp, desc.type))
      log.debug("Set local description")
    },
    async setRemoteDescription(desc: SessionDescriptor) {
      await pc.setRemoteDescription(new RTCSessionDescription(desc.sdp, desc.type))
      log.debug("Set remote description")
    },
    async addCandidate(candidate: CandidateRecord) {
      await pc.addIceCandidate(new RTCIceCandidate({
        candidate: candidate.candidate,
        sdpMid: candidate.sdpMid,
        sdpMLineIndex: candidate.sdpMLineIndex
      }))
      log.debug("Added ICE candidate")
    },
    onCandidate(cb) {
      pc.onIceCandidate.subscribe(candidate => {
        if (!candidate || !candidate.candidate) return
        log.debug("New ICE candidate: %s", candidate.candidate)
        cb({
          candidate: candidate.candidate,
          sdpMid: candidate.sdpMid ?? undefined,
          sdpMLineIndex: candidate.sdpMLineIndex ?? undefined
        })
      })
    },
    onConnectionStateChange(cb) {
      pc.connectionStateChange.subscribe(state => cb(toConnectionState(state)))
    },
    onIncomingDataChannel(cb) {
      pc.onDataChannel.subscribe(dc => {
        log.info("New data channel: %s", dc.label)
        cb(wrapDataChannel(dc))
      })
    },
    async close() {
      await pc.close()
    }
  }
}
