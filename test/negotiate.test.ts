import {test, expect} from 'vitest'
import {negotiate} from '../src/session/negotiate.js'
import {closeRendezvous, connectRendezvous, waitForOpen} from '../src/signaling/client.js'
import {ConnectionError, SignalingError, TimeoutError} from '../src/errors.js'
import {
  FakeTransport, createFakeClient, createMemoryRelay, createTransportPair, tick
} from './fixtures.js'

const answer = (src: string, connectionId: string) => ({
  type: 'ANSWER' as const, src, connectionId, descriptor: {type: 'answer' as const, sdp: 'v=0 answer'}
})

const offer = (src: string, connectionId: string) => ({
  type: 'OFFER' as const, src, connectionId, descriptor: {type: 'offer' as const, sdp: 'v=0 offer'}
})

test('offerer times out, closes the transport and goes quiet', async () => {
  const fake = createFakeClient('receiver-1')
  const transport = new FakeTransport('lonely')
  const err = await negotiate(fake.client, transport, {role: 'offerer', remotePeer: 'missing-peer', deadlineMs: 50})
    .catch((e: unknown) => e)
  expect(err).toBeInstanceOf(TimeoutError)
  expect(fake.sent.map(m => m.type)).toEqual(['OFFER'])
  expect(fake.sent[0].dst).toBe('missing-peer')
  expect(transport.closed).toBe(true)

  transport.emitCandidate({candidate: 'late'})
  fake.push({type: 'HEARTBEAT'})
  await tick(20)
  expect(fake.sent.length).toBe(1)
})

test('offerer rejects a second ANSWER on the same connection', async () => {
  const fake = createFakeClient()
  const transport = new FakeTransport('offerer')
  fake.push(answer('sender-1', 'dc_test'))
  fake.push(answer('sender-1', 'dc_test'))
  await expect(negotiate(fake.client, transport, {
    role: 'offerer', remotePeer: 'sender-1', connectionId: 'dc_test', deadlineMs: 1000
  })).rejects.toThrow('Remote description already set; unexpected second answer')
  expect(transport.calls.filter(c => c === 'setRemote:answer').length).toBe(1)
})

test('candidates that arrive before the answer are applied after it', async () => {
  const fake = createFakeClient()
  const transport = new FakeTransport('offerer')
  fake.push({type: 'CANDIDATE', src: 'sender-1', connectionId: 'dc_test', candidate: {candidate: 'cand-1'}})
  fake.push({type: 'CANDIDATE', src: 'sender-1', connectionId: 'dc_other', candidate: {candidate: 'stray'}})
  fake.push(answer('sender-1', 'dc_test'))
  await expect(negotiate(fake.client, transport, {
    role: 'offerer', remotePeer: 'sender-1', connectionId: 'dc_test', deadlineMs: 50
  })).rejects.toBeInstanceOf(TimeoutError)
  expect(transport.calls).toEqual([
    'createDataChannel', 'createOffer', 'setLocal:offer', 'setRemote:answer', 'addCandidate:cand-1', 'close'
  ])
})

test('answers from other peers or connections are ignored', async () => {
  const fake = createFakeClient()
  const transport = new FakeTransport('offerer')
  fake.push(answer('intruder', 'dc_test'))
  fake.push(answer('sender-1', 'dc_old'))
  await expect(negotiate(fake.client, transport, {
    role: 'offerer', remotePeer: 'sender-1', connectionId: 'dc_test', deadlineMs: 50
  })).rejects.toBeInstanceOf(TimeoutError)
  expect(transport.remote).toBeNull()
})

test('each heartbeat during negotiation is answered once', async () => {
  const fake = createFakeClient()
  fake.push({type: 'HEARTBEAT'})
  fake.push({type: 'HEARTBEAT'})
  await expect(negotiate(fake.client, new FakeTransport('offerer'), {role: 'offerer', remotePeer: 'sender-1', deadlineMs: 50}))
    .rejects.toBeInstanceOf(TimeoutError)
  expect(fake.sent.map(m => m.type)).toEqual(['OFFER', 'HEARTBEAT', 'HEARTBEAT'])
})

test('answerer waits for an offer without a deadline, answering heartbeats', async () => {
  const fake = createFakeClient()
  const pending = negotiate(fake.client, new FakeTransport('answerer'), {role: 'answerer', deadlineMs: 30})
  fake.push({type: 'HEARTBEAT'})
  await tick(80)
  expect(fake.sent).toEqual([{type: 'HEARTBEAT'}])
  fake.push({type: 'EXPIRE'})
  await expect(pending).rejects.toThrow('Connection expired - peer not found')
})

test('server errors and expiry end negotiation', async () => {
  const a = createFakeClient()
  a.push({type: 'ERROR', message: 'overloaded'})
  const err = await negotiate(a.client, new FakeTransport('x'), {role: 'answerer'}).catch((e: unknown) => e)
  expect(err).toBeInstanceOf(SignalingError)
  expect(err).toMatchObject({reason: 'SERVER', message: 'overloaded'})

  const b = createFakeClient()
  b.push({type: 'EXPIRE'})
  await expect(negotiate(b.client, new FakeTransport('x'), {role: 'offerer', remotePeer: 'gone'}))
    .rejects.toThrow('Connection expired - peer not found')
})

test('LEAVE from the remote peer fails, from others it is ignored', async () => {
  const fake = createFakeClient()
  fake.push({type: 'LEAVE', src: 'someone-else'})
  fake.push({type: 'LEAVE', src: 'sender-1'})
  const err = await negotiate(fake.client, new FakeTransport('x'), {role: 'offerer', remotePeer: 'sender-1'})
    .catch((e: unknown) => e)
  expect(err).toBeInstanceOf(ConnectionError)
  expect(err).toMatchObject({message: 'Peer sender-1 left'})
})

test('a failed peer connection ends negotiation early', async () => {
  const fake = createFakeClient()
  const transport = new FakeTransport('x')
  const pending = negotiate(fake.client, transport, {role: 'offerer', remotePeer: 'sender-1', deadlineMs: 5000})
  await tick()
  transport.emitState('failed')
  await expect(pending).rejects.toThrow('Peer connection failed')
  expect(transport.closed).toBe(true)
})

test('answerer ignores offers from unexpected peers', async () => {
  const fake = createFakeClient()
  const transport = new FakeTransport('answerer')
  fake.push(offer('mallory', 'dc_1'))
  fake.push({type: 'ERROR', message: 'stop'})
  await expect(negotiate(fake.client, transport, {role: 'answerer', expectedPeer: 'alice', deadlineMs: 50}))
    .rejects.toBeInstanceOf(SignalingError)
  expect(transport.calls).toEqual(['close'])
  expect(fake.sent).toEqual([])
})

test('answerer answers an offer and relays its candidates', async () => {
  const fake = createFakeClient('sender-1')
  const transport = new FakeTransport('answerer', [{candidate: 'cand-a', sdpMLineIndex: 0}])
  fake.push(offer('receiver-1', 'dc_7'))
  await expect(negotiate(fake.client, transport, {role: 'answerer', deadlineMs: 100}))
    .rejects.toBeInstanceOf(TimeoutError)
  expect(transport.calls.slice(0, 3)).toEqual(['setRemote:offer', 'createAnswer', 'setLocal:answer'])
  expect(fake.sent).toEqual([
    {
      type: 'ANSWER', src: 'sender-1', dst: 'receiver-1',
      payload: {sdp: {sdp: 'answer-from-answerer', type: 'answer'}, type: 'data', connectionId: 'dc_7', browser: 'sendfile-p2p'}
    },
    {
      type: 'CANDIDATE', src: 'sender-1', dst: 'receiver-1',
      payload: {candidate: {candidate: 'cand-a', sdpMLineIndex: 0, sdpMid: null}, type: 'data', connectionId: 'dc_7'}
    }
  ])
})

test('offerer and answerer establish a channel through the relay', async () => {
  const relay = createMemoryRelay()
  const quiet = {heartbeatIntervalMs: 0}
  const sender = await connectRendezvous('sender-1', quiet, relay.openSocket)
  const receiver = await connectRendezvous('receiver-1', quiet, relay.openSocket)
  await waitForOpen(sender)
  await waitForOpen(receiver)

  const [offerT, answerT] = createTransportPair([{candidate: 'cand-o'}], [{candidate: 'cand-a'}])
  const [receiverSession, senderSession] = await Promise.all([
    negotiate(receiver, offerT, {role: 'offerer', remotePeer: 'sender-1', deadlineMs: 2000}),
    negotiate(sender, answerT, {role: 'answerer', expectedPeer: 'receiver-1', deadlineMs: 2000})
  ])

  expect(receiverSession.remotePeer).toBe('sender-1')
  expect(senderSession.remotePeer).toBe('receiver-1')
  expect(senderSession.connectionId).toBe(receiverSession.connectionId)
  expect(receiverSession.connectionId).toMatch(/^dc_[0-9a-f-]{36}$/)
  expect(senderSession.channel.label).toBe('file-transfer')
  expect(offerT.closed).toBe(false)
  expect(answerT.closed).toBe(false)

  receiverSession.channel.send(new Uint8Array([1, 2, 3]))
  expect(await senderSession.inbox.recv()).toEqual(new Uint8Array([1, 2, 3]))

  const descriptors = relay.sent.filter(m => m.type !== 'CANDIDATE').map(m => `${m.from}:${m.type}`)
  expect(descriptors).toEqual(['receiver-1:OFFER', 'sender-1:ANSWER'])
  expect(relay.sent.filter(m => m.type === 'CANDIDATE').map(m => m.from).sort()).toEqual(['receiver-1', 'sender-1'])
  closeRendezvous(sender)
  closeRendezvous(receiver)
})

test('an offer arriving after the deadline span still connects', async () => {
  const relay = createMemoryRelay()
  const quiet = {heartbeatIntervalMs: 0}
  const sender = await connectRendezvous('sender-3', quiet, relay.openSocket)
  const receiver = await connectRendezvous('receiver-3', quiet, relay.openSocket)
  await waitForOpen(sender)
  await waitForOpen(receiver)

  const [offerT, answerT] = createTransportPair()
  const answering = negotiate(sender, answerT, {role: 'answerer', deadlineMs: 100})
  await tick(150)
  const [receiverSession, senderSession] = await Promise.all([
    negotiate(receiver, offerT, {role: 'offerer', remotePeer: 'sender-3', deadlineMs: 2000}),
    answering
  ])
  expect(senderSession.remotePeer).toBe('receiver-3')
  expect(senderSession.connectionId).toBe(receiverSession.connectionId)
  closeRendezvous(sender)
  closeRendezvous(receiver)
})

test('answerer closes data channels beyond the first', async () => {
  const relay = createMemoryRelay()
  const quiet = {heartbeatIntervalMs: 0}
  const sender = await connectRendezvous('sender-2', quiet, relay.openSocket)
  const receiver = await connectRendezvous('receiver-2', quiet, relay.openSocket)
  await waitForOpen(sender)
  await waitForOpen(receiver)

  const [offerT, answerT] = createTransportPair()
  const [, senderSession] = await Promise.all([
    negotiate(receiver, offerT, {role: 'offerer', remotePeer: 'sender-2', deadlineMs: 2000}),
    negotiate(sender, answerT, {role: 'answerer', deadlineMs: 2000})
  ])
  const extra = await offerT.createDataChannel('extra')
  answerT.emitIncoming(extra)
  expect(extra.readyState()).toBe('closed')
  expect(senderSession.channel.readyState()).toBe('open')
  closeRendezvous(sender)
  closeRendezvous(receiver)
})
