import {test, expect} from 'vitest'
import {generatePeerId, isValidPeerId, MAX_PEER_ID_LENGTH} from '../src/identity.js'

test('generated peer ids are valid three-word names', () => {
  for (let i = 0; i < 200; i++) {
    const id = generatePeerId()
    expect(isValidPeerId(id)).toBe(true)
    expect(id).toMatch(/^[a-z]+-[a-z]+-[a-z]+$/)
  }
})

test('isValidPeerId accepts letters, digits and inner separators', () => {
  expect(isValidPeerId('a')).toBe(true)
  expect(isValidPeerId('happy-apple-sunset')).toBe(true)
  expect(isValidPeerId('Peer_01')).toBe(true)
  expect(isValidPeerId('x'.repeat(MAX_PEER_ID_LENGTH))).toBe(true)
})

test('isValidPeerId rejects malformed ids', () => {
  expect(isValidPeerId('')).toBe(false)
  expect(isValidPeerId('-abc')).toBe(false)
  expect(isValidPeerId('abc-')).toBe(false)
  expect(isValidPeerId('ab cd')).toBe(false)
  expect(isValidPeerId('_abc')).toBe(false)
  expect(isValidPeerId('abc.def')).toBe(false)
  expect(isValidPeerId('x'.repeat(MAX_PEER_ID_LENGTH + 1))).toBe(false)
})
