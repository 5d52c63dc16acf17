// Peer identities: the names a party registers under at the rendezvous server.
//
// Format: 1-64 characters, ASCII letters/digits with '-' or '_' inside,
// first and last character a letter or digit.

import {readFileSync} from "node:fs"
import {randomInt} from "node:crypto"

export const MAX_PEER_ID_LENGTH = 64

interface WordLists {
  adjectives: readonly string[]
  nouns: readonly string[]
}

function loadWordLists(): WordLists {
  const raw: unknown = JSON.parse(readFileSync(new URL("./words.json", import.meta.url), "utf-8"))
  if (typeof raw !== "object" || raw === null || !("adjectives" in raw) || !("nouns" in raw)) {
    throw new Error("words.json: expected {adjectives, nouns}")
  }
  const {adjectives, nouns} = raw
  if (!isWordList(adjectives) || !isWordList(nouns)) throw new Error("words.json: word lists must be non-empty string arrays")
  return {adjectives, nouns}
}

function isWordList(v: unknown): v is string[] {
  return Array.isArray(v) && v.length > 0 && v.every(w => typeof w === "string" && /^[a-z]+$/.test(w))
}

const WORDS: WordLists = loadWordLists()

function pick(list: readonly string[]): string {
  return list[randomInt(list.length)]
}

// Human-friendly id such as "happy-apple-sunset".
export function generatePeerId(): string {
  return `${pick(WORDS.adjectives)}-${pick(WORDS.nouns)}-${pick(WORDS.nouns)}`
}

const PEER_ID_RE = /^[A-Za-z0-9](?:[A-Za-z0-9_-]*[A-Za-z0-9])?$/

export function isValidPeerId(id: string): boolean {
  return id.length > 0 && id.length <= MAX_PEER_ID_LENGTH && PEER_ID_RE.test(id)
}
