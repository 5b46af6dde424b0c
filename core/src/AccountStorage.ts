import { EMPTY_WORD, wordKey, type Word } from './Felt.js'
import { malformed } from './errors.js'
import type { StorageAccess } from './types.js'

export interface MapEntry {
  key: Word
  value: Word
}

/**
 * A storage slot holds either a single word or a word-keyed map of words.
 */
export type StorageSlot =
  | { type: 'value', value: Word }
  | { type: 'map', entries: Map<string, MapEntry> }

/**
 * Indexed storage slots of an account.
 *
 * Map entries that were never written read as the empty word.
 */
export class AccountStorage implements StorageAccess {
  private readonly slots: StorageSlot[]

  constructor(slots: StorageSlot[]) {
    this.slots = slots
  }

  static valueSlot(value: Word = EMPTY_WORD): StorageSlot {
    return { type: 'value', value }
  }

  static mapSlot(entries: MapEntry[] = []): StorageSlot {
    return {
      type: 'map',
      entries: new Map(entries.map(e => [wordKey(e.key), e]))
    }
  }

  getItem(slot: number): Word {
    const s = this.slotAt(slot)
    if (s.type !== 'value') {
      throw malformed(`Storage slot ${slot} is a map, not a value`)
    }
    return s.value
  }

  setItem(slot: number, value: Word): void {
    const s = this.slotAt(slot)
    if (s.type !== 'value') {
      throw malformed(`Storage slot ${slot} is a map, not a value`)
    }
    s.value = value
  }

  getMapItem(slot: number, key: Word): Word {
    return this.mapAt(slot).get(wordKey(key))?.value ?? EMPTY_WORD
  }

  setMapItem(slot: number, key: Word, value: Word): void {
    this.mapAt(slot).set(wordKey(key), { key, value })
  }

  /** All written entries of a map slot, in insertion order. */
  mapEntries(slot: number): MapEntry[] {
    return Array.from(this.mapAt(slot).values())
  }

  slotsView(): readonly StorageSlot[] {
    return this.slots
  }

  clone(): AccountStorage {
    return new AccountStorage(this.slots.map(s =>
      s.type === 'value'
        ? { type: 'value', value: s.value }
        : { type: 'map', entries: new Map(s.entries) }
    ))
  }

  private slotAt(slot: number): StorageSlot {
    const s = this.slots[slot]
    if (s === undefined) {
      throw malformed(`Storage slot ${slot} does not exist`)
    }
    return s
  }

  private mapAt(slot: number): Map<string, MapEntry> {
    const s = this.slotAt(slot)
    if (s.type !== 'map') {
      throw malformed(`Storage slot ${slot} is a value, not a map`)
    }
    return s.entries
  }
}
