import {
  AccountId,
  AccountStorage,
  AssetVault,
  BankAccount,
  Felt,
  FungibleAsset,
  wordFrom,
  wordToHex,
  type OutputNote,
  type StorageSlot,
  type Word
} from '@vault-bank/core'
import type { BankAccountState, OutputNoteRecord, StoredAsset, StoredSlot, StoredWord } from './types.js'

const ACCOUNT_KEY_PATTERN = /^(\d+):(\d+)$/

export function encodeWord (w: Word): StoredWord {
  return [w[0].toString(), w[1].toString(), w[2].toString(), w[3].toString()]
}

export function decodeWord (stored: StoredWord): Word {
  return wordFrom(stored.map(raw => Felt.parse(raw)))
}

/**
 * Parse the `prefix:suffix` form produced by AccountId.toString().
 */
export function parseAccountKey (key: string): AccountId {
  const match = ACCOUNT_KEY_PATTERN.exec(key)
  if (match === null) {
    throw new Error(`Invalid account key: ${key}`)
  }
  return new AccountId(Felt.parse(match[1]), Felt.parse(match[2]))
}

function encodeAsset (asset: FungibleAsset): StoredAsset {
  return { faucetId: asset.faucetId.toString(), amount: asset.amount.toString() }
}

function decodeAsset (stored: StoredAsset): FungibleAsset {
  return new FungibleAsset(parseAccountKey(stored.faucetId), Felt.parse(stored.amount).asCanonical())
}

function encodeSlot (slot: StorageSlot): StoredSlot {
  if (slot.type === 'value') {
    return { type: 'value', value: encodeWord(slot.value) }
  }
  return {
    type: 'map',
    entries: Array.from(slot.entries.values()).map(e => ({ key: encodeWord(e.key), value: encodeWord(e.value) }))
  }
}

function decodeSlot (stored: StoredSlot): StorageSlot {
  if (stored.type === 'value') {
    return AccountStorage.valueSlot(decodeWord(stored.value))
  }
  return AccountStorage.mapSlot(stored.entries.map(e => ({ key: decodeWord(e.key), value: decodeWord(e.value) })))
}

export function encodeAccount (account: BankAccount): BankAccountState {
  return {
    nonce: account.nonce,
    slots: account.storage.slotsView().map(encodeSlot),
    vault: account.vault.assets().map(encodeAsset)
  }
}

export function decodeAccount (accountId: string, state: BankAccountState): BankAccount {
  return new BankAccount(
    parseAccountKey(accountId),
    state.nonce,
    new AccountStorage(state.slots.map(decodeSlot)),
    new AssetVault(state.vault.map(decodeAsset))
  )
}

/**
 * @param nonce - Account nonce after the transaction that emitted the note
 */
export function encodeOutputNote (note: OutputNote, nonce: number, createdAt: Date = new Date()): OutputNoteRecord {
  return {
    noteId: wordToHex(note.noteId),
    recipient: wordToHex(note.recipient),
    tag: note.tag,
    aux: note.aux.toString(),
    noteType: note.noteType,
    executionHint: note.executionHint,
    sender: note.sender.toString(),
    assets: note.assets.map(encodeAsset),
    nonce,
    index: note.index,
    createdAt
  }
}
