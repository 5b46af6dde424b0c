/**
 * Four field elements as canonical decimal strings
 */
export type StoredWord = [string, string, string, string]

export type StoredSlot =
  | { type: 'value', value: StoredWord }
  | { type: 'map', entries: Array<{ key: StoredWord, value: StoredWord }> }

/**
 * A fungible asset held in the vault or carried by a note
 */
export interface StoredAsset {
  /** Faucet account ID as `prefix:suffix` */
  faucetId: string
  amount: string
}

/**
 * Mutable part of the bank account, replaced on every commit
 */
export interface BankAccountState {
  nonce: number
  slots: StoredSlot[]
  vault: StoredAsset[]
}

/**
 * A note emitted by a committed transaction
 */
export interface OutputNoteRecord {
  noteId: string
  recipient: string
  tag: number
  aux: string
  noteType: number
  executionHint: number
  sender: string
  assets: StoredAsset[]
  /** Nonce of the account after the transaction that emitted the note */
  nonce: number
  index: number
  createdAt: Date
}

/**
 * A bank account document in the ledger database
 */
export interface BankAccountRecord extends BankAccountState {
  accountId: string
  outputNotes: OutputNoteRecord[]
  createdAt: Date
  updatedAt: Date
}

/**
 * Query parameters for output note lookups
 */
export interface BankNoteQuery {
  tag?: number
  recipient?: string
  faucetId?: string
  limit?: number
  skip?: number
  sortOrder?: 'asc' | 'desc'
}

export interface BankNoteFilters {
  tag?: number
  recipient?: string
  faucetId?: string
}

/**
 * Persistence used by the ledger service
 */
export interface BankStorage {
  loadAccount: (accountId: string) => Promise<BankAccountRecord | null>
  /** Must leave an existing account untouched */
  createAccount: (record: BankAccountRecord) => Promise<void>
  commitTransaction: (
    accountId: string,
    expectedNonce: number,
    state: BankAccountState,
    notes: OutputNoteRecord[]
  ) => Promise<void>
  findNotes: (
    accountId: string,
    filters: BankNoteFilters,
    limit?: number,
    skip?: number,
    sortOrder?: 'asc' | 'desc'
  ) => Promise<OutputNoteRecord[]>
}
