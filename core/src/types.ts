/**
 * Bank Core Type Definitions
 *
 * Interfaces for the collaborators the ledger depends on (storage, vault
 * and note host, hash primitive) and the records it produces.
 */

import type { AccountId } from './AccountId.js'
import type { Digest, Felt, Word } from './Felt.js'
import type { FungibleAsset } from './FungibleAsset.js'

// ---------------------------------------------------------------------------
// Note Metadata
// ---------------------------------------------------------------------------

/**
 * How the delivery environment discloses a note.
 */
export const NoteType = {
  /** Full note data is published */
  Public: 1,
  /** Only the note commitment is published */
  Private: 2,
  /** Note data is published encrypted */
  Encrypted: 3
} as const

export type NoteType = typeof NoteType[keyof typeof NoteType]

export const NoteExecutionHint = {
  None: 0
} as const

export type NoteExecutionHint = typeof NoteExecutionHint[keyof typeof NoteExecutionHint]

/**
 * Header of a note the account asks the host to create.
 */
export interface NoteParams {
  /** 32-bit routing tag */
  tag: number
  aux: Felt
  noteType: NoteType
  executionHint: NoteExecutionHint
  /** Recipient commitment the claimant must open */
  recipient: Digest
}

/**
 * A note emitted by an executed transaction
 */
export interface OutputNote extends NoteParams {
  /** Position among the transaction's output notes */
  index: number
  /** Commitment to recipient and assets */
  noteId: Digest
  /** The account that created the note */
  sender: AccountId
  assets: FungibleAsset[]
}

// ---------------------------------------------------------------------------
// Environment Collaborators
// ---------------------------------------------------------------------------

/**
 * Opaque collision-resistant hash primitive supplied by the environment.
 */
export interface Hasher {
  hashElements(elements: readonly Felt[]): Digest
  merge(left: Word, right: Word): Digest
}

/**
 * Key-value storage of the executing account.
 */
export interface StorageAccess {
  getItem(slot: number): Word
  setItem(slot: number, value: Word): void
  getMapItem(slot: number, key: Word): Word
  setMapItem(slot: number, key: Word, value: Word): void
}

/**
 * Vault custody and note lifecycle operations of the executing account.
 */
export interface BankHost {
  addAsset(asset: FungibleAsset): void
  /** @throws BankError(AssetNotHeld) if the vault lacks the asset */
  removeAsset(asset: FungibleAsset): void
  /** Returns the index of the new output note */
  createNote(params: NoteParams): number
  addAssetToNote(asset: FungibleAsset, noteIndex: number): void
}

/**
 * Preimage store keyed by hash commitment.
 */
export interface AdviceProvider {
  /** @throws BankError(MalformedInput) if no verified preimage exists */
  lookupByCommitment(commitment: Word): Felt[]
}

// ---------------------------------------------------------------------------
// Notes Consumed by the Bank
// ---------------------------------------------------------------------------

/**
 * A note carrying assets into the bank; the sender becomes the depositor.
 */
export interface DepositNote {
  sender: AccountId
  assets: FungibleAsset[]
}

/**
 * A note asking the bank to pay assets back to its sender.
 */
export interface WithdrawRequestNote {
  sender: AccountId
  inputs: Felt[]
}

/**
 * Client-side description of a withdrawal.
 */
export interface WithdrawRequestParams {
  asset: FungibleAsset
  /** Must be unique per emitted note */
  serialNum: Word
  tag: number
}

// ---------------------------------------------------------------------------
// Execution Results
// ---------------------------------------------------------------------------

/**
 * Net change of one balance entry within a transaction
 */
export interface BalanceDelta {
  depositor: AccountId
  faucetId: AccountId
  /** Positive for credits, negative for debits */
  delta: bigint
}

// ---------------------------------------------------------------------------
// Configuration Types
// ---------------------------------------------------------------------------

/**
 * Configuration options for the bank component
 */
export interface BankConfig {
  /** Largest amount accepted by a single deposit (default: 1_000_000) */
  maxDepositAmount?: bigint
  /** Root of the claim program the emitted notes commit to (default: PAY_TO_ID_SCRIPT_ROOT) */
  scriptRoot?: Word
  /** Note type used when a withdrawal does not name one (default: Public) */
  defaultNoteType?: NoteType
  /** Hash primitive (default: Sha256Hasher) */
  hasher?: Hasher
}

/**
 * Resolved configuration with defaults applied
 */
export interface ResolvedBankConfig {
  maxDepositAmount: bigint
  scriptRoot: Word
  defaultNoteType: NoteType
  hasher: Hasher
}
