/**
 * @vault-bank/core - Custodial Bank Ledger
 *
 * A bank account component that keeps depositor balances over a shared
 * vault and pays withdrawals out as pay-to-id notes.
 *
 * This library provides:
 * - Prime field elements and words
 * - Account identifier and fungible asset encodings
 * - The balance ledger and initialization gate
 * - Recipient commitments and note emission
 * - Bank entry points and the note scripts that drive them
 * - An in-process transaction executor with atomic commit
 *
 * @example
 * ```typescript
 * import { BankAccount, TransactionExecutor, FungibleAsset } from '@vault-bank/core'
 *
 * const executor = new TransactionExecutor()
 * let bank = BankAccount.create(bankId)
 * bank = executor.initialize(bank).account
 *
 * const deposit = executor.consumeDepositNote(bank, {
 *   sender: alice,
 *   assets: [new FungibleAsset(faucet, 1000)]
 * })
 * bank = deposit.account
 * ```
 *
 * @packageDocumentation
 */

// Entry points
export { Bank, resolveConfig } from './Bank.js'
export type { WithdrawResult } from './Bank.js'

// Encodings
export { Felt, FIELD_MODULUS, EMPTY_WORD, word, wordFrom, wordsEqual, wordKey, wordToHex } from './Felt.js'
export type { Word, Digest } from './Felt.js'
export { AccountId } from './AccountId.js'
export { FungibleAsset } from './FungibleAsset.js'

// Ledger state
export { BalanceLedger } from './BalanceLedger.js'
export { InitializationGate } from './InitializationGate.js'
export { AccountStorage } from './AccountStorage.js'
export type { StorageSlot, MapEntry } from './AccountStorage.js'
export { AssetVault } from './AssetVault.js'
export { BankAccount } from './BankAccount.js'

// Notes
export { computeRecipient, payToIdInputs, payToIdRecipient } from './Recipient.js'
export {
  NoteEmitter,
  computeNoteId,
  noteTagForLocalAccount,
  tagFromFelt,
  validateTag,
  validateNoteType
} from './NoteEmitter.js'
export type { TransferParams } from './NoteEmitter.js'
export {
  initializeScript,
  depositNoteScript,
  withdrawRequestNoteScript,
  decodeWithdrawRequest,
  buildWithdrawRequest
} from './scripts.js'

// Execution
export { TransactionExecutor } from './TransactionExecutor.js'
export type {
  TransactionScript,
  TransactionContext,
  ExecuteOptions,
  ExecutedTransaction
} from './TransactionExecutor.js'
export { AdviceMap } from './AdviceMap.js'
export { Sha256Hasher } from './Sha256Hasher.js'

// Types
export { NoteType, NoteExecutionHint } from './types.js'
export type {
  NoteParams,
  OutputNote,
  Hasher,
  StorageAccess,
  BankHost,
  AdviceProvider,
  DepositNote,
  WithdrawRequestNote,
  WithdrawRequestParams,
  BalanceDelta,
  BankConfig,
  ResolvedBankConfig
} from './types.js'

// Errors
export { BankError, ERR, isBankError } from './errors.js'
export type { BankErrorCode } from './errors.js'

// Constants
export {
  INITIALIZED_SLOT,
  BALANCES_SLOT,
  MAX_FUNGIBLE_ASSET_AMOUNT,
  DEFAULT_MAX_DEPOSIT_AMOUNT,
  PAY_TO_ID_SCRIPT_ROOT,
  PAY_TO_ID_INPUT_COUNT,
  WITHDRAW_REQUEST_INPUT_COUNT
} from './constants.js'

export { debug } from './utils.js'
