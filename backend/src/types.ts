/**
 * Type definitions for the bank ledger backend
 * @module types
 */

export type {
  BankAccountRecord,
  BankAccountState,
  BankNoteFilters,
  BankNoteQuery,
  BankStorage,
  OutputNoteRecord,
  StoredAsset,
  StoredSlot,
  StoredWord
} from './ledger-services/types.js'
