export { default, BankLedgerService } from './ledger-services/BankLedgerServiceFactory.js'
export { BankStorageManager } from './ledger-services/BankStorageManager.js'
export {
  decodeAccount,
  decodeWord,
  encodeAccount,
  encodeOutputNote,
  encodeWord,
  parseAccountKey
} from './ledger-services/stateCodec.js'
export * from './types.js'
