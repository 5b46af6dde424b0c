/**
 * Bank - Custodial Ledger Entry Points
 *
 * The bank component runs inside the bank account during a transaction.
 * It provides:
 * - One-time initialization
 * - Deposits that credit a depositor and take custody of the asset
 * - Withdrawals that debit a depositor and emit a pay-to-id note back to them
 * - Balance queries
 *
 * The environment commits a transaction's effects only if the entry point
 * returns; any thrown BankError discards them all.
 */

import { AccountId } from './AccountId.js'
import { BalanceLedger } from './BalanceLedger.js'
import { Felt, type Digest, type Word } from './Felt.js'
import { FungibleAsset } from './FungibleAsset.js'
import { InitializationGate } from './InitializationGate.js'
import { NoteEmitter, tagFromFelt } from './NoteEmitter.js'
import { payToIdRecipient } from './Recipient.js'
import { Sha256Hasher } from './Sha256Hasher.js'
import { DEFAULT_MAX_DEPOSIT_AMOUNT, PAY_TO_ID_SCRIPT_ROOT } from './constants.js'
import { BankError, ERR } from './errors.js'
import {
  NoteExecutionHint,
  NoteType,
  type BankConfig,
  type BankHost,
  type ResolvedBankConfig,
  type StorageAccess
} from './types.js'
import { debug } from './utils.js'

/**
 * Result of a successful withdrawal
 */
export interface WithdrawResult {
  noteIndex: number
  recipient: Digest
  remainingBalance: bigint
}

/**
 * @example
 * ```typescript
 * const bank = new Bank(storage, host)
 * bank.initialize()
 * bank.deposit(alice, new FungibleAsset(faucet, 1000))
 * bank.withdraw(alice, new FungibleAsset(faucet, 500), serialNum, noteTagForLocalAccount(alice))
 * bank.getBalance(alice, faucet) // 500n
 * ```
 */
export class Bank {
  private readonly config: ResolvedBankConfig
  private readonly gate: InitializationGate
  private readonly ledger: BalanceLedger
  private readonly emitter: NoteEmitter
  private readonly host: BankHost

  constructor(storage: StorageAccess, host: BankHost, config: BankConfig = {}) {
    this.config = resolveConfig(config)
    this.gate = new InitializationGate(storage)
    this.ledger = new BalanceLedger(storage)
    this.emitter = new NoteEmitter(host)
    this.host = host
  }

  // ---------------------------------------------------------------------------
  // Setup
  // ---------------------------------------------------------------------------

  /**
   * @throws BankError(AlreadyInitialized)
   */
  initialize(): void {
    this.gate.markInitialized()
    debug('bank', 'initialized')
  }

  isInitialized(): boolean {
    return this.gate.isInitialized()
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  getBalance(depositor: AccountId, faucetId: AccountId): bigint {
    return this.ledger.getBalance(depositor, faucetId)
  }

  // ---------------------------------------------------------------------------
  // Deposits and Withdrawals
  // ---------------------------------------------------------------------------

  /**
   * Credit `depositor` with `asset` and take custody of it.
   *
   * The asset must already be under the transaction's control (for example
   * carried by the note being consumed).
   *
   * @returns The depositor's new balance
   * @throws BankError(NotInitialized | DepositTooLarge | BalanceOverflow)
   */
  deposit(depositor: AccountId, asset: FungibleAsset): bigint {
    this.gate.requireInitialized()
    if (asset.amount > this.config.maxDepositAmount) {
      throw new BankError(
        ERR.DEPOSIT_TOO_LARGE,
        `Deposit of ${asset.amount} exceeds the maximum of ${this.config.maxDepositAmount}`
      )
    }

    const balance = this.ledger.credit(depositor, asset.faucetId, asset.amount)
    this.host.addAsset(asset)

    debug('bank', `deposit ${asset.toString()} for ${depositor.toString()}, balance ${balance}`)
    return balance
  }

  /**
   * Debit `depositor` and emit a pay-to-id note that only they can claim.
   *
   * @param serialNum - Serial number of the emitted note; must be fresh per withdrawal
   * @param tag - Routing tag of the emitted note (32 bits)
   * @throws BankError(NotInitialized | InsufficientFunds | MalformedInput | AssetNotHeld)
   */
  withdraw(
    depositor: AccountId,
    asset: FungibleAsset,
    serialNum: Word,
    tag: Felt | number,
    aux: Felt = Felt.ZERO,
    noteType: NoteType = this.config.defaultNoteType
  ): WithdrawResult {
    this.gate.requireInitialized()

    const remainingBalance = this.ledger.debit(depositor, asset.faucetId, asset.amount)
    const recipient = payToIdRecipient(this.config.hasher, depositor, serialNum, this.config.scriptRoot)
    const noteIndex = this.emitter.emitTransfer({
      tag: typeof tag === 'number' ? tag : tagFromFelt(tag),
      aux,
      noteType,
      executionHint: NoteExecutionHint.None,
      recipient,
      asset
    })

    debug('bank', `withdraw ${asset.toString()} for ${depositor.toString()} as note ${noteIndex}`)
    return { noteIndex, recipient, remainingBalance }
  }
}

/**
 * Apply defaults to a bank configuration.
 */
export function resolveConfig(config: BankConfig): ResolvedBankConfig {
  return {
    maxDepositAmount: config.maxDepositAmount ?? DEFAULT_MAX_DEPOSIT_AMOUNT,
    scriptRoot: config.scriptRoot ?? PAY_TO_ID_SCRIPT_ROOT,
    defaultNoteType: config.defaultNoteType ?? NoteType.Public,
    hasher: config.hasher ?? new Sha256Hasher()
  }
}
