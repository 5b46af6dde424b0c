import {
  AccountId,
  BalanceLedger,
  BankAccount,
  InitializationGate,
  TransactionExecutor,
  isBankError,
  type AdviceMap,
  type AdviceProvider,
  type BankConfig,
  type DepositNote,
  type ExecutedTransaction,
  type Hasher,
  type WithdrawRequestNote
} from '@vault-bank/core'
import { Db } from 'mongodb'
import { BankStorageManager } from './BankStorageManager.js'
import { decodeAccount, encodeAccount, encodeOutputNote } from './stateCodec.js'
import type { BankNoteQuery, BankStorage, OutputNoteRecord } from './types.js'
import docs from '../docs/BankLedgerDocs.js'

/**
 * Runs bank transactions against the persisted account and commits the
 * results.
 * @public
 */
export class BankLedgerService {
  private readonly executor: TransactionExecutor
  private readonly accountKey: string

  constructor (
    public storageManager: BankStorage,
    readonly accountId: AccountId,
    config: BankConfig = {}
  ) {
    this.executor = new TransactionExecutor(config)
    this.accountKey = accountId.toString()
  }

  get hasher (): Hasher {
    return this.executor.hasher
  }

  /**
   * Advice map for building withdraw requests against this service.
   */
  createAdviceMap (): AdviceMap {
    return this.executor.createAdviceMap()
  }

  async initialize (): Promise<ExecutedTransaction> {
    return await this.run('initialize', account => this.executor.initialize(account))
  }

  async consumeDepositNote (note: DepositNote): Promise<ExecutedTransaction> {
    return await this.run('deposit', account => this.executor.consumeDepositNote(account, note))
  }

  async consumeWithdrawRequestNote (note: WithdrawRequestNote, advice: AdviceProvider): Promise<ExecutedTransaction> {
    return await this.run('withdraw', account => this.executor.consumeWithdrawRequestNote(account, note, advice))
  }

  async getBalance (depositor: AccountId, faucetId: AccountId): Promise<bigint> {
    const account = await this.loadAccount()
    return new BalanceLedger(account.storage).getBalance(depositor, faucetId)
  }

  async isInitialized (): Promise<boolean> {
    const account = await this.loadAccount()
    return new InitializationGate(account.storage).isInitialized()
  }

  async lookup (query: BankNoteQuery): Promise<OutputNoteRecord[]> {
    if (query === undefined || query === null) {
      throw new Error('A valid query must be provided')
    }
    if (query.tag !== undefined && (!Number.isInteger(query.tag) || query.tag < 0 || query.tag > 0xFFFFFFFF)) {
      throw new Error(`Invalid note tag: ${query.tag}`)
    }

    return await this.storageManager.findNotes(
      this.accountKey,
      {
        tag: query.tag,
        recipient: query.recipient?.toLowerCase(),
        faucetId: query.faucetId
      },
      query.limit,
      query.skip,
      query.sortOrder
    )
  }

  async getDocumentation (): Promise<string> {
    return docs
  }

  async getMetaData (): Promise<{
    name: string
    shortDescription: string
    iconURL?: string
    version?: string
    informationURL?: string
  }> {
    return {
      name: 'Bank Ledger Service',
      shortDescription: 'Custodial deposits and pay-to-id withdrawals for a bank account.'
    }
  }

  /**
   * Load the account, creating the document on first use.
   */
  private async loadAccount (): Promise<BankAccount> {
    const existing = await this.storageManager.loadAccount(this.accountKey)
    if (existing !== null) {
      return decodeAccount(existing.accountId, existing)
    }

    const now = new Date()
    await this.storageManager.createAccount({
      accountId: this.accountKey,
      ...encodeAccount(BankAccount.create(this.accountId)),
      outputNotes: [],
      createdAt: now,
      updatedAt: now
    })

    // Another caller may have created it first
    const record = await this.storageManager.loadAccount(this.accountKey)
    if (record === null) {
      throw new Error(`Bank account ${this.accountKey} could not be created`)
    }
    return decodeAccount(record.accountId, record)
  }

  private async run (
    label: string,
    execute: (account: BankAccount) => ExecutedTransaction
  ): Promise<ExecutedTransaction> {
    try {
      const account = await this.loadAccount()
      const executed = execute(account)
      const createdAt = new Date()
      await this.storageManager.commitTransaction(
        this.accountKey,
        account.nonce,
        encodeAccount(executed.account),
        executed.outputNotes.map(note => encodeOutputNote(note, executed.account.nonce, createdAt))
      )
      return executed
    } catch (error) {
      if (isBankError(error)) {
        console.error(`[BankLedgerService] ${label} rejected (${error.code}): ${error.message}`)
      } else {
        console.error(`[BankLedgerService] ${label} failed:`, error)
      }
      throw error
    }
  }
}

// Factory function
export default (db: Db, accountId: AccountId, config?: BankConfig): BankLedgerService => {
  return new BankLedgerService(new BankStorageManager(db), accountId, config)
}
