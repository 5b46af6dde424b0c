import { Collection, Db, type Document } from 'mongodb'
import type {
  BankAccountRecord,
  BankAccountState,
  BankNoteFilters,
  BankStorage,
  OutputNoteRecord
} from './types.js'

/**
 * Storage manager for the bank ledger using MongoDB.
 *
 * Each bank account is one document; its output notes are embedded so that
 * a transaction's state change and its notes land in a single write.
 */
export class BankStorageManager implements BankStorage {
  private readonly accounts: Collection<BankAccountRecord>

  /**
   * @param db A connected MongoDB database handle.
   */
  constructor (private readonly db: Db) {
    this.accounts = db.collection<BankAccountRecord>('bankAccounts')

    this.accounts
      .createIndex({ accountId: 1 }, { unique: true })
      .catch(console.error)

    // Notes are looked up by routing tag
    this.accounts
      .createIndex({ 'outputNotes.tag': 1 })
      .catch(console.error)
  }

  async loadAccount (accountId: string): Promise<BankAccountRecord | null> {
    return await this.accounts.findOne({ accountId }, { projection: { _id: 0 } })
  }

  /**
   * Insert the account document unless one already exists for its ID.
   */
  async createAccount (record: BankAccountRecord): Promise<void> {
    await this.accounts.updateOne(
      { accountId: record.accountId },
      { $setOnInsert: { ...record } },
      { upsert: true }
    )
  }

  /**
   * Replace the account state and append the transaction's notes, provided
   * no other transaction has committed since `expectedNonce` was read.
   */
  async commitTransaction (
    accountId: string,
    expectedNonce: number,
    state: BankAccountState,
    notes: OutputNoteRecord[]
  ): Promise<void> {
    const result = await this.accounts.updateOne(
      { accountId, nonce: expectedNonce },
      {
        $set: {
          nonce: state.nonce,
          slots: state.slots,
          vault: state.vault,
          updatedAt: new Date()
        },
        $push: { outputNotes: { $each: notes } }
      }
    )
    if (result.matchedCount === 0) {
      throw new Error(`Bank account ${accountId} changed since nonce ${expectedNonce}`)
    }
  }

  /**
   * Find output notes with dynamic filter combinations.
   */
  async findNotes (
    accountId: string,
    filters: BankNoteFilters,
    limit: number = 50,
    skip: number = 0,
    sortOrder: 'asc' | 'desc' = 'desc'
  ): Promise<OutputNoteRecord[]> {
    const match: Record<string, unknown> = {}

    if (filters.tag !== undefined) {
      match['outputNotes.tag'] = filters.tag
    }

    if (filters.recipient !== undefined) {
      match['outputNotes.recipient'] = filters.recipient
    }

    if (filters.faucetId !== undefined) {
      match['outputNotes.assets.faucetId'] = filters.faucetId
    }

    const sortDirection = sortOrder === 'desc' ? -1 : 1

    const pipeline: Document[] = [
      { $match: { accountId } },
      { $unwind: '$outputNotes' },
      { $match: match },
      { $sort: { 'outputNotes.createdAt': sortDirection, 'outputNotes.nonce': sortDirection, 'outputNotes.index': sortDirection } },
      { $skip: skip },
      { $limit: limit },
      { $replaceRoot: { newRoot: '$outputNotes' } }
    ]

    return await this.accounts.aggregate<OutputNoteRecord>(pipeline).toArray()
  }
}
