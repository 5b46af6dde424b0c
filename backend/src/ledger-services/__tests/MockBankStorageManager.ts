import type {
  BankAccountRecord,
  BankAccountState,
  BankNoteFilters,
  BankStorage,
  OutputNoteRecord
} from '../types'

/**
 * In-memory stand-in for BankStorageManager
 */
export class MockBankStorageManager implements BankStorage {
  private readonly records: Map<string, BankAccountRecord> = new Map()

  async loadAccount (accountId: string): Promise<BankAccountRecord | null> {
    const record = this.records.get(accountId)
    return record === undefined ? null : structuredClone(record)
  }

  async createAccount (record: BankAccountRecord): Promise<void> {
    if (this.records.has(record.accountId)) {
      return
    }
    this.records.set(record.accountId, structuredClone(record))
  }

  async commitTransaction (
    accountId: string,
    expectedNonce: number,
    state: BankAccountState,
    notes: OutputNoteRecord[]
  ): Promise<void> {
    const record = this.records.get(accountId)
    if (record === undefined || record.nonce !== expectedNonce) {
      throw new Error(`Bank account ${accountId} changed since nonce ${expectedNonce}`)
    }
    this.records.set(accountId, {
      ...record,
      ...structuredClone(state),
      outputNotes: [...record.outputNotes, ...structuredClone(notes)],
      updatedAt: new Date()
    })
  }

  async findNotes (
    accountId: string,
    filters: BankNoteFilters,
    limit: number = 50,
    skip: number = 0,
    sortOrder: 'asc' | 'desc' = 'desc'
  ): Promise<OutputNoteRecord[]> {
    let results = this.records.get(accountId)?.outputNotes ?? []

    if (filters.tag !== undefined) {
      results = results.filter(n => n.tag === filters.tag)
    }
    if (filters.recipient !== undefined) {
      results = results.filter(n => n.recipient === filters.recipient)
    }
    if (filters.faucetId !== undefined) {
      results = results.filter(n => n.assets.some(a => a.faucetId === filters.faucetId))
    }

    const sorted = [...results].sort((a, b) => {
      const diff = (a.createdAt.getTime() - b.createdAt.getTime()) || (a.nonce - b.nonce) || (a.index - b.index)
      return sortOrder === 'desc' ? -diff : diff
    })

    return structuredClone(sorted.slice(skip, skip + limit))
  }

  getRecord (accountId: string): BankAccountRecord | undefined {
    return this.records.get(accountId)
  }

  getRecordCount (): number {
    return this.records.size
  }
}
