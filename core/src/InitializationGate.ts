import { Felt } from './Felt.js'
import { INITIALIZED_SLOT } from './constants.js'
import { BankError, ERR } from './errors.js'
import type { StorageAccess } from './types.js'

/**
 * One-way flag stored as [flag, 0, 0, 0]. Created false, set once, never reset.
 */
export class InitializationGate {
  private readonly storage: StorageAccess
  private readonly slot: number

  constructor(storage: StorageAccess, slot: number = INITIALIZED_SLOT) {
    this.storage = storage
    this.slot = slot
  }

  isInitialized(): boolean {
    return this.storage.getItem(this.slot)[0].equals(Felt.ONE)
  }

  markInitialized(): void {
    if (this.isInitialized()) {
      throw new BankError(ERR.ALREADY_INITIALIZED, 'Bank is already initialized')
    }
    this.storage.setItem(this.slot, [Felt.ONE, Felt.ZERO, Felt.ZERO, Felt.ZERO])
  }

  requireInitialized(): void {
    if (!this.isInitialized()) {
      throw new BankError(ERR.NOT_INITIALIZED, 'Bank is not initialized')
    }
  }
}
