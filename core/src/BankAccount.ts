import { AccountId } from './AccountId.js'
import { AccountStorage, type StorageSlot } from './AccountStorage.js'
import { AssetVault } from './AssetVault.js'
import { BALANCES_SLOT, INITIALIZED_SLOT } from './constants.js'

/**
 * State of the bank account as seen by the execution environment:
 * its storage slots, its vault and a nonce bumped by every committed
 * transaction.
 */
export class BankAccount {
  readonly id: AccountId
  readonly nonce: number
  readonly storage: AccountStorage
  readonly vault: AssetVault

  constructor(id: AccountId, nonce: number, storage: AccountStorage, vault: AssetVault) {
    this.id = id
    this.nonce = nonce
    this.storage = storage
    this.vault = vault
  }

  /**
   * A fresh, uninitialized bank account with the standard slot layout.
   */
  static create(id: AccountId): BankAccount {
    const slots: StorageSlot[] = []
    slots[INITIALIZED_SLOT] = AccountStorage.valueSlot()
    slots[BALANCES_SLOT] = AccountStorage.mapSlot()
    return new BankAccount(id, 0, new AccountStorage(slots), new AssetVault())
  }

  clone(nonce: number = this.nonce): BankAccount {
    return new BankAccount(this.id, nonce, this.storage.clone(), this.vault.clone())
  }
}
