/**
 * BalanceLedger - Per-Depositor, Per-Asset Balances
 *
 * Balances live in the balances map slot. Each entry is keyed by
 * [depositor.prefix, depositor.suffix, faucet.prefix, faucet.suffix]
 * and stores [0, 0, 0, balance].
 *
 * Field arithmetic wraps, so both mutations compare canonical values
 * before writing anything.
 */

import { AccountId } from './AccountId.js'
import { FIELD_MODULUS, Felt, type Word } from './Felt.js'
import { BALANCES_SLOT } from './constants.js'
import { BankError, ERR } from './errors.js'
import type { StorageAccess } from './types.js'

export class BalanceLedger {
  private readonly storage: StorageAccess
  private readonly slot: number

  constructor(storage: StorageAccess, slot: number = BALANCES_SLOT) {
    this.storage = storage
    this.slot = slot
  }

  static key(depositor: AccountId, faucetId: AccountId): Word {
    return [depositor.prefix, depositor.suffix, faucetId.prefix, faucetId.suffix]
  }

  /**
   * Inverse of key(): recover the depositor and faucet from a map key.
   */
  static parseKey(key: Word): { depositor: AccountId, faucetId: AccountId } {
    return {
      depositor: new AccountId(key[0], key[1]),
      faucetId: new AccountId(key[2], key[3])
    }
  }

  static balanceOf(value: Word): bigint {
    return value[3].asCanonical()
  }

  getBalance(depositor: AccountId, faucetId: AccountId): bigint {
    return BalanceLedger.balanceOf(this.storage.getMapItem(this.slot, BalanceLedger.key(depositor, faucetId)))
  }

  /**
   * Add to a balance. The caller range-checks the amount.
   *
   * @throws BankError(BalanceOverflow) if the new balance would not fit in the field
   */
  credit(depositor: AccountId, faucetId: AccountId, amount: bigint): bigint {
    const current = this.getBalance(depositor, faucetId)
    const next = current + amount
    if (next >= FIELD_MODULUS) {
      throw new BankError(
        ERR.BALANCE_OVERFLOW,
        `Balance of ${depositor.toString()} in ${faucetId.toString()} would overflow`
      )
    }
    this.write(depositor, faucetId, Felt.new(current).add(Felt.new(amount)))
    return next
  }

  /**
   * Subtract from a balance.
   *
   * @throws BankError(InsufficientFunds) if the stored balance is below the amount
   */
  debit(depositor: AccountId, faucetId: AccountId, amount: bigint): bigint {
    const current = this.getBalance(depositor, faucetId)
    if (current < amount) {
      throw new BankError(
        ERR.INSUFFICIENT_FUNDS,
        `Insufficient balance. Have ${current}, need ${amount}`
      )
    }
    this.write(depositor, faucetId, Felt.new(current).sub(Felt.new(amount)))
    return current - amount
  }

  private write(depositor: AccountId, faucetId: AccountId, balance: Felt): void {
    this.storage.setMapItem(
      this.slot,
      BalanceLedger.key(depositor, faucetId),
      [Felt.ZERO, Felt.ZERO, Felt.ZERO, balance]
    )
  }
}
