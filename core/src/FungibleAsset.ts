/**
 * FungibleAsset - Asset Encoding
 *
 * A fungible asset is carried as the word
 * [amount, 0, faucet.suffix, faucet.prefix]
 * where the faucet id names the asset class.
 */

import { AccountId } from './AccountId.js'
import { Felt, type Word } from './Felt.js'
import { MAX_FUNGIBLE_ASSET_AMOUNT } from './constants.js'
import { malformed } from './errors.js'

export class FungibleAsset {
  readonly faucetId: AccountId
  readonly amount: bigint

  constructor(faucetId: AccountId, amount: bigint | number) {
    const value = BigInt(amount)
    if (value < 0n || value > MAX_FUNGIBLE_ASSET_AMOUNT) {
      throw malformed(`Asset amount ${value} is outside [0, ${MAX_FUNGIBLE_ASSET_AMOUNT}]`)
    }
    this.faucetId = faucetId
    this.amount = value
  }

  /**
   * Decode an asset word.
   *
   * @throws BankError(MalformedInput) if the padding element is non-zero
   * or the amount exceeds the fungible maximum
   */
  static fromWord(w: Word): FungibleAsset {
    const [amount, padding, suffix, prefix] = w
    if (!padding.isZero()) {
      throw malformed('Fungible asset word must have a zero second element')
    }
    return new FungibleAsset(new AccountId(prefix, suffix), amount.asCanonical())
  }

  toWord(): Word {
    return [
      Felt.new(this.amount),
      Felt.ZERO,
      this.faucetId.suffix,
      this.faucetId.prefix
    ]
  }

  /** Same faucet, different amount. */
  withAmount(amount: bigint | number): FungibleAsset {
    return new FungibleAsset(this.faucetId, amount)
  }

  isSameType(other: FungibleAsset): boolean {
    return this.faucetId.equals(other.faucetId)
  }

  equals(other: FungibleAsset): boolean {
    return this.isSameType(other) && this.amount === other.amount
  }

  toString(): string {
    return `${this.amount}@${this.faucetId.toString()}`
  }
}
