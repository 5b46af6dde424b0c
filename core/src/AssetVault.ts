import { AccountId } from './AccountId.js'
import { FungibleAsset } from './FungibleAsset.js'
import { MAX_FUNGIBLE_ASSET_AMOUNT } from './constants.js'
import { BankError, ERR } from './errors.js'

/**
 * Fungible assets held in custody by an account, one entry per faucet.
 */
export class AssetVault {
  private readonly entries: Map<string, FungibleAsset>

  constructor(assets: FungibleAsset[] = []) {
    this.entries = new Map()
    for (const asset of assets) {
      this.add(asset)
    }
  }

  getBalance(faucetId: AccountId): bigint {
    return this.entries.get(faucetId.toString())?.amount ?? 0n
  }

  /**
   * @throws BankError(BalanceOverflow) if the faucet total would exceed the fungible maximum
   */
  add(asset: FungibleAsset): void {
    if (asset.amount === 0n) {
      return
    }
    const key = asset.faucetId.toString()
    const current = this.entries.get(key)?.amount ?? 0n
    const next = current + asset.amount
    if (next > MAX_FUNGIBLE_ASSET_AMOUNT) {
      throw new BankError(ERR.BALANCE_OVERFLOW, `Vault total for ${key} would exceed ${MAX_FUNGIBLE_ASSET_AMOUNT}`)
    }
    this.entries.set(key, asset.withAmount(next))
  }

  /**
   * @throws BankError(AssetNotHeld) if the vault holds less than the asset amount
   */
  remove(asset: FungibleAsset): void {
    const key = asset.faucetId.toString()
    const current = this.entries.get(key)?.amount ?? 0n
    if (current < asset.amount) {
      throw new BankError(ERR.ASSET_NOT_HELD, `Vault holds ${current} of ${key}, cannot remove ${asset.amount}`)
    }
    const next = current - asset.amount
    if (next === 0n) {
      this.entries.delete(key)
    } else {
      this.entries.set(key, asset.withAmount(next))
    }
  }

  assets(): FungibleAsset[] {
    return Array.from(this.entries.values())
  }

  clone(): AssetVault {
    return new AssetVault(this.assets())
  }
}
