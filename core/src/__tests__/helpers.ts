import {
  AccountId,
  AssetVault,
  BankError,
  FungibleAsset,
  isBankError,
  type BankHost,
  type NoteParams
} from '../index.js'

export const BANK_ID = AccountId.fromValues(0x9000000000000000n, 0x100n)
export const DEPOSITOR = AccountId.fromValues(0xABCD000000000000n, 0x4200n)
export const OTHER_DEPOSITOR = AccountId.fromValues(0x1234000000000000n, 0x7700n)
export const FAUCET_X = AccountId.fromValues(0x2000000000000000n, 0x300n)
export const FAUCET_Y = AccountId.fromValues(0x3000000000000000n, 0x500n)

export function assetX(amount: bigint | number): FungibleAsset {
  return new FungibleAsset(FAUCET_X, amount)
}

export function assetY(amount: bigint | number): FungibleAsset {
  return new FungibleAsset(FAUCET_Y, amount)
}

/**
 * Run fn and return the BankError it throws.
 */
export function captureError(fn: () => unknown): BankError {
  try {
    fn()
  } catch (error) {
    if (isBankError(error)) {
      return error
    }
    throw error
  }
  throw new Error('Expected a BankError to be thrown')
}

type HostCall =
  | { method: 'addAsset', asset: FungibleAsset }
  | { method: 'removeAsset', asset: FungibleAsset }
  | { method: 'createNote', params: NoteParams }
  | { method: 'addAssetToNote', asset: FungibleAsset, noteIndex: number }

/**
 * Host that records every call and keeps a real vault.
 */
export function createMockHost(initialAssets: FungibleAsset[] = []): BankHost & { calls: HostCall[], vault: AssetVault } {
  const calls: HostCall[] = []
  const vault = new AssetVault(initialAssets)
  let notes = 0

  return {
    calls,
    vault,
    addAsset(asset) {
      calls.push({ method: 'addAsset', asset })
      vault.add(asset)
    },
    removeAsset(asset) {
      calls.push({ method: 'removeAsset', asset })
      vault.remove(asset)
    },
    createNote(params) {
      calls.push({ method: 'createNote', params })
      return notes++
    },
    addAssetToNote(asset, noteIndex) {
      calls.push({ method: 'addAssetToNote', asset, noteIndex })
    }
  }
}
