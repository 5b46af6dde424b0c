/**
 * Bank Protocol Constants
 *
 * Storage slot indices, the pinned claim-program root and amount limits.
 * The slot layout and script root are part of the compatibility surface
 * with deployed accounts and claim programs.
 */

import { word, type Word } from './Felt.js'

// ---------------------------------------------------------------------------
// Storage Layout
// ---------------------------------------------------------------------------

/** Slot 0: initialization flag, stored as [flag, 0, 0, 0] */
export const INITIALIZED_SLOT = 0

/** Slot 1: balances map, key [depositor.prefix, depositor.suffix, faucet.prefix, faucet.suffix] */
export const BALANCES_SLOT = 1

// ---------------------------------------------------------------------------
// Amount Limits
// ---------------------------------------------------------------------------

/** Largest amount a single fungible asset (or a vault entry) may carry: 2^63 - 2^31 */
export const MAX_FUNGIBLE_ASSET_AMOUNT = (1n << 63n) - (1n << 31n)

/** Default cap on a single deposit */
export const DEFAULT_MAX_DEPOSIT_AMOUNT = 1_000_000n

// ---------------------------------------------------------------------------
// Note Constants
// ---------------------------------------------------------------------------

/**
 * MAST root of the standard pay-to-id note script.
 *
 * Must match the claim-program build the receiving accounts run. If that
 * script changes, pin the new root through BankConfig.scriptRoot.
 */
export const PAY_TO_ID_SCRIPT_ROOT: Word = word(
  15783632360113277539n,
  7403765918285273520n,
  15691985194755641846n,
  10399643920503194563n
)

/** Number of inputs the pay-to-id script reads: [suffix, prefix] padded with zeros */
export const PAY_TO_ID_INPUT_COUNT = 8

/** Prefix bits of a "local any" note tag */
export const LOCAL_ANY_TAG_PREFIX = 0xC0000000

/** Account prefix bits embedded in a local pay-to-id tag */
export const LOCAL_TAG_ACCOUNT_BITS = 14

/** Withdraw request note inputs: asset word, serial number, tag commitment */
export const WITHDRAW_REQUEST_INPUT_COUNT = 12
