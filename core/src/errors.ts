/**
 * Error taxonomy for the bank ledger.
 *
 * Every check inside the ledger is a hard abort: the enclosing transaction
 * is discarded by the executor and no partial state is kept.
 */

export const ERR = {
  ALREADY_INITIALIZED: 'AlreadyInitialized',
  NOT_INITIALIZED: 'NotInitialized',
  DEPOSIT_TOO_LARGE: 'DepositTooLarge',
  INSUFFICIENT_FUNDS: 'InsufficientFunds',
  ASSET_NOT_HELD: 'AssetNotHeld',
  MALFORMED_INPUT: 'MalformedInput',
  BALANCE_OVERFLOW: 'BalanceOverflow'
} as const

export type BankErrorCode = typeof ERR[keyof typeof ERR]

export class BankError extends Error {
  readonly code: BankErrorCode

  constructor(code: BankErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'BankError'
    this.code = code
  }
}

export function isBankError(error: unknown, code?: BankErrorCode): error is BankError {
  return error instanceof BankError && (code === undefined || error.code === code)
}

export function malformed(message: string): BankError {
  return new BankError(ERR.MALFORMED_INPUT, message)
}
