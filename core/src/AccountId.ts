import { Felt } from './Felt.js'
import { malformed } from './errors.js'

const HEX_PATTERN = /^0x[0-9a-fA-F]{30}$/

/**
 * Identifier of a participant: two field elements assigned by the
 * execution environment. Also used as the type tag of fungible assets,
 * where it names the issuing faucet.
 */
export class AccountId {
  readonly prefix: Felt
  readonly suffix: Felt

  constructor(prefix: Felt, suffix: Felt) {
    this.prefix = prefix
    this.suffix = suffix
  }

  static fromValues(prefix: bigint | number, suffix: bigint | number): AccountId {
    return new AccountId(Felt.fromCanonical(prefix), Felt.fromCanonical(suffix))
  }

  /**
   * Parse the 15-byte hex form: 8 bytes of prefix followed by the upper
   * 7 bytes of the suffix. The low byte of the suffix is always zero.
   */
  static fromHex(hex: string): AccountId {
    if (!HEX_PATTERN.test(hex)) {
      throw malformed(`Invalid account ID: ${hex}`)
    }
    const prefix = BigInt('0x' + hex.slice(2, 18))
    const suffix = BigInt('0x' + hex.slice(18)) << 8n
    return AccountId.fromValues(prefix, suffix)
  }

  toHex(): string {
    const suffix = this.suffix.asCanonical()
    if ((suffix & 0xffn) !== 0n) {
      throw malformed(`Account suffix ${suffix} has a non-zero low byte`)
    }
    return '0x' +
      this.prefix.asCanonical().toString(16).padStart(16, '0') +
      (suffix >> 8n).toString(16).padStart(14, '0')
  }

  equals(other: AccountId): boolean {
    return this.prefix.equals(other.prefix) && this.suffix.equals(other.suffix)
  }

  toString(): string {
    return `${this.prefix.toString()}:${this.suffix.toString()}`
  }
}
