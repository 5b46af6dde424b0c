/**
 * Felt - Prime Field Elements
 *
 * Values live in the field of order p = 2^64 - 2^32 + 1. Addition and
 * subtraction wrap modulo p; callers that need unsigned semantics (balances,
 * amounts) must compare canonical values before subtracting.
 */

import { malformed } from './errors.js'

/** Field modulus: 2^64 - 2^32 + 1 */
export const FIELD_MODULUS = 0xFFFFFFFF00000001n

const U64_MAX = 0xFFFFFFFFFFFFFFFFn

export class Felt {
  private readonly value: bigint

  private constructor(value: bigint) {
    this.value = value
  }

  static readonly ZERO = new Felt(0n)
  static readonly ONE = new Felt(1n)

  /**
   * Create a field element, reducing the value modulo p.
   */
  static new(value: bigint | number): Felt {
    const v = BigInt(value) % FIELD_MODULUS
    return new Felt(v < 0n ? v + FIELD_MODULUS : v)
  }

  /**
   * Create a field element from a value that must already be canonical.
   *
   * @throws BankError(MalformedInput) if the value is not in [0, p)
   */
  static fromCanonical(value: bigint | number): Felt {
    const v = BigInt(value)
    if (v < 0n || v >= FIELD_MODULUS) {
      throw malformed(`Value ${v} is not a canonical field element`)
    }
    return new Felt(v)
  }

  /**
   * Parse a decimal or 0x-prefixed hex string holding a canonical value.
   */
  static parse(raw: string): Felt {
    if (!/^(0x[0-9a-fA-F]+|\d+)$/.test(raw)) {
      throw malformed(`Invalid field element: ${raw}`)
    }
    return Felt.fromCanonical(BigInt(raw))
  }

  /**
   * Read 8 little-endian bytes as a u64 and reduce it into the field.
   */
  static fromLEBytes(bytes: number[]): Felt {
    if (bytes.length !== 8) {
      throw malformed(`Expected 8 bytes, got ${bytes.length}`)
    }
    let v = 0n
    for (let i = 7; i >= 0; i--) {
      v = (v << 8n) | BigInt(bytes[i] & 0xff)
    }
    return Felt.new(v & U64_MAX)
  }

  add(other: Felt): Felt {
    return Felt.new(this.value + other.value)
  }

  sub(other: Felt): Felt {
    return Felt.new(this.value - other.value)
  }

  equals(other: Felt): boolean {
    return this.value === other.value
  }

  isZero(): boolean {
    return this.value === 0n
  }

  asCanonical(): bigint {
    return this.value
  }

  toLEBytes(): number[] {
    const out: number[] = []
    let v = this.value
    for (let i = 0; i < 8; i++) {
      out.push(Number(v & 0xffn))
      v >>= 8n
    }
    return out
  }

  toString(): string {
    return this.value.toString()
  }
}

// ---------------------------------------------------------------------------
// Words
// ---------------------------------------------------------------------------

/** Four field elements; the unit of storage and addressing. */
export type Word = readonly [Felt, Felt, Felt, Felt]

/** Digests produced by the hasher share the word layout. */
export type Digest = Word

export const EMPTY_WORD: Word = [Felt.ZERO, Felt.ZERO, Felt.ZERO, Felt.ZERO]

export function word(a: bigint | number, b: bigint | number, c: bigint | number, d: bigint | number): Word {
  return [Felt.new(a), Felt.new(b), Felt.new(c), Felt.new(d)]
}

export function wordFrom(values: readonly Felt[]): Word {
  if (values.length !== 4) {
    throw malformed(`A word has 4 elements, got ${values.length}`)
  }
  return [values[0], values[1], values[2], values[3]]
}

export function wordsEqual(a: Word, b: Word): boolean {
  return a.every((felt, i) => felt.equals(b[i]))
}

/** Stable string form of a word, usable as a map key. */
export function wordKey(w: Word): string {
  return w.map(f => f.toString()).join('.')
}

export function wordToHex(w: Word): string {
  return '0x' + w
    .flatMap(f => f.toLEBytes())
    .map(b => b.toString(16).padStart(2, '0'))
    .join('')
}
