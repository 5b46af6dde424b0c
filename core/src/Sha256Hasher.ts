import { Hash } from '@bsv/sdk'
import { Felt, type Digest, type Word } from './Felt.js'
import type { Hasher } from './types.js'

/**
 * Hasher over field elements built on SHA-256.
 *
 * Elements are serialized as 8 little-endian bytes each; the 32-byte
 * digest is read back as four little-endian u64 values reduced modulo p.
 */
export class Sha256Hasher implements Hasher {
  hashElements(elements: readonly Felt[]): Digest {
    const bytes = elements.flatMap(e => e.toLEBytes())
    const digest = Hash.sha256(bytes)
    return [
      Felt.fromLEBytes(digest.slice(0, 8)),
      Felt.fromLEBytes(digest.slice(8, 16)),
      Felt.fromLEBytes(digest.slice(16, 24)),
      Felt.fromLEBytes(digest.slice(24, 32))
    ]
  }

  merge(left: Word, right: Word): Digest {
    return this.hashElements([...left, ...right])
  }
}
