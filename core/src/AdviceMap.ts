import { Felt, wordKey, wordsEqual, type Word } from './Felt.js'
import { malformed } from './errors.js'
import type { AdviceProvider, Hasher } from './types.js'

interface AdviceEntry {
  commitment: Word
  values: Felt[]
}

/**
 * Caller-supplied preimages, looked up by their hash commitment.
 *
 * A lookup only succeeds when the stored values hash back to the key,
 * so a caller cannot substitute data under someone else's commitment.
 */
export class AdviceMap implements AdviceProvider {
  private readonly entries = new Map<string, AdviceEntry>()
  private readonly hasher: Hasher

  constructor(hasher: Hasher) {
    this.hasher = hasher
  }

  /**
   * Store values under their own commitment.
   */
  insert(values: Felt[]): Word {
    const commitment = this.hasher.hashElements(values)
    this.entries.set(wordKey(commitment), { commitment, values: [...values] })
    return commitment
  }

  /**
   * Store values under an arbitrary key. They are verified on lookup.
   */
  insertEntry(commitment: Word, values: Felt[]): void {
    this.entries.set(wordKey(commitment), { commitment, values: [...values] })
  }

  lookupByCommitment(commitment: Word): Felt[] {
    const entry = this.entries.get(wordKey(commitment))
    if (entry === undefined) {
      throw malformed(`No advice entry for commitment ${wordKey(commitment)}`)
    }
    if (!wordsEqual(this.hasher.hashElements(entry.values), commitment)) {
      throw malformed(`Advice preimage does not match commitment ${wordKey(commitment)}`)
    }
    return [...entry.values]
  }
}
