/**
 * Recipient commitments.
 *
 * A note's recipient binds its serial number, the root of the script that
 * runs when the note is claimed, and the inputs that script reads:
 *
 *   merge(merge(merge(serialNum, EMPTY_WORD), scriptRoot), hashElements(inputs))
 *
 * The inputs must match what the claim program expects element for element.
 * A mismatch is not detected here; the note simply becomes unclaimable.
 */

import { AccountId } from './AccountId.js'
import { EMPTY_WORD, Felt, type Digest, type Word } from './Felt.js'
import { PAY_TO_ID_INPUT_COUNT } from './constants.js'
import type { Hasher } from './types.js'

export function computeRecipient(
  hasher: Hasher,
  serialNum: Word,
  scriptRoot: Word,
  inputs: readonly Felt[]
): Digest {
  const serialHash = hasher.merge(serialNum, EMPTY_WORD)
  const serialScriptHash = hasher.merge(serialHash, scriptRoot)
  return hasher.merge(serialScriptHash, hasher.hashElements(inputs))
}

/**
 * Inputs of the pay-to-id script: [suffix, prefix, 0, 0, 0, 0, 0, 0].
 */
export function payToIdInputs(target: AccountId): Felt[] {
  const inputs: Felt[] = [target.suffix, target.prefix]
  while (inputs.length < PAY_TO_ID_INPUT_COUNT) {
    inputs.push(Felt.ZERO)
  }
  return inputs
}

/**
 * Recipient of a pay-to-id note claimable only by `target`.
 */
export function payToIdRecipient(
  hasher: Hasher,
  target: AccountId,
  serialNum: Word,
  scriptRoot: Word
): Digest {
  return computeRecipient(hasher, serialNum, scriptRoot, payToIdInputs(target))
}
