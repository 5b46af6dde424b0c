/**
 * Scripts run by the bank account.
 *
 * - initializeScript: transaction script that opens the bank
 * - depositNoteScript: credits the note sender with every asset on the note
 * - withdrawRequestNoteScript: pays an asset back to the note sender
 *
 * Withdraw request note inputs (12 elements):
 *   [0..3]   asset word [amount, 0, faucet.suffix, faucet.prefix]
 *   [4..7]   serial number of the pay-to-id note to emit
 *   [8..11]  commitment to the tag data word [tag, 0, 0, 0]
 *
 * The tag itself is read from the advice provider under that commitment.
 */

import type { AdviceMap } from './AdviceMap.js'
import { Felt, wordFrom } from './Felt.js'
import { FungibleAsset } from './FungibleAsset.js'
import { tagFromFelt, validateTag } from './NoteEmitter.js'
import { WITHDRAW_REQUEST_INPUT_COUNT } from './constants.js'
import { malformed } from './errors.js'
import type { TransactionScript } from './TransactionExecutor.js'
import type {
  AdviceProvider,
  DepositNote,
  WithdrawRequestNote,
  WithdrawRequestParams
} from './types.js'

export function initializeScript(): TransactionScript {
  return bank => {
    bank.initialize()
  }
}

export function depositNoteScript(note: DepositNote): TransactionScript {
  return bank => {
    for (const asset of note.assets) {
      bank.deposit(note.sender, asset)
    }
  }
}

export function withdrawRequestNoteScript(note: WithdrawRequestNote): TransactionScript {
  return (bank, { advice }) => {
    const request = decodeWithdrawRequest(note.inputs, advice)
    bank.withdraw(note.sender, request.asset, request.serialNum, request.tag)
  }
}

/**
 * Decode withdraw request note inputs, resolving the tag through `advice`.
 *
 * @throws BankError(MalformedInput) on wrong arity, a malformed asset or tag,
 * or a missing tag preimage
 */
export function decodeWithdrawRequest(inputs: readonly Felt[], advice: AdviceProvider): WithdrawRequestParams {
  if (inputs.length !== WITHDRAW_REQUEST_INPUT_COUNT) {
    throw malformed(`Withdraw request expects ${WITHDRAW_REQUEST_INPUT_COUNT} inputs, got ${inputs.length}`)
  }

  const asset = FungibleAsset.fromWord(wordFrom(inputs.slice(0, 4)))
  const serialNum = wordFrom(inputs.slice(4, 8))
  const commitment = wordFrom(inputs.slice(8, 12))

  const tagData = advice.lookupByCommitment(commitment)
  if (tagData.length !== 4 || !tagData.slice(1).every(f => f.isZero())) {
    throw malformed('Tag data must be a word of the form [tag, 0, 0, 0]')
  }

  return { asset, serialNum, tag: tagFromFelt(tagData[0]) }
}

/**
 * Build the inputs of a withdraw request note and register the tag
 * preimage the bank will look up.
 */
export function buildWithdrawRequest(
  params: WithdrawRequestParams,
  advice: AdviceMap
): Felt[] {
  validateTag(params.tag)
  const commitment = advice.insert([Felt.new(params.tag), Felt.ZERO, Felt.ZERO, Felt.ZERO])
  return [
    ...params.asset.toWord(),
    ...params.serialNum,
    ...commitment
  ]
}
