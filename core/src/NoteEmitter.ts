import { AccountId } from './AccountId.js'
import { Felt, type Digest } from './Felt.js'
import { FungibleAsset } from './FungibleAsset.js'
import { LOCAL_ANY_TAG_PREFIX, LOCAL_TAG_ACCOUNT_BITS } from './constants.js'
import { malformed } from './errors.js'
import { NoteExecutionHint, NoteType, type BankHost, type Hasher } from './types.js'

const U32_MAX = 0xFFFFFFFF

export interface TransferParams {
  tag: number
  aux: Felt
  noteType: NoteType
  executionHint: NoteExecutionHint
  recipient: Digest
  asset: FungibleAsset
}

/**
 * Moves assets out of the account's vault into new output notes.
 * This is the only path by which value leaves the bank.
 */
export class NoteEmitter {
  private readonly host: BankHost

  constructor(host: BankHost) {
    this.host = host
  }

  /**
   * Create an output note, remove the asset from the vault and attach it.
   *
   * @returns Index of the created note
   * @throws BankError(AssetNotHeld) if the vault lacks the asset
   */
  emitTransfer(params: TransferParams): number {
    validateTag(params.tag)
    validateNoteType(params.noteType)

    const noteIndex = this.host.createNote({
      tag: params.tag,
      aux: params.aux,
      noteType: params.noteType,
      executionHint: params.executionHint,
      recipient: params.recipient
    })
    this.host.removeAsset(params.asset)
    this.host.addAssetToNote(params.asset, noteIndex)
    return noteIndex
  }
}

export function validateTag(tag: number): void {
  if (!Number.isInteger(tag) || tag < 0 || tag > U32_MAX) {
    throw malformed(`Note tag ${tag} does not fit in 32 bits`)
  }
}

export function validateNoteType(noteType: number): asserts noteType is NoteType {
  if (!Object.values<number>(NoteType).includes(noteType)) {
    throw malformed(`Unknown note type: ${noteType}`)
  }
}

/**
 * Convert a tag carried as a field element.
 */
export function tagFromFelt(tag: Felt): number {
  const value = tag.asCanonical()
  if (value > BigInt(U32_MAX)) {
    throw malformed(`Note tag ${value} does not fit in 32 bits`)
  }
  return Number(value)
}

/**
 * Routing tag under which a pay-to-id note for a local account is indexed:
 * the "local any" prefix with the top bits of the account prefix.
 */
export function noteTagForLocalAccount(accountId: AccountId): number {
  const shifted = Number(accountId.prefix.asCanonical() >> 34n)
  const mask = (U32_MAX << (30 - LOCAL_TAG_ACCOUNT_BITS)) >>> 0
  return (LOCAL_ANY_TAG_PREFIX | (shifted & mask)) >>> 0
}

/**
 * Identifier of a note: a commitment to its recipient and its assets.
 */
export function computeNoteId(hasher: Hasher, recipient: Digest, assets: FungibleAsset[]): Digest {
  const assetsCommitment = hasher.hashElements(assets.flatMap(a => a.toWord()))
  return hasher.merge(recipient, assetsCommitment)
}
