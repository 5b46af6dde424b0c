/**
 * TransactionExecutor - In-Process Execution Environment
 *
 * Runs one script against the bank account the way the execution
 * environment does: all reads and writes happen on a working copy, and the
 * copy is handed back only if the script completes. A failed script leaves
 * the caller's account untouched and produces no notes.
 */

import { AccountId } from './AccountId.js'
import { AdviceMap } from './AdviceMap.js'
import { AssetVault } from './AssetVault.js'
import { Bank, resolveConfig } from './Bank.js'
import { BalanceLedger } from './BalanceLedger.js'
import { BankAccount } from './BankAccount.js'
import { FungibleAsset } from './FungibleAsset.js'
import { computeNoteId } from './NoteEmitter.js'
import { BALANCES_SLOT } from './constants.js'
import { BankError, ERR, malformed } from './errors.js'
import { depositNoteScript, initializeScript, withdrawRequestNoteScript } from './scripts.js'
import type {
  AdviceProvider,
  BalanceDelta,
  BankConfig,
  BankHost,
  DepositNote,
  Hasher,
  NoteParams,
  OutputNote,
  ResolvedBankConfig,
  WithdrawRequestNote
} from './types.js'
import { debug } from './utils.js'

export interface TransactionContext {
  advice: AdviceProvider
  hasher: Hasher
}

export type TransactionScript = (bank: Bank, context: TransactionContext) => void

export interface ExecuteOptions {
  /** Assets carried by the notes consumed in this transaction */
  inputAssets?: FungibleAsset[]
  advice?: AdviceProvider
}

/**
 * Outcome of a successful transaction, ready to be committed
 */
export interface ExecutedTransaction {
  /** Account state after the transaction, nonce incremented */
  account: BankAccount
  outputNotes: OutputNote[]
  balanceDeltas: BalanceDelta[]
}

interface PendingNote {
  params: NoteParams
  assets: FungibleAsset[]
}

/**
 * Host side of a single transaction: custody moves between the consumed
 * notes, the account vault and the output notes.
 */
class TransactionHost implements BankHost {
  private readonly notes: PendingNote[] = []

  constructor(
    private readonly vault: AssetVault,
    private readonly inputAssets: AssetVault
  ) { }

  addAsset(asset: FungibleAsset): void {
    try {
      this.inputAssets.remove(asset)
    } catch (error) {
      throw new BankError(
        ERR.ASSET_NOT_HELD,
        `Transaction does not carry ${asset.toString()} to deposit`,
        { cause: error }
      )
    }
    this.vault.add(asset)
  }

  removeAsset(asset: FungibleAsset): void {
    this.vault.remove(asset)
  }

  createNote(params: NoteParams): number {
    this.notes.push({ params, assets: [] })
    return this.notes.length - 1
  }

  addAssetToNote(asset: FungibleAsset, noteIndex: number): void {
    const note = this.notes[noteIndex]
    if (note === undefined) {
      throw malformed(`Output note ${noteIndex} does not exist`)
    }
    const existing = note.assets.findIndex(a => a.isSameType(asset))
    if (existing === -1) {
      note.assets.push(asset)
    } else {
      note.assets[existing] = asset.withAmount(note.assets[existing].amount + asset.amount)
    }
  }

  finalizeNotes(sender: AccountId, hasher: Hasher): OutputNote[] {
    return this.notes.map((note, index) => ({
      ...note.params,
      index,
      noteId: computeNoteId(hasher, note.params.recipient, note.assets),
      sender,
      assets: note.assets
    }))
  }

  unconsumedInputs(): FungibleAsset[] {
    return this.inputAssets.assets()
  }
}

export class TransactionExecutor {
  private readonly config: ResolvedBankConfig

  constructor(config: BankConfig = {}) {
    this.config = resolveConfig(config)
  }

  get hasher(): Hasher {
    return this.config.hasher
  }

  /**
   * Create an advice map bound to this executor's hasher.
   */
  createAdviceMap(): AdviceMap {
    return new AdviceMap(this.config.hasher)
  }

  /**
   * Run a script against a working copy of `account`.
   *
   * @throws BankError from the script, or MalformedInput if consumed notes
   * carried assets the script did not take into custody
   */
  execute(account: BankAccount, script: TransactionScript, options: ExecuteOptions = {}): ExecutedTransaction {
    const working = account.clone(account.nonce + 1)
    const host = new TransactionHost(working.vault, new AssetVault(options.inputAssets ?? []))
    const bank = new Bank(working.storage, host, this.config)

    script(bank, {
      advice: options.advice ?? this.createAdviceMap(),
      hasher: this.config.hasher
    })

    const leftover = host.unconsumedInputs()
    if (leftover.length > 0) {
      throw malformed(`Consumed notes carry unclaimed assets: ${leftover.map(a => a.toString()).join(', ')}`)
    }

    const outputNotes = host.finalizeNotes(account.id, this.config.hasher)
    const balanceDeltas = diffBalances(account, working)
    debug('executor', `nonce ${account.nonce} -> ${working.nonce}, ${outputNotes.length} output note(s)`)

    return { account: working, outputNotes, balanceDeltas }
  }

  initialize(account: BankAccount): ExecutedTransaction {
    return this.execute(account, initializeScript())
  }

  consumeDepositNote(account: BankAccount, note: DepositNote): ExecutedTransaction {
    return this.execute(account, depositNoteScript(note), { inputAssets: note.assets })
  }

  consumeWithdrawRequestNote(
    account: BankAccount,
    note: WithdrawRequestNote,
    advice: AdviceProvider
  ): ExecutedTransaction {
    return this.execute(account, withdrawRequestNoteScript(note), { advice })
  }
}

function diffBalances(before: BankAccount, after: BankAccount): BalanceDelta[] {
  const deltas: BalanceDelta[] = []
  for (const { key, value } of after.storage.mapEntries(BALANCES_SLOT)) {
    const previous = BalanceLedger.balanceOf(before.storage.getMapItem(BALANCES_SLOT, key))
    const delta = BalanceLedger.balanceOf(value) - previous
    if (delta !== 0n) {
      deltas.push({ ...BalanceLedger.parseKey(key), delta })
    }
  }
  return deltas
}
