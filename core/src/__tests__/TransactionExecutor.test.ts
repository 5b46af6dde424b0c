/**
 * TransactionExecutor Tests
 *
 * End-to-end flows through the note scripts: initialize, deposit, withdraw,
 * and the atomicity of failed transactions.
 */

import {
  BankAccount,
  BalanceLedger,
  ERR,
  Felt,
  NoteType,
  PAY_TO_ID_SCRIPT_ROOT,
  TransactionExecutor,
  buildWithdrawRequest,
  computeNoteId,
  decodeWithdrawRequest,
  depositNoteScript,
  initializeScript,
  payToIdRecipient,
  word,
  wordFrom,
  wordsEqual,
  type AccountId,
  type AdviceMap,
  type BankErrorCode,
  type ExecutedTransaction,
  type FungibleAsset
} from '../index.js'
import {
  BANK_ID,
  DEPOSITOR,
  FAUCET_X,
  FAUCET_Y,
  OTHER_DEPOSITOR,
  assetX,
  assetY,
  captureError
} from './helpers.js'

const SERIAL = word(101, 202, 303, 404)
const TAG = 0xEAF30000

describe('TransactionExecutor', () => {
  let executor: TransactionExecutor
  let bank: BankAccount

  function balanceOf(account: BankAccount, depositor = DEPOSITOR, faucet = FAUCET_X): bigint {
    return new BalanceLedger(account.storage).getBalance(depositor, faucet)
  }

  function withdrawRequest(
    asset = assetX(500),
    serialNum = SERIAL,
    tag = TAG
  ): { inputs: Felt[], advice: AdviceMap } {
    const advice = executor.createAdviceMap()
    const inputs = buildWithdrawRequest({ asset, serialNum, tag }, advice)
    return { inputs, advice }
  }

  function withdraw(account: BankAccount, asset = assetX(500), serialNum = SERIAL): ExecutedTransaction {
    const { inputs, advice } = withdrawRequest(asset, serialNum)
    return executor.consumeWithdrawRequestNote(account, { sender: DEPOSITOR, inputs }, advice)
  }

  beforeEach(() => {
    executor = new TransactionExecutor()
    bank = executor.initialize(BankAccount.create(BANK_ID)).account
  })

  describe('initialize', () => {
    it('should bump the nonce and leave the input account untouched', () => {
      const fresh = BankAccount.create(BANK_ID)

      const result = executor.initialize(fresh)

      expect(result.account.nonce).toBe(1)
      expect(fresh.nonce).toBe(0)
      expect(fresh.storage.getItem(0)[0].isZero()).toBe(true)
      expect(result.account.storage.getItem(0)[0].asCanonical()).toBe(1n)
      expect(result.outputNotes).toEqual([])
      expect(result.balanceDeltas).toEqual([])
    })

    it('should reject a second initialization', () => {
      expect(captureError(() => executor.initialize(bank)).code).toBe(ERR.ALREADY_INITIALIZED)
    })
  })

  describe('deposit then withdraw', () => {
    it('should credit, pay out and report the remaining balance', () => {
      const deposited = executor.consumeDepositNote(bank, { sender: DEPOSITOR, assets: [assetX(1000)] })

      expect(balanceOf(deposited.account)).toBe(1000n)
      expect(deposited.account.vault.getBalance(FAUCET_X)).toBe(1000n)
      expect(deposited.balanceDeltas).toEqual([
        { depositor: DEPOSITOR, faucetId: FAUCET_X, delta: 1000n }
      ])

      const withdrawn = withdraw(deposited.account)

      expect(balanceOf(withdrawn.account)).toBe(500n)
      expect(withdrawn.account.vault.getBalance(FAUCET_X)).toBe(500n)
      expect(withdrawn.account.nonce).toBe(3)
      expect(withdrawn.balanceDeltas).toEqual([
        { depositor: DEPOSITOR, faucetId: FAUCET_X, delta: -500n }
      ])

      expect(withdrawn.outputNotes).toHaveLength(1)
      const note = withdrawn.outputNotes[0]
      const recipient = payToIdRecipient(executor.hasher, DEPOSITOR, SERIAL, PAY_TO_ID_SCRIPT_ROOT)
      expect(note.index).toBe(0)
      expect(note.sender.equals(BANK_ID)).toBe(true)
      expect(note.tag).toBe(TAG)
      expect(note.noteType).toBe(NoteType.Public)
      expect(note.aux.isZero()).toBe(true)
      expect(note.assets).toEqual([assetX(500)])
      expect(wordsEqual(note.recipient, recipient)).toBe(true)
      expect(wordsEqual(note.noteId, computeNoteId(executor.hasher, recipient, [assetX(500)]))).toBe(true)
    })

    it('should allow the full balance to be withdrawn', () => {
      const deposited = executor.consumeDepositNote(bank, { sender: DEPOSITOR, assets: [assetX(1000)] })

      const withdrawn = withdraw(deposited.account, assetX(1000))

      expect(balanceOf(withdrawn.account)).toBe(0n)
      expect(withdrawn.account.vault.getBalance(FAUCET_X)).toBe(0n)
      expect(withdrawn.account.vault.assets()).toEqual([])
    })

    it('should reject an overdraft and keep the balance', () => {
      const deposited = executor.consumeDepositNote(bank, { sender: DEPOSITOR, assets: [assetX(500)] })

      const error = captureError(() => withdraw(deposited.account, assetX(600)))

      expect(error.code).toBe(ERR.INSUFFICIENT_FUNDS)
      expect(balanceOf(deposited.account)).toBe(500n)
      expect(deposited.account.vault.getBalance(FAUCET_X)).toBe(500n)
    })

    it('should keep balances per depositor and per faucet', () => {
      let account = executor.consumeDepositNote(bank, { sender: DEPOSITOR, assets: [assetX(300), assetY(40)] }).account
      account = executor.consumeDepositNote(account, { sender: OTHER_DEPOSITOR, assets: [assetX(200)] }).account

      expect(balanceOf(account, DEPOSITOR, FAUCET_X)).toBe(300n)
      expect(balanceOf(account, DEPOSITOR, FAUCET_Y)).toBe(40n)
      expect(balanceOf(account, OTHER_DEPOSITOR, FAUCET_X)).toBe(200n)
      expect(balanceOf(account, OTHER_DEPOSITOR, FAUCET_Y)).toBe(0n)

      // The vault holds exactly what the ledger owes
      expect(account.vault.getBalance(FAUCET_X)).toBe(500n)
      expect(account.vault.getBalance(FAUCET_Y)).toBe(40n)
    })

    it('should produce the same recipient when a serial number is reused', () => {
      const deposited = executor.consumeDepositNote(bank, { sender: DEPOSITOR, assets: [assetX(1000)] })

      const first = withdraw(deposited.account, assetX(100))
      const second = withdraw(first.account, assetX(100))

      expect(wordsEqual(first.outputNotes[0].recipient, second.outputNotes[0].recipient)).toBe(true)
      expect(balanceOf(second.account)).toBe(800n)
    })
  })

  describe('conservation', () => {
    type Step =
      | { kind: 'deposit', sender: AccountId, asset: FungibleAsset, rejectedWith?: BankErrorCode }
      | { kind: 'withdraw', sender: AccountId, asset: FungibleAsset, rejectedWith?: BankErrorCode }

    const depositors = [DEPOSITOR, OTHER_DEPOSITOR]
    const faucets = [FAUCET_X, FAUCET_Y]

    const steps: Step[] = [
      { kind: 'deposit', sender: DEPOSITOR, asset: assetX(400) },
      { kind: 'deposit', sender: OTHER_DEPOSITOR, asset: assetY(250) },
      { kind: 'withdraw', sender: DEPOSITOR, asset: assetX(150) },
      { kind: 'withdraw', sender: OTHER_DEPOSITOR, asset: assetX(10), rejectedWith: ERR.INSUFFICIENT_FUNDS },
      { kind: 'deposit', sender: DEPOSITOR, asset: assetY(2_000_000), rejectedWith: ERR.DEPOSIT_TOO_LARGE },
      { kind: 'deposit', sender: OTHER_DEPOSITOR, asset: assetX(1_000_000) },
      { kind: 'withdraw', sender: DEPOSITOR, asset: assetX(300), rejectedWith: ERR.INSUFFICIENT_FUNDS },
      { kind: 'withdraw', sender: OTHER_DEPOSITOR, asset: assetY(250) },
      { kind: 'deposit', sender: DEPOSITOR, asset: assetY(75) },
      { kind: 'withdraw', sender: OTHER_DEPOSITOR, asset: assetX(999_999) },
      { kind: 'withdraw', sender: DEPOSITOR, asset: assetX(250) }
    ]

    function apply(account: BankAccount, step: Step, serial: number): ExecutedTransaction {
      if (step.kind === 'deposit') {
        return executor.consumeDepositNote(account, { sender: step.sender, assets: [step.asset] })
      }
      const advice = executor.createAdviceMap()
      const inputs = buildWithdrawRequest({ asset: step.asset, serialNum: word(serial, 0, 0, 0), tag: TAG }, advice)
      return executor.consumeWithdrawRequestNote(account, { sender: step.sender, inputs }, advice)
    }

    it('should keep every balance equal to credits minus debits and the vault equal to the ledger', () => {
      const expected = new Map<string, bigint>()
      let account = bank

      steps.forEach((step, i) => {
        if (step.rejectedWith !== undefined) {
          expect(captureError(() => apply(account, step, i)).code).toBe(step.rejectedWith)
        } else {
          account = apply(account, step, i).account
          const key = `${step.sender.toString()}|${step.asset.faucetId.toString()}`
          const change = step.kind === 'deposit' ? step.asset.amount : -step.asset.amount
          expected.set(key, (expected.get(key) ?? 0n) + change)
        }

        for (const faucet of faucets) {
          let owed = 0n
          for (const depositor of depositors) {
            const balance = balanceOf(account, depositor, faucet)
            expect(balance).toBe(expected.get(`${depositor.toString()}|${faucet.toString()}`) ?? 0n)
            owed += balance
          }
          expect(account.vault.getBalance(faucet)).toBe(owed)
        }
      })

      expect(balanceOf(account, DEPOSITOR, FAUCET_X)).toBe(0n)
      expect(balanceOf(account, DEPOSITOR, FAUCET_Y)).toBe(75n)
      expect(balanceOf(account, OTHER_DEPOSITOR, FAUCET_X)).toBe(1n)
      expect(balanceOf(account, OTHER_DEPOSITOR, FAUCET_Y)).toBe(0n)
      expect(account.nonce).toBe(9)
    })

    it('should not leave a vault entry for a zero-amount deposit', () => {
      const deposited = executor.consumeDepositNote(bank, { sender: DEPOSITOR, assets: [assetX(0)] })

      expect(deposited.account.vault.assets()).toEqual([])
      expect(balanceOf(deposited.account)).toBe(0n)
      expect(deposited.balanceDeltas).toEqual([])
    })
  })

  describe('failed transactions', () => {
    it('should reject a deposit before initialization', () => {
      const fresh = BankAccount.create(BANK_ID)

      const error = captureError(() => executor.consumeDepositNote(fresh, { sender: DEPOSITOR, assets: [assetX(1000)] }))

      expect(error.code).toBe(ERR.NOT_INITIALIZED)
      expect(fresh.vault.assets()).toEqual([])
    })

    it('should reject a withdrawal before initialization', () => {
      const fresh = BankAccount.create(BANK_ID)
      expect(captureError(() => withdraw(fresh)).code).toBe(ERR.NOT_INITIALIZED)
    })

    it('should discard every deposit on a note when one asset is too large', () => {
      const error = captureError(() => executor.consumeDepositNote(bank, {
        sender: DEPOSITOR,
        assets: [assetX(500), assetY(2_000_000)]
      }))

      expect(error.code).toBe(ERR.DEPOSIT_TOO_LARGE)
      expect(balanceOf(bank, DEPOSITOR, FAUCET_X)).toBe(0n)
      expect(bank.vault.assets()).toEqual([])
      expect(bank.nonce).toBe(1)
    })

    it('should reject a deposit the transaction does not carry', () => {
      const error = captureError(() => executor.execute(bank, depositNoteScript({ sender: DEPOSITOR, assets: [assetX(10)] })))

      expect(error.code).toBe(ERR.ASSET_NOT_HELD)
      expect(error.cause).toBeDefined()
    })

    it('should reject consumed assets the script leaves unclaimed', () => {
      const error = captureError(() => executor.execute(BankAccount.create(BANK_ID), initializeScript(), {
        inputAssets: [assetX(10)]
      }))

      expect(error.code).toBe(ERR.MALFORMED_INPUT)
    })
  })

  describe('withdraw request decoding', () => {
    it('should round trip asset, serial number and tag', () => {
      const { inputs, advice } = withdrawRequest(assetY(77), SERIAL, 0xC0010000)

      const decoded = decodeWithdrawRequest(inputs, advice)

      expect(inputs).toHaveLength(12)
      expect(decoded.asset.equals(assetY(77))).toBe(true)
      expect(wordsEqual(decoded.serialNum, SERIAL)).toBe(true)
      expect(decoded.tag).toBe(0xC0010000)
    })

    it('should reject the eight-input layout', () => {
      const { inputs, advice } = withdrawRequest()
      expect(captureError(() => decodeWithdrawRequest(inputs.slice(0, 8), advice)).code).toBe(ERR.MALFORMED_INPUT)
    })

    it('should reject a request whose tag preimage is missing', () => {
      const { inputs } = withdrawRequest()
      const empty = executor.createAdviceMap()

      const error = captureError(() => executor.consumeWithdrawRequestNote(bank, { sender: DEPOSITOR, inputs }, empty))

      expect(error.code).toBe(ERR.MALFORMED_INPUT)
    })

    it('should reject a tag preimage that does not hash to the commitment', () => {
      const { inputs, advice } = withdrawRequest()
      const commitment = wordFrom(inputs.slice(8, 12))
      advice.insertEntry(commitment, [Felt.new(0xC0000000), Felt.ZERO, Felt.ZERO, Felt.ZERO])

      expect(captureError(() => decodeWithdrawRequest(inputs, advice)).code).toBe(ERR.MALFORMED_INPUT)
    })

    it('should reject tag data that is not a single tag word', () => {
      const advice = executor.createAdviceMap()
      const commitment = advice.insert([Felt.new(TAG), Felt.ONE, Felt.ZERO, Felt.ZERO])
      const inputs = [...assetX(1).toWord(), ...SERIAL, ...commitment]

      expect(captureError(() => decodeWithdrawRequest(inputs, advice)).code).toBe(ERR.MALFORMED_INPUT)
    })

    it('should reject a tag wider than 32 bits', () => {
      const advice = executor.createAdviceMap()
      const commitment = advice.insert([Felt.new(0x1_0000_0000n), Felt.ZERO, Felt.ZERO, Felt.ZERO])
      const inputs = [...assetX(1).toWord(), ...SERIAL, ...commitment]

      expect(captureError(() => decodeWithdrawRequest(inputs, advice)).code).toBe(ERR.MALFORMED_INPUT)
    })
  })
})
