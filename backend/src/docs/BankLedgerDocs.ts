export default `# Bank Ledger

A custodial bank account that holds fungible assets on behalf of depositors
and keeps a balance per (depositor, faucet) pair in its storage.

The bank must be initialized once before it accepts deposits or withdrawals.

## Deposits

Consume a deposit note sent to the bank. Every asset on the note is moved into
the bank's vault and credited to the note's sender. A single deposit may not
exceed the configured maximum (1,000,000 units by default). If any asset on the
note is rejected, none of them are credited.

## Withdrawals

Consume a withdraw request note with 12 inputs:

- [0..3] the asset word [amount, 0, faucet suffix, faucet prefix]
- [4..7] the serial number of the note to emit
- [8..11] the commitment to the tag word [tag, 0, 0, 0], whose preimage is supplied as advice

The sender's balance is debited and a pay-to-id note carrying the asset is
emitted. Only the sender can consume it. Use a fresh serial number for every
withdrawal.

## Lookup

Query emitted notes by any combination of:

- **tag**: routing tag of the note
- **recipient**: hex recipient digest
- **faucetId**: faucet of an asset carried by the note, as \`prefix:suffix\`

Results are paginated with \`limit\` (default 50) and \`skip\`, and sorted by
creation time (\`sortOrder\`: "desc" by default).`
