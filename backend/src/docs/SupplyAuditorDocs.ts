export default `# Asset Ledger Supply Auditor

Every committed ledger transaction is delivered with the events it emitted, in
emission order. The auditor nets those events per token type.

- **Deposited** adds to held value; **Withdrawn** removes from it.
- **MintNotification** adds to supply; **Burned** removes from it.
- **CollectionCreated** and **TokenTypeCreated** carry no value.

## Rules (Checked)

- **Transfers**: a withdraw followed by a deposit of the same amount nets to zero.
- **Splits/Merges**: any number of deposits drawn from one withdrawal nets to zero.
- **Minting**: held value may grow only by the amount minted.
- **Burning**: held value may shrink only by the amount burned.
- **Multi-asset**: each token type is checked independently.

A transaction is balanced when, for every token type it touches, the net change
in held value equals the net change in supply. Supply is audited whether or not
the token type tracks it on the ledger.`
