export default `# Asset Ledger Lookup Service

Indexes committed ledger transactions into MongoDB and answers queries on the
\`ls_assets\` service. Transactions that fail the supply audit are logged as
warnings and indexed like any other, so holdings follow the committed ledger.

## Queries

Events, newest first unless \`sortOrder\` is \`asc\`:

\`\`\`json
{ "kind": "events", "identityKey": "[\\"0xc0ffee\\",\\"Sets\\",\\"Gold\\"]", "account": "0xb0b", "limit": 50, "skip": 0 }
\`\`\`

Both filters are optional; with neither, every event is returned.

Holdings of one account, one entry per token type it has held:

\`\`\`json
{ "kind": "holdings", "account": "0xb0b" }
\`\`\``
