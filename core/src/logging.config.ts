// Per-file logging switches, read once from LEDGER_LOG.
//
//   LEDGER_LOG=all                     every file logs
//   LEDGER_LOG=none (or unset)         silent
//   LEDGER_LOG=AssetLedger,host        only these tags

export interface LoggingConfig {
  default: boolean
  [file: string]: boolean
}

export function loggingConfigFromEnv(value: string | undefined): LoggingConfig {
  const setting = (value ?? '').trim()
  if (setting === '' || setting === 'none') return { default: false }
  if (setting === 'all') return { default: true }

  const config: LoggingConfig = { default: false }
  for (const file of setting.split(',')) {
    const tag = file.trim()
    if (tag !== '') config[tag] = true
  }
  return config
}

const loggingConfig: LoggingConfig = loggingConfigFromEnv(process.env.LEDGER_LOG)

export default loggingConfig
