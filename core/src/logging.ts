/**
 * @file core/src/logging.ts
 * @description
 * Timestamped, per-file switchable logging for the ledger and its indexer.
 * Each line carries the ISO time, the seconds elapsed since the previous line
 * (coloured when slow) and the file tag.
 */

import { inspect } from 'node:util'
import * as colors from 'colors/safe'
import defaultLoggingConfig, { type LoggingConfig } from './logging.config.js'

let lastLogTime = performance.now()

let loggingConfig: LoggingConfig = { ...defaultLoggingConfig }

/**
 * Replace the logging switches (tests and embedding applications).
 */
export const configureLogging = (config: LoggingConfig): void => {
  loggingConfig = { ...config }
}

export const isLoggingEnabled = (file: string): boolean =>
  loggingConfig[file] !== undefined ? loggingConfig[file] : loggingConfig.default

export const log = {
  info: (...args: unknown[]) => console.log(colors.cyan('[info]'), ...args),
  warn: (...args: unknown[]) => console.warn(colors.yellow('[warn]'), ...args),
  error: (...args: unknown[]) => console.error(colors.red('[error]'), ...args)
}

const colorForElapsed = (elapsed: number, text: string): string => {
  if (elapsed > 1.0) return colors.red(text)
  if (elapsed > 0.5) return colors.magenta(text)
  if (elapsed > 0.3) return colors.yellow(text)
  return colors.gray(text)
}

const format = (val: unknown): unknown =>
  typeof val === 'object' && val !== null ? inspect(val, { depth: 4, breakLength: 120 }) : val

export const logWithTimestamp = (file: string = 'unknown', message: unknown = 'No message', ...args: unknown[]): void => {
  if (!isLoggingEnabled(file)) return

  const now = performance.now()
  const elapsed = (now - lastLogTime) / 1000
  lastLogTime = now

  const timestamp = new Date().toISOString()

  console.log(
    colorForElapsed(elapsed, `[${timestamp}] [${elapsed.toFixed(3)}s] [${file}]`),
    format(message),
    ...args.map(format)
  )
}
