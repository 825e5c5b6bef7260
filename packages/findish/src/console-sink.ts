import type { LogRecord, Sink } from '@logtape/logtape'
import chalk from 'chalk'

function stringify(value: unknown): string {
  try {
    return JSON.stringify(value)
  } catch {
    return '[Unserializable]'
  }
}

/**
 * Render a record as `[LEVEL][category] message`, the level colored by
 * severity.
 */
export function formatLogRecord(record: LogRecord): string {
  const level = `[${record.level.toUpperCase()}]`
  const category = record.category.join('.')
  const message = record.message.map((part) => (typeof part === 'string' ? part : stringify(part))).join('')

  let levelText: string
  switch (record.level) {
    case 'debug':
    case 'trace':
      levelText = chalk.dim(level)
      break
    case 'info':
      levelText = chalk.blue(level)
      break
    case 'warning':
      levelText = chalk.yellow(level)
      break
    case 'error':
    case 'fatal':
      levelText = chalk.red(level)
      break
  }

  const categoryText = category ? chalk.dim(`[${category}]`) : ''
  return `${levelText}${categoryText} ${message}`
}

/**
 * A sink writing formatted records to stderr, keeping stdout for results.
 */
export function createConsoleSink(write: (line: string) => void = (line) => console.error(line)): Sink {
  return (record: LogRecord) => {
    write(formatLogRecord(record))
  }
}
