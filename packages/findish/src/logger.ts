import { configure, getLogger, reset, type Logger } from '@logtape/logtape'
import { LOG_CATEGORY } from 'treeish'
import { z } from 'zod'
import { createConsoleSink } from './console-sink'

/** @public */
export const logLevelSchema = z.enum(['debug', 'info', 'warning', 'error'])

/** @public */
export type LogLevel = z.infer<typeof logLevelSchema>

export interface LoggerConfig {
  level: LogLevel
  /** Where formatted lines go; stderr by default */
  write?: (line: string) => void
}

let isConfigured = false

/**
 * Route the library's and the CLI's log records to the console sink.
 */
export async function initLogger(config: LoggerConfig): Promise<void> {
  if (isConfigured) {
    await resetLogger()
  }

  await configure({
    sinks: { console: createConsoleSink(config.write) },
    loggers: [
      { category: [LOG_CATEGORY], lowestLevel: config.level, sinks: ['console'] },
      { category: ['findish'], lowestLevel: config.level, sinks: ['console'] },
      { category: ['logtape', 'meta'], lowestLevel: 'warning', sinks: ['console'] },
    ],
    reset: true,
  })
  isConfigured = true
}

export async function resetLogger(): Promise<void> {
  await reset()
  isConfigured = false
}

export function getCliLogger(...category: string[]): Logger {
  return getLogger(['findish', ...category])
}
