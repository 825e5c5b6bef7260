import { getLogger, type Logger } from '@logtape/logtape'

/**
 * Root category of every logger in this library.
 * @public
 */
export const LOG_CATEGORY = 'treeish'

/**
 * Get a logger for a part of the library, e.g. `getTreeishLogger('walk')`
 * logs under `["treeish", "walk"]`.
 *
 * The library only emits records; applications decide where they go by
 * configuring LogTape.
 *
 * @public
 */
export function getTreeishLogger(...category: string[]): Logger {
  return getLogger([LOG_CATEGORY, ...category])
}
