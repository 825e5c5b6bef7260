/**
 * Traversal engine - lazy, synchronous directory walks.
 * @packageDocumentation
 */

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import type { CompiledGlob, MatchState } from '../types'
import { partitionGlob } from '../compile'
import { advance, expandHome, initialStates, isAccepting, segmentsToPath, type PathContext } from '../match'
import { getTreeishLogger } from '../logging'
import { resolveWalkBehavior, type WalkBehavior, type WalkBehaviorOptions } from './behavior'

const log = getTreeishLogger('walk')

/**
 * Root a pattern without an explicit tree is searched in.
 * @public
 */
export const DEFAULT_ROOT = '.'

/** @public */
export type FileKind = 'file' | 'directory' | 'symlink' | 'other'

/**
 * A filesystem entry produced by a walk.
 * @public
 */
export interface WalkEntry {
  /** The walk base joined with {@link WalkEntry.relativePath} */
  readonly path: string

  /** Path below the walk base, `/`-separated; empty for the base itself */
  readonly relativePath: string

  /** Number of components below the walk base */
  readonly depth: number

  /** What the entry is; a followed link reports its target's kind */
  readonly kind: FileKind
}

/**
 * An entry that could not be read. It is yielded in place of the entry and
 * the walk goes on.
 * @public
 */
export class WalkError extends Error {
  /** The I/O error code, e.g. `ENOENT`, `EACCES` or `ELOOP` */
  readonly code: string

  readonly path: string

  readonly depth: number

  constructor(entryPath: string, depth: number, cause: unknown) {
    super(`Cannot walk ${entryPath}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause })
    this.name = 'WalkError'
    this.code = errorCode(cause)
    this.path = entryPath
    this.depth = depth
  }
}

/** @public */
export type WalkItem = WalkEntry | WalkError

/**
 * A lazy, single-pass sequence of walk results. Entries are read from disk
 * as the sequence is pulled; stopping early is just not pulling further.
 * @public
 */
export type Walk = Generator<WalkItem, void, undefined>

/**
 * Walk every entry under `root`, `root` itself included at depth 0.
 *
 * @public
 */
export function walkTree(root: string, options?: WalkBehaviorOptions): Walk {
  return traverse(expandHome(root, homeContext()), undefined, resolveWalkBehavior(options))
}

/**
 * Walk the entries under `root` that match `glob`.
 *
 * The glob's literal prefix is joined onto `root` first (a rooted prefix
 * replaces it), and the rest of the glob is matched against paths relative
 * to that base. Depths count from the base.
 *
 * @public
 */
export function walkGlob(glob: CompiledGlob, root: string = DEFAULT_ROOT, options?: WalkBehaviorOptions): Walk {
  const behavior = resolveWalkBehavior(options)
  const context = homeContext()
  const { prefix, remainder } = partitionGlob(glob)

  let base = expandHome(root, context)
  if (prefix !== undefined) {
    const expanded = expandHome(prefix, context)
    base = path.isAbsolute(expanded) ? expanded : path.join(base, expanded)
  }

  if (remainder === undefined) {
    // Fully literal: the base is the only candidate
    return traverse(base, undefined, { ...behavior, maxDepth: 0 })
  }
  return traverse(base, remainder, behavior)
}

function homeContext(): PathContext {
  return { homeDir: os.homedir() }
}

interface Directory {
  readonly path: string
  readonly segments: readonly string[]
  readonly depth: number
  /** Automaton states after the directory's own components */
  readonly states?: MatchState
  /** Identities of the directories above, used to stop link cycles */
  readonly ancestors: ReadonlySet<string>
}

function* traverse(base: string, glob: CompiledGlob | undefined, behavior: WalkBehavior): Walk {
  if (glob) {
    log.debug`Walking ${base} for ${glob.source}`
  } else {
    log.debug`Walking ${base}`
  }

  let stats: fs.BigIntStats
  try {
    stats = behavior.followLinks ? fs.statSync(base, { bigint: true }) : fs.lstatSync(base, { bigint: true })
  } catch (error) {
    yield new WalkError(base, 0, error)
    return
  }

  const kind = kindOfStats(stats)
  if (glob === undefined && behavior.minDepth === 0) {
    yield { path: base, relativePath: '', depth: 0, kind }
  }
  if (kind !== 'directory' || behavior.maxDepth === 0) {
    return
  }

  yield* visit(
    {
      path: base,
      segments: [],
      depth: 0,
      states: glob && initialStates(glob),
      ancestors: new Set([fileIdentity(stats)]),
    },
    glob,
    behavior,
  )
}

function* visit(directory: Directory, glob: CompiledGlob | undefined, behavior: WalkBehavior): Walk {
  let dirents: fs.Dirent[]
  try {
    dirents = fs.readdirSync(directory.path, { withFileTypes: true })
  } catch (error) {
    yield new WalkError(directory.path, directory.depth, error)
    return
  }

  const depth = directory.depth + 1
  for (const dirent of dirents) {
    const entryPath = path.join(directory.path, dirent.name)

    let states: MatchState | undefined
    if (glob && directory.states) {
      states = advance(glob, directory.states, dirent.name)
      if (states.size === 0) {
        // Nothing at or below this entry can match
        continue
      }
    }

    let kind = kindOfDirent(dirent)
    let stats: fs.BigIntStats | undefined
    if (behavior.followLinks && (kind === 'symlink' || kind === 'directory')) {
      try {
        stats = fs.statSync(entryPath, { bigint: true })
      } catch (error) {
        yield new WalkError(entryPath, depth, error)
        continue
      }
      kind = kindOfStats(stats)
    }

    const segments = [...directory.segments, dirent.name]
    const matched = glob === undefined || (states !== undefined && isAccepting(glob, states))
    if (matched && depth >= behavior.minDepth) {
      yield { path: entryPath, relativePath: segmentsToPath(segments), depth, kind }
    }

    if (kind !== 'directory' || !canDescend(depth, glob, behavior)) {
      continue
    }

    const ancestors = new Set(directory.ancestors)
    if (stats) {
      const id = fileIdentity(stats)
      if (ancestors.has(id)) {
        yield new WalkError(entryPath, depth, linkCycle(entryPath))
        continue
      }
      ancestors.add(id)
    }

    yield* visit({ path: entryPath, segments, depth, states, ancestors }, glob, behavior)
  }
}

function canDescend(depth: number, glob: CompiledGlob | undefined, behavior: WalkBehavior): boolean {
  if (behavior.maxDepth !== undefined && depth >= behavior.maxDepth) {
    return false
  }
  return glob?.maxSegments === undefined || depth < glob.maxSegments
}

function kindOfStats(stats: fs.BigIntStats): FileKind {
  if (stats.isDirectory()) return 'directory'
  if (stats.isFile()) return 'file'
  if (stats.isSymbolicLink()) return 'symlink'
  return 'other'
}

function kindOfDirent(dirent: fs.Dirent): FileKind {
  if (dirent.isDirectory()) return 'directory'
  if (dirent.isFile()) return 'file'
  if (dirent.isSymbolicLink()) return 'symlink'
  return 'other'
}

/**
 * Device and inode of a file, exact beyond 2^53.
 * @internal
 */
export function fileIdentity(stats: Pick<fs.BigIntStats, 'dev' | 'ino'>): string {
  return `${stats.dev}:${stats.ino}`
}

function linkCycle(entryPath: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(`Symbolic link cycle at ${entryPath}`)
  error.code = 'ELOOP'
  return error
}

function errorCode(cause: unknown): string {
  if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') {
    return cause.code
  }
  return 'EUNKNOWN'
}
