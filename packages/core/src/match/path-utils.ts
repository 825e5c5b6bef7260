/**
 * Path manipulation helpers shared by matching and walking.
 * @packageDocumentation
 */

/**
 * Context for resolving walk roots.
 * @public
 */
export interface PathContext {
  /** User's home directory for ~ expansion */
  readonly homeDir: string
}

/**
 * Split a path into its components.
 *
 * @example
 * pathToSegments('/home/user//dev/file.ts/')
 * // => ['home', 'user', 'dev', 'file.ts']
 *
 * @public
 */
export function pathToSegments(path: string): readonly string[] {
  return path.split('/').filter((segment) => segment !== '')
}

/**
 * Join components with `/`.
 *
 * @example
 * segmentsToPath(['src', 'lib', 'index.ts']) // => 'src/lib/index.ts'
 *
 * @public
 */
export function segmentsToPath(segments: readonly string[]): string {
  return segments.join('/')
}

/**
 * Replace a leading `~` component with the home directory.
 *
 * @example
 * expandHome('~/dev', { homeDir: '/home/user' }) // => '/home/user/dev'
 * expandHome('~dev', { homeDir: '/home/user' }) // => '~dev'
 *
 * @public
 */
export function expandHome(path: string, context: PathContext): string {
  if (path === '~') {
    return context.homeDir
  }
  if (path.startsWith('~/')) {
    return context.homeDir + path.slice(1)
  }
  return path
}
