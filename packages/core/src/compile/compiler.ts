/**
 * Glob compiler - turns glob text into a matchable form.
 * @packageDocumentation
 */

import type { GlobAst, CompiledGlob } from '../types'
import { GlobBuildError } from '../types'
import { parseGlob, validateGlob } from '../parse'
import { buildAutomaton, getMaxSegments } from './automaton-builder'

/**
 * Compile a parsed glob.
 *
 * The AST must be valid; use {@link buildGlob} to parse, validate and
 * compile in one step.
 *
 * @public
 */
export function compileGlob(ast: GlobAst): CompiledGlob {
  return {
    source: ast.source,
    ast,
    automaton: buildAutomaton(ast),
    rooted: ast.anchor !== undefined,
    maxSegments: getMaxSegments(ast),
  }
}

/**
 * Parse, validate and compile glob text.
 *
 * The empty text compiles to the empty glob, which matches only the empty
 * path.
 *
 * @throws {@link GlobBuildError} if the text is not a valid glob
 *
 * @public
 */
export function buildGlob(source: string): CompiledGlob {
  const ast = parseGlob(source)
  const errors = validateGlob(ast)
  if (errors.length > 0) {
    throw new GlobBuildError(source, errors)
  }
  return compileGlob(ast)
}

/**
 * Whether a glob denotes a location by itself: it starts at the filesystem
 * root (`/`) or the home directory (`~`).
 *
 * @public
 */
export function isRooted(glob: CompiledGlob): boolean {
  return glob.rooted
}

/**
 * Whether a glob was built from empty text.
 *
 * @public
 */
export function isEmptyGlob(glob: CompiledGlob): boolean {
  return glob.source === ''
}
