/**
 * Automaton builder - converts a glob AST to a segment automaton.
 * @packageDocumentation
 */

import type {
  GlobAst,
  PatternNode,
  SegmentSequence,
  Segment,
  SegmentAutomaton,
  AutomatonState,
  AutomatonTransition,
} from '../types'
import { variantToRegex } from '../match/segment-matcher'

/**
 * States under construction. Transitions are appended in place and frozen
 * into {@link AutomatonState} objects at the end.
 */
interface AutomatonBuilder {
  transitions: AutomatonTransition[][]
}

/**
 * Build a segment NFA from a glob AST.
 *
 * State 0 is initial and state 1 the single accepting state.
 *
 * @public
 */
export function buildAutomaton(glob: GlobAst): SegmentAutomaton {
  const builder: AutomatonBuilder = { transitions: [] }

  const initial = createState(builder)
  const final = createState(builder)
  buildNode(builder, glob.root, initial, final)

  const states: AutomatonState[] = builder.transitions.map((transitions, id) => ({
    id,
    transitions,
    accepting: id === final,
  }))

  return { states, initialState: initial, acceptingStates: [final] }
}

function createState(builder: AutomatonBuilder): number {
  builder.transitions.push([])
  return builder.transitions.length - 1
}

function buildNode(builder: AutomatonBuilder, node: PatternNode, from: number, to: number): void {
  if (node.type === 'sequence') {
    buildSequence(builder, node, from, to)
    return
  }

  for (const branch of node.branches) {
    const start = createState(builder)
    builder.transitions[from].push({ type: 'epsilon', target: start })
    buildSequence(builder, branch, start, to)
  }
}

function buildSequence(builder: AutomatonBuilder, sequence: SegmentSequence, from: number, to: number): void {
  const { segments } = sequence

  if (segments.length === 0) {
    builder.transitions[from].push({ type: 'epsilon', target: to })
    return
  }

  let current = from
  segments.forEach((segment, index) => {
    const next = index === segments.length - 1 ? to : createState(builder)
    buildSegment(builder, segment, current, next)
    current = next
  })
}

function buildSegment(builder: AutomatonBuilder, segment: Segment, from: number, to: number): void {
  switch (segment.type) {
    case 'literal':
      builder.transitions[from].push({ type: 'literal', segment: segment.value, target: to })
      break

    case 'globstar':
      builder.transitions[from].push({ type: 'globstar', selfLoop: from, exit: to })
      break

    case 'variant':
      builder.transitions[from].push({ type: 'variant', pattern: variantToRegex(segment), target: to })
      break
  }
}

/**
 * Maximum number of components a glob can match, `undefined` when it
 * contains a globstar.
 *
 * @public
 */
export function getMaxSegments(glob: GlobAst): number | undefined {
  return nodeMaxSegments(glob.root)
}

function nodeMaxSegments(node: PatternNode): number | undefined {
  if (node.type === 'sequence') {
    return node.segments.some((segment) => segment.type === 'globstar') ? undefined : node.segments.length
  }

  let max = 0
  for (const branch of node.branches) {
    const branchMax = nodeMaxSegments(branch)
    if (branchMax === undefined) return undefined
    max = Math.max(max, branchMax)
  }
  return max
}
