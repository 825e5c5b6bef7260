/**
 * Directory walking.
 * @packageDocumentation
 */

export {
  walkTree,
  walkGlob,
  DEFAULT_ROOT,
  WalkError,
  type Walk,
  type WalkEntry,
  type WalkItem,
  type FileKind,
} from './walker'
export { walkBehaviorSchema, resolveWalkBehavior, type WalkBehavior, type WalkBehaviorOptions } from './behavior'
