import { z } from 'zod'

/**
 * Schema for the knobs of a directory walk.
 *
 * - `minDepth`: entries shallower than this are not yielded (but are
 *   descended into). The walk root is depth 0.
 * - `maxDepth`: directories at this depth are not descended into;
 *   unbounded when absent.
 * - `followLinks`: treat symbolic links as what they point to.
 *
 * @public
 */
export const walkBehaviorSchema = z
  .object({
    minDepth: z.number().int().nonnegative().default(0),
    maxDepth: z.number().int().nonnegative().optional(),
    followLinks: z.boolean().default(false),
  })
  .strict()
  .refine((behavior) => behavior.maxDepth === undefined || behavior.minDepth <= behavior.maxDepth, {
    message: 'minDepth cannot exceed maxDepth',
    path: ['minDepth'],
  })

/**
 * Resolved walk behavior with every default applied.
 * @public
 */
export type WalkBehavior = z.output<typeof walkBehaviorSchema>

/**
 * Walk behavior as callers write it; every field is optional.
 * @public
 */
export type WalkBehaviorOptions = z.input<typeof walkBehaviorSchema>

/**
 * Validate walk options and fill in defaults.
 *
 * @throws ZodError if the options are invalid
 *
 * @public
 */
export function resolveWalkBehavior(options: WalkBehaviorOptions = {}): WalkBehavior {
  return walkBehaviorSchema.parse(options)
}
