/**
 * @pricebars/session-boundaries
 *
 * Marks the last bar of each trading session and the number of bars left
 * until the session closes.
 *
 * @example
 * ```typescript
 * import { annotateSessionBoundaries } from '@pricebars/session-boundaries';
 *
 * const { sessions } = annotateSessionBoundaries(bars);
 * ```
 */

export { annotateSessionBoundaries, annotateCrossSections } from './annotate.js';
export type {
  AnnotateOptions,
  AnnotationSummary,
  CrossSectionAnnotationSummary,
} from './annotate.js';
export { utcSessionKey } from './session-key.js';
export type { SessionKeyFn } from './session-key.js';
export { UnorderedBarsError, isUnorderedBarsError } from './errors.js';
