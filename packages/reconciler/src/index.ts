/**
 * @dbconverge/reconciler
 *
 * Reflected tree over a live server and the engine that aligns it with a
 * declared tree.
 *
 * @module packages/reconciler
 */

export { AlignEngine, type AlignEngineConfig, type AlignOptions } from './services/AlignEngine.js';
export { OutcomeRecorder, summarize } from './services/OutcomeRecorder.js';
export { ReflectedNode } from './reflected/ReflectedNode.js';
export type { AttributeReader, AttributeSetter, EntityBehavior } from './reflected/EntityBehavior.js';
export { BEHAVIORS, behaviorOf, dailyBoundaries, partitionObjectNames, SERVER_ROLES } from './reflected/behaviors/index.js';
export {
  APPLIED,
  OUTCOME_STATUSES,
  skipped,
  type AlignOperation,
  type AlignOutcome,
  type AlignReport,
  type AlignSummary,
  type MutationResult,
  type OutcomeStatus,
  type ReflectionContext,
} from './types.js';
