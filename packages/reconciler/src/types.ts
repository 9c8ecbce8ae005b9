/**
 * Reconciler Types
 *
 * Outcome records for gated operations, the alignment report, and the
 * context every reflected node shares during one run.
 *
 * @module packages/reconciler/types
 */

import type { Logger } from 'pino';
import type { EntityType } from '@dbconverge/core/domain';
import type { IConfirmationProvider, ISchemaDialect, ISqlDriver } from '@dbconverge/core/ports';
import type { OutcomeRecorder } from './services/OutcomeRecorder.js';

// ============================================================================
// Outcomes
// ============================================================================

export type AlignOperation = 'create' | 'update' | 'rename' | 'delete';

/**
 * - `applied`: the change ran and was verified
 * - `declined`: the confirmation provider said no
 * - `unsupported`: no remediation exists for this operation
 * - `refused`: policy forbids the operation on this object
 * - `skipped`: a precondition failed, nothing was changed
 */
export type OutcomeStatus = 'applied' | 'declined' | 'unsupported' | 'refused' | 'skipped';

export const OUTCOME_STATUSES: readonly OutcomeStatus[] = [
  'applied',
  'declined',
  'unsupported',
  'refused',
  'skipped',
];

export interface AlignOutcome {
  operation: AlignOperation;
  entityType: EntityType;
  /** Qualified name of the entity */
  path: string;
  /** Attribute name, for updates */
  attribute?: string;
  from?: string;
  to?: string;
  status: OutcomeStatus;
  reason?: string;
}

export type AlignSummary = { total: number } & Record<OutcomeStatus, number>;

export interface AlignReport {
  outcomes: AlignOutcome[];
  summary: AlignSummary;
}

// ============================================================================
// Context
// ============================================================================

/**
 * Collaborators shared by every node of one reflected tree.
 *
 * One driver connection per run; calls are awaited one at a time.
 */
export interface ReflectionContext {
  readonly driver: ISqlDriver;
  readonly dialect: ISchemaDialect;
  readonly confirm: IConfirmationProvider;
  readonly logger: Logger;
  readonly outcomes: OutcomeRecorder;
  /** Clock used for time-derived values such as partition boundaries */
  readonly now: () => Date;
}

/**
 * Result of a type-specific mutation. A skipped mutation changed nothing and
 * is not verified.
 */
export type MutationResult =
  | { readonly status: 'applied' }
  | { readonly status: 'skipped'; readonly reason: string };

export const APPLIED: MutationResult = { status: 'applied' };

export function skipped(reason: string): MutationResult {
  return { status: 'skipped', reason };
}
