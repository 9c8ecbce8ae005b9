/**
 * Outcome Recorder
 *
 * Collects the outcome of every gated operation of a run, in order.
 *
 * @module packages/reconciler/services/OutcomeRecorder
 */

import type { AlignOutcome, AlignReport, AlignSummary } from '../types.js';

export function summarize(outcomes: readonly AlignOutcome[]): AlignSummary {
  const summary: AlignSummary = {
    total: outcomes.length,
    applied: 0,
    declined: 0,
    unsupported: 0,
    refused: 0,
    skipped: 0,
  };
  for (const outcome of outcomes) {
    summary[outcome.status] += 1;
  }
  return summary;
}

export class OutcomeRecorder {
  private readonly outcomes: AlignOutcome[] = [];

  record(outcome: AlignOutcome): void {
    this.outcomes.push(outcome);
  }

  /** Number of outcomes recorded so far; a mark for `report` */
  get size(): number {
    return this.outcomes.length;
  }

  /**
   * Report of the outcomes recorded since the given mark
   */
  report(from = 0): AlignReport {
    const outcomes = this.outcomes.slice(from);
    return { outcomes, summary: summarize(outcomes) };
  }
}
