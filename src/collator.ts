import type {
  CaseSummary,
  Outcome,
  OutcomeStatus,
  PlannedUnit,
  RunCounts,
  SuiteSummary,
} from './types.js';

export function emptyCounts(): RunCounts {
  return { total: 0, passed: 0, failed: 0, skipped: 0, flaky: 0, cancelled: 0, pending: 0 };
}

function tally(counts: RunCounts, status: OutcomeStatus | 'pending'): void {
  counts.total += 1;
  counts[status] += 1;
}

/** Folds one case's outcomes (one per dataset row) into a single status */
function caseStatus(counts: RunCounts): OutcomeStatus | 'pending' {
  if (counts.failed > 0) return 'failed';
  if (counts.cancelled > 0) return 'cancelled';
  if (counts.pending > 0) return 'pending';
  if (counts.flaky > 0) return 'flaky';
  if (counts.passed > 0) return 'passed';
  return 'skipped';
}

export interface CollatedResult {
  counts: RunCounts;
  outcomes: Outcome[];
  suites: SuiteSummary[];
  passed: boolean;
}

/**
 * Slot arena keyed by sequence index. Completions fill their slot as they
 * arrive; reading the arena in index order restores the planned order, and
 * unfilled slots read as pending.
 */
export class ResultCollator {
  private slots: Array<Outcome | undefined>;
  private units: PlannedUnit[];
  private filled = 0;

  constructor(units: PlannedUnit[]) {
    this.units = [...units].sort((a, b) => a.index - b.index);
    const size = this.units.length === 0 ? 0 : this.units[this.units.length - 1].index + 1;
    this.slots = new Array<Outcome | undefined>(size).fill(undefined);
  }

  get complete(): boolean {
    return this.filled === this.units.length;
  }

  record(outcome: Outcome): void {
    if (outcome.index < 0 || outcome.index >= this.slots.length) {
      throw new RangeError(`No unit planned at index ${outcome.index}`);
    }
    if (this.slots[outcome.index] !== undefined) {
      throw new Error(`Unit ${outcome.index} already has an outcome`);
    }
    this.slots[outcome.index] = outcome;
    this.filled += 1;
  }

  outcome(index: number): Outcome | undefined {
    return this.slots[index];
  }

  /** Safe to call at any time; pending units are counted but not listed */
  snapshot(): CollatedResult {
    const counts = emptyCounts();
    const outcomes: Outcome[] = [];
    const suites = new Map<string, { counts: RunCounts; cases: Map<string, CaseSummary> }>();

    for (const unit of this.units) {
      const outcome = this.slots[unit.index];
      const status = outcome ? outcome.status : 'pending';
      if (outcome) outcomes.push(outcome);
      tally(counts, status);

      let suite = suites.get(unit.suiteName);
      if (!suite) {
        suite = { counts: emptyCounts(), cases: new Map() };
        suites.set(unit.suiteName, suite);
      }
      tally(suite.counts, status);

      const caseKey = `${unit.phase}\u0000${unit.testCase.name}`;
      let summary = suite.cases.get(caseKey);
      if (!summary) {
        summary = {
          suiteName: unit.suiteName,
          name: unit.testCase.name,
          phase: unit.phase,
          counts: emptyCounts(),
          status: 'pending',
        };
        suite.cases.set(caseKey, summary);
      }
      tally(summary.counts, status);
    }

    const suiteSummaries: SuiteSummary[] = [];
    for (const [name, suite] of suites) {
      const cases = [...suite.cases.values()];
      cases.forEach((c) => {
        c.status = caseStatus(c.counts);
      });
      const considered = cases.filter((c) => c.status !== 'skipped');
      suiteSummaries.push({
        name,
        passed: considered.every((c) => c.status === 'passed' || c.status === 'flaky'),
        counts: suite.counts,
        cases,
      });
    }

    return {
      counts,
      outcomes,
      suites: suiteSummaries,
      passed: suiteSummaries.every((s) => s.passed),
    };
  }
}
