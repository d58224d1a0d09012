/**
 * Run Gate Tests
 */

import { describe, it, expect } from 'vitest';
import { BudgetState } from '../../../orchestration/budget.js';
import {
  FailureRateTracker,
  GATE_OK,
  checkBudget,
  checkDriftSignal,
  terminalStateFor,
} from '../../../orchestration/gates.js';

describe('terminalStateFor', () => {
  it('should map each signal to one terminal state', () => {
    expect(terminalStateFor(GATE_OK)).toBe('completed');
    expect(
      terminalStateFor({
        kind: 'budget_exceeded',
        stage: 's',
        record_id: 'r',
        estimate_usd: 1,
        spent_usd: 0,
        limit_usd: 0.5,
      })
    ).toBe('aborted_budget');
    expect(
      terminalStateFor({
        kind: 'failure_rate_exceeded',
        processed: 1,
        failed: 1,
        failure_rate: 1,
        threshold: 0.1,
      })
    ).toBe('aborted_failure_rate');
    expect(terminalStateFor({ kind: 'drift_exceeded', drift_rate: 0.5, threshold: 0.02 })).toBe(
      'aborted_drift'
    );
  });
});

describe('checkBudget', () => {
  it('should signal before a call that would breach the limit', () => {
    const budget = new BudgetState(1, 0);
    budget.record(0.75);

    expect(checkBudget(budget, 0.25, 'llm-judge', 'rec-1')).toEqual(GATE_OK);
    expect(checkBudget(budget, 0.5, 'llm-judge', 'rec-2')).toEqual({
      kind: 'budget_exceeded',
      stage: 'llm-judge',
      record_id: 'rec-2',
      estimate_usd: 0.5,
      spent_usd: 0.75,
      limit_usd: 1,
    });
  });
});

describe('FailureRateTracker', () => {
  it('should trip only above the threshold', () => {
    const tracker = new FailureRateTracker(0.1, 1);
    for (let i = 0; i < 9; i++) tracker.recordSuccess();
    tracker.recordFailure();

    expect(tracker.failureRate).toBe(0.1);
    expect(tracker.check()).toEqual(GATE_OK);

    tracker.recordFailure();
    expect(tracker.check()).toEqual({
      kind: 'failure_rate_exceeded',
      processed: 11,
      failed: 2,
      failure_rate: 2 / 11,
      threshold: 0.1,
    });
  });

  it('should wait for the minimum sample', () => {
    const tracker = new FailureRateTracker(0.1, 3);
    tracker.recordFailure();
    tracker.recordFailure();
    expect(tracker.check()).toEqual(GATE_OK);

    tracker.recordSuccess();
    expect(tracker.check().kind).toBe('failure_rate_exceeded');
  });

  it('should report a zero rate before anything is processed', () => {
    expect(new FailureRateTracker().failureRate).toBe(0);
  });
});

describe('checkDriftSignal', () => {
  it('should flag only an exceeded report', () => {
    const report = {
      total_fields_checked: 5,
      drifted_fields: 1,
      drift_rate: 0.2,
      threshold: 0.25,
      exceeded: false,
      missing_records: [],
      diffs: [],
    };
    expect(checkDriftSignal(report)).toEqual(GATE_OK);
    expect(checkDriftSignal({ ...report, threshold: 0.1, exceeded: true })).toEqual({
      kind: 'drift_exceeded',
      drift_rate: 0.2,
      threshold: 0.1,
    });
  });
});
