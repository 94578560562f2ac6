/**
 * Timing Slack Allocator
 *
 * Lengthens cues that are too short to be spoken by borrowing time from the
 * silent gaps on either side of them. Gaps are shared between neighbours, so
 * the slack array is decremented as borrows are granted and the pass runs
 * strictly left to right.
 */

import type { TimingConfig } from '../config/dubbingConfig';
import { timingLogger } from '../logger';
import {
  cueDuration,
  withTiming,
  type Cue,
  type TimingDecision,
  type TimingDecisionRecord,
} from '../../types/dubbing';
import { validateCues } from './cueValidation';
import { minRequiredMs } from './speechDensity';

export interface AllocationResult {
  /** Accepted cues with adjusted timing, in input order */
  cues: Cue[];
  /** Input position of each output cue */
  sourcePositions: number[];
  decisions: TimingDecisionRecord[];
}

export interface BorrowSplit {
  front: number;
  back: number;
}

/**
 * Borrowable time in each gap: slack[i] sits between cue i and cue i+1.
 */
export function computeSlack(cues: readonly Cue[], minGapThresholdMs: number): number[] {
  const slack: number[] = [];
  for (let i = 0; i < cues.length - 1; i++) {
    const gap = cues[i + 1].startMs - cues[i].endMs;
    slack.push(Math.max(0, gap - minGapThresholdMs));
  }
  return slack;
}

/**
 * Split `totalNeeded` across both sides in proportion to their caps.
 * Requires frontCap + backCap >= totalNeeded. Flooring can leave the split a
 * few ms short; that remainder comes from the side with more unused room.
 */
export function splitBorrow(frontCap: number, backCap: number, totalNeeded: number): BorrowSplit {
  const available = frontCap + backCap;
  let front = Math.floor((frontCap * totalNeeded) / available);
  let back = Math.floor((backCap * totalNeeded) / available);

  let remainder = totalNeeded - front - back;
  if (remainder > 0) {
    const frontFirst = frontCap - front >= backCap - back;
    const topUpFront = () => {
      const grant = Math.min(remainder, frontCap - front);
      front += grant;
      remainder -= grant;
    };
    const topUpBack = () => {
      const grant = Math.min(remainder, backCap - back);
      back += grant;
      remainder -= grant;
    };
    if (frontFirst) {
      topUpFront();
      topUpBack();
    } else {
      topUpBack();
      topUpFront();
    }
  }

  return { front, back };
}

/**
 * Run one allocation pass.
 *
 * Invalid cues are dropped from the output and recorded as `rejected`.
 * A cue whose partial borrow still leaves it short gets two records:
 * the partial `time_borrow` and then `need_escalation`.
 */
export function optimize(cues: readonly Cue[], cfg: TimingConfig): AllocationResult {
  const { valid, positions, rejected } = validateCues(cues);
  const decisions: TimingDecisionRecord[] = rejected.map(({ position, error }) => ({
    cueIndex: cues[position].index,
    position,
    decision: { kind: 'rejected', reason: error.message },
  }));

  const slack = computeSlack(valid, cfg.minGapThresholdMs);
  const output: Cue[] = [];

  valid.forEach((cue, i) => {
    const position = positions[i];
    const record = (decision: TimingDecision) => {
      decisions.push({ cueIndex: cue.index, position, decision });
    };

    const duration = cueDuration(cue);
    const required = minRequiredMs(cue.text, cfg);
    const needed = Math.max(0, required - duration);

    if (needed === 0) {
      record({ kind: 'no_change' });
      output.push(cue);
      return;
    }

    const frontSlack = i > 0 ? slack[i - 1] : 0;
    const backSlack = i < valid.length - 1 ? slack[i] : 0;
    const frontCap = Math.floor(frontSlack * cfg.borrowRatio);
    const backCap = Math.floor(backSlack * cfg.borrowRatio);
    const available = frontCap + backCap;
    const totalNeeded = needed + cfg.extraBufferMs;

    if (available === 0) {
      timingLogger.debug(`Cue ${cue.index}: no slack, needs ${needed}ms more`);
      record({ kind: 'need_escalation', shortfallMs: needed, minRequiredMs: required });
      output.push(cue);
      return;
    }

    const partial = available < totalNeeded;
    const split = partial ? { front: frontCap, back: backCap } : splitBorrow(frontCap, backCap, totalNeeded);

    const startMs = Math.max(0, cue.startMs - split.front);
    const frontBorrowed = cue.startMs - startMs;
    const endMs = cue.endMs + split.back;

    if (i > 0) slack[i - 1] -= frontBorrowed;
    if (i < valid.length - 1) slack[i] -= split.back;

    record({ kind: 'time_borrow', frontMs: frontBorrowed, backMs: split.back, partial });
    timingLogger.debug(
      `Cue ${cue.index}: borrowed ${frontBorrowed}ms front, ${split.back}ms back${partial ? ' (partial)' : ''}`
    );

    const newDuration = endMs - startMs;
    if (newDuration < required) {
      record({ kind: 'need_escalation', shortfallMs: required - newDuration, minRequiredMs: required });
    }
    output.push(withTiming(cue, startMs, endMs));
  });

  decisions.sort((a, b) => a.position - b.position);
  return { cues: output, sourcePositions: positions, decisions };
}

export interface DecisionSummary {
  noChange: number;
  timeBorrowed: number;
  partialBorrows: number;
  needEscalation: number;
  rejected: number;
}

export function summarizeDecisions(decisions: readonly TimingDecisionRecord[]): DecisionSummary {
  const summary: DecisionSummary = { noChange: 0, timeBorrowed: 0, partialBorrows: 0, needEscalation: 0, rejected: 0 };
  for (const { decision } of decisions) {
    switch (decision.kind) {
      case 'no_change':
        summary.noChange++;
        break;
      case 'time_borrow':
        summary.timeBorrowed++;
        if (decision.partial) summary.partialBorrows++;
        break;
      case 'need_escalation':
        summary.needEscalation++;
        break;
      case 'rejected':
        summary.rejected++;
        break;
    }
  }
  return summary;
}
