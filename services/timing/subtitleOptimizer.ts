/**
 * Subtitle Optimizer
 *
 * Time borrowing first, then text simplification for the cues borrowing could
 * not fix, then a final check that reports cues which are still too short.
 */

import type { EscalationGateway, EscalationRecord, EscalationTarget } from '../ai/escalationGateway';
import type { TimingConfig } from '../config/dubbingConfig';
import { timingLogger } from '../logger';
import { throwIfCancelled } from '../shared/robustUtils';
import { cueDuration, type Cue, type TimingDecisionRecord } from '../../types/dubbing';
import { optimize, summarizeDecisions } from './slackAllocator';
import { minRequiredMs } from './speechDensity';

export interface StillShortCue {
  cueIndex: number;
  durationMs: number;
  requiredMs: number;
}

export interface OptimizationReport {
  originalCount: number;
  optimizedCount: number;
  timeBorrowedCount: number;
  simplifiedCount: number;
  rejectedCount: number;
  stillShort: StillShortCue[];
  decisions: TimingDecisionRecord[];
  escalations: EscalationRecord[];
}

export interface SubtitleOptimizerOptions {
  timing: TimingConfig;
  /** Without a gateway, cues needing escalation are only reported */
  gateway?: EscalationGateway | null;
  signal?: AbortSignal;
}

export function findStillShort(cues: readonly Cue[], timing: TimingConfig): StillShortCue[] {
  const short: StillShortCue[] = [];
  for (const cue of cues) {
    const requiredMs = minRequiredMs(cue.text, timing);
    const durationMs = cueDuration(cue);
    if (durationMs < requiredMs) {
      short.push({ cueIndex: cue.index, durationMs, requiredMs });
    }
  }
  return short;
}

export async function optimizeSubtitles(
  cues: readonly Cue[],
  options: SubtitleOptimizerOptions
): Promise<{ cues: Cue[]; report: OptimizationReport }> {
  const { timing, gateway, signal } = options;
  throwIfCancelled(signal);

  const allocation = optimize(cues, timing);
  const summary = summarizeDecisions(allocation.decisions);

  const outputPositionOf = new Map<number, number>();
  allocation.sourcePositions.forEach((source, output) => outputPositionOf.set(source, output));

  const targets: EscalationTarget[] = [];
  for (const { position, decision } of allocation.decisions) {
    const outputPosition = outputPositionOf.get(position);
    if (decision.kind === 'need_escalation' && outputPosition !== undefined) {
      targets.push({ position: outputPosition, minRequiredMs: decision.minRequiredMs });
    }
  }

  let optimized = allocation.cues;
  let escalations: EscalationRecord[] = [];

  if (targets.length > 0 && gateway) {
    throwIfCancelled(signal);
    timingLogger.info(`${targets.length} cues need simplification`);
    const escalation = await gateway.escalateAll(optimized, targets, signal);
    optimized = escalation.cues;
    escalations = escalation.records;
  } else if (targets.length > 0) {
    timingLogger.warn(`${targets.length} cues need simplification but no simplifier is configured`);
  }

  const stillShort = findStillShort(optimized, timing);
  for (const entry of stillShort) {
    timingLogger.warn(
      `Cue ${entry.cueIndex} is still short: ${entry.durationMs}ms available, ${entry.requiredMs}ms required`
    );
  }

  const report: OptimizationReport = {
    originalCount: cues.length,
    optimizedCount: optimized.length,
    timeBorrowedCount: summary.timeBorrowed,
    simplifiedCount: escalations.filter(e => e.outcome.ok).length,
    rejectedCount: summary.rejected,
    stillShort,
    decisions: allocation.decisions,
    escalations,
  };

  timingLogger.info(
    `Optimized ${report.optimizedCount}/${report.originalCount} cues: ` +
    `${report.timeBorrowedCount} borrowed, ${report.simplifiedCount} simplified, ${stillShort.length} still short`
  );
  return { cues: optimized, report };
}
