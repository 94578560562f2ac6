/**
 * Escalation Gateway Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { EscalationGateway } from '../../services/ai/escalationGateway';
import {
  buildContextWindow,
  buildSimplificationPrompt,
  parseSimplificationResponse,
  type SimplificationRequest,
  type SimplificationResponse,
  type Simplifier,
} from '../../services/ai/simplifierPrompt';
import { CancelledError, TimeoutError, TimingEscalationError } from '../../services/errors';
import { createRetryPolicy } from '../../services/shared/robustUtils';
import { createCue, type Cue } from '../../types/dubbing';

// ============================================================================
// Helpers
// ============================================================================

const noDelayRetry = (maxRetries = 2) => createRetryPolicy({ maxRetries, baseDelayMs: 0, maxDelayMs: 0 });

function fakeSimplifier(impl: (request: SimplificationRequest) => Promise<SimplificationResponse>) {
  const simplify = vi.fn(impl);
  return { name: 'fake', simplify } satisfies Simplifier;
}

function createGateway(simplifier: Simplifier, overrides: { maxConcurrency?: number; maxRetries?: number; timeoutMs?: number } = {}) {
  return new EscalationGateway({
    simplifier,
    maxConcurrency: overrides.maxConcurrency ?? 4,
    retry: noDelayRetry(overrides.maxRetries),
    timeoutMs: overrides.timeoutMs ?? 1000,
  });
}

const cues: Cue[] = [
  createCue(1, 0, 1000, '第一句'),
  createCue(2, 1100, 1200, '这一句实在是太长了'),
  createCue(3, 1300, 2000, '第三句'),
];

const contextFor = (position: number) => buildContextWindow(cues, position, 3);

// ============================================================================
// Gateway
// ============================================================================

describe('EscalationGateway', () => {
  it('returns the shortened text on success', async () => {
    const simplifier = fakeSimplifier(async () => ({ text: '太长了', reason: '删去修饰' }));
    const gateway = createGateway(simplifier);

    const outcome = await gateway.simplify(cues[1], contextFor(1), 1350);

    expect(outcome).toEqual({ ok: true, text: '太长了', reason: '删去修饰' });
    expect(simplifier.simplify).toHaveBeenCalledTimes(1);
    expect(simplifier.simplify.mock.calls[0][0].minRequiredMs).toBe(1350);
    expect(simplifier.simplify.mock.calls[0][0].context.before).toEqual([cues[0]]);
  });

  it('serves repeated requests from the cache', async () => {
    const simplifier = fakeSimplifier(async () => ({ text: '太长了', reason: '' }));
    const gateway = createGateway(simplifier);

    await gateway.simplify(cues[1], contextFor(1), 1350);
    const second = await gateway.simplify(cues[1], contextFor(1), 1350);

    expect(second.text).toBe('太长了');
    expect(simplifier.simplify).toHaveBeenCalledTimes(1);
    expect(gateway.stats).toEqual({ calls: 1, cacheHits: 1, cached: 1 });
  });

  it('keys the cache on the required duration as well as the text', async () => {
    const simplifier = fakeSimplifier(async () => ({ text: '太长了', reason: '' }));
    const gateway = createGateway(simplifier);

    await gateway.simplify(cues[1], contextFor(1), 1350);
    await gateway.simplify(cues[1], contextFor(1), 900);

    expect(simplifier.simplify).toHaveBeenCalledTimes(2);
  });

  it('retries transient failures', async () => {
    let attempt = 0;
    const simplifier = fakeSimplifier(async () => {
      attempt++;
      if (attempt < 3) throw new Error('503 unavailable');
      return { text: '太长了', reason: '' };
    });
    const gateway = createGateway(simplifier);

    const outcome = await gateway.simplify(cues[1], contextFor(1), 1350);

    expect(outcome.ok).toBe(true);
    expect(simplifier.simplify).toHaveBeenCalledTimes(3);
  });

  it('falls back to the original text once retries are exhausted', async () => {
    const simplifier = fakeSimplifier(async () => {
      throw new Error('rate limited');
    });
    const gateway = createGateway(simplifier, { maxRetries: 2 });

    const outcome = await gateway.simplify(cues[1], contextFor(1), 1350);

    expect(outcome.ok).toBe(false);
    expect(outcome.text).toBe('这一句实在是太长了');
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(TimingEscalationError);
      expect(outcome.error.cueIndex).toBe(2);
      expect(outcome.error.originalError?.message).toBe('rate limited');
    }
    expect(simplifier.simplify).toHaveBeenCalledTimes(3);
    expect(gateway.stats.cached).toBe(0);
  });

  it('rejects rewrites that are not shorter', async () => {
    const simplifier = fakeSimplifier(async () => ({ text: '这一句实在是太长了啊', reason: '' }));
    const gateway = createGateway(simplifier, { maxRetries: 1 });

    const outcome = await gateway.simplify(cues[1], contextFor(1), 1350);

    expect(outcome.ok).toBe(false);
    expect(simplifier.simplify).toHaveBeenCalledTimes(2);
  });

  it('times out a simplifier call that never answers', async () => {
    const simplifier = fakeSimplifier(() => new Promise<SimplificationResponse>(() => undefined));
    const gateway = createGateway(simplifier, { maxRetries: 0, timeoutMs: 20 });

    const outcome = await gateway.simplify(cues[1], contextFor(1), 1350);

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error.originalError).toBeInstanceOf(TimeoutError);
    }
  });

  it('never runs more simplifier calls at once than allowed', async () => {
    let active = 0;
    let maxActive = 0;
    const simplifier = fakeSimplifier(async request => {
      active++;
      maxActive = Math.max(maxActive, active);
      await new Promise(resolve => setTimeout(resolve, 5));
      active--;
      return { text: request.cue.text.slice(0, 1), reason: '' };
    });
    const gateway = createGateway(simplifier, { maxConcurrency: 2 });

    const many = Array.from({ length: 6 }, (_, i) => createCue(i + 1, i * 1000, i * 1000 + 100, `很长的句子${i}`));
    await Promise.all(many.map((cue, i) => gateway.simplify(cue, buildContextWindow(many, i), 600)));

    expect(maxActive).toBe(2);
    expect(simplifier.simplify).toHaveBeenCalledTimes(6);
  });

  it('propagates cancellation instead of falling back', async () => {
    const simplifier = fakeSimplifier(async () => ({ text: '短', reason: '' }));
    const gateway = createGateway(simplifier);
    const controller = new AbortController();
    controller.abort();

    await expect(gateway.simplify(cues[1], contextFor(1), 1350, controller.signal)).rejects.toBeInstanceOf(
      CancelledError
    );
    expect(simplifier.simplify).not.toHaveBeenCalled();
  });

  describe('escalateAll', () => {
    it('replaces text only for successful targets and keeps timing', async () => {
      const simplifier = fakeSimplifier(async request => {
        if (request.cue.index === 3) throw new Error('refused');
        return { text: '太长了', reason: '' };
      });
      const gateway = createGateway(simplifier, { maxRetries: 0 });

      const result = await gateway.escalateAll(cues, [
        { position: 2, minRequiredMs: 450 },
        { position: 1, minRequiredMs: 1350 },
      ]);

      expect(result.cues).toEqual([
        { index: 1, startMs: 0, endMs: 1000, text: '第一句' },
        { index: 2, startMs: 1100, endMs: 1200, text: '太长了' },
        { index: 3, startMs: 1300, endMs: 2000, text: '第三句' },
      ]);
      expect(result.records.map(r => [r.cueIndex, r.outcome.ok])).toEqual([
        [2, true],
        [3, false],
      ]);
    });
  });
});

// ============================================================================
// Prompt helpers
// ============================================================================

describe('buildContextWindow', () => {
  const ten = Array.from({ length: 10 }, (_, i) => createCue(i + 1, i * 1000, i * 1000 + 500, `line ${i + 1}`));

  it('takes up to radius cues on each side', () => {
    const window = buildContextWindow(ten, 1, 3);
    expect(window.before.map(c => c.index)).toEqual([1]);
    expect(window.target.index).toBe(2);
    expect(window.after.map(c => c.index)).toEqual([3, 4, 5]);
  });

  it('is empty after the last cue', () => {
    expect(buildContextWindow(ten, 9, 3).after).toEqual([]);
  });

  it('throws for a position outside the list', () => {
    expect(() => buildContextWindow(ten, 10, 3)).toThrow(RangeError);
  });
});

describe('buildSimplificationPrompt', () => {
  it('marks the target line and states the slot and required durations', () => {
    const prompt = buildSimplificationPrompt({ cue: cues[1], context: contextFor(1), minRequiredMs: 1350 });

    expect(prompt).toContain('the slot is 100ms but reading it takes about 1350ms');
    expect(prompt).toContain('>>> [2] 这一句实在是太长了');
    expect(prompt).toContain('    [1] 第一句');
  });
});

describe('parseSimplificationResponse', () => {
  it('reads both lines and strips quotes', () => {
    expect(parseSimplificationResponse('SIMPLIFIED_TEXT: "太长了"\nREASON: 删去修饰')).toEqual({
      text: '太长了',
      reason: '删去修饰',
    });
  });

  it('accepts a full-width colon and a missing reason', () => {
    expect(parseSimplificationResponse('SIMPLIFIED_TEXT：短句')).toEqual({ text: '短句', reason: '' });
  });

  it('returns null without a usable text line', () => {
    expect(parseSimplificationResponse('I cannot help with that.')).toBeNull();
    expect(parseSimplificationResponse('SIMPLIFIED_TEXT:   ')).toBeNull();
  });
});
