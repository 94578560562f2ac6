/**
 * Speech density estimates
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { countSpeechUnits, minRequiredMs } from '../../services/timing/speechDensity';

const RATES = { chineseCharMs: 150, englishWordMs: 250 };

describe('countSpeechUnits', () => {
  it('counts CJK characters one by one', () => {
    expect(countSpeechUnits('你好世界')).toEqual({ cjkChars: 4, latinWords: 0 });
  });

  it('counts latin letter runs as words', () => {
    expect(countSpeechUnits("don't stop, OK?")).toEqual({ cjkChars: 0, latinWords: 4 });
  });

  it('ignores digits, punctuation and full-width symbols', () => {
    expect(countSpeechUnits('2024，。！？')).toEqual({ cjkChars: 0, latinWords: 0 });
  });
});

describe('minRequiredMs', () => {
  it('uses the per-character rate for Chinese', () => {
    expect(minRequiredMs('你好世界', RATES)).toBe(600);
  });

  it('uses the per-word rate for English', () => {
    expect(minRequiredMs('hello world', RATES)).toBe(500);
  });

  it('sums both rates for mixed text', () => {
    expect(minRequiredMs('我爱 NYC 2024', RATES)).toBe(550);
  });

  it('is zero for text with nothing to speak', () => {
    expect(minRequiredMs('', RATES)).toBe(0);
    expect(minRequiredMs('...', RATES)).toBe(0);
  });

  it('grows linearly with the number of CJK characters', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 200 }), count => {
        expect(minRequiredMs('好'.repeat(count), RATES)).toBe(count * 150);
      })
    );
  });
});
