/**
 * SRT parsing and serialization
 */

import { describe, it, expect } from 'vitest';
import { formatSrtTimestamp, parseSrt, serializeSrt } from '../../services/parsers/srtParser';
import { createCue } from '../../types/dubbing';

const SAMPLE = [
  '1',
  '00:00:01,000 --> 00:00:02,500',
  'Hello',
  'world',
  '',
  '2',
  '00:00:03,000 --> 00:00:04,000',
  '你好',
  '',
].join('\n');

describe('parseSrt', () => {
  it('parses indices, timestamps and multi-line text', () => {
    const { cues, skipped } = parseSrt(SAMPLE);

    expect(cues).toEqual([
      { index: 1, startMs: 1000, endMs: 2500, text: 'Hello\nworld' },
      { index: 2, startMs: 3000, endMs: 4000, text: '你好' },
    ]);
    expect(skipped).toEqual([]);
  });

  it('handles a byte order mark and CRLF line endings', () => {
    const { cues } = parseSrt('\uFEFF' + SAMPLE.replace(/\n/g, '\r\n'));
    expect(cues.map(c => c.index)).toEqual([1, 2]);
    expect(cues[0].text).toBe('Hello\nworld');
  });

  it('accepts a dot before the milliseconds and hours above 9', () => {
    const { cues } = parseSrt('5\n10:00:01.250 --> 10:00:02.000\nLate line');
    expect(cues).toEqual([{ index: 5, startMs: 36001250, endMs: 36002000, text: 'Late line' }]);
  });

  it('skips malformed blocks and keeps the rest', () => {
    const content = [
      'abc',
      '00:00:05,000 --> 00:00:06,000',
      'Bad index',
      '',
      '3',
      'no time here',
      '',
      '4',
      '00:00:07,000 --> 00:00:08,000',
      'Good',
      '',
      '5',
      '00:00:09,000 --> 00:00:10,000',
    ].join('\n');

    const { cues, skipped } = parseSrt(content);

    expect(cues).toEqual([{ index: 4, startMs: 7000, endMs: 8000, text: 'Good' }]);
    expect(skipped).toEqual([
      { block: 1, reason: 'invalid index "abc"' },
      { block: 2, reason: 'no timestamp line' },
      { block: 4, reason: 'empty text' },
    ]);
  });

  it('returns nothing for blank input', () => {
    expect(parseSrt('  \n\n ')).toEqual({ cues: [], skipped: [] });
  });
});

describe('formatSrtTimestamp', () => {
  it('formats hours, minutes, seconds and milliseconds', () => {
    expect(formatSrtTimestamp(3723004)).toBe('01:02:03,004');
    expect(formatSrtTimestamp(0)).toBe('00:00:00,000');
  });

  it('clamps negative values to zero', () => {
    expect(formatSrtTimestamp(-50)).toBe('00:00:00,000');
  });
});

describe('serializeSrt', () => {
  it('renumbers cues from 1', () => {
    const output = serializeSrt([createCue(7, 0, 650, '你好吗'), createCue(9, 1300, 2000, 'Two\nlines')]);

    expect(output).toBe(
      '1\n00:00:00,000 --> 00:00:00,650\n你好吗\n\n2\n00:00:01,300 --> 00:00:02,000\nTwo\nlines\n'
    );
  });

  it('parses back to the same timing and text', () => {
    const cues = [createCue(1, 1000, 2500, 'Hello\nworld'), createCue(2, 3000, 4000, '你好')];
    expect(parseSrt(serializeSrt(cues)).cues).toEqual(cues);
  });
});
