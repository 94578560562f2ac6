/**
 * Speech density estimates used to decide whether a cue is long enough to be spoken.
 */

import type { TimingConfig } from '../config/dubbingConfig';

const CJK_CHAR = /[\u4e00-\u9fff]/g;
const LATIN_WORD = /[A-Za-z]+/g;

export interface TextCounts {
  cjkChars: number;
  latinWords: number;
}

export function countSpeechUnits(text: string): TextCounts {
  return {
    cjkChars: text.match(CJK_CHAR)?.length ?? 0,
    latinWords: text.match(LATIN_WORD)?.length ?? 0,
  };
}

/** Minimum speaking time for `text`. Mixed-script text sums both rates. */
export function minRequiredMs(
  text: string,
  rates: Pick<TimingConfig, 'chineseCharMs' | 'englishWordMs'>
): number {
  const { cjkChars, latinWords } = countSpeechUnits(text);
  return cjkChars * rates.chineseCharMs + latinWords * rates.englishWordMs;
}
