/**
 * Plain-text input: one untimed cue per sentence.
 *
 * Text files carry no timing, so every cue has startMs = endMs = 0 and can
 * only go through the basic (concatenating) strategy.
 */

import fs from 'fs';
import { createLogger } from '../logger';
import { createCue, type Cue } from '../../types/dubbing';

const parserLog = createLogger('TxtParser');

const SENTENCE_PATTERN = /[^。！？!?.]+[。！？!?.]*/g;

/** Split on sentence-ending punctuation, keeping the punctuation. */
export function splitOnPunctuation(text: string): string[] {
  return (text.match(SENTENCE_PATTERN) ?? [])
    .map(sentence => sentence.replace(/\s*\n\s*/g, ' ').trim())
    .filter(sentence => sentence.length > 0);
}

function createSentenceSegmenter(language: string): Intl.Segmenter | null {
  try {
    return new Intl.Segmenter(language, { granularity: 'sentence' });
  } catch (error) {
    if (error instanceof RangeError) {
      parserLog.warn(`Unsupported language tag "${language}", splitting on punctuation`);
      return null;
    }
    throw error;
  }
}

/**
 * Split into sentences using the ICU sentence segmenter for `language`.
 * Falls back on punctuation when the tag is not a valid locale.
 */
export function splitSentences(text: string, language: string = 'en'): string[] {
  const segmenter = createSentenceSegmenter(language);
  if (!segmenter) return splitOnPunctuation(text);

  const sentences: string[] = [];
  for (const { segment } of segmenter.segment(text)) {
    const cleaned = segment.replace(/\s*\n\s*/g, ' ').trim();
    if (cleaned) sentences.push(cleaned);
  }
  return sentences;
}

export function parseTxt(content: string, language: string = 'en'): Cue[] {
  const cues = splitSentences(content.replace(/\r\n?/g, '\n'), language)
    .map((sentence, i) => createCue(i + 1, 0, 0, sentence));
  parserLog.info(`Split text into ${cues.length} sentences`);
  return cues;
}

export async function parseTxtFile(filePath: string, language?: string): Promise<Cue[]> {
  const content = await fs.promises.readFile(filePath, 'utf-8');
  return parseTxt(content, language);
}
