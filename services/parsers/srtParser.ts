/**
 * SRT (SubRip) parsing and serialization.
 */

import fs from 'fs';
import { createLogger } from '../logger';
import { createCue, type Cue } from '../../types/dubbing';

const parserLog = createLogger('SrtParser');

// HH:MM:SS,mmm --> HH:MM:SS,mmm (a '.' before the milliseconds is tolerated)
const TIME_LINE = /^(\d{1,2}):(\d{2}):(\d{2})[,.](\d{3})\s*-->\s*(\d{1,2}):(\d{2}):(\d{2})[,.](\d{3})/;

export interface SrtParseResult {
  cues: Cue[];
  /** Blocks that were dropped, with the reason */
  skipped: Array<{ block: number; reason: string }>;
}

function toMs(hours: string, minutes: string, seconds: string, millis: string): number {
  return Number(hours) * 3600000 + Number(minutes) * 60000 + Number(seconds) * 1000 + Number(millis);
}

/**
 * Convert milliseconds to SRT timestamp format (HH:MM:SS,mmm)
 */
export function formatSrtTimestamp(totalMs: number): string {
  const ms = Math.max(0, Math.round(totalMs));
  const hours = Math.floor(ms / 3600000);
  const minutes = Math.floor((ms % 3600000) / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  const millis = ms % 1000;

  return `${hours.toString().padStart(2, '0')}:${minutes.toString().padStart(2, '0')}:${seconds.toString().padStart(2, '0')},${millis.toString().padStart(3, '0')}`;
}

export function parseSrt(content: string): SrtParseResult {
  const normalized = content.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n').trim();
  const result: SrtParseResult = { cues: [], skipped: [] };
  if (!normalized) return result;

  const blocks = normalized.split(/\n\s*\n/);
  blocks.forEach((block, blockNumber) => {
    const lines = block.split('\n').map(line => line.trim());
    const timeLineIndex = lines.findIndex(line => line.includes('-->'));

    const skip = (reason: string) => {
      parserLog.warn(`Skipping block ${blockNumber + 1}: ${reason} (${block.slice(0, 50)})`);
      result.skipped.push({ block: blockNumber + 1, reason });
    };

    if (timeLineIndex === -1) return skip('no timestamp line');
    if (timeLineIndex === 0) return skip('missing index line');

    const index = Number(lines[timeLineIndex - 1]);
    if (!Number.isInteger(index)) return skip(`invalid index "${lines[timeLineIndex - 1]}"`);

    const match = lines[timeLineIndex].match(TIME_LINE);
    if (!match) return skip(`malformed timestamp "${lines[timeLineIndex]}"`);

    const text = lines.slice(timeLineIndex + 1).join('\n').trim();
    if (!text) return skip('empty text');

    const startMs = toMs(match[1], match[2], match[3], match[4]);
    const endMs = toMs(match[5], match[6], match[7], match[8]);
    result.cues.push(createCue(index, startMs, endMs, text));
  });

  parserLog.info(`Parsed ${result.cues.length} cues (${result.skipped.length} blocks skipped)`);
  return result;
}

export async function parseSrtFile(filePath: string): Promise<SrtParseResult> {
  const content = await fs.promises.readFile(filePath, 'utf-8');
  return parseSrt(content);
}

/**
 * Serialize cues back to SRT, renumbered from 1.
 */
export function serializeSrt(cues: readonly Cue[]): string {
  return cues
    .map((cue, i) => `${i + 1}\n${formatSrtTimestamp(cue.startMs)} --> ${formatSrtTimestamp(cue.endMs)}\n${cue.text}`)
    .join('\n\n') + '\n';
}
