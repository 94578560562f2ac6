/**
 * Prompt construction and response parsing for subtitle simplification.
 */

import { cueDuration, type Cue } from '../../types/dubbing';

export interface ContextWindow {
  before: Cue[];
  target: Cue;
  after: Cue[];
}

export interface SimplificationRequest {
  cue: Cue;
  context: ContextWindow;
  minRequiredMs: number;
  language?: string;
}

export interface SimplificationResponse {
  text: string;
  reason: string;
}

/** Text simplification backend (an LLM behind some API). */
export interface Simplifier {
  readonly name: string;
  simplify(request: SimplificationRequest): Promise<SimplificationResponse>;
}

export const DEFAULT_CONTEXT_RADIUS = 3;

/** Neighbouring cues within `radius` positions of `position`. */
export function buildContextWindow(
  cues: readonly Cue[],
  position: number,
  radius: number = DEFAULT_CONTEXT_RADIUS
): ContextWindow {
  const target = cues[position];
  if (!target) {
    throw new RangeError(`No cue at position ${position}`);
  }
  return {
    before: cues.slice(Math.max(0, position - radius), position),
    target,
    after: cues.slice(position + 1, position + 1 + radius),
  };
}

function formatContextLine(cue: Cue, marker: string): string {
  return `${marker} [${cue.index}] ${cue.text.replace(/\s*\n\s*/g, ' ')}`;
}

export function buildSimplificationPrompt(request: SimplificationRequest): string {
  const { cue, context, minRequiredMs } = request;
  const slotMs = cueDuration(cue);
  const lines = [
    ...context.before.map(c => formatContextLine(c, '   ')),
    formatContextLine(context.target, '>>>'),
    ...context.after.map(c => formatContextLine(c, '   ')),
  ];

  return [
    'You are editing subtitles for a voice-over. The subtitle marked with >>> is too long',
    `to be spoken in its time slot: the slot is ${slotMs}ms but reading it takes about ${minRequiredMs}ms.`,
    '',
    'Rewrite ONLY the marked subtitle so it can be spoken within the slot:',
    '- keep the original language and the core meaning',
    '- drop filler words and redundant phrases first',
    '- keep names and numbers intact',
    '- stay consistent with the surrounding lines',
    request.language ? `- the subtitle language is "${request.language}"` : '',
    '',
    'Context:',
    ...lines,
    '',
    'Answer with exactly two lines:',
    'SIMPLIFIED_TEXT: <the rewritten subtitle>',
    'REASON: <one short sentence on what was removed>',
  ]
    .filter((line, i, all) => line !== '' || all[i - 1] !== '')
    .join('\n');
}

const TEXT_MARKER = /^\s*SIMPLIFIED_TEXT\s*[:：]\s*(.*)$/i;
const REASON_MARKER = /^\s*REASON\s*[:：]\s*(.*)$/i;

function stripQuotes(value: string): string {
  const trimmed = value.trim();
  const match = trimmed.match(/^(["'“「])(.*)(["'”」])$/s);
  return match ? match[2].trim() : trimmed;
}

/**
 * Extract the rewritten text and reason. Returns null when the response has
 * no SIMPLIFIED_TEXT line or it is empty.
 */
export function parseSimplificationResponse(raw: string): SimplificationResponse | null {
  let text: string | null = null;
  let reason = '';

  for (const line of raw.split(/\r?\n/)) {
    const textMatch = line.match(TEXT_MARKER);
    if (textMatch && text === null) {
      text = stripQuotes(textMatch[1]);
      continue;
    }
    const reasonMatch = line.match(REASON_MARKER);
    if (reasonMatch && !reason) {
      reason = reasonMatch[1].trim();
    }
  }

  if (!text) return null;
  return { text, reason };
}
