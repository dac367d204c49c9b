/**
 * Text Chunking
 *
 * Splits long text into overlapping spans suitable for embedding. Spans
 * carry their character offsets so the original text can be rebuilt from
 * them: consecutive spans overlap by at most `overlapChars`. Windows that
 * hold only whitespace are dropped, so the only gaps are whitespace runs.
 * Cuts never split a UTF-16 surrogate pair.
 */

import type { TextSpan } from "./types.js";

export interface ChunkOptions {
  maxChars: number;
  overlapChars: number;
}

export const DEFAULT_CHUNK_OPTIONS: ChunkOptions = {
  maxChars: 512,
  overlapChars: 64,
};

const SENTENCE_END = /[.!?]\s+/g;

/**
 * Split text into spans of at most `maxChars` characters.
 *
 * Text that fits in one span is returned whole. Longer text is cut at the
 * last paragraph break in the window, else the last sentence end, else the
 * last whitespace; only breaks in the second half of a window count, so
 * every span keeps at least half of `maxChars`.
 */
export function chunkText(text: string, options: Partial<ChunkOptions> = {}): TextSpan[] {
  const { maxChars, overlapChars } = { ...DEFAULT_CHUNK_OPTIONS, ...options };

  if (!Number.isInteger(maxChars) || maxChars <= 0) {
    throw new Error(`maxChars must be a positive integer, got ${maxChars}`);
  }
  const overlap = Math.max(0, Math.min(overlapChars, maxChars - 1));

  if (text.trim() === "") return [];
  if (text.length <= maxChars) {
    return [{ text, start: 0, end: text.length }];
  }

  const spans: TextSpan[] = [];
  let start = 0;

  while (start < text.length) {
    let end = Math.min(start + maxChars, text.length);
    if (end < text.length) {
      end = start + findBreak(text.slice(start, end));
    }

    const slice = text.slice(start, end);
    if (slice.trim() !== "") {
      spans.push({ text: slice, start, end });
    }

    if (end >= text.length) break;

    // Step back by the overlap, but always move forward
    let next = end - overlap;
    if (isLowSurrogate(text.charCodeAt(next))) next--;
    start = next > start ? next : start + 1;
  }

  return spans;
}

/**
 * Position (exclusive) at which to cut a full window
 */
function findBreak(window: string): number {
  const min = Math.floor(window.length / 2);

  const paragraph = window.lastIndexOf("\n\n");
  if (paragraph >= min) {
    return paragraph + 2;
  }

  let sentenceCut = -1;
  for (const match of window.matchAll(SENTENCE_END)) {
    if (match.index !== undefined && match.index >= min) {
      sentenceCut = match.index + match[0].length;
    }
  }
  if (sentenceCut > 0) {
    return sentenceCut;
  }

  for (let i = window.length - 1; i >= min; i--) {
    if (/\s/.test(window[i])) {
      return i + 1;
    }
  }

  const cut = window.length;
  return cut > 1 && isHighSurrogate(window.charCodeAt(cut - 1)) ? cut - 1 : cut;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}
