/**
 * chunker.ts - Splits document text into overlapping chunks
 *
 * A window of at most chunkSize characters slides over the text. Each window
 * ends at the best natural boundary inside its back half, so chunks tend to
 * hold whole sections, paragraphs or sentences:
 *
 *   heading / horizontal rule  >  blank line  >  newline  >  ". " "? " "! "
 *
 * Only when none of these exist does the chunk end at chunkSize (one
 * character earlier if that would split a surrogate pair).
 * The next window starts chunkOverlap characters before the previous end, so
 * every character of the input is in at least one chunk.
 *
 * Everything here is pure and deterministic: the same text and options
 * always produce the same spans, which is what makes chunk ids stable
 * across re-ingestion.
 */

import path from "node:path";
import type { Chunk, ChunkOptions, TextSpan } from "./types";

/**
 * A boundary kind: a pattern, and where in a match the chunk should end.
 */
interface BoundaryRule {
  pattern: RegExp;
  /** Cut offset relative to the match start */
  cutAt: (match: RegExpExecArray) => number;
}

const afterMatch = (match: RegExpExecArray): number => match[0].length;

/** Boundary levels, strongest first. Rules within a level are equivalent. */
const BOUNDARY_LEVELS: BoundaryRule[][] = [
  [
    // Before a Markdown heading line
    { pattern: /\n(?=#{1,6}\s)/g, cutAt: () => 1 },
    // After a horizontal rule line
    { pattern: /\n-{3,}[ \t]*\n/g, cutAt: afterMatch },
  ],
  [{ pattern: /\n[ \t]*\n/g, cutAt: afterMatch }],
  [{ pattern: /\n/g, cutAt: afterMatch }],
  [{ pattern: /[.?!] /g, cutAt: afterMatch }],
];

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 200;

/**
 * How far past the window end a pattern may need to look (heading lookahead).
 */
const LOOKAHEAD = 8;

/**
 * Checks chunking parameters.
 *
 * @throws RangeError when chunkSize is not a positive integer or
 *   chunkOverlap is not an integer in [0, chunkSize)
 */
export function validateChunkOptions(options: ChunkOptions): void {
  const { chunkSize, chunkOverlap } = options;
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
    throw new RangeError(
      `chunkOverlap must be a non-negative integer, got ${chunkOverlap}`
    );
  }
  if (chunkOverlap >= chunkSize) {
    throw new RangeError(
      `chunkOverlap (${chunkOverlap}) must be smaller than chunkSize (${chunkSize})`
    );
  }
}

/**
 * Splits text into overlapping spans.
 *
 * - Empty text yields no spans
 * - Text no longer than chunkSize yields one span
 * - Every span is at most chunkSize characters
 * - Consecutive spans overlap by exactly chunkOverlap characters
 *
 * @throws RangeError for invalid options (see validateChunkOptions)
 */
export function chunkText(text: string, options: ChunkOptions): TextSpan[] {
  validateChunkOptions(options);
  const { chunkSize, chunkOverlap } = options;

  const spans: TextSpan[] = [];
  if (text.length === 0) return spans;

  let start = 0;
  for (;;) {
    if (text.length - start <= chunkSize) {
      spans.push({ text: text.slice(start), start, end: text.length });
      return spans;
    }

    const end = findCut(text, start, options);
    spans.push({ text: text.slice(start, end), start, end });
    start = end - chunkOverlap;
  }
}

/**
 * Splits a document into indexed chunks.
 */
export function chunkDocument(
  document: { path: string; text: string },
  options: ChunkOptions
): Chunk[] {
  return chunkText(document.text, options).map((span, index) => ({
    ...span,
    index,
    source: document.path,
  }));
}

/**
 * Deterministic storage id for a chunk: "<normalized path>:<index>".
 */
export function chunkId(documentPath: string, index: number): string {
  return `${path.normalize(documentPath)}:${index}`;
}

/**
 * Picks where the window starting at `start` ends.
 *
 * Candidates lie in (start + minLength, start + chunkSize]. The lower bound
 * keeps chunks from getting tiny and guarantees the next start moves forward
 * (minLength > chunkOverlap).
 */
function findCut(text: string, start: number, options: ChunkOptions): number {
  const { chunkSize, chunkOverlap } = options;
  const lo = start + Math.max(chunkOverlap + 1, Math.floor(chunkSize / 2));
  const hi = start + chunkSize;
  const region = text.slice(start, Math.min(text.length, hi + LOOKAHEAD));

  for (const level of BOUNDARY_LEVELS) {
    let best = -1;
    for (const rule of level) {
      const cut = lastCut(region, rule, start, lo, hi);
      if (cut > best) best = cut;
    }
    if (best !== -1) return best;
  }
  // Keep a surrogate pair in one chunk
  if (isHighSurrogate(text.charCodeAt(hi - 1)) && hi - 1 > lo) return hi - 1;
  return hi;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Last cut position a rule allows inside (lo, hi], or -1.
 */
function lastCut(
  region: string,
  rule: BoundaryRule,
  offset: number,
  lo: number,
  hi: number
): number {
  let best = -1;
  const pattern = new RegExp(rule.pattern.source, rule.pattern.flags);
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(region)) !== null) {
    const cut = offset + match.index + rule.cutAt(match);
    if (cut > hi) break;
    if (cut > lo) best = cut;
  }
  return best;
}
