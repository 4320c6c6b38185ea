import type { Chunk, FragmentRange, TextFragment } from "../types/translation";
import { ValidationError } from "../errors/index";
import { type ChunkingOptions, type ChunkingStrategy, DEFAULT_MAX_CHUNK_CHARS } from "./types";
import { type TextSpan, wordSpans } from "./utils";

const SENTENCE_TERMINATORS = new Set([".", "!", "?"]);

function isWhitespace(ch: string | undefined): boolean {
  return ch !== undefined && /\s/.test(ch);
}

function skipWhitespace(text: string, from: number): number {
  let i = from;
  while (i < text.length && isWhitespace(text[i])) i++;
  return i;
}

/*
 * Sentence spans, trimmed. A terminator only ends a sentence when followed by
 * whitespace or the end of the text, so "3.14" and "e.g.x" stay whole.
 */
export function sentenceSpans(text: string): TextSpan[] {
  const spans: TextSpan[] = [];
  let start = skipWhitespace(text, 0);

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (ch === undefined || !SENTENCE_TERMINATORS.has(ch)) continue;
    const next = text[i + 1];
    if (next !== undefined && !isWhitespace(next)) continue;

    spans.push({ start, end: i + 1 });
    start = skipWhitespace(text, i + 1);
    i = start - 1;
  }

  if (start < text.length) {
    let end = text.length;
    while (end > start && isWhitespace(text[end - 1])) end--;
    spans.push({ start, end });
  }

  return spans;
}

// Greedily merges adjacent spans while the merged length fits.
function packSpans(spans: TextSpan[], maxChars: number): TextSpan[] {
  const packed: TextSpan[] = [];
  let current: TextSpan | undefined;

  for (const span of spans) {
    if (!current) {
      current = { ...span };
      continue;
    }
    if (span.end - current.start <= maxChars) {
      current.end = span.end;
    } else {
      packed.push(current);
      current = { ...span };
    }
  }

  if (current) packed.push(current);
  return packed;
}

export class SentenceChunker implements ChunkingStrategy {
  readonly name = "sentence";

  chunk(content: string, options?: ChunkingOptions): Chunk[] {
    const maxChars = options?.maxChunkChars ?? DEFAULT_MAX_CHUNK_CHARS;
    if (!Number.isInteger(maxChars) || maxChars < 1) {
      throw new ValidationError(`maxChunkChars must be a positive integer, got ${maxChars}`);
    }

    const pieces: TextSpan[] = [];
    for (const sentence of sentenceSpans(content)) {
      if (sentence.end - sentence.start <= maxChars) {
        pieces.push(sentence);
      } else {
        // Oversized sentence: fall back to word boundaries
        pieces.push(...packSpans(wordSpans(content, sentence), maxChars));
      }
    }

    return packSpans(pieces, maxChars).map((span, id) => ({
      id,
      text: content.slice(span.start, span.end),
      startOffset: span.start,
      endOffset: span.end,
      sourceFragmentRange: [0, 0] as const,
    }));
  }
}

/**
 * Splits text into provider-safe chunks on sentence, then word, boundaries.
 * Blank text yields no chunks.
 */
export function split(text: string, maxChunkChars: number = DEFAULT_MAX_CHUNK_CHARS): Chunk[] {
  return new SentenceChunker().chunk(text, { maxChunkChars });
}

/*
 * Locates each fragment inside the full text (in order) and records, per
 * chunk, the first and last fragment it overlaps. Fragments that cannot be
 * found are skipped; a chunk overlapping none falls back to every fragment.
 */
export function assignFragmentRanges(
  chunks: Chunk[],
  fullText: string,
  fragments: readonly TextFragment[]
): Chunk[] {
  if (fragments.length === 0) return chunks;

  const located: Array<{ index: number; span: TextSpan }> = [];
  let cursor = 0;
  for (const fragment of fragments) {
    const core = fragment.rawText.trim();
    if (!core) continue;
    const at = fullText.indexOf(core, cursor);
    if (at < 0) continue;
    located.push({ index: fragment.index, span: { start: at, end: at + core.length } });
    cursor = at + core.length;
  }

  const lastIndex = fragments[fragments.length - 1]?.index ?? 0;
  const firstIndex = fragments[0]?.index ?? 0;

  return chunks.map((chunk) => {
    const overlapping = located.filter(
      ({ span }) => span.start < chunk.endOffset && span.end > chunk.startOffset
    );
    const first = overlapping[0];
    const last = overlapping[overlapping.length - 1];
    const range: FragmentRange = first && last ? [first.index, last.index] : [firstIndex, lastIndex];
    return { ...chunk, sourceFragmentRange: range };
  });
}
