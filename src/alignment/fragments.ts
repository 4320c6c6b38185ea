import type { TextFragment } from '../types/translation';

export const FRAGMENT_PUNCTUATION = new Set(['.', '!', '?', ',', ':', ';']);

/**
 * Captures a text node's content as an immutable fragment, splitting off the
 * surrounding whitespace and noting a trailing punctuation mark.
 */
export function captureFragment(index: number, rawText: string): TextFragment {
  const leadingWhitespace = /^\s*/.exec(rawText)?.[0] ?? '';
  if (leadingWhitespace.length === rawText.length) {
    return { index, rawText, leadingWhitespace, trailingWhitespace: '' };
  }

  const trailingWhitespace = /\s*$/.exec(rawText)?.[0] ?? '';
  const core = rawText.slice(leadingWhitespace.length, rawText.length - trailingWhitespace.length);
  const last = core.charAt(core.length - 1);

  return {
    index,
    rawText,
    leadingWhitespace,
    trailingWhitespace,
    ...(FRAGMENT_PUNCTUATION.has(last) && { trailingPunctuation: last }),
  };
}

export function captureFragments(texts: readonly string[]): TextFragment[] {
  return texts.map((text, index) => captureFragment(index, text));
}

export type FragmentMode = 'none' | 'lines' | 'paragraphs';

/*
 * Derives fragment texts from a plain document when no DOM is available.
 * 'none' keeps the whole content as a single fragment.
 */
export function fragmentTexts(content: string, mode: FragmentMode): string[] {
  switch (mode) {
    case 'none':
      return [content];
    case 'lines':
      return content.split(/\r?\n/).filter((line) => line.trim().length > 0);
    case 'paragraphs':
      return content.split(/(?:\r?\n){2,}/).filter((para) => para.trim().length > 0);
  }
}
