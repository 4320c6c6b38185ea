import type { RewriteInstruction, TextFragment } from '../types/translation';
import { countWords, splitIntoWords } from '../chunking/utils';
import { FRAGMENT_PUNCTUATION } from './fragments';

function endsWithPunctuation(text: string): boolean {
  return FRAGMENT_PUNCTUATION.has(text.charAt(text.length - 1));
}

/**
 * Redistributes a translated blob over the original fragments in proportion
 * to each fragment's word count.
 *
 * Each fragment with `n` words takes `ceil(n * translated / original)` words
 * from a running cursor, capped by what is left. The last fragment that has
 * any words takes everything still unassigned, so no translated word is lost.
 * Fragments that end up with no words get no instruction and stay as they are.
 */
export function align(
  fragments: readonly TextFragment[],
  translatedBlob: string
): RewriteInstruction[] {
  const translatedWords = splitIntoWords(translatedBlob);
  const wordCounts = fragments.map((fragment) => countWords(fragment.rawText));
  const originalWordCount = wordCounts.reduce((sum, n) => sum + n, 0);

  if (translatedWords.length === 0 || originalWordCount === 0) return [];

  let catchAll = -1;
  wordCounts.forEach((n, position) => {
    if (n > 0) catchAll = position;
  });

  const instructions: RewriteInstruction[] = [];
  let wordIndex = 0;

  fragments.forEach((fragment, position) => {
    const n = wordCounts[position] ?? 0;
    const remaining = translatedWords.length - wordIndex;
    if (n === 0 || remaining <= 0) return;

    // Integer ceil(n * ratio), free of floating point drift
    const expected = Math.floor((n * translatedWords.length + originalWordCount - 1) / originalWordCount);
    const take = position === catchAll ? remaining : Math.min(expected, remaining);
    if (take <= 0) return;

    let body = translatedWords.slice(wordIndex, wordIndex + take).join(' ');
    wordIndex += take;

    if (fragment.trailingPunctuation && !endsWithPunctuation(body)) {
      body += fragment.trailingPunctuation;
    }

    instructions.push({
      fragmentIndex: fragment.index,
      newText: `${fragment.leadingWhitespace}${body}${fragment.trailingWhitespace}`,
    });
  });

  return instructions;
}
