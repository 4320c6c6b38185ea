import { describe, it, expect } from 'vitest';
import { assignFragmentRanges, sentenceSpans, split } from '../src/chunking/splitter';
import { captureFragments } from '../src/alignment/fragments';
import { ValidationError } from '../src/errors/index';

const texts = (text: string, max: number) => split(text, max).map((c) => c.text);

describe('ChunkSplitter', () => {
  describe('degenerate input', () => {
    it('returns no chunks for an empty string', () => {
      expect(split('', 1000)).toEqual([]);
    });

    it('returns no chunks for whitespace only', () => {
      expect(split('  \n\t ', 1000)).toEqual([]);
    });

    it('rejects a non-positive limit', () => {
      expect(() => split('Hello.', 0)).toThrow(ValidationError);
    });
  });

  describe('sentence boundaries', () => {
    it('returns a single chunk when the text fits', () => {
      const chunks = split('The cat sat. The dog ran.', 1000);
      expect(chunks).toHaveLength(1);
      expect(chunks[0]).toEqual({
        id: 0,
        text: 'The cat sat. The dog ran.',
        startOffset: 0,
        endOffset: 25,
        sourceFragmentRange: [0, 0],
      });
    });

    it('packs whole sentences up to the limit', () => {
      expect(texts('One two. Three four. Five six.', 20)).toEqual(['One two. Three four.', 'Five six.']);
    });

    it('does not end a sentence on a decimal point', () => {
      const text = 'Pi is 3.14 today. Next!';
      expect(sentenceSpans(text).map((s) => text.slice(s.start, s.end))).toEqual(['Pi is 3.14 today.', 'Next!']);
    });

    it('numbers chunks sequentially', () => {
      const chunks = split('A a. B b. C c.', 4);
      expect(chunks.map((c) => c.id)).toEqual([0, 1, 2]);
      expect(chunks.map((c) => c.text)).toEqual(['A a.', 'B b.', 'C c.']);
    });
  });

  describe('word fallback', () => {
    it('splits an oversized sentence on whitespace', () => {
      expect(texts('alpha beta gamma delta', 11)).toEqual(['alpha beta', 'gamma delta']);
    });

    it('returns a word longer than the limit as its own chunk', () => {
      expect(texts('a supercalifragilistic b', 5)).toEqual(['a', 'supercalifragilistic', 'b']);
    });
  });

  describe('reconstruction', () => {
    const text =
      'Translation keeps the page intact.  Every node keeps its place!\n' +
      'Does it work for longer paragraphs with many words in them? It should. ' +
      'Sentences that are much longer than the configured limit are broken on spaces instead of mid word.';

    it('keeps every chunk within the limit and on word boundaries', () => {
      const max = 40;
      const chunks = split(text, max);
      for (const chunk of chunks) {
        expect(chunk.text).toBe(text.slice(chunk.startOffset, chunk.endOffset));
        expect(chunk.text.length <= max || !/\s/.test(chunk.text)).toBe(true);
        expect(chunk.text).toBe(chunk.text.trim());
      }
    });

    it('leaves only whitespace between consecutive chunks', () => {
      const chunks = split(text, 40);
      let cursor = 0;
      for (const chunk of chunks) {
        expect(text.slice(cursor, chunk.startOffset).trim()).toBe('');
        cursor = chunk.endOffset;
      }
      expect(text.slice(cursor).trim()).toBe('');
    });

    it('rebuilds the text when chunks are joined with single spaces', () => {
      const single = 'One two. Three four. Five six.';
      expect(texts(single, 12).join(' ')).toBe(single);
    });
  });

  describe('fragment ranges', () => {
    it('records which fragments each chunk covers', () => {
      const fullText = 'The cat sat. The dog ran.';
      const fragments = captureFragments(['The cat sat.', 'The dog ran.']);
      const chunks = assignFragmentRanges(split(fullText, 12), fullText, fragments);
      expect(chunks.map((c) => c.sourceFragmentRange)).toEqual([
        [0, 0],
        [1, 1],
      ]);
    });

    it('spans several fragments when a chunk covers them', () => {
      const fullText = 'Hello world. Bye.';
      const fragments = captureFragments(['Hello ', 'world.', ' Bye.']);
      const chunks = assignFragmentRanges(split(fullText, 1000), fullText, fragments);
      expect(chunks[0]?.sourceFragmentRange).toEqual([0, 2]);
    });
  });
});
