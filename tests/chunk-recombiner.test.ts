import { describe, it, expect } from 'vitest';
import { recombine } from '../src/chunking/merger';
import { TranslationError } from '../src/errors/index';
import type { TranslationResult } from '../src/types/translation';

const result = (chunkId: number, translatedText: string): TranslationResult => ({
  chunkId,
  translatedText,
  providerUsed: 'gemini',
});

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e: unknown) {
    return e;
  }
  return undefined;
}

describe('ChunkRecombiner', () => {
  it('joins results in chunk order, not arrival order', () => {
    expect(recombine([result(1, 'mundo.'), result(0, 'Hola')], [0, 1])).toBe('Hola mundo.');
  });

  it('collapses whitespace at the join boundary', () => {
    expect(recombine([result(0, 'Hola  '), result(1, '  mundo')], [0, 1])).toBe('Hola mundo');
  });

  it('keeps whitespace inside a chunk', () => {
    expect(recombine([result(0, 'Hola\n\nmundo'), result(1, 'otra vez')], [0, 1])).toBe('Hola\n\nmundo otra vez');
  });

  it('skips blank translations', () => {
    expect(recombine([result(0, 'A'), result(1, '   '), result(2, 'B')], [0, 1, 2])).toBe('A B');
  });

  it('fails with IncompleteResults when a chunk is missing', () => {
    const err = captureError(() => recombine([result(0, 'Hola')], [0, 1, 2]));
    expect(err).toBeInstanceOf(TranslationError);
    expect(err).toMatchObject({
      kind: 'IncompleteResults',
      message: 'Missing translation results for chunk(s): 1, 2',
    });
  });

  it('fails with IncompleteResults when a chunk is reported twice', () => {
    const err = captureError(() => recombine([result(0, 'Hola'), result(0, 'Hola')], [0]));
    expect(err).toMatchObject({ kind: 'IncompleteResults' });
  });

  it('returns an empty string when there is nothing to join', () => {
    expect(recombine([], [])).toBe('');
  });
});
