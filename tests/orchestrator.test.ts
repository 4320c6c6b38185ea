import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { TranslationOrchestrator } from '../src/pipeline/orchestrator';
import type { TranslationProvider } from '../src/providers/translation-provider';
import type { Chunk, ProviderOutcome } from '../src/types/translation';
import { fatal, success } from '../src/types/translation';
import { captureFragments } from '../src/alignment/fragments';
import { TranslationError, ValidationError } from '../src/errors/index';
import { setSilentMode } from '../src/output/logger';
import { SPANISH, echoProvider, recordingSleep, scriptedProvider } from './helpers/scripted-provider';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('TranslationOrchestrator', () => {
  beforeAll(() => setSilentMode(true));
  afterAll(() => setSilentMode(false));

  it('translates a page and aligns it onto its fragments', async () => {
    const text = 'The cat sat. The dog ran.';
    const fragments = captureFragments(['The cat sat.', ' The dog ran.']);
    const { provider } = scriptedProvider('gemini', [success('El gato se sentó. El perro corrió.')]);

    const page = await new TranslationOrchestrator().translatePage(text, fragments, 'spanish', [provider]);

    expect(page.translatedContent).toBe('El gato se sentó. El perro corrió.');
    expect(page.instructions).toEqual([
      { fragmentIndex: 0, newText: 'El gato se sentó.' },
      { fragmentIndex: 1, newText: ' El perro corrió.' },
    ]);
    expect(page.chunks).toHaveLength(1);
    expect(page.chunks[0]?.sourceFragmentRange).toEqual([0, 1]);
    expect(page.results).toEqual([{ chunkId: 0, translatedText: 'El gato se sentó. El perro corrió.', providerUsed: 'gemini' }]);
  });

  it('rejects an unsupported language before calling any provider', async () => {
    const { provider, translate } = scriptedProvider('gemini', [success('x')]);

    const run = new TranslationOrchestrator().translatePage('Hello', captureFragments(['Hello']), 'klingon', [provider]);

    await expect(run).rejects.toMatchObject({ kind: 'UnsupportedLanguage' });
    expect(translate).not.toHaveBeenCalled();
  });

  it('rejects a page when no provider is configured', async () => {
    const run = new TranslationOrchestrator().translatePage('Hello', captureFragments(['Hello']), 'spanish', []);

    await expect(run).rejects.toBeInstanceOf(TranslationError);
    await expect(run).rejects.toMatchObject({ kind: 'NoProviderConfigured' });
  });

  it('accepts the language name in any case', async () => {
    const { provider, translate } = scriptedProvider('gemini', [success('Hola')]);

    await new TranslationOrchestrator().translatePage('Hello', captureFragments(['Hello']), '  SPANISH ', [provider]);

    expect(translate).toHaveBeenCalledWith(expect.objectContaining({ text: 'Hello' }), SPANISH, expect.any(AbortSignal));
  });

  it('recombines chunks in order even when they finish out of order', async () => {
    const provider: TranslationProvider = {
      name: 'gemini',
      translate: async (chunk: Chunk): Promise<ProviderOutcome> => {
        await delay(chunk.id === 0 ? 30 : 1);
        return success(chunk.text.toUpperCase());
      },
    };
    const text = 'Hello there. Good night.';

    const page = await new TranslationOrchestrator({ maxChunkChars: 12 }).translatePage(
      text,
      captureFragments(['Hello there.', 'Good night.']),
      'spanish',
      [provider]
    );

    expect(page.chunks.map((chunk) => chunk.text)).toEqual(['Hello there.', 'Good night.']);
    expect(page.translatedContent).toBe('HELLO THERE. GOOD NIGHT.');
    expect(page.instructions).toEqual([
      { fragmentIndex: 0, newText: 'HELLO THERE.' },
      { fragmentIndex: 1, newText: 'GOOD NIGHT.' },
    ]);
  });

  it('fails the whole page when one chunk cannot be translated', async () => {
    const provider: TranslationProvider = {
      name: 'gemini',
      translate: async (chunk: Chunk): Promise<ProviderOutcome> =>
        chunk.id === 1 ? fatal('Other', 'bad request') : success(chunk.text),
    };

    const run = new TranslationOrchestrator({ maxChunkChars: 12, sleep: recordingSleep().sleep }).translatePage(
      'Hello there. Good night.',
      captureFragments(['Hello there. Good night.']),
      'spanish',
      [provider]
    );

    await expect(run).rejects.toMatchObject({
      kind: 'AllProvidersExhausted',
      message: 'All translation providers failed for chunk 1. Last error from gemini: bad request',
    });
  });

  it('does nothing once cancelled', async () => {
    const { provider, translate } = scriptedProvider('gemini', [success('Hola')]);
    const controller = new AbortController();
    controller.abort();

    const run = new TranslationOrchestrator().translatePage(
      'Hello',
      captureFragments(['Hello']),
      'spanish',
      [provider],
      controller.signal
    );

    await expect(run).rejects.toMatchObject({ kind: 'Cancelled' });
    expect(translate).not.toHaveBeenCalled();
  });

  it('stops starting chunks when cancelled mid-page', async () => {
    const controller = new AbortController();
    const { provider, translate } = echoProvider('gemini', (text) => {
      controller.abort();
      return text;
    });

    const run = new TranslationOrchestrator({ maxChunkChars: 12, concurrency: 1 }).translatePage(
      'Hello there. Good night.',
      captureFragments(['Hello there. Good night.']),
      'spanish',
      [provider],
      controller.signal
    );

    await expect(run).rejects.toMatchObject({ kind: 'Cancelled' });
    expect(translate).toHaveBeenCalledTimes(1);
  });

  it('returns an empty translation for blank text', async () => {
    const { provider, translate } = scriptedProvider('gemini', []);

    const page = await new TranslationOrchestrator().translatePage('  ', captureFragments(['  ']), 'spanish', [provider]);

    expect(page).toEqual({ instructions: [], translatedContent: '', chunks: [], results: [] });
    expect(translate).not.toHaveBeenCalled();
  });

  it('rejects a concurrency that is not a number', () => {
    expect(() => new TranslationOrchestrator({ concurrency: Number.NaN })).toThrow(ValidationError);
    expect(() => new TranslationOrchestrator({ concurrency: Number.POSITIVE_INFINITY })).toThrow(
      'concurrency must be a number between 1 and 8, got Infinity'
    );
  });

  it('clamps concurrency into 1..8', async () => {
    const { provider } = scriptedProvider('gemini', [success('Hola')]);

    const page = await new TranslationOrchestrator({ concurrency: 0 }).translatePage(
      'Hello',
      captureFragments(['Hello']),
      'spanish',
      [provider]
    );

    expect(page.translatedContent).toBe('Hola');
  });

  it('keeps no more chunks in flight than the concurrency limit', async () => {
    let active = 0;
    let peak = 0;
    const provider: TranslationProvider = {
      name: 'gemini',
      translate: async (chunk: Chunk): Promise<ProviderOutcome> => {
        active++;
        peak = Math.max(peak, active);
        await delay(5);
        active--;
        return success(chunk.text);
      },
    };

    const page = await new TranslationOrchestrator({ maxChunkChars: 4, concurrency: 2 }).translatePage(
      'A a. B b. C c. D d. E e.',
      captureFragments(['A a. B b. C c. D d. E e.']),
      'spanish',
      [provider]
    );

    expect(page.chunks).toHaveLength(5);
    expect(page.translatedContent).toBe('A a. B b. C c. D d. E e.');
    expect(peak).toBe(2);
  });
});
