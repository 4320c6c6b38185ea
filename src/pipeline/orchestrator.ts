import type { TranslationProvider } from '../providers/translation-provider';
import type { Chunk, RewriteInstruction, TextFragment, TranslationResult } from '../types/translation';
import { resolveLanguage, SUPPORTED_LANGUAGES } from '../config/languages';
import { assignFragmentRanges, split } from '../chunking/splitter';
import { recombine } from '../chunking/merger';
import { DEFAULT_MAX_CHUNK_CHARS } from '../chunking/types';
import { align } from '../alignment/word-aligner';
import { RetryingDispatcher, type DispatcherOptions } from '../dispatch/retrying-dispatcher';
import { PoolCancelledError, runWithConcurrency } from '../dispatch/worker-pool';
import { TranslationError, ValidationError } from '../errors/index';
import { debug } from '../output/logger';

export const DEFAULT_CONCURRENCY = 4;
export const MAX_CONCURRENCY = 8;

export interface OrchestratorOptions extends DispatcherOptions {
  maxChunkChars?: number;
  concurrency?: number;
}

export interface PageTranslation {
  instructions: RewriteInstruction[];
  translatedContent: string;
  chunks: Chunk[];
  results: TranslationResult[];
}

function cancelled(): TranslationError {
  return new TranslationError('Translation was cancelled', 'Cancelled');
}

/*
 * Top-level coordinator: split, dispatch every chunk through a bounded pool,
 * recombine in chunk order, then align onto the original fragments. Any
 * chunk that cannot be translated fails the whole page.
 */
export class TranslationOrchestrator {
  private readonly dispatcher: RetryingDispatcher;
  private readonly maxChunkChars: number;
  private readonly concurrency: number;

  constructor(options: OrchestratorOptions = {}) {
    this.dispatcher = new RetryingDispatcher(options);
    this.maxChunkChars = options.maxChunkChars ?? DEFAULT_MAX_CHUNK_CHARS;
    const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    if (!Number.isFinite(concurrency)) {
      throw new ValidationError(`concurrency must be a number between 1 and ${MAX_CONCURRENCY}, got ${concurrency}`);
    }
    this.concurrency = Math.min(MAX_CONCURRENCY, Math.max(1, Math.floor(concurrency)));
  }

  async translatePage(
    fullText: string,
    fragments: readonly TextFragment[],
    targetLanguage: string,
    providers: readonly TranslationProvider[],
    signal?: AbortSignal
  ): Promise<PageTranslation> {
    const language = resolveLanguage(targetLanguage);
    if (!language) {
      const supported = SUPPORTED_LANGUAGES.map((lang) => lang.key).join(', ');
      throw new TranslationError(
        `Unsupported target language '${targetLanguage}'. Supported: ${supported}`,
        'UnsupportedLanguage'
      );
    }
    if (providers.length === 0) {
      throw new TranslationError(
        'No translation provider is configured',
        'NoProviderConfigured',
        'Set GEMINI_API_KEY or HUGGINGFACE_API_TOKEN in your environment or .env file.'
      );
    }
    if (signal?.aborted) throw cancelled();

    const chunks = assignFragmentRanges(split(fullText, this.maxChunkChars), fullText, fragments);
    debug(`Split ${fullText.length} char(s) into ${chunks.length} chunk(s) for ${language.displayName}`);
    if (chunks.length === 0) {
      return { instructions: [], translatedContent: '', chunks, results: [] };
    }

    let results: TranslationResult[];
    try {
      results = await runWithConcurrency(
        chunks,
        { limit: this.concurrency, ...(signal !== undefined && { signal }) },
        async (chunk) => {
          const dispatched = await this.dispatcher.dispatch(chunk, language, providers, signal);
          return dispatched.ok
            ? { ok: true as const, value: dispatched.result }
            : { ok: false as const, error: dispatched.error };
        }
      );
    } catch (e: unknown) {
      if (e instanceof PoolCancelledError) throw cancelled();
      throw e;
    }

    // In-flight calls were allowed to finish; their results are dropped here
    if (signal?.aborted) throw cancelled();

    const translatedContent = recombine(
      results.filter((result): result is TranslationResult => result !== undefined),
      chunks.map((chunk) => chunk.id)
    );
    const instructions = align(fragments, translatedContent);
    debug(`Aligned ${instructions.length} rewrite instruction(s) over ${fragments.length} fragment(s)`);

    return { instructions, translatedContent, chunks, results };
  }
}
