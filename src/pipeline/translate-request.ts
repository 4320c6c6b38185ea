import { z } from 'zod';
import { TRANSLATE_REQUEST_SCHEMA, type TranslateRequest, type TranslateResponse } from '../schemas/api-schemas';
import type { ProviderConfiguration } from '../config/config';
import type { TranslationProvider } from '../providers/translation-provider';
import { createProviders } from '../providers/provider-factory';
import { resolveLanguage } from '../config/languages';
import { captureFragments } from '../alignment/fragments';
import { TranslationOrchestrator, type OrchestratorOptions } from './orchestrator';
import { TranslationError, handleUnknownError, isTranslationError } from '../errors/index';

export interface TranslateRequestDeps {
  createProviders?: (configuration: ProviderConfiguration) => TranslationProvider[];
  now?: () => Date;
  orchestratorOptions?: Pick<OrchestratorOptions, 'sleep' | 'onAttempt'>;
  signal?: AbortSignal;
}

export function parseTranslateRequest(raw: unknown, maxContentLength: number): TranslateRequest {
  let request: TranslateRequest;
  try {
    request = TRANSLATE_REQUEST_SCHEMA.parse(raw);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      const issues = e.issues.map((issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`);
      throw new TranslationError(`Invalid translation request: ${issues.join(', ')}`, 'InvalidRequest');
    }
    const err = handleUnknownError(e, 'Request validation');
    throw new TranslationError(`Request validation failed: ${err.message}`, 'InvalidRequest');
  }

  if (!request.content.trim()) {
    throw new TranslationError('Missing content in request', 'InvalidRequest');
  }
  if (request.content.length > maxContentLength) {
    throw new TranslationError(
      `Content is ${request.content.length} characters; the limit is ${maxContentLength}`,
      'InvalidRequest'
    );
  }
  return request;
}

export function toFailureResponse(e: unknown): TranslateResponse {
  if (isTranslationError(e)) {
    return {
      success: false,
      error: e.message,
      errorKind: e.kind,
      ...(e.hint !== undefined && { hint: e.hint }),
    };
  }
  const err = handleUnknownError(e, 'Translation');
  return { success: false, error: err.message, errorKind: 'Other' };
}

/*
 * Request/response boundary for the presentation layer. Never throws: every
 * failure becomes `{ success: false, error, errorKind }`. Without explicit
 * fragments the whole content is treated as one fragment.
 */
export async function handleTranslateRequest(
  raw: unknown,
  configuration: ProviderConfiguration,
  deps: TranslateRequestDeps = {}
): Promise<TranslateResponse> {
  try {
    const request = parseTranslateRequest(raw, configuration.maxContentLength);
    const providers = (deps.createProviders ?? ((config) => createProviders(config.providers)))(configuration);

    const orchestrator = new TranslationOrchestrator({
      ...deps.orchestratorOptions,
      maxChunkChars: configuration.maxChunkChars,
      concurrency: configuration.concurrency,
      policy: configuration.retry,
    });

    const fragments = captureFragments(request.fragments ?? [request.content]);
    const page = await orchestrator.translatePage(
      request.content,
      fragments,
      request.targetLanguage,
      providers,
      deps.signal
    );

    const now = deps.now ?? (() => new Date());
    return {
      success: true,
      translatedContent: page.translatedContent,
      rewriteInstructions: page.instructions,
      sourceLanguage: 'auto',
      targetLanguage: resolveLanguage(request.targetLanguage)?.key ?? request.targetLanguage,
      metadata: {
        originalLength: request.content.length,
        translatedLength: page.translatedContent.length,
        translatedAt: now().toISOString(),
        chunkCount: page.chunks.length,
        providersUsed: [...new Set(page.results.map((result) => result.providerUsed))],
      },
    };
  } catch (e: unknown) {
    return toFailureResponse(e);
  }
}
