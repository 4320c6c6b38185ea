import { z } from 'zod';

// Inbound request from the presentation layer. `target_language` is accepted for older clients.
export const TRANSLATE_REQUEST_SCHEMA = z
  .object({
    content: z.string(),
    targetLanguage: z.string().optional(),
    target_language: z.string().optional(),
    fragments: z.array(z.string()).min(1, 'fragments must list at least one fragment').optional(),
  })
  .transform(({ content, targetLanguage, target_language, fragments }, ctx) => {
    const language = targetLanguage ?? target_language;
    if (language === undefined || language.trim() === '') {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'targetLanguage is required', path: ['targetLanguage'] });
      return z.NEVER;
    }
    return { content, targetLanguage: language, ...(fragments !== undefined && { fragments }) };
  });

export type TranslateRequest = z.infer<typeof TRANSLATE_REQUEST_SCHEMA>;

export interface TranslateSuccessResponse {
  success: true;
  translatedContent: string;
  rewriteInstructions: Array<{ fragmentIndex: number; newText: string }>;
  sourceLanguage: 'auto';
  targetLanguage: string;
  metadata: {
    originalLength: number;
    translatedLength: number;
    translatedAt: string;
    chunkCount: number;
    providersUsed: string[];
  };
}

export interface TranslateFailureResponse {
  success: false;
  error: string;
  errorKind: string;
  hint?: string;
}

export type TranslateResponse = TranslateSuccessResponse | TranslateFailureResponse;
