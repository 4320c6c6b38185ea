// Centralized prompt construction for generative providers

import type { LanguageInfo } from '../config/languages';

export interface RequestBuilder {
  buildTranslationPrompt(text: string, targetLanguage: LanguageInfo): string;
}

export class DefaultRequestBuilder implements RequestBuilder {
  private directive: string;

  constructor(directive?: string) {
    this.directive = (directive || '').trim();
  }

  buildTranslationPrompt(text: string, targetLanguage: LanguageInfo): string {
    const directive = this.directive ? `\n\n${this.directive}` : '';
    return (
      `Translate the following text to ${targetLanguage.displayName}. ` +
      'Provide only the translation without any additional text or explanations.' +
      directive +
      `\n\nText to translate:\n${text}\n\nTranslation:`
    );
  }
}
