export interface LanguageInfo {
  key: string;
  code: string;
  displayName: string;
  /** Target suffix of the English-to-X opus-mt model; absent when none is published. */
  opusMtTarget?: string;
}

export const SUPPORTED_LANGUAGES: readonly LanguageInfo[] = [
  { key: 'spanish', code: 'es', displayName: 'Spanish', opusMtTarget: 'es' },
  { key: 'french', code: 'fr', displayName: 'French', opusMtTarget: 'fr' },
  { key: 'german', code: 'de', displayName: 'German', opusMtTarget: 'de' },
  { key: 'italian', code: 'it', displayName: 'Italian', opusMtTarget: 'it' },
  { key: 'portuguese', code: 'pt', displayName: 'Portuguese' },
  { key: 'dutch', code: 'nl', displayName: 'Dutch', opusMtTarget: 'nl' },
  { key: 'chinese', code: 'zh', displayName: 'Chinese', opusMtTarget: 'zh' },
  { key: 'japanese', code: 'ja', displayName: 'Japanese', opusMtTarget: 'jap' },
  { key: 'korean', code: 'ko', displayName: 'Korean' },
  { key: 'arabic', code: 'ar', displayName: 'Arabic', opusMtTarget: 'ar' },
  { key: 'russian', code: 'ru', displayName: 'Russian', opusMtTarget: 'ru' },
  { key: 'hindi', code: 'hi', displayName: 'Hindi', opusMtTarget: 'hi' },
];

/**
 * Looks up a language by key, case-insensitively and ignoring surrounding
 * whitespace. Returns undefined for anything outside the supported set.
 */
export function resolveLanguage(name: string): LanguageInfo | undefined {
  const key = name.trim().toLowerCase();
  return SUPPORTED_LANGUAGES.find((lang) => lang.key === key);
}
