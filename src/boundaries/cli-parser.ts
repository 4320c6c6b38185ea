import { TRANSLATE_OPTIONS_SCHEMA, type TranslateOptions } from '../schemas/cli-schemas';
import { ValidationError, handleUnknownError } from '../errors/index';

export function parseTranslateOptions(raw: unknown): TranslateOptions {
  try {
    return TRANSLATE_OPTIONS_SCHEMA.parse(raw);
  } catch (e: unknown) {
    if (e instanceof Error && 'issues' in e) {
      // Zod error
      throw new ValidationError(`Invalid translate options: ${e.message}`);
    }
    const err = handleUnknownError(e, 'Translate option parsing');
    throw new ValidationError(`Translate option parsing failed: ${err.message}`);
  }
}
