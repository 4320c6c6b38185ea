import { z } from 'zod';
import { ENV_SCHEMA, type EnvConfig } from '../schemas/env-schemas';
import { ConfigError, handleUnknownError } from '../errors/index';

export function parseEnvironment(env: unknown = process.env): EnvConfig {
  try {
    return ENV_SCHEMA.parse(env);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ConfigError(`Invalid environment variables: ${formatEnvValidationError(e)}`);
    }
    const err = handleUnknownError(e, 'Environment validation');
    throw new ConfigError(`Environment validation failed: ${err.message}`);
  }
}

function formatEnvValidationError(zodError: z.ZodError): string {
  const providerIssue = zodError.issues.find((issue) => issue.path[0] === 'TRANSLATION_PROVIDERS');
  if (providerIssue) {
    return `TRANSLATION_PROVIDERS must be a comma-separated list of 'gemini' and/or 'huggingface' (${providerIssue.message})`;
  }

  const fieldErrors = zodError.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
  return `Invalid environment variable values: ${fieldErrors.join(', ')}`;
}
