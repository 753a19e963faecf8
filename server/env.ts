import dotenv from 'dotenv';
import { resolve } from 'node:path';
import { z } from 'zod';

import { ConfigurationError } from './integrations/errors';
import { TypeformAPIClient, type TypeformClientOptions } from './integrations/TypeformAPIClient';

export interface TypeformEnv {
  formId: string;
  token: string;
  baseURL?: string;
  timeoutMs?: number;
}

const typeformEnvSchema = z.object({
  TYPEFORM_FORM_ID: z.string().trim().min(1, 'is required'),
  TYPEFORM_TOKEN: z.string().trim().min(1, 'is required'),
  TYPEFORM_BASE_URL: z.string().trim().url('must be an absolute URL').optional(),
  TYPEFORM_TIMEOUT_MS: z.coerce.number().int('must be an integer').positive('must be positive').optional(),
});

function isMissing(value: string | undefined): boolean {
  return !value || value.trim().length === 0;
}

/** Loads .env and .env.local (if present) into process.env without overriding existing values. */
function loadDotenv(): NodeJS.ProcessEnv {
  dotenv.config();
  dotenv.config({ path: resolve(process.cwd(), '.env.local') });
  return process.env;
}

export function loadTypeformEnv(source: NodeJS.ProcessEnv = loadDotenv()): TypeformEnv {
  // Blank optional values count as unset.
  const raw = {
    TYPEFORM_FORM_ID: source.TYPEFORM_FORM_ID ?? '',
    TYPEFORM_TOKEN: source.TYPEFORM_TOKEN ?? '',
    TYPEFORM_BASE_URL: isMissing(source.TYPEFORM_BASE_URL) ? undefined : source.TYPEFORM_BASE_URL,
    TYPEFORM_TIMEOUT_MS: isMissing(source.TYPEFORM_TIMEOUT_MS) ? undefined : source.TYPEFORM_TIMEOUT_MS,
  };

  const parsed = typeformEnvSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')} ${issue.message}`);
    const variables = Array.from(new Set(parsed.error.issues.map(issue => issue.path.join('.'))));
    throw new ConfigurationError(`Invalid Typeform configuration: ${problems.join('; ')}`, variables);
  }

  return {
    formId: parsed.data.TYPEFORM_FORM_ID,
    token: parsed.data.TYPEFORM_TOKEN,
    baseURL: parsed.data.TYPEFORM_BASE_URL,
    timeoutMs: parsed.data.TYPEFORM_TIMEOUT_MS,
  };
}

export function createTypeformClientFromEnv(
  source?: NodeJS.ProcessEnv,
  options: Omit<TypeformClientOptions, 'baseURL' | 'timeoutMs'> = {},
): TypeformAPIClient {
  const env = loadTypeformEnv(source);
  return new TypeformAPIClient(env.formId, env.token, {
    ...options,
    baseURL: env.baseURL,
    timeoutMs: env.timeoutMs,
  });
}
