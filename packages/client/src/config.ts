// Client configuration
//
// Precedence, lowest first: built-in defaults, DATATRACKER_* environment
// variables, explicit overrides.

import { z } from 'zod';
import { ValidationError, type Result } from '@ietfdata/protocol';
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from '@ietfdata/transport';

export const DEFAULT_MAX_PAGES = 10_000;

export const ClientConfigSchema = z.object({
  /**
   * Service root that API paths are resolved against
   */
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),

  /**
   * Per-request timeout in milliseconds
   */
  timeoutMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),

  /**
   * Records per page requested from list endpoints; the service default when unset
   */
  pageSize: z.coerce.number().int().positive().max(1000).optional(),

  /**
   * Upper bound on pages fetched by one traversal
   */
  maxPages: z.coerce.number().int().positive().default(DEFAULT_MAX_PAGES),

  userAgent: z.string().min(1).optional(),
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;

export type ClientConfigInput = z.input<typeof ClientConfigSchema>;

const ENV_KEYS: Record<keyof ClientConfig, string> = {
  baseUrl: 'DATATRACKER_BASE_URL',
  timeoutMs: 'DATATRACKER_TIMEOUT_MS',
  pageSize: 'DATATRACKER_PAGE_SIZE',
  maxPages: 'DATATRACKER_MAX_PAGES',
  userAgent: 'DATATRACKER_USER_AGENT',
};

/**
 * Resolve the client configuration.
 *
 * Usage:
 * ```ts
 * const config = loadConfig({ timeoutMs: 5000 });
 * if (!config.success) throw config.error;
 * ```
 */
export function loadConfig(
  overrides: ClientConfigInput = {},
  env: Record<string, string | undefined> = process.env
): Result<ClientConfig, ValidationError> {
  const merged: Record<string, unknown> = {};

  for (const [field, variable] of Object.entries(ENV_KEYS)) {
    const value = env[variable]?.trim();
    if (value) {
      merged[field] = value;
    }
  }

  for (const [field, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[field] = value;
    }
  }

  const parsed = ClientConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message }));
    const field = issues[0]?.path ?? '';
    const message = issues[0]?.message ?? 'invalid value';
    return {
      success: false,
      error: new ValidationError(`Invalid configuration: ${field}: ${message}`, {
        field,
        details: { issues },
      }),
    };
  }

  return { success: true, value: parsed.data };
}
