/**
 * Credentials file written by the provisioning tool.
 *
 * Format (one setting per line, string values only):
 *   URL = "https://cloud.example.test";
 *   CustomerKey = "...";
 *   CustomerSecret = "...";
 *   RememberMeToken = "...";
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { createLogger, err, ok, retry, toError } from '@ledbridge/types';
import type { Clock, Logger, Result } from '@ledbridge/types';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

export const DEFAULT_CREDENTIALS_PATH = '/etc/lwm2m/flow_access.cfg';
export const DEFAULT_CREDENTIALS_READ_ATTEMPTS = 5;
export const DEFAULT_CREDENTIALS_READ_BACKOFF_MS = 1000;

const SETTING_PATTERN = /^\s*([A-Za-z*][\w*-]*)\s*[=:]\s*"((?:[^"\\]|\\.)*)"\s*;?\s*$/;

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export const RegistrationConfigSchema = z
  .object({
    URL: z.string().url(),
    CustomerKey: z.string().min(1),
    CustomerSecret: z.string().min(1),
    RememberMeToken: z.string().min(1),
  })
  .transform((settings) => ({
    url: settings.URL.replace(/\/+$/, ''),
    customerKey: settings.CustomerKey,
    customerSecret: settings.CustomerSecret,
    rememberMeToken: settings.RememberMeToken,
  }));
export type RegistrationConfig = z.output<typeof RegistrationConfigSchema>;

/**
 * `unreadable`: the file could not be read (absent, not yet written).
 * `invalid`: the file was read but lacks a setting.
 */
export class CredentialsError extends Error {
  readonly reason: 'unreadable' | 'invalid';

  constructor(reason: 'unreadable' | 'invalid', message: string) {
    super(message);
    this.name = 'CredentialsError';
    this.reason = reason;
  }
}

export interface LoadCredentialsOptions {
  attempts?: number;
  backoffMs?: number;
  clock?: Clock;
  signal?: AbortSignal;
  logger?: Logger;
}

// ═══════════════════════════════════════════════════════════════════════════
// PARSING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Collect the string settings of a credentials file.
 * Comment lines and settings that are not quoted strings are skipped.
 */
export function parseSettings(text: string): Record<string, string> {
  const settings: Record<string, string> = {};

  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#') || trimmed.startsWith('//')) continue;

    const match = SETTING_PATTERN.exec(trimmed);
    if (match) {
      settings[match[1]] = match[2].replace(/\\(["\\])/g, '$1');
    }
  }

  return settings;
}

export function parseRegistrationConfig(text: string): Result<RegistrationConfig, CredentialsError> {
  const result = RegistrationConfigSchema.safeParse(parseSettings(text));
  if (!result.success) {
    const keys = result.error.issues.map((issue) => issue.path.join('.')).join(', ');
    return err(new CredentialsError('invalid', `Credentials file lacks valid settings: ${keys}`));
  }
  return ok(result.data);
}

// ═══════════════════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Read the credentials, waiting for the provisioning tool to write the file.
 * Only an unreadable file is retried; a file with missing settings fails at once.
 */
export async function loadRegistrationConfig(
  path: string = DEFAULT_CREDENTIALS_PATH,
  options: LoadCredentialsOptions = {},
): Promise<Result<RegistrationConfig, CredentialsError>> {
  const log = options.logger ?? createLogger('Credentials');

  const result = await retry(
    async (): Promise<Result<RegistrationConfig, CredentialsError>> => {
      let text: string;
      try {
        text = await readFile(path, 'utf-8');
      } catch (error) {
        return err(new CredentialsError('unreadable', `Cannot read ${path}: ${toError(error).message}`));
      }
      return parseRegistrationConfig(text);
    },
    {
      attempts: options.attempts ?? DEFAULT_CREDENTIALS_READ_ATTEMPTS,
      backoffMs: options.backoffMs ?? DEFAULT_CREDENTIALS_READ_BACKOFF_MS,
      clock: options.clock,
      signal: options.signal,
      shouldRetry: (error) => error.reason === 'unreadable',
      onRetry: () => log.info('Waiting for config data'),
    },
  );

  if (!result.ok) {
    const summary = result.error.reason === 'unreadable' ? 'Failed to read config file' : 'Failed to read config data';
    log.error(`${summary}:`, result.error.message);
  }
  return result;
}
