/**
 * Command-line options, config file loading and logging setup for the
 * ledbridge-gateway command.
 */

import { appendFileSync, writeFileSync } from 'fs';
import { readFile } from 'fs/promises';
import { inspect } from 'util';
import { createConsola } from 'consola';
import type { ConsolaInstance, ConsolaReporter, LogObject } from 'consola';
import { z } from 'zod';
import { GatewayConfigSchema } from '@ledbridge/gateway';
import type { GatewayConfig } from '@ledbridge/gateway';
import { err, ok, toError } from '@ledbridge/types';
import type { Logger, Result } from '@ledbridge/types';

// ═══════════════════════════════════════════════════════════════════════════
// VERBOSITY
// ═══════════════════════════════════════════════════════════════════════════

export const DEFAULT_VERBOSITY = 4;

/**
 * -v 1..5 (fatal, error, warning, info, debug) onto consola levels.
 */
const CONSOLA_LEVELS: Record<number, number> = {
  1: 0,
  2: 0,
  3: 1,
  4: 3,
  5: 4,
};

export function toConsolaLevel(verbosity: number): number {
  return CONSOLA_LEVELS[verbosity] ?? CONSOLA_LEVELS[DEFAULT_VERBOSITY] ?? 3;
}

// ═══════════════════════════════════════════════════════════════════════════
// ARGUMENTS
// ═══════════════════════════════════════════════════════════════════════════

const VALUE_FLAGS = new Map<string, keyof RawCliArgs>([
  ['-l', 'log'],
  ['--log', 'log'],
  ['-v', 'verbosity'],
  ['--verbosity', 'verbosity'],
  ['-c', 'config'],
  ['--config', 'config'],
]);
const SWITCH_FLAGS = new Set(['-h', '--help']);

const CliArgsSchema = z.object({
  log: z.string().min(1, 'Log file path is empty').optional(),
  verbosity: z.coerce
    .number({ invalid_type_error: 'Verbosity must be a number' })
    .int('Verbosity must be an integer')
    .min(1, 'Verbosity must be between 1 and 5')
    .max(5, 'Verbosity must be between 1 and 5')
    .default(DEFAULT_VERBOSITY),
  config: z.string().min(1, 'Config file path is empty').optional(),
});

export interface CliOptions {
  logFile: string | undefined;
  verbosity: number;
  configPath: string | undefined;
}

export interface RawCliArgs {
  log?: string;
  verbosity?: string;
  config?: string;
}

/**
 * Collect flag values from the raw arguments. Values may follow as the next
 * argument, attach to a short flag (`-v5`) or follow `=` on a long one.
 */
export function scanArguments(rawArgs: readonly string[]): Result<RawCliArgs, string> {
  const args: RawCliArgs = {};
  for (let i = 0; i < rawArgs.length; i++) {
    const arg = rawArgs[i];
    if (SWITCH_FLAGS.has(arg)) continue;

    const [flag, attached] = splitFlag(arg);
    const key = VALUE_FLAGS.get(flag);
    if (!key) {
      return err(arg.startsWith('-') ? `Unknown option: ${arg}` : `Unexpected argument: ${arg}`);
    }

    const value = attached ?? rawArgs[++i];
    if (value === undefined) {
      return err(`Option ${flag} needs a value`);
    }
    args[key] = value;
  }
  return ok(args);
}

function splitFlag(arg: string): [string, string | undefined] {
  if (arg.startsWith('--')) {
    const eq = arg.indexOf('=');
    return eq === -1 ? [arg, undefined] : [arg.slice(0, eq), arg.slice(eq + 1)];
  }
  if (arg.startsWith('-') && arg.length > 2) {
    return [arg.slice(0, 2), arg.slice(2)];
  }
  return [arg, undefined];
}

export function parseCliOptions(rawArgs: readonly string[]): Result<CliOptions, string> {
  const scanned = scanArguments(rawArgs);
  if (!scanned.ok) {
    return scanned;
  }

  const parsed = CliArgsSchema.safeParse(scanned.value);
  if (!parsed.success) {
    return err(parsed.error.issues.map((issue) => issue.message).join('; '));
  }

  return ok({
    logFile: parsed.data.log,
    verbosity: parsed.data.verbosity,
    configPath: parsed.data.config,
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIG FILE
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Read a JSON gateway config. Missing keys take their defaults.
 */
export async function loadConfigFile(path: string): Promise<Result<GatewayConfig, string>> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    return err(`Cannot read config file ${path}: ${toError(error).message}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    return err(`Config file ${path} is not valid JSON: ${toError(error).message}`);
  }

  const parsed = GatewayConfigSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    return err(`Invalid config file ${path}: ${issues.join('; ')}`);
  }
  return ok(parsed.data);
}

// ═══════════════════════════════════════════════════════════════════════════
// LOGGING
// ═══════════════════════════════════════════════════════════════════════════

export type LogRecord = Pick<LogObject, 'date' | 'type' | 'tag' | 'args'>;

/** `ISO-timestamp [type] [tag] message` */
export function formatLogLine(record: LogRecord): string {
  const tag = record.tag ? ` [${record.tag}]` : '';
  const message = record.args
    .map((arg: unknown) => (typeof arg === 'string' ? arg : inspect(arg, { colors: false, breakLength: Infinity })))
    .join(' ');
  return `${record.date.toISOString()} [${record.type}]${tag} ${message}`;
}

/**
 * Reporter that appends every record to `path`. The file is truncated (or
 * created) up front; this throws if it cannot be.
 */
export function createFileReporter(path: string): ConsolaReporter {
  writeFileSync(path, '');
  return {
    log: (logObj) => {
      appendFileSync(path, `${formatLogLine(logObj)}\n`);
    },
  };
}

export interface CliLogging {
  consola: ConsolaInstance;
  loggerFor: (component: string) => Logger;
}

export function createCliLogging(options: Pick<CliOptions, 'verbosity' | 'logFile'>): CliLogging {
  const instance = createConsola({ level: toConsolaLevel(options.verbosity) });

  if (options.logFile) {
    try {
      instance.setReporters([createFileReporter(options.logFile)]);
    } catch (error) {
      instance.error(`Cannot open log file ${options.logFile}:`, toError(error).message);
    }
  }

  return {
    consola: instance,
    loggerFor: (component) => toLogger(instance.withTag(component)),
  };
}

function toLogger(instance: ConsolaInstance): Logger {
  return {
    info: (msg, ...args) => instance.info(msg, ...args),
    warn: (msg, ...args) => instance.warn(msg, ...args),
    error: (msg, ...args) => instance.error(msg, ...args),
    debug: (msg, ...args) => instance.debug(msg, ...args),
  };
}
