/**
 * Options snapshot for one supervised service.
 *
 * Resolution order: defaults, then caller overrides, then environment
 * overrides read under the service's prefix. The result is frozen.
 */

import { z } from 'zod';
import {
  createContext,
  loadEnv,
  normalizeEnvKey,
  parseDuration,
  withEnvPrefix,
  type ServiceIdentity,
} from '@keeper/core';
import type { LoggerOptions } from '@keeper/observability';

type Env = Readonly<Record<string, string | undefined>>;

export interface ServiceOptions extends LoggerOptions {
  restartOnError: boolean;
  restartOnErrorDelayMs: number;
  restartOnPanic: boolean;
  /** Delay after a panic. 0 falls back to restartOnErrorDelayMs. */
  restartOnPanicDelayMs: number;
  recoverPanic: boolean;
  /** Wall-clock ceiling on restarts, from the first attempt. 0 = unlimited. */
  gracePeriodMs: number;
  /** Restarts allowed after the first attempt. 0 = unlimited. */
  graceCount: number;
  /** Upper bound on a single close, and on waiting for siblings in a group. */
  shutdownTimeoutMs: number;
  /** Explicit env prefix. Empty derives one from namespace and name. */
  envPrefix: string;
  disableEnvPrefix: boolean;
}

export const DEFAULT_OPTIONS: Readonly<ServiceOptions> = Object.freeze({
  restartOnError: true,
  restartOnErrorDelayMs: 10_000,
  restartOnPanic: true,
  restartOnPanicDelayMs: 0,
  recoverPanic: true,
  gracePeriodMs: 60_000,
  graceCount: 3,
  shutdownTimeoutMs: 30_000,
  logLevel: 'info',
  logDebug: false,
  logJson: true,
  logColors: false,
  logAutoColors: true,
  envPrefix: '',
  disableEnvPrefix: false,
});

const OPTION_KEYS = [
  'restartOnError',
  'restartOnErrorDelayMs',
  'restartOnPanic',
  'restartOnPanicDelayMs',
  'recoverPanic',
  'gracePeriodMs',
  'graceCount',
  'shutdownTimeoutMs',
  'logLevel',
  'logDebug',
  'logJson',
  'logColors',
  'logAutoColors',
  'envPrefix',
  'disableEnvPrefix',
] as const satisfies ReadonlyArray<keyof ServiceOptions>;

// ── Environment schema ───────────────────────────────────────────────────

const TRUE_VALUES = new Set(['1', 't', 'true']);
const FALSE_VALUES = new Set(['0', 'f', 'false']);

/** Treats an empty variable as unset. */
function optionalVar<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === '' ? undefined : value), schema.optional());
}

const booleanVar = z.string().transform((raw, ctx) => {
  const value = raw.trim().toLowerCase();
  if (TRUE_VALUES.has(value)) return true;
  if (FALSE_VALUES.has(value)) return false;
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message: 'expected a boolean (1, t, true, 0, f, false)',
  });
  return z.NEVER;
});

const durationVar = z.string().transform((raw, ctx) => {
  const ms = parseDuration(raw);
  if (ms !== undefined) return ms;
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message: 'expected a duration such as 250ms, 1m30s or a number of milliseconds',
  });
  return z.NEVER;
});

const countVar = z
  .string()
  .trim()
  .regex(/^\d+$/, 'expected a non-negative integer')
  .transform(Number);

const levelVar = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(
    z.enum(['debug', 'info', 'warn', 'error'], {
      errorMap: () => ({ message: 'expected one of debug, info, warn, error' }),
    }),
  );

export const OPTIONS_ENV_SCHEMA = z.object({
  RESTART_ON_ERROR: optionalVar(booleanVar),
  RESTART_ON_ERROR_DELAY: optionalVar(durationVar),
  RESTART_ON_PANIC: optionalVar(booleanVar),
  RESTART_ON_PANIC_DELAY: optionalVar(durationVar),
  RECOVER_PANIC: optionalVar(booleanVar),
  GRACE_PERIOD: optionalVar(durationVar),
  GRACE_COUNT: optionalVar(countVar),
  SHUTDOWN_TIMEOUT: optionalVar(durationVar),
  LOG_LEVEL: optionalVar(levelVar),
  LOG_DEBUG: optionalVar(booleanVar),
  LOG_JSON: optionalVar(booleanVar),
  LOG_COLORS: optionalVar(booleanVar),
  LOG_COLORS_AUTO: optionalVar(booleanVar),
});

// ── Resolution ───────────────────────────────────────────────────────────

function definedOnly(source: Partial<ServiceOptions>): Partial<ServiceOptions> {
  const picked: Partial<ServiceOptions> = {};
  const copy = <K extends keyof ServiceOptions>(key: K) => {
    if (source[key] !== undefined) picked[key] = source[key];
  };
  for (const key of OPTION_KEYS) copy(key);
  return picked;
}

/**
 * Environment prefix for a service, normalized and without the trailing
 * underscore: '' when disabled, the explicit prefix when set, otherwise
 * `<namespace>_<name>`.
 */
export function derivePrefix(
  identity: Pick<ServiceIdentity, 'name' | 'namespace'>,
  options: Pick<ServiceOptions, 'envPrefix' | 'disableEnvPrefix'>,
): string {
  if (options.disableEnvPrefix) return '';
  if (options.envPrefix) return normalizeEnvKey(options.envPrefix);
  const parts = identity.namespace ? [identity.namespace, identity.name] : [identity.name];
  return normalizeEnvKey(`${parts.join('_')}_`);
}

/**
 * Build the options snapshot for one service. Throws ConfigError listing every
 * environment variable that does not parse.
 */
export function resolveOptions(
  identity: Pick<ServiceIdentity, 'name' | 'namespace'>,
  overrides: Partial<ServiceOptions> = {},
  env: Env = process.env,
): Readonly<ServiceOptions> {
  const base: ServiceOptions = { ...DEFAULT_OPTIONS, ...definedOnly(overrides) };
  const prefix = derivePrefix(identity, base);

  const vars = loadEnv(withEnvPrefix(createContext(), prefix), OPTIONS_ENV_SCHEMA, env);

  return Object.freeze({
    ...base,
    ...definedOnly({
      restartOnError: vars.RESTART_ON_ERROR,
      restartOnErrorDelayMs: vars.RESTART_ON_ERROR_DELAY,
      restartOnPanic: vars.RESTART_ON_PANIC,
      restartOnPanicDelayMs: vars.RESTART_ON_PANIC_DELAY,
      recoverPanic: vars.RECOVER_PANIC,
      gracePeriodMs: vars.GRACE_PERIOD,
      graceCount: vars.GRACE_COUNT,
      shutdownTimeoutMs: vars.SHUTDOWN_TIMEOUT,
      logLevel: vars.LOG_LEVEL,
      logDebug: vars.LOG_DEBUG,
      logJson: vars.LOG_JSON,
      logColors: vars.LOG_COLORS,
      logAutoColors: vars.LOG_COLORS_AUTO,
    }),
    envPrefix: prefix,
  });
}
