/**
 * Environment helpers bound to a ServiceContext.
 *
 * Every key is looked up under the context's prefix, so a service named
 * "api" in namespace "shop" reads `PORT` from `SHOP_API_PORT`.
 */

import type { z } from 'zod';
import type { ServiceContext } from './context.js';
import { ConfigError } from './errors/index.js';

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Normalize a string into a POSIX-safe environment key: accents folded to
 * their base letter, uppercase, each run of other characters collapsed to a
 * single underscore, no leading or trailing underscores.
 *
 * @example normalizeEnvKey('my-Énv.key') // 'MY_ENV_KEY'
 */
export function normalizeEnvKey(name: string): string {
  return name
    .normalize('NFD')
    .replace(/\p{Mn}/gu, '')
    .replace(/[^A-Za-z0-9]+/g, '_')
    .toUpperCase()
    .replace(/^_+|_+$/g, '');
}

/** Full environment key for `key` under `prefix`. */
export function envKey(prefix: string, key: string): string {
  return normalizeEnvKey(prefix ? `${prefix}_${key}` : key);
}

/** Value of `key` under the context prefix, or '' when unset. */
export function getEnv(ctx: ServiceContext, key: string, env: Env = process.env): string {
  return env[envKey(ctx.envPrefix, key)] ?? '';
}

/** Like getEnv, but distinguishes an unset variable (undefined) from an empty one. */
export function lookupEnv(
  ctx: ServiceContext,
  key: string,
  env: Env = process.env,
): string | undefined {
  return env[envKey(ctx.envPrefix, key)];
}

/**
 * Parse every variable under the context prefix through `schema`. Keys are
 * passed to the schema with the prefix stripped and are not normalized.
 * Throws ConfigError listing each invalid key.
 */
export function loadEnv<S extends z.ZodTypeAny>(
  ctx: ServiceContext,
  schema: S,
  env: Env = process.env,
): z.output<S> {
  const lead = ctx.envPrefix ? `${ctx.envPrefix}_` : '';
  const scoped: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value === undefined || !key.startsWith(lead)) continue;
    scoped[key.slice(lead.length)] = value;
  }

  const result = schema.safeParse(scoped);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${lead}${issue.path.join('.')}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid environment configuration:\n  ${issues.join('\n  ')}`, {
      prefix: ctx.envPrefix,
      issues,
    });
  }
  return result.data;
}
