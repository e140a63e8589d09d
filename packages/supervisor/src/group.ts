/**
 * Group orchestration: one supervision loop per service, all sharing one
 * AbortController. The first loop to settle decides the outcome for the whole
 * group; the rest are cancelled and given `shutdownTimeoutMs` to wind down.
 */

import {
  createContext,
  formatDuration,
  identityOf,
  TelemetryError,
  ValidationError,
  withEnvPrefix,
  withLogger,
  withName,
  withNamespace,
  withVersion,
  type Service,
  type ServiceContext,
  type ServiceIdentity,
  type TelemetryInitializer,
} from '@keeper/core';
import {
  createLogger,
  initTelemetry,
  serviceBindings,
  type Logger,
} from '@keeper/observability';
import { resolveOptions, type ServiceOptions } from './options.js';
import { ServiceSupervisor, type Clock } from './supervisor.js';

type Env = Readonly<Record<string, string | undefined>>;

export interface RunOptions extends Partial<ServiceOptions> {
  /** Aborting it stops every service in the group. */
  signal?: AbortSignal;
  /** Defaults to the OpenTelemetry initializer. */
  telemetry?: TelemetryInitializer;
  /** Parent logger; each service gets a child bound to its identity. */
  logger?: Logger;
  /** Source of environment overrides. Defaults to process.env. */
  env?: Env;
  /** Abort the group on SIGINT and SIGTERM. Default true. */
  handleSignals?: boolean;
  clock?: Clock;
}

interface Member {
  service: Service;
  identity: ServiceIdentity;
  options: Readonly<ServiceOptions>;
  ctx: ServiceContext;
}

interface Session extends Member {
  shutdown: () => Promise<void>;
}

interface LoopResult {
  member: Session;
  failed: boolean;
  error?: unknown;
}

const HANDLED_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

// ── Validation ───────────────────────────────────────────────────────────

/**
 * Check every identity before anything starts. All problems are reported
 * together in a single ValidationError.
 */
export function validateServices(services: readonly Service[]): void {
  if (services.length === 0) {
    throw new ValidationError('invalid services', ['no services given']);
  }

  const issues: string[] = [];
  const seen = new Map<string, number>();

  services.forEach((service, index) => {
    const { name, namespace } = identityOf(service);
    if (!name) issues.push(`service #${index}: name cannot be empty`);
    if (!namespace) issues.push(`service #${index}: namespace cannot be empty`);
    if (!name || !namespace) return;

    const key = `${namespace}/${name}`;
    const first = seen.get(key);
    if (first !== undefined) {
      issues.push(`service #${index}: duplicate of service #${first} (${key})`);
    } else {
      seen.set(key, index);
    }
  });

  if (issues.length > 0) {
    throw new ValidationError('invalid services', issues);
  }
}

// ── Entry points ─────────────────────────────────────────────────────────

/**
 * Supervise every service until the first one stops. Resolves when that
 * service finished cleanly (or the group was cancelled) and rejects with its
 * error otherwise.
 */
export async function runServices(
  services: readonly Service[],
  options: RunOptions = {},
): Promise<void> {
  validateServices(services);

  const controller = new AbortController();
  const env = options.env ?? process.env;
  const members = services.map((service) => prepare(service, options, env, controller.signal));

  const lead = members[0];
  const detach = lead
    ? linkSignals(controller, lead.ctx.logger, options.signal, options.handleSignals ?? true)
    : () => {};

  try {
    const sessions = await startTelemetry(members, options.telemetry ?? initTelemetry);
    try {
      await supervise(sessions, controller, options.clock);
    } finally {
      await stopTelemetry(sessions);
    }
  } finally {
    detach();
  }
}

/** Supervise a single service. */
export function runService(service: Service, options: RunOptions = {}): Promise<void> {
  return runServices([service], options);
}

// ── Internals ────────────────────────────────────────────────────────────

function prepare(
  service: Service,
  runOptions: RunOptions,
  env: Env,
  signal: AbortSignal,
): Member {
  const identity = identityOf(service);
  const options = resolveOptions(identity, runOptions, env);
  const logger = runOptions.logger
    ? runOptions.logger.child(serviceBindings(identity))
    : createLogger(options, identity);

  let ctx = createContext(signal);
  ctx = withName(ctx, identity.name);
  ctx = withNamespace(ctx, identity.namespace);
  ctx = withVersion(ctx, identity.version);
  ctx = withEnvPrefix(ctx, options.envPrefix);
  ctx = withLogger(ctx, logger);

  return { service, identity, options, ctx };
}

function linkSignals(
  controller: AbortController,
  logger: Logger,
  signal: AbortSignal | undefined,
  handleSignals: boolean,
): () => void {
  const cleanups: Array<() => void> = [];

  if (signal) {
    const onAbort = () => controller.abort(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
      cleanups.push(() => signal.removeEventListener('abort', onAbort));
    }
  }

  if (handleSignals) {
    for (const name of HANDLED_SIGNALS) {
      const onSignal = () => {
        logger.info({ signal: name }, 'received signal, shutting down');
        controller.abort();
      };
      process.once(name, onSignal);
      cleanups.push(() => process.removeListener(name, onSignal));
    }
  }

  return () => {
    for (const cleanup of cleanups) cleanup();
  };
}

async function startTelemetry(
  members: readonly Member[],
  telemetry: TelemetryInitializer,
): Promise<Session[]> {
  const sessions: Session[] = [];
  for (const member of members) {
    try {
      const session = await telemetry(member.ctx);
      sessions.push({ ...member, ctx: session.context, shutdown: session.shutdown });
    } catch (err) {
      await stopTelemetry(sessions);
      throw new TelemetryError('failed to initialize telemetry', member.identity.name, err);
    }
  }
  return sessions;
}

async function stopTelemetry(sessions: readonly Session[]): Promise<void> {
  await Promise.all(
    sessions.map(async (session) => {
      try {
        await session.shutdown();
      } catch (err) {
        session.ctx.logger.error({ err }, 'telemetry shutdown failed');
      }
    }),
  );
}

async function supervise(
  sessions: readonly Session[],
  controller: AbortController,
  clock: Clock | undefined,
): Promise<void> {
  const pending = new Set<Session>(sessions);

  const loops = sessions.map((member) =>
    new ServiceSupervisor(member.service, member.ctx, member.options, clock)
      .run()
      .then(
        (): LoopResult => ({ member, failed: false }),
        (error: unknown): LoopResult => ({ member, failed: true, error }),
      )
      .finally(() => {
        pending.delete(member);
      }),
  );

  const first = await Promise.race(loops);
  controller.abort();

  const waitMs = Math.max(...sessions.map((s) => s.options.shutdownTimeoutMs));
  if (!(await settleWithin(loops, waitMs))) {
    for (const straggler of pending) {
      straggler.ctx.logger.error(
        { timeout: formatDuration(waitMs) },
        'service did not stop within the shutdown timeout',
      );
    }
  }

  if (first.failed) throw first.error;
}

/** Whether every promise settled within `timeoutMs`. 0 waits indefinitely. */
async function settleWithin(promises: readonly Promise<unknown>[], timeoutMs: number): Promise<boolean> {
  const all = Promise.allSettled(promises).then(() => true);
  if (timeoutMs <= 0) return all;

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timedOut = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });
  try {
    return await Promise.race([all, timedOut]);
  } finally {
    clearTimeout(timer);
  }
}
