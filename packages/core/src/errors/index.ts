/**
 * Error hierarchy for keeper.
 *
 * Every error raised by the supervisor carries a stable `code`, optional
 * structured `context`, and a `fatal` flag. Fatal errors end supervision
 * regardless of restart settings; everything else is eligible for a retry.
 */

import { inspect } from 'node:util';

export interface KeeperErrorOptions {
  cause?: unknown;
  fatal?: boolean;
}

export class KeeperError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;
  readonly fatal: boolean;

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>,
    options: KeeperErrorOptions = {},
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'KeeperError';
    this.code = code;
    this.context = context;
    this.fatal = options.fatal ?? false;
  }
}

// ─── Validation / configuration ─────────────────────────────────────────────

/** Service identities are missing or clash. Reported before anything starts. */
export class ValidationError extends KeeperError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[], context?: Record<string, unknown>) {
    super(
      issues.length > 0 ? `${message}: ${issues.join('; ')}` : message,
      'VALIDATION_ERROR',
      { ...context, issues: [...issues] },
      { fatal: true },
    );
    this.name = 'ValidationError';
    this.issues = [...issues];
  }
}

export class ConfigError extends KeeperError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context, { fatal: true });
    this.name = 'ConfigError';
  }
}

export class TelemetryError extends KeeperError {
  readonly service: string;

  constructor(message: string, service: string, cause: unknown) {
    super(message, 'TELEMETRY_ERROR', { service }, { cause, fatal: true });
    this.name = 'TelemetryError';
    this.service = service;
  }
}

// ─── Lifecycle failures ─────────────────────────────────────────────────────

export type ServicePhase = 'init' | 'run';

/**
 * Wraps a failure raised by a hosted service. Inherits fatality from its
 * cause, so a service can stop restarts by throwing a FatalError.
 */
export class ServiceError extends KeeperError {
  readonly service: string;
  readonly phase: ServicePhase;

  constructor(message: string, service: string, phase: ServicePhase, cause: unknown) {
    super(message, 'SERVICE_ERROR', { service, phase }, { cause, fatal: isFatal(cause) });
    this.name = 'ServiceError';
    this.service = service;
    this.phase = phase;
  }
}

/** A recovered panic. `cause` is the thrown value, `related` the attempt's prior error. */
export class PanicError extends KeeperError {
  override readonly cause: Error;
  readonly related?: Error;

  constructor(cause: Error, related?: Error) {
    super(`panic: ${cause.message}`, 'PANIC', related ? { related: related.message } : undefined, {
      cause,
    });
    this.name = 'PanicError';
    this.cause = cause;
    this.related = related;
  }
}

export type GraceDimension = 'period' | 'count';

export class GraceExceededError extends KeeperError {
  readonly dimension: GraceDimension;

  constructor(dimension: GraceDimension, cause: Error, context?: Record<string, unknown>) {
    super(`service failed, exceeded grace ${dimension}`, 'GRACE_EXCEEDED', { ...context, dimension }, {
      cause,
      fatal: true,
    });
    this.name = 'GraceExceededError';
    this.dimension = dimension;
  }
}

/** Thrown by services to end supervision without a restart. */
export class FatalError extends KeeperError {
  constructor(message: string, options: { cause?: unknown; context?: Record<string, unknown> } = {}) {
    super(message, 'FATAL', options.context, { cause: options.cause, fatal: true });
    this.name = 'FatalError';
  }
}

export class SupervisorStateError extends KeeperError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'SUPERVISOR_STATE', context, { fatal: true });
    this.name = 'SupervisorStateError';
  }
}

// ─── Panics ─────────────────────────────────────────────────────────────────

/** Carrier thrown by `panic()`. Lets a service panic with any value, Errors included. */
export class PanicSignal extends Error {
  readonly value: unknown;

  constructor(value: unknown) {
    super(describe(value));
    this.name = 'PanicSignal';
    this.value = value;
  }
}

export function panic(value: unknown): never {
  throw new PanicSignal(value);
}

const RUNTIME_FAULTS = [TypeError, ReferenceError, RangeError, EvalError, URIError] as const;

/**
 * Whether a thrown value counts as a panic rather than an ordinary failure:
 * an explicit `panic()`, a non-Error value, or a built-in runtime fault.
 */
export function isPanic(value: unknown): boolean {
  if (value instanceof PanicSignal) return true;
  if (!(value instanceof Error)) return true;
  return RUNTIME_FAULTS.some((fault) => value instanceof fault);
}

/** The Error a panic carries: passed through when it already is one, formatted otherwise. */
export function panicCause(value: unknown): Error {
  return toError(value instanceof PanicSignal ? value.value : value);
}

// ─── Helpers ────────────────────────────────────────────────────────────────

export function isFatal(err: unknown): boolean {
  return err instanceof KeeperError && err.fatal;
}

export function isRecoverable(err: unknown): boolean {
  return !isFatal(err);
}

/**
 * Whether `err` is a cancellation: the signal's own abort reason, or an
 * AbortError anywhere along the cause chain.
 */
export function isCancellation(err: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted && err === signal.reason) return true;

  let current: unknown = err;
  for (let depth = 0; depth < 16 && current !== undefined && current !== null; depth++) {
    if (typeof current !== 'object') return false;
    if ('name' in current && current.name === 'AbortError') return true;
    current = 'cause' in current ? current.cause : undefined;
  }
  return false;
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(describe(value));
}

function describe(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value instanceof Error) return value.message;
  return inspect(value);
}
