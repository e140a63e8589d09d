/**
 * ServiceContext: the explicit, immutable record handed to every lifecycle
 * call. Each `with*` function returns a new frozen record layered over the
 * previous one; the input is never modified, so a subtree can override a
 * binding without the parent seeing it.
 */

import { metrics, trace, type TextMapPropagator } from '@opentelemetry/api';
import { pino, type Logger } from 'pino';
import type { TelemetryHandles } from './interfaces/telemetry.js';

/** Instrumentation scope used for default tracer and meter handles. */
export const INSTRUMENTATION_SCOPE = 'keeper/supervisor';

export interface ServiceContext {
  /** Aborts when the service (or its whole group) should stop. */
  readonly signal: AbortSignal;
  readonly name: string;
  readonly namespace: string;
  readonly version: string;
  /** Normalized environment prefix, without the trailing underscore. */
  readonly envPrefix: string;
  readonly logger: Logger;
  readonly telemetry: Readonly<TelemetryHandles>;
}

const SILENT_LOGGER: Logger = pino({ enabled: false });

const NOOP_PROPAGATOR: TextMapPropagator = {
  inject() {},
  extract(context) {
    return context;
  },
  fields() {
    return [];
  },
};

/** Handles backed by the global OpenTelemetry API (no-ops unless an SDK registered itself). */
export function defaultTelemetry(): TelemetryHandles {
  const tracerProvider = trace.getTracerProvider();
  const meterProvider = metrics.getMeterProvider();
  return {
    tracerProvider,
    tracer: tracerProvider.getTracer(INSTRUMENTATION_SCOPE),
    meterProvider,
    meter: meterProvider.getMeter(INSTRUMENTATION_SCOPE),
    propagator: NOOP_PROPAGATOR,
  };
}

export function createContext(signal: AbortSignal = new AbortController().signal): ServiceContext {
  return Object.freeze({
    signal,
    name: '',
    namespace: '',
    version: '',
    envPrefix: '',
    logger: SILENT_LOGGER,
    telemetry: Object.freeze(defaultTelemetry()),
  });
}

function decorate(ctx: ServiceContext, patch: Partial<ServiceContext>): ServiceContext {
  return Object.freeze({ ...ctx, ...patch });
}

// ── Identity ─────────────────────────────────────────────────────────────

export function withName(ctx: ServiceContext, name: string): ServiceContext {
  return name ? decorate(ctx, { name }) : ctx;
}

export function withNamespace(ctx: ServiceContext, namespace: string): ServiceContext {
  return namespace ? decorate(ctx, { namespace }) : ctx;
}

export function withVersion(ctx: ServiceContext, version: string): ServiceContext {
  return version ? decorate(ctx, { version }) : ctx;
}

export function withEnvPrefix(ctx: ServiceContext, envPrefix: string): ServiceContext {
  return decorate(ctx, { envPrefix });
}

// ── Ambient handles ──────────────────────────────────────────────────────

/** Binds a logger. Passing undefined keeps whatever logger is already bound. */
export function withLogger(ctx: ServiceContext, logger: Logger | undefined): ServiceContext {
  return logger ? decorate(ctx, { logger }) : ctx;
}

/**
 * Overrides telemetry handles. A provider given without its tracer or meter
 * gets one derived from it under the default instrumentation scope.
 */
export function withTelemetry(
  ctx: ServiceContext,
  handles: Partial<TelemetryHandles>,
): ServiceContext {
  const merged: TelemetryHandles = { ...ctx.telemetry, ...handles };
  if (handles.tracerProvider && !handles.tracer) {
    merged.tracer = handles.tracerProvider.getTracer(INSTRUMENTATION_SCOPE);
  }
  if (handles.meterProvider && !handles.meter) {
    merged.meter = handles.meterProvider.getMeter(INSTRUMENTATION_SCOPE);
  }
  return decorate(ctx, { telemetry: Object.freeze(merged) });
}

export function withSignal(ctx: ServiceContext, signal: AbortSignal): ServiceContext {
  return decorate(ctx, { signal });
}
