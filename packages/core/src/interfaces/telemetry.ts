/**
 * Telemetry contract
 *
 * The supervisor treats telemetry as a black box: an initializer decorates the
 * service context with tracer / meter / propagator handles and hands back a
 * shutdown hook that runs once the supervision loop exits.
 */

import type {
  Meter,
  MeterProvider,
  TextMapPropagator,
  Tracer,
  TracerProvider,
} from '@opentelemetry/api';
import type { ServiceContext } from '../context.js';

export interface TelemetryHandles {
  tracerProvider: TracerProvider;
  tracer: Tracer;
  meterProvider: MeterProvider;
  meter: Meter;
  propagator: TextMapPropagator;
}

export interface TelemetrySession {
  context: ServiceContext;
  shutdown: () => Promise<void>;
}

export type TelemetryInitializer = (ctx: ServiceContext) => Promise<TelemetrySession>;
