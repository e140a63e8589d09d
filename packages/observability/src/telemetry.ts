/**
 * OpenTelemetry initializer for supervised services.
 *
 * Builds a tracer provider and a meter provider per service, both carrying a
 * resource with the service name, version and namespace. Exporters follow the
 * standard OTEL_TRACES_EXPORTER / OTEL_METRICS_EXPORTER variables:
 *
 * - `otlp`: OTLP over HTTP (endpoint from the usual OTEL_EXPORTER_OTLP_* vars)
 * - `console`: print to stdout
 * - `none`: no exporter
 *
 * When a variable is unset the provider runs without an exporter and a
 * warning is logged. Providers are not registered globally; the handles only
 * travel through the service context.
 */

import { CompositePropagator, W3CTraceContextPropagator } from '@opentelemetry/core';
import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-http';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { Resource } from '@opentelemetry/resources';
import {
  ConsoleMetricExporter,
  MeterProvider,
  PeriodicExportingMetricReader,
  type MetricReader,
} from '@opentelemetry/sdk-metrics';
import {
  BasicTracerProvider,
  BatchSpanProcessor,
  ConsoleSpanExporter,
  type SpanExporter,
} from '@opentelemetry/sdk-trace-base';
import {
  ATTR_SERVICE_NAME,
  ATTR_SERVICE_VERSION,
  SEMRESATTRS_SERVICE_NAMESPACE,
} from '@opentelemetry/semantic-conventions';
import {
  INSTRUMENTATION_SCOPE,
  withTelemetry,
  type ServiceContext,
  type TelemetryInitializer,
  type TelemetrySession,
} from '@keeper/core';

type Env = Readonly<Record<string, string | undefined>>;

export interface TelemetryOptions {
  env?: Env;
  /** Export interval for periodic metric readers. Default 60 000. */
  metricExportIntervalMs?: number;
}

type ExporterKind = 'otlp' | 'console' | 'none' | 'unset';

// ── Exporter selection ─────────────────────────────────────────────────────

function exporterKind(env: Env, variable: string): ExporterKind {
  const raw = env[variable]?.split(',')[0]?.trim().toLowerCase() ?? '';
  switch (raw) {
    case '':
      return 'unset';
    case 'otlp':
    case 'console':
    case 'none':
      return raw;
    default:
      throw new Error(`unsupported ${variable} value "${raw}"`);
  }
}

function createSpanExporter(kind: ExporterKind): SpanExporter | undefined {
  switch (kind) {
    case 'otlp':
      return new OTLPTraceExporter();
    case 'console':
      return new ConsoleSpanExporter();
    default:
      return undefined;
  }
}

function createMetricReader(kind: ExporterKind, intervalMs: number): MetricReader | undefined {
  switch (kind) {
    case 'otlp':
      return new PeriodicExportingMetricReader({
        exporter: new OTLPMetricExporter(),
        exportIntervalMillis: intervalMs,
      });
    case 'console':
      return new PeriodicExportingMetricReader({
        exporter: new ConsoleMetricExporter(),
        exportIntervalMillis: intervalMs,
      });
    default:
      return undefined;
  }
}

// ── Initializers ───────────────────────────────────────────────────────────

/** Telemetry initializer backed by the OpenTelemetry SDK. */
export function createTelemetry(options: TelemetryOptions = {}): TelemetryInitializer {
  const env = options.env ?? process.env;
  const intervalMs = options.metricExportIntervalMs ?? 60_000;

  return async (ctx: ServiceContext): Promise<TelemetrySession> => {
    const tracesKind = exporterKind(env, 'OTEL_TRACES_EXPORTER');
    const metricsKind = exporterKind(env, 'OTEL_METRICS_EXPORTER');

    const resource = Resource.default().merge(
      new Resource({
        [ATTR_SERVICE_NAME]: ctx.name,
        [ATTR_SERVICE_VERSION]: ctx.version,
        [SEMRESATTRS_SERVICE_NAMESPACE]: ctx.namespace,
      }),
    );

    const tracerProvider = new BasicTracerProvider({ resource });
    const spanExporter = createSpanExporter(tracesKind);
    if (spanExporter) {
      tracerProvider.addSpanProcessor(new BatchSpanProcessor(spanExporter));
    } else if (tracesKind === 'unset') {
      ctx.logger.warn(
        'using a no-op OTEL span exporter. Set OTEL_TRACES_EXPORTER and related env vars as required',
      );
    }

    const metricReader = createMetricReader(metricsKind, intervalMs);
    const meterProvider = new MeterProvider({
      resource,
      readers: metricReader ? [metricReader] : [],
    });
    if (!metricReader && metricsKind === 'unset') {
      ctx.logger.warn(
        'using a no-op OTEL metric exporter. Set OTEL_METRICS_EXPORTER and related env vars as required',
      );
    }

    const context = withTelemetry(ctx, {
      tracerProvider,
      tracer: tracerProvider.getTracer(INSTRUMENTATION_SCOPE),
      meterProvider,
      meter: meterProvider.getMeter(INSTRUMENTATION_SCOPE),
      propagator: new CompositePropagator({
        propagators: [new W3CTraceContextPropagator()],
      }),
    });

    const shutdown = async (): Promise<void> => {
      const results = await Promise.allSettled([
        tracerProvider.shutdown(),
        meterProvider.shutdown(),
      ]);
      const failures: unknown[] = results.flatMap((r) => (r.status === 'rejected' ? [r.reason] : []));
      if (failures.length > 0) {
        throw new AggregateError(failures, 'OTEL shutdown failed');
      }
    };

    return { context, shutdown };
  };
}

/** Default initializer, reading exporters from process.env. */
export const initTelemetry: TelemetryInitializer = createTelemetry();

/** Leaves the context as it is; for tests and embedding. */
export const noopTelemetry: TelemetryInitializer = async (ctx) => ({
  context: ctx,
  shutdown: async () => {},
});
