/**
 * @keeper/observability: logging and telemetry for supervised services.
 */

export { createLogger, serviceBindings } from './logger.js';
export type { Logger, LoggerOptions, LogLevel } from './logger.js';

export { createTelemetry, initTelemetry, noopTelemetry } from './telemetry.js';
export type { TelemetryOptions } from './telemetry.js';
