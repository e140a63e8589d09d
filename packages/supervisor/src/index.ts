/**
 * @keeper/supervisor: restart-on-failure supervision for long-running services.
 *
 * Resolves per-service options, drives each service through init / run /
 * close with a bounded restart budget, and runs groups of services that
 * stop together.
 */

export * from './options.js';
export * from './run-once.js';
export * from './supervisor.js';
export * from './group.js';
export * from './print.js';
export * from './exit.js';
