/**
 * @keeper/core: contracts and shared primitives for keeper.
 *
 * Service contract, the immutable service context, the error hierarchy and
 * the environment helpers every other package builds on.
 */

export * from './errors/index.js';
export * from './interfaces/service.js';
export * from './interfaces/telemetry.js';
export * from './context.js';
export * from './env.js';
export * from './utils/duration.js';
export * from './utils/sleep.js';
