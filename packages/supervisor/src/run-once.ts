/**
 * One supervised attempt: init, run, close.
 *
 * Failures come back as an outcome rather than a rejection so the loop can
 * decide whether to restart. The only thing that escapes is a panic when
 * `recoverPanic` is off, rethrown as the raw value once close has run.
 */

import {
  formatDuration,
  isCancellation,
  isPanic,
  panicCause,
  PanicError,
  ServiceError,
  type KeeperError,
  type Service,
  type ServiceContext,
} from '@keeper/core';
import type { ServiceOptions } from './options.js';

export interface AttemptOutcome {
  /** Absent on a clean finish, including a cancelled run. */
  error?: KeeperError;
  fatal: boolean;
  panic: boolean;
}

export type AttemptPhase = 'init' | 'running' | 'closing';

type AttemptOptions = Pick<ServiceOptions, 'recoverPanic' | 'shutdownTimeoutMs'>;

/** A thrown panic value, boxed so `undefined` can be told apart from "none". */
interface Thrown {
  value: unknown;
}

const CLEAN: AttemptOutcome = Object.freeze({ fatal: false, panic: false });

function failed(error: KeeperError): AttemptOutcome {
  return { error, fatal: error.fatal, panic: false };
}

function recovered(thrown: Thrown, options: AttemptOptions, related?: Error): AttemptOutcome {
  if (!options.recoverPanic) throw thrown.value;
  return { error: new PanicError(panicCause(thrown.value), related), fatal: false, panic: true };
}

export async function runOnce(
  service: Service,
  ctx: ServiceContext,
  options: AttemptOptions,
  onPhase?: (phase: AttemptPhase) => void,
): Promise<AttemptOutcome> {
  const { logger } = ctx;

  onPhase?.('init');
  logger.debug('initializing service');
  try {
    await service.init(ctx);
  } catch (err) {
    if (isCancellation(err, ctx.signal)) return CLEAN;
    if (isPanic(err)) return recovered({ value: err }, options);
    return failed(new ServiceError('service initialization failed', ctx.name, 'init', err));
  }

  let runError: ServiceError | undefined;
  let runPanic: Thrown | undefined;

  onPhase?.('running');
  logger.debug('starting service');
  try {
    await service.run(ctx);
  } catch (err) {
    if (!isCancellation(err, ctx.signal)) {
      if (isPanic(err)) {
        runPanic = { value: err };
      } else {
        runError = new ServiceError('service run failed', ctx.name, 'run', err);
      }
    }
  }

  onPhase?.('closing');
  logger.debug('shutting down service');
  const closePanic = await closeService(service, ctx, options.shutdownTimeoutMs);

  if (runPanic) {
    if (closePanic) {
      logger.error({ err: panicCause(closePanic.value) }, 'service shutdown failed');
    }
    return recovered(runPanic, options);
  }
  if (closePanic) return recovered(closePanic, options, runError);
  return runError ? failed(runError) : CLEAN;
}

/**
 * Calls close, bounded by `timeoutMs` (0 waits indefinitely). Ordinary
 * failures are logged here; a panic is handed back to the caller.
 */
async function closeService(
  service: Service,
  ctx: ServiceContext,
  timeoutMs: number,
): Promise<Thrown | undefined> {
  const { logger } = ctx;
  const classify = (err: unknown): Thrown | undefined => {
    if (isPanic(err)) return { value: err };
    logger.error({ err }, 'service shutdown failed');
    return undefined;
  };

  const closing = Promise.resolve().then(() => service.close(ctx));

  if (timeoutMs <= 0) {
    try {
      await closing;
      return undefined;
    } catch (err) {
      return classify(err);
    }
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timedOut = new Promise<'timeout'>((resolve) => {
    timer = setTimeout(() => resolve('timeout'), timeoutMs);
  });

  try {
    const result = await Promise.race([closing.then(() => 'closed' as const), timedOut]);
    if (result === 'timeout') {
      logger.error({ timeout: formatDuration(timeoutMs) }, 'service shutdown timed out');
      closing.catch((err: unknown) => {
        logger.error({ err }, 'service shutdown failed');
      });
    }
    return undefined;
  } catch (err) {
    return classify(err);
  } finally {
    clearTimeout(timer);
  }
}
