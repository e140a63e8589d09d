/**
 * Supervision loop for a single service.
 *
 * Repeats init → run → close until the service finishes cleanly, fails with
 * something that cannot be retried, or exhausts its restart budget. The budget
 * has two independent ceilings measured from the first attempt: wall-clock
 * time (`gracePeriodMs`) and number of restarts (`graceCount`). Either set to
 * 0 removes that ceiling.
 *
 * A supervisor is single-use; create a fresh one for every run.
 */

import { EventEmitter } from 'node:events';
import {
  formatDuration,
  GraceExceededError,
  isCancellation,
  sleep,
  SupervisorStateError,
  toError,
  type GraceDimension,
  type KeeperError,
  type Service,
  type ServiceContext,
} from '@keeper/core';
import type { ServiceOptions } from './options.js';
import { runOnce, type AttemptPhase } from './run-once.js';

// ── Types ────────────────────────────────────────────────────────────────

export type SupervisionStatus =
  | 'idle'
  | AttemptPhase
  | 'deciding'
  | 'delaying'
  | 'stopped'
  | 'failed';

export interface SupervisionState {
  status: SupervisionStatus;
  /** Clock reading at the first attempt. */
  graceStart?: number;
  attempts: number;
  /** Retryable failures, counted against `graceCount`. */
  failures: number;
  /** Restarts decided so far; the first attempt is not a restart. */
  restarts: number;
  lastError?: KeeperError;
}

export interface SupervisorEvents {
  'service:attempt': [attempt: number];
  'service:failed': [error: KeeperError, panic: boolean];
  'service:restarting': [delayMs: number, restarts: number];
  'service:exhausted': [dimension: GraceDimension, error: GraceExceededError];
  'service:stopped': [error: Error | undefined];
}

export type Clock = () => number;

// ── Supervisor ───────────────────────────────────────────────────────────

export class ServiceSupervisor extends EventEmitter<SupervisorEvents> {
  private readonly service: Service;
  private readonly ctx: ServiceContext;
  private readonly options: Readonly<ServiceOptions>;
  private readonly clock: Clock;

  private readonly state: SupervisionState = {
    status: 'idle',
    attempts: 0,
    failures: 0,
    restarts: 0,
  };
  private started = false;

  constructor(
    service: Service,
    ctx: ServiceContext,
    options: Readonly<ServiceOptions>,
    clock: Clock = Date.now,
  ) {
    super();
    this.service = service;
    this.ctx = ctx;
    this.options = options;
    this.clock = clock;
  }

  getState(): SupervisionState {
    return { ...this.state };
  }

  /**
   * Supervise the service until it stops. Resolves on a clean finish or a
   * cancellation; rejects with the error that ended supervision.
   */
  async run(): Promise<void> {
    if (this.started) {
      throw new SupervisorStateError('supervisor already started', { service: this.ctx.name });
    }
    this.started = true;

    try {
      await this.loop();
    } catch (err) {
      this.state.status = 'failed';
      this.emit('service:stopped', toError(err));
      throw err;
    }

    this.state.status = 'stopped';
    this.emit('service:stopped', undefined);
  }

  // ── Loop ─────────────────────────────────────────────────────────────

  private async loop(): Promise<void> {
    const { ctx, options, state } = this;
    const graceStart = this.clock();
    state.graceStart = graceStart;

    for (;;) {
      if (ctx.signal.aborted) return;

      state.attempts += 1;
      this.emit('service:attempt', state.attempts);

      const outcome = await runOnce(this.service, ctx, options, (phase) => {
        state.status = phase;
      });
      const { error } = outcome;
      if (!error) return;

      state.status = 'deciding';
      state.lastError = error;
      this.emit('service:failed', error, outcome.panic);

      if (outcome.fatal || !options.restartOnError) throw error;

      state.failures += 1;

      const attrs: Record<string, unknown> = { err: error };
      if (options.gracePeriodMs > 0) {
        attrs['grace_period'] = formatDuration(options.gracePeriodMs);
      }
      if (options.graceCount > 0) {
        attrs['grace_count'] = options.graceCount;
        attrs['grace_count_remaining'] = options.graceCount - state.failures;
      }

      if (options.gracePeriodMs > 0 && this.clock() - graceStart > options.gracePeriodMs) {
        ctx.logger.error(attrs, 'service failed, exceeded grace period');
        throw this.exhausted('period', error);
      }

      if (options.graceCount > 0 && state.failures > options.graceCount) {
        ctx.logger.error(attrs, 'service failed, exceeded grace count');
        throw this.exhausted('count', error);
      }

      let delayMs = options.restartOnErrorDelayMs;
      if (outcome.panic) {
        if (!options.restartOnPanic) throw error;
        if (options.restartOnPanicDelayMs > 0) delayMs = options.restartOnPanicDelayMs;
      }
      attrs['restart_delay'] = formatDuration(delayMs);

      state.restarts += 1;

      this.emit('service:restarting', delayMs, state.restarts);

      if (delayMs <= 0) {
        ctx.logger.error(attrs, 'service failed, restarting immediately');
        continue;
      }

      ctx.logger.error(attrs, 'service failed, restarting after delay');
      state.status = 'delaying';
      try {
        await sleep(delayMs, ctx.signal);
      } catch (err) {
        if (isCancellation(err, ctx.signal)) return;
        throw err;
      }
    }
  }

  private exhausted(dimension: GraceDimension, cause: KeeperError): GraceExceededError {
    const error = new GraceExceededError(dimension, cause, {
      service: this.ctx.name,
      attempts: this.state.attempts,
      failures: this.state.failures,
      restarts: this.state.restarts,
    });
    this.emit('service:exhausted', dimension, error);
    return error;
  }
}
