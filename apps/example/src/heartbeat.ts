/**
 * Heartbeat: a sample service that ticks on an interval until cancelled.
 *
 * Reads its settings from the environment under the service prefix
 * (`DEMO_HEARTBEAT_INTERVAL`, `DEMO_HEARTBEAT_FAIL_EVERY`) and records each
 * tick on a counter. With FAIL_EVERY set, every Nth tick fails the run so the
 * restart path can be watched.
 */

import { z } from 'zod';
import type { Counter } from '@opentelemetry/api';
import {
  loadEnv,
  parseDuration,
  sleep,
  type Service,
  type ServiceContext,
} from '@keeper/core';

const HeartbeatEnv = z.object({
  INTERVAL: z
    .string()
    .default('1s')
    .transform((raw, ctx) => {
      const ms = parseDuration(raw);
      if (ms !== undefined && ms > 0) return ms;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected a positive duration' });
      return z.NEVER;
    }),
  FAIL_EVERY: z.coerce.number().int().nonnegative().default(0),
});

export type HeartbeatConfig = z.output<typeof HeartbeatEnv>;

export class HeartbeatService implements Service {
  private readonly env: Readonly<Record<string, string | undefined>>;
  private config: HeartbeatConfig = { INTERVAL: 1_000, FAIL_EVERY: 0 };
  private ticks: Counter | undefined;
  private count = 0;

  constructor(env: Readonly<Record<string, string | undefined>> = process.env) {
    this.env = env;
  }

  name(): string {
    return 'heartbeat';
  }

  namespace(): string {
    return 'demo';
  }

  version(): string {
    return '0.1.0';
  }

  get tickCount(): number {
    return this.count;
  }

  async init(ctx: ServiceContext): Promise<void> {
    this.config = loadEnv(ctx, HeartbeatEnv, this.env);
    this.ticks = ctx.telemetry.meter.createCounter('heartbeat.ticks', {
      description: 'Heartbeats emitted',
    });
    ctx.logger.info({ interval_ms: this.config.INTERVAL }, 'heartbeat configured');
  }

  async run(ctx: ServiceContext): Promise<void> {
    for (;;) {
      await sleep(this.config.INTERVAL, ctx.signal);
      this.count += 1;
      this.ticks?.add(1);
      ctx.logger.info({ tick: this.count }, 'heartbeat');

      if (this.config.FAIL_EVERY > 0 && this.count % this.config.FAIL_EVERY === 0) {
        throw new Error(`simulated failure at tick ${this.count}`);
      }
    }
  }

  async close(ctx: ServiceContext): Promise<void> {
    ctx.logger.info({ ticks: this.count }, 'heartbeat stopped');
  }
}
