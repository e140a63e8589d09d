import { vi } from 'vitest';
import { pino } from 'pino';
import {
  ConfigError,
  FatalError,
  ServiceError,
  TelemetryError,
  ValidationError,
  withTelemetry,
  type Service,
  type ServiceContext,
  type TelemetryInitializer,
} from '@keeper/core';
import { noopTelemetry } from '@keeper/observability';
import { runService, runServices, validateServices, type RunOptions } from './group.js';

function captureLogger() {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino(
    {
      level: 'debug',
      base: null,
      timestamp: false,
      formatters: { level: (label) => ({ level: label }) },
    },
    {
      write(msg: string) {
        lines.push(JSON.parse(msg) as Record<string, unknown>);
      },
    },
  );
  return { logger, lines };
}

function makeService(name: string, namespace = 'shop', overrides: Partial<Service> = {}): Service {
  return {
    name: () => name,
    namespace: () => namespace,
    version: () => '1.0.0',
    init: vi.fn(async () => {}),
    run: vi.fn(async () => {}),
    close: vi.fn(async () => {}),
    ...overrides,
  };
}

/** A run that blocks until the context is cancelled. */
function blockingRun() {
  return vi.fn(
    (ctx: ServiceContext) =>
      new Promise<void>((_resolve, reject) => {
        const stop = () => reject(ctx.signal.reason);
        if (ctx.signal.aborted) stop();
        else ctx.signal.addEventListener('abort', stop, { once: true });
      }),
  );
}

describe('validateServices', () => {
  it('rejects an empty group', () => {
    expect(() => validateServices([])).toThrow('invalid services: no services given');
  });

  it('accepts distinct identities', () => {
    expect(() =>
      validateServices([makeService('api'), makeService('worker'), makeService('api', 'admin')]),
    ).not.toThrow();
  });

  it('collects every problem into one error', () => {
    let caught: unknown;
    try {
      validateServices([
        makeService('api'),
        makeService('', ''),
        makeService('api'),
        makeService('worker', ''),
      ]);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    if (!(caught instanceof ValidationError)) return;
    expect(caught.issues).toEqual([
      'service #1: name cannot be empty',
      'service #1: namespace cannot be empty',
      'service #2: duplicate of service #0 (shop/api)',
      'service #3: namespace cannot be empty',
    ]);
  });
});

describe('runServices', () => {
  let logger: ReturnType<typeof captureLogger>['logger'];
  let lines: Array<Record<string, unknown>>;
  let options: RunOptions;

  beforeEach(() => {
    const captured = captureLogger();
    logger = captured.logger;
    lines = captured.lines;
    options = {
      telemetry: noopTelemetry,
      env: {},
      handleSignals: false,
      logger,
      restartOnErrorDelayMs: 0,
    };
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('before start', () => {
    it('starts nothing when validation fails', async () => {
      const service = makeService('api');

      await expect(runServices([service, makeService('api')], options)).rejects.toBeInstanceOf(
        ValidationError,
      );
      expect(service.init).not.toHaveBeenCalled();
    });

    it('starts nothing when an environment override is invalid', async () => {
      const telemetry = vi.fn(noopTelemetry);
      const api = makeService('api');
      const worker = makeService('worker');

      const err = await runServices([api, worker], {
        ...options,
        telemetry,
        env: { SHOP_WORKER_GRACE_COUNT: 'many' },
      }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ConfigError);
      expect(err).toMatchObject({
        context: { issues: ['SHOP_WORKER_GRACE_COUNT: expected a non-negative integer'] },
      });
      expect(telemetry).not.toHaveBeenCalled();
      expect(api.init).not.toHaveBeenCalled();
    });

    it('shuts down initialized telemetry when a later member fails', async () => {
      const shutdown = vi.fn(async () => {});
      const telemetry: TelemetryInitializer = async (ctx) => {
        if (ctx.name === 'worker') throw new Error('exporter unreachable');
        return { context: ctx, shutdown };
      };
      const api = makeService('api');

      const err = await runServices([api, makeService('worker')], { ...options, telemetry }).catch(
        (e: unknown) => e,
      );

      expect(err).toBeInstanceOf(TelemetryError);
      expect(err).toMatchObject({
        message: 'failed to initialize telemetry',
        service: 'worker',
        fatal: true,
      });
      expect(shutdown).toHaveBeenCalledTimes(1);
      expect(api.init).not.toHaveBeenCalled();
    });
  });

  describe('context', () => {
    it('binds identity, env prefix and logger for each member', async () => {
      const seen: ServiceContext[] = [];
      const service = makeService('api', 'shop', {
        init: async (ctx) => {
          seen.push(ctx);
        },
      });

      await runService(service, options);

      const ctx = seen[0];
      expect(ctx).toMatchObject({
        name: 'api',
        namespace: 'shop',
        version: '1.0.0',
        envPrefix: 'SHOP_API',
      });
      expect(Object.isFrozen(ctx)).toBe(true);
      expect(lines.find((l) => l['msg'] === 'initializing service')).toEqual({
        level: 'debug',
        service: 'api',
        version: '1.0.0',
        namespace: 'shop',
        msg: 'initializing service',
      });
    });

    it('passes the telemetry context to the service and reuses it across retries', async () => {
      const propagator = { inject() {}, extract: <T>(c: T) => c, fields: () => ['x-test'] };
      const telemetry = vi.fn<TelemetryInitializer>(async (ctx) => ({
        context: withTelemetry(ctx, { propagator }),
        shutdown: async () => {},
      }));
      const seen: ServiceContext[] = [];
      let calls = 0;
      const service = makeService('api', 'shop', {
        run: async (ctx) => {
          seen.push(ctx);
          calls += 1;
          if (calls === 1) throw new Error('db down');
        },
      });

      await runService(service, { ...options, telemetry });

      expect(telemetry).toHaveBeenCalledTimes(1);
      expect(seen).toHaveLength(2);
      expect(seen[0]).toBe(seen[1]);
      expect(seen[0]?.telemetry.propagator.fields()).toEqual(['x-test']);
    });
  });

  describe('first result wins', () => {
    it('rejects with the first failure and cancels the siblings', async () => {
      const api = makeService('api', 'shop', {
        run: async () => {
          throw new FatalError('license expired');
        },
      });
      const worker = makeService('worker', 'shop', { run: blockingRun() });

      const err = await runServices([api, worker], options).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(ServiceError);
      expect(err).toMatchObject({ message: 'service run failed', service: 'api', fatal: true });
      expect(worker.close).toHaveBeenCalledTimes(1);
    });

    it('resolves when the first member finishes cleanly', async () => {
      const api = makeService('api');
      const worker = makeService('worker', 'shop', { run: blockingRun() });

      await expect(runServices([api, worker], options)).resolves.toBeUndefined();
      expect(worker.close).toHaveBeenCalledTimes(1);
    });

    it('stops every member when the caller aborts', async () => {
      const controller = new AbortController();
      const api = makeService('api', 'shop', { run: blockingRun() });
      const worker = makeService('worker', 'shop', { run: blockingRun() });

      const pending = runServices([api, worker], { ...options, signal: controller.signal });
      await vi.waitFor(() => expect(worker.run).toHaveBeenCalled());
      controller.abort();

      await expect(pending).resolves.toBeUndefined();
      expect(api.close).toHaveBeenCalledTimes(1);
      expect(worker.close).toHaveBeenCalledTimes(1);
    });

    it('does not start members when the caller signal is already aborted', async () => {
      const api = makeService('api');

      await runService(api, { ...options, signal: AbortSignal.abort() });

      expect(api.init).not.toHaveBeenCalled();
    });

    it('abandons siblings that overrun the shutdown timeout', async () => {
      vi.useFakeTimers();
      const api = makeService('api', 'shop', {
        run: async () => {
          throw new FatalError('license expired');
        },
      });
      const worker = makeService('worker', 'shop', { run: () => new Promise<void>(() => {}) });

      const result = runServices([api, worker], { ...options, shutdownTimeoutMs: 1_000 }).catch(
        (e: unknown) => e,
      );
      await vi.advanceTimersByTimeAsync(1_000);

      expect(await result).toBeInstanceOf(ServiceError);
      expect(
        lines.find((l) => l['msg'] === 'service did not stop within the shutdown timeout'),
      ).toMatchObject({ level: 'error', service: 'worker', timeout: '1s' });
    });
  });

  describe('telemetry shutdown', () => {
    it('runs once per member after the loops settle', async () => {
      const order: string[] = [];
      const telemetry: TelemetryInitializer = async (ctx) => ({
        context: ctx,
        shutdown: async () => {
          order.push(`shutdown:${ctx.name}`);
        },
      });
      const api = makeService('api', 'shop', {
        close: async () => {
          order.push('close:api');
        },
      });
      const worker = makeService('worker', 'shop', {
        run: blockingRun(),
        close: async () => {
          order.push('close:worker');
        },
      });

      await runServices([api, worker], { ...options, telemetry });

      expect(order.slice(0, 2).sort()).toEqual(['close:api', 'close:worker']);
      expect(order.slice(2).sort()).toEqual(['shutdown:api', 'shutdown:worker']);
    });

    it('logs shutdown failures without changing the result', async () => {
      const telemetry: TelemetryInitializer = async (ctx) => ({
        context: ctx,
        shutdown: async () => {
          throw new Error('flush failed');
        },
      });

      await expect(runService(makeService('api'), { ...options, telemetry })).resolves.toBeUndefined();
      expect(lines.find((l) => l['msg'] === 'telemetry shutdown failed')).toMatchObject({
        level: 'error',
        service: 'api',
        err: { message: 'flush failed' },
      });
    });
  });
});
