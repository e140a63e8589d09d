/**
 * The contract a supervised unit implements.
 *
 * Identity accessors are read on every attempt and must be stable. The three
 * lifecycle methods run strictly in order for each attempt: init, run, close.
 */

import type { ServiceContext } from '../context.js';

export interface ServiceIdentity {
  name: string;
  namespace: string;
  version: string;
}

export interface Service {
  name(): string;
  namespace(): string;
  /** Advisory; SemVer or CalVer. */
  version(): string;

  /**
   * Per-attempt setup. Called again on every restart, so it must tolerate
   * repetition. A rejection aborts the attempt before `run`.
   */
  init(ctx: ServiceContext): Promise<void>;

  /**
   * Main body. Should settle only when `ctx.signal` aborts or the service
   * fails. Rejecting with the abort reason counts as a clean stop.
   */
  run(ctx: ServiceContext): Promise<void>;

  /** Best-effort teardown. Called after every `run`, even a failed one. */
  close(ctx: ServiceContext): Promise<void>;
}

export function identityOf(service: Service): ServiceIdentity {
  return {
    name: service.name(),
    namespace: service.namespace(),
    version: service.version(),
  };
}
