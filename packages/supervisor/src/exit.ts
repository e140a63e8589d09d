/**
 * Entry points for a program's main module: supervise, and on failure print
 * the error and exit with status 1. A cancellation exits quietly with 0.
 */

import { isCancellation, type Service } from '@keeper/core';
import { runService, runServices, type RunOptions } from './group.js';
import { formatError } from './print.js';

export interface ExitHooks {
  exit?: (code: number) => void;
  write?: (text: string) => void;
}

export async function exitOnError(run: Promise<void>, hooks: ExitHooks = {}): Promise<void> {
  const exit = hooks.exit ?? ((code: number) => process.exit(code));
  const write = hooks.write ?? ((text: string) => process.stderr.write(text));

  try {
    await run;
  } catch (err) {
    if (isCancellation(err)) {
      exit(0);
      return;
    }
    write(`${formatError(err)}\n`);
    exit(1);
  }
}

export function runServiceAndExit(
  service: Service,
  options: RunOptions = {},
  hooks?: ExitHooks,
): Promise<void> {
  return exitOnError(runService(service, options), hooks);
}

export function runServicesAndExit(
  services: readonly Service[],
  options: RunOptions = {},
  hooks?: ExitHooks,
): Promise<void> {
  return exitOnError(runServices(services, options), hooks);
}
