/**
 * Human-readable rendering of a final error: the error, each cause beneath
 * it, and the error a panic displaced. Stack frames from this package are
 * hidden by default so the trace points at the service's own code.
 */

import { inspect } from 'node:util';
import { KeeperError, PanicError } from '@keeper/core';

/** Returns true to keep a stack frame line. */
export type FrameFilter = (frame: string) => boolean;

const MAX_DEPTH = 16;

// Matched on function names, not paths: a bundler may inline this package
// into the same file as the service. A numeric suffix covers bundler renames.
const SUPERVISOR_FRAME =
  /^\s*at (?:async )?(?:new )?(?:ServiceSupervisor(?:\.\S+)?|(?:runOnce|closeService|runServices?|supervise|settleWithin|startTelemetry|stopTelemetry|exitOnError|runServiceAndExit|runServicesAndExit)\d*)(?: \(|$)/;

export const hideSupervisorFrames: FrameFilter = (frame) => !SUPERVISOR_FRAME.test(frame);

export const keepAllFrames: FrameFilter = () => true;

export function formatError(err: unknown, keepFrame: FrameFilter = hideSupervisorFrames): string {
  const sections: string[] = [];
  const seen = new Set<unknown>();

  let current: unknown = err;
  let label = '';
  while (current !== undefined && current !== null && !seen.has(current) && seen.size < MAX_DEPTH) {
    seen.add(current);
    sections.push(label + describe(current, keepFrame));

    if (current instanceof PanicError && current.related) {
      sections.push(`related: ${describe(current.related, keepFrame)}`);
    }

    current = current instanceof Error ? current.cause : undefined;
    label = 'caused by: ';
  }

  return sections.join('\n');
}

function describe(value: unknown, keepFrame: FrameFilter): string {
  if (!(value instanceof Error)) return inspect(value);

  const lines = [`${value.name}: ${value.message}`];
  if (value instanceof KeeperError && value.context) {
    lines.push(`    context: ${inspect(value.context, { breakLength: Infinity, depth: 4 })}`);
  }

  const frames = (value.stack ?? '')
    .split('\n')
    .filter((line) => /^\s+at /.test(line))
    .filter(keepFrame);
  return [...lines, ...frames].join('\n');
}
