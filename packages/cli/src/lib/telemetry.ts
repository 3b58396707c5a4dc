/**
 * Telemetry and observability helpers
 */

import { STAT_NAMES, type StatsSnapshot } from "@subdoc/sdk";
import { isVerbose } from "./env.js";
import { writeStderr } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Emit a metric to stderr if verbose mode is enabled
 */
export function emitMetric(
  key: string,
  fields: Record<string, unknown>,
  verbose: boolean = isVerbose()
): void {
  if (!verbose) {
    return;
  }

  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }

  writeStderr(parts.join(" ") + "\n");
}

/**
 * Engine counters that moved during one command
 */
export function statsDelta(before: StatsSnapshot, after: StatsSnapshot): Record<string, number> {
  const delta: Record<string, number> = {};
  for (const name of STAT_NAMES) {
    const change = after[name] - before[name];
    if (change !== 0) delta[name] = change;
  }
  return delta;
}

/**
 * Wrap an async function with timing metrics
 */
export async function withTiming<T>(
  label: string,
  fn: () => Promise<T>,
  verbose: boolean = isVerbose()
): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    const duration = Date.now() - start;
    emitMetric(
      label,
      {
        duration_ms: duration,
        success,
      },
      verbose
    );
  }
}
