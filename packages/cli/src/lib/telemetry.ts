/**
 * Metric lines on stderr, written only when TABLEDB_CLI_DEBUG=1
 *
 *   metric cli.select duration_ms=3 outcome=ok
 *   metric index table=users column=email hits=2 misses=0 hit_rate=1.00 p95_rebuild_ms=0.04 keys=2
 */

import { performance } from "node:perf_hooks";
import { TableDBError, type Database } from "@tabledb/sdk";
import { isVerbose } from "./env.js";
import { writeStderr } from "./io.js";

export type MetricValue = string | number | boolean;

const WHITESPACE = /\s+/g;

function metricPart(value: MetricValue): string {
  return String(value).trim().replace(WHITESPACE, "_");
}

export function formatMetric(key: string, fields: Record<string, MetricValue>): string {
  const parts = [`metric ${metricPart(key)}`];
  for (const [name, value] of Object.entries(fields)) {
    parts.push(`${metricPart(name)}=${metricPart(value)}`);
  }
  return parts.join(" ");
}

export function emitMetric(key: string, fields: Record<string, MetricValue>): void {
  if (!isVerbose()) return;
  writeStderr(formatMetric(key, fields) + "\n");
}

/**
 * "ok", the code of an engine error, or "error"
 */
export function outcomeOf(error?: unknown): string {
  if (error === undefined) return "ok";
  return error instanceof TableDBError ? error.code : "error";
}

/**
 * Run a command body and report its duration and outcome
 */
export async function timeCommand<T>(label: string, fn: () => Promise<T> | T): Promise<T> {
  const start = performance.now();
  let outcome = outcomeOf();

  try {
    return await fn();
  } catch (error) {
    outcome = outcomeOf(error);
    throw error;
  } finally {
    emitMetric(`cli.${label}`, {
      duration_ms: Math.round(performance.now() - start),
      outcome,
    });
  }
}

/**
 * One line per index touched during the command
 */
export function emitIndexMetrics(db: Database): void {
  if (!isVerbose()) return;

  for (const [key, metrics] of Object.entries(db.indexMetrics())) {
    const [table = key, column = ""] = key.split("/");
    emitMetric("index", {
      table,
      column,
      hits: metrics.hitCount,
      misses: metrics.missCount,
      hit_rate: metrics.hitRate.toFixed(2),
      p95_rebuild_ms: metrics.p95RebuildTimeMs.toFixed(2),
      keys: metrics.keys,
    });
  }
}
