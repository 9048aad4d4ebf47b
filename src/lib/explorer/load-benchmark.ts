import pLimit from "p-limit";
import { silentLog, type DiagnosticSink } from "../diagnostics.js";
import type { ElementCache } from "./cache.js";
import type { Session } from "./session.js";
import { DEFAULT_EXPAND_CONCURRENCY } from "./tree.js";

/** Fewer cached ids than this make the comparison meaningless. */
export const MIN_BENCHMARK_IDS = 10;
export const DEFAULT_BENCHMARK_IDS = 50;

export interface LoadBenchmarkOptions {
  concurrency?: number;
  log?: DiagnosticSink;
  now?: () => number;
  onPass?: (pass: "sequential" | "parallel") => void;
}

export interface LoadBenchmarkResult {
  count: number;
  sequentialMs: number;
  parallelMs: number;
  /** Time saved by the parallel pass, as a percentage of the sequential time. */
  speedupPercent: number;
  failures: number;
}

/**
 * First `count` ids in cache order.
 */
export function sampleIds(cache: ElementCache, count = DEFAULT_BENCHMARK_IDS): string[] {
  const ids: string[] = [];
  for (const [id] of cache.entries()) {
    if (ids.length >= count) break;
    ids.push(id);
  }
  return ids;
}

export function speedupPercent(sequentialMs: number, parallelMs: number): number {
  return sequentialMs > 0 ? ((sequentialMs - parallelMs) / sequentialMs) * 100 : 0;
}

/**
 * Fetch `ids` twice, each time into a fresh session cache: once one after another,
 * once through a pool of `concurrency` requests. Failed fetches are logged and counted.
 */
export async function compareLoadPerformance(
  session: Session,
  ids: string[],
  options: LoadBenchmarkOptions = {}
): Promise<LoadBenchmarkResult> {
  const log = options.log ?? silentLog;
  const now = options.now ?? (() => Date.now());
  const concurrency = options.concurrency ?? DEFAULT_EXPAND_CONCURRENCY;
  let failures = 0;

  const load = async (cache: ElementCache, id: string): Promise<void> => {
    try {
      await cache.getOrFetch(id);
    } catch (error) {
      failures++;
      log.logError(`Benchmark load of ${id}`, error);
    }
  };

  options.onPass?.("sequential");
  const sequential = session.withCommit(session.commitId);
  const sequentialStart = now();
  for (const id of ids) {
    await load(sequential.cache, id);
  }
  const sequentialMs = now() - sequentialStart;

  options.onPass?.("parallel");
  const parallel = session.withCommit(session.commitId);
  const limit = pLimit(concurrency);
  const parallelStart = now();
  await Promise.all(ids.map((id) => limit(() => load(parallel.cache, id))));
  const parallelMs = now() - parallelStart;

  log.log(`Load benchmark: ${ids.length} elements, sequential ${sequentialMs}ms, parallel ${parallelMs}ms (pool ${concurrency})`);
  return {
    count: ids.length,
    sequentialMs,
    parallelMs,
    speedupPercent: speedupPercent(sequentialMs, parallelMs),
    failures,
  };
}
