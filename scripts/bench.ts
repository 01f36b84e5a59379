import { performance } from 'node:perf_hooks';
import { BenchmarkAbortedError, ConfigError, EmptyBenchmarkError } from './errors.js';

/**
 * `single`: every request goes to one adapter.
 * `random`: each adapter gets its own share of the budget and every request
 * picks uniformly among the adapters that still have budget left.
 */
export type TrafficMode = 'single' | 'random';

/**
 * What a failed call does: `record` spends the slot and counts a failure,
 * `retry` re-issues the call up to `maxRetries` times before recording it,
 * `abort` stops handing out work and rejects the run.
 */
export type FailurePolicy = 'record' | 'retry' | 'abort';

/** `truncate` gives every adapter floor(T/A); `distribute` spreads T mod A over the first adapters. */
export type RemainderPolicy = 'truncate' | 'distribute';

export type Invoker = (adapterId: string, signal: AbortSignal) => Promise<unknown>;

export interface BenchmarkConfig {
  totalRequests: number;
  adapterCount: number;
  workers: number;
  mode: TrafficMode;
  /** Defaults to "1".."adapterCount". */
  adapterIds?: readonly string[];
  /** Target of single mode, defaults to the first adapter id. Rejected in random mode. */
  adapterId?: string;
  failurePolicy?: FailurePolicy;
  maxRetries?: number;
  /** Per-call timeout; a call that exceeds it fails. */
  timeoutMs?: number;
  remainder?: RemainderPolicy;
  random?: () => number;
  now?: () => number;
}

export interface BenchmarkStats {
  mode: TrafficMode;
  totalRequests: number;
  workers: number;
  calls: number;
  failures: number;
  durationMs: number;
  meanLatencyMs: number;
  p50LatencyMs: number;
  p99LatencyMs: number;
  throughputRps: number;
  /** Budget slots consumed per adapter, successful or not. */
  perAdapter: Record<string, number>;
  latenciesMs: number[];
}

const isCount = (value: number, min: number): boolean => Number.isInteger(value) && value >= min;

export function adapterIdsFor(count: number): string[] {
  return Array.from({ length: count }, (_, i) => String(i + 1));
}

/**
 * Budget per adapter at the start of a run. In random mode each adapter gets
 * floor(T/A), so with `truncate` a run may execute fewer than T requests.
 */
export function initialBudget(config: BenchmarkConfig): Map<string, number> {
  const ids = config.adapterIds ?? adapterIdsFor(config.adapterCount);
  if (config.mode === 'single') {
    const target = config.adapterId ?? ids[0];
    if (target === undefined) {
      throw new ConfigError('adapterId', 'single mode needs an adapter id');
    }
    return new Map([[target, config.totalRequests]]);
  }

  const share = Math.floor(config.totalRequests / ids.length);
  const extra = config.remainder === 'distribute' ? config.totalRequests % ids.length : 0;
  return new Map(ids.map((id, i): [string, number] => [id, share + (i < extra ? 1 : 0)]));
}

export function validateConfig(config: BenchmarkConfig): void {
  if (!isCount(config.totalRequests, 0)) {
    throw new ConfigError('totalRequests', `expected a non-negative integer, got ${config.totalRequests}`);
  }
  if (!isCount(config.workers, 1)) {
    throw new ConfigError('workers', `expected a positive integer, got ${config.workers}`);
  }
  const ids = config.adapterIds ?? adapterIdsFor(config.adapterCount);
  if (!config.adapterIds && !isCount(config.adapterCount, 1)) {
    throw new ConfigError('adapterCount', `expected a positive integer, got ${config.adapterCount}`);
  }
  if (ids.length === 0 || new Set(ids).size !== ids.length) {
    throw new ConfigError('adapterIds', 'expected at least one id and no duplicates');
  }
  if (config.mode === 'random' && config.adapterId !== undefined) {
    throw new ConfigError('adapterId', 'only applies to single mode');
  }
  if (config.maxRetries !== undefined && !isCount(config.maxRetries, 0)) {
    throw new ConfigError('maxRetries', `expected a non-negative integer, got ${config.maxRetries}`);
  }
  if (config.timeoutMs !== undefined && !(config.timeoutMs > 0)) {
    throw new ConfigError('timeoutMs', `expected a positive number, got ${config.timeoutMs}`);
  }
}

/**
 * Shared remaining-budget counters. `claim` checks eligibility and decrements
 * in one synchronous step; there is no await between the two, so concurrent
 * workers can never both take the last unit.
 */
export class WorkDispatcher {
  private readonly counters: Map<string, number>;
  private closed = false;

  constructor(
    budget: ReadonlyMap<string, number>,
    private readonly random: () => number = Math.random,
  ) {
    this.counters = new Map(budget);
  }

  claim(): string | null {
    if (this.closed) return null;
    const eligible: Array<[string, number]> = [];
    for (const entry of this.counters) {
      if (entry[1] > 0) eligible.push(entry);
    }
    if (eligible.length === 0) return null;

    const index = Math.min(eligible.length - 1, Math.floor(this.random() * eligible.length));
    const [id, left] = eligible[index];
    this.counters.set(id, left - 1);
    return id;
  }

  remaining(): number {
    let total = 0;
    for (const left of this.counters.values()) total += left;
    return total;
  }

  remainingFor(adapterId: string): number {
    return this.counters.get(adapterId) ?? 0;
  }

  close(): void {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}

export async function callWithTimeout(
  invoke: Invoker,
  adapterId: string,
  timeoutMs?: number,
): Promise<void> {
  const controller = new AbortController();
  if (timeoutMs === undefined) {
    await invoke(adapterId, controller.signal);
    return;
  }
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new Error(`call to adapter ${adapterId} timed out after ${timeoutMs}ms`);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });
  try {
    await Promise.race([invoke(adapterId, controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export function meanLatency(latencies: readonly number[]): number {
  if (latencies.length === 0) throw new EmptyBenchmarkError();
  return latencies.reduce((a, b) => a + b, 0) / latencies.length;
}

/** Nearest-rank percentile over an ascending list. */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) throw new EmptyBenchmarkError();
  const rank = Math.max(1, Math.ceil((p / 100) * sorted.length));
  return sorted[Math.min(rank, sorted.length) - 1];
}

interface WorkerReport {
  latencies: number[];
  failures: number;
  claims: Map<string, number>;
}

function summarize(
  config: BenchmarkConfig,
  reports: readonly WorkerReport[],
  durationMs: number,
): BenchmarkStats {
  const latenciesMs = reports.flatMap((r) => r.latencies);
  const perAdapter: Record<string, number> = {};
  for (const report of reports) {
    for (const [id, n] of report.claims) perAdapter[id] = (perAdapter[id] ?? 0) + n;
  }
  const sorted = [...latenciesMs].sort((a, b) => a - b);
  return {
    mode: config.mode,
    totalRequests: config.totalRequests,
    workers: config.workers,
    calls: latenciesMs.length,
    failures: reports.reduce((n, r) => n + r.failures, 0),
    durationMs,
    meanLatencyMs: meanLatency(latenciesMs),
    p50LatencyMs: percentile(sorted, 50),
    p99LatencyMs: percentile(sorted, 99),
    throughputRps: durationMs > 0 ? latenciesMs.length / (durationMs / 1000) : 0,
    perAdapter,
    latenciesMs,
  };
}

/**
 * Drives `config.workers` concurrent loops against `invoke` until the budget
 * is spent, then joins every worker before computing statistics. Latencies of
 * failed calls are left out; throws EmptyBenchmarkError when nothing succeeded.
 */
export async function runBenchmark(config: BenchmarkConfig, invoke: Invoker): Promise<BenchmarkStats> {
  validateConfig(config);
  const now = config.now ?? (() => performance.now());
  const policy = config.failurePolicy ?? 'record';
  const maxRetries = policy === 'retry' ? config.maxRetries ?? 0 : 0;
  const dispatcher = new WorkDispatcher(initialBudget(config), config.random);
  const aborts: Array<{ adapterId: string; error: unknown }> = [];

  const worker = async (): Promise<WorkerReport> => {
    const report: WorkerReport = { latencies: [], failures: 0, claims: new Map() };
    for (let id = dispatcher.claim(); id !== null; id = dispatcher.claim()) {
      report.claims.set(id, (report.claims.get(id) ?? 0) + 1);
      for (let attempt = 0; ; attempt += 1) {
        const started = now();
        try {
          await callWithTimeout(invoke, id, config.timeoutMs);
          report.latencies.push(now() - started);
          break;
        } catch (err) {
          if (attempt < maxRetries) continue;
          report.failures += 1;
          if (policy === 'abort') {
            aborts.push({ adapterId: id, error: err });
            dispatcher.close();
          }
          break;
        }
      }
    }
    return report;
  };

  const start = now();
  const settled = await Promise.allSettled(Array.from({ length: config.workers }, worker));
  const durationMs = now() - start;

  const reports: WorkerReport[] = [];
  for (const result of settled) {
    if (result.status === 'rejected') throw result.reason;
    reports.push(result.value);
  }

  const [firstAbort] = aborts;
  if (firstAbort) {
    const partial = reports.some((r) => r.latencies.length > 0)
      ? summarize(config, reports, durationMs)
      : null;
    throw new BenchmarkAbortedError(firstAbort.adapterId, partial, firstAbort.error);
  }
  return summarize(config, reports, durationMs);
}
