import type { BenchmarkStats } from './bench.js';

export class ConfigError extends Error {
  constructor(
    readonly field: string,
    message: string,
  ) {
    super(`${field}: ${message}`);
    this.name = 'ConfigError';
  }
}

export class ManifestError extends Error {
  constructor(
    message: string,
    readonly token?: string,
  ) {
    super(token === undefined ? message : `${message} (token "${token}")`);
    this.name = 'ManifestError';
  }
}

/**
 * Non-2xx answer from an inference endpoint.
 */
export class InvocationError extends Error {
  constructor(
    readonly statusCode: number,
    readonly body: string,
  ) {
    super(`Invocation failed with HTTP ${statusCode}${body ? `: ${body.slice(0, 200)}` : ''}`);
    this.name = 'InvocationError';
  }
}

export class EmptyBenchmarkError extends Error {
  constructor() {
    super('No successful calls were recorded; latency statistics are undefined.');
    this.name = 'EmptyBenchmarkError';
  }
}

/**
 * Raised when the `abort` failure policy stops a run. `stats` covers the calls
 * that completed before the stop, or is null when none succeeded.
 */
export class BenchmarkAbortedError extends Error {
  constructor(
    readonly adapterId: string,
    readonly stats: BenchmarkStats | null,
    cause: unknown,
  ) {
    super(`Benchmark aborted after a failed call to adapter ${adapterId}: ${describeError(cause)}`, {
      cause,
    });
    this.name = 'BenchmarkAbortedError';
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
