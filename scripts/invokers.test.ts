import http from 'node:http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { InvokeEndpointCommand, InvokeEndpointCommandOutput } from '@aws-sdk/client-sagemaker-runtime';
import { runBenchmark } from './bench.js';
import { EmptyBenchmarkError, InvocationError } from './errors.js';
import { completionBody, httpInvoker, postJson, sageMakerInvoker } from './invokers.js';
import type { EndpointRuntime } from './invokers.js';

type Handler = (body: string, res: http.ServerResponse) => void;

describe('completionBody', () => {
  it('names the adapter as the model', () => {
    expect(completionBody('7', { prompt: 'p', maxTokens: 16, temperature: 0 })).toBe(
      '{"model":"7","prompt":"p","max_tokens":16,"temperature":0}',
    );
  });
});

describe('HTTP invocation', () => {
  let server: http.Server;
  let url: string;
  let handler: Handler;

  beforeEach(async () => {
    handler = (_body, res) => res.end('{}');
    server = http.createServer((req, res) => {
      const chunks: Buffer[] = [];
      req.on('data', (chunk: Buffer) => chunks.push(chunk));
      req.on('end', () => handler(Buffer.concat(chunks).toString('utf8'), res));
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('server is not listening on TCP');
    url = `http://127.0.0.1:${address.port}/invocations`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  it('posts JSON and resolves the response text', async () => {
    let received = '';
    handler = (body, res) => {
      received = body;
      res.setHeader('Content-Type', 'application/json');
      res.end('{"choices":[]}');
    };

    await expect(postJson(url, '{"a":1}')).resolves.toBe('{"choices":[]}');
    expect(received).toBe('{"a":1}');
  });

  it('rejects non-2xx answers with the status and body', async () => {
    handler = (_body, res) => {
      res.statusCode = 500;
      res.end('adapter not loaded');
    };

    const error = await postJson(url, '{}').catch((err: unknown) => err);
    expect(error).toBeInstanceOf(InvocationError);
    if (!(error instanceof InvocationError)) return;
    expect(error.statusCode).toBe(500);
    expect(error.body).toBe('adapter not loaded');
    expect(error.message).toBe('Invocation failed with HTTP 500: adapter not loaded');
  });

  it('gives up when the signal aborts', async () => {
    handler = () => {};
    const controller = new AbortController();
    const pending = postJson(url, '{}', controller.signal);
    setTimeout(() => controller.abort(), 10);

    await expect(pending).rejects.toThrow();
  });

  it('drives a benchmark against the server', async () => {
    const perModel = new Map<string, number>();
    handler = (body, res) => {
      const parsed: unknown = JSON.parse(body);
      const model =
        typeof parsed === 'object' && parsed !== null && 'model' in parsed ? String(parsed.model) : '';
      perModel.set(model, (perModel.get(model) ?? 0) + 1);
      res.end('{}');
    };

    const stats = await runBenchmark(
      { totalRequests: 20, adapterCount: 4, workers: 3, mode: 'random' },
      httpInvoker(url),
    );

    expect(stats.calls).toBe(20);
    expect([...perModel.entries()].sort()).toEqual([
      ['1', 5],
      ['2', 5],
      ['3', 5],
      ['4', 5],
    ]);
  });
});

/** Runtime whose requests only end when their abort signal fires. */
class HangingRuntime implements EndpointRuntime {
  signals: Array<AbortSignal | undefined> = [];
  bodies: string[] = [];
  inFlight = 0;
  peak = 0;

  send(
    command: InvokeEndpointCommand,
    options?: { abortSignal?: AbortSignal },
  ): Promise<InvokeEndpointCommandOutput> {
    const signal = options?.abortSignal;
    this.signals.push(signal);
    const body = command.input.Body;
    if (body instanceof Uint8Array) this.bodies.push(new TextDecoder().decode(body));
    this.inFlight += 1;
    this.peak = Math.max(this.peak, this.inFlight);
    return new Promise((_resolve, reject) => {
      signal?.addEventListener('abort', () => {
        this.inFlight -= 1;
        reject(new Error('request aborted'));
      });
    });
  }
}

describe('sageMakerInvoker', () => {
  it('cancels timed-out requests so retries never outnumber the workers', async () => {
    const runtime = new HangingRuntime();
    const run = runBenchmark(
      {
        totalRequests: 2,
        adapterCount: 1,
        workers: 2,
        mode: 'single',
        failurePolicy: 'retry',
        maxRetries: 3,
        timeoutMs: 10,
      },
      sageMakerInvoker(runtime, 'vllm-multi-lora', { prompt: 'p', maxTokens: 4, temperature: 0 }),
    );

    await expect(run).rejects.toBeInstanceOf(EmptyBenchmarkError);
    expect(runtime.signals).toHaveLength(8);
    expect(runtime.signals.every((signal) => signal?.aborted === true)).toBe(true);
    expect(runtime.peak).toBe(2);
    expect(runtime.inFlight).toBe(0);
    expect(runtime.bodies[0]).toBe('{"model":"1","prompt":"p","max_tokens":4,"temperature":0}');
  });
});
