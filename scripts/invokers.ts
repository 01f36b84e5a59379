import http from 'node:http';
import https from 'node:https';
import { InvokeEndpointCommand } from '@aws-sdk/client-sagemaker-runtime';
import type { InvokeEndpointCommandOutput } from '@aws-sdk/client-sagemaker-runtime';
import { DEFAULT_MAX_TOKENS, DEFAULT_PROMPT } from './config.js';
import { InvocationError } from './errors.js';
import type { Invoker } from './bench.js';

export interface CompletionPayload {
  prompt: string;
  maxTokens: number;
  temperature: number;
}

export const DEFAULT_PAYLOAD: CompletionPayload = {
  prompt: DEFAULT_PROMPT,
  maxTokens: DEFAULT_MAX_TOKENS,
  temperature: 0,
};

/** OpenAI completions body; vLLM routes it to the LoRA adapter named in `model`. */
export function completionBody(adapterId: string, payload: CompletionPayload): string {
  return JSON.stringify({
    model: adapterId,
    prompt: payload.prompt,
    max_tokens: payload.maxTokens,
    temperature: payload.temperature,
  });
}

export function postJson(url: string, body: string, signal?: AbortSignal): Promise<string> {
  return new Promise((resolve, reject) => {
    const target = new URL(url);
    const lib = target.protocol === 'https:' ? https : http;
    const req = lib.request(
      {
        method: 'POST',
        hostname: target.hostname,
        port: target.port,
        path: `${target.pathname}${target.search}`,
        headers: {
          'Content-Type': 'application/json',
          'Content-Length': Buffer.byteLength(body),
        },
        signal,
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('error', reject);
        res.on('end', () => {
          const text = Buffer.concat(chunks).toString('utf8');
          const status = res.statusCode ?? 0;
          if (status >= 200 && status < 300) {
            resolve(text);
          } else {
            reject(new InvocationError(status, text));
          }
        });
      },
    );
    req.on('error', reject);
    req.end(body);
  });
}

/** Calls a locally running container, e.g. `http://127.0.0.1:8080/invocations`. */
export function httpInvoker(url: string, payload: CompletionPayload = DEFAULT_PAYLOAD): Invoker {
  return (adapterId, signal) => postJson(url, completionBody(adapterId, payload), signal);
}

/** The part of `SageMakerRuntimeClient` the endpoint invoker uses. */
export interface EndpointRuntime {
  send(
    command: InvokeEndpointCommand,
    options?: { abortSignal?: AbortSignal },
  ): Promise<InvokeEndpointCommandOutput>;
}

/** Calls a SageMaker endpoint; a timed-out call aborts its request. */
export function sageMakerInvoker(
  client: EndpointRuntime,
  endpointName: string,
  payload: CompletionPayload = DEFAULT_PAYLOAD,
): Invoker {
  return async (adapterId, signal) => {
    const response = await client.send(
      new InvokeEndpointCommand({
        EndpointName: endpointName,
        ContentType: 'application/json',
        Accept: 'application/json',
        Body: new TextEncoder().encode(completionBody(adapterId, payload)),
      }),
      { abortSignal: signal },
    );
    return new TextDecoder().decode(response.Body);
  };
}
