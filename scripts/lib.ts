import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import http from 'node:http';
import https from 'node:https';
import { execa } from 'execa';
import type { Subprocess } from 'execa';
import { describeError } from './errors.js';

const scriptDir = path.dirname(fileURLToPath(import.meta.url));
// scripts/ when run from source, dist/scripts/ once compiled
export const projectRoot = path.basename(path.dirname(scriptDir)) === 'dist'
  ? path.resolve(scriptDir, '..', '..')
  : path.resolve(scriptDir, '..');

export function resolvePath(...parts: string[]): string {
  return path.resolve(...parts);
}

export function nowStamp(date: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_${pad(
    date.getHours(),
  )}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

export const splitList = (value: string): string[] =>
  value
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);

export const toCsvValue = (value: unknown): string => (value == null ? '' : String(value));

/**
 * Parses `KEY=VALUE` pairs separated by commas or semicolons. Entries without
 * a `=` or with an empty key are skipped.
 */
export function parseKeyValueList(value: string | undefined): Record<string, string> {
  if (!value) return {};
  const out: Record<string, string> = {};
  for (const part of value.split(/[,;]+/)) {
    const trimmed = part.trim();
    const eqIdx = trimmed.indexOf('=');
    if (eqIdx <= 0) continue;
    out[trimmed.slice(0, eqIdx).trim()] = trimmed.slice(eqIdx + 1).trim();
  }
  return out;
}

export function ensureExists(label: string, filePath: string): void {
  if (!fs.existsSync(filePath)) {
    throw new Error(`${label} not found: ${filePath}`);
  }
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export function spawnLogged(
  command: string,
  args: string[],
  options: {
    cwd?: string;
    env?: NodeJS.ProcessEnv;
    logFile?: string;
    name?: string;
  } = {},
): Subprocess {
  const { cwd, env, logFile, name = command } = options;
  const child = execa(command, args, {
    cwd,
    env,
    stdio: 'pipe',
    detached: true,
    reject: false,
  });

  if (logFile) {
    // Large highWaterMark so docker/vLLM are not blocked by their startup logging
    const stream = fs.createWriteStream(logFile, {
      flags: 'a',
      highWaterMark: 512 * 1024,
    });
    child.stdout?.pipe(stream);
    child.stderr?.pipe(stream);
  } else {
    child.stdout?.pipe(process.stdout);
    child.stderr?.pipe(process.stderr);
  }

  child.on('error', (err) => {
    console.error(`[${name}] spawn error:`, err.message);
  });

  return child;
}

export async function getHttpStatus(url: string, timeoutMs: number): Promise<number> {
  return await new Promise((resolve, reject) => {
    const target = new URL(url);
    const lib = target.protocol === 'https:' ? https : http;
    const req = lib.request(
      {
        method: 'GET',
        hostname: target.hostname,
        port: target.port,
        path: `${target.pathname}${target.search}`,
        timeout: timeoutMs,
      },
      (res) => {
        res.resume();
        resolve(res.statusCode ?? 0);
      },
    );

    req.on('error', reject);
    req.on('timeout', () => {
      req.destroy(new Error('timeout'));
    });
    req.end();
  });
}

export async function waitForHttpOk(
  url: string,
  {
    timeoutMs = 120_000,
    intervalMs = 1000,
    quiet = false,
  }: { timeoutMs?: number; intervalMs?: number; quiet?: boolean } = {},
): Promise<void> {
  const start = Date.now();
  const deadline = start + timeoutMs;
  let lastError: string | null = null;

  while (Date.now() < deadline) {
    try {
      const status = await getHttpStatus(url, Math.min(5000, timeoutMs));
      if (status >= 200 && status < 300) return;
      lastError = `HTTP ${status}`;
    } catch (err) {
      lastError = describeError(err);
    }
    if (!quiet) {
      const elapsed = Math.round((Date.now() - start) / 1000);
      process.stderr.write(`  waiting for ${url} ... ${elapsed}s\n`);
    }
    await sleep(intervalMs);
  }

  throw new Error(`Timeout waiting for ${url} (${lastError ?? 'timeout'})`);
}

export function killProcessTree(child?: Subprocess, timeoutMs = 5000): void {
  const pid = child?.pid;
  if (!pid) return;
  try {
    process.kill(-pid, 'SIGTERM');
  } catch (err) {
    if (!isMissingProcess(err)) {
      console.error('Failed to terminate process group:', describeError(err));
    }
    return;
  }

  const started = Date.now();
  const interval = setInterval(() => {
    if (Date.now() - started <= timeoutMs) return;
    clearInterval(interval);
    try {
      process.kill(-pid, 'SIGKILL');
    } catch (err) {
      if (!isMissingProcess(err)) {
        console.error('Failed to force kill process group:', describeError(err));
      }
    }
  }, 200);
  interval.unref();
}

function isMissingProcess(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ESRCH';
}
