import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { execa } from 'execa';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { projectRoot } from './lib.js';

const entrypoint = fileURLToPath(new URL('./entrypoint.ts', import.meta.url));
const TIMEOUT_MS = 30_000;

describe('entrypoint', () => {
  let modelDir: string;
  let argvFile: string;

  beforeEach(async () => {
    modelDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lora-entrypoint-'));
    argvFile = path.join(modelDir, 'argv.txt');
    await fs.writeFile(
      path.join(modelDir, 'lora_modules_manifest.txt'),
      'a=/opt/ml/model/adapters/a/ b=/opt/ml/model/adapters/b/\n',
    );
  });

  afterEach(async () => {
    await fs.rm(modelDir, { recursive: true, force: true });
  });

  /** Stand-in for the server process: records its argv, then runs `tail`. */
  const writeServerStub = async (tail: string): Promise<string> => {
    const stub = path.join(modelDir, 'fake-python.sh');
    await fs.writeFile(stub, `#!/bin/sh\nprintf '%s\\n' "$@" > "$ARGV_FILE"\n${tail}\n`, { mode: 0o755 });
    return stub;
  };

  const runEntrypoint = (env: Record<string, string>) =>
    execa(process.execPath, ['--import', 'tsx', entrypoint], {
      cwd: projectRoot,
      extendEnv: false,
      env: { PATH: process.env.PATH ?? '', ARGV_FILE: argvFile, ...env },
      reject: false,
    });

  const serverEnv = (stub: string): Record<string, string> => ({
    MODEL_DIR: modelDir,
    LORA_MODULES_MANIFEST_FILE: 'lora_modules_manifest.txt',
    HF_MODEL_ID: 'org/model',
    MAX_MODEL_LEN: '4096',
    MAX_GPU_LORAS: '2',
    MAX_CPU_LORAS: '4',
    MAX_NUM_SEQS: '8',
    VLLM_PYTHON: stub,
  });

  const recordedArgv = async (): Promise<string[]> =>
    (await fs.readFile(argvFile, 'utf8')).split('\n').filter(Boolean);

  it(
    'launches the server with the manifest adapters and exits with its code',
    async () => {
      const result = await runEntrypoint(serverEnv(await writeServerStub('exit 3')));

      expect(result.exitCode).toBe(3);
      expect(await recordedArgv()).toEqual([
        '-m',
        'vllm.entrypoints.openai.api_server',
        '--port',
        '8080',
        '--model',
        'org/model',
        '--max-model-len',
        '4096',
        '--enable-lora',
        '--lora-modules',
        'a=/opt/ml/model/adapters/a/',
        'b=/opt/ml/model/adapters/b/',
        '--max-loras',
        '2',
        '--max-cpu-loras',
        '4',
        '--max-num-seqs',
        '8',
      ]);
    },
    TIMEOUT_MS,
  );

  it(
    'maps a server killed by a signal to 128 + the signal number',
    async () => {
      const result = await runEntrypoint(serverEnv(await writeServerStub('kill -TERM $$')));

      expect(result.exitCode).toBe(128 + os.constants.signals.SIGTERM);
    },
    TIMEOUT_MS,
  );

  it(
    'exits 1 before launching when a setting is missing',
    async () => {
      const { MAX_NUM_SEQS: _unset, ...env } = serverEnv(await writeServerStub('exit 0'));
      const result = await runEntrypoint(env);

      expect(result.exitCode).toBe(1);
      expect(result.stderr).toContain('[entrypoint] ERROR: MAX_NUM_SEQS: must be set');
      await expect(fs.access(argvFile)).rejects.toThrow();
    },
    TIMEOUT_MS,
  );

  it(
    'serves the base model alone when the manifest is empty',
    async () => {
      await fs.writeFile(path.join(modelDir, 'lora_modules_manifest.txt'), '');
      const result = await runEntrypoint(serverEnv(await writeServerStub('exit 0')));

      expect(result.exitCode).toBe(0);
      expect(result.stderr).toContain('lists no adapters; serving the base model only');
      const argv = await recordedArgv();
      expect(argv).toContain('--enable-lora');
      expect(argv).not.toContain('--lora-modules');
    },
    TIMEOUT_MS,
  );
});
