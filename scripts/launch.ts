import path from 'node:path';
import { DEFAULT_API_SERVER_MODULE, DEFAULT_PORT } from './config.js';
import { ConfigError } from './errors.js';
import type { Manifest } from './manifest.js';

/**
 * Everything the container needs to launch the vLLM OpenAI server, read from
 * the environment SageMaker passes to the container.
 */
export interface ServerSettings {
  modelDir: string;
  manifestFile: string;
  model: string;
  maxModelLen: number;
  maxGpuLoras: number;
  maxCpuLoras: number;
  maxNumSeqs: number;
  enforceEager: boolean;
  port: number;
}

function requireString(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name]?.trim();
  if (!value) {
    throw new ConfigError(name, 'must be set');
  }
  return value;
}

function requirePositiveInt(env: NodeJS.ProcessEnv, name: string): number {
  const raw = requireString(env, name);
  if (!/^\d+$/.test(raw) || Number(raw) <= 0) {
    throw new ConfigError(name, `expected a positive integer, got "${raw}"`);
  }
  return Number(raw);
}

export function readServerSettings(env: NodeJS.ProcessEnv): ServerSettings {
  return {
    modelDir: requireString(env, 'MODEL_DIR'),
    manifestFile: requireString(env, 'LORA_MODULES_MANIFEST_FILE'),
    model: requireString(env, 'HF_MODEL_ID'),
    maxModelLen: requirePositiveInt(env, 'MAX_MODEL_LEN'),
    maxGpuLoras: requirePositiveInt(env, 'MAX_GPU_LORAS'),
    maxCpuLoras: requirePositiveInt(env, 'MAX_CPU_LORAS'),
    maxNumSeqs: requirePositiveInt(env, 'MAX_NUM_SEQS'),
    // exact match only: "True", "1" and unset all leave eager mode off
    enforceEager: env.ENFORCE_EAGER === 'true',
    port: DEFAULT_PORT,
  };
}

export function manifestPath(settings: Pick<ServerSettings, 'modelDir' | 'manifestFile'>): string {
  return path.join(settings.modelDir, settings.manifestFile);
}

export function apiServerArgs(settings: ServerSettings, loraModules: Manifest): string[] {
  const args = [
    '-m',
    DEFAULT_API_SERVER_MODULE,
    '--port',
    String(settings.port),
    '--model',
    settings.model,
    '--max-model-len',
    String(settings.maxModelLen),
    '--enable-lora',
  ];
  if (loraModules.length > 0) {
    args.push('--lora-modules', ...loraModules.map(({ id, path: p }) => `${id}=${p}`));
  }
  args.push(
    '--max-loras',
    String(settings.maxGpuLoras),
    '--max-cpu-loras',
    String(settings.maxCpuLoras),
    '--max-num-seqs',
    String(settings.maxNumSeqs),
  );
  if (settings.enforceEager) {
    args.push('--enforce-eager');
  }
  return args;
}

export function resolvePythonCommand(env: NodeJS.ProcessEnv): string {
  const vllmPython = env.VLLM_PYTHON;
  if (vllmPython && vllmPython.trim()) {
    return vllmPython.trim();
  }
  return 'python3';
}
