#!/usr/bin/env node
import { Command } from 'commander';
import {
  DEFAULT_ECR_REPOSITORY,
  DEFAULT_IMAGE_TAG,
  DEFAULT_MANIFEST_FILE,
  DEFAULT_MAX_CPU_LORAS,
  DEFAULT_MAX_GPU_LORAS,
  DEFAULT_MAX_MODEL_LEN,
  DEFAULT_MAX_NUM_SEQS,
  DEFAULT_MODEL,
  DEFAULT_MODEL_DIR,
  DEFAULT_PORT,
  HEALTH_ROUTE,
  INVOCATIONS_ROUTE,
} from './config.js';
import { describeError } from './errors.js';
import { ensureExists, killProcessTree, resolvePath, spawnLogged, waitForHttpOk } from './lib.js';
import { containerEnvironment } from './sagemaker.js';

const program = new Command();

program
  .name('start_local')
  .description('Run the hosting image locally the way SageMaker would and wait for it to answer pings.')
  .requiredOption('--model-dir <path>', 'Local copy of the model data prefix (manifest + adapters/)')
  .option('--image <name>', 'Image to run', `${DEFAULT_ECR_REPOSITORY}:${DEFAULT_IMAGE_TAG}`)
  .option('--hf-model-id <id>', 'Base model', process.env.HF_MODEL_ID ?? DEFAULT_MODEL)
  .option('--port <n>', 'Host port', String(DEFAULT_PORT))
  .option('--enforce-eager', 'Pass --enforce-eager to vLLM')
  .option('--timeout-s <n>', 'Seconds to wait for the ping route', '900')
  .option('--log-file <path>', 'Write container output here instead of the terminal')
  .parse(process.argv);

const options = program.opts<{
  modelDir: string;
  image: string;
  hfModelId: string;
  port: string;
  enforceEager?: boolean;
  timeoutS: string;
  logFile?: string;
}>();

const modelDir = resolvePath(options.modelDir);
ensureExists('manifest', resolvePath(modelDir, DEFAULT_MANIFEST_FILE));

const env = containerEnvironment({
  model: options.hfModelId,
  maxModelLen: DEFAULT_MAX_MODEL_LEN,
  maxGpuLoras: DEFAULT_MAX_GPU_LORAS,
  maxCpuLoras: DEFAULT_MAX_CPU_LORAS,
  maxNumSeqs: DEFAULT_MAX_NUM_SEQS,
  enforceEager: Boolean(options.enforceEager),
  hfToken: process.env.HUGGING_FACE_HUB_TOKEN,
});

const args = [
  'run',
  '--rm',
  '--gpus',
  'all',
  '-p',
  `${options.port}:${DEFAULT_PORT}`,
  '-v',
  `${modelDir}:${DEFAULT_MODEL_DIR}:ro`,
  ...Object.entries(env).flatMap(([key, value]) => ['-e', `${key}=${value}`]),
  options.image,
];

const child = spawnLogged('docker', args, { logFile: options.logFile, name: 'container' });

process.on('SIGINT', () => killProcessTree(child));
process.on('SIGTERM', () => killProcessTree(child));

const baseUrl = `http://127.0.0.1:${options.port}`;
try {
  await waitForHttpOk(`${baseUrl}${HEALTH_ROUTE}`, {
    timeoutMs: Number(options.timeoutS) * 1000,
    intervalMs: 5000,
  });
  console.log(`[start_local] ready: POST ${baseUrl}${INVOCATIONS_ROUTE}`);
} catch (err) {
  console.error(`[start_local] ERROR: ${describeError(err)}`);
  killProcessTree(child);
}

const result = await child;
process.exit(result.exitCode ?? 1);
