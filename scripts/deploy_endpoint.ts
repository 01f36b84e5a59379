#!/usr/bin/env node
import { Command } from 'commander';
import { SageMakerClient } from '@aws-sdk/client-sagemaker';
import {
  DEFAULT_ENDPOINT_NAME,
  DEFAULT_HEALTH_CHECK_TIMEOUT_S,
  DEFAULT_INSTANCE_COUNT,
  DEFAULT_INSTANCE_TYPE,
  DEFAULT_MANIFEST_FILE,
  DEFAULT_MAX_CPU_LORAS,
  DEFAULT_MAX_GPU_LORAS,
  DEFAULT_MAX_MODEL_LEN,
  DEFAULT_MAX_NUM_SEQS,
  DEFAULT_MODEL,
  DEFAULT_VARIANT_NAME,
  DEFAULT_VOLUME_SIZE_GB,
  resolveRegion,
} from './config.js';
import { ConfigError, describeError } from './errors.js';
import { nowStamp, parseKeyValueList } from './lib.js';
import { SdkSageMakerApi, containerEnvironment, deployEndpoint, modelDataPrefix } from './sagemaker.js';

const program = new Command();

program
  .name('deploy_endpoint')
  .description('Create or update a SageMaker endpoint serving vLLM with many LoRA adapters.')
  .option('--region <name>', 'AWS region')
  .option('--role-arn <arn>', 'SageMaker execution role ARN', process.env.SAGEMAKER_EXECUTION_ROLE_ARN)
  .option('--image-uri <uri>', 'Container image built by build_image', process.env.IMAGE_URI)
  .option('--model-data-url <s3://...>', 'S3 prefix holding the manifest and adapters', process.env.MODEL_DATA_URL)
  .option('--endpoint-name <name>', 'Endpoint name', process.env.ENDPOINT_NAME ?? DEFAULT_ENDPOINT_NAME)
  .option('--model-name <name>', 'Model name (default: <endpoint-name>-<timestamp>)')
  .option('--endpoint-config-name <name>', 'Endpoint config name (default: <endpoint-name>-<timestamp>)')
  .option('--variant-name <name>', 'Production variant name', DEFAULT_VARIANT_NAME)
  .option('--instance-type <type>', 'Instance type', process.env.INSTANCE_TYPE ?? DEFAULT_INSTANCE_TYPE)
  .option('--instance-count <n>', 'Initial instance count', String(DEFAULT_INSTANCE_COUNT))
  .option('--volume-size <gb>', 'EBS volume size, 0 to omit', String(DEFAULT_VOLUME_SIZE_GB))
  .option('--health-check-timeout-s <n>', 'Container startup and download timeout', String(DEFAULT_HEALTH_CHECK_TIMEOUT_S))
  .option('--hf-model-id <id>', 'Base model', process.env.HF_MODEL_ID ?? DEFAULT_MODEL)
  .option('--manifest-file <name>', 'Manifest file name under the model dir', DEFAULT_MANIFEST_FILE)
  .option('--max-model-len <n>', 'vLLM --max-model-len', String(DEFAULT_MAX_MODEL_LEN))
  .option('--max-gpu-loras <n>', 'vLLM --max-loras', String(DEFAULT_MAX_GPU_LORAS))
  .option('--max-cpu-loras <n>', 'vLLM --max-cpu-loras', String(DEFAULT_MAX_CPU_LORAS))
  .option('--max-num-seqs <n>', 'vLLM --max-num-seqs', String(DEFAULT_MAX_NUM_SEQS))
  .option('--enforce-eager', 'Pass --enforce-eager to vLLM')
  .option('--hf-token <token>', 'Hugging Face token for gated base models', process.env.HUGGING_FACE_HUB_TOKEN)
  .option('--extra-env <k=v,...>', 'Additional container environment')
  .option('--tags <k=v,...>', 'Endpoint tags')
  .option('--no-wait', 'Return without waiting for InService')
  .parse(process.argv);

const options = program.opts<{
  region?: string;
  roleArn?: string;
  imageUri?: string;
  modelDataUrl?: string;
  endpointName: string;
  modelName?: string;
  endpointConfigName?: string;
  variantName: string;
  instanceType: string;
  instanceCount: string;
  volumeSize: string;
  healthCheckTimeoutS: string;
  hfModelId: string;
  manifestFile: string;
  maxModelLen: string;
  maxGpuLoras: string;
  maxCpuLoras: string;
  maxNumSeqs: string;
  enforceEager?: boolean;
  hfToken?: string;
  extraEnv?: string;
  tags?: string;
  wait: boolean;
}>();

function required(name: string, value: string | undefined): string {
  if (!value) throw new ConfigError(name, 'is required');
  return value;
}

function toCount(name: string, value: string, { allowZero = false } = {}): number {
  const num = Number(value);
  if (!Number.isInteger(num) || num < (allowZero ? 0 : 1)) {
    throw new ConfigError(name, `expected a ${allowZero ? 'non-negative' : 'positive'} integer, got "${value}"`);
  }
  return num;
}

function toModelDataPrefix(value: string): string {
  try {
    return modelDataPrefix(value);
  } catch (err) {
    throw new ConfigError('--model-data-url', describeError(err));
  }
}

async function main() {
  const region = resolveRegion(options.region);
  const stamp = nowStamp().replace('_', '-');
  const environment = containerEnvironment({
    model: options.hfModelId,
    manifestFile: options.manifestFile,
    maxModelLen: toCount('--max-model-len', options.maxModelLen),
    maxGpuLoras: toCount('--max-gpu-loras', options.maxGpuLoras),
    maxCpuLoras: toCount('--max-cpu-loras', options.maxCpuLoras),
    maxNumSeqs: toCount('--max-num-seqs', options.maxNumSeqs),
    enforceEager: Boolean(options.enforceEager),
    hfToken: options.hfToken,
    extra: parseKeyValueList(options.extraEnv),
  });

  const modelDataUrl = toModelDataPrefix(required('--model-data-url', options.modelDataUrl));

  const api = new SdkSageMakerApi(new SageMakerClient({ region }));
  console.log(`[deploy] region=${region} endpoint=${options.endpointName}`);
  await deployEndpoint(api, {
    endpointName: options.endpointName,
    modelName: options.modelName ?? `${options.endpointName}-${stamp}`,
    endpointConfigName: options.endpointConfigName ?? `${options.endpointName}-${stamp}`,
    variantName: options.variantName,
    roleArn: required('--role-arn', options.roleArn),
    imageUri: required('--image-uri', options.imageUri),
    modelDataUrl,
    instanceType: options.instanceType,
    instanceCount: toCount('--instance-count', options.instanceCount),
    volumeSizeGb: toCount('--volume-size', options.volumeSize, { allowZero: true }),
    healthCheckTimeoutS: toCount('--health-check-timeout-s', options.healthCheckTimeoutS),
    environment,
    tags: parseKeyValueList(options.tags),
    wait: options.wait,
  });
}

main().catch((err) => {
  console.error(`[deploy] ERROR: ${describeError(err)}`);
  process.exit(1);
});
