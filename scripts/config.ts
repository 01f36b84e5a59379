// SageMaker hosting contract
export const DEFAULT_PORT = 8080;
export const DEFAULT_MODEL_DIR = '/opt/ml/model';
export const DEFAULT_MANIFEST_FILE = 'lora_modules_manifest.txt';
export const DEFAULT_ADAPTERS_SUBDIR = 'adapters';
export const HEALTH_ROUTE = '/ping';
export const INVOCATIONS_ROUTE = '/invocations';

// Container image
export const DEFAULT_VLLM_VERSION = 'v0.6.3';
export const DEFAULT_ECR_REPOSITORY = 'sagemaker-vllm-lora';
export const DEFAULT_IMAGE_TAG = 'latest';
export const DEFAULT_SERVER_MODULE_PATH = 'vllm/entrypoints/openai/api_server.py';
export const DEFAULT_API_SERVER_MODULE = 'vllm.entrypoints.openai.api_server';

// Server launch
export const DEFAULT_MODEL = 'mistralai/Mistral-7B-Instruct-v0.2';
export const DEFAULT_MAX_MODEL_LEN = 4096;
export const DEFAULT_MAX_GPU_LORAS = 30;
export const DEFAULT_MAX_CPU_LORAS = 70;
export const DEFAULT_MAX_NUM_SEQS = 50;

// Endpoint
export const DEFAULT_ENDPOINT_NAME = 'vllm-multi-lora';
export const DEFAULT_INSTANCE_TYPE = 'ml.g5.xlarge';
export const DEFAULT_INSTANCE_COUNT = 1;
// 0 keeps the instance default; g5 instances only use their local NVMe volume
export const DEFAULT_VOLUME_SIZE_GB = 0;
export const DEFAULT_HEALTH_CHECK_TIMEOUT_S = 900;
export const DEFAULT_VARIANT_NAME = 'AllTraffic';
export const ENDPOINT_POLL_INTERVAL_MS = 15_000;

// Benchmark
export const DEFAULT_TOTAL_REQUESTS = 300;
export const DEFAULT_ADAPTER_COUNT = 50;
export const DEFAULT_WORKERS = 20;
export const DEFAULT_MAX_TOKENS = 128;
export const DEFAULT_REQUEST_TIMEOUT_MS = 120_000;
export const DEFAULT_MAX_RETRIES = 2;
export const DEFAULT_PROMPT =
  '[INST] Summarize the benefits of serving many LoRA adapters from one base model. [/INST]';

export function resolveRegion(explicit?: string): string {
  const region = explicit ?? process.env.AWS_REGION ?? process.env.AWS_DEFAULT_REGION;
  if (!region) {
    throw new Error('Unable to determine AWS region. Pass --region or set AWS_REGION.');
  }
  return region;
}
