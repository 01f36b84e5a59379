import {
  CreateEndpointCommand,
  CreateEndpointConfigCommand,
  CreateModelCommand,
  DeleteEndpointCommand,
  DeleteEndpointConfigCommand,
  DeleteModelCommand,
  DescribeEndpointCommand,
  DescribeEndpointConfigCommand,
  DescribeModelCommand,
  UpdateEndpointCommand,
} from '@aws-sdk/client-sagemaker';
import type {
  CreateEndpointConfigCommandInput,
  CreateEndpointCommandInput,
  CreateModelCommandInput,
  SageMakerClient,
} from '@aws-sdk/client-sagemaker';
import {
  DEFAULT_MANIFEST_FILE,
  DEFAULT_MODEL_DIR,
  ENDPOINT_POLL_INTERVAL_MS,
} from './config.js';
import { sleep } from './lib.js';
import { directoryPrefix, parseS3Uri, s3Uri } from './storage.js';

export interface ContainerEnvironmentOptions {
  model: string;
  modelDir?: string;
  manifestFile?: string;
  maxModelLen: number;
  maxGpuLoras: number;
  maxCpuLoras: number;
  maxNumSeqs: number;
  enforceEager: boolean;
  hfToken?: string;
  extra?: Record<string, string>;
}

/** Environment read by the container entrypoint. */
export function containerEnvironment(options: ContainerEnvironmentOptions): Record<string, string> {
  const env: Record<string, string> = {
    MODEL_DIR: options.modelDir ?? DEFAULT_MODEL_DIR,
    LORA_MODULES_MANIFEST_FILE: options.manifestFile ?? DEFAULT_MANIFEST_FILE,
    HF_MODEL_ID: options.model,
    MAX_MODEL_LEN: String(options.maxModelLen),
    MAX_GPU_LORAS: String(options.maxGpuLoras),
    MAX_CPU_LORAS: String(options.maxCpuLoras),
    MAX_NUM_SEQS: String(options.maxNumSeqs),
    ENFORCE_EAGER: options.enforceEager ? 'true' : 'false',
  };
  if (options.hfToken) {
    env.HUGGING_FACE_HUB_TOKEN = options.hfToken;
  }
  return { ...env, ...options.extra };
}

export interface DeployOptions {
  endpointName: string;
  modelName: string;
  endpointConfigName: string;
  variantName: string;
  roleArn: string;
  imageUri: string;
  /** `s3://bucket/prefix/` holding the manifest and the adapters directory. */
  modelDataUrl: string;
  instanceType: string;
  instanceCount: number;
  volumeSizeGb: number;
  healthCheckTimeoutS: number;
  environment: Record<string, string>;
  tags: Record<string, string>;
  wait: boolean;
}

const toTagList = (tags: Record<string, string>) =>
  Object.entries(tags).map(([Key, Value]) => ({ Key, Value }));

/** `s3://bucket/lora` -> `s3://bucket/lora/`; throws for anything but an s3:// URI. */
export function modelDataPrefix(url: string): string {
  const { bucket, key } = parseS3Uri(url);
  return s3Uri(bucket, directoryPrefix(key));
}

export function createModelInput(options: DeployOptions): CreateModelCommandInput {
  return {
    ModelName: options.modelName,
    ExecutionRoleArn: options.roleArn,
    PrimaryContainer: {
      Image: options.imageUri,
      Environment: options.environment,
      // Uncompressed prefix: SageMaker syncs it to /opt/ml/model as-is
      ModelDataSource: {
        S3DataSource: {
          S3Uri: modelDataPrefix(options.modelDataUrl),
          S3DataType: 'S3Prefix',
          CompressionType: 'None',
        },
      },
    },
  };
}

export function createEndpointConfigInput(options: DeployOptions): CreateEndpointConfigCommandInput {
  return {
    EndpointConfigName: options.endpointConfigName,
    ProductionVariants: [
      {
        VariantName: options.variantName,
        ModelName: options.modelName,
        InstanceType: options.instanceType,
        InitialInstanceCount: options.instanceCount,
        InitialVariantWeight: 1,
        ContainerStartupHealthCheckTimeoutInSeconds: options.healthCheckTimeoutS,
        ModelDataDownloadTimeoutInSeconds: options.healthCheckTimeoutS,
        ...(options.volumeSizeGb > 0 ? { VolumeSizeInGB: options.volumeSizeGb } : {}),
      },
    ],
  };
}

export function createEndpointInput(options: DeployOptions): CreateEndpointCommandInput {
  const tags = toTagList(options.tags);
  return {
    EndpointName: options.endpointName,
    EndpointConfigName: options.endpointConfigName,
    ...(tags.length > 0 ? { Tags: tags } : {}),
  };
}

export interface EndpointDescription {
  endpointConfigName?: string;
  status?: string;
  failureReason?: string;
}

/**
 * The SageMaker control-plane calls the deploy and delete flows use. `describe*`
 * resolve null for resources that do not exist.
 */
export interface SageMakerApi {
  describeModel(name: string): Promise<{ name: string } | null>;
  createModel(input: CreateModelCommandInput): Promise<void>;
  deleteModel(name: string): Promise<void>;
  describeEndpointConfig(name: string): Promise<{ name: string; modelNames: string[] } | null>;
  createEndpointConfig(input: CreateEndpointConfigCommandInput): Promise<void>;
  deleteEndpointConfig(name: string): Promise<void>;
  describeEndpoint(name: string): Promise<EndpointDescription | null>;
  createEndpoint(input: CreateEndpointCommandInput): Promise<void>;
  updateEndpoint(name: string, endpointConfigName: string): Promise<void>;
  deleteEndpoint(name: string): Promise<void>;
}

export function isNotFound(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  if (err.name.toLowerCase().includes('notfound')) return true;
  return (
    err.name === 'ValidationException' &&
    /could not find|does not exist/i.test(err.message)
  );
}

async function orNull<T>(call: () => Promise<T>): Promise<T | null> {
  try {
    return await call();
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
}

export class SdkSageMakerApi implements SageMakerApi {
  constructor(private readonly client: SageMakerClient) {}

  describeModel(name: string) {
    return orNull(async () => {
      const res = await this.client.send(new DescribeModelCommand({ ModelName: name }));
      return { name: res.ModelName ?? name };
    });
  }

  async createModel(input: CreateModelCommandInput) {
    await this.client.send(new CreateModelCommand(input));
  }

  async deleteModel(name: string) {
    await this.client.send(new DeleteModelCommand({ ModelName: name }));
  }

  describeEndpointConfig(name: string) {
    return orNull(async () => {
      const res = await this.client.send(
        new DescribeEndpointConfigCommand({ EndpointConfigName: name }),
      );
      return {
        name: res.EndpointConfigName ?? name,
        modelNames: (res.ProductionVariants ?? []).flatMap((v) => (v.ModelName ? [v.ModelName] : [])),
      };
    });
  }

  async createEndpointConfig(input: CreateEndpointConfigCommandInput) {
    await this.client.send(new CreateEndpointConfigCommand(input));
  }

  async deleteEndpointConfig(name: string) {
    await this.client.send(new DeleteEndpointConfigCommand({ EndpointConfigName: name }));
  }

  describeEndpoint(name: string) {
    return orNull(async (): Promise<EndpointDescription> => {
      const res = await this.client.send(new DescribeEndpointCommand({ EndpointName: name }));
      return {
        endpointConfigName: res.EndpointConfigName,
        status: res.EndpointStatus,
        failureReason: res.FailureReason,
      };
    });
  }

  async createEndpoint(input: CreateEndpointCommandInput) {
    await this.client.send(new CreateEndpointCommand(input));
  }

  async updateEndpoint(name: string, endpointConfigName: string) {
    await this.client.send(
      new UpdateEndpointCommand({ EndpointName: name, EndpointConfigName: endpointConfigName }),
    );
  }

  async deleteEndpoint(name: string) {
    await this.client.send(new DeleteEndpointCommand({ EndpointName: name }));
  }
}

export async function waitForEndpoint(
  api: SageMakerApi,
  endpointName: string,
  {
    intervalMs = ENDPOINT_POLL_INTERVAL_MS,
    log = (line: string) => console.log(line),
  }: { intervalMs?: number; log?: (line: string) => void } = {},
): Promise<void> {
  const start = Date.now();
  for (;;) {
    const desc = await api.describeEndpoint(endpointName);
    if (!desc) {
      throw new Error(`Endpoint ${endpointName} disappeared while waiting for InService.`);
    }
    if (desc.status === 'InService') return;
    if (desc.status === 'Failed') {
      throw new Error(`Endpoint ${endpointName} failed: ${desc.failureReason ?? 'unknown'}`);
    }
    const elapsed = Math.round((Date.now() - start) / 1000);
    log(`  status=${desc.status ?? 'unknown'} elapsed=${elapsed}s`);
    await sleep(intervalMs);
  }
}

export async function deployEndpoint(
  api: SageMakerApi,
  options: DeployOptions,
  log: (line: string) => void = (line) => console.log(line),
): Promise<void> {
  if (await api.describeModel(options.modelName)) {
    log(`[deploy] Model ${options.modelName} already exists.`);
  } else {
    log(`[deploy] Creating model ${options.modelName}...`);
    await api.createModel(createModelInput(options));
  }

  if (await api.describeEndpointConfig(options.endpointConfigName)) {
    log(`[deploy] EndpointConfig ${options.endpointConfigName} already exists.`);
  } else {
    log(`[deploy] Creating endpoint config ${options.endpointConfigName}...`);
    await api.createEndpointConfig(createEndpointConfigInput(options));
  }

  const endpoint = await api.describeEndpoint(options.endpointName);
  if (!endpoint) {
    log(`[deploy] Creating endpoint ${options.endpointName}...`);
    await api.createEndpoint(createEndpointInput(options));
  } else if (endpoint.endpointConfigName !== options.endpointConfigName) {
    log(`[deploy] Updating endpoint ${options.endpointName} to ${options.endpointConfigName}...`);
    await api.updateEndpoint(options.endpointName, options.endpointConfigName);
  } else {
    log(`[deploy] Endpoint ${options.endpointName} already uses ${options.endpointConfigName}.`);
  }

  if (options.wait) {
    log('[deploy] Waiting for endpoint to become InService (model download and vLLM start take a while)...');
    await waitForEndpoint(api, options.endpointName, { log });
    log('[deploy] Endpoint is InService.');
  }
}

export interface DeleteTargets {
  endpointName: string;
  endpointConfigName?: string;
  modelName?: string;
}

/**
 * Deletes the endpoint, then its config and models. Config and model names
 * default to what the endpoint currently points at; anything already gone is
 * skipped.
 */
export async function deleteEndpoint(
  api: SageMakerApi,
  targets: DeleteTargets,
  log: (line: string) => void = (line) => console.log(line),
): Promise<string[]> {
  const deleted: string[] = [];
  const endpoint = await api.describeEndpoint(targets.endpointName);
  const configName = targets.endpointConfigName ?? endpoint?.endpointConfigName;
  const config = configName ? await api.describeEndpointConfig(configName) : null;
  const modelNames = targets.modelName ? [targets.modelName] : config?.modelNames ?? [];

  if (endpoint) {
    log(`[delete] Deleting endpoint ${targets.endpointName}`);
    await api.deleteEndpoint(targets.endpointName);
    deleted.push(`endpoint/${targets.endpointName}`);
  }
  if (config) {
    log(`[delete] Deleting endpoint config ${config.name}`);
    await api.deleteEndpointConfig(config.name);
    deleted.push(`endpoint-config/${config.name}`);
  }
  for (const modelName of modelNames) {
    if (!(await api.describeModel(modelName))) continue;
    log(`[delete] Deleting model ${modelName}`);
    await api.deleteModel(modelName);
    deleted.push(`model/${modelName}`);
  }
  return deleted;
}
