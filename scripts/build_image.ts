#!/usr/bin/env node
import fs from 'node:fs';
import { Command } from 'commander';
import { ECRClient } from '@aws-sdk/client-ecr';
import {
  DEFAULT_ECR_REPOSITORY,
  DEFAULT_IMAGE_TAG,
  DEFAULT_SERVER_MODULE_PATH,
  DEFAULT_VLLM_VERSION,
  resolveRegion,
} from './config.js';
import { describeError } from './errors.js';
import { projectRoot, resolvePath } from './lib.js';
import {
  buildImage,
  dockerLogin,
  ecrImageUri,
  ensureRepository,
  renderDockerfile,
} from './container.js';

const program = new Command();

program
  .name('build_image')
  .description('Build the SageMaker-compatible vLLM image and push it to ECR.')
  .option('--region <name>', 'AWS region')
  .option('--repository <name>', 'ECR repository', process.env.ECR_REPOSITORY ?? DEFAULT_ECR_REPOSITORY)
  .option('--tag <tag>', 'Image tag', process.env.IMAGE_TAG ?? DEFAULT_IMAGE_TAG)
  .option('--vllm-version <version>', 'vllm/vllm-openai base image tag', process.env.VLLM_VERSION ?? DEFAULT_VLLM_VERSION)
  .option('--server-module-path <path>', 'API server module inside the base image', DEFAULT_SERVER_MODULE_PATH)
  .option('--platform <platform>', 'docker build --platform', 'linux/amd64')
  .option('--no-push', 'Build a local image only')
  .parse(process.argv);

const options = program.opts<{
  region?: string;
  repository: string;
  tag: string;
  vllmVersion: string;
  serverModulePath: string;
  platform: string;
  push: boolean;
}>();

async function main() {
  const buildDir = resolvePath(projectRoot, '.build');
  fs.mkdirSync(buildDir, { recursive: true });
  const dockerfile = resolvePath(buildDir, 'Dockerfile');
  fs.writeFileSync(
    dockerfile,
    renderDockerfile({
      vllmVersion: options.vllmVersion,
      serverModulePath: options.serverModulePath,
    }),
  );
  console.log(`[build_image] Dockerfile written to ${dockerfile}`);

  let imageUri = `${options.repository}:${options.tag}`;
  if (options.push) {
    const ecr = new ECRClient({ region: resolveRegion(options.region) });
    if (await ensureRepository(ecr, options.repository)) {
      console.log(`[build_image] Created ECR repository ${options.repository}`);
    }
    const registry = await dockerLogin(ecr);
    imageUri = ecrImageUri(registry, options.repository, options.tag);
  }

  console.log(`[build_image] Building ${imageUri} from vllm/vllm-openai:${options.vllmVersion}`);
  await buildImage({
    contextDir: projectRoot,
    dockerfile,
    imageUri,
    vllmVersion: options.vllmVersion,
    platform: options.platform,
    push: options.push,
  });
  console.log(imageUri);
}

main().catch((err) => {
  console.error(`[build_image] ERROR: ${describeError(err)}`);
  process.exit(1);
});
