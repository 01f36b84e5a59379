#!/usr/bin/env node
import { Command } from 'commander';
import { SageMakerClient } from '@aws-sdk/client-sagemaker';
import { DEFAULT_ENDPOINT_NAME, resolveRegion } from './config.js';
import { describeError } from './errors.js';
import { SdkSageMakerApi, deleteEndpoint } from './sagemaker.js';

const program = new Command();

program
  .name('delete_endpoint')
  .description('Delete an endpoint together with its endpoint config and model.')
  .option('--region <name>', 'AWS region')
  .option('--endpoint-name <name>', 'Endpoint name', process.env.ENDPOINT_NAME ?? DEFAULT_ENDPOINT_NAME)
  .option('--endpoint-config-name <name>', 'Endpoint config (default: the one the endpoint uses)')
  .option('--model-name <name>', 'Model (default: the models of the endpoint config)')
  .parse(process.argv);

const options = program.opts<{
  region?: string;
  endpointName: string;
  endpointConfigName?: string;
  modelName?: string;
}>();

async function main() {
  const api = new SdkSageMakerApi(new SageMakerClient({ region: resolveRegion(options.region) }));
  const deleted = await deleteEndpoint(api, {
    endpointName: options.endpointName,
    endpointConfigName: options.endpointConfigName,
    modelName: options.modelName,
  });
  console.log(deleted.length > 0 ? `[delete] Removed ${deleted.join(', ')}` : '[delete] Nothing to delete');
}

main().catch((err) => {
  console.error(`[delete] ERROR: ${describeError(err)}`);
  process.exit(1);
});
