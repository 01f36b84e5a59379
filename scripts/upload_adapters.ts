#!/usr/bin/env node
import { Command } from 'commander';
import { S3Client } from '@aws-sdk/client-s3';
import {
  DEFAULT_ADAPTERS_SUBDIR,
  DEFAULT_MANIFEST_FILE,
  DEFAULT_MODEL_DIR,
  resolveRegion,
} from './config.js';
import { ConfigError, describeError } from './errors.js';
import { ensureExists } from './lib.js';
import {
  adaptersPrefixFor,
  buildManifest,
  listAdapterIds,
  manifestKeyFor,
  publishManifest,
  uploadAdapters,
} from './manifest.js';
import { S3ObjectStore, directoryPrefix, s3Uri } from './storage.js';

const program = new Command();

program
  .name('upload_adapters')
  .description('Upload LoRA adapters to S3 and publish the manifest the container reads at startup.')
  .option('--region <name>', 'AWS region')
  .option('--bucket <name>', 'S3 bucket', process.env.ADAPTER_BUCKET)
  .option('--prefix <prefix>', 'Model data prefix (the endpoint syncs it to the model dir)', 'lora-hosting')
  .option('--adapters-dir <path>', 'Local directory with one sub-directory per adapter to upload first')
  .option('--mount-root <path>', 'Where the adapters appear on the serving host', `${DEFAULT_MODEL_DIR}/${DEFAULT_ADAPTERS_SUBDIR}`)
  .option('--manifest-file <name>', 'Manifest object name, next to the adapters directory', DEFAULT_MANIFEST_FILE)
  .parse(process.argv);

const options = program.opts<{
  region?: string;
  bucket?: string;
  prefix: string;
  adaptersDir?: string;
  mountRoot: string;
  manifestFile: string;
}>();

async function main() {
  if (!options.bucket) throw new ConfigError('--bucket', 'is required');
  const store = new S3ObjectStore(new S3Client({ region: resolveRegion(options.region) }), options.bucket);
  const adaptersPrefix = adaptersPrefixFor(options.prefix);

  if (options.adaptersDir) {
    ensureExists('adapters directory', options.adaptersDir);
    let files = 0;
    const uploaded = await uploadAdapters(store, options.adaptersDir, adaptersPrefix, () => {
      files += 1;
    });
    console.log(`[upload] ${uploaded.length} adapter(s), ${files} file(s) -> ${s3Uri(options.bucket, adaptersPrefix)}`);
  }

  const ids = await listAdapterIds(store, adaptersPrefix);
  if (ids.length === 0) {
    throw new Error(`No adapter directories under ${s3Uri(options.bucket, adaptersPrefix)}`);
  }
  const manifestKey = manifestKeyFor(options.prefix, options.manifestFile);
  const text = await publishManifest(store, manifestKey, buildManifest(ids, options.mountRoot));
  console.log(`[upload] manifest (${ids.length} adapters) -> ${s3Uri(options.bucket, manifestKey)}`);
  console.log(text);
  console.log(`model data url: ${s3Uri(options.bucket, directoryPrefix(options.prefix))}`);
}

main().catch((err) => {
  console.error(`[upload] ERROR: ${describeError(err)}`);
  process.exit(1);
});
