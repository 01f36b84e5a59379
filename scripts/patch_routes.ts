#!/usr/bin/env node
import fs from 'node:fs';
import { Command } from 'commander';
import { DEFAULT_SERVER_MODULE_PATH } from './config.js';
import { describeError } from './errors.js';
import { ensureExists } from './lib.js';
import { applyRoutePatches, missingRoutes } from './container.js';

const program = new Command();

program
  .name('patch_routes')
  .description('Rename the vLLM health and completions routes to the SageMaker hosting routes.')
  .argument('[file]', 'OpenAI API server module to patch in place', DEFAULT_SERVER_MODULE_PATH)
  .option('--check', 'Fail if a hosting route is missing after patching')
  .option('--dry-run', 'Report replacements without writing the file')
  .parse(process.argv);

const options = program.opts<{ check?: boolean; dryRun?: boolean }>();
const [file = DEFAULT_SERVER_MODULE_PATH] = program.args;

try {
  ensureExists('server module', file);
  const { text, replacements } = applyRoutePatches(fs.readFileSync(file, 'utf8'));
  for (const [route, count] of Object.entries(replacements)) {
    console.log(`[patch_routes] ${route}: ${count} replacement(s)`);
  }
  if (!options.dryRun) {
    fs.writeFileSync(file, text);
  }
  const missing = missingRoutes(text);
  if (options.check && missing.length > 0) {
    throw new Error(`routes not found in ${file}: ${missing.map((p) => p.to).join(', ')}`);
  }
} catch (err) {
  console.error(`[patch_routes] ERROR: ${describeError(err)}`);
  process.exit(1);
}
