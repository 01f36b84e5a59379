#!/usr/bin/env node
import fs from 'node:fs';
import os from 'node:os';
import { execa } from 'execa';
import { describeError } from './errors.js';
import { apiServerArgs, manifestPath, readServerSettings, resolvePythonCommand } from './launch.js';
import { parseManifest } from './manifest.js';
import type { Manifest } from './manifest.js';
import type { ServerSettings } from './launch.js';

let settings: ServerSettings;
let loraModules: Manifest;
try {
  settings = readServerSettings(process.env);
  loraModules = parseManifest(fs.readFileSync(manifestPath(settings), 'utf8'));
} catch (err) {
  console.error(`[entrypoint] ERROR: ${describeError(err)}`);
  process.exit(1);
}

if (loraModules.length === 0) {
  console.warn(`[entrypoint] ${manifestPath(settings)} lists no adapters; serving the base model only`);
}

const command = resolvePythonCommand(process.env);
const args = apiServerArgs(settings, loraModules);
console.log(`[entrypoint] ${command} ${args.join(' ')}`);

const child = execa(command, args, {
  stdio: 'inherit',
  env: process.env,
  reject: false,
});

process.on('SIGINT', () => child.kill('SIGINT'));
process.on('SIGTERM', () => child.kill('SIGTERM'));

const result = await child;
if (result.signal) {
  process.exit(128 + os.constants.signals[result.signal]);
}
process.exit(result.exitCode ?? 1);
