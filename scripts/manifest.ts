import fs from 'node:fs/promises';
import path from 'node:path';
import { DEFAULT_ADAPTERS_SUBDIR } from './config.js';
import { ManifestError } from './errors.js';
import { directoryPrefix, joinKey } from './storage.js';
import type { ObjectStore } from './storage.js';

export interface AdapterDescriptor {
  id: string;
  /** Path of the adapter weights on the serving host, always ending in `/`. */
  path: string;
}

export type Manifest = readonly AdapterDescriptor[];

export function adapterIdFromPrefix(prefix: string): string {
  const segments = prefix.split('/').filter(Boolean);
  const id = segments[segments.length - 1];
  if (!id) {
    throw new ManifestError('Cannot derive an adapter id from an empty prefix', prefix);
  }
  return id;
}

/**
 * Ids of the adapter directories directly under `prefix`. Anything that is not
 * a directory (the manifest object itself, stray files) is skipped.
 */
export async function listAdapterIds(store: ObjectStore, prefix: string): Promise<string[]> {
  const children = await store.listChildPrefixes(prefix);
  return children.filter((child) => child.endsWith('/')).map(adapterIdFromPrefix);
}

export function buildManifest(ids: readonly string[], mountRoot: string): Manifest {
  const root = mountRoot.replace(/\/+$/, '');
  const seen = new Set<string>();
  return ids.map((id) => {
    if (!id || /[\s=]/.test(id)) {
      throw new ManifestError('Adapter ids must be non-empty and contain no whitespace or "="', id);
    }
    if (seen.has(id)) {
      throw new ManifestError('Duplicate adapter id', id);
    }
    seen.add(id);
    return { id, path: `${root}/${id}/` };
  });
}

export function formatManifest(manifest: Manifest): string {
  return manifest.map(({ id, path: adapterPath }) => `${id}=${adapterPath}`).join(' ');
}

export function parseManifest(text: string): Manifest {
  const seen = new Set<string>();
  return text
    .split(/\s+/)
    .filter(Boolean)
    .map((token) => {
      const eqIdx = token.indexOf('=');
      if (eqIdx <= 0 || eqIdx === token.length - 1) {
        throw new ManifestError('Expected id=path', token);
      }
      const id = token.slice(0, eqIdx);
      if (seen.has(id)) {
        throw new ManifestError('Duplicate adapter id', token);
      }
      seen.add(id);
      return { id, path: token.slice(eqIdx + 1) };
    });
}

/** The manifest sits beside the adapters directory, never inside it. */
export function manifestKeyFor(modelPrefix: string, fileName: string): string {
  return joinKey(modelPrefix, fileName);
}

export function adaptersPrefixFor(modelPrefix: string): string {
  return directoryPrefix(joinKey(modelPrefix, DEFAULT_ADAPTERS_SUBDIR));
}

export async function publishManifest(
  store: ObjectStore,
  key: string,
  manifest: Manifest,
): Promise<string> {
  const text = formatManifest(manifest);
  await store.putObject(key, text, 'text/plain');
  return text;
}

/**
 * Uploads every sub-directory of `localDir` as one adapter. Plain files at the
 * top level are not adapters and are left out.
 */
export async function uploadAdapters(
  store: ObjectStore,
  localDir: string,
  adaptersPrefix: string,
  onFile: (key: string) => void = () => {},
): Promise<string[]> {
  const entries = await fs.readdir(localDir, { withFileTypes: true });
  const ids = entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();

  for (const id of ids) {
    const adapterDir = path.join(localDir, id);
    for (const file of await listFiles(adapterDir)) {
      const relative = path.relative(adapterDir, file).split(path.sep).join('/');
      const key = joinKey(adaptersPrefix, id, relative);
      await store.putObject(key, await fs.readFile(file));
      onFile(key);
    }
  }
  return ids;
}

async function listFiles(dir: string): Promise<string[]> {
  const files: string[] = [];
  for (const entry of await fs.readdir(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(full)));
    } else if (entry.isFile()) {
      files.push(full);
    }
  }
  return files.sort();
}
