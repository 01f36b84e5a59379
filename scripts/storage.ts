import { ListObjectsV2Command, PutObjectCommand } from '@aws-sdk/client-s3';
import type { ListObjectsV2CommandInput, ListObjectsV2CommandOutput, S3Client } from '@aws-sdk/client-s3';

/**
 * The slice of object storage the manifest builder needs. Keys use `/` as the
 * directory separator; a "child prefix" always ends in `/`.
 */
export interface ObjectStore {
  /** Immediate child directories of `prefix`, non-recursive, in key order. */
  listChildPrefixes(prefix: string): Promise<string[]>;
  putObject(key: string, body: string | Uint8Array, contentType?: string): Promise<void>;
}

export function joinKey(...parts: string[]): string {
  return parts
    .map((part) => part.replace(/^\/+|\/+$/g, ''))
    .filter(Boolean)
    .join('/');
}

/** `a/b` -> `a/b/`, `/a/` -> `a/`, `` -> `` */
export function directoryPrefix(prefix: string): string {
  const key = joinKey(prefix);
  return key ? `${key}/` : '';
}

export function s3Uri(bucket: string, key: string): string {
  return `s3://${bucket}/${key}`;
}

export function parseS3Uri(uri: string): { bucket: string; key: string } {
  const match = /^s3:\/\/([^/]+)\/?(.*)$/.exec(uri);
  if (!match) {
    throw new Error(`Not an s3:// URI: ${uri}`);
  }
  return { bucket: match[1], key: match[2] };
}

export class S3ObjectStore implements ObjectStore {
  constructor(
    private readonly client: S3Client,
    readonly bucket: string,
  ) {}

  async listChildPrefixes(prefix: string): Promise<string[]> {
    const prefixes: string[] = [];
    let continuationToken: string | undefined;
    do {
      const page = await this.listPage({
        Bucket: this.bucket,
        Prefix: directoryPrefix(prefix),
        Delimiter: '/',
        ContinuationToken: continuationToken,
      });
      // CommonPrefixes only: objects directly under the prefix are not directories
      for (const entry of page.CommonPrefixes ?? []) {
        if (entry.Prefix) prefixes.push(entry.Prefix);
      }
      continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (continuationToken);
    return prefixes;
  }

  protected listPage(input: ListObjectsV2CommandInput): Promise<ListObjectsV2CommandOutput> {
    return this.client.send(new ListObjectsV2Command(input));
  }

  async putObject(key: string, body: string | Uint8Array, contentType?: string): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentType: contentType,
      }),
    );
  }
}

/**
 * Map-backed store with the same listing semantics as S3 with a `/` delimiter.
 */
export class InMemoryObjectStore implements ObjectStore {
  readonly objects = new Map<string, string | Uint8Array>();

  constructor(keys: Iterable<string> = []) {
    for (const key of keys) this.objects.set(key, '');
  }

  async listChildPrefixes(prefix: string): Promise<string[]> {
    const base = directoryPrefix(prefix);
    const children = new Set<string>();
    for (const key of [...this.objects.keys()].sort()) {
      if (!key.startsWith(base)) continue;
      const rest = key.slice(base.length);
      const slash = rest.indexOf('/');
      if (slash > 0) children.add(`${base}${rest.slice(0, slash + 1)}`);
    }
    return [...children];
  }

  async putObject(key: string, body: string | Uint8Array): Promise<void> {
    this.objects.set(key, body);
  }

  getText(key: string): string | undefined {
    const body = this.objects.get(key);
    if (body === undefined) return undefined;
    return typeof body === 'string' ? body : Buffer.from(body).toString('utf8');
  }
}
