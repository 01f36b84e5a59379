import { S3Client } from '@aws-sdk/client-s3';
import type { ListObjectsV2CommandInput, ListObjectsV2CommandOutput } from '@aws-sdk/client-s3';
import { describe, expect, it } from 'vitest';
import { listAdapterIds } from './manifest.js';
import { InMemoryObjectStore, S3ObjectStore, directoryPrefix, joinKey, parseS3Uri, s3Uri } from './storage.js';

describe('key helpers', () => {
  it('joins key parts without doubled or edge slashes', () => {
    expect(joinKey('/lora/', 'adapters/', '', '7')).toBe('lora/adapters/7');
  });

  it('turns a prefix into a directory prefix', () => {
    expect(directoryPrefix('/lora/adapters')).toBe('lora/adapters/');
    expect(directoryPrefix('lora/')).toBe('lora/');
    expect(directoryPrefix('')).toBe('');
  });

  it('round-trips s3 URIs', () => {
    expect(s3Uri('bucket', 'lora/')).toBe('s3://bucket/lora/');
    expect(parseS3Uri('s3://bucket/lora/adapters/')).toEqual({ bucket: 'bucket', key: 'lora/adapters/' });
    expect(parseS3Uri('s3://bucket')).toEqual({ bucket: 'bucket', key: '' });
  });

  it('rejects non-s3 URIs', () => {
    expect(() => parseS3Uri('https://bucket.s3.amazonaws.com/key')).toThrow('Not an s3:// URI');
  });
});

describe('InMemoryObjectStore', () => {
  it('lists top-level directories from the root', async () => {
    const store = new InMemoryObjectStore(['b/x', 'a/y/z', 'root.txt']);
    expect(await store.listChildPrefixes('')).toEqual(['a/', 'b/']);
  });

  it('lists nothing under an unknown prefix', async () => {
    const store = new InMemoryObjectStore(['a/y/z']);
    expect(await store.listChildPrefixes('missing')).toEqual([]);
  });

  it('does not treat a sibling with a shared name prefix as a child', async () => {
    const store = new InMemoryObjectStore(['lora/adapters/1/c.json', 'lora/adapters-old/2/c.json']);
    expect(await store.listChildPrefixes('lora/adapters')).toEqual(['lora/adapters/1/']);
  });

  it('stores text and binary bodies', async () => {
    const store = new InMemoryObjectStore();
    await store.putObject('t.txt', 'hello');
    await store.putObject('b.bin', new Uint8Array([104, 105]));
    expect(store.getText('t.txt')).toBe('hello');
    expect(store.getText('b.bin')).toBe('hi');
    expect(store.getText('absent')).toBeUndefined();
  });
});

class PagedS3Store extends S3ObjectStore {
  readonly requests: ListObjectsV2CommandInput[] = [];

  constructor(private readonly pages: ListObjectsV2CommandOutput[]) {
    super(
      new S3Client({ region: 'us-east-1', credentials: { accessKeyId: 'test', secretAccessKey: 'test-secret' } }),
      'models',
    );
  }

  protected override async listPage(input: ListObjectsV2CommandInput): Promise<ListObjectsV2CommandOutput> {
    this.requests.push(input);
    const page = this.pages.shift();
    if (!page) throw new Error('no more pages');
    return page;
  }
}

describe('S3ObjectStore', () => {
  const pages = (): ListObjectsV2CommandOutput[] => [
    {
      $metadata: {},
      CommonPrefixes: [{ Prefix: 'lora/adapters/1/' }, { Prefix: 'lora/adapters/10/' }],
      Contents: [{ Key: 'lora/adapters/lora_modules_manifest.txt' }],
      IsTruncated: true,
      NextContinuationToken: 'page-2',
    },
    {
      $metadata: {},
      CommonPrefixes: [{ Prefix: 'lora/adapters/2/' }],
      IsTruncated: false,
    },
  ];

  it('lists delimited child prefixes across pages', async () => {
    const store = new PagedS3Store(pages());

    expect(await store.listChildPrefixes('lora/adapters')).toEqual([
      'lora/adapters/1/',
      'lora/adapters/10/',
      'lora/adapters/2/',
    ]);
    expect(store.requests).toEqual([
      { Bucket: 'models', Prefix: 'lora/adapters/', Delimiter: '/', ContinuationToken: undefined },
      { Bucket: 'models', Prefix: 'lora/adapters/', Delimiter: '/', ContinuationToken: 'page-2' },
    ]);
  });

  it('never reports an object under the prefix as an adapter', async () => {
    expect(await listAdapterIds(new PagedS3Store(pages()), 'lora/adapters/')).toEqual(['1', '10', '2']);
  });
});
