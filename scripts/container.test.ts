import { describe, expect, it, vi } from 'vitest';
import {
  applyRoutePatches,
  buildImage,
  decodeAuthorizationToken,
  dockerBuildArgs,
  ecrImageUri,
  missingRoutes,
  registryFromEndpoint,
  renderDockerfile,
} from './container.js';
import type { BuildImageOptions, CommandExec } from './container.js';

const SERVER_SOURCE = [
  '@router.get("/health")',
  'async def health(raw_request: Request) -> Response:',
  '@router.get("/health_generate")',
  '@router.post("/v1/completions")',
  '@router.post("/v1/chat/completions")',
  "@router.post('/v1/completions/stream')",
  "COMPLETIONS_PATH = '/v1/completions'",
  '# see /health for liveness',
].join('\n');

describe('applyRoutePatches', () => {
  it('renames only the two exact routes', () => {
    const { text, replacements } = applyRoutePatches(SERVER_SOURCE);

    expect(text.split('\n')).toEqual([
      '@router.get("/ping")',
      'async def health(raw_request: Request) -> Response:',
      '@router.get("/health_generate")',
      '@router.post("/invocations")',
      '@router.post("/v1/chat/completions")',
      "@router.post('/v1/completions/stream')",
      "COMPLETIONS_PATH = '/invocations'",
      '# see /health for liveness',
    ]);
    expect(replacements).toEqual({ '/health': 1, '/v1/completions': 2 });
  });

  it('is idempotent', () => {
    const once = applyRoutePatches(SERVER_SOURCE).text;
    const twice = applyRoutePatches(once);

    expect(twice.text).toBe(once);
    expect(twice.replacements).toEqual({ '/health': 0, '/v1/completions': 0 });
  });

  it('reports target routes that are still missing', () => {
    expect(missingRoutes(SERVER_SOURCE).map((p) => p.to)).toEqual(['/ping', '/invocations']);
    expect(missingRoutes(applyRoutePatches(SERVER_SOURCE).text)).toEqual([]);
  });
});

describe('renderDockerfile', () => {
  it('wraps the vLLM image and runs the node entrypoint in the foreground', () => {
    const lines = renderDockerfile({ vllmVersion: 'v0.6.3' }).split('\n');

    expect(lines[0]).toBe('ARG VERSION=v0.6.3');
    expect(lines).toContain('FROM vllm/vllm-openai:${VERSION}');
    expect(lines).toContain(
      'RUN node /opt/lora-host/dist/scripts/patch_routes.js --check vllm/entrypoints/openai/api_server.py',
    );
    expect(lines).toContain('EXPOSE 8080');
    expect(lines).toContain('ENTRYPOINT ["node", "/opt/lora-host/dist/scripts/entrypoint.js"]');
  });

  it('honours a custom server module path and app dir', () => {
    const text = renderDockerfile({
      serverModulePath: '/usr/local/lib/python3.12/dist-packages/vllm/entrypoints/openai/api_server.py',
      appDir: '/app',
    });

    expect(text).toContain(
      'RUN node /app/dist/scripts/patch_routes.js --check /usr/local/lib/python3.12/dist-packages/vllm/entrypoints/openai/api_server.py',
    );
    expect(text).toContain('COPY --from=build /build/dist /app/dist');
  });
});

describe('ECR helpers', () => {
  it('derives the registry host and image URI', () => {
    const registry = registryFromEndpoint('https://123456789012.dkr.ecr.us-east-1.amazonaws.com');
    expect(registry).toBe('123456789012.dkr.ecr.us-east-1.amazonaws.com');
    expect(ecrImageUri(registry, 'sagemaker-vllm-lora', 'v1')).toBe(
      '123456789012.dkr.ecr.us-east-1.amazonaws.com/sagemaker-vllm-lora:v1',
    );
  });

  it('decodes the authorization token', () => {
    const token = Buffer.from('AWS:test-secret').toString('base64');
    expect(decodeAuthorizationToken(token)).toEqual({ username: 'AWS', password: 'test-secret' });
    expect(() => decodeAuthorizationToken(Buffer.from('no-separator').toString('base64'))).toThrow(
      'Malformed ECR authorization token',
    );
  });
});

describe('buildImage', () => {
  const options: BuildImageOptions = {
    contextDir: '/repo',
    dockerfile: '/repo/.build/Dockerfile',
    imageUri: 'registry.example/sagemaker-vllm-lora:v1',
    vllmVersion: 'v0.6.3',
    platform: 'linux/amd64',
    push: true,
  };

  it('builds with the base image version and platform', () => {
    expect(dockerBuildArgs(options)).toEqual([
      'build',
      '-f',
      '/repo/.build/Dockerfile',
      '--build-arg',
      'VERSION=v0.6.3',
      '--platform',
      'linux/amd64',
      '-t',
      'registry.example/sagemaker-vllm-lora:v1',
      '/repo',
    ]);
  });

  it('pushes after a successful build', async () => {
    const exec = vi.fn<CommandExec>(async () => '');
    await buildImage(options, exec);

    expect(exec).toHaveBeenCalledTimes(2);
    expect(exec.mock.calls[0]?.[1][0]).toBe('build');
    expect(exec.mock.calls[1]).toEqual(['docker', ['push', 'registry.example/sagemaker-vllm-lora:v1']]);
  });

  it('skips the push for local builds', async () => {
    const exec = vi.fn<CommandExec>(async () => '');
    await buildImage({ ...options, push: false, platform: undefined }, exec);

    expect(exec).toHaveBeenCalledTimes(1);
    expect(exec.mock.calls[0]?.[1]).not.toContain('--platform');
  });

  it('does not push when the build fails', async () => {
    const exec = vi.fn<CommandExec>(async (_command, args) => {
      if (args[0] === 'build') throw new Error('build failed');
      return '';
    });

    await expect(buildImage(options, exec)).rejects.toThrow('build failed');
    expect(exec).toHaveBeenCalledTimes(1);
  });
});
