import { execa } from 'execa';
import {
  CreateRepositoryCommand,
  DescribeRepositoriesCommand,
  GetAuthorizationTokenCommand,
  RepositoryNotFoundException,
} from '@aws-sdk/client-ecr';
import type { ECRClient } from '@aws-sdk/client-ecr';
import {
  DEFAULT_PORT,
  DEFAULT_SERVER_MODULE_PATH,
  DEFAULT_VLLM_VERSION,
  HEALTH_ROUTE,
  INVOCATIONS_ROUTE,
} from './config.js';

export interface RoutePatch {
  from: string;
  to: string;
}

/** Routes of the OpenAI server renamed to what SageMaker hosting calls. */
export const ROUTE_PATCHES: readonly RoutePatch[] = [
  { from: '/health', to: HEALTH_ROUTE },
  { from: '/v1/completions', to: INVOCATIONS_ROUTE },
];

export interface PatchResult {
  text: string;
  /** Replacements made, keyed by the route that was renamed. */
  replacements: Record<string, number>;
}

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

// Whole quoted literals only, so "/health_generate" or "/v1/completions/x" never match.
const quotedLiteral = (route: string): RegExp =>
  new RegExp(`(["'])${escapeRegExp(route)}\\1`, 'g');

export function applyRoutePatches(
  source: string,
  patches: readonly RoutePatch[] = ROUTE_PATCHES,
): PatchResult {
  let text = source;
  const replacements: Record<string, number> = {};
  for (const { from, to } of patches) {
    let count = 0;
    text = text.replace(quotedLiteral(from), (_match, quote: string) => {
      count += 1;
      return `${quote}${to}${quote}`;
    });
    replacements[from] = count;
  }
  return { text, replacements };
}

/** Patches whose target route does not appear in `text`. */
export function missingRoutes(
  text: string,
  patches: readonly RoutePatch[] = ROUTE_PATCHES,
): RoutePatch[] {
  return patches.filter(({ to }) => !quotedLiteral(to).test(text));
}

export interface DockerfileOptions {
  vllmVersion?: string;
  serverModulePath?: string;
  port?: number;
  appDir?: string;
}

export function renderDockerfile({
  vllmVersion = DEFAULT_VLLM_VERSION,
  serverModulePath = DEFAULT_SERVER_MODULE_PATH,
  port = DEFAULT_PORT,
  appDir = '/opt/lora-host',
}: DockerfileOptions = {}): string {
  return `ARG VERSION=${vllmVersion}

FROM node:20-slim AS build
WORKDIR /build
COPY package.json tsconfig.json ./
RUN npm install
COPY scripts ./scripts
RUN npm run build && npm prune --omit=dev

FROM vllm/vllm-openai:\${VERSION}
COPY --from=build /usr/local/bin/node /usr/local/bin/node
COPY --from=build /build/package.json ${appDir}/package.json
COPY --from=build /build/node_modules ${appDir}/node_modules
COPY --from=build /build/dist ${appDir}/dist

# Serve ${HEALTH_ROUTE} and ${INVOCATIONS_ROUTE} as required by SageMaker hosting
RUN node ${appDir}/dist/scripts/patch_routes.js --check ${serverModulePath}

EXPOSE ${port}
ENTRYPOINT ["node", "${appDir}/dist/scripts/entrypoint.js"]
`;
}

export function ecrImageUri(registry: string, repository: string, tag: string): string {
  return `${registry}/${repository}:${tag}`;
}

/** `https://123.dkr.ecr.us-east-1.amazonaws.com` -> `123.dkr.ecr.us-east-1.amazonaws.com` */
export function registryFromEndpoint(proxyEndpoint: string): string {
  return proxyEndpoint.replace(/^https?:\/\//, '').replace(/\/+$/, '');
}

/**
 * Runs a CLI command and resolves its stdout. Overridable for tests.
 */
export type CommandExec = (command: string, args: string[], input?: string) => Promise<string>;

export const execCommand: CommandExec = async (command, args, input) => {
  const result = await execa(command, args, {
    input,
    stdout: ['pipe', 'inherit'],
    stderr: 'inherit',
  });
  return result.stdout;
};

export async function ensureRepository(ecr: ECRClient, repositoryName: string): Promise<boolean> {
  try {
    await ecr.send(new DescribeRepositoriesCommand({ repositoryNames: [repositoryName] }));
    return false;
  } catch (err) {
    if (!(err instanceof RepositoryNotFoundException)) throw err;
  }
  await ecr.send(new CreateRepositoryCommand({ repositoryName }));
  return true;
}

/** ECR tokens are base64 `AWS:<password>`. */
export function decodeAuthorizationToken(token: string): { username: string; password: string } {
  const decoded = Buffer.from(token, 'base64').toString('utf8');
  const sep = decoded.indexOf(':');
  if (sep <= 0) {
    throw new Error('Malformed ECR authorization token');
  }
  return { username: decoded.slice(0, sep), password: decoded.slice(sep + 1) };
}

/** Logs docker in to the account's ECR registry and returns the registry host. */
export async function dockerLogin(ecr: ECRClient, exec: CommandExec = execCommand): Promise<string> {
  const response = await ecr.send(new GetAuthorizationTokenCommand({}));
  const auth = response.authorizationData?.[0];
  if (!auth?.authorizationToken || !auth.proxyEndpoint) {
    throw new Error('ECR returned no authorization data');
  }
  const { username, password } = decodeAuthorizationToken(auth.authorizationToken);
  await exec(
    'docker',
    ['login', '--username', username, '--password-stdin', auth.proxyEndpoint],
    password,
  );
  return registryFromEndpoint(auth.proxyEndpoint);
}

export interface BuildImageOptions {
  contextDir: string;
  dockerfile: string;
  imageUri: string;
  vllmVersion: string;
  platform?: string;
  push: boolean;
}

export function dockerBuildArgs(options: BuildImageOptions): string[] {
  const args = ['build', '-f', options.dockerfile, '--build-arg', `VERSION=${options.vllmVersion}`];
  if (options.platform) {
    args.push('--platform', options.platform);
  }
  args.push('-t', options.imageUri, options.contextDir);
  return args;
}

export async function buildImage(
  options: BuildImageOptions,
  exec: CommandExec = execCommand,
): Promise<void> {
  await exec('docker', dockerBuildArgs(options));
  if (options.push) {
    await exec('docker', ['push', options.imageUri]);
  }
}
