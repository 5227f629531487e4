import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { errorMessage } from '../../errors';
import { PluginRun, runBuild, runPush } from '../../plugins/lifecycle';
import type { PluginOptions } from '../../plugins/types';
import { cloneRepository } from '../../steps/clone';
import { builderChain, detectBuilders } from '../../steps/detect';
import type { Detection } from '../../steps/detect';
import { describeSourceUrl, downloadSource } from '../../steps/download';
import type { Artifact, ExecutionContext } from '../../types';
import { deployRepositoryParamsSchema } from '../params';
import type { DeployRepositoryParams } from '../params';
import {
  announceFailed,
  announceStarted,
  announceSucceeded,
  defineHandler,
  deploymentEvent,
  imageReference,
  log,
  logError,
  sanitizeRootDirectory,
  step,
  toNetworkPorts,
} from './shared';
import type { HandlerDeps } from './shared';

function imageName(params: DeployRepositoryParams): string {
  return params.imageName || params.jobId;
}

export function builderOptions(
  builder: string,
  params: DeployRepositoryParams,
  detection: Detection,
): PluginOptions {
  const options: PluginOptions = { name: imageName(params), version: params.imageTag };

  if (builder === 'docker') {
    Object.assign(options, {
      image: imageName(params),
      tag: params.imageTag,
      dockerfile: params.build.dockerfilePath || detection.dockerfile || 'Dockerfile',
      build_args: params.build.buildArgs,
    });
  }

  return { ...options, ...params.build.options };
}

export function registryOptions(params: DeployRepositoryParams): PluginOptions {
  const { build } = params;
  const options: PluginOptions = {};

  if (build.registry === 'docker') {
    Object.assign(options, {
      image: imageName(params),
      tag: params.imageTag,
      registry: build.registryUrl,
      namespace: build.registryNamespace,
      username: build.registryUsername,
      password: build.registryPassword,
    });
  }

  return { ...options, ...build.options };
}

/**
 * Try each builder in order until one produces an artifact. A cancelled
 * context stops the chain instead of falling through to the next builder.
 */
async function buildWithFallback(
  deps: HandlerDeps,
  ctx: ExecutionContext,
  params: DeployRepositoryParams,
  detection: Detection,
): Promise<{ run: PluginRun; artifact: Artifact }> {
  const chain = builderChain(detection, params.build.builder);
  if (chain.length === 0) {
    throw new Error('no builder available: set build.builder or add a Dockerfile');
  }
  await log(ctx, `Builder chain: ${chain.join(', ')}`);

  let lastError: unknown;
  for (const [attempt, name] of chain.entries()) {
    if (attempt > 0) {
      await log(ctx, `Warning: builder '${chain[attempt - 1]}' failed, trying '${name}' (attempt ${attempt + 1}/${chain.length})...`);
    }
    await log(ctx, `Building with ${name}...`);

    const run = new PluginRun();
    try {
      const builder = deps.plugins.loadBuilder(name, builderOptions(name, params, detection));
      const artifact = await runBuild(run, builder, ctx);
      await log(ctx, `Build succeeded with ${name}`);
      return { run, artifact };
    } catch (error) {
      if (ctx.signal.aborted) throw error;
      lastError = error;
      await logError(ctx, `Builder '${name}' failed: ${errorMessage(error)}`);
    }
  }

  throw new Error(`build failed with all builders: ${errorMessage(lastError)}`, { cause: lastError });
}

async function cleanup(workDir: string): Promise<void> {
  try {
    await fs.rm(workDir, { recursive: true, force: true });
  } catch (error) {
    console.error(`[DispatchWorker] Failed to cleanup ${workDir}:`, errorMessage(error));
  }
}

/** Check out the repository, or unpack the uploaded archive, under `workDir/source`. */
async function fetchSource(ctx: ExecutionContext, workDir: string, params: DeployRepositoryParams): Promise<string> {
  const destination = path.join(workDir, 'source');
  const { sourceUrl } = params;

  if (params.sourceType === 'local_upload' && sourceUrl) {
    return step(ctx, 'clone', 'Download & Extract', async () => {
      await log(ctx, `Downloading uploaded source from ${describeSourceUrl(sourceUrl)}...`);
      const source = await downloadSource(ctx, sourceUrl, destination);
      await log(ctx, `Source extracted successfully (${source.entries} entries, ${source.sizeBytes} bytes)`);
      return source.directory;
    });
  }

  return step(ctx, 'clone', 'Clone', async () => {
    await log(ctx, `Cloning repository ${params.repository} (branch: ${params.branch})...`);
    const checkout = await cloneRepository(
      ctx,
      destination,
      params.repository,
      params.branch,
      params.gitPass,
      params.provider,
    );
    await log(ctx, 'Clone completed successfully');
    return checkout;
  });
}

async function deployRepository(deps: HandlerDeps, params: DeployRepositoryParams): Promise<void> {
  const { bus } = deps;
  const event = deploymentEvent(params, 'git_repo');

  await log(deps.ctx, '=== Starting deployment from repository ===');
  if (params.sourceType === 'local_upload') {
    await log(deps.ctx, `Source: uploaded archive${params.uploadId ? ` (upload ${params.uploadId})` : ''}`);
  } else {
    await log(deps.ctx, `Repository: ${params.repository}`);
    await log(deps.ctx, `Branch: ${params.branch}`);
  }
  await log(deps.ctx, `Job ID: ${params.jobId}`);
  await announceStarted(bus, params.deploymentJobId);

  const workRoot = deps.workRoot ?? os.tmpdir();
  await fs.mkdir(workRoot, { recursive: true });
  const workDir = await fs.mkdtemp(path.join(workRoot, 'dispatch-'));
  const ctx: ExecutionContext = { ...deps.ctx, workDir };

  try {
    const checkout = await fetchSource(ctx, workDir, params);

    const sourceDir = path.join(checkout, sanitizeRootDirectory(params.build.rootDirectory));
    const buildCtx: ExecutionContext = { ...ctx, workDir: sourceDir };

    const { run, artifact } = await step(buildCtx, 'build', 'Build', async () => {
      const detection = await detectBuilders(sourceDir);
      const result = await buildWithFallback(deps, buildCtx, params, detection);
      await log(buildCtx, `Artifact ID: ${result.artifact.id}`);
      return result;
    });

    if (artifact.kind === 'release') {
      await step(buildCtx, 'release', 'Release', async () => {
        if (params.build.disablePush) {
          await log(buildCtx, 'Push disabled, release not published');
          return;
        }
        const registry = deps.plugins.loadRegistry(params.build.registry, registryOptions(params));
        const reference = await runPush(run, registry, buildCtx);
        await log(buildCtx, `Release published\nRelease: ${reference.location}`);
      });
      await log(ctx, `Skipping container deploy: ${artifact.image} is a release artifact`);
    } else {
      let image = imageReference(artifact.image, artifact.tag);
      if (!params.build.disablePush) {
        image = await step(buildCtx, 'registry', 'Registry', async () => {
          const registry = deps.plugins.loadRegistry(params.build.registry, registryOptions(params));
          const reference = await runPush(run, registry, buildCtx);
          await log(buildCtx, `Registry push completed\nImage: ${reference.location}`);
          return reference.location;
        });
      }

      await step(ctx, 'deploy', 'Deploy', async () => {
        const platform = deps.plugins.loadPlatform(params.platform, {
          address: params.nomadAddress,
          token: params.nomadToken,
        });
        const result = await platform.deploy(ctx, {
          jobId: params.jobId,
          serviceId: params.serviceId,
          image,
          replicaCount: params.replicaCount,
          cpu: params.cpu,
          ram: params.ram,
          command: params.build.startCommand,
          networks: toNetworkPorts(params.networks),
        });
        await log(ctx, `Deploy completed\nDeployment ID: ${result.id}\nStatus: ${result.state}`);
      });
    }
  } catch (error) {
    console.log(`[DispatchWorker] Preserving work directory for debugging: ${workDir}`);
    await announceFailed(bus, event);
    throw error;
  }

  await cleanup(workDir);
  await announceSucceeded(bus, event);
  await log(ctx, '=== Deployment completed successfully ===');
}

export const deployRepositoryHandler = defineHandler(
  'deploy-repository',
  deployRepositoryParamsSchema,
  deployRepository,
);

// A redeploy rebuilds from the same source; only the kind named in errors differs.
export const redeployRepositoryHandler = defineHandler(
  'redeploy-repository',
  deployRepositoryParamsSchema,
  deployRepository,
);
