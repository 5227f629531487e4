import { sha256 } from '../../plugins/fingerprint';
import type { Artifact } from '../../types';
import { deployImageParamsSchema } from '../params';
import type { DeployImageParams } from '../params';
import {
  announceFailed,
  announceStarted,
  announceSucceeded,
  defineHandler,
  deploymentEvent,
  imageReference,
  log,
  step,
  toNetworkPorts,
} from './shared';
import type { HandlerDeps } from './shared';

/** A pre-built image is its own artifact; there is no build or push. */
export function imageArtifact(params: DeployImageParams): Artifact {
  const reference = imageReference(params.imageName, params.imageTag);
  return {
    id: `image-${params.jobId}`,
    image: params.imageName,
    tag: params.imageTag,
    fingerprint: sha256(reference),
    durationMs: 0,
    labels: { builder: 'image' },
    metadata: { reference },
    builtAt: new Date(),
  };
}

async function deployImage(deps: HandlerDeps, params: DeployImageParams): Promise<void> {
  const { ctx, bus } = deps;
  const event = deploymentEvent(params, 'image');
  const artifact = imageArtifact(params);
  const image = imageReference(artifact.image, artifact.tag);

  await log(ctx, '=== Starting deployment from pre-built image ===');
  await log(ctx, `Image: ${image}`);
  await log(ctx, `Job ID: ${params.jobId}`);
  await announceStarted(bus, params.deploymentJobId);

  try {
    await step(ctx, 'deploy', 'Deploy', async () => {
      await log(ctx, 'Deploying image to cluster...');
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
  } catch (error) {
    await announceFailed(bus, event);
    throw error;
  }

  await announceSucceeded(bus, event);
  await log(ctx, '=== Deployment completed successfully ===');
}

export const deployImageHandler = defineHandler('deploy-image', deployImageParamsSchema, deployImage);
