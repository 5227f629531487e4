import type { z } from 'zod';
import type { BuildPhase, DeploymentEvent, DeploymentSourceType } from '@dockhand/contracts';
import type { LogBus } from '../../bus/client';
import { errorMessage } from '../../errors';
import type { PluginRegistry } from '../../plugins/registry';
import type { ExecutionContext, NetworkPort } from '../../types';
import { validateParams } from '../params';
import type { NetworkPortParams } from '../params';

/** What a handler gets besides its params. */
export interface HandlerDeps {
  ctx: ExecutionContext;
  bus: LogBus | null;
  plugins: PluginRegistry;
  /** Parent for per-task work directories; the OS temp dir when unset. */
  workRoot?: string;
}

export type BoundTask = (deps: HandlerDeps) => Promise<void>;

/**
 * A task handler. `bind` validates raw params and throws ValidationError on
 * a mismatch, so validation never reaches the handler body.
 */
export interface TaskHandler {
  bind(params: unknown): BoundTask;
}

export function defineHandler<S extends z.ZodTypeAny>(
  kind: string,
  schema: S,
  run: (deps: HandlerDeps, params: z.output<S>) => Promise<void>,
): TaskHandler {
  return {
    bind(params: unknown): BoundTask {
      const validated = validateParams(kind, schema, params);
      return (deps) => run(deps, validated);
    },
  };
}

// ===========================================
// Log helpers
// ===========================================

export function setPhase(ctx: ExecutionContext, phase: BuildPhase): void {
  ctx.stdout?.setPhase(phase);
  ctx.stderr?.setPhase(phase);
}

/** One line to local stdout and the stdout build log. */
export async function log(ctx: ExecutionContext, message: string): Promise<void> {
  console.log(message);
  await ctx.stdout?.write(`${message}\n`);
}

export async function logError(ctx: ExecutionContext, message: string): Promise<void> {
  console.error(message);
  await ctx.stderr?.write(`${message}\n`);
}

/**
 * Run one handler phase: tag both writers, print the phase banner, and on
 * failure print `ERROR [<phase>]` before rethrowing.
 */
export async function step<T>(
  ctx: ExecutionContext,
  phase: BuildPhase,
  title: string,
  work: () => Promise<T>,
): Promise<T> {
  setPhase(ctx, phase);
  await log(ctx, `=== Phase: ${title} ===`);

  try {
    return await work();
  } catch (error) {
    await logError(ctx, `ERROR [${phase}]: ${errorMessage(error)}`);
    throw error;
  }
}

// ===========================================
// Lifecycle events
// ===========================================

interface DeploymentIdentity {
  deploymentJobId: number;
  deploymentId: string;
  serviceId: string;
  teamId?: string;
  userId: number;
  ownerId: string;
}

export function deploymentEvent(params: DeploymentIdentity, type: DeploymentSourceType): DeploymentEvent {
  return {
    jobId: params.deploymentJobId,
    type,
    deploymentId: params.deploymentId,
    serviceId: params.serviceId,
    teamId: params.teamId,
    userId: String(params.userId),
    ownerId: params.ownerId,
  };
}

// Lifecycle events are reporting only: a failed publish is logged, never fatal.
async function publishEvent(name: string, publish: () => Promise<void>): Promise<void> {
  try {
    await publish();
  } catch (error) {
    console.warn(`[DispatchWorker] Failed to publish ${name} event:`, errorMessage(error));
  }
}

export function announceStarted(bus: LogBus | null, jobId: number): Promise<void> {
  if (!bus) return Promise.resolve();
  return publishEvent('deployment started', () => bus.publishDeploymentStarted(jobId));
}

export function announceSucceeded(bus: LogBus | null, event: DeploymentEvent): Promise<void> {
  if (!bus) return Promise.resolve();
  return publishEvent('deployment succeeded', () => bus.publishDeploymentSucceeded(event));
}

export function announceFailed(bus: LogBus | null, event: DeploymentEvent): Promise<void> {
  if (!bus) return Promise.resolve();
  return publishEvent('deployment failed', () => bus.publishDeploymentFailed(event));
}

// ===========================================
// Deploy request helpers
// ===========================================

/** `name:tag`, unless the name already pins a tag or digest. */
export function imageReference(name: string, tag?: string): string {
  const lastSegment = name.slice(name.lastIndexOf('/') + 1);
  if (!tag || name.includes('@') || lastSegment.includes(':')) return name;
  return `${name}:${tag}`;
}

export function toNetworkPorts(networks: NetworkPortParams[]): NetworkPort[] {
  return networks.map((network) => ({
    portNumber: network.portNumber,
    portType: network.portType,
    public: network.public,
    domain: network.domain,
  }));
}

/** Strip leading and trailing slashes and any `..` so the path stays inside the checkout. */
export function sanitizeRootDirectory(rootDirectory?: string): string {
  if (!rootDirectory) return '';
  return rootDirectory
    .split('/')
    .filter((segment) => segment !== '' && segment !== '.' && segment !== '..')
    .join('/');
}
