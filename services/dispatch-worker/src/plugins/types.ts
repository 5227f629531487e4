import type {
  Artifact,
  DeployRequest,
  DeploymentResult,
  ExecutionContext,
  Reference,
} from '../types';

/**
 * Plugin-specific option mapping as it arrives from task parameters.
 * Each plugin picks out the keys it recognizes.
 */
export type PluginOptions = Record<string, unknown>;

export interface Configurable {
  configure(options: PluginOptions): void;
}

/** Produces an artifact from source. */
export interface Builder extends Configurable {
  build(ctx: ExecutionContext): Promise<Artifact>;
}

/** Publishes an artifact somewhere durable. */
export interface Registry extends Configurable {
  push(ctx: ExecutionContext, artifact: Artifact): Promise<Reference>;
}

/** Runs or removes a workload on a cluster. */
export interface Platform extends Configurable {
  deploy(ctx: ExecutionContext, request: DeployRequest): Promise<DeploymentResult>;
  destroy(ctx: ExecutionContext, jobId: string): Promise<void>;
}

export interface PluginComponents {
  builder?: () => Builder;
  registry?: () => Registry;
  platform?: () => Platform;
}

export type Capability = keyof PluginComponents;
