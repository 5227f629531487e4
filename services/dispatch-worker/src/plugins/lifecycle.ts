import { ContextCancelledError, PluginStateError } from '../errors';
import type { Artifact, ExecutionContext, Reference } from '../types';
import type { Builder, Registry } from './types';

export type PluginRunState =
  | 'configured'
  | 'building'
  | 'built'
  | 'build_failed'
  | 'build_cancelled'
  | 'pushing'
  | 'pushed'
  | 'push_failed'
  | 'push_cancelled';

const TRANSITIONS: Record<PluginRunState, readonly PluginRunState[]> = {
  configured: ['building'],
  building: ['built', 'build_failed', 'build_cancelled'],
  built: ['pushing'],
  build_failed: [],
  build_cancelled: [],
  pushing: ['pushed', 'push_failed', 'push_cancelled'],
  pushed: [],
  push_failed: [],
  push_cancelled: [],
};

/**
 * Tracks one build-then-push invocation. There is no retry path: every
 * failure state is terminal and a new run starts from `configured`.
 */
export class PluginRun {
  private current: PluginRunState = 'configured';
  private builtArtifact: Artifact | null = null;

  get state(): PluginRunState {
    return this.current;
  }

  get artifact(): Artifact | null {
    return this.builtArtifact;
  }

  transition(next: PluginRunState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new PluginStateError(`invalid plugin transition: ${this.current} -> ${next}`);
    }
    this.current = next;
  }

  recordArtifact(artifact: Artifact): void {
    this.transition('built');
    this.builtArtifact = artifact;
  }
}

export async function runBuild(
  run: PluginRun,
  builder: Builder,
  ctx: ExecutionContext,
): Promise<Artifact> {
  run.transition('building');

  if (ctx.signal.aborted) {
    run.transition('build_cancelled');
    throw new ContextCancelledError('build', ctx.signal.reason);
  }

  try {
    const artifact = await builder.build(ctx);
    run.recordArtifact(artifact);
    return artifact;
  } catch (error) {
    run.transition(ctx.signal.aborted ? 'build_cancelled' : 'build_failed');
    throw error;
  }
}

export async function runPush(
  run: PluginRun,
  registry: Registry,
  ctx: ExecutionContext,
): Promise<Reference> {
  const artifact = run.artifact;
  if (run.state !== 'built' || !artifact) {
    throw new PluginStateError(`cannot push from state ${run.state}: no built artifact`);
  }

  run.transition('pushing');

  if (ctx.signal.aborted) {
    run.transition('push_cancelled');
    throw new ContextCancelledError('push', ctx.signal.reason);
  }

  try {
    const reference = await registry.push(ctx, artifact);
    run.transition('pushed');
    return reference;
  } catch (error) {
    run.transition(ctx.signal.aborted ? 'push_cancelled' : 'push_failed');
    throw error;
  }
}
