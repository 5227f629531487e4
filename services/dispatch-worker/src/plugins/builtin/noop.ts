import { ContextCancelledError } from '../../errors';
import type {
  Artifact,
  DeployRequest,
  DeploymentResult,
  ExecutionContext,
  Reference,
} from '../../types';
import { artifactId, sha256 } from '../fingerprint';
import { getString } from '../options';
import type { Builder, Platform, PluginOptions, Registry } from '../types';

/**
 * Plugins that do nothing. Used for image deployments, where the image is
 * already built, and in tests.
 */

export class NoopBuilder implements Builder {
  private message = '';

  configure(options: PluginOptions): void {
    this.message = getString(options, 'message');
  }

  async build(ctx: ExecutionContext): Promise<Artifact> {
    if (ctx.signal.aborted) {
      throw new ContextCancelledError('noop build', ctx.signal.reason);
    }

    return {
      id: artifactId('noop'),
      image: 'noop',
      tag: 'latest',
      fingerprint: sha256(this.message),
      durationMs: 0,
      labels: { builder: 'noop' },
      metadata: { builder: 'noop', message: this.message },
      builtAt: new Date(),
    };
  }
}

export class NoopRegistry implements Registry {
  configure(_options: PluginOptions): void {}

  async push(ctx: ExecutionContext, artifact: Artifact): Promise<Reference> {
    if (ctx.signal.aborted) {
      throw new ContextCancelledError('noop push', ctx.signal.reason);
    }

    const tag = artifact.tag || 'latest';
    return {
      registry: 'noop-registry',
      repository: artifact.image,
      tag,
      location: `noop-registry/${artifact.image}:${tag}`,
      pushedAt: new Date(),
      metadata: { artifactId: artifact.id },
    };
  }
}

export class NoopPlatform implements Platform {
  configure(_options: PluginOptions): void {}

  async deploy(ctx: ExecutionContext, request: DeployRequest): Promise<DeploymentResult> {
    if (ctx.signal.aborted) {
      throw new ContextCancelledError('noop deploy', ctx.signal.reason);
    }
    return { id: request.jobId, platform: 'noop', state: 'running' };
  }

  async destroy(ctx: ExecutionContext, _jobId: string): Promise<void> {
    if (ctx.signal.aborted) {
      throw new ContextCancelledError('noop destroy', ctx.signal.reason);
    }
  }
}
