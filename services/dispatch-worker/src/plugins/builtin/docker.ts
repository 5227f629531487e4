import * as fs from 'fs/promises';
import * as path from 'path';
import { ContextCancelledError } from '../../errors';
import { runCommand } from '../../process/exec';
import type { Artifact, ExecutionContext, Reference } from '../../types';
import { artifactId, sha256 } from '../fingerprint';
import { getString, getStringMap } from '../options';
import type { Builder, PluginOptions, Registry } from '../types';

const DIGEST_PATTERN = /digest: (sha256:[a-f0-9]{64})/;

interface DockerBuilderConfig {
  image: string;
  tag: string;
  dockerfile: string;
  context: string;
  buildArgs: Record<string, string>;
}

export class DockerBuilder implements Builder {
  private config: DockerBuilderConfig = {
    image: '',
    tag: 'latest',
    dockerfile: 'Dockerfile',
    context: '.',
    buildArgs: {},
  };

  configure(options: PluginOptions): void {
    this.config = {
      image: getString(options, 'image') || getString(options, 'name'),
      tag: getString(options, 'tag', 'latest') || 'latest',
      dockerfile: getString(options, 'dockerfile', 'Dockerfile') || 'Dockerfile',
      context: getString(options, 'context', '.') || '.',
      buildArgs: getStringMap(options, 'build_args'),
    };
  }

  async build(ctx: ExecutionContext): Promise<Artifact> {
    if (ctx.signal.aborted) {
      throw new ContextCancelledError('docker build', ctx.signal.reason);
    }
    if (!this.config.image) {
      throw new Error('docker builder requires an image name');
    }

    const startedAt = Date.now();
    const root = ctx.workDir ?? process.cwd();
    const contextDir = path.resolve(root, this.config.context);
    const dockerfilePath = path.resolve(contextDir, this.config.dockerfile);

    try {
      await fs.access(dockerfilePath);
    } catch {
      throw new Error(`Dockerfile not found at: ${this.config.dockerfile}`);
    }

    const reference = `${this.config.image}:${this.config.tag}`;
    const buildArgs = Object.entries(this.config.buildArgs).flatMap(([key, value]) => [
      '--build-arg',
      `${key}=${value}`,
    ]);

    console.log(`[Docker] Building ${reference}`);
    await runCommand(
      ctx,
      'docker',
      ['build', '-t', reference, '-f', dockerfilePath, ...buildArgs, contextDir],
      { cwd: root, redact: Object.values(this.config.buildArgs) },
    );

    const inspected = await runCommand(
      ctx,
      'docker',
      ['image', 'inspect', '--format', '{{.Id}} {{.Size}}', reference],
      { cwd: root, quiet: true },
    );
    const [imageId = '', size = ''] = inspected.stdout.trim().split(' ');
    const sizeBytes = parseInt(size, 10);

    return {
      id: artifactId('docker'),
      image: this.config.image,
      tag: this.config.tag,
      fingerprint: imageId.startsWith('sha256:') ? imageId.slice('sha256:'.length) : sha256(reference),
      sizeBytes: Number.isNaN(sizeBytes) ? undefined : sizeBytes,
      durationMs: Date.now() - startedAt,
      labels: { builder: 'docker' },
      metadata: { builder: 'docker', imageId, dockerfile: this.config.dockerfile },
      builtAt: new Date(),
    };
  }
}

interface DockerRegistryConfig {
  image: string;
  tag: string;
  registry: string;
  namespace: string;
  username: string;
  password: string;
}

/**
 * Tags, logs in and pushes. Connection settings missing from the options
 * fall back to REGISTRY_URL, REGISTRY_NAMESPACE, REGISTRY_USERNAME and
 * REGISTRY_PASSWORD.
 */
export class DockerRegistry implements Registry {
  private config: DockerRegistryConfig = {
    image: '',
    tag: '',
    registry: '',
    namespace: '',
    username: '',
    password: '',
  };

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  configure(options: PluginOptions): void {
    this.config = {
      image: getString(options, 'image'),
      tag: getString(options, 'tag'),
      registry: getString(options, 'registry') || this.env.REGISTRY_URL || '',
      namespace: getString(options, 'namespace') || this.env.REGISTRY_NAMESPACE || '',
      username: getString(options, 'username') || this.env.REGISTRY_USERNAME || '',
      password: getString(options, 'password') || this.env.REGISTRY_PASSWORD || '',
    };
  }

  async push(ctx: ExecutionContext, artifact: Artifact): Promise<Reference> {
    if (ctx.signal.aborted) {
      throw new ContextCancelledError('docker push', ctx.signal.reason);
    }

    const { registry, namespace, username, password } = this.config;
    const source = `${artifact.image}:${artifact.tag || 'latest'}`;
    const repository = [registry, namespace, this.config.image || artifact.image]
      .filter(Boolean)
      .join('/');
    const tag = this.config.tag || artifact.tag || 'latest';
    const target = `${repository}:${tag}`;

    await runCommand(ctx, 'docker', ['tag', source, target]);

    if (username && password) {
      const loginArgs = ['login', '-u', username, '--password-stdin'];
      if (registry) loginArgs.push(registry);
      await runCommand(ctx, 'docker', loginArgs, { input: password, redact: [password] });
    }

    console.log(`[Docker] Pushing ${target}`);
    const result = await runCommand(ctx, 'docker', ['push', target]);
    const digest = DIGEST_PATTERN.exec(result.stdout)?.[1];

    return {
      registry: registry || 'docker.io',
      repository,
      tag,
      digest,
      location: target,
      pushedAt: new Date(),
      metadata: { source, artifactId: artifact.id },
    };
  }
}
