import * as fs from 'fs/promises';
import * as path from 'path';
import { ContextCancelledError } from '../../errors';
import { runCommand } from '../../process/exec';
import type { Artifact, ExecutionContext } from '../../types';
import { artifactId, sha256, sha256File } from '../fingerprint';
import { getString, getStringList, getStringMap } from '../options';
import type { Builder, PluginOptions } from '../types';

export const DEFAULT_TARGETS = ['linux/amd64', 'darwin/arm64'];

export interface ReleaseBinary {
  path: string;
  os: string;
  arch: string;
  sha256: string;
  sizeBytes: number;
}

interface GoReleaseConfig {
  name: string;
  path: string;
  version: string;
  outputDir: string;
  targets: string[];
  ldflags: string;
  buildArgs: Record<string, string>;
}

export function binaryName(name: string, goos: string, goarch: string): string {
  const base = `${name}-${goos}-${goarch}`;
  return goos === 'windows' ? `${base}.exe` : base;
}

export function releaseLdflags(version: string, extra: string): string {
  const flags = ['-s -w'];
  if (version) {
    flags.push(`-X main.Version=${version}`, `-X main.version=${version}`);
  }
  if (extra) flags.push(extra);
  return flags.join(' ');
}

/** Cross-compiles one static binary per GOOS/GOARCH target. */
export class GoReleaseBuilder implements Builder {
  private config: GoReleaseConfig = {
    name: '',
    path: '.',
    version: '',
    outputDir: './dist',
    targets: DEFAULT_TARGETS,
    ldflags: '',
    buildArgs: {},
  };

  configure(options: PluginOptions): void {
    const targets = getStringList(options, 'targets');
    this.config = {
      name: getString(options, 'name'),
      path: getString(options, 'path') || '.',
      version: getString(options, 'version'),
      outputDir: getString(options, 'output_dir') || './dist',
      targets: targets.length > 0 ? targets : DEFAULT_TARGETS,
      ldflags: getString(options, 'ldflags'),
      buildArgs: getStringMap(options, 'build_args'),
    };
  }

  async build(ctx: ExecutionContext): Promise<Artifact> {
    if (ctx.signal.aborted) {
      throw new ContextCancelledError('go release build', ctx.signal.reason);
    }
    if (!this.config.name) {
      throw new Error('go-release builder requires a name');
    }

    const startedAt = Date.now();
    const root = ctx.workDir ?? process.cwd();
    const outputDir = path.resolve(root, this.config.outputDir);
    await fs.mkdir(outputDir, { recursive: true });

    const ldflags = releaseLdflags(this.config.version, this.config.ldflags);
    const extraArgs = Object.entries(this.config.buildArgs).map(([key, value]) => `-${key}=${value}`);
    const binaries: ReleaseBinary[] = [];

    for (const target of this.config.targets) {
      const [goos, goarch, ...rest] = target.split('/');
      if (!goos || !goarch || rest.length > 0) {
        throw new Error(`invalid target format '${target}': expected GOOS/GOARCH`);
      }

      const outputPath = path.join(outputDir, binaryName(this.config.name, goos, goarch));
      console.log(`[GoRelease] Building ${target} -> ${outputPath}`);

      await runCommand(
        ctx,
        'go',
        ['build', '-ldflags', ldflags, '-o', outputPath, ...extraArgs, this.config.path],
        {
          cwd: root,
          env: { ...process.env, CGO_ENABLED: '0', GOOS: goos, GOARCH: goarch },
        },
      );

      let sizeBytes: number;
      try {
        sizeBytes = (await fs.stat(outputPath)).size;
      } catch (error) {
        throw new Error(`binary was not created at ${outputPath}`, { cause: error });
      }

      binaries.push({
        path: outputPath,
        os: goos,
        arch: goarch,
        sha256: await sha256File(outputPath),
        sizeBytes,
      });
    }

    return {
      id: artifactId(`go-release-${this.config.name}`),
      kind: 'release',
      image: this.config.name,
      tag: this.config.version || undefined,
      fingerprint: sha256(binaries.map((binary) => binary.sha256).join('\n')),
      sizeBytes: binaries.reduce((total, binary) => total + binary.sizeBytes, 0),
      durationMs: Date.now() - startedAt,
      labels: { builder: 'go-release' },
      metadata: {
        builder: 'go-release',
        binaries,
        targets: this.config.targets,
        version: this.config.version,
      },
      builtAt: new Date(),
    };
  }
}
