import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { CommandError, ContextCancelledError } from '../../errors';
import { runCommand } from '../../process/exec';
import type { Artifact, ExecutionContext, Reference } from '../../types';
import { sha256File } from '../fingerprint';
import { getBool, getSection, getString, getStringList } from '../options';
import type { PluginOptions, Registry } from '../types';

const binariesSchema = z.array(z.union([z.string(), z.object({ path: z.string() })]));

interface GitHubReleaseConfig {
  repository: string;
  token: string;
  tagName: string;
  releaseName: string;
  releaseNotes: string;
  generateNotes: boolean;
  checksums: boolean;
  draft: boolean;
  prerelease: boolean;
  createRelease: boolean;
  targetCommit: string;
  assets: string[];
}

/** Asset paths from a builder's artifact metadata (`binaries` or `release_assets`). */
export function artifactAssets(artifact: Artifact): string[] {
  for (const key of ['binaries', 'release_assets']) {
    const parsed = binariesSchema.safeParse(artifact.metadata[key]);
    if (parsed.success) {
      return parsed.data.map((entry) => (typeof entry === 'string' ? entry : entry.path));
    }
  }

  const single = artifact.metadata.binary_path;
  return typeof single === 'string' ? [single] : [];
}

/** `checksums.txt` content: one `<sha256>  <basename>` line per asset. */
export async function checksumsFile(assets: string[]): Promise<string> {
  const lines: string[] = [];
  for (const asset of assets) {
    lines.push(`${await sha256File(asset)}  ${path.basename(asset)}`);
  }
  return lines.map((line) => `${line}\n`).join('');
}

/**
 * Publishes release assets with the `gh` CLI. The release is created when
 * it does not exist yet unless `create_release` is false.
 */
export class GitHubReleaseRegistry implements Registry {
  private config: GitHubReleaseConfig = {
    repository: '',
    token: '',
    tagName: '',
    releaseName: '',
    releaseNotes: '',
    generateNotes: false,
    checksums: false,
    draft: false,
    prerelease: false,
    createRelease: true,
    targetCommit: '',
    assets: [],
  };

  configure(options: PluginOptions): void {
    this.config = {
      repository: getString(options, 'repository'),
      token: getString(getSection(options, 'auth'), 'token') || getString(options, 'token'),
      tagName: getString(options, 'tag_name'),
      releaseName: getString(options, 'release_name'),
      releaseNotes: getString(options, 'release_notes'),
      generateNotes: getBool(options, 'generate_notes'),
      checksums: getBool(options, 'checksums'),
      draft: getBool(options, 'draft'),
      prerelease: getBool(options, 'prerelease'),
      createRelease: getBool(options, 'create_release', true),
      targetCommit: getString(options, 'target_commit'),
      assets: getStringList(options, 'assets'),
    };
  }

  async push(ctx: ExecutionContext, artifact: Artifact): Promise<Reference> {
    if (ctx.signal.aborted) {
      throw new ContextCancelledError('github release', ctx.signal.reason);
    }

    const { repository, token } = this.config;
    const tagName = this.config.tagName || artifact.tag || '';
    if (!repository) throw new Error('github registry requires a repository');
    if (!token) throw new Error('github registry requires a token');
    if (!tagName) throw new Error('github registry requires a tag_name');

    const assets = this.config.assets.length > 0 ? [...this.config.assets] : artifactAssets(artifact);
    if (assets.length === 0) {
      throw new Error('no release assets found: set assets or build with a release builder');
    }

    const gh = (args: string[], quiet = false) =>
      runCommand(ctx, 'gh', args, {
        env: { ...process.env, GH_TOKEN: token },
        redact: [token],
        quiet,
      });

    if (!(await this.releaseExists(gh, tagName))) {
      if (!this.config.createRelease) {
        throw new Error(`release ${tagName} does not exist and create_release is false`);
      }
      console.log(`[GitHub] Creating release ${tagName} on ${repository}`);
      await gh(this.createArgs(tagName));
    }

    if (this.config.checksums) {
      const checksumsPath = path.join(path.dirname(assets[0] ?? '.'), 'checksums.txt');
      await fs.writeFile(checksumsPath, await checksumsFile(assets));
      assets.push(checksumsPath);
    }

    for (const asset of assets) {
      console.log(`[GitHub] Uploading ${path.basename(asset)}`);
      await gh(['release', 'upload', tagName, asset, '--repo', repository, '--clobber']);
    }

    const location = `https://github.com/${repository}/releases/tag/${tagName}`;
    return {
      registry: 'github.com',
      repository,
      tag: tagName,
      location,
      pushedAt: new Date(),
      metadata: { assets: assets.map((asset) => path.basename(asset)), draft: this.config.draft },
    };
  }

  createArgs(tagName: string): string[] {
    const args = [
      'release',
      'create',
      tagName,
      '--repo',
      this.config.repository,
      '--title',
      this.config.releaseName || tagName,
    ];
    if (this.config.draft) args.push('--draft');
    if (this.config.prerelease) args.push('--prerelease');
    if (this.config.generateNotes) args.push('--generate-notes');
    if (this.config.releaseNotes) args.push('--notes', this.config.releaseNotes);
    if (this.config.targetCommit) args.push('--target', this.config.targetCommit);
    return args;
  }

  private async releaseExists(
    gh: (args: string[], quiet?: boolean) => Promise<unknown>,
    tagName: string,
  ): Promise<boolean> {
    try {
      await gh(['release', 'view', tagName, '--repo', this.config.repository], true);
      return true;
    } catch (error) {
      if (error instanceof CommandError) return false;
      throw error;
    }
  }
}
