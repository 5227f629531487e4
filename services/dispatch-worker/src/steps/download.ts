import * as fs from 'fs/promises';
import * as path from 'path';
import { ContextCancelledError, errorMessage } from '../errors';
import { runCommand } from '../process/exec';
import type { ExecutionContext } from '../types';

export interface ExtractedSource {
  directory: string;
  entries: number;
  sizeBytes: number;
}

/** Origin and path only; presigned query strings carry credentials. */
export function describeSourceUrl(url: string): string {
  const parsed = new URL(url);
  return `${parsed.origin}${parsed.pathname}`;
}

/** True for archive paths that would land outside the extraction directory. */
export function isUnsafeEntry(name: string): boolean {
  if (path.isAbsolute(name)) return true;
  const normalized = path.normalize(name);
  return normalized === '..' || normalized.startsWith(`..${path.sep}`);
}

async function fetchArchive(ctx: ExecutionContext, url: string, archivePath: string): Promise<number> {
  let response: Response;
  try {
    response = await fetch(url, { signal: ctx.signal });
  } catch (error) {
    if (ctx.signal.aborted) {
      throw new ContextCancelledError('source download', ctx.signal.reason);
    }
    throw new Error(`failed to download source: ${errorMessage(error)}`, { cause: error });
  }

  if (!response.ok) {
    throw new Error(`failed to download source: HTTP ${response.status}`);
  }

  const bytes = Buffer.from(await response.arrayBuffer());
  await fs.writeFile(archivePath, bytes);
  return bytes.length;
}

async function escapingLinks(root: string, dir: string = root): Promise<string[]> {
  const found: string[] = [];

  for (const entry of await fs.readdir(dir, { withFileTypes: true })) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isSymbolicLink()) {
      const target = path.resolve(dir, await fs.readlink(entryPath));
      if (isUnsafeEntry(path.relative(root, target))) {
        found.push(path.relative(root, entryPath));
      }
    } else if (entry.isDirectory()) {
      found.push(...(await escapingLinks(root, entryPath)));
    }
  }

  return found;
}

/**
 * Fetch a gzipped tarball and unpack it into `destination`. Member paths are
 * checked before anything is written, and symlinks after.
 */
export async function downloadSource(
  ctx: ExecutionContext,
  url: string,
  destination: string,
): Promise<ExtractedSource> {
  const archive = `${destination}.tar.gz`;
  const sizeBytes = await fetchArchive(ctx, url, archive);

  const listing = await runCommand(ctx, 'tar', ['-tzf', archive], { quiet: true });
  const entries = listing.stdout.split('\n').filter((name) => name.length > 0);
  const unsafe = entries.find(isUnsafeEntry);
  if (unsafe !== undefined) {
    throw new Error(`invalid file path in archive: ${unsafe}`);
  }

  await fs.mkdir(destination, { recursive: true });
  await runCommand(ctx, 'tar', ['-xzf', archive, '-C', destination, '--no-same-owner']);

  const links = await escapingLinks(destination);
  if (links.length > 0) {
    throw new Error(`symlink escapes the source directory: ${links.join(', ')}`);
  }

  await fs.rm(archive, { force: true });
  return { directory: destination, entries: entries.length, sizeBytes };
}
