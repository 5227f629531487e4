import * as fs from 'fs/promises';
import * as path from 'path';

const DOCKERFILES = [
  'Dockerfile',
  'dockerfile',
  'Dockerfile.prod',
  'Dockerfile.production',
  'Dockerfile.dev',
  'Dockerfile.development',
];

export interface Detection {
  builders: string[];
  dockerfile?: string;
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

export async function detectBuilders(sourceDir: string): Promise<Detection> {
  for (const dockerfile of DOCKERFILES) {
    if (await isFile(path.join(sourceDir, dockerfile))) {
      return { builders: ['docker'], dockerfile };
    }
  }
  return { builders: [] };
}

/**
 * Builders to try in order: the requested one first, then whatever the
 * source tree suggests, without duplicates.
 */
export function builderChain(detection: Detection, requested?: string): string[] {
  const chain = requested ? [requested, ...detection.builders] : detection.builders;
  return [...new Set(chain)];
}
