import type { LogWriter } from './bus/log-writer';

/**
 * Per-dispatch state handed to every handler and plugin. Anything that can
 * block must take `signal` and stop when it fires.
 */
export interface ExecutionContext {
  signal: AbortSignal;
  deadline: Date;
  stdout?: LogWriter;
  stderr?: LogWriter;
  workDir?: string;
}

/** `release` artifacts are published as-is and never run as a container. */
export type ArtifactKind = 'image' | 'release';

export interface Artifact {
  id: string;
  /** Defaults to `image` */
  kind?: ArtifactKind;
  /** Image reference, or the application name for non-image builds */
  image: string;
  tag?: string;
  digest?: string;
  /** sha256 over the produced content */
  fingerprint: string;
  sizeBytes?: number;
  durationMs: number;
  labels: Record<string, string>;
  metadata: Record<string, unknown>;
  builtAt: Date;
}

export interface Reference {
  registry: string;
  repository: string;
  tag: string;
  digest?: string;
  /** Full image reference or release URL */
  location: string;
  pushedAt: Date;
  metadata: Record<string, unknown>;
}

export interface NetworkPort {
  portNumber: number;
  portType: string;
  public: boolean;
  domain?: string;
}

export interface DeployRequest {
  jobId: string;
  serviceId: string;
  image: string;
  replicaCount: number;
  cpu?: number;
  ram?: number;
  command?: string;
  networks: NetworkPort[];
}

export interface DeploymentResult {
  id: string;
  platform: string;
  state: 'running' | 'pending' | 'failed';
  evaluationId?: string;
}
