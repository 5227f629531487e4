// Bus Event Types (Dispatch Worker -> Log Bus -> Platform)

import type { JobDestroyReason } from './dispatch';

// ===========================================
// Build Logs
// ===========================================

export type LogOutput = 'stdout' | 'stderr';

/**
 * One line of build output. `content` keeps its trailing newline unless the
 * line was flushed without one. `sequence` starts at 1 per writer and is not
 * comparable across stdout and stderr.
 */
export interface BuildLogEvent {
  deploymentId: string;
  jobId: number;
  serviceId: string;
  ownerId: string;
  logOutput: LogOutput;
  content: string;
  /** Unix milliseconds */
  timestamp: number;
  sequence: number;
  phase: string;
}

export type BuildLogEndStatus = 'success' | 'failed' | 'timeout';

export interface BuildLogEndEvent {
  deploymentId: string;
  jobId: number;
  status: BuildLogEndStatus;
}

// ===========================================
// Deployment Lifecycle
// ===========================================

export type DeploymentStatus = 'IN_PROGRESS' | 'SUCCEEDED' | 'FAILED';

export interface DeploymentStatusEvent {
  jobId: number;
  status: DeploymentStatus;
}

export type DeploymentSourceType = 'git_repo' | 'image';

export interface DeploymentEvent {
  jobId: number;
  type: DeploymentSourceType;
  deploymentId: string;
  serviceId: string;
  teamId?: string;
  userId: string;
  ownerId: string;
}

export interface JobDestroyedEvent {
  id: string;
  reason: JobDestroyReason;
}
