// Dispatch Task Types (Scheduler -> Dispatch Worker)

// ===========================================
// Task Kinds
// ===========================================

export type TaskKind =
  | 'deploy-repository'
  | 'redeploy-repository'
  | 'deploy-image'
  | 'destroy-job-pack';

// ===========================================
// Destroy Reasons
// ===========================================

export type JobDestroyReason =
  | 'delete'
  | 'upgrade_volume'
  | 'migrate_volume'
  | 'suspend_account'
  | 'pause_service';

// ===========================================
// Build Phases
// ===========================================

/**
 * Stage label attached to every build log line. Handlers move through
 * these in order; `init` covers everything before the first handler step.
 */
export type BuildPhase =
  | 'init'
  | 'clone'
  | 'build'
  | 'registry'
  | 'deploy'
  | 'release'
  | 'destroy';

export type GitProvider = 'github' | 'gitlab' | 'bitbucket';
