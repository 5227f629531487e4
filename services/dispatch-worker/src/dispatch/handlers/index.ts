import type { TaskKind } from '@dockhand/contracts';
import { deployImageHandler } from './deploy-image';
import { deployRepositoryHandler, redeployRepositoryHandler } from './deploy-repository';
import { destroyJobHandler } from './destroy-job';
import type { TaskHandler } from './shared';

export type HandlerTable = Partial<Record<TaskKind, TaskHandler>>;

export const defaultHandlers: HandlerTable = {
  'deploy-repository': deployRepositoryHandler,
  'redeploy-repository': redeployRepositoryHandler,
  'deploy-image': deployImageHandler,
  'destroy-job-pack': destroyJobHandler,
};

export { defineHandler } from './shared';
export type { BoundTask, HandlerDeps, TaskHandler } from './shared';
