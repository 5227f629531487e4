import { errorMessage } from '../../errors';
import { destroyJobParamsSchema } from '../params';
import type { DestroyJobParams } from '../params';
import { defineHandler, log, step } from './shared';
import type { HandlerDeps } from './shared';

// Jobs are destroyed one at a time, in the order given.
async function destroyJobs(deps: HandlerDeps, params: DestroyJobParams): Promise<void> {
  const { ctx, bus } = deps;

  await log(ctx, `=== Destroying ${params.jobs.length} job(s) ===`);
  await log(ctx, `Reason: ${params.reason}`);

  await step(ctx, 'destroy', 'Destroy', async () => {
    for (const [index, job] of params.jobs.entries()) {
      await log(ctx, `Destroying job ${index + 1}/${params.jobs.length}: ${job.jobId}`);

      const platform = deps.plugins.loadPlatform(params.platform, {
        address: job.nomadAddress,
        token: job.nomadToken,
      });
      await platform.destroy(ctx, job.jobId);

      if (!bus) continue;
      try {
        await bus.publishJobDestroyed({ id: job.serviceId, reason: params.reason });
      } catch (error) {
        console.warn(
          `[DispatchWorker] Failed to publish job destroyed event for ${job.jobId}:`,
          errorMessage(error),
        );
      }
    }
  });

  await log(ctx, '=== Job destruction completed ===');
}

export const destroyJobHandler = defineHandler('destroy-job-pack', destroyJobParamsSchema, destroyJobs);
