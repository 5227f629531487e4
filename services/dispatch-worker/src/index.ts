/**
 * Dockhand Dispatch Worker
 *
 * Started by the cluster scheduler once per task. Reads the task from the
 * environment, runs it under a deadline while streaming build output to the
 * log bus, and exits with a code describing the outcome.
 */

import { config, redactUrl } from './config';
import { DispatchController } from './dispatch/controller';
import { plugins } from './plugins/registry';
import './plugins/builtin';

async function main() {
  plugins.seal();

  console.log('[DispatchWorker] Config:', {
    busServers: config.bus.servers.map(redactUrl),
    busPrefix: config.bus.prefix || '<none>',
    deadlineMs: config.dispatch.deadlineMs,
    plugins: plugins.list(),
  });

  const controller = new DispatchController({ config });
  const code = await controller.run(process.env);
  process.exit(code);
}

main().catch((error) => {
  console.error('[DispatchWorker] Fatal error:', error);
  process.exit(1);
});
