import { setTimeout as sleep } from 'timers/promises';
import type { BuildLogEndStatus } from '@dockhand/contracts';
import { LogBusClient } from '../bus/client';
import type { LogBus } from '../bus/client';
import { LogWriter } from '../bus/log-writer';
import type { LogWriterOptions } from '../bus/log-writer';
import { isBusConfigured } from '../config';
import type { BusConfig, WorkerConfig } from '../config';
import {
  DeadlineExceededError,
  UnsupportedTaskError,
  ValidationError,
  errorMessage,
} from '../errors';
import { plugins as defaultPlugins } from '../plugins/registry';
import type { PluginRegistry } from '../plugins/registry';
import type { ExecutionContext } from '../types';
import { createExecutionContext, whenAborted } from './context';
import { ExitCode, exitCodeName } from './exit-codes';
import { defaultHandlers } from './handlers';
import type { BoundTask, HandlerTable } from './handlers';
import { flexInt, flexString, parseTaskEnvelope } from './params';
import type { TaskEnvelope } from './params';
import { logErrorToStderr } from './report';

type LogScope = Omit<LogWriterOptions, 'output' | 'phase'>;

export interface DispatchControllerOptions {
  config: WorkerConfig;
  handlers?: HandlerTable;
  plugins?: PluginRegistry;
  connectBus?: (config: BusConfig) => Promise<LogBus>;
}

/** IDs that scope a task's build log, or null for tasks that have no deployment. */
export function logScopeFor(params: Readonly<Record<string, unknown>>): LogScope | null {
  const deploymentId = params.deploymentId;
  if (typeof deploymentId !== 'string' || !deploymentId) return null;

  const jobId = flexInt.safeParse(params.deploymentJobId);
  const serviceId = flexString.safeParse(params.serviceId);
  const ownerId = flexString.safeParse(params.ownerId);

  return {
    deploymentId,
    jobId: jobId.success ? jobId.data : 0,
    serviceId: serviceId.success ? serviceId.data : '',
    ownerId: ownerId.success ? ownerId.data : '',
  };
}

function endStatus(code: ExitCode): BuildLogEndStatus {
  if (code === ExitCode.Success) return 'success';
  if (code === ExitCode.Timeout) return 'timeout';
  return 'failed';
}

/**
 * Runs exactly one task per process: parse, connect the log bus, dispatch
 * to the task's handler under a deadline, and map the outcome to an exit
 * code. Cleanup runs on every path once parsing has succeeded.
 */
export class DispatchController {
  private readonly config: WorkerConfig;
  private readonly handlers: HandlerTable;
  private readonly plugins: PluginRegistry;
  private readonly connectBus: (config: BusConfig) => Promise<LogBus>;

  constructor(options: DispatchControllerOptions) {
    this.config = options.config;
    this.handlers = options.handlers ?? defaultHandlers;
    this.plugins = options.plugins ?? defaultPlugins;
    this.connectBus = options.connectBus ?? ((bus) => LogBusClient.connect(bus));
  }

  async run(env: NodeJS.ProcessEnv = process.env): Promise<ExitCode> {
    let envelope: TaskEnvelope;
    try {
      envelope = parseTaskEnvelope(env, this.config.dispatch);
    } catch (error) {
      logErrorToStderr('parse', error);
      await sleep(this.config.dispatch.exitGraceMs);
      return ExitCode.ParseError;
    }

    const startedAt = new Date();
    console.log('=== Dispatch Execution Started ===');
    console.log(`Task: ${envelope.kind}`);
    console.log(`Start time: ${startedAt.toISOString()}`);

    const scope = createExecutionContext(this.config.dispatch.deadlineMs);
    const { ctx } = scope;

    let timedOut = false;
    ctx.signal.addEventListener(
      'abort',
      () => {
        if (ctx.signal.reason instanceof DeadlineExceededError) {
          timedOut = true;
          console.error(`[DispatchWorker] ${ctx.signal.reason.message}`);
        }
      },
      { once: true },
    );

    const logScope = logScopeFor(envelope.params);
    let bus: LogBus | null = null;
    let code: ExitCode = ExitCode.RuntimeError;

    try {
      bus = await this.openBus();
      if (bus && logScope) {
        ctx.stdout = new LogWriter(bus, { ...logScope, output: 'stdout', phase: 'init' });
        ctx.stderr = new LogWriter(bus, { ...logScope, output: 'stderr', phase: 'init' });
      }

      code = await this.dispatch(envelope, ctx, bus, () => timedOut);
    } finally {
      scope.dispose();
      await this.cleanup(ctx, bus, logScope, code);

      const durationMs = Date.now() - startedAt.getTime();
      console.log('=== Dispatch Execution Completed ===');
      console.log(`Duration: ${durationMs}ms`);
      console.log(`Exit code: ${code} (${exitCodeName(code)})`);

      await sleep(this.config.dispatch.exitGraceMs);
    }

    return code;
  }

  private async dispatch(
    envelope: TaskEnvelope,
    ctx: ExecutionContext,
    bus: LogBus | null,
    timedOut: () => boolean,
  ): Promise<ExitCode> {
    const handler = this.handlers[envelope.kind];
    if (!handler) {
      logErrorToStderr('execute', new UnsupportedTaskError(envelope.kind));
      return ExitCode.RuntimeError;
    }

    let task: BoundTask;
    try {
      task = handler.bind(envelope.params);
    } catch (error) {
      if (error instanceof ValidationError) {
        logErrorToStderr('validate', error);
        return ExitCode.ValidationError;
      }
      throw error;
    }

    try {
      await Promise.race([
        task({ ctx, bus, plugins: this.plugins, workRoot: this.config.dispatch.workRoot }),
        whenAborted(ctx.signal),
      ]);
    } catch (error) {
      if (timedOut()) {
        logErrorToStderr('timeout', ctx.signal.reason);
        return ExitCode.Timeout;
      }
      logErrorToStderr('handler_execution', error);
      return ExitCode.RuntimeError;
    }

    // The deadline wins even over a handler that finished in the same tick.
    if (timedOut()) {
      logErrorToStderr('timeout', ctx.signal.reason);
      return ExitCode.Timeout;
    }
    return ExitCode.Success;
  }

  private async openBus(): Promise<LogBus | null> {
    if (!isBusConfigured(this.config.bus)) {
      console.warn('[DispatchWorker] Log bus not configured, continuing with local output only');
      return null;
    }

    try {
      return await this.connectBus(this.config.bus);
    } catch (error) {
      console.warn(
        '[DispatchWorker] Log bus unavailable, continuing with local output only:',
        errorMessage(error),
      );
      return null;
    }
  }

  private async cleanup(
    ctx: ExecutionContext,
    bus: LogBus | null,
    logScope: LogScope | null,
    code: ExitCode,
  ): Promise<void> {
    for (const writer of [ctx.stdout, ctx.stderr]) {
      if (!writer) continue;
      try {
        await writer.close();
      } catch (error) {
        console.warn(`[DispatchWorker] Failed to close ${writer.output} log writer:`, errorMessage(error));
      }
    }

    if (bus && logScope && ctx.stdout) {
      try {
        await bus.publishBuildLogEnd({
          deploymentId: logScope.deploymentId,
          jobId: logScope.jobId,
          status: endStatus(code),
        });
      } catch (error) {
        console.warn('[DispatchWorker] Failed to publish build log end:', errorMessage(error));
      }
    }

    if (bus) {
      try {
        await bus.close();
      } catch (error) {
        console.warn('[DispatchWorker] Failed to close log bus:', errorMessage(error));
      }
    }
  }
}
