export interface BusConfig {
  servers: string[];
  privateKey?: string;
  prefix: string;
  maxReconnects: number;
  reconnectWaitMs: number;
  commandTimeoutMs: number;
  flushReplicas: number;
  flushTimeoutMs: number;
}

export interface DispatchConfig {
  taskEnv: string;
  paramsEnv: string;
  deadlineMs: number;
  exitGraceMs: number;
  workRoot?: string;
}

export interface WorkerConfig {
  bus: BusConfig;
  dispatch: DispatchConfig;
}

function int(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): WorkerConfig {
  return {
    bus: {
      servers: (env.LOG_BUS_SERVERS || '')
        .split(',')
        .map((server) => server.trim())
        .filter(Boolean),
      privateKey: env.LOG_BUS_CLIENT_PRIVATE_KEY || undefined,
      prefix: env.LOG_BUS_PREFIX || '',
      maxReconnects: int(env.LOG_BUS_MAX_RECONNECTS, 5),
      reconnectWaitMs: int(env.LOG_BUS_RECONNECT_WAIT_MS, 2000),
      commandTimeoutMs: int(env.LOG_BUS_COMMAND_TIMEOUT_MS, 5000),
      flushReplicas: int(env.LOG_BUS_FLUSH_REPLICAS, 0),
      flushTimeoutMs: int(env.LOG_BUS_FLUSH_TIMEOUT_MS, 1000),
    },
    dispatch: {
      taskEnv: 'DISPATCH_TASK',
      paramsEnv: 'DISPATCH_PARAMS',
      deadlineMs: int(env.DISPATCH_DEADLINE_MS, 15 * 60 * 1000),
      exitGraceMs: int(env.DISPATCH_EXIT_GRACE_MS, 100),
      workRoot: env.DISPATCH_WORK_ROOT || undefined,
    },
  };
}

export const config = loadConfig();

/**
 * The bus is optional: without servers and a client key the worker runs
 * with local output only.
 */
export function isBusConfigured(bus: BusConfig): boolean {
  return bus.servers.length > 0 && Boolean(bus.privateKey);
}

export function redactUrl(url: string): string {
  return url.replace(/\/\/.*@/, '//<credentials>@');
}
