/**
 * Log Bus Client
 *
 * Publishes build logs and deployment lifecycle events to Redis streams.
 * One connection per dispatched task, shared by the task's log writers.
 */

import Redis from 'ioredis';
import type {
  BuildLogEndEvent,
  BuildLogEvent,
  DeploymentEvent,
  DeploymentStatusEvent,
  JobDestroyedEvent,
} from '@dockhand/contracts';
import { redactUrl } from '../config';
import type { BusConfig } from '../config';
import { BusConnectionError, PublishError, errorMessage } from '../errors';
import { parseClientKeyPair } from './credentials';

// Subjects without the namespace prefix
export const SUBJECTS = {
  deploymentStatusChanged: 'deployment:status:changed',
  deploymentSucceeded: 'deployment:succeeded',
  deploymentFailed: 'deployment:failed',
  jobDestroyed: 'job:destroyed',
  buildLog: 'build:log',
  buildLogEnd: 'build:log:end',
} as const;

/**
 * Everything the dispatch core needs from the bus. Handlers and log writers
 * depend on this rather than on the Redis-backed client.
 */
export interface LogBus {
  publishBuildLog(event: BuildLogEvent): Promise<void>;
  publishBuildLogEnd(event: BuildLogEndEvent): Promise<void>;
  publishDeploymentStarted(jobId: number): Promise<void>;
  publishDeploymentSucceeded(event: DeploymentEvent): Promise<void>;
  publishDeploymentFailed(event: DeploymentEvent): Promise<void>;
  publishJobDestroyed(event: JobDestroyedEvent): Promise<void>;
  close(): Promise<void>;
}

interface StreamMeta {
  deploymentId?: string;
  serviceId?: string;
}

export class LogBusClient implements LogBus {
  private redis: Redis | null;
  private readonly options: BusConfig;

  private constructor(redis: Redis, options: BusConfig) {
    this.redis = redis;
    this.options = options;
  }

  /**
   * Connect to the first reachable server in the list. Once connected, a
   * dropped connection is retried `maxReconnects` times, `reconnectWaitMs`
   * apart, before the client gives up.
   */
  static async connect(options: BusConfig): Promise<LogBusClient> {
    if (options.servers.length === 0) {
      throw new BusConnectionError('no log bus servers configured');
    }
    if (!options.privateKey) {
      throw new BusConnectionError('no log bus client key configured');
    }

    const keyPair = parseClientKeyPair(options.privateKey);
    const failures: string[] = [];

    for (const server of options.servers) {
      try {
        const redis = await openConnection(server, options, keyPair);
        console.log('[LogBus] Connected', {
          server: redactUrl(server),
          prefix: options.prefix || '<none>',
        });
        return new LogBusClient(redis, options);
      } catch (error) {
        failures.push(`${redactUrl(server)}: ${errorMessage(error)}`);
      }
    }

    throw new BusConnectionError(`failed to connect to log bus (${failures.join('; ')})`);
  }

  subject(base: string, suffix?: string): string {
    const prefixed = this.options.prefix ? `${this.options.prefix}:${base}` : base;
    return suffix ? `${prefixed}:${suffix}` : prefixed;
  }

  async publishDeploymentStarted(jobId: number): Promise<void> {
    const event: DeploymentStatusEvent = { jobId, status: 'IN_PROGRESS' };
    await this.publish(this.subject(SUBJECTS.deploymentStatusChanged), event);
  }

  async publishDeploymentSucceeded(event: DeploymentEvent): Promise<void> {
    await this.publish(this.subject(SUBJECTS.deploymentSucceeded), event, event);
  }

  async publishDeploymentFailed(event: DeploymentEvent): Promise<void> {
    await this.publish(this.subject(SUBJECTS.deploymentFailed), event, event);
  }

  async publishJobDestroyed(event: JobDestroyedEvent): Promise<void> {
    await this.publish(this.subject(SUBJECTS.jobDestroyed), event);
  }

  // Per-deployment subjects so consumers can follow a single build
  async publishBuildLog(event: BuildLogEvent): Promise<void> {
    await this.publish(this.subject(SUBJECTS.buildLog, event.deploymentId), event, event);
  }

  async publishBuildLogEnd(event: BuildLogEndEvent): Promise<void> {
    await this.publish(this.subject(SUBJECTS.buildLogEnd, event.deploymentId), event, event);
  }

  async close(): Promise<void> {
    if (!this.redis) return;

    const redis = this.redis;
    this.redis = null;
    redis.removeAllListeners('close');
    redis.removeAllListeners('end');

    try {
      await redis.quit();
    } catch (error) {
      console.warn('[LogBus] Error while closing connection:', errorMessage(error));
      redis.disconnect();
    }
    console.log('[LogBus] Connection closed');
  }

  private async publish(subject: string, payload: object, meta: StreamMeta = {}): Promise<void> {
    if (!this.redis) {
      throw new PublishError(subject, new Error('connection closed'));
    }

    const fields = ['data', JSON.stringify(payload), 'timestamp', new Date().toISOString()];
    if (meta.deploymentId) fields.push('deployment_id', meta.deploymentId);
    if (meta.serviceId) fields.push('service_id', meta.serviceId);

    try {
      await this.redis.xadd(subject, '*', ...fields);
    } catch (error) {
      console.error(`[LogBus] Failed to publish to ${subject}:`, errorMessage(error));
      throw new PublishError(subject, error);
    }

    // The entry is already stored on the primary; replica acknowledgement is best effort.
    if (this.options.flushReplicas > 0) {
      try {
        const acked = await this.redis.wait(this.options.flushReplicas, this.options.flushTimeoutMs);
        if (acked < this.options.flushReplicas) {
          console.warn(
            `[LogBus] Flush for ${subject} reached ${acked}/${this.options.flushReplicas} replicas`,
          );
        }
      } catch (error) {
        console.warn(`[LogBus] Failed to flush ${subject}:`, errorMessage(error));
      }
    }
  }
}

async function openConnection(
  server: string,
  options: BusConfig,
  keyPair: { key: string; cert?: string },
): Promise<Redis> {
  let ready = false;

  const redis = new Redis(server, {
    lazyConnect: true,
    tls: { key: keyPair.key, cert: keyPair.cert },
    commandTimeout: options.commandTimeoutMs,
    maxRetriesPerRequest: 1,
    retryStrategy: (times: number) => {
      // Never retry the initial connect; the next server is tried instead.
      if (!ready || times > options.maxReconnects) return null;
      console.warn(
        `[LogBus] Reconnecting (attempt ${times}/${options.maxReconnects}) in ${options.reconnectWaitMs}ms`,
      );
      return options.reconnectWaitMs;
    },
  });

  // Wait for connection
  try {
    await new Promise<void>((resolve, reject) => {
      redis.once('ready', () => resolve());
      redis.once('error', reject);
      redis.connect().catch(reject);
    });
  } catch (error) {
    redis.disconnect();
    throw error;
  }

  ready = true;
  redis.removeAllListeners('error');

  redis.on('error', (error: Error) => {
    console.warn('[LogBus] Connection error:', error.message);
  });
  redis.on('close', () => {
    console.warn('[LogBus] Disconnected', { server: redactUrl(server) });
  });
  redis.on('ready', () => {
    console.log('[LogBus] Reconnected', { server: redactUrl(server) });
  });
  redis.on('end', () => {
    console.warn('[LogBus] Connection ended, no further reconnects');
  });

  return redis;
}
