import { z } from 'zod';
import { ContextCancelledError } from '../../errors';
import type { DeployRequest, DeploymentResult, ExecutionContext } from '../../types';
import { getString, getStringList } from '../options';
import type { Platform, PluginOptions } from '../types';

const registerResponseSchema = z.object({
  EvalID: z.string().optional().default(''),
});

interface NomadConfig {
  address: string;
  token: string;
  region: string;
  namespace: string;
  datacenters: string[];
}

export function nomadJobSpec(request: DeployRequest, datacenters: string[]): Record<string, unknown> {
  const ports = request.networks.map((network) => ({
    Label: `port${network.portNumber}`,
    To: network.portNumber,
  }));

  const config: Record<string, unknown> = {
    image: request.image,
    ports: ports.map((port) => port.Label),
  };
  if (request.command) {
    config.command = '/bin/sh';
    config.args = ['-c', request.command];
  }

  return {
    ID: request.jobId,
    Name: request.jobId,
    Type: 'service',
    Datacenters: datacenters,
    Meta: { service_id: request.serviceId },
    TaskGroups: [
      {
        Name: request.jobId,
        Count: request.replicaCount,
        Networks: ports.length > 0 ? [{ DynamicPorts: ports }] : [],
        Services: request.networks
          .filter((network) => network.public)
          .map((network) => ({
            Name: `${request.serviceId}-${network.portNumber}`,
            PortLabel: `port${network.portNumber}`,
            Tags: network.domain ? [`domain=${network.domain}`] : [],
          })),
        Tasks: [
          {
            Name: request.jobId,
            Driver: 'docker',
            Config: config,
            Resources: {
              CPU: request.cpu ?? 100,
              MemoryMB: request.ram ?? 256,
            },
          },
        ],
      },
    ],
  };
}

/** Submits and purges jobs through the Nomad HTTP API. */
export class NomadPlatform implements Platform {
  private config: NomadConfig = {
    address: 'http://127.0.0.1:4646',
    token: '',
    region: '',
    namespace: '',
    datacenters: ['*'],
  };

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  configure(options: PluginOptions): void {
    const datacenters = getStringList(options, 'datacenters');
    this.config = {
      address: (getString(options, 'address') || this.env.NOMAD_ADDR || 'http://127.0.0.1:4646').replace(/\/$/, ''),
      token: getString(options, 'token') || this.env.NOMAD_TOKEN || '',
      region: getString(options, 'region'),
      namespace: getString(options, 'namespace'),
      datacenters: datacenters.length > 0 ? datacenters : ['*'],
    };
  }

  async deploy(ctx: ExecutionContext, request: DeployRequest): Promise<DeploymentResult> {
    const job = nomadJobSpec(request, this.config.datacenters);
    const body = await this.request(ctx, 'POST', '/v1/jobs', { Job: job });
    const parsed = registerResponseSchema.safeParse(body);

    console.log(`[Nomad] Registered job ${request.jobId}`);
    return {
      id: request.jobId,
      platform: 'nomad',
      state: 'pending',
      evaluationId: parsed.success && parsed.data.EvalID ? parsed.data.EvalID : undefined,
    };
  }

  async destroy(ctx: ExecutionContext, jobId: string): Promise<void> {
    await this.request(ctx, 'DELETE', `/v1/job/${encodeURIComponent(jobId)}`, undefined, { purge: 'true' });
    console.log(`[Nomad] Purged job ${jobId}`);
  }

  private async request(
    ctx: ExecutionContext,
    method: 'POST' | 'DELETE',
    path: string,
    payload?: unknown,
    query: Record<string, string> = {},
  ): Promise<unknown> {
    if (ctx.signal.aborted) {
      throw new ContextCancelledError(`nomad ${method} ${path}`, ctx.signal.reason);
    }

    const url = new URL(`${this.config.address}${path}`);
    for (const [key, value] of Object.entries(query)) url.searchParams.set(key, value);
    if (this.config.region) url.searchParams.set('region', this.config.region);
    if (this.config.namespace) url.searchParams.set('namespace', this.config.namespace);

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.config.token) headers['X-Nomad-Token'] = this.config.token;

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers,
        body: payload === undefined ? undefined : JSON.stringify(payload),
        signal: ctx.signal,
      });
    } catch (error) {
      if (ctx.signal.aborted) {
        throw new ContextCancelledError(`nomad ${method} ${path}`, ctx.signal.reason);
      }
      throw error;
    }

    if (!response.ok) {
      const text = await response.text().catch(() => 'Unknown error');
      throw new Error(`nomad ${method} ${path} failed: HTTP ${response.status}: ${text}`);
    }

    const text = await response.text();
    return text ? JSON.parse(text) : null;
  }
}
