import { z } from 'zod';
import type { TaskKind } from '@dockhand/contracts';
import type { DispatchConfig } from '../config';
import { ParseError, ValidationError } from '../errors';

export const TASK_KINDS: readonly TaskKind[] = [
  'deploy-repository',
  'redeploy-repository',
  'deploy-image',
  'destroy-job-pack',
];

const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

// ===========================================
// Flexible scalars
// ===========================================

/** Integer given as a number or a numeric string; "" reads as 0. */
export const flexInt = z.union([
  z.number().int(),
  z
    .string()
    .trim()
    .regex(/^(-?\d+)?$/, 'Expected an integer or numeric string')
    .transform((value) => (value === '' ? 0 : parseInt(value, 10))),
]);

/** ID given as a string or a number. */
export const flexString = z.union([
  z.string(),
  z.number().transform((value) => String(Math.trunc(value))),
]);

// ===========================================
// Shared shapes
// ===========================================

export const networkPortSchema = z.object({
  portNumber: flexInt,
  portType: z.string().default('http'),
  public: z.boolean().default(false),
  domain: z.string().optional(),
});

export const buildOptionsSchema = z.object({
  builder: z.string().optional(),
  registry: z.string().default('docker'),
  dockerfilePath: z.string().optional(),
  rootDirectory: z.string().optional(),
  buildArgs: z.record(z.string()).default({}),
  disablePush: z.boolean().default(false),
  registryUrl: z.string().optional(),
  registryNamespace: z.string().optional(),
  registryUsername: z.string().optional(),
  registryPassword: z.string().optional(),
  startCommand: z.string().optional(),
  options: z.record(z.unknown()).default({}),
});

const deploymentFields = {
  jobId: z.string().min(1),
  deploymentId: z.string().min(1),
  serviceId: z.string().min(1),
  teamId: z.string().optional(),
  userId: flexInt,
  ownerId: flexString,
  deploymentJobId: flexInt,
  projectId: z.string().optional(),
  imageName: z.string().default(''),
  imageTag: z.string().default('latest'),
  replicaCount: flexInt.default(1),
  cpu: flexInt.optional(),
  ram: flexInt.optional(),
  networks: z.array(networkPortSchema).default([]),
  platform: z.string().default('nomad'),
  nomadAddress: z.string().optional(),
  nomadToken: z.string().optional(),
  clusterDomain: z.string().optional(),
};

// ===========================================
// Per-kind parameters
// ===========================================

const SOURCE_TYPES = ['git', 'local_upload'] as const;

export const deployRepositoryParamsSchema = z
  .object({
    ...deploymentFields,
    repository: z.string().default(''),
    branch: z.string().default('main'),
    gitPass: z.string().optional(),
    provider: z.enum(['github', 'gitlab', 'bitbucket']).optional(),
    // Uploaded tarball instead of a git checkout
    sourceType: z.enum(SOURCE_TYPES).default('git'),
    sourceUrl: z.string().url().optional(),
    uploadId: z.string().optional(),
    build: buildOptionsSchema.default({}),
  })
  .superRefine((params, issues) => {
    if (params.sourceType === 'local_upload') {
      if (!params.sourceUrl) {
        issues.addIssue({ code: z.ZodIssueCode.custom, path: ['sourceUrl'], message: 'Required for local_upload' });
      }
    } else if (!params.repository) {
      issues.addIssue({ code: z.ZodIssueCode.custom, path: ['repository'], message: 'Required' });
    }
  });

export const deployImageParamsSchema = z.object({
  ...deploymentFields,
  imageName: z.string().min(1),
  build: z.object({ startCommand: z.string().optional() }).default({}),
});

export const destroyJobParamsSchema = z.object({
  jobs: z
    .array(
      z.object({
        jobId: z.string().min(1),
        serviceId: z.string().min(1),
        nomadAddress: z.string().optional(),
        nomadToken: z.string().optional(),
      }),
    )
    .min(1),
  reason: z.enum(['delete', 'upgrade_volume', 'migrate_volume', 'suspend_account', 'pause_service']),
  platform: z.string().default('nomad'),
});

export type NetworkPortParams = z.infer<typeof networkPortSchema>;
export type BuildOptions = z.infer<typeof buildOptionsSchema>;
export type DeployRepositoryParams = z.infer<typeof deployRepositoryParamsSchema>;
export type DeployImageParams = z.infer<typeof deployImageParamsSchema>;
export type DestroyJobParams = z.infer<typeof destroyJobParamsSchema>;

// ===========================================
// Envelope
// ===========================================

/** Task as read from the environment, before its params are checked against its kind. */
export interface TaskEnvelope {
  readonly kind: TaskKind;
  readonly params: Readonly<Record<string, unknown>>;
}

function isTaskKind(value: string): value is TaskKind {
  return TASK_KINDS.some((kind) => kind === value);
}

export function parseTaskEnvelope(
  env: NodeJS.ProcessEnv,
  names: Pick<DispatchConfig, 'taskEnv' | 'paramsEnv'>,
): TaskEnvelope {
  const kind = env[names.taskEnv];
  if (!kind) {
    throw new ParseError(`${names.taskEnv} environment variable is not set`);
  }
  if (!isTaskKind(kind)) {
    throw new ParseError(`unknown task type: ${kind}`);
  }

  const encoded = env[names.paramsEnv];
  if (!encoded) {
    throw new ParseError(`${names.paramsEnv} environment variable is not set`);
  }
  if (!BASE64.test(encoded)) {
    throw new ParseError('failed to decode base64 parameters');
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(encoded, 'base64').toString('utf8'));
  } catch (error) {
    throw new ParseError(`failed to parse ${kind} parameters as JSON`, { cause: error });
  }

  if (!decoded || typeof decoded !== 'object' || Array.isArray(decoded)) {
    throw new ParseError(`${kind} parameters must be a JSON object`);
  }

  return Object.freeze({ kind, params: Object.freeze(Object.fromEntries(Object.entries(decoded))) });
}

/** Check params against the schema registered for their kind. */
export function validateParams<S extends z.ZodTypeAny>(
  kind: string,
  schema: S,
  params: unknown,
): z.output<S> {
  const result = schema.safeParse(params);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`,
    );
    throw new ValidationError(`invalid ${kind} parameters: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

export function encodeParams(params: object): string {
  return Buffer.from(JSON.stringify(params), 'utf8').toString('base64');
}
