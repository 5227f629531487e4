import { describe, it, expect } from 'vitest';
import { ParseError, ValidationError } from '../src/errors';
import {
  deployImageParamsSchema,
  deployRepositoryParamsSchema,
  destroyJobParamsSchema,
  encodeParams,
  flexInt,
  flexString,
  parseTaskEnvelope,
  validateParams,
} from '../src/dispatch/params';

const NAMES = { taskEnv: 'DISPATCH_TASK', paramsEnv: 'DISPATCH_PARAMS' };

const DEPLOYMENT = {
  jobId: 'web-1',
  deploymentId: 'dep-1',
  serviceId: 'svc-1',
  userId: 3,
  ownerId: 'owner-1',
  deploymentJobId: 7,
};

describe('parseTaskEnvelope', () => {
  it('should decode the task and its params', () => {
    const envelope = parseTaskEnvelope(
      { DISPATCH_TASK: 'deploy-image', DISPATCH_PARAMS: encodeParams({ imageName: 'nginx' }) },
      NAMES,
    );

    expect(envelope.kind).toBe('deploy-image');
    expect(envelope.params).toEqual({ imageName: 'nginx' });
    expect(Object.isFrozen(envelope)).toBe(true);
    expect(Object.isFrozen(envelope.params)).toBe(true);
  });

  it('should require the task variable', () => {
    expect(() => parseTaskEnvelope({}, NAMES)).toThrow('DISPATCH_TASK environment variable is not set');
  });

  it('should reject an unknown task kind', () => {
    expect(() => parseTaskEnvelope({ DISPATCH_TASK: 'compile-kernel' }, NAMES)).toThrow(
      'unknown task type: compile-kernel',
    );
  });

  it('should require the params variable', () => {
    expect(() => parseTaskEnvelope({ DISPATCH_TASK: 'deploy-image' }, NAMES)).toThrow(
      'DISPATCH_PARAMS environment variable is not set',
    );
  });

  it('should reject params that are not base64', () => {
    const env = { DISPATCH_TASK: 'deploy-image', DISPATCH_PARAMS: '{not base64}' };

    expect(() => parseTaskEnvelope(env, NAMES)).toThrow(ParseError);
    expect(() => parseTaskEnvelope(env, NAMES)).toThrow('failed to decode base64 parameters');
  });

  it('should reject base64 that is not JSON', () => {
    const env = {
      DISPATCH_TASK: 'destroy-job-pack',
      DISPATCH_PARAMS: Buffer.from('not json').toString('base64'),
    };

    expect(() => parseTaskEnvelope(env, NAMES)).toThrow(
      'failed to parse destroy-job-pack parameters as JSON',
    );
  });

  it('should reject JSON that is not an object', () => {
    const env = { DISPATCH_TASK: 'deploy-repository', DISPATCH_PARAMS: encodeParams([1, 2]) };

    expect(() => parseTaskEnvelope(env, NAMES)).toThrow(
      'deploy-repository parameters must be a JSON object',
    );
  });

  it('should read from custom variable names', () => {
    const envelope = parseTaskEnvelope(
      { TASK: 'redeploy-repository', PARAMS: encodeParams({}) },
      { taskEnv: 'TASK', paramsEnv: 'PARAMS' },
    );

    expect(envelope.kind).toBe('redeploy-repository');
  });
});

describe('flexible scalars', () => {
  it('should read integers from numbers and numeric strings', () => {
    expect(flexInt.parse(42)).toBe(42);
    expect(flexInt.parse(' 42 ')).toBe(42);
    expect(flexInt.parse('')).toBe(0);
    expect(flexInt.safeParse('4.2').success).toBe(false);
    expect(flexInt.safeParse(4.2).success).toBe(false);
  });

  it('should read IDs from strings and numbers', () => {
    expect(flexString.parse('owner-1')).toBe('owner-1');
    expect(flexString.parse(12)).toBe('12');
  });
});

describe('validateParams', () => {
  it('should fill deployment defaults', () => {
    const params = validateParams('deploy-repository', deployRepositoryParamsSchema, {
      ...DEPLOYMENT,
      repository: 'acme/web',
    });

    expect(params.branch).toBe('main');
    expect(params.imageTag).toBe('latest');
    expect(params.replicaCount).toBe(1);
    expect(params.platform).toBe('nomad');
    expect(params.networks).toEqual([]);
    expect(params.build).toEqual({
      registry: 'docker',
      buildArgs: {},
      disablePush: false,
      options: {},
    });
  });

  it('should coerce string-typed numbers', () => {
    const params = validateParams('deploy-image', deployImageParamsSchema, {
      ...DEPLOYMENT,
      userId: '3',
      ownerId: 9,
      deploymentJobId: '7',
      imageName: 'nginx',
      networks: [{ portNumber: '8080', public: true }],
    });

    expect(params.userId).toBe(3);
    expect(params.ownerId).toBe('9');
    expect(params.deploymentJobId).toBe(7);
    expect(params.networks).toEqual([{ portNumber: 8080, portType: 'http', public: true }]);
  });

  it('should list each failing field', () => {
    const validate = () =>
      validateParams('deploy-image', deployImageParamsSchema, { ...DEPLOYMENT, serviceId: '' });

    expect(validate).toThrow(ValidationError);
    expect(validate).toThrow(
      'invalid deploy-image parameters: serviceId: String must contain at least 1 character(s); imageName: Required',
    );
  });

  it('should expose the issues on the error', () => {
    try {
      validateParams('deploy-repository', deployRepositoryParamsSchema, DEPLOYMENT);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.phase).toBe('validate');
        expect(error.issues).toEqual(['repository: Required']);
      }
    }
  });

  it('should accept an uploaded source in place of a repository', () => {
    const params = validateParams('deploy-repository', deployRepositoryParamsSchema, {
      ...DEPLOYMENT,
      sourceType: 'local_upload',
      sourceUrl: 'https://storage.test/uploads/src.tar.gz',
      uploadId: 'up-1',
    });

    expect(params.sourceType).toBe('local_upload');
    expect(params.repository).toBe('');
    expect(params.uploadId).toBe('up-1');
  });

  it('should default to a git source', () => {
    const params = validateParams('deploy-repository', deployRepositoryParamsSchema, {
      ...DEPLOYMENT,
      repository: 'acme/web',
    });

    expect(params.sourceType).toBe('git');
  });

  it('should label issues on the value itself as root', () => {
    expect(() => validateParams('destroy-job-pack', destroyJobParamsSchema, 'nope')).toThrow(
      'invalid destroy-job-pack parameters: <root>: Expected object, received string',
    );
  });

  it('should need at least one job to destroy', () => {
    expect(() =>
      validateParams('destroy-job-pack', destroyJobParamsSchema, { jobs: [], reason: 'delete' }),
    ).toThrow('jobs: Array must contain at least 1 element(s)');
  });

  it('should reject an unknown destroy reason', () => {
    const result = destroyJobParamsSchema.safeParse({
      jobs: [{ jobId: 'web-1', serviceId: 'svc-1' }],
      reason: 'boredom',
    });

    expect(result.success).toBe(false);
  });
});
