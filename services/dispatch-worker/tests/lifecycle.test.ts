import { describe, it, expect } from 'vitest';
import { ContextCancelledError, PluginStateError } from '../src/errors';
import { NoopBuilder, NoopRegistry } from '../src/plugins/builtin/noop';
import { PluginRun, runBuild, runPush } from '../src/plugins/lifecycle';
import type { Builder, Registry } from '../src/plugins/types';
import type { ExecutionContext } from '../src/types';

function context(controller = new AbortController()): ExecutionContext {
  return { signal: controller.signal, deadline: new Date(Date.now() + 60_000) };
}

const failingBuilder: Builder = {
  configure() {},
  async build() {
    throw new Error('compiler crashed');
  },
};

describe('PluginRun', () => {
  it('should start configured', () => {
    const run = new PluginRun();

    expect(run.state).toBe('configured');
    expect(run.artifact).toBeNull();
  });

  it('should reject transitions the lifecycle does not allow', () => {
    const run = new PluginRun();

    expect(() => run.transition('pushing')).toThrow(PluginStateError);
    expect(() => run.transition('built')).toThrow('invalid plugin transition: configured -> built');
  });

  it('should treat failure states as terminal', () => {
    const run = new PluginRun();
    run.transition('building');
    run.transition('build_failed');

    expect(() => run.transition('building')).toThrow(
      'invalid plugin transition: build_failed -> building',
    );
  });
});

describe('runBuild and runPush', () => {
  it('should walk the happy path through every state', async () => {
    const run = new PluginRun();
    const ctx = context();

    const artifact = await runBuild(run, new NoopBuilder(), ctx);
    expect(run.artifact).toBe(artifact);
    expect(run.state).toBe('built');

    const reference = await runPush(run, new NoopRegistry(), ctx);

    expect(reference.location).toBe('noop-registry/noop:latest');
    expect(run.state).toBe('pushed');
  });

  it('should record a failed build and rethrow', async () => {
    const run = new PluginRun();

    await expect(runBuild(run, failingBuilder, context())).rejects.toThrow('compiler crashed');
    expect(run.state).toBe('build_failed');
    expect(run.artifact).toBeNull();
  });

  it('should cancel a build whose context is already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('deadline'));
    const run = new PluginRun();

    const promise = runBuild(run, new NoopBuilder(), context(controller));

    await expect(promise).rejects.toBeInstanceOf(ContextCancelledError);
    expect(run.state).toBe('build_cancelled');
  });

  it('should mark a build cancelled when it fails after an abort', async () => {
    const controller = new AbortController();
    const run = new PluginRun();
    const aborting: Builder = {
      configure() {},
      async build() {
        controller.abort();
        throw new Error('killed');
      },
    };

    await expect(runBuild(run, aborting, context(controller))).rejects.toThrow('killed');
    expect(run.state).toBe('build_cancelled');
  });

  it('should refuse to push without a built artifact', async () => {
    const run = new PluginRun();

    await expect(runPush(run, new NoopRegistry(), context())).rejects.toThrow(
      'cannot push from state configured: no built artifact',
    );
    expect(run.state).toBe('configured');
  });

  it('should record a failed push', async () => {
    const run = new PluginRun();
    const ctx = context();
    const rejecting: Registry = {
      configure() {},
      async push() {
        throw new Error('unauthorized');
      },
    };
    await runBuild(run, new NoopBuilder(), ctx);

    await expect(runPush(run, rejecting, ctx)).rejects.toThrow('unauthorized');
    expect(run.state).toBe('push_failed');
  });

  it('should cancel a push whose context aborted after the build', async () => {
    const controller = new AbortController();
    const run = new PluginRun();
    await runBuild(run, new NoopBuilder(), context(controller));
    controller.abort();

    await expect(runPush(run, new NoopRegistry(), context(controller))).rejects.toThrow(
      'push cancelled',
    );
    expect(run.state).toBe('push_cancelled');
  });
});
