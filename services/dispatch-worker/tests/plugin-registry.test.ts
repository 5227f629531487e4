import { describe, it, expect, beforeEach } from 'vitest';
import { PluginCapabilityError, PluginNotFoundError, PluginStateError } from '../src/errors';
import { DockerBuilder, DockerRegistry } from '../src/plugins/builtin/docker';
import { GitHubReleaseRegistry } from '../src/plugins/builtin/github';
import { GoReleaseBuilder } from '../src/plugins/builtin/go-release';
import { NomadPlatform } from '../src/plugins/builtin/nomad';
import { NoopBuilder, NoopPlatform, NoopRegistry } from '../src/plugins/builtin/noop';
import { PluginRegistry, plugins } from '../src/plugins/registry';
import '../src/plugins/builtin';

function context() {
  return { signal: new AbortController().signal, deadline: new Date(Date.now() + 60_000) };
}

describe('PluginRegistry', () => {
  let registry: PluginRegistry;

  beforeEach(() => {
    registry = new PluginRegistry();
    registry.register('noop', {
      builder: () => new NoopBuilder(),
      registry: () => new NoopRegistry(),
      platform: () => new NoopPlatform(),
    });
    registry.register('push-only', { registry: () => new NoopRegistry() });
  });

  it('should list plugins by name', () => {
    expect(registry.list()).toEqual(['noop', 'push-only']);
  });

  it('should load only the components a plugin provides', () => {
    expect(registry.loadRegistry('push-only')).toBeInstanceOf(NoopRegistry);
    expect(() => registry.loadPlatform('push-only')).toThrow(PluginCapabilityError);
  });

  it('should configure a fresh instance on every load', async () => {
    const first = registry.loadBuilder('noop', { message: 'first' });
    const second = registry.loadBuilder('noop', { message: 'second' });

    expect(first).not.toBe(second);
    const artifact = await first.build(context());
    expect(artifact.metadata).toEqual({ builder: 'noop', message: 'first' });
  });

  it('should reject an unknown plugin', () => {
    expect(() => registry.loadPlatform('kubernetes')).toThrow(PluginNotFoundError);
    expect(() => registry.loadPlatform('kubernetes')).toThrow('plugin not found: kubernetes');
  });

  it('should reject a plugin without the requested component', () => {
    expect(() => registry.loadBuilder('push-only')).toThrow(PluginCapabilityError);
    expect(() => registry.loadBuilder('push-only')).toThrow(
      'plugin push-only does not provide a builder component',
    );
  });

  it('should replace an earlier registration under the same name', () => {
    registry.register('noop', { platform: () => new NoopPlatform() });

    expect(() => registry.loadBuilder('noop')).toThrow(PluginCapabilityError);
    expect(registry.loadPlatform('noop')).toBeInstanceOf(NoopPlatform);
  });

  it('should refuse registrations once sealed', () => {
    registry.seal();

    expect(() => registry.register('late', {})).toThrow(PluginStateError);
    expect(registry.list()).toEqual(['noop', 'push-only']);
  });
});

describe('builtin plugins', () => {
  it('should register every builtin on the process-wide registry', () => {
    expect(plugins.list()).toEqual(['docker', 'github', 'go-release', 'nomad', 'noop']);
  });

  it('should expose the expected components', () => {
    expect(plugins.loadBuilder('docker')).toBeInstanceOf(DockerBuilder);
    expect(plugins.loadRegistry('docker')).toBeInstanceOf(DockerRegistry);
    expect(plugins.loadBuilder('go-release')).toBeInstanceOf(GoReleaseBuilder);
    expect(plugins.loadRegistry('github')).toBeInstanceOf(GitHubReleaseRegistry);
    expect(plugins.loadPlatform('nomad')).toBeInstanceOf(NomadPlatform);
    expect(() => plugins.loadBuilder('nomad')).toThrow(PluginCapabilityError);
  });
});
