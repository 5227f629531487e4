import { PluginCapabilityError, PluginNotFoundError, PluginStateError } from '../errors';
import type {
  Builder,
  Capability,
  Platform,
  PluginComponents,
  PluginOptions,
  Registry,
} from './types';

/**
 * Name → plugin table. Builtins register themselves when their module is
 * imported; the worker seals the table before dispatching, after which it
 * is read-only. Each load returns a fresh, configured instance so no plugin
 * state leaks between invocations.
 */
export class PluginRegistry {
  private readonly plugins = new Map<string, PluginComponents>();
  private sealed = false;

  register(name: string, components: PluginComponents): void {
    if (this.sealed) {
      throw new PluginStateError(`cannot register plugin ${name}: registry is sealed`);
    }
    this.plugins.set(name, { ...components });
  }

  seal(): void {
    this.sealed = true;
  }

  list(): string[] {
    return [...this.plugins.keys()].sort();
  }

  loadBuilder(name: string, options: PluginOptions = {}): Builder {
    const builder = this.factory(name, 'builder')();
    builder.configure(options);
    return builder;
  }

  loadRegistry(name: string, options: PluginOptions = {}): Registry {
    const registry = this.factory(name, 'registry')();
    registry.configure(options);
    return registry;
  }

  loadPlatform(name: string, options: PluginOptions = {}): Platform {
    const platform = this.factory(name, 'platform')();
    platform.configure(options);
    return platform;
  }

  private factory<C extends Capability>(name: string, capability: C): NonNullable<PluginComponents[C]> {
    const plugin = this.plugins.get(name);
    if (!plugin) {
      throw new PluginNotFoundError(name);
    }

    const create = plugin[capability];
    if (!create) {
      throw new PluginCapabilityError(name, capability);
    }
    return create;
  }
}

// Process-wide registry
export const plugins = new PluginRegistry();

export function registerPlugin(name: string, components: PluginComponents): void {
  plugins.register(name, components);
}
