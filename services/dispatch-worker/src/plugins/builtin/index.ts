/**
 * Importing this module registers every builtin plugin with the process-wide
 * registry. The worker imports it once at startup, before sealing.
 */

import { registerPlugin } from '../registry';
import { DockerBuilder, DockerRegistry } from './docker';
import { GitHubReleaseRegistry } from './github';
import { GoReleaseBuilder } from './go-release';
import { NomadPlatform } from './nomad';
import { NoopBuilder, NoopPlatform, NoopRegistry } from './noop';

registerPlugin('noop', {
  builder: () => new NoopBuilder(),
  registry: () => new NoopRegistry(),
  platform: () => new NoopPlatform(),
});

registerPlugin('docker', {
  builder: () => new DockerBuilder(),
  registry: () => new DockerRegistry(),
});

registerPlugin('go-release', {
  builder: () => new GoReleaseBuilder(),
});

registerPlugin('github', {
  registry: () => new GitHubReleaseRegistry(),
});

registerPlugin('nomad', {
  platform: () => new NomadPlatform(),
});
