import type { GitProvider } from '@dockhand/contracts';
import { runCommand } from '../process/exec';
import type { ExecutionContext } from '../types';

const PROVIDER_HOSTS: Record<GitProvider, string> = {
  github: 'github.com',
  gitlab: 'gitlab.com',
  bitbucket: 'bitbucket.org',
};

/**
 * Clone URL for an `owner/name` repository. Full URLs are used as given,
 * with the token injected when one is set.
 */
export function buildCloneUrl(repository: string, token?: string, provider: GitProvider = 'github'): string {
  const user = provider === 'bitbucket' ? 'x-token-auth' : 'x-access-token';

  if (/^https?:\/\//.test(repository)) {
    if (!token) return repository;
    const url = new URL(repository);
    url.username = user;
    url.password = token;
    return url.toString();
  }

  const auth = token ? `${user}:${token}@` : '';
  return `https://${auth}${PROVIDER_HOSTS[provider]}/${repository}.git`;
}

export async function cloneRepository(
  ctx: ExecutionContext,
  destination: string,
  repository: string,
  branch: string,
  token?: string,
  provider?: GitProvider,
): Promise<string> {
  const args = ['clone', '--depth', '1'];
  if (branch) args.push('--branch', branch);
  args.push(buildCloneUrl(repository, token, provider), destination);

  await runCommand(ctx, 'git', args, {
    env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
    redact: token ? [token, encodeURIComponent(token)] : [],
  });

  return destination;
}
