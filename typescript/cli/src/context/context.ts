import { z } from 'zod';

import {
  GithubDownloader,
  NetworkKind,
  getNetwork,
  getRelayerPaths,
} from '@icmctl/relayer';
import { resolvePath } from '@icmctl/utils';

import { ENV } from '../utils/env.js';

import { CommandContext, ContextSettings } from './types.js';

const ContextArgsSchema = z.object({
  home: z.string().min(1),
  network: z.nativeEnum(NetworkKind),
  endpoint: z.string().optional(),
  yes: z.boolean().optional(),
});

export function contextMiddleware(argv: Record<string, unknown>) {
  const result = ContextArgsSchema.safeParse(argv);
  if (!result.success) {
    const firstIssue = result.error.issues[0];
    throw new Error(
      `Invalid global option --${firstIssue.path.join('.')}: ${firstIssue.message}`,
    );
  }
  const { home, network, endpoint, yes } = result.data;

  const settings: ContextSettings = {
    home,
    network,
    endpoint,
    skipConfirmation: yes,
    githubToken: ENV.GITHUB_TOKEN,
  };
  argv.context = getContext(settings);
}

/**
 * Retrieves context for the user-selected command
 * @returns context for the current command
 */
export function getContext({
  home,
  network,
  endpoint,
  skipConfirmation = false,
  githubToken,
}: ContextSettings): CommandContext {
  const resolvedHome = resolvePath(home);
  return {
    home: resolvedHome,
    network: getNetwork(network, endpoint),
    paths: getRelayerPaths(resolvedHome, network),
    downloader: new GithubDownloader(githubToken),
    skipConfirmation,
  };
}
