import type { CommandModule } from 'yargs';

import type {
  Downloader,
  Network,
  NetworkKind,
  RelayerPaths,
} from '@icmctl/relayer';

export interface ContextSettings {
  home: string;
  network: NetworkKind;
  endpoint?: string;
  skipConfirmation?: boolean;
  githubToken?: string;
}

export interface CommandContext {
  home: string;
  network: Network;
  // Relayer files of the selected network
  paths: RelayerPaths;
  downloader: Downloader;
  skipConfirmation: boolean;
}

export type CommandModuleWithContext<Args> = CommandModule<
  {},
  Args & { context: CommandContext }
>;
