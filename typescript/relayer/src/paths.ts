import path from 'path';

import { ICM_RELAYER_BIN } from './consts.js';
import { NetworkKind } from './network.js';

export interface RelayerPaths {
  // Versioned binaries live under binDir/<version>/
  binDir: string;
  configPath: string;
  logPath: string;
  runFilePath: string;
  storageDir: string;
}

export function getRunDir(home: string, network: NetworkKind): string {
  return path.join(home, 'runs', network);
}

export function getRelayerPaths(
  home: string,
  network: NetworkKind,
): RelayerPaths {
  const runDir = getRunDir(home, network);
  return {
    binDir: path.join(home, 'bin', ICM_RELAYER_BIN),
    configPath: path.join(runDir, `${ICM_RELAYER_BIN}-config.json`),
    logPath: path.join(runDir, `${ICM_RELAYER_BIN}.log`),
    runFilePath: path.join(runDir, `${ICM_RELAYER_BIN}-process.json`),
    storageDir: path.join(runDir, `${ICM_RELAYER_BIN}-storage`),
  };
}

export function getKeyPath(home: string, name: string): string {
  return path.join(home, 'keys', `${name}.pk`);
}
