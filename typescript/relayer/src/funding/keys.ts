import { Wallet } from 'ethers';

import {
  ensure0x,
  isFile,
  readFileAtPath,
  strip0x,
  writeFileAtPath,
} from '@icmctl/utils';

import { RelayerConfigError } from '../errors.js';

export interface RelayerKeyInfo {
  address: string;
  privateKey: string;
}

const KEY_FILE_MODE = 0o600;

/**
 * Loads the hex private key stored at keyPath, creating and saving a new
 * random key when the file does not exist.
 */
export function getRelayerKeyInfo(keyPath: string): RelayerKeyInfo {
  if (!isFile(keyPath)) {
    const wallet = Wallet.createRandom();
    writeFileAtPath(keyPath, strip0x(wallet.privateKey), KEY_FILE_MODE);
    return { address: wallet.address, privateKey: wallet.privateKey };
  }

  const content = readFileAtPath(keyPath).trim();
  let wallet: Wallet;
  try {
    wallet = new Wallet(ensure0x(content));
  } catch (error) {
    throw new RelayerConfigError(`Invalid private key at ${keyPath}`, error);
  }
  return { address: wallet.address, privateKey: wallet.privateKey };
}
