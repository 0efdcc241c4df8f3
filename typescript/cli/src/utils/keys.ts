import { password } from '@inquirer/prompts';
import { Wallet, providers, utils } from 'ethers';

import { getKeyPath } from '@icmctl/relayer';
import { ensure0x, isFile, readFileAtPath } from '@icmctl/utils';

/**
 * Resolves a private key given either as hex or as the name of a key
 * stored under <home>/keys.
 */
export function resolvePrivateKey(home: string, keyOrName: string): string {
  const trimmed = keyOrName.trim();
  if (utils.isHexString(ensure0x(trimmed), 32)) return ensure0x(trimmed);

  const keyPath = getKeyPath(home, trimmed);
  if (!isFile(keyPath)) {
    throw new Error(`No key named ${trimmed} found at ${keyPath}`);
  }
  const stored = ensure0x(readFileAtPath(keyPath).trim());
  if (!utils.isHexString(stored, 32)) {
    throw new Error(`Invalid private key format at ${keyPath}`);
  }
  return stored;
}

/**
 * Retrieves a signer for the given key, prompting for one when missing.
 * @returns the signer
 */
export async function getSigner({
  home,
  key,
  provider,
  skipConfirmation,
}: {
  home: string;
  key?: string;
  provider: providers.Provider;
  skipConfirmation?: boolean;
}): Promise<Wallet> {
  key ||= await retrieveKey(skipConfirmation);
  return new Wallet(resolvePrivateKey(home, key), provider);
}

async function retrieveKey(
  skipConfirmation: boolean | undefined,
): Promise<string> {
  if (skipConfirmation) throw new Error(`No private key provided`);
  else
    return password({
      message: `Please enter private key or use the ICM_KEY environment variable.`,
    });
}
