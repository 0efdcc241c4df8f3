export enum NetworkKind {
  Local = 'local',
  Devnet = 'devnet',
  Fuji = 'fuji',
  Mainnet = 'mainnet',
}

export interface Network {
  kind: NetworkKind;
  endpoint: string;
}

export const LOCAL_NETWORK_ENDPOINT = 'http://127.0.0.1:9650';
export const FUJI_API_ENDPOINT = 'https://api.avax-test.network';
export const MAINNET_API_ENDPOINT = 'https://api.avax.network';

const DEFAULT_ENDPOINTS: Record<NetworkKind, string | undefined> = {
  [NetworkKind.Local]: LOCAL_NETWORK_ENDPOINT,
  [NetworkKind.Devnet]: undefined,
  [NetworkKind.Fuji]: FUJI_API_ENDPOINT,
  [NetworkKind.Mainnet]: MAINNET_API_ENDPOINT,
};

export function getNetwork(kind: NetworkKind, endpoint?: string): Network {
  const resolved = endpoint || DEFAULT_ENDPOINTS[kind];
  if (!resolved) {
    throw new Error(`An endpoint is required for the ${kind} network`);
  }
  return { kind, endpoint: resolved.replace(/\/+$/, '') };
}
