/**
 * Derives the websocket endpoint of a blockchain from its RPC endpoint:
 * https becomes wss, http becomes ws, and a trailing /rpc becomes /ws.
 */
export function deriveWsEndpoint(rpcEndpoint: string): string {
  let wsEndpoint = rpcEndpoint;
  if (wsEndpoint.startsWith('https://')) {
    wsEndpoint = 'wss://' + wsEndpoint.slice('https://'.length);
  } else if (wsEndpoint.startsWith('http://')) {
    wsEndpoint = 'ws://' + wsEndpoint.slice('http://'.length);
  }
  if (wsEndpoint.endsWith('/rpc')) {
    wsEndpoint = wsEndpoint.slice(0, -'/rpc'.length) + '/ws';
  }
  return wsEndpoint;
}
