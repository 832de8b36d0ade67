/**
 * Filer provider.
 * Directory browser answered by the long-lived worker; changing directory
 * starts a new RPC session.
 */
import type { Provider } from './types.js';

export const filerProvider: Provider = {
  id: 'filer',
  description: 'Directory browser served by the RPC worker',
  overflowPolicy: 'cache',

  source() {
    return { kind: 'rpc', method: 'filer' };
  },

  rpcParams(query, { cwd, config }) {
    return { query, cwd, limit: config.preloadCapacity };
  },
};
