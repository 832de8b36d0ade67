/**
 * RPC Module Exports
 */

export * from './types.js';
export { RpcCorrelator, type RpcCorrelatorOptions } from './correlator.js';
export { RpcWorker, type RpcWorkerOptions } from './worker.js';
export { createFrameDecoder, encodeFrame, type FrameDecoder } from './codec.js';
