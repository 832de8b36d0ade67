/**
 * Provider Types
 * A provider is a search source: files, grep hits, a directory browser, or
 * any list the host hands over.
 */
import type { PipelineConfig } from '../config.js';
import type { FilterMode, Source } from '../dispatch/mode-selector.js';
import type { JobCommand } from '../jobs/types.js';
import type { OverflowPolicy } from '../stream/result-stream.js';

export interface ProviderContext {
  cwd: string;
  config: PipelineConfig;
}

export interface QueryContext extends ProviderContext {
  /** Full candidate list spilled to disk by the forerunner. */
  tempfile?: string;
}

export interface Provider {
  readonly id: string;
  readonly description: string;
  /** Exit codes that still mean success; grep exits 1 on no match. */
  readonly successCodes?: readonly number[];
  /** What happens to result lines beyond the preload capacity. */
  readonly overflowPolicy?: OverflowPolicy;
  readonly forceMode?: FilterMode;

  source(context: ProviderContext): Source;

  /** Command run for one query on the async path of command and streaming sources. */
  queryCommand?(query: string, context: QueryContext): JobCommand;

  /** Parameters of the request sent for one query by rpc sources. */
  rpcParams?(query: string, context: ProviderContext): Record<string, unknown>;
}
