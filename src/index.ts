#!/usr/bin/env node
/**
 * swiftpick MCP Server
 *
 * Incremental search over stdio: open a session for a provider, feed it
 * queries, read back the bounded, current-generation result lines.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import { CACHE_MAX_AGE_MS, cacheDbPath, loadConfig } from './config.js';
import { CommandCache } from './cache/command-cache.js';
import { JobRunner } from './jobs/index.js';
import { createLogger } from './logging.js';
import { ProviderRegistry } from './providers/index.js';
import { RpcWorker } from './rpc/index.js';
import { SearchSessions } from './session.js';
import { TOOLS } from './tool-definitions.js';
import { createToolDispatch, dispatchToolCall } from './tool-handlers.js';

// ============================================================================
// Setup
// ============================================================================

const config = loadConfig();
const logger = createLogger('server', config.debug);

const cache = CommandCache.open(cacheDbPath(config));
const pruned = cache.prune(CACHE_MAX_AGE_MS);
if (pruned > 0) logger.debug(`pruned ${pruned} cached command outputs`);

const registry = new ProviderRegistry();
const sessions = new SearchSessions({
  config,
  registry,
  cache,
  jobs: new JobRunner({ logger: createLogger('job', config.debug) }),
  logger: createLogger('session', config.debug),
  startWorker: (cwd) =>
    RpcWorker.start({
      argv: config.workerCommand,
      cwd,
      framing: config.rpcFraming,
      logger: createLogger('rpc', config.debug),
      onDiagnostic: (error) => logger.warn(`worker sent malformed data: ${error.message}`),
      onExit: (code) => logger.debug(`worker exited (${code ?? 'signal'})`),
    }),
});
const dispatch = createToolDispatch({ sessions, registry, config, cache });

// Idle sessions hold processes; sweep them now and then.
const cleanupTimer = setInterval(() => {
  const closed = sessions.cleanup();
  if (closed > 0) logger.debug(`closed ${closed} idle sessions`);
}, 60_000);
cleanupTimer.unref();

// ============================================================================
// MCP Server
// ============================================================================

const server = new Server(
  {
    name: 'swiftpick',
    version: '0.4.0',
  },
  {
    capabilities: {
      tools: {},
    },
  },
);

server.setRequestHandler(ListToolsRequestSchema, async () => {
  return { tools: TOOLS };
});

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;

  try {
    const result = await dispatchToolCall(name, args ?? {}, dispatch);
    let textResult: string;
    if (typeof result === 'string') {
      textResult = result;
    } else if (result === undefined || result === null) {
      textResult = 'null';
    } else {
      textResult = JSON.stringify(result, null, 2);
    }
    return {
      content: [{ type: 'text', text: textResult }],
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    return {
      content: [{ type: 'text', text: `Error: ${message}` }],
      isError: true,
    };
  }
});

// ============================================================================
// Main Entry Point
// ============================================================================

function shutdown(): void {
  logger.debug('shutting down');
  clearInterval(cleanupTimer);
  sessions.closeAll();
  cache.close();
  process.exit(0);
}

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`[swiftpick] Server running on stdio (engine: ${config.engine}, capacity: ${config.preloadCapacity})`);

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  console.error('[swiftpick] Fatal error:', error);
  process.exit(1);
});
