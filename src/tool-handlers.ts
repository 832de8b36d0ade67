/**
 * swiftpick: Tool Handlers
 * Dispatches MCP tool calls to the search session operations.
 *
 * Arguments are validated with zod before they reach a ToolDispatch, so
 * handlers only ever see typed input.
 */
import { z } from 'zod';
import { MAX_QUERY_LENGTH, type PipelineConfig } from './config.js';
import type { CacheEntry, CommandCache } from './cache/command-cache.js';
import type { DispatcherState, DisplayStatus, FilterMode } from './dispatch/index.js';
import type { Diagnostic } from './errors.js';
import type { ProviderRegistry } from './providers/index.js';
import type { OpenSessionInput, SearchSession, SearchSessions, SessionSummary } from './session.js';

export const DEFAULT_RESULT_LIMIT = 100;

// ============================================================================
// Result Types
// ============================================================================

export interface ProviderSummary {
  id: string;
  description: string;
}

export interface SessionView {
  session_id: string;
  provider: string;
  state: DispatcherState;
  mode: FilterMode;
  generation: number;
  status: DisplayStatus;
  indicator: string;
  lines: string[];
  error?: Diagnostic;
  revision: number;
  loaded: number;
  cached: number;
  dropped: number;
}

export interface LoadMoreView extends SessionView {
  revealed: number;
}

export interface ConfigView {
  config: PipelineConfig;
  sessions: SessionSummary[];
  cache: CacheEntry[];
}

// ============================================================================
// ToolDispatch Interface
// ============================================================================

/** All operations the tool handler dispatch needs. */
export interface ToolDispatch {
  listProviders(): ProviderSummary[];
  openSession(input: OpenSessionInput): SessionView;
  setQuery(sessionId: string, query: string, flush: boolean): SessionView;
  getResults(sessionId: string, offset: number, limit: number): SessionView;
  loadMore(sessionId: string, count?: number): LoadMoreView;
  setCwd(sessionId: string, cwd: string): SessionView;
  abort(sessionId: string): SessionView;
  closeSession(sessionId: string): { closed: boolean };
  getConfig(): ConfigView;
}

// ============================================================================
// Argument Schemas
// ============================================================================

const SessionIdSchema = z.string().min(1, 'session_id is required');

/** Clients sometimes send arrays as JSON strings. */
const LinesSchema = z.preprocess((value) => {
  if (typeof value !== 'string') return value;
  try {
    return JSON.parse(value);
  } catch {
    return [value];
  }
}, z.array(z.string()));

export const OpenArgsSchema = z
  .object({
    provider: z.string().min(1).optional(),
    cwd: z.string().min(1).optional(),
    lines: LinesSchema.optional(),
    matcher: z.enum(['fuzzy', 'substring', 'regex']).optional(),
    case_mode: z.enum(['smart', 'ignore', 'respect']).optional(),
  })
  .refine((args) => args.provider !== undefined || args.lines !== undefined, {
    message: 'provider or lines is required',
  });

export const QueryArgsSchema = z.object({
  session_id: SessionIdSchema,
  query: z.string().max(MAX_QUERY_LENGTH),
  flush: z.boolean().optional().default(false),
});

export const ResultsArgsSchema = z.object({
  session_id: SessionIdSchema,
  offset: z.number().int().min(0).optional().default(0),
  limit: z.number().int().min(1).max(1000).optional().default(DEFAULT_RESULT_LIMIT),
});

export const LoadMoreArgsSchema = z.object({
  session_id: SessionIdSchema,
  count: z.number().int().min(1).optional(),
});

export const SetCwdArgsSchema = z.object({
  session_id: SessionIdSchema,
  cwd: z.string().min(1),
});

export const SessionArgsSchema = z.object({
  session_id: SessionIdSchema,
});

function parseArgs<T extends z.ZodTypeAny>(tool: string, schema: T, args: unknown): z.output<T> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    throw new Error(`Invalid arguments for ${tool}: ${problems.join('; ')}`);
  }
  return parsed.data;
}

// ============================================================================
// Dispatch
// ============================================================================

export async function dispatchToolCall(name: string, args: unknown, d: ToolDispatch): Promise<unknown> {
  switch (name) {
    case 'search_providers':
      return d.listProviders();

    case 'search_open': {
      const a = parseArgs(name, OpenArgsSchema, args);
      return d.openSession({
        provider: a.provider,
        cwd: a.cwd ?? process.cwd(),
        lines: a.lines,
        matcher: a.matcher,
        caseMode: a.case_mode,
      });
    }

    case 'search_query': {
      const a = parseArgs(name, QueryArgsSchema, args);
      return d.setQuery(a.session_id, a.query, a.flush);
    }

    case 'search_results': {
      const a = parseArgs(name, ResultsArgsSchema, args);
      return d.getResults(a.session_id, a.offset, a.limit);
    }

    case 'search_load_more': {
      const a = parseArgs(name, LoadMoreArgsSchema, args);
      return d.loadMore(a.session_id, a.count);
    }

    case 'search_set_cwd': {
      const a = parseArgs(name, SetCwdArgsSchema, args);
      return d.setCwd(a.session_id, a.cwd);
    }

    case 'search_abort':
      return d.abort(parseArgs(name, SessionArgsSchema, args).session_id);

    case 'search_close':
      return d.closeSession(parseArgs(name, SessionArgsSchema, args).session_id);

    case 'get_config':
      return d.getConfig();

    default:
      throw new Error(`Unknown tool: ${name}`);
  }
}

// ============================================================================
// Session-backed ToolDispatch
// ============================================================================

export function viewSession(session: SearchSession, offset = 0, limit = DEFAULT_RESULT_LIMIT): SessionView {
  const snapshot = session.display.snapshot(offset, limit);
  const stats = session.dispatcher.stats();
  return {
    session_id: session.id,
    provider: session.provider.id,
    state: stats.state,
    mode: stats.mode,
    generation: stats.generation,
    status: snapshot.status,
    indicator: snapshot.indicator,
    lines: snapshot.lines,
    error: snapshot.error,
    revision: snapshot.revision,
    loaded: stats.loadedSize,
    cached: stats.cachedSize,
    dropped: stats.droppedSize,
  };
}

export interface SessionDispatchDeps {
  sessions: SearchSessions;
  registry: ProviderRegistry;
  config: PipelineConfig;
  cache?: CommandCache;
}

export function createToolDispatch({ sessions, registry, config, cache }: SessionDispatchDeps): ToolDispatch {
  return {
    listProviders: () => registry.list().map(({ id, description }) => ({ id, description })),

    openSession: (input) => viewSession(sessions.open(input)),

    setQuery: (sessionId, query, flush) => {
      const session = sessions.get(sessionId);
      session.dispatcher.onQueryChange(query);
      if (flush) session.dispatcher.flush();
      return viewSession(session);
    },

    getResults: (sessionId, offset, limit) => viewSession(sessions.get(sessionId), offset, limit),

    loadMore: (sessionId, count) => {
      const session = sessions.get(sessionId);
      const revealed = session.dispatcher.loadMore(count);
      return { ...viewSession(session), revealed };
    },

    setCwd: (sessionId, cwd) => {
      const session = sessions.get(sessionId);
      session.dispatcher.setCwd(cwd);
      return viewSession(session);
    },

    abort: (sessionId) => {
      const session = sessions.get(sessionId);
      session.dispatcher.abort();
      return viewSession(session);
    },

    closeSession: (sessionId) => ({ closed: sessions.close(sessionId) }),

    getConfig: () => ({ config, sessions: sessions.list(), cache: cache?.list(20) ?? [] }),
  };
}
