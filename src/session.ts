/**
 * swiftpick: Search Sessions
 * Open query contexts, each a Dispatcher rendering into a MemoryDisplay.
 */
import { MAX_SESSIONS, SESSION_MAX_AGE_MS, spillDir, type PipelineConfig } from './config.js';
import type { CommandCache } from './cache/command-cache.js';
import {
  Dispatcher,
  MemoryDisplay,
  createMatcher,
  type CaseMode,
  type DispatcherStats,
  type MatcherName,
} from './dispatch/index.js';
import { Forerunner } from './forerunner/forerunner.js';
import { JobRunner } from './jobs/index.js';
import type { Logger } from './logging.js';
import { silentLogger } from './logging.js';
import { createListProvider, type ProviderRegistry } from './providers/index.js';
import type { Provider } from './providers/types.js';
import type { RpcWorker } from './rpc/index.js';
import type { TimerHost } from './scheduling/timers.js';

export interface SearchSession {
  id: string;
  provider: Provider;
  dispatcher: Dispatcher;
  display: MemoryDisplay;
  worker?: RpcWorker;
  createdAt: number;
  lastUsedAt: number;
}

export interface OpenSessionInput {
  /** Registered provider id. Ignored when `lines` is given. */
  provider?: string;
  cwd: string;
  /** Ad-hoc candidate list. */
  lines?: string[];
  matcher?: MatcherName;
  caseMode?: CaseMode;
}

export interface SessionSummary extends DispatcherStats {
  id: string;
  provider: string;
  cwd: string;
  createdAt: number;
  lastUsedAt: number;
}

export interface SearchSessionsOptions {
  config: PipelineConfig;
  registry: ProviderRegistry;
  jobs?: JobRunner;
  cache?: CommandCache;
  timers?: TimerHost;
  /** Starts the worker for an rpc provider. */
  startWorker?: (cwd: string) => RpcWorker;
  logger?: Logger;
  now?: () => number;
}

export class SearchSessions {
  private readonly sessions = new Map<string, SearchSession>();
  private readonly options: SearchSessionsOptions;
  private readonly jobs: JobRunner;
  private readonly logger: Logger;
  private readonly now: () => number;
  private seq = 0;

  constructor(options: SearchSessionsOptions) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
    this.jobs = options.jobs ?? new JobRunner({ logger: this.logger });
    this.now = options.now ?? Date.now;
  }

  open(input: OpenSessionInput): SearchSession {
    const { config, registry } = this.options;
    const id = `s${++this.seq}`;
    const provider = input.lines
      ? createListProvider(`list:${id}`, input.lines)
      : registry.get(input.provider ?? '');
    if (!provider) {
      throw new Error(`Unknown provider: ${input.provider ?? '(none)'}`);
    }

    if (this.sessions.size >= MAX_SESSIONS) this.evictOldest();

    const worker = provider.source({ cwd: input.cwd, config }).kind === 'rpc' ? this.startWorker(input.cwd) : undefined;
    const display = new MemoryDisplay();
    const dispatcher = new Dispatcher({
      provider,
      display,
      config,
      cwd: input.cwd,
      jobs: this.jobs,
      timers: this.options.timers,
      matcher: createMatcher(input.matcher ?? 'fuzzy', input.caseMode),
      correlator: worker?.correlator,
      forerunner: new Forerunner({
        runner: this.jobs,
        cache: this.options.cache,
        threshold: config.forerunnerThreshold,
        spillDir: spillDir(config),
        previewSize: config.preloadCapacity,
        logger: this.logger,
      }),
      logger: this.logger,
    });

    const now = this.now();
    const session: SearchSession = { id, provider, dispatcher, display, worker, createdAt: now, lastUsedAt: now };
    this.sessions.set(id, session);
    this.logger.debug(`opened ${id} (${provider.id}) in ${input.cwd}`);

    dispatcher.onQueryChange('');
    dispatcher.startForerunner().catch((err: unknown) => this.logger.error(`forerunner for ${id} failed:`, err));
    return session;
  }

  /**
   * @throws {Error} when no session has this id
   */
  get(id: string): SearchSession {
    const session = this.sessions.get(id);
    if (!session) throw new Error(`Unknown session: ${id}`);
    session.lastUsedAt = this.now();
    return session;
  }

  has(id: string): boolean {
    return this.sessions.has(id);
  }

  close(id: string): boolean {
    const session = this.sessions.get(id);
    if (!session) return false;
    session.dispatcher.dispose();
    session.worker?.stop();
    this.sessions.delete(id);
    this.logger.debug(`closed ${id}`);
    return true;
  }

  closeAll(): void {
    for (const id of [...this.sessions.keys()]) this.close(id);
  }

  /** Close sessions idle for longer than `maxAgeMs`. Returns how many were closed. */
  cleanup(maxAgeMs: number = SESSION_MAX_AGE_MS): number {
    const cutoff = this.now() - maxAgeMs;
    let closed = 0;
    for (const session of [...this.sessions.values()]) {
      if (session.lastUsedAt < cutoff && this.close(session.id)) closed++;
    }
    return closed;
  }

  list(): SessionSummary[] {
    return [...this.sessions.values()].map((session) => ({
      ...session.dispatcher.stats(),
      id: session.id,
      provider: session.provider.id,
      cwd: session.dispatcher.cwd,
      createdAt: session.createdAt,
      lastUsedAt: session.lastUsedAt,
    }));
  }

  get size(): number {
    return this.sessions.size;
  }

  private startWorker(cwd: string): RpcWorker {
    const start = this.options.startWorker;
    if (!start) throw new Error('No RPC worker configured');
    return start(cwd);
  }

  private evictOldest(): void {
    let oldest: SearchSession | undefined;
    for (const session of this.sessions.values()) {
      if (!oldest || session.lastUsedAt < oldest.lastUsedAt) oldest = session;
    }
    if (oldest) {
      this.logger.warn(`session limit reached, closing ${oldest.id}`);
      this.close(oldest.id);
    }
  }
}
