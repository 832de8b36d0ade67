/**
 * Dispatcher
 *
 * Coordinates one query context. Every edit goes through `onQueryChange`,
 * which either filters in-process right away or debounces a Job start.
 * The Dispatcher owns the current generation, the active Job, the
 * ResultStream and the narrowing base; Job and RPC callbacks that carry an
 * older generation are ignored.
 *
 * State: idle → debouncing → running → (idle | error)
 */
import { spillDir, thresholdFor, type PipelineConfig } from '../config.js';
import {
  DecodeError,
  SearchError,
  StreamError,
  toDiagnostic,
  type CommandContext,
} from '../errors.js';
import { removeSpilled, spillLines, type Forerunner, type ForerunnerResult } from '../forerunner/forerunner.js';
import { JobRunner, type Job } from '../jobs/job.js';
import type { JobCommand, JobKind, JobSummary } from '../jobs/types.js';
import type { Logger } from '../logging.js';
import { silentLogger } from '../logging.js';
import type { Provider, ProviderContext, QueryContext } from '../providers/types.js';
import type { RpcCorrelator } from '../rpc/correlator.js';
import { LinesResultSchema, type RpcResult } from '../rpc/types.js';
import { Debouncer } from '../scheduling/debouncer.js';
import { nodeTimers, type TimerHost } from '../scheduling/timers.js';
import { ResultStream, formatIndicator, type ResultStreamSnapshot } from '../stream/index.js';
import { validateQuery } from '../validation.js';
import type { Display } from './display.js';
import { createFuzzyMatcher, type Matcher } from './matcher.js';
import { selectMode, type FilterMode, type Source } from './mode-selector.js';

export type DispatcherState = 'idle' | 'debouncing' | 'running' | 'error';

export interface DispatcherOptions {
  provider: Provider;
  display: Display;
  config: PipelineConfig;
  cwd: string;
  jobs?: JobRunner;
  timers?: TimerHost;
  matcher?: Matcher;
  /** Required by rpc sources. */
  correlator?: RpcCorrelator;
  /** Required by command sources that should preload candidates. */
  forerunner?: Forerunner;
  logger?: Logger;
}

/** Candidates held in memory. */
interface CandidateSet {
  lines: string[];
  /** Total reported by a forerunner. */
  reportedTotal?: number;
  tempfile?: string;
  /** In-flight write of `lines` to disk; concurrent jobs share it. */
  spilling?: Promise<string>;
  /** False when `lines` is only a preview of a spilled output. */
  complete: boolean;
}

/** Previous sync query and what it matched. */
interface NarrowingBase {
  query: string;
  matches: string[];
  configKey: string;
}

export interface DispatcherStats extends ResultStreamSnapshot {
  state: DispatcherState;
  generation: number;
  mode: FilterMode;
  query: string;
  candidateCount?: number;
}

export class Dispatcher {
  private readonly provider: Provider;
  private readonly display: Display;
  private readonly config: PipelineConfig;
  private readonly jobs: JobRunner;
  private readonly debouncer: Debouncer;
  private readonly correlator?: RpcCorrelator;
  private readonly forerunner?: Forerunner;
  private readonly logger: Logger;
  private readonly threshold: number;

  private _cwd: string;
  private _matcher: Matcher;
  private _state: DispatcherState = 'idle';
  private _generation = 0;
  private _query = '';
  private stream: ResultStream;
  private path: FilterMode = 'sync';
  private firstBatch = true;
  /** Total the worker reported for the current generation. */
  private rpcTotal?: number;
  /** Spill files this Dispatcher wrote and must delete. */
  private ownedSpills: string[] = [];
  private activeJob?: Job;
  private cachedSource?: Source;
  private candidates?: CandidateSet;
  private narrowBase?: NarrowingBase;
  private forerunnerWanted = false;
  private cwdVersion = 0;
  private disposed = false;

  constructor(options: DispatcherOptions) {
    this.provider = options.provider;
    this.display = options.display;
    this.config = options.config;
    this.jobs = options.jobs ?? new JobRunner({ logger: options.logger });
    this.debouncer = new Debouncer(options.timers ?? nodeTimers);
    this.correlator = options.correlator;
    this.forerunner = options.forerunner;
    this.logger = options.logger ?? silentLogger;
    this.threshold = thresholdFor(options.config);
    this._cwd = options.cwd;
    this._matcher = options.matcher ?? createFuzzyMatcher();
    this.stream = new ResultStream(options.config.preloadCapacity, options.provider.overflowPolicy);
  }

  // ==========================================================================
  // Query edits
  // ==========================================================================

  onQueryChange(query: string): void {
    if (this.disposed) return;
    this._query = validateQuery(query);

    if (query.length === 0) {
      this.showBaseline();
      return;
    }

    // A lazy source only reveals its size once loaded.
    if (this.source().kind === 'lazy' && !this.candidates && !this.tryMaterialize()) return;

    if (this.mode === 'sync') {
      this.filterSync(query);
      return;
    }

    this.narrowBase = undefined;
    this._state = 'debouncing';
    this.debouncer.schedule(this.config.debounceMs, () => this.startJob(query));
  }

  /** Mode the next edit would take. */
  get mode(): FilterMode {
    const candidates = this.candidates;
    return selectMode({
      source: this.source(),
      knownSize: candidates ? (candidates.reportedTotal ?? candidates.lines.length) : undefined,
      threshold: this.threshold,
      // A spilled preview cannot stand in for the full candidate list.
      forceMode: candidates && !candidates.complete ? 'async' : this.provider.forceMode,
    });
  }

  /** Start a debounced Job now instead of at its deadline. */
  flush(): boolean {
    return this.debouncer.flush();
  }

  /** Reveal up to `count` cached lines. Returns how many were revealed. */
  loadMore(count: number = this.config.preloadCapacity): number {
    const taken = this.stream.takeCached(count);
    if (taken.length === 0) return 0;
    this.display.appendLines(taken);
    this.updateIndicator();
    return taken.length;
  }

  /** Stop whatever is pending or running; results already shown stay. */
  abort(): void {
    this.debouncer.cancel();
    this.cancelActiveJob();
    this._generation++;
    if (this._state !== 'error') this._state = 'idle';
  }

  setCwd(cwd: string): void {
    if (this.disposed || cwd === this._cwd) return;
    // Output from the old directory must not land in the new view.
    this.abort();
    this._cwd = cwd;
    this.cwdVersion++;
    this.forerunner?.cancel();
    this.cachedSource = undefined;
    this.candidates = undefined;
    this.narrowBase = undefined;
    this.releaseSpills();
    this.correlator?.newSession();
    this.logger.debug(`${this.provider.id}: cwd -> ${cwd}`);

    if (this.forerunnerWanted) {
      this.startForerunner().catch((err: unknown) => this.logger.error('forerunner restart failed:', err));
    }
    this.onQueryChange(this._query);
  }

  setMatcher(matcher: Matcher): void {
    this._matcher = matcher;
    this.narrowBase = undefined;
    if (this._query.length > 0 && this.mode === 'sync') {
      this.filterSync(this._query);
    }
  }

  /**
   * Preload the candidates of a command source. Resolves with the result,
   * or undefined when there is nothing to preload, the run failed, or the
   * context changed meanwhile.
   */
  async startForerunner(): Promise<ForerunnerResult | undefined> {
    const source = this.source();
    const forerunner = this.forerunner;
    if (source.kind !== 'command' || !forerunner) return undefined;

    this.forerunnerWanted = true;
    const version = this.cwdVersion;
    let result: ForerunnerResult;
    try {
      result = await forerunner.run({ argv: source.argv, cwd: this._cwd });
    } catch (err) {
      if (version === this.cwdVersion && !this.disposed) {
        this.logger.warn(`forerunner for ${this.provider.id} failed: ${err instanceof Error ? err.message : String(err)}`);
      }
      return undefined;
    }
    if (version !== this.cwdVersion || this.disposed) {
      if (result.ownsTempfile && result.tempfile) this.deleteSpills([result.tempfile]);
      return undefined;
    }

    this.releaseSpills();
    if (result.ownsTempfile && result.tempfile) this.ownedSpills.push(result.tempfile);
    this.candidates = {
      lines: result.lines,
      reportedTotal: result.total,
      tempfile: result.tempfile,
      complete: result.lines.length === result.total,
    };
    this.narrowBase = undefined;
    this.logger.debug(`${this.provider.id}: ${result.total} candidates${result.fromCache ? ' (cached)' : ''}`);

    if (this._query.length === 0) {
      this.showBaseline();
    } else if (this.mode === 'sync') {
      this.filterSync(this._query);
    }
    return result;
  }

  dispose(): void {
    if (this.disposed) return;
    this.abort();
    this.forerunner?.cancel();
    this.disposed = true;
    this.releaseSpills();
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  get state(): DispatcherState {
    return this._state;
  }

  get generation(): number {
    return this._generation;
  }

  get query(): string {
    return this._query;
  }

  get cwd(): string {
    return this._cwd;
  }

  get matcher(): Matcher {
    return this._matcher;
  }

  get currentJob(): Job | undefined {
    return this.activeJob;
  }

  get cachedLines(): readonly string[] {
    return this.stream.cache;
  }

  stats(): DispatcherStats {
    return {
      ...this.stream.snapshot(),
      state: this._state,
      generation: this._generation,
      mode: this.mode,
      query: this._query,
      candidateCount: this.candidates?.reportedTotal ?? this.candidates?.lines.length,
    };
  }

  // ==========================================================================
  // Sync path
  // ==========================================================================

  private showBaseline(): void {
    this.beginGeneration();
    this.narrowBase = undefined;
    this._state = 'idle';
    this.path = 'sync';

    const source = this.source();
    if (source.kind === 'rpc') {
      this.startJob('');
      return;
    }
    if (source.kind === 'lazy' && !this.candidates && !this.tryMaterialize()) return;

    const candidates = this.candidates ?? this.materialize();
    if (!candidates) {
      this.display.clear();
      return;
    }
    const { toDisplay } = this.stream.accept(candidates.lines);
    this.display.setLines(toDisplay);
    this.updateIndicator();
  }

  private filterSync(query: string): void {
    this.beginGeneration();
    this.path = 'sync';
    this._state = 'idle';

    const matcher = this._matcher;
    const matches = matcher.filter(this.filterInput(query), query);
    this.narrowBase = { query, matches, configKey: matcher.configKey };

    if (matches.length === 0) {
      this.display.showNoResults();
      this.updateIndicator();
      return;
    }
    const { toDisplay } = this.stream.accept(matches);
    this.display.setLines(toDisplay);
    this.updateIndicator();
  }

  /**
   * Narrowing reuse: an extension of the previous query only needs the
   * previous matches. Anything else starts from the full candidate list.
   */
  private filterInput(query: string): readonly string[] {
    const base = this.narrowBase;
    const matcher = this._matcher;
    if (
      base &&
      matcher.narrowingSafe &&
      base.configKey === matcher.configKey &&
      query.startsWith(base.query)
    ) {
      return base.matches;
    }
    return this.materialize()?.lines ?? [];
  }

  private materialize(): CandidateSet | undefined {
    if (this.candidates) return this.candidates;
    const source = this.source();
    if (source.kind === 'static') {
      this.candidates = { lines: [...source.lines], complete: true };
    } else if (source.kind === 'lazy') {
      this.candidates = { lines: source.load(), complete: true };
    }
    return this.candidates;
  }

  /** Materialize, surfacing a throwing loader as an error. */
  private tryMaterialize(): boolean {
    try {
      this.materialize();
      return true;
    } catch (err) {
      this.beginGeneration();
      this.fail(err, { argv: [this.provider.id], cwd: this._cwd });
      return false;
    }
  }

  // ==========================================================================
  // Async path
  // ==========================================================================

  private startJob(query: string): void {
    if (this.disposed) return;
    const generation = this.beginGeneration();
    this.path = 'async';
    this._state = 'running';

    const source = this.source();
    switch (source.kind) {
      case 'rpc':
        this.sendRequest(source.method, query, generation);
        return;
      case 'static':
      case 'lazy':
        this.filterFromFile(query, generation);
        return;
      case 'command':
        this.spawnQuery(query, generation, this.candidates?.tempfile ? 'filter' : 'dynamic-filter');
        return;
      case 'streaming':
        this.spawnQuery(query, generation, 'search');
        return;
    }
  }

  /** In-memory lists too large for the sync path are filtered from a spilled copy. */
  private filterFromFile(query: string, generation: number): void {
    const candidates = this.materialize();
    if (!candidates || candidates.tempfile) {
      this.spawnQuery(query, generation, 'filter');
      return;
    }
    this.spillCandidates(candidates)
      .then(() => {
        if (generation === this._generation) this.spawnQuery(query, generation, 'filter');
      })
      .catch((err: unknown) => {
        if (generation === this._generation) this.fail(err, { argv: [this.provider.id], cwd: this._cwd });
      });
  }

  private spillCandidates(candidates: CandidateSet): Promise<string> {
    if (!candidates.spilling) {
      candidates.spilling = spillLines(spillDir(this.config), [this.provider.id], candidates.lines).then(
        (tempfile) => {
          if (this.disposed || this.candidates !== candidates) {
            this.deleteSpills([tempfile]);
          } else {
            this.ownedSpills.push(tempfile);
          }
          candidates.tempfile = tempfile;
          return tempfile;
        },
        (err: unknown) => {
          candidates.spilling = undefined;
          throw err;
        },
      );
    }
    return candidates.spilling;
  }

  private spawnQuery(query: string, generation: number, kind: JobKind): void {
    const provider = this.provider;
    if (!provider.queryCommand) {
      this.fail(new SearchError('SPAWN_FAILURE', `Provider ${provider.id} cannot filter asynchronously`), {
        argv: [provider.id],
        cwd: this._cwd,
      });
      return;
    }

    let command: JobCommand;
    try {
      command = provider.queryCommand(query, this.queryContext());
    } catch (err) {
      this.fail(err, { argv: [this.provider.id], cwd: this._cwd });
      return;
    }

    const job = this.jobs.spawn(
      { command, generation, kind, successCodes: provider.successCodes },
      {
        onLines: (j, lines) => this.onJobLines(j, lines),
        onComplete: (j, summary) => this.onJobComplete(j, summary),
        onFailed: (j, error) => this.onJobFailed(j, error),
      },
    );
    if (!job.isTerminal) this.activeJob = job;
  }

  private onJobLines(job: Job, lines: string[]): void {
    if (job.generation !== this._generation) {
      this.logger.debug(`dropped ${lines.length} lines from gen=${job.generation}`);
      return;
    }
    this.showBatch(lines);
  }

  private onJobComplete(job: Job, summary: JobSummary): void {
    if (job.generation !== this._generation) return;
    this.activeJob = undefined;
    this._state = 'idle';
    if (summary.lineCount === 0) {
      this.display.showNoResults();
      this.updateIndicator();
    }
  }

  private onJobFailed(job: Job, error: SearchError): void {
    if (job.generation !== this._generation) return;
    this.fail(error, job.command);
  }

  private sendRequest(method: string, query: string, generation: number): void {
    const context: CommandContext = { argv: [method], cwd: this._cwd };
    const correlator = this.correlator;
    if (!correlator) {
      this.fail(new SearchError('SPAWN_FAILURE', `No RPC worker for ${this.provider.id}`), context);
      return;
    }

    const params = this.provider.rpcParams?.(query, this.providerContext()) ?? { query, cwd: this._cwd };
    try {
      correlator.send(method, params, (response) => this.onRpcResponse(generation, context, response));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.fail(new SearchError('STREAM_ERROR', message, { cause: err }), context);
    }
  }

  private onRpcResponse(generation: number, context: CommandContext, response: RpcResult): void {
    if (generation !== this._generation) return;
    if (!response.ok) {
      const error =
        response.raw === undefined ? new StreamError(context, response.error) : new DecodeError(response.error, response.raw);
      this.fail(error, context);
      return;
    }
    const parsed = LinesResultSchema.safeParse(response.result);
    if (!parsed.success) {
      this.fail(new DecodeError('Unexpected result from worker', JSON.stringify(response.result ?? null)), context);
      return;
    }

    this._state = 'idle';
    this.rpcTotal = parsed.data.total;
    if (parsed.data.lines.length === 0) {
      this.display.showNoResults();
      this.updateIndicator();
      return;
    }
    this.showBatch(parsed.data.lines);
  }

  // ==========================================================================
  // Shared
  // ==========================================================================

  /** Start a new generation: nothing older may touch the display after this. */
  private beginGeneration(): number {
    this.debouncer.cancel();
    this.cancelActiveJob();
    this.stream.reset();
    this.firstBatch = true;
    this.rpcTotal = undefined;
    return ++this._generation;
  }

  private cancelActiveJob(): void {
    const job = this.activeJob;
    this.activeJob = undefined;
    if (job) this.jobs.cancel(job);
  }

  /** First batch of a generation replaces the view; later ones append. */
  private showBatch(lines: readonly string[]): void {
    const { toDisplay } = this.stream.accept(lines);
    if (this.firstBatch) {
      this.firstBatch = false;
      this.display.setLines(toDisplay);
    } else {
      this.display.appendLines(toDisplay);
    }
    this.updateIndicator();
  }

  private updateIndicator(): void {
    const total = this.path === 'sync' ? this.candidates?.reportedTotal : (this.rpcTotal ?? this.stream.total);
    this.display.setIndicator(formatIndicator(this.stream.loadedSize, total));
  }

  private fail(error: unknown, context: CommandContext): void {
    this.activeJob = undefined;
    this._state = 'error';
    const diagnostic = toDiagnostic(error, context);
    this.logger.debug(`${this.provider.id} failed: ${diagnostic.message}`);
    this.display.showError(diagnostic);
    this.display.setIndicator('');
  }

  private releaseSpills(): void {
    this.deleteSpills(this.ownedSpills.splice(0));
  }

  private deleteSpills(tempfiles: string[]): void {
    if (tempfiles.length === 0) return;
    removeSpilled(tempfiles).catch((err: unknown) => this.logger.warn('could not remove spill files:', err));
  }

  private source(): Source {
    if (!this.cachedSource) {
      this.cachedSource = this.provider.source(this.providerContext());
    }
    return this.cachedSource;
  }

  private providerContext(): ProviderContext {
    return { cwd: this._cwd, config: this.config };
  }

  private queryContext(): QueryContext {
    return { ...this.providerContext(), tempfile: this.candidates?.tempfile };
  }
}
