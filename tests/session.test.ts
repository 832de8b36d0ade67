/**
 * Tests for src/session.ts and the session-backed ToolDispatch
 */
import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { MAX_SESSIONS } from '../src/config.js';
import { JobRunner } from '../src/jobs/job.js';
import { ProviderRegistry } from '../src/providers/index.js';
import { RpcWorker } from '../src/rpc/worker.js';
import { SearchSessions } from '../src/session.js';
import { createToolDispatch, dispatchToolCall, type SessionView, type ToolDispatch } from '../src/tool-handlers.js';
import { FakeSpawner } from './helpers/fake-process.js';
import { FakeTimers } from './helpers/fake-timers.js';
import { testConfig } from './helpers/test-config.js';

describe('SearchSessions', () => {
  let spawner: FakeSpawner;
  let clock: number;
  let sessions: SearchSessions;

  beforeEach(() => {
    spawner = new FakeSpawner();
    clock = 1000;
    sessions = new SearchSessions({
      config: testConfig({ preloadCapacity: 2 }),
      registry: new ProviderRegistry(),
      jobs: new JobRunner({ spawner: spawner.spawn }),
      timers: new FakeTimers(),
      startWorker: (cwd) => RpcWorker.start({ argv: ['worker'], cwd, framing: 'line', spawner: spawner.spawn }),
      now: () => clock,
    });
  });

  afterEach(() => {
    sessions.closeAll();
  });

  it('should open an ad-hoc list and show its first lines', () => {
    const session = sessions.open({ cwd: '/proj', lines: ['alpha', 'beta', 'gamma'] });

    assert.strictEqual(session.id, 's1');
    assert.strictEqual(session.provider.id, 'list:s1');
    assert.deepStrictEqual(session.display.snapshot().lines, ['alpha', 'beta']);
    assert.strictEqual(session.display.snapshot().indicator, '2');
    assert.strictEqual(spawner.count, 0);
  });

  it('should reject an unknown provider', () => {
    assert.throws(() => sessions.open({ provider: 'nope', cwd: '/' }), /Unknown provider: nope/);
    assert.strictEqual(sessions.size, 0);
  });

  it('should reject an unknown session id', () => {
    assert.throws(() => sessions.get('s9'), /Unknown session: s9/);
  });

  it('should start the worker for an rpc provider and stop it on close', () => {
    const session = sessions.open({ provider: 'filer', cwd: '/proj' });
    const proc = spawner.last();

    assert.deepStrictEqual(proc.argv, ['worker']);
    assert.deepStrictEqual(proc.written, [
      '{"id":1,"session_id":1,"method":"filer","params":{"query":"","cwd":"/proj","limit":2}}\n',
    ]);

    assert.strictEqual(sessions.close(session.id), true);
    assert.deepStrictEqual(proc.signals, ['SIGTERM']);
    assert.strictEqual(sessions.has(session.id), false);
    assert.strictEqual(sessions.close(session.id), false);
  });

  it('should fail an rpc provider without a worker factory', () => {
    const bare = new SearchSessions({ config: testConfig(), registry: new ProviderRegistry() });
    assert.throws(() => bare.open({ provider: 'filer', cwd: '/' }), /No RPC worker configured/);
  });

  it('should evict the least recently used session at the limit', () => {
    for (let i = 0; i < MAX_SESSIONS; i++) {
      clock++;
      sessions.open({ cwd: '/', lines: [] });
    }
    clock++;
    sessions.get('s1');
    clock++;
    sessions.open({ cwd: '/', lines: [] });

    assert.strictEqual(sessions.size, MAX_SESSIONS);
    assert.strictEqual(sessions.has('s1'), true);
    assert.strictEqual(sessions.has('s2'), false);
    assert.strictEqual(sessions.has(`s${MAX_SESSIONS + 1}`), true);
  });

  it('should close idle sessions on cleanup', () => {
    sessions.open({ cwd: '/', lines: ['a'] });
    clock = 5000;
    sessions.open({ cwd: '/', lines: ['b'] });
    clock = 6000;

    assert.strictEqual(sessions.cleanup(2000), 1);
    assert.deepStrictEqual(sessions.list().map((s) => s.id), ['s2']);
  });

  it('should summarize open sessions', () => {
    const session = sessions.open({ provider: 'grep', cwd: '/proj' });
    session.dispatcher.onQueryChange('todo');

    const [summary] = sessions.list();
    assert.strictEqual(summary.id, 's1');
    assert.strictEqual(summary.provider, 'grep');
    assert.strictEqual(summary.cwd, '/proj');
    assert.strictEqual(summary.query, 'todo');
    assert.strictEqual(summary.state, 'debouncing');
    assert.strictEqual(summary.mode, 'async');
  });
});

describe('createToolDispatch', () => {
  let spawner: FakeSpawner;
  let sessions: SearchSessions;
  let dispatch: ToolDispatch;

  beforeEach(() => {
    spawner = new FakeSpawner();
    const config = testConfig({ preloadCapacity: 2 });
    const registry = new ProviderRegistry();
    sessions = new SearchSessions({
      config,
      registry,
      jobs: new JobRunner({ spawner: spawner.spawn }),
      timers: new FakeTimers(),
    });
    dispatch = createToolDispatch({ sessions, registry, config });
  });

  afterEach(() => {
    sessions.closeAll();
  });

  /** Opens through the tool entry point, as a client would. */
  async function open(args: Record<string, unknown>): Promise<SessionView> {
    await dispatchToolCall('search_open', args, dispatch);
    const [summary] = sessions.list().slice(-1);
    return dispatch.getResults(summary.id, 0, 100);
  }

  it('should list the built-in providers', () => {
    assert.deepStrictEqual(dispatch.listProviders().map((p) => p.id), ['files', 'grep', 'filer']);
  });

  it('should filter an ad-hoc list as the query changes', async () => {
    const opened = await open({ lines: ['alpha', 'beta', 'gamma'], cwd: '/proj' });
    assert.deepStrictEqual(opened.lines, ['alpha', 'beta']);
    assert.strictEqual(opened.cached, 1);

    const view = dispatch.setQuery(opened.session_id, 'al', false);
    assert.deepStrictEqual(view.lines, ['alpha']);
    assert.strictEqual(view.indicator, '1');
    assert.strictEqual(view.mode, 'sync');
    assert.strictEqual(view.state, 'idle');
  });

  it('should reveal cached lines on load more', async () => {
    const opened = await open({ lines: ['alpha', 'beta', 'gamma'] });
    const more = dispatch.loadMore(opened.session_id);

    assert.strictEqual(more.revealed, 1);
    assert.deepStrictEqual(more.lines, ['alpha', 'beta', 'gamma']);
    assert.strictEqual(more.indicator, '3');
  });

  it('should run a grep job when flushed and page its output', async () => {
    const opened = await open({ provider: 'grep', cwd: '/proj' });
    assert.strictEqual(opened.status, 'empty');

    const running = dispatch.setQuery(opened.session_id, 'todo', true);
    assert.strictEqual(running.state, 'running');
    assert.deepStrictEqual(spawner.last().argv.slice(-3), ['--', 'todo', '.']);

    spawner.last().emitStdout('a.ts:1:1:todo\nb.ts:2:5:todo\nc.ts:3:1:todo\n');
    const page = dispatch.getResults(opened.session_id, 1, 10);
    assert.deepStrictEqual(page.lines, ['b.ts:2:5:todo']);
    assert.strictEqual(page.indicator, '2/3');
    assert.strictEqual(page.cached, 1);
  });

  it('should report a failed job as an error view', async () => {
    const opened = await open({ provider: 'grep', cwd: '/proj' });
    dispatch.setQuery(opened.session_id, '(', true);
    spawner.last().emitStderr('rg: regex parse error\n');

    const view = dispatch.getResults(opened.session_id, 0, 100);
    assert.strictEqual(view.state, 'error');
    assert.strictEqual(view.status, 'error');
    assert.strictEqual(view.error?.message, 'rg: regex parse error');
    assert.strictEqual(view.lines[0], 'Error: rg: regex parse error');
  });

  it('should abort a pending query', async () => {
    const opened = await open({ provider: 'grep', cwd: '/proj' });
    dispatch.setQuery(opened.session_id, 'todo', false);
    const view = dispatch.abort(opened.session_id);

    assert.strictEqual(view.state, 'idle');
    assert.strictEqual(spawner.count, 0);
  });

  it('should requery after a cwd change', async () => {
    const opened = await open({ provider: 'grep', cwd: '/proj' });
    dispatch.setQuery(opened.session_id, 'todo', true);
    const first = spawner.last();

    const view = dispatch.setCwd(opened.session_id, '/other');
    assert.strictEqual(view.state, 'debouncing');
    assert.deepStrictEqual(first.signals, ['SIGTERM']);
    assert.strictEqual(sessions.get(opened.session_id).dispatcher.cwd, '/other');
  });

  it('should close sessions', async () => {
    const opened = await open({ lines: ['x'] });
    assert.deepStrictEqual(dispatch.closeSession(opened.session_id), { closed: true });
    assert.throws(() => dispatch.getResults(opened.session_id, 0, 10), /Unknown session/);
  });

  it('should expose configuration and open sessions', async () => {
    await open({ lines: ['x'] });
    const view = dispatch.getConfig();
    assert.strictEqual(view.config.preloadCapacity, 2);
    assert.strictEqual(view.sessions.length, 1);
    assert.deepStrictEqual(view.cache, []);
  });
});
