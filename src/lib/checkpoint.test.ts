import test, { after } from 'node:test';
import assert from 'node:assert/strict';
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { FileCheckpointStore, isEligible, parseCheckpointTimestamp } from './checkpoint.js';
import { ConfigError, PersistenceError } from './errors.js';
import { recentRuns, recordRun } from './runs.js';
import { MAX_RUNS, StateFile, initState } from './state.js';
import type { RunSummary } from '../types/index.js';

const dir = mkdtempSync(join(tmpdir(), 'liftlog-test-'));
after(() => rmSync(dir, { recursive: true, force: true }));

const summary: RunSummary = {
  started_at: '2026-03-05T20:00:00.000Z',
  finished_at: '2026-03-05T20:00:05.000Z',
  fetched: 3,
  eligible: 2,
  skipped: 0,
  processed: 2,
  ok: 1,
  needs_review: 1,
  errors: 0,
  previous_checkpoint: '',
  last_timestamp: '2026-03-05T19:00:00.000Z',
  checkpoint_saved: true
};

test('load returns the empty checkpoint when no state file exists', () => {
  const state = new StateFile(join(dir, 'nested', 'fresh.json'));
  assert.deepEqual(new FileCheckpointStore(state).load(), { last_timestamp: '' });
  assert.equal(state.exists(), false);
});

test('save is durable across instances and the last save wins', () => {
  const path = join(dir, 'deep', 'er', 'durable.json');
  const store = new FileCheckpointStore(new StateFile(path));
  store.save({ last_timestamp: '2026-03-05T18:00:00.000Z' });
  store.save({ last_timestamp: '2026-03-06T07:30:00.000Z' });

  const loaded = new FileCheckpointStore(new StateFile(path)).load();
  assert.equal(loaded.last_timestamp, '2026-03-06T07:30:00.000Z');
  assert.equal(typeof loaded.updated_at, 'string');
});

test('named checkpoints are independent', () => {
  const state = new StateFile(join(dir, 'named.json'));
  new FileCheckpointStore(state, 'a').save({ last_timestamp: '2026-03-05T18:00:00.000Z' });
  assert.equal(new FileCheckpointStore(state, 'b').load().last_timestamp, '');
  assert.equal(new FileCheckpointStore(state, 'a').load().last_timestamp, '2026-03-05T18:00:00.000Z');
});

test('a failed write is a PersistenceError', () => {
  // The state path is a directory: it can be neither read nor replaced
  const path = join(dir, 'occupied');
  mkdirSync(join(path, 'child'), { recursive: true });
  const store = new FileCheckpointStore(new StateFile(path));
  assert.throws(() => store.save({ last_timestamp: '2026-03-05T18:00:00.000Z' }), PersistenceError);
});

test('a corrupt state file is a PersistenceError, not an empty checkpoint', () => {
  const path = join(dir, 'corrupt.json');
  writeFileSync(path, '{"version": 1, "checkpoints": ', 'utf-8');
  assert.throws(() => new FileCheckpointStore(new StateFile(path)).load(), PersistenceError);

  writeFileSync(path, JSON.stringify({ version: 1, checkpoints: { raw_logs: { last_timestamp: 5 } } }), 'utf-8');
  assert.throws(
    () => new FileCheckpointStore(new StateFile(path)).load(),
    (err: unknown) => err instanceof PersistenceError && err.message.endsWith('is malformed: checkpoints.raw_logs.last_timestamp: Expected string, received number')
  );
});

test('initState creates the file once and keeps existing content', () => {
  const state = new StateFile(join(dir, 'init', 'state.json'));
  assert.deepEqual(initState(state), { created: true, path: state.path });
  assert.deepEqual(JSON.parse(readFileSync(state.path, 'utf-8')), { version: 1, checkpoints: {}, runs: [] });

  new FileCheckpointStore(state).save({ last_timestamp: '2026-03-05T18:00:00.000Z' });
  assert.deepEqual(initState(state), { created: false, path: state.path });
  assert.equal(new FileCheckpointStore(state).load().last_timestamp, '2026-03-05T18:00:00.000Z');
});

test('eligibility is a strict string comparison against the checkpoint', () => {
  const checkpoint = { last_timestamp: '2026-03-05T18:00:00.000Z' };
  assert.equal(isEligible('2026-03-05T18:00:00.001Z', checkpoint), true);
  assert.equal(isEligible('2026-03-05T18:00:00.000Z', checkpoint), false);
  assert.equal(isEligible('2026-03-04T23:59:59.000Z', checkpoint), false);
  assert.equal(isEligible('2026-01-01T00:00:00.000Z', { last_timestamp: '' }), true);
  assert.equal(isEligible('', { last_timestamp: '' }), false);
});

test('parseCheckpointTimestamp accepts UTC ISO-8601 timestamps', () => {
  assert.equal(parseCheckpointTimestamp('2026-03-05T18:00:00.000Z'), '2026-03-05T18:00:00.000Z');
  assert.equal(parseCheckpointTimestamp(' 2026-03-05T18:00:00.123456+00:00 '), '2026-03-05T18:00:00.123456+00:00');
});

test('parseCheckpointTimestamp rejects dates that would hide every later entry', () => {
  // "March 5 2026" parses as a date but sorts after every ISO timestamp
  assert.equal(isEligible('2026-06-01T00:00:00.000Z', { last_timestamp: 'March 5 2026' }), false);
  assert.throws(() => parseCheckpointTimestamp('March 5 2026'), ConfigError);
  assert.throws(() => parseCheckpointTimestamp('2026-03-05'), ConfigError);
  assert.throws(
    () => parseCheckpointTimestamp('2026-03-05T18:00:00+02:00'),
    (err: unknown) => err instanceof ConfigError && err.message === 'Invalid checkpoint "2026-03-05T18:00:00+02:00": must be in UTC (Z or +00:00)'
  );
});

test('run summaries are recorded newest first', () => {
  const state = new StateFile(join(dir, 'runs.json'));
  const firstId = recordRun(state, summary);
  const secondId = recordRun(state, { ...summary, started_at: '2026-03-06T20:00:00.000Z', processed: 0, checkpoint_saved: false });

  assert.deepEqual([firstId, secondId], [1, 2]);
  const runs = recentRuns(state, 10);
  assert.deepEqual(runs.map(r => r.id), [2, 1]);
  assert.equal(runs[0].checkpoint_saved, false);
  assert.deepEqual(runs[1], { id: 1, ...summary });
  assert.deepEqual(recentRuns(state, 1).map(r => r.id), [2]);
  assert.deepEqual(recentRuns(state, 0), []);
});

test('run history keeps only the newest runs and ids keep increasing', () => {
  const state = new StateFile(join(dir, 'many-runs.json'));
  state.write({
    version: 1,
    checkpoints: {},
    runs: Array.from({ length: MAX_RUNS }, (_, i) => ({ id: i + 1, ...summary }))
  });

  assert.equal(recordRun(state, summary), MAX_RUNS + 1);
  const runs = state.read().runs;
  assert.equal(runs.length, MAX_RUNS);
  assert.equal(runs[0].id, 2);
  assert.equal(runs[runs.length - 1].id, MAX_RUNS + 1);
});

test('recording a run leaves the checkpoint alone', () => {
  const state = new StateFile(join(dir, 'shared.json'));
  new FileCheckpointStore(state).save({ last_timestamp: '2026-03-05T18:00:00.000Z' });
  recordRun(state, summary);
  assert.equal(new FileCheckpointStore(state).load().last_timestamp, '2026-03-05T18:00:00.000Z');
});
