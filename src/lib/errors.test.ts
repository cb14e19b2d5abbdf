import test from 'node:test';
import assert from 'node:assert/strict';
import { ConfigError, LiftlogError, ParseError, PersistenceError, UpstreamError, errorMessage } from './errors.js';

test('error classes carry their own name and share the LiftlogError base', () => {
  const errors = [new UpstreamError('a'), new ParseError('b'), new PersistenceError('c'), new ConfigError('d')];
  assert.deepEqual(errors.map(e => e.name), ['UpstreamError', 'ParseError', 'PersistenceError', 'ConfigError']);
  for (const e of errors) {
    assert.ok(e instanceof LiftlogError);
    assert.ok(e instanceof Error);
  }
});

test('cause is preserved', () => {
  const root = new Error('socket hang up');
  const err = new UpstreamError('Sheet get_raw failed', { cause: root });
  assert.equal(err.cause, root);
});

test('errorMessage handles non-Error values', () => {
  assert.equal(errorMessage(new ParseError('bad json')), 'bad json');
  assert.equal(errorMessage('plain'), 'plain');
  assert.equal(errorMessage(42), '42');
});
