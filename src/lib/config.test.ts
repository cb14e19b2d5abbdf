import test from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'path';
import { getLogPath, getStatePath, loadConfig, loadSheetConfig } from './config.js';
import { ConfigError } from './errors.js';

const baseEnv = {
  SHEET_WEBAPP_URL: 'https://sheets.example.test/exec',
  SHEET_SECRET: 'test-secret',
  OPENAI_API_KEY: 'test-key'
};

test('loadConfig applies defaults', () => {
  const config = loadConfig(baseEnv);
  assert.deepEqual(config, {
    sheet: { url: 'https://sheets.example.test/exec', secret: 'test-secret', timeoutMs: 20000 },
    llm: {
      provider: 'openai',
      apiKey: 'test-key',
      model: 'gpt-5-nano',
      baseUrl: 'https://api.openai.com/v1',
      timeoutMs: 120000
    },
    fetchLimit: 100
  });
});

test('loadConfig reads overrides and trims trailing slashes', () => {
  const config = loadConfig({
    ...baseEnv,
    OPENAI_BASE_URL: 'https://llm.example.test/v1/',
    OPENAI_MODEL: 'gpt-test',
    LIFTLOG_FETCH_LIMIT: '25',
    LIFTLOG_HTTP_TIMEOUT_MS: '5000'
  });
  assert.equal(config.fetchLimit, 25);
  assert.equal(config.sheet.timeoutMs, 5000);
  assert.equal(config.llm.provider, 'openai');
  if (config.llm.provider === 'openai') {
    assert.equal(config.llm.baseUrl, 'https://llm.example.test/v1');
    assert.equal(config.llm.model, 'gpt-test');
  }
});

test('ollama provider needs no API key', () => {
  const config = loadConfig({
    SHEET_WEBAPP_URL: baseEnv.SHEET_WEBAPP_URL,
    SHEET_SECRET: baseEnv.SHEET_SECRET,
    LIFTLOG_LLM_PROVIDER: 'ollama'
  });
  assert.deepEqual(config.llm, {
    provider: 'ollama',
    url: 'http://localhost:11434',
    model: 'qwen2.5:3b',
    timeoutMs: 120000
  });
});

test('missing credentials are reported together as a ConfigError', () => {
  assert.throws(
    () => loadConfig({ SHEET_WEBAPP_URL: baseEnv.SHEET_WEBAPP_URL, SHEET_SECRET: '   ' }),
    (err: unknown) => {
      assert.ok(err instanceof ConfigError);
      assert.equal(
        err.message,
        'Invalid configuration:\n  - SHEET_SECRET: required\n  - OPENAI_API_KEY: required when LIFTLOG_LLM_PROVIDER=openai'
      );
      return true;
    }
  );
});

test('invalid numbers and URLs are rejected', () => {
  assert.throws(
    () => loadConfig({ ...baseEnv, SHEET_WEBAPP_URL: 'not a url', LIFTLOG_FETCH_LIMIT: '0' }),
    (err: unknown) => {
      assert.ok(err instanceof ConfigError);
      assert.match(err.message, /SHEET_WEBAPP_URL: must be a URL/);
      assert.match(err.message, /LIFTLOG_FETCH_LIMIT: /);
      return true;
    }
  );
});

test('loadSheetConfig ignores model settings', () => {
  const sheet = loadSheetConfig({ SHEET_WEBAPP_URL: baseEnv.SHEET_WEBAPP_URL, SHEET_SECRET: 'test-secret' });
  assert.deepEqual(sheet, { url: 'https://sheets.example.test/exec', secret: 'test-secret', timeoutMs: 20000 });
});

test('local paths fall back to defaults without failing', () => {
  assert.ok(getStatePath({}).endsWith(join('.liftlog', 'state.json')));
  assert.equal(getStatePath({ LIFTLOG_STATE_PATH: '/tmp/state.json' }), '/tmp/state.json');
  assert.equal(getLogPath({}), undefined);
  assert.equal(getLogPath({ LIFTLOG_LOG_PATH: '/tmp/liftlog.log' }), '/tmp/liftlog.log');
});
