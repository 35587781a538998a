/**
 * Configuration Test Suite
 * Run with: npx tsx tests/config.test.ts
 */

import { buildConfig, parseFileConfig, projectRoot, validateConfig } from '../src/config.js';
import { assertDeepEqual, assertEqual, run, section, test } from './harness.js';

section('buildConfig');

test('defaults', () => {
  const cfg = buildConfig({});
  assertEqual(cfg.drupal.base_url, 'http://localhost:8080');
  assertEqual(cfg.drupal.graphql_path, '/graphql');
  assertEqual(cfg.ai.default_provider, 'anthropic');
  assertEqual(cfg.ai.classify_fallback, true);
  assertEqual(cfg.tools.drush, 'drush');
  assertEqual(cfg.sites.root, './sites');
  assertEqual(cfg.sites.drupal_version, 'drupal10');
  assertEqual(cfg.shell.timeout_ms, 300000);
});

test('environment wins over config.json', () => {
  const cfg = buildConfig(
    { DRUPAL_BASE_URL: 'https://cms.example.test', AI_CLASSIFY_FALLBACK: 'false', OLLAMA_MODEL: 'mistral' },
    { drupal: { base_url: 'https://file.example.test', timeout_ms: 5000 }, ai: { models: { openai: 'gpt-4o' } } }
  );
  assertEqual(cfg.drupal.base_url, 'https://cms.example.test');
  assertEqual(cfg.drupal.timeout_ms, 5000);
  assertEqual(cfg.ai.classify_fallback, false);
  assertDeepEqual(cfg.ai.models, { anthropic: 'claude-3-5-haiku-latest', openai: 'gpt-4o', ollama: 'mistral' });
});

test('unparseable numbers fall back', () => {
  assertEqual(buildConfig({ SHELL_TIMEOUT_MS: 'soon' }).shell.timeout_ms, 300000);
});

section('parseFileConfig');

test('valid file', () => {
  assertDeepEqual(parseFileConfig('{"sites":{"root":"/srv/sites"}}'), { sites: { root: '/srv/sites' } });
});

test('invalid JSON -> empty', () => {
  assertDeepEqual(parseFileConfig('{ not json'), {});
});

test('schema violation -> empty', () => {
  assertDeepEqual(parseFileConfig('{"drupal":{"timeout_ms":-1}}'), {});
});

section('projectRoot');

test('source tree: the parent of src/', () => {
  assertEqual(projectRoot('/opt/drupal-agent/src'), '/opt/drupal-agent');
});

test('built tree: dist/src/ still resolves to the package root', () => {
  assertEqual(projectRoot('/opt/drupal-agent/dist/src'), '/opt/drupal-agent');
});

section('validateConfig');

test('missing password and key are reported', () => {
  assertDeepEqual(validateConfig(buildConfig({})).errors, [
    'DRUPAL_PASSWORD is not set; content operations will be rejected by Drupal',
    'ANTHROPIC_API_KEY environment variable is required for the anthropic provider',
  ]);
});

test('complete ollama setup is valid', () => {
  const cfg = buildConfig({
    DRUPAL_PASSWORD: 'test-secret',
    DEFAULT_AI_PROVIDER: 'ollama',
    OLLAMA_BASE_URL: 'http://localhost:11434',
  });
  assertDeepEqual(validateConfig(cfg), { valid: true, errors: [] });
});

test('unknown provider', () => {
  const cfg = buildConfig({ DRUPAL_PASSWORD: 'test-secret', DEFAULT_AI_PROVIDER: 'gemini' });
  assertDeepEqual(validateConfig(cfg).errors, ['DEFAULT_AI_PROVIDER "gemini" is not one of anthropic, openai, ollama']);
});

await run('Configuration');
