/**
 * Diagnostics Test Suite
 * `setup` and the connectivity checks, against in-process stand-ins.
 * Run with: npx tsx tests/diagnostics.test.ts
 */

import { readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { runConnectivityChecks, summarizeChecks, writeEnvFile } from '../src/services/diagnostics.js';
import { DrushRunner } from '../src/services/drush.js';
import { sampleCommands } from '../src/core/pattern-table.js';
import { CommandError } from '../src/core/errors.js';
import { FakeGenerator, fakeRunner, tempSitesRoot, testConfig } from './fakes.js';
import { assertDeepEqual, assertEqual, assertTrue, run, section, test } from './harness.js';

const reachable = { ping: async () => undefined };

section('Connectivity');

test('all three answer -> success with sample commands', async () => {
  const generator = FakeGenerator.answering('ready');
  const { runner, calls } = fakeRunner();
  const checks = await runConnectivityChecks({
    ai: generator,
    drush: new DrushRunner(runner, testConfig.tools),
    drupal: reachable,
  });

  assertDeepEqual(checks, [
    { name: 'ai', ok: true, detail: 'anthropic answered' },
    { name: 'drush', ok: true, detail: 'drush status succeeded' },
    { name: 'drupal', ok: true, detail: 'JSON:API answered' },
  ]);
  assertEqual(generator.requests[0]?.maxTokens, 10);
  assertEqual(calls[0]?.executable, 'drush');
  assertDeepEqual(calls[0]?.args, ['status']);

  const result = summarizeChecks(checks);
  assertEqual(result.success, true);
  assertEqual(result.message, 'All connectivity checks passed');
  assertDeepEqual(result.data.sample_commands, sampleCommands());
});

test('every check runs even when the earlier ones fail', async () => {
  const { runner } = fakeRunner(() => ({ success: false, notFound: true, exitCode: null }));
  const checks = await runConnectivityChecks({
    ai: FakeGenerator.unconfigured(),
    drush: new DrushRunner(runner, testConfig.tools),
    drupal: {
      ping: async () => {
        throw new CommandError('ProviderFailure', 'Cannot reach Drupal at http://localhost:8080: fetch failed');
      },
    },
  });

  assertDeepEqual(checks, [
    { name: 'ai', ok: false, detail: 'not configured' },
    { name: 'drush', ok: false, detail: 'drush is not installed or not on PATH' },
    { name: 'drupal', ok: false, detail: 'Cannot reach Drupal at http://localhost:8080: fetch failed' },
  ]);

  const result = summarizeChecks(checks);
  assertEqual(result.success, false);
  assertEqual(result.error, 'ProviderFailure');
  assertEqual(result.message, 'Connectivity check failed: ai, drush, drupal');
});

test('a failing drush status reports its stderr', async () => {
  const { runner } = fakeRunner(() => ({ success: false, exitCode: 1, stderr: 'Bootstrap failed' }));
  const checks = await runConnectivityChecks({
    ai: FakeGenerator.answering('ready'),
    drush: new DrushRunner(runner, testConfig.tools),
    drupal: reachable,
  });
  assertDeepEqual(checks[1], { name: 'drush', ok: false, detail: 'drush status failed: Bootstrap failed' });
  assertEqual(summarizeChecks(checks).message, 'Connectivity check failed: drush');
});

section('Setup');

test('.env is created from .env.example', () => {
  const root = tempSitesRoot();
  writeFileSync(join(root, '.env.example'), 'DRUPAL_BASE_URL=http://localhost:8080\n');

  const outcome = writeEnvFile(root);
  assertEqual(outcome.created, true);
  assertEqual(outcome.path, join(root, '.env'));
  assertEqual(readFileSync(join(root, '.env'), 'utf-8'), 'DRUPAL_BASE_URL=http://localhost:8080\n');
});

test('an existing .env is left alone', () => {
  const root = tempSitesRoot();
  writeFileSync(join(root, '.env.example'), 'DRUPAL_PASSWORD=\n');
  writeFileSync(join(root, '.env'), 'DRUPAL_PASSWORD=test-secret\n');

  assertEqual(writeEnvFile(root).created, false);
  assertEqual(readFileSync(join(root, '.env'), 'utf-8'), 'DRUPAL_PASSWORD=test-secret\n');
});

test('no template -> NotFoundFailure', () => {
  const root = tempSitesRoot();
  let caught: unknown;
  try {
    writeEnvFile(root);
  } catch (error) {
    caught = error;
  }
  assertTrue(caught instanceof CommandError, 'expected a CommandError');
  if (caught instanceof CommandError) {
    assertEqual(caught.kind, 'NotFoundFailure');
    assertEqual(caught.message, `No .env.example in ${root}`);
  }
});

await run('Diagnostics');
