/**
 * Dispatch Test Suite
 * Whole pipeline: text -> intent -> command -> envelope.
 * Run with: npx tsx tests/dispatch.test.ts
 */

import { Dispatcher } from '../src/core/dispatcher.js';
import { IntentResolver } from '../src/core/intent-resolver.js';
import { AiIntentClassifier } from '../src/core/classifier.js';
import { sampleCommands } from '../src/core/pattern-table.js';
import { AiTextGenerator, type TextGenerator } from '../src/services/ai.js';
import { buildConfig } from '../src/config.js';
import { FakeGenerator, fakeRunner, makeContext, makeDdevSite, tempSitesRoot, type TestContext } from './fakes.js';
import { assertDeepEqual, assertEqual, assertTrue, run, section, test } from './harness.js';

function dispatcher(context: TestContext, classifier?: AiIntentClassifier): Dispatcher {
  return new Dispatcher({ resolver: new IntentResolver({ classifier }), context });
}

section('Examples');

test('1: "status of site my-blog" with .ddev/config.yaml -> success, platform ddev', async () => {
  const root = tempSitesRoot();
  makeDdevSite(root, 'my-blog');
  const stdout = JSON.stringify({ raw: { status: 'running', primary_url: 'https://my-blog.ddev.site', services: {} } });
  const { runner } = fakeRunner(() => ({ stdout }));
  const { intent, result } = await dispatcher(makeContext({ root, runner })).dispatch('status of site my-blog');
  assertEqual(intent.operation, 'status-site');
  assertEqual(result.success, true);
  assertEqual(result.data.platform, 'ddev');
});

test('2: "start my-blog" with no site directory -> NotFoundFailure with a create hint', async () => {
  const { intent, result } = await dispatcher(makeContext({ root: tempSitesRoot() })).dispatch('start my-blog');
  assertEqual(intent.operation, 'start-site');
  assertEqual(result.success, false);
  assertEqual(result.error, 'NotFoundFailure');
  assertDeepEqual(result.data.suggestions, ['create site named my-blog using ddev']);
});

test('3: "Create a blog post about AI in Drupal" without a provider -> ProviderFailure naming the key', async () => {
  const ai: TextGenerator = new AiTextGenerator(buildConfig({}).ai);
  const context = makeContext({ ai });
  const { intent, result } = await dispatcher(context, new AiIntentClassifier(ai)).dispatch(
    'Create a blog post about AI in Drupal'
  );
  assertEqual(intent.operation, 'create-post');
  assertEqual(result.success, false);
  assertEqual(result.error, 'ProviderFailure');
  assertEqual(result.message, 'AI provider "anthropic" is not configured: set ANTHROPIC_API_KEY');
  assertEqual(context.content.created.length, 0);
});

test('4: "get the latest 5 articles" -> query-latest {count: 5, content_type: article}', async () => {
  const context = makeContext();
  const { intent, result } = await dispatcher(context).dispatch('get the latest 5 articles');
  assertEqual(intent.operation, 'query-latest');
  assertDeepEqual(intent.parameters, { count: 5, content_type: 'article' });
  assertEqual(result.success, true);
  assertDeepEqual(context.queries.calls, ['latest article 5']);
});

test('5: "frobnicate the whatsit" with AI fallback disabled -> unknown, ParseFailure', async () => {
  const generator = FakeGenerator.answering('{"operation":"start-site","parameters":{"site":"x"}}');
  const { intent, result } = await dispatcher(makeContext(), new AiIntentClassifier(generator, false)).dispatch(
    'frobnicate the whatsit'
  );
  assertEqual(intent.operation, 'unknown');
  assertDeepEqual(result, {
    success: false,
    message: 'Could not understand: "frobnicate the whatsit"',
    data: { suggestions: sampleCommands() },
    error: 'ParseFailure',
  });
  assertEqual(generator.requests.length, 0);
});

section('Pipeline');

test('--provider overrides the provider for create-post', async () => {
  const { intent, result } = await dispatcher(makeContext({ ai: FakeGenerator.unconfigured() })).dispatch(
    'Create a blog post about caching',
    { provider: 'openai' }
  );
  assertEqual(intent.parameters.ai_provider, 'openai');
  assertEqual(result.message, 'AI provider "openai" is not configured: set OPENAI_API_KEY');
});

test('--provider leaves other operations alone', async () => {
  const { intent } = await dispatcher(makeContext()).dispatch('get the latest 5 articles', { provider: 'openai' });
  assertEqual(intent.parameters.ai_provider, undefined);
});

test('validate() false -> ValidationFailure with problems', async () => {
  const { runner, calls } = fakeRunner();
  const { result } = await dispatcher(makeContext({ runner })).dispatch('drush sql:drop');
  assertEqual(result.error, 'ValidationFailure');
  assertEqual(result.message, 'Invalid run-drush: drush sql:drop is blocked: run it by hand if you really mean it');
  assertDeepEqual(result.data.problems, ['drush sql:drop is blocked: run it by hand if you really mean it']);
  assertEqual(calls.length, 0);
});

test('hyphenated and short Drush aliases of blocked commands are blocked too', async () => {
  const attempts: Array<[string, string]> = [
    ['drush php-eval "echo 1;"', 'php-eval'],
    ['drush sql-query "DROP TABLE users"', 'sql-query'],
    ['drush site-install minimal', 'site-install'],
    ['drush sql-cli', 'sql-cli'],
    ['drush php-script x', 'php-script'],
    ['drush sin', 'sin'],
    ['drush sql:create', 'sql:create'],
    ['drush sql-sync @a @b', 'sql-sync'],
    ['drush SQL-DROP', 'SQL-DROP'],
  ];
  for (const [text, command] of attempts) {
    const { runner, calls } = fakeRunner();
    const { intent, result } = await dispatcher(makeContext({ runner })).dispatch(text);
    assertEqual(intent.operation, 'run-drush', text);
    assertEqual(result.error, 'ValidationFailure', text);
    assertDeepEqual(result.data.problems, [`drush ${command} is blocked: run it by hand if you really mean it`]);
    assertEqual(calls.length, 0, text);
  }
});

test('AI-inferred intent missing a parameter -> ValidationFailure from the factory', async () => {
  const classifier = new AiIntentClassifier(FakeGenerator.answering('{"operation":"start-site","parameters":{}}'));
  const { intent, result } = await dispatcher(makeContext(), classifier).dispatch('wake it up');
  assertEqual(intent.source, 'ai-inferred');
  assertEqual(result.error, 'ValidationFailure');
  assertEqual(result.message, 'Invalid parameters for start-site: site');
  assertDeepEqual(result.data.fields, ['site']);
});

test('every envelope has a one-line message', async () => {
  const d = dispatcher(makeContext({ root: tempSitesRoot() }));
  for (const text of ['start my-blog', 'frobnicate', 'delete node 999', 'drush sql:drop']) {
    const { result } = await d.dispatch(text);
    assertTrue(!result.message.includes('\n'), `"${text}" produced a multi-line message`);
  }
});

await run('Dispatch');
