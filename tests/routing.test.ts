/**
 * Routing Test Suite
 * Tests Pattern Table matching. Examples are sourced from PATTERN_TABLE.
 * Run with: npx tsx tests/routing.test.ts
 */

import { PATTERN_TABLE, sampleCommands, type PatternRule } from '../src/core/pattern-table.js';
import { matchRules } from '../src/core/intent-resolver.js';
import { assertDeepEqual, assertEqual, assertNotNull, assertTrue, run, section, test } from './harness.js';

// ==========================================
// TABLE EXAMPLE TESTS (generated from the table)
// ==========================================

section('Pattern Table Example Tests');

for (const rule of PATTERN_TABLE) {
  for (const example of rule.examples) {
    test(`${rule.id}: "${example}"`, () => {
      const intent = matchRules(example);
      assertNotNull(intent, `Expected a match for "${example}"`);
      assertEqual(intent.operation, rule.operation);
      assertEqual(intent.source, 'rule-matched');
    });
  }
}

test('every rule has at least one example', () => {
  const bare = PATTERN_TABLE.filter((rule) => rule.examples.length === 0).map((rule) => rule.id);
  assertDeepEqual(bare, []);
});

test('rule ids are unique', () => {
  const ids = PATTERN_TABLE.map((rule) => rule.id);
  assertEqual(new Set(ids).size, ids.length);
});

test('the table is frozen', () => {
  assertTrue(Object.isFrozen(PATTERN_TABLE));
  assertTrue(PATTERN_TABLE.every((rule) => Object.isFrozen(rule)));
});

// ==========================================
// CRITICAL ROUTING TESTS
// ==========================================

section('Critical Routing Tests');

test('"get the latest 5 articles" -> query-latest {count: 5, content_type: article}', () => {
  const intent = matchRules('get the latest 5 articles');
  assertNotNull(intent);
  assertEqual(intent.operation, 'query-latest');
  assertDeepEqual(intent.parameters, { count: 5, content_type: 'article' });
});

test('"get the latest articles" defaults count to 10', () => {
  const intent = matchRules('get the latest articles');
  assertNotNull(intent);
  assertDeepEqual(intent.parameters, { count: 10, content_type: 'article' });
});

test('"status of site my-blog" -> status-site', () => {
  const intent = matchRules('status of site my-blog');
  assertNotNull(intent);
  assertEqual(intent.operation, 'status-site');
  assertEqual(intent.ruleId, 'site.status');
  assertDeepEqual(intent.parameters, { site: 'my-blog' });
});

test('"start my-blog" -> start-site', () => {
  const intent = matchRules('start my-blog');
  assertNotNull(intent);
  assertEqual(intent.operation, 'start-site');
  assertDeepEqual(intent.parameters, { site: 'my-blog' });
});

test('"drush status" is a drush command, not a site called drush', () => {
  const intent = matchRules('drush status');
  assertNotNull(intent);
  assertEqual(intent.operation, 'run-drush');
  assertDeepEqual(intent.parameters, { command: 'status' });
});

test('drush arguments are split into words', () => {
  const intent = matchRules('drush pm:list --type=module');
  assertNotNull(intent);
  assertDeepEqual(intent.parameters, { command: 'pm:list', args: ['--type=module'] });
});

test('"clear cache" -> cache:rebuild without a site', () => {
  const intent = matchRules('clear cache');
  assertNotNull(intent);
  assertDeepEqual(intent.parameters, { command: 'cache:rebuild' });
});

test('"clear all caches on my-blog" carries the site', () => {
  const intent = matchRules('clear all caches on my-blog');
  assertNotNull(intent);
  assertDeepEqual(intent.parameters, { site: 'my-blog', command: 'cache:rebuild' });
});

test('"enable the token module on my-blog" -> pm:enable token', () => {
  const intent = matchRules('enable the token module on my-blog');
  assertNotNull(intent);
  assertDeepEqual(intent.parameters, { module: 'token', site: 'my-blog', command: 'pm:enable' });
});

test('"Create a blog post about AI in Drupal" -> create-post with topic', () => {
  const intent = matchRules('Create a blog post about AI in Drupal');
  assertNotNull(intent);
  assertEqual(intent.operation, 'create-post');
  assertEqual(intent.ruleId, 'content.create.topic');
  assertDeepEqual(intent.parameters, { topic: 'AI in Drupal', content_type: 'article' });
});

test('"title" or "named" inside the topic does not make a titled post', () => {
  const intent = matchRules('Create a blog post about the title sequence in films');
  assertNotNull(intent);
  assertEqual(intent.ruleId, 'content.create.topic');
  assertDeepEqual(intent.parameters, { topic: 'the title sequence in films', content_type: 'article' });

  const named = matchRules('write an article about people named Ada');
  assertNotNull(named);
  assertEqual(named.ruleId, 'content.create.topic');
  assertDeepEqual(named.parameters, { topic: 'people named Ada', content_type: 'article' });
});

test('a bare "title" needs a quoted title', () => {
  const intent = matchRules('create a page with title "Pricing"');
  assertNotNull(intent);
  assertEqual(intent.ruleId, 'content.create.titled');
  assertDeepEqual(intent.parameters, { title: 'Pricing', content_type: 'page' });
});

test('platform named before the site', () => {
  const intent = matchRules('create a new ddev site named test-site');
  assertNotNull(intent);
  assertEqual(intent.operation, 'create-site');
  assertDeepEqual(intent.parameters, { site: 'test-site', platform: 'ddev' });
});

test('platform named after the site', () => {
  const intent = matchRules('create a site called my-blog using lando');
  assertNotNull(intent);
  assertEqual(intent.ruleId, 'site.create');
  assertDeepEqual(intent.parameters, { site: 'my-blog', platform: 'lando' });
});

test('tagged query splits the tag list', () => {
  const intent = matchRules('get nodes tagged "drupal, php"');
  assertNotNull(intent);
  assertEqual(intent.operation, 'query-tagged');
  assertDeepEqual(intent.parameters, { tags: ['drupal', 'php'], content_type: 'article', count: 10 });
});

test('"frobnicate the whatsit" matches nothing', () => {
  assertEqual(matchRules('frobnicate the whatsit'), null);
});

test('empty input matches nothing', () => {
  assertEqual(matchRules('   '), null);
});

// ==========================================
// PRIORITY
// ==========================================

section('Rule Priority');

test('body edit is declared before title edit and both match', () => {
  const text = 'update node 12 body to "Fresh copy"';
  const ids = PATTERN_TABLE.filter((rule) => rule.pattern.test(text)).map((rule) => rule.id);
  assertDeepEqual(ids, ['node.edit.body', 'node.edit.title']);

  const intent = matchRules(text);
  assertNotNull(intent);
  assertEqual(intent.ruleId, 'node.edit.body');
  assertDeepEqual(intent.parameters, { node_id: 12, body: 'Fresh copy' });
});

const overlapping: PatternRule[] = [
  {
    id: 'first',
    operation: 'stop-site',
    pattern: /^halt (?<site>\S+)$/i,
    roles: [{ name: 'site', kind: 'identifier', required: true }],
    examples: ['halt shop'],
    category: 'site',
  },
  {
    id: 'second',
    operation: 'status-site',
    pattern: /^halt (?<site>\S+)$/i,
    roles: [{ name: 'site', kind: 'identifier', required: true }],
    examples: ['halt shop'],
    category: 'site',
  },
];

test('earlier-declared rule wins on overlap', () => {
  assertEqual(matchRules('halt shop', overlapping)?.ruleId, 'first');
  assertEqual(matchRules('halt shop', [...overlapping].reverse())?.ruleId, 'second');
});

test('a structural match with a missing role is skipped', () => {
  const table: PatternRule[] = [
    {
      id: 'needs-module',
      operation: 'run-drush',
      pattern: /^enable(?: (?<module>\d+))?$/i,
      roles: [{ name: 'module', kind: 'identifier', required: true }],
      examples: [],
      category: 'maintenance',
    },
    {
      id: 'fallback',
      operation: 'run-drush',
      pattern: /^enable/i,
      roles: [],
      fixed: { command: 'pm:list' },
      examples: [],
      category: 'maintenance',
    },
  ];
  assertEqual(matchRules('enable', table)?.ruleId, 'fallback');
});

test('sample commands: one per category', () => {
  const samples = sampleCommands();
  assertEqual(samples.length, 6);
  assertEqual(samples[0], "Try: 'drush status'");
});

await run('Routing');
