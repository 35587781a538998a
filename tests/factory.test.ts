/**
 * Command Factory Test Suite
 * Run with: npx tsx tests/factory.test.ts
 */

import { COMMAND_REGISTRY, CommandFactory, assertRegistryConsistency } from '../src/core/command-factory.js';
import { PATTERN_TABLE } from '../src/core/pattern-table.js';
import { matchRules } from '../src/core/intent-resolver.js';
import { CommandError } from '../src/core/errors.js';
import { QueryContentCommand } from '../src/core/commands/query.js';
import { CreatePostCommand } from '../src/core/commands/content.js';
import { OPERATION_IDS } from '../src/types/index.js';
import { makeContext } from './fakes.js';
import { assertDeepEqual, assertEqual, assertNotNull, assertTrue, run, section, test } from './harness.js';

const factory = new CommandFactory();
const context = makeContext();

function creationError(fn: () => unknown): CommandError {
  try {
    fn();
  } catch (error) {
    if (error instanceof CommandError) return error;
    throw error;
  }
  throw new Error('Expected a CommandError');
}

section('Registry');

test('every operation id has a registration', () => {
  const missing = OPERATION_IDS.filter((id) => !COMMAND_REGISTRY.has(id));
  assertDeepEqual(missing, []);
});

test('registry and pattern table agree', () => {
  assertRegistryConsistency();
});

test('an operation without a rule is fatal', () => {
  const table = PATTERN_TABLE.filter((rule) => rule.operation !== 'query-users');
  let message = '';
  try {
    assertRegistryConsistency(table);
  } catch (error) {
    message = error instanceof Error ? error.message : String(error);
  }
  assertEqual(message, 'Command registry is inconsistent:\n  - command query-users has no pattern rule');
});

test('a rule without a command is fatal', () => {
  const registry = new Map([...COMMAND_REGISTRY].filter(([id]) => id !== 'delete-node'));
  let message = '';
  try {
    assertRegistryConsistency(PATTERN_TABLE, registry);
  } catch (error) {
    message = error instanceof Error ? error.message : String(error);
  }
  assertEqual(message, 'Command registry is inconsistent:\n  - rule for delete-node has no registered command');
});

section('Factory errors');

test('unregistered operation -> UnknownOperationFailure', () => {
  const error = creationError(() => factory.create('reboot-server', {}, context));
  assertEqual(error.kind, 'UnknownOperationFailure');
});

test('missing mandatory field -> ValidationFailure naming it', () => {
  const error = creationError(() => factory.create('start-site', {}, context));
  assertEqual(error.kind, 'ValidationFailure');
  assertEqual(error.message, 'Invalid parameters for start-site: site');
});

test('create-post needs a title or a topic', () => {
  const error = creationError(() => factory.create('create-post', { body: 'text' }, context));
  assertEqual(error.kind, 'ValidationFailure');
  assertEqual(error.message, 'Invalid parameters for create-post: title');
});

test('wrong type -> ValidationFailure', () => {
  const error = creationError(() => factory.create('edit-node', { node_id: 'abc', title: 'x' }, context));
  assertEqual(error.kind, 'ValidationFailure');
  assertDeepEqual(error.details.fields, ['node_id']);
});

section('Parameter parsing');

test('count is coerced and capped at 100', () => {
  const command = factory.create('query-latest', { count: '250' }, context);
  assertTrue(command instanceof QueryContentCommand);
  if (command instanceof QueryContentCommand) {
    assertDeepEqual(command.params, { kind: 'query-latest', count: 100, content_type: 'article' });
  }
});

test('a comma-separated string becomes a tag list', () => {
  const command = factory.create('create-post', { title: 'Hello', tags: 'drupal, php' }, context);
  assertTrue(command instanceof CreatePostCommand);
  if (command instanceof CreatePostCommand) {
    assertDeepEqual(command.params.tags, ['drupal', 'php']);
    assertEqual(command.params.content_type, 'article');
  }
});

test('each dispatch gets a fresh command', () => {
  const a = factory.create('start-site', { site: 'shop' }, context);
  const b = factory.create('start-site', { site: 'shop' }, context);
  assertTrue(a !== b);
});

section('validate()');

const invalid: Array<[string, Record<string, string>, string]> = [
  ['start-site', { site: '!!!' }, 'site "!!!" is not a usable project name'],
  ['create-site', { site: 'shop', platform: 'vagrant' }, 'platform "vagrant" is not one of ddev, lando'],
  ['run-drush', { command: 'sql:drop' }, 'drush sql:drop is blocked: run it by hand if you really mean it'],
  ['create-post', { title: 'Hi', ai_provider: 'gemini' }, 'ai_provider "gemini" is not one of anthropic, openai, ollama'],
  ['query-latest', { content_type: 'Blog Posts' }, 'content_type "blog posts" is not a machine name'],
  ['upload-media', { file_path: 'notes.txt' }, 'notes.txt is not an image (jpg, jpeg, png, gif, webp)'],
];

for (const [operation, params, problem] of invalid) {
  test(`${operation} ${JSON.stringify(params)} is invalid`, () => {
    const command = factory.create(operation, params, context);
    assertEqual(command.validate(), false);
    assertDeepEqual(command.problems(), [problem]);
  });
}

section('Round-trip: rule-matched intents validate');

for (const rule of PATTERN_TABLE) {
  for (const example of rule.examples) {
    test(`${rule.id}: "${example}"`, () => {
      const intent = matchRules(example);
      assertNotNull(intent);
      const command = factory.create(intent.operation, intent.parameters, context);
      assertEqual(command.operation, rule.operation);
      assertDeepEqual(command.problems(), []);
      assertEqual(command.validate(), true);
    });
  }
}

section('Boundaries: zero ids and punctuation-only names');

for (const text of ['delete node 0', 'edit node 0 title to "x"', 'get the latest 0 articles', 'start __', 'stop ---']) {
  test(`"${text}" matches no rule`, () => {
    assertEqual(matchRules(text), null);
  });
}

for (const text of ['delete node 10', 'start a_1', 'get the latest 20 articles']) {
  test(`"${text}" matches and validates`, () => {
    const intent = matchRules(text);
    assertNotNull(intent);
    assertEqual(factory.create(intent.operation, intent.parameters, context).validate(), true);
  });
}

await run('Command Factory');
