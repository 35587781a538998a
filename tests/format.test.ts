/**
 * Output Format Test Suite
 * Run with: npx tsx tests/format.test.ts
 */

import { formatResult, formatValue, isOutputFormat } from '../src/utils/format.js';
import { fail, ok } from '../src/core/result.js';
import { assertEqual, run, section, test } from './harness.js';

const created = ok('Created article: Hello', { node_id: 101, tags: ['drupal', 'php'], published: true });
const missing = fail('NotFoundFailure', 'Site "my-blog" not found in ./sites', {
  suggestions: ['create site named my-blog using ddev'],
});

section('formatValue');

test('scalars, lists and objects', () => {
  assertEqual(formatValue('x'), 'x');
  assertEqual(formatValue(3), '3');
  assertEqual(formatValue(null), '');
  assertEqual(formatValue(['a', 2]), 'a, 2');
  assertEqual(formatValue([{ id: 1 }]), '[{"id":1}]');
});

section('formatResult');

test('text', () => {
  assertEqual(
    formatResult(created, 'text'),
    '✅ Created article: Hello\n   node_id: 101\n   tags: drupal, php\n   published: true'
  );
  assertEqual(
    formatResult(missing),
    '❌ Site "my-blog" not found in ./sites\n   suggestions: create site named my-blog using ddev'
  );
});

test('table', () => {
  assertEqual(
    formatResult(created, 'table'),
    [
      'Status: SUCCESS',
      'Message: Created article: Hello',
      '-'.repeat(50),
      'node_id             : 101',
      'tags                : drupal, php',
      'published           : true',
    ].join('\n')
  );
});

test('table with no data falls back to text', () => {
  assertEqual(formatResult(ok('Stopped shop'), 'table'), '✅ Stopped shop');
});

test('json keeps the envelope intact', () => {
  assertEqual(
    formatResult(missing, 'json'),
    JSON.stringify(
      {
        success: false,
        message: 'Site "my-blog" not found in ./sites',
        data: { suggestions: ['create site named my-blog using ddev'] },
        error: 'NotFoundFailure',
      },
      null,
      2
    )
  );
});

test('isOutputFormat', () => {
  assertEqual(isOutputFormat('table'), true);
  assertEqual(isOutputFormat('yaml'), false);
});

await run('Output Format');
