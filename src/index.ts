#!/usr/bin/env node
/**
 * Drupal Agent
 * Main entry point
 */

import { Command, Option } from 'commander';
import { config, loadConfig, validateConfig, ROOT_DIR } from './config.js';
import { logger, setLogLevel } from './utils/logger.js';
import { formatResult, OUTPUT_FORMATS, isOutputFormat } from './utils/format.js';
import { assertRegistryConsistency } from './core/command-factory.js';
import { sampleCommands } from './core/pattern-table.js';
import { fromError } from './core/result.js';
import { createConnectivityDeps, createDispatcher } from './services/index.js';
import { runConnectivityChecks, summarizeChecks, writeEnvFile } from './services/diagnostics.js';
import { summarizeError } from './core/errors.js';
import { AI_PROVIDERS, type Config, type OutputFormat } from './types/index.js';

interface ExecuteOptions {
  format: string;
  provider?: string;
}

async function execute(text: string, options: ExecuteOptions): Promise<number> {
  const format: OutputFormat = isOutputFormat(options.format) ? options.format : 'text';
  const controller = new AbortController();
  const onInterrupt = () => {
    logger.warn('Interrupted, aborting');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const dispatcher = createDispatcher(config);
    const { result } = await dispatcher.dispatch(text, { provider: options.provider, signal: controller.signal });
    console.log(formatResult(result, format));
    return result.success ? 0 : 1;
  } catch (error) {
    logger.error('Unexpected failure', { error: String(error) });
    console.log(formatResult(fromError(error, 'PlatformFailure', 'Unexpected failure'), format));
    return 1;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

function check(cfg: Config = config): number {
  const validation = validateConfig(cfg);
  if (validation.valid) {
    console.log('✅ Configuration OK');
    return 0;
  }
  console.log('❌ Configuration problems:');
  validation.errors.forEach((err) => console.log(`   - ${err}`));
  console.log('   Copy .env.example to .env (or config.example.json to config.json) and update settings');
  return 1;
}

function setup(): number {
  try {
    const { created, path } = writeEnvFile(ROOT_DIR);
    console.log(created ? `✅ Created ${path}; edit it with your settings` : `⚠️  ${path} already exists`);
  } catch (error) {
    console.log(`❌ ${summarizeError(error)}`);
    return 1;
  }
  return check(loadConfig());
}

async function testConnectivity(format: OutputFormat): Promise<number> {
  const checks = await runConnectivityChecks(createConnectivityDeps(config));
  const result = summarizeChecks(checks);
  if (format !== 'text') {
    console.log(formatResult(result, format));
    return result.success ? 0 : 1;
  }

  console.log(`Drupal URL: ${config.drupal.base_url}`);
  console.log(`AI provider: ${config.ai.default_provider}`);
  checks.forEach((outcome) => console.log(`${outcome.ok ? '✅' : '❌'} ${outcome.name}: ${outcome.detail}`));
  console.log('');
  sampleCommands().forEach((line) => console.log(line));
  return result.success ? 0 : 1;
}

async function main(): Promise<void> {
  assertRegistryConsistency();

  const program = new Command();

  program
    .name('drupal-agent')
    .description('Run Drupal content, Drush and local site operations from plain-language commands')
    .version('0.1.0')
    .option('-v, --verbose', 'log resolution and execution details to stderr')
    .hook('preAction', (command) => {
      if (command.opts().verbose) setLogLevel('debug');
    });

  program
    .command('execute')
    .description('Resolve and run one command, e.g. "get the latest 5 articles"')
    .argument('<command...>', 'the command, quoted or as separate words')
    .addOption(new Option('-f, --format <format>', 'output format').choices(OUTPUT_FORMATS).default('text'))
    .addOption(new Option('-p, --provider <provider>', 'AI provider for generated content').choices(AI_PROVIDERS))
    .action(async (words: string[], options: ExecuteOptions) => {
      process.exitCode = await execute(words.join(' '), options);
    });

  program
    .command('check')
    .description('Validate configuration')
    .action(() => {
      process.exitCode = check();
    });

  program
    .command('setup')
    .description('Create .env from .env.example if missing, then validate configuration')
    .action(() => {
      process.exitCode = setup();
    });

  program
    .command('test')
    .description('Check that the AI provider, Drush and Drupal answer')
    .addOption(new Option('-f, --format <format>', 'output format').choices(OUTPUT_FORMATS).default('text'))
    .action(async (options: { format: string }) => {
      process.exitCode = await testConnectivity(isOutputFormat(options.format) ? options.format : 'text');
    });

  await program.parseAsync();
}

main().catch((error) => {
  logger.error('Fatal error', { error: String(error) });
  process.exit(1);
});
