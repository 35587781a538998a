/**
 * Platform Detector
 * Which local development platform manages a site directory, the command
 * each platform uses per lifecycle action, and how to read its status output.
 */

import { existsSync, statSync } from 'fs';
import { join, resolve } from 'path';
import { z } from 'zod';
import { toProjectName } from '../core/parameter-extractor.js';
import type {
  DetectedPlatform,
  LifecycleAction,
  Platform,
  SiteDescriptor,
  SiteState,
  SiteStatus,
} from '../types/index.js';

export const PLATFORM_COMMANDS: Readonly<Record<Platform, Readonly<Record<LifecycleAction, readonly string[]>>>> = {
  ddev: {
    start: ['start'],
    stop: ['stop'],
    restart: ['restart'],
    status: ['describe', '-j'],
  },
  lando: {
    start: ['start'],
    stop: ['stop'],
    restart: ['restart'],
    status: ['info', '--format', 'json'],
  },
};

export type Tool = Platform | 'composer' | 'drush';

export const INSTALL_GUIDANCE: Readonly<Record<Tool, string>> = {
  ddev: 'Install DDEV: https://ddev.com/get-started/ (macOS: brew install ddev/ddev/ddev)',
  lando: 'Install Lando: https://docs.lando.dev/getting-started/installation.html (macOS: brew install lando)',
  composer: 'Install Composer: https://getcomposer.org/download/',
  drush: 'Install Drush (composer require drush/drush) or set DRUSH_PATH and DRUSH_ROOT',
};

/**
 * `.ddev/config.yaml` wins over `.lando.yml`. Reads the file system only.
 */
export function detectPlatform(directory: string): DetectedPlatform {
  if (existsSync(join(directory, '.ddev', 'config.yaml'))) return 'ddev';
  if (existsSync(join(directory, '.lando.yml'))) return 'lando';
  return 'unknown';
}

export function siteDirectory(name: string, root: string): string {
  return resolve(root, toProjectName(name));
}

export function describeSite(name: string, root: string): SiteDescriptor {
  const directory = siteDirectory(name, root);
  const exists = existsSync(directory) && statSync(directory).isDirectory();
  return {
    name: toProjectName(name),
    directory,
    platform: exists ? detectPlatform(directory) : 'unknown',
    exists,
  };
}

export function siteUrl(name: string, platform: Platform): string {
  const project = toProjectName(name);
  return platform === 'ddev' ? `https://${project}.ddev.site` : `https://${project}.lndo.site`;
}

// ============================================================================
// Status parsing
// ============================================================================

const DdevDescribeSchema = z.object({
  raw: z.object({
    status: z.string().optional(),
    primary_url: z.string().optional(),
    services: z.record(z.unknown()).optional(),
  }),
});

const LandoInfoSchema = z.array(
  z.object({
    service: z.string(),
    urls: z.array(z.string()).optional(),
    running: z.boolean().optional(),
  })
);

function stateFromWord(word: string): SiteState {
  const lower = word.toLowerCase();
  if (lower === 'running' || lower === 'ok') return 'running';
  if (lower === 'stopped' || lower === 'paused') return 'stopped';
  return 'error';
}

function tryJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function parseDdev(output: string): SiteStatus | null {
  // ddev may print several JSON log lines; the describe payload is the one with `raw`
  for (const line of output.split('\n').reverse()) {
    const parsed = DdevDescribeSchema.safeParse(tryJson(line.trim()));
    if (!parsed.success) continue;
    const { raw } = parsed.data;
    return {
      state: stateFromWord(raw.status ?? ''),
      url: raw.primary_url ?? null,
      services: Object.keys(raw.services ?? {}),
    };
  }
  return null;
}

function parseLando(output: string): SiteStatus | null {
  const parsed = LandoInfoSchema.safeParse(tryJson(output.trim()));
  if (!parsed.success) return null;

  const entries = parsed.data;
  const flags = entries.filter((entry) => entry.running !== undefined);
  const urls = entries.flatMap((entry) => entry.urls ?? []);
  let state: SiteState;
  if (flags.length > 0) {
    state = flags.every((entry) => entry.running) ? 'running' : 'stopped';
  } else {
    state = urls.length > 0 ? 'running' : 'stopped';
  }

  return {
    state,
    url: urls.find((url) => url.startsWith('https://')) ?? urls[0] ?? null,
    services: entries.map((entry) => entry.service),
  };
}

/** Non-JSON output: look for state words. */
export function parseStatusKeywords(output: string): SiteStatus {
  const url = output.match(/https?:\/\/[^\s"',]+/)?.[0] ?? null;
  let state: SiteState = 'error';
  if (/\b(stopped|paused|not running|down)\b/i.test(output)) {
    state = 'stopped';
  } else if (/\b(running|ok|healthy)\b/i.test(output)) {
    state = 'running';
  }
  return { state, url, services: [] };
}

export function parseStatus(platform: Platform, output: string): SiteStatus {
  const parsed = platform === 'ddev' ? parseDdev(output) : parseLando(output);
  return parsed ?? parseStatusKeywords(output);
}
