/**
 * Drupal Agent - Type Definitions
 */

// ============================================================================
// Logging
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
}

// ============================================================================
// Operations & Intents
// ============================================================================

export const OPERATION_IDS = [
  'create-post',
  'edit-node',
  'delete-node',
  'upload-media',
  'run-drush',
  'query-latest',
  'query-search',
  'query-tagged',
  'query-users',
  'create-site',
  'start-site',
  'stop-site',
  'restart-site',
  'status-site',
] as const;

export type OperationId = (typeof OPERATION_IDS)[number];

export function isOperationId(value: string): value is OperationId {
  return OPERATION_IDS.some((id) => id === value);
}

export type ParamValue = string | number | boolean | string[];

export type IntentSource = 'rule-matched' | 'ai-inferred' | 'unresolved';

export interface Intent {
  operation: OperationId | 'unknown';
  parameters: Record<string, ParamValue>;
  source: IntentSource;
  ruleId?: string;
}

// ============================================================================
// Result Envelope
// ============================================================================

export type FailureKind =
  | 'ParseFailure'
  | 'ValidationFailure'
  | 'NotFoundFailure'
  | 'PlatformFailure'
  | 'ProviderFailure'
  | 'UnknownOperationFailure';

export interface ResultEnvelope {
  success: boolean;
  message: string;
  data: Record<string, unknown>;
  error?: FailureKind;
}

export type OutputFormat = 'json' | 'text' | 'table';

// ============================================================================
// Local sites
// ============================================================================

export const PLATFORMS = ['ddev', 'lando'] as const;

export type Platform = (typeof PLATFORMS)[number];

export type DetectedPlatform = Platform | 'unknown';

export type SiteState = 'running' | 'stopped' | 'error';

export type LifecycleAction = 'start' | 'stop' | 'restart' | 'status';

export interface SiteDescriptor {
  name: string;
  directory: string;
  platform: DetectedPlatform;
  exists: boolean;
}

export interface SiteStatus {
  state: SiteState;
  url: string | null;
  services: string[];
}

// ============================================================================
// Shell
// ============================================================================

export interface ShellCommandResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number | null;
  timedOut: boolean;
  aborted: boolean;
  notFound: boolean;
  duration_ms: number;
  command: string;
}

export interface ShellOptions {
  cwd?: string;
  timeout?: number;
  maxOutput?: number;
  signal?: AbortSignal;
}

export type ShellRunner = (
  executable: string,
  args: string[],
  options?: ShellOptions
) => Promise<ShellCommandResult>;

// ============================================================================
// AI
// ============================================================================

export const AI_PROVIDERS = ['anthropic', 'openai', 'ollama'] as const;

export type AiProvider = (typeof AI_PROVIDERS)[number];

export type GenerationFailureReason = 'not-configured' | 'unavailable' | 'unauthorized' | 'timeout';

export type GenerationResult =
  | { success: true; text: string; provider: AiProvider }
  | { success: false; reason: GenerationFailureReason; error: string; provider: string };

export interface GenerationRequest {
  prompt: string;
  contentType?: string;
  provider?: string;
  system?: string;
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
}

// ============================================================================
// Configuration
// ============================================================================

export interface Config {
  drupal: {
    base_url: string;
    username: string;
    password: string;
    graphql_path: string;
    timeout_ms: number;
  };
  ai: {
    default_provider: string;
    anthropic_api_key: string;
    openai_api_key: string;
    ollama_base_url: string;
    models: Record<AiProvider, string>;
    timeout_ms: number;
    classify_fallback: boolean;
    classify_timeout_ms: number;
  };
  tools: {
    drush: string;
    ddev: string;
    lando: string;
    composer: string;
    drush_root: string;
  };
  sites: {
    root: string;
    drupal_version: string;
    admin_user: string;
    admin_pass: string;
  };
  shell: {
    timeout_ms: number;
    max_output_chars: number;
  };
}
