/**
 * Pattern Table
 * Every phrasing the agent understands, as ordered (pattern, operation, roles)
 * rules. The first rule that matches and fills its required roles wins, so a
 * more specific rule must be declared before a looser one that also matches
 * the same text. Adding a phrasing = adding one object here.
 */

import type { OperationId, ParamValue } from '../types/index.js';
import type { ParameterRole } from './parameter-extractor.js';

export type RuleCategory = 'site' | 'content' | 'node' | 'media' | 'maintenance' | 'query';

export interface PatternRule {
  id: string;
  operation: OperationId;
  pattern: RegExp;
  roles: readonly ParameterRole[];
  /** Parameters implied by the phrasing itself (e.g. "run cron" -> cron:run) */
  fixed?: Readonly<Record<string, ParamValue>>;
  examples: readonly string[];
  category: RuleCategory;
}

// ============================================================================
// Vocabularies
// ============================================================================

export const CONTENT_TYPES: Record<string, string> = {
  article: 'article',
  articles: 'article',
  post: 'article',
  posts: 'article',
  blog: 'article',
  blogs: 'article',
  'blog post': 'article',
  'blog posts': 'article',
  node: 'article',
  nodes: 'article',
  content: 'article',
  page: 'page',
  pages: 'page',
  'basic page': 'page',
  'basic pages': 'page',
};

export const PLATFORM_NAMES: Record<string, string> = {
  ddev: 'ddev',
  lando: 'lando',
};

export const PROVIDER_NAMES: Record<string, string> = {
  anthropic: 'anthropic',
  claude: 'anthropic',
  openai: 'openai',
  gpt: 'openai',
  chatgpt: 'openai',
  ollama: 'ollama',
  llama: 'ollama',
};

// ============================================================================
// Shared fragments
// ============================================================================

// At least one letter or digit: "__" or "---" is not a name
const NAME = String.raw`["']?[\w.-]*[a-z0-9][\w.-]*["']?`;
// Node ids and counts start at 1
const POSITIVE = String.raw`[1-9]\d*`;
const SITE = String.raw`(?<site>${NAME})`;
const SITE_WORD = String.raw`(?:site\s+|project\s+)?`;
const SITE_TAIL = String.raw`(?:\s+(?:site|project))?\s*[.!?]?$`;
const ON_SITE = String.raw`(?:\s+(?:on|for|in)\s+(?:the\s+)?${SITE_WORD}${SITE}(?:\s+(?:site|project))?)?\s*[.!]?$`;
// Any run of text that does not cross the word "about"
const BEFORE_ABOUT = String.raw`(?:(?!\babout\b).)*?`;
const CREATE_VERB = String.raw`^(?:please\s+)?(?:create|write|add|publish|draft)\b`;

function rx(source: string): RegExp {
  return new RegExp(source, 'i');
}

const siteRole: ParameterRole = { name: 'site', kind: 'identifier', required: true };
const optionalSiteRole: ParameterRole = { name: 'site', kind: 'identifier' };
const contentTypeRole: ParameterRole = {
  name: 'content_type', slot: 'contentType', kind: 'enum', vocabulary: CONTENT_TYPES, default: 'article',
};
const countRole: ParameterRole = { name: 'count', kind: 'integer', default: 10 };
const providerRole: ParameterRole = {
  name: 'ai_provider', slot: 'provider', kind: 'enum', vocabulary: PROVIDER_NAMES,
};
const platformRole: ParameterRole = {
  name: 'platform', kind: 'enum', vocabulary: PLATFORM_NAMES, default: 'ddev',
};

const RULES: PatternRule[] = [
  // --- RAW DRUSH (before status rules: "drush status" is not a site) ---
  {
    id: 'drush.custom',
    operation: 'run-drush',
    pattern: rx(String.raw`^drush\s+(?<command>[\w:.-]+)(?:\s+(?<args>.+))?$`),
    roles: [
      { name: 'command', kind: 'identifier', required: true },
      { name: 'args', kind: 'args' },
    ],
    examples: ['drush status', 'drush pm:list --type=module'],
    category: 'maintenance',
  },
  // --- SITE CREATION ---
  {
    id: 'site.create.platform_first',
    operation: 'create-site',
    pattern: rx(String.raw`^(?:please\s+)?(?:create|set\s*up|make|spin\s+up|build)\b.*?\b(?<platform>ddev|lando)\b.*?\b(?:named|called)\s+${SITE}`),
    roles: [siteRole, platformRole],
    examples: ['create a new ddev site named test-site', 'set up a lando site called "shop"'],
    category: 'site',
  },
  {
    id: 'site.create',
    operation: 'create-site',
    pattern: rx(String.raw`^(?:please\s+)?(?:create|set\s*up|make|spin\s+up|build)\b.*?\bsite\b.*?\b(?:named|called)\s+${SITE}(?:.*?\b(?<platform>ddev|lando)\b)?`),
    roles: [siteRole, platformRole],
    examples: ['create site named mysite', 'create a site called my-blog using lando'],
    category: 'site',
  },

  // --- SITE LIFECYCLE ---
  {
    id: 'site.restart',
    operation: 'restart-site',
    pattern: rx(String.raw`^restart\s+(?:the\s+)?${SITE_WORD}${SITE}${SITE_TAIL}`),
    roles: [siteRole],
    examples: ['restart my-blog', 'restart site my-blog', 'restart the shop site'],
    category: 'site',
  },
  {
    id: 'site.restart.loose',
    operation: 'restart-site',
    pattern: rx(String.raw`^restart\b.*?\b(?:site|project)\s+${SITE}`),
    roles: [siteRole],
    examples: ['restart the local drupal site my-blog please'],
    category: 'site',
  },
  {
    id: 'site.start',
    operation: 'start-site',
    pattern: rx(String.raw`^(?:start|boot|launch)\s+(?:up\s+)?(?:the\s+)?${SITE_WORD}${SITE}${SITE_TAIL}`),
    roles: [siteRole],
    examples: ['start my-blog', 'start site my-blog', 'start the project shop'],
    category: 'site',
  },
  {
    id: 'site.start.loose',
    operation: 'start-site',
    pattern: rx(String.raw`^(?:start|boot|launch)\b.*?\b(?:site|project)\s+${SITE}`),
    roles: [siteRole],
    examples: ['start up my local site my-blog'],
    category: 'site',
  },
  {
    id: 'site.stop',
    operation: 'stop-site',
    pattern: rx(String.raw`^(?:stop|halt|shut\s+down)\s+(?:the\s+)?${SITE_WORD}${SITE}${SITE_TAIL}`),
    roles: [siteRole],
    examples: ['stop my-blog', 'stop site my-blog', 'shut down the shop site'],
    category: 'site',
  },
  {
    id: 'site.stop.loose',
    operation: 'stop-site',
    pattern: rx(String.raw`^(?:stop|halt|shut\s+down)\b.*?\b(?:site|project)\s+${SITE}`),
    roles: [siteRole],
    examples: ['stop the running site my-blog'],
    category: 'site',
  },
  {
    id: 'site.status',
    operation: 'status-site',
    pattern: rx(String.raw`^(?:show\s+|get\s+|check\s+)?(?:the\s+)?status\s+(?:of|for)\s+(?:the\s+)?${SITE_WORD}${SITE}${SITE_TAIL}`),
    roles: [siteRole],
    examples: ['status of site my-blog', 'status for my-blog', 'check the status of the site shop'],
    category: 'site',
  },
  {
    id: 'site.status.bare',
    operation: 'status-site',
    pattern: rx(String.raw`^status\s+${SITE_WORD}${SITE}${SITE_TAIL}`),
    roles: [siteRole],
    examples: ['status my-blog', 'status site shop'],
    category: 'site',
  },
  {
    id: 'site.status.suffix',
    operation: 'status-site',
    pattern: rx(String.raw`^(?:(?:site|project)\s+)?${SITE}\s+status\s*[.?]?$`),
    roles: [siteRole],
    examples: ['my-blog status', 'site shop status'],
    category: 'site',
  },
  {
    id: 'site.status.question',
    operation: 'status-site',
    pattern: rx(String.raw`^(?:is|are)\s+(?:the\s+)?${SITE_WORD}${SITE}(?:\s+(?:site|project))?\s+(?:running|up|started|stopped|down)\s*\??$`),
    roles: [siteRole],
    examples: ['is my-blog running?', 'is the shop site up'],
    category: 'site',
  },
  // --- CONTENT CREATION ---
  {
    id: 'content.create.titled',
    operation: 'create-post',
    pattern: rx(String.raw`${CREATE_VERB}.*?\b(?<contentType>post|article|blog|page)s?\b${BEFORE_ABOUT}\b(?:titled|called|named|title(?=\s+["']))\s+(?<title>"[^"]+"|'[^']+'|.+?)(?:\s+about\s+(?<topic>.+))?$`),
    roles: [
      { name: 'title', kind: 'quoted', required: true },
      { name: 'topic', kind: 'free' },
      contentTypeRole,
    ],
    examples: ['create a blog post titled "Welcome to Drupal"', "write an article titled 'Release notes' about the 10.3 release"],
    category: 'content',
  },
  {
    id: 'content.generate',
    operation: 'create-post',
    pattern: rx(String.raw`^(?:please\s+)?(?:generate|write|create)\b.*?\b(?<contentType>content|article|post|blog|page)s?\b.*?\busing\s+(?<provider>[\w.-]+)\b.*?\babout\s+(?<topic>.+)$`),
    roles: [
      { name: 'topic', kind: 'free', required: true },
      providerRole,
      contentTypeRole,
    ],
    examples: ['generate an article using openai about headless CMS', 'create a blog post using ollama about Drupal 11'],
    category: 'content',
  },
  {
    id: 'content.create.topic',
    operation: 'create-post',
    pattern: rx(String.raw`${CREATE_VERB}.*?\b(?<contentType>post|article|blog|page)s?\b.*?\babout\s+(?<topic>.+?)(?:\s+using\s+(?<provider>[\w.-]+))?\s*[.!]?$`),
    roles: [
      { name: 'topic', kind: 'free', required: true },
      providerRole,
      contentTypeRole,
    ],
    examples: ['Create a blog post about AI in Drupal', 'write an article about site performance using anthropic'],
    category: 'content',
  },

  // --- NODES ---
  {
    id: 'node.edit.body',
    operation: 'edit-node',
    pattern: rx(String.raw`^(?:update|edit|change|set)\b.*?\bnode\s+#?(?<nodeId>${POSITIVE})\b.*?\bbody\b\s*(?:to\s+|with\s+|as\s+)?(?<body>.+)$`),
    roles: [
      { name: 'node_id', slot: 'nodeId', kind: 'integer', required: true },
      { name: 'body', kind: 'quoted', required: true },
    ],
    examples: ['update node 12 body to "Fresh copy"', "edit node 3 and change the body to 'Shorter intro'"],
    category: 'node',
  },
  {
    id: 'node.edit.title',
    operation: 'edit-node',
    pattern: rx(String.raw`^(?:edit|update|change|rename|set)\b.*?\b(?:title\s+of\s+node|node|title)\s+#?(?<nodeId>${POSITIVE})\b.*?\bto\s+(?<title>.+)$`),
    roles: [
      { name: 'node_id', slot: 'nodeId', kind: 'integer', required: true },
      { name: 'title', kind: 'quoted', required: true },
    ],
    examples: ['edit node 5 title to "New Title"', "change the title of node 42 to 'Launch recap'", 'rename node 9 to Spring sale'],
    category: 'node',
  },
  {
    id: 'node.delete',
    operation: 'delete-node',
    pattern: rx(String.raw`^(?:delete|remove|trash)\b.*?\bnode\s+#?(?<nodeId>${POSITIVE})\b`),
    roles: [{ name: 'node_id', slot: 'nodeId', kind: 'integer', required: true }],
    examples: ['delete node 42', 'remove node #7'],
    category: 'node',
  },

  // --- MEDIA ---
  {
    id: 'media.upload.alt',
    operation: 'upload-media',
    pattern: rx(String.raw`^upload\s+(?:the\s+)?(?:image\s+|file\s+)?(?<file>"[^"]+"|'[^']+'|\S+)\s+.*?\balt(?:\s+text)?\b\s*(?:of\s+|as\s+|to\s+|:\s*)?(?<alt>.+)$`),
    roles: [
      { name: 'file_path', slot: 'file', kind: 'quoted', required: true },
      { name: 'alt_text', slot: 'alt', kind: 'quoted', required: true },
    ],
    examples: ['upload ./images/hero.jpg with alt text "Mountain view"'],
    category: 'media',
  },
  {
    id: 'media.upload',
    operation: 'upload-media',
    pattern: rx(String.raw`^upload\s+(?:the\s+)?(?:image\s+|file\s+)?(?<file>"[^"]+"|'[^']+'|\S+)`),
    roles: [{ name: 'file_path', slot: 'file', kind: 'quoted', required: true }],
    examples: ['upload /tmp/logo.png', 'upload the image "team photo.jpg"'],
    category: 'media',
  },

  // --- MAINTENANCE (Drush) ---
  {
    id: 'drush.cache',
    operation: 'run-drush',
    pattern: rx(String.raw`^(?:clear|flush|purge|rebuild|refresh)\s+(?:the\s+|all\s+)?(?:drupal\s+)?caches?${ON_SITE}`),
    roles: [optionalSiteRole],
    fixed: { command: 'cache:rebuild' },
    examples: ['clear cache', 'clear all caches on my-blog', 'rebuild the cache'],
    category: 'maintenance',
  },
  {
    id: 'drush.cron',
    operation: 'run-drush',
    pattern: rx(String.raw`^run\s+(?:the\s+)?cron(?:\s+jobs?)?${ON_SITE}`),
    roles: [optionalSiteRole],
    fixed: { command: 'cron:run' },
    examples: ['run cron', 'run cron on shop'],
    category: 'maintenance',
  },
  {
    id: 'drush.updatedb',
    operation: 'run-drush',
    pattern: rx(String.raw`^(?:run\s+(?:the\s+)?(?:database|db)\s+updates?|update\s+(?:the\s+)?(?:database|db))${ON_SITE}`),
    roles: [optionalSiteRole],
    fixed: { command: 'updatedb' },
    examples: ['run database updates', 'update the database on my-blog'],
    category: 'maintenance',
  },
  {
    id: 'drush.config.import',
    operation: 'run-drush',
    pattern: rx(String.raw`^import\s+(?:the\s+)?(?:config|configuration)${ON_SITE}`),
    roles: [optionalSiteRole],
    fixed: { command: 'config:import' },
    examples: ['import config', 'import the configuration on shop'],
    category: 'maintenance',
  },
  {
    id: 'drush.config.export',
    operation: 'run-drush',
    pattern: rx(String.raw`^export\s+(?:the\s+)?(?:config|configuration)${ON_SITE}`),
    roles: [optionalSiteRole],
    fixed: { command: 'config:export' },
    examples: ['export config', 'export the configuration for my-blog'],
    category: 'maintenance',
  },
  {
    id: 'drush.module.enable',
    operation: 'run-drush',
    pattern: rx(String.raw`^(?:enable|install)\s+(?:the\s+)?(?:module\s+)?(?<module>[a-z]\w*)(?:\s+module)?${ON_SITE}`),
    roles: [{ name: 'module', kind: 'identifier', required: true }, optionalSiteRole],
    fixed: { command: 'pm:enable' },
    examples: ['enable module pathauto', 'enable the token module on my-blog'],
    category: 'maintenance',
  },
  {
    id: 'drush.module.uninstall',
    operation: 'run-drush',
    pattern: rx(String.raw`^(?:disable|uninstall)\s+(?:the\s+)?(?:module\s+)?(?<module>[a-z]\w*)(?:\s+module)?${ON_SITE}`),
    roles: [{ name: 'module', kind: 'identifier', required: true }, optionalSiteRole],
    fixed: { command: 'pm:uninstall' },
    examples: ['disable module devel', 'uninstall the ban module on shop'],
    category: 'maintenance',
  },

  // --- QUERIES (GraphQL) ---
  {
    id: 'query.users',
    operation: 'query-users',
    pattern: rx(String.raw`^(?:get|show|list|find|fetch)\b.*?\b(?:(?<count>${POSITIVE})\s+)?users?\b.*?\b(?:with\s+(?:the\s+)?)?role\s+(?:of\s+)?(?<role>["']?[\w-]+["']?)`),
    roles: [{ name: 'role', kind: 'identifier', required: true }, countRole],
    examples: ['get all users with role editor', 'show 5 users with the role "administrator"'],
    category: 'query',
  },
  {
    id: 'query.tagged',
    operation: 'query-tagged',
    pattern: rx(String.raw`^(?:get|find|show|list|fetch)\b.*?\b(?<contentType>nodes?|posts?|articles?|pages?|content)\b.*?\btagged\s+(?:with\s+)?(?<tags>.+?)\s*[.!?]?$`),
    roles: [{ name: 'tags', kind: 'list', required: true }, contentTypeRole, countRole],
    examples: ['get nodes tagged "drupal, php"', 'find articles tagged with news and events'],
    category: 'query',
  },
  {
    id: 'query.search.containing',
    operation: 'query-search',
    pattern: rx(String.raw`^(?:fetch|find|get|show|search)\b.*?\bcontaining\s+(?:the\s+)?(?:(?:word|phrase|term|text)\s+)?(?<term>.+?)\s*[.!?]?$`),
    roles: [{ name: 'term', kind: 'quoted', required: true }, countRole],
    examples: ['fetch article bodies containing the word "migration"'],
    category: 'query',
  },
  {
    id: 'query.search',
    operation: 'query-search',
    pattern: rx(String.raw`^(?:find|search|look\s+up|show|get)\b.*?\b(?<contentType>posts?|articles?|nodes?|pages?|content)\b.*?\babout\s+(?<term>.+?)\s*[.!?]?$`),
    roles: [{ name: 'term', kind: 'free', required: true }, contentTypeRole, countRole],
    examples: ['find posts about headless Drupal', 'search for content about accessibility'],
    category: 'query',
  },
  {
    id: 'query.type',
    operation: 'query-latest',
    pattern: rx(String.raw`^(?:query|list|show|get|fetch)\b.*?\bnodes?\b.*?\b(?:of\s+)?(?:type|content[\s_]type)\s+(?<contentType>["']?[\w-]+["']?)`),
    roles: [{ ...contentTypeRole, required: true }, countRole],
    examples: ['query nodes of type page', 'list nodes with content type "event"'],
    category: 'query',
  },
  {
    id: 'query.latest',
    operation: 'query-latest',
    pattern: rx(String.raw`^(?:get|show|list|fetch|display|find)\b.*?\b(?:latest|recent|newest|last)\s+(?:(?<count>${POSITIVE})\s+)?(?<contentType>blog\s+posts?|[a-z_]+)\b`),
    roles: [countRole, contentTypeRole],
    examples: ['get the latest 5 articles', 'show titles of the latest 3 blog posts', 'list recent pages'],
    category: 'query',
  },

  // Unanchored, so it goes last
  {
    id: 'site.status.question_long',
    operation: 'status-site',
    pattern: rx(String.raw`\bstatus\s+(?:of|for)\s+(?:the\s+)?${SITE_WORD}${SITE}`),
    roles: [siteRole],
    examples: ["what's the status of my-blog right now"],
    category: 'site',
  },
];

export const PATTERN_TABLE: readonly PatternRule[] = Object.freeze(RULES.map((rule) => Object.freeze(rule)));

/**
 * A handful of phrasings to suggest when nothing matched: the first example
 * of the first rule in each category.
 */
export function sampleCommands(table: readonly PatternRule[] = PATTERN_TABLE): string[] {
  const seen = new Set<RuleCategory>();
  const samples: string[] = [];
  for (const rule of table) {
    if (seen.has(rule.category) || rule.examples.length === 0) continue;
    seen.add(rule.category);
    samples.push(`Try: '${rule.examples[0]}'`);
  }
  return samples;
}
