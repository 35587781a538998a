/**
 * Intent Classifier
 *
 * Last resort for commands no pattern understood: ask a model to map the
 * text onto one of the known operations. Any answer that is not valid JSON
 * naming a known operation counts as "no match".
 */

import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { isOperationId, type OperationId, type ParamValue } from '../types/index.js';
import type { TextGenerator } from '../services/ai.js';

export interface ClassifiedIntent {
  operation: OperationId;
  parameters: Record<string, ParamValue>;
}

export interface IntentClassifier {
  isAvailable(): boolean;
  /** Resolves null when the text could not be classified */
  classify(text: string, signal?: AbortSignal): Promise<ClassifiedIntent | null>;
}

// ==========================================
// CLASSIFICATION PROMPT
// ==========================================

const CLASSIFICATION_PROMPT = `Map this Drupal operator command to one operation. Return valid JSON only.

COMMAND: "{input}"

OPERATIONS (parameters):
- create-post (title | topic, body, ai_provider, content_type, tags)
- edit-node (node_id, title | body)
- delete-node (node_id)
- upload-media (file_path, alt_text, title)
- run-drush (command, module, args, site)
- query-latest (count, content_type)
- query-search (term, count)
- query-tagged (tags, count)
- query-users (role, count)
- create-site (site, platform: ddev | lando)
- start-site (site)
- stop-site (site)
- restart-site (site)
- status-site (site)
- unknown (when nothing fits)

RULES:
- Parameter names are snake_case exactly as listed
- node_id and count are numbers; tags and args are arrays of strings
- Leave out parameters the command does not mention

RESPOND WITH JSON ONLY:
{"operation":"","parameters":{}}`;

const ParamValueSchema = z.union([z.string(), z.number(), z.boolean(), z.array(z.string())]);

const ClassificationSchema = z.object({
  operation: z.string(),
  parameters: z.record(ParamValueSchema).default({}),
});

/**
 * Parse a model answer. Tolerates prose around the JSON object.
 */
export function parseClassification(text: string): ClassifiedIntent | null {
  const jsonMatch = text.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    logger.debug('[classifier] Non-JSON response', { text: text.slice(0, 200) });
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(jsonMatch[0]);
  } catch (error) {
    logger.debug('[classifier] Malformed JSON', { error: String(error) });
    return null;
  }

  const parsed = ClassificationSchema.safeParse(json);
  if (!parsed.success) {
    logger.debug('[classifier] Unexpected shape', { issues: parsed.error.issues.length });
    return null;
  }

  const { operation, parameters } = parsed.data;
  if (!isOperationId(operation)) {
    logger.debug('[classifier] Unknown operation', { operation });
    return null;
  }
  return { operation, parameters };
}

export class AiIntentClassifier implements IntentClassifier {
  constructor(
    private readonly generator: TextGenerator,
    private readonly enabled: boolean = true
  ) {}

  isAvailable(): boolean {
    return this.enabled && this.generator.isConfigured();
  }

  async classify(text: string, signal?: AbortSignal): Promise<ClassifiedIntent | null> {
    const prompt = CLASSIFICATION_PROMPT.replace('{input}', text.replace(/"/g, '\\"'));
    const result = await this.generator.generate({
      prompt,
      system: 'You classify commands. Output JSON only.',
      maxTokens: 200,
      temperature: 0,
      signal,
    });

    if (!result.success) {
      logger.debug('[classifier] Provider failed', { reason: result.reason });
      return null;
    }
    return parseClassification(result.text);
  }
}
