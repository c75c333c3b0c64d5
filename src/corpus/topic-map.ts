/**
 * Static keyword → section mapping, read from data/topics.json.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { TopicMap } from './types.js';

const TOPICS_PATH = fileURLToPath(new URL('../../data/topics.json', import.meta.url));

const TopicMapSchema = z.object({
  defaultSections: z.array(z.string()).min(1),
  rules: z.array(
    z.object({
      topic: z.string(),
      section: z.string(),
      keywords: z.array(z.string().min(1)).min(1),
    }),
  ),
});

let cached: TopicMap | null = null;

/**
 * Parse and validate a topic map. Keywords are lowercased so that matching
 * against a lowercased query is a plain substring test.
 */
export function parseTopicMap(input: unknown): TopicMap {
  const parsed = TopicMapSchema.parse(input);
  return {
    defaultSections: parsed.defaultSections,
    rules: parsed.rules.map((rule) => ({
      ...rule,
      keywords: rule.keywords.map((kw) => kw.toLowerCase()),
    })),
  };
}

/**
 * The bundled topic map (loaded once).
 */
export function getTopicMap(): TopicMap {
  if (!cached) {
    cached = parseTopicMap(JSON.parse(readFileSync(TOPICS_PATH, 'utf-8')));
  }
  return cached;
}
