/**
 * Rule-based context selection.
 *
 * Maps a free-text query to a bounded subset of the corpus: keyword rules
 * pick section labels, matching sections are concatenated under a character
 * budget, and a raw-prefix tier guarantees non-empty output for any
 * non-empty corpus. Pure function of (corpus, query, maxChars, topic map).
 */

import type { Corpus, Section, TopicMap } from '../corpus/types.js';
import { getSection } from '../corpus/corpus-parser.js';
import { getTopicMap } from '../corpus/topic-map.js';

/** Smallest leftover budget worth filling with a truncated section. */
export const MIN_PARTIAL_CHARS = 500;

/** Appended to a section cut short by the budget. */
export const TRUNCATION_MARKER = '\n...';

/** Placed between selected sections. */
export const SECTION_SEPARATOR = '\n\n';

/**
 * Which tier produced the context.
 * - 'sections': one or more labeled sections were selected
 * - 'raw-prefix': nothing matched; the first maxChars of the corpus were used
 */
export type SelectionTier = 'sections' | 'raw-prefix';

export interface ContextSelection {
  text: string;
  tier: SelectionTier;
  /** Labels found relevant for the query, in visiting order */
  relevantLabels: string[];
  /** Labels whose text made it into the output */
  includedLabels: string[];
  /** Whether the last included section was cut */
  truncated: boolean;
  /** True when no rule matched and the default labels were used */
  usedDefaults: boolean;
}

export interface SelectOptions {
  topicMap?: TopicMap;
  minPartialChars?: number;
}

/**
 * Ascending label order with numeric awareness ("SECTION 2" < "SECTION 10").
 */
export function compareLabels(a: string, b: string): number {
  return a.localeCompare(b, 'en', { numeric: true, sensitivity: 'base' });
}

/**
 * Labels whose keywords occur in the query, sorted and deduplicated.
 */
export function findRelevantLabels(
  query: string,
  topicMap: TopicMap = getTopicMap(),
): { labels: string[]; usedDefaults: boolean } {
  const normalized = query.toLowerCase();
  const matched = new Set<string>();

  for (const rule of topicMap.rules) {
    if (rule.keywords.some((kw) => normalized.includes(kw))) {
      matched.add(rule.section);
    }
  }

  const usedDefaults = matched.size === 0;
  const labels = usedDefaults ? new Set(topicMap.defaultSections) : matched;
  return { labels: [...labels].sort(compareLabels), usedDefaults };
}

/**
 * Select the context to ground an answer to `query`.
 */
export function selectContext(
  corpus: Corpus,
  query: string,
  maxChars: number,
  options: SelectOptions = {},
): ContextSelection {
  const minPartial = options.minPartialChars ?? MIN_PARTIAL_CHARS;
  const { labels, usedDefaults } = findRelevantLabels(query, options.topicMap);

  const sections = labels
    .map((label) => getSection(corpus, label))
    .filter((section): section is Section => section !== undefined);

  const pieces: string[] = [];
  const includedLabels: string[] = [];
  let total = 0;
  let truncated = false;

  for (const section of sections) {
    const separator = pieces.length > 0 ? SECTION_SEPARATOR.length : 0;
    const remaining = maxChars - total - separator;

    if (section.text.length <= remaining) {
      pieces.push(section.text);
      includedLabels.push(section.label);
      total += separator + section.text.length;
      continue;
    }

    if (remaining > minPartial) {
      pieces.push(section.text.slice(0, remaining) + TRUNCATION_MARKER);
      includedLabels.push(section.label);
      truncated = true;
    }
    break;
  }

  if (pieces.length === 0) {
    return {
      text: corpus.raw.slice(0, maxChars),
      tier: 'raw-prefix',
      relevantLabels: labels,
      includedLabels: [],
      truncated: corpus.raw.length > maxChars,
      usedDefaults,
    };
  }

  return {
    text: pieces.join(SECTION_SEPARATOR),
    tier: 'sections',
    relevantLabels: labels,
    includedLabels,
    truncated,
    usedDefaults,
  };
}
