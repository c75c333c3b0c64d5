/**
 * Core types for the sectioned knowledge base.
 *
 * The source is a UTF-8 text file partitioned by header lines such as
 * `SECTION 4: Stages` — every following line belongs to that section until
 * the next header.
 */

/** A labeled, contiguous span of corpus text. */
export interface Section {
  /** Lookup key, e.g. "SECTION 4" */
  label: string;
  /** The header line as written */
  header: string;
  /** Lines after the header, up to the next header */
  lines: string[];
  /** Header and body joined with newlines */
  text: string;
}

/** The parsed corpus. Immutable once built. */
export interface Corpus {
  /** Original text, used by the raw-prefix fallback */
  readonly raw: string;
  /** Sections in order of first appearance */
  readonly sections: readonly Section[];
  /** Lines before the first header (ignored by section lookup) */
  readonly preamble: readonly string[];
}

/** One keyword set and the section it points at. */
export interface TopicRule {
  topic: string;
  section: string;
  keywords: string[];
}

/** The static topic → section mapping. */
export interface TopicMap {
  rules: TopicRule[];
  /** Sections used when no rule matches a query */
  defaultSections: string[];
}
