/**
 * Lexical markers used by the requirement extractor.
 */

/**
 * Phrases that introduce illustrative examples rather than obligations.
 * Matched case-insensitively on word boundaries.
 */
export const EXAMPLE_MARKERS: readonly string[] = [
  'for example',
  'for instance',
  'such as',
  'e.g.',
  'examples include',
  'example:',
  'as an example',
  'including but not limited to',
];

function markerPattern(marker: string): string {
  const escaped = marker.replace(/[.*+?^${}()|[\]\\]/g, '\\$&').replace(/ /g, '\\s+');
  return /\w$/.test(marker) ? `\\b${escaped}\\b` : `\\b${escaped}`;
}

const EXAMPLE_MARKER_SOURCE = `(?:${EXAMPLE_MARKERS.map(markerPattern).join('|')})`;

/** First example marker anywhere in a string */
export const EXAMPLE_MARKER_RE = new RegExp(EXAMPLE_MARKER_SOURCE, 'i');

/** A sentence that opens with an example marker */
export const LEADING_EXAMPLE_RE = new RegExp(`^[^a-z0-9]*${EXAMPLE_MARKER_SOURCE}`, 'i');

/**
 * Obligation modals. The first match splits a sentence into subject and predicate.
 */
export const OBLIGATION_RE =
  /\b(?:must|shall|should|(?:is|are) required to|will ensure|needs? to|ha(?:s|ve) to)\b/i;

/** Words that refer back to something outside their own clause */
export const PRONOUNS: ReadonlySet<string> = new Set([
  'it',
  'its',
  'they',
  'them',
  'their',
  'this',
  'that',
  'these',
  'those',
]);

/** Prepositions that may open a coordinated object phrase */
export const OBJECT_PREPOSITION_RE =
  /\b(?:for|to|on|across|within|in|of|from)\s+(?:(?:all|every|each|any)\s+)?/gi;

/** Where an inserted example clause ends: a comma or a spaced dash */
export const CLAUSE_END_RE = /\s*(?:,|\s[–—-]\s|[–—])\s*/;

/** Abbreviations whose trailing period does not end a sentence */
export const ABBREVIATION_RE = /(?:^|[^a-z])(?:e\.g|i\.e|etc|vs)\.$/i;

/** List item prefixes at the start of a line */
export const BULLET_RE = /^[ \t]*(?:[-*•]|\d+[.)]|\([a-z0-9]+\))(?:[ \t]+|$)/i;

export function containsExampleMarker(text: string): boolean {
  return EXAMPLE_MARKER_RE.test(text);
}
