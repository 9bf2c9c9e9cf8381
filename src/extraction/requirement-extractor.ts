/**
 * Requirement Extractor for Policy Compiler
 *
 * Splits raw policy text into atomic, testable requirement statements.
 *
 * Sentences introduced by example markers ("for example", "such as",
 * "e.g.") are discarded, and example clauses inside an obligation are cut
 * out before the statement is normalized, so illustrative text never becomes
 * or leaks into a requirement. Compound obligations may be split into one
 * requirement per coordinated verb phrase or object.
 */

import actionVerbList from './action-verbs.json';
import { shortId } from '../core/identity/fingerprint.js';
import { ExtractionEmptyError } from '../core/errors.js';
import type { Logger } from '../core/logging/logger.js';
import { silentLogger } from '../core/logging/logger.js';
import {
  ABBREVIATION_RE,
  BULLET_RE,
  CLAUSE_END_RE,
  EXAMPLE_MARKER_RE,
  LEADING_EXAMPLE_RE,
  OBJECT_PREPOSITION_RE,
  OBLIGATION_RE,
  PRONOUNS,
} from './markers.js';

/**
 * Offsets of a sentence in the source text
 */
export interface TextSpan {
  readonly start: number;
  readonly end: number;
  readonly text: string;
}

/**
 * An atomic obligation extracted from a document
 */
export interface Requirement {
  /** Fingerprint of the normalized statement */
  readonly id: string;
  /** The sentence the requirement came from */
  readonly rawSpan: TextSpan;
  /** Normalized requirement text */
  readonly statement: string;
  /** Whether an example clause was removed from the sentence */
  readonly exampleExcluded: boolean;
  /** The removed example text */
  readonly excludedExamples: readonly string[];
  /** Position of the source sentence in the document */
  readonly sentenceIndex: number;
}

export const DiscardReason = {
  /** Sentence introduced by an example marker */
  EXAMPLE: 'example',
  /** Sentence carries no obligation */
  NON_OBLIGATION: 'non-obligation',
  /** Statement already extracted earlier in the document */
  DUPLICATE: 'duplicate',
} as const;

export type DiscardReasonValue = (typeof DiscardReason)[keyof typeof DiscardReason];

export interface DiscardedSentence {
  readonly span: TextSpan;
  readonly reason: DiscardReasonValue;
}

export interface ExtractionResult {
  readonly requirements: readonly Requirement[];
  readonly discarded: readonly DiscardedSentence[];
}

export interface ExtractionOptions {
  /** Split compound obligations (default: true) */
  readonly splitCompound?: boolean;
  /** Verbs that may open a coordinated verb phrase */
  readonly actionVerbs?: ReadonlySet<string>;
  readonly logger?: Logger;
}

export const DEFAULT_ACTION_VERBS: ReadonlySet<string> = new Set<string>(actionVerbList);

/**
 * Split text into sentences, keeping source offsets
 */
export function splitSentences(text: string): TextSpan[] {
  const spans: TextSpan[] = [];
  let start = 0;

  const push = (from: number, to: number): void => {
    let raw = text.slice(from, to);
    let offset = from;

    const leading = raw.length - raw.trimStart().length;
    raw = raw.trim();
    offset += leading;

    const bullet = BULLET_RE.exec(raw);
    if (bullet) {
      offset += bullet[0].length;
      raw = raw.slice(bullet[0].length).trimEnd();
    }

    if (raw.length > 0) {
      spans.push({ start: offset, end: offset + raw.length, text: raw });
    }
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (ch === '\n') {
      const rest = text.slice(i + 1);
      if (/^[ \t]*(?:\r?\n|$)/.test(rest) || BULLET_RE.test(rest)) {
        push(start, i);
        start = i + 1;
      }
      continue;
    }

    if (ch === '.' || ch === '!' || ch === '?' || ch === ';') {
      const next = text[i + 1];
      if (next !== undefined && !/\s/.test(next)) {
        continue;
      }
      if (ch === '.' && ABBREVIATION_RE.test(text.slice(Math.max(0, i - 5), i + 1))) {
        continue;
      }
      push(start, i + 1);
      start = i + 1;
    }
  }

  push(start, text.length);
  return spans;
}

/**
 * Collapse whitespace, capitalize, and end with a single period
 */
export function normalizeStatement(text: string): string {
  const collapsed = text
    .replace(/\s+/g, ' ')
    .replace(/\s+([,;:.])/g, '$1')
    .trim()
    .replace(/[\s.;:!?,]+$/, '');

  if (collapsed.length === 0) {
    return '';
  }

  return collapsed.charAt(0).toUpperCase() + collapsed.slice(1) + '.';
}

function wordsOf(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9'-]+/)
    .filter((w) => w.length > 0);
}

function hasPronoun(text: string): boolean {
  return wordsOf(text).some((w) => PRONOUNS.has(w));
}

/**
 * Split "A, B, and C" / "A and B" / "A or B" into parts.
 * Returns null when there is no single, unambiguous top-level coordination.
 */
export function splitCoordination(text: string): string[] | null {
  if (text.includes('(') || text.includes(')')) {
    return null;
  }

  const separator = /\s*,\s*(?:and|or)\s+|\s*,\s*|\s+(?:and|or)\s+/gi;
  const separators = Array.from(text.matchAll(separator), (m) => m[0]);
  if (separators.length === 0) {
    return null;
  }

  const isConjunction = (sep: string): boolean => /\b(?:and|or)\b/i.test(sep);
  const last = separators[separators.length - 1];
  if (last === undefined || !isConjunction(last)) {
    return null;
  }
  if (separators.slice(0, -1).some(isConjunction)) {
    return null;
  }

  const parts = text.split(separator).map((p) => p.trim());
  if (parts.some((p) => p.length === 0)) {
    return null;
  }

  return parts;
}

/**
 * Requirement Extractor
 */
export class RequirementExtractor {
  private readonly splitCompound: boolean;
  private readonly actionVerbs: ReadonlySet<string>;
  private readonly logger: Logger;

  constructor(options: ExtractionOptions = {}) {
    this.splitCompound = options.splitCompound ?? true;
    this.actionVerbs = options.actionVerbs ?? DEFAULT_ACTION_VERBS;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Extract requirements from raw document text.
   *
   * @throws ExtractionEmptyError when the document yields no requirement
   */
  extract(text: string): ExtractionResult {
    const sentences = splitSentences(text);
    const requirements: Requirement[] = [];
    const discarded: DiscardedSentence[] = [];
    const seen = new Set<string>();

    sentences.forEach((span, sentenceIndex) => {
      if (LEADING_EXAMPLE_RE.test(span.text)) {
        discarded.push({ span, reason: DiscardReason.EXAMPLE });
        return;
      }

      const { kept, removed } = this.stripExamples(span.text);
      if (!OBLIGATION_RE.test(kept)) {
        discarded.push({ span, reason: DiscardReason.NON_OBLIGATION });
        return;
      }

      const body = kept.replace(/\s+/g, ' ').trim().replace(/[\s.;:!?,]+$/, '');
      const statements = this.splitCompound ? this.splitObligation(body) : [body];

      for (const candidate of statements) {
        const statement = normalizeStatement(candidate);
        if (statement.length === 0) {
          continue;
        }
        if (seen.has(statement)) {
          discarded.push({ span, reason: DiscardReason.DUPLICATE });
          continue;
        }
        seen.add(statement);
        requirements.push({
          id: shortId(statement),
          rawSpan: span,
          statement,
          exampleExcluded: removed.length > 0,
          excludedExamples: removed,
          sentenceIndex,
        });
      }
    });

    this.logger.debug('extraction complete', {
      sentences: sentences.length,
      requirements: requirements.length,
      discarded: discarded.length,
    });

    if (requirements.length === 0) {
      throw new ExtractionEmptyError({ sentences: sentences.length, discarded: discarded.length });
    }

    return { requirements, discarded };
  }

  /**
   * Remove example clauses from a sentence
   */
  private stripExamples(sentence: string): { kept: string; removed: string[] } {
    const removed: string[] = [];

    let kept = sentence.replace(/\s*\(([^()]*)\)/g, (match: string, inner: string) => {
      if (EXAMPLE_MARKER_RE.test(inner)) {
        removed.push(match.trim());
        return '';
      }
      return match;
    });

    const marker = EXAMPLE_MARKER_RE.exec(kept);
    if (marker) {
      const prefix = kept.slice(0, marker.index);
      const lead = /[\s,;:–—-]*$/.exec(prefix);
      const cut = lead ? marker.index - lead[0].length : marker.index;
      const after = kept.slice(marker.index + marker[0].length);
      const close = CLAUSE_END_RE.exec(after);
      const rest = close ? after.slice(close.index + close[0].length) : '';

      if (close && OBLIGATION_RE.test(rest)) {
        // "X, such as Y, must Z": only the inserted clause goes
        removed.push((marker[0] + after.slice(0, close.index)).trim());
        kept = `${kept.slice(0, cut)} ${rest}`;
      } else {
        const tail = kept.slice(cut).replace(/^[\s,;:–—-]+/, '').trim();
        if (tail.length > 0) {
          removed.push(tail);
        }
        kept = kept.slice(0, cut);
      }
    }

    return { kept, removed };
  }

  /**
   * Split a compound obligation into independently verifiable statements
   */
  private splitObligation(body: string): string[] {
    const modal = OBLIGATION_RE.exec(body);
    if (!modal) {
      return [body];
    }

    const subject = body.slice(0, modal.index).trim();
    const predicate = body.slice(modal.index + modal[0].length).trim();
    const compose = (rest: string): string => [subject, modal[0], rest].filter(Boolean).join(' ');

    const verbPhrases = splitCoordination(predicate);
    if (
      verbPhrases &&
      verbPhrases.every((phrase) => this.startsWithActionVerb(phrase) && wordsOf(phrase).length >= 2) &&
      verbPhrases.slice(1).every((phrase) => !hasPronoun(phrase))
    ) {
      return verbPhrases.map(compose);
    }

    const prepositions = Array.from(predicate.matchAll(OBJECT_PREPOSITION_RE)).reverse();
    for (const prep of prepositions) {
      const prepEnd = (prep.index ?? 0) + prep[0].length;
      const objects = splitCoordination(predicate.slice(prepEnd));
      if (!objects) {
        continue;
      }

      const wellFormed = objects.every((object) => {
        const count = wordsOf(object).length;
        return (
          count >= 1 &&
          count <= 6 &&
          !hasPronoun(object) &&
          !OBLIGATION_RE.test(object) &&
          !this.startsWithActionVerb(object)
        );
      });

      if (wellFormed) {
        const prefix = predicate.slice(0, prepEnd);
        return objects.map((object) => compose(prefix + object));
      }
    }

    return [body];
  }

  private startsWithActionVerb(phrase: string): boolean {
    const first = wordsOf(phrase)[0];
    return first !== undefined && this.actionVerbs.has(first);
  }
}

/**
 * Create a requirement extractor
 */
export function createRequirementExtractor(options?: ExtractionOptions): RequirementExtractor {
  return new RequirementExtractor(options);
}

/**
 * Extract requirements with a one-off extractor
 */
export function extractRequirements(text: string, options?: ExtractionOptions): ExtractionResult {
  return new RequirementExtractor(options).extract(text);
}
