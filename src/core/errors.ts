/**
 * Error taxonomy for Policy Compiler
 *
 * Fatal conditions are thrown as PolicyCompilerError subclasses carrying a
 * stable `code`. Partial-result conditions (schema resolution failures,
 * traversal truncation) are not errors; see TraversalWarning in graph/types.
 */

export const ErrorCode = {
  /** No requirements could be extracted from a document */
  EXTRACTION_EMPTY: 'EXTRACTION_EMPTY',
  /** Two sibling controls received the same alias or label */
  ALIAS_COLLISION: 'ALIAS_COLLISION',
  /** A persisted Assessment document is malformed */
  INVALID_DOCUMENT: 'INVALID_DOCUMENT',
  /** A query referenced a field absent from every resolved schema */
  UNDEFINED_FIELD_REFERENCE: 'UNDEFINED_FIELD_REFERENCE',
  /** Synthesis had no evidence schemas to work from */
  NO_EVIDENCE: 'NO_EVIDENCE',
  /** The summary query needs a compliance check */
  MISSING_COMPLIANCE_CHECK: 'MISSING_COMPLIANCE_CHECK',
  /** Invalid caller input */
  INVALID_INPUT: 'INVALID_INPUT',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

export class PolicyCompilerError extends Error {
  readonly code: ErrorCodeValue;
  readonly details: Record<string, unknown>;

  constructor(code: ErrorCodeValue, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = 'PolicyCompilerError';
    this.code = code;
    this.details = details;
  }
}

export class ExtractionEmptyError extends PolicyCompilerError {
  constructor(details: Record<string, unknown> = {}) {
    super(ErrorCode.EXTRACTION_EMPTY, 'No requirements found in document', details);
    this.name = 'ExtractionEmptyError';
  }
}

export class AliasCollisionError extends PolicyCompilerError {
  readonly alias: string;

  constructor(alias: string, message: string, details: Record<string, unknown> = {}) {
    super(ErrorCode.ALIAS_COLLISION, message, { alias, ...details });
    this.name = 'AliasCollisionError';
    this.alias = alias;
  }
}

export class AssessmentDocumentError extends PolicyCompilerError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(ErrorCode.INVALID_DOCUMENT, `Invalid assessment document: ${issues.join('; ')}`, {
      issues,
    });
    this.name = 'AssessmentDocumentError';
    this.issues = issues;
  }
}

export class SqlSynthesisError extends PolicyCompilerError {
  constructor(code: ErrorCodeValue, message: string, details: Record<string, unknown> = {}) {
    super(code, message, details);
    this.name = 'SqlSynthesisError';
  }
}

export class UndefinedFieldReferenceError extends SqlSynthesisError {
  readonly field: string;

  constructor(field: string, message: string, details: Record<string, unknown> = {}) {
    super(ErrorCode.UNDEFINED_FIELD_REFERENCE, message, { field, ...details });
    this.name = 'UndefinedFieldReferenceError';
    this.field = field;
  }
}

function safeJson(value: unknown): string {
  const seen = new WeakSet<object>();
  try {
    const text = JSON.stringify(value, (_key, v: unknown) => {
      if (!v || typeof v !== 'object') return v;
      if (seen.has(v)) return '[circular]';
      seen.add(v);
      return v;
    });
    return text ?? String(value);
  } catch {
    return String(value);
  }
}

/**
 * Render any thrown value as a one-line message
 */
export function formatError(err: unknown): string {
  if (typeof err === 'string') {
    const s = err.trim();
    return s.length > 0 ? s : 'unknown_error';
  }

  if (err instanceof PolicyCompilerError) {
    return `${err.code}: ${err.message}`;
  }

  if (err instanceof Error) {
    const msg = err.message.trim();
    return msg.length > 0 ? msg : err.name || 'unknown_error';
  }

  if (err && typeof err === 'object') {
    return safeJson(err);
  }

  return String(err);
}
