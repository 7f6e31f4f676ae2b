/**
 * Structured Error System for ngsi-semantics
 *
 * Every failure carries a machine-readable code. Parse and post-processing
 * failures are wrapped into a single ParsingException by the configurator.
 */

/**
 * Error codes for vocabulary operations
 */
export type VocabularyErrorCode =
  | 'PARSE_ERROR'           // Malformed ontology content
  | 'CONFLICT_ERROR'        // Contradictory declarations for one IRI
  | 'PROCESSING_ERROR'      // Closure could not be computed
  | 'PARSING_FAILED'        // Merge protocol aborted (wraps a cause)
  | 'IO_ERROR'              // Ontology file unreadable
  | 'SOURCE_NOT_FOUND'      // No source of that name in the vocabulary
  | 'INVALID_SOURCE_NAME'   // Name not usable as a source key
  | 'ENTITY_NOT_FOUND'      // No entity with that IRI
  | 'INVALID_SETTING'       // Setting not applicable to the entity kind
  | 'INVALID_VOCABULARY';   // Deserialized data is not a vocabulary

export type ParseErrorKind = 'syntax' | 'conflict';

/**
 * Structured error with code, message and location
 */
export interface VocabularyError {
  code: VocabularyErrorCode;
  message: string;
  sourceName?: string;
  line?: number;
  details?: Record<string, unknown>;
}

/**
 * Exception class wrapping VocabularyError for throw/catch patterns
 */
export class VocabularyException extends Error {
  public readonly error: VocabularyError;

  constructor(error: VocabularyError, options?: { cause?: unknown }) {
    super(error.message, options);
    this.name = 'VocabularyException';
    this.error = error;

    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  get code(): VocabularyErrorCode {
    return this.error.code;
  }

  toJSON(): VocabularyError {
    return this.error;
  }
}

/**
 * Raised by the RDF parser for one source
 */
export class ParseError extends VocabularyException {
  public readonly kind: ParseErrorKind;

  constructor(kind: ParseErrorKind, error: VocabularyError, options?: { cause?: unknown }) {
    super(error, options);
    this.name = 'ParseError';
    this.kind = kind;
  }
}

/**
 * Raised by post-processing when a derived property cannot be computed
 */
export class ProcessingError extends VocabularyException {
  constructor(error: VocabularyError) {
    super(error);
    this.name = 'ProcessingError';
  }
}

/**
 * The one error a failed configurator call surfaces. The original
 * failure is available as `cause`.
 */
export class ParsingException extends VocabularyException {
  constructor(error: VocabularyError, cause: unknown) {
    super(error, { cause });
    this.name = 'ParsingException';
  }
}

/**
 * Create a syntax error for malformed source content
 */
export function createSyntaxError(
  sourceName: string,
  message: string,
  line?: number,
  cause?: unknown
): ParseError {
  const where = line !== undefined ? ` (line ${line})` : '';
  return new ParseError('syntax', {
    code: 'PARSE_ERROR',
    message: `Syntax error in source '${sourceName}'${where}: ${message}`,
    sourceName,
    line,
  }, { cause });
}

/**
 * Create a conflict error for an IRI declared with two different kinds
 */
export function createConflictError(
  sourceName: string,
  iri: string,
  existingKind: string,
  declaredKind: string
): ParseError {
  return new ParseError('conflict', {
    code: 'CONFLICT_ERROR',
    message: `Source '${sourceName}' declares <${iri}> as ${declaredKind}, but it is already a ${existingKind}`,
    sourceName,
    details: { iri, existingKind, declaredKind },
  });
}

/**
 * Create a post-processing error, e.g. for a cyclic hierarchy
 */
export function createProcessingError(
  message: string,
  details?: Record<string, unknown>
): ProcessingError {
  return new ProcessingError({
    code: 'PROCESSING_ERROR',
    message,
    details,
  });
}

/**
 * Wrap any failure of the merge protocol
 */
export function createParsingException(cause: unknown): ParsingException {
  const reason = cause instanceof Error ? cause.message : String(cause);
  const inner = cause instanceof VocabularyException ? cause.error : undefined;
  return new ParsingException({
    code: 'PARSING_FAILED',
    message: `Vocabulary could not be built: ${reason}`,
    sourceName: inner?.sourceName,
    line: inner?.line,
    details: inner ? { causeCode: inner.code } : undefined,
  }, cause);
}

/**
 * Create an error for an unreadable ontology file
 */
export function createIoError(path: string, cause: unknown): VocabularyException {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new VocabularyException({
    code: 'IO_ERROR',
    message: `Cannot read ontology file '${path}': ${reason}`,
    details: { path },
  }, { cause });
}

/**
 * Serialize a VocabularyError for JSON output
 */
export function serializeVocabularyError(error: VocabularyError): object {
  return {
    code: error.code,
    message: error.message,
    ...(error.sourceName !== undefined && { sourceName: error.sourceName }),
    ...(error.line !== undefined && { line: error.line }),
    ...(error.details && { details: error.details }),
  };
}

/**
 * Create a generic vocabulary exception.
 * Use this when no specific factory is available.
 */
export function createGenericError(
  code: VocabularyErrorCode,
  message: string,
  details?: Record<string, unknown>
): VocabularyException {
  return new VocabularyException({
    code,
    message,
    details,
  });
}
