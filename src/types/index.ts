/**
 * Shared type definitions for ngsi-semantics
 */

// Re-export error types
export {
    VocabularyException,
    ParseError,
    ProcessingError,
    ParsingException,
    createSyntaxError,
    createConflictError,
    createProcessingError,
    createParsingException,
    createIoError,
    createGenericError,
    serializeVocabularyError,
} from './errors.js';

export type {
    VocabularyErrorCode,
    ParseErrorKind,
    VocabularyError,
} from './errors.js';

// Re-export vocabulary model
export type {
    Source,
    EntityKind,
    DataFieldType,
    EntitySettings,
    DataPropertySettings,
    VocabularyClass,
    PropertyCharacteristic,
    ObjectProperty,
    DataProperty,
    Individual,
    VocabularyEntity,
    RestrictionType,
    RelationTarget,
    Relation,
    Vocabulary,
} from './vocabulary.js';

// Re-export options
export type {
    ParserOptions,
    ConfiguratorOptions,
} from './options.js';
