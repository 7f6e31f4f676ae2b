/**
 * ngsi-semantics - Library Entry Point
 *
 * Ontology parsing and vocabulary reconciliation for NGSI-v2 model
 * generation. This file should NOT import the CLI.
 */

// Configurator
export { VocabularyConfigurator } from './vocabulary/configurator.js';

// Parser
export { RdfParser, relationId } from './parser/rdfParser.js';
export type { DeclaredSource } from './parser/rdfParser.js';
export { RDF, RDFS, OWL, XSD, isBuiltinIri, iriFragment } from './parser/namespaces.js';

// Vocabulary building blocks
export { createVocabulary, createSource, allEntities } from './vocabulary/factory.js';
export { postProcessVocabulary } from './vocabulary/postProcessor.js';
export {
    getEntity,
    getEffectiveLabel,
    setUserLabel,
    setIncluded,
    setDataPropertyFieldType,
} from './vocabulary/settings.js';
export { findMissingDependencies } from './vocabulary/dependencies.js';
export type { MissingDependency, DependencyVia } from './vocabulary/dependencies.js';
export { serializeVocabulary, deserializeVocabulary } from './vocabulary/serialization.js';

// Types and Interfaces
export * from './types/index.js';

// Constants
export { DEFAULTS } from './types/options.js';
