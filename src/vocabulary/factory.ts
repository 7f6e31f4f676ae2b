import type {
    DataProperty,
    DataPropertySettings,
    EntityKind,
    EntitySettings,
    Individual,
    ObjectProperty,
    Source,
    Vocabulary,
    VocabularyClass,
    VocabularyEntity,
} from '../types/vocabulary.js';
import { DEFAULTS } from '../types/options.js';
import { createGenericError } from '../types/errors.js';

// Assigning this key sets the prototype instead of adding an entry
const PROTOTYPE_KEY = '__proto__';

/**
 * Create an empty vocabulary (no sources, no entities)
 */
export function createVocabulary(): Vocabulary {
    return {
        sources: {},
        classes: {},
        objectProperties: {},
        dataProperties: {},
        individuals: {},
        relations: {},
    };
}

/**
 * Create an immutable source record stamped with the current time
 */
export function createSource(sourceName: string, content: string, timestamp: number = Date.now()): Source {
    assertSourceName(sourceName);
    return Object.freeze({ sourceName, content, timestamp });
}

/**
 * Source names key `vocabulary.sources`, so they must be usable as
 * record keys
 */
export function assertSourceName(sourceName: string): void {
    if (sourceName === '' || sourceName === PROTOTYPE_KEY) {
        throw createGenericError(
            'INVALID_SOURCE_NAME',
            `'${sourceName}' cannot be used as a source name`,
            { sourceName }
        );
    }
}

/**
 * True unless `key` would be swallowed by plain assignment
 */
export function isRecordKey(key: string): boolean {
    return key !== PROTOTYPE_KEY;
}

/**
 * Own entry of a record, never one inherited from Object.prototype
 */
export function getOwn<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
    return Object.hasOwn(record, key) ? record[key] : undefined;
}

export function defaultSettings(): EntitySettings {
    return { included: DEFAULTS.included };
}

export function defaultDataPropertySettings(): DataPropertySettings {
    return { included: DEFAULTS.included, fieldType: DEFAULTS.fieldType };
}

export function createClass(iri: string): VocabularyClass {
    return {
        kind: 'class',
        iri,
        labels: [],
        comments: [],
        sourceNames: [],
        label: '',
        settings: defaultSettings(),
        parentClassIris: [],
        equivalentClassIris: [],
        relationIds: [],
        ancestorClassIris: [],
        childClassIris: [],
        descendantClassIris: [],
        combinedRelations: {},
    };
}

export function createObjectProperty(iri: string): ObjectProperty {
    return {
        kind: 'objectProperty',
        iri,
        labels: [],
        comments: [],
        sourceNames: [],
        label: '',
        settings: defaultSettings(),
        domainIris: [],
        rangeIris: [],
        inverseIris: [],
        parentPropertyIris: [],
        ancestorPropertyIris: [],
        characteristics: [],
    };
}

export function createDataProperty(iri: string): DataProperty {
    return {
        kind: 'dataProperty',
        iri,
        labels: [],
        comments: [],
        sourceNames: [],
        label: '',
        settings: defaultDataPropertySettings(),
        domainIris: [],
        rangeIris: [],
        parentPropertyIris: [],
        ancestorPropertyIris: [],
        functional: false,
    };
}

export function createIndividual(iri: string): Individual {
    return {
        kind: 'individual',
        iri,
        labels: [],
        comments: [],
        sourceNames: [],
        label: '',
        settings: defaultSettings(),
        classIris: [],
    };
}

/**
 * All entities of a vocabulary, classes first
 */
export function allEntities(vocabulary: Vocabulary): VocabularyEntity[] {
    return [
        ...Object.values(vocabulary.classes),
        ...Object.values(vocabulary.objectProperties),
        ...Object.values(vocabulary.dataProperties),
        ...Object.values(vocabulary.individuals),
    ];
}

/**
 * Kind of the entity with the given IRI, if any
 */
export function kindOf(vocabulary: Vocabulary, iri: string): EntityKind | undefined {
    if (Object.hasOwn(vocabulary.classes, iri)) return 'class';
    if (Object.hasOwn(vocabulary.objectProperties, iri)) return 'objectProperty';
    if (Object.hasOwn(vocabulary.dataProperties, iri)) return 'dataProperty';
    if (Object.hasOwn(vocabulary.individuals, iri)) return 'individual';
    return undefined;
}

/**
 * Append without duplicates, preserving first-seen order
 */
export function addUnique<T>(list: T[], ...values: T[]): void {
    for (const value of values) {
        if (!list.includes(value)) {
            list.push(value);
        }
    }
}

/**
 * Entity with the given IRI, whatever its kind
 */
export function findEntity(vocabulary: Vocabulary, iri: string): VocabularyEntity | undefined {
    switch (kindOf(vocabulary, iri)) {
        case 'class': return vocabulary.classes[iri];
        case 'objectProperty': return vocabulary.objectProperties[iri];
        case 'dataProperty': return vocabulary.dataProperties[iri];
        case 'individual': return vocabulary.individuals[iri];
        default: return undefined;
    }
}
