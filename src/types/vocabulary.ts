// === Vocabulary data model ===
// Plain records throughout, so a vocabulary serializes to JSON as-is.

/**
 * One ingested ontology document
 */
export interface Source {
    readonly sourceName: string;
    readonly content: string;
    readonly timestamp: number;     // epoch milliseconds
}

export type EntityKind = 'class' | 'objectProperty' | 'dataProperty' | 'individual';

/**
 * How a data property is exposed when generating NGSI-v2 entities
 */
export type DataFieldType = 'simple' | 'command' | 'deviceAttribute';

/**
 * User-assigned configuration, carried forward across rebuilds
 */
export interface EntitySettings {
    userSetLabel?: string;
    included: boolean;
}

export interface DataPropertySettings extends EntitySettings {
    fieldType: DataFieldType;
}

interface EntityBase {
    iri: string;
    labels: string[];
    comments: string[];
    sourceNames: string[];
    /** Display label, derived during post-processing */
    label: string;
    settings: EntitySettings;
}

export interface VocabularyClass extends EntityBase {
    kind: 'class';
    parentClassIris: string[];
    equivalentClassIris: string[];
    relationIds: string[];
    ancestorClassIris: string[];
    childClassIris: string[];
    descendantClassIris: string[];
    /** property IRI -> relation ids of this class and its ancestors */
    combinedRelations: Record<string, string[]>;
}

export type PropertyCharacteristic =
    | 'functional'
    | 'inverseFunctional'
    | 'transitive'
    | 'symmetric'
    | 'asymmetric'
    | 'reflexive'
    | 'irreflexive';

export interface ObjectProperty extends EntityBase {
    kind: 'objectProperty';
    domainIris: string[];
    rangeIris: string[];
    inverseIris: string[];
    parentPropertyIris: string[];
    ancestorPropertyIris: string[];
    characteristics: PropertyCharacteristic[];
}

export interface DataProperty extends EntityBase {
    kind: 'dataProperty';
    domainIris: string[];
    rangeIris: string[];
    parentPropertyIris: string[];
    ancestorPropertyIris: string[];
    functional: boolean;
    settings: DataPropertySettings;
}

export interface Individual extends EntityBase {
    kind: 'individual';
    classIris: string[];
}

export type VocabularyEntity = VocabularyClass | ObjectProperty | DataProperty | Individual;

export type RestrictionType = 'some' | 'only' | 'value' | 'min' | 'max' | 'exactly';

/**
 * Target of a class restriction
 */
export type RelationTarget =
    | { type: 'iri'; iri: string }
    | { type: 'literal'; value: string; datatype: string; language?: string }
    | { type: 'union'; members: RelationTarget[] }
    | { type: 'intersection'; members: RelationTarget[] }
    | { type: 'complement'; member: RelationTarget };

/**
 * A property restriction declared on a class
 */
export interface Relation {
    id: string;
    classIri: string;
    propertyIri: string;
    restrictionType: RestrictionType;
    cardinality?: number;
    target?: RelationTarget;
    sourceNames: string[];
}

export interface Vocabulary {
    sources: Record<string, Source>;
    classes: Record<string, VocabularyClass>;
    objectProperties: Record<string, ObjectProperty>;
    dataProperties: Record<string, DataProperty>;
    individuals: Record<string, Individual>;
    relations: Record<string, Relation>;
}
