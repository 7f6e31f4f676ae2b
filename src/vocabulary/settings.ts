import type { DataFieldType, Vocabulary, VocabularyEntity } from '../types/vocabulary.js';
import { createGenericError } from '../types/errors.js';
import { findEntity } from './factory.js';

/**
 * Look up an entity of any kind by IRI
 */
export function getEntity(vocabulary: Vocabulary, iri: string): VocabularyEntity | undefined {
    return findEntity(vocabulary, iri);
}

/**
 * Label shown to users: their own label if they set one
 */
export function getEffectiveLabel(entity: VocabularyEntity): string {
    return entity.settings.userSetLabel ?? entity.label;
}

export function setUserLabel(vocabulary: Vocabulary, iri: string, label: string | undefined): Vocabulary {
    return updateEntity(vocabulary, iri, entity => {
        if (label === undefined) {
            delete entity.settings.userSetLabel;
        } else {
            entity.settings.userSetLabel = label;
        }
    });
}

export function setIncluded(vocabulary: Vocabulary, iri: string, included: boolean): Vocabulary {
    return updateEntity(vocabulary, iri, entity => {
        entity.settings.included = included;
    });
}

export function setDataPropertyFieldType(
    vocabulary: Vocabulary,
    iri: string,
    fieldType: DataFieldType
): Vocabulary {
    return updateEntity(vocabulary, iri, entity => {
        if (entity.kind !== 'dataProperty') {
            throw createGenericError(
                'INVALID_SETTING',
                `Field type applies to data properties only, <${iri}> is a ${entity.kind}`,
                { iri, kind: entity.kind }
            );
        }
        entity.settings.fieldType = fieldType;
    });
}

/**
 * Copy-on-write: apply `change` to the entity in a deep copy of the
 * vocabulary
 */
function updateEntity(
    vocabulary: Vocabulary,
    iri: string,
    change: (entity: VocabularyEntity) => void
): Vocabulary {
    if (!findEntity(vocabulary, iri)) {
        throw createGenericError('ENTITY_NOT_FOUND', `No entity <${iri}> in the vocabulary`, { iri });
    }
    const copy = structuredClone(vocabulary);
    const entity = findEntity(copy, iri);
    if (entity) {
        change(entity);
    }
    return copy;
}
