import type {
    DataProperty,
    EntitySettings,
    ObjectProperty,
    Vocabulary,
    VocabularyEntity,
} from '../types/vocabulary.js';
import { iriFragment } from '../parser/namespaces.js';
import { addUnique, allEntities, getOwn } from './factory.js';
import { invert, transitiveClosure } from './closure.js';

/**
 * Post-processing of a freshly parsed vocabulary.
 *
 * Computes everything that depends on the complete set of facts (labels,
 * hierarchy closures, inverse links, inherited restrictions) and carries
 * user settings over from the previous vocabulary. Must run once, after
 * all sources are parsed. `oldVocabulary` is only read.
 */
export function postProcessVocabulary(vocabulary: Vocabulary, oldVocabulary: Vocabulary): void {
    for (const entity of allEntities(vocabulary)) {
        entity.label = entity.labels[0] ?? iriFragment(entity.iri);
    }

    computeClassHierarchy(vocabulary);
    computePropertyHierarchy(Object.values(vocabulary.objectProperties), 'object property');
    computePropertyHierarchy(Object.values(vocabulary.dataProperties), 'data property');
    linkInverseProperties(vocabulary);
    combineRelations(vocabulary);
    carryForwardSettings(vocabulary, oldVocabulary);
}

function computeClassHierarchy(vocabulary: Vocabulary): void {
    const classes = Object.values(vocabulary.classes);
    const parents = new Map<string, string[]>(classes.map(c => [c.iri, c.parentClassIris]));

    const ancestors = transitiveClosure(parents, 'class');
    const children = invert(parents);
    const descendants = invert(ancestors);

    for (const cls of classes) {
        cls.ancestorClassIris = ancestors.get(cls.iri) ?? [];
        cls.childClassIris = children.get(cls.iri) ?? [];
        cls.descendantClassIris = descendants.get(cls.iri) ?? [];
    }
}

function computePropertyHierarchy(properties: Array<ObjectProperty | DataProperty>, what: string): void {
    const parents = new Map<string, string[]>(properties.map(p => [p.iri, p.parentPropertyIris]));
    const ancestors = transitiveClosure(parents, what);

    for (const property of properties) {
        property.ancestorPropertyIris = ancestors.get(property.iri) ?? [];
    }
}

function linkInverseProperties(vocabulary: Vocabulary): void {
    for (const property of Object.values(vocabulary.objectProperties)) {
        for (const inverseIri of property.inverseIris) {
            const inverse = getOwn(vocabulary.objectProperties, inverseIri);
            if (inverse && inverse !== property) {
                addUnique(inverse.inverseIris, property.iri);
            }
        }
    }
}

/**
 * Groups each class's own restrictions and those inherited from its
 * ancestors by property
 */
function combineRelations(vocabulary: Vocabulary): void {
    for (const cls of Object.values(vocabulary.classes)) {
        const combined = new Map<string, string[]>();
        const lineage = [cls.iri, ...cls.ancestorClassIris];

        for (const iri of lineage) {
            const ancestor = getOwn(vocabulary.classes, iri);
            if (!ancestor) continue;
            for (const relationId of ancestor.relationIds) {
                const relation = getOwn(vocabulary.relations, relationId);
                if (!relation) continue;
                let ids = combined.get(relation.propertyIri);
                if (!ids) {
                    ids = [];
                    combined.set(relation.propertyIri, ids);
                }
                addUnique(ids, relationId);
            }
        }
        cls.combinedRelations = Object.fromEntries(combined);
    }
}

/**
 * Three-way merge of settings keyed by IRI. New entities keep the defaults
 * the factory gave them; entities whose kind changed are treated as new.
 */
function carryForwardSettings(vocabulary: Vocabulary, oldVocabulary: Vocabulary): void {
    const previous = new Map<string, VocabularyEntity>(
        allEntities(oldVocabulary).map(entity => [entity.iri, entity])
    );

    for (const entity of allEntities(vocabulary)) {
        const old = previous.get(entity.iri);
        if (!old || old.kind !== entity.kind) continue;

        if (entity.kind === 'dataProperty') {
            if (old.kind === 'dataProperty') {
                entity.settings = { ...copySettings(old.settings), fieldType: old.settings.fieldType };
            }
        } else {
            entity.settings = copySettings(old.settings);
        }
    }
}

function copySettings(settings: EntitySettings): EntitySettings {
    return {
        included: settings.included,
        ...(settings.userSetLabel !== undefined && { userSetLabel: settings.userSetLabel }),
    };
}
