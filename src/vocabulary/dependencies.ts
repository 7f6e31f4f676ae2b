import type { EntityKind, RelationTarget, Vocabulary } from '../types/vocabulary.js';
import { isBuiltinIri } from '../parser/namespaces.js';
import { kindOf } from './factory.js';

export type DependencyVia =
    | 'parentClass'
    | 'equivalentClass'
    | 'restrictionProperty'
    | 'restrictionTarget'
    | 'domain'
    | 'range'
    | 'parentProperty'
    | 'inverse'
    | 'individualType';

/**
 * A reference to an IRI that no source declares with the expected kind
 */
export interface MissingDependency {
    iri: string;
    referencedBy: string;
    via: DependencyVia;
}

/**
 * Lists references that point outside the vocabulary, typically because
 * an imported ontology has not been added yet
 */
export function findMissingDependencies(vocabulary: Vocabulary): MissingDependency[] {
    const missing = new Map<string, MissingDependency>();

    const check = (iri: string, expected: EntityKind[], referencedBy: string, via: DependencyVia) => {
        if (isBuiltinIri(iri)) return;
        const kind = kindOf(vocabulary, iri);
        if (kind && expected.includes(kind)) return;
        missing.set(`${iri} ${referencedBy} ${via}`, { iri, referencedBy, via });
    };

    const checkTarget = (target: RelationTarget, referencedBy: string) => {
        switch (target.type) {
            case 'iri':
                check(target.iri, ['class', 'individual'], referencedBy, 'restrictionTarget');
                break;
            case 'union':
            case 'intersection':
                target.members.forEach(member => checkTarget(member, referencedBy));
                break;
            case 'complement':
                checkTarget(target.member, referencedBy);
                break;
        }
    };

    for (const cls of Object.values(vocabulary.classes)) {
        cls.parentClassIris.forEach(iri => check(iri, ['class'], cls.iri, 'parentClass'));
        cls.equivalentClassIris.forEach(iri => check(iri, ['class'], cls.iri, 'equivalentClass'));
    }

    for (const relation of Object.values(vocabulary.relations)) {
        check(relation.propertyIri, ['objectProperty', 'dataProperty'], relation.classIri, 'restrictionProperty');
        if (relation.target) checkTarget(relation.target, relation.classIri);
    }

    for (const property of Object.values(vocabulary.objectProperties)) {
        property.domainIris.forEach(iri => check(iri, ['class'], property.iri, 'domain'));
        property.rangeIris.forEach(iri => check(iri, ['class'], property.iri, 'range'));
        property.parentPropertyIris.forEach(iri => check(iri, ['objectProperty'], property.iri, 'parentProperty'));
        property.inverseIris.forEach(iri => check(iri, ['objectProperty'], property.iri, 'inverse'));
    }

    for (const property of Object.values(vocabulary.dataProperties)) {
        property.domainIris.forEach(iri => check(iri, ['class'], property.iri, 'domain'));
        property.parentPropertyIris.forEach(iri => check(iri, ['dataProperty'], property.iri, 'parentProperty'));
    }

    for (const individual of Object.values(vocabulary.individuals)) {
        individual.classIris.forEach(iri => check(iri, ['class'], individual.iri, 'individualType'));
    }

    return [...missing.values()].sort((a, b) =>
        a.iri.localeCompare(b.iri) || a.referencedBy.localeCompare(b.referencedBy) || a.via.localeCompare(b.via));
}
