import { Parser, Store } from 'n3';
import type { Quad, Term } from 'n3';
import type { ParserOptions } from '../types/options.js';
import { DEFAULTS } from '../types/options.js';
import type {
    EntityKind,
    PropertyCharacteristic,
    Relation,
    RelationTarget,
    RestrictionType,
    Source,
    Vocabulary,
    VocabularyClass,
    VocabularyEntity,
} from '../types/vocabulary.js';
import { createConflictError, createSyntaxError } from '../types/errors.js';
import {
    addUnique,
    assertSourceName,
    createClass,
    createDataProperty,
    createIndividual,
    createObjectProperty,
    findEntity,
    getOwn,
    isRecordKey,
    kindOf,
} from '../vocabulary/factory.js';
import { isBuiltinIri, TERMS } from './namespaces.js';

const DECLARING_TYPES: Record<string, EntityKind> = {
    [TERMS.owlClass]: 'class',
    [TERMS.rdfsClass]: 'class',
    [TERMS.objectProperty]: 'objectProperty',
    [TERMS.inverseFunctionalProperty]: 'objectProperty',
    [TERMS.transitiveProperty]: 'objectProperty',
    [TERMS.symmetricProperty]: 'objectProperty',
    [TERMS.asymmetricProperty]: 'objectProperty',
    [TERMS.reflexiveProperty]: 'objectProperty',
    [TERMS.irreflexiveProperty]: 'objectProperty',
    [TERMS.datatypeProperty]: 'dataProperty',
    [TERMS.namedIndividual]: 'individual',
};

const CHARACTERISTICS: Record<string, PropertyCharacteristic> = {
    [TERMS.functionalProperty]: 'functional',
    [TERMS.inverseFunctionalProperty]: 'inverseFunctional',
    [TERMS.transitiveProperty]: 'transitive',
    [TERMS.symmetricProperty]: 'symmetric',
    [TERMS.asymmetricProperty]: 'asymmetric',
    [TERMS.reflexiveProperty]: 'reflexive',
    [TERMS.irreflexiveProperty]: 'irreflexive',
};

/** Restriction predicates without a qualifying class */
const PLAIN_RESTRICTIONS: Array<[string, RestrictionType]> = [
    [TERMS.someValuesFrom, 'some'],
    [TERMS.allValuesFrom, 'only'],
    [TERMS.hasValue, 'value'],
];

const CARDINALITY_RESTRICTIONS: Array<[string, RestrictionType, boolean]> = [
    [TERMS.minCardinality, 'min', false],
    [TERMS.maxCardinality, 'max', false],
    [TERMS.cardinality, 'exactly', false],
    [TERMS.minQualifiedCardinality, 'min', true],
    [TERMS.maxQualifiedCardinality, 'max', true],
    [TERMS.qualifiedCardinality, 'exactly', true],
];

/**
 * A source whose declarations are in the vocabulary and whose facts are
 * still to be merged
 */
export interface DeclaredSource {
    readonly source: Source;
    readonly quads: Quad[];
    readonly store: Store;
}

/**
 * Parses ontology sources (Turtle and the other n3 syntaxes) into a
 * vocabulary.
 *
 * Parsing happens in two passes. The first collects declarations (what kind
 * of entity each IRI is) and rejects conflicting ones; the second merges
 * facts onto the declared entities. When several sources are parsed
 * together every declaration pass runs before the first fact pass, so a
 * source may describe entities that a later source declares. Facts are
 * only ever added.
 */
export class RdfParser {
    private readonly format: string;
    private readonly onWarning: (message: string) => void;

    constructor(options: ParserOptions = {}) {
        this.format = options.format ?? DEFAULTS.format;
        this.onWarning = options.onWarning ?? ((message) => console.warn(message));
    }

    parseSourceIntoVocabulary(source: Source, vocabulary: Vocabulary): void {
        this.parseSourcesIntoVocabulary([source], vocabulary);
    }

    /**
     * Parse several sources as one batch. `onMerged` is called after the
     * facts of each source are merged.
     */
    parseSourcesIntoVocabulary(
        sources: readonly Source[],
        vocabulary: Vocabulary,
        onMerged?: (source: Source, index: number) => void
    ): void {
        const declared = sources.map(source => this.declareSource(source, vocabulary));
        declared.forEach((entry, i) => {
            this.mergeSource(entry, vocabulary);
            onMerged?.(entry.source, i);
        });
    }

    /**
     * First pass: register the source and the entities it declares
     */
    declareSource(source: Source, vocabulary: Vocabulary): DeclaredSource {
        assertSourceName(source.sourceName);
        const quads = this.readQuads(source);
        const store = new Store(quads);

        vocabulary.sources[source.sourceName] = source;

        for (const quad of quads) {
            this.collectDeclaration(quad, source, vocabulary);
        }
        return { source, quads, store };
    }

    /**
     * Second pass: merge facts onto entities declared by any source
     */
    mergeSource({ source, quads, store }: DeclaredSource, vocabulary: Vocabulary): void {
        for (const quad of quads) {
            const entity = this.mergeFact(quad, store, source, vocabulary);
            if (entity) addUnique(entity.sourceNames, source.sourceName);
        }
    }

    private readQuads(source: Source): Quad[] {
        const content = source.content;
        const head = content.trimStart();
        if (head.startsWith('<?xml') || head.startsWith('<rdf:RDF')) {
            throw createSyntaxError(source.sourceName, 'RDF/XML is not supported, provide the ontology as Turtle');
        }

        try {
            return new Parser({ format: this.format }).parse(content);
        } catch (e) {
            const message = e instanceof Error ? e.message : String(e);
            const lineMatch = /line (\d+)/.exec(message);
            throw createSyntaxError(
                source.sourceName,
                message,
                lineMatch ? Number(lineMatch[1]) : undefined,
                e
            );
        }
    }

    private collectDeclaration(quad: Quad, source: Source, vocabulary: Vocabulary): void {
        const { subject, predicate, object } = quad;
        if (subject.termType !== 'NamedNode') return;

        if (predicate.value === TERMS.subClassOf || predicate.value === TERMS.equivalentClass) {
            this.declare(vocabulary, source, subject.value, 'class');
            return;
        }
        if (predicate.value !== TERMS.type || object.termType !== 'NamedNode') return;

        const declared = getOwn(DECLARING_TYPES, object.value);
        if (declared) {
            this.declare(vocabulary, source, subject.value, declared);
        } else if (!isBuiltinIri(object.value)) {
            this.declare(vocabulary, source, subject.value, 'individual');
        }
    }

    private declare(vocabulary: Vocabulary, source: Source, iri: string, kind: EntityKind): void {
        if (!isRecordKey(iri)) {
            this.skip(source, `declaration of <${iri}>, which cannot be used as a key`);
            return;
        }
        const existing = kindOf(vocabulary, iri);
        if (existing !== undefined && existing !== kind) {
            throw createConflictError(source.sourceName, iri, existing, kind);
        }

        let entity: VocabularyEntity;
        switch (kind) {
            case 'class':
                entity = getOwn(vocabulary.classes, iri) ?? (vocabulary.classes[iri] = createClass(iri));
                break;
            case 'objectProperty':
                entity = getOwn(vocabulary.objectProperties, iri)
                    ?? (vocabulary.objectProperties[iri] = createObjectProperty(iri));
                break;
            case 'dataProperty':
                entity = getOwn(vocabulary.dataProperties, iri)
                    ?? (vocabulary.dataProperties[iri] = createDataProperty(iri));
                break;
            case 'individual':
                entity = getOwn(vocabulary.individuals, iri)
                    ?? (vocabulary.individuals[iri] = createIndividual(iri));
                break;
        }
        addUnique(entity.sourceNames, source.sourceName);
    }

    /**
     * Returns the entity the fact was merged onto, if any
     */
    private mergeFact(
        quad: Quad,
        store: Store,
        source: Source,
        vocabulary: Vocabulary
    ): VocabularyEntity | undefined {
        const { subject, predicate, object } = quad;
        if (subject.termType !== 'NamedNode') return undefined;

        const iri = subject.value;
        const entity = findEntity(vocabulary, iri);

        switch (predicate.value) {
            case TERMS.label:
            case TERMS.comment:
                if (!entity) {
                    if (store.countQuads(subject, TERMS.type, TERMS.ontology, null) === 0) {
                        this.skip(source, `<${predicate.value}> on <${iri}>, which no source declares`);
                    }
                    return undefined;
                }
                if (object.termType !== 'Literal') return undefined;
                addUnique(predicate.value === TERMS.label ? entity.labels : entity.comments, object.value);
                return entity;

            case TERMS.type:
                if (entity && object.termType === 'NamedNode') {
                    this.mergeType(entity, object.value);
                }
                return entity;

            case TERMS.subClassOf:
            case TERMS.equivalentClass:
                if (entity?.kind !== 'class') return undefined;
                this.mergeClassExpression(
                    entity, object, store, source, vocabulary, predicate.value === TERMS.equivalentClass);
                return entity;

            case TERMS.subPropertyOf:
                if (entity?.kind === 'objectProperty' || entity?.kind === 'dataProperty') {
                    if (object.termType === 'NamedNode') addUnique(entity.parentPropertyIris, object.value);
                    return entity;
                }
                this.skip(source, `rdfs:subPropertyOf on <${iri}>, which is not a declared property`);
                return undefined;

            case TERMS.domain:
            case TERMS.range:
                if (entity?.kind === 'objectProperty' || entity?.kind === 'dataProperty') {
                    const target = predicate.value === TERMS.domain ? entity.domainIris : entity.rangeIris;
                    addUnique(target, ...this.flattenUnion(object, store, source));
                    return entity;
                }
                this.skip(source, `<${predicate.value}> on <${iri}>, which is not a declared property`);
                return undefined;

            case TERMS.inverseOf:
                if (entity?.kind === 'objectProperty' && object.termType === 'NamedNode') {
                    addUnique(entity.inverseIris, object.value);
                    return entity;
                }
                this.skip(source, `owl:inverseOf on <${iri}>, which is not a declared object property`);
                return undefined;

            default:
                return undefined;
        }
    }

    private mergeType(entity: VocabularyEntity, typeIri: string): void {
        const characteristic = getOwn(CHARACTERISTICS, typeIri);
        if (characteristic) {
            if (entity.kind === 'objectProperty') {
                addUnique(entity.characteristics, characteristic);
            } else if (entity.kind === 'dataProperty' && characteristic === 'functional') {
                entity.functional = true;
            }
            return;
        }
        if (entity.kind === 'individual' && !isBuiltinIri(typeIri)) {
            addUnique(entity.classIris, typeIri);
        }
    }

    /**
     * Handles the object of rdfs:subClassOf / owl:equivalentClass: a named
     * class, a restriction, or an intersection of both.
     */
    private mergeClassExpression(
        owner: VocabularyClass,
        object: Term,
        store: Store,
        source: Source,
        vocabulary: Vocabulary,
        equivalent: boolean,
        path: ReadonlySet<string> = new Set()
    ): void {
        if (object.termType === 'NamedNode') {
            addUnique(equivalent ? owner.equivalentClassIris : owner.parentClassIris, object.value);
            return;
        }
        if (object.termType !== 'BlankNode') return;

        if (store.getObjects(object, TERMS.onProperty, null).length > 0) {
            this.mergeRestriction(owner, object, store, source, vocabulary);
            return;
        }

        const intersection = store.getObjects(object, TERMS.intersectionOf, null)[0];
        if (intersection) {
            const inner = this.enter(path, object, source);
            // A ≡ B ⊓ R means A is a subclass of B and carries R
            for (const member of this.readList(intersection, store)) {
                this.mergeClassExpression(owner, member, store, source, vocabulary, false, inner);
            }
            return;
        }

        this.skip(source, `anonymous class expression on <${owner.iri}>`);
    }

    private mergeRestriction(
        owner: VocabularyClass,
        node: Term,
        store: Store,
        source: Source,
        vocabulary: Vocabulary
    ): void {
        const property = store.getObjects(node, TERMS.onProperty, null)[0];
        if (property?.termType !== 'NamedNode') {
            this.skip(source, `restriction on <${owner.iri}> without a named owl:onProperty`);
            return;
        }

        let restrictionType: RestrictionType | undefined;
        let cardinality: number | undefined;
        let target: RelationTarget | undefined;

        for (const [predicate, type] of PLAIN_RESTRICTIONS) {
            const value = store.getObjects(node, predicate, null)[0];
            if (value) {
                restrictionType = type;
                target = this.toTarget(value, store, source);
                break;
            }
        }

        if (!restrictionType) {
            for (const [predicate, type, qualified] of CARDINALITY_RESTRICTIONS) {
                const value = store.getObjects(node, predicate, null)[0];
                if (!value) continue;

                const count = Number(value.value);
                if (value.termType !== 'Literal' || !Number.isInteger(count) || count < 0) {
                    this.skip(source, `restriction on <${owner.iri}> with invalid cardinality '${value.value}'`);
                    return;
                }
                restrictionType = type;
                cardinality = count;
                if (qualified) {
                    const on = store.getObjects(node, TERMS.onClass, null)[0]
                        ?? store.getObjects(node, TERMS.onDataRange, null)[0];
                    target = on ? this.toTarget(on, store, source) : undefined;
                }
                break;
            }
        }

        if (!restrictionType) {
            this.skip(source, `restriction on <${owner.iri}> has no supported restriction type`);
            return;
        }

        const id = relationId(owner.iri, property.value, restrictionType, cardinality, target);
        const relation: Relation = vocabulary.relations[id] ??= {
            id,
            classIri: owner.iri,
            propertyIri: property.value,
            restrictionType,
            ...(cardinality !== undefined && { cardinality }),
            ...(target && { target }),
            sourceNames: [],
        };
        addUnique(relation.sourceNames, source.sourceName);
        addUnique(owner.relationIds, id);
    }

    private toTarget(
        term: Term,
        store: Store,
        source: Source,
        path: ReadonlySet<string> = new Set()
    ): RelationTarget | undefined {
        switch (term.termType) {
            case 'NamedNode':
                return { type: 'iri', iri: term.value };
            case 'Literal':
                return {
                    type: 'literal',
                    value: term.value,
                    datatype: term.datatype.value,
                    ...(term.language && { language: term.language }),
                };
            case 'BlankNode': {
                const inner = this.enter(path, term, source);
                const union = store.getObjects(term, TERMS.unionOf, null)[0];
                if (union) {
                    return { type: 'union', members: this.readTargets(union, store, source, inner) };
                }
                const intersection = store.getObjects(term, TERMS.intersectionOf, null)[0];
                if (intersection) {
                    return { type: 'intersection', members: this.readTargets(intersection, store, source, inner) };
                }
                const complement = store.getObjects(term, TERMS.complementOf, null)[0];
                const member = complement ? this.toTarget(complement, store, source, inner) : undefined;
                return member ? { type: 'complement', member } : undefined;
            }
            default:
                return undefined;
        }
    }

    private readTargets(list: Term, store: Store, source: Source, path: ReadonlySet<string>): RelationTarget[] {
        const targets: RelationTarget[] = [];
        for (const item of this.readList(list, store)) {
            const target = this.toTarget(item, store, source, path);
            if (target) targets.push(target);
        }
        return targets;
    }

    /**
     * Named classes of a domain/range: the IRI itself or the members of
     * an owl:unionOf
     */
    private flattenUnion(
        term: Term,
        store: Store,
        source: Source,
        path: ReadonlySet<string> = new Set()
    ): string[] {
        if (term.termType === 'NamedNode') return [term.value];

        const union = term.termType === 'BlankNode' ? store.getObjects(term, TERMS.unionOf, null)[0] : undefined;
        if (!union) {
            this.skip(source, `unsupported domain/range expression '${term.value}'`);
            return [];
        }
        const inner = this.enter(path, term, source);
        return this.readList(union, store).flatMap(member => this.flattenUnion(member, store, source, inner));
    }

    /**
     * Path of blank nodes with `node` appended; a node already on the path
     * makes the expression infinite
     */
    private enter(path: ReadonlySet<string>, node: Term, source: Source): ReadonlySet<string> {
        if (path.has(node.value)) {
            throw createSyntaxError(source.sourceName, `class expression _:${node.value} contains itself`);
        }
        return new Set(path).add(node.value);
    }

    /**
     * Items of an rdf:first/rdf:rest list
     */
    private readList(head: Term, store: Store): Term[] {
        const items: Term[] = [];
        const visited = new Set<string>();
        let node: Term | undefined = head;

        while (node && node.value !== TERMS.nil && !visited.has(node.value)) {
            visited.add(node.value);
            const first = store.getObjects(node, TERMS.first, null)[0];
            if (first) items.push(first);
            node = store.getObjects(node, TERMS.rest, null)[0];
        }
        return items;
    }

    private skip(source: Source, what: string): void {
        this.onWarning(`[${source.sourceName}] skipped ${what}`);
    }
}

/**
 * Deterministic key of a restriction, so that repeated declarations
 * collapse into one relation
 */
export function relationId(
    classIri: string,
    propertyIri: string,
    restrictionType: RestrictionType,
    cardinality?: number,
    target?: RelationTarget
): string {
    const parts = [`<${classIri}>`, `<${propertyIri}>`, restrictionType];
    if (cardinality !== undefined) parts.push(String(cardinality));
    if (target) parts.push(targetKey(target));
    return parts.join(' ');
}

function targetKey(target: RelationTarget): string {
    switch (target.type) {
        case 'iri': return `<${target.iri}>`;
        case 'literal': return target.language
            ? `"${target.value}"@${target.language}`
            : `"${target.value}"^^<${target.datatype}>`;
        case 'union': return `or(${target.members.map(targetKey).join(' ')})`;
        case 'intersection': return `and(${target.members.map(targetKey).join(' ')})`;
        case 'complement': return `not(${targetKey(target.member)})`;
    }
}
