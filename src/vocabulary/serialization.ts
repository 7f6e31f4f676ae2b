import { z } from 'zod';
import type { RelationTarget, Vocabulary } from '../types/vocabulary.js';
import { createGenericError } from '../types/errors.js';

const iriList = z.array(z.string());

const settingsSchema = z.object({
    userSetLabel: z.string().optional(),
    included: z.boolean(),
});

const entityBase = {
    iri: z.string(),
    labels: z.array(z.string()),
    comments: z.array(z.string()),
    sourceNames: z.array(z.string()),
    label: z.string(),
    settings: settingsSchema,
};

const classSchema = z.object({
    ...entityBase,
    kind: z.literal('class'),
    parentClassIris: iriList,
    equivalentClassIris: iriList,
    relationIds: z.array(z.string()),
    ancestorClassIris: iriList,
    childClassIris: iriList,
    descendantClassIris: iriList,
    combinedRelations: z.record(z.array(z.string())),
});

const objectPropertySchema = z.object({
    ...entityBase,
    kind: z.literal('objectProperty'),
    domainIris: iriList,
    rangeIris: iriList,
    inverseIris: iriList,
    parentPropertyIris: iriList,
    ancestorPropertyIris: iriList,
    characteristics: z.array(z.enum([
        'functional', 'inverseFunctional', 'transitive', 'symmetric',
        'asymmetric', 'reflexive', 'irreflexive',
    ])),
});

const dataPropertySchema = z.object({
    ...entityBase,
    kind: z.literal('dataProperty'),
    domainIris: iriList,
    rangeIris: iriList,
    parentPropertyIris: iriList,
    ancestorPropertyIris: iriList,
    functional: z.boolean(),
    settings: settingsSchema.extend({
        fieldType: z.enum(['simple', 'command', 'deviceAttribute']),
    }),
});

const individualSchema = z.object({
    ...entityBase,
    kind: z.literal('individual'),
    classIris: iriList,
});

const targetSchema: z.ZodType<RelationTarget> = z.lazy(() => z.discriminatedUnion('type', [
    z.object({ type: z.literal('iri'), iri: z.string() }),
    z.object({
        type: z.literal('literal'),
        value: z.string(),
        datatype: z.string(),
        language: z.string().optional(),
    }),
    z.object({ type: z.literal('union'), members: z.array(targetSchema) }),
    z.object({ type: z.literal('intersection'), members: z.array(targetSchema) }),
    z.object({ type: z.literal('complement'), member: targetSchema }),
]));

const relationSchema = z.object({
    id: z.string(),
    classIri: z.string(),
    propertyIri: z.string(),
    restrictionType: z.enum(['some', 'only', 'value', 'min', 'max', 'exactly']),
    cardinality: z.number().int().nonnegative().optional(),
    target: targetSchema.optional(),
    sourceNames: z.array(z.string()),
});

const sourceSchema = z.object({
    sourceName: z.string(),
    content: z.string(),
    timestamp: z.number(),
});

const vocabularySchema = z.object({
    sources: z.record(sourceSchema),
    classes: z.record(classSchema),
    objectProperties: z.record(objectPropertySchema),
    dataProperties: z.record(dataPropertySchema),
    individuals: z.record(individualSchema),
    relations: z.record(relationSchema),
});

export function serializeVocabulary(vocabulary: Vocabulary): string {
    return JSON.stringify(vocabulary, null, 2);
}

/**
 * Parse and validate a serialized vocabulary
 */
export function deserializeVocabulary(json: string): Vocabulary {
    let data: unknown;
    try {
        data = JSON.parse(json);
    } catch (e) {
        throw createGenericError('INVALID_VOCABULARY', `Vocabulary is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
    }

    const result = vocabularySchema.safeParse(data);
    if (!result.success) {
        throw createGenericError('INVALID_VOCABULARY', 'Vocabulary does not match the expected shape', {
            issues: result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
        });
    }

    const vocabulary = result.data;
    for (const [name, source] of Object.entries(vocabulary.sources)) {
        vocabulary.sources[name] = Object.freeze(source);
    }
    return vocabulary;
}
