/**
 * Tests for the vocabulary merge protocol
 */

import { VocabularyConfigurator } from '../src/vocabulary/configurator.js';
import { createSource } from '../src/vocabulary/factory.js';
import { setIncluded, setUserLabel } from '../src/vocabulary/settings.js';
import {
    ParseError,
    ParsingException,
    ProcessingError,
    VocabularyException,
} from '../src/types/errors.js';
import type { ConfiguratorOptions } from '../src/types/options.js';
import type { Vocabulary } from '../src/types/vocabulary.js';
import { BUILDING_FILE, FIXTURE_DIR, PETS_FILE, SOURCES, expectError, turtle, zoo } from './fixtures.js';

const quiet: ConfiguratorOptions = { onWarning: () => undefined };

const add = (vocabulary: Vocabulary, name: string, content: string): Vocabulary =>
    VocabularyConfigurator.addOntologyToVocabularyAsString(vocabulary, name, content, quiet);

describe('VocabularyConfigurator', () => {
    let empty: Vocabulary;

    beforeEach(() => {
        empty = new VocabularyConfigurator().createVocabulary();
    });

    test('creates an empty vocabulary', () => {
        expect(empty).toEqual({
            sources: {},
            classes: {},
            objectProperties: {},
            dataProperties: {},
            individuals: {},
            relations: {},
        });
    });

    test('builds the Animal/Dog scenario', () => {
        const v1 = add(empty, 'a', SOURCES.animal);
        expect(Object.keys(v1.sources)).toEqual(['a']);
        expect(Object.keys(v1.classes)).toEqual([zoo('Animal')]);

        const v2 = add(v1, 'b', SOURCES.dog);
        expect(Object.keys(v2.sources)).toEqual(['a', 'b']);
        expect(Object.keys(v2.classes).sort()).toEqual([zoo('Animal'), zoo('Dog')]);
        expect(v2.classes[zoo('Dog')].ancestorClassIris).toContain(zoo('Animal'));
        expect(v2.classes[zoo('Animal')].descendantClassIris).toEqual([zoo('Dog')]);
    });

    test('returns a new vocabulary and leaves the input unchanged', () => {
        const v1 = add(empty, 'a', SOURCES.animal);
        const snapshot = structuredClone(v1);
        const sources = v1.sources;

        const v2 = add(v1, 'b', SOURCES.dog);

        expect(v2).not.toBe(v1);
        expect(v1.sources).toBe(sources);
        expect(v1).toEqual(snapshot);
        expect(empty).toEqual(new VocabularyConfigurator().createVocabulary());
    });

    test('is idempotent for the same source added twice', () => {
        const once = setUserLabel(add(empty, 'a', SOURCES.animal), zoo('Animal'), 'Beast');
        const twice = add(once, 'a', SOURCES.animal);

        expect(Object.keys(twice.sources)).toEqual(['a']);
        expect(twice.classes).toEqual(once.classes);
        expect(twice.relations).toEqual(once.relations);
    });

    test('yields the same entities for disjoint sources in either order', () => {
        const ab = add(add(empty, 'a', SOURCES.animal), 'p', SOURCES.plant);
        const ba = add(add(empty, 'p', SOURCES.plant), 'a', SOURCES.animal);

        expect(ab.classes).toEqual(ba.classes);
        expect(ab.relations).toEqual(ba.relations);
    });

    test('carries settings forward when an unrelated source is added', () => {
        let v1 = add(empty, 'a', SOURCES.animal);
        v1 = setIncluded(setUserLabel(v1, zoo('Animal'), 'Beast'), zoo('Animal'), false);

        const v2 = add(v1, 'p', SOURCES.plant);

        expect(v2.classes[zoo('Animal')].settings).toEqual({ included: false, userSetLabel: 'Beast' });
        expect(v2.classes[zoo('Plant')].settings).toEqual({ included: true });
    });

    test('drops settings of entities no source declares any more', () => {
        const v1 = setUserLabel(add(empty, 'a', SOURCES.animalAndCat), zoo('Cat'), 'Kitty');

        const v2 = add(v1, 'a', SOURCES.animal);
        expect(v2.classes[zoo('Cat')]).toBeUndefined();

        const v3 = add(v2, 'a', SOURCES.animalAndCat);
        expect(v3.classes[zoo('Cat')].settings).toEqual({ included: true });
    });

    test('replaces a source added again under the same name', () => {
        const v1 = add(empty, 'a', SOURCES.animal);
        const v2 = add(v1, 'a', SOURCES.plant);

        expect(Object.keys(v2.sources)).toEqual(['a']);
        expect(v2.sources.a.content).toBe(SOURCES.plant);
        expect(Object.keys(v2.classes)).toEqual([zoo('Plant')]);
    });

    test('keeps what an extension states about core entities when the core is updated', () => {
        const core = turtle(':Animal a owl:Class . :eats a owl:ObjectProperty .');
        const extension = turtle(':Animal rdfs:label "Tier" . :eats rdfs:domain :Animal .');
        const v1 = add(add(empty, 'core', core), 'ext', extension);

        const v2 = add(v1, 'core', `${core}\n:Plant a owl:Class .`);

        expect(VocabularyConfigurator.getSourceNames(v2)).toEqual(['core', 'ext']);
        expect(v2.classes[zoo('Animal')].labels).toEqual(['Tier']);
        expect(v2.classes[zoo('Animal')].label).toBe('Tier');
        expect(v2.classes[zoo('Animal')].sourceNames).toEqual(['core', 'ext']);
        expect(v2.objectProperties[zoo('eats')].domainIris).toEqual([zoo('Animal')]);
        expect(v2.classes[zoo('Plant')]).toBeDefined();
    });

    test('picks up facts stated before their entity was declared', () => {
        const v1 = add(empty, 'ext', turtle(':Animal rdfs:label "Tier" .'));
        expect(v1.classes).toEqual({});

        const v2 = add(v1, 'core', SOURCES.animal);

        expect(v2.classes[zoo('Animal')].label).toBe('Tier');
    });

    test('keeps the position of a replaced source', () => {
        const v1 = add(add(add(empty, 'a', SOURCES.animal), 'b', SOURCES.dog), 'p', SOURCES.plant);

        const v2 = add(v1, 'a', SOURCES.animalAndCat);

        expect(VocabularyConfigurator.getSourceNames(v2)).toEqual(['a', 'b', 'p']);
        expect(v2.sources.a.content).toBe(SOURCES.animalAndCat);
    });

    test('rejects a source name that cannot key a record', () => {
        const error = expectError(() => add(empty, '__proto__', SOURCES.animal), VocabularyException);

        expect(error.code).toBe('INVALID_SOURCE_NAME');
        expect(VocabularyConfigurator.getSourceNames(empty)).toEqual([]);
    });

    test('adds several sources in one call', () => {
        const v = VocabularyConfigurator.addSourcesToVocabulary(empty, [
            createSource('a', SOURCES.animal),
            createSource('f', SOURCES.feeding),
        ], quiet);

        expect(VocabularyConfigurator.getSourceNames(v)).toEqual(['a', 'f']);
        expect(Object.keys(v.objectProperties)).toEqual([zoo('eats')]);
        expect(Object.keys(v.dataProperties)).toEqual([zoo('weight')]);
    });

    test('reports progress per source and after post-processing', () => {
        const progress: Array<[number, string]> = [];
        VocabularyConfigurator.addOntologyToVocabularyAsString(empty, 'a', SOURCES.animal, {
            onProgress: (value, message) => progress.push([value, message]),
        });

        expect(progress).toEqual([
            [0.5, "Parsed source 'a'"],
            [1, 'Post-processing complete'],
        ]);
    });

    describe('failures', () => {
        test('wraps a syntax error and keeps the input vocabulary', () => {
            const v1 = add(empty, 'a', SOURCES.animal);

            const error = expectError(() => add(v1, 'bad', SOURCES.malformed), ParsingException);

            expect(error.error.code).toBe('PARSING_FAILED');
            expect(error.error.sourceName).toBe('bad');
            expect(error.cause).toBeInstanceOf(ParseError);
            expect(Object.keys(v1.sources)).toEqual(['a']);
        });

        test('wraps a conflict between sources', () => {
            const v1 = add(empty, 'a', SOURCES.animal);

            const error = expectError(
                () => add(v1, 'x', SOURCES.feeding.replace(':weight', ':Animal')),
                ParsingException
            );

            expect(error.cause).toBeInstanceOf(ParseError);
            expect(error.error.details).toEqual({ causeCode: 'CONFLICT_ERROR' });
        });

        test('wraps a post-processing failure', () => {
            const error = expectError(() => add(empty, 'c', SOURCES.cycle), ParsingException);

            expect(error.cause).toBeInstanceOf(ProcessingError);
            expect(error.message).toBe(
                `Vocabulary could not be built: Cyclic class hierarchy: ${zoo('A')} -> ${zoo('B')} -> ${zoo('A')}`
            );
        });
    });

    describe('files', () => {
        test('names the source after the file', () => {
            const v = VocabularyConfigurator.addOntologyToVocabularyAsFile(empty, BUILDING_FILE, quiet);

            expect(Object.keys(v.sources)).toEqual(['building']);
            expect(Object.keys(v.classes)).toHaveLength(5);
            expect(Object.keys(v.relations)).toHaveLength(3);
        });

        test('combines a file with a string source', () => {
            const v1 = add(empty, 'a', SOURCES.animal);
            const v2 = VocabularyConfigurator.addOntologyToVocabularyAsFile(v1, PETS_FILE, quiet);

            expect(Object.keys(v2.sources)).toEqual(['a', 'pets']);
            expect(v2.classes[zoo('Pet')].ancestorClassIris).toEqual([zoo('Animal')]);
            expect(v2.classes[zoo('Pet')].label).toBe('Pet');
        });

        test('surfaces an unreadable file as an I/O error', () => {
            const error = expectError(
                () => VocabularyConfigurator.addOntologyToVocabularyAsFile(empty, `${FIXTURE_DIR}/missing.ttl`),
                VocabularyException
            );

            expect(error).not.toBeInstanceOf(ParsingException);
            expect(error.code).toBe('IO_ERROR');
        });
    });

    describe('deleteSourceFromVocabulary', () => {
        test('rebuilds without the source', () => {
            const v1 = add(add(empty, 'a', SOURCES.animal), 'b', SOURCES.dog);

            const v2 = VocabularyConfigurator.deleteSourceFromVocabulary(v1, 'b', quiet);

            expect(Object.keys(v2.sources)).toEqual(['a']);
            expect(Object.keys(v2.classes)).toEqual([zoo('Animal')]);
            expect(v2.classes[zoo('Animal')].descendantClassIris).toEqual([]);
            expect(Object.keys(v1.sources)).toEqual(['a', 'b']);
        });

        test('rejects an unknown source name', () => {
            const error = expectError(
                () => VocabularyConfigurator.deleteSourceFromVocabulary(empty, 'nope'),
                VocabularyException
            );

            expect(error.code).toBe('SOURCE_NOT_FOUND');
        });
    });
});
