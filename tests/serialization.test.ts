import { VocabularyConfigurator } from '../src/vocabulary/configurator.js';
import { createVocabulary } from '../src/vocabulary/factory.js';
import { setUserLabel } from '../src/vocabulary/settings.js';
import { deserializeVocabulary, serializeVocabulary } from '../src/vocabulary/serialization.js';
import { VocabularyException } from '../src/types/errors.js';
import { BUILDING_FILE, building, expectError } from './fixtures.js';

describe('serialization', () => {
    test('restores a saved vocabulary with its settings', () => {
        const vocabulary = setUserLabel(
            VocabularyConfigurator.addOntologyToVocabularyAsFile(createVocabulary(), BUILDING_FILE),
            building('Room'),
            'Space'
        );

        const restored = deserializeVocabulary(serializeVocabulary(vocabulary));

        expect(restored).toEqual(vocabulary);
        expect(restored.classes[building('Room')].settings.userSetLabel).toBe('Space');
        expect(Object.isFrozen(restored.sources.building)).toBe(true);
    });

    test('a restored vocabulary accepts further sources', () => {
        const saved = serializeVocabulary(
            VocabularyConfigurator.addOntologyToVocabularyAsFile(createVocabulary(), BUILDING_FILE));

        const restored = deserializeVocabulary(saved);
        const rebuilt = VocabularyConfigurator.deleteSourceFromVocabulary(restored, 'building');

        expect(rebuilt).toEqual(createVocabulary());
    });

    test('rejects malformed JSON', () => {
        const error = expectError(() => deserializeVocabulary('{'), VocabularyException);

        expect(error.code).toBe('INVALID_VOCABULARY');
    });

    test('lists the paths that do not match', () => {
        const json = JSON.stringify({
            ...createVocabulary(),
            classes: { x: { iri: 'x' } },
        });

        const error = expectError(() => deserializeVocabulary(json), VocabularyException);

        expect(error.code).toBe('INVALID_VOCABULARY');
        expect(error.error.details?.issues).toContain('classes.x.labels: Required');
    });
});
