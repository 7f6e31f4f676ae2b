import { readFileSync, writeFileSync } from 'fs';
import type { ConfiguratorOptions } from './types/options.js';
import type { Vocabulary } from './types/vocabulary.js';
import { createIoError } from './types/errors.js';
import { VocabularyConfigurator } from './vocabulary/configurator.js';
import { createVocabulary } from './vocabulary/factory.js';
import { findMissingDependencies } from './vocabulary/dependencies.js';
import { deserializeVocabulary, serializeVocabulary } from './vocabulary/serialization.js';

export function loadVocabulary(vocabularyPath: string): Vocabulary {
    let json: string;
    try {
        json = readFileSync(vocabularyPath, 'utf-8');
    } catch (e) {
        throw createIoError(vocabularyPath, e);
    }
    return deserializeVocabulary(json);
}

export function saveVocabulary(vocabularyPath: string, vocabulary: Vocabulary): void {
    writeFileSync(vocabularyPath, serializeVocabulary(vocabulary));
}

/**
 * Create a vocabulary from ontology files and write it to `outPath`
 */
export function buildCommand(outPath: string, files: string[], options: ConfiguratorOptions = {}): string {
    let vocabulary = createVocabulary();
    for (const file of files) {
        vocabulary = VocabularyConfigurator.addOntologyToVocabularyAsFile(vocabulary, file, options);
    }
    saveVocabulary(outPath, vocabulary);
    return formatSummary(vocabulary);
}

/**
 * Add (or replace) one ontology file in a saved vocabulary
 */
export function addCommand(vocabularyPath: string, file: string, options: ConfiguratorOptions = {}): string {
    const vocabulary = VocabularyConfigurator.addOntologyToVocabularyAsFile(
        loadVocabulary(vocabularyPath), file, options);
    saveVocabulary(vocabularyPath, vocabulary);
    return formatSummary(vocabulary);
}

export function removeCommand(vocabularyPath: string, sourceName: string, options: ConfiguratorOptions = {}): string {
    const vocabulary = VocabularyConfigurator.deleteSourceFromVocabulary(
        loadVocabulary(vocabularyPath), sourceName, options);
    saveVocabulary(vocabularyPath, vocabulary);
    return formatSummary(vocabulary);
}

export function summaryCommand(vocabularyPath: string): string {
    return formatSummary(loadVocabulary(vocabularyPath));
}

export function formatSummary(vocabulary: Vocabulary): string {
    const sourceNames = VocabularyConfigurator.getSourceNames(vocabulary);
    const lines = [
        `Sources: ${sourceNames.length > 0 ? sourceNames.join(', ') : '(none)'}`,
        `Classes: ${Object.keys(vocabulary.classes).length}`,
        `Object properties: ${Object.keys(vocabulary.objectProperties).length}`,
        `Data properties: ${Object.keys(vocabulary.dataProperties).length}`,
        `Individuals: ${Object.keys(vocabulary.individuals).length}`,
        `Relations: ${Object.keys(vocabulary.relations).length}`,
    ];

    const missing = findMissingDependencies(vocabulary);
    if (missing.length === 0) {
        lines.push('Missing dependencies: none');
    } else {
        lines.push(`Missing dependencies: ${missing.length}`);
        for (const dep of missing) {
            lines.push(`  <${dep.iri}> referenced by <${dep.referencedBy}> (${dep.via})`);
        }
    }
    return lines.join('\n');
}
