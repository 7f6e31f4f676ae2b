import { readFileSync } from 'fs';
import * as path from 'path';
import type { ConfiguratorOptions } from '../types/options.js';
import type { Source, Vocabulary } from '../types/vocabulary.js';
import {
    createGenericError,
    createIoError,
    createParsingException,
} from '../types/errors.js';
import { RdfParser } from '../parser/rdfParser.js';
import { createSource, createVocabulary } from './factory.js';
import { postProcessVocabulary } from './postProcessor.js';

/**
 * Builds vocabularies from ontology sources.
 *
 * Every update rebuilds the vocabulary from scratch: all known sources are
 * re-parsed into a fresh vocabulary together with the new ones, and the result
 * is post-processed against the previous vocabulary to carry user settings
 * forward. The vocabulary passed in is never modified; a failed call throws
 * a ParsingException and leaves it as it was.
 */
export class VocabularyConfigurator {
    createVocabulary(): Vocabulary {
        return createVocabulary();
    }

    /**
     * Add an ontology file. The source is named after the file name up to
     * its first dot; a source of that name already in the vocabulary is
     * replaced.
     */
    static addOntologyToVocabularyAsFile(
        vocabulary: Vocabulary,
        pathToFile: string,
        options: ConfiguratorOptions = {}
    ): Vocabulary {
        let content: string;
        try {
            content = readFileSync(pathToFile, 'utf-8');
        } catch (e) {
            throw createIoError(pathToFile, e);
        }

        const sourceName = path.basename(pathToFile).split('.')[0];
        return VocabularyConfigurator.addSourcesToVocabulary(
            vocabulary, [createSource(sourceName, content)], options);
    }

    static addOntologyToVocabularyAsString(
        vocabulary: Vocabulary,
        sourceName: string,
        sourceContent: string,
        options: ConfiguratorOptions = {}
    ): Vocabulary {
        return VocabularyConfigurator.addSourcesToVocabulary(
            vocabulary, [createSource(sourceName, sourceContent)], options);
    }

    static addSourcesToVocabulary(
        vocabulary: Vocabulary,
        sources: Source[],
        options: ConfiguratorOptions = {}
    ): Vocabulary {
        // An update keeps the position of the source it replaces
        const updates = new Map(sources.map(s => [s.sourceName, s]));
        const merged = Object.values(vocabulary.sources).map(s => {
            const update = updates.get(s.sourceName);
            updates.delete(s.sourceName);
            return update ?? s;
        });
        return VocabularyConfigurator.rebuild(vocabulary, [...merged, ...updates.values()], options);
    }

    /**
     * Rebuild the vocabulary without the named source. Entities only that
     * source declared disappear, together with their settings.
     */
    static deleteSourceFromVocabulary(
        vocabulary: Vocabulary,
        sourceName: string,
        options: ConfiguratorOptions = {}
    ): Vocabulary {
        if (!Object.hasOwn(vocabulary.sources, sourceName)) {
            throw createGenericError(
                'SOURCE_NOT_FOUND',
                `Source '${sourceName}' is not part of the vocabulary`,
                { sourceName }
            );
        }
        const kept = Object.values(vocabulary.sources).filter(s => s.sourceName !== sourceName);
        return VocabularyConfigurator.rebuild(vocabulary, kept, options);
    }

    static getSourceNames(vocabulary: Vocabulary): string[] {
        return Object.keys(vocabulary.sources);
    }

    private static rebuild(
        vocabulary: Vocabulary,
        sources: Source[],
        options: ConfiguratorOptions
    ): Vocabulary {
        const newVocabulary = createVocabulary();
        const parser = new RdfParser(options);
        const steps = sources.length + 1;

        try {
            parser.parseSourcesIntoVocabulary(sources, newVocabulary, (source, i) => {
                options.onProgress?.((i + 1) / steps, `Parsed source '${source.sourceName}'`);
            });
            postProcessVocabulary(newVocabulary, vocabulary);
            options.onProgress?.(1, 'Post-processing complete');
        } catch (e) {
            throw createParsingException(e);
        }

        return newVocabulary;
    }
}
