#!/usr/bin/env node
import { addCommand, buildCommand, removeCommand, summaryCommand } from './commands.js';
import type { ConfiguratorOptions } from './types/options.js';

const VERSION = '0.3.0';
const HELP = `
ngsi-semantics v${VERSION}

Usage:
  ngsi-semantics build <out.json> <file.ttl...>   Create a vocabulary from ontology files
  ngsi-semantics add <vocab.json> <file.ttl>      Add or replace an ontology source
  ngsi-semantics remove <vocab.json> <source>     Remove a source and rebuild
  ngsi-semantics summary <vocab.json>             Show sources, counts and missing dependencies

Options:
  --format=<mime>    RDF serialization (default: text/turtle)
  --quiet, -q        Do not print skipped statements
  --help, -h         Show this help
  --version, -v      Show version
`;

const args = process.argv.slice(2);
const quiet = args.includes('--quiet') || args.includes('-q');

let format: string | undefined;
const cleanArgs: string[] = [];

for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--format=')) {
        format = arg.split('=')[1];
    } else if (arg === '--format') {
        if (i + 1 < args.length) {
            format = args[i + 1];
            i++;
        }
    } else if (!arg.startsWith('-')) {
        cleanArgs.push(arg);
    }
}

const [commandName, target, ...rest] = cleanArgs;

function run(): string | undefined {
    if (args.includes('--version') || args.includes('-v')) {
        return VERSION;
    }
    if (args.includes('--help') || args.includes('-h') || !commandName) {
        return HELP;
    }
    if (!target) {
        throw new Error(`'${commandName}' needs a vocabulary file argument`);
    }

    const options: ConfiguratorOptions = {
        format,
        onWarning: quiet ? () => undefined : (message) => console.warn(message),
        onProgress: (_progress, message) => {
            if (!quiet) console.error(message);
        },
    };

    switch (commandName) {
        case 'build':
            if (rest.length === 0) throw new Error('build needs at least one ontology file');
            return buildCommand(target, rest, options);
        case 'add':
            if (rest.length !== 1) throw new Error('add needs exactly one ontology file');
            return addCommand(target, rest[0], options);
        case 'remove':
            if (rest.length !== 1) throw new Error('remove needs exactly one source name');
            return removeCommand(target, rest[0], options);
        case 'summary':
            return summaryCommand(target);
        default:
            throw new Error(`Unknown command: ${commandName}`);
    }
}

try {
    const output = run();
    if (output) console.log(output);
} catch (e) {
    console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
    process.exit(1);
}
