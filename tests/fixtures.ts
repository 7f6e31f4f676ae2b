/**
 * Shared ontology fixtures for the vocabulary tests.
 */
import * as path from 'path';

export const ZOO = 'http://example.org/zoo#';
export const BUILDING = 'http://example.org/building#';
export const XSD = 'http://www.w3.org/2001/XMLSchema#';

export const zoo = (local: string): string => `${ZOO}${local}`;
export const building = (local: string): string => `${BUILDING}${local}`;

export const FIXTURE_DIR = path.join(__dirname, 'fixtures');
export const BUILDING_FILE = path.join(FIXTURE_DIR, 'building.ttl');
export const PETS_FILE = path.join(FIXTURE_DIR, 'pets.ttl');

const PREFIXES = `@prefix : <${ZOO}> .
@prefix owl: <http://www.w3.org/2002/07/owl#> .
@prefix rdfs: <http://www.w3.org/2000/01/rdf-schema#> .
@prefix xsd: <${XSD}> .
`;

/** Prepends the zoo prefixes to a Turtle body */
export const turtle = (body: string): string => `${PREFIXES}\n${body}\n`;

// === Common sources ===
export const SOURCES = {
    animal: turtle(':Animal a owl:Class .'),
    dog: turtle(':Dog rdfs:subClassOf :Animal .'),
    plant: turtle(':Plant a owl:Class ; rdfs:label "Plant" .'),
    animalAndCat: turtle(`
:Animal a owl:Class .
:Cat a owl:Class ; rdfs:subClassOf :Animal .`),
    feeding: turtle(`
:eats a owl:ObjectProperty ;
    rdfs:domain :Animal ;
    rdfs:range :Plant .
:weight a owl:DatatypeProperty ;
    rdfs:range xsd:decimal .`),
    cycle: turtle(`
:A rdfs:subClassOf :B .
:B rdfs:subClassOf :A .`),
    malformed: 'this is not turtle',
};

/**
 * Runs `fn`, asserts it throws an instance of `type` and returns the error
 */
export function expectError<T extends Error>(fn: () => unknown, type: new (...args: never[]) => T): T {
    let caught: unknown;
    try {
        fn();
    } catch (e) {
        caught = e;
    }
    expect(caught).toBeInstanceOf(type);
    if (!(caught instanceof type)) {
        throw new Error(`Expected ${type.name} to be thrown`);
    }
    return caught;
}
