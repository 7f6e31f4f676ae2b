export const RDF = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#';
export const RDFS = 'http://www.w3.org/2000/01/rdf-schema#';
export const OWL = 'http://www.w3.org/2002/07/owl#';
export const XSD = 'http://www.w3.org/2001/XMLSchema#';

export const TERMS = {
    type: `${RDF}type`,
    first: `${RDF}first`,
    rest: `${RDF}rest`,
    nil: `${RDF}nil`,

    rdfsClass: `${RDFS}Class`,
    subClassOf: `${RDFS}subClassOf`,
    subPropertyOf: `${RDFS}subPropertyOf`,
    domain: `${RDFS}domain`,
    range: `${RDFS}range`,
    label: `${RDFS}label`,
    comment: `${RDFS}comment`,

    owlClass: `${OWL}Class`,
    ontology: `${OWL}Ontology`,
    objectProperty: `${OWL}ObjectProperty`,
    datatypeProperty: `${OWL}DatatypeProperty`,
    namedIndividual: `${OWL}NamedIndividual`,
    functionalProperty: `${OWL}FunctionalProperty`,
    inverseFunctionalProperty: `${OWL}InverseFunctionalProperty`,
    transitiveProperty: `${OWL}TransitiveProperty`,
    symmetricProperty: `${OWL}SymmetricProperty`,
    asymmetricProperty: `${OWL}AsymmetricProperty`,
    reflexiveProperty: `${OWL}ReflexiveProperty`,
    irreflexiveProperty: `${OWL}IrreflexiveProperty`,
    equivalentClass: `${OWL}equivalentClass`,
    inverseOf: `${OWL}inverseOf`,

    onProperty: `${OWL}onProperty`,
    onClass: `${OWL}onClass`,
    onDataRange: `${OWL}onDataRange`,
    someValuesFrom: `${OWL}someValuesFrom`,
    allValuesFrom: `${OWL}allValuesFrom`,
    hasValue: `${OWL}hasValue`,
    minCardinality: `${OWL}minCardinality`,
    maxCardinality: `${OWL}maxCardinality`,
    cardinality: `${OWL}cardinality`,
    minQualifiedCardinality: `${OWL}minQualifiedCardinality`,
    maxQualifiedCardinality: `${OWL}maxQualifiedCardinality`,
    qualifiedCardinality: `${OWL}qualifiedCardinality`,
    unionOf: `${OWL}unionOf`,
    intersectionOf: `${OWL}intersectionOf`,
    complementOf: `${OWL}complementOf`,
} as const;

const BUILTIN_NAMESPACES = [RDF, RDFS, OWL, XSD];

/**
 * True for IRIs of the RDF, RDFS, OWL and XSD vocabularies themselves
 */
export function isBuiltinIri(iri: string): boolean {
    return BUILTIN_NAMESPACES.some(ns => iri.startsWith(ns));
}

/**
 * Local name of an IRI: the part after the last '#' or '/'
 */
export function iriFragment(iri: string): string {
    const idx = Math.max(iri.lastIndexOf('#'), iri.lastIndexOf('/'));
    return idx > -1 && idx < iri.length - 1 ? iri.substring(idx + 1) : iri;
}
