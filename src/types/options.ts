export interface ParserOptions {
    /** RDF serialization handed to the n3 parser */
    format?: string;
    /**
     * Called for statements that are skipped, e.g. a domain on a
     * property no source declares. Defaults to console.warn.
     */
    onWarning?: (message: string) => void;
}

export interface ConfiguratorOptions extends ParserOptions {
    /**
     * Callback for progress updates.
     * @param progress A number between 0 and 1.
     * @param message A descriptive message about the current step.
     */
    onProgress?: (progress: number, message: string) => void;
}

export const DEFAULTS = {
    format: 'text/turtle',
    included: true,
    fieldType: 'simple',
} as const;
