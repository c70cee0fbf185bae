/**
 * Error taxonomy for ingestion and question answering.
 * Every error raised on purpose by the assistant extends {@link AssistantError},
 * so callers can separate expected failures from programming errors.
 */
export class AssistantError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** A path given for ingestion, or a persisted index to load, does not exist. */
export class NotFoundError extends AssistantError {
    constructor(readonly path: string, what: string = "Path") {
        super(`${what} not found: ${path}`);
    }
}

/** No matching documents were found, or none could be processed. */
export class EmptyInputError extends AssistantError {}

/** The embedding or completion model could not be initialised. Fatal. */
export class ModelLoadError extends AssistantError {}

/** A query matched nothing. Reported to the user; the session continues. */
export class RetrievalEmptyError extends AssistantError {
    constructor(message: string = "No relevant information found in the document for your question.") {
        super(message);
    }
}

/** The completion request failed. Reported to the user; the session continues. */
export class GenerationError extends AssistantError {}

/** A persisted index file could not be parsed or does not match the expected layout. */
export class IndexFormatError extends AssistantError {}

/** A persisted index was built with a different embedding model than the one in use. */
export class IndexMismatchError extends AssistantError {
    constructor(readonly indexModel: string, readonly activeModel: string) {
        super(
            `Index was built with embedding model '${indexModel}' but '${activeModel}' is configured. ` +
            `Re-run ingestion with the current model.`
        );
    }
}

/** A vector's length differs from the dimensionality of the index. */
export class DimensionMismatchError extends AssistantError {
    constructor(readonly expected: number, readonly actual: number) {
        super(`Vector dimensionality mismatch: expected ${expected}, got ${actual}.`);
    }
}

/** Invalid or missing configuration. */
export class ConfigError extends AssistantError {}

/** Normalises an unknown thrown value into a message string. */
export const errorMessage = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);
