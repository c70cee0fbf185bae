import { ConfigError } from "./errors.js";

export type CompletionProvider = "mistral" | "azure";

const COMPLETION_PROVIDERS: readonly CompletionProvider[] = ["mistral", "azure"];

export interface EmbeddingConfig {
    providerName: string;
    baseURL: string;
    apiKey?: string;
    model: string;
    batchSize: number;
    apiDelayMs: number;
}

export type CompletionConfig =
    | { provider: "mistral"; model: string; apiKey?: string; maxRetries: number; temperature: number }
    | {
        provider: "azure";
        resourceName: string;
        apiKey?: string;
        apiVersion?: string;
        deployment: string;
        maxRetries: number;
        temperature: number;
    };

export interface AppConfig {
    dataDir: string;
    singlePdfFile: string;
    /** Index built from every PDF in `dataDir`. */
    indexPath: string;
    /** Index built from `singlePdfFile` alone. */
    singleIndexPath: string;
    chunkSize: number;
    chunkOverlap: number;
    topK: number;
    maxConcurrentLoading: number;
    embedding: EmbeddingConfig;
    completion: CompletionConfig;
}

type Env = Record<string, string | undefined>;

const optional = (env: Env, name: string): string | undefined => {
    const value = env[name]?.trim();
    return value ? value : undefined;
};

const required = (env: Env, name: string): string => {
    const value = optional(env, name);
    if (value === undefined) {
        throw new ConfigError(`Missing required environment variable: ${name}`);
    }
    return value;
};

const integer = (env: Env, name: string, fallback: number, min: number): number => {
    const raw = optional(env, name);
    if (raw === undefined) {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
        const kind = min > 0 ? "a positive integer" : "a non-negative integer";
        throw new ConfigError(`${name} must be ${kind}, got "${raw}".`);
    }
    return value;
};

const decimal = (env: Env, name: string, fallback: number): number => {
    const raw = optional(env, name);
    if (raw === undefined) {
        return fallback;
    }
    const value = Number(raw);
    if (!Number.isFinite(value) || value < 0) {
        throw new ConfigError(`${name} must be a non-negative number, got "${raw}".`);
    }
    return value;
};

const isCompletionProvider = (value: string): value is CompletionProvider =>
    COMPLETION_PROVIDERS.some(provider => provider === value);

/**
 * Reads and validates configuration from environment variables, applying defaults.
 * @throws ConfigError on a missing required variable or an invalid value.
 */
export function loadConfig(env: Env = process.env): AppConfig {
    const chunkSize = integer(env, "CHUNK_SIZE", 1000, 1);
    const chunkOverlap = integer(env, "CHUNK_OVERLAP", 200, 0);
    if (chunkOverlap >= chunkSize) {
        throw new ConfigError(`CHUNK_OVERLAP (${chunkOverlap}) must be smaller than CHUNK_SIZE (${chunkSize}).`);
    }

    const providerName = (optional(env, "COMPLETION_PROVIDER") ?? "mistral").toLowerCase();
    if (!isCompletionProvider(providerName)) {
        throw new ConfigError(`Invalid COMPLETION_PROVIDER: ${providerName}. Must be one of ${COMPLETION_PROVIDERS.map(p => `'${p}'`).join(", ")}.`);
    }

    const maxRetries = integer(env, "COMPLETION_MAX_RETRIES", 2, 0);
    const temperature = decimal(env, "COMPLETION_TEMPERATURE", 0.2);

    const completion: CompletionConfig = providerName === "azure"
        ? {
            provider: "azure",
            resourceName: required(env, "AZURE_RESOURCE_NAME"),
            apiKey: optional(env, "AZURE_API_KEY"),
            apiVersion: optional(env, "AZURE_API_VERSION"),
            deployment: required(env, "AZURE_DEPLOYMENT"),
            maxRetries,
            temperature,
        }
        : {
            provider: "mistral",
            model: optional(env, "COMPLETION_MODEL") ?? "mistral-large-latest",
            apiKey: optional(env, "MISTRAL_API_KEY"),
            maxRetries,
            temperature,
        };

    return {
        dataDir: optional(env, "DATA_DIR") ?? "data",
        singlePdfFile: optional(env, "SINGLE_PDF_FILE") ?? "data/document.pdf",
        indexPath: optional(env, "INDEX_PATH") ?? "vectordb/vector_store_all.json",
        singleIndexPath: optional(env, "SINGLE_INDEX_PATH") ?? "vectordb/vector_store.json",
        chunkSize,
        chunkOverlap,
        topK: integer(env, "TOP_K", 10, 1),
        maxConcurrentLoading: integer(env, "MAX_CONCURRENT_LOADING", 1, 1),
        embedding: {
            providerName: optional(env, "EMBEDDING_PROVIDER_NAME") ?? "local",
            baseURL: optional(env, "EMBEDDING_PROVIDER_BASE_URL") ?? "http://localhost:8080/v1",
            apiKey: optional(env, "EMBEDDING_PROVIDER_API_KEY"),
            model: optional(env, "EMBEDDING_MODEL") ?? "sentence-transformers/all-mpnet-base-v2",
            batchSize: integer(env, "EMBEDDING_BATCH_SIZE", 32, 1),
            apiDelayMs: integer(env, "EMBEDDING_API_DELAY_MS", 0, 0),
        },
        completion,
    };
}

/**
 * Returns a warning when the completion credential is absent. The missing key is
 * not fatal at startup; requests fail later if the provider needs it.
 */
export function missingCredentialWarning(config: AppConfig): string | undefined {
    if (config.completion.apiKey) {
        return undefined;
    }
    const variable = config.completion.provider === "azure" ? "AZURE_API_KEY" : "MISTRAL_API_KEY";
    return `Warning: ${variable} not found in environment variables. Set it in your .env file or environment.`;
}
