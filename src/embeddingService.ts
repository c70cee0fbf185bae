import { EmbeddingModel, embed, embedMany } from "ai";
import { ModelLoadError, errorMessage } from "./errors.js";
import { retry } from "./retry.js";
import { RetryOptions } from "./retryOptions.js";
import { sleep } from "./utilities.js";

const PROBE_TEXT = "embedding model probe";

/**
 * Turns text into vectors with one embedding model. Chunk texts go out in
 * batches with an optional pause between them; every request is retried.
 */
export class EmbeddingService {
    /**
     * @param batchSize Texts sent per embedding request.
     * @param apiDelayMs Pause between consecutive batches.
     */
    constructor(
        private embeddingModel: EmbeddingModel<string>,
        private batchSize: number = 32,
        private apiDelayMs: number = 0,
        private retryOptions: Partial<RetryOptions> = { maxRetries: 3, initialDelay: 1000 }
    ) {
        if (!Number.isInteger(batchSize) || batchSize <= 0) {
            throw new RangeError(`batchSize must be a positive integer, got ${batchSize}.`);
        }
    }

    /**
     * Identifies the model that produced the vectors, as `<provider>:<modelId>`.
     * Stored alongside a persisted index so that it is only ever queried with the same model.
     */
    get modelIdentity(): string {
        return `${this.embeddingModel.provider}:${this.embeddingModel.modelId}`;
    }

    /**
     * Embeds a fixed probe text to confirm the model is reachable and learn its dimensionality.
     * @throws ModelLoadError if the model cannot produce an embedding.
     */
    async probe(): Promise<number> {
        console.log(`Initializing embedding model ${this.modelIdentity}...`);
        try {
            const vector = await this.embedQuery(PROBE_TEXT);
            if (vector.length === 0) {
                throw new Error("model returned an empty vector");
            }
            console.log(`Embedding model ready (${vector.length} dimensions).`);
            return vector.length;
        } catch (error) {
            throw new ModelLoadError(
                `Failed to initialize embedding model ${this.modelIdentity}: ${errorMessage(error)}`,
                { cause: error }
            );
        }
    }

    /** Embeds a single query text. */
    async embedQuery(text: string): Promise<number[]> {
        const { embedding } = await this.withRetry("query embedding", () =>
            embed({ model: this.embeddingModel, value: text, maxRetries: 0 })
        );
        return embedding;
    }

    /**
     * Embeds texts in batches of `batchSize`, one vector per text, in input order.
     * A batch that still fails after its retries aborts the whole call.
     */
    async embedTexts(texts: readonly string[]): Promise<number[][]> {
        if (texts.length === 0) {
            return [];
        }

        const totalBatches = Math.ceil(texts.length / this.batchSize);
        console.log(`Embedding ${texts.length} chunks in ${totalBatches} batches of up to ${this.batchSize}...`);
        const vectors: number[][] = [];

        for (let batch = 0; batch < totalBatches; batch++) {
            const values = texts.slice(batch * this.batchSize, (batch + 1) * this.batchSize);
            const label = `batch ${batch + 1}/${totalBatches}`;
            console.log(`Embedding ${label} (${values.length} texts)...`);

            try {
                const { embeddings } = await this.withRetry(label, async () => {
                    const response = await embedMany({ model: this.embeddingModel, values, maxRetries: 0 });
                    if (response.embeddings.length !== values.length) {
                        throw new Error(`expected ${values.length} embeddings, got ${response.embeddings.length}`);
                    }
                    return response;
                });
                vectors.push(...embeddings);
            } catch (error) {
                console.error(`Embedding ${label} failed: ${errorMessage(error)}. Aborting.`);
                throw error;
            }

            if (this.apiDelayMs > 0 && batch < totalBatches - 1) {
                await sleep(this.apiDelayMs);
            }
        }

        console.log(`Generated ${vectors.length} embeddings.`);
        return vectors;
    }

    private withRetry<T>(label: string, operation: () => Promise<T>): Promise<T> {
        return retry(operation, {
            ...this.retryOptions,
            onRetry: (error, attempt) => {
                console.warn(`Retry attempt ${attempt} for ${label}: ${error.message}`);
            },
        });
    }
}
