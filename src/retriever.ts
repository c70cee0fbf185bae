import { EmbeddingService } from "./embeddingService.js";
import { RetrievalEmptyError } from "./errors.js";
import { SearchResult, VectorIndex } from "./vectorIndex.js";

export const DEFAULT_TOP_K = 10;

export type RetrievalOutcome =
    | { status: "found"; results: SearchResult[] }
    | { status: "empty"; error: RetrievalEmptyError };

/**
 * Finds the chunks most similar to a query. "Nothing found" is a normal outcome,
 * returned as `status: "empty"` rather than thrown.
 */
export class Retriever {
    constructor(
        private embeddingService: EmbeddingService,
        private index: VectorIndex,
        readonly topK: number = DEFAULT_TOP_K
    ) {
        if (!Number.isInteger(topK) || topK <= 0) {
            throw new RangeError(`topK must be a positive integer, got ${topK}.`);
        }
    }

    async retrieve(query: string): Promise<RetrievalOutcome> {
        if (this.index.size === 0) {
            return { status: "empty", error: new RetrievalEmptyError() };
        }

        const queryVector = await this.embeddingService.embedQuery(query);
        const results = this.index.search(queryVector, this.topK);
        if (results.length === 0) {
            return { status: "empty", error: new RetrievalEmptyError() };
        }
        return { status: "found", results };
    }
}
