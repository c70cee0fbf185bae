import { AnswerComposer } from "./answerComposer.js";
import { ChunkMetadata } from "./chunk.js";
import { GenerationError, RetrievalEmptyError } from "./errors.js";
import { Retriever } from "./retriever.js";

/** Where a piece of the answer's context came from. */
export interface SourceReference {
    sourceFile: string;
    pageNumber: number;
    score: number;
}

export type AskOutcome =
    | { status: "answered"; answer: string; sources: SourceReference[] }
    | { status: "no-results"; error: RetrievalEmptyError }
    | { status: "failed"; error: GenerationError };

/** Anything that can answer a question; the chat session depends only on this. */
export interface QuestionAnswerer {
    ask(question: string): Promise<AskOutcome>;
}

/**
 * Session-wide context built once at startup: the retriever over the loaded
 * index and the answer composer, passed by reference to whoever needs them.
 */
export class DocumentAssistant implements QuestionAnswerer {
    constructor(
        private retriever: Retriever,
        private composer: AnswerComposer
    ) {}

    async ask(question: string): Promise<AskOutcome> {
        console.log("Searching document...");
        const retrieval = await this.retriever.retrieve(question);
        if (retrieval.status === "empty") {
            return { status: "no-results", error: retrieval.error };
        }

        console.log("Analyzing and generating response...");
        try {
            const answer = await this.composer.compose(question, retrieval.results);
            return { status: "answered", answer, sources: summarizeSources(retrieval.results.map(r => ({ ...r.entry.metadata, score: r.score }))) };
        } catch (error) {
            if (error instanceof GenerationError) {
                return { status: "failed", error };
            }
            throw error;
        }
    }
}

/**
 * Collapses retrieved chunks to one reference per file and page, keeping the
 * best score and the order of first appearance.
 */
export function summarizeSources(hits: ReadonlyArray<Pick<ChunkMetadata, "sourceFile" | "pageNumber"> & { score: number }>): SourceReference[] {
    const byKey = new Map<string, SourceReference>();
    for (const hit of hits) {
        const key = `${hit.sourceFile}#${hit.pageNumber}`;
        const existing = byKey.get(key);
        if (!existing) {
            byKey.set(key, { sourceFile: hit.sourceFile, pageNumber: hit.pageNumber, score: hit.score });
        } else if (hit.score > existing.score) {
            existing.score = hit.score;
        }
    }
    return [...byKey.values()];
}
