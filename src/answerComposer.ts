import { LanguageModel, generateText } from "ai";
import { GenerationError, errorMessage } from "./errors.js";
import { SYSTEM_PROMPT } from "./systemPrompt.js";
import { SearchResult } from "./vectorIndex.js";

export interface AnswerComposerOptions {
    /** Retries performed by the AI SDK for retryable API errors. */
    maxRetries?: number;
    temperature?: number;
    systemPrompt?: string;
}

/**
 * Turns retrieved chunks and a question into a grounded answer from a language model.
 */
export class AnswerComposer {
    private systemPrompt: string;

    constructor(private llm: LanguageModel, private options: AnswerComposerOptions = {}) {
        this.systemPrompt = options.systemPrompt ?? SYSTEM_PROMPT;
    }

    /** Raw chunk texts in retrieval order, one per line. */
    buildContextBlock(results: readonly SearchResult[]): string {
        return results.map(result => result.entry.text).join("\n");
    }

    buildUserPrompt(question: string, contextBlock: string): string {
        return `**Document Context:**
${contextBlock}

**Question:** ${question}

Please provide a comprehensive answer based on the document content above.`;
    }

    /**
     * Sends the question with its context to the model and returns the generated text unchanged.
     * @throws GenerationError if the completion request fails.
     */
    async compose(question: string, results: readonly SearchResult[]): Promise<string> {
        const prompt = this.buildUserPrompt(question, this.buildContextBlock(results));
        try {
            const response = await generateText({
                model: this.llm,
                system: this.systemPrompt,
                prompt,
                maxRetries: this.options.maxRetries,
                temperature: this.options.temperature,
            });
            return response.text;
        } catch (error) {
            throw new GenerationError(`Answer generation failed: ${errorMessage(error)}`, { cause: error });
        }
    }
}
