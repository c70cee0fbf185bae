import { createAzure } from "@ai-sdk/azure";
import { createMistral } from "@ai-sdk/mistral";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import { EmbeddingModel, LanguageModel } from "ai";
import { CompletionConfig, EmbeddingConfig } from "./config.js";
import { ModelLoadError, errorMessage } from "./errors.js";

/**
 * Embedding model served by a locally hosted, OpenAI-compatible endpoint
 * (e.g. a text-embeddings-inference or Ollama server).
 */
export function createEmbeddingModel(config: EmbeddingConfig): EmbeddingModel<string> {
    try {
        const provider = createOpenAICompatible({
            name: config.providerName,
            baseURL: config.baseURL,
            apiKey: config.apiKey,
        });
        return provider.textEmbeddingModel(config.model);
    } catch (error) {
        throw new ModelLoadError(`Could not create embedding model ${config.model}: ${errorMessage(error)}`, { cause: error });
    }
}

export function createCompletionModel(config: CompletionConfig): LanguageModel {
    try {
        switch (config.provider) {
            case "mistral":
                return createMistral({ apiKey: config.apiKey })(config.model);
            case "azure":
                return createAzure({
                    resourceName: config.resourceName,
                    apiKey: config.apiKey,
                    apiVersion: config.apiVersion,
                })(config.deployment);
        }
    } catch (error) {
        throw new ModelLoadError(`Could not create ${config.provider} completion model: ${errorMessage(error)}`, { cause: error });
    }
}
