import { describe, it, expect } from "vitest";
import { MockEmbeddingModelV1 } from "ai/test";
import { EmbeddingService } from "./embeddingService.js";
import { ModelLoadError } from "./errors.js";
import { keywordEmbeddingModel } from "./testing/fakes.js";

const VOCABULARY = ["alpha", "beta", "gamma"];
const noWait = { maxRetries: 2, wait: async () => {} };

describe("EmbeddingService", () => {
    it("embeds identical text to identical vectors", async () => {
        const { model } = keywordEmbeddingModel(VOCABULARY);
        const service = new EmbeddingService(model, 8, 0, noWait);

        const [first, second] = await service.embedTexts(["alpha beta beta", "alpha beta beta"]);
        const query = await service.embedQuery("alpha beta beta");

        expect(first).toEqual([1, 2, 0]);
        expect(second).toEqual(first);
        expect(query).toEqual(first);
    });

    it("sends texts in batches of the configured size, preserving order", async () => {
        const { model, calls } = keywordEmbeddingModel(VOCABULARY);
        const service = new EmbeddingService(model, 2, 0, noWait);

        const vectors = await service.embedTexts(["alpha", "beta", "gamma", "alpha alpha", "beta gamma"]);

        expect(calls).toEqual([["alpha", "beta"], ["gamma", "alpha alpha"], ["beta gamma"]]);
        expect(vectors).toEqual([[1, 0, 0], [0, 1, 0], [0, 0, 1], [2, 0, 0], [0, 1, 1]]);
    });

    it("makes no call for an empty input", async () => {
        const { model, calls } = keywordEmbeddingModel(VOCABULARY);

        expect(await new EmbeddingService(model).embedTexts([])).toEqual([]);
        expect(calls).toHaveLength(0);
    });

    it("retries a failed batch", async () => {
        let attempts = 0;
        const model = new MockEmbeddingModelV1<string>({
            maxEmbeddingsPerCall: 100,
            doEmbed: async ({ values }) => {
                attempts++;
                if (attempts === 1) {
                    throw new Error("connection reset");
                }
                return { embeddings: values.map(() => [0.5, 0.5]) };
            },
        });
        const service = new EmbeddingService(model, 10, 0, noWait);

        expect(await service.embedTexts(["x", "y"])).toEqual([[0.5, 0.5], [0.5, 0.5]]);
        expect(attempts).toBe(2);
    });

    it("reports the model identity as provider and model id", () => {
        const { model } = keywordEmbeddingModel(VOCABULARY);

        expect(new EmbeddingService(model).modelIdentity).toBe("test:keywords");
    });

    it("probes the model for its dimensionality", async () => {
        const { model } = keywordEmbeddingModel(VOCABULARY);

        expect(await new EmbeddingService(model, 8, 0, noWait).probe()).toBe(3);
    });

    it("turns a probe failure into a ModelLoadError", async () => {
        const model = new MockEmbeddingModelV1<string>({
            doEmbed: async () => {
                throw new Error("model server unreachable");
            },
        });
        const service = new EmbeddingService(model, 8, 0, { maxRetries: 1 });

        const probe = service.probe();

        await expect(probe).rejects.toBeInstanceOf(ModelLoadError);
        await expect(probe).rejects.toThrow(/model server unreachable/);
    });

    it("rejects a non-positive batch size", () => {
        const { model } = keywordEmbeddingModel(VOCABULARY);

        expect(() => new EmbeddingService(model, 0)).toThrow(RangeError);
    });
});
