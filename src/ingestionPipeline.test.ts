import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { join } from "path";
import { Chunker } from "./chunker.js";
import { EmbeddingService } from "./embeddingService.js";
import { EmptyInputError } from "./errors.js";
import { IngestionPipeline } from "./ingestionPipeline.js";
import { PdfLoader } from "./pdfLoader.js";
import { Retriever } from "./retriever.js";
import { VectorIndex } from "./vectorIndex.js";
import { formFeedExtractor, keywordEmbeddingModel, makeTempDir, removeDir, writeFakePdf } from "./testing/fakes.js";
import { fsExists } from "./utilities.js";

const VOCABULARY = ["volcano", "lava", "island", "chocolate", "cake", "flour", "sugar", "alpha", "beta", "gamma"];

describe("IngestionPipeline", () => {
    let dir: string;
    let indexPath: string;

    beforeEach(async () => {
        dir = await makeTempDir();
        indexPath = join(dir, "vectordb", "index.json");
    });

    afterEach(async () => {
        await removeDir(dir);
    });

    function pipeline(chunkSize = 1000, chunkOverlap = 200) {
        const embedding = keywordEmbeddingModel(VOCABULARY);
        const embeddingService = new EmbeddingService(embedding.model, 2, 0, { maxRetries: 1 });
        return {
            embeddingService,
            calls: embedding.calls,
            pipeline: new IngestionPipeline({
                loader: new PdfLoader(formFeedExtractor),
                chunker: new Chunker({ chunkSize, chunkOverlap }),
                embeddingService,
            }),
        };
    }

    it("indexes one chunk per short page with page provenance", async () => {
        const pdf = await writeFakePdf(dir, "doc.pdf", ["Page 1: Alpha.", "Page 2: Beta.", "Page 3: Gamma."]);

        const { index, summary } = await pipeline(20, 5).pipeline.run(pdf, indexPath);

        expect(summary).toMatchObject({ processedFiles: ["doc.pdf"], failedFiles: [], pageCount: 3, chunkCount: 3, indexPath });
        expect(summary.entryIds).toHaveLength(3);
        expect(index.entries().map(e => [e.metadata.pageNumber, e.metadata.startOffset, e.metadata.endOffset])).toEqual([
            [1, 0, 14],
            [2, 0, 13],
            [3, 0, 14],
        ]);
        expect(index.entries().map(e => e.vector)).toEqual([
            [0, 0, 0, 0, 0, 0, 0, 1, 0, 0],
            [0, 0, 0, 0, 0, 0, 0, 0, 1, 0],
            [0, 0, 0, 0, 0, 0, 0, 0, 0, 1],
        ]);
    });

    it("splits a long page into overlapping chunks", async () => {
        const pdf = await writeFakePdf(dir, "doc.pdf", ["Page 1: Alpha. Page 2: Beta. Page 3: Gamma."]);

        const { index } = await pipeline(20, 5).pipeline.run(pdf, indexPath);

        expect(index.entries().map(e => [e.metadata.startOffset, e.metadata.endOffset])).toEqual([[0, 15], [10, 29], [24, 43]]);
        expect(index.entries().map(e => e.text)).toEqual(["Page 1: Alpha. ", "pha. Page 2: Beta. ", "eta. Page 3: Gamma."]);
    });

    it("builds an index whose nearest chunk answers the question", async () => {
        await writeFakePdf(dir, "A.pdf", ["The volcano erupted and lava flowed across the island."]);
        await writeFakePdf(dir, "B.pdf", ["The chocolate cake recipe needs flour and sugar."]);
        const { pipeline: ingestion, embeddingService } = pipeline();

        await ingestion.run(dir, indexPath);
        const loaded = await VectorIndex.load(indexPath, { embeddingModel: embeddingService.modelIdentity });
        const outcome = await new Retriever(embeddingService, loaded, 1).retrieve("Where did the lava from the volcano flow?");

        expect(loaded.size).toBe(2);
        expect(outcome.status).toBe("found");
        if (outcome.status === "found") {
            expect(outcome.results).toHaveLength(1);
            expect(outcome.results[0].entry.metadata.sourceFile).toBe("A.pdf");
        }
    });

    it("embeds chunk texts in batches", async () => {
        const pdf = await writeFakePdf(dir, "doc.pdf", ["alpha", "beta", "gamma"]);
        const { pipeline: ingestion, calls } = pipeline();

        await ingestion.run(pdf, indexPath);

        expect(calls).toEqual([["alpha", "beta"], ["gamma"]]);
    });

    it("skips unreadable files and reports them", async () => {
        await writeFakePdf(dir, "good.pdf", ["alpha"]);
        await writeFakePdf(dir, "bad.pdf", ["CORRUPT"]);

        const { summary } = await pipeline().pipeline.run(dir, indexPath);

        expect(summary.processedFiles).toEqual(["good.pdf"]);
        expect(summary.failedFiles).toEqual([{ file: "bad.pdf", error: "Invalid PDF structure" }]);
        expect(summary.chunkCount).toBe(1);
    });

    it("fails without writing an index when every file is unreadable", async () => {
        await writeFakePdf(dir, "bad.pdf", ["CORRUPT"]);

        await expect(pipeline().pipeline.run(dir, indexPath)).rejects.toThrow("No documents were successfully processed.");
        expect(await fsExists(indexPath)).toBe(false);
    });

    it("fails when the documents contain no text", async () => {
        const pdf = await writeFakePdf(dir, "scan.pdf", ["   ", ""]);

        const attempt = pipeline().pipeline.run(pdf, indexPath);

        await expect(attempt).rejects.toBeInstanceOf(EmptyInputError);
        await expect(attempt).rejects.toThrow("No text could be extracted from 2 pages.");
    });
});
