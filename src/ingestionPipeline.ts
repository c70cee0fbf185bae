import { EmbeddedChunk } from "./chunk.js";
import { EmptyInputError, errorMessage } from "./errors.js";
import { IngestionPipelineOptions } from "./ingestionPipelineOptions.js";
import { FailedFile } from "./pdfLoader.js";
import { VectorIndex } from "./vectorIndex.js";

export interface IngestionSummary {
    processedFiles: string[];
    failedFiles: FailedFile[];
    pageCount: number;
    chunkCount: number;
    /** Identifiers assigned by the index, one per chunk. */
    entryIds: string[];
    indexPath: string;
}

/**
 * Builds a vector index from PDF files and saves it: load, chunk, embed, insert, save.
 */
export class IngestionPipeline {
    private options: IngestionPipelineOptions;

    constructor(options: IngestionPipelineOptions) {
        this.options = options;
    }

    /**
     * Ingests a PDF file or a directory of PDFs into a new index written to `indexPath`.
     * @returns The built index and a summary of the run.
     * @throws EmptyInputError if no page could be loaded.
     */
    async run(inputPath: string, indexPath: string): Promise<{ index: VectorIndex; summary: IngestionSummary }> {
        console.log(`Starting ingestion from: ${inputPath}`);
        try {
            // 1. Read every PDF into pages; unreadable files are skipped by the loader
            const { pages, processedFiles, failedFiles } = await this.options.loader.load(inputPath);
            if (pages.length === 0) {
                throw new EmptyInputError("No documents were successfully processed.");
            }

            // 2. Split pages into overlapping chunks
            const chunks = this.options.chunker.chunkPages(pages);
            if (chunks.length === 0) {
                throw new EmptyInputError(`No text could be extracted from ${pages.length} pages.`);
            }

            // 3. Embed all chunk texts in batches
            const vectors = await this.options.embeddingService.embedTexts(chunks.map(chunk => chunk.text));
            const embedded: EmbeddedChunk[] = chunks.map((chunk, i) => ({ ...chunk, vector: vectors[i] }));

            // 4. Build a fresh index tied to the embedding model and persist it
            const index = new VectorIndex(this.options.embeddingService.modelIdentity);
            const entryIds = index.insert(embedded);
            console.log(`Added ${entryIds.length} document chunks to the vector index.`);
            await index.save(indexPath);

            console.log(`Ingestion completed successfully. Processed files: ${processedFiles.join(", ")}`);
            return {
                index,
                summary: {
                    processedFiles,
                    failedFiles,
                    pageCount: pages.length,
                    chunkCount: chunks.length,
                    entryIds,
                    indexPath,
                },
            };
        } catch (error) {
            console.error("Ingestion failed:", errorMessage(error));
            throw error;
        }
    }
}
