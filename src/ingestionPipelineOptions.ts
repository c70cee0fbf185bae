import { Chunker } from "./chunker.js";
import { EmbeddingService } from "./embeddingService.js";
import { PdfLoader } from "./pdfLoader.js";

/**
 * Dependencies injected into the IngestionPipeline.
 */
export interface IngestionPipelineOptions {
    /** Reads PDF files into pages. */
    loader: PdfLoader;
    /** Splits pages into overlapping chunks. */
    chunker: Chunker;
    /** Generates chunk embeddings; its model identity is recorded in the index. */
    embeddingService: EmbeddingService;
}
