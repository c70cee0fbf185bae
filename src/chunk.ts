/**
 * Provenance of a chunk within its source page.
 */
export interface ChunkMetadata {
  /** Base name of the originating PDF. */
  readonly sourceFile: string;
  /** Path the PDF was read from. */
  readonly sourcePath: string;
  /** 1-based page number. */
  readonly pageNumber: number;
  /** Offset of the first character of the chunk within the page text. */
  readonly startOffset: number;
  /** Offset one past the last character of the chunk. */
  readonly endOffset: number;
  /** 0-based position of the chunk within its page. */
  readonly chunkIndex: number;
}

/**
 * A single chunk of text extracted from a document page.
 */
export interface Chunk {
  /** Exact substring of the page text. */
  readonly text: string;
  readonly metadata: ChunkMetadata;
}

/** A chunk paired with its embedding vector. */
export interface EmbeddedChunk extends Chunk {
  readonly vector: readonly number[];
}
