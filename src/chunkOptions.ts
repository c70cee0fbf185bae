/**
 * Size parameters for splitting page text into chunks.
 */
export interface ChunkingOptions {
  /** Maximum chunk length in characters. */
  chunkSize: number;
  /** Number of characters shared by consecutive chunks of the same page. Must be smaller than `chunkSize`. */
  chunkOverlap: number;
}

export const DEFAULT_CHUNKING_OPTIONS: ChunkingOptions = {
  chunkSize: 1000,
  chunkOverlap: 200,
};

/**
 * Break points tried in order when a window has to be cut:
 * paragraph, line, sentence, word.
 */
export const SEPARATOR_GROUPS: readonly (readonly string[])[] = [
  ["\n\n"],
  ["\n"],
  [". ", "! ", "? "],
  [" "],
];
