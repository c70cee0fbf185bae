import { Chunk } from "./chunk.js";
import { ChunkingOptions, DEFAULT_CHUNKING_OPTIONS, SEPARATOR_GROUPS } from "./chunkOptions.js";
import { DocumentPage } from "./documentPage.js";

/**
 * Splits page text into overlapping windows that prefer to end on paragraph,
 * line, sentence or word boundaries before falling back to a hard cut.
 *
 * Every chunk is an exact substring of its page, and consecutive chunks of one
 * page share `chunkOverlap` characters, so the page text can be rebuilt from its
 * chunks. Offsets count UTF-16 code units and never fall inside a surrogate
 * pair; where one would, the cut moves by one unit. Output depends only on the
 * input text and the options.
 */
export class Chunker {
    private options: ChunkingOptions;

    /**
     * @param options Overrides for the default size (1000) and overlap (200).
     */
    constructor(options: Partial<ChunkingOptions> = {}) {
        this.options = { ...DEFAULT_CHUNKING_OPTIONS, ...options };
        const { chunkSize, chunkOverlap } = this.options;
        if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
            throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}.`);
        }
        if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
            throw new RangeError(`chunkOverlap must be an integer in [0, ${chunkSize}), got ${chunkOverlap}.`);
        }
    }

    get chunkSize(): number {
        return this.options.chunkSize;
    }

    get chunkOverlap(): number {
        return this.options.chunkOverlap;
    }

    /**
     * Chunks every page in order. Pages with blank text produce no chunks.
     */
    chunkPages(pages: readonly DocumentPage[]): Chunk[] {
        console.log(`Splitting ${pages.length} pages into chunks (size ${this.chunkSize}, overlap ${this.chunkOverlap})...`);
        const chunks = pages.flatMap(page => this.chunkPage(page));
        console.log(`Created ${chunks.length} chunks from ${pages.length} pages.`);
        return chunks;
    }

    /** Chunks a single page, carrying its source metadata onto each chunk. */
    chunkPage(page: DocumentPage): Chunk[] {
        return this.split(page.text).map(([startOffset, endOffset], chunkIndex) => ({
            text: page.text.slice(startOffset, endOffset),
            metadata: {
                sourceFile: page.sourceFile,
                sourcePath: page.sourcePath,
                pageNumber: page.pageNumber,
                startOffset,
                endOffset,
                chunkIndex,
            },
        }));
    }

    /**
     * Computes `[start, end)` spans for the given text.
     */
    split(text: string): Array<[number, number]> {
        if (text.trim().length === 0) {
            return [];
        }

        const spans: Array<[number, number]> = [];
        let start = 0;
        while (text.length - start > this.chunkSize) {
            const end = this.findBreak(text, start);
            spans.push([start, end]);
            start = this.nextStart(text, start, end);
        }
        spans.push([start, text.length]);
        return spans;
    }

    /**
     * Finds the end of the window starting at `start`. A break must leave the
     * next window starting after `start`, so it has to lie past the overlap.
     */
    private findBreak(text: string, start: number): number {
        const lowest = start + this.chunkOverlap;
        const highest = start + this.chunkSize;

        for (const group of SEPARATOR_GROUPS) {
            let best = -1;
            for (const separator of group) {
                const index = text.lastIndexOf(separator, highest - separator.length);
                if (index === -1 || index < start) continue;
                const candidate = index + separator.length;
                if (candidate > lowest && candidate <= highest && candidate > best) {
                    best = candidate;
                }
            }
            if (best !== -1) {
                return best;
            }
        }

        if (splitsSurrogatePair(text, highest)) {
            return highest - 1 > lowest ? highest - 1 : highest + 1;
        }
        return highest;
    }

    /** Start of the window after `[start, end)`, widening the overlap to keep a surrogate pair whole. */
    private nextStart(text: string, start: number, end: number): number {
        const next = end - this.chunkOverlap;
        if (!splitsSurrogatePair(text, next)) {
            return next;
        }
        return next - 1 > start ? next - 1 : next + 1;
    }
}

/** True when `index` falls between the two code units of a surrogate pair. */
function splitsSurrogatePair(text: string, index: number): boolean {
    if (index <= 0 || index >= text.length) {
        return false;
    }
    const before = text.charCodeAt(index - 1);
    const after = text.charCodeAt(index);
    return before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff;
}
