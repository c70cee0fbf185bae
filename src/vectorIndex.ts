import { randomUUID } from "crypto";
import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import { EmbeddedChunk } from "./chunk.js";
import { DimensionMismatchError, IndexFormatError, IndexMismatchError, NotFoundError, errorMessage } from "./errors.js";
import { INDEX_FORMAT_VERSION, IndexSnapshot, indexSnapshotSchema } from "./indexSnapshot.js";
import { statIfExists } from "./utilities.js";

/** An embedded chunk stored in the index. */
export interface IndexEntry extends EmbeddedChunk {
    readonly id: string;
}

export interface SearchResult {
    entry: IndexEntry;
    /** Cosine similarity between the query and the entry's vector, in [-1, 1]. */
    score: number;
}

export interface LoadIndexOptions {
    /**
     * Identity of the embedding model that will embed queries. When given, an index
     * built with any other model is rejected.
     */
    embeddingModel?: string;
}

/**
 * In-memory vector store with exact cosine-similarity search.
 *
 * Entries are kept in insertion order and searched by linear scan. All vectors
 * share one dimensionality, fixed by the constructor or by the first insert.
 * The index remembers which embedding model produced its vectors and is
 * persisted as a single JSON file.
 */
export class VectorIndex {
    private items: IndexEntry[] = [];
    private norms: number[] = [];
    private dims: number | undefined;

    constructor(readonly embeddingModel: string, dimensions?: number) {
        this.dims = dimensions;
    }

    get size(): number {
        return this.items.length;
    }

    /** Vector dimensionality, or undefined while the index is empty and unconstrained. */
    get dimensions(): number | undefined {
        return this.dims;
    }

    entries(): readonly IndexEntry[] {
        return this.items;
    }

    /**
     * Appends entries without deduplication.
     * @returns The identifiers assigned to the inserted entries, in input order.
     * @throws DimensionMismatchError if any vector's length differs from the index's; nothing is inserted then.
     * @throws RangeError if a vector is empty or has a non-finite component.
     */
    insert(chunks: readonly EmbeddedChunk[]): string[] {
        if (chunks.length === 0) {
            return [];
        }

        const expected = this.dims ?? chunks[0].vector.length;
        if (expected === 0) {
            throw new RangeError("Cannot insert empty vectors.");
        }
        for (const chunk of chunks) {
            if (chunk.vector.length !== expected) {
                throw new DimensionMismatchError(expected, chunk.vector.length);
            }
            if (!chunk.vector.every(Number.isFinite)) {
                throw new RangeError(`Vector of chunk ${chunk.metadata.chunkIndex} from ${chunk.metadata.sourceFile} has a non-finite component.`);
            }
        }

        this.dims = expected;
        return chunks.map(chunk => {
            const entry: IndexEntry = {
                id: randomUUID(),
                text: chunk.text,
                metadata: { ...chunk.metadata },
                vector: [...chunk.vector],
            };
            this.items.push(entry);
            this.norms.push(magnitude(entry.vector));
            return entry.id;
        });
    }

    /**
     * Returns up to `k` entries ordered by descending similarity to the query,
     * ties going to the entry inserted first.
     * @throws DimensionMismatchError if the query vector has the wrong length.
     * @throws RangeError if the query vector has a non-finite component.
     */
    search(queryVector: readonly number[], k: number): SearchResult[] {
        if (this.items.length === 0 || k <= 0) {
            return [];
        }
        if (this.dims !== undefined && queryVector.length !== this.dims) {
            throw new DimensionMismatchError(this.dims, queryVector.length);
        }
        if (!queryVector.every(Number.isFinite)) {
            throw new RangeError("Query vector has a non-finite component.");
        }

        const queryNorm = magnitude(queryVector);
        const scored = this.items.map((entry, position) => ({
            position,
            score: cosine(queryVector, queryNorm, entry.vector, this.norms[position]),
        }));

        scored.sort((a, b) => b.score - a.score || a.position - b.position);

        return scored.slice(0, k).map(({ position, score }) => ({ entry: this.items[position], score }));
    }

    toSnapshot(): IndexSnapshot {
        return {
            formatVersion: INDEX_FORMAT_VERSION,
            embeddingModel: this.embeddingModel,
            dimensions: this.dims ?? 0,
            createdAt: new Date().toISOString(),
            entries: this.items.map(entry => ({
                id: entry.id,
                text: entry.text,
                metadata: { ...entry.metadata },
                vector: [...entry.vector],
            })),
        };
    }

    static fromSnapshot(snapshot: IndexSnapshot): VectorIndex {
        const index = new VectorIndex(snapshot.embeddingModel, snapshot.dimensions > 0 ? snapshot.dimensions : undefined);
        for (const entry of snapshot.entries) {
            index.items.push(entry);
            index.norms.push(magnitude(entry.vector));
        }
        return index;
    }

    /**
     * Writes the whole index to one file, creating parent directories as needed.
     */
    async save(filePath: string): Promise<void> {
        console.log(`Saving vector index (${this.size} entries) to: ${filePath}`);
        await mkdir(dirname(filePath), { recursive: true });
        await writeFile(filePath, JSON.stringify(this.toSnapshot()), "utf8");
    }

    /**
     * Reads an index written by {@link VectorIndex.save}.
     * @throws NotFoundError if the file does not exist.
     * @throws IndexFormatError if the file is not a valid index.
     * @throws IndexMismatchError if the index was built with another embedding model.
     */
    static async load(filePath: string, options: LoadIndexOptions = {}): Promise<VectorIndex> {
        const stats = await statIfExists(filePath);
        if (!stats || !stats.isFile()) {
            throw new NotFoundError(filePath, "Vector index");
        }

        console.log(`Loading vector index from: ${filePath}`);
        let raw: unknown;
        try {
            raw = JSON.parse(await readFile(filePath, "utf8"));
        } catch (error) {
            throw new IndexFormatError(`Could not parse vector index ${filePath}: ${errorMessage(error)}`, { cause: error });
        }

        const parsed = indexSnapshotSchema.safeParse(raw);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
            throw new IndexFormatError(`Invalid vector index ${filePath}${where}: ${issue?.message ?? "unknown error"}`);
        }

        const snapshot = parsed.data;
        if (options.embeddingModel !== undefined && snapshot.embeddingModel !== options.embeddingModel) {
            throw new IndexMismatchError(snapshot.embeddingModel, options.embeddingModel);
        }

        const index = VectorIndex.fromSnapshot(snapshot);
        console.log(`Vector index loaded: ${index.size} entries.`);
        return index;
    }
}

function magnitude(vector: readonly number[]): number {
    let sum = 0;
    for (const value of vector) {
        sum += value * value;
    }
    return Math.sqrt(sum);
}

function cosine(a: readonly number[], normA: number, b: readonly number[], normB: number): number {
    if (normA === 0 || normB === 0) {
        return 0;
    }
    let dot = 0;
    for (let i = 0; i < a.length; i++) {
        dot += a[i] * b[i];
    }
    return dot / (normA * normB);
}
