import { z } from "zod";

/** Bumped whenever the persisted layout changes incompatibly. */
export const INDEX_FORMAT_VERSION = 1;

const chunkMetadataSchema = z.object({
    sourceFile: z.string(),
    sourcePath: z.string(),
    pageNumber: z.number().int().positive(),
    startOffset: z.number().int().nonnegative(),
    endOffset: z.number().int().nonnegative(),
    chunkIndex: z.number().int().nonnegative(),
});

const indexEntrySchema = z.object({
    id: z.string().min(1),
    text: z.string(),
    metadata: chunkMetadataSchema,
    vector: z.array(z.number()),
});

/**
 * Layout of a persisted vector index file.
 */
export const indexSnapshotSchema = z.object({
    formatVersion: z.literal(INDEX_FORMAT_VERSION),
    embeddingModel: z.string().min(1),
    dimensions: z.number().int().nonnegative(),
    createdAt: z.string(),
    entries: z.array(indexEntrySchema),
}).superRefine((snapshot, ctx) => {
    snapshot.entries.forEach((entry, index) => {
        if (entry.vector.length !== snapshot.dimensions) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ["entries", index, "vector"],
                message: `expected ${snapshot.dimensions} dimensions, got ${entry.vector.length}`,
            });
        }
    });
});

export type IndexSnapshot = z.infer<typeof indexSnapshotSchema>;
