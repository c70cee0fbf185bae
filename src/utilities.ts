import { stat } from "fs/promises";
import type { Stats } from "fs";

/** Checks if a filename has a PDF extension. */
export const isPdf = (fileName: string): boolean => /\.pdf$/i.test(fileName);

/**
 * Stats a path, returning undefined when it does not exist.
 * Errors other than ENOENT (permissions, etc.) propagate.
 */
export const statIfExists = async (filePath: string): Promise<Stats | undefined> => {
    try {
        return await stat(filePath);
    } catch (error: unknown) {
        if (error instanceof Error && "code" in error && error.code === "ENOENT") {
            return undefined;
        }
        throw error;
    }
};

/**
 * Checks if a file or directory exists at the given path.
 * @returns True if the path exists, false otherwise.
 */
export const fsExists = async (filePath: string): Promise<boolean> =>
    (await statIfExists(filePath)) !== undefined;

export const sleep = (ms: number): Promise<void> =>
    new Promise(resolve => setTimeout(resolve, ms));
