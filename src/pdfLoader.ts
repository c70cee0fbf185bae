import { readdir, readFile } from "fs/promises";
import { basename, join } from "path";
import pLimit from "p-limit";
import { DocumentPage } from "./documentPage.js";
import { EmptyInputError, NotFoundError, errorMessage } from "./errors.js";
import { isPdf, statIfExists } from "./utilities.js";

/**
 * Extracts the text of each page from raw PDF bytes, in page order.
 */
export type PdfTextExtractor = (data: Uint8Array) => Promise<string[]>;

/** Default extractor backed by unpdf's bundled pdf.js build. */
export const extractPdfPages: PdfTextExtractor = async (data) => {
    const { extractText, getDocumentProxy } = await import("unpdf");
    const pdf = await getDocumentProxy(data);
    const { text } = await extractText(pdf, { mergePages: false });
    return text;
};

/** A file that could not be loaded, and why. */
export interface FailedFile {
    file: string;
    error: string;
}

type FileOutcome = { file: string; pages: DocumentPage[] } | { file: string; error: string };

export interface LoadResult {
    /** Pages of every successfully loaded file, in file then page order. */
    pages: DocumentPage[];
    /** Base names of the files that loaded. */
    processedFiles: string[];
    failedFiles: FailedFile[];
}

/**
 * Reads PDF files from a single path or a directory into page records.
 */
export class PdfLoader {
    /**
     * @param extractor Turns PDF bytes into page texts.
     * @param maxConcurrency Files read and parsed at once. Output order does not depend on it.
     */
    constructor(
        private extractor: PdfTextExtractor = extractPdfPages,
        private maxConcurrency: number = 1
    ) {}

    /**
     * Loads a PDF file, or every PDF directly inside a directory.
     * In directory mode a file that fails to load is logged and skipped.
     * @throws NotFoundError if the path does not exist.
     * @throws EmptyInputError if no PDF files are found.
     */
    async load(inputPath: string): Promise<LoadResult> {
        const stats = await statIfExists(inputPath);
        if (!stats) {
            throw new NotFoundError(inputPath);
        }

        if (!stats.isDirectory()) {
            if (!isPdf(inputPath)) {
                throw new EmptyInputError(`Not a PDF file: ${inputPath}`);
            }
            const pages = await this.loadFile(inputPath);
            console.log(`Loaded ${pages.length} pages from ${basename(inputPath)}`);
            return { pages, processedFiles: [basename(inputPath)], failedFiles: [] };
        }

        const pdfFiles = (await readdir(inputPath, { withFileTypes: true }))
            .filter(entry => entry.isFile() && isPdf(entry.name))
            .map(entry => entry.name)
            .sort();

        if (pdfFiles.length === 0) {
            throw new EmptyInputError(`No PDF files found in ${inputPath}`);
        }

        console.log(`Found ${pdfFiles.length} PDF files:`);
        pdfFiles.forEach(file => console.log(`   - ${file}`));

        const limit = pLimit(this.maxConcurrency);
        const outcomes = await Promise.all(pdfFiles.map((file, index) => limit(async (): Promise<FileOutcome> => {
            console.log(`Processing file ${index + 1}/${pdfFiles.length}: ${file}`);
            try {
                const pages = await this.loadFile(join(inputPath, file));
                console.log(`   Loaded ${pages.length} pages from ${file}`);
                return { file, pages };
            } catch (error) {
                const message = errorMessage(error);
                console.error(`   Error processing ${file}: ${message}`);
                return { file, error: message };
            }
        })));

        const result: LoadResult = { pages: [], processedFiles: [], failedFiles: [] };
        for (const outcome of outcomes) {
            if ("pages" in outcome) {
                result.pages.push(...outcome.pages);
                result.processedFiles.push(outcome.file);
            } else {
                result.failedFiles.push({ file: outcome.file, error: outcome.error });
            }
        }
        console.log(`Total pages loaded: ${result.pages.length} from ${result.processedFiles.length} files`);
        return result;
    }

    private async loadFile(filePath: string): Promise<DocumentPage[]> {
        const data = new Uint8Array(await readFile(filePath));
        const texts = await this.extractor(data);
        const sourceFile = basename(filePath);
        return texts.map((text, index) => ({
            text,
            sourceFile,
            sourcePath: filePath,
            pageNumber: index + 1,
        }));
    }
}
