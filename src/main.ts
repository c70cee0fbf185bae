#!/usr/bin/env node
import dotenv from "dotenv";
import { confirm, select } from "@inquirer/prompts";
import { mkdir } from "fs/promises";
import { AnswerComposer } from "./answerComposer.js";
import { ChatSession } from "./chatSession.js";
import { CliOptions, IngestMode, parseCommandLine, USAGE } from "./cli.js";
import { Chunker } from "./chunker.js";
import { AppConfig, loadConfig, missingCredentialWarning } from "./config.js";
import { DocumentAssistant } from "./documentAssistant.js";
import { EmbeddingService } from "./embeddingService.js";
import { DimensionMismatchError, NotFoundError, errorMessage } from "./errors.js";
import { IngestionPipeline } from "./ingestionPipeline.js";
import { PdfLoader } from "./pdfLoader.js";
import { createCompletionModel, createEmbeddingModel } from "./providers.js";
import { Retriever } from "./retriever.js";
import { ReadlineSessionIO } from "./sessionIO.js";
import { fsExists } from "./utilities.js";
import { VectorIndex } from "./vectorIndex.js";

dotenv.config();

/**
 * Builds the embedding service and confirms the model answers before any work starts.
 */
async function startEmbeddingService(config: AppConfig): Promise<{ service: EmbeddingService; dimensions: number }> {
    const service = new EmbeddingService(
        createEmbeddingModel(config.embedding),
        config.embedding.batchSize,
        config.embedding.apiDelayMs
    );
    const dimensions = await service.probe();
    return { service, dimensions };
}

async function chooseMode(requested: IngestMode | undefined): Promise<IngestMode> {
    if (requested !== undefined) {
        return requested;
    }
    return select<IngestMode>({
        message: "Choose ingestion mode:",
        choices: [
            { name: "Single PDF file", value: "single" },
            { name: "All PDF files in data folder", value: "all" },
        ],
    });
}

async function runIngest(config: AppConfig, options: CliOptions): Promise<number> {
    const mode = await chooseMode(options.mode);
    const inputPath = options.path ?? (mode === "single" ? config.singlePdfFile : config.dataDir);
    const indexPath = options.index ?? (mode === "single" ? config.singleIndexPath : config.indexPath);

    if (mode === "all" && options.path === undefined) {
        await mkdir(config.dataDir, { recursive: true });
    }

    if (!options.force && await fsExists(indexPath)) {
        const overwrite = await confirm({ message: `Vector index '${indexPath}' already exists. Overwrite?`, default: false });
        if (!overwrite) {
            console.log("Ingestion cancelled.");
            return 0;
        }
    }

    const { service: embeddingService } = await startEmbeddingService(config);
    const pipeline = new IngestionPipeline({
        loader: new PdfLoader(undefined, config.maxConcurrentLoading),
        chunker: new Chunker({ chunkSize: config.chunkSize, chunkOverlap: config.chunkOverlap }),
        embeddingService,
    });

    const { summary } = await pipeline.run(inputPath, indexPath);

    console.log("\nVector index stats:");
    console.log(`   - ${mode === "single" ? "File" : "Folder"} processed: ${inputPath}`);
    console.log(`   - Files: ${summary.processedFiles.join(", ")}`);
    if (summary.failedFiles.length > 0) {
        console.log(`   - Skipped: ${summary.failedFiles.map(f => f.file).join(", ")}`);
    }
    console.log(`   - Pages: ${summary.pageCount}, chunks: ${summary.chunkCount}`);
    console.log(`   - Vector index saved: ${summary.indexPath}`);
    console.log(`   - Ready for chat! Run 'pdf-chat chat${options.index ? ` --index ${options.index}` : ""}' to ask questions.`);
    return 0;
}

async function runChat(config: AppConfig, options: CliOptions): Promise<number> {
    const warning = missingCredentialWarning(config);
    if (warning) {
        console.warn(warning);
    }

    const indexPath = options.index ?? config.indexPath;
    const { service: embeddingService, dimensions } = await startEmbeddingService(config);

    let index: VectorIndex;
    try {
        index = await VectorIndex.load(indexPath, { embeddingModel: embeddingService.modelIdentity });
    } catch (error) {
        if (error instanceof NotFoundError) {
            console.error(`Vector index not found at ${indexPath}. Please run 'pdf-chat ingest' first to process your documents.`);
            return 1;
        }
        throw error;
    }
    if (index.dimensions !== undefined && index.dimensions !== dimensions) {
        throw new DimensionMismatchError(index.dimensions, dimensions);
    }

    const assistant = new DocumentAssistant(
        new Retriever(embeddingService, index, config.topK),
        new AnswerComposer(createCompletionModel(config.completion), {
            maxRetries: config.completion.maxRetries,
            temperature: config.completion.temperature,
        })
    );
    console.log("Document assistant ready!\n");

    const io = new ReadlineSessionIO();
    try {
        await new ChatSession(assistant, io).run();
    } finally {
        io.close();
    }
    return 0;
}

/**
 * Main application entry point. Parses the command, loads configuration and
 * runs ingestion or the chat session.
 * @returns The process exit code.
 */
async function main(argv: string[]): Promise<number> {
    const parsed = parseCommandLine(argv);
    if (parsed.status === "usage") {
        if (parsed.error !== undefined) {
            console.error(parsed.error);
        }
        console.error(USAGE);
        return parsed.exitCode;
    }

    const { command, options } = parsed;
    try {
        const config = loadConfig();
        return command === "ingest" ? await runIngest(config, options) : await runChat(config, options);
    } catch (error) {
        if (error instanceof DimensionMismatchError) {
            console.error(`The vector index does not match the embedding model: ${error.message}`);
        } else {
            console.error(`Error during ${command}: ${errorMessage(error)}`);
        }
        return 1;
    }
}

process.exitCode = await main(process.argv.slice(2));
