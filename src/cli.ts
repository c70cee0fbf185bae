import { parseArgs } from "util";
import { errorMessage } from "./errors.js";

export type Command = "ingest" | "chat";
export type IngestMode = "single" | "all";

export const USAGE = `Usage:
  pdf-chat ingest [--mode all|single] [--path <pdf or folder>] [--index <file>] [--force]
  pdf-chat chat [--index <file>]`;

export interface CliOptions {
    mode?: IngestMode;
    path?: string;
    index?: string;
    force: boolean;
}

/** Options each command accepts. */
const COMMAND_OPTIONS: Record<Command, readonly (keyof CliOptions)[]> = {
    ingest: ["mode", "path", "index", "force"],
    chat: ["index"],
};

export type ParsedCommandLine =
    | { status: "run"; command: Command; options: CliOptions }
    | { status: "usage"; exitCode: number; error?: string };

const isCommand = (value: string | undefined): value is Command =>
    value === "ingest" || value === "chat";

const isIngestMode = (value: string): value is IngestMode =>
    value === "single" || value === "all";

/**
 * Parses `argv` (without the node and script paths). Unknown commands, unknown
 * options and options the command does not take come back as `usage`.
 */
export function parseCommandLine(argv: string[]): ParsedCommandLine {
    let positionals: string[];
    let mode: string | undefined;
    let options: Omit<CliOptions, "mode">;
    try {
        const parsed = parseArgs({
            args: argv,
            allowPositionals: true,
            options: {
                mode: { type: "string" },
                path: { type: "string" },
                index: { type: "string" },
                force: { type: "boolean" },
            },
        });
        positionals = parsed.positionals;
        mode = parsed.values.mode;
        options = {
            path: parsed.values.path,
            index: parsed.values.index,
            force: parsed.values.force ?? false,
        };
    } catch (error) {
        return { status: "usage", exitCode: 1, error: errorMessage(error) };
    }

    const [command, ...extra] = positionals;
    if (command === undefined) {
        return { status: "usage", exitCode: 0 };
    }
    if (!isCommand(command)) {
        return { status: "usage", exitCode: 1, error: `Unknown command: ${command}` };
    }
    if (extra.length > 0) {
        return { status: "usage", exitCode: 1, error: `Unexpected argument: ${extra[0]}` };
    }

    const allowed = COMMAND_OPTIONS[command];
    const given: (keyof CliOptions)[] = [];
    if (mode !== undefined) given.push("mode");
    if (options.path !== undefined) given.push("path");
    if (options.index !== undefined) given.push("index");
    if (options.force) given.push("force");
    const rejected = given.find(name => !allowed.includes(name));
    if (rejected !== undefined) {
        return { status: "usage", exitCode: 1, error: `Option --${rejected} does not apply to '${command}'.` };
    }

    if (mode === undefined) {
        return { status: "run", command, options };
    }
    if (!isIngestMode(mode)) {
        return { status: "usage", exitCode: 1, error: `Invalid --mode: ${mode}. Must be 'single' or 'all'.` };
    }
    return { status: "run", command, options: { ...options, mode } };
}
