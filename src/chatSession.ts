import { QuestionAnswerer, SourceReference } from "./documentAssistant.js";
import { errorMessage } from "./errors.js";
import { SessionIO } from "./sessionIO.js";
import { EXIT_COMMANDS, GOODBYE_TEXT, HELP_COMMAND, WELCOME_TEXT } from "./welcome.js";

export const PROMPT = "Your question: ";

const ANSWER_RULE = "=".repeat(80);
const QUESTION_RULE = "-".repeat(60);

/**
 * Interactive question loop. Errors raised while answering are reported and the
 * loop continues; only an exit command or the end of input stops it.
 */
export class ChatSession {
    constructor(private assistant: QuestionAnswerer, private io: SessionIO) {}

    /**
     * Runs until the user leaves.
     * @returns The number of questions that were sent to the assistant.
     */
    async run(): Promise<number> {
        this.io.write(WELCOME_TEXT);
        let asked = 0;

        while (true) {
            const line = await this.io.prompt(PROMPT);
            if (line === null) {
                this.io.write(`\n${GOODBYE_TEXT}`);
                return asked;
            }

            const question = line.trim();
            if (!question) {
                continue;
            }

            const command = question.toLowerCase();
            if (EXIT_COMMANDS.includes(command)) {
                this.io.write(`\n${GOODBYE_TEXT}`);
                return asked;
            }
            if (command === HELP_COMMAND) {
                this.io.write(WELCOME_TEXT);
                continue;
            }

            asked++;
            this.io.write(QUESTION_RULE);
            try {
                await this.answer(question);
            } catch (error) {
                this.io.write(`An error occurred: ${errorMessage(error)}`);
                this.io.write("Please try again or type 'quit' to exit.\n");
            }
        }
    }

    private async answer(question: string): Promise<void> {
        const outcome = await this.assistant.ask(question);
        switch (outcome.status) {
            case "answered":
                this.io.write("Answer:");
                this.io.write(outcome.answer);
                if (outcome.sources.length > 0) {
                    this.io.write(`\nSources: ${formatSources(outcome.sources)}`);
                }
                this.io.write(`\n${ANSWER_RULE}\n`);
                break;
            case "no-results":
            case "failed":
                this.io.write(outcome.error.message);
                break;
        }
    }
}

/** Renders references as `file p.N`, joined by commas. */
export function formatSources(sources: readonly SourceReference[]): string {
    return sources.map(source => `${source.sourceFile} p.${source.pageNumber}`).join(", ");
}
