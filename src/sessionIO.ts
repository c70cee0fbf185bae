import * as readline from "readline";

/**
 * Line-oriented terminal abstraction used by the chat session.
 */
export interface SessionIO {
    /** Shows `message` and resolves with the next line, or null once input has ended. */
    prompt(message: string): Promise<string | null>;
    write(text: string): void;
    close(): void;
}

/**
 * {@link SessionIO} over stdin/stdout. Ctrl+C and end of input both end the session.
 */
export class ReadlineSessionIO implements SessionIO {
    private rl: readline.Interface;
    private closed = false;

    constructor(
        input: NodeJS.ReadableStream = process.stdin,
        private output: NodeJS.WritableStream = process.stdout
    ) {
        this.rl = readline.createInterface({ input, output });
        this.rl.on("SIGINT", () => this.rl.close());
        this.rl.on("close", () => {
            this.closed = true;
        });
    }

    prompt(message: string): Promise<string | null> {
        if (this.closed) {
            return Promise.resolve(null);
        }
        return new Promise(resolve => {
            const onClose = () => resolve(null);
            this.rl.once("close", onClose);
            this.rl.question(message, answer => {
                this.rl.off("close", onClose);
                resolve(answer);
            });
        });
    }

    write(text: string): void {
        this.output.write(`${text}\n`);
    }

    close(): void {
        this.rl.close();
    }
}
