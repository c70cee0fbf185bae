import { describe, it, expect, vi } from "vitest";
import { ChatSession, formatSources } from "./chatSession.js";
import { AskOutcome, QuestionAnswerer } from "./documentAssistant.js";
import { GenerationError, RetrievalEmptyError } from "./errors.js";
import { GOODBYE_TEXT, WELCOME_TEXT } from "./welcome.js";
import { ScriptedIO } from "./testing/fakes.js";

const answered: AskOutcome = {
    status: "answered",
    answer: "The flight leaves at 9.",
    sources: [{ sourceFile: "trip.pdf", pageNumber: 2, score: 0.9 }],
};

function stubAssistant(ask: (question: string) => Promise<AskOutcome>) {
    const spy = vi.fn(ask);
    const assistant: QuestionAnswerer = { ask: spy };
    return { assistant, spy };
}

describe("ChatSession", () => {
    it("answers a question and prints its sources", async () => {
        const { assistant, spy } = stubAssistant(async () => answered);
        const io = new ScriptedIO(["When is the flight?", "quit"]);

        const asked = await new ChatSession(assistant, io).run();

        expect(asked).toBe(1);
        expect(spy).toHaveBeenCalledWith("When is the flight?");
        expect(io.output).toEqual([
            WELCOME_TEXT,
            "-".repeat(60),
            "Answer:",
            "The flight leaves at 9.",
            "\nSources: trip.pdf p.2",
            `\n${"=".repeat(80)}\n`,
            `\n${GOODBYE_TEXT}`,
        ]);
    });

    it("shows help again without asking the assistant", async () => {
        const { assistant, spy } = stubAssistant(async () => answered);
        const io = new ScriptedIO(["Question one", "help", "Question two", "exit"]);

        const asked = await new ChatSession(assistant, io).run();

        expect(asked).toBe(2);
        expect(spy.mock.calls.map(call => call[0])).toEqual(["Question one", "Question two"]);
        expect(io.output.filter(text => text === WELCOME_TEXT)).toHaveLength(2);
    });

    it.each(["quit", "exit", "bye", "QUIT", "  Bye  "])("ends the session on %j", async (command) => {
        const { assistant, spy } = stubAssistant(async () => answered);
        const io = new ScriptedIO([command, "never read"]);

        expect(await new ChatSession(assistant, io).run()).toBe(0);
        expect(spy).not.toHaveBeenCalled();
        expect(io.prompts).toBe(1);
        expect(io.output.at(-1)).toBe(`\n${GOODBYE_TEXT}`);
    });

    it("ignores empty input", async () => {
        const { assistant, spy } = stubAssistant(async () => answered);
        const io = new ScriptedIO(["", "   ", "quit"]);

        await new ChatSession(assistant, io).run();

        expect(spy).not.toHaveBeenCalled();
        expect(io.output).toEqual([WELCOME_TEXT, `\n${GOODBYE_TEXT}`]);
    });

    it("ends the session when input runs out", async () => {
        const { assistant } = stubAssistant(async () => answered);
        const io = new ScriptedIO(["A question"]);

        expect(await new ChatSession(assistant, io).run()).toBe(1);
        expect(io.output.at(-1)).toBe(`\n${GOODBYE_TEXT}`);
    });

    it("prints the message of a no-results or failed outcome", async () => {
        const outcomes: AskOutcome[] = [
            { status: "no-results", error: new RetrievalEmptyError() },
            { status: "failed", error: new GenerationError("Answer generation failed: timeout") },
        ];
        const { assistant } = stubAssistant(async () => {
            const next = outcomes.shift();
            if (!next) throw new Error("unexpected question");
            return next;
        });
        const io = new ScriptedIO(["first", "second", "quit"]);

        await new ChatSession(assistant, io).run();

        expect(io.output).toContain("No relevant information found in the document for your question.");
        expect(io.output).toContain("Answer generation failed: timeout");
        expect(io.output).not.toContain("Answer:");
    });

    it("reports an unexpected error and keeps going", async () => {
        let calls = 0;
        const { assistant } = stubAssistant(async () => {
            calls++;
            if (calls === 1) throw new Error("index unavailable");
            return answered;
        });
        const io = new ScriptedIO(["first", "second", "quit"]);

        expect(await new ChatSession(assistant, io).run()).toBe(2);
        expect(io.output).toContain("An error occurred: index unavailable");
        expect(io.output).toContain("Please try again or type 'quit' to exit.\n");
        expect(io.output).toContain("The flight leaves at 9.");
    });

    it("omits the sources line when there are none", async () => {
        const { assistant } = stubAssistant(async () => ({ status: "answered", answer: "Nothing to cite.", sources: [] }));
        const io = new ScriptedIO(["q", "quit"]);

        await new ChatSession(assistant, io).run();

        expect(io.output.some(text => text.startsWith("\nSources:"))).toBe(false);
    });
});

describe("formatSources", () => {
    it("joins file and page references", () => {
        expect(formatSources([
            { sourceFile: "a.pdf", pageNumber: 1, score: 1 },
            { sourceFile: "b.pdf", pageNumber: 12, score: 0.5 },
        ])).toBe("a.pdf p.1, b.pdf p.12");
    });
});
