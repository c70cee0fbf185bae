const RULE = "=".repeat(80);

export const EXIT_COMMANDS: readonly string[] = ["quit", "exit", "bye"];
export const HELP_COMMAND = "help";

export const WELCOME_TEXT = `${RULE}
PERSONAL ASSISTANT - EVENT PLANNER - TRAVEL AGENT
${RULE}

Welcome! I answer questions about the documents you ingested,
such as travel plans and conference schedules.

Answers are based strictly on the document content. When the documents
do not cover a question, I will say so.

Commands:
  - Type 'quit', 'exit', or 'bye' to end the session
  - Type 'help' to show this message again
  - Otherwise, just ask your question naturally!

${RULE}`;

export const GOODBYE_TEXT = "Goodbye! Thanks for using the document assistant!";
