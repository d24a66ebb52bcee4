export type Command = "ingest" | "ask" | "stats" | "reset" | "rebuild";

const COMMANDS: readonly Command[] = ["ingest", "ask", "stats", "reset", "rebuild"];

const USAGE = "Usage: filingrag <ingest|ask|stats|reset|rebuild> [...]";

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((c) => c === value);
}

export function parseCli(argv: string[]): { command: Command; args: string[] } {
  const [, , command, ...rest] = argv;
  if (!isCommand(command)) {
    throw new Error(USAGE);
  }
  return { command, args: rest };
}
