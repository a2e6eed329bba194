// src/intake/terminal/terminalCommands.ts

export type TerminalCommand =
  | { kind: "exit" }
  | { kind: "report" }
  | { kind: "status" }
  | { kind: "benchmarks" }
  | { kind: "export"; filePath?: string }
  | { kind: "transcript"; filePath?: string }
  | { kind: "load"; consultationId: string }
  | { kind: "usage"; text: string }
  | { kind: "message"; text: string };

const EXIT_WORDS = new Set(["exit", "quit", "q"]);

export const TERMINAL_HELP =
  "Commands: status, report, benchmarks, export [file], transcript [file], load <id>, exit";

/**
 * A line typed into the terminal consultation. Single command words and
 * their arguments are commands; anything else is the client's message.
 */
export function parseTerminalCommand(line: string): TerminalCommand {
  const trimmed = line.trim();
  const [head, ...rest] = trimmed.split(/\s+/);
  const word = head.toLowerCase();

  if (rest.length === 0) {
    if (EXIT_WORDS.has(word)) return { kind: "exit" };
    if (word === "report") return { kind: "report" };
    if (word === "status") return { kind: "status" };
    if (word === "benchmarks") return { kind: "benchmarks" };
    if (word === "export") return { kind: "export" };
    if (word === "transcript") return { kind: "transcript" };
    if (word === "load") return { kind: "usage", text: "load <consultation id>" };
  }
  if (rest.length === 1) {
    if (word === "export") return { kind: "export", filePath: rest[0] };
    if (word === "transcript") return { kind: "transcript", filePath: rest[0] };
    if (word === "load") return { kind: "load", consultationId: rest[0] };
  }
  return { kind: "message", text: trimmed };
}

export function defaultExportPath(consultationId: string): string {
  return `consultation-${consultationId}.md`;
}

export function defaultTranscriptPath(consultationId: string): string {
  return `consultation-${consultationId}-transcript.json`;
}
