import {
  defaultExportPath,
  defaultTranscriptPath,
  parseTerminalCommand,
  type TerminalCommand,
} from "./terminalCommands";

const COMMANDS: Array<[string, TerminalCommand]> = [
  ["exit", { kind: "exit" }],
  ["  QUIT ", { kind: "exit" }],
  ["report", { kind: "report" }],
  ["Status", { kind: "status" }],
  ["benchmarks", { kind: "benchmarks" }],
  ["export", { kind: "export" }],
  ["export notes/acme.md", { kind: "export", filePath: "notes/acme.md" }],
  ["transcript", { kind: "transcript" }],
  ["transcript acme.json", { kind: "transcript", filePath: "acme.json" }],
  ["load 7f3c", { kind: "load", consultationId: "7f3c" }],
  ["load", { kind: "usage", text: "load <consultation id>" }],
];

describe("parseTerminalCommand", () => {
  it.each(COMMANDS)("parses %p as a command", (line, expected) => {
    expect(parseTerminalCommand(line)).toEqual(expected);
  });

  it("treats longer sentences that start with a command word as messages", () => {
    expect(parseTerminalCommand("report writing takes us all of Friday")).toEqual({
      kind: "message",
      text: "report writing takes us all of Friday",
    });
    expect(parseTerminalCommand("exit interviews are manual")).toEqual({
      kind: "message",
      text: "exit interviews are manual",
    });
    expect(parseTerminalCommand("status reports eat our Mondays")).toEqual({
      kind: "message",
      text: "status reports eat our Mondays",
    });
    expect(parseTerminalCommand("load times are slow")).toEqual({
      kind: "message",
      text: "load times are slow",
    });
  });

  it("passes blank lines through as empty messages", () => {
    expect(parseTerminalCommand("   ")).toEqual({ kind: "message", text: "" });
  });
});

describe("export paths", () => {
  it("names the exports after the consultation", () => {
    expect(defaultExportPath("abc")).toBe("consultation-abc.md");
    expect(defaultTranscriptPath("abc")).toBe("consultation-abc-transcript.json");
  });
});
