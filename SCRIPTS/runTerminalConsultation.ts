// SCRIPTS/runTerminalConsultation.ts
//
// Runs an intake consultation in the terminal.
//
// Usage:
//   node dist/SCRIPTS/runTerminalConsultation.js [clientId]
//
// Commands: `status` shows the stage, metrics and bottlenecks, `report` prints
// the executive summary as it stands, `benchmarks` lists the industry
// benchmarks, `export [file]` writes the summary as markdown, `transcript
// [file]` writes the conversation as JSON, `load <id>` resumes a stored
// consultation, `exit` closes the current one. Logs go to stderr.

import "dotenv/config";

import * as fs from "fs";
import pino from "pino";
import * as readline from "readline";
import { loadIntakeConfig } from "../src/config/intakeConfig";
import { createIntakeRuntime } from "../src/intake/runtime";
import { ConsultationNotFoundError } from "../src/intake/errors";
import { renderExecutiveMarkdown } from "../src/intake/reports/renderReportMarkdown";
import {
  defaultExportPath,
  defaultTranscriptPath,
  parseTerminalCommand,
  TERMINAL_HELP,
} from "../src/intake/terminal/terminalCommands";
import {
  buildTranscriptExport,
  renderBenchmarks,
  renderStatus,
} from "../src/intake/terminal/terminalViews";

async function main() {
  const config = loadIntakeConfig();
  const logger = pino({ level: config.logLevel }, pino.destination(2));
  const runtime = createIntakeRuntime(config, logger);
  const { orchestrator } = runtime;

  const clientId = process.argv[2] ?? "terminal";
  const started = await orchestrator.startConsultation({ clientId });
  let consultationId = started.consultation.id;
  let open = true;

  console.log(`Consultation ${consultationId}`);
  console.log(`${TERMINAL_HELP}\n`);
  console.log(`Consultant: ${started.prompt.text}\n`);

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  rl.setPrompt("You: ");
  rl.prompt();

  for await (const line of rl) {
    const command = parseTerminalCommand(line);

    if (command.kind === "exit") break;

    switch (command.kind) {
      case "status": {
        const { consultation, bottlenecks } = await orchestrator.getSnapshot(consultationId);
        console.log(`\n${renderStatus(consultation, bottlenecks)}\n`);
        break;
      }
      case "report": {
        const summary = await orchestrator.previewExecutiveSummary(consultationId);
        console.log(`\n${renderExecutiveMarkdown(summary, new Date().toISOString())}`);
        break;
      }
      case "benchmarks":
        console.log(`\n${renderBenchmarks()}\n`);
        break;
      case "export": {
        const filePath = command.filePath ?? defaultExportPath(consultationId);
        fs.writeFileSync(filePath, await orchestrator.exportExecutiveMarkdown(consultationId));
        console.log(`\nExported to ${filePath}\n`);
        break;
      }
      case "transcript": {
        const filePath = command.filePath ?? defaultTranscriptPath(consultationId);
        const { consultation, bottlenecks, insights } =
          await orchestrator.getSnapshot(consultationId);
        fs.writeFileSync(filePath, buildTranscriptExport(consultation, bottlenecks, insights));
        console.log(`\nTranscript written to ${filePath}\n`);
        break;
      }
      case "load": {
        try {
          const { consultation, bottlenecks } = await orchestrator.getSnapshot(
            command.consultationId
          );
          consultationId = consultation.id;
          open = consultation.status === "in_progress";
          console.log(`\nLoaded\n${renderStatus(consultation, bottlenecks)}\n`);
          if (!open) {
            console.log("This consultation is closed; its reports can still be exported.\n");
          }
        } catch (error) {
          if (!(error instanceof ConsultationNotFoundError)) throw error;
          console.log(
            `\nConsultation ${command.consultationId} not found (${runtime.storeKind} store)\n`
          );
        }
        break;
      }
      case "usage":
        console.log(`\nUsage: ${command.text}\n`);
        break;
      case "message": {
        if (!open) {
          console.log("\nThis consultation is closed. Load another one or exit.\n");
          break;
        }
        const result = await orchestrator.runTurn({ consultationId, message: command.text });
        console.log(`\nConsultant: ${result.reply}\n`);

        if (result.consultation.status === "completed") {
          open = false;
          console.log(await orchestrator.exportExecutiveMarkdown(consultationId));
        }
        break;
      }
    }
    rl.prompt();
  }
  rl.close();

  if (open) {
    const { reports } = await orchestrator.abandonConsultation(consultationId);
    console.log(`\nConsultation closed with ${reports.length} report(s).`);
  }

  await runtime.close();
}

main().catch((error) => {
  console.error("terminal consultation failed", error);
  process.exit(1);
});
