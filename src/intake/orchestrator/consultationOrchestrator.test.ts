import pino from "pino";
import { InMemoryConsultationStore } from "../../repositories/inMemoryConsultationStore";
import { ConsultationClosedError, ConsultationNotFoundError, PersistenceError } from "../errors";
import { DEFAULT_STAGE_THRESHOLDS } from "../flow/intakeStageMachine";
import { CLOSING_PROMPT, STAGE_PROMPTS } from "../flow/stagePrompts";
import type { Bottleneck, Consultation, ConsultationPatch } from "../types";
import { ConsultationOrchestrator, type OrchestratorConfig } from "./consultationOrchestrator";

const LEAD_LOSS_MESSAGE =
  "We have 50 employees and lose leads because we track everything in Excel manually";

const baseConfig: OrchestratorConfig = {
  stageThresholds: DEFAULT_STAGE_THRESHOLDS,
  topN: 3,
  defaultTier: "growth",
  bottleneckDedup: "by_name",
};

const oneTurnPerStage: OrchestratorConfig = {
  ...baseConfig,
  stageThresholds: {
    opening: { minInformativeExchanges: 1, maxTurns: 1 },
    discovery: { minInformativeExchanges: 1, maxTurns: 1 },
    deep_dive: { minInformativeExchanges: 1, maxTurns: 1 },
    synthesis: { minInformativeExchanges: 1, maxTurns: 1 },
  },
};

function setup(config: OrchestratorConfig = baseConfig, store = new InMemoryConsultationStore()) {
  const logger = pino({ level: "silent" });
  const orchestrator = new ConsultationOrchestrator({
    store,
    logger,
    config,
    now: () => "2026-01-01T00:00:00.000Z",
  });
  return { orchestrator, store, logger };
}

describe("ConsultationOrchestrator.startConsultation", () => {
  it("opens a consultation in the opening stage with the welcome prompt", async () => {
    const { orchestrator } = setup();

    const { consultation, prompt } = await orchestrator.startConsultation({ clientId: "client-1" });

    expect(prompt.id).toBe("opening_welcome");
    expect(consultation.status).toBe("in_progress");
    expect(consultation.stage).toBe("opening");
    expect(consultation.companyName).toBeNull();
    expect(consultation.stageProgress).toEqual({
      turnsInStage: 0,
      informativeExchangesInStage: 0,
      usedPromptIds: ["opening_welcome"],
    });
    expect(consultation.transcript).toEqual([
      {
        role: "consultant",
        content: prompt.text,
        stage: "opening",
        timestamp: "2026-01-01T00:00:00.000Z",
      },
    ]);
  });
});

describe("ConsultationOrchestrator.runTurn", () => {
  it("extracts metrics, records bottlenecks and advances on an informative turn", async () => {
    const { orchestrator } = setup();
    const { consultation } = await orchestrator.startConsultation({ clientId: "client-1" });

    const result = await orchestrator.runTurn({
      consultationId: consultation.id,
      message: LEAD_LOSS_MESSAGE,
    });

    expect(result.extracted).toEqual({ employeeCount: 50, technologies: ["Excel"] });
    expect(result.newBottlenecks.map((b) => b.category)).toEqual([
      "manual_process",
      "spreadsheet_tracking",
      "revenue_leakage",
    ]);
    expect(result.informative).toBe(true);
    expect(result.transition).toEqual({
      previousStage: "opening",
      nextStage: "discovery",
      reason: "advance_by_information",
    });
    expect(result.prompt.id).toBe("discovery_operations");
    expect(result.reply).toBe(STAGE_PROMPTS.discovery[0].text);
    expect(result.suggestedPrompts).toBeUndefined();
    expect(result.consultation.stageProgress).toEqual({
      turnsInStage: 0,
      informativeExchangesInStage: 0,
      usedPromptIds: ["opening_welcome", "discovery_operations"],
    });
    expect(result.consultation.metrics.employeeCount).toBe(50);
    expect(result.consultation.transcript.map((e) => [e.role, e.stage])).toEqual([
      ["consultant", "opening"],
      ["client", "opening"],
      ["consultant", "discovery"],
    ]);
  });

  it("skips repeated bottleneck names and stays when nothing new was learned", async () => {
    const { orchestrator } = setup();
    const { consultation } = await orchestrator.startConsultation({ clientId: "client-1" });
    await orchestrator.runTurn({ consultationId: consultation.id, message: LEAD_LOSS_MESSAGE });

    const repeat = await orchestrator.runTurn({
      consultationId: consultation.id,
      message: LEAD_LOSS_MESSAGE,
    });

    expect(repeat.extracted).toEqual({});
    expect(repeat.newBottlenecks).toEqual([]);
    expect(repeat.informative).toBe(false);
    expect(repeat.transition.reason).toBe("stay_in_stage");
    expect(repeat.prompt.id).toBe("discovery_tools");
    expect(repeat.consultation.stageProgress.turnsInStage).toBe(1);
    expect(await orchestrator.listBottlenecks(consultation.id)).toHaveLength(3);
  });

  it("stores every detection under the additive policy", async () => {
    const { orchestrator } = setup({ ...baseConfig, bottleneckDedup: "additive" });
    const { consultation } = await orchestrator.startConsultation({ clientId: "client-1" });
    await orchestrator.runTurn({ consultationId: consultation.id, message: LEAD_LOSS_MESSAGE });

    const repeat = await orchestrator.runTurn({
      consultationId: consultation.id,
      message: LEAD_LOSS_MESSAGE,
    });

    expect(repeat.newBottlenecks).toHaveLength(3);
    expect(repeat.informative).toBe(true);
    expect(await orchestrator.listBottlenecks(consultation.id)).toHaveLength(6);
  });

  it("treats a non-text message as an empty turn and logs a warning", async () => {
    const { orchestrator, logger } = setup();
    const warn = jest.spyOn(logger, "warn");
    const { consultation } = await orchestrator.startConsultation({ clientId: "client-1" });

    const result = await orchestrator.runTurn({ consultationId: consultation.id, message: 42 });

    expect(warn).toHaveBeenCalledTimes(1);
    expect(result.informative).toBe(false);
    expect(result.transition.nextStage).toBe("opening");
    expect(result.prompt.id).toBe("opening_industry");
    expect(result.consultation.transcript[1]).toEqual({
      role: "client",
      content: "",
      stage: "opening",
      timestamp: "2026-01-01T00:00:00.000Z",
    });
  });

  it("takes the company name from the conversation", async () => {
    const { orchestrator } = setup();
    const { consultation } = await orchestrator.startConsultation({ clientId: "client-1" });

    const result = await orchestrator.runTurn({
      consultationId: consultation.id,
      message: "I run Acme Legal with 12 staff",
    });

    expect(result.consultation.companyName).toBe("Acme Legal");
    expect(result.consultation.metrics).toMatchObject({
      companyName: "Acme Legal",
      industry: "legal",
      employeeCount: 12,
    });
  });

  it("lets an operator supply the reply, see suggestions and jump ahead", async () => {
    const { orchestrator } = setup();
    const { consultation } = await orchestrator.startConsultation({ clientId: "client-1" });

    const result = await orchestrator.runTurn({
      consultationId: consultation.id,
      message: "ok",
      mode: "operator",
      operatorResponse: "Tell me about a typical week.",
      nextStage: "deep_dive",
    });

    expect(result.transition).toEqual({
      previousStage: "opening",
      nextStage: "deep_dive",
      reason: "manual_override",
    });
    expect(result.reply).toBe("Tell me about a typical week.");
    expect(result.prompt.id).toBe("deep_dive_time_wasters");
    expect(result.suggestedPrompts?.map((p) => p.id)).toEqual([
      "deep_dive_walkthrough",
      "deep_dive_hours",
    ]);
  });

  it("ignores operator fields in client mode", async () => {
    const { orchestrator } = setup();
    const { consultation } = await orchestrator.startConsultation({ clientId: "client-1" });

    const result = await orchestrator.runTurn({
      consultationId: consultation.id,
      message: "ok",
      operatorResponse: "Tell me about a typical week.",
      nextStage: "synthesis",
    });

    expect(result.transition.nextStage).toBe("opening");
    expect(result.reply).toBe(STAGE_PROMPTS.opening[1].text);
    expect(result.suggestedPrompts).toBeUndefined();
  });

  it("closes the consultation and generates every report on completion", async () => {
    const { orchestrator, store } = setup(oneTurnPerStage);
    const { consultation } = await orchestrator.startConsultation({ clientId: "client-1" });

    await orchestrator.runTurn({ consultationId: consultation.id, message: LEAD_LOSS_MESSAGE });
    await orchestrator.runTurn({ consultationId: consultation.id, message: "ok" });
    await orchestrator.runTurn({ consultationId: consultation.id, message: "ok" });
    const last = await orchestrator.runTurn({ consultationId: consultation.id, message: "ok" });

    expect(last.transition).toEqual({
      previousStage: "synthesis",
      nextStage: "completed",
      reason: "advance_by_turn_ceiling",
    });
    expect(last.reply).toBe(CLOSING_PROMPT.text);
    expect(last.consultation.status).toBe("completed");
    expect(last.consultation.endTime).toBe("2026-01-01T00:00:00.000Z");
    expect(last.reports?.map((r) => r.type)).toEqual(["diagnostic", "proposal", "executive"]);
    expect(last.reports?.[2].payload).toMatchObject({
      roiAnalysis: { roiPercentage: { status: "computed", value: 202.4 } },
    });
    expect((await store.listInsights(consultation.id)).map((i) => i.category)).toEqual([
      "manual_process",
      "spreadsheet_tracking",
      "revenue_leakage",
    ]);

    await expect(
      orchestrator.runTurn({ consultationId: consultation.id, message: "one more thing" })
    ).rejects.toBeInstanceOf(ConsultationClosedError);
  });

  it("rejects turns for unknown consultations", async () => {
    const { orchestrator } = setup();

    await expect(
      orchestrator.runTurn({ consultationId: "missing", message: "hello" })
    ).rejects.toBeInstanceOf(ConsultationNotFoundError);
  });

  it("writes no bottlenecks when the turn itself fails to persist", async () => {
    class FlakyStore extends InMemoryConsultationStore {
      failNextUpdate = true;

      async updateConsultation(id: string, patch: ConsultationPatch): Promise<Consultation> {
        if (this.failNextUpdate) {
          this.failNextUpdate = false;
          throw new PersistenceError("updateConsultation", new Error("connection reset"));
        }
        return super.updateConsultation(id, patch);
      }
    }
    const store = new FlakyStore();
    const { orchestrator } = setup(baseConfig, store);
    const { consultation } = await orchestrator.startConsultation({ clientId: "client-1" });

    await expect(
      orchestrator.runTurn({ consultationId: consultation.id, message: LEAD_LOSS_MESSAGE })
    ).rejects.toBeInstanceOf(PersistenceError);
    expect(await store.listBottlenecks(consultation.id)).toEqual([]);

    const retry = await orchestrator.runTurn({
      consultationId: consultation.id,
      message: LEAD_LOSS_MESSAGE,
    });
    expect(retry.informative).toBe(true);
    expect(retry.newBottlenecks).toHaveLength(3);
    expect(retry.consultation.transcript.filter((e) => e.role === "client")).toHaveLength(1);
  });

  it("propagates persistence failures", async () => {
    class FailingStore extends InMemoryConsultationStore {
      async addBottleneck(): Promise<Bottleneck> {
        throw new PersistenceError("addBottleneck", new Error("disk full"));
      }
    }
    const { orchestrator } = setup(baseConfig, new FailingStore());
    const { consultation } = await orchestrator.startConsultation({ clientId: "client-1" });

    await expect(
      orchestrator.runTurn({ consultationId: consultation.id, message: LEAD_LOSS_MESSAGE })
    ).rejects.toBeInstanceOf(PersistenceError);
  });
});

describe("ConsultationOrchestrator reports and abandonment", () => {
  it("returns the stored report on repeated requests once closed", async () => {
    const { orchestrator } = setup();
    const { consultation } = await orchestrator.startConsultation({ clientId: "client-1" });
    await orchestrator.abandonConsultation(consultation.id);

    const first = await orchestrator.generateReport(consultation.id, "proposal");
    const second = await orchestrator.generateReport(consultation.id, "proposal");

    expect(second).toEqual(first);
    expect(first).not.toHaveProperty("draft");
    expect(first.payload).toMatchObject({
      roiAnalysis: { annualSavings: 0, roiPercentage: { status: "not_computed" } },
    });
  });

  it("serves drafts for an open consultation without storing reports or insights", async () => {
    const { orchestrator, store } = setup();
    const { consultation } = await orchestrator.startConsultation({ clientId: "client-1" });
    await orchestrator.runTurn({ consultationId: consultation.id, message: LEAD_LOSS_MESSAGE });

    const draft = await orchestrator.generateReport(consultation.id, "executive");

    expect(draft).toMatchObject({
      consultationId: consultation.id,
      type: "executive",
      draft: true,
      generatedAt: "2026-01-01T00:00:00.000Z",
      payload: { keyFindings: { bottleneckCount: 3 } },
    });
    expect(await store.listReports(consultation.id)).toEqual([]);
    expect(await store.listInsights(consultation.id)).toEqual([]);
  });

  it("snapshots an open consultation with draft insights", async () => {
    const { orchestrator, store } = setup();
    const { consultation } = await orchestrator.startConsultation({ clientId: "client-1" });
    await orchestrator.runTurn({ consultationId: consultation.id, message: LEAD_LOSS_MESSAGE });

    const snapshot = await orchestrator.getSnapshot(consultation.id);

    expect(snapshot.consultation.stage).toBe("discovery");
    expect(snapshot.bottlenecks).toHaveLength(3);
    expect(snapshot.insights.map((i) => i.category)).toEqual([
      "manual_process",
      "spreadsheet_tracking",
      "revenue_leakage",
    ]);
    expect(await store.listInsights(consultation.id)).toEqual([]);
  });

  it("builds the closing reports from every bottleneck, even after an earlier draft", async () => {
    const { orchestrator, store } = setup();
    const { consultation } = await orchestrator.startConsultation({ clientId: "client-1" });
    const early = await orchestrator.generateReport(consultation.id, "executive");
    expect(early.payload).toMatchObject({ keyFindings: { bottleneckCount: 0 } });

    await orchestrator.runTurn({ consultationId: consultation.id, message: LEAD_LOSS_MESSAGE });
    const { reports } = await orchestrator.abandonConsultation(consultation.id);

    expect(await store.listBottlenecks(consultation.id)).toHaveLength(3);
    expect(reports.find((r) => r.type === "executive")).toMatchObject({
      payload: { keyFindings: { bottleneckCount: 3 } },
    });
    expect((await store.listInsights(consultation.id)).map((i) => i.category)).toEqual(
      expect.arrayContaining(["manual_process", "spreadsheet_tracking", "revenue_leakage"])
    );

    const markdown = await orchestrator.exportExecutiveMarkdown(consultation.id);
    expect(markdown.split("\n")).toContain("- Bottlenecks identified: 3");
  });

  it("closes an abandoned consultation with reports and refuses a second abandon", async () => {
    const { orchestrator } = setup();
    const { consultation } = await orchestrator.startConsultation({ clientId: "client-1" });
    await orchestrator.runTurn({ consultationId: consultation.id, message: LEAD_LOSS_MESSAGE });

    const { consultation: closed, reports } = await orchestrator.abandonConsultation(
      consultation.id
    );

    expect(closed.status).toBe("completed");
    expect(closed.stage).toBe("discovery");
    expect(closed.endTime).toBe("2026-01-01T00:00:00.000Z");
    expect(reports).toHaveLength(3);
    await expect(orchestrator.abandonConsultation(consultation.id)).rejects.toBeInstanceOf(
      ConsultationClosedError
    );
  });

  it("previews the executive summary without storing it", async () => {
    const { orchestrator, store } = setup();
    const { consultation } = await orchestrator.startConsultation({ clientId: "client-1" });
    await orchestrator.runTurn({ consultationId: consultation.id, message: LEAD_LOSS_MESSAGE });

    const summary = await orchestrator.previewExecutiveSummary(consultation.id);

    expect(summary.keyFindings.projectedAnnualSavings).toBe(98_280);
    expect(await store.listReports(consultation.id)).toEqual([]);
  });

  it("exports markdown for open and closed consultations", async () => {
    const { orchestrator, store } = setup();
    const { consultation } = await orchestrator.startConsultation({
      clientId: "client-1",
      companyName: "Acme Legal",
    });

    const open = await orchestrator.exportExecutiveMarkdown(consultation.id);
    expect(open.split("\n").slice(0, 3)).toEqual([
      "# Executive Summary: Acme Legal",
      "",
      "_Generated 2026-01-01T00:00:00.000Z_",
    ]);
    expect(await store.listReports(consultation.id)).toEqual([]);

    await orchestrator.abandonConsultation(consultation.id);
    const closed = await orchestrator.exportExecutiveMarkdown(consultation.id);
    expect(closed.split("\n")[0]).toBe("# Executive Summary: Acme Legal");
    expect(await store.listReports(consultation.id)).toHaveLength(3);
  });
});
