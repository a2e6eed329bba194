// src/intake/orchestrator/consultationOrchestrator.ts
//
// Drives a consultation turn by turn: extraction and bottleneck detection on
// the client's text, the stage transition, the consultant's next prompt and
// the incremental writes to the store. Reaching `completed` closes the
// consultation and produces its insights and reports.

import type pino from "pino";
import type { BottleneckDedupPolicy, IntakeConfig } from "../../config/intakeConfig";
import type { ConsultationStore } from "../../repositories/consultationStore";
import { generateInsights } from "../analysis/insightGenerator";
import { buildExecutiveSummary, compareToIndustry, type ExecutiveSummary } from "../analysis/roiAnalyzer";
import { ConsultationClosedError, ConsultationNotFoundError } from "../errors";
import {
  BUILT_IN_BOTTLENECK_RULES,
  identifyBottlenecks,
  type BottleneckCandidate,
  type BottleneckRule,
} from "../extraction/bottleneckIdentifier";
import { countNewFacts, extractMetrics, mergeMetrics } from "../extraction/metricExtractor";
import {
  computeNextIntakeStage,
  getInitialIntakeStage,
  type IntakeStage,
  type IntakeStageTransition,
} from "../flow/intakeStageMachine";
import {
  CLOSING_PROMPT,
  GENERIC_CONTINUATION_PROMPT,
  listUnusedStagePrompts,
  selectStagePrompt,
  type StagePrompt,
} from "../flow/stagePrompts";
import { logIntakeEvent } from "../observability/intakeEventLogger";
import {
  buildReport,
  isExecutiveReportPayload,
  type InsightSummary,
} from "../reports/reportBuilder";
import { renderExecutiveMarkdown } from "../reports/renderReportMarkdown";
import type {
  Bottleneck,
  CompanyMetrics,
  Consultation,
  Insight,
  NewReport,
  Report,
  ReportType,
  StageProgress,
  TranscriptEntry,
} from "../types";

export type TurnMode = "client" | "operator";

export const REPORT_TYPES: readonly ReportType[] = ["diagnostic", "proposal", "executive"];

export type OrchestratorConfig = Pick<
  IntakeConfig,
  "stageThresholds" | "topN" | "defaultTier" | "bottleneckDedup"
>;

/** A report built for an open consultation; it has no id and is not stored. */
export interface DraftReport extends NewReport {
  generatedAt: string;
  draft: true;
}

export interface ConsultationSnapshot {
  consultation: Consultation;
  bottlenecks: Bottleneck[];
  /** Stored insights once completed; drafts while open. */
  insights: InsightSummary[];
}

export interface ConsultationOrchestratorDeps {
  store: ConsultationStore;
  logger: pino.Logger;
  config: OrchestratorConfig;
  rules?: BottleneckRule[];
  now?: () => string;
}

export interface StartConsultationInput {
  clientId: string;
  companyName?: string;
}

export interface StartConsultationResult {
  consultation: Consultation;
  prompt: StagePrompt;
}

export interface RunTurnInput {
  consultationId: string;
  /** Client text. Anything other than a string is treated as an empty turn. */
  message: unknown;
  mode?: TurnMode;
  /** Operator mode only: replaces the selected prompt as the consultant reply. */
  operatorResponse?: string;
  /** Operator mode only: jump ahead to a later stage. */
  nextStage?: IntakeStage;
}

export interface RunTurnResult {
  consultation: Consultation;
  transition: IntakeStageTransition;
  prompt: StagePrompt;
  reply: string;
  informative: boolean;
  extracted: Partial<CompanyMetrics>;
  newBottlenecks: Bottleneck[];
  /** Operator mode only: prompts of the current stage not used yet. */
  suggestedPrompts?: StagePrompt[];
  /** Present on the turn that completes the consultation. */
  reports?: Report[];
}

function clientText(transcript: readonly TranscriptEntry[]): string {
  return transcript
    .filter((entry) => entry.role === "client" && entry.content.length > 0)
    .map((entry) => entry.content)
    .join("\n");
}

function isPoolPrompt(prompt: StagePrompt): boolean {
  return prompt.id !== GENERIC_CONTINUATION_PROMPT.id && prompt.id !== CLOSING_PROMPT.id;
}

function filterDuplicates(
  candidates: BottleneckCandidate[],
  existing: readonly Bottleneck[],
  policy: BottleneckDedupPolicy
): { kept: BottleneckCandidate[]; skipped: BottleneckCandidate[] } {
  if (policy === "additive") return { kept: candidates, skipped: [] };

  const known = new Set(existing.map((b) => b.name));
  const kept: BottleneckCandidate[] = [];
  const skipped: BottleneckCandidate[] = [];
  for (const candidate of candidates) {
    if (known.has(candidate.name)) {
      skipped.push(candidate);
    } else {
      known.add(candidate.name);
      kept.push(candidate);
    }
  }
  return { kept, skipped };
}

export class ConsultationOrchestrator {
  private readonly rules: BottleneckRule[];
  private readonly now: () => string;

  constructor(private readonly deps: ConsultationOrchestratorDeps) {
    this.rules = deps.rules ?? BUILT_IN_BOTTLENECK_RULES;
    this.now = deps.now ?? (() => new Date().toISOString());
  }

  async startConsultation(input: StartConsultationInput): Promise<StartConsultationResult> {
    const { nextStage } = getInitialIntakeStage();
    const prompt = selectStagePrompt(nextStage, []);
    const companyName = input.companyName?.trim() || null;

    const consultation = await this.deps.store.createConsultation({
      clientId: input.clientId,
      companyName,
      stage: nextStage,
      stageProgress: {
        turnsInStage: 0,
        informativeExchangesInStage: 0,
        usedPromptIds: isPoolPrompt(prompt) ? [prompt.id] : [],
      },
      transcript: [
        { role: "consultant", content: prompt.text, stage: nextStage, timestamp: this.now() },
      ],
      metrics: companyName
        ? { companyName, technologies: [], challenges: [] }
        : { technologies: [], challenges: [] },
    });

    logIntakeEvent(this.deps.logger, {
      event: "consultation.started",
      consultationId: consultation.id,
      stage: nextStage,
      meta: { clientId: consultation.clientId },
    });

    return { consultation, prompt };
  }

  async getConsultation(consultationId: string): Promise<Consultation> {
    const consultation = await this.deps.store.getConsultation(consultationId);
    if (!consultation) throw new ConsultationNotFoundError(consultationId);
    return consultation;
  }

  async runTurn(input: RunTurnInput): Promise<RunTurnResult> {
    const { store, logger, config } = this.deps;
    const consultation = await this.getConsultation(input.consultationId);
    if (consultation.status === "completed") {
      throw new ConsultationClosedError(consultation.id);
    }

    const mode: TurnMode = input.mode ?? "client";
    let text: string;
    if (typeof input.message === "string") {
      text = input.message;
    } else {
      text = "";
      logger.warn(
        { consultationId: consultation.id, receivedType: typeof input.message },
        "[consultationOrchestrator] non-text message treated as an empty turn"
      );
      logIntakeEvent(logger, {
        event: "consultation.input_normalized",
        consultationId: consultation.id,
        stage: consultation.stage,
      });
    }

    const timestamp = this.now();
    const transcript: TranscriptEntry[] = [
      ...consultation.transcript,
      { role: "client", content: text, stage: consultation.stage, timestamp },
    ];

    // metrics are read from everything the client has said so far; bottlenecks
    // only from this turn, so a repeated sentence is not rediscovered
    const extracted = extractMetrics(clientText(transcript), consultation.metrics);
    const metrics = mergeMetrics(consultation.metrics, extracted);

    const candidates = identifyBottlenecks(text, this.rules);
    const existing = await store.listBottlenecks(consultation.id);
    const { kept, skipped } = filterDuplicates(candidates, existing, config.bottleneckDedup);

    const informative = countNewFacts(extracted) + kept.length > 0;
    const turnsInStage = consultation.stageProgress.turnsInStage + 1;
    const informativeExchangesInStage =
      consultation.stageProgress.informativeExchangesInStage + (informative ? 1 : 0);

    const transition = computeNextIntakeStage({
      previousStage: consultation.stage,
      turnsInStage,
      informativeExchangesInStage,
      thresholds: config.stageThresholds,
      manualNextStage: mode === "operator" ? input.nextStage : undefined,
    });
    const stage = transition.nextStage;
    const advanced = stage !== consultation.stage;

    if (advanced) {
      logIntakeEvent(logger, {
        event: "stage.advanced",
        consultationId: consultation.id,
        stage,
        meta: { from: consultation.stage, reason: transition.reason },
      });
    }

    const usedPromptIds = [...consultation.stageProgress.usedPromptIds];
    const prompt = selectStagePrompt(stage, usedPromptIds);
    if (isPoolPrompt(prompt)) usedPromptIds.push(prompt.id);

    const operatorResponse = input.operatorResponse?.trim();
    const reply =
      mode === "operator" && operatorResponse ? operatorResponse : prompt.text;
    transcript.push({ role: "consultant", content: reply, stage, timestamp });

    const stageProgress: StageProgress = advanced
      ? { turnsInStage: 0, informativeExchangesInStage: 0, usedPromptIds }
      : { turnsInStage, informativeExchangesInStage, usedPromptIds };

    // the turn is written before its bottlenecks, so a failed write leaves no
    // bottleneck without its transcript entry
    const completed = stage === "completed";
    const updated = await store.updateConsultation(consultation.id, {
      companyName: consultation.companyName ?? metrics.companyName ?? null,
      stage,
      stageProgress,
      transcript,
      metrics,
      ...(completed ? { status: "completed" as const, endTime: timestamp } : {}),
    });

    const newBottlenecks: Bottleneck[] = [];
    for (const candidate of kept) {
      const { matchedPhrases, ...fields } = candidate;
      const stored = await store.addBottleneck({ ...fields, consultationId: consultation.id });
      newBottlenecks.push(stored);
      logIntakeEvent(logger, {
        event: "bottleneck.recorded",
        consultationId: consultation.id,
        stage: consultation.stage,
        meta: { category: stored.category, priority: stored.priority, matchedPhrases },
      });
    }
    for (const candidate of skipped) {
      logIntakeEvent(logger, {
        event: "bottleneck.duplicate_skipped",
        consultationId: consultation.id,
        stage: consultation.stage,
        meta: { category: candidate.category },
      });
    }

    logIntakeEvent(logger, {
      event: "consultation.turn",
      consultationId: updated.id,
      stage,
      meta: {
        mode,
        informative,
        newFacts: countNewFacts(extracted),
        newBottlenecks: newBottlenecks.length,
      },
    });

    const result: RunTurnResult = {
      consultation: updated,
      transition,
      prompt,
      reply,
      informative,
      extracted,
      newBottlenecks,
    };
    if (mode === "operator") {
      result.suggestedPrompts = listUnusedStagePrompts(stage, usedPromptIds);
    }
    if (completed) {
      result.reports = await this.finalize(updated, "completed");
    }
    return result;
  }

  /** Closes an open consultation early; its reports are generated as on completion. */
  async abandonConsultation(consultationId: string): Promise<{
    consultation: Consultation;
    reports: Report[];
  }> {
    const consultation = await this.getConsultation(consultationId);
    if (consultation.status === "completed") {
      throw new ConsultationClosedError(consultationId);
    }

    const updated = await this.deps.store.updateConsultation(consultationId, {
      status: "completed",
      endTime: this.now(),
    });
    const reports = await this.finalize(updated, "abandoned");
    return { consultation: updated, reports };
  }

  /**
   * The report of `type`. A completed consultation's report is built once,
   * stored and returned on every later request; an open consultation gets a
   * draft built from its records as they stand, and nothing is stored.
   */
  async generateReport(consultationId: string, type: ReportType): Promise<Report | DraftReport> {
    const consultation = await this.getConsultation(consultationId);
    if (consultation.status === "completed") {
      return this.storedReport(consultation, type);
    }

    const bottlenecks = await this.deps.store.listBottlenecks(consultationId);
    const insights = this.draftInsights(consultation, bottlenecks);
    const { payload } = buildReport(type, {
      metrics: consultation.metrics,
      bottlenecks,
      insights,
      options: this.summaryOptions(),
    });
    return { consultationId, type, payload, generatedAt: this.now(), draft: true };
  }

  /** Executive summary of the consultation as it stands; nothing is stored. */
  async previewExecutiveSummary(consultationId: string): Promise<ExecutiveSummary> {
    const consultation = await this.getConsultation(consultationId);
    const bottlenecks = await this.deps.store.listBottlenecks(consultationId);
    return buildExecutiveSummary(consultation.metrics, bottlenecks, this.summaryOptions());
  }

  /**
   * Markdown export of the executive summary: the stored executive report
   * once the consultation is completed, a live preview before that.
   */
  async exportExecutiveMarkdown(consultationId: string): Promise<string> {
    const consultation = await this.getConsultation(consultationId);
    if (consultation.status !== "completed") {
      const summary = await this.previewExecutiveSummary(consultationId);
      return renderExecutiveMarkdown(summary, this.now());
    }

    const report = await this.storedReport(consultation, "executive");
    if (!isExecutiveReportPayload(report.payload)) {
      throw new Error(`stored executive report ${report.id} has an unexpected payload`);
    }
    return renderExecutiveMarkdown(report.payload, report.generatedAt);
  }

  async getSnapshot(consultationId: string): Promise<ConsultationSnapshot> {
    const consultation = await this.getConsultation(consultationId);
    const bottlenecks = await this.deps.store.listBottlenecks(consultationId);
    const insights =
      consultation.status === "completed"
        ? await this.deps.store.listInsights(consultationId)
        : this.draftInsights(consultation, bottlenecks);
    return { consultation, bottlenecks, insights };
  }

  async listBottlenecks(consultationId: string): Promise<Bottleneck[]> {
    await this.getConsultation(consultationId);
    return this.deps.store.listBottlenecks(consultationId);
  }

  async listInsights(consultationId: string): Promise<Insight[]> {
    await this.getConsultation(consultationId);
    return this.deps.store.listInsights(consultationId);
  }

  private summaryOptions() {
    return { tier: this.deps.config.defaultTier, topN: this.deps.config.topN };
  }

  private draftInsights(consultation: Consultation, bottlenecks: readonly Bottleneck[]) {
    return generateInsights(
      consultation.id,
      consultation.metrics,
      bottlenecks,
      compareToIndustry(consultation.metrics)
    );
  }

  private async storedReport(consultation: Consultation, type: ReportType): Promise<Report> {
    const { store, logger } = this.deps;

    const stored = await store.findReport(consultation.id, type);
    if (stored) {
      logIntakeEvent(logger, {
        event: "report.reused",
        consultationId: consultation.id,
        meta: { type, reportId: stored.id },
      });
      return stored;
    }

    const bottlenecks = await store.listBottlenecks(consultation.id);
    const insights = await this.ensureInsights(consultation, bottlenecks);
    const { payload } = buildReport(type, {
      metrics: consultation.metrics,
      bottlenecks,
      insights,
      options: this.summaryOptions(),
    });

    const report = await store.addReport({ consultationId: consultation.id, type, payload });
    logIntakeEvent(logger, {
      event: "report.generated",
      consultationId: consultation.id,
      stage: consultation.stage,
      meta: { type, reportId: report.id },
    });
    return report;
  }

  /** Insights of a completed consultation, derived and stored on first use. */
  private async ensureInsights(
    consultation: Consultation,
    bottlenecks: readonly Bottleneck[]
  ): Promise<Insight[]> {
    const existing = await this.deps.store.listInsights(consultation.id);
    if (existing.length > 0) return existing;

    const insights: Insight[] = [];
    for (const draft of this.draftInsights(consultation, bottlenecks)) {
      insights.push(await this.deps.store.addInsight(draft));
    }
    return insights;
  }

  private async finalize(
    consultation: Consultation,
    outcome: "completed" | "abandoned"
  ): Promise<Report[]> {
    logIntakeEvent(this.deps.logger, {
      event: outcome === "completed" ? "consultation.completed" : "consultation.abandoned",
      consultationId: consultation.id,
      stage: consultation.stage,
      meta: { endTime: consultation.endTime },
    });

    const reports: Report[] = [];
    for (const type of REPORT_TYPES) {
      reports.push(await this.storedReport(consultation, type));
    }
    return reports;
  }
}
