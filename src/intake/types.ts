// src/intake/types.ts

import type { IntakeStage } from "./flow/intakeStageMachine";

export type Industry =
  | "legal"
  | "accounting"
  | "consulting"
  | "msp"
  | "healthcare"
  | "other";

export type Priority = "low" | "medium" | "high" | "critical";

export type ImplementationEffort = "low" | "medium" | "high";

export type ConsultationStatus = "in_progress" | "completed";

export type ReportType = "diagnostic" | "proposal" | "executive";

export type ImplementationTier = "starter" | "growth" | "enterprise";

/**
 * Company facts gathered during intake. Every field is optional until the
 * extractor observes it; list fields start empty.
 */
export interface CompanyMetrics {
  companyName?: string;
  industry?: Industry;
  employeeCount?: number;
  annualRevenue?: number;
  technologies: string[];
  challenges: string[];
}

export type TranscriptRole = "client" | "consultant";

export interface TranscriptEntry {
  role: TranscriptRole;
  content: string;
  stage: IntakeStage;
  timestamp: string; // ISO8601
}

export interface StageProgress {
  turnsInStage: number;
  informativeExchangesInStage: number;
  usedPromptIds: string[];
}

export interface Consultation {
  id: string;
  clientId: string;
  companyName: string | null;
  startTime: string;
  endTime: string | null;
  status: ConsultationStatus;
  stage: IntakeStage;
  stageProgress: StageProgress;
  transcript: TranscriptEntry[];
  metrics: CompanyMetrics;
}

/** Fields a caller may change on an open consultation. */
export type ConsultationPatch = Partial<
  Pick<
    Consultation,
    | "companyName"
    | "endTime"
    | "status"
    | "stage"
    | "stageProgress"
    | "transcript"
    | "metrics"
  >
>;

export interface Bottleneck {
  id: string;
  consultationId: string;
  category: string;
  name: string;
  description: string;
  weeklyHoursImpact: number;
  weeklyCostImpact: number;
  automationPotential: number;
  priority: Priority;
  createdAt: string;
}

export interface Insight {
  id: string;
  consultationId: string;
  category: string;
  text: string;
  confidence: number;
  potentialValue: number;
  implementationEffort: ImplementationEffort;
  priorityScore: number;
  createdAt: string;
}

export interface Report<TPayload = unknown> {
  id: string;
  consultationId: string;
  type: ReportType;
  payload: TPayload;
  generatedAt: string;
}

/** Record shapes accepted by the store before an id is assigned. */
export type NewBottleneck = Omit<Bottleneck, "id" | "createdAt">;
export type NewInsight = Omit<Insight, "id" | "createdAt">;
export type NewReport = Omit<Report, "id" | "generatedAt">;

export function emptyCompanyMetrics(): CompanyMetrics {
  return { technologies: [], challenges: [] };
}
