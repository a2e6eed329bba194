// src/repositories/consultationStore.ts

import type {
  Bottleneck,
  Consultation,
  ConsultationPatch,
  Insight,
  NewBottleneck,
  NewInsight,
  NewReport,
  Report,
  ReportType,
} from "../intake/types";

/** Fields supplied when a consultation is opened; the store assigns the rest. */
export type NewConsultation = Pick<
  Consultation,
  "clientId" | "companyName" | "stage" | "stageProgress" | "transcript" | "metrics"
>;

/**
 * Append-only storage for consultations and the records derived from them.
 *
 * - `updateConsultation` rejects with ConsultationClosedError once the
 *   consultation is completed, and ConsultationNotFoundError for unknown ids.
 * - child records (bottlenecks, insights, reports) require an existing
 *   consultation.
 * - `addReport` keeps the first report of each type; a repeat returns it.
 * - backend failures surface as PersistenceError.
 */
export interface ConsultationStore {
  createConsultation(input: NewConsultation): Promise<Consultation>;
  getConsultation(id: string): Promise<Consultation | undefined>;
  updateConsultation(id: string, patch: ConsultationPatch): Promise<Consultation>;

  addBottleneck(record: NewBottleneck): Promise<Bottleneck>;
  listBottlenecks(consultationId: string): Promise<Bottleneck[]>;

  addInsight(record: NewInsight): Promise<Insight>;
  listInsights(consultationId: string): Promise<Insight[]>;

  addReport(record: NewReport): Promise<Report>;
  getReport(reportId: string): Promise<Report | undefined>;
  findReport(consultationId: string, type: ReportType): Promise<Report | undefined>;
  listReports(consultationId: string): Promise<Report[]>;
}
