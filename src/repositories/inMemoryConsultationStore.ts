// src/repositories/inMemoryConsultationStore.ts
// Map-backed ConsultationStore for tests and local sessions.

import crypto from "node:crypto";
import { ConsultationClosedError, ConsultationNotFoundError } from "../intake/errors";
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
import type { ConsultationStore, NewConsultation } from "./consultationStore";

export interface InMemoryConsultationStoreOptions {
  now?: () => string;
  newId?: () => string;
}

const reportKey = (consultationId: string, type: ReportType): string =>
  `${consultationId}::${type}`;

export class InMemoryConsultationStore implements ConsultationStore {
  private readonly consultations = new Map<string, Consultation>();
  private readonly bottlenecks = new Map<string, Bottleneck[]>();
  private readonly insights = new Map<string, Insight[]>();
  private readonly reports = new Map<string, Report>();
  private readonly reportsByType = new Map<string, Report>();

  private readonly now: () => string;
  private readonly newId: () => string;

  constructor(options: InMemoryConsultationStoreOptions = {}) {
    this.now = options.now ?? (() => new Date().toISOString());
    this.newId = options.newId ?? (() => crypto.randomUUID());
  }

  async createConsultation(input: NewConsultation): Promise<Consultation> {
    const record: Consultation = {
      id: this.newId(),
      clientId: input.clientId,
      companyName: input.companyName,
      startTime: this.now(),
      endTime: null,
      status: "in_progress",
      stage: input.stage,
      stageProgress: input.stageProgress,
      transcript: input.transcript,
      metrics: input.metrics,
    };
    this.consultations.set(record.id, structuredClone(record));
    return record;
  }

  async getConsultation(id: string): Promise<Consultation | undefined> {
    const record = this.consultations.get(id);
    return record ? structuredClone(record) : undefined;
  }

  async updateConsultation(id: string, patch: ConsultationPatch): Promise<Consultation> {
    const existing = this.consultations.get(id);
    if (!existing) throw new ConsultationNotFoundError(id);
    if (existing.status === "completed") throw new ConsultationClosedError(id);

    const record: Consultation = { ...existing, ...structuredClone(patch) };
    this.consultations.set(id, record);
    return structuredClone(record);
  }

  async addBottleneck(input: NewBottleneck): Promise<Bottleneck> {
    this.requireConsultation(input.consultationId);
    const record: Bottleneck = { ...input, id: this.newId(), createdAt: this.now() };
    this.append(this.bottlenecks, input.consultationId, record);
    return { ...record };
  }

  async listBottlenecks(consultationId: string): Promise<Bottleneck[]> {
    return (this.bottlenecks.get(consultationId) ?? []).map((b) => ({ ...b }));
  }

  async addInsight(input: NewInsight): Promise<Insight> {
    this.requireConsultation(input.consultationId);
    const record: Insight = { ...input, id: this.newId(), createdAt: this.now() };
    this.append(this.insights, input.consultationId, record);
    return { ...record };
  }

  async listInsights(consultationId: string): Promise<Insight[]> {
    return (this.insights.get(consultationId) ?? []).map((i) => ({ ...i }));
  }

  async addReport(input: NewReport): Promise<Report> {
    this.requireConsultation(input.consultationId);
    const key = reportKey(input.consultationId, input.type);
    const existing = this.reportsByType.get(key);
    if (existing) return structuredClone(existing);

    const record: Report = {
      ...input,
      payload: structuredClone(input.payload),
      id: this.newId(),
      generatedAt: this.now(),
    };
    this.reports.set(record.id, record);
    this.reportsByType.set(key, record);
    return structuredClone(record);
  }

  async getReport(reportId: string): Promise<Report | undefined> {
    const record = this.reports.get(reportId);
    return record ? structuredClone(record) : undefined;
  }

  async findReport(consultationId: string, type: ReportType): Promise<Report | undefined> {
    const record = this.reportsByType.get(reportKey(consultationId, type));
    return record ? structuredClone(record) : undefined;
  }

  async listReports(consultationId: string): Promise<Report[]> {
    return [...this.reports.values()]
      .filter((r) => r.consultationId === consultationId)
      .map((r) => structuredClone(r));
  }

  private requireConsultation(consultationId: string): void {
    if (!this.consultations.has(consultationId)) {
      throw new ConsultationNotFoundError(consultationId);
    }
  }

  private append<T>(table: Map<string, T[]>, consultationId: string, record: T): void {
    const rows = table.get(consultationId);
    if (rows) rows.push(record);
    else table.set(consultationId, [record]);
  }
}
