// src/repositories/pgConsultationStore.ts
// PostgreSQL ConsultationStore. Tables are defined in db/schema.sql.

import crypto from "node:crypto";
import type { Pool } from "pg";
import { z } from "zod";
import {
  ConsultationClosedError,
  ConsultationNotFoundError,
  PersistenceError,
} from "../intake/errors";
import { INTAKE_STAGES } from "../intake/flow/intakeStageMachine";
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

export type SqlRow = Record<string, unknown>;

/** Runs one statement and resolves to its rows. */
export type SqlQuery = (sql: string, params?: unknown[]) => Promise<SqlRow[]>;

export function createPoolQuery(pool: Pool): SqlQuery {
  return async (sql, params) => {
    const result = await pool.query(sql, params);
    return result.rows;
  };
}

export interface PgConsultationStoreDeps {
  query: SqlQuery;
  now?: () => string;
  newId?: () => string;
}

// --- row schemas -----------------------------------------------------------

const timestamp = z
  .union([z.date(), z.string()])
  .transform((v) => (v instanceof Date ? v.toISOString() : v));

const stageSchema = z.enum(INTAKE_STAGES);
const prioritySchema = z.enum(["low", "medium", "high", "critical"]);
const effortSchema = z.enum(["low", "medium", "high"]);
const reportTypeSchema = z.enum(["diagnostic", "proposal", "executive"]);

const metricsSchema = z.object({
  companyName: z.string().optional(),
  industry: z
    .enum(["legal", "accounting", "consulting", "msp", "healthcare", "other"])
    .optional(),
  employeeCount: z.number().optional(),
  annualRevenue: z.number().optional(),
  technologies: z.array(z.string()),
  challenges: z.array(z.string()),
});

const consultationRowSchema = z
  .object({
    id: z.string(),
    client_id: z.string(),
    company_name: z.string().nullable(),
    start_time: timestamp,
    end_time: timestamp.nullable(),
    status: z.enum(["in_progress", "completed"]),
    stage: stageSchema,
    stage_progress: z.object({
      turnsInStage: z.number(),
      informativeExchangesInStage: z.number(),
      usedPromptIds: z.array(z.string()),
    }),
    transcript: z.array(
      z.object({
        role: z.enum(["client", "consultant"]),
        content: z.string(),
        stage: stageSchema,
        timestamp: z.string(),
      })
    ),
    metrics: metricsSchema,
  })
  .transform(
    (row): Consultation => ({
      id: row.id,
      clientId: row.client_id,
      companyName: row.company_name,
      startTime: row.start_time,
      endTime: row.end_time,
      status: row.status,
      stage: row.stage,
      stageProgress: row.stage_progress,
      transcript: row.transcript,
      metrics: row.metrics,
    })
  );

const bottleneckRowSchema = z
  .object({
    id: z.string(),
    consultation_id: z.string(),
    category: z.string(),
    name: z.string(),
    description: z.string(),
    weekly_hours_impact: z.coerce.number(),
    weekly_cost_impact: z.coerce.number(),
    automation_potential: z.coerce.number(),
    priority: prioritySchema,
    created_at: timestamp,
  })
  .transform(
    (row): Bottleneck => ({
      id: row.id,
      consultationId: row.consultation_id,
      category: row.category,
      name: row.name,
      description: row.description,
      weeklyHoursImpact: row.weekly_hours_impact,
      weeklyCostImpact: row.weekly_cost_impact,
      automationPotential: row.automation_potential,
      priority: row.priority,
      createdAt: row.created_at,
    })
  );

const insightRowSchema = z
  .object({
    id: z.string(),
    consultation_id: z.string(),
    category: z.string(),
    text: z.string(),
    confidence: z.coerce.number(),
    potential_value: z.coerce.number(),
    implementation_effort: effortSchema,
    priority_score: z.coerce.number(),
    created_at: timestamp,
  })
  .transform(
    (row): Insight => ({
      id: row.id,
      consultationId: row.consultation_id,
      category: row.category,
      text: row.text,
      confidence: row.confidence,
      potentialValue: row.potential_value,
      implementationEffort: row.implementation_effort,
      priorityScore: row.priority_score,
      createdAt: row.created_at,
    })
  );

const reportRowSchema = z
  .object({
    id: z.string(),
    consultation_id: z.string(),
    type: reportTypeSchema,
    payload: z.unknown(),
    generated_at: timestamp,
  })
  .transform(
    (row): Report => ({
      id: row.id,
      consultationId: row.consultation_id,
      type: row.type,
      payload: row.payload,
      generatedAt: row.generated_at,
    })
  );

const CONSULTATION_COLUMNS =
  "id, client_id, company_name, start_time, end_time, status, stage, stage_progress, transcript, metrics";
const BOTTLENECK_COLUMNS =
  "id, consultation_id, category, name, description, weekly_hours_impact, weekly_cost_impact, automation_potential, priority, created_at";
const INSIGHT_COLUMNS =
  "id, consultation_id, category, text, confidence, potential_value, implementation_effort, priority_score, created_at";
const REPORT_COLUMNS = "id, consultation_id, type, payload, generated_at";

export class PgConsultationStore implements ConsultationStore {
  private readonly now: () => string;
  private readonly newId: () => string;

  constructor(private readonly deps: PgConsultationStoreDeps) {
    this.now = deps.now ?? (() => new Date().toISOString());
    this.newId = deps.newId ?? (() => crypto.randomUUID());
  }

  async createConsultation(input: NewConsultation): Promise<Consultation> {
    const rows = await this.run(
      "createConsultation",
      `INSERT INTO consultations (${CONSULTATION_COLUMNS})
       VALUES ($1, $2, $3, $4, NULL, 'in_progress', $5, $6, $7, $8)
       RETURNING ${CONSULTATION_COLUMNS}`,
      [
        this.newId(),
        input.clientId,
        input.companyName,
        this.now(),
        input.stage,
        JSON.stringify(input.stageProgress),
        JSON.stringify(input.transcript),
        JSON.stringify(input.metrics),
      ]
    );
    return this.one("createConsultation", rows, consultationRowSchema);
  }

  async getConsultation(id: string): Promise<Consultation | undefined> {
    const rows = await this.run(
      "getConsultation",
      `SELECT ${CONSULTATION_COLUMNS} FROM consultations WHERE id = $1`,
      [id]
    );
    return rows.length === 0 ? undefined : this.one("getConsultation", rows, consultationRowSchema);
  }

  async updateConsultation(id: string, patch: ConsultationPatch): Promise<Consultation> {
    const existing = await this.getConsultation(id);
    if (!existing) throw new ConsultationNotFoundError(id);
    if (existing.status === "completed") throw new ConsultationClosedError(id);

    const next: Consultation = { ...existing, ...patch };
    const rows = await this.run(
      "updateConsultation",
      `UPDATE consultations
          SET company_name = $2, end_time = $3, status = $4, stage = $5,
              stage_progress = $6, transcript = $7, metrics = $8
        WHERE id = $1 AND status = 'in_progress'
        RETURNING ${CONSULTATION_COLUMNS}`,
      [
        id,
        next.companyName,
        next.endTime,
        next.status,
        next.stage,
        JSON.stringify(next.stageProgress),
        JSON.stringify(next.transcript),
        JSON.stringify(next.metrics),
      ]
    );
    if (rows.length === 0) throw new ConsultationClosedError(id);
    return this.one("updateConsultation", rows, consultationRowSchema);
  }

  async addBottleneck(input: NewBottleneck): Promise<Bottleneck> {
    const rows = await this.run(
      "addBottleneck",
      `INSERT INTO bottlenecks (${BOTTLENECK_COLUMNS})
       SELECT $1::text, $2::text, $3::text, $4::text, $5::text,
              $6::double precision, $7::double precision, $8::double precision,
              $9::text, $10::timestamptz
        WHERE EXISTS (SELECT 1 FROM consultations WHERE id = $2::text)
       RETURNING ${BOTTLENECK_COLUMNS}`,
      [
        this.newId(),
        input.consultationId,
        input.category,
        input.name,
        input.description,
        input.weeklyHoursImpact,
        input.weeklyCostImpact,
        input.automationPotential,
        input.priority,
        this.now(),
      ]
    );
    if (rows.length === 0) throw new ConsultationNotFoundError(input.consultationId);
    return this.one("addBottleneck", rows, bottleneckRowSchema);
  }

  async listBottlenecks(consultationId: string): Promise<Bottleneck[]> {
    const rows = await this.run(
      "listBottlenecks",
      `SELECT ${BOTTLENECK_COLUMNS} FROM bottlenecks WHERE consultation_id = $1 ORDER BY seq`,
      [consultationId]
    );
    return this.many("listBottlenecks", rows, bottleneckRowSchema);
  }

  async addInsight(input: NewInsight): Promise<Insight> {
    const rows = await this.run(
      "addInsight",
      `INSERT INTO insights (${INSIGHT_COLUMNS})
       SELECT $1::text, $2::text, $3::text, $4::text,
              $5::double precision, $6::double precision, $7::text,
              $8::double precision, $9::timestamptz
        WHERE EXISTS (SELECT 1 FROM consultations WHERE id = $2::text)
       RETURNING ${INSIGHT_COLUMNS}`,
      [
        this.newId(),
        input.consultationId,
        input.category,
        input.text,
        input.confidence,
        input.potentialValue,
        input.implementationEffort,
        input.priorityScore,
        this.now(),
      ]
    );
    if (rows.length === 0) throw new ConsultationNotFoundError(input.consultationId);
    return this.one("addInsight", rows, insightRowSchema);
  }

  async listInsights(consultationId: string): Promise<Insight[]> {
    const rows = await this.run(
      "listInsights",
      `SELECT ${INSIGHT_COLUMNS} FROM insights WHERE consultation_id = $1 ORDER BY seq`,
      [consultationId]
    );
    return this.many("listInsights", rows, insightRowSchema);
  }

  async addReport(input: NewReport): Promise<Report> {
    const existing = await this.findReport(input.consultationId, input.type);
    if (existing) return existing;

    const rows = await this.run(
      "addReport",
      `INSERT INTO reports (${REPORT_COLUMNS})
       SELECT $1::text, $2::text, $3::text, $4::jsonb, $5::timestamptz
        WHERE EXISTS (SELECT 1 FROM consultations WHERE id = $2::text)
       ON CONFLICT (consultation_id, type) DO NOTHING
       RETURNING ${REPORT_COLUMNS}`,
      [this.newId(), input.consultationId, input.type, JSON.stringify(input.payload), this.now()]
    );
    if (rows.length > 0) return this.one("addReport", rows, reportRowSchema);

    // lost a race with a concurrent insert, or the consultation is missing
    const stored = await this.findReport(input.consultationId, input.type);
    if (!stored) throw new ConsultationNotFoundError(input.consultationId);
    return stored;
  }

  async getReport(reportId: string): Promise<Report | undefined> {
    const rows = await this.run(
      "getReport",
      `SELECT ${REPORT_COLUMNS} FROM reports WHERE id = $1`,
      [reportId]
    );
    return rows.length === 0 ? undefined : this.one("getReport", rows, reportRowSchema);
  }

  async findReport(consultationId: string, type: ReportType): Promise<Report | undefined> {
    const rows = await this.run(
      "findReport",
      `SELECT ${REPORT_COLUMNS} FROM reports WHERE consultation_id = $1 AND type = $2`,
      [consultationId, type]
    );
    return rows.length === 0 ? undefined : this.one("findReport", rows, reportRowSchema);
  }

  async listReports(consultationId: string): Promise<Report[]> {
    const rows = await this.run(
      "listReports",
      `SELECT ${REPORT_COLUMNS} FROM reports WHERE consultation_id = $1 ORDER BY seq`,
      [consultationId]
    );
    return this.many("listReports", rows, reportRowSchema);
  }

  // --- helpers ---------------------------------------------------------------

  private async run(operation: string, sql: string, params: unknown[]): Promise<SqlRow[]> {
    try {
      return await this.deps.query(sql, params);
    } catch (err) {
      throw new PersistenceError(operation, err);
    }
  }

  private one<T>(operation: string, rows: SqlRow[], schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
    const parsed = schema.safeParse(rows[0]);
    if (!parsed.success) {
      throw new PersistenceError(operation, parsed.error);
    }
    return parsed.data;
  }

  private many<T>(operation: string, rows: SqlRow[], schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] {
    return rows.map((row) => this.one(operation, [row], schema));
  }
}
