// src/intake/http/consultationRoutes.ts

import type { Express } from "express";
import type { Logger } from "pino";
import { z } from "zod";
import { ConsultationClosedError, ConsultationNotFoundError, PersistenceError } from "../errors";
import { INTAKE_STAGES } from "../flow/intakeStageMachine";
import type { ConsultationOrchestrator } from "../orchestrator/consultationOrchestrator";

/** The parts of an express request the handlers read. */
export interface HandlerRequest {
  params: Record<string, string>;
  query: Record<string, unknown>;
  body: unknown;
}

/** The parts of an express response the handlers write. */
export interface HandlerResponse {
  status(code: number): HandlerResponse;
  json(body: unknown): unknown;
  type(contentType: string): HandlerResponse;
  send(body: string): unknown;
}

export type ConsultationHandler = (req: HandlerRequest, res: HandlerResponse) => Promise<void>;

export type ConsultationRouteDeps = {
  orchestrator: ConsultationOrchestrator;
};

const startBodySchema = z.object({
  clientId: z.string().trim().min(1),
  companyName: z.string().optional(),
});

const turnBodySchema = z.object({
  // non-text messages are accepted and handled as empty turns
  message: z.unknown(),
  mode: z.enum(["client", "operator"]).optional(),
  operatorResponse: z.string().optional(),
  nextStage: z.enum(INTAKE_STAGES).optional(),
});

const reportBodySchema = z.object({
  type: z.enum(["diagnostic", "proposal", "executive"]),
});

const reportQuerySchema = z.object({
  format: z.enum(["json", "markdown"]).default("json"),
});

function sendError(logger: Logger, res: HandlerResponse, error: unknown): void {
  if (error instanceof ConsultationNotFoundError) {
    res.status(404).json({ error: "consultation_not_found", consultationId: error.consultationId });
    return;
  }
  if (error instanceof ConsultationClosedError) {
    res.status(409).json({ error: "consultation_closed", consultationId: error.consultationId });
    return;
  }
  if (error instanceof PersistenceError) {
    logger.error({ err: error, operation: error.operation }, "[consultationRoutes] persistence failure");
    res.status(500).json({ error: "persistence_failure", operation: error.operation });
    return;
  }
  logger.error({ err: error }, "[consultationRoutes] unexpected error");
  res.status(500).json({ error: "internal_error" });
}

export function createConsultationHandlers(logger: Logger, deps: ConsultationRouteDeps) {
  const { orchestrator } = deps;

  const start: ConsultationHandler = async (req, res) => {
    const parsed = startBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: "invalid_request", details: parsed.error.issues });
      return;
    }
    try {
      const { consultation, prompt } = await orchestrator.startConsultation(parsed.data);
      res.status(201).json({ consultation, prompt });
    } catch (error) {
      sendError(logger, res, error);
    }
  };

  const get: ConsultationHandler = async (req, res) => {
    try {
      res.json({ consultation: await orchestrator.getConsultation(req.params.id) });
    } catch (error) {
      sendError(logger, res, error);
    }
  };

  const turn: ConsultationHandler = async (req, res) => {
    const parsed = turnBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: "invalid_request", details: parsed.error.issues });
      return;
    }
    try {
      const { message, mode, operatorResponse, nextStage } = parsed.data;
      const result = await orchestrator.runTurn({
        consultationId: req.params.id,
        message,
        mode,
        operatorResponse,
        nextStage,
      });
      res.json(result);
    } catch (error) {
      sendError(logger, res, error);
    }
  };

  const abandon: ConsultationHandler = async (req, res) => {
    try {
      res.json(await orchestrator.abandonConsultation(req.params.id));
    } catch (error) {
      sendError(logger, res, error);
    }
  };

  const bottlenecks: ConsultationHandler = async (req, res) => {
    try {
      res.json({ items: await orchestrator.listBottlenecks(req.params.id) });
    } catch (error) {
      sendError(logger, res, error);
    }
  };

  const insights: ConsultationHandler = async (req, res) => {
    try {
      res.json({ items: await orchestrator.listInsights(req.params.id) });
    } catch (error) {
      sendError(logger, res, error);
    }
  };

  const report: ConsultationHandler = async (req, res) => {
    const body = reportBodySchema.safeParse(req.body ?? {});
    const query = reportQuerySchema.safeParse(req.query);
    if (!body.success || !query.success) {
      const issues = [
        ...(body.success ? [] : body.error.issues),
        ...(query.success ? [] : query.error.issues),
      ];
      res.status(400).json({ error: "invalid_request", details: issues });
      return;
    }

    if (query.data.format === "markdown" && body.data.type !== "executive") {
      res.status(400).json({ error: "markdown_export_requires_executive" });
      return;
    }

    try {
      if (query.data.format === "markdown") {
        const markdown = await orchestrator.exportExecutiveMarkdown(req.params.id);
        res.status(200).type("text/markdown").send(markdown);
        return;
      }
      res.json({ report: await orchestrator.generateReport(req.params.id, body.data.type) });
    } catch (error) {
      sendError(logger, res, error);
    }
  };

  return { start, get, turn, abandon, bottlenecks, insights, report };
}

export function registerConsultationRoutes(
  app: Express,
  logger: Logger,
  deps: ConsultationRouteDeps
): void {
  const handlers = createConsultationHandlers(logger, deps);

  app.post("/consultations", handlers.start);
  app.get("/consultations/:id", handlers.get);
  app.post("/consultations/:id/turns", handlers.turn);
  app.post("/consultations/:id/abandon", handlers.abandon);
  app.get("/consultations/:id/bottlenecks", handlers.bottlenecks);
  app.get("/consultations/:id/insights", handlers.insights);
  app.post("/consultations/:id/reports", handlers.report);
}
