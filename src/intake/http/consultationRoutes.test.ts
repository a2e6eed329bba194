// src/intake/http/consultationRoutes.test.ts

import pino from "pino";
import { InMemoryConsultationStore } from "../../repositories/inMemoryConsultationStore";
import { PersistenceError } from "../errors";
import { DEFAULT_STAGE_THRESHOLDS } from "../flow/intakeStageMachine";
import { ConsultationOrchestrator } from "../orchestrator/consultationOrchestrator";
import type { Consultation } from "../types";
import {
  createConsultationHandlers,
  type ConsultationHandler,
  type HandlerRequest,
  type HandlerResponse,
} from "./consultationRoutes";

type TestResult = { statusCode: number; body: unknown; contentType?: string };

function createHandlers(store = new InMemoryConsultationStore()) {
  const logger = pino({ level: "silent" });
  const orchestrator = new ConsultationOrchestrator({
    store,
    logger,
    config: {
      stageThresholds: DEFAULT_STAGE_THRESHOLDS,
      topN: 3,
      defaultTier: "growth",
      bottleneckDedup: "by_name",
    },
    now: () => "2026-01-01T00:00:00.000Z",
  });
  return { handlers: createConsultationHandlers(logger, { orchestrator }), orchestrator };
}

async function call(
  handler: ConsultationHandler,
  req: Partial<HandlerRequest>
): Promise<TestResult> {
  const result: TestResult = { statusCode: 200, body: undefined };

  const res: HandlerResponse = {
    status(code) {
      result.statusCode = code;
      return res;
    },
    json(payload) {
      result.body = payload;
      return res;
    },
    type(contentType) {
      result.contentType = contentType;
      return res;
    },
    send(payload) {
      result.body = payload;
      return res;
    },
  };

  await handler({ params: {}, query: {}, body: undefined, ...req }, res);
  return result;
}

async function openConsultation(orchestrator: ConsultationOrchestrator): Promise<Consultation> {
  const { consultation } = await orchestrator.startConsultation({ clientId: "client-1" });
  return consultation;
}

describe("POST /consultations", () => {
  it("creates a consultation and returns the opening prompt", async () => {
    const { handlers } = createHandlers();

    const { statusCode, body } = await call(handlers.start, {
      body: { clientId: "client-1", companyName: "Acme Legal" },
    });

    expect(statusCode).toBe(201);
    expect(body).toMatchObject({
      consultation: { clientId: "client-1", companyName: "Acme Legal", stage: "opening" },
      prompt: { id: "opening_welcome" },
    });
  });

  it("rejects a body without clientId", async () => {
    const { handlers } = createHandlers();

    const { statusCode, body } = await call(handlers.start, { body: { companyName: "x" } });

    expect(statusCode).toBe(400);
    expect(body).toMatchObject({ error: "invalid_request" });
  });
});

describe("GET /consultations/:id", () => {
  it("returns 404 for an unknown consultation", async () => {
    const { handlers } = createHandlers();

    const { statusCode, body } = await call(handlers.get, { params: { id: "missing" } });

    expect(statusCode).toBe(404);
    expect(body).toEqual({ error: "consultation_not_found", consultationId: "missing" });
  });
});

describe("POST /consultations/:id/turns", () => {
  it("runs a turn and returns the consultant reply", async () => {
    const { handlers, orchestrator } = createHandlers();
    const consultation = await openConsultation(orchestrator);

    const { statusCode, body } = await call(handlers.turn, {
      params: { id: consultation.id },
      body: { message: "We have 50 employees and lose leads because we track everything in Excel manually" },
    });

    expect(statusCode).toBe(200);
    expect(body).toMatchObject({
      informative: true,
      transition: { previousStage: "opening", nextStage: "discovery" },
      prompt: { id: "discovery_operations" },
    });
  });

  it("accepts a non-text message as an empty turn", async () => {
    const { handlers, orchestrator } = createHandlers();
    const consultation = await openConsultation(orchestrator);

    const { statusCode, body } = await call(handlers.turn, {
      params: { id: consultation.id },
      body: { message: { nested: true } },
    });

    expect(statusCode).toBe(200);
    expect(body).toMatchObject({ informative: false, prompt: { id: "opening_industry" } });
  });

  it("rejects an unknown mode", async () => {
    const { handlers, orchestrator } = createHandlers();
    const consultation = await openConsultation(orchestrator);

    const { statusCode } = await call(handlers.turn, {
      params: { id: consultation.id },
      body: { message: "hi", mode: "admin" },
    });

    expect(statusCode).toBe(400);
  });

  it("returns 409 once the consultation is closed", async () => {
    const { handlers, orchestrator } = createHandlers();
    const consultation = await openConsultation(orchestrator);
    await call(handlers.abandon, { params: { id: consultation.id } });

    const { statusCode, body } = await call(handlers.turn, {
      params: { id: consultation.id },
      body: { message: "hello again" },
    });

    expect(statusCode).toBe(409);
    expect(body).toEqual({ error: "consultation_closed", consultationId: consultation.id });
  });

  it("returns 500 when the store fails", async () => {
    class FailingStore extends InMemoryConsultationStore {
      async listBottlenecks(): Promise<never> {
        throw new PersistenceError("listBottlenecks", new Error("connection reset"));
      }
    }
    const { handlers, orchestrator } = createHandlers(new FailingStore());
    const consultation = await openConsultation(orchestrator);

    const { statusCode, body } = await call(handlers.turn, {
      params: { id: consultation.id },
      body: { message: "hello" },
    });

    expect(statusCode).toBe(500);
    expect(body).toEqual({ error: "persistence_failure", operation: "listBottlenecks" });
  });
});

describe("bottleneck and insight listings", () => {
  it("lists recorded bottlenecks and derived insights", async () => {
    const { handlers, orchestrator } = createHandlers();
    const consultation = await openConsultation(orchestrator);
    await orchestrator.runTurn({
      consultationId: consultation.id,
      message: "Scheduling is a mess",
    });
    await orchestrator.abandonConsultation(consultation.id);

    const bottlenecks = await call(handlers.bottlenecks, { params: { id: consultation.id } });
    const insights = await call(handlers.insights, { params: { id: consultation.id } });

    expect(bottlenecks.body).toMatchObject({ items: [{ category: "scheduling" }] });
    expect(insights.body).toMatchObject({ items: [{ category: "scheduling" }] });
  });
});

describe("POST /consultations/:id/reports", () => {
  it("generates a report of the requested type", async () => {
    const { handlers, orchestrator } = createHandlers();
    const consultation = await openConsultation(orchestrator);

    const { statusCode, body } = await call(handlers.report, {
      params: { id: consultation.id },
      body: { type: "diagnostic" },
    });

    expect(statusCode).toBe(200);
    expect(body).toMatchObject({
      report: { consultationId: consultation.id, type: "diagnostic", draft: true },
    });
  });

  it("exports the executive summary as markdown", async () => {
    const { handlers, orchestrator } = createHandlers();
    const consultation = await openConsultation(orchestrator);

    const result = await call(handlers.report, {
      params: { id: consultation.id },
      query: { format: "markdown" },
      body: { type: "executive" },
    });

    expect(result.statusCode).toBe(200);
    expect(result.contentType).toBe("text/markdown");
    expect(typeof result.body === "string" ? result.body.split("\n")[0] : null).toBe(
      "# Executive Summary: Company"
    );
  });

  it("rejects markdown for other report types and unknown types", async () => {
    const { handlers, orchestrator } = createHandlers();
    const consultation = await openConsultation(orchestrator);

    const markdown = await call(handlers.report, {
      params: { id: consultation.id },
      query: { format: "markdown" },
      body: { type: "proposal" },
    });
    const unknownType = await call(handlers.report, {
      params: { id: consultation.id },
      body: { type: "summary" },
    });

    expect(markdown.statusCode).toBe(400);
    expect(markdown.body).toEqual({ error: "markdown_export_requires_executive" });
    expect(unknownType.statusCode).toBe(400);
  });
});
