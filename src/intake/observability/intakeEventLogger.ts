// src/intake/observability/intakeEventLogger.ts

import type pino from "pino";

export type IntakeEventName =
  | "consultation.started"
  | "consultation.turn"
  | "consultation.input_normalized"
  | "stage.advanced"
  | "bottleneck.recorded"
  | "bottleneck.duplicate_skipped"
  | "consultation.completed"
  | "consultation.abandoned"
  | "report.generated"
  | "report.reused";

export function logIntakeEvent(
  logger: pino.Logger,
  payload: {
    event: IntakeEventName;
    consultationId: string;
    stage?: string;
    meta?: Record<string, unknown>;
  }
): void {
  logger.info(
    {
      event: payload.event,
      consultationId: payload.consultationId,
      stage: payload.stage,
      meta: payload.meta ?? {},
    },
    `intake.${payload.event}`
  );
}
