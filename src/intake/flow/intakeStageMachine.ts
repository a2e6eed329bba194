// src/intake/flow/intakeStageMachine.ts
// Linear state machine for the intake conversation stages.

/**
 * Stages of an intake conversation, in the only order they can be visited.
 *
 * - opening: greeting, company identity
 * - discovery: size, revenue, tools, day-to-day operations
 * - deep_dive: pain points and how the affected processes run today
 * - synthesis: playing back the findings and their financial impact
 * - completed: terminal; the consultation is closed and reported on
 */
export const INTAKE_STAGES = [
  "opening",
  "discovery",
  "deep_dive",
  "synthesis",
  "completed",
] as const;

export type IntakeStage = (typeof INTAKE_STAGES)[number];

/** Stages that still take client turns. */
export type ActiveIntakeStage = Exclude<IntakeStage, "completed">;

export type IntakeStageTransitionReason =
  | "initial_opening"
  | "advance_by_information"
  | "advance_by_turn_ceiling"
  | "stay_in_stage"
  | "manual_override";

export type IntakeStageTransition = {
  previousStage: IntakeStage | null;
  nextStage: IntakeStage;
  reason: IntakeStageTransitionReason;
};

export interface StageThreshold {
  /** Informative exchanges needed before the stage is considered covered. */
  minInformativeExchanges: number;
  /** Hard ceiling on turns spent in the stage. */
  maxTurns: number;
}

export type StageThresholds = Record<ActiveIntakeStage, StageThreshold>;

export const DEFAULT_STAGE_THRESHOLDS: StageThresholds = {
  opening: { minInformativeExchanges: 1, maxTurns: 3 },
  discovery: { minInformativeExchanges: 2, maxTurns: 4 },
  deep_dive: { minInformativeExchanges: 2, maxTurns: 5 },
  synthesis: { minInformativeExchanges: 1, maxTurns: 2 },
};

/**
 * Counters for the stage the conversation is in, already including the turn
 * being evaluated.
 */
export type IntakeStageSignals = {
  previousStage: IntakeStage | null;
  turnsInStage: number;
  informativeExchangesInStage: number;
  thresholds?: StageThresholds;
  manualNextStage?: IntakeStage;
};

export function stageIndex(stage: IntakeStage): number {
  return INTAKE_STAGES.indexOf(stage);
}

export function isActiveStage(stage: IntakeStage): stage is ActiveIntakeStage {
  return stage !== "completed";
}

function followingStage(stage: ActiveIntakeStage): IntakeStage {
  return INTAKE_STAGES[stageIndex(stage) + 1] ?? "completed";
}

export function getInitialIntakeStage(): IntakeStageTransition {
  return {
    previousStage: null,
    nextStage: "opening",
    reason: "initial_opening",
  };
}

/**
 * Decide the stage after a client turn.
 *
 * - no previous stage: start at opening
 * - a manual target is honoured only when it lies ahead of the current stage
 * - otherwise advance exactly one stage once either the informative-exchange
 *   minimum or the turn ceiling for the current stage is reached
 * - completed never moves
 */
export function computeNextIntakeStage(
  signals: IntakeStageSignals
): IntakeStageTransition {
  const previousStage = signals.previousStage ?? null;

  if (previousStage === null) {
    return getInitialIntakeStage();
  }

  if (!isActiveStage(previousStage)) {
    return { previousStage, nextStage: previousStage, reason: "stay_in_stage" };
  }

  if (
    signals.manualNextStage &&
    stageIndex(signals.manualNextStage) > stageIndex(previousStage)
  ) {
    return {
      previousStage,
      nextStage: signals.manualNextStage,
      reason: "manual_override",
    };
  }

  const thresholds = signals.thresholds ?? DEFAULT_STAGE_THRESHOLDS;
  const threshold = thresholds[previousStage];

  if (signals.informativeExchangesInStage >= threshold.minInformativeExchanges) {
    return {
      previousStage,
      nextStage: followingStage(previousStage),
      reason: "advance_by_information",
    };
  }

  if (signals.turnsInStage >= threshold.maxTurns) {
    return {
      previousStage,
      nextStage: followingStage(previousStage),
      reason: "advance_by_turn_ceiling",
    };
  }

  return { previousStage, nextStage: previousStage, reason: "stay_in_stage" };
}
