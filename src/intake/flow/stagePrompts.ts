// src/intake/flow/stagePrompts.ts
// Consultant prompt pools per stage, handed out first-unused-first.

import type { ActiveIntakeStage, IntakeStage } from "./intakeStageMachine";

export interface StagePrompt {
  id: string;
  text: string;
}

export const GENERIC_CONTINUATION_PROMPT: StagePrompt = {
  id: "generic_continue",
  text: "Could you tell me more about that?",
};

export const CLOSING_PROMPT: StagePrompt = {
  id: "completed_closing",
  text: "Thank you, that gives me a clear picture. I'm preparing your diagnostic report and proposal now.",
};

export const STAGE_PROMPTS: Record<ActiveIntakeStage, StagePrompt[]> = {
  opening: [
    {
      id: "opening_welcome",
      text: "Hello! I'm here to help find the inefficiencies in your business processes and where automation can pay off. Could you start by telling me about your company: its name, what you do, and how many people work there?",
    },
    {
      id: "opening_industry",
      text: "Which industry would you say you're in, and who are your typical customers?",
    },
  ],
  discovery: [
    {
      id: "discovery_operations",
      text: "Could you walk me through your day-to-day operations and what your team typically works on?",
    },
    {
      id: "discovery_tools",
      text: "Which tools and systems does the team rely on today: spreadsheets, accounting software, a CRM?",
    },
    {
      id: "discovery_revenue",
      text: "Roughly what is your annual revenue? A ballpark figure is fine.",
    },
  ],
  deep_dive: [
    {
      id: "deep_dive_time_wasters",
      text: "What are the biggest time-wasters or frustrations in your current processes?",
    },
    {
      id: "deep_dive_walkthrough",
      text: "Let's dig into that. Can you walk me through exactly how it works today, step by step, and how many people are involved?",
    },
    {
      id: "deep_dive_hours",
      text: "How many hours a week would you estimate that costs your team?",
    },
  ],
  synthesis: [
    {
      id: "synthesis_playback",
      text: "Based on what you've told me, I can see several areas where automation could save significant time. Is there anything important we haven't covered?",
    },
    {
      id: "synthesis_priorities",
      text: "If you could fix only one of these problems in the next 90 days, which would it be?",
    },
  ],
};

/**
 * First template of the stage pool that has not been used in this
 * consultation yet, the generic continuation prompt once the pool is
 * exhausted, and the closing message for completed.
 */
export function selectStagePrompt(
  stage: IntakeStage,
  usedPromptIds: readonly string[]
): StagePrompt {
  if (stage === "completed") {
    return CLOSING_PROMPT;
  }

  const unused = STAGE_PROMPTS[stage].find(
    (prompt) => !usedPromptIds.includes(prompt.id)
  );
  return unused ?? GENERIC_CONTINUATION_PROMPT;
}

/** Remaining pool for a stage, shown to operators as suggestions. */
export function listUnusedStagePrompts(
  stage: IntakeStage,
  usedPromptIds: readonly string[]
): StagePrompt[] {
  if (stage === "completed") return [];
  return STAGE_PROMPTS[stage].filter(
    (prompt) => !usedPromptIds.includes(prompt.id)
  );
}
