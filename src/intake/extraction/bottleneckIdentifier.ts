// src/intake/extraction/bottleneckIdentifier.ts
// Pain-point phrase matching. Rules are read from config/bottleneckRules.yaml;
// when the file cannot be read or fails validation the built-in table is used.

import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import type { Logger } from "pino";
import { z } from "zod";
import type { Priority } from "../types";

const bottleneckRuleSchema = z.object({
  category: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  weeklyHours: z.number().nonnegative(),
  weeklyCost: z.number().nonnegative(),
  automationPotential: z.number().min(0).max(1),
  patterns: z.object({
    any: z.array(z.string()).default([]),
    require: z.array(z.string()).default([]),
    /** Phrases blanked out before matching, e.g. "excel at" for the Excel rule. */
    exclude: z.array(z.string()).optional(),
  }),
});

const bottleneckRulesFileSchema = z.object({
  rules: z.array(bottleneckRuleSchema).min(1),
});

export type BottleneckRule = z.infer<typeof bottleneckRuleSchema>;

export interface BottleneckCandidate {
  category: string;
  name: string;
  description: string;
  weeklyHoursImpact: number;
  weeklyCostImpact: number;
  automationPotential: number;
  priority: Priority;
  matchedPhrases: string[];
}

export const DEFAULT_RULES_PATH = "config/bottleneckRules.yaml";

/** Built-in table; mirrors config/bottleneckRules.yaml. */
export const BUILT_IN_BOTTLENECK_RULES: BottleneckRule[] = [
  {
    category: "manual_process",
    name: "Manual process overhead",
    description: "Work handled by hand that a system could take over",
    weeklyHours: 10,
    weeklyCost: 750,
    automationPotential: 0.8,
    patterns: {
      any: ["manual", "by hand", "data entry", "copy and paste", "copy-paste", "re-enter", "retype"],
      require: [],
    },
  },
  {
    category: "spreadsheet_tracking",
    name: "Spreadsheet-based tracking",
    description: "Operational data kept in spreadsheets instead of a system of record",
    weeklyHours: 8,
    weeklyCost: 600,
    automationPotential: 0.75,
    patterns: {
      any: ["spreadsheet", "excel", "google sheets"],
      require: [],
      exclude: ["excel at", "excels"],
    },
  },
  {
    category: "revenue_leakage",
    name: "Revenue leakage from missed follow-ups",
    description: "Leads, calls or invoices that slip through without follow-up",
    weeklyHours: 6,
    weeklyCost: 1200,
    automationPotential: 0.7,
    patterns: {
      any: ["lose leads", "losing leads", "lost leads", "lose clients", "missed", "miss calls", "fall through the cracks", "forget to follow", "forgotten"],
      require: [],
    },
  },
  {
    category: "communication_gaps",
    name: "Communication gaps",
    description: "Time lost chasing information across email and phone",
    weeklyHours: 5,
    weeklyCost: 375,
    automationPotential: 0.6,
    patterns: { any: ["phone tag", "back and forth", "chasing", "follow up", "follow-up"], require: [] },
  },
  {
    category: "slow_turnaround",
    name: "Slow turnaround",
    description: "Work waiting in queues or on approvals",
    weeklyHours: 6,
    weeklyCost: 450,
    automationPotential: 0.5,
    patterns: { any: ["slow", "delay", "waiting on", "wait for", "backlog", "bottleneck"], require: [] },
  },
  {
    category: "scheduling",
    name: "Scheduling overhead",
    description: "Manual coordination of appointments and calendars",
    weeklyHours: 3,
    weeklyCost: 150,
    automationPotential: 0.85,
    patterns: { any: ["scheduling", "double-book", "double book", "calendar", "appointments"], require: [] },
  },
  {
    category: "reporting",
    name: "Manual reporting",
    description: "Reports and reconciliations assembled by hand",
    weeklyHours: 5,
    weeklyCost: 375,
    automationPotential: 0.7,
    patterns: { any: ["reporting", "month-end", "month end", "reconcil*", "status report"], require: [] },
  },
  {
    category: "client_intake",
    name: "Client intake and onboarding",
    description: "Paperwork and data capture when new clients start",
    weeklyHours: 7,
    weeklyCost: 525,
    automationPotential: 0.8,
    patterns: { any: ["intake", "onboarding", "paperwork", "new client forms"], require: [] },
  },
  {
    category: "growth_constraint",
    name: "Growth constraint",
    description: "Headcount-bound processes limiting growth",
    weeklyHours: 12,
    weeklyCost: 1500,
    automationPotential: 0.5,
    patterns: {
      any: ["can't scale", "cannot scale", "can't keep up", "overwhelmed", "hire more", "turning away"],
      require: [],
    },
  },
  {
    category: "compliance_risk",
    name: "Compliance exposure",
    description: "Manual compliance steps that risk penalties",
    weeklyHours: 10,
    weeklyCost: 2500,
    automationPotential: 0.6,
    patterns: { any: ["compliance", "audit", "penalt*", "regulat*"], require: [] },
  },
];

// --- priority -----------------------------------------------------------------

const WEEKS_PER_YEAR = 52;

/**
 * Priority from weekly cost impact, by its annualized value:
 * > 100k critical, > 50k high, > 10k medium, otherwise low.
 */
export function priorityForWeeklyCost(weeklyCost: number): Priority {
  const annualCost = weeklyCost * WEEKS_PER_YEAR;
  if (annualCost > 100_000) return "critical";
  if (annualCost > 50_000) return "high";
  if (annualCost > 10_000) return "medium";
  return "low";
}

// --- rule loading -------------------------------------------------------------

const rulesCache = new Map<string, BottleneckRule[]>();

export function loadBottleneckRules(
  filePath: string = DEFAULT_RULES_PATH,
  logger?: Logger
): BottleneckRule[] {
  const resolved = path.resolve(process.cwd(), filePath);
  const cached = rulesCache.get(resolved);
  if (cached) return cached;

  let rules: BottleneckRule[];
  try {
    const raw = fs.readFileSync(resolved, "utf8");
    rules = bottleneckRulesFileSchema.parse(yaml.load(raw)).rules;
  } catch (err) {
    logger?.warn(
      { err, filePath: resolved },
      "[bottleneckIdentifier] failed to load rules, using built-in table"
    );
    rules = BUILT_IN_BOTTLENECK_RULES;
  }

  rulesCache.set(resolved, rules);
  return rules;
}

export function clearBottleneckRulesCache(): void {
  rulesCache.clear();
}

// --- matching -----------------------------------------------------------------

function normalize(text: string): string {
  return text.toLowerCase();
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const INFLECTIONS = "(?:s|es|d|ed|ing|ly)?";

/**
 * Phrases match whole words, plus a plain inflection ("manual" matches
 * "manually"). A trailing `*` makes the phrase a prefix: "reconcil*".
 */
function phrasePattern(phrase: string): { label: string; pattern: RegExp } | undefined {
  const normalized = normalize(phrase).trim();
  const prefix = normalized.endsWith("*");
  const label = prefix ? normalized.slice(0, -1) : normalized;
  if (label.length === 0) return undefined;

  const tail = prefix ? "" : `${INFLECTIONS}\\b`;
  return { label, pattern: new RegExp(`\\b${escapeRegExp(label)}${tail}`, "g") };
}

function matchPhrases(text: string, phrases: string[]): string[] {
  const matched: string[] = [];
  for (const phrase of phrases) {
    const compiled = phrasePattern(phrase);
    if (compiled && compiled.pattern.test(text)) matched.push(compiled.label);
  }
  return matched;
}

function maskPhrases(text: string, phrases: string[]): string {
  let masked = text;
  for (const phrase of phrases) {
    const compiled = phrasePattern(phrase);
    if (compiled) masked = masked.replace(compiled.pattern, " ");
  }
  return masked;
}

function matchRule(text: string, rule: BottleneckRule): string[] {
  const visible = maskPhrases(text, rule.patterns.exclude ?? []);
  if (rule.patterns.require.length > 0) {
    if (matchPhrases(visible, rule.patterns.require).length === 0) return [];
  }
  return matchPhrases(visible, rule.patterns.any);
}

/**
 * One candidate per matching rule, in rule order. Every call is independent:
 * the same phrase processed twice yields two candidates, and callers decide
 * whether to drop repeats.
 */
export function identifyBottlenecks(
  text: string,
  rules: BottleneckRule[] = BUILT_IN_BOTTLENECK_RULES
): BottleneckCandidate[] {
  const normalized = normalize(text);
  if (normalized.trim().length === 0) return [];

  const candidates: BottleneckCandidate[] = [];
  for (const rule of rules) {
    const matched = matchRule(normalized, rule);
    if (matched.length === 0) continue;

    candidates.push({
      category: rule.category,
      name: rule.name,
      description: `${rule.description} (mentioned: "${matched[0]}")`,
      weeklyHoursImpact: rule.weeklyHours,
      weeklyCostImpact: rule.weeklyCost,
      automationPotential: rule.automationPotential,
      priority: priorityForWeeklyCost(rule.weeklyCost),
      matchedPhrases: matched,
    });
  }
  return candidates;
}
