// src/intake/extraction/metricExtractor.ts

import { emptyCompanyMetrics, type CompanyMetrics } from "../types";
import { EXTRACTION_RULES, type ExtractionRule } from "./extractionRules";

type RuleHit = {
  index: number;
  rule: ExtractionRule;
  match: RegExpExecArray;
};

function collectHits(text: string, rules: ExtractionRule[]): RuleHit[] {
  const hits: RuleHit[] = [];
  for (const rule of rules) {
    // clone so that lastIndex state never leaks between calls
    const pattern = new RegExp(rule.pattern.source, rule.pattern.flags);
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(text)) !== null) {
      hits.push({ index: match.index, rule, match });
      if (match[0].length === 0) pattern.lastIndex++;
    }
  }
  // stable sort keeps table order for hits at the same offset
  return hits.sort((a, b) => a.index - b.index);
}

/**
 * Everything the rule table can read out of `text`, applied in text order.
 */
export function detectMetrics(
  text: string,
  rules: ExtractionRule[] = EXTRACTION_RULES
): CompanyMetrics {
  const detected = emptyCompanyMetrics();
  if (text.trim().length === 0) return detected;

  const hits = collectHits(text, rules);
  const primaryFields = new Set(
    hits.filter((hit) => !hit.rule.fallback).map((hit) => hit.rule.field)
  );
  for (const hit of hits) {
    if (hit.rule.fallback && primaryFields.has(hit.rule.field)) continue;
    hit.rule.apply(hit.match, detected);
  }
  return detected;
}

function includesIgnoreCase(list: readonly string[], value: string): boolean {
  const needle = value.toLowerCase();
  return list.some((item) => item.toLowerCase() === needle);
}

/**
 * Partial CompanyMetrics update for the accumulated transcript text.
 *
 * Only fields whose detected value differs from `current` are returned; for
 * the list fields only entries not already known. A later statement that
 * conflicts with an earlier one overwrites it. No match yields `{}`.
 */
export function extractMetrics(
  transcriptText: string,
  current: CompanyMetrics = emptyCompanyMetrics(),
  rules: ExtractionRule[] = EXTRACTION_RULES
): Partial<CompanyMetrics> {
  const detected = detectMetrics(transcriptText, rules);
  const update: Partial<CompanyMetrics> = {};

  if (detected.companyName !== undefined && detected.companyName !== current.companyName) {
    update.companyName = detected.companyName;
  }
  if (detected.industry !== undefined && detected.industry !== current.industry) {
    update.industry = detected.industry;
  }
  if (
    detected.employeeCount !== undefined &&
    detected.employeeCount !== current.employeeCount
  ) {
    update.employeeCount = detected.employeeCount;
  }
  if (
    detected.annualRevenue !== undefined &&
    detected.annualRevenue !== current.annualRevenue
  ) {
    update.annualRevenue = detected.annualRevenue;
  }

  const newTechnologies = detected.technologies.filter(
    (t) => !includesIgnoreCase(current.technologies, t)
  );
  if (newTechnologies.length > 0) update.technologies = newTechnologies;

  const newChallenges = detected.challenges.filter(
    (c) => !includesIgnoreCase(current.challenges, c)
  );
  if (newChallenges.length > 0) update.challenges = newChallenges;

  return update;
}

/** Merge an extractor update into a metrics snapshot; lists are appended. */
export function mergeMetrics(
  current: CompanyMetrics,
  update: Partial<CompanyMetrics>
): CompanyMetrics {
  return {
    ...current,
    ...update,
    technologies: [...current.technologies, ...(update.technologies ?? [])],
    challenges: [...current.challenges, ...(update.challenges ?? [])],
  };
}

export function countNewFacts(update: Partial<CompanyMetrics>): number {
  let count = 0;
  if (update.companyName !== undefined) count++;
  if (update.industry !== undefined) count++;
  if (update.employeeCount !== undefined) count++;
  if (update.annualRevenue !== undefined) count++;
  count += update.technologies?.length ?? 0;
  count += update.challenges?.length ?? 0;
  return count;
}
