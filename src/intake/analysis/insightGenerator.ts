// src/intake/analysis/insightGenerator.ts

import type {
  Bottleneck,
  CompanyMetrics,
  ImplementationEffort,
  NewInsight,
} from "../types";
import { formatUsd, roundTo, sumMoney } from "./money";
import { annualizeBottleneck, type IndustryComparison } from "./roiAnalyzer";

const EFFORT_MULTIPLIER: Record<ImplementationEffort, number> = {
  low: 1.5,
  medium: 1.0,
  high: 0.5,
};

export function effortForAutomationPotential(
  automationPotential: number
): ImplementationEffort {
  if (automationPotential >= 0.75) return "low";
  if (automationPotential >= 0.5) return "medium";
  return "high";
}

export function computePriorityScore(
  potentialValue: number,
  confidence: number,
  effort: ImplementationEffort
): number {
  return roundTo(potentialValue * confidence * EFFORT_MULTIPLIER[effort], 2);
}

/** 0.5 base, +0.1 per known fact, capped at 1. */
export function computeConfidence(
  metrics: CompanyMetrics,
  hasQuantifiedCost: boolean
): number {
  let confidence = 0.5;
  if (metrics.employeeCount !== undefined) confidence += 0.1;
  if (metrics.annualRevenue !== undefined) confidence += 0.1;
  if (metrics.industry !== undefined) confidence += 0.1;
  if (metrics.technologies.length > 0) confidence += 0.1;
  if (hasQuantifiedCost) confidence += 0.1;
  return roundTo(Math.min(confidence, 1), 2);
}

/**
 * One insight per bottleneck category, in the order categories were first
 * seen, plus a benchmark insight when the company trails its industry.
 */
export function generateInsights(
  consultationId: string,
  metrics: CompanyMetrics,
  bottlenecks: readonly Bottleneck[],
  comparison?: IndustryComparison
): NewInsight[] {
  const groups = new Map<string, Bottleneck[]>();
  for (const bottleneck of bottlenecks) {
    const group = groups.get(bottleneck.category);
    if (group) group.push(bottleneck);
    else groups.set(bottleneck.category, [bottleneck]);
  }

  const insights: NewInsight[] = [];

  for (const [category, members] of groups) {
    const impacts = members.map(annualizeBottleneck);
    const potentialValue = sumMoney(impacts.map((i) => i.projectedAnnualSavings));
    const automationPotential = Math.max(...members.map((m) => m.automationPotential));
    const implementationEffort = effortForAutomationPotential(automationPotential);
    const confidence = computeConfidence(
      metrics,
      members.some((m) => m.weeklyCostImpact > 0)
    );

    insights.push({
      consultationId,
      category,
      text: `Automating ${members[0].name.toLowerCase()} could recover about ${formatUsd(
        potentialValue
      )} per year`,
      confidence,
      potentialValue,
      implementationEffort,
      priorityScore: computePriorityScore(potentialValue, confidence, implementationEffort),
    });
  }

  if (
    comparison?.performanceRating === "Below Average" &&
    comparison.differencePercentage.status === "computed"
  ) {
    const confidence = computeConfidence(metrics, false);
    insights.push({
      consultationId,
      category: "benchmark",
      text: `Revenue per employee is ${Math.abs(
        comparison.differencePercentage.value
      ).toFixed(0)}% below the ${comparison.benchmarkKey} benchmark`,
      confidence,
      potentialValue: comparison.improvementPotential,
      implementationEffort: "high",
      priorityScore: computePriorityScore(comparison.improvementPotential, confidence, "high"),
    });
  }

  return insights;
}
