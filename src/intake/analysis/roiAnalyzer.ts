// src/intake/analysis/roiAnalyzer.ts
//
// Turns a consultation's bottlenecks and company metrics into annualized
// impact, ROI / payback projections, an industry comparison and the
// Executive Summary used by every report type.

import type {
  Bottleneck,
  CompanyMetrics,
  ImplementationTier,
  Priority,
} from "../types";
import { getIndustryBenchmark, type BenchmarkKey } from "./industryBenchmarks";
import {
  formatUsd,
  fromCents,
  multiplyMoney,
  roundTo,
  sumMoney,
  toCents,
} from "./money";

export const WEEKS_PER_YEAR = 52;

/** A figure that may be unavailable for degenerate inputs. */
export type Computed =
  | { status: "computed"; value: number }
  | { status: "not_computed"; reason: string };

export interface TierPricing {
  baseFee: number;
  perEmployee: number;
}

export const DEFAULT_TIER_PRICING: Readonly<Record<ImplementationTier, TierPricing>> = {
  starter: { baseFee: 10_000, perEmployee: 100 },
  growth: { baseFee: 25_000, perEmployee: 150 },
  enterprise: { baseFee: 50_000, perEmployee: 200 },
};

export interface BottleneckImpact {
  bottleneckId: string;
  category: string;
  name: string;
  priority: Priority;
  automationPotential: number;
  weeklyHours: number;
  weeklyCost: number;
  annualHours: number;
  annualCost: number;
  projectedAnnualSavings: number;
}

export interface PortfolioTotals {
  bottleneckCount: number;
  annualHours: number;
  annualCost: number;
  projectedAnnualSavings: number;
}

export type PerformanceRating = "Above Average" | "Average" | "Below Average" | "Unknown";

export interface IndustryComparison {
  benchmarkKey: BenchmarkKey;
  usedDefaultBenchmark: boolean;
  revenuePerEmployee: Computed;
  industryRevenuePerEmployee: number;
  differencePercentage: Computed;
  billableHoursPercentage: number;
  adminOverheadPercentage: number;
  typicalHourlyRate: number;
  performanceRating: PerformanceRating;
  improvementPotential: number;
}

export interface RoadmapPhase {
  phase: 1 | 2 | 3;
  name: string;
  duration: string;
  projects: string[];
  expectedAnnualSavings: number;
}

export interface ExecutiveSummary {
  companySnapshot: {
    name: string;
    industry: string;
    employees: number | null;
    annualRevenue: number | null;
    sizeCategory: string;
    automationReadiness: string;
    technologies: string[];
  };
  keyFindings: PortfolioTotals & {
    priorityBreakdown: Record<Priority, number>;
  };
  roiAnalysis: {
    tier: ImplementationTier;
    implementationCost: number;
    annualSavings: number;
    roiPercentage: Computed;
    paybackMonths: Computed;
  };
  topOpportunities: BottleneckImpact[];
  implementationRoadmap: RoadmapPhase[];
  industryComparison: IndustryComparison;
  recommendations: string[];
  executiveRecommendation: string;
}

export interface ExecutiveSummaryOptions {
  tier?: ImplementationTier;
  topN?: number;
  pricing?: Readonly<Record<ImplementationTier, TierPricing>>;
}

// --- per-bottleneck and portfolio ---------------------------------------------

export function annualizeBottleneck(bottleneck: Bottleneck): BottleneckImpact {
  const annualCost = fromCents(toCents(bottleneck.weeklyCostImpact) * WEEKS_PER_YEAR);
  return {
    bottleneckId: bottleneck.id,
    category: bottleneck.category,
    name: bottleneck.name,
    priority: bottleneck.priority,
    automationPotential: bottleneck.automationPotential,
    weeklyHours: bottleneck.weeklyHoursImpact,
    weeklyCost: bottleneck.weeklyCostImpact,
    annualHours: roundTo(bottleneck.weeklyHoursImpact * WEEKS_PER_YEAR, 2),
    annualCost,
    projectedAnnualSavings: multiplyMoney(annualCost, bottleneck.automationPotential),
  };
}

export function computePortfolioTotals(impacts: readonly BottleneckImpact[]): PortfolioTotals {
  return {
    bottleneckCount: impacts.length,
    annualHours: roundTo(
      impacts.reduce((total, i) => total + i.annualHours, 0),
      2
    ),
    annualCost: sumMoney(impacts.map((i) => i.annualCost)),
    projectedAnnualSavings: sumMoney(impacts.map((i) => i.projectedAnnualSavings)),
  };
}

/** Descending weekly cost; ties keep their original order. */
export function rankBottlenecks(
  impacts: readonly BottleneckImpact[],
  topN: number
): BottleneckImpact[] {
  return [...impacts]
    .sort((a, b) => b.weeklyCost - a.weeklyCost)
    .slice(0, Math.max(0, topN));
}

// --- cost, ROI, payback -------------------------------------------------------

export function estimateImplementationCost(
  employeeCount: number | undefined,
  tier: ImplementationTier,
  pricing: Readonly<Record<ImplementationTier, TierPricing>> = DEFAULT_TIER_PRICING
): number {
  const { baseFee, perEmployee } = pricing[tier];
  const employees = employeeCount && employeeCount > 0 ? employeeCount : 0;
  return sumMoney([baseFee, multiplyMoney(perEmployee, employees)]);
}

/** (annual savings − cost) / cost, as a percentage. */
export function computeRoiPercentage(
  annualSavings: number,
  implementationCost: number
): Computed {
  if (implementationCost <= 0) {
    return { status: "not_computed", reason: "no implementation cost estimate" };
  }
  if (annualSavings <= 0) {
    return { status: "not_computed", reason: "no projected savings" };
  }
  return {
    status: "computed",
    value: roundTo(((annualSavings - implementationCost) / implementationCost) * 100, 2),
  };
}

/** Implementation cost / (annual savings / 12). */
export function computePaybackMonths(
  implementationCost: number,
  annualSavings: number
): Computed {
  if (annualSavings <= 0) {
    return { status: "not_computed", reason: "no projected savings" };
  }
  return {
    status: "computed",
    value: roundTo(implementationCost / (annualSavings / 12), 2),
  };
}

// --- company profile ----------------------------------------------------------

export function categorizeCompanySize(employeeCount: number | undefined): string {
  if (employeeCount === undefined) return "Unknown";
  if (employeeCount < 20) return "Micro";
  if (employeeCount < 50) return "Small";
  if (employeeCount < 250) return "Medium";
  if (employeeCount < 500) return "Mid-Market";
  return "Enterprise";
}

export function assessAutomationReadiness(metrics: CompanyMetrics): string {
  let score = 0;

  const employees = metrics.employeeCount ?? 0;
  if (employees >= 20) score += 2;
  else if (employees >= 10) score += 1;

  const revenue = metrics.annualRevenue ?? 0;
  if (revenue >= 5_000_000) score += 2;
  else if (revenue >= 1_000_000) score += 1;

  if (metrics.technologies.length >= 3) score += 2;
  else if (metrics.technologies.length >= 1) score += 1;

  if (score >= 5) return "High - ready for comprehensive automation";
  if (score >= 3) return "Medium - ready for targeted automation";
  return "Low - start with basic automation";
}

export function compareToIndustry(metrics: CompanyMetrics): IndustryComparison {
  const { key, benchmark } = getIndustryBenchmark(metrics.industry);
  const employees = metrics.employeeCount;
  const revenue = metrics.annualRevenue;

  const base = {
    benchmarkKey: key,
    usedDefaultBenchmark: key === "default",
    industryRevenuePerEmployee: benchmark.revenuePerEmployee,
    billableHoursPercentage: benchmark.billableHoursPercentage,
    adminOverheadPercentage: benchmark.adminOverheadPercentage,
    typicalHourlyRate: benchmark.typicalHourlyRate,
  };

  if (employees === undefined || employees <= 0 || revenue === undefined) {
    const reason = "employee count and annual revenue are both required";
    return {
      ...base,
      revenuePerEmployee: { status: "not_computed", reason },
      differencePercentage: { status: "not_computed", reason },
      performanceRating: "Unknown",
      improvementPotential: 0,
    };
  }

  const revenuePerEmployee = roundTo(revenue / employees, 2);
  const difference = roundTo(
    ((revenuePerEmployee - benchmark.revenuePerEmployee) / benchmark.revenuePerEmployee) * 100,
    2
  );

  let performanceRating: PerformanceRating;
  if (difference > 20) performanceRating = "Above Average";
  else if (difference > -20) performanceRating = "Average";
  else performanceRating = "Below Average";

  const improvementPotential =
    performanceRating === "Below Average"
      ? roundTo((benchmark.revenuePerEmployee - revenuePerEmployee) * employees, 2)
      : 0;

  return {
    ...base,
    revenuePerEmployee: { status: "computed", value: revenuePerEmployee },
    differencePercentage: { status: "computed", value: difference },
    performanceRating,
    improvementPotential,
  };
}

// --- roadmap and recommendations ----------------------------------------------

const PHASE_SIZE = 3;

export function buildImplementationRoadmap(
  impacts: readonly BottleneckImpact[]
): RoadmapPhase[] {
  const bySavings = [...impacts].sort(
    (a, b) => b.projectedAnnualSavings - a.projectedAnnualSavings
  );

  const quickWins = bySavings
    .filter((i) => i.automationPotential >= 0.75)
    .slice(0, PHASE_SIZE);
  const core = bySavings
    .filter((i) => !quickWins.includes(i) && i.priority !== "low")
    .slice(0, PHASE_SIZE);
  const transformation = bySavings
    .filter((i) => !quickWins.includes(i) && !core.includes(i))
    .slice(0, PHASE_SIZE);

  const phases: RoadmapPhase[] = [];
  const push = (
    phase: RoadmapPhase["phase"],
    name: string,
    duration: string,
    members: BottleneckImpact[]
  ) => {
    if (members.length === 0) return;
    phases.push({
      phase,
      name,
      duration,
      projects: members.map((m) => `Automate ${m.name.toLowerCase()}`),
      expectedAnnualSavings: sumMoney(members.map((m) => m.projectedAnnualSavings)),
    });
  };

  push(1, "Quick Wins", "0-30 days", quickWins);
  push(2, "Core Improvements", "31-90 days", core);
  push(3, "Full Transformation", "91-180 days", transformation);
  return phases;
}

export function buildRecommendations(
  impacts: readonly BottleneckImpact[],
  roadmap: readonly RoadmapPhase[],
  comparison: IndustryComparison
): string[] {
  const recommendations: string[] = [];

  if (impacts.length === 0) {
    recommendations.push(
      "Gather more detail on day-to-day processes before committing to automation work"
    );
  }

  const quickWins = roadmap.find((p) => p.phase === 1);
  if (quickWins) {
    recommendations.push(
      `Start with ${quickWins.projects.length} quick win(s) worth ${formatUsd(
        quickWins.expectedAnnualSavings
      )} in annual savings within 30 days`
    );
  }

  const highImpact = impacts.filter((i) => i.projectedAnnualSavings > 50_000);
  if (highImpact.length > 0) {
    recommendations.push(
      `Focus on ${highImpact.length} high-impact project(s) with combined savings of ${formatUsd(
        sumMoney(highImpact.map((i) => i.projectedAnnualSavings))
      )} annually`
    );
  }

  if (impacts.length > 5) {
    recommendations.push(
      "Implement improvements in phases to manage change and demonstrate value incrementally"
    );
  }

  if (comparison.performanceRating === "Below Average") {
    recommendations.push(
      `Closing the revenue-per-employee gap to the industry average could add ${formatUsd(
        comparison.improvementPotential
      )} in annual revenue`
    );
  }

  return recommendations;
}

export function buildExecutiveRecommendation(
  roi: Computed,
  payback: Computed,
  comparison: IndustryComparison
): string {
  let text: string;
  if (roi.status === "not_computed" || payback.status === "not_computed") {
    text = "NOT YET ASSESSED: no quantified savings were identified during the consultation.";
  } else if (roi.value > 200 && payback.value < 6) {
    text = `STRONGLY RECOMMENDED: an exceptional opportunity with ${roi.value.toFixed(
      0
    )}% ROI and a ${payback.value.toFixed(1)} month payback.`;
  } else if (roi.value > 100 && payback.value < 12) {
    text = `RECOMMENDED: strong returns with ${roi.value.toFixed(
      0
    )}% ROI and a ${payback.value.toFixed(1)} month payback.`;
  } else {
    text =
      "WORTH CONSIDERING: returns are moderate, but the operational benefits of automation are significant.";
  }

  if (comparison.performanceRating === "Below Average") {
    text += ` Reaching industry benchmarks could add ${formatUsd(
      comparison.improvementPotential
    )} in annual revenue.`;
  }
  return text;
}

// --- executive summary --------------------------------------------------------

export function buildExecutiveSummary(
  metrics: CompanyMetrics,
  bottlenecks: readonly Bottleneck[],
  options: ExecutiveSummaryOptions = {}
): ExecutiveSummary {
  const tier = options.tier ?? "growth";
  const topN = options.topN ?? 3;

  const impacts = bottlenecks.map(annualizeBottleneck);
  const totals = computePortfolioTotals(impacts);

  const implementationCost = estimateImplementationCost(
    metrics.employeeCount,
    tier,
    options.pricing
  );
  const roiPercentage = computeRoiPercentage(totals.projectedAnnualSavings, implementationCost);
  const paybackMonths = computePaybackMonths(implementationCost, totals.projectedAnnualSavings);

  const comparison = compareToIndustry(metrics);
  const roadmap = buildImplementationRoadmap(impacts);

  const priorityBreakdown: Record<Priority, number> = {
    low: 0,
    medium: 0,
    high: 0,
    critical: 0,
  };
  for (const impact of impacts) priorityBreakdown[impact.priority]++;

  return {
    companySnapshot: {
      name: metrics.companyName ?? "Company",
      industry: metrics.industry ?? "unknown",
      employees: metrics.employeeCount ?? null,
      annualRevenue: metrics.annualRevenue ?? null,
      sizeCategory: categorizeCompanySize(metrics.employeeCount),
      automationReadiness: assessAutomationReadiness(metrics),
      technologies: [...metrics.technologies],
    },
    keyFindings: { ...totals, priorityBreakdown },
    roiAnalysis: {
      tier,
      implementationCost,
      annualSavings: totals.projectedAnnualSavings,
      roiPercentage,
      paybackMonths,
    },
    topOpportunities: rankBottlenecks(impacts, topN),
    implementationRoadmap: roadmap,
    industryComparison: comparison,
    recommendations: buildRecommendations(impacts, roadmap, comparison),
    executiveRecommendation: buildExecutiveRecommendation(
      roiPercentage,
      paybackMonths,
      comparison
    ),
  };
}
