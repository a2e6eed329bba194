// src/intake/reports/reportBuilder.ts

import type { Bottleneck, CompanyMetrics, Insight, ReportType } from "../types";
import {
  annualizeBottleneck,
  buildExecutiveSummary,
  type BottleneckImpact,
  type ExecutiveSummary,
  type ExecutiveSummaryOptions,
} from "../analysis/roiAnalyzer";

export type InsightSummary = Omit<Insight, "id" | "consultationId" | "createdAt">;

export interface DiagnosticReportPayload {
  companyOverview: ExecutiveSummary["companySnapshot"];
  bottlenecks: Array<BottleneckImpact & { description: string }>;
  totals: ExecutiveSummary["keyFindings"];
  insights: InsightSummary[];
  industryComparison: ExecutiveSummary["industryComparison"];
  implementationRoadmap: ExecutiveSummary["implementationRoadmap"];
}

export interface ProposalReportPayload {
  companyName: string;
  roiAnalysis: ExecutiveSummary["roiAnalysis"];
  topOpportunities: ExecutiveSummary["topOpportunities"];
  implementationRoadmap: ExecutiveSummary["implementationRoadmap"];
  recommendations: string[];
  executiveRecommendation: string;
}

export type ExecutiveReportPayload = ExecutiveSummary;

export type ReportPayload =
  | { type: "diagnostic"; payload: DiagnosticReportPayload }
  | { type: "proposal"; payload: ProposalReportPayload }
  | { type: "executive"; payload: ExecutiveReportPayload };

export interface ReportInput {
  metrics: CompanyMetrics;
  bottlenecks: readonly Bottleneck[];
  insights: readonly InsightSummary[];
  options?: ExecutiveSummaryOptions;
}

export function buildReport(type: ReportType, input: ReportInput): ReportPayload {
  const summary = buildExecutiveSummary(input.metrics, input.bottlenecks, input.options);

  switch (type) {
    case "diagnostic":
      return {
        type,
        payload: {
          companyOverview: summary.companySnapshot,
          bottlenecks: input.bottlenecks.map((b) => ({
            ...annualizeBottleneck(b),
            description: b.description,
          })),
          totals: summary.keyFindings,
          insights: [...input.insights]
            .sort((a, b) => b.priorityScore - a.priorityScore)
            .map((i) => ({
              category: i.category,
              text: i.text,
              confidence: i.confidence,
              potentialValue: i.potentialValue,
              implementationEffort: i.implementationEffort,
              priorityScore: i.priorityScore,
            })),
          industryComparison: summary.industryComparison,
          implementationRoadmap: summary.implementationRoadmap,
        },
      };
    case "proposal":
      return {
        type,
        payload: {
          companyName: summary.companySnapshot.name,
          roiAnalysis: summary.roiAnalysis,
          topOpportunities: summary.topOpportunities,
          implementationRoadmap: summary.implementationRoadmap,
          recommendations: summary.recommendations,
          executiveRecommendation: summary.executiveRecommendation,
        },
      };
    case "executive":
      return { type, payload: summary };
  }
}

const EXECUTIVE_KEYS = [
  "companySnapshot",
  "keyFindings",
  "roiAnalysis",
  "topOpportunities",
  "implementationRoadmap",
  "industryComparison",
  "recommendations",
  "executiveRecommendation",
] as const;

/** Top-level shape check for an executive payload read back from the store. */
export function isExecutiveReportPayload(value: unknown): value is ExecutiveReportPayload {
  if (typeof value !== "object" || value === null) return false;
  return EXECUTIVE_KEYS.every((key) => key in value);
}
