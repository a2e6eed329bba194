// src/intake/reports/renderReportMarkdown.ts

import type { Computed, ExecutiveSummary } from "../analysis/roiAnalyzer";
import { formatUsd } from "../analysis/money";

function describeComputed(value: Computed, suffix: string): string {
  return value.status === "computed"
    ? `${value.value}${suffix}`
    : `not computed (${value.reason})`;
}

/** Markdown export of an executive summary. */
export function renderExecutiveMarkdown(
  summary: ExecutiveSummary,
  generatedAt: string
): string {
  const { companySnapshot: company, keyFindings, roiAnalysis, industryComparison } = summary;
  const lines: string[] = [];

  lines.push(`# Executive Summary: ${company.name}`, "", `_Generated ${generatedAt}_`, "");

  lines.push(
    "## Company Snapshot",
    `- Industry: ${company.industry}`,
    `- Employees: ${company.employees ?? "unknown"}`,
    `- Annual revenue: ${
      company.annualRevenue === null ? "unknown" : formatUsd(company.annualRevenue)
    }`,
    `- Size category: ${company.sizeCategory}`,
    `- Automation readiness: ${company.automationReadiness}`,
    `- Technologies: ${
      company.technologies.length > 0 ? company.technologies.join(", ") : "none recorded"
    }`,
    ""
  );

  lines.push(
    "## Key Findings",
    `- Bottlenecks identified: ${keyFindings.bottleneckCount}`,
    `- Annual hours lost: ${keyFindings.annualHours}`,
    `- Annual cost: ${formatUsd(keyFindings.annualCost)}`,
    `- Projected annual savings: ${formatUsd(keyFindings.projectedAnnualSavings)}`,
    ""
  );

  lines.push(
    `## ROI Analysis (${roiAnalysis.tier} tier)`,
    `- Implementation cost: ${formatUsd(roiAnalysis.implementationCost)}`,
    `- ROI: ${describeComputed(roiAnalysis.roiPercentage, "%")}`,
    `- Payback: ${describeComputed(roiAnalysis.paybackMonths, " months")}`,
    ""
  );

  if (summary.topOpportunities.length > 0) {
    lines.push("## Top Opportunities");
    summary.topOpportunities.forEach((o, i) => {
      lines.push(
        `${i + 1}. ${o.name}: ${formatUsd(o.annualCost)}/yr (${o.priority} priority)`
      );
    });
    lines.push("");
  }

  if (summary.implementationRoadmap.length > 0) {
    lines.push("## Implementation Roadmap");
    for (const phase of summary.implementationRoadmap) {
      lines.push(`### Phase ${phase.phase}: ${phase.name} (${phase.duration})`);
      for (const project of phase.projects) lines.push(`- ${project}`);
      lines.push(`- Expected annual savings: ${formatUsd(phase.expectedAnnualSavings)}`, "");
    }
  }

  lines.push(
    "## Industry Comparison",
    `- Benchmark: ${industryComparison.benchmarkKey}`,
    `- Revenue per employee: ${
      industryComparison.revenuePerEmployee.status === "computed"
        ? formatUsd(industryComparison.revenuePerEmployee.value)
        : "unknown"
    } (industry ${formatUsd(industryComparison.industryRevenuePerEmployee)})`,
    `- Rating: ${industryComparison.performanceRating}`,
    ""
  );

  if (summary.recommendations.length > 0) {
    lines.push("## Recommendations");
    for (const r of summary.recommendations) lines.push(`- ${r}`);
    lines.push("");
  }

  lines.push("## Executive Recommendation", summary.executiveRecommendation, "");

  return lines.join("\n");
}
