// src/intake/terminal/terminalViews.ts
// Plain-text views printed by the terminal consultation.

import { INDUSTRY_BENCHMARKS } from "../analysis/industryBenchmarks";
import { formatUsd } from "../analysis/money";
import { annualizeBottleneck } from "../analysis/roiAnalyzer";
import type { InsightSummary } from "../reports/reportBuilder";
import type { Bottleneck, Consultation } from "../types";

const NOT_SPECIFIED = "Not specified";

const percent = (ratio: number): string => `${Math.round(ratio * 100)}%`;

export function renderStatus(
  consultation: Consultation,
  bottlenecks: readonly Bottleneck[]
): string {
  const { metrics } = consultation;
  const lines = [
    `Consultation ${consultation.id} (${consultation.status}, stage ${consultation.stage})`,
    `Company: ${consultation.companyName ?? metrics.companyName ?? NOT_SPECIFIED}`,
    `Industry: ${metrics.industry ?? NOT_SPECIFIED}`,
    `Employees: ${metrics.employeeCount ?? NOT_SPECIFIED}`,
    `Revenue: ${
      metrics.annualRevenue === undefined ? NOT_SPECIFIED : formatUsd(metrics.annualRevenue)
    }`,
    `Bottlenecks: ${bottlenecks.length}`,
  ];

  bottlenecks.forEach((bottleneck, i) => {
    const impact = annualizeBottleneck(bottleneck);
    lines.push(
      `  ${i + 1}. ${impact.name}: ${impact.annualHours} hours/yr (${formatUsd(
        impact.annualCost
      )}), ${percent(impact.automationPotential)} automatable`
    );
  });
  return lines.join("\n");
}

export function renderBenchmarks(): string {
  return Object.entries(INDUSTRY_BENCHMARKS)
    .map(([key, row]) =>
      [
        key.toUpperCase(),
        `  Revenue per employee: ${formatUsd(row.revenuePerEmployee)}`,
        `  Billable hours: ${percent(row.billableHoursPercentage)}`,
        `  Admin overhead: ${percent(row.adminOverheadPercentage)}`,
        `  Typical hourly rate: ${formatUsd(row.typicalHourlyRate)}`,
      ].join("\n")
    )
    .join("\n\n");
}

/** JSON export of the conversation with what was learned from it. */
export function buildTranscriptExport(
  consultation: Consultation,
  bottlenecks: readonly Bottleneck[],
  insights: readonly InsightSummary[]
): string {
  return JSON.stringify(
    {
      consultationId: consultation.id,
      status: consultation.status,
      stage: consultation.stage,
      transcript: consultation.transcript,
      metrics: consultation.metrics,
      bottlenecks,
      insights,
    },
    null,
    2
  );
}
