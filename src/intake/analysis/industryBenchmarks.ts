// src/intake/analysis/industryBenchmarks.ts

import type { Industry } from "../types";

export interface IndustryBenchmark {
  revenuePerEmployee: number;
  billableHoursPercentage: number;
  adminOverheadPercentage: number;
  typicalHourlyRate: number;
}

export type BenchmarkKey = Exclude<Industry, "other"> | "default";

export const INDUSTRY_BENCHMARKS: Readonly<Record<BenchmarkKey, IndustryBenchmark>> = {
  legal: {
    revenuePerEmployee: 200_000,
    billableHoursPercentage: 0.65,
    adminOverheadPercentage: 0.35,
    typicalHourlyRate: 300,
  },
  accounting: {
    revenuePerEmployee: 150_000,
    billableHoursPercentage: 0.7,
    adminOverheadPercentage: 0.3,
    typicalHourlyRate: 200,
  },
  consulting: {
    revenuePerEmployee: 175_000,
    billableHoursPercentage: 0.75,
    adminOverheadPercentage: 0.25,
    typicalHourlyRate: 250,
  },
  msp: {
    revenuePerEmployee: 125_000,
    billableHoursPercentage: 0.6,
    adminOverheadPercentage: 0.4,
    typicalHourlyRate: 150,
  },
  healthcare: {
    revenuePerEmployee: 120_000,
    billableHoursPercentage: 0.55,
    adminOverheadPercentage: 0.45,
    typicalHourlyRate: 125,
  },
  default: {
    revenuePerEmployee: 100_000,
    billableHoursPercentage: 0.5,
    adminOverheadPercentage: 0.5,
    typicalHourlyRate: 75,
  },
};

function isBenchmarkKey(value: string): value is BenchmarkKey {
  return Object.prototype.hasOwnProperty.call(INDUSTRY_BENCHMARKS, value);
}

/**
 * Benchmark row for an industry label. Missing or unrecognized labels
 * (including "other") resolve to the default row.
 */
export function getIndustryBenchmark(industry?: string | null): {
  key: BenchmarkKey;
  benchmark: IndustryBenchmark;
} {
  const normalized = (industry ?? "").trim().toLowerCase();
  const key: BenchmarkKey = isBenchmarkKey(normalized) ? normalized : "default";
  return { key, benchmark: INDUSTRY_BENCHMARKS[key] };
}
