// src/intake/extraction/extractionRules.ts
//
// Declarative (pattern, field, parse-rule) table for the metric extractor.
// Every pattern must carry the global flag: the extractor walks all matches
// and applies them in text order, so the last mention of a scalar wins.
// A fallback rule only counts when no other rule for its field matched.

import type { CompanyMetrics, Industry } from "../types";

type ScalarField = "companyName" | "industry" | "employeeCount" | "annualRevenue";
type ListField = "technologies" | "challenges";

export interface ExtractionRule {
  name: string;
  field: ScalarField | ListField;
  pattern: RegExp;
  fallback?: boolean;
  apply: (match: RegExpExecArray, into: CompanyMetrics) => void;
}

function scalarRule<F extends ScalarField>(
  name: string,
  field: F,
  pattern: RegExp,
  parse: (match: RegExpExecArray) => CompanyMetrics[F] | undefined,
  options: { fallback?: boolean } = {}
): ExtractionRule {
  return {
    name,
    field,
    pattern,
    fallback: options.fallback,
    apply: (match, into) => {
      const value = parse(match);
      if (value !== undefined) {
        into[field] = value;
      }
    },
  };
}

function listRule(
  name: string,
  field: ListField,
  pattern: RegExp,
  parse: (match: RegExpExecArray) => string | undefined
): ExtractionRule {
  return {
    name,
    field,
    pattern,
    apply: (match, into) => {
      const value = parse(match);
      if (!value) return;
      const exists = into[field].some(
        (item) => item.toLowerCase() === value.toLowerCase()
      );
      if (!exists) into[field].push(value);
    },
  };
}

// --- parse helpers ----------------------------------------------------------

const NUMBER = String.raw`(\d{1,3}(?:,\d{3})+(?:\.\d+)?|\d+(?:\.\d+)?)`;
const UNIT = String.raw`(thousand|million|billion|mm|bn|k|m|b)?`;

export function parsePositiveInteger(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  const value = Number(raw.replace(/,/g, ""));
  if (!Number.isInteger(value) || value <= 0) return undefined;
  return value;
}

const UNIT_MULTIPLIERS: Record<string, number> = {
  k: 1_000,
  thousand: 1_000,
  m: 1_000_000,
  mm: 1_000_000,
  million: 1_000_000,
  b: 1_000_000_000,
  bn: 1_000_000_000,
  billion: 1_000_000_000,
};

export function parseMoney(
  rawNumber: string | undefined,
  rawUnit: string | undefined
): number | undefined {
  if (!rawNumber) return undefined;
  const base = Number(rawNumber.replace(/,/g, ""));
  if (!Number.isFinite(base) || base <= 0) return undefined;
  const multiplier = rawUnit ? UNIT_MULTIPLIERS[rawUnit.toLowerCase()] ?? 1 : 1;
  return Math.round(base * multiplier);
}

function cleanName(raw: string | undefined): string | undefined {
  const name = raw?.replace(/[.,;:]+$/, "").trim();
  return name && name.length > 0 ? name : undefined;
}

// --- lookup tables ------------------------------------------------------------

const INDUSTRY_KEYWORDS: Array<[Industry, string]> = [
  ["legal", String.raw`law firm|law practice|legal|attorneys?|lawyers?|paralegals?`],
  ["accounting", String.raw`accounting|accountants?|cpa|bookkeeping|tax preparation`],
  ["consulting", String.raw`consulting|consultancy|advisory firm`],
  ["msp", String.raw`msp|managed services?|managed service provider|managed it|it services`],
  ["healthcare", String.raw`healthcare|clinic|dental|medical practice|physicians?`],
];

const TECHNOLOGY_KEYWORDS: Array<[string, string]> = [
  ["Excel", String.raw`excel`],
  ["Google Sheets", String.raw`google sheets?`],
  ["QuickBooks", String.raw`quick ?books`],
  ["Xero", String.raw`xero`],
  ["Salesforce", String.raw`salesforce`],
  ["HubSpot", String.raw`hub ?spot`],
  ["Outlook", String.raw`outlook`],
  ["Gmail", String.raw`gmail`],
  ["Slack", String.raw`slack`],
  ["Microsoft Teams", String.raw`ms teams|microsoft teams`],
  ["SharePoint", String.raw`sharepoint`],
  ["Zendesk", String.raw`zendesk`],
  ["Jira", String.raw`jira`],
  ["Clio", String.raw`clio`],
  ["Trello", String.raw`trello`],
  ["Asana", String.raw`asana`],
];

// --- the table ----------------------------------------------------------------

export const EXTRACTION_RULES: ExtractionRule[] = [
  scalarRule(
    "employees_suffix",
    "employeeCount",
    new RegExp(
      String.raw`\b${NUMBER}\s+(?:full[- ]time\s+|part[- ]time\s+)?(?:employees|staff(?:\s+members)?|team members|workers)\b`,
      "gi"
    ),
    (m) => parsePositiveInteger(m[1])
  ),
  scalarRule(
    "team_of",
    "employeeCount",
    new RegExp(String.raw`\b(?:team of|headcount of|headcount is)\s+${NUMBER}\b`, "gi"),
    (m) => parsePositiveInteger(m[1]),
    // "a sales team of 5" names a department, not the company
    { fallback: true }
  ),
  scalarRule(
    "revenue_then_amount",
    "annualRevenue",
    new RegExp(String.raw`\brevenue\b[^$.]{0,40}?\$\s?${NUMBER}\s*${UNIT}\b`, "gi"),
    (m) => parseMoney(m[1], m[2])
  ),
  scalarRule(
    "amount_then_revenue",
    "annualRevenue",
    new RegExp(
      String.raw`\$\s?${NUMBER}\s*${UNIT}\s+(?:in\s+)?(?:annual\s+|yearly\s+)?(?:revenue|sales)\b`,
      "gi"
    ),
    (m) => parseMoney(m[1], m[2])
  ),
  scalarRule(
    "amount_per_year",
    "annualRevenue",
    new RegExp(String.raw`\$\s?${NUMBER}\s*${UNIT}\s+(?:a|per)\s+year\b`, "gi"),
    (m) => parseMoney(m[1], m[2])
  ),
  scalarRule(
    "called_named",
    "companyName",
    /\b(?:called|named)\s+([A-Z][\w&'.-]*(?:\s+(?:&\s+)?[A-Z][\w&'.-]*)*)/g,
    (m) => cleanName(m[1])
  ),
  scalarRule(
    "company_is",
    "companyName",
    /\b(?:[Cc]ompany|[Ff]irm|[Bb]usiness) is\s+([A-Z][\w&'.-]*(?:\s+(?:&\s+)?[A-Z][\w&'.-]*)*)/g,
    (m) => cleanName(m[1])
  ),
  scalarRule(
    "i_run",
    "companyName",
    /\b(?:I run|I own|[Ww]e run)\s+([A-Z][\w&'.-]*(?:\s+(?:&\s+)?[A-Z][\w&'.-]*)*)/g,
    (m) => cleanName(m[1])
  ),
  ...INDUSTRY_KEYWORDS.map(([industry, keywords]) =>
    scalarRule(
      `industry_${industry}`,
      "industry",
      new RegExp(String.raw`\b(?:${keywords})\b`, "gi"),
      () => industry
    )
  ),
  ...TECHNOLOGY_KEYWORDS.map(([technology, keywords]) =>
    listRule(
      `technology_${technology}`,
      "technologies",
      new RegExp(String.raw`\b(?:${keywords})\b`, "gi"),
      () => technology
    )
  ),
  listRule(
    "challenge_sentence",
    "challenges",
    /[^.!?\n]*\b(?:problems?|struggl\w*|challeng\w*|frustrat\w*|biggest issue|pain points?)\b[^.!?\n]*/gi,
    (m) => m[0].trim() || undefined
  ),
];
