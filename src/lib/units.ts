import type { MetricDefinition, UnitTag } from "@/lib/esgPacks";

export type UnitReading = {
  unit: UnitTag;
  factor: number; // multiply the stated value by this to get the canonical unit
};

// Keys are lower-cased with whitespace removed.
const UNIT_SYNONYMS: Record<string, UnitReading> = {
  tco2eq: { unit: "tCO2eq", factor: 1 },
  tco2e: { unit: "tCO2eq", factor: 1 },
  "tco2-eq": { unit: "tCO2eq", factor: 1 },
  tco2: { unit: "tCO2eq", factor: 1 },
  톤co2eq: { unit: "tCO2eq", factor: 1 },
  "톤co2-eq": { unit: "tCO2eq", factor: 1 },
  ktco2eq: { unit: "tCO2eq", factor: 1_000 },
  ktco2e: { unit: "tCO2eq", factor: 1_000 },
  천tco2eq: { unit: "tCO2eq", factor: 1_000 },
  천톤co2eq: { unit: "tCO2eq", factor: 1_000 },
  mtco2eq: { unit: "tCO2eq", factor: 1_000_000 },
  백만tco2eq: { unit: "tCO2eq", factor: 1_000_000 },

  tj: { unit: "TJ", factor: 1 },
  테라줄: { unit: "TJ", factor: 1 },
  pj: { unit: "TJ", factor: 1_000 },
  gj: { unit: "TJ", factor: 0.001 },
  kwh: { unit: "TJ", factor: 0.0000036 },
  mwh: { unit: "TJ", factor: 0.0036 },
  gwh: { unit: "TJ", factor: 3.6 },

  t: { unit: "ton", factor: 1 },
  ton: { unit: "ton", factor: 1 },
  tons: { unit: "ton", factor: 1 },
  tonne: { unit: "ton", factor: 1 },
  tonnes: { unit: "ton", factor: 1 },
  톤: { unit: "ton", factor: 1 },
  kg: { unit: "ton", factor: 0.001 },
  kt: { unit: "ton", factor: 1_000 },
  천톤: { unit: "ton", factor: 1_000 },
  천t: { unit: "ton", factor: 1_000 },
  만톤: { unit: "ton", factor: 10_000 },

  m3: { unit: "m3", factor: 1 },
  "m³": { unit: "m3", factor: 1 },
  "㎥": { unit: "m3", factor: 1 },
  세제곱미터: { unit: "m3", factor: 1 },
  천m3: { unit: "m3", factor: 1_000 },
  "천㎥": { unit: "m3", factor: 1_000 },
  "천m³": { unit: "m3", factor: 1_000 },

  "%": { unit: "%", factor: 1 },
  "％": { unit: "%", factor: 1 },
  퍼센트: { unit: "%", factor: 1 },
  percent: { unit: "%", factor: 1 },
  pct: { unit: "%", factor: 1 },

  "%p": { unit: "%p", factor: 1 },
  "%포인트": { unit: "%p", factor: 1 },
  pp: { unit: "%p", factor: 1 },
  percentagepoint: { unit: "%p", factor: 1 },
  percentagepoints: { unit: "%p", factor: 1 },

  count: { unit: "count", factor: 1 },
  명: { unit: "count", factor: 1 },
  인: { unit: "count", factor: 1 },
  건: { unit: "count", factor: 1 },
  회: { unit: "count", factor: 1 },
  번: { unit: "count", factor: 1 },
  개: { unit: "count", factor: 1 },
  천명: { unit: "count", factor: 1_000 },
  person: { unit: "count", factor: 1 },
  persons: { unit: "count", factor: 1 },
  people: { unit: "count", factor: 1 },
  employees: { unit: "count", factor: 1 },
  times: { unit: "count", factor: 1 },
  meetings: { unit: "count", factor: 1 },

  hours: { unit: "hours", factor: 1 },
  hour: { unit: "hours", factor: 1 },
  hrs: { unit: "hours", factor: 1 },
  hr: { unit: "hours", factor: 1 },
  h: { unit: "hours", factor: 1 },
  시간: { unit: "hours", factor: 1 },

  원: { unit: "currency", factor: 1 },
  krw: { unit: "currency", factor: 1 },
  "₩": { unit: "currency", factor: 1 },
  천원: { unit: "currency", factor: 1 },
  백만원: { unit: "currency", factor: 1 },
  억원: { unit: "currency", factor: 1 },
  usd: { unit: "currency", factor: 1 },
  달러: { unit: "currency", factor: 1 },
};

function unitKey(raw: string): string {
  return raw
    .trim()
    .toLowerCase()
    .replaceAll("₂", "2")
    .replace(/\s+/g, "")
    .replace(/(\/|per)(년|yr|year|annum)$/, "")
    .replace(/[.)]+$/, "");
}

export function normalizeUnit(raw: string | null | undefined): UnitReading | null {
  if (!raw) return null;
  const key = unitKey(raw);
  if (!key) return null;
  return UNIT_SYNONYMS[key] ?? null;
}

export function isUnitCompatible(metric: MetricDefinition, unit: UnitTag): boolean {
  return unit === metric.unit || (metric.equivalentUnits ?? []).includes(unit);
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Matches a unit token at the start of the given text (after optional spaces).
 * Longest synonyms win, so "tCO2eq" is never read as "t".
 */
const UNIT_TOKEN_RE = new RegExp(
  "^\\s*(" +
    Object.keys(UNIT_SYNONYMS)
      .sort((a, b) => b.length - a.length)
      .map((k) => escapeRegExp(k).replace(/([a-z])$/, "$1(?![a-z])"))
      .join("|") +
    ")",
  "i",
);

/** Reads the unit written right after a number, e.g. " tCO2eq" in "245,000 tCO2eq". */
export function readUnitAfter(text: string): { raw: string; reading: UnitReading } | null {
  const m = UNIT_TOKEN_RE.exec(text.replaceAll("₂", "2"));
  if (!m) return null;
  const reading = normalizeUnit(m[1]);
  return reading ? { raw: m[1], reading } : null;
}
