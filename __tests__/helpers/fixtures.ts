import { createMetricRegistry, getDefaultRegistry } from "@/lib/esgMetrics";
import type { Candidate, PageChunk } from "@/lib/esgPacks";

export const SAMPLE_CHUNKS: PageChunk[] = [
  { pageNumber: 1, text: "Scope 1 온실가스 직접배출량: 245,000 tCO2eq" },
  { pageNumber: 2, text: "총 에너지 사용량 4,521 TJ" },
  { pageNumber: 3, text: "총 임직원 수: 63,500명" },
];

export const SAMPLE_ANSWERS: Record<string, { value: number; unit: string; page: number; quote: string }> = {
  E01: { value: 245000, unit: "tCO2eq", page: 1, quote: "Scope 1 온실가스 직접배출량: 245,000 tCO2eq" },
  E04: { value: 4521, unit: "TJ", page: 2, quote: "총 에너지 사용량 4,521 TJ" },
  S01: { value: 63500, unit: "명", page: 3, quote: "총 임직원 수: 63,500명" },
};

export function smallRegistry(ids: string[] = ["E01", "E04", "S01"]) {
  const all = getDefaultRegistry();
  return createMetricRegistry(ids.map((id) => all.get(id)));
}

export function promptMetricId(prompt: string): string {
  const m = /\[대상 지표\]\s*-\s*([A-Z]\d{2}):/.exec(prompt);
  if (!m) throw new Error("prompt without a target metric");
  return m[1];
}

/** Answers in the prompt's JSON shape from SAMPLE_ANSWERS. */
export function answerFor(prompt: string): string {
  const id = promptMetricId(prompt);
  const a = SAMPLE_ANSWERS[id];
  if (!a) return '{"extracted": []}';
  return JSON.stringify({
    extracted: [{ metric_id: id, value: a.value, unit: a.unit, year: 2023, page: a.page, source_text: a.quote }],
  });
}

export function candidate(metricId: string, value: number, overrides: Partial<Candidate> = {}): Candidate {
  const unit = getDefaultRegistry().get(metricId).unit;
  return {
    metricId,
    value,
    reportedValue: value,
    unitReported: unit,
    unit,
    unitMismatch: false,
    confidence: 0.9,
    confidenceSource: "reported",
    sourceQuote: `${metricId} 보고 수치 ${value}`,
    pageNumber: 10,
    year: 2023,
    ...overrides,
  };
}
