import type { BackendCall, PageChunk } from "@/lib/esgPacks";

type DemoEntry = {
  value: number;
  unit: string;
  confidence: number;
  page: number;
  quote: string;
};

const DEMO_YEAR = 2023;

// Turnover (S05) and female board ratio (G03) are left out so demo runs show NOT_FOUND handling.
export const DEMO_REPORT: Readonly<Record<string, DemoEntry>> = {
  E01: { value: 245000, unit: "tCO2eq", confidence: 0.95, page: 23, quote: "Scope 1 온실가스 직접배출량: 245,000 tCO2eq" },
  E02: { value: 189000, unit: "tCO2eq", confidence: 0.93, page: 23, quote: "Scope 2 온실가스 간접배출량: 189,000 tCO2eq" },
  E03: { value: 1520000, unit: "tCO2eq", confidence: 0.72, page: 24, quote: "Scope 3 기타 간접배출량: 약 1,520,000 tCO2eq (추정치)" },
  E04: { value: 4521, unit: "TJ", confidence: 0.91, page: 31, quote: "총 에너지 사용량 4,521 TJ" },
  E05: { value: 32500, unit: "천톤", confidence: 0.88, page: 35, quote: "용수 취수량: 32,500천톤" },
  E06: { value: 78500, unit: "톤", confidence: 0.9, page: 38, quote: "폐기물 총 발생량 78,500톤" },
  E07: { value: 92.3, unit: "%", confidence: 0.94, page: 38, quote: "폐기물 재활용률 92.3%" },
  S01: { value: 63500, unit: "명", confidence: 0.97, page: 45, quote: "총 임직원 수: 63,500명" },
  S02: { value: 28.5, unit: "%", confidence: 0.89, page: 45, quote: "여성 임직원 비율 28.5%" },
  S03: { value: 0.12, unit: "%", confidence: 0.85, page: 52, quote: "산업재해율 0.12%" },
  S04: { value: 62, unit: "시간", confidence: 0.82, page: 57, quote: "1인당 평균 교육시간: 62시간" },
  G01: { value: 57.1, unit: "%", confidence: 0.96, page: 71, quote: "사외이사 비율: 57.1%" },
  G02: { value: 14, unit: "회", confidence: 0.98, page: 71, quote: "이사회 개최: 연 14회" },
  G04: { value: 98.5, unit: "%", confidence: 0.91, page: 78, quote: "반부패 교육 이수율 98.5%" },
};

/** Report pages holding the demo quotes, one chunk per page. */
export function demoChunks(): PageChunk[] {
  const byPage = new Map<number, string[]>();
  for (const entry of Object.values(DEMO_REPORT)) {
    const lines = byPage.get(entry.page) ?? [];
    lines.push(entry.quote);
    byPage.set(entry.page, lines);
  }
  return Array.from(byPage.entries())
    .sort((a, b) => a[0] - b[0])
    .map(([pageNumber, lines]) => ({ pageNumber, text: lines.join("\n") }));
}

function promptMetricId(prompt: string): string | null {
  const m = /\[대상 지표\]\s*-\s*([A-Z]\d{2}):/.exec(prompt);
  return m ? m[1] : null;
}

/** A backend that answers from the fixed demo report instead of calling a model. */
export function createDemoBackend(): BackendCall {
  return async (prompt) => {
    const id = promptMetricId(prompt);
    const entry = id ? DEMO_REPORT[id] : undefined;
    if (!id || !entry) return JSON.stringify({ extracted: [] });
    return JSON.stringify({
      extracted: [
        {
          metric_id: id,
          value: entry.value,
          unit: entry.unit,
          year: DEMO_YEAR,
          page: entry.page,
          confidence: entry.confidence,
          source_text: entry.quote,
        },
      ],
    });
  };
}
