import type { MetricDefinition, PageChunk } from "@/lib/esgPacks";

function retrievalTerms(metric: MetricDefinition): string[] {
  const terms = [metric.id, metric.nameKr, metric.nameEn, `GRI ${metric.griCode}`, ...metric.keywords];
  return Array.from(new Set(terms.map((t) => t.trim().toLowerCase()).filter(Boolean)));
}

export function scoreChunk(metric: MetricDefinition, chunk: PageChunk): number {
  const text = chunk.text.toLowerCase();
  let score = 0;
  for (const term of retrievalTerms(metric)) {
    if (text.includes(term)) score += term === metric.nameKr.toLowerCase() || term === metric.nameEn.toLowerCase() ? 2 : 1;
  }
  return score;
}

/**
 * Picks the chunks most likely to state the metric, keeping page order.
 * When nothing matches, the first chunks of the report are used.
 */
export function selectChunks(metric: MetricDefinition, chunks: PageChunk[], max: number): PageChunk[] {
  if (!chunks.length || max <= 0) return [];
  const scored = chunks.map((chunk, index) => ({ chunk, index, score: scoreChunk(metric, chunk) }));
  const matching = scored.filter((s) => s.score > 0);
  const picked = matching.length
    ? matching.sort((a, b) => b.score - a.score || a.index - b.index).slice(0, max)
    : scored.slice(0, max);
  return picked.sort((a, b) => a.index - b.index).map((s) => s.chunk);
}

function pageBlocks(chunks: PageChunk[], maxChars: number): string {
  const blocks: string[] = [];
  let remaining = maxChars;
  for (const c of chunks) {
    if (remaining <= 0) break;
    const text = c.text.trim().slice(0, remaining);
    remaining -= text.length;
    blocks.push(`[Page ${c.pageNumber}]\n${text}`);
  }
  return blocks.join("\n\n");
}

export function buildMetricPrompt(metric: MetricDefinition, chunks: PageChunk[], maxPromptChars: number): string {
  return [
    "당신은 한국 기업 지속가능경영보고서에서 ESG 정량 데이터를 추출하는 전문가입니다.",
    "아래 보고서 텍스트에서 다음 지표의 수치를 찾아 JSON으로 반환하세요.",
    "",
    "[대상 지표]",
    `  - ${metric.id}: ${metric.nameKr} (${metric.nameEn}) [단위: ${metric.unit}] [GRI: ${metric.griCode}]`,
    "",
    "[지침]",
    "1. 텍스트에 명시된 수치만 추출하세요. 추정하거나 계산하지 마세요.",
    "2. 숫자의 쉼표는 제거하세요 (예: \"1,234.5\" → 1234.5).",
    "3. source_text에는 수치가 포함된 문장이나 표의 행을 그대로 복사하세요.",
    "4. page에는 수치가 나온 [Page N]의 N을 적으세요.",
    "5. 설명이나 마크다운 없이 아래 형식의 JSON만 반환하세요.",
    "",
    "[출력 형식]",
    "{",
    '  "extracted": [',
    "    {",
    `      "metric_id": "${metric.id}",`,
    '      "value": <숫자>,',
    '      "unit": "<보고서에 표기된 단위>",',
    '      "year": <네 자리 연도>,',
    '      "page": <페이지 번호>,',
    '      "source_text": "<원문 인용>"',
    "    }",
    "  ]",
    "}",
    "",
    '지표가 없으면 {"extracted": []}',
    "",
    "[텍스트]",
    pageBlocks(chunks, maxPromptChars),
  ].join("\n");
}
