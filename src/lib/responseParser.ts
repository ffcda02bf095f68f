import { z } from "zod";

import { ParseInputError } from "@/lib/errors";
import type { Candidate, MetricDefinition, PageChunk, ParseOutcome } from "@/lib/esgPacks";
import { isUnitCompatible, normalizeUnit, readUnitAfter } from "@/lib/units";

export type ParseContext = {
  /** The chunks the prompt was built from. Used for evidence checks and page inference. */
  pages?: PageChunk[];
  trustReportedConfidence?: boolean;
};

export type EvidenceSignals = {
  valueInPageText: boolean;
  valueInQuote: boolean;
  unitStated: boolean;
  pageCited: boolean;
  quoteLength: number;
};

type Pick = {
  reportedValue: number;
  unitText: string;
  quote: string;
  page?: number;
  confidence?: number;
  year?: number;
};

const NumberLike = z.union([z.number(), z.string()]);

const ResponseItemSchema = z.object({
  metric_id: z.string().nullish(),
  metricId: z.string().nullish(),
  value: NumberLike.nullish(),
  raw_value: NumberLike.nullish(),
  unit: z.string().nullish(),
  unit_reported: z.string().nullish(),
  confidence: NumberLike.nullish(),
  source_text: z.string().nullish(),
  source_quote: z.string().nullish(),
  quote: z.string().nullish(),
  evidence: z.string().nullish(),
  page: NumberLike.nullish(),
  page_num: NumberLike.nullish(),
  page_number: NumberLike.nullish(),
  year: NumberLike.nullish(),
});

type ResponseItem = z.infer<typeof ResponseItemSchema>;

const NOT_FOUND_RE = /not[\s_-]?found|n\/a|없음|찾을 수 없|확인되지 않|해당 ?없|명시되지 않/i;

const NUMBER_RE = /(?<![A-Za-z\d.,])(\d{1,3}(?:,\d{3})+(?:\.\d+)?|\d+(?:\.\d+)?)/g;

type NumberToken = {
  value: number;
  raw: string;
  index: number;
  end: number;
};

function trimText(s: string, max = 320): string {
  const t = (s ?? "").trim().replaceAll("\r\n", "\n").replace(/\s+/g, " ");
  if (t.length <= max) return t;
  return t.slice(0, max - 3) + "...";
}

function numberTokens(text: string): NumberToken[] {
  const out: NumberToken[] = [];
  for (const m of text.matchAll(NUMBER_RE)) {
    const raw = m[1];
    const index = m.index ?? 0;
    let value = Number(raw.replaceAll(",", ""));
    if (!Number.isFinite(value)) continue;
    // "△" marks a negative figure in Korean tables.
    const sign = /(^|[^\dA-Za-z])[-−△]\s?$/.exec(text.slice(Math.max(0, index - 3), index));
    if (sign) value = -value;
    out.push({ value, raw, index, end: index + raw.length });
  }
  return out;
}

function parseNumberText(value: number | string | null | undefined): { value: number; rest: string } | null {
  if (typeof value === "number") return Number.isFinite(value) ? { value, rest: "" } : null;
  if (typeof value !== "string") return null;
  const text = value.trim();
  if (!text || NOT_FOUND_RE.test(text) || /^null$/i.test(text)) return null;
  const tok = numberTokens(text)[0];
  if (!tok) return null;
  return { value: tok.value, rest: text.slice(tok.end) };
}

function toPositiveInt(value: number | string | null | undefined): number | undefined {
  const n = typeof value === "number" ? value : typeof value === "string" ? numberTokens(value)[0]?.value : undefined;
  return n !== undefined && Number.isInteger(n) && n > 0 ? n : undefined;
}

function toYear(value: number | string | null | undefined): number | undefined {
  const n = toPositiveInt(value);
  return n !== undefined && n >= 1900 && n <= 2100 ? n : undefined;
}

/**
 * A 0-1 fraction, a "%" string, or a bare number from 2 to 100 read as a percentage.
 * Anything else (including 1 < n < 2) is unusable and yields undefined.
 */
export function normalizeConfidence(value: number | string | null | undefined): number | undefined {
  let n: number;
  let percent = false;
  if (typeof value === "number") {
    n = value;
  } else if (typeof value === "string") {
    const t = value.trim();
    percent = t.endsWith("%");
    n = Number(t.replace(/%$/, ""));
  } else {
    return undefined;
  }
  if (!Number.isFinite(n) || n < 0) return undefined;
  if (percent || (n >= 2 && n <= 100)) n /= 100;
  return n <= 1 ? n : undefined;
}

/** True when the value is written somewhere in the text, with or without thousands separators. */
export function numberAppearsIn(value: number, text: string | undefined): boolean {
  if (!text) return false;
  const target = Math.abs(value);
  return numberTokens(text).some((t) => Math.abs(Math.abs(t.value) - target) <= 1e-9 * Math.max(1, target));
}

export function deriveConfidence(signals: EvidenceSignals): number {
  let score = 0;
  if (signals.valueInPageText) score += 0.3;
  if (signals.valueInQuote) score += 0.25;
  if (signals.unitStated) score += 0.2;
  if (signals.pageCited) score += 0.1;
  if (signals.quoteLength >= 15) score += 0.15;
  else if (signals.quoteLength >= 5) score += 0.07;
  return Math.round(Math.min(score, 1) * 100) / 100;
}

function extractJson(text: string): unknown {
  const tryParse = (s: string): unknown => {
    try {
      const parsed: unknown = JSON.parse(s);
      return parsed && typeof parsed === "object" ? parsed : undefined;
    } catch {
      return undefined;
    }
  };

  const s = text.trim();
  const whole = tryParse(s);
  if (whole !== undefined) return whole;

  const fenced = /```(?:json)?\s*([\s\S]*?)\s*```/i.exec(s);
  if (fenced) {
    const inner = tryParse(fenced[1]);
    if (inner !== undefined) return inner;
  }

  for (const [open, close] of [["{", "}"], ["[", "]"]] as const) {
    const start = s.indexOf(open);
    const end = s.lastIndexOf(close);
    if (start !== -1 && end > start) {
      const slice = tryParse(s.slice(start, end + 1));
      if (slice !== undefined) return slice;
    }
  }
  return undefined;
}

const ContainerSchema = z.object({
  extracted: z.array(z.unknown()).optional(),
  items: z.array(z.unknown()).optional(),
  results: z.array(z.unknown()).optional(),
});

function jsonItems(parsed: unknown): ResponseItem[] {
  let list: unknown[] = [parsed];
  if (Array.isArray(parsed)) {
    list = parsed;
  } else {
    const container = ContainerSchema.safeParse(parsed);
    if (container.success) {
      const nested = container.data.extracted ?? container.data.items ?? container.data.results;
      if (nested) list = nested;
    }
  }
  const out: ResponseItem[] = [];
  for (const it of list) {
    const r = ResponseItemSchema.safeParse(it);
    if (r.success) out.push(r.data);
  }
  return out;
}

function hasValueField(item: ResponseItem): boolean {
  return item.value !== undefined || item.raw_value !== undefined;
}

function isContainer(parsed: unknown): boolean {
  if (Array.isArray(parsed)) return true;
  const container = ContainerSchema.safeParse(parsed);
  return container.success && Boolean(container.data.extracted ?? container.data.items ?? container.data.results);
}

function labelScore(metric: MetricDefinition, line: string): number {
  const l = line.toLowerCase();
  if (l.includes(metric.id.toLowerCase()) || l.includes(metric.nameKr.toLowerCase()) || l.includes(metric.nameEn.toLowerCase())) {
    return 1;
  }
  return metric.keywords.some((k) => l.includes(k.toLowerCase())) ? 0.5 : 0;
}

function unitScore(metric: MetricDefinition, unitText: string): number {
  const reading = normalizeUnit(unitText);
  return reading && isUnitCompatible(metric, reading.unit) ? 2 : 0;
}

function pickFromJson(items: ResponseItem[], metric: MetricDefinition): Pick | null {
  let best: { pick: Pick; score: number } | null = null;
  for (const item of items) {
    const id = (item.metric_id ?? item.metricId ?? "").trim();
    if (id && id.toUpperCase() !== metric.id.toUpperCase()) continue;

    const parsed = parseNumberText(item.value ?? item.raw_value);
    if (!parsed) continue;

    const unitText = (item.unit ?? item.unit_reported ?? "").trim() || parsed.rest.trim();
    const pick: Pick = {
      reportedValue: parsed.value,
      unitText,
      quote: (item.source_text ?? item.source_quote ?? item.quote ?? item.evidence ?? "").trim(),
      page: toPositiveInt(item.page ?? item.page_num ?? item.page_number),
      confidence: normalizeConfidence(item.confidence),
      year: toYear(item.year),
    };
    const score = unitScore(metric, unitText) + (id ? 1 : 0);
    if (!best || score > best.score || (score === best.score && (pick.year ?? 0) > (best.pick.year ?? 0))) {
      best = { pick, score };
    }
  }
  return best?.pick ?? null;
}

const KEY_ALIASES: Record<string, "value" | "unit" | "confidence" | "page" | "quote" | "year"> = {
  value: "value",
  raw_value: "value",
  값: "value",
  수치: "value",
  unit: "unit",
  unit_reported: "unit",
  단위: "unit",
  confidence: "confidence",
  신뢰도: "confidence",
  page: "page",
  page_num: "page",
  page_number: "page",
  페이지: "page",
  quote: "quote",
  source: "quote",
  source_text: "quote",
  source_quote: "quote",
  evidence: "quote",
  근거: "quote",
  출처: "quote",
  year: "year",
  연도: "year",
  년도: "year",
};

function readKeyValues(text: string): Partial<Record<"value" | "unit" | "confidence" | "page" | "quote" | "year", string>> {
  const out: Partial<Record<"value" | "unit" | "confidence" | "page" | "quote" | "year", string>> = {};
  for (const line of text.split(/\r?\n/)) {
    const m = /^\s*[-*•]?\s*["']?([A-Za-z_가-힣 ]+?)["']?\s*[:=：]\s*(.+?)\s*,?\s*$/.exec(line);
    if (!m) continue;
    const key = KEY_ALIASES[m[1].trim().toLowerCase().replace(/\s+/g, "_")];
    if (key && out[key] === undefined) out[key] = m[2].replace(/^["'“「]|["'”」]$/g, "").trim();
  }
  return out;
}

function pickFromKeyValues(text: string): Pick | null | "absent" {
  const kv = readKeyValues(text);
  if (kv.value === undefined) return null;
  const parsed = parseNumberText(kv.value);
  if (!parsed) return "absent";
  return {
    reportedValue: parsed.value,
    unitText: (kv.unit ?? "").trim() || parsed.rest.trim(),
    quote: kv.quote ?? "",
    page: toPositiveInt(kv.page),
    confidence: normalizeConfidence(kv.confidence),
    year: toYear(kv.year),
  };
}

type ProseToken = NumberToken & { kind: "value" | "page" | "confidence" | "year" | "skip"; line: string; unitText: string };

function classifyProse(text: string): ProseToken[] {
  const out: ProseToken[] = [];
  for (const line of text.split(/\r?\n/)) {
    for (const tok of numberTokens(line)) {
      const before = line.slice(0, tok.index).replace(/[-−△]\s?$/, "");
      const after = line.slice(tok.end);
      const unit = readUnitAfter(after);
      let kind: ProseToken["kind"] = "value";
      if (/(?:\bp\.?|\bpage|\bpg\.?|페이지)\s*$/i.test(before) || /^\s*(?:페이지|쪽|page\b|p\b)/i.test(after)) kind = "page";
      else if (/(?:confidence|신뢰도|확신도)\s*[:=：]?\s*$/i.test(before)) kind = "confidence";
      else if (/^\s*년/.test(after) || /\bFY\s*$/i.test(before)) kind = "year";
      else if (/scope\s*$/i.test(before) || /GRI\s*$/i.test(before) || /^-\d/.test(after)) kind = "skip";
      out.push({ ...tok, kind, line, unitText: unit?.raw ?? "" });
    }
  }
  return out;
}

function quoteAround(text: string, raw: string, line: string): string {
  for (const m of text.matchAll(/[“"「『]([^”"」』]{5,}?)[”"」』]/g)) {
    if (m[1].includes(raw)) return trimText(m[1]);
  }
  return trimText(line);
}

function pickFromProse(text: string, metric: MetricDefinition): Pick | null {
  const tokens = classifyProse(text);
  let best: { tok: ProseToken; score: number } | null = null;
  for (const tok of tokens) {
    if (tok.kind !== "value") continue;
    const before = tok.line.slice(Math.max(0, tok.index - 4), tok.index);
    const yearLike = Number.isInteger(tok.value) && tok.value >= 1990 && tok.value <= 2100 && !tok.unitText;
    const score =
      unitScore(metric, tok.unitText) +
      labelScore(metric, tok.line) +
      (/[:=：]|[은는이가약]\s*$/.test(before) ? 0.5 : 0) -
      (yearLike ? 1 : 0);
    if (!best || score > best.score) best = { tok, score };
  }
  if (!best) return null;
  // An explicit "not found" only yields to a value carrying a compatible unit.
  if (NOT_FOUND_RE.test(text) && unitScore(metric, best.tok.unitText) === 0) return null;

  const page = tokens.find((t) => t.kind === "page");
  const conf = tokens.find((t) => t.kind === "confidence");
  const year = tokens.find((t) => t.kind === "year" && t.line === best?.tok.line) ?? tokens.find((t) => t.kind === "year");
  return {
    reportedValue: best.tok.value,
    unitText: best.tok.unitText,
    quote: quoteAround(text, best.tok.raw, best.tok.line),
    page: page ? toPositiveInt(page.value) : undefined,
    confidence: conf ? normalizeConfidence(conf.value) : undefined,
    year: year ? toYear(year.value) : undefined,
  };
}

function sentenceWith(value: number, pages: PageChunk[]): { quote: string; pageNumber: number } | null {
  for (const p of pages) {
    for (const sentence of p.text.split(/(?<=[.!?。])\s+|\n+/)) {
      if (numberAppearsIn(value, sentence)) return { quote: trimText(sentence), pageNumber: p.pageNumber };
    }
  }
  return null;
}

function buildCandidate(pick: Pick, metric: MetricDefinition, ctx: ParseContext): ParseOutcome {
  const pages = ctx.pages ?? [];
  const pageText = pages.map((p) => p.text).join("\n");
  const reading = normalizeUnit(pick.unitText);
  const unitMismatch = reading !== null && !isUnitCompatible(metric, reading.unit);
  const value = reading && !unitMismatch ? Number((pick.reportedValue * reading.factor).toPrecision(12)) : pick.reportedValue;

  let quote = trimText(pick.quote);
  let inferredPage: number | null = null;
  if (!quote) {
    const found = sentenceWith(pick.reportedValue, pages);
    if (!found) return { kind: "not_found", reason: "missing_evidence" };
    quote = found.quote;
    inferredPage = found.pageNumber;
  }

  const knownPages = new Set(pages.map((p) => p.pageNumber));
  const citedPage = pick.page !== undefined && (!knownPages.size || knownPages.has(pick.page)) ? pick.page : null;
  if (citedPage === null && inferredPage === null) {
    const holder = pages.find((p) => p.text.replace(/\s+/g, " ").includes(quote));
    inferredPage = holder?.pageNumber ?? (pages.length === 1 ? pages[0].pageNumber : null);
  }

  const reported = ctx.trustReportedConfidence === false ? undefined : pick.confidence;
  const confidence =
    reported ??
    deriveConfidence({
      valueInPageText: numberAppearsIn(pick.reportedValue, pageText),
      valueInQuote: numberAppearsIn(pick.reportedValue, quote),
      unitStated: reading !== null && !unitMismatch,
      pageCited: citedPage !== null,
      quoteLength: quote.length,
    });

  const candidate: Candidate = {
    metricId: metric.id,
    value,
    reportedValue: pick.reportedValue,
    unitReported: pick.unitText,
    unit: reading?.unit ?? null,
    unitMismatch,
    confidence,
    confidenceSource: reported !== undefined ? "reported" : "derived",
    sourceQuote: quote,
    pageNumber: citedPage ?? inferredPage,
    year: pick.year ?? null,
  };
  return { kind: "found", candidate };
}

/**
 * Turns one backend response into at most one candidate for `metric`.
 * "Nothing usable" is a not_found outcome; only non-text or blank input throws.
 */
export function parseMetricResponse(raw: unknown, metric: MetricDefinition, ctx: ParseContext = {}): ParseOutcome {
  if (typeof raw !== "string") throw new ParseInputError(metric.id, `expected text, got ${raw === null ? "null" : typeof raw}`);
  const text = raw.trim();
  if (!text) throw new ParseInputError(metric.id, "empty response");

  const parsed = extractJson(text);
  if (parsed !== undefined) {
    const items = jsonItems(parsed);
    // A JSON answer in the requested shape is authoritative; anything else falls through to text reading.
    if (isContainer(parsed) || items.some(hasValueField)) {
      const pick = pickFromJson(items, metric);
      return pick ? buildCandidate(pick, metric, ctx) : { kind: "not_found", reason: "value_absent" };
    }
  }

  const kv = pickFromKeyValues(text);
  if (kv === "absent") return { kind: "not_found", reason: "value_absent" };
  if (kv) return buildCandidate(kv, metric, ctx);

  const prose = pickFromProse(text, metric);
  return prose ? buildCandidate(prose, metric, ctx) : { kind: "not_found", reason: "value_absent" };
}
