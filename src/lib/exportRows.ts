import type { ScoredRecord } from "@/lib/esgPacks";

export const EXPORT_COLUMNS = [
  "metric_id",
  "category",
  "name_kr",
  "name_en",
  "gri_code",
  "value",
  "unit",
  "unit_reported",
  "confidence",
  "status",
  "rule_id",
  "reason",
  "page_number",
  "year",
  "source_quote",
] as const;

export type ExportColumn = (typeof EXPORT_COLUMNS)[number];

export type ExportRow = Record<ExportColumn, string | number | null>;

export function toExportRows(records: readonly ScoredRecord[]): ExportRow[] {
  return records.map(({ metric, candidate, verdict }) => ({
    metric_id: metric.id,
    category: metric.category,
    name_kr: metric.nameKr,
    name_en: metric.nameEn,
    gri_code: metric.griCode,
    value: candidate?.value ?? null,
    unit: metric.unit,
    unit_reported: candidate?.unitReported ?? null,
    confidence: candidate?.confidence ?? null,
    status: verdict.status,
    rule_id: verdict.ruleId,
    reason: verdict.reason,
    page_number: candidate?.pageNumber ?? null,
    year: candidate?.year ?? null,
    source_quote: candidate?.sourceQuote ?? null,
  }));
}

function csvCell(value: string | number | null): string {
  if (value === null) return "";
  const s = String(value);
  return /[",\r\n]/.test(s) ? `"${s.replaceAll('"', '""')}"` : s;
}

/** CSV with a UTF-8 byte order mark so spreadsheet tools read the Korean text. */
export function toCsv(rows: readonly ExportRow[]): string {
  const lines = [EXPORT_COLUMNS.join(",")];
  for (const row of rows) lines.push(EXPORT_COLUMNS.map((c) => csvCell(row[c])).join(","));
  return "\uFEFF" + lines.join("\r\n") + "\r\n";
}
