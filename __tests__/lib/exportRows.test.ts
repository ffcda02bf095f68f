import { describe, expect, it } from "vitest";

import { getDefaultRegistry } from "@/lib/esgMetrics";
import type { ScoredRecord } from "@/lib/esgPacks";
import { EXPORT_COLUMNS, toCsv, toExportRows } from "@/lib/exportRows";

import { candidate } from "../helpers/fixtures";

const registry = getDefaultRegistry();

const records: ScoredRecord[] = [
  {
    metric: registry.get("E01"),
    candidate: candidate("E01", 245000, { confidence: 0.95, pageNumber: 23, sourceQuote: 'Scope 1 "직접" 배출, 245,000 tCO2eq' }),
    verdict: { metricId: "E01", status: "PASS", ruleId: "pass", reason: "all checks passed" },
  },
  {
    metric: registry.get("G03"),
    candidate: null,
    verdict: { metricId: "G03", status: "NOT_FOUND", ruleId: "presence", reason: "value absent in text" },
  },
];

describe("toExportRows", () => {
  it("flattens a record into the export columns", () => {
    const [row] = toExportRows(records);
    expect(Object.keys(row)).toEqual([...EXPORT_COLUMNS]);
    expect(row).toMatchObject({ metric_id: "E01", gri_code: "305-1", value: 245000, unit: "tCO2eq", page_number: 23, status: "PASS" });
  });

  it("leaves candidate columns empty for metrics that were not found", () => {
    const row = toExportRows(records)[1];
    expect(row.value).toBeNull();
    expect(row.confidence).toBeNull();
    expect(row.source_quote).toBeNull();
    expect(row.reason).toBe("value absent in text");
  });
});

describe("toCsv", () => {
  it("writes a BOM, a header and escaped rows", () => {
    const csv = toCsv(toExportRows(records));
    expect(csv).toBe(
      "\uFEFF" +
        [
          EXPORT_COLUMNS.join(","),
          'E01,Environmental,Scope 1 온실가스 직접배출량,GHG Emissions (Scope 1),305-1,245000,tCO2eq,tCO2eq,0.95,PASS,pass,all checks passed,23,2023,"Scope 1 ""직접"" 배출, 245,000 tCO2eq"',
          "G03,Governance,여성 이사 비율,Female Board Member Ratio,405-1,,%,,,NOT_FOUND,presence,value absent in text,,,",
        ].join("\r\n") +
        "\r\n",
    );
  });
});
