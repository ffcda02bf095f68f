import { describe, expect, it, vi } from "vitest";

import { UnknownMetricError } from "@/lib/errors";
import { getDefaultRegistry } from "@/lib/esgMetrics";
import type { ValidationVerdict } from "@/lib/esgPacks";
import { resolveCandidates, validateCandidates, type ConsistencyRule } from "@/lib/metricValidators";

import { candidate } from "../helpers/fixtures";

const registry = getDefaultRegistry();

function verdictFor(verdicts: ValidationVerdict[], metricId: string): ValidationVerdict {
  const v = verdicts.find((x) => x.metricId === metricId);
  if (!v) throw new Error(`no verdict for ${metricId}`);
  return v;
}

describe("validateCandidates", () => {
  it("returns one NOT_FOUND verdict per metric when nothing was extracted", () => {
    const verdicts = validateCandidates([], registry);
    expect(verdicts).toHaveLength(16);
    expect(verdicts.map((v) => v.metricId)).toEqual(registry.all().map((m) => m.id));
    expect(new Set(verdicts.map((v) => v.status))).toEqual(new Set(["NOT_FOUND"]));
    expect(verdicts[0]).toEqual({ metricId: "E01", status: "NOT_FOUND", ruleId: "presence", reason: "value absent in text" });
  });

  it("distinguishes backend errors from absent values", () => {
    const verdicts = validateCandidates([], registry, { notFoundReasons: { G03: "backend_error" } });
    expect(verdictFor(verdicts, "G03").reason).toBe("backend error");
    expect(verdictFor(verdicts, "G04").reason).toBe("value absent in text");
  });

  it("passes a clean percentage and fails one above 100", () => {
    const ok = validateCandidates([candidate("S02", 37.5)], registry);
    expect(verdictFor(ok, "S02")).toEqual({ metricId: "S02", status: "PASS", ruleId: "pass", reason: "all checks passed" });

    const bad = validateCandidates([candidate("S02", 105)], registry);
    expect(verdictFor(bad, "S02")).toEqual({
      metricId: "S02",
      status: "FAIL",
      ruleId: "range",
      reason: "out of physical range: 105 outside [0, 100]",
    });
  });

  it("fails negative emissions", () => {
    const verdicts = validateCandidates([candidate("E01", -10), candidate("E03", -1)], registry);
    expect(verdictFor(verdicts, "E01").reason).toBe("out of physical range: -10 outside [0, 1000000000]");
    expect(verdictFor(verdicts, "E03").reason).toBe("out of physical range: -1 outside [0, ∞]");
  });

  it("checks the unit before the range", () => {
    const verdicts = validateCandidates([candidate("S02", 105, { unitMismatch: true, unitReported: "%p", unit: "%p" })], registry);
    expect(verdictFor(verdicts, "S02")).toEqual({ metricId: "S02", status: "FAIL", ruleId: "unit", reason: 'unit mismatch: "%p" for %' });
  });

  it("warns on low extraction confidence", () => {
    const verdicts = validateCandidates([candidate("G02", 14, { confidence: 0.3 })], registry);
    expect(verdictFor(verdicts, "G02")).toEqual({
      metricId: "G02",
      status: "WARNING",
      ruleId: "low_confidence",
      reason: "low extraction confidence: 0.3 < 0.5",
    });
  });

  it("honors a configured confidence threshold", () => {
    const verdicts = validateCandidates([candidate("G02", 14, { confidence: 0.3 })], registry, { config: { lowConfidenceThreshold: 0.2 } });
    expect(verdictFor(verdicts, "G02").status).toBe("PASS");
  });

  it("warns on a report year outside the plausible range", () => {
    const verdicts = validateCandidates([candidate("G02", 14, { year: 1950 }), candidate("G04", 98.5, { year: null })], registry);
    expect(verdictFor(verdicts, "G02")).toEqual({
      metricId: "G02",
      status: "WARNING",
      ruleId: "report_year",
      reason: "implausible report year: 1950 outside [2000, 2026]",
    });
    expect(verdictFor(verdicts, "G04").status).toBe("PASS");
  });

  it("checks the report year before confidence and honors configured bounds", () => {
    const early = validateCandidates([candidate("G02", 14, { year: 1950, confidence: 0.3 })], registry);
    expect(verdictFor(early, "G02").ruleId).toBe("report_year");

    const bounded = validateCandidates([candidate("G02", 14)], registry, { config: { maxReportYear: 2022 } });
    expect(verdictFor(bounded, "G02").reason).toBe("implausible report year: 2023 outside [2000, 2022]");
  });

  it("rejects candidates for unknown metrics", () => {
    expect(() => validateCandidates([candidate("E01", 1, { metricId: "X99" })], registry)).toThrow(UnknownMetricError);
  });

  it("is idempotent and leaves its inputs untouched", () => {
    const input = [candidate("E01", 200), candidate("E02", 100), candidate("E03", 20), candidate("S02", 105)];
    const copy = structuredClone(input);
    const first = validateCandidates(input, registry);
    const second = validateCandidates(input, registry);
    expect(second).toEqual(first);
    expect(input).toEqual(copy);
  });
});

describe("consistency rules", () => {
  it("warns every metric of an implausible Scope 1+2 to Scope 3 ratio", () => {
    const verdicts = validateCandidates([candidate("E01", 200), candidate("E02", 100), candidate("E03", 20)], registry);
    for (const id of ["E01", "E02", "E03"]) {
      expect(verdictFor(verdicts, id)).toEqual({
        metricId: id,
        status: "WARNING",
        ruleId: "scope12_vs_scope3",
        reason: "Scope 1+2 (300) exceeds 10x Scope 3 (20)",
      });
    }
  });

  it("skips a consistency rule when a referenced metric already failed", () => {
    const verdicts = validateCandidates([candidate("E01", 200), candidate("E02", 100), candidate("E03", -5)], registry);
    expect(verdictFor(verdicts, "E01").status).toBe("PASS");
    expect(verdictFor(verdicts, "E02").status).toBe("PASS");
    expect(verdictFor(verdicts, "E03").status).toBe("FAIL");
  });

  it("warns on emission intensity far above energy use", () => {
    const verdicts = validateCandidates([candidate("E01", 500), candidate("E02", 100), candidate("E04", 1)], registry);
    expect(verdictFor(verdicts, "E04")).toEqual({
      metricId: "E04",
      status: "WARNING",
      ruleId: "emission_intensity",
      reason: "emission intensity 600 tCO2eq/TJ above 300",
    });
    expect(verdictFor(verdicts, "E01").ruleId).toBe("emission_intensity");
  });

  it("warns on recycling without any waste", () => {
    const verdicts = validateCandidates([candidate("E06", 0), candidate("E07", 50)], registry);
    expect(verdictFor(verdicts, "E07").reason).toBe("recycling rate 50% with no waste generated");
    expect(verdictFor(verdicts, "E06").status).toBe("WARNING");
  });

  it("accepts board ratios that fit one small board", () => {
    const verdicts = validateCandidates([candidate("G01", 57.1), candidate("G03", 14.3)], registry);
    expect(verdictFor(verdicts, "G01").status).toBe("PASS");
    expect(verdictFor(verdicts, "G03").status).toBe("PASS");
  });

  it("warns on board ratios no board of the configured size can produce", () => {
    const input = [candidate("G01", 50), candidate("G03", 1)];
    const verdicts = validateCandidates(input, registry);
    expect(verdictFor(verdicts, "G03")).toEqual({
      metricId: "G03",
      status: "WARNING",
      ruleId: "board_ratio_granularity",
      reason: "board ratios 50% and 1% fit no board of at most 20 members",
    });
    const larger = validateCandidates(input, registry, { config: { maxBoardSize: 100 } });
    expect(verdictFor(larger, "G03").status).toBe("PASS");
  });

  it("never turns a consistency finding into FAIL", () => {
    const verdicts = validateCandidates(
      [candidate("E01", 500), candidate("E02", 100), candidate("E03", 1), candidate("E04", 1), candidate("E06", 0), candidate("E07", 50)],
      registry,
    );
    expect(verdicts.filter((v) => v.status === "FAIL")).toEqual([]);
  });

  it("reports a throwing rule as RULE_ERROR for the metrics it governs", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const explodes: ConsistencyRule = {
      id: "explodes",
      metricIds: ["E01", "E02"],
      check() {
        throw new Error("bad math");
      },
    };
    const verdicts = validateCandidates([candidate("E01", 1), candidate("E02", 1), candidate("S02", 40)], registry, {
      consistencyRules: [explodes],
    });

    expect(verdicts).toHaveLength(16);
    expect(verdictFor(verdicts, "E01")).toEqual({
      metricId: "E01",
      status: "RULE_ERROR",
      ruleId: "explodes",
      reason: "RULE_ERROR: explodes (bad math)",
    });
    expect(verdictFor(verdicts, "E02").status).toBe("RULE_ERROR");
    expect(verdictFor(verdicts, "S02").status).toBe("PASS");
    expect(error).toHaveBeenCalledTimes(1);
  });
});

describe("resolveCandidates", () => {
  it("keeps the most confident candidate, then the earliest page", () => {
    const byConfidence = resolveCandidates([candidate("E01", 100, { confidence: 0.6 }), candidate("E01", 200, { confidence: 0.9 })], registry);
    expect(byConfidence.get("E01")?.value).toBe(200);

    const byPage = resolveCandidates([candidate("E01", 100, { pageNumber: 5 }), candidate("E01", 200, { pageNumber: 3 })], registry);
    expect(byPage.get("E01")?.value).toBe(200);
  });

  it("picks the same duplicate whatever the input order", () => {
    const a = candidate("E01", 200, { sourceQuote: "Scope 1 배출량" });
    const b = candidate("E01", 100, { sourceQuote: "Scope 1 배출량" });
    expect(resolveCandidates([a, b], registry).get("E01")?.value).toBe(100);
    expect(resolveCandidates([b, a], registry).get("E01")?.value).toBe(100);
  });
});
