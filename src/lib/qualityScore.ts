import type { MetricRegistry } from "@/lib/esgMetrics";
import {
  ESG_CATEGORIES,
  type Candidate,
  type CategoryScore,
  type QualityDimensions,
  type ScoreReport,
  type ValidationVerdict,
  type VerdictStatus,
} from "@/lib/esgPacks";
import { resolveCandidates } from "@/lib/metricValidators";

export const STATUS_WEIGHTS: Record<Exclude<VerdictStatus, "NOT_FOUND">, number> = {
  PASS: 1,
  WARNING: 0.5,
  FAIL: 0,
  RULE_ERROR: 0,
};

const MIN_TRACEABLE_QUOTE = 10;

function emptyCounts(): Record<VerdictStatus, number> {
  return { PASS: 0, WARNING: 0, FAIL: 0, NOT_FOUND: 0, RULE_ERROR: 0 };
}

function mean(values: number[]): number {
  return values.length ? values.reduce((a, b) => a + b, 0) / values.length : 0;
}

/** Category qualities weighted by category coverage; uncovered categories drop out. */
function coverageWeightedScore(categories: readonly CategoryScore[]): number {
  let weighted = 0;
  let totalCoverage = 0;
  for (const c of categories) {
    weighted += c.quality * c.coverage;
    totalCoverage += c.coverage;
  }
  return totalCoverage > 0 ? weighted / totalCoverage : 0;
}

export function scoreReport(
  candidates: readonly Candidate[],
  verdicts: readonly ValidationVerdict[],
  registry: MetricRegistry,
): ScoreReport {
  const byId = resolveCandidates(candidates, registry);
  const verdictById = new Map(verdicts.map((v) => [v.metricId, v]));

  const categories: CategoryScore[] = [];
  const found: Array<{ candidate: Candidate; status: Exclude<VerdictStatus, "NOT_FOUND"> }> = [];
  const inRange: boolean[] = [];

  for (const category of ESG_CATEGORIES) {
    const metrics = registry.byCategory(category);
    if (!metrics.length) continue;

    const statusCounts = emptyCounts();
    const weighted: number[] = [];
    for (const metric of metrics) {
      const verdict = verdictById.get(metric.id);
      if (!verdict) throw new Error(`Missing verdict for metric ${metric.id}`);
      statusCounts[verdict.status] += 1;

      const candidate = byId.get(metric.id);
      if (!candidate || verdict.status === "NOT_FOUND") continue;
      weighted.push(candidate.confidence * STATUS_WEIGHTS[verdict.status]);
      found.push({ candidate, status: verdict.status });
      const { min, max } = metric.validRange;
      inRange.push(!candidate.unitMismatch && candidate.value >= min && (max === null || candidate.value <= max));
    }

    categories.push({
      category,
      metricsExpected: metrics.length,
      metricsFound: weighted.length,
      coverage: weighted.length / metrics.length,
      quality: mean(weighted),
      statusCounts,
    });
  }

  const expected = categories.reduce((n, c) => n + c.metricsExpected, 0);
  const dimensions: QualityDimensions = {
    completeness: expected ? found.length / expected : 0,
    accuracy: mean(inRange.map((ok) => (ok ? 1 : 0))),
    validity: mean(found.map((f) => STATUS_WEIGHTS[f.status])),
    confidence: mean(found.map((f) => f.candidate.confidence)),
    traceability: mean(found.map((f) => (f.candidate.sourceQuote.trim().length >= MIN_TRACEABLE_QUOTE ? 1 : 0))),
  };

  return {
    categories,
    coverage: dimensions.completeness,
    quality: mean(found.map((f) => f.candidate.confidence * STATUS_WEIGHTS[f.status])),
    score: coverageWeightedScore(categories),
    dimensions,
  };
}
