import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from "@/lib/config";
import { ValidationRuleError, errorMessage } from "@/lib/errors";
import type { MetricRegistry } from "@/lib/esgMetrics";
import type { Candidate, MetricDefinition, NotFoundReason, ValidationVerdict, VerdictStatus } from "@/lib/esgPacks";

type RuleHit = { status: VerdictStatus; reason: string };

export type MetricRule = {
  id: string;
  check: (metric: MetricDefinition, candidate: Candidate | undefined, config: PipelineConfig) => RuleHit | null;
};

export type ConsistencyRule = {
  id: string;
  metricIds: readonly string[];
  /** Returns a warning reason, or null when the values agree. */
  check: (values: Record<string, number>, config: PipelineConfig) => string | null;
};

export type ValidateOptions = {
  config?: Partial<PipelineConfig>;
  notFoundReasons?: Partial<Record<string, NotFoundReason>>;
  consistencyRules?: readonly ConsistencyRule[];
};

const NOT_FOUND_TEXT: Record<NotFoundReason, string> = {
  value_absent: "value absent in text",
  missing_evidence: "value without supporting evidence",
  backend_error: "backend error",
  parse_error: "unparseable backend response",
};

function formatRange(metric: MetricDefinition): string {
  return `[${metric.validRange.min}, ${metric.validRange.max ?? "∞"}]`;
}

const unitRule: MetricRule = {
  id: "unit",
  check(metric, candidate) {
    if (!candidate?.unitMismatch) return null;
    return { status: "FAIL", reason: `unit mismatch: "${candidate.unitReported}" for ${metric.unit}` };
  },
};

const rangeRule: MetricRule = {
  id: "range",
  check(metric, candidate) {
    if (!candidate) return null;
    const { min, max } = metric.validRange;
    const v = candidate.value;
    if (Number.isFinite(v) && v >= min && (max === null || v <= max)) return null;
    return { status: "FAIL", reason: `out of physical range: ${v} outside ${formatRange(metric)}` };
  },
};

const lowConfidenceRule: MetricRule = {
  id: "low_confidence",
  check(_metric, candidate, config) {
    if (!candidate || candidate.confidence >= config.lowConfidenceThreshold) return null;
    return { status: "WARNING", reason: `low extraction confidence: ${candidate.confidence} < ${config.lowConfidenceThreshold}` };
  },
};

const reportYearRule: MetricRule = {
  id: "report_year",
  check(_metric, candidate, config) {
    if (!candidate || candidate.year === null) return null;
    if (candidate.year >= config.minReportYear && candidate.year <= config.maxReportYear) return null;
    return {
      status: "WARNING",
      reason: `implausible report year: ${candidate.year} outside [${config.minReportYear}, ${config.maxReportYear}]`,
    };
  },
};

function boardRatioAchievable(percent: number, members: number): boolean {
  const k = Math.round((percent * members) / 100);
  return Math.abs((k * 100) / members - percent) <= 0.5;
}

export const CONSISTENCY_RULES: readonly ConsistencyRule[] = [
  {
    id: "scope12_vs_scope3",
    metricIds: ["E01", "E02", "E03"],
    check(v, config) {
      const scope12 = v.E01 + v.E02;
      if (scope12 <= v.E03 * config.scope12ToScope3MaxRatio) return null;
      return `Scope 1+2 (${scope12}) exceeds ${config.scope12ToScope3MaxRatio}x Scope 3 (${v.E03})`;
    },
  },
  {
    id: "emission_intensity",
    metricIds: ["E01", "E02", "E04"],
    check(v, config) {
      const scope12 = v.E01 + v.E02;
      if (v.E04 === 0) return scope12 > 0 ? "emissions reported with zero energy use" : null;
      const intensity = scope12 / v.E04;
      if (intensity <= config.maxEmissionIntensity) return null;
      return `emission intensity ${Math.round(intensity * 100) / 100} tCO2eq/TJ above ${config.maxEmissionIntensity}`;
    },
  },
  {
    id: "recycling_without_waste",
    metricIds: ["E06", "E07"],
    check(v) {
      return v.E06 === 0 && v.E07 > 0 ? `recycling rate ${v.E07}% with no waste generated` : null;
    },
  },
  {
    id: "board_ratio_granularity",
    metricIds: ["G01", "G03"],
    check(v, config) {
      for (let n = 1; n <= config.maxBoardSize; n++) {
        if (boardRatioAchievable(v.G01, n) && boardRatioAchievable(v.G03, n)) return null;
      }
      return `board ratios ${v.G01}% and ${v.G03}% fit no board of at most ${config.maxBoardSize} members`;
    },
  },
];

function compareCandidates(a: Candidate, b: Candidate): number {
  if (a.confidence !== b.confidence) return b.confidence - a.confidence;
  const pa = a.pageNumber ?? Number.POSITIVE_INFINITY;
  const pb = b.pageNumber ?? Number.POSITIVE_INFINITY;
  if (pa !== pb) return pa - pb;
  if (a.sourceQuote !== b.sourceQuote) return a.sourceQuote < b.sourceQuote ? -1 : 1;
  return a.value - b.value;
}

/** One candidate per metric id; unknown ids throw. */
export function resolveCandidates(candidates: readonly Candidate[], registry: MetricRegistry): Map<string, Candidate> {
  const out = new Map<string, Candidate>();
  for (const c of candidates) {
    registry.get(c.metricId);
    const prev = out.get(c.metricId);
    if (!prev || compareCandidates(c, prev) < 0) out.set(c.metricId, c);
  }
  return out;
}

function runRule(rule: MetricRule, metric: MetricDefinition, candidate: Candidate | undefined, config: PipelineConfig): ValidationVerdict | null {
  try {
    const hit = rule.check(metric, candidate, config);
    return hit ? { metricId: metric.id, ruleId: rule.id, ...hit } : null;
  } catch (err) {
    const wrapped = new ValidationRuleError(rule.id, [metric.id], err);
    console.error("ESG validation rule failed", { ruleId: rule.id, metricId: metric.id, err: errorMessage(err) });
    return { metricId: metric.id, status: "RULE_ERROR", ruleId: rule.id, reason: wrapped.message };
  }
}

/**
 * One verdict per registry metric, in registry order.
 * Rules run in order and the first verdict a rule returns is final for that metric.
 */
export function validateCandidates(
  candidates: readonly Candidate[],
  registry: MetricRegistry,
  options: ValidateOptions = {},
): ValidationVerdict[] {
  const config: PipelineConfig = { ...DEFAULT_PIPELINE_CONFIG, ...options.config };
  const byId = resolveCandidates(candidates, registry);
  const metrics = registry.all();
  const decided = new Map<string, ValidationVerdict>();

  for (const metric of metrics) {
    const candidate = byId.get(metric.id);
    if (!candidate) {
      const why = options.notFoundReasons?.[metric.id] ?? "value_absent";
      decided.set(metric.id, { metricId: metric.id, status: "NOT_FOUND", ruleId: "presence", reason: NOT_FOUND_TEXT[why] });
      continue;
    }
    for (const rule of [unitRule, rangeRule]) {
      const verdict = runRule(rule, metric, candidate, config);
      if (verdict) {
        decided.set(metric.id, verdict);
        break;
      }
    }
  }

  const failed = new Set(decided.keys());
  for (const rule of options.consistencyRules ?? CONSISTENCY_RULES) {
    const values: Record<string, number> = {};
    let eligible = true;
    for (const id of rule.metricIds) {
      const candidate = byId.get(id);
      if (!registry.has(id) || !candidate || failed.has(id)) {
        eligible = false;
        break;
      }
      values[id] = candidate.value;
    }
    if (!eligible) continue;

    let hit: RuleHit;
    try {
      const reason = rule.check(values, config);
      if (reason === null) continue;
      hit = { status: "WARNING", reason };
    } catch (err) {
      const wrapped = new ValidationRuleError(rule.id, [...rule.metricIds], err);
      console.error("ESG consistency rule failed", { ruleId: rule.id, metricIds: rule.metricIds, err: errorMessage(err) });
      hit = { status: "RULE_ERROR", reason: wrapped.message };
    }
    for (const id of rule.metricIds) {
      if (!decided.has(id)) decided.set(id, { metricId: id, ruleId: rule.id, ...hit });
    }
  }

  return metrics.map((metric) => {
    const verdict = decided.get(metric.id);
    if (verdict) return verdict;
    const candidate = byId.get(metric.id);
    return (
      runRule(reportYearRule, metric, candidate, config) ??
      runRule(lowConfidenceRule, metric, candidate, config) ?? { metricId: metric.id, status: "PASS", ruleId: "pass", reason: "all checks passed" }
    );
  });
}
