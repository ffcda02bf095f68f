export type EsgCategory = "Environmental" | "Social" | "Governance";

export const ESG_CATEGORIES: readonly EsgCategory[] = ["Environmental", "Social", "Governance"];

export type UnitTag = "tCO2eq" | "TJ" | "ton" | "m3" | "%" | "%p" | "count" | "hours" | "currency";

export type Polarity = "higher_better" | "lower_better" | "neutral";

export type MetricDefinition = {
  id: string; // "E01"
  category: EsgCategory;
  nameKr: string;
  nameEn: string;
  unit: UnitTag;
  equivalentUnits?: readonly UnitTag[]; // accepted 1:1, e.g. m3 of water for tonnes
  griCode: string;
  validRange: { min: number; max: number | null }; // closed, max null = unbounded
  polarity: Polarity;
  keywords: readonly string[];
};

export type PageChunk = {
  pageNumber: number;
  text: string;
};

export type BackendCall = (prompt: string) => Promise<string>;

export type Candidate = {
  metricId: string;
  value: number; // canonical unit
  reportedValue: number; // as stated, before scale conversion
  unitReported: string; // "" when the backend gave none
  unit: UnitTag | null;
  unitMismatch: boolean;
  confidence: number; // 0..1
  confidenceSource: "reported" | "derived";
  sourceQuote: string;
  pageNumber: number | null;
  year: number | null;
};

export type NotFoundReason = "value_absent" | "missing_evidence" | "backend_error" | "parse_error";

export type ParseOutcome =
  | { kind: "found"; candidate: Candidate }
  | { kind: "not_found"; reason: "value_absent" | "missing_evidence" };

export type ExtractionOutcome =
  | { kind: "found"; metricId: string; candidate: Candidate; pages: number[] }
  | { kind: "not_found"; metricId: string; reason: NotFoundReason; detail?: string; pages: number[] };

export type VerdictStatus = "PASS" | "WARNING" | "FAIL" | "NOT_FOUND" | "RULE_ERROR";

export type ValidationVerdict = {
  metricId: string;
  status: VerdictStatus;
  ruleId: string;
  reason: string;
};

export type CategoryScore = {
  category: EsgCategory;
  metricsExpected: number;
  metricsFound: number;
  coverage: number;
  quality: number;
  statusCounts: Record<VerdictStatus, number>;
};

export type QualityDimensions = {
  completeness: number;
  accuracy: number;
  validity: number;
  confidence: number;
  traceability: number;
};

export type ScoreReport = {
  categories: CategoryScore[];
  coverage: number;
  quality: number;
  score: number;
  dimensions: QualityDimensions;
};

export type ScoredRecord = {
  metric: MetricDefinition;
  candidate: Candidate | null;
  verdict: ValidationVerdict;
};
