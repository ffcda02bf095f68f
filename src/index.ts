export * from "./lib/esgPacks";
export { ESG_METRICS, createMetricRegistry, getDefaultRegistry, type MetricRegistry } from "./lib/esgMetrics";
export { normalizeUnit, isUnitCompatible, type UnitReading } from "./lib/units";
export { parseMetricResponse, deriveConfidence, type ParseContext, type EvidenceSignals } from "./lib/responseParser";
export { buildMetricPrompt, selectChunks } from "./lib/metricPrompt";
export { extractMetrics, type ExtractMetricsArgs } from "./lib/extraction";
export {
  CONSISTENCY_RULES,
  validateCandidates,
  type ConsistencyRule,
  type ValidateOptions,
} from "./lib/metricValidators";
export { STATUS_WEIGHTS, scoreReport } from "./lib/qualityScore";
export { EXPORT_COLUMNS, toCsv, toExportRows, type ExportRow } from "./lib/exportRows";
export { PageChunkSchema, runEsgPipeline, type PipelineResult } from "./lib/pipeline";
export { DEFAULT_PIPELINE_CONFIG, getPipelineConfig, type PipelineConfig } from "./lib/config";
export { createUsageTally, estimateUsd, getPriceForModel, type UsageSummary } from "./lib/cost";
export { completeText, createLlmBackend, getLlmProvider, type LlmBackend, type LlmProvider } from "./lib/llm";
export { createDemoBackend, demoChunks } from "./lib/demoBackend";
export { BackendError, ParseInputError, UnknownMetricError, ValidationRuleError } from "./lib/errors";
