import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from "@/lib/config";
import { BackendError, errorMessage } from "@/lib/errors";
import type { BackendCall, ExtractionOutcome, MetricDefinition, PageChunk } from "@/lib/esgPacks";
import { buildMetricPrompt, selectChunks } from "@/lib/metricPrompt";
import { parseMetricResponse } from "@/lib/responseParser";

export type ExtractMetricsArgs = {
  metrics: readonly MetricDefinition[];
  chunks: PageChunk[];
  backend: BackendCall;
  config?: Partial<PipelineConfig>;
};

async function callWithTimeout(backend: BackendCall, prompt: string, metricId: string, timeoutMs: number): Promise<string> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new BackendError(metricId, `timed out after ${timeoutMs}ms`, { timedOut: true })), timeoutMs);
  });
  try {
    return await Promise.race([backend(prompt), timeout]);
  } catch (err) {
    if (err instanceof BackendError) throw err;
    throw new BackendError(metricId, errorMessage(err), { cause: err });
  } finally {
    clearTimeout(timer);
  }
}

async function extractOne(metric: MetricDefinition, args: ExtractMetricsArgs, config: PipelineConfig): Promise<ExtractionOutcome> {
  const pages = selectChunks(metric, args.chunks, config.maxChunksPerMetric);
  const pageNumbers = pages.map((p) => p.pageNumber);
  if (!pages.length) return { kind: "not_found", metricId: metric.id, reason: "value_absent", pages: pageNumbers };

  let raw: string;
  try {
    raw = await callWithTimeout(args.backend, buildMetricPrompt(metric, pages, config.maxPromptChars), metric.id, config.backendTimeoutMs);
  } catch (err) {
    console.warn("ESG backend call failed", { metricId: metric.id, err: errorMessage(err) });
    return { kind: "not_found", metricId: metric.id, reason: "backend_error", detail: errorMessage(err), pages: pageNumbers };
  }

  try {
    const outcome = parseMetricResponse(raw, metric, { pages, trustReportedConfidence: config.trustReportedConfidence });
    if (outcome.kind === "found") return { kind: "found", metricId: metric.id, candidate: outcome.candidate, pages: pageNumbers };
    return { kind: "not_found", metricId: metric.id, reason: outcome.reason, pages: pageNumbers };
  } catch (err) {
    console.error("ESG response parse failed", { metricId: metric.id, err: errorMessage(err) });
    return { kind: "not_found", metricId: metric.id, reason: "parse_error", detail: errorMessage(err), pages: pageNumbers };
  }
}

/**
 * Runs one backend call per metric and parses each answer.
 * Results keep the order of `metrics` whatever the concurrency.
 */
export async function extractMetrics(args: ExtractMetricsArgs): Promise<ExtractionOutcome[]> {
  const config: PipelineConfig = { ...DEFAULT_PIPELINE_CONFIG, ...args.config };
  const metrics = args.metrics;
  const results: ExtractionOutcome[] = new Array(metrics.length);
  let next = 0;

  const worker = async () => {
    while (next < metrics.length) {
      const index = next++;
      results[index] = await extractOne(metrics[index], args, config);
    }
  };

  const workers = Math.max(1, Math.min(config.extractionConcurrency, metrics.length));
  await Promise.all(Array.from({ length: workers }, () => worker()));
  return results;
}
