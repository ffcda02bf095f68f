import { z } from "zod";

import { getPipelineConfig, type PipelineConfig } from "@/lib/config";
import type { MetricRegistry } from "@/lib/esgMetrics";
import { getDefaultRegistry } from "@/lib/esgMetrics";
import type { BackendCall, Candidate, ExtractionOutcome, NotFoundReason, ScoreReport, ScoredRecord } from "@/lib/esgPacks";
import { extractMetrics } from "@/lib/extraction";
import { validateCandidates } from "@/lib/metricValidators";
import { scoreReport } from "@/lib/qualityScore";

export const PageChunkSchema = z.object({
  pageNumber: z.number().int().positive(),
  text: z.string(),
});

export const PageChunksSchema = z.array(PageChunkSchema);

export type PipelineResult = {
  records: ScoredRecord[];
  score: ScoreReport;
  outcomes: ExtractionOutcome[];
};

export async function runEsgPipeline(args: {
  chunks: unknown;
  backend: BackendCall;
  registry?: MetricRegistry;
  config?: Partial<PipelineConfig>;
}): Promise<PipelineResult> {
  const chunks = PageChunksSchema.parse(args.chunks);
  const registry = args.registry ?? getDefaultRegistry();
  const config = getPipelineConfig(process.env, args.config);

  const outcomes = await extractMetrics({ metrics: registry.all(), chunks, backend: args.backend, config });

  const candidates: Candidate[] = [];
  const notFoundReasons: Record<string, NotFoundReason> = {};
  for (const o of outcomes) {
    if (o.kind === "found") candidates.push(o.candidate);
    else notFoundReasons[o.metricId] = o.reason;
  }

  const verdicts = validateCandidates(candidates, registry, { config, notFoundReasons });
  const score = scoreReport(candidates, verdicts, registry);

  const byId = new Map(candidates.map((c) => [c.metricId, c]));
  const records: ScoredRecord[] = registry.all().map((metric, i) => ({
    metric,
    candidate: byId.get(metric.id) ?? null,
    verdict: verdicts[i],
  }));

  return { records, score, outcomes };
}
