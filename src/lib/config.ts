import { z } from "zod";

export const PipelineConfigSchema = z
  .object({
    lowConfidenceThreshold: z.number().min(0).max(1),
    backendTimeoutMs: z.number().int().positive(),
    extractionConcurrency: z.number().int().min(1).max(16),
    maxChunksPerMetric: z.number().int().min(1).max(20),
    maxPromptChars: z.number().int().min(200),
    // (Scope 1 + Scope 2) may exceed Scope 3 by at most this factor.
    scope12ToScope3MaxRatio: z.number().positive(),
    // tCO2eq per TJ of energy consumed.
    maxEmissionIntensity: z.number().positive(),
    maxBoardSize: z.number().int().min(1).max(100),
    trustReportedConfidence: z.boolean(),
    minReportYear: z.number().int().min(1900).max(2100),
    maxReportYear: z.number().int().min(1900).max(2100),
  })
  .refine((c) => c.minReportYear <= c.maxReportYear, { message: "minReportYear must not exceed maxReportYear" });

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  lowConfidenceThreshold: 0.5,
  backendTimeoutMs: 120_000,
  extractionConcurrency: 1,
  maxChunksPerMetric: 3,
  maxPromptChars: 3000,
  scope12ToScope3MaxRatio: 10,
  maxEmissionIntensity: 300,
  maxBoardSize: 20,
  trustReportedConfidence: true,
  minReportYear: 2000,
  maxReportYear: 2026,
};

type Env = Record<string, string | undefined>;

function parseFloatEnv(env: Env, name: string): number | null {
  const raw = env[name];
  if (!raw) return null;
  const n = Number(raw);
  return Number.isFinite(n) ? n : null;
}

function parseBoolEnv(env: Env, name: string): boolean | null {
  const raw = (env[name] ?? "").trim().toLowerCase();
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  return null;
}

export function getPipelineConfig(env: Env = process.env, overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  const d = DEFAULT_PIPELINE_CONFIG;
  return PipelineConfigSchema.parse({
    lowConfidenceThreshold: parseFloatEnv(env, "ESG_LOW_CONFIDENCE_THRESHOLD") ?? d.lowConfidenceThreshold,
    backendTimeoutMs: parseFloatEnv(env, "ESG_BACKEND_TIMEOUT_MS") ?? d.backendTimeoutMs,
    extractionConcurrency: parseFloatEnv(env, "ESG_EXTRACTION_CONCURRENCY") ?? d.extractionConcurrency,
    maxChunksPerMetric: parseFloatEnv(env, "ESG_MAX_CHUNKS_PER_METRIC") ?? d.maxChunksPerMetric,
    maxPromptChars: parseFloatEnv(env, "ESG_MAX_PROMPT_CHARS") ?? d.maxPromptChars,
    scope12ToScope3MaxRatio: parseFloatEnv(env, "ESG_SCOPE12_TO_SCOPE3_MAX_RATIO") ?? d.scope12ToScope3MaxRatio,
    maxEmissionIntensity: parseFloatEnv(env, "ESG_MAX_EMISSION_INTENSITY") ?? d.maxEmissionIntensity,
    maxBoardSize: parseFloatEnv(env, "ESG_MAX_BOARD_SIZE") ?? d.maxBoardSize,
    trustReportedConfidence: parseBoolEnv(env, "ESG_TRUST_REPORTED_CONFIDENCE") ?? d.trustReportedConfidence,
    minReportYear: parseFloatEnv(env, "ESG_MIN_REPORT_YEAR") ?? d.minReportYear,
    maxReportYear: parseFloatEnv(env, "ESG_MAX_REPORT_YEAR") ?? d.maxReportYear,
    ...overrides,
  });
}
