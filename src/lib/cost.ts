import type { LlmProvider } from "@/lib/llm";

export type TokenUsage = {
  inputTokens?: number;
  outputTokens?: number;
};

export type LlmPrice = {
  inputUsdPer1M: number;
  outputUsdPer1M: number;
};

export type UsageSummary = {
  model: string | null;
  tokens: TokenUsage;
  estimatedUsd: number;
};

const LOCAL_PRICE: LlmPrice = { inputUsdPer1M: 0, outputUsdPer1M: 0 };

// First family found in the model id wins; Bedrock ids ("anthropic.claude-3-5-haiku-...") match too.
const FAMILY_PRICES: ReadonlyArray<readonly [string, LlmPrice]> = [
  ["haiku", { inputUsdPer1M: 0.8, outputUsdPer1M: 4 }],
  ["opus", { inputUsdPer1M: 15, outputUsdPer1M: 75 }],
  ["sonnet", { inputUsdPer1M: 3, outputUsdPer1M: 15 }],
];

const FALLBACK_PRICE: LlmPrice = { inputUsdPer1M: 3, outputUsdPer1M: 15 };

function parseFloatEnv(name: string): number | null {
  const raw = process.env[name];
  if (!raw) return null;
  const n = Number(raw);
  return Number.isFinite(n) ? n : null;
}

export function getPriceForModel(provider: LlmProvider, modelId: string): LlmPrice {
  // Local models cost nothing per token, whatever the override says.
  if (provider === "ollama") return LOCAL_PRICE;

  const in1m = parseFloatEnv("LLM_INPUT_USD_PER_1M");
  const out1m = parseFloatEnv("LLM_OUTPUT_USD_PER_1M");
  if (in1m != null && out1m != null) return { inputUsdPer1M: in1m, outputUsdPer1M: out1m };

  const m = modelId.toLowerCase();
  return FAMILY_PRICES.find(([family]) => m.includes(family))?.[1] ?? FALLBACK_PRICE;
}

export function estimateUsd(provider: LlmProvider, modelId: string, usage: TokenUsage): number {
  const price = getPriceForModel(provider, modelId);
  const input = usage.inputTokens ?? 0;
  const output = usage.outputTokens ?? 0;
  return (input / 1_000_000) * price.inputUsdPer1M + (output / 1_000_000) * price.outputUsdPer1M;
}

export type UsageTally = {
  record(provider: LlmProvider, model: string, usage: TokenUsage | undefined): void;
  summary(): UsageSummary;
};

/** Token and cost totals across the calls of one extraction run. */
export function createUsageTally(): UsageTally {
  let tokens: Required<TokenUsage> = { inputTokens: 0, outputTokens: 0 };
  let model: string | null = null;
  let usd = 0;

  return {
    record(provider, callModel, usage) {
      model = callModel;
      tokens = {
        inputTokens: tokens.inputTokens + (usage?.inputTokens ?? 0),
        outputTokens: tokens.outputTokens + (usage?.outputTokens ?? 0),
      };
      if (usage) usd += estimateUsd(provider, callModel, usage);
    },
    summary() {
      return { model, tokens: { ...tokens }, estimatedUsd: usd };
    },
  };
}
