import Anthropic from "@anthropic-ai/sdk";
import { InvokeModelCommand } from "@aws-sdk/client-bedrock-runtime";
import { z } from "zod";

import { getBedrockRuntimeClient } from "@/lib/aws/bedrock";
import { getBedrockModelId } from "@/lib/aws/env";
import { createUsageTally, type TokenUsage, type UsageSummary } from "@/lib/cost";
import type { BackendCall } from "@/lib/esgPacks";

export type LlmProvider = "anthropic" | "bedrock" | "ollama";

export type LlmUsage = TokenUsage;

export type LlmTextResult = {
  provider: LlmProvider;
  model: string;
  text: string;
  usage?: LlmUsage;
};

export type LlmMessage = {
  role: "user" | "assistant";
  content: string;
};

type CompleteArgs = {
  system: string;
  messages: LlmMessage[];
  maxTokens: number;
  temperature?: number;
  model?: string;
};

const DEFAULT_ANTHROPIC_MODEL = "claude-sonnet-4-5-20250929";
const DEFAULT_OLLAMA_MODEL = "qwen2.5:14b";
const DEFAULT_OLLAMA_BASE_URL = "http://localhost:11434";
const OLLAMA_TIMEOUT_MS = 120_000;

export const EXTRACTION_SYSTEM_PROMPT =
  "You extract ESG metrics from Korean sustainability reports. Answer with the requested JSON object only.";

function getProvider(): LlmProvider {
  const raw = (process.env.LLM_PROVIDER ?? "anthropic").trim().toLowerCase();
  if (raw === "bedrock" || raw === "ollama") return raw;
  return "anthropic";
}

export function getLlmProvider(): LlmProvider {
  return getProvider();
}

function getAnthropicApiKey(): string {
  const apiKey = process.env.ANTHROPIC_API_KEY;
  if (!apiKey) throw new Error("Missing env ANTHROPIC_API_KEY");
  return apiKey;
}

const BedrockResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })).default([]),
  usage: z
    .object({
      input_tokens: z.number().optional(),
      inputTokens: z.number().optional(),
      output_tokens: z.number().optional(),
      outputTokens: z.number().optional(),
    })
    .optional(),
});

const OllamaResponseSchema = z.object({
  response: z.string(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

function joinTextBlocks(blocks: Array<{ type: string; text?: string }>): string {
  const parts: string[] = [];
  for (const block of blocks) {
    if (block.type === "text" && typeof block.text === "string") parts.push(block.text);
  }
  return parts.join("\n").trim();
}

async function completeWithBedrock(args: CompleteArgs): Promise<LlmTextResult> {
  // Anthropic models on Bedrock use an Anthropic-shaped request body.
  const modelId = (args.model ?? getBedrockModelId()).trim();
  const client = getBedrockRuntimeClient();

  const payload = {
    anthropic_version: "bedrock-2023-05-31",
    max_tokens: args.maxTokens,
    temperature: args.temperature ?? 0,
    system: args.system,
    messages: args.messages.map((m) => ({
      role: m.role,
      content: [{ type: "text", text: m.content }],
    })),
  };

  const resp = await client.send(
    new InvokeModelCommand({
      modelId,
      contentType: "application/json",
      accept: "application/json",
      body: new TextEncoder().encode(JSON.stringify(payload)),
    }),
  );

  const parsed = BedrockResponseSchema.parse(JSON.parse(new TextDecoder("utf-8").decode(resp.body)));
  const u = parsed.usage ?? {};
  return {
    provider: "bedrock",
    model: modelId,
    text: joinTextBlocks(parsed.content),
    usage: { inputTokens: u.input_tokens ?? u.inputTokens, outputTokens: u.output_tokens ?? u.outputTokens },
  };
}

async function completeWithOllama(args: CompleteArgs): Promise<LlmTextResult> {
  const baseUrl = (process.env.OLLAMA_BASE_URL ?? DEFAULT_OLLAMA_BASE_URL).trim().replace(/\/+$/, "");
  const model = (args.model ?? process.env.OLLAMA_MODEL ?? DEFAULT_OLLAMA_MODEL).trim();

  const res = await fetch(`${baseUrl}/api/generate`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify({
      model,
      system: args.system,
      prompt: args.messages.map((m) => m.content).join("\n\n"),
      stream: false,
      options: { temperature: args.temperature ?? 0, num_predict: args.maxTokens },
    }),
    signal: AbortSignal.timeout(OLLAMA_TIMEOUT_MS),
  });
  if (!res.ok) throw new Error(`Ollama request failed: HTTP ${res.status}`);

  const parsed = OllamaResponseSchema.parse(await res.json());
  return {
    provider: "ollama",
    model,
    text: parsed.response.trim(),
    usage: { inputTokens: parsed.prompt_eval_count, outputTokens: parsed.eval_count },
  };
}

async function completeWithAnthropic(args: CompleteArgs): Promise<LlmTextResult> {
  const client = new Anthropic({ apiKey: getAnthropicApiKey() });
  const model = (args.model ?? process.env.ANTHROPIC_MODEL ?? DEFAULT_ANTHROPIC_MODEL).trim();

  const resp = await client.messages.create({
    model,
    system: args.system,
    max_tokens: args.maxTokens,
    temperature: args.temperature ?? 0,
    messages: args.messages.map((m) => ({ role: m.role, content: m.content })),
  });

  const parts: string[] = [];
  for (const block of resp.content) {
    if (block.type === "text") parts.push(block.text);
  }
  return {
    provider: "anthropic",
    model,
    text: parts.join("\n").trim(),
    usage: { inputTokens: resp.usage.input_tokens, outputTokens: resp.usage.output_tokens },
  };
}

export async function completeText(args: CompleteArgs): Promise<LlmTextResult> {
  const provider = getProvider();
  if (provider === "bedrock") return completeWithBedrock(args);
  if (provider === "ollama") return completeWithOllama(args);
  return completeWithAnthropic(args);
}

export type LlmBackend = {
  call: BackendCall;
  usage(): UsageSummary;
};

/** Wraps `completeText` as an extraction backend and keeps a running token tally. */
export function createLlmBackend(opts: { model?: string; maxTokens?: number } = {}): LlmBackend {
  const tally = createUsageTally();

  return {
    async call(prompt) {
      const result = await completeText({
        system: EXTRACTION_SYSTEM_PROMPT,
        messages: [{ role: "user", content: prompt }],
        maxTokens: opts.maxTokens ?? 2048,
        temperature: 0,
        model: opts.model,
      });
      tally.record(result.provider, result.model, result.usage);
      return result.text;
    },
    usage() {
      return tally.summary();
    },
  };
}
