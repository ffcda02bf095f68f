import { BedrockRuntimeClient } from "@aws-sdk/client-bedrock-runtime";

import { getAwsRegion } from "@/lib/aws/env";

declare global {
  // One client per region for the life of the process.
  var __esg_bedrock_clients: Map<string, BedrockRuntimeClient> | undefined;
}

function clientCache(): Map<string, BedrockRuntimeClient> {
  if (!globalThis.__esg_bedrock_clients) globalThis.__esg_bedrock_clients = new Map<string, BedrockRuntimeClient>();
  return globalThis.__esg_bedrock_clients;
}

export function getBedrockRuntimeClient(region: string = getAwsRegion()): BedrockRuntimeClient {
  const clients = clientCache();
  const cached = clients.get(region);
  if (cached) return cached;
  const client = new BedrockRuntimeClient({ region });
  clients.set(region, client);
  return client;
}
