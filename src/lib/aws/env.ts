export function getAwsRegion(): string {
  const region = process.env.AWS_REGION ?? process.env.AWS_DEFAULT_REGION;
  if (!region) {
    throw new Error("Missing env AWS_REGION");
  }
  return region;
}

export function getBedrockModelId(): string {
  const id = process.env.BEDROCK_MODEL_ID;
  if (!id) {
    throw new Error("Missing env BEDROCK_MODEL_ID");
  }
  return id;
}
