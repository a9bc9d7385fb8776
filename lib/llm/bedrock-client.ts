import { BedrockRuntimeClient } from "@aws-sdk/client-bedrock-runtime";

export type BedrockModelConfig =
  | { ok: true; modelId: string; debugModelId: string; region: string }
  | { ok: false; error: string; debugModelId?: string; region: string };

const bedrockClientsByRegion = new Map<string, BedrockRuntimeClient>();

const DEFAULT_REGION = "us-east-1";

export function looksLikeJwt(value: string): boolean {
  return /^[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+$/.test(value);
}

const INFERENCE_PROFILE_ARN = /^arn:aws(?:-[a-z]+)?:bedrock:[a-z0-9-]+:\d{12}:inference-profile\/[A-Za-z0-9._:/-]+$/i;
const FOUNDATION_MODEL_ARN = /^arn:aws(?:-[a-z]+)?:bedrock:[a-z0-9-]+:(?:\d{12})?:foundation-model\/[A-Za-z0-9._:/-]+$/i;
const MODEL_ID = /^[a-z0-9][a-z0-9._:-]{2,}$/i;

export function parseRegionFromBedrockArn(value: string): string | null {
  if (!value.startsWith("arn:")) return null;
  const match = value.match(/^arn:aws(?:-[a-z]+)?:bedrock:([a-z0-9-]+):/i);
  return match?.[1]?.toLowerCase() ?? null;
}

/** Accepts plain model ids, inference-profile ARNs and foundation-model ARNs; rejects pasted tokens. */
export function isValidBedrockModelId(value: string): boolean {
  if (looksLikeJwt(value)) return false;
  return INFERENCE_PROFILE_ARN.test(value) || FOUNDATION_MODEL_ARN.test(value) || MODEL_ID.test(value);
}

/** Short, log-safe form of a model id. */
export function toDebugModelId(modelId: string): string {
  if (modelId.startsWith("arn:")) {
    const resource = modelId.split(":").slice(5).join(":");
    const [resourceType = "arn", rest = ""] = resource.split("/");
    return `${resourceType}:${rest || resource}`;
  }
  if (looksLikeJwt(modelId)) return "invalid-configured-value";
  if (modelId.length > 72) return `${modelId.slice(0, 28)}...${modelId.slice(-16)}`;
  return modelId;
}

function resolveRegion(env: Record<string, string | undefined>, modelId?: string): string {
  const parsedFromModel = modelId ? parseRegionFromBedrockArn(modelId) : null;
  return parsedFromModel || env.AWS_REGION?.trim() || DEFAULT_REGION;
}

/**
 * Resolves the generation model: an explicit id wins, then
 * `BEDROCK_GENERATION_MODEL_ID`, then `BEDROCK_MODEL_ID`.
 */
export function getBedrockModelConfig(
  explicitModelId?: string,
  env: Record<string, string | undefined> = process.env,
): BedrockModelConfig {
  const modelId =
    explicitModelId?.trim() || env.BEDROCK_GENERATION_MODEL_ID?.trim() || env.BEDROCK_MODEL_ID?.trim();

  if (!modelId) {
    return {
      ok: false,
      error: "BEDROCK_GENERATION_MODEL_ID or BEDROCK_MODEL_ID missing",
      region: resolveRegion(env),
    };
  }

  if (!isValidBedrockModelId(modelId)) {
    return {
      ok: false,
      error: "configured generation model is not a valid Bedrock model/inference profile id",
      debugModelId: toDebugModelId(modelId),
      region: resolveRegion(env, modelId),
    };
  }

  return {
    ok: true,
    modelId,
    debugModelId: toDebugModelId(modelId),
    region: resolveRegion(env, modelId),
  };
}

export function getBedrockClient(region: string): BedrockRuntimeClient {
  // Skip IMDS credential probing outside AWS; it otherwise eats the call timeout.
  if (!process.env.AWS_EC2_METADATA_DISABLED) {
    process.env.AWS_EC2_METADATA_DISABLED = "true";
  }

  const cached = bedrockClientsByRegion.get(region);
  if (cached) return cached;

  // Retries belong to the resilience layer.
  const client = new BedrockRuntimeClient({ region, maxAttempts: 1 });
  bedrockClientsByRegion.set(region, client);
  return client;
}
