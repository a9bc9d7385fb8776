import assert from "node:assert/strict";
import test from "node:test";
import {
  isResourceClass,
  loadRuntimeConfig,
  parseGenerationProvider,
  resolveProfiledNumber,
} from "@/lib/runtime-config";

test("loadRuntimeConfig gives each resource class its own defaults", () => {
  const config = loadRuntimeConfig({});

  assert.equal(config.presets.generation.timeoutMs, 120_000);
  assert.equal(config.presets.generation.retryMaxAttempts, 2);
  assert.equal(config.presets.retrieval.timeoutMs, 60_000);
  assert.equal(config.presets["legal-search"].timeoutMs, 45_000);
  assert.equal(config.presets["generic-http"].timeoutMs, 30_000);
  assert.equal(config.presets.retrieval.retryMaxAttempts, 3);
  assert.equal(config.presets.retrieval.circuitFailMax, 5);
  assert.equal(config.presets.retrieval.circuitResetTimeoutMs, 60_000);
  assert.equal(config.presets.retrieval.retryBaseWaitMs, 1_000);
  assert.equal(config.presets.retrieval.retryMaxWaitMs, 10_000);
  assert.equal(config.presets.retrieval.retryMultiplier, 2);
  assert.equal(config.cacheTtls.answerSec, 1_800);
  assert.ok(config.cacheTtls.answerSec < config.cacheTtls.retrievalContextSec);
  assert.equal(config.generation.provider, "bedrock");
  assert.equal(config.retrieval.topK, 5);
  assert.equal(config.legal.instance, "3");
});

test("loadRuntimeConfig applies env overrides within floors and caps", () => {
  const config = loadRuntimeConfig({
    RESILIENCE_LEGAL_TIMEOUT_MS: "5000",
    RESILIENCE_GENERATION_RETRY_MAX_ATTEMPTS: "99",
    RESILIENCE_HTTP_CB_FAIL_MAX: "not-a-number",
    RAG_TOP_K: "8",
    LLM_PROVIDER: "LMStudio",
    LLM_MODEL: "  local-model  ",
    CLASSIFIER_LLM_ENABLED: "off",
  });

  assert.equal(config.presets["legal-search"].timeoutMs, 5_000);
  assert.equal(config.presets.generation.retryMaxAttempts, 10);
  assert.equal(config.presets["generic-http"].circuitFailMax, 5);
  assert.equal(config.retrieval.topK, 8);
  assert.equal(config.generation.provider, "lmstudio");
  assert.equal(config.generation.model, "local-model");
  assert.equal(config.classification.enabled, false);
});

test("resolveProfiledNumber falls back on empty or invalid input", () => {
  assert.equal(resolveProfiledNumber({ value: "", defaultValue: 7 }), 7);
  assert.equal(resolveProfiledNumber({ value: "abc", defaultValue: 7 }), 7);
  assert.equal(resolveProfiledNumber({ value: "3.9", defaultValue: 7, round: "floor" }), 3);
  assert.equal(resolveProfiledNumber({ value: "-4", defaultValue: 7, min: 0 }), 0);
  assert.equal(parseGenerationProvider(undefined), "bedrock");
  assert.equal(isResourceClass("legal-search"), true);
  assert.equal(isResourceClass("cache"), false);
});
