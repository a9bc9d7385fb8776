import assert from "node:assert/strict";
import test from "node:test";
import { OpenAiCompatibleBackend } from "@/lib/llm/openai-backend";

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "content-type": "application/json" },
  });
}

test("OpenAiCompatibleBackend posts chat completions to the configured base URL", async () => {
  const urls: string[] = [];
  const bodies: unknown[] = [];
  const fakeFetch: typeof fetch = async (input, init) => {
    urls.push(String(input));
    bodies.push(JSON.parse(String(init?.body)));
    return jsonResponse({
      id: "chatcmpl-1",
      object: "chat.completion",
      created: 1,
      model: "local-model",
      choices: [{ index: 0, message: { role: "assistant", content: "Привіт" }, finish_reason: "stop" }],
      usage: { prompt_tokens: 10, completion_tokens: 3, total_tokens: 13 },
    });
  };

  const backend = new OpenAiCompatibleBackend({
    provider: "lmstudio",
    baseUrl: "http://localhost:1234/v1",
    apiKey: "lm-studio",
    model: "local-model",
    fetch: fakeFetch,
  });

  const result = await backend.generate({
    messages: [
      { role: "system", content: "sys" },
      { role: "user", content: "hi" },
    ],
    temperature: 0.7,
    maxTokens: 2000,
  });

  assert.equal(result.content, "Привіт");
  assert.equal(result.model, "local-model");
  assert.deepEqual(result.usage, { inputTokens: 10, outputTokens: 3, totalTokens: 13 });
  assert.equal(urls[0], "http://localhost:1234/v1/chat/completions");
  assert.deepEqual(bodies[0], {
    model: "local-model",
    messages: [
      { role: "system", content: "sys" },
      { role: "user", content: "hi" },
    ],
    temperature: 0.7,
    max_tokens: 2000,
  });
});

test("OpenAiCompatibleBackend yields streamed deltas in order", async () => {
  const chunk = (content: string) =>
    `data: ${JSON.stringify({
      id: "chatcmpl-2",
      object: "chat.completion.chunk",
      created: 1,
      model: "custom-model",
      choices: [{ index: 0, delta: { content }, finish_reason: null }],
    })}\n\n`;
  const fakeFetch: typeof fetch = async () =>
    new Response(`${chunk("Сла")}${chunk("ва")}data: [DONE]\n\n`, {
      status: 200,
      headers: { "content-type": "text/event-stream" },
    });

  const backend = new OpenAiCompatibleBackend({
    provider: "custom",
    baseUrl: "http://localhost:8000/v1",
    apiKey: "test-secret",
    model: "custom-model",
    fetch: fakeFetch,
  });
  const received: string[] = [];

  for await (const delta of backend.streamGenerate({ messages: [{ role: "user", content: "q" }], temperature: 0, maxTokens: 50 })) {
    received.push(delta);
  }

  assert.deepEqual(received, ["Сла", "ва"]);
});
