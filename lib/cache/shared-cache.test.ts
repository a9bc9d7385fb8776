import assert from "node:assert/strict";
import test from "node:test";
import { SharedCache } from "@/lib/cache/shared-cache";

function fakeClock() {
  const clock = { time: 0, now: () => clock.time };
  return clock;
}

test("SharedCache memory mode expires entries by TTL", async () => {
  const clock = fakeClock();
  const cache = new SharedCache({ restUrl: "", restToken: "", clock });

  await cache.setJson("classify:abc", { intent: "general" }, 60);
  await cache.setString("pinned", "forever");

  assert.equal(cache.mode, "memory");
  assert.deepEqual(await cache.getJson("classify:abc"), { intent: "general" });

  clock.time += 60_000;
  assert.equal(await cache.getJson("classify:abc"), null);
  assert.equal(await cache.getString("pinned"), "forever");
});

test("SharedCache deleteByPrefix removes only matching memory keys", async () => {
  const cache = new SharedCache({ restUrl: "", restToken: "" });

  await cache.setString("rag:context:1", "a");
  await cache.setString("rag:search:2", "b");
  await cache.setString("rag:documents", "c");
  await cache.setString("legal:context:3", "d");

  assert.equal(await cache.deleteByPrefix("rag:"), 3);
  assert.equal(await cache.getString("rag:context:1"), null);
  assert.equal(await cache.getString("legal:context:3"), "d");
});

test("SharedCache remote mode scans and deletes by prefix over REST", async () => {
  const originalFetch = global.fetch;
  const paths: string[] = [];
  const auth: string[] = [];

  global.fetch = (async (input: URL | RequestInfo, init?: RequestInit) => {
    const url = String(input);
    paths.push(url.replace("https://cache.example.test/", ""));
    auth.push(new Headers(init?.headers).get("authorization") ?? "");

    let result: unknown = null;
    if (url.includes("/SCAN/")) result = ["0", ["rag:context:1", "rag:search:2"]];
    if (url.includes("/DEL/")) result = 2;
    return {
      ok: true,
      status: 200,
      json: async () => ({ result }),
    } as Response;
  }) as typeof fetch;

  try {
    const cache = new SharedCache({ restUrl: "https://cache.example.test/", restToken: "test-secret" });

    assert.equal(cache.mode, "remote");
    assert.equal(await cache.deleteByPrefix("rag:"), 2);
    assert.deepEqual(paths, ["SCAN/0/MATCH/rag%3A*/COUNT/200", "DEL/rag%3Acontext%3A1/rag%3Asearch%3A2"]);
    assert.deepEqual(auth, ["Bearer test-secret", "Bearer test-secret"]);
  } finally {
    global.fetch = originalFetch;
  }
});

test("SharedCache falls back to memory when the remote call fails", async () => {
  const originalFetch = global.fetch;
  global.fetch = (async () => {
    throw new TypeError("fetch failed");
  }) as typeof fetch;

  try {
    const cache = new SharedCache({ restUrl: "https://cache.example.test", restToken: "test-secret" });

    await cache.setString("llm:answer:1", "cached answer", 30);
    assert.equal(await cache.getString("llm:answer:1"), "cached answer");
    await cache.del("llm:answer:1");
    assert.equal(await cache.getString("llm:answer:1"), null);
  } finally {
    global.fetch = originalFetch;
  }
});
