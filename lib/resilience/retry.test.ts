import assert from "node:assert/strict";
import test from "node:test";
import { HttpStatusError, RetriesExhausted, TransientNetworkFailure } from "@/lib/resilience/errors";
import { backoffDelayMs, DEFAULT_RETRY_ON, retryAsync, retrySync, type RetryPolicy } from "@/lib/resilience/retry";

const POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseWaitMs: 1_000,
  maxWaitMs: 10_000,
  multiplier: 2,
  retryOn: DEFAULT_RETRY_ON,
  unwrapOnExhaustion: true,
};

function recordingSleep() {
  const waits: number[] = [];
  return {
    waits,
    sleep: async (ms: number) => {
      waits.push(ms);
    },
  };
}

test("backoffDelayMs grows exponentially between the base and max wait", () => {
  assert.deepEqual(
    [0, 1, 2, 3, 4, 5].map((index) => backoffDelayMs(POLICY, index)),
    [1_000, 2_000, 4_000, 8_000, 10_000, 10_000],
  );
  assert.equal(backoffDelayMs({ baseWaitMs: 500, maxWaitMs: 200, multiplier: 2 }, 0), 200);
});

test("retryAsync stops at maxAttempts and re-raises the last transient error", async () => {
  const { waits, sleep } = recordingSleep();
  let calls = 0;

  await assert.rejects(
    retryAsync({
      resource: "retrieval",
      policy: POLICY,
      signal: new AbortController().signal,
      sleep,
      attempt: async () => {
        calls += 1;
        throw new TransientNetworkFailure(`reset ${calls}`);
      },
    }),
    (error: unknown) => error instanceof TransientNetworkFailure && error.message === "reset 3",
  );

  assert.equal(calls, 3);
  assert.deepEqual(waits, [1_000, 2_000]);
});

test("retryAsync recovers once the transient failure clears", async () => {
  const { waits, sleep } = recordingSleep();
  let calls = 0;

  const value = await retryAsync({
    resource: "retrieval",
    policy: POLICY,
    signal: new AbortController().signal,
    sleep,
    attempt: async () => {
      calls += 1;
      if (calls < 2) throw new TransientNetworkFailure("reset");
      return "ok";
    },
  });

  assert.equal(value, "ok");
  assert.deepEqual(waits, [1_000]);
});

test("retryAsync never retries errors outside the allow-list", async () => {
  const { waits, sleep } = recordingSleep();
  let calls = 0;

  await assert.rejects(
    retryAsync({
      resource: "legal-search",
      policy: POLICY,
      signal: new AbortController().signal,
      sleep,
      attempt: async () => {
        calls += 1;
        throw new HttpStatusError("bad request", { status: 400 });
      },
    }),
    HttpStatusError,
  );

  assert.equal(calls, 1);
  assert.deepEqual(waits, []);
});

test("retryAsync wraps exhaustion when unwrapping is disabled", async () => {
  const { sleep } = recordingSleep();

  await assert.rejects(
    retryAsync({
      resource: "retrieval",
      policy: { ...POLICY, maxAttempts: 2, unwrapOnExhaustion: false },
      signal: new AbortController().signal,
      sleep,
      attempt: async () => {
        throw new TransientNetworkFailure("reset");
      },
    }),
    (error: unknown) => error instanceof RetriesExhausted && error.attempts === 2,
  );
});

test("retryAsync surfaces the abort reason instead of retrying", async () => {
  const { waits, sleep } = recordingSleep();
  const controller = new AbortController();
  const reason = new Error("caller went away");
  let calls = 0;

  await assert.rejects(
    retryAsync({
      resource: "generation",
      policy: POLICY,
      signal: controller.signal,
      sleep,
      attempt: async () => {
        calls += 1;
        controller.abort(reason);
        throw new TransientNetworkFailure("reset");
      },
    }),
    (error: unknown) => error === reason,
  );

  assert.equal(calls, 1);
  assert.deepEqual(waits, []);
});

test("retrySync checks the deadline around each wait", () => {
  const waits: number[] = [];
  let deadlineChecks = 0;
  let calls = 0;

  assert.throws(
    () =>
      retrySync({
        resource: "generic-http",
        policy: POLICY,
        deadline: () => {
          deadlineChecks += 1;
        },
        sleep: (ms) => {
          waits.push(ms);
        },
        attempt: () => {
          calls += 1;
          throw new TransientNetworkFailure("reset");
        },
      }),
    TransientNetworkFailure,
  );

  assert.equal(calls, 3);
  assert.deepEqual(waits, [1_000, 2_000]);
  assert.equal(deadlineChecks, 4);
});
