import { describe, expect, it } from "vitest";
import { withRetry, type RetryPolicy } from "../src/resilience/retry.js";
import {
  MalformedResponseError,
  NonRetriableCapabilityError,
  QuotaExceededError,
  RateLimitedError,
  ServiceUnavailableError,
  classifyHttpFailure
} from "../src/resilience/errors.js";
import { resilientCapabilities } from "../src/resilience/resilientCapabilities.js";
import { fakeCapabilities, quietLogger } from "./helpers/fakes.js";

const policy: RetryPolicy = { maxRetries: 3, initialDelayMs: 100, backoffFactor: 2, jitterMs: 0 };

function recorder() {
  const waits: number[] = [];
  return { waits, sleep: async (ms: number) => void waits.push(ms) };
}

function failing<T>(errors: Error[], value: T) {
  let calls = 0;
  const fn = async () => {
    calls++;
    const err = errors[calls - 1];
    if (err) throw err;
    return value;
  };
  return { fn, calls: () => calls };
}

describe("withRetry", () => {
  it("retries a retriable error twice and then succeeds on the third call", async () => {
    const { waits, sleep } = recorder();
    const f = failing([new RateLimitedError("429"), new ServiceUnavailableError("503")], "ok");

    await expect(withRetry("call", f.fn, policy, { logger: quietLogger, sleep })).resolves.toBe("ok");
    expect(f.calls()).toBe(3);
    expect(waits).toEqual([100, 200]);
  });

  it("does not retry a non-retriable error", async () => {
    const { waits, sleep } = recorder();
    const f = failing([new QuotaExceededError("daily quota")], "ok");

    await expect(withRetry("call", f.fn, policy, { logger: quietLogger, sleep })).rejects.toBeInstanceOf(QuotaExceededError);
    expect(f.calls()).toBe(1);
    expect(waits).toEqual([]);
  });

  it("treats unclassified errors as terminal", async () => {
    const { sleep } = recorder();
    const f = failing([new TypeError("boom")], "ok");

    await expect(withRetry("call", f.fn, policy, { logger: quietLogger, sleep })).rejects.toThrow("boom");
    expect(f.calls()).toBe(1);
  });

  it("rethrows the last error once the retry budget is spent", async () => {
    const { waits, sleep } = recorder();
    const errors = [1, 2, 3, 4, 5].map((n) => new ServiceUnavailableError(`503 #${n}`));
    const f = failing(errors, "ok");

    await expect(withRetry("call", f.fn, policy, { logger: quietLogger, sleep })).rejects.toThrow("503 #4");
    expect(f.calls()).toBe(4);
    expect(waits).toEqual([100, 200, 400]);
  });

  it("retries a malformed model response only once", async () => {
    const { sleep } = recorder();
    const f = failing([new MalformedResponseError("bad json"), new MalformedResponseError("bad json again")], "ok");

    await expect(withRetry("call", f.fn, policy, { logger: quietLogger, sleep })).rejects.toThrow("bad json again");
    expect(f.calls()).toBe(2);
  });

  it("adds jitter within the configured range", async () => {
    const { waits, sleep } = recorder();
    const f = failing([new RateLimitedError("429")], "ok");
    const jittery = { ...policy, jitterMs: 50 };

    await withRetry("call", f.fn, jittery, { logger: quietLogger, sleep, random: () => 1 });
    expect(waits).toEqual([150]);
  });
});

describe("classifyHttpFailure", () => {
  it("maps statuses onto retriable and terminal errors", () => {
    expect(classifyHttpFailure("svc", 429, "slow down")).toBeInstanceOf(RateLimitedError);
    expect(classifyHttpFailure("svc", 429, "You exceeded your current quota")).toBeInstanceOf(QuotaExceededError);
    expect(classifyHttpFailure("svc", 503, "")).toBeInstanceOf(ServiceUnavailableError);
    expect(classifyHttpFailure("svc", 408, "")).toBeInstanceOf(ServiceUnavailableError);
    expect(classifyHttpFailure("svc", 401, "bad key")).toBeInstanceOf(NonRetriableCapabilityError);
  });
});

describe("resilientCapabilities", () => {
  it("routes every port call through the retry policy", async () => {
    let searches = 0;
    const { caps } = fakeCapabilities({
      search: () => {
        searches++;
        if (searches === 1) throw new RateLimitedError("429");
        return [];
      }
    });
    const { sleep, waits } = recorder();
    const wrapped = resilientCapabilities(caps, policy, { logger: quietLogger, sleep });

    await expect(wrapped.search.search("coffee")).resolves.toEqual([]);
    expect(searches).toBe(2);
    expect(waits).toEqual([100]);
    expect(wrapped.places?.hasCredentials()).toBe(true);
  });
});
