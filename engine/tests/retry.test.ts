/**
 * ensure-conda Engine — Download Retry Tests
 */

import { describe, it, expect, vi } from "vitest";
import { backoffSeconds, requestWithRetry } from "../src/acquisition/retry";
import { RemoteError, RetriesExhaustedError } from "../src/errors";
import { ResolverEvent } from "../src/types";
import { createLogger } from "../src/utils/logger";
import { FakeHttpClient, respond } from "./helpers";

const URL = "https://example.test/archive.tar.bz2";
const logger = createLogger({ level: "silent" });

function sequence(statuses: (number | Error)[]): FakeHttpClient {
  let call = 0;
  return new FakeHttpClient((url) => {
    const next = statuses[Math.min(call, statuses.length - 1)];
    call += 1;
    return next instanceof Error ? next : respond(url, next, `status ${next}`);
  });
}

describe("backoffSeconds", () => {
  it("grows exponentially above the floor", () => {
    expect(backoffSeconds(0, 0)).toBe(1);
    expect(backoffSeconds(12, 1)).toBeCloseTo(Math.exp(3));
  });

  it("never drops below the floor", () => {
    expect(backoffSeconds(4, 15)).toBe(15);
  });
});

describe("requestWithRetry", () => {
  it("returns the first successful response without sleeping", async () => {
    const client = sequence([200]);
    const sleep = vi.fn(async () => undefined);
    const response = await requestWithRetry(client, URL, { logger, sleep, minWaitSeconds: 0 });
    expect(response.body.toString()).toBe("status 200");
    expect(sleep).not.toHaveBeenCalled();
  });

  it("retries 503 and reports the retry", async () => {
    const client = sequence([503, 200]);
    const sleep = vi.fn(async () => undefined);
    const events: ResolverEvent[] = [];
    const response = await requestWithRetry(client, URL, {
      logger,
      sleep,
      minWaitSeconds: 0,
      emit: (event) => events.push(event),
    });
    expect(response.status).toBe(200);
    expect(client.requests).toEqual([URL, URL]);
    expect(sleep).toHaveBeenCalledWith(1000);
    expect(events).toEqual([
      { type: "retry", url: URL, attempt: 1, waitSeconds: 1, reason: "HTTP 503" },
    ]);
  });

  it("retries transport failures", async () => {
    const client = sequence([new Error("socket hang up"), 200]);
    const events: ResolverEvent[] = [];
    await requestWithRetry(client, URL, {
      logger,
      sleep: async () => undefined,
      minWaitSeconds: 0,
      emit: (event) => events.push(event),
    });
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ type: "retry", reason: "socket hang up" });
  });

  it("fails immediately on other HTTP errors", async () => {
    const client = sequence([404]);
    const sleep = vi.fn(async () => undefined);
    await expect(
      requestWithRetry(client, URL, { logger, sleep, minWaitSeconds: 0 }),
    ).rejects.toBeInstanceOf(RemoteError);
    expect(client.requests).toHaveLength(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("gives up after the attempt budget without a final sleep", async () => {
    const client = sequence([500]);
    const sleep = vi.fn(async () => undefined);
    const attempt = requestWithRetry(client, URL, {
      logger,
      sleep,
      attempts: 3,
      minWaitSeconds: 0,
    });
    await expect(attempt).rejects.toBeInstanceOf(RetriesExhaustedError);
    await expect(attempt).rejects.toThrow(`Could not retrieve ${URL} in 3 tries`);
    expect(client.requests).toHaveLength(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it("honours the minimum wait", async () => {
    const client = sequence([503, 200]);
    const sleep = vi.fn(async () => undefined);
    await requestWithRetry(client, URL, { logger, sleep, minWaitSeconds: 15 });
    expect(sleep).toHaveBeenCalledWith(15000);
  });
});
