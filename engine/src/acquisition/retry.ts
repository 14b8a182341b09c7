/**
 * ensure-conda Engine — Download Retry
 *
 * anaconda.org and micro.mamba.pm occasionally answer 500/503 or drop the
 * connection. Those are retried with exponential backoff; any other HTTP
 * error is final.
 */

import { HttpClient, HttpResponse, isSuccessStatus } from "./http";
import { RemoteError, RetriesExhaustedError, getErrorMessage } from "../errors";
import { RETRY_ATTEMPTS, RETRY_MIN_WAIT_SECONDS } from "../config";
import { Logger } from "../utils/logger";
import { ResolverEventHandler } from "../types";

/** Statuses worth another attempt */
const RETRYABLE_STATUSES = new Set([500, 503]);

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOptions {
  logger: Logger;
  attempts?: number;
  /** Floor for the backoff, in seconds */
  minWaitSeconds?: number;
  sleep?: Sleep;
  emit?: ResolverEventHandler;
}

/**
 * Seconds to wait after the given (0-based) failed attempt.
 */
export function backoffSeconds(attempt: number, minWaitSeconds: number): number {
  return Math.max(Math.exp(attempt / 4), minWaitSeconds);
}

export async function requestWithRetry(
  client: HttpClient,
  url: string,
  options: RetryOptions,
): Promise<HttpResponse> {
  const attempts = options.attempts ?? RETRY_ATTEMPTS;
  const minWaitSeconds = options.minWaitSeconds ?? RETRY_MIN_WAIT_SECONDS;
  const sleep = options.sleep ?? defaultSleep;
  let lastError: unknown;

  for (let attempt = 0; attempt < attempts; attempt++) {
    let reason: string;
    try {
      const response = await client.get(url);
      if (isSuccessStatus(response.status)) {
        return response;
      }
      if (!RETRYABLE_STATUSES.has(response.status)) {
        throw new RemoteError(
          `HTTP ${response.status} while fetching ${url}`,
          url,
          response.status,
        );
      }
      reason = `HTTP ${response.status}`;
      lastError = new RemoteError(reason, url, response.status);
    } catch (err: unknown) {
      if (err instanceof RemoteError) throw err;
      reason = getErrorMessage(err);
      lastError = err;
    }

    if (attempt === attempts - 1) break;

    const waitSeconds = backoffSeconds(attempt, minWaitSeconds);
    options.logger.warn(
      { url, attempt: attempt + 1, reason, wait_s: waitSeconds },
      "Request failed, retrying",
    );
    options.emit?.({ type: "retry", url, attempt: attempt + 1, waitSeconds, reason });
    await sleep(waitSeconds * 1000);
  }

  throw new RetriesExhaustedError(url, attempts, lastError);
}
