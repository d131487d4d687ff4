import { z } from "zod";

import { createLogger } from "./logger.ts";
import { RequestRateLimiter, sleep as defaultSleep, type Sleep } from "./rateLimit.ts";

const MAX_RETRIES = 2;
const MAX_BACKOFF_MS = 4000;

const log = createLogger("youtube-request");

type ErrorReason =
  | "quotaExceeded"
  | "dailyLimitExceeded"
  | "rateLimitExceeded"
  | "userRateLimitExceeded"
  | "accessNotConfigured"
  | "keyInvalid"
  | "invalidKey"
  | "forbidden"
  | string;

export class YouTubeApiError extends Error {
  status: number;
  reason?: ErrorReason;
  isRateLimit: boolean;
  isQuotaExceeded: boolean;
  isAuthError: boolean;

  constructor(
    message: string,
    status: number,
    reason?: ErrorReason,
    isRateLimit = false,
    isQuotaExceeded = false,
    isAuthError = false
  ) {
    super(message);
    this.name = "YouTubeApiError";
    this.status = status;
    this.reason = reason;
    this.isRateLimit = isRateLimit;
    this.isQuotaExceeded = isQuotaExceeded;
    this.isAuthError = isAuthError;
  }
}

const errorPayloadSchema = z.object({
  error: z
    .object({
      code: z.number().optional(),
      message: z.string().optional(),
      errors: z
        .array(
          z.object({
            reason: z.string().optional(),
            message: z.string().optional(),
          })
        )
        .optional(),
    })
    .optional(),
});

function buildSignature(method: string, url: string) {
  const parsed = new URL(url);
  const entries = Array.from(parsed.searchParams.entries());
  entries.sort((a, b) => {
    if (a[0] === b[0]) return a[1].localeCompare(b[1]);
    return a[0].localeCompare(b[0]);
  });
  const query = entries.map(([key, value]) => `${key}=${value}`).join("&");
  return `${method.toUpperCase()} ${parsed.origin}${parsed.pathname}?${query}`;
}

function parseRetryAfter(value: string | null): number | null {
  if (!value) return null;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
  const dateMs = Date.parse(value);
  if (!Number.isNaN(dateMs)) return Math.max(0, dateMs - Date.now());
  return null;
}

function parseYouTubeError(status: number, payload: unknown, fallback: string) {
  const parsed = errorPayloadSchema.safeParse(payload);
  const error = parsed.success ? parsed.data.error : undefined;
  const reason = error?.errors?.[0]?.reason;
  const message = error?.message ?? error?.errors?.[0]?.message ?? fallback;

  const isQuotaExceeded =
    reason === "quotaExceeded" || reason === "dailyLimitExceeded";
  const isRateLimit =
    status === 429 ||
    reason === "rateLimitExceeded" ||
    reason === "userRateLimitExceeded" ||
    isQuotaExceeded;
  const isAuthError =
    status === 401 ||
    reason === "accessNotConfigured" ||
    reason === "keyInvalid" ||
    reason === "invalidKey" ||
    reason === "forbidden";

  return { reason, message, isRateLimit, isQuotaExceeded, isAuthError };
}

function shouldRetry(error: YouTubeApiError) {
  if (error.isQuotaExceeded || error.isAuthError) return false;
  if (error.status === 429) return true;
  if (error.status >= 500 && error.status < 600) return true;
  if (error.isRateLimit) return true;
  return false;
}

export function isYouTubeRateLimitError(error: unknown): boolean {
  if (error instanceof YouTubeApiError) {
    return error.isRateLimit || error.isQuotaExceeded;
  }
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes("rate limit") ||
      message.includes("quota") ||
      message.includes("userratelimitexceeded")
    );
  }
  return false;
}

export type YouTubeRequesterOptions = {
  apiKey: string;
  rateLimiter: RequestRateLimiter;
  retries?: number;
  sleep?: Sleep;
};

/**
 * GET-only JSON transport for the YouTube Data API. Identical requests that
 * overlap in time share one network call.
 */
export class YouTubeRequester {
  private readonly apiKey: string;
  private readonly rateLimiter: RequestRateLimiter;
  private readonly retries: number;
  private readonly sleep: Sleep;
  private readonly inflight = new Map<string, Promise<unknown>>();

  constructor(options: YouTubeRequesterOptions) {
    this.apiKey = options.apiKey;
    this.rateLimiter = options.rateLimiter;
    this.retries = options.retries ?? MAX_RETRIES;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get requestCount() {
    return this.rateLimiter.requestCount;
  }

  async fetchJson(url: string): Promise<unknown> {
    const signature = buildSignature("GET", url);
    const existing = this.inflight.get(signature);
    if (existing) return existing;

    const task = this.fetchWithRetry(url);
    this.inflight.set(signature, task);
    try {
      return await task;
    } finally {
      this.inflight.delete(signature);
    }
  }

  private async fetchWithRetry(url: string): Promise<unknown> {
    let attempt = 0;

    while (attempt <= this.retries) {
      const response = await this.rateLimiter.schedule(() =>
        fetch(url, { headers: { "X-Goog-Api-Key": this.apiKey } })
      );

      if (response.ok) {
        return response.json();
      }

      const retryAfterMs = parseRetryAfter(response.headers.get("retry-after"));
      const rawBody = await response.text();
      let body: unknown = null;
      try {
        body = JSON.parse(rawBody);
      } catch {
        body = null;
      }

      const parsed = parseYouTubeError(
        response.status,
        body,
        rawBody.slice(0, 300) || "YouTube API request failed."
      );
      const apiError = new YouTubeApiError(
        parsed.message,
        response.status,
        parsed.reason,
        parsed.isRateLimit,
        parsed.isQuotaExceeded,
        parsed.isAuthError
      );

      if (attempt >= this.retries || !shouldRetry(apiError)) {
        throw apiError;
      }

      const baseDelay = 500 * Math.pow(2, attempt);
      const jitter = Math.round(Math.random() * 200);
      const delayMs = Math.min(MAX_BACKOFF_MS, retryAfterMs ?? baseDelay + jitter);
      log.warn(
        { status: response.status, reason: parsed.reason, attempt: attempt + 1, delayMs },
        "Retrying YouTube request"
      );
      await this.sleep(delayMs);
      attempt += 1;
    }

    throw new YouTubeApiError("YouTube API request failed.", 500);
  }
}
