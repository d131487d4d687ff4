import { YouTubeApiError, isYouTubeRateLimitError } from "./youtube-request.ts";

type DescribedApiError = {
  message: string;
  status: number;
  isRateLimit: boolean;
  isFatal: boolean;
};

function detectRateLimit(error: unknown): boolean {
  if (isYouTubeRateLimitError(error)) return true;
  if (error instanceof YouTubeApiError || !(error instanceof Error)) return false;

  const lower = error.message.toLowerCase();
  return (
    /\(429\)/.test(error.message) ||
    lower.includes("too many requests") ||
    lower.includes("limit exceeded") ||
    lower.includes("exceeded your")
  );
}

export function describeYouTubeError(error: unknown): DescribedApiError {
  const message = error instanceof Error ? error.message : "";
  const status = error instanceof YouTubeApiError ? error.status : 500;

  if (error instanceof YouTubeApiError && error.isAuthError) {
    return {
      message: `YouTube API rejected the API key (${status}): ${message}`,
      status,
      isRateLimit: false,
      isFatal: true,
    };
  }

  if (error instanceof YouTubeApiError && error.isQuotaExceeded) {
    return {
      message: "YouTube API daily quota exceeded.",
      status,
      isRateLimit: true,
      isFatal: false,
    };
  }

  if (detectRateLimit(error)) {
    return {
      message: "YouTube API rate limit exceeded.",
      status: 429,
      isRateLimit: true,
      isFatal: false,
    };
  }

  return {
    message: message ? `YouTube API request failed: ${message}` : "YouTube API request failed.",
    status,
    isRateLimit: false,
    isFatal: false,
  };
}
