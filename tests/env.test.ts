import { describe, expect, it } from "vitest";

import {
  EnvError,
  formatEnvError,
  getEnvStatus,
  parseEnv,
  requireApiKey,
} from "@/lib/env";

describe("parseEnv", () => {
  it("applies defaults when nothing is set", () => {
    expect(parseEnv({})).toEqual({
      YOUTUBE_API_KEY: undefined,
      OUTPUT_DIR: "output",
      MIN_VIEW_COUNT: 100_000,
      MIN_SUBSCRIBER_COUNT: 50_000,
      MAX_VIDEOS_PER_CHANNEL: 20,
      MAX_REQUESTS_PER_MINUTE: 100,
      LOG_LEVEL: "info",
    });
  });

  it("coerces numeric settings and treats blanks as unset", () => {
    const env = parseEnv({
      YOUTUBE_API_KEY: "test",
      MIN_VIEW_COUNT: "5000",
      MIN_SUBSCRIBER_COUNT: " ",
      MAX_REQUESTS_PER_MINUTE: "30",
    });

    expect(env.YOUTUBE_API_KEY).toBe("test");
    expect(env.MIN_VIEW_COUNT).toBe(5000);
    expect(env.MIN_SUBSCRIBER_COUNT).toBe(50_000);
    expect(env.MAX_REQUESTS_PER_MINUTE).toBe(30);
  });

  it("reports every invalid key", () => {
    try {
      parseEnv({ MIN_VIEW_COUNT: "lots", MAX_REQUESTS_PER_MINUTE: "0" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(EnvError);
      if (error instanceof EnvError) {
        expect(error.missingKeys).toEqual(["MIN_VIEW_COUNT", "MAX_REQUESTS_PER_MINUTE"]);
      }
    }
  });
});

describe("requireApiKey", () => {
  it("throws when the key is missing", () => {
    expect(() => requireApiKey(parseEnv({}))).toThrow(EnvError);
  });

  it("returns the configured key", () => {
    expect(requireApiKey(parseEnv({ YOUTUBE_API_KEY: "test" }))).toBe("test");
  });
});

describe("env status", () => {
  it("lists the missing key", () => {
    expect(getEnvStatus(parseEnv({}))).toEqual({
      youtubeConfigured: false,
      missingKeys: ["YOUTUBE_API_KEY"],
    });
    expect(getEnvStatus(parseEnv({ YOUTUBE_API_KEY: "test" }))).toEqual({
      youtubeConfigured: true,
      missingKeys: [],
    });
  });

  it("formats env errors", () => {
    expect(formatEnvError(new EnvError(["YOUTUBE_API_KEY"]))).toBe(
      "Configuration error. Missing or invalid: YOUTUBE_API_KEY."
    );
    expect(formatEnvError(new Error("boom"))).toBe("Configuration error.");
  });
});
