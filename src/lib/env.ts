import { z } from "zod";

const count = (fallback: number) =>
  z.preprocess(
    (value) =>
      typeof value === "string" && value.trim().length === 0 ? undefined : value,
    z.coerce.number().int().nonnegative().default(fallback)
  );

const envSchema = z.object({
  YOUTUBE_API_KEY: z.preprocess(
    (value) =>
      typeof value === "string" && value.length === 0 ? undefined : value,
    z.string().min(1).optional()
  ),
  OUTPUT_DIR: z.string().min(1).optional().default("output"),
  MIN_VIEW_COUNT: count(100_000),
  MIN_SUBSCRIBER_COUNT: count(50_000),
  MAX_VIDEOS_PER_CHANNEL: count(20),
  MAX_REQUESTS_PER_MINUTE: z.preprocess(
    (value) =>
      typeof value === "string" && value.trim().length === 0 ? undefined : value,
    z.coerce.number().int().positive().default(100)
  ),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .optional()
    .default("info"),
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

export class EnvError extends Error {
  readonly missingKeys: string[];

  constructor(missingKeys: string[]) {
    super(`Missing required environment configuration: ${missingKeys.join(", ")}`);
    this.name = "EnvError";
    this.missingKeys = missingKeys;
  }
}

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse({
    YOUTUBE_API_KEY: source.YOUTUBE_API_KEY,
    OUTPUT_DIR: source.OUTPUT_DIR || undefined,
    MIN_VIEW_COUNT: source.MIN_VIEW_COUNT,
    MIN_SUBSCRIBER_COUNT: source.MIN_SUBSCRIBER_COUNT,
    MAX_VIDEOS_PER_CHANNEL: source.MAX_VIDEOS_PER_CHANNEL,
    MAX_REQUESTS_PER_MINUTE: source.MAX_REQUESTS_PER_MINUTE,
    LOG_LEVEL: source.LOG_LEVEL || undefined,
  });

  if (!parsed.success) {
    const invalidKeys = parsed.error.issues
      .map((issue) => issue.path[0])
      .filter((key): key is string => typeof key === "string");
    throw new EnvError(invalidKeys);
  }

  return parsed.data;
}

export function getEnv(): Env {
  if (cachedEnv) return cachedEnv;
  cachedEnv = parseEnv(process.env);
  return cachedEnv;
}

export function requireApiKey(env: Env): string {
  if (!env.YOUTUBE_API_KEY) {
    throw new EnvError(["YOUTUBE_API_KEY"]);
  }
  return env.YOUTUBE_API_KEY;
}

export function getEnvStatus(env: Env) {
  const missingKeys = env.YOUTUBE_API_KEY ? [] : ["YOUTUBE_API_KEY"];

  return {
    youtubeConfigured: missingKeys.length === 0,
    missingKeys,
  };
}

export function formatEnvError(error: unknown) {
  if (error instanceof EnvError) {
    const suffix = error.missingKeys.length
      ? ` Missing or invalid: ${error.missingKeys.join(", ")}.`
      : "";
    return `Configuration error.${suffix}`;
  }
  return "Configuration error.";
}
