import { parseArgs } from "node:util";
import { z } from "zod";

import {
  AI_SEARCH_KEYWORDS,
  CHANNELS_PER_KEYWORD,
  SAMPLE_HASHTAGS,
  SAMPLE_TRENDING_TOPICS,
  settingsFromEnv,
} from "./lib/config.ts";
import { generateContentIdeas } from "./lib/content/ideas.ts";
import { describeYouTubeError } from "./lib/api-errors.ts";
import {
  EnvError,
  formatEnvError,
  getEnvStatus,
  requireApiKey,
  type Env,
} from "./lib/env.ts";
import { exportAnalysis } from "./lib/export/index.ts";
import { createSeededRandom, systemRandom, type RandomSource } from "./lib/random.ts";
import { RequestRateLimiter } from "./lib/rateLimit.ts";
import { findTrendingVideos } from "./lib/ranking/videos.ts";
import { runAnalysis, summarizeAnalysis } from "./lib/pipeline.ts";
import { YouTubeDataSource, type ChannelVideoSource } from "./lib/youtube.ts";
import { YouTubeApiError, YouTubeRequester } from "./lib/youtube-request.ts";
import type { ContentIdea } from "./lib/types.ts";

const MIN_REQUEST_INTERVAL_MS = 120;

export const COMMANDS = [
  "analyze",
  "quick",
  "search",
  "trending",
  "ideas",
  "check-api",
  "keywords",
  "config",
] as const;

type Command = (typeof COMMANDS)[number];

const positiveInt = z.coerce.number().int().positive();

const optionsSchema = z.object({
  influencers: positiveInt.optional(),
  ideas: positiveInt.optional(),
  scripts: z.coerce.number().int().nonnegative().optional(),
  videos: positiveInt.optional(),
  seed: z.coerce.number().int().optional(),
  help: z.boolean().optional(),
});

type CliOptions = z.infer<typeof optionsSchema>;

export type CliDeps = {
  env: Env;
  createSource?: (env: Env) => ChannelVideoSource;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
  now?: Date;
};

type Context = {
  env: Env;
  options: CliOptions;
  positionals: string[];
  random: RandomSource;
  source: () => ChannelVideoSource;
  out: (line: string) => void;
  err: (line: string) => void;
  now: Date;
};

export const USAGE = `Usage: tubescout <command> [options]

Commands:
  analyze          Full analysis: influencers, videos, trends, ideas, scripts, CSV export
  quick            Smaller analysis, prints the top ideas
  search <topic>   Search videos for a topic
  trending         High-view videos across the AI search keywords
  ideas            Generate ideas from sample trend data (no API key needed)
  check-api        Verify the YouTube API key
  keywords         List the AI search keywords
  config           Show the effective configuration

Options:
  --influencers N  Number of influencers to keep
  --ideas N        Number of content ideas to generate
  --scripts N      Number of scripts to generate (analyze only)
  --videos N       Number of videos to fetch (search, trending)
  --seed N         Seed the idea generator for a repeatable run
  -h, --help       Show this message`;

function formatCount(value: number) {
  return Math.round(value).toLocaleString("en-US");
}

export function createYouTubeSource(env: Env): ChannelVideoSource {
  const apiKey = requireApiKey(env);
  const rateLimiter = new RequestRateLimiter({
    maxRequestsPerWindow: env.MAX_REQUESTS_PER_MINUTE,
    windowMs: 60_000,
    minIntervalMs: MIN_REQUEST_INTERVAL_MS,
  });
  return new YouTubeDataSource(new YouTubeRequester({ apiKey, rateLimiter }));
}

function printIdeas(ctx: Context, ideas: ContentIdea[]) {
  ideas.forEach((idea, index) => {
    ctx.out(`  ${String(index + 1).padStart(2)}. ${idea.title}`);
    ctx.out(`      Category: ${idea.category} | Score: ${idea.trendScore}`);
  });
}

async function analyze(ctx: Context, quick: boolean): Promise<number> {
  const settings = settingsFromEnv(ctx.env);
  const result = await runAnalysis(ctx.source(), {
    keywords: settings.searchKeywords,
    channelsPerKeyword: CHANNELS_PER_KEYWORD,
    influencerLimit: ctx.options.influencers ?? (quick ? 5 : 20),
    minSubscribers: settings.minSubscriberCount,
    maxVideosPerChannel: settings.maxVideosPerChannel,
    minViews: settings.minViewCount,
    ideaCount: ctx.options.ideas ?? (quick ? 10 : 50),
    scriptCount: quick ? 0 : ctx.options.scripts ?? 25,
    random: ctx.random,
    now: ctx.now,
  });

  if (result.influencers.length === 0) {
    ctx.err("No AI influencers found. Check your API key, quota and connection.");
    return 1;
  }

  const summary = summarizeAnalysis(result);

  if (quick) {
    ctx.out(`Found ${summary.influencerCount} influencers`);
    ctx.out(`Analyzed ${summary.videoCount} videos`);
    ctx.out(`Generated ${summary.ideaCount} content ideas`);
    ctx.out("Top ideas:");
    printIdeas(ctx, result.ideas.slice(0, 3));
    return 0;
  }

  const exported = await exportAnalysis(result, settings.outputDir);

  ctx.out("Analysis summary");
  ctx.out(`  AI influencers: ${summary.influencerCount}`);
  ctx.out(`  Total subscribers: ${formatCount(summary.totalSubscribers)}`);
  ctx.out(`  Videos analyzed: ${summary.videoCount}`);
  if (summary.videoCount > 0) {
    ctx.out(`  Total views: ${formatCount(summary.totalViews)}`);
    ctx.out(`  Average views per video: ${formatCount(summary.averageViews)}`);
  }
  ctx.out(`  Content ideas: ${summary.ideaCount}`);
  for (const [category, count] of Object.entries(summary.ideasByCategory)) {
    ctx.out(`    ${category}: ${count}`);
  }
  ctx.out(`  Scripts: ${summary.scriptCount} (${formatCount(summary.totalScriptWords)} words)`);
  ctx.out(`Files written to ${settings.outputDir}/:`);
  for (const file of exported) {
    ctx.out(`  ${file.fileName} (${file.recordsExported} ${file.description})`);
  }
  return 0;
}

async function search(ctx: Context): Promise<number> {
  const topic = ctx.positionals.join(" ").trim();
  if (!topic) {
    ctx.err("search needs a topic, e.g. `tubescout search \"ai agents\"`");
    return 1;
  }

  const videos = await ctx.source().searchVideos(topic, ctx.options.videos ?? 10);
  if (videos.length === 0) {
    ctx.out("No videos found");
    return 0;
  }

  ctx.out(`Found ${videos.length} videos:`);
  videos.forEach((video, index) => {
    ctx.out(`  ${index + 1}. ${video.title}`);
    ctx.out(`     Channel: ${video.channelTitle}`);
    ctx.out(`     Views: ${formatCount(video.viewCount)}`);
    ctx.out(`     URL: ${video.url}`);
  });
  return 0;
}

async function trending(ctx: Context): Promise<number> {
  const settings = settingsFromEnv(ctx.env);
  const videos = await findTrendingVideos(ctx.source(), {
    keywords: settings.searchKeywords,
    maxResults: ctx.options.videos ?? 100,
    minViews: settings.minViewCount,
  });

  ctx.out(`Found ${videos.length} trending videos:`);
  videos.forEach((video, index) => {
    ctx.out(`  ${index + 1}. ${video.title} (${formatCount(video.viewCount)} views)`);
  });
  return 0;
}

function ideas(ctx: Context): number {
  const generated = generateContentIdeas({
    trendingTopics: SAMPLE_TRENDING_TOPICS,
    hashtags: SAMPLE_HASHTAGS,
    count: ctx.options.ideas ?? 20,
    random: ctx.random,
    now: ctx.now,
  });

  ctx.out(`Generated ${generated.length} content ideas:`);
  printIdeas(ctx, generated);
  return 0;
}

async function checkApi(ctx: Context): Promise<number> {
  const videos = await ctx.source().searchVideos("AI", 1);
  if (videos.length === 0) {
    ctx.err("API responded but returned no results");
    return 1;
  }
  ctx.out("YouTube API is working");
  return 0;
}

function keywords(ctx: Context): number {
  ctx.out("AI search keywords:");
  AI_SEARCH_KEYWORDS.forEach((keyword, index) => {
    ctx.out(`  ${String(index + 1).padStart(2)}. ${keyword}`);
  });
  ctx.out(`Total keywords: ${AI_SEARCH_KEYWORDS.length}`);
  return 0;
}

function showConfig(ctx: Context): number {
  const settings = settingsFromEnv(ctx.env);
  ctx.out("Configuration:");
  ctx.out(`  Min view count: ${formatCount(settings.minViewCount)}`);
  ctx.out(`  Min subscriber count: ${formatCount(settings.minSubscriberCount)}`);
  ctx.out(`  Max videos per channel: ${settings.maxVideosPerChannel}`);
  ctx.out(`  Max requests per minute: ${settings.maxRequestsPerMinute}`);
  ctx.out(`  Search keywords: ${settings.searchKeywords.length}`);
  ctx.out(`  Output directory: ${settings.outputDir}`);
  const status = getEnvStatus(ctx.env);
  ctx.out(`  YouTube API key: ${status.youtubeConfigured ? "set" : "missing"}`);
  if (status.missingKeys.length > 0) {
    ctx.out(`Missing for API commands: ${status.missingKeys.join(", ")}`);
  }
  return 0;
}

function dispatch(command: Command, ctx: Context): Promise<number> | number {
  switch (command) {
    case "analyze":
      return analyze(ctx, false);
    case "quick":
      return analyze(ctx, true);
    case "search":
      return search(ctx);
    case "trending":
      return trending(ctx);
    case "ideas":
      return ideas(ctx);
    case "check-api":
      return checkApi(ctx);
    case "keywords":
      return keywords(ctx);
    case "config":
      return showConfig(ctx);
  }
}

export async function runCommand(argv: string[], deps: CliDeps): Promise<number> {
  const out = deps.stdout ?? ((line: string) => console.log(line));
  const err = deps.stderr ?? ((line: string) => console.error(line));

  let parsedArgs;
  try {
    parsedArgs = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        influencers: { type: "string" },
        ideas: { type: "string" },
        scripts: { type: "string" },
        videos: { type: "string" },
        seed: { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (error) {
    err(error instanceof Error ? error.message : String(error));
    err(USAGE);
    return 1;
  }

  const [commandName, ...positionals] = parsedArgs.positionals;
  const options = optionsSchema.safeParse(parsedArgs.values);
  if (!options.success) {
    const invalid = options.error.issues.map((issue) => `--${issue.path.join(".")}`);
    err(`Invalid option value: ${invalid.join(", ")}`);
    return 1;
  }

  if (options.data.help || !commandName) {
    out(USAGE);
    return 0;
  }

  const command = z.enum(COMMANDS).safeParse(commandName);
  if (!command.success) {
    err(`Unknown command: ${commandName}`);
    err(USAGE);
    return 1;
  }

  const createSource = deps.createSource ?? createYouTubeSource;
  let source: ChannelVideoSource | null = null;

  const ctx: Context = {
    env: deps.env,
    options: options.data,
    positionals,
    random:
      options.data.seed === undefined
        ? systemRandom
        : createSeededRandom(options.data.seed),
    source: () => {
      source ??= createSource(deps.env);
      return source;
    },
    out,
    err,
    now: deps.now ?? new Date(),
  };

  try {
    return await dispatch(command.data, ctx);
  } catch (error) {
    if (error instanceof EnvError) {
      err(formatEnvError(error));
      err("Set YOUTUBE_API_KEY in your environment or .env file.");
      return 1;
    }
    if (error instanceof YouTubeApiError) {
      err(`API error: ${describeYouTubeError(error).message}`);
      return 1;
    }
    throw error;
  }
}
