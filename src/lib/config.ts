import type { Env } from "./env.ts";

export const AI_SEARCH_KEYWORDS = [
  "artificial intelligence",
  "machine learning",
  "deep learning",
  "AI tutorial",
  "neural networks",
  "ChatGPT",
  "generative AI",
  "AI tools",
  "automation",
  "AI news",
];

export const CHANNELS_PER_KEYWORD = 20;

export type AnalysisSettings = {
  minViewCount: number;
  minSubscriberCount: number;
  maxVideosPerChannel: number;
  maxRequestsPerMinute: number;
  outputDir: string;
  searchKeywords: string[];
};

export function settingsFromEnv(env: Env): AnalysisSettings {
  return {
    minViewCount: env.MIN_VIEW_COUNT,
    minSubscriberCount: env.MIN_SUBSCRIBER_COUNT,
    maxVideosPerChannel: env.MAX_VIDEOS_PER_CHANNEL,
    maxRequestsPerMinute: env.MAX_REQUESTS_PER_MINUTE,
    outputDir: env.OUTPUT_DIR,
    searchKeywords: AI_SEARCH_KEYWORDS,
  };
}

// Offline input for `tubescout ideas`, which runs without an API key.
export const SAMPLE_TRENDING_TOPICS = new Map<string, number>([
  ["chatgpt", 100],
  ["ai", 95],
  ["machine learning", 80],
  ["python", 75],
  ["tutorial", 70],
  ["automation", 65],
]);

export const SAMPLE_HASHTAGS = [
  "#AI",
  "#MachineLearning",
  "#Python",
  "#Tech",
  "#Programming",
];
