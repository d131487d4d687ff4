import { ageInDays } from "./age.ts";
import type { ChannelRecord } from "../types.ts";

const HIGH_VALUE_KEYWORDS = [
  "artificial intelligence",
  "machine learning",
  "deep learning",
  "ai",
  "ml",
];

const MEDIUM_VALUE_KEYWORDS = [
  "data science",
  "programming",
  "tech",
  "computer science",
  "automation",
];

const LOW_VALUE_KEYWORDS = ["tutorial", "coding", "software", "algorithm", "python"];

const AI_INDICATORS = [
  "artificial intelligence",
  "machine learning",
  "deep learning",
  "neural network",
  "ai",
  "ml",
  "data science",
  "computer vision",
  "natural language processing",
  "nlp",
  "robotics",
  "automation",
  "chatgpt",
  "openai",
  "tensorflow",
  "pytorch",
  "kaggle",
  "algorithm",
  "programming",
  "coding",
  "tech",
  "technology",
];

const MIN_INDICATOR_MATCHES = 2;
const MAX_GROWTH_SCORE = 1000;

type ChannelText = Pick<ChannelRecord, "title" | "description">;

function clamp(value: number, min: number, max: number) {
  return Math.max(min, Math.min(max, value));
}

function channelText(channel: ChannelText) {
  return `${channel.title} ${channel.description}`.toLowerCase();
}

function countMatches(text: string, keywords: string[]) {
  return keywords.filter((keyword) => text.includes(keyword)).length;
}

// Plain substring matching: "ai" also matches inside "explain" or "training".
export function aiRelevanceScore(channel: ChannelText): number {
  const text = channelText(channel);
  const score =
    countMatches(text, HIGH_VALUE_KEYWORDS) * 20 +
    countMatches(text, MEDIUM_VALUE_KEYWORDS) * 10 +
    countMatches(text, LOW_VALUE_KEYWORDS) * 5;
  return clamp(score, 0, 100);
}

export function isAiRelatedChannel(channel: ChannelText): boolean {
  return countMatches(channelText(channel), AI_INDICATORS) >= MIN_INDICATOR_MATCHES;
}

/**
 * Upload cadence plus average reach, capped at 1000. Channels with an
 * unreadable creation date, or created today, score 0.
 */
export function growthScore(
  channel: Pick<ChannelRecord, "publishedAt" | "videoCount" | "viewCount">,
  now: Date = new Date()
): number {
  const ageDays = ageInDays(channel.publishedAt, now);
  if (ageDays === null || ageDays <= 0) return 0;

  const videosPerDay = channel.videoCount / ageDays;
  const viewsPerVideo = channel.viewCount / Math.max(channel.videoCount, 1);
  const score = videosPerDay * 365 * 10 + viewsPerVideo / 10_000;
  return clamp(score, 0, MAX_GROWTH_SCORE);
}
