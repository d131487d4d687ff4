import type { TrendTable } from "../types.ts";

export const TRENDING_KEYWORDS = [
  "2024",
  "2025",
  "new",
  "latest",
  "breakthrough",
  "future",
];

export function trendScore(title: string, trendingTopics: TrendTable): number {
  const lowerTitle = title.toLowerCase();
  let score = 0;

  for (const [topic, mentions] of trendingTopics) {
    if (lowerTitle.includes(topic)) {
      score += mentions * 2;
    }
  }

  for (const keyword of TRENDING_KEYWORDS) {
    if (lowerTitle.includes(keyword)) {
      score += 5;
    }
  }

  return Math.max(0, Math.min(100, score));
}
