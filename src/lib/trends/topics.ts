import type { TrendTable, VideoRecord } from "../types.ts";

export const TOPIC_VOCABULARY = [
  "chatgpt",
  "gpt",
  "openai",
  "claude",
  "gemini",
  "bard",
  "machine learning",
  "deep learning",
  "neural network",
  "computer vision",
  "nlp",
  "natural language processing",
  "tensorflow",
  "pytorch",
  "transformers",
  "llm",
  "large language model",
  "artificial intelligence",
  "automation",
  "robotics",
  "data science",
  "python",
  "coding",
  "programming",
  "tutorial",
  "explained",
  "guide",
  "how to",
  "beginner",
  "ai tools",
  "ai news",
  "future",
  "prediction",
  "breakthrough",
];

type TopicSource = Pick<VideoRecord, "title" | "description" | "tags">;

function searchableText(video: TopicSource) {
  const parts = [video.title, video.description];
  if (video.tags.length > 0) {
    parts.push(video.tags.join(" "));
  }
  return parts.join(" ").toLowerCase();
}

/**
 * Number of videos mentioning each vocabulary topic at least once. Topics no
 * video mentions are left out.
 */
export function extractTopics(
  videos: TopicSource[],
  vocabulary: readonly string[] = TOPIC_VOCABULARY
): TrendTable {
  const counts = new Map<string, number>();

  for (const video of videos) {
    const text = searchableText(video);
    for (const topic of vocabulary) {
      if (text.includes(topic)) {
        counts.set(topic, (counts.get(topic) ?? 0) + 1);
      }
    }
  }

  return sortTrendTable(counts);
}

export function sortTrendTable(table: TrendTable): TrendTable {
  return new Map([...table.entries()].sort((a, b) => b[1] - a[1]));
}

export function topTopics(table: TrendTable, limit: number): string[] {
  return [...sortTrendTable(table).keys()].slice(0, limit);
}
