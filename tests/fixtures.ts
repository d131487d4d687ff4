import type { ChannelRecord, ScoredVideo, VideoRecord } from "@/lib/types";

export const NOW = new Date("2025-01-01T00:00:00Z");

export function makeChannel(overrides: Partial<ChannelRecord> = {}): ChannelRecord {
  return {
    id: "chan-1",
    title: "AI Explained",
    description: "machine learning tutorials",
    publishedAt: "2020-01-01T00:00:00Z",
    thumbnailUrl: "",
    subscriberCount: 60_000,
    videoCount: 100,
    viewCount: 1_000_000,
    country: "US",
    customUrl: "@aiexplained",
    ...overrides,
  };
}

export function makeVideo(overrides: Partial<VideoRecord> = {}): VideoRecord {
  const id = overrides.id ?? "vid-1";
  return {
    id,
    title: "Untitled",
    description: "",
    channelId: "chan-1",
    channelTitle: "AI Explained",
    viewCount: 200_000,
    likeCount: 0,
    commentCount: 0,
    publishedAt: "2024-12-01T00:00:00Z",
    tags: [],
    duration: "PT10M",
    durationSeconds: 600,
    thumbnailUrl: "",
    url: `https://www.youtube.com/watch?v=${id}`,
    ...overrides,
  };
}

export function makeScoredVideo(overrides: Partial<ScoredVideo> = {}): ScoredVideo {
  return {
    ...makeVideo(overrides),
    engagementRate: 0,
    performanceScore: 0,
    channelSubscriberCount: 60_000,
    channelViewCount: 1_000_000,
    ...overrides,
  };
}

/** Replays the given values in order, then repeats the last one. */
export function sequenceRandom(values: number[]) {
  let index = 0;
  return () => {
    const value = values[Math.min(index, values.length - 1)] ?? 0;
    index += 1;
    return value;
  };
}

export function jsonResponse(
  body: unknown,
  status = 200,
  headers: Record<string, string> = {}
) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}
