import type { HashtagStat, VideoRecord } from "../types.ts";

const HASHTAG_PATTERN = /#([\p{L}\p{N}_]+)/gu;
const MAX_HASHTAGS = 50;

type HashtagSource = Pick<VideoRecord, "id" | "title" | "description" | "viewCount">;

export function collectHashtagStats(
  videos: HashtagSource[],
  minViews: number
): HashtagStat[] {
  const stats = new Map<string, HashtagStat>();

  for (const video of videos) {
    if (video.viewCount < minViews) continue;

    const text = `${video.title} ${video.description}`;
    for (const match of text.matchAll(HASHTAG_PATTERN)) {
      const tag = match[1].toLowerCase();
      const entry = stats.get(tag) ?? {
        tag,
        count: 0,
        totalViews: 0,
        avgViews: 0,
        videoIds: [],
      };
      entry.count += 1;
      entry.totalViews += video.viewCount;
      entry.avgViews = entry.totalViews / entry.count;
      entry.videoIds.push(video.id);
      stats.set(tag, entry);
    }
  }

  return Array.from(stats.values());
}

/** Top hashtags by average views × uses, as `#tag` strings. */
export function extractHashtags(videos: HashtagSource[], minViews: number): string[] {
  return collectHashtagStats(videos, minViews)
    .sort((a, b) => b.avgViews * b.count - a.avgViews * a.count)
    .slice(0, MAX_HASHTAGS)
    .map((stat) => `#${stat.tag}`);
}
