import { ageInDays } from "./age.ts";
import type { ChannelRecord, VideoRecord } from "../types.ts";

function clamp(value: number, min: number, max: number) {
  return Math.max(min, Math.min(max, value));
}

export function engagementRate(
  video: Pick<VideoRecord, "viewCount" | "likeCount" | "commentCount">
): number {
  const views = Math.max(video.viewCount, 1);
  const rate = ((video.likeCount + video.commentCount * 2) / views) * 100;
  return clamp(rate, 0, 100);
}

export function recencyScore(publishedAt: string, now: Date = new Date()): number {
  const ageDays = ageInDays(publishedAt, now);
  if (ageDays === null) return 0;
  return Math.max(0, 365 - ageDays) / 365;
}

/**
 * Views relative to the owning channel's audience, plus engagement and a
 * first-year recency bonus. Unbounded; only meaningful for ordering.
 */
export function performanceScore(
  video: Pick<VideoRecord, "viewCount" | "publishedAt">,
  engagement: number,
  channel: Pick<ChannelRecord, "subscriberCount">,
  now: Date = new Date()
): number {
  const viewRatio = video.viewCount / Math.max(channel.subscriberCount, 1);
  return (
    viewRatio * 1000 + engagement * 10 + recencyScore(video.publishedAt, now) * 100
  );
}
