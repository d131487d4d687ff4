import { createLogger } from "../logger.ts";
import { engagementRate, performanceScore } from "../scoring/video.ts";
import type { ChannelVideoSource } from "../youtube.ts";
import type { ChannelRecord, ScoredVideo, VideoRecord } from "../types.ts";
import { dedupeById } from "./influencers.ts";

const log = createLogger("videos");

export type AnalyzeVideosOptions = {
  maxVideosPerChannel: number;
  minViews: number;
  now?: Date;
};

export type TrendingVideosOptions = {
  keywords: string[];
  maxResults: number;
  minViews: number;
};

export function scoreVideo(
  video: VideoRecord,
  channel: Pick<ChannelRecord, "subscriberCount" | "viewCount">,
  now: Date = new Date()
): ScoredVideo {
  const engagement = engagementRate(video);
  return {
    ...video,
    engagementRate: engagement,
    performanceScore: performanceScore(video, engagement, channel, now),
    channelSubscriberCount: channel.subscriberCount,
    channelViewCount: channel.viewCount,
  };
}

export function rankVideos(videos: ScoredVideo[], minViews: number): ScoredVideo[] {
  return videos
    .filter((video) => video.viewCount >= minViews)
    .sort((a, b) => b.performanceScore - a.performanceScore);
}

export async function analyzeInfluencerVideos(
  source: ChannelVideoSource,
  channels: ChannelRecord[],
  options: AnalyzeVideosOptions
): Promise<ScoredVideo[]> {
  const now = options.now ?? new Date();
  const scored: ScoredVideo[] = [];

  for (const [index, channel] of channels.entries()) {
    log.info(
      { channel: channel.title, position: index + 1, of: channels.length },
      "Analyzing channel videos"
    );
    const videos = await source.getChannelVideos(
      channel.id,
      options.maxVideosPerChannel
    );
    scored.push(...videos.map((video) => scoreVideo(video, channel, now)));
  }

  const ranked = rankVideos(scored, options.minViews);
  log.info(
    { analyzed: scored.length, highPerforming: ranked.length },
    "Analyzed influencer videos"
  );
  return ranked;
}

export async function findTrendingVideos(
  source: ChannelVideoSource,
  options: TrendingVideosOptions
): Promise<VideoRecord[]> {
  if (options.keywords.length === 0) return [];
  const perKeyword = Math.max(1, Math.floor(options.maxResults / options.keywords.length));

  const found: VideoRecord[] = [];
  for (const keyword of options.keywords) {
    found.push(...(await source.searchVideos(keyword, perKeyword)));
  }

  return dedupeById(found)
    .filter((video) => video.viewCount >= options.minViews)
    .sort((a, b) => b.viewCount - a.viewCount);
}
