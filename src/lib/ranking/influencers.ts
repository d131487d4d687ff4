import { createLogger } from "../logger.ts";
import {
  aiRelevanceScore,
  growthScore,
  isAiRelatedChannel,
} from "../scoring/channel.ts";
import type { ChannelVideoSource } from "../youtube.ts";
import type { ChannelRecord, ChannelSearchHit, RankedChannel } from "../types.ts";

const log = createLogger("influencers");

export type RankInfluencersOptions = {
  minSubscribers: number;
  limit: number;
  now?: Date;
};

export type FindInfluencersOptions = RankInfluencersOptions & {
  keywords: string[];
  channelsPerKeyword: number;
};

/** First occurrence of each id wins; order of first appearance is kept. */
export function dedupeById<T extends { id: string }>(records: T[]): T[] {
  const seen = new Map<string, T>();
  for (const record of records) {
    if (!seen.has(record.id)) {
      seen.set(record.id, record);
    }
  }
  return Array.from(seen.values());
}

export function compositeScore(
  channel: Pick<RankedChannel, "subscriberCount" | "growthScore" | "aiRelevanceScore">
) {
  return (
    channel.subscriberCount * 0.4 +
    channel.growthScore * 0.3 +
    channel.aiRelevanceScore * 0.3
  );
}

export function rankInfluencers(
  channels: ChannelRecord[],
  options: RankInfluencersOptions
): RankedChannel[] {
  const now = options.now ?? new Date();

  const ranked = dedupeById(channels)
    .filter(
      (channel) =>
        channel.subscriberCount >= options.minSubscribers &&
        isAiRelatedChannel(channel)
    )
    .map((channel) => ({
      ...channel,
      growthScore: growthScore(channel, now),
      aiRelevanceScore: aiRelevanceScore(channel),
    }));

  // Array#sort is stable, so equal composites keep first-seen order.
  ranked.sort((a, b) => compositeScore(b) - compositeScore(a));

  return ranked.slice(0, Math.max(0, options.limit));
}

export async function findInfluencers(
  source: ChannelVideoSource,
  options: FindInfluencersOptions
): Promise<RankedChannel[]> {
  const hits: ChannelSearchHit[] = [];
  for (const keyword of options.keywords) {
    log.info({ keyword }, "Searching channels");
    hits.push(...(await source.searchChannels(keyword, options.channelsPerKeyword)));
  }

  const channelIds = dedupeById(hits).map((hit) => hit.id);
  log.info({ channels: channelIds.length }, "Found unique channels");
  if (channelIds.length === 0) return [];

  const stats = await source.getChannelStatistics(channelIds);
  const influencers = rankInfluencers(stats, options);

  log.info({ influencers: influencers.length }, "Ranked AI influencers");
  return influencers;
}
