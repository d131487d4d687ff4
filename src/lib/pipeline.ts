import { generateContentIdeas } from "./content/ideas.ts";
import { generateVideoScripts } from "./content/scripts.ts";
import { createLogger } from "./logger.ts";
import type { RandomSource } from "./random.ts";
import { findInfluencers } from "./ranking/influencers.ts";
import { analyzeInfluencerVideos } from "./ranking/videos.ts";
import { extractHashtags } from "./trends/hashtags.ts";
import { extractTopics } from "./trends/topics.ts";
import type { ChannelVideoSource } from "./youtube.ts";
import type { AnalysisResult, ContentCategory } from "./types.ts";

const log = createLogger("pipeline");

export type AnalysisOptions = {
  keywords: string[];
  channelsPerKeyword: number;
  influencerLimit: number;
  minSubscribers: number;
  maxVideosPerChannel: number;
  minViews: number;
  ideaCount: number;
  scriptCount: number;
  random: RandomSource;
  now?: Date;
};

export type AnalysisSummary = {
  influencerCount: number;
  totalSubscribers: number;
  videoCount: number;
  totalViews: number;
  averageViews: number;
  ideaCount: number;
  ideasByCategory: Partial<Record<ContentCategory, number>>;
  scriptCount: number;
  totalScriptWords: number;
};

export async function runAnalysis(
  source: ChannelVideoSource,
  options: AnalysisOptions
): Promise<AnalysisResult> {
  const now = options.now ?? new Date();

  const influencers = await findInfluencers(source, {
    keywords: options.keywords,
    channelsPerKeyword: options.channelsPerKeyword,
    minSubscribers: options.minSubscribers,
    limit: options.influencerLimit,
    now,
  });

  if (influencers.length === 0) {
    log.warn("No AI influencers found");
    return {
      influencers,
      videos: [],
      trendingTopics: new Map(),
      hashtags: [],
      ideas: [],
      scripts: [],
    };
  }

  const videos = await analyzeInfluencerVideos(source, influencers, {
    maxVideosPerChannel: options.maxVideosPerChannel,
    minViews: options.minViews,
    now,
  });
  if (videos.length === 0) {
    log.warn("No high-performing videos found, continuing with empty trend data");
  }

  const trendingTopics = extractTopics(videos);
  const hashtags = extractHashtags(videos, options.minViews);
  log.info(
    { topics: trendingTopics.size, hashtags: hashtags.length },
    "Extracted trends"
  );

  const ideas = generateContentIdeas({
    trendingTopics,
    hashtags,
    count: options.ideaCount,
    random: options.random,
    now,
  });
  const scripts = generateVideoScripts(ideas, { count: options.scriptCount, now });

  return { influencers, videos, trendingTopics, hashtags, ideas, scripts };
}

export function summarizeAnalysis(result: AnalysisResult): AnalysisSummary {
  const totalViews = result.videos.reduce((sum, video) => sum + video.viewCount, 0);
  const ideasByCategory: Partial<Record<ContentCategory, number>> = {};
  for (const idea of result.ideas) {
    ideasByCategory[idea.category] = (ideasByCategory[idea.category] ?? 0) + 1;
  }

  return {
    influencerCount: result.influencers.length,
    totalSubscribers: result.influencers.reduce(
      (sum, channel) => sum + channel.subscriberCount,
      0
    ),
    videoCount: result.videos.length,
    totalViews,
    averageViews: result.videos.length ? totalViews / result.videos.length : 0,
    ideaCount: result.ideas.length,
    ideasByCategory,
    scriptCount: result.scripts.length,
    totalScriptWords: result.scripts.reduce((sum, script) => sum + script.wordCount, 0),
  };
}
