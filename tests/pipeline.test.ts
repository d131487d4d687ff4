import { describe, expect, it, vi } from "vitest";

import { runAnalysis, summarizeAnalysis, type AnalysisOptions } from "@/lib/pipeline";
import { createSeededRandom } from "@/lib/random";
import type { ChannelVideoSource } from "@/lib/youtube";

import { NOW, makeChannel, makeScoredVideo, makeVideo } from "./fixtures";

function fakeSource(channels = [makeChannel({ id: "c1" })]): ChannelVideoSource {
  return {
    searchChannels: vi.fn(async () => [
      { id: "c1", title: "", description: "", publishedAt: "", thumbnailUrl: "" },
    ]),
    getChannelStatistics: vi.fn(async () => channels),
    getChannelVideos: vi.fn(async () => [
      makeVideo({
        id: "hit",
        title: "Python tutorial",
        description: "learn fast #ai",
        viewCount: 200_000,
      }),
      makeVideo({ id: "miss", title: "Vlog", viewCount: 10 }),
    ]),
    searchVideos: vi.fn(async () => []),
  };
}

function options(overrides: Partial<AnalysisOptions> = {}): AnalysisOptions {
  return {
    keywords: ["ai"],
    channelsPerKeyword: 20,
    influencerLimit: 20,
    minSubscribers: 50_000,
    maxVideosPerChannel: 20,
    minViews: 100_000,
    ideaCount: 5,
    scriptCount: 2,
    random: createSeededRandom(11),
    now: NOW,
    ...overrides,
  };
}

describe("runAnalysis", () => {
  it("chains discovery, trends and content generation", async () => {
    const result = await runAnalysis(fakeSource(), options());

    expect(result.influencers.map((channel) => channel.id)).toEqual(["c1"]);
    expect(result.videos.map((video) => video.id)).toEqual(["hit"]);
    expect([...result.trendingTopics.entries()]).toEqual([
      ["python", 1],
      ["tutorial", 1],
    ]);
    expect(result.hashtags).toEqual(["#ai"]);
    expect(result.ideas).toHaveLength(5);
    expect(result.scripts.map((script) => script.title)).toEqual(
      result.ideas.slice(0, 2).map((idea) => idea.title)
    );
  });

  it("stops early when no influencers qualify", async () => {
    const source = fakeSource([]);
    const result = await runAnalysis(source, options());

    expect(result).toEqual({
      influencers: [],
      videos: [],
      trendingTopics: new Map(),
      hashtags: [],
      ideas: [],
      scripts: [],
    });
    expect(source.getChannelVideos).not.toHaveBeenCalled();
  });
});

describe("summarizeAnalysis", () => {
  it("totals the result", () => {
    const summary = summarizeAnalysis({
      influencers: [
        { ...makeChannel({ subscriberCount: 100 }), growthScore: 0, aiRelevanceScore: 0 },
        { ...makeChannel({ subscriberCount: 300 }), growthScore: 0, aiRelevanceScore: 0 },
      ],
      videos: [makeScoredVideo({ viewCount: 10 }), makeScoredVideo({ viewCount: 30 })],
      trendingTopics: new Map(),
      hashtags: [],
      ideas: [],
      scripts: [],
    });

    expect(summary).toEqual({
      influencerCount: 2,
      totalSubscribers: 400,
      videoCount: 2,
      totalViews: 40,
      averageViews: 20,
      ideaCount: 0,
      ideasByCategory: {},
      scriptCount: 0,
      totalScriptWords: 0,
    });
  });
});
