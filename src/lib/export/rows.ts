import type {
  ContentIdea,
  RankedChannel,
  ScoredVideo,
  TrendTable,
  VideoScript,
} from "../types.ts";

export type ExportRow = Record<string, string | number>;

export const LIST_SEPARATOR = ";";
const SNIPPET_LENGTH = 200;

function round2(value: number) {
  return Math.round(value * 100) / 100;
}

function joinList(values: readonly string[]) {
  return values.join(LIST_SEPARATOR);
}

export function snippet(text: string) {
  return text ? `${text.slice(0, SNIPPET_LENGTH)}...` : "";
}

export function toInfluencerRows(channels: RankedChannel[]): ExportRow[] {
  return channels.map((channel) => ({
    channel_id: channel.id,
    channel_title: channel.title,
    subscriber_count: channel.subscriberCount,
    video_count: channel.videoCount,
    view_count: channel.viewCount,
    published_at: channel.publishedAt,
    growth_score: round2(channel.growthScore),
    ai_relevance_score: round2(channel.aiRelevanceScore),
    thumbnail_url: channel.thumbnailUrl,
    custom_url: channel.customUrl,
    country: channel.country,
    description_snippet: snippet(channel.description),
  }));
}

export function toVideoRows(videos: ScoredVideo[]): ExportRow[] {
  return videos.map((video) => ({
    video_id: video.id,
    title: video.title,
    channel_title: video.channelTitle,
    channel_id: video.channelId,
    view_count: video.viewCount,
    like_count: video.likeCount,
    comment_count: video.commentCount,
    published_at: video.publishedAt,
    duration: video.duration,
    thumbnail_url: video.thumbnailUrl,
    video_url: video.url,
    tags: joinList(video.tags),
    engagement_rate: round2(video.engagementRate),
    performance_score: round2(video.performanceScore),
    influencer_subscriber_count: video.channelSubscriberCount,
    influencer_total_views: video.channelViewCount,
    description_snippet: snippet(video.description),
  }));
}

export function toTopicRows(topics: TrendTable): ExportRow[] {
  return [...topics.entries()].map(([topic, frequency]) => ({ topic, frequency }));
}

export function toHashtagRows(hashtags: string[]): ExportRow[] {
  return hashtags.map((hashtag, index) => ({ hashtag, rank: index + 1 }));
}

export function toIdeaRows(ideas: ContentIdea[]): ExportRow[] {
  return ideas.map((idea) => ({
    id: idea.id,
    title: idea.title,
    category: idea.category,
    hashtags: joinList(idea.hashtags),
    thumbnail_concept: idea.thumbnailConcept,
    trend_score: idea.trendScore,
    estimated_views: idea.estimatedViews,
    difficulty: idea.difficulty,
    target_audience: idea.targetAudience,
    key_topics: joinList(idea.keyTopics),
    created_at: idea.createdAt,
  }));
}

export function toScriptRows(scripts: VideoScript[]): ExportRow[] {
  return scripts.map((script) => ({
    id: script.id,
    title: script.title,
    category: script.category,
    script: script.script,
    hashtags: joinList(script.hashtags),
    thumbnail_concept: script.thumbnailConcept,
    estimated_duration: script.estimatedDuration,
    word_count: script.wordCount,
    key_points: joinList(script.keyPoints),
    call_to_action: script.callToAction,
    created_at: script.createdAt,
  }));
}
