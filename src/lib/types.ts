export type ChannelSearchHit = {
  id: string;
  title: string;
  description: string;
  publishedAt: string;
  thumbnailUrl: string;
};

export type ChannelRecord = ChannelSearchHit & {
  subscriberCount: number;
  videoCount: number;
  viewCount: number;
  country: string;
  customUrl: string;
};

export type RankedChannel = ChannelRecord & {
  growthScore: number;
  aiRelevanceScore: number;
};

export type VideoRecord = {
  id: string;
  title: string;
  description: string;
  channelId: string;
  channelTitle: string;
  viewCount: number;
  likeCount: number;
  commentCount: number;
  publishedAt: string;
  tags: string[];
  duration: string;
  durationSeconds: number;
  thumbnailUrl: string;
  url: string;
};

export type ScoredVideo = VideoRecord & {
  engagementRate: number;
  performanceScore: number;
  channelSubscriberCount: number;
  channelViewCount: number;
};

/** Topic → number of videos mentioning it, iterated by count descending. */
export type TrendTable = Map<string, number>;

export type HashtagStat = {
  tag: string;
  count: number;
  totalViews: number;
  avgViews: number;
  videoIds: string[];
};

export const CONTENT_CATEGORIES = [
  "tutorial",
  "news",
  "comparison",
  "explanation",
  "prediction",
  "review",
] as const;

export type ContentCategory = (typeof CONTENT_CATEGORIES)[number];

export type Difficulty = "Easy" | "Medium" | "Hard";

export type ContentIdea = {
  id: number;
  title: string;
  category: ContentCategory;
  hashtags: string[];
  thumbnailConcept: string;
  trendScore: number;
  estimatedViews: number;
  difficulty: Difficulty;
  targetAudience: string;
  keyTopics: string[];
  createdAt: string;
};

export type VideoScript = {
  id: number;
  title: string;
  category: ContentCategory;
  script: string;
  hashtags: string[];
  thumbnailConcept: string;
  estimatedDuration: string;
  wordCount: number;
  keyPoints: string[];
  callToAction: string;
  createdAt: string;
};

export type AnalysisResult = {
  influencers: RankedChannel[];
  videos: ScoredVideo[];
  trendingTopics: TrendTable;
  hashtags: string[];
  ideas: ContentIdea[];
  scripts: VideoScript[];
};
