import { createLogger } from "../logger.ts";
import { pick, sample, uniform, type RandomSource } from "../random.ts";
import { trendScore } from "../scoring/trend.ts";
import { topTopics } from "../trends/topics.ts";
import {
  BASE_DIFFICULTY,
  BASE_VIEWS,
  COMPLEXITY_WORDS,
  FALLBACK_BASE_VIEWS,
  FALLBACK_THUMBNAIL_CONCEPTS,
  HASHTAG_TECH_KEYWORDS,
  KEY_TOPIC_KEYWORDS,
  PLACEHOLDER,
  POPULAR_AI_HASHTAGS,
  THUMBNAIL_CONCEPTS,
  TITLE_TEMPLATES,
  TOPIC_ABBREVIATIONS,
} from "./templates.ts";
import {
  CONTENT_CATEGORIES,
  type ContentCategory,
  type ContentIdea,
  type Difficulty,
  type TrendTable,
} from "../types.ts";

const log = createLogger("ideas");

const TOP_TOPIC_COUNT = 20;
const MAX_IDEA_HASHTAGS = 15;
const MIN_IDEA_HASHTAGS = 8;
const MAX_KEY_TOPICS = 5;

const DURATION_CHOICES = [5, 10, 15, 20, 30];
const DAY_CHOICES = [7, 14, 30, 60, 90];
const MONTH_CHOICES = [1, 3, 6, 12];
const TIMEFRAME_CHOICES = ["2024", "2025", "Today", "Now"];

export type GenerateIdeasInput = {
  trendingTopics: TrendTable;
  hashtags: string[];
  count: number;
  random: RandomSource;
  now?: Date;
};

function capitalize(word: string) {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

function titleCase(text: string) {
  return text
    .split(/\s+/)
    .filter(Boolean)
    .map(capitalize)
    .join(" ");
}

function countPlaceholders(template: string) {
  return template.split(PLACEHOLDER).length - 1;
}

function fillNext(title: string, value: string) {
  return title.replace(PLACEHOLDER, () => value);
}

export function formatTopic(topic: string): string {
  return TOPIC_ABBREVIATIONS[topic.toLowerCase()] ?? titleCase(topic);
}

/**
 * Fills `{}` slots left to right: distinct trending topics first, then a
 * number or timeframe chosen from the words already in the title.
 */
export function fillTitleTemplate(
  template: string,
  topics: readonly string[],
  random: RandomSource
): string {
  const placeholders = countPlaceholders(template);
  if (placeholders === 0) return template;

  let title = template;
  for (const topic of sample(topics, placeholders, random)) {
    title = fillNext(title, formatTopic(topic));
  }

  while (title.includes(PLACEHOLDER)) {
    const lower = title.toLowerCase();
    if (lower.includes("minutes") || lower.includes("steps")) {
      title = fillNext(title, String(pick(DURATION_CHOICES, random)));
    } else if (lower.includes("days")) {
      title = fillNext(title, String(pick(DAY_CHOICES, random)));
    } else if (lower.includes("months")) {
      title = fillNext(title, String(pick(MONTH_CHOICES, random)));
    } else {
      title = fillNext(title, pick(TIMEFRAME_CHOICES, random));
    }
  }

  return title;
}

export function scoreHashtag(title: string, hashtag: string): number {
  const lowerTitle = title.toLowerCase();
  const clean = hashtag.replace(/#/g, "").toLowerCase();

  let score = 0;
  if (lowerTitle.includes(clean)) {
    score += 10;
  }
  for (const word of clean.split(/\s+/).filter(Boolean)) {
    if (lowerTitle.includes(word)) {
      score += 5;
    }
  }
  if (HASHTAG_TECH_KEYWORDS.some((keyword) => clean.includes(keyword))) {
    score += 3;
  }
  return score;
}

export function selectHashtags(
  title: string,
  hashtags: readonly string[],
  maxHashtags = MAX_IDEA_HASHTAGS
): string[] {
  const scores = new Map<string, number>();
  for (const hashtag of hashtags) {
    const score = scoreHashtag(title, hashtag);
    if (score > 0) {
      scores.set(hashtag, score);
    }
  }

  const selected = [...scores.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, maxHashtags)
    .map(([hashtag]) => hashtag);

  for (const fallback of POPULAR_AI_HASHTAGS) {
    if (selected.length >= MIN_IDEA_HASHTAGS) break;
    if (!selected.includes(fallback)) {
      selected.push(fallback);
    }
  }

  return selected;
}

export function thumbnailConcept(
  title: string,
  category: ContentCategory,
  random: RandomSource
): string {
  const concepts = THUMBNAIL_CONCEPTS[category] ?? FALLBACK_THUMBNAIL_CONCEPTS;
  const base = pick(concepts, random);
  const lower = title.toLowerCase();

  if (lower.includes("chatgpt")) return `${base} with ChatGPT logo`;
  if (lower.includes("ai")) return `${base} with AI/robot elements`;
  if (lower.includes("python")) return `${base} with Python logo`;
  return base;
}

export function estimateViews(
  score: number,
  category: ContentCategory,
  random: RandomSource
): number {
  const base = BASE_VIEWS[category] ?? FALLBACK_BASE_VIEWS;
  const multiplier = 1 + score / 100;
  return Math.trunc(base * multiplier * uniform(0.5, 1.5, random));
}

// Escalates one level at most and leaves "Hard" alone.
export function estimateDifficulty(
  category: ContentCategory,
  title: string
): Difficulty {
  const base = BASE_DIFFICULTY[category] ?? "Medium";
  const lower = title.toLowerCase();
  if (!COMPLEXITY_WORDS.some((word) => lower.includes(word))) return base;

  if (base === "Easy") return "Medium";
  if (base === "Medium") return "Hard";
  return base;
}

export function identifyTargetAudience(title: string): string {
  const lower = title.toLowerCase();
  if (lower.includes("beginner") || lower.includes("first")) return "Beginners";
  if (lower.includes("advanced") || lower.includes("expert")) return "Advanced users";
  if (lower.includes("tutorial") || lower.includes("how to")) {
    return "Learners/Students";
  }
  if (lower.includes("news") || lower.includes("update")) return "AI enthusiasts";
  if (lower.includes("review")) return "Potential buyers";
  return "General tech audience";
}

export function extractKeyTopics(title: string): string[] {
  const lower = title.toLowerCase();
  return KEY_TOPIC_KEYWORDS.filter((keyword) => lower.includes(keyword))
    .map(titleCase)
    .slice(0, MAX_KEY_TOPICS);
}

export function generateContentIdeas(input: GenerateIdeasInput): ContentIdea[] {
  const { random } = input;
  const createdAt = (input.now ?? new Date()).toISOString();
  const topics = topTopics(input.trendingTopics, TOP_TOPIC_COUNT);
  const ideas: ContentIdea[] = [];

  for (let index = 0; index < input.count; index += 1) {
    const category = pick(CONTENT_CATEGORIES, random);
    const template = pick(TITLE_TEMPLATES[category], random);
    const title = fillTitleTemplate(template, topics, random);
    const hashtags = selectHashtags(title, input.hashtags);
    const concept = thumbnailConcept(title, category, random);
    const score = trendScore(title, input.trendingTopics);

    ideas.push({
      id: index + 1,
      title,
      category,
      hashtags,
      thumbnailConcept: concept,
      trendScore: score,
      estimatedViews: estimateViews(score, category, random),
      difficulty: estimateDifficulty(category, title),
      targetAudience: identifyTargetAudience(title),
      keyTopics: extractKeyTopics(title),
      createdAt,
    });
  }

  ideas.sort((a, b) => b.trendScore - a.trendScore);
  log.info({ ideas: ideas.length }, "Generated content ideas");
  return ideas;
}
