import { describe, expect, it } from "vitest";

import {
  estimateDifficulty,
  estimateViews,
  extractKeyTopics,
  fillTitleTemplate,
  formatTopic,
  generateContentIdeas,
  identifyTargetAudience,
  scoreHashtag,
  selectHashtags,
  thumbnailConcept,
} from "@/lib/content/ideas";
import { SAMPLE_HASHTAGS, SAMPLE_TRENDING_TOPICS } from "@/lib/config";
import { createSeededRandom } from "@/lib/random";
import { CONTENT_CATEGORIES } from "@/lib/types";

import { NOW, sequenceRandom } from "./fixtures";

describe("formatTopic", () => {
  it("expands known abbreviations and title-cases the rest", () => {
    expect(formatTopic("ai")).toBe("AI");
    expect(formatTopic("llm")).toBe("Large Language Models");
    expect(formatTopic("machine learning")).toBe("Machine Learning");
    expect(formatTopic("chatgpt")).toBe("Chatgpt");
  });
});

describe("fillTitleTemplate", () => {
  it("fills topics first, then a duration for minute templates", () => {
    const title = fillTitleTemplate(
      "How to Build {} in {} Minutes",
      ["python"],
      sequenceRandom([0, 0.5])
    );
    expect(title).toBe("How to Build Python in 15 Minutes");
  });

  it("uses distinct topics when there are enough", () => {
    const title = fillTitleTemplate(
      "{} vs {}: Which is Better?",
      ["chatgpt", "ai", "python"],
      sequenceRandom([0, 0])
    );
    expect(title).toBe("Chatgpt vs AI: Which is Better?");
  });

  it("picks day and month counts from the title wording", () => {
    expect(fillTitleTemplate("I Tested {} for {} Days", ["ai"], sequenceRandom([0, 0]))).toBe(
      "I Tested AI for 7 Days"
    );
    expect(
      fillTitleTemplate("Honest {} Review After {} Months", ["gpt"], sequenceRandom([0, 0.99]))
    ).toBe("Honest GPT Review After 12 Months");
  });

  it("falls back to a timeframe", () => {
    expect(
      fillTitleTemplate("Why {} Will Dominate {}", ["python"], sequenceRandom([0, 0.25]))
    ).toBe("Why Python Will Dominate 2025");
  });

  it("fills every slot even without topics", () => {
    expect(fillTitleTemplate("Master {} in {} Steps", [], () => 0)).toBe("Master 5 in 5 Steps");
  });
});

describe("hashtags", () => {
  it("scores title matches and tech keywords", () => {
    expect(scoreHashtag("Learn Python Fast", "#Python")).toBe(15);
    expect(scoreHashtag("Learn Python Fast", "#AI")).toBe(3);
    expect(scoreHashtag("Learn Python Fast", "#Cooking")).toBe(0);
    expect(scoreHashtag("Anything", "#")).toBe(10);
  });

  it("ranks matches and pads with popular hashtags", () => {
    expect(selectHashtags("Learn Python Fast", ["#Cooking", "#AI", "#Python"])).toEqual([
      "#Python",
      "#AI",
      "#MachineLearning",
      "#Tech",
      "#Programming",
      "#Tutorial",
      "#Coding",
    ]);
  });

  it("respects the maximum", () => {
    const many = Array.from({ length: 20 }, (_, index) => `#tech${index}`);
    expect(selectHashtags("tech", many)).toHaveLength(15);
  });
});

describe("idea attributes", () => {
  it("decorates thumbnail concepts by subject", () => {
    expect(thumbnailConcept("ChatGPT Explained", "explanation", () => 0)).toBe(
      "Complex diagram simplified with arrows with ChatGPT logo"
    );
    expect(thumbnailConcept("Python basics", "tutorial", () => 0)).toBe(
      "Split-screen showing before/after code results with Python logo"
    );
    expect(thumbnailConcept("Learn Rust", "review", () => 0)).toBe(
      "Product with star ratings overlay"
    );
  });

  it("scales views by category, trend score and noise", () => {
    expect(estimateViews(50, "prediction", () => 0.5)).toBe(375_000);
    expect(estimateViews(0, "review", () => 0)).toBe(50_000);
  });

  it("escalates difficulty one level and saturates at Hard", () => {
    expect(estimateDifficulty("news", "Deep news")).toBe("Medium");
    expect(estimateDifficulty("tutorial", "Advanced Python")).toBe("Hard");
    expect(estimateDifficulty("explanation", "The Science Behind AI")).toBe("Hard");
    expect(estimateDifficulty("review", "Honest Review")).toBe("Easy");
  });

  it("identifies the target audience", () => {
    expect(identifyTargetAudience("Complete Python Tutorial for Beginners")).toBe("Beginners");
    expect(identifyTargetAudience("Advanced prompts")).toBe("Advanced users");
    expect(identifyTargetAudience("How to Build a Bot")).toBe("Learners/Students");
    expect(identifyTargetAudience("Latest GPT Updates")).toBe("AI enthusiasts");
    expect(identifyTargetAudience("Honest Review")).toBe("Potential buyers");
    expect(identifyTargetAudience("Cats")).toBe("General tech audience");
  });

  it("extracts at most five key topics", () => {
    expect(extractKeyTopics("ChatGPT vs Python for AI Automation")).toEqual([
      "Ai",
      "Chatgpt",
      "Gpt",
      "Automation",
      "Python",
    ]);
  });
});

describe("generateContentIdeas", () => {
  const input = {
    trendingTopics: SAMPLE_TRENDING_TOPICS,
    hashtags: SAMPLE_HASHTAGS,
    count: 12,
    now: NOW,
  };

  it("is repeatable for a seed", () => {
    const first = generateContentIdeas({ ...input, random: createSeededRandom(7) });
    const second = generateContentIdeas({ ...input, random: createSeededRandom(7) });
    expect(first).toEqual(second);
  });

  it("returns the requested number of ideas sorted by trend score", () => {
    const ideas = generateContentIdeas({ ...input, random: createSeededRandom(3) });

    expect(ideas).toHaveLength(12);
    expect([...ideas.map((idea) => idea.id)].sort((a, b) => a - b)).toEqual(
      Array.from({ length: 12 }, (_, index) => index + 1)
    );
    for (let index = 1; index < ideas.length; index += 1) {
      expect(ideas[index - 1]?.trendScore ?? 0).toBeGreaterThanOrEqual(
        ideas[index]?.trendScore ?? 0
      );
    }
    for (const idea of ideas) {
      expect(CONTENT_CATEGORIES).toContain(idea.category);
      expect(idea.title).not.toContain("{}");
      expect(idea.createdAt).toBe("2025-01-01T00:00:00.000Z");
    }
  });

  it("still produces ideas without trend data", () => {
    const ideas = generateContentIdeas({
      trendingTopics: new Map(),
      hashtags: [],
      count: 3,
      random: createSeededRandom(1),
      now: NOW,
    });
    expect(ideas).toHaveLength(3);
    expect(ideas.every((idea) => idea.trendScore >= 0)).toBe(true);
  });

  it("returns nothing for a zero count", () => {
    expect(generateContentIdeas({ ...input, count: 0, random: () => 0 })).toEqual([]);
  });
});
