import { describe, expect, it } from "vitest";

import {
  buildScript,
  callToAction,
  countWords,
  estimateDuration,
  extractKeyPoints,
  generateVideoScripts,
} from "@/lib/content/scripts";
import type { ContentIdea } from "@/lib/types";

import { NOW } from "./fixtures";

function words(count: number) {
  return Array.from({ length: count }, () => "word").join(" ");
}

function makeIdea(overrides: Partial<ContentIdea> = {}): ContentIdea {
  return {
    id: 1,
    title: "Build A Bot",
    category: "tutorial",
    hashtags: ["#AI"],
    thumbnailConcept: "Person pointing at code on a large screen",
    trendScore: 40,
    estimatedViews: 100_000,
    difficulty: "Medium",
    targetAudience: "General tech audience",
    keyTopics: [],
    createdAt: NOW.toISOString(),
    ...overrides,
  };
}

describe("buildScript", () => {
  it("fills the title into the category template", () => {
    expect(buildScript("tutorial", "Build A Bot")).toContain(
      "In this video we're going to build a bot."
    );
    expect(buildScript("comparison", "GPT vs Claude")).toContain(
      "Today we're finally answering it: GPT vs Claude"
    );
  });
});

describe("script metrics", () => {
  it("counts whitespace-separated words", () => {
    expect(countWords("  one two\nthree  ")).toBe(3);
    expect(countWords("")).toBe(0);
  });

  it("buckets the spoken duration", () => {
    expect(estimateDuration(words(100))).toBe("< 1 minute");
    expect(estimateDuration(words(310))).toBe("2-3 minutes");
    expect(estimateDuration(words(930))).toBe("6-8 minutes");
    expect(estimateDuration(words(1860))).toBe("12-15 minutes");
  });
});

describe("extractKeyPoints", () => {
  it("prefers structured lines", () => {
    expect(extractKeyPoints(buildScript("tutorial", "Build A Bot"))).toEqual([
      "First, here's a look at the finished result so you know where we're heading. [SHOW DEMO]",
      "Step 1: Preparing Your Environment",
      "Step 2: The Core Concepts",
      "Step 3: Building It",
      "Step 4: Testing and Fixing",
    ]);
    expect(extractKeyPoints(buildScript("news", "Anything"))).toEqual([
      "Second, it could change the way we...",
    ]);
  });

  it("falls back to sentences with key phrases", () => {
    const script = "This is filler. The key idea is simple. Nothing else. Main point here";
    expect(extractKeyPoints(script)).toEqual(["The key idea is simple", "Main point here"]);
  });
});

describe("generateVideoScripts", () => {
  it("scripts the first ideas up to the count", () => {
    const ideas = [
      makeIdea(),
      makeIdea({ id: 2, title: "AI News This Week", category: "news" }),
      makeIdea({ id: 3, title: "Third" }),
    ];

    const scripts = generateVideoScripts(ideas, { count: 2, now: NOW });

    expect(scripts).toHaveLength(2);
    const [first, second] = scripts;
    expect(first?.id).toBe(1);
    expect(first?.title).toBe("Build A Bot");
    expect(first?.wordCount).toBe(countWords(first?.script ?? ""));
    expect(first?.callToAction).toBe(
      "Try building this yourself and share your results in the comments!"
    );
    expect(second?.category).toBe("news");
    expect(second?.callToAction).toBe(callToAction("news"));
    expect(second?.createdAt).toBe("2025-01-01T00:00:00.000Z");
  });

  it("returns nothing for a zero count", () => {
    expect(generateVideoScripts([makeIdea()], { count: 0, now: NOW })).toEqual([]);
  });
});
