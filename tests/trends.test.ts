import { describe, expect, it } from "vitest";

import { collectHashtagStats, extractHashtags } from "@/lib/trends/hashtags";
import { extractTopics, sortTrendTable, topTopics } from "@/lib/trends/topics";

import { makeVideo } from "./fixtures";

describe("extractTopics", () => {
  it("counts each video at most once per topic", () => {
    const videos = [
      makeVideo({ title: "Python tutorial", description: "python python python" }),
      makeVideo({ title: "ChatGPT for coding", tags: ["python"] }),
      makeVideo({ title: "Cooking show" }),
    ];

    const table = extractTopics(videos, ["python", "chatgpt", "tutorial", "robotics"]);

    expect([...table.entries()]).toEqual([
      ["python", 2],
      ["tutorial", 1],
      ["chatgpt", 1],
    ]);
  });

  it("uses the built-in vocabulary by default", () => {
    const table = extractTopics([makeVideo({ title: "Deep Learning explained" })]);
    expect(table.get("deep learning")).toBe(1);
    expect(table.get("explained")).toBe(1);
  });

  it("returns an empty table for no videos", () => {
    expect(extractTopics([]).size).toBe(0);
  });

  it("orders by count and truncates", () => {
    const table = new Map([
      ["a", 1],
      ["b", 3],
      ["c", 2],
    ]);
    expect([...sortTrendTable(table).keys()]).toEqual(["b", "c", "a"]);
    expect(topTopics(table, 2)).toEqual(["b", "c"]);
  });
});

describe("hashtags", () => {
  const videos = [
    makeVideo({ id: "v1", title: "Intro #AI", description: "#python #ai", viewCount: 200_000 }),
    makeVideo({ id: "v2", title: "More", description: "#Python", viewCount: 600_000 }),
    makeVideo({ id: "v3", title: "Small #ignored", viewCount: 10 }),
  ];

  it("aggregates case-insensitively and skips low-view videos", () => {
    const stats = collectHashtagStats(videos, 100_000);

    expect(stats).toEqual([
      { tag: "ai", count: 2, totalViews: 400_000, avgViews: 200_000, videoIds: ["v1", "v1"] },
      {
        tag: "python",
        count: 2,
        totalViews: 800_000,
        avgViews: 400_000,
        videoIds: ["v1", "v2"],
      },
    ]);
  });

  it("ranks by average views times uses", () => {
    expect(extractHashtags(videos, 100_000)).toEqual(["#python", "#ai"]);
  });

  it("returns nothing for no qualifying videos", () => {
    expect(extractHashtags([], 0)).toEqual([]);
    expect(extractHashtags(videos, 1_000_000)).toEqual([]);
  });
});
