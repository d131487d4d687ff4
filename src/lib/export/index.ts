import { mkdir } from "node:fs/promises";
import { join } from "node:path";

import { createLogger } from "../logger.ts";
import type { AnalysisResult } from "../types.ts";
import { writeCsv } from "./csv.ts";
import {
  toHashtagRows,
  toIdeaRows,
  toInfluencerRows,
  toScriptRows,
  toTopicRows,
  toVideoRows,
  type ExportRow,
} from "./rows.ts";

const log = createLogger("export");

export type ExportedFile = {
  fileName: string;
  description: string;
  filePath: string;
  recordsExported: number;
};

export async function exportAnalysis(
  result: AnalysisResult,
  outputDir: string
): Promise<ExportedFile[]> {
  await mkdir(outputDir, { recursive: true });

  const files: Array<{ fileName: string; description: string; rows: ExportRow[] }> = [
    {
      fileName: "ai_influencer_videos.csv",
      description: "influencer videos",
      rows: toVideoRows(result.videos),
    },
    {
      fileName: "video_ideas.csv",
      description: "content ideas",
      rows: toIdeaRows(result.ideas),
    },
    {
      fileName: "video_scripts.csv",
      description: "video scripts",
      rows: toScriptRows(result.scripts),
    },
    {
      fileName: "trending_topics.csv",
      description: "trending topics",
      rows: toTopicRows(result.trendingTopics),
    },
    {
      fileName: "successful_hashtags.csv",
      description: "successful hashtags",
      rows: toHashtagRows(result.hashtags),
    },
    {
      fileName: "ai_influencers.csv",
      description: "AI influencers",
      rows: toInfluencerRows(result.influencers),
    },
  ];

  const exported: ExportedFile[] = [];
  for (const file of files) {
    if (file.rows.length === 0) {
      log.warn({ file: file.fileName }, `No data to save for ${file.description}`);
      continue;
    }
    const written = await writeCsv(file.rows, join(outputDir, file.fileName));
    log.info(
      { file: written.filePath, records: written.recordsExported },
      `Saved ${file.description}`
    );
    exported.push({ fileName: file.fileName, description: file.description, ...written });
  }

  return exported;
}
