import { z } from "zod";

import { describeYouTubeError } from "./api-errors.ts";
import { createLogger } from "./logger.ts";
import type { YouTubeRequester } from "./youtube-request.ts";
import type { ChannelRecord, ChannelSearchHit, VideoRecord } from "./types.ts";

const SEARCH_ENDPOINT = "https://www.googleapis.com/youtube/v3/search";
const VIDEOS_ENDPOINT = "https://www.googleapis.com/youtube/v3/videos";
const CHANNELS_ENDPOINT = "https://www.googleapis.com/youtube/v3/channels";
const PLAYLIST_ITEMS_ENDPOINT =
  "https://www.googleapis.com/youtube/v3/playlistItems";

export const MAX_RESULTS_PER_REQUEST = 50;

const log = createLogger("youtube");

/** What the analysis core needs from a channel/video provider. */
export interface ChannelVideoSource {
  searchChannels(query: string, maxResults: number): Promise<ChannelSearchHit[]>;
  getChannelStatistics(channelIds: string[]): Promise<ChannelRecord[]>;
  getChannelVideos(channelId: string, maxResults: number): Promise<VideoRecord[]>;
  searchVideos(query: string, maxResults: number): Promise<VideoRecord[]>;
}

const thumbnailsSchema = z
  .record(
    z.string(),
    z.object({
      url: z.string().optional(),
    })
  )
  .optional();

const numeric = z.union([z.number(), z.string()]).optional();

const searchSchema = z
  .object({
    items: z
      .array(
        z
          .object({
            id: z
              .object({
                videoId: z.string().optional(),
                channelId: z.string().optional(),
              })
              .optional(),
            snippet: z
              .object({
                channelId: z.string().optional(),
                title: z.string().optional(),
                description: z.string().optional(),
                publishedAt: z.string().optional(),
                thumbnails: thumbnailsSchema,
              })
              .optional(),
          })
          .passthrough()
      )
      .optional(),
  })
  .passthrough();

const videosSchema = z
  .object({
    items: z
      .array(
        z
          .object({
            id: z.string().optional(),
            snippet: z
              .object({
                title: z.string().optional(),
                description: z.string().optional(),
                tags: z.array(z.string()).optional(),
                publishedAt: z.string().optional(),
                channelId: z.string().optional(),
                channelTitle: z.string().optional(),
                thumbnails: thumbnailsSchema,
              })
              .passthrough()
              .optional(),
            statistics: z
              .object({
                viewCount: numeric,
                likeCount: numeric,
                commentCount: numeric,
              })
              .optional(),
            contentDetails: z
              .object({
                duration: z.string().optional(),
              })
              .optional(),
          })
          .passthrough()
      )
      .optional(),
  })
  .passthrough();

const channelsSchema = z
  .object({
    items: z
      .array(
        z
          .object({
            id: z.string().optional(),
            snippet: z
              .object({
                title: z.string().optional(),
                description: z.string().optional(),
                publishedAt: z.string().optional(),
                country: z.string().optional(),
                customUrl: z.string().optional(),
                thumbnails: thumbnailsSchema,
              })
              .optional(),
            statistics: z
              .object({
                subscriberCount: numeric,
                videoCount: numeric,
                viewCount: numeric,
              })
              .optional(),
            contentDetails: z
              .object({
                relatedPlaylists: z
                  .object({
                    uploads: z.string().optional(),
                  })
                  .optional(),
              })
              .optional(),
          })
          .passthrough()
      )
      .optional(),
  })
  .passthrough();

const playlistItemsSchema = z
  .object({
    items: z
      .array(
        z
          .object({
            contentDetails: z
              .object({
                videoId: z.string().optional(),
              })
              .optional(),
          })
          .passthrough()
      )
      .optional(),
    nextPageToken: z.string().optional(),
  })
  .passthrough();

export function parseCount(value: string | number | undefined) {
  if (typeof value === "number" && Number.isFinite(value)) {
    return Math.max(0, Math.floor(value));
  }
  if (typeof value === "string") {
    const parsed = Number(value.replace(/,/g, ""));
    return Number.isFinite(parsed) ? Math.max(0, Math.floor(parsed)) : 0;
  }
  return 0;
}

export function parseDurationSeconds(value: string | undefined) {
  if (!value) return 0;
  const match = value.match(/PT(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?/);
  if (!match) return 0;
  const hours = Number(match[1] ?? 0);
  const minutes = Number(match[2] ?? 0);
  const seconds = Number(match[3] ?? 0);
  return hours * 3600 + minutes * 60 + seconds;
}

function chunk<T>(values: T[], size: number) {
  const chunks: T[][] = [];
  for (let i = 0; i < values.length; i += size) {
    chunks.push(values.slice(i, i + size));
  }
  return chunks;
}

function getThumbnailUrl(
  thumbnails: Record<string, { url?: string }> | undefined
) {
  if (!thumbnails) return "";
  return (
    thumbnails.maxres?.url ??
    thumbnails.high?.url ??
    thumbnails.medium?.url ??
    thumbnails.default?.url ??
    ""
  );
}

function perRequest(maxResults: number) {
  return String(Math.max(1, Math.min(maxResults, MAX_RESULTS_PER_REQUEST)));
}

export class YouTubeDataSource implements ChannelVideoSource {
  constructor(private readonly requester: YouTubeRequester) {}

  async searchChannels(
    query: string,
    maxResults: number
  ): Promise<ChannelSearchHit[]> {
    try {
      const searchUrl = new URL(SEARCH_ENDPOINT);
      searchUrl.searchParams.set("part", "id,snippet");
      searchUrl.searchParams.set("type", "channel");
      searchUrl.searchParams.set("q", query.trim());
      searchUrl.searchParams.set("order", "relevance");
      searchUrl.searchParams.set("maxResults", perRequest(maxResults));

      const data = await this.requester.fetchJson(searchUrl.toString());
      const parsed = searchSchema.safeParse(data);
      if (!parsed.success) {
        throw new Error("Unexpected YouTube search response.");
      }

      const hits: ChannelSearchHit[] = [];
      for (const item of parsed.data.items ?? []) {
        const id = item.id?.channelId ?? item.snippet?.channelId;
        if (!id) continue;
        hits.push({
          id,
          title: item.snippet?.title ?? "",
          description: item.snippet?.description ?? "",
          publishedAt: item.snippet?.publishedAt ?? "",
          thumbnailUrl: getThumbnailUrl(item.snippet?.thumbnails),
        });
      }
      return hits;
    } catch (error) {
      return this.recover(error, "searchChannels", { query });
    }
  }

  async getChannelStatistics(channelIds: string[]): Promise<ChannelRecord[]> {
    const ids = Array.from(new Set(channelIds.filter(Boolean)));
    const channels: ChannelRecord[] = [];

    for (const group of chunk(ids, MAX_RESULTS_PER_REQUEST)) {
      try {
        const channelsUrl = new URL(CHANNELS_ENDPOINT);
        channelsUrl.searchParams.set("part", "snippet,statistics");
        channelsUrl.searchParams.set("id", group.join(","));

        const data = await this.requester.fetchJson(channelsUrl.toString());
        const parsed = channelsSchema.safeParse(data);
        if (!parsed.success) {
          throw new Error("Unexpected YouTube channels response.");
        }

        for (const item of parsed.data.items ?? []) {
          if (!item.id) continue;
          channels.push({
            id: item.id,
            title: item.snippet?.title ?? "",
            description: item.snippet?.description ?? "",
            publishedAt: item.snippet?.publishedAt ?? "",
            thumbnailUrl: getThumbnailUrl(item.snippet?.thumbnails),
            subscriberCount: parseCount(item.statistics?.subscriberCount),
            videoCount: parseCount(item.statistics?.videoCount),
            viewCount: parseCount(item.statistics?.viewCount),
            country: item.snippet?.country ?? "",
            customUrl: item.snippet?.customUrl ?? "",
          });
        }
      } catch (error) {
        this.recover(error, "getChannelStatistics", { batchSize: group.length });
      }
    }

    return channels;
  }

  async getChannelVideos(
    channelId: string,
    maxResults: number
  ): Promise<VideoRecord[]> {
    try {
      const uploadsPlaylistId = await this.fetchUploadsPlaylistId(channelId);
      if (!uploadsPlaylistId) return [];

      const videos: VideoRecord[] = [];
      let pageToken: string | undefined;

      while (videos.length < maxResults) {
        const playlistUrl = new URL(PLAYLIST_ITEMS_ENDPOINT);
        playlistUrl.searchParams.set("part", "contentDetails");
        playlistUrl.searchParams.set("playlistId", uploadsPlaylistId);
        playlistUrl.searchParams.set(
          "maxResults",
          perRequest(maxResults - videos.length)
        );
        if (pageToken) {
          playlistUrl.searchParams.set("pageToken", pageToken);
        }

        const data = await this.requester.fetchJson(playlistUrl.toString());
        const parsed = playlistItemsSchema.safeParse(data);
        if (!parsed.success) {
          throw new Error("Unexpected YouTube playlist response.");
        }

        const ids = (parsed.data.items ?? [])
          .map((item) => item.contentDetails?.videoId)
          .filter((id): id is string => Boolean(id));
        videos.push(...(await this.fetchVideosByIds(ids)));

        pageToken = parsed.data.nextPageToken;
        if (!pageToken || ids.length === 0) break;
      }

      return videos.slice(0, maxResults);
    } catch (error) {
      return this.recover(error, "getChannelVideos", { channelId });
    }
  }

  async searchVideos(query: string, maxResults: number): Promise<VideoRecord[]> {
    try {
      const searchUrl = new URL(SEARCH_ENDPOINT);
      searchUrl.searchParams.set("part", "id");
      searchUrl.searchParams.set("type", "video");
      searchUrl.searchParams.set("q", query.trim());
      searchUrl.searchParams.set("order", "relevance");
      searchUrl.searchParams.set("maxResults", perRequest(maxResults));

      const data = await this.requester.fetchJson(searchUrl.toString());
      const parsed = searchSchema.safeParse(data);
      if (!parsed.success) {
        throw new Error("Unexpected YouTube search response.");
      }

      const ids = (parsed.data.items ?? [])
        .map((item) => item.id?.videoId)
        .filter((id): id is string => Boolean(id));
      return await this.fetchVideosByIds(ids);
    } catch (error) {
      return this.recover(error, "searchVideos", { query });
    }
  }

  private async fetchUploadsPlaylistId(channelId: string) {
    const channelsUrl = new URL(CHANNELS_ENDPOINT);
    channelsUrl.searchParams.set("part", "contentDetails");
    channelsUrl.searchParams.set("id", channelId);
    channelsUrl.searchParams.set(
      "fields",
      "items(id,contentDetails(relatedPlaylists(uploads)))"
    );

    const data = await this.requester.fetchJson(channelsUrl.toString());
    const parsed = channelsSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error("Unexpected YouTube channels response.");
    }
    return parsed.data.items?.[0]?.contentDetails?.relatedPlaylists?.uploads ?? "";
  }

  // Results come back in request order, whatever order the API answers in.
  private async fetchVideosByIds(ids: string[]): Promise<VideoRecord[]> {
    const videoMap = new Map<string, VideoRecord>();
    if (ids.length === 0) return [];

    for (const group of chunk(ids, MAX_RESULTS_PER_REQUEST)) {
      const videosUrl = new URL(VIDEOS_ENDPOINT);
      videosUrl.searchParams.set("part", "snippet,statistics,contentDetails");
      videosUrl.searchParams.set("id", group.join(","));

      const data = await this.requester.fetchJson(videosUrl.toString());
      const parsed = videosSchema.safeParse(data);
      if (!parsed.success) {
        throw new Error("Unexpected YouTube videos response.");
      }

      for (const item of parsed.data.items ?? []) {
        const id = item.id;
        if (!id) continue;
        const duration = item.contentDetails?.duration ?? "";
        videoMap.set(id, {
          id,
          title: item.snippet?.title ?? "",
          description: item.snippet?.description ?? "",
          channelId: item.snippet?.channelId ?? "",
          channelTitle: item.snippet?.channelTitle ?? "",
          viewCount: parseCount(item.statistics?.viewCount),
          likeCount: parseCount(item.statistics?.likeCount),
          commentCount: parseCount(item.statistics?.commentCount),
          publishedAt: item.snippet?.publishedAt ?? "",
          tags: item.snippet?.tags ?? [],
          duration,
          durationSeconds: parseDurationSeconds(duration),
          thumbnailUrl: getThumbnailUrl(item.snippet?.thumbnails),
          url: `https://www.youtube.com/watch?v=${id}`,
        });
      }
    }

    return ids
      .map((id) => videoMap.get(id))
      .filter((video): video is VideoRecord => Boolean(video));
  }

  private recover<T>(
    error: unknown,
    operation: string,
    context: Record<string, unknown>
  ): T[] {
    const described = describeYouTubeError(error);
    if (described.isFatal) {
      throw error;
    }
    log.warn({ ...context, operation, status: described.status }, described.message);
    return [];
  }
}
