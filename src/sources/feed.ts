import Parser from "rss-parser";
import { z } from "zod";
import { fetchText } from "./http.js";
import { firstImage, imageLinks, imageSources, scoreFromText } from "./images.js";
import type { Extraction, HttpOptions, ItemExtractor } from "./types.js";

const FEED_BASE_URL = "https://www.reddit.com";

interface RedditFeedFields {
  id?: string;
  mediaThumbnail?: unknown;
}

export type FeedEntry = Parser.Item & RedditFeedFields;

const MediaThumbnailSchema = z.object({
  $: z.object({ url: z.string() }),
});

function buildFeedUrl(source: string): string {
  return `${FEED_BASE_URL}/r/${encodeURIComponent(source)}/top/.rss?t=week&limit=50`;
}

function thumbnailUrl(value: unknown): string | undefined {
  const parsed = MediaThumbnailSchema.safeParse(value);
  return parsed.success ? parsed.data.$.url : undefined;
}

function extractFeedEntry(entry: FeedEntry): Extraction | null {
  if (!entry.title) {
    throw new Error("feed entry has no title");
  }

  const content = entry.content ?? "";
  const identifier = entry.id ?? entry.guid;

  const imageUrl = firstImage([
    thumbnailUrl(entry.mediaThumbnail),
    ...imageSources(content),
    ...imageLinks(content),
    identifier,
    entry.link,
  ]);
  if (!imageUrl) return null;

  return {
    item: {
      title: entry.title,
      imageUrl,
      postUrl: entry.link ?? "",
      score: scoreFromText(content) ?? "?",
    },
    nsfw: false,
  };
}

export function createFeedExtractor(
  http: HttpOptions,
  parser?: Parser<Record<string, unknown>, RedditFeedFields>
): ItemExtractor<FeedEntry> {
  const rssParser =
    parser ??
    new Parser<Record<string, unknown>, RedditFeedFields>({
      customFields: { item: [["media:thumbnail", "mediaThumbnail"]] },
    });

  return {
    name: "feed",
    async fetchEntries(source: string): Promise<FeedEntry[]> {
      const xml = await fetchText(buildFeedUrl(source), http);
      const feed = await rssParser.parseString(xml);
      return feed.items;
    },
    extract: extractFeedEntry,
  };
}

export { buildFeedUrl, extractFeedEntry, thumbnailUrl };
