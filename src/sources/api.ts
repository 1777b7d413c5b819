import { z } from "zod";
import { fetchText } from "./http.js";
import { firstImage } from "./images.js";
import type { Extraction, HttpOptions, ItemExtractor } from "./types.js";

const API_BASE_URL = "https://meme-api.com/gimme";
const MAX_API_COUNT = 50;

const MemeSchema = z.object({
  title: z.string().min(1),
  url: z.string(),
  postLink: z.string().optional(),
  ups: z.number().int().nonnegative().optional(),
  nsfw: z.boolean().optional(),
});

const GimmeResponseSchema = z.object({
  memes: z.array(z.unknown()),
});

const ApiErrorSchema = z.object({
  code: z.number(),
  message: z.string(),
});

// The API drops nothing itself, so ask for extra to cover non-image and NSFW posts
function requestCount(limit: number): number {
  return Math.min(MAX_API_COUNT, limit * 2);
}

function buildApiUrl(source: string, limit: number): string {
  return `${API_BASE_URL}/${encodeURIComponent(source)}/${requestCount(limit)}`;
}

export function parseGimmeResponse(text: string): unknown[] {
  const body: unknown = JSON.parse(text);

  const apiError = ApiErrorSchema.safeParse(body);
  if (apiError.success) {
    throw new Error(`meme API error ${apiError.data.code}: ${apiError.data.message}`);
  }

  const parsed = GimmeResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new Error("meme API response has no memes list");
  }
  return parsed.data.memes;
}

function extractApiEntry(entry: unknown): Extraction | null {
  const meme = MemeSchema.parse(entry);

  const imageUrl = firstImage([meme.url]);
  if (!imageUrl) return null;

  return {
    item: {
      title: meme.title,
      imageUrl,
      postUrl: meme.postLink ?? "",
      score: meme.ups !== undefined ? String(meme.ups) : "?",
    },
    nsfw: meme.nsfw ?? false,
  };
}

export function createApiExtractor(http: HttpOptions): ItemExtractor<unknown> {
  return {
    name: "api",
    async fetchEntries(source: string, limit: number): Promise<unknown[]> {
      const text = await fetchText(buildApiUrl(source, limit), http);
      return parseGimmeResponse(text);
    },
    extract: extractApiEntry,
  };
}

export { buildApiUrl, extractApiEntry, requestCount };
