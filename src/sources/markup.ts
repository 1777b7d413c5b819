import { fetchText } from "./http.js";
import { decodeEntities, firstImage, imageLinks, imageSources, scoreFromText } from "./images.js";
import type { Extraction, HttpOptions, ItemExtractor } from "./types.js";

const PAGE_BASE_URL = "https://old.reddit.com";
const PERMALINK_BASE_URL = "https://www.reddit.com";

// old.reddit.com serves a captcha page to unknown clients
const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";

const THING_TAG_REGEX = /<div\s[^>]*class="[^"]*\bthing\b[^"]*"[^>]*>/gi;
const ATTRIBUTE_REGEX = /([\w:-]+)="([^"]*)"/g;
const DIV_TAG_REGEX = /<(\/?)div\b[^>]*>/gi;
const TITLE_REGEX = /<a\s[^>]*class="[^"]*\btitle\b[^"]*"[^>]*>([\s\S]*?)<\/a>/i;

export interface MarkupEntry {
  attributes: Record<string, string>;
  body: string;
}

function buildPageUrl(source: string): string {
  return `${PAGE_BASE_URL}/r/${encodeURIComponent(source)}/top/?sort=top&t=week`;
}

function parseAttributes(tag: string): Record<string, string> {
  const attributes: Record<string, string> = {};
  for (const match of tag.matchAll(ATTRIBUTE_REGEX)) {
    attributes[match[1].toLowerCase()] = decodeEntities(match[2]);
  }
  return attributes;
}

// Inner markup of the div opened just before `from`, up to its matching close tag
function divContent(html: string, from: number, limit: number): string {
  const divs = new RegExp(DIV_TAG_REGEX.source, DIV_TAG_REGEX.flags);
  divs.lastIndex = from;

  let depth = 1;
  for (let match = divs.exec(html); match && match.index < limit; match = divs.exec(html)) {
    depth += match[1] ? -1 : 1;
    if (depth === 0) return html.slice(from, match.index);
  }
  return html.slice(from, limit);
}

export function parseListing(html: string): MarkupEntry[] {
  const tags = [...html.matchAll(THING_TAG_REGEX)];

  return tags
    .map((tag, i) => {
      const start = (tag.index ?? 0) + tag[0].length;
      const next = i + 1 < tags.length ? (tags[i + 1].index ?? html.length) : html.length;
      return {
        attributes: parseAttributes(tag[0]),
        body: divContent(html, start, next),
      };
    })
    .filter((entry) => entry.attributes["data-promoted"] !== "true");
}

function resolvePermalink(permalink: string | undefined): string {
  if (!permalink) return "";
  try {
    return new URL(permalink, PERMALINK_BASE_URL).href;
  } catch {
    return "";
  }
}

function extractTitle(body: string): string | undefined {
  const match = TITLE_REGEX.exec(body);
  if (!match) return undefined;
  const title = decodeEntities(match[1].replace(/<[^>]+>/g, "")).trim();
  return title || undefined;
}

function extractMarkupEntry(entry: MarkupEntry): Extraction | null {
  const { attributes, body } = entry;
  const title = extractTitle(body);
  if (!title) {
    throw new Error(`post ${attributes["data-fullname"] ?? "?"} has no title`);
  }

  const imageUrl = firstImage([
    attributes["data-url"],
    ...imageSources(body),
    ...imageLinks(body),
  ]);
  if (!imageUrl) return null;

  const dataScore = attributes["data-score"];
  const score = dataScore && /^\d+$/.test(dataScore) ? dataScore : scoreFromText(body) ?? "?";
  const classes = (attributes["class"] ?? "").split(/\s+/);

  return {
    item: {
      title,
      imageUrl,
      postUrl: resolvePermalink(attributes["data-permalink"]),
      score,
    },
    nsfw: attributes["data-nsfw"] === "true" || classes.includes("over18"),
  };
}

export function createMarkupExtractor(http: HttpOptions): ItemExtractor<MarkupEntry> {
  return {
    name: "markup",
    async fetchEntries(source: string): Promise<MarkupEntry[]> {
      const html = await fetchText(buildPageUrl(source), http, {
        "User-Agent": BROWSER_USER_AGENT,
      });
      return parseListing(html);
    },
    extract: extractMarkupEntry,
  };
}

export { buildPageUrl, extractMarkupEntry, parseAttributes };
