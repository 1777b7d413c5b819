export const IMAGE_EXTENSIONS = [".jpg", ".jpeg", ".png", ".gif"] as const;

// Low-resolution proxies that sit in front of the full-size upload
const PREVIEW_HOSTS = ["preview.redd.it", "external-preview.redd.it", "redditmedia.com"];

const IMG_SRC_REGEX = /<img(?:\s[^>]*?)?\ssrc="([^"]+)"/gi;
const IMAGE_HREF_REGEX = /href="([^"]+\.(?:jpe?g|png|gifv?)(?:[?#][^"]*)?)"/gi;
const POINTS_REGEX = /(\d+)\s+points?\b/;

const ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#39;": "'",
  "&#x27;": "'",
  "&#32;": " ",
};

export function decodeEntities(text: string): string {
  return text.replace(/&(?:amp|lt|gt|quot|#39|#x27|#32);/g, (entity) => ENTITIES[entity] ?? entity);
}

function isPreviewHost(hostname: string): boolean {
  const host = hostname.toLowerCase();
  return PREVIEW_HOSTS.some((h) => host === h || host.endsWith(`.${h}`));
}

/**
 * Returns the URL to embed for `raw`, or null when it is not an absolute
 * http(s) link to a full-size image. A trailing `.gifv` becomes `.gif`.
 */
export function resolveImageUrl(raw: string | undefined): string | null {
  if (!raw) return null;
  const decoded = decodeEntities(raw.trim());

  let url: URL;
  try {
    url = new URL(decoded);
  } catch {
    return null;
  }
  if (url.protocol !== "https:" && url.protocol !== "http:") return null;
  if (isPreviewHost(url.hostname)) return null;

  const path = url.pathname.toLowerCase();
  if (path.endsWith(".gifv")) {
    url.pathname = url.pathname.slice(0, -1);
    return url.href;
  }
  return IMAGE_EXTENSIONS.some((ext) => path.endsWith(ext)) ? decoded : null;
}

export function imageSources(markup: string): string[] {
  return [...markup.matchAll(IMG_SRC_REGEX)].map((m) => m[1]);
}

export function imageLinks(markup: string): string[] {
  return [...markup.matchAll(IMAGE_HREF_REGEX)].map((m) => m[1]);
}

export function firstImage(candidates: Array<string | undefined>): string | null {
  for (const candidate of candidates) {
    const resolved = resolveImageUrl(candidate);
    if (resolved) return resolved;
  }
  return null;
}

export function scoreFromText(text: string): string | undefined {
  return POINTS_REGEX.exec(text)?.[1];
}
