import type { HttpOptions } from "./types.js";

export const USER_AGENT = "weekly-meme-fetcher/1.0 (scheduled job)";

export async function fetchText(
  url: string,
  http: HttpOptions,
  headers: Record<string, string> = {}
): Promise<string> {
  const response = await http.fetchFn(url, {
    headers: { "User-Agent": USER_AGENT, ...headers },
    signal: AbortSignal.timeout(http.timeoutMs),
  });
  if (!response.ok) {
    throw new Error(`HTTP ${response.status} for ${url}`);
  }
  return response.text();
}
