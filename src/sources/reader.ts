import * as core from "@actions/core";
import { describeError, withRetry, type Delay } from "../retry.js";
import type { CandidateItem, ItemExtractor, SourceReader } from "./types.js";

export interface SourceReaderOptions {
  maxAttempts: number;
  retryDelayMs: number;
  suppressNsfw: boolean;
  delay: Delay;
}

function collectItems<TEntry>(
  entries: TEntry[],
  extractor: ItemExtractor<TEntry>,
  limit: number,
  suppressNsfw: boolean
): CandidateItem[] {
  const items: CandidateItem[] = [];

  for (const entry of entries) {
    if (items.length >= limit) break;

    try {
      const extraction = extractor.extract(entry);
      if (!extraction) continue;
      if (suppressNsfw && extraction.nsfw) {
        core.info(`  Skipping NSFW post "${extraction.item.title}"`);
        continue;
      }
      items.push(extraction.item);
    } catch (error) {
      core.warning(`Error parsing entry: ${describeError(error)}`);
    }
  }

  return items;
}

export function createSourceReader<TEntry>(
  extractor: ItemExtractor<TEntry>,
  options: SourceReaderOptions
): SourceReader {
  return {
    async fetch(source: string, limit: number): Promise<CandidateItem[]> {
      if (limit <= 0) return [];

      core.info(`Fetching memes from r/${source} (${extractor.name})...`);

      const entries = await withRetry(
        `r/${source}`,
        async () => {
          const found = await extractor.fetchEntries(source, limit);
          if (found.length === 0) {
            throw new Error(`no entries returned for r/${source}`);
          }
          return found;
        },
        {
          maxAttempts: options.maxAttempts,
          delayMs: options.retryDelayMs,
          delay: options.delay,
        }
      );

      if (!entries) {
        core.warning(`Failed to fetch memes from r/${source} after ${options.maxAttempts} attempts`);
        return [];
      }

      const items = collectItems(entries, extractor, limit, options.suppressNsfw);
      core.info(`  Fetched ${items.length} memes from r/${source}`);
      return items;
    },
  };
}
