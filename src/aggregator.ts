import * as core from "@actions/core";
import type { AccumulationPolicy } from "./config.js";
import type { Delay } from "./retry.js";
import type { CandidateItem, SourceQuery, SourceReader } from "./sources/types.js";

export interface BatchOptions {
  policy: AccumulationPolicy;
  reader: SourceReader;
  delay: Delay;
  sourceDelayMs: number;
}

/**
 * Collects items source by source, in the order given, and keeps the first
 * `targetSize`. Under "early-stop" the remaining sources are skipped once
 * enough items are in hand; "exhaustive" always asks every source.
 */
export async function buildBatch(
  queries: SourceQuery[],
  targetSize: number,
  options: BatchOptions
): Promise<CandidateItem[]> {
  const collected: CandidateItem[] = [];

  for (const [index, query] of queries.entries()) {
    if (index > 0) {
      await options.delay(options.sourceDelayMs);
    }

    collected.push(...(await options.reader.fetch(query.source, query.limit)));

    if (options.policy === "early-stop" && collected.length >= targetSize) {
      if (index < queries.length - 1) {
        core.info(`  Reached ${targetSize} memes, skipping remaining sources`);
      }
      break;
    }
  }

  return collected.slice(0, targetSize);
}
