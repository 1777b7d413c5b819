import * as core from "@actions/core";
import { buildBatch } from "./aggregator.js";
import type { MemeConfig } from "./config.js";
import type { DeliveryStatus, Notifier } from "./output/discord.js";
import type { Delay } from "./retry.js";
import type { SourceReader } from "./sources/types.js";

export interface CategoryOutcome {
  name: string;
  collected: number;
  status: DeliveryStatus;
}

export interface PipelineResult {
  categories: CategoryOutcome[];
  delivered: number;
  memesSent: number;
}

export interface PipelineDeps {
  reader: SourceReader;
  notifier: Notifier;
  delay: Delay;
}

export async function runPipeline(
  config: MemeConfig,
  deps: PipelineDeps
): Promise<PipelineResult> {
  const categories: CategoryOutcome[] = [];
  const total = config.categories.length;

  for (const [index, category] of config.categories.entries()) {
    core.info(`Category ${index + 1}/${total}: fetching ${category.name} memes...`);

    const batch = await buildBatch(
      category.sources.map((s) => ({ source: s.name, limit: s.limit })),
      category.target_size,
      {
        policy: category.policy,
        reader: deps.reader,
        delay: deps.delay,
        sourceDelayMs: config.retry.source_delay_ms,
      }
    );

    if (batch.length < category.target_size) {
      core.warning(
        `Only found ${batch.length} ${category.name} memes (target was ${category.target_size})`
      );
    }

    if (index > 0) {
      await deps.delay(config.retry.message_delay_ms);
    }
    const status = await deps.notifier.deliver(batch, category);
    categories.push({ name: category.name, collected: batch.length, status });
  }

  const delivered = categories.filter((c) => c.status === "delivered");
  return {
    categories,
    delivered: delivered.length,
    memesSent: delivered.reduce((sum, c) => sum + c.collected, 0),
  };
}
