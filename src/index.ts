import "dotenv/config";
import * as core from "@actions/core";
import { DEFAULT_CONFIG_PATH, loadConfig } from "./config.js";
import { createDiscordNotifier } from "./output/discord.js";
import { runPipeline } from "./pipeline.js";
import { sleep } from "./retry.js";
import { createReaderFor } from "./sources/index.js";

async function run(): Promise<void> {
  try {
    core.info(`Loading config from ${DEFAULT_CONFIG_PATH}`);
    const config = loadConfig(DEFAULT_CONFIG_PATH, process.env);

    const result = await runPipeline(config, {
      reader: createReaderFor(
        config.provider,
        { fetchFn: fetch, timeoutMs: config.retry.timeout_ms },
        {
          maxAttempts: config.retry.max_attempts,
          retryDelayMs: config.retry.retry_delay_ms,
          suppressNsfw: config.suppress_nsfw,
          delay: sleep,
        }
      ),
      notifier: createDiscordNotifier({
        webhookUrl: config.webhookUrl,
        maxAttempts: config.retry.max_attempts,
        retryDelayMs: config.retry.retry_delay_ms,
        timeoutMs: config.retry.timeout_ms,
        delay: sleep,
      }),
      delay: sleep,
    });

    core.setOutput("categories_delivered", result.delivered);
    core.setOutput("memes_sent", result.memesSent);

    for (const category of result.categories) {
      core.info(`  ${category.name}: ${category.status} (${category.collected} memes)`);
    }

    if (result.delivered === 0) {
      core.setFailed("No category was delivered to Discord");
      return;
    }
    core.info("Meme fetcher completed successfully");
  } catch (error) {
    if (error instanceof Error) {
      core.setFailed(error.message);
    } else {
      core.setFailed("An unexpected error occurred");
    }
  }
}

void run();
