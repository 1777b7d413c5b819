import * as core from "@actions/core";
import type { CategoryConfig } from "../config.js";
import { withRetry, type Delay } from "../retry.js";
import type { CandidateItem, FetchFn } from "../sources/types.js";

// Discord allows 256; stay under it
export const MAX_EMBED_TITLE_LENGTH = 250;

export interface DiscordEmbed {
  title: string;
  url?: string;
  image: { url: string };
  footer: { text: string };
  color: number;
}

export interface DiscordPayload {
  content: string;
  embeds?: DiscordEmbed[];
}

export type DeliveryStatus = "delivered" | "empty" | "failed";

export interface Notifier {
  deliver(batch: CandidateItem[], category: CategoryConfig): Promise<DeliveryStatus>;
}

export interface DiscordNotifierOptions {
  webhookUrl: string;
  maxAttempts: number;
  retryDelayMs: number;
  timeoutMs: number;
  delay: Delay;
  fetchFn?: FetchFn;
}

function buildEmbedTitle(position: number, title: string): string {
  const prefix = `${position}. `;
  let result = prefix;
  // whole code points only, so a cut never splits an emoji
  for (const char of title) {
    if (result.length + char.length > MAX_EMBED_TITLE_LENGTH) break;
    result += char;
  }
  return result;
}

function buildEmbed(item: CandidateItem, position: number, color: number): DiscordEmbed {
  return {
    title: buildEmbedTitle(position, item.title),
    ...(item.postUrl ? { url: item.postUrl } : {}),
    image: { url: item.imageUrl },
    footer: { text: `👍 ${item.score} upvotes` },
    color,
  };
}

export function buildPayload(
  batch: CandidateItem[],
  header: string,
  color: number
): DiscordPayload {
  return {
    content: header,
    embeds: batch.map((item, i) => buildEmbed(item, i + 1, color)),
  };
}

export function createDiscordNotifier(options: DiscordNotifierOptions): Notifier {
  const fetcher = options.fetchFn ?? fetch;

  async function post(payload: DiscordPayload, label: string): Promise<boolean> {
    const sent = await withRetry(
      label,
      async () => {
        const response = await fetcher(options.webhookUrl, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify(payload),
          signal: AbortSignal.timeout(options.timeoutMs),
        });
        if (!response.ok) {
          throw new Error(`Discord webhook returned ${response.status}`);
        }
        return true;
      },
      {
        maxAttempts: options.maxAttempts,
        delayMs: options.retryDelayMs,
        delay: options.delay,
      }
    );
    return sent ?? false;
  }

  return {
    async deliver(batch, category) {
      if (batch.length === 0) {
        core.warning(`No ${category.name} memes to send`);
        if (category.empty_notice) {
          await post({ content: category.empty_notice }, `Discord notice (${category.name})`);
        }
        return "empty";
      }

      core.info(`Sending ${batch.length} ${category.name} memes to Discord...`);
      const sent = await post(
        buildPayload(batch, category.header, category.color),
        `Discord (${category.name})`
      );

      if (sent) {
        core.info(`Sent ${category.name} memes to Discord`);
        return "delivered";
      }
      core.warning(`Failed to send ${category.name} memes after ${options.maxAttempts} attempts`);
      return "failed";
    },
  };
}

export { buildEmbed, buildEmbedTitle };
