import { describe, it, expect, vi } from "vitest";
import {
  buildEmbed,
  buildEmbedTitle,
  buildPayload,
  createDiscordNotifier,
  MAX_EMBED_TITLE_LENGTH,
} from "../../src/output/discord.js";
import type { CategoryConfig } from "../../src/config.js";
import type { CandidateItem } from "../../src/sources/types.js";

vi.mock("@actions/core", () => ({
  info: vi.fn(),
  warning: vi.fn(),
}));

const WEBHOOK = "https://discord.com/api/webhooks/123/test-secret";

const category: CategoryConfig = {
  name: "general",
  header: "🔥 **Top 5 Trending Memes This Week** 🔥",
  color: 16734003,
  policy: "early-stop",
  target_size: 5,
  sources: [{ name: "memes", limit: 5 }],
};

const item: CandidateItem = {
  title: "Cat discovers mirror",
  imageUrl: "https://i.redd.it/aaa111.jpg",
  postUrl: "https://www.reddit.com/r/memes/comments/aaa111/",
  score: "512",
};

function notifierWith(statuses: number[]) {
  const bodies: unknown[] = [];
  let call = 0;
  const fetchFn = vi.fn(async (_url: string, init?: RequestInit) => {
    bodies.push(JSON.parse(String(init?.body)));
    const status = statuses[Math.min(call, statuses.length - 1)];
    call++;
    return new Response(null, { status });
  });
  const delay = vi.fn(async (_ms: number) => {});
  const notifier = createDiscordNotifier({
    webhookUrl: WEBHOOK,
    maxAttempts: 3,
    retryDelayMs: 2000,
    timeoutMs: 10_000,
    delay,
    fetchFn,
  });
  return { notifier, fetchFn, delay, bodies };
}

describe("buildEmbedTitle", () => {
  it("numbers the title", () => {
    expect(buildEmbedTitle(1, "Cat")).toBe("1. Cat");
  });

  it("keeps the whole title within the limit", () => {
    const title = buildEmbedTitle(3, "a".repeat(300));
    expect(title).toHaveLength(MAX_EMBED_TITLE_LENGTH);
    expect(title).toBe(`3. ${"a".repeat(247)}`);
  });

  it("drops an emoji that would straddle the limit instead of splitting it", () => {
    const title = buildEmbedTitle(1, `${"a".repeat(246)}😂😂`);

    expect(title).toBe(`1. ${"a".repeat(246)}`);
    expect(title.charCodeAt(title.length - 1)).toBe(0x61);
  });

  it("keeps emoji whole when they fit", () => {
    expect(buildEmbedTitle(1, "Monday 😂")).toBe("1. Monday 😂");
  });
});

describe("buildEmbed", () => {
  it("renders one card", () => {
    expect(buildEmbed(item, 2, 3447003)).toEqual({
      title: "2. Cat discovers mirror",
      url: "https://www.reddit.com/r/memes/comments/aaa111/",
      image: { url: "https://i.redd.it/aaa111.jpg" },
      footer: { text: "👍 512 upvotes" },
      color: 3447003,
    });
  });

  it("omits the link when the post URL is unknown", () => {
    expect(buildEmbed({ ...item, postUrl: "" }, 1, 1)).not.toHaveProperty("url");
  });
});

describe("buildPayload", () => {
  it("puts the header in the content and one embed per item", () => {
    const payload = buildPayload([item, { ...item, title: "Second" }], category.header, category.color);

    expect(payload.content).toBe("🔥 **Top 5 Trending Memes This Week** 🔥");
    expect(payload.embeds?.map((e) => e.title)).toEqual(["1. Cat discovers mirror", "2. Second"]);
  });
});

describe("createDiscordNotifier", () => {
  it("posts the batch to the webhook", async () => {
    const { notifier, fetchFn, bodies } = notifierWith([204]);

    await expect(notifier.deliver([item], category)).resolves.toBe("delivered");

    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(fetchFn.mock.calls[0][0]).toBe(WEBHOOK);
    expect(fetchFn.mock.calls[0][1]?.method).toBe("POST");
    expect(bodies[0]).toEqual(buildPayload([item], category.header, category.color));
  });

  it("retries a failing webhook", async () => {
    const { notifier, fetchFn, delay } = notifierWith([500, 429, 204]);

    await expect(notifier.deliver([item], category)).resolves.toBe("delivered");
    expect(fetchFn).toHaveBeenCalledTimes(3);
    expect(delay).toHaveBeenCalledTimes(2);
  });

  it("reports failure once attempts run out", async () => {
    const { notifier, fetchFn } = notifierWith([500]);

    await expect(notifier.deliver([item], category)).resolves.toBe("failed");
    expect(fetchFn).toHaveBeenCalledTimes(3);
  });

  it("skips an empty batch", async () => {
    const { notifier, fetchFn } = notifierWith([204]);

    await expect(notifier.deliver([], category)).resolves.toBe("empty");
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it("sends the nothing-found notice for an empty batch when configured", async () => {
    const { notifier, bodies } = notifierWith([204]);

    const status = await notifier.deliver([], { ...category, empty_notice: "No memes this week" });

    expect(status).toBe("empty");
    expect(bodies).toEqual([{ content: "No memes this week" }]);
  });
});
