import { readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { z, ZodError } from "zod";

// Resolved against the working directory the job is started from
export const DEFAULT_CONFIG_PATH = "memes.yml";

export const WEBHOOK_URL_PREFIX = "https://discord.com/api/webhooks/";

// Discord rejects messages with more embeds than this
const MAX_EMBEDS_PER_MESSAGE = 10;

const SourceQuerySchema = z.object({
  name: z.string().min(1),
  limit: z.number().int().positive().default(5),
});

const CategorySchema = z.object({
  name: z.string().min(1),
  header: z.string().min(1),
  color: z.number().int().min(0).max(0xffffff),
  policy: z.enum(["early-stop", "exhaustive"]).default("early-stop"),
  target_size: z.number().int().positive().max(MAX_EMBEDS_PER_MESSAGE).default(5),
  empty_notice: z.string().min(1).optional(),
  sources: z.array(SourceQuerySchema).min(1),
});

const RetrySchema = z.object({
  max_attempts: z.number().int().positive().default(3),
  retry_delay_ms: z.number().int().nonnegative().default(2000),
  source_delay_ms: z.number().int().nonnegative().default(1000),
  message_delay_ms: z.number().int().nonnegative().default(1000),
  timeout_ms: z.number().int().positive().default(10_000),
});

export const MemeConfigSchema = z.object({
  provider: z.enum(["feed", "markup", "api"]).default("feed"),
  suppress_nsfw: z.boolean().default(true),
  retry: RetrySchema.default({}),
  categories: z.array(CategorySchema).min(1),
});

const EnvSchema = z.object({
  DISCORD_WEBHOOK_URL: z
    .string({ required_error: "DISCORD_WEBHOOK_URL environment variable not set" })
    .trim()
    .min(1, "DISCORD_WEBHOOK_URL environment variable not set")
    .startsWith(WEBHOOK_URL_PREFIX, "Invalid Discord webhook URL"),
});

export type MemeConfig = z.infer<typeof MemeConfigSchema>;
export type CategoryConfig = z.infer<typeof CategorySchema>;
export type RetryConfig = z.infer<typeof RetrySchema>;
export type ProviderName = MemeConfig["provider"];
export type AccumulationPolicy = CategoryConfig["policy"];

export interface FetcherConfig extends MemeConfig {
  webhookUrl: string;
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    )
    .join("; ");
}

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, what: string): T {
  try {
    return schema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new Error(`Invalid ${what}: ${describeIssues(error)}`);
    }
    throw error;
  }
}

export function parseConfig(yamlContent: string): MemeConfig {
  return validate(MemeConfigSchema, parseYaml(yamlContent), "config");
}

export function parseWebhookUrl(env: NodeJS.ProcessEnv): string {
  return validate(EnvSchema, env, "environment").DISCORD_WEBHOOK_URL;
}

export function loadConfig(
  filePath: string = DEFAULT_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env
): FetcherConfig {
  const webhookUrl = parseWebhookUrl(env);
  const content = readFileSync(filePath, "utf-8");
  return { ...parseConfig(content), webhookUrl };
}
