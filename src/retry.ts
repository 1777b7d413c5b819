import * as core from "@actions/core";

export type Delay = (ms: number) => Promise<void>;

export const sleep: Delay = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export interface RetryOptions {
  maxAttempts: number;
  delayMs: number;
  delay: Delay;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Resolves undefined once every attempt has failed; never rejects.
export async function withRetry<T>(
  label: string,
  attempt: () => Promise<T>,
  options: RetryOptions
): Promise<T | undefined> {
  for (let i = 1; i <= options.maxAttempts; i++) {
    try {
      return await attempt();
    } catch (error) {
      core.warning(
        `${label}: attempt ${i}/${options.maxAttempts} failed: ${describeError(error)}`
      );
      if (i < options.maxAttempts) {
        await options.delay(options.delayMs);
      }
    }
  }
  return undefined;
}

export { describeError };
