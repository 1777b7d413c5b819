import type { ProviderName } from "../config.js";
import { createApiExtractor } from "./api.js";
import { createFeedExtractor } from "./feed.js";
import { createMarkupExtractor } from "./markup.js";
import { createSourceReader, type SourceReaderOptions } from "./reader.js";
import type { HttpOptions, SourceReader } from "./types.js";

export function createReaderFor(
  provider: ProviderName,
  http: HttpOptions,
  options: SourceReaderOptions
): SourceReader {
  switch (provider) {
    case "feed":
      return createSourceReader(createFeedExtractor(http), options);
    case "markup":
      return createSourceReader(createMarkupExtractor(http), options);
    case "api":
      return createSourceReader(createApiExtractor(http), options);
  }
}
