import type { LoggerPort } from "../../ports/sys/LoggerPort";
import type { WebSearchPort, WebSearchResult } from "../../ports/search/WebSearchPort";
import { describeError } from "../../shared/errors";

/**
 * Queries each engine in turn until `limit` distinct links are collected.
 * An engine that throws is logged and skipped.
 */
export class CompositeSearch implements WebSearchPort {
  readonly name = "composite";

  constructor(
    private readonly engines: WebSearchPort[],
    private readonly logger?: LoggerPort
  ) {}

  async search(query: string, limit = 10): Promise<WebSearchResult[]> {
    const seen = new Set<string>();
    const results: WebSearchResult[] = [];

    for (const engine of this.engines) {
      if (results.length >= limit) break;
      try {
        const found = await engine.search(query, limit);
        this.logger?.info(`Found ${found.length} ${engine.name} results`, { query });
        for (const item of found) {
          if (seen.has(item.link)) continue;
          seen.add(item.link);
          results.push(item);
        }
      } catch (err) {
        this.logger?.error(`Error during ${engine.name} search: ${describeError(err)}`);
      }
    }

    const unique = results.slice(0, limit);
    this.logger?.info(`Web search completed with ${unique.length} unique results`);
    return unique;
  }
}
