import { SafeSearchType, search } from "duck-duck-scrape";
import type { WebSearchPort, WebSearchResult } from "../../ports/search/WebSearchPort";
import { stripTags } from "../../shared/html";

export interface DuckDuckGoHit {
  title: string;
  url: string;
  description: string;
}

/** The part of duck-duck-scrape's `search` this adapter relies on. */
export type DuckDuckGoSearchFn = (
  query: string,
  options: { safeSearch: SafeSearchType }
) => Promise<{ noResults: boolean; results: DuckDuckGoHit[] }>;

export interface DuckDuckGoOptions {
  searchFn?: DuckDuckGoSearchFn;
  safeSearch?: SafeSearchType;
}

export class DuckDuckGoSearch implements WebSearchPort {
  readonly name = "DuckDuckGo";
  private readonly searchFn: DuckDuckGoSearchFn;

  constructor(private readonly options: DuckDuckGoOptions = {}) {
    this.searchFn = options.searchFn ?? search;
  }

  async search(query: string, limit = 5): Promise<WebSearchResult[]> {
    const response = await this.searchFn(query, {
      safeSearch: this.options.safeSearch ?? SafeSearchType.MODERATE,
    });
    if (response.noResults) return [];

    return response.results
      .filter((item) => item.url.startsWith("http"))
      .slice(0, limit)
      .map((item) => ({
        title: stripTags(item.title).trim() || "No title",
        link: item.url,
        snippet: stripTags(item.description).trim() || "No description available",
        source: this.name,
      }));
  }
}
