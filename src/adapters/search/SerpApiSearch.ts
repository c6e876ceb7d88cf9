import type { WebSearchPort, WebSearchResult } from "../../ports/search/WebSearchPort";

export interface SerpApiOptions {
  apiKey?: string;
}

interface OrganicResult {
  title?: unknown;
  link?: unknown;
  snippet?: unknown;
}

function readOrganic(data: unknown): OrganicResult[] {
  if (typeof data !== "object" || data === null || !("organic_results" in data)) return [];
  const organic = data.organic_results;
  return Array.isArray(organic) ? organic : [];
}

export class SerpApiSearch implements WebSearchPort {
  readonly name = "Google";

  constructor(private readonly options: SerpApiOptions) {}

  async search(query: string, limit = 5): Promise<WebSearchResult[]> {
    const apiKey = this.options.apiKey;
    if (!apiKey) {
      throw new Error("SERPAPI_KEY is not configured.");
    }

    const url = new URL("https://serpapi.com/search.json");
    url.searchParams.set("q", query);
    url.searchParams.set("num", Math.min(10, Math.max(1, limit)).toString());
    url.searchParams.set("api_key", apiKey);

    const res = await fetch(url.toString());
    if (!res.ok) {
      throw new Error(`SerpAPI error: ${res.status} ${res.statusText}`);
    }

    const data: unknown = await res.json();
    return readOrganic(data)
      .filter((item) => typeof item.link === "string" && item.link.startsWith("http"))
      .slice(0, limit)
      .map((item) => ({
        title: typeof item.title === "string" ? item.title : "No title",
        link: String(item.link),
        snippet: typeof item.snippet === "string" ? item.snippet : "No description available",
        source: this.name,
      }));
  }
}
