import type { ToolResult } from "../ports/tools/ToolRegistryPort";

export interface SearchHit {
  title: string;
  snippet: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Hits of a successful web_search result; anything else yields none. */
export function searchHits(result: ToolResult | undefined): SearchHit[] {
  if (!result || result.status !== "success" || !Array.isArray(result.results)) return [];
  return result.results.filter(isRecord).map((item) => ({
    title: typeof item.title === "string" ? item.title : "No title",
    snippet: typeof item.snippet === "string" ? item.snippet : "No description",
  }));
}

/** Text of the page attached to a web_search result, or "" when there is none. */
export function pageText(result: ToolResult | undefined): string {
  const page = result?.page_content;
  if (!isRecord(page) || page.status !== "success") return "";
  return typeof page.content === "string" ? page.content : "";
}

export function formatHits(hits: SearchHit[], limit: number): string {
  return hits
    .slice(0, limit)
    .map((hit, i) => `${i + 1}. ${hit.title}\n   ${hit.snippet}\n\n`)
    .join("");
}
