import { webSearchRequest, type ParseContext, type ToolRequest, type ToolRequestMatcher } from "../types";

export const SEARCH_INDICATORS: readonly string[] = [
  "I'll search for",
  "I need to search for",
  "Let me search for",
  "I should search for",
  "I need to find information about",
  "Let me look up",
];

const QUERY_TERMINATORS = [".", "?", "\n"];

export class ImpliedSearchMatcher implements ToolRequestMatcher {
  readonly kind = "implied-search" as const;

  match(reply: string, context: ParseContext): ToolRequest[] {
    const lower = reply.toLowerCase();
    if (!lower.includes("search")) return [];

    for (const indicator of SEARCH_INDICATORS) {
      const at = lower.indexOf(indicator.toLowerCase());
      if (at === -1) continue;

      const from = at + indicator.length;
      const ends = QUERY_TERMINATORS
        .map((marker) => reply.indexOf(marker, from))
        .filter((pos) => pos !== -1);
      const to = ends.length ? Math.min(...ends) : reply.length;

      const query = reply.slice(from, to).trim();
      if (query) {
        context.logger?.info(`Extracted implied search query: ${query}`);
        return [webSearchRequest(query)];
      }
    }

    return [];
  }
}
