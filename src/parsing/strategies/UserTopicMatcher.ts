import { webSearchRequest, type ParseContext, type ToolRequest, type ToolRequestMatcher } from "../types";

export const INFO_PHRASES: readonly string[] = [
  "about",
  "information on",
  "tell me about",
  "what is",
  "who is",
  "wanna know",
];

export const DEFAULT_PINNED_PHRASES: readonly string[] = ["Claude Sonnet 3.7"];

/**
 * Falls back to the user's own words: whatever follows an informational
 * phrase in the last user turn becomes the search query.
 */
export class UserTopicMatcher implements ToolRequestMatcher {
  readonly kind = "user-topic" as const;

  constructor(private readonly pinnedPhrases: readonly string[] = DEFAULT_PINNED_PHRASES) {}

  match(_reply: string, context: ParseContext): ToolRequest[] {
    const message = context.lastUserMessage;
    if (!message) return [];

    const lower = message.toLowerCase();
    const phrase = INFO_PHRASES.find((candidate) => lower.includes(candidate));
    if (!phrase) return [];

    const query = message.slice(lower.indexOf(phrase) + phrase.length).trim();
    if (!query) return [];

    const pinned = this.findPinned(query);
    if (pinned) {
      context.logger?.info(`Extracted exact product name from user message: ${pinned}`);
      return [webSearchRequest(pinned)];
    }

    context.logger?.info(`Extracted search query from user message: ${query}`);
    return [webSearchRequest(query)];
  }

  private findPinned(query: string): string | null {
    const lower = query.toLowerCase();
    for (const phrase of this.pinnedPhrases) {
      const at = lower.indexOf(phrase.toLowerCase());
      if (at !== -1) return query.slice(at, at + phrase.length);
    }
    return null;
  }
}
