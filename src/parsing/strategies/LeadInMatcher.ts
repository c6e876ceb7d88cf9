import { BLANK_LINE, locateSpan } from "../markers";
import { webSearchRequest, type ParseContext, type ToolRequest, type ToolRequestMatcher } from "../types";

interface LeadIn {
  phrase: string;
  /** The section only counts when it talks about searching. */
  requiresSearchMention: boolean;
}

const LEAD_INS: readonly LeadIn[] = [
  { phrase: "I need to use the following tools:", requiresSearchMention: true },
  { phrase: "I'll search for", requiresSearchMention: false },
];

const FILLER_PHRASES = ["I need to search for", "I'll search for", "Let me search for"];

/** Free-text "I'll search for ..." paragraphs, read up to the next blank line. */
export class LeadInMatcher implements ToolRequestMatcher {
  readonly kind = "lead-in" as const;

  match(reply: string, context: ParseContext): ToolRequest[] {
    const requests: ToolRequest[] = [];

    for (const leadIn of LEAD_INS) {
      const span = locateSpan(reply, { start: leadIn.phrase, end: BLANK_LINE });
      if (!span) continue;

      const section = reply.slice(span.bodyStart, span.bodyEnd).trim();
      if (leadIn.requiresSearchMention && !section.toLowerCase().includes("search")) {
        continue;
      }

      let query = section;
      for (const filler of FILLER_PHRASES) {
        query = query.split(filler).join("");
      }
      query = query.trim();

      if (query) {
        context.logger?.info(`Created web search request with query: ${query}`);
        requests.push(webSearchRequest(query));
      }
    }

    return requests;
  }
}
