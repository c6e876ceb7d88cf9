import type { LoggerPort } from "../ports/sys/LoggerPort";
import { CodeBlockMatcher } from "./strategies/CodeBlockMatcher";
import { ImpliedSearchMatcher } from "./strategies/ImpliedSearchMatcher";
import { LeadInMatcher } from "./strategies/LeadInMatcher";
import { StructuredBlockMatcher } from "./strategies/StructuredBlockMatcher";
import { DEFAULT_PINNED_PHRASES, UserTopicMatcher } from "./strategies/UserTopicMatcher";
import type { ParseContext, ToolRequest, ToolRequestMatcher } from "./types";

export interface ResponseParserOptions {
  pinnedPhrases?: readonly string[];
  logger?: LoggerPort;
}

export function defaultMatchers(
  pinnedPhrases: readonly string[] = DEFAULT_PINNED_PHRASES
): ToolRequestMatcher[] {
  return [
    new StructuredBlockMatcher(),
    new LeadInMatcher(),
    new ImpliedSearchMatcher(),
    new CodeBlockMatcher(),
    new UserTopicMatcher(pinnedPhrases),
  ];
}

/**
 * Runs the matchers in order and returns the requests of the first one that
 * finds anything. An empty list means the reply needs no tools.
 */
export class ResponseParser {
  private readonly logger?: LoggerPort;

  constructor(
    private readonly matchers: ToolRequestMatcher[] = defaultMatchers(),
    options: ResponseParserOptions = {}
  ) {
    this.logger = options.logger;
  }

  static withOptions(options: ResponseParserOptions = {}): ResponseParser {
    return new ResponseParser(defaultMatchers(options.pinnedPhrases), options);
  }

  parse(reply: string, lastUserMessage?: string | null): ToolRequest[] {
    const context: ParseContext = { lastUserMessage, logger: this.logger };
    for (const matcher of this.matchers) {
      const requests = matcher.match(reply, context);
      if (requests.length) {
        this.logger?.info(`Matched ${requests.length} tool request(s) via ${matcher.kind}`);
        return requests;
      }
    }
    return [];
  }
}

export function parseToolRequests(
  reply: string,
  lastUserMessage?: string | null,
  options: ResponseParserOptions = {}
): ToolRequest[] {
  return ResponseParser.withOptions(options).parse(reply, lastUserMessage);
}
