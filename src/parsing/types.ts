import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { ToolParameters } from "../ports/tools/ToolRegistryPort";

export interface ToolRequest {
  toolName: string;
  parameters: ToolParameters;
}

export type MatcherKind =
  | "structured-block"
  | "lead-in"
  | "implied-search"
  | "code-block"
  | "user-topic";

export interface ParseContext {
  /** Text of the most recent user turn, including the one being answered. */
  lastUserMessage?: string | null;
  logger?: LoggerPort;
}

export interface ToolRequestMatcher {
  readonly kind: MatcherKind;
  match(reply: string, context: ParseContext): ToolRequest[];
}

export const WEB_SEARCH_TOOL = "web_search";
export const CREATE_FILE_TOOL = "create_file";
export const READ_DOCUMENT_TOOL = "read_document";

export function webSearchRequest(query: string): ToolRequest {
  return { toolName: WEB_SEARCH_TOOL, parameters: { query } };
}
