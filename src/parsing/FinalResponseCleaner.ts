import type { LoggerPort } from "../ports/sys/LoggerPort";
import {
  locateSpan,
  THINKING_MARKERS,
  TOOL_SECTION_MARKERS,
  type LocateOptions,
  type MarkerPair,
} from "./markers";

export const DEFAULT_MIN_RESPONSE_LENGTH = 20;

export interface CleanerOptions {
  minLength?: number;
  logger?: LoggerPort;
}

function removeSpan(text: string, pair: MarkerPair, options: LocateOptions): string {
  const span = locateSpan(text, pair, options);
  if (!span) return text;
  const section = text.slice(span.start, span.end);
  return text.split(section).join("");
}

/**
 * Strips tool-request and "thinking" sections from a model reply. When the
 * stripped text is shorter than `minLength` the original reply is kept.
 */
export function extractFinalResponse(reply: string, options: CleanerOptions = {}): string {
  const minLength = options.minLength ?? DEFAULT_MIN_RESPONSE_LENGTH;
  let text = reply;

  for (const pair of TOOL_SECTION_MARKERS) {
    text = removeSpan(text, pair, {});
  }
  for (const pair of THINKING_MARKERS) {
    text = removeSpan(text, pair, { ignoreCase: true });
  }

  if (text.trim().length < minLength) {
    options.logger?.warn("Extracted response too short, using original");
    return reply.trim();
  }
  return text.trim();
}
