import { locateSpan, TOOL_BLOCK_MARKERS } from "../markers";
import type { ParseContext, ToolRequest, ToolRequestMatcher } from "../types";
import type { ToolParameters } from "../../ports/tools/ToolRegistryPort";
import { describeError } from "../../shared/errors";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toParameters(raw: unknown): ToolParameters {
  const out: ToolParameters = {};
  if (!isRecord(raw)) return out;
  for (const [key, value] of Object.entries(raw)) {
    if (value === undefined || value === null) continue;
    out[key] = typeof value === "string"
      ? value
      : typeof value === "object"
        ? JSON.stringify(value)
        : String(value);
  }
  return out;
}

export function decodeRequestLine(line: string): ToolRequest | null {
  const parsed: unknown = JSON.parse(line);
  if (!isRecord(parsed) || typeof parsed.tool_name !== "string" || !parsed.tool_name.trim()) {
    return null;
  }
  return {
    toolName: parsed.tool_name.trim(),
    parameters: toParameters(parsed.parameters),
  };
}

/**
 * One JSON object per line inside `[TOOL_REQUESTS]` or `<tool_requests>`
 * blocks. Lines that do not decode are skipped.
 */
export class StructuredBlockMatcher implements ToolRequestMatcher {
  readonly kind = "structured-block" as const;

  match(reply: string, context: ParseContext): ToolRequest[] {
    const requests: ToolRequest[] = [];

    for (const pair of TOOL_BLOCK_MARKERS) {
      const span = locateSpan(reply, pair);
      if (!span) continue;

      const section = reply.slice(span.bodyStart, span.bodyEnd).trim();
      context.logger?.debug(`Found tool section with format ${pair.start}`, { section });

      for (const rawLine of section.split("\n")) {
        const line = rawLine.trim();
        if (!line.startsWith("{")) continue;
        try {
          const request = decodeRequestLine(line);
          if (request) {
            requests.push(request);
          } else {
            context.logger?.warn("Tool request line has no tool_name", { line });
          }
        } catch (err) {
          context.logger?.warn("Skipping undecodable tool request line", {
            line,
            error: describeError(err),
          });
        }
      }
    }

    return requests;
  }
}
