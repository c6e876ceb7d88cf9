export interface MarkerPair {
  start: string;
  end: string;
}

export const BLANK_LINE = "\n\n";

export const TOOL_BLOCK_MARKERS: readonly MarkerPair[] = [
  { start: "[TOOL_REQUESTS]", end: "[/TOOL_REQUESTS]" },
  { start: "<tool_requests>", end: "</tool_requests>" },
];

export const TOOL_SECTION_MARKERS: readonly MarkerPair[] = [
  ...TOOL_BLOCK_MARKERS,
  { start: "I need to use the following tools:", end: BLANK_LINE },
];

export const THINKING_MARKERS: readonly MarkerPair[] = [
  { start: "<thinking>", end: "</thinking>" },
  { start: "[THINKING]", end: "[/THINKING]" },
  { start: "(thinking:", end: ")" },
  { start: "Thinking:", end: BLANK_LINE },
  { start: "Let me think about this:", end: BLANK_LINE },
  { start: "let me think", end: BLANK_LINE },
  { start: "First, I need to", end: BLANK_LINE },
];

export interface MarkedSpan {
  /** Index of the start marker. */
  start: number;
  bodyStart: number;
  bodyEnd: number;
  /** Index just past the end marker, clamped to the text length. */
  end: number;
}

export interface LocateOptions {
  ignoreCase?: boolean;
}

/**
 * Finds the first occurrence of `pair.start` and the matching end marker
 * after it. A missing blank-line terminator runs to the end of the text; a
 * missing explicit terminator means there is no span.
 */
export function locateSpan(
  text: string,
  pair: MarkerPair,
  options: LocateOptions = {}
): MarkedSpan | null {
  const haystack = options.ignoreCase ? text.toLowerCase() : text;
  const startMarker = options.ignoreCase ? pair.start.toLowerCase() : pair.start;
  const endMarker = options.ignoreCase ? pair.end.toLowerCase() : pair.end;

  const start = haystack.indexOf(startMarker);
  if (start === -1) return null;
  const bodyStart = start + pair.start.length;

  let bodyEnd = haystack.indexOf(endMarker, bodyStart);
  if (bodyEnd === -1) {
    if (pair.end !== BLANK_LINE) return null;
    bodyEnd = text.length;
  }

  return {
    start,
    bodyStart,
    bodyEnd,
    end: Math.min(text.length, bodyEnd + pair.end.length),
  };
}
