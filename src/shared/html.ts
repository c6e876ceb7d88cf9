const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  nbsp: " ",
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  "#39": "'",
};

const MAX_CODE_POINT = 0x10ffff;

function fromCodePoint(code: number, whole: string): string {
  return Number.isInteger(code) && code <= MAX_CODE_POINT ? String.fromCodePoint(code) : whole;
}

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+|#39);/gi, (whole, name: string) => {
    const key = name.toLowerCase();
    if (NAMED_ENTITIES[key] !== undefined) return NAMED_ENTITIES[key];
    if (key.startsWith("#x")) return fromCodePoint(Number.parseInt(key.slice(2), 16), whole);
    if (key.startsWith("#")) return fromCodePoint(Number.parseInt(key.slice(1), 10), whole);
    return whole;
  });
}

export function stripTags(html: string): string {
  return decodeEntities(html.replace(/<[^>]+>/g, ""));
}

export function removeElements(html: string, tags: readonly string[]): string {
  let out = html;
  for (const tag of tags) {
    out = out.replace(new RegExp(`<${tag}\\b[^>]*>[\\s\\S]*?<\\/${tag}>`, "gi"), "");
  }
  return out;
}

/** Converts markup to plain text, keeping block boundaries as line breaks. */
export function htmlToText(html: string): string {
  const text = html
    .replace(/<br\s*\/?>/gi, "\n")
    .replace(/<\/(p|div|li|h[1-6]|tr|section|article)>/gi, "\n");
  return stripTags(text)
    .replace(/[ \t]+/g, " ")
    .replace(/\n\s*\n/g, "\n\n")
    .trim();
}
