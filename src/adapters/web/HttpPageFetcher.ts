import type { PageContent, PageFetchPort, PageMetadata } from "../../ports/web/PageFetchPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import { decodeEntities, htmlToText, removeElements, stripTags } from "../../shared/html";
import { pickUserAgent } from "./userAgents";

export const MAX_PAGE_CHARS = 5000;

const NOISE_ELEMENTS = ["script", "style", "noscript", "nav", "header", "footer", "aside", "form"];

const CONTENT_ELEMENTS = ["main", "article"];

const BOILERPLATE = [
  "accept cookies",
  "cookie policy",
  "use cookies",
  "privacy policy",
  "terms of service",
  "all rights reserved",
  "navigation menu",
  "skip to content",
  "sign in",
  "subscribe to our newsletter",
  "subscribe now",
  "sign up",
];

export interface HttpPageFetcherOptions {
  timeoutMs?: number;
  maxChars?: number;
  logger?: LoggerPort;
  random?: () => number;
}

function firstMatch(html: string, pattern: RegExp): string | null {
  const match = pattern.exec(html);
  return match?.[1] ?? null;
}

export function extractTitle(html: string): string {
  const raw = firstMatch(html, /<title[^>]*>([\s\S]*?)<\/title>/i);
  const title = raw ? stripTags(raw).trim() : "";
  return title || "No title found";
}

export function extractMetadata(html: string): PageMetadata {
  const metadata: PageMetadata = {};
  const time = firstMatch(html, /<time\b[^>]*>([\s\S]*?)<\/time>/i);
  if (time && stripTags(time).trim()) {
    metadata.publication_date = stripTags(time).trim();
  }
  const author = firstMatch(html, /<meta\s+name=["']author["']\s+content=["']([^"']+)["']/i);
  if (author) {
    metadata.author = decodeEntities(author).trim();
  }
  return metadata;
}

export function extractMainText(html: string): string {
  const cleaned = removeElements(html, NOISE_ELEMENTS);

  for (const tag of CONTENT_ELEMENTS) {
    const inner = firstMatch(cleaned, new RegExp(`<${tag}\\b[^>]*>([\\s\\S]*?)<\\/${tag}>`, "i"));
    if (inner) {
      const text = htmlToText(inner);
      if (text.length > 100) return text;
    }
  }

  const paragraphs: string[] = [];
  const paragraphPattern = /<p\b[^>]*>([\s\S]*?)<\/p>/gi;
  let match: RegExpExecArray | null;
  while ((match = paragraphPattern.exec(cleaned)) !== null) {
    const text = htmlToText(match[1]);
    if (text.length > 40) paragraphs.push(text);
  }
  if (paragraphs.length) return paragraphs.join("\n\n");

  const body = firstMatch(cleaned, /<body\b[^>]*>([\s\S]*?)<\/body>/i);
  return htmlToText(body ?? cleaned);
}

export function cleanContent(content: string): string {
  return content
    .split("\n")
    .map((line) => line.replace(/\s+/g, " ").trim())
    .filter((line) => line && !BOILERPLATE.some((phrase) => line.toLowerCase().includes(phrase)))
    .join("\n");
}

/** Downloads a page and reduces it to readable text. */
export class HttpPageFetcher implements PageFetchPort {
  private readonly timeoutMs: number;
  private readonly maxChars: number;

  constructor(private readonly options: HttpPageFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.maxChars = options.maxChars ?? MAX_PAGE_CHARS;
  }

  async fetchPage(url: string): Promise<PageContent> {
    this.options.logger?.info(`Visiting and summarizing URL: ${url}`);
    const res = await fetch(url, {
      headers: {
        "User-Agent": pickUserAgent(this.options.random),
        Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
        "Accept-Language": "en-US,en;q=0.9",
      },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!res.ok) {
      throw new Error(`HTTP error ${res.status} while fetching ${url}`);
    }

    const html = await res.text();
    const content = cleanContent(extractMainText(html)) || "Failed to extract content from page.";

    return {
      status: "success",
      url,
      title: extractTitle(html),
      content: content.slice(0, this.maxChars),
      metadata: extractMetadata(html),
    };
  }
}
