import type { ToolParameters, ToolResult } from "../ports/tools/ToolRegistryPort";
import { toolError } from "../ports/tools/ToolRegistryPort";
import type { WebSearchPort, WebSearchResult } from "../ports/search/WebSearchPort";
import type { PageContent, PageFetchPort } from "../ports/web/PageFetchPort";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import { describeError } from "../shared/errors";

export interface WebSearchToolOptions {
  maxResults?: number;
  /** Fetch the top result and attach its text as `page_content`. */
  visitTopResult?: boolean;
  logger?: LoggerPort;
}

export interface WebSearchPayload extends ToolResult {
  status: "success";
  query: string;
  results: WebSearchResult[];
  page_content?: PageContent;
}

export class WebSearchTool {
  readonly name = "web_search";
  readonly description = "Search the web for information on a given query.";
  readonly parameters = {
    query: { description: "Search query string, exactly as the user phrased it.", required: true },
    num_results: { description: "How many results to return (1-10, default 10)." },
  };

  private readonly maxResults: number;

  constructor(
    private readonly search: WebSearchPort,
    private readonly pages: PageFetchPort | null,
    private readonly options: WebSearchToolOptions = {}
  ) {
    this.maxResults = clamp(options.maxResults ?? 10);
  }

  async exec(params: ToolParameters): Promise<ToolResult> {
    const query = typeof params.query === "string" ? params.query.trim() : "";
    if (!query) {
      return toolError("Search query is required");
    }

    const requested = Number.parseInt(params.num_results ?? "", 10);
    const limit = Number.isFinite(requested) ? clamp(requested) : this.maxResults;
    this.options.logger?.info(`Starting web search for query: ${query}`);

    let results: WebSearchResult[];
    try {
      results = await this.search.search(query, limit);
    } catch (err) {
      return toolError(`Error during web search: ${describeError(err)}`, { query });
    }

    const payload: WebSearchPayload = { status: "success", query, results: results.slice(0, limit) };

    const top = payload.results[0];
    if (top && this.pages && this.options.visitTopResult !== false) {
      try {
        payload.page_content = await this.pages.fetchPage(top.link);
        this.options.logger?.info(`Extracted page content from ${top.link}`);
      } catch (err) {
        this.options.logger?.error(`Error extracting page content: ${describeError(err)}`);
      }
    }

    return payload;
  }
}

function clamp(n: number): number {
  return Math.min(10, Math.max(1, Math.floor(n)));
}
