export interface WebSearchResult {
  title: string;
  link: string;
  snippet: string;
  source: string;
}

export interface WebSearchPort {
  readonly name: string;
  search(query: string, limit?: number): Promise<WebSearchResult[]>;
}
