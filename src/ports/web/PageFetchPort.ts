export interface PageMetadata {
  publication_date?: string;
  author?: string;
}

export interface PageContent {
  status: "success";
  url: string;
  title: string;
  content: string;
  metadata: PageMetadata;
}

export interface PageFetchPort {
  fetchPage(url: string): Promise<PageContent>;
}
