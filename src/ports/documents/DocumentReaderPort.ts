export type DocumentFormat =
  | "text"
  | "html"
  | "pdf"
  | "docx"
  | "spreadsheet"
  | "presentation";

export interface DocumentText {
  format: DocumentFormat;
  text: string;
}

export interface DocumentReaderPort {
  supports(filePath: string): boolean;
  read(filePath: string): Promise<DocumentText>;
}
