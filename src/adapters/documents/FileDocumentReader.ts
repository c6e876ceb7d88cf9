import { promises as fs } from "fs";
import path from "path";
import type {
  DocumentFormat,
  DocumentReaderPort,
  DocumentText,
} from "../../ports/documents/DocumentReaderPort";
import { decodeEntities, htmlToText, removeElements } from "../../shared/html";

export type FormatReader = (filePath: string) => Promise<string>;

const EXTENSION_FORMATS: Readonly<Record<string, DocumentFormat>> = {
  ".txt": "text",
  ".md": "text",
  ".csv": "text",
  ".json": "text",
  ".log": "text",
  ".html": "html",
  ".htm": "html",
  ".pdf": "pdf",
  ".docx": "docx",
  ".xlsx": "spreadsheet",
  ".xls": "spreadsheet",
  ".pptx": "presentation",
};

export const SUPPORTED_EXTENSIONS = Object.keys(EXTENSION_FORMATS);

export function formatForPath(filePath: string): DocumentFormat | null {
  return EXTENSION_FORMATS[path.extname(filePath).toLowerCase()] ?? null;
}

async function readText(filePath: string): Promise<string> {
  return fs.readFile(filePath, "utf8");
}

async function readHtml(filePath: string): Promise<string> {
  const html = await fs.readFile(filePath, "utf8");
  return htmlToText(removeElements(html, ["script", "style"]));
}

async function readPdf(filePath: string): Promise<string> {
  const { default: pdfParse } = await import("pdf-parse");
  const parsed = await pdfParse(await fs.readFile(filePath));
  return parsed.text;
}

async function readDocx(filePath: string): Promise<string> {
  const { default: mammoth } = await import("mammoth");
  const result = await mammoth.extractRawText({ path: filePath });
  return result.value;
}

async function readSpreadsheet(filePath: string): Promise<string> {
  const XLSX = await import("xlsx");
  const workbook = XLSX.read(await fs.readFile(filePath), { type: "buffer" });
  return workbook.SheetNames.map((name) => {
    const csv = XLSX.utils.sheet_to_csv(workbook.Sheets[name]);
    return `## Sheet: ${name}\n${csv}`;
  }).join("\n\n");
}

function slideNumber(entry: string): number {
  const match = /slide(\d+)\.xml$/.exec(entry);
  return match ? Number.parseInt(match[1], 10) : 0;
}

async function readPresentation(filePath: string): Promise<string> {
  const { default: JSZip } = await import("jszip");
  const zip = await JSZip.loadAsync(await fs.readFile(filePath));
  const slides = Object.keys(zip.files)
    .filter((entry) => /^ppt\/slides\/slide\d+\.xml$/.test(entry))
    .sort((a, b) => slideNumber(a) - slideNumber(b));

  const sections: string[] = [];
  for (const entry of slides) {
    const file = zip.file(entry);
    if (!file) continue;
    const xml = await file.async("string");
    const runs: string[] = [];
    const textPattern = /<a:t>([^<]*)<\/a:t>/g;
    let match: RegExpExecArray | null;
    while ((match = textPattern.exec(xml)) !== null) {
      runs.push(decodeEntities(match[1]));
    }
    sections.push(`## Slide ${slideNumber(entry)}\n${runs.join(" ").trim()}`);
  }
  return sections.join("\n\n");
}

const DEFAULT_READERS: Record<DocumentFormat, FormatReader> = {
  text: readText,
  html: readHtml,
  pdf: readPdf,
  docx: readDocx,
  spreadsheet: readSpreadsheet,
  presentation: readPresentation,
};

/** Picks a reader by file extension and returns the document's plain text. */
export class FileDocumentReader implements DocumentReaderPort {
  private readonly readers: Record<DocumentFormat, FormatReader>;

  constructor(overrides: Partial<Record<DocumentFormat, FormatReader>> = {}) {
    this.readers = { ...DEFAULT_READERS, ...overrides };
  }

  supports(filePath: string): boolean {
    return formatForPath(filePath) !== null;
  }

  async read(filePath: string): Promise<DocumentText> {
    const format = formatForPath(filePath);
    if (!format) {
      throw new Error(
        `Unsupported document type "${path.extname(filePath) || "(none)"}". Supported: ${SUPPORTED_EXTENSIONS.join(", ")}`
      );
    }
    const text = await this.readers[format](filePath);
    return { format, text: text.trim() };
  }
}
