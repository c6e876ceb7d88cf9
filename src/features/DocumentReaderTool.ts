import { existsSync, statSync } from "fs";
import path from "path";
import type { DocumentReaderPort } from "../ports/documents/DocumentReaderPort";
import type { ToolParameters, ToolResult } from "../ports/tools/ToolRegistryPort";
import { toolError } from "../ports/tools/ToolRegistryPort";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import { describeError } from "../shared/errors";

export const DEFAULT_MAX_DOCUMENT_CHARS = 20000;

export interface DocumentReaderToolOptions {
  maxChars?: number;
  logger?: LoggerPort;
}

export class DocumentReaderTool {
  readonly name = "read_document";
  readonly description =
    "Read a local document (txt, md, csv, json, html, pdf, docx, xlsx, pptx) and return its text.";
  readonly parameters = {
    file_path: { description: "Path to the document on disk.", required: true },
  };

  private readonly maxChars: number;

  constructor(
    private readonly reader: DocumentReaderPort,
    private readonly options: DocumentReaderToolOptions = {}
  ) {
    this.maxChars = Math.max(1, options.maxChars ?? DEFAULT_MAX_DOCUMENT_CHARS);
  }

  supports(filePath: string): boolean {
    return this.reader.supports(filePath);
  }

  async exec(params: ToolParameters): Promise<ToolResult> {
    const requested = typeof params.file_path === "string" ? params.file_path.trim() : "";
    if (!requested) {
      return toolError("file_path is required");
    }

    const filePath = path.resolve(requested);
    const fileName = path.basename(filePath);
    if (!existsSync(filePath) || !statSync(filePath).isFile()) {
      return toolError(`File not found: ${requested}`, { file_path: filePath });
    }

    try {
      const doc = await this.reader.read(filePath);
      const truncated = doc.text.length > this.maxChars;
      this.options.logger?.info(`Read ${doc.format} document ${fileName} (${doc.text.length} characters)`);
      return {
        status: "success",
        file_path: filePath,
        file_name: fileName,
        format: doc.format,
        content: truncated ? doc.text.slice(0, this.maxChars) : doc.text,
        truncated,
      };
    } catch (err) {
      return toolError(`Error reading document: ${describeError(err)}`, {
        file_path: filePath,
        file_name: fileName,
      });
    }
  }
}
