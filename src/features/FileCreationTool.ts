import path from "path";
import type { StoragePort } from "../ports/sys/StoragePort";
import type { ToolParameters, ToolResult } from "../ports/tools/ToolRegistryPort";
import { toolError } from "../ports/tools/ToolRegistryPort";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import { describeError } from "../shared/errors";

export const DEFAULT_EXTENSION = "txt";

/**
 * Reduces a requested name to a safe base name and settles its extension:
 * an existing extension wins, then `fileType`, then `.txt`.
 */
export function resolveFileName(requested: string, fileType?: string): string {
  const base = path.basename(requested.trim().replace(/\\/g, "/"));
  const safe = base.replace(/[^a-zA-Z0-9_\-.]/g, "_").replace(/^\.+/, "") || "generated_file";
  if (path.extname(safe)) return safe;

  const ext = (fileType ?? "").trim().replace(/^\.+/, "").replace(/[^a-zA-Z0-9]/g, "");
  return `${safe}.${ext || DEFAULT_EXTENSION}`;
}

export class FileCreationTool {
  readonly name = "create_file";
  readonly description = "Create a file in the outputs directory.";
  readonly parameters = {
    filename: { description: "Name of the file, ideally with an extension.", required: true },
    content: { description: "Text to write into the file.", required: true },
    file_type: { description: "Optional extension without the dot (txt, md, py, json...)." },
  };

  constructor(
    private readonly storage: StoragePort,
    private readonly logger?: LoggerPort
  ) {}

  async exec(params: ToolParameters): Promise<ToolResult> {
    const content = params.content;
    if (typeof content !== "string" || !content.trim()) {
      return toolError("File content is required");
    }

    const fileName = resolveFileName(params.filename ?? "", params.file_type);
    try {
      const filePath = await this.storage.write(fileName, content);
      this.logger?.info(`File created at ${filePath}`);
      return { status: "success", file_path: filePath, file_name: fileName };
    } catch (err) {
      return toolError(`Error creating file: ${describeError(err)}`, { file_name: fileName });
    }
  }
}
