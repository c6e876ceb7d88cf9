export type ToolStatus = "success" | "error";

export interface ToolResult {
  status: ToolStatus;
  message?: string;
  [field: string]: unknown;
}

export type ToolParameters = Record<string, string>;

export interface ToolParameterSpec {
  description: string;
  required?: boolean;
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, ToolParameterSpec>;
}

export interface ToolRegistryPort {
  list(): ToolDefinition[];
  has(name: string): boolean;
  exec(name: string, params: ToolParameters): Promise<ToolResult>;
}

export function toolError(message: string, extra: Record<string, unknown> = {}): ToolResult {
  return { ...extra, status: "error", message };
}
