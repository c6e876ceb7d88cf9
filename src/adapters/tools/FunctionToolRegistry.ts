import {
  toolError,
  type ToolDefinition,
  type ToolParameters,
  type ToolParameterSpec,
  type ToolRegistryPort,
  type ToolResult,
} from "../../ports/tools/ToolRegistryPort";
import { describeError } from "../../shared/errors";

export interface FunctionTool {
  name: string;
  description: string;
  parameters: Record<string, ToolParameterSpec>;
  exec: (params: ToolParameters) => Promise<ToolResult> | ToolResult;
}

export class FunctionToolRegistry implements ToolRegistryPort {
  private readonly toolsByName = new Map<string, FunctionTool>();

  constructor(tools: FunctionTool[]) {
    for (const tool of tools) {
      this.toolsByName.set(tool.name, tool);
    }
  }

  list(): ToolDefinition[] {
    return Array.from(this.toolsByName.values()).map((tool) => ({
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    }));
  }

  has(name: string): boolean {
    return this.toolsByName.has(name);
  }

  async exec(name: string, params: ToolParameters): Promise<ToolResult> {
    const tool = this.toolsByName.get(name);
    if (!tool) {
      return toolError(`Tool "${name}" is not registered.`);
    }

    try {
      return await tool.exec(params);
    } catch (err) {
      return toolError(`Error executing tool ${name}: ${describeError(err)}`);
    }
  }
}
