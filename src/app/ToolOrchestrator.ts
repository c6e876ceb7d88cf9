import type { Conversation } from "../domain/conversation/Conversation";
import { extractFinalResponse } from "../parsing/FinalResponseCleaner";
import { CREATE_FILE_TOOL, WEB_SEARCH_TOOL, type ToolRequest } from "../parsing/types";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { ToolRegistryPort, ToolResult } from "../ports/tools/ToolRegistryPort";
import { describeError } from "../shared/errors";
import { toLlmMessages, type GenerationOptions, type LlmPort } from "./LlmPort";
import { formatHits, pageText, searchHits } from "./searchDigest";

export type ToolResults = Record<string, ToolResult>;

export const RESULTS_PREFIX = "Here are the results of the requested tools:\n\n";

export function serializeToolResults(results: ToolResults): string {
  return RESULTS_PREFIX + JSON.stringify(results, null, 2);
}

export interface ToolOrchestratorOptions {
  logger?: LoggerPort;
  generation?: GenerationOptions;
  cleanerMinLength?: number;
  /** Tools whose results later requests may build on. */
  primaryTools?: readonly string[];
  /** Tools deferred until every other request has run. */
  dependentTools?: readonly string[];
}

export interface ExecutionContext {
  message: string;
  conversation: Conversation;
}

export class ToolOrchestrator {
  private readonly primary: Set<string>;
  private readonly dependent: Set<string>;

  constructor(
    private readonly tools: ToolRegistryPort,
    private readonly llm: LlmPort,
    private readonly options: ToolOrchestratorOptions = {}
  ) {
    this.primary = new Set(options.primaryTools ?? [WEB_SEARCH_TOOL]);
    this.dependent = new Set(options.dependentTools ?? [CREATE_FILE_TOOL]);
  }

  async execute(requests: ToolRequest[], context: ExecutionContext): Promise<ToolResults> {
    const results: ToolResults = {};
    const deferred: ToolRequest[] = [];
    let searchData: ToolResult | undefined;

    for (const request of requests) {
      if (this.dependent.has(request.toolName)) {
        deferred.push(request);
        continue;
      }
      const result = await this.invoke(request);
      results[request.toolName] = result;
      if (this.primary.has(request.toolName) && result.status === "success") {
        searchData = result;
      }
    }

    for (const request of deferred) {
      const parameters = { ...request.parameters };
      if (request.toolName === CREATE_FILE_TOOL && parameters.content === undefined && searchData) {
        try {
          parameters.content = await this.generateContent(searchData, context);
        } catch (err) {
          this.options.logger?.error(`Error generating content from search: ${describeError(err)}`);
        }
      }
      results[request.toolName] = await this.invoke({ toolName: request.toolName, parameters });
    }

    return results;
  }

  private async invoke(request: ToolRequest): Promise<ToolResult> {
    const { logger } = this.options;
    logger?.info(`Executing tool: ${request.toolName}`, { parameters: request.parameters });
    try {
      const result = await this.tools.exec(request.toolName, request.parameters);
      if (result.status === "success") {
        logger?.info(`Tool execution successful: ${request.toolName}`);
      } else {
        logger?.warn(`Tool ${request.toolName} reported an error: ${result.message ?? "unknown error"}`);
      }
      return result;
    } catch (err) {
      const message = `Error executing tool ${request.toolName}: ${describeError(err)}`;
      logger?.error(message);
      return { status: "error", message };
    }
  }

  private async generateContent(searchData: ToolResult, context: ExecutionContext): Promise<string> {
    let digest = "Here are the web search results:\n\n" + formatHits(searchHits(searchData), 5);
    const page = pageText(searchData);
    if (page) {
      digest += "Detailed content from the top result:\n\n" + page.slice(0, 3000) + "\n\n";
    }

    context.conversation.addUser(
      "Based on the web search results, please create content for the file about " + context.message
    );
    context.conversation.addUser(digest);

    const reply = await this.llm.generate(toLlmMessages(context.conversation.snapshot()), this.options.generation);
    return extractFinalResponse(reply, {
      minLength: this.options.cleanerMinLength,
      logger: this.options.logger,
    });
  }
}
