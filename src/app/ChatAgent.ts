import { Conversation } from "../domain/conversation/Conversation";
import { ConversationState } from "../domain/conversation/ConversationState";
import { ConversationStateMachine } from "../domain/conversation/ConversationStateMachine";
import type { Turn, TurnPhase } from "../domain/conversation/types";
import { extractFinalResponse } from "../parsing/FinalResponseCleaner";
import type { ResponseParser } from "../parsing/ResponseParser";
import { WEB_SEARCH_TOOL, webSearchRequest, type ToolRequest } from "../parsing/types";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { ToolRegistryPort } from "../ports/tools/ToolRegistryPort";
import { describeError, RetryExhaustedError } from "../shared/errors";
import { toLlmMessages, type GenerationOptions, type LlmMessage, type LlmPort } from "./LlmPort";
import type { RetryPolicy } from "./RetryPolicy";
import { formatHits, pageText, searchHits } from "./searchDigest";
import { buildSystemPrompt } from "./SystemPrompt";
import { serializeToolResults, type ToolOrchestrator, type ToolResults } from "./ToolOrchestrator";

const FALLBACK_PREFIXES = ["about", "information on", "tell me about", "look for"];
const INFORMATIONAL_TERMS = ["about", "what is", "who is", "information on"];

export function isInformational(message: string): boolean {
  const lower = message.toLowerCase();
  return INFORMATIONAL_TERMS.some((term) => lower.includes(term));
}

/** Search terms for a turn whose initial model call never succeeded. */
export function fallbackSearchTerms(message: string): string {
  const lower = message.toLowerCase();
  for (const prefix of FALLBACK_PREFIXES) {
    const at = lower.indexOf(prefix);
    if (at !== -1) return lower.slice(at + prefix.length).trim();
  }
  return message;
}

export function synthesizeFromResults(results: ToolResults): string {
  let reply = "I found some information for you:\n\n";
  const search = results[WEB_SEARCH_TOOL];
  const hits = searchHits(search);
  if (hits.length) {
    reply += "From my web search:\n\n" + formatHits(hits, 3);
  }
  const page = pageText(search);
  if (page) {
    reply += "I also found this detailed information:\n\n" + page.slice(0, 1000) + "...\n\n";
  }
  return reply + "That's what I could find based on the search results.";
}

export interface ChatAgentDeps {
  llm: LlmPort;
  tools: ToolRegistryPort;
  orchestrator: ToolOrchestrator;
  parser: ResponseParser;
  retry: RetryPolicy;
  logger?: LoggerPort;
  generation?: GenerationOptions;
  cleanerMinLength?: number;
  debug?: boolean;
  /** Called whenever debug mode flips, e.g. to toggle console log echo. */
  onDebugChange?: (enabled: boolean) => void;
  onPhaseChange?: (from: TurnPhase, to: TurnPhase) => void;
}

export class ChatAgent {
  private readonly conversation = new Conversation();
  private readonly machine: ConversationStateMachine;
  private readonly systemPrompt: string;
  private debug: boolean;

  constructor(private readonly deps: ChatAgentDeps) {
    this.machine = new ConversationStateMachine(new ConversationState(), deps.onPhaseChange);
    this.systemPrompt = buildSystemPrompt(deps.tools.list());
    this.debug = Boolean(deps.debug);
  }

  get phase(): TurnPhase {
    return this.machine.phase;
  }

  history(): Turn[] {
    return this.conversation.snapshot();
  }

  isDebugMode(): boolean {
    return this.debug;
  }

  toggleDebugMode(): string {
    this.debug = !this.debug;
    this.deps.onDebugChange?.(this.debug);
    return `Debug mode ${this.debug ? "enabled" : "disabled"}`;
  }

  resetConversation() {
    this.conversation.reset();
    this.machine.onReset();
    this.deps.logger?.info("Conversation reset");
  }

  /** Runs one turn. Never rejects: failures come back as reply text. */
  async processMessage(message: string): Promise<string> {
    const { logger } = this.deps;
    this.conversation.addUser(message);
    this.machine.onTurnStarted();
    logger?.info(`Processing user message: ${message}`);

    try {
      const initial = await this.initialReply(message);
      this.machine.onInitialResponse();
      logger?.debug("Initial model response", { reply: initial });

      const requests = this.parse(initial, message);
      let reply: string;
      if (!requests.length) {
        logger?.info("No tools requested, using initial response");
        reply = this.clean(initial);
      } else {
        logger?.info(`Found ${requests.length} tool request(s) to execute`);
        this.machine.onToolsNeeded();
        const results = await this.deps.orchestrator.execute(requests, {
          message,
          conversation: this.conversation,
        });
        this.machine.onToolsFinished();

        this.conversation.addUser(serializeToolResults(results));
        const final = await this.finalReply(results);
        this.machine.onFinalResponse();
        reply = this.clean(final);
      }

      this.conversation.addModel(reply);
      this.machine.onReplyReady();
      return reply;
    } catch (err) {
      this.machine.onFailure();
      const errorMessage = `An error occurred while processing your message: ${describeError(err)}`;
      logger?.error(errorMessage);
      return (await this.searchAfterFailure(message)) ?? errorMessage;
    }
  }

  private async initialReply(message: string): Promise<string> {
    const messages: LlmMessage[] = [
      { role: "system", text: this.systemPrompt },
      ...toLlmMessages(this.conversation.snapshot()),
    ];

    let reply: string;
    try {
      reply = await this.deps.retry.run("Initial model call", () => this.generate(messages), this.deps.logger);
    } catch (err) {
      if (!(err instanceof RetryExhaustedError)) throw err;
      const terms = fallbackSearchTerms(message);
      this.deps.logger?.error(`Max retries reached, falling back to web search for: ${terms}`);
      reply = `I'll search for information about ${terms}`;
    }

    if (!reply) {
      reply = `I should search for information about ${message}`;
      this.deps.logger?.warn(`Created fallback response for tool detection: ${reply}`);
    }
    return reply;
  }

  private async finalReply(results: ToolResults): Promise<string> {
    const messages = toLlmMessages(this.conversation.snapshot());
    try {
      return await this.deps.retry.run("Final model call", () => this.generate(messages), this.deps.logger);
    } catch (err) {
      if (!(err instanceof RetryExhaustedError)) throw err;
      this.deps.logger?.error("Max retries reached for final response, building one from tool results");
      return synthesizeFromResults(results);
    }
  }

  private parse(reply: string, message: string): ToolRequest[] {
    try {
      return this.deps.parser.parse(reply, this.conversation.lastUserText());
    } catch (err) {
      this.deps.logger?.error(`Error parsing tool requests: ${describeError(err)}`);
      return isInformational(message) ? [webSearchRequest(message)] : [];
    }
  }

  private generate(messages: LlmMessage[]): Promise<string> {
    return this.deps.llm.generate(messages, this.deps.generation);
  }

  private clean(reply: string): string {
    return extractFinalResponse(reply, {
      minLength: this.deps.cleanerMinLength,
      logger: this.deps.logger,
    });
  }

  private async searchAfterFailure(message: string): Promise<string | null> {
    if (!isInformational(message) || !this.deps.tools.has(WEB_SEARCH_TOOL)) return null;
    this.deps.logger?.info(`Error occurred but attempting web search for: ${message}`);
    try {
      const result = await this.deps.tools.exec(WEB_SEARCH_TOOL, { query: message });
      return (
        "I encountered an error, but I was able to search the web for you:\n\n" +
        formatHits(searchHits(result), 3) +
        "\nI hope this information is helpful despite the technical issues."
      );
    } catch (err) {
      this.deps.logger?.error(`Fallback search also failed: ${describeError(err)}`);
      return null;
    }
  }
}
