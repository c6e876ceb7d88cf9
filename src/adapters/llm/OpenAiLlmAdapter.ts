import { APIError } from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import type { GenerationOptions, LlmMessage, LlmPort } from "../../app/LlmPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import { getOpenAI, type OpenAiSettings } from "../../openai";
import { ModelUnavailableError } from "../../shared/errors";

export interface OpenAiLlmOptions extends OpenAiSettings {
  model: string;
  defaults?: GenerationOptions;
  logger?: LoggerPort;
}

export const DEFAULT_GENERATION: Required<GenerationOptions> = {
  temperature: 0.7,
  topP: 0.95,
  maxOutputTokens: 8192,
};

export function toChatMessage(msg: LlmMessage): ChatCompletionMessageParam {
  switch (msg.role) {
    case "system":
      return { role: "system", content: msg.text };
    case "model":
      return { role: "assistant", content: msg.text };
    case "user":
      return { role: "user", content: msg.text };
  }
}

/**
 * Streams a chat completion from any OpenAI-compatible endpoint and joins
 * the deltas. SDK API and connection errors surface as
 * ModelUnavailableError so callers can retry them.
 */
export class OpenAiLlmAdapter implements LlmPort {
  constructor(private readonly options: OpenAiLlmOptions) {}

  async generate(messages: LlmMessage[], overrides: GenerationOptions = {}): Promise<string> {
    const client = getOpenAI(this.options);
    const settings = { ...DEFAULT_GENERATION, ...this.options.defaults, ...overrides };

    this.options.logger?.debug("OpenAI request", {
      model: this.options.model,
      messages: messages.map((m) => ({ role: m.role, preview: m.text.slice(0, 80) })),
    });

    try {
      const stream = await client.chat.completions.create({
        model: this.options.model,
        messages: messages.map(toChatMessage),
        temperature: settings.temperature,
        top_p: settings.topP,
        max_tokens: settings.maxOutputTokens,
        stream: true,
      });

      let text = "";
      for await (const chunk of stream) {
        text += chunk.choices[0]?.delta?.content ?? "";
      }
      return text;
    } catch (err) {
      if (err instanceof APIError) {
        throw new ModelUnavailableError(`Model request failed: ${err.message}`, err);
      }
      throw err;
    }
  }
}
