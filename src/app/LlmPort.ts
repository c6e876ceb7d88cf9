export type LlmRole = "system" | "user" | "model";

export interface LlmMessage {
  role: LlmRole;
  text: string;
}

export interface GenerationOptions {
  temperature?: number;
  topP?: number;
  maxOutputTokens?: number;
}

export interface LlmPort {
  /** Sends the messages and resolves with the full reply text. */
  generate(messages: LlmMessage[], options?: GenerationOptions): Promise<string>;
}

export function toLlmMessages(turns: ReadonlyArray<{ role: "user" | "model"; text: string }>): LlmMessage[] {
  return turns.map((turn) => ({ role: turn.role, text: turn.text }));
}
