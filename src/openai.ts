import OpenAI from "openai";

export interface OpenAiSettings {
  apiKey?: string;
  baseURL?: string;
}

let _client: OpenAI | null = null;
let _clientKey = "";

export function getOpenAI(settings: OpenAiSettings): OpenAI {
  if (!settings.apiKey) {
    throw new Error("OPENAI_API_KEY is missing. Set it in your environment or pass --api-key.");
  }
  const key = `${settings.apiKey}|${settings.baseURL ?? ""}`;
  if (_client && _clientKey === key) return _client;
  // RetryPolicy owns retries; the SDK's own would multiply the attempts.
  _client = new OpenAI({ apiKey: settings.apiKey, baseURL: settings.baseURL || undefined, maxRetries: 0 });
  _clientKey = key;
  return _client;
}
