import fs from "fs";
import path from "path";
import type { LoggerPort } from "./ports/sys/LoggerPort";
import { DEFAULT_BASE_DELAY_MS, DEFAULT_MAX_RETRIES } from "./app/RetryPolicy";
import { DEFAULT_GENERATION } from "./adapters/llm/OpenAiLlmAdapter";
import { DEFAULT_MIN_RESPONSE_LENGTH } from "./parsing/FinalResponseCleaner";
import { DEFAULT_PINNED_PHRASES } from "./parsing/strategies/UserTopicMatcher";
import { DEFAULT_MAX_DOCUMENT_CHARS } from "./features/DocumentReaderTool";
import { describeError } from "./shared/errors";

export type SearchEngineName = "serpapi" | "duckduckgo";

export interface AppConfig {
  tools: string[];
  outputDir: string;
  retry: { maxRetries: number; baseDelayMs: number };
  generation: { temperature: number; topP: number; maxOutputTokens: number };
  search: { engines: SearchEngineName[]; maxResults: number; visitTopResult: boolean };
  parser: { pinnedPhrases: string[] };
  cleaner: { minLength: number };
  documents: { maxChars: number };
}

export const DEFAULT_TOOLS = ["web_search", "create_file", "read_document"];
export const DEFAULT_OUTPUT_DIR = "OUTPUTS";
const SEARCH_ENGINES: readonly SearchEngineName[] = ["serpapi", "duckduckgo"];
const DEFAULT_CONFIG_FILENAMES = ["config.json", "agent.config.json"];

export function defaultConfig(): AppConfig {
  return {
    tools: [...DEFAULT_TOOLS],
    outputDir: DEFAULT_OUTPUT_DIR,
    retry: { maxRetries: DEFAULT_MAX_RETRIES, baseDelayMs: DEFAULT_BASE_DELAY_MS },
    generation: {
      temperature: DEFAULT_GENERATION.temperature,
      topP: DEFAULT_GENERATION.topP,
      maxOutputTokens: DEFAULT_GENERATION.maxOutputTokens,
    },
    search: { engines: [...SEARCH_ENGINES], maxResults: 10, visitTopResult: true },
    parser: { pinnedPhrases: [...DEFAULT_PINNED_PHRASES] },
    cleaner: { minLength: DEFAULT_MIN_RESPONSE_LENGTH },
    documents: { maxChars: DEFAULT_MAX_DOCUMENT_CHARS },
  };
}

export interface LoadedConfig {
  config: AppConfig;
  path?: string;
}

type Warn = (message: string) => void;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string, warn: Warn): Record<string, unknown> {
  const value = raw[key];
  if (value === undefined) return {};
  if (isRecord(value)) return value;
  warn(`Config "${key}" must be an object; using defaults.`);
  return {};
}

function numberIn(
  value: unknown,
  fallback: number,
  name: string,
  warn: Warn,
  { min, max, integer }: { min: number; max?: number; integer?: boolean }
): number {
  if (value === undefined) return fallback;
  const valid =
    typeof value === "number" &&
    Number.isFinite(value) &&
    value >= min &&
    (max === undefined || value <= max) &&
    (!integer || Number.isInteger(value));
  if (valid) return value;
  warn(`Invalid value for "${name}"; using ${fallback}.`);
  return fallback;
}

function stringList(value: unknown, fallback: string[], name: string, warn: Warn): string[] {
  if (value === undefined) return fallback;
  if (Array.isArray(value)) {
    return value
      .filter((item): item is string => typeof item === "string")
      .map((item) => item.trim())
      .filter((item) => item.length > 0);
  }
  warn(`Config "${name}" must be a list of strings; using defaults.`);
  return fallback;
}

function isEngine(name: string): name is SearchEngineName {
  return SEARCH_ENGINES.some((engine) => engine === name);
}

/** Validates a parsed config file, replacing bad or missing values with defaults. */
export function normalizeConfig(raw: unknown, warn: Warn = () => undefined): AppConfig {
  const defaults = defaultConfig();
  if (!isRecord(raw)) {
    warn("Config file must contain a JSON object; using defaults.");
    return defaults;
  }

  const retry = section(raw, "retry", warn);
  const generation = section(raw, "generation", warn);
  const search = section(raw, "search", warn);
  const parser = section(raw, "parser", warn);
  const cleaner = section(raw, "cleaner", warn);
  const documents = section(raw, "documents", warn);

  const engines = stringList(search.engines, defaults.search.engines, "search.engines", warn)
    .map((name) => name.toLowerCase())
    .filter((name): name is SearchEngineName => {
      if (isEngine(name)) return true;
      warn(`Unknown search engine "${name}" ignored.`);
      return false;
    });

  let outputDir = defaults.outputDir;
  if (typeof raw.outputDir === "string" && raw.outputDir.trim()) {
    outputDir = raw.outputDir.trim();
  } else if (raw.outputDir !== undefined) {
    warn(`Invalid value for "outputDir"; using ${defaults.outputDir}.`);
  }

  let visitTopResult = defaults.search.visitTopResult;
  if (typeof search.visitTopResult === "boolean") {
    visitTopResult = search.visitTopResult;
  } else if (search.visitTopResult !== undefined) {
    warn(`Invalid value for "search.visitTopResult"; using ${visitTopResult}.`);
  }

  return {
    tools: stringList(raw.tools, defaults.tools, "tools", warn),
    outputDir,
    retry: {
      maxRetries: numberIn(retry.maxRetries, defaults.retry.maxRetries, "retry.maxRetries", warn, {
        min: 1,
        integer: true,
      }),
      baseDelayMs: numberIn(retry.baseDelayMs, defaults.retry.baseDelayMs, "retry.baseDelayMs", warn, {
        min: 0,
      }),
    },
    generation: {
      temperature: numberIn(
        generation.temperature,
        defaults.generation.temperature,
        "generation.temperature",
        warn,
        { min: 0, max: 2 }
      ),
      topP: numberIn(generation.topP, defaults.generation.topP, "generation.topP", warn, { min: 0, max: 1 }),
      maxOutputTokens: numberIn(
        generation.maxOutputTokens,
        defaults.generation.maxOutputTokens,
        "generation.maxOutputTokens",
        warn,
        { min: 1, integer: true }
      ),
    },
    search: {
      engines: engines.length ? engines : defaults.search.engines,
      maxResults: numberIn(search.maxResults, defaults.search.maxResults, "search.maxResults", warn, {
        min: 1,
        max: 10,
        integer: true,
      }),
      visitTopResult,
    },
    parser: {
      pinnedPhrases: stringList(
        parser.pinnedPhrases,
        defaults.parser.pinnedPhrases,
        "parser.pinnedPhrases",
        warn
      ),
    },
    cleaner: {
      minLength: numberIn(cleaner.minLength, defaults.cleaner.minLength, "cleaner.minLength", warn, {
        min: 0,
        integer: true,
      }),
    },
    documents: {
      maxChars: numberIn(documents.maxChars, defaults.documents.maxChars, "documents.maxChars", warn, {
        min: 1,
        integer: true,
      }),
    },
  };
}

export function loadConfig(configPath?: string, logger?: LoggerPort): LoadedConfig {
  const warn: Warn = (message) => (logger ? logger.warn(message) : console.warn(message));
  const searchPaths = configPath
    ? [configPath]
    : DEFAULT_CONFIG_FILENAMES.map((name) => path.resolve(process.cwd(), name));

  for (const candidate of searchPaths) {
    const resolved = path.resolve(candidate);
    if (!fs.existsSync(resolved)) {
      if (configPath) warn(`Config file not found: ${resolved}`);
      continue;
    }
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(resolved, "utf8"));
      return { config: normalizeConfig(parsed, warn), path: resolved };
    } catch (err) {
      warn(`Failed to load config from ${candidate}: ${describeError(err)}`);
    }
  }

  return { config: defaultConfig() };
}
