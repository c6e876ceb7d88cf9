import path from 'path';
import { loadConfig, type AppConfig } from '../config';
import type { EnvSettings } from '../env';
import { initializeLogging, type LoggingHandle } from '../runtime/logging';
import type { WebSearchPort } from '../ports/search/WebSearchPort';
import { OpenAiLlmAdapter } from '../adapters/llm/OpenAiLlmAdapter';
import { SerpApiSearch } from '../adapters/search/SerpApiSearch';
import { DuckDuckGoSearch } from '../adapters/search/DuckDuckGoSearch';
import { CompositeSearch } from '../adapters/search/CompositeSearch';
import { HttpPageFetcher } from '../adapters/web/HttpPageFetcher';
import { LocalFileStorage } from '../adapters/sys/LocalFileStorage';
import { FileDocumentReader } from '../adapters/documents/FileDocumentReader';
import { FunctionToolRegistry, type FunctionTool } from '../adapters/tools/FunctionToolRegistry';
import { WebSearchTool } from '../features/WebSearchTool';
import { FileCreationTool } from '../features/FileCreationTool';
import { DocumentReaderTool } from '../features/DocumentReaderTool';
import { ResponseParser } from '../parsing/ResponseParser';
import { RetryPolicy } from '../app/RetryPolicy';
import { ToolOrchestrator } from '../app/ToolOrchestrator';
import { ChatAgent } from '../app/ChatAgent';
import { ConsoleSession, type ConsoleSessionOptions } from '../app/ConsoleSession';

export interface ApplicationInstance {
  readonly agent: ChatAgent;
  readonly logging: LoggingHandle;
  start(): Promise<void>;
  shutdown(): Promise<void>;
}

export interface BuildOptions {
  /** Pre-built logging context; a new one is created from the env otherwise. */
  logging?: LoggingHandle;
  session?: Pick<ConsoleSessionOptions, 'input' | 'output'>;
}

function buildSearch(env: EnvSettings, config: AppConfig, logging: LoggingHandle): WebSearchPort {
  const engines: WebSearchPort[] = [];
  for (const name of config.search.engines) {
    if (name === 'serpapi') {
      if (env.serpApiKey) engines.push(new SerpApiSearch({ apiKey: env.serpApiKey }));
    } else {
      engines.push(new DuckDuckGoSearch());
    }
  }
  return new CompositeSearch(engines, logging.forScope('search'));
}

export function buildTools(env: EnvSettings, config: AppConfig, logging: LoggingHandle) {
  const enabled = new Set(config.tools);
  const documentTool = new DocumentReaderTool(new FileDocumentReader(), {
    maxChars: config.documents.maxChars,
    logger: logging.forScope('documents'),
  });

  const candidates: FunctionTool[] = [
    new WebSearchTool(
      buildSearch(env, config, logging),
      new HttpPageFetcher({ logger: logging.forScope('web') }),
      {
        maxResults: config.search.maxResults,
        visitTopResult: config.search.visitTopResult,
        logger: logging.forScope('tools'),
      }
    ),
    new FileCreationTool(
      new LocalFileStorage(path.resolve(config.outputDir)),
      logging.forScope('tools')
    ),
    documentTool,
  ];

  const registry = new FunctionToolRegistry(candidates.filter((tool) => enabled.has(tool.name)));
  return { registry, documentTool: enabled.has(documentTool.name) ? documentTool : undefined };
}

export function buildApplication(env: EnvSettings, options: BuildOptions = {}): ApplicationInstance {
  const logging = options.logging ?? initializeLogging({ logFile: env.logFile, echo: env.debugMode });
  const log = logging.forScope('agent');

  const { config, path: configPath } = loadConfig(env.configPath, logging.forScope('config'));
  if (configPath) {
    log.info(`Loaded config from ${configPath}`);
  }

  const { registry, documentTool } = buildTools(env, config, logging);
  const llm = new OpenAiLlmAdapter({
    apiKey: env.openAiApiKey,
    baseURL: env.openAiBaseUrl,
    model: env.openAiModel,
    defaults: config.generation,
    logger: logging.forScope('llm'),
  });

  const orchestrator = new ToolOrchestrator(registry, llm, {
    logger: logging.forScope('tools'),
    generation: config.generation,
    cleanerMinLength: config.cleaner.minLength,
  });

  const agent = new ChatAgent({
    llm,
    tools: registry,
    orchestrator,
    parser: ResponseParser.withOptions({
      pinnedPhrases: config.parser.pinnedPhrases,
      logger: logging.forScope('parser'),
    }),
    retry: new RetryPolicy(config.retry),
    logger: log,
    generation: config.generation,
    cleanerMinLength: config.cleaner.minLength,
    debug: env.debugMode,
    onDebugChange: (enabled) => logging.setEcho(enabled),
    onPhaseChange: (from, to) => log.debug(`Turn phase ${from} -> ${to}`),
  });

  const session = new ConsoleSession(agent, { ...options.session, documents: documentTool });

  return {
    agent,
    logging,
    start: () => session.run(),
    shutdown: () => logging.shutdown(),
  };
}
