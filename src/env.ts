import { config } from 'dotenv';

export const DEFAULT_MODEL = 'gpt-4o-mini';
export const DEFAULT_LOG_FILE = 'agent_debug.log';

export interface EnvSettings {
  openAiApiKey?: string;
  openAiModel: string;
  openAiBaseUrl?: string;
  serpApiKey?: string;
  debugMode: boolean;
  logFile: string;
  configPath?: string;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Reads settings from the environment, then lets command-line flags
 * override them. Unknown flags are ignored.
 */
export function readEnv(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): EnvSettings {
  const settings: EnvSettings = {
    openAiApiKey: nonEmpty(env.OPENAI_API_KEY),
    openAiModel: nonEmpty(env.OPENAI_MODEL) ?? DEFAULT_MODEL,
    openAiBaseUrl: nonEmpty(env.OPENAI_BASE_URL),
    serpApiKey: nonEmpty(env.SERPAPI_KEY),
    debugMode: env.DEBUG_MODE === 'true',
    logFile: nonEmpty(env.LOG_FILE) ?? DEFAULT_LOG_FILE,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    switch (arg) {
      case '--config':
        if (next) settings.configPath = argv[++i];
        break;
      case '--log-file':
        if (next) settings.logFile = argv[++i];
        break;
      case '--api-key':
        if (next) settings.openAiApiKey = argv[++i];
        break;
      case '--model':
        if (next) settings.openAiModel = argv[++i];
        break;
      case '--debug':
        settings.debugMode = true;
        break;
      case '--no-debug':
        settings.debugMode = false;
        break;
      default:
        break;
    }
  }

  return settings;
}

/** Loads `.env` into `process.env` and reads the settings. */
export function loadEnv(argv?: string[]): EnvSettings {
  config();
  return readEnv(argv);
}
