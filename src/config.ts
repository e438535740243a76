/**
 * Environment configuration loader for the marketing crew.
 *
 * The configuration is parsed once at process start (server or CLI) and the
 * resulting object is passed explicitly to tool bindings, agents, the crew
 * runner and pipeline entry points. Nothing else reads credentials from the
 * environment at call time.
 */
import { ConfigError } from './errors';

export type LlmProvider = 'deepseek' | 'openai' | 'anthropic';

export const LLM_PROVIDERS: readonly LlmProvider[] = ['deepseek', 'openai', 'anthropic'];

/**
 * Sampling profile shared by agents with the same temperament.
 */
export interface LlmProfile {
  temperature: number;
}

export type LlmProfileName = 'creative' | 'analytical';

/**
 * Configuration schema for the application.
 */
export interface Config {
  /** NODE_ENV, defaults to development */
  env: string;

  /** Remote access server */
  server: {
    port: number;
    host: string;
    /** Interval between SSE keep-alive pings */
    keepAliveMs: number;
  };

  /** Model provider used by every agent */
  llm: {
    provider: LlmProvider;
    model: string;
    apiKey: string | undefined;
    /** OpenAI-compatible base URL (always ends with a slash) */
    baseUrl: string | undefined;
    maxTokens: number;
    profiles: Record<LlmProfileName, LlmProfile>;
  };

  search: {
    tavilyApiKey: string | undefined;
    serperApiKey: string | undefined;
  };

  social: {
    bufferAccessToken: string | undefined;
  };

  email: {
    mailerliteApiKey: string | undefined;
    fromName: string;
    fromEmail: string | undefined;
  };

  notifications: {
    telegramBotToken: string | undefined;
    telegramChatId: string | undefined;
  };

  /** Root of the artifact directory tree */
  output: {
    dir: string;
  };

  http: {
    timeoutMs: number;
  };

  agents: {
    maxIterPerTask: number;
  };

  /** OpenTelemetry configuration */
  telemetry: {
    enabled: boolean;
    serviceName: string;
    otlpEndpoint: string;
  };
}

export type Env = Record<string, string | undefined>;

const DEFAULT_MODELS: Record<LlmProvider, string> = {
  deepseek: 'deepseek-chat',
  openai: 'gpt-4o-mini',
  anthropic: 'claude-sonnet-4-20250514',
};

/**
 * Environment variable holding the API key of each provider.
 */
export const API_KEY_VARS: Record<LlmProvider, string> = {
  deepseek: 'DEEPSEEK_API_KEY',
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
};

const DEEPSEEK_BASE_URL = 'https://api.deepseek.com/v1/';

/**
 * Parse a boolean environment variable.
 */
function parseBool(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Parse an integer environment variable.
 */
function parseInt(value: string | undefined, defaultValue: number): number {
  if (value === undefined) return defaultValue;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Treat blank values the same as unset ones.
 */
function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function isProvider(value: string): value is LlmProvider {
  return LLM_PROVIDERS.some((provider) => provider === value);
}

function parseProvider(value: string | undefined): LlmProvider {
  const provider = (optional(value) ?? 'deepseek').toLowerCase();
  if (!isProvider(provider)) {
    throw new ConfigError([`LLM_PROVIDER must be one of ${LLM_PROVIDERS.join(', ')} (got "${provider}")`]);
  }
  return provider;
}

function withTrailingSlash(url: string | undefined): string | undefined {
  if (!url) return undefined;
  return url.endsWith('/') ? url : `${url}/`;
}

function resolveBaseUrl(provider: LlmProvider, env: Env): string | undefined {
  const explicit = optional(env.LLM_BASE_URL);
  if (explicit) return withTrailingSlash(explicit);
  if (provider === 'deepseek') {
    return withTrailingSlash(optional(env.DEEPSEEK_BASE_URL) ?? DEEPSEEK_BASE_URL);
  }
  return undefined;
}

/**
 * Build the configuration from an environment record.
 *
 * Provides defaults for local development; credentials stay undefined when
 * unset so that bindings can decide between skipping and failing.
 */
export function loadConfig(env: Env = process.env): Config {
  const provider = parseProvider(env.LLM_PROVIDER);

  return Object.freeze({
    env: optional(env.NODE_ENV) ?? 'development',

    server: {
      port: parseInt(env.PORT, 8080),
      host: optional(env.HOST) ?? '0.0.0.0',
      keepAliveMs: parseInt(env.SSE_KEEP_ALIVE_MS, 15_000),
    },

    llm: {
      provider,
      model: optional(env.LLM_MODEL) ?? DEFAULT_MODELS[provider],
      apiKey: optional(env[API_KEY_VARS[provider]]),
      baseUrl: resolveBaseUrl(provider, env),
      maxTokens: parseInt(env.LLM_MAX_TOKENS, 4096),
      profiles: {
        creative: { temperature: 0.7 },
        analytical: { temperature: 0.1 },
      },
    },

    search: {
      tavilyApiKey: optional(env.TAVILY_API_KEY),
      serperApiKey: optional(env.SERPER_API_KEY),
    },

    social: {
      bufferAccessToken: optional(env.BUFFER_ACCESS_TOKEN),
    },

    email: {
      mailerliteApiKey: optional(env.MAILERLITE_API_KEY),
      fromName: optional(env.MAILERLITE_FROM_NAME) ?? 'Marketing Bot',
      fromEmail: optional(env.MAILERLITE_FROM_EMAIL),
    },

    notifications: {
      telegramBotToken: optional(env.TELEGRAM_BOT_TOKEN),
      telegramChatId: optional(env.TELEGRAM_CHAT_ID),
    },

    output: {
      dir: optional(env.OUTPUT_DIR) ?? 'output',
    },

    http: {
      timeoutMs: parseInt(env.HTTP_TIMEOUT_MS, 30_000),
    },

    agents: {
      maxIterPerTask: parseInt(env.AGENT_MAX_ITER, 25),
    },

    telemetry: {
      enabled: parseBool(env.OTEL_ENABLED, false),
      serviceName: optional(env.OTEL_SERVICE_NAME) ?? 'marketing-crew',
      otlpEndpoint: optional(env.OTEL_EXPORTER_OTLP_TRACES_ENDPOINT) ?? 'http://localhost:4318/v1/traces',
    },
  });
}

/**
 * Validate that required configuration is present.
 * Call this before running a pipeline to fail fast if misconfigured.
 */
export function validateConfig(config: Config): void {
  const errors: string[] = [];

  if (!config.llm.apiKey) {
    errors.push(`${API_KEY_VARS[config.llm.provider]} is required for provider ${config.llm.provider}`);
  }
  if (config.server.port <= 0 || config.server.port > 65_535) {
    errors.push(`PORT must be between 1 and 65535 (got ${config.server.port})`);
  }
  if (config.agents.maxIterPerTask < 1) {
    errors.push('AGENT_MAX_ITER must be at least 1');
  }

  if (errors.length > 0) {
    throw new ConfigError(errors);
  }
}
