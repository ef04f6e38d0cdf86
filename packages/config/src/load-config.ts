import { config as loadDotenv } from "dotenv";
import type { ZodIssue } from "zod";

import { configSchema, type AppConfig } from "./schema.js";

let cachedConfig: AppConfig | null = null;

function coerceBoolean(value: string | undefined) {
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.toLowerCase();
  if (["false", "0", "no", "off"].includes(normalized)) {
    return false;
  }
  if (["true", "1", "yes", "on"].includes(normalized)) {
    return true;
  }
  return undefined;
}

/**
 * Builds the application config from environment variables.
 *
 * Without an explicit `env` the process environment is used (after loading
 * `.env`) and the result is cached for the lifetime of the process.
 */
export function loadConfig(options: { env?: NodeJS.ProcessEnv } = {}): AppConfig {
  if (!options.env && cachedConfig) {
    return cachedConfig;
  }

  if (!options.env) {
    loadDotenv();
  }

  const env = options.env ?? process.env;

  const result = configSchema.safeParse({
    nodeEnv: env.NODE_ENV,
    database: {
      path: env.DATABASE_PATH
    },
    lexicon: {
      path: env.LEXICON_PATH
    },
    embeddings: {
      provider: env.EMBEDDING_PROVIDER,
      endpoint: env.EMBEDDING_ENDPOINT,
      model: env.EMBEDDING_MODEL,
      dimensions: env.EMBEDDING_DIMENSIONS,
      namespace: env.EMBEDDING_NAMESPACE,
      timeoutMs: env.EMBEDDING_TIMEOUT_MS,
      lexical: {
        namespace: env.EMBEDDING_LEXICAL_NAMESPACE,
        maxFeatures: env.EMBEDDING_LEXICAL_MAX_FEATURES
      },
      retry: {
        maxRetries: env.EMBEDDING_MAX_RETRIES,
        initialDelayMs: env.EMBEDDING_RETRY_INITIAL_DELAY_MS,
        maxDelayMs: env.EMBEDDING_RETRY_MAX_DELAY_MS
      },
      circuitBreaker: {
        failureThreshold: env.EMBEDDING_CIRCUIT_BREAKER_FAILURE_THRESHOLD,
        successThreshold: env.EMBEDDING_CIRCUIT_BREAKER_SUCCESS_THRESHOLD,
        timeoutMs: env.EMBEDDING_CIRCUIT_BREAKER_TIMEOUT_MS
      }
    },
    clustering: {
      enabled: coerceBoolean(env.CLUSTERING_ENABLED ?? "true"),
      similarityThreshold: env.CLUSTERING_SIMILARITY_THRESHOLD,
      intervalMs: env.CLUSTERING_INTERVAL_MS
    },
    retrieval: {
      searchK: env.RETRIEVAL_SEARCH_K,
      themeScoreThreshold: env.RETRIEVAL_THEME_SCORE_THRESHOLD
    },
    monitoring: {
      enabled: coerceBoolean(env.MONITORING_ENABLED),
      metricsPort: env.MONITORING_METRICS_PORT,
      metricsHost: env.MONITORING_METRICS_HOST
    }
  });

  if (!result.success) {
    const formattedErrors = result.error.issues
      .map((issue: ZodIssue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new Error(`Invalid configuration: ${formattedErrors}`);
  }

  if (!options.env) {
    cachedConfig = result.data;
  }
  return result.data;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
