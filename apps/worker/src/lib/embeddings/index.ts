import type { AppConfig } from "@newsdesk/config";
import { createLogger } from "@newsdesk/logger";

import { LexicalEmbeddingProvider } from "./lexical-provider.js";
import { HttpEmbeddingProvider, type EmbeddingProvider } from "./provider.js";
import {
  ResilientEmbeddingProvider,
  type LexicalModelRepository
} from "./resilient-provider.js";

const logger = createLogger({ name: "embeddings" });

export function createEmbeddingProvider(
  config: AppConfig,
  options: { corpus?: () => readonly string[]; models?: LexicalModelRepository } = {}
): ResilientEmbeddingProvider {
  const settings = config.embeddings;
  const fallback = new LexicalEmbeddingProvider({
    namespace: settings.lexical.namespace,
    maxFeatures: settings.lexical.maxFeatures
  });

  let primary: EmbeddingProvider | null = null;
  if (settings.provider === "http") {
    if (settings.endpoint) {
      logger.info(
        {
          endpoint: settings.endpoint,
          model: settings.model,
          circuitBreaker: settings.circuitBreaker,
          retry: settings.retry,
          requestTimeout: settings.timeoutMs
        },
        "Using HTTP embedding provider with circuit breaker and retry"
      );
      primary = new HttpEmbeddingProvider({
        endpoint: settings.endpoint,
        model: settings.model,
        dimensions: settings.dimensions,
        namespace: settings.namespace,
        timeoutMs: settings.timeoutMs,
        retry: settings.retry,
        circuitBreaker: settings.circuitBreaker
      });
    } else {
      logger.warn("EMBEDDING_ENDPOINT is not set, using lexical embeddings");
    }
  } else {
    logger.info({ maxFeatures: settings.lexical.maxFeatures }, "Using lexical embedding provider");
  }

  return new ResilientEmbeddingProvider({
    primary,
    fallback,
    corpus: options.corpus,
    models: options.models,
    // Retry the backend once its circuit breaker would let a request through again.
    recoveryIntervalMs: settings.circuitBreaker.timeoutMs
  });
}

export { type EmbeddingProvider, HttpEmbeddingProvider, retryWithBackoff } from "./provider.js";
export { LexicalEmbeddingProvider, tokenize } from "./lexical-provider.js";
export {
  ResilientEmbeddingProvider,
  type LexicalModelRepository
} from "./resilient-provider.js";
export {
  EmbedderAlreadyFittedError,
  EmbedderNotFittedError,
  EmbedderUnavailableError
} from "./errors.js";
export {
  CircuitBreaker,
  CircuitBreakerOpenError,
  CircuitState,
  type CircuitBreakerOptions
} from "./circuit-breaker.js";
