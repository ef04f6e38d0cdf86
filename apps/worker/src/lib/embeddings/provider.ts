import { z } from "zod";

import { createLogger } from "@newsdesk/logger";

import { workerMetrics } from "../../metrics/registry.js";
import {
  CircuitBreaker,
  CircuitBreakerOpenError,
  type CircuitBreakerOptions
} from "./circuit-breaker.js";
import { EmbedderUnavailableError } from "./errors.js";

const logger = createLogger({ name: "embeddings" });

/**
 * Text → fixed-dimension vector. Every strategy writes its vectors to its own
 * vector-index namespace so dimensions never mix.
 */
export interface EmbeddingProvider {
  readonly name: string;
  readonly namespace: string;
  getDimensions(): number;
  /** One vector per input text, in input order. */
  embed(texts: readonly string[]): Promise<number[][]>;
}

export interface RetryOptions {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 8000,
  backoffMultiplier: 2
};

export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {},
  providerName = "http"
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= opts.maxRetries) {
        throw error;
      }

      workerMetrics.embeddingRetries.inc({ provider: providerName });
      const delay = Math.min(
        opts.initialDelayMs * Math.pow(opts.backoffMultiplier, attempt),
        opts.maxDelayMs
      );
      logger.debug(
        { attempt: attempt + 1, maxRetries: opts.maxRetries, delayMs: delay },
        "Retrying embedding request after failure"
      );
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}

const embeddingResponseSchema = z.object({
  embeddings: z.array(z.array(z.number().finite()))
});

export interface HttpEmbeddingProviderOptions {
  endpoint: string;
  model: string;
  dimensions: number;
  namespace: string;
  timeoutMs?: number;
  retry?: Partial<RetryOptions>;
  circuitBreaker?: Partial<CircuitBreakerOptions>;
}

/**
 * Pretrained sentence-embedding model served over HTTP:
 * `POST {texts, model}` → `{embeddings: number[][]}`.
 * Every failure (transport, status, malformed payload, open circuit) is
 * reported as an `EmbedderUnavailableError`.
 */
export class HttpEmbeddingProvider implements EmbeddingProvider {
  readonly name = "http";
  readonly namespace: string;
  private readonly endpoint: string;
  private readonly model: string;
  private readonly dimensions: number;
  private readonly timeoutMs: number;
  private readonly retryOptions: Partial<RetryOptions>;
  private readonly circuitBreaker: CircuitBreaker;

  constructor(options: HttpEmbeddingProviderOptions) {
    this.endpoint = options.endpoint;
    this.model = options.model;
    this.dimensions = options.dimensions;
    this.namespace = options.namespace;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.retryOptions = options.retry ?? {};
    this.circuitBreaker = new CircuitBreaker({
      ...options.circuitBreaker,
      onStateChange: (state) => {
        logger.info({ state, endpoint: this.endpoint }, "Circuit breaker state changed");
        options.circuitBreaker?.onStateChange?.(state);
      }
    });
  }

  getDimensions(): number {
    return this.dimensions;
  }

  getCircuitBreakerState() {
    return this.circuitBreaker.getState();
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const timer = workerMetrics.embeddingDuration.startTimer({ provider: this.name });
    try {
      const vectors = await this.circuitBreaker.execute(() =>
        retryWithBackoff(() => this.fetchEmbeddings(texts), this.retryOptions, this.name)
      );
      workerMetrics.embeddingRequests.inc({ provider: this.name, status: "success" });
      return vectors;
    } catch (error) {
      const status =
        error instanceof CircuitBreakerOpenError ? "circuit_breaker_open" : "error";
      workerMetrics.embeddingRequests.inc({ provider: this.name, status });
      throw new EmbedderUnavailableError(
        `Embedding backend at ${this.endpoint} is unavailable`,
        { cause: error }
      );
    } finally {
      timer();
      workerMetrics.embeddingCircuitBreakerState.set(
        { provider: this.name },
        this.circuitBreaker.getStateValue()
      );
    }
  }

  private async fetchEmbeddings(texts: readonly string[]): Promise<number[][]> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(this.endpoint, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ texts, model: this.model }),
        signal: controller.signal
      });

      if (!response.ok) {
        throw new Error(`Embedding API returned ${response.status}`);
      }

      const parsed = embeddingResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error("Invalid embedding response format");
      }

      const { embeddings } = parsed.data;
      if (embeddings.length !== texts.length) {
        throw new Error(
          `Embedding API returned ${embeddings.length} vectors for ${texts.length} texts`
        );
      }
      for (const vector of embeddings) {
        if (vector.length !== this.dimensions) {
          throw new Error(
            `Embedding API returned dimension ${vector.length}, expected ${this.dimensions}`
          );
        }
      }
      return embeddings;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
