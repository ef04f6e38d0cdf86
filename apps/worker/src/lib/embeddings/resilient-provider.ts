import type { LexicalModel } from "@newsdesk/db";
import { createLogger, type Logger } from "@newsdesk/logger";

import { workerMetrics } from "../../metrics/registry.js";
import type { LexicalEmbeddingProvider } from "./lexical-provider.js";
import type { EmbeddingProvider } from "./provider.js";

/** Where fitted vocabularies outlive the process; `LexicalModelStore` in production. */
export interface LexicalModelRepository {
  load(namespace: string): LexicalModel | null;
  replace(namespace: string, model: LexicalModel): void;
}

export interface ResilientEmbeddingProviderOptions {
  /** Pretrained backend; `null` when it could not be constructed. */
  primary: EmbeddingProvider | null;
  fallback: LexicalEmbeddingProvider;
  /** Texts the fallback is fitted on the first time it is needed. */
  corpus?: () => readonly string[];
  models?: LexicalModelRepository;
  /** How long to stay on the fallback before trying the backend again. Never, when omitted. */
  recoveryIntervalMs?: number;
  now?: () => number;
  logger?: Logger;
}

/**
 * Uses the pretrained backend while it works and switches to the lexical
 * fallback when it fails. After `recoveryIntervalMs` the next call tries the
 * backend again and switches back if it answers. Callers never see the
 * backend's failure; they should read `namespace` after each `embed` call
 * since it changes with the active strategy.
 */
export class ResilientEmbeddingProvider implements EmbeddingProvider {
  private readonly primary: EmbeddingProvider | null;
  private readonly fallback: LexicalEmbeddingProvider;
  private readonly corpus: () => readonly string[];
  private readonly models: LexicalModelRepository | null;
  private readonly recoveryIntervalMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private degraded: boolean;
  private retryPrimaryAt = Number.POSITIVE_INFINITY;

  constructor(options: ResilientEmbeddingProviderOptions) {
    this.primary = options.primary;
    this.fallback = options.fallback;
    this.corpus = options.corpus ?? (() => []);
    this.models = options.models ?? null;
    this.recoveryIntervalMs = options.recoveryIntervalMs ?? Number.POSITIVE_INFINITY;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger({ name: "embeddings" });
    this.degraded = options.primary === null;
  }

  private get active(): EmbeddingProvider {
    return !this.degraded && this.primary ? this.primary : this.fallback;
  }

  get name(): string {
    return this.active.name;
  }

  get namespace(): string {
    return this.active.namespace;
  }

  getDimensions(): number {
    return this.active.getDimensions();
  }

  isUsingFallback(): boolean {
    return this.active === this.fallback;
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    if (this.primary && (!this.degraded || this.now() >= this.retryPrimaryAt)) {
      try {
        const vectors = await this.primary.embed(texts);
        if (this.degraded) {
          this.recover();
        }
        return vectors;
      } catch (error) {
        this.degrade(error);
      }
    }

    return this.embedWithFallback(texts);
  }

  private degrade(error: unknown): void {
    const reason = error instanceof Error ? error.name : "unknown";
    this.retryPrimaryAt = this.now() + this.recoveryIntervalMs;
    workerMetrics.embeddingFallbacks.inc({ reason });

    if (this.degraded) {
      this.logger.debug(
        { error, from: this.primary?.name },
        "Pretrained embedding backend still failing, staying on lexical fallback"
      );
      return;
    }

    this.degraded = true;
    this.logger.warn(
      { error, from: this.primary?.name, to: this.fallback.name },
      "Pretrained embedding backend failed, switching to lexical fallback"
    );
  }

  private recover(): void {
    this.degraded = false;
    this.retryPrimaryAt = Number.POSITIVE_INFINITY;
    workerMetrics.embeddingRecoveries.inc();
    this.logger.info(
      { from: this.fallback.name, to: this.primary?.name },
      "Pretrained embedding backend answered again, leaving lexical fallback"
    );
  }

  private async embedWithFallback(texts: readonly string[]): Promise<number[][]> {
    if (!this.fallback.isFitted()) {
      this.prepareFallback(texts);
    }
    return this.fallback.embed(texts);
  }

  private prepareFallback(texts: readonly string[]): void {
    const namespace = this.fallback.namespace;
    const saved = this.models?.load(namespace) ?? null;

    if (saved && this.fallback.accepts(saved)) {
      this.fallback.restore(saved);
      this.logger.info(
        { namespace, vocabularySize: saved.vocabulary.length },
        "Restored lexical embedding vocabulary"
      );
      return;
    }
    if (saved) {
      this.logger.warn(
        { namespace, dimensions: saved.dimensions, maxFeatures: this.fallback.getDimensions() },
        "Stored lexical vocabulary has other dimensions, refitting"
      );
    }

    const corpus = this.corpus();
    this.fallback.fit(corpus.length > 0 ? corpus : texts);
    this.models?.replace(namespace, this.fallback.getModel());
    this.logger.info(
      {
        namespace,
        documents: corpus.length > 0 ? corpus.length : texts.length,
        vocabularySize: this.fallback.getVocabulary().length
      },
      "Fitted lexical embedding vocabulary"
    );
  }
}
