import type { LexicalModel } from "@newsdesk/db";

import type { EmbeddingProvider } from "./provider.js";
import { EmbedderAlreadyFittedError, EmbedderNotFittedError } from "./errors.js";

const TOKEN_PATTERN = /\b\w\w+\b/g;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

export interface LexicalEmbeddingProviderOptions {
  namespace: string;
  maxFeatures: number;
}

/**
 * TF-IDF vectorizer with an explicit fit step. The vocabulary keeps the
 * `maxFeatures` most frequent corpus terms (ties alphabetical) and is frozen
 * after `fit`; vectors always have `maxFeatures` components, L2-normalized.
 */
export class LexicalEmbeddingProvider implements EmbeddingProvider {
  readonly name = "lexical";
  readonly namespace: string;
  private readonly maxFeatures: number;
  private vocabulary: Map<string, number> | null = null;
  private idf: number[] = [];

  constructor(options: LexicalEmbeddingProviderOptions) {
    if (!Number.isInteger(options.maxFeatures) || options.maxFeatures <= 0) {
      throw new RangeError("maxFeatures must be a positive integer");
    }
    this.namespace = options.namespace;
    this.maxFeatures = options.maxFeatures;
  }

  getDimensions(): number {
    return this.maxFeatures;
  }

  isFitted(): boolean {
    return this.vocabulary !== null;
  }

  /** Terms in index order. */
  getVocabulary(): string[] {
    return this.vocabulary ? [...this.vocabulary.keys()] : [];
  }

  fit(corpus: readonly string[]): void {
    if (this.vocabulary) {
      throw new EmbedderAlreadyFittedError(this.name);
    }

    const termCounts = new Map<string, number>();
    const documentFrequency = new Map<string, number>();
    for (const text of corpus) {
      const tokens = tokenize(text);
      for (const token of tokens) {
        termCounts.set(token, (termCounts.get(token) ?? 0) + 1);
      }
      for (const token of new Set(tokens)) {
        documentFrequency.set(token, (documentFrequency.get(token) ?? 0) + 1);
      }
    }

    const selected = [...termCounts.entries()]
      .sort(([termA, countA], [termB, countB]) =>
        countB !== countA ? countB - countA : termA < termB ? -1 : termA > termB ? 1 : 0
      )
      .slice(0, this.maxFeatures)
      .map(([term]) => term)
      .sort();

    const documents = corpus.length;
    this.vocabulary = new Map(selected.map((term, index) => [term, index]));
    this.idf = selected.map((term) => {
      const df = documentFrequency.get(term) ?? 0;
      return Math.log((1 + documents) / (1 + df)) + 1;
    });
  }

  /** Fitted state for persistence. */
  getModel(): LexicalModel {
    if (!this.vocabulary) {
      throw new EmbedderNotFittedError(this.name);
    }
    return {
      dimensions: this.maxFeatures,
      vocabulary: this.getVocabulary(),
      idf: [...this.idf]
    };
  }

  /** Whether `restore` would accept the model for this instance. */
  accepts(model: LexicalModel): boolean {
    return (
      model.dimensions === this.maxFeatures &&
      model.vocabulary.length <= this.maxFeatures &&
      model.vocabulary.length === model.idf.length
    );
  }

  /** Freezes a previously fitted vocabulary in place of `fit`. */
  restore(model: LexicalModel): void {
    if (this.vocabulary) {
      throw new EmbedderAlreadyFittedError(this.name);
    }
    if (!this.accepts(model)) {
      throw new RangeError(
        `Lexical model with ${model.vocabulary.length} terms and ${model.dimensions} dimensions does not fit maxFeatures ${this.maxFeatures}`
      );
    }
    this.vocabulary = new Map(model.vocabulary.map((term, index) => [term, index]));
    this.idf = [...model.idf];
  }

  transform(texts: readonly string[]): number[][] {
    const vocabulary = this.vocabulary;
    if (!vocabulary) {
      throw new EmbedderNotFittedError(this.name);
    }

    return texts.map((text) => {
      const row = new Array<number>(this.maxFeatures).fill(0);
      for (const token of tokenize(text)) {
        const index = vocabulary.get(token);
        if (index !== undefined) {
          row[index] = (row[index] ?? 0) + 1;
        }
      }

      let sumOfSquares = 0;
      for (let i = 0; i < this.idf.length; i++) {
        const weighted = (row[i] ?? 0) * (this.idf[i] ?? 0);
        row[i] = weighted;
        sumOfSquares += weighted * weighted;
      }

      if (sumOfSquares === 0) {
        return row;
      }
      const length = Math.sqrt(sumOfSquares);
      return row.map((value) => value / length);
    });
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    return this.transform(texts);
  }
}
