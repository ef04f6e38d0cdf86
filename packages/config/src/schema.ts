import { z } from "zod";

const databaseSchema = z.object({
  path: z.string().min(1).default("data/newsdesk.db")
});

const lexiconSchema = z.object({
  path: z.string().min(1).default("data/lexicon.json")
});

const embeddingsSchema = z.object({
  provider: z.enum(["http", "lexical"]).default("lexical"),
  endpoint: z.string().url().optional(),
  model: z.string().default("all-MiniLM-L6-v2"),
  dimensions: z.coerce.number().int().positive().default(384),
  namespace: z.string().min(1).default("sent-emb"),
  timeoutMs: z.coerce.number().int().positive().default(10_000),
  lexical: z.object({
    namespace: z.string().min(1).default("tfidf"),
    maxFeatures: z.coerce.number().int().positive().default(256)
  }),
  retry: z.object({
    maxRetries: z.coerce.number().int().min(0).default(3),
    initialDelayMs: z.coerce.number().int().min(0).default(1000),
    maxDelayMs: z.coerce.number().int().min(0).default(8000)
  }),
  circuitBreaker: z.object({
    failureThreshold: z.coerce.number().int().positive().default(5),
    successThreshold: z.coerce.number().int().positive().default(3),
    timeoutMs: z.coerce.number().int().positive().default(30_000)
  })
});

const monitoringSchema = z.object({
  enabled: z.coerce.boolean().default(true),
  metricsPort: z.coerce.number().int().min(1).max(65535).default(9300),
  metricsHost: z.string().default("0.0.0.0")
});

export const configSchema = z.object({
  nodeEnv: z
    .enum(["development", "test", "production"])
    .default("development"),
  database: databaseSchema,
  lexicon: lexiconSchema,
  embeddings: embeddingsSchema,
  clustering: z.object({
    enabled: z.coerce.boolean().default(true),
    similarityThreshold: z.coerce.number().min(0).max(1).default(0.82),
    intervalMs: z.coerce.number().int().positive().default(20 * 60 * 1000) // 20 minutes
  }),
  retrieval: z.object({
    searchK: z.coerce.number().int().positive().max(100).default(10),
    themeScoreThreshold: z.coerce.number().min(-1).max(1).default(0.5)
  }),
  monitoring: monitoringSchema
});

export type AppConfig = z.infer<typeof configSchema>;
