import { readFileSync } from "node:fs";
import { z } from "zod";

const impactSchema = z.object({
  symbols: z.record(z.string(), z.string()).default({}),
  sectorStocks: z.record(z.string(), z.array(z.string())).default({}),
  regulatorConfidence: z.record(z.string(), z.number().min(0).max(1)).default({}),
  regulatedSymbols: z.array(z.string()).default([]),
  defaultRegulatorConfidence: z.number().min(0).max(1).default(0.4)
});

const lexiconFileSchema = z.object({
  companies: z.record(z.string(), z.string()),
  regulators: z.array(z.string()),
  impact: impactSchema.default({})
});

/** Entity vocabularies supplied by the host; the engine never derives them. */
export interface EntityLexicon {
  companies: string[];
  sectors: string[];
  regulators: string[];
  companySectors: ReadonlyMap<string, string>;
}

export type ImpactLexicon = z.infer<typeof impactSchema>;

export interface Lexicon {
  entities: EntityLexicon;
  impact: ImpactLexicon;
}

function unique(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

export function createEntityLexicon(input: {
  companies: Record<string, string>;
  regulators: readonly string[];
}): EntityLexicon {
  const companySectors = new Map(Object.entries(input.companies));
  return {
    companies: [...companySectors.keys()],
    sectors: unique(companySectors.values()),
    regulators: unique(input.regulators),
    companySectors
  };
}

export function parseLexicon(raw: unknown): Lexicon {
  const result = lexiconFileSchema.safeParse(raw);
  if (!result.success) {
    const formattedErrors = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new Error(`Invalid lexicon: ${formattedErrors}`);
  }
  return {
    entities: createEntityLexicon(result.data),
    impact: result.data.impact
  };
}

export function loadLexicon(path: string): Lexicon {
  const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
  return parseLexicon(raw);
}
