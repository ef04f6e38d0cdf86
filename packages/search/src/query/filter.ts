import type { QueryIntent } from "../types.js";

export interface CandidateEntities {
  companies: readonly string[];
  sectors: readonly string[];
  regulators: readonly string[];
}

export interface EntityMatch {
  companies: string[];
  sectors: string[];
  regulators: string[];
}

export const NO_ENTITIES: CandidateEntities = {
  companies: [],
  sectors: [],
  regulators: []
};

function intersect(wanted: readonly string[], present: readonly string[]): string[] {
  const presentLower = new Set(present.map((value) => value.toLowerCase()));
  return wanted.filter((value) => presentLower.has(value.toLowerCase()));
}

/** Entity names from the intent that the candidate is also tagged with. */
export function matchEntities(intent: QueryIntent, tags: CandidateEntities): EntityMatch {
  return {
    companies: intersect(intent.companies, tags.companies),
    sectors: intersect(intent.sectors, tags.sectors),
    regulators: intersect(intent.regulators, tags.regulators)
  };
}

export function passesStructuredFilter(
  intent: QueryIntent,
  match: EntityMatch,
  score: number,
  themeScoreThreshold: number
): boolean {
  switch (intent.queryType) {
    case "company":
      return match.companies.length > 0 || match.sectors.length > 0;
    case "sector":
      return match.sectors.length > 0;
    case "regulator":
      return match.regulators.length > 0;
    case "theme":
      return score > themeScoreThreshold;
  }
}

export function explainMatch(match: EntityMatch, score: number): string {
  const parts: string[] = [];
  if (match.companies.length > 0) {
    parts.push(`companies: ${match.companies.join(", ")}`);
  }
  if (match.sectors.length > 0) {
    parts.push(`sectors: ${match.sectors.join(", ")}`);
  }
  if (match.regulators.length > 0) {
    parts.push(`regulators: ${match.regulators.join(", ")}`);
  }

  if (parts.length === 0) {
    return `Semantically similar to the query (score ${score.toFixed(3)})`;
  }
  return `Matched ${parts.join("; ")}`;
}
