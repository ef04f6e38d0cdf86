import type { ArticleImpact, EntityTags, ImpactedStock } from "@newsdesk/db";
import type { ImpactLexicon } from "@newsdesk/search";

export const DIRECT_CONFIDENCE = 1.0;
export const SECTOR_CONFIDENCE = 0.7;

/**
 * Maps an article's entity tags to the stock symbols it may move. A symbol
 * reached several ways keeps its highest-confidence reason; on a tie the
 * first one found (direct, then sector, then regulatory) stays.
 */
export function analyzeImpact(tags: EntityTags, lexicon: ImpactLexicon): ArticleImpact {
  const candidates: ImpactedStock[] = [];

  for (const company of tags.companies) {
    const symbol = lexicon.symbols[company];
    if (symbol) {
      candidates.push({ symbol, confidence: DIRECT_CONFIDENCE, type: "direct", company });
    }
  }

  for (const sector of tags.sectors) {
    for (const symbol of lexicon.sectorStocks[sector] ?? []) {
      candidates.push({ symbol, confidence: SECTOR_CONFIDENCE, type: "sector", sector });
    }
  }

  for (const regulator of tags.regulators) {
    const confidence =
      lexicon.regulatorConfidence[regulator] ?? lexicon.defaultRegulatorConfidence;
    for (const symbol of lexicon.regulatedSymbols) {
      candidates.push({ symbol, confidence, type: "regulatory", regulator });
    }
  }

  const strongest = new Map<string, ImpactedStock>();
  for (const candidate of candidates) {
    const current = strongest.get(candidate.symbol);
    if (!current || candidate.confidence > current.confidence) {
      strongest.set(candidate.symbol, candidate);
    }
  }

  return { articleId: tags.articleId, impactedStocks: [...strongest.values()] };
}
