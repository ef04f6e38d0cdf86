import type { EntityLexicon } from "../lexicon.js";
import type { QueryIntent } from "../types.js";

/**
 * Classifies a free-text query by case-insensitive substring matches against
 * the entity lexicon. Precedence: company, sector, regulator, then theme.
 */
export class QueryInterpreter {
  constructor(private readonly lexicon: EntityLexicon) {}

  interpret(queryText: string): QueryIntent {
    const haystack = queryText.toLowerCase();
    const mentioned = (name: string) =>
      name.length > 0 && haystack.includes(name.toLowerCase());

    const companies = this.lexicon.companies.filter(mentioned);
    const regulators = this.lexicon.regulators.filter(mentioned);

    const companySectors = new Set<string>();
    for (const company of companies) {
      const sector = this.lexicon.companySectors.get(company);
      if (sector) {
        companySectors.add(sector);
      }
    }

    if (companies.length > 0) {
      // Narrowed on purpose: sector names that merely appear in the text are dropped.
      return {
        queryType: "company",
        companies,
        sectors: [...companySectors],
        regulators
      };
    }

    const sectors = this.lexicon.sectors.filter(mentioned);
    if (sectors.length > 0) {
      return { queryType: "sector", companies, sectors, regulators };
    }
    if (regulators.length > 0) {
      return { queryType: "regulator", companies, sectors, regulators };
    }
    return { queryType: "theme", companies, sectors, regulators };
  }
}
