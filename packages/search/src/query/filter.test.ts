import { describe, expect, it } from "vitest";

import type { QueryIntent } from "../types.js";
import { explainMatch, matchEntities, passesStructuredFilter } from "./filter.js";

const companyIntent: QueryIntent = {
  queryType: "company",
  companies: ["HDFC Bank"],
  sectors: ["Banking"],
  regulators: []
};

describe("matchEntities", () => {
  it("intersects the intent with the candidate's tags, ignoring case", () => {
    const match = matchEntities(companyIntent, {
      companies: ["hdfc bank", "TCS"],
      sectors: ["Banking"],
      regulators: ["RBI"]
    });

    expect(match).toEqual({ companies: ["HDFC Bank"], sectors: ["Banking"], regulators: [] });
  });
});

describe("passesStructuredFilter", () => {
  const none = { companies: [], sectors: [], regulators: [] };

  it("keeps company candidates matched by company or by sector", () => {
    expect(
      passesStructuredFilter(companyIntent, { ...none, companies: ["HDFC Bank"] }, 0.1, 0.5)
    ).toBe(true);
    expect(
      passesStructuredFilter(companyIntent, { ...none, sectors: ["Banking"] }, 0.1, 0.5)
    ).toBe(true);
    expect(passesStructuredFilter(companyIntent, none, 0.99, 0.5)).toBe(false);
  });

  it("requires a sector match for sector queries", () => {
    const intent: QueryIntent = { ...companyIntent, queryType: "sector", companies: [] };
    expect(passesStructuredFilter(intent, { ...none, companies: ["HDFC Bank"] }, 0.9, 0.5)).toBe(
      false
    );
    expect(passesStructuredFilter(intent, { ...none, sectors: ["Banking"] }, 0.1, 0.5)).toBe(true);
  });

  it("requires a regulator match for regulator queries", () => {
    const intent: QueryIntent = {
      queryType: "regulator",
      companies: [],
      sectors: [],
      regulators: ["RBI"]
    };
    expect(passesStructuredFilter(intent, none, 0.9, 0.5)).toBe(false);
    expect(passesStructuredFilter(intent, { ...none, regulators: ["RBI"] }, 0.1, 0.5)).toBe(true);
  });

  it("keeps theme candidates strictly above the score threshold", () => {
    const intent: QueryIntent = { queryType: "theme", companies: [], sectors: [], regulators: [] };
    expect(passesStructuredFilter(intent, none, 0.51, 0.5)).toBe(true);
    expect(passesStructuredFilter(intent, none, 0.5, 0.5)).toBe(false);
  });
});

describe("explainMatch", () => {
  it("lists the matched entity classes", () => {
    expect(
      explainMatch({ companies: ["HDFC Bank"], sectors: ["Banking"], regulators: [] }, 0.4)
    ).toBe("Matched companies: HDFC Bank; sectors: Banking");
  });

  it("falls back to a semantic note", () => {
    expect(explainMatch({ companies: [], sectors: [], regulators: [] }, 0.73456)).toBe(
      "Semantically similar to the query (score 0.735)"
    );
  });
});
