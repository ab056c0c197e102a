import { describe, expect, it } from "vitest";
import { findNamePosition, normalizeWhitespace, stripInlineCitations } from "./textNormalization";

describe("text normalization", () => {
  it("repairs replacement characters between digits and collapses whitespace", () => {
    expect(normalizeWhitespace("Stay of 30\uFFFD90 days\n\n covered")).toBe("Stay of 30-90 days covered");
  });

  it("strips author-year citations from summaries", () => {
    expect(stripInlineCitations("Claims are paid within 30 days (Tan 2021).")).toBe("Claims are paid within 30 days .");
    expect(stripInlineCitations("As Lim et al. (2019) noted, riders cost extra.")).toBe("As  noted, riders cost extra.");
  });

  it("keeps parentheticals without a year", () => {
    expect(stripInlineCitations("Deductible (per policy year) applies.")).toBe("Deductible (per policy year) applies.");
  });

  it("matches whole keys only", () => {
    expect(findNamePosition("Callahan2019", "See Callahan2019a and Callahan2019.")).toBe(22);
    expect(findNamePosition("Callahan2019", "See Callahan2019a only.")).toBe(-1);
  });
});
