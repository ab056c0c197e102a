import { describe, expect, it } from "vitest";
import { EvidenceCache } from "./evidenceCache";
import { makeChunk, makeSummary } from "../../test/helpers";

const shieldA = makeChunk({ id: "a", docname: "Shield2024", pages: [3, 4] });
const shieldB = makeChunk({ id: "b", docname: "Shield2024", pages: [10, 12] });
const care = makeChunk({ id: "c", docname: "Care2023", pages: [1, 2], citation: "Care Plus Policy Wording 2023" });
const zero = makeChunk({ id: "z", docname: "Zed2020", pages: [5, 5] });

describe("EvidenceCache", () => {
  it("drops zero scores and orders by score then name", () => {
    const cache = new EvidenceCache();
    cache.addBatch([
      makeSummary({ chunk: shieldB, score: 7 }),
      makeSummary({ chunk: zero, score: 0 }),
      makeSummary({ chunk: care, score: 7 }),
      makeSummary({ chunk: shieldA, score: 9 })
    ]);

    expect(cache.filtered().map((summary) => summary.chunk.name)).toEqual([
      "Shield2024 pages 3-4",
      "Care2023 pages 1-2",
      "Shield2024 pages 10-12"
    ]);
    expect(cache.filtered(2)).toHaveLength(2);
    expect(cache.size).toBe(4);
  });

  it("never returns non-positive scores for arbitrary score lists", () => {
    const scores = [3, -1, 0, 10, 3, 0, 7, 1];
    const cache = new EvidenceCache();
    cache.addBatch(
      scores.map((score, index) =>
        makeSummary({ chunk: makeChunk({ id: `s-${index}`, docname: `Doc${2000 + index}` }), score })
      )
    );

    const filtered = cache.filtered();
    expect(filtered.every((summary) => summary.relevanceScore > 0)).toBe(true);
    expect(filtered.map((summary) => summary.relevanceScore)).toEqual([10, 7, 3, 3, 1]);
    expect(filtered.map((summary) => summary.chunk.name).slice(2, 4)).toEqual([
      "Doc2000 pages 1-2",
      "Doc2004 pages 1-2"
    ]);
  });

  it("renders names, summaries, numbered quotes and valid keys", () => {
    const cache = new EvidenceCache();
    cache.addBatch([
      makeSummary({
        chunk: care,
        score: 6,
        summary: "Covers day surgery.",
        points: [
          { quote: "Day surgery is covered", point: "Day surgery is covered." },
          { quote: "up to S$1,000", point: "Capped at S$1,000." }
        ]
      }),
      makeSummary({ chunk: shieldA, score: 8, summary: "Covers B1 wards." })
    ]);

    expect(cache.renderContext()).toBe(
      "Shield2024 pages 3-4:\nCovers B1 wards.\nFrom Shield2024 policy wording\n\n" +
        "Care2023 pages 1-2:\nCovers day surgery.\nRelevant quotes:\n" +
        "quote1: \"Day surgery is covered\"\nquote2: \"up to S$1,000\"\nFrom Care Plus Policy Wording 2023\n\n" +
        "Valid Keys: Shield2024 pages 3-4, Care2023 pages 1-2"
    );
  });

  it("clears on reset", () => {
    const cache = new EvidenceCache();
    cache.addBatch([makeSummary({ chunk: shieldA, score: 5 })]);
    cache.reset();

    expect(cache.size).toBe(0);
    expect(cache.renderContext()).toBe("\n\nValid Keys: ");
  });
});
