import { describe, expect, it } from "vitest";
import { readCsvTable } from "./csv";

describe("readCsvTable", () => {
  it("handles BOM, quoted commas, and quoted newlines", () => {
    const csv =
      "\uFEFFpolicy,riders\n" +
      '"Harbor Shield","Care Plus, Care Lite"\n' +
      '"Lumen Health","First line\nSecond line"\n';

    const table = readCsvTable(csv, { source: "plans.csv", columns: ["policy", "riders"] });

    expect(table.headers).toEqual(["policy", "riders"]);
    expect(table.rows).toEqual([
      { policy: "Harbor Shield", riders: "Care Plus, Care Lite" },
      { policy: "Lumen Health", riders: "First line\nSecond line" }
    ]);
  });

  it("disambiguates duplicate headers and skips blank lines", () => {
    const table = readCsvTable("plan,plan,\nA,B, C \n\n  \n", { source: "plans.csv", columns: [] });

    expect(table.headers).toEqual(["plan", "plan (2)", "Column 3"]);
    expect(table.rows).toEqual([{ plan: "A", "plan (2)": "B", "Column 3": "C" }]);
  });

  it("fills short rows with empty values", () => {
    const table = readCsvTable("policy,document_id\nHarbor Shield\n", { source: "policies.csv", columns: ["policy"] });

    expect(table.rows).toEqual([{ policy: "Harbor Shield", document_id: "" }]);
  });

  it("reports missing columns by name", () => {
    expect(() =>
      readCsvTable("policy,plan\nHarbor Shield,Standard\n", {
        source: "plans.csv",
        columns: ["policy", "coverage", "riders"]
      })
    ).toThrow("plans.csv is missing column(s): coverage, riders");
  });

  it("rejects an empty file", () => {
    expect(() => readCsvTable("\n\n", { source: "policies.csv", columns: ["policy"] })).toThrow("policies.csv is empty");
  });
});
