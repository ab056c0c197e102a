import Papa from "papaparse";

export type CsvTable = {
  headers: string[];
  rows: Array<Record<string, string>>;
};

const BOM = /^\uFEFF/;

// Repeated headers become "name (2)", "name (3)"; blank ones "Column N".
function headerNames(raw: readonly string[]): string[] {
  const seen = new Map<string, number>();

  return raw.map((value, index) => {
    const name = value.replace(BOM, "").trim() || `Column ${index + 1}`;
    const count = (seen.get(name) ?? 0) + 1;
    seen.set(name, count);
    return count === 1 ? name : `${name} (${count})`;
  });
}

/**
 * Parses `text` into rows keyed by header, with every value trimmed and blank
 * lines skipped. Throws when the table is empty or lacks one of `columns`.
 */
export function readCsvTable(text: string, options: { source: string; columns: readonly string[] }): CsvTable {
  const parsed = Papa.parse<string[]>(text.replace(BOM, ""), {
    header: false,
    delimiter: ",",
    skipEmptyLines: "greedy"
  });

  if (parsed.errors.length > 0) {
    throw new Error(`Failed to parse ${options.source}: ${parsed.errors[0].message}`);
  }

  const [headerRow, ...records] = parsed.data;
  if (!headerRow) {
    throw new Error(`${options.source} is empty`);
  }

  const headers = headerNames(headerRow.map((value) => String(value ?? "")));
  const missing = options.columns.filter((column) => !headers.includes(column));
  if (missing.length > 0) {
    throw new Error(`${options.source} is missing column(s): ${missing.join(", ")}`);
  }

  const rows = records.map((values) => {
    const row: Record<string, string> = {};
    headers.forEach((header, index) => {
      row[header] = String(values[index] ?? "").trim();
    });
    return row;
  });

  return { headers, rows };
}
