import { readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { readCsvTable } from "@/lib/csv";

export type PolicyPlan = {
  plan: string;
  coverage: string;
  riders: string[];
};

type PolicyEntry = {
  name: string;
  documentIds: string[];
  plans: PolicyPlan[];
};

export const DEFAULT_DATA_DIR = fileURLToPath(new URL("../../data/", import.meta.url));

const COVERAGE_MEANINGS: Record<string, string> = {
  Basic: "(basic coverage sized for subsidised wards in public hospitals)",
  "Standard Class B1": "(standardised plan covering Class B1 wards in public hospitals)",
  "Class B1": "(Class B1 wards in public hospitals)",
  "Class A": "(Class A wards in public hospitals)",
  Private: "(private hospitals)"
};

const GENERAL_HEADER =
  "Each insurance offers several different plans and riders.\n" +
  "An insurance rider is an optional add-on to an insurance policy that provides additional benefits or coverage.\n" +
  "Riders can be used to customize an insurance policy to meet the needs of the insured.";

function normalizePolicyName(value: string): string {
  return value.trim().replace(/\s+/g, " ").toLowerCase();
}

function renderPlan(plan: PolicyPlan): string {
  const coverage = `${plan.coverage} ${COVERAGE_MEANINGS[plan.coverage] ?? ""}`.trimEnd();
  const riders = plan.riders.length ? plan.riders.map((rider) => `- ${rider}`).join("\n") : "None";
  return `\nPlan: ${plan.plan}\nCoverage: ${coverage}\nRiders:\n${riders}\n`;
}

export class PolicyCatalog {
  private readonly entries: PolicyEntry[];
  private readonly byName = new Map<string, PolicyEntry>();

  constructor(entries: PolicyEntry[]) {
    this.entries = entries;
    for (const entry of entries) {
      this.byName.set(normalizePolicyName(entry.name), entry);
    }
  }

  get policies(): string[] {
    return this.entries.map((entry) => entry.name);
  }

  /** Canonical name for `name`, matched case- and spacing-insensitively. */
  resolve(name: string): string | null {
    return this.byName.get(normalizePolicyName(name))?.name ?? null;
  }

  documentIds(policy: string): string[] {
    return [...this.requireEntry(policy).documentIds];
  }

  plans(policy: string): PolicyPlan[] {
    return this.requireEntry(policy).plans.map((plan) => ({ ...plan, riders: [...plan.riders] }));
  }

  renderPlansAndRiders(policies: string[]): string {
    const blocks = policies.map((policy) => {
      const entry = this.requireEntry(policy);
      return `\nThe ${entry.name} policy comprises the following.\n${entry.plans.map(renderPlan).join("")}\n`;
    });

    return `\n${GENERAL_HEADER}\n\n${blocks.join("\n")}\n`;
  }

  private requireEntry(policy: string): PolicyEntry {
    const entry = this.byName.get(normalizePolicyName(policy));
    if (!entry) {
      throw new Error(`Unknown policy "${policy}". Valid policies are: ${this.policies.join(", ")}`);
    }

    return entry;
  }
}

/**
 * Builds the catalog from `policy,document_id` and
 * `policy,plan,coverage,riders` CSV text. Riders are separated by `|`.
 */
export function parsePolicyCatalog(params: { policiesCsv: string; plansCsv: string }): PolicyCatalog {
  const policies = readCsvTable(params.policiesCsv, { source: "policies.csv", columns: ["policy", "document_id"] });
  const plans = readCsvTable(params.plansCsv, { source: "plans.csv", columns: ["policy", "plan", "coverage", "riders"] });

  const entries = new Map<string, PolicyEntry>();
  const entryFor = (name: string) => {
    const key = normalizePolicyName(name);
    const existing = entries.get(key);
    if (existing) {
      return existing;
    }

    const created: PolicyEntry = { name: name.trim(), documentIds: [], plans: [] };
    entries.set(key, created);
    return created;
  };

  for (const row of policies.rows) {
    if (row.policy && row.document_id) {
      entryFor(row.policy).documentIds.push(row.document_id);
    }
  }

  for (const row of plans.rows) {
    if (!row.policy || !row.plan) {
      continue;
    }

    entryFor(row.policy).plans.push({
      plan: row.plan,
      coverage: row.coverage,
      riders: row.riders
        .split("|")
        .map((rider) => rider.trim())
        .filter(Boolean)
    });
  }

  return new PolicyCatalog([...entries.values()]);
}

export function loadPolicyCatalog(dataDir = DEFAULT_DATA_DIR): PolicyCatalog {
  const read = (file: string) => readFileSync(join(dataDir, file), "utf8");
  return parsePolicyCatalog({ policiesCsv: read("policies.csv"), plansCsv: read("plans.csv") });
}
