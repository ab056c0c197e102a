import type { TokenUsage } from "@/lib/llm";

// USD per million tokens.
const PRICES_PER_MILLION: Record<string, { prompt: number; completion: number }> = {
  "gpt-4.1": { prompt: 2, completion: 8 },
  "gpt-4.1-mini": { prompt: 0.4, completion: 1.6 },
  "gpt-4.1-nano": { prompt: 0.1, completion: 0.4 },
  "gpt-4o": { prompt: 2.5, completion: 10 },
  "gpt-4o-mini": { prompt: 0.15, completion: 0.6 },
  "text-embedding-3-small": { prompt: 0.02, completion: 0 },
  "text-embedding-3-large": { prompt: 0.13, completion: 0 }
};

export type CostEntry = {
  model: string;
  label: string;
  promptTokens: number;
  completionTokens: number;
  costUsd: number;
};

function findPrice(model: string) {
  if (PRICES_PER_MILLION[model]) {
    return PRICES_PER_MILLION[model];
  }

  // Dated snapshots such as gpt-4o-mini-2024-07-18.
  const prefix = Object.keys(PRICES_PER_MILLION)
    .filter((known) => model.startsWith(`${known}-`))
    .sort((left, right) => right.length - left.length)[0];

  return prefix ? PRICES_PER_MILLION[prefix] : null;
}

export class CostCollector {
  private readonly entries: CostEntry[] = [];
  private readonly warnedModels = new Set<string>();

  constructor(private readonly options: { logCosts?: boolean } = {}) {}

  record(params: { model: string; label: string; usage: TokenUsage }): CostEntry {
    const price = findPrice(params.model);
    if (!price && !this.warnedModels.has(params.model)) {
      this.warnedModels.add(params.model);
      console.warn(`No price known for model ${params.model}; counting its usage as free.`);
    }

    const costUsd = price
      ? (params.usage.promptTokens * price.prompt + params.usage.completionTokens * price.completion) / 1_000_000
      : 0;

    const entry: CostEntry = {
      model: params.model,
      label: params.label,
      promptTokens: params.usage.promptTokens,
      completionTokens: params.usage.completionTokens,
      costUsd
    };
    this.entries.push(entry);

    if (this.options.logCosts) {
      console.info(
        `[cost] ${entry.label} ${entry.model}: ${entry.promptTokens} in / ${entry.completionTokens} out, $${entry.costUsd.toFixed(6)} (total $${this.totalUsd().toFixed(6)})`
      );
    }

    return entry;
  }

  totalUsd(): number {
    return this.entries.reduce((total, entry) => total + entry.costUsd, 0);
  }

  list(): CostEntry[] {
    return [...this.entries];
  }
}
