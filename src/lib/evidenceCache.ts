import type { EvidenceSummary } from "@/lib/evidenceSummarizer";
import type { EvidencePoint } from "@/lib/quoteCheck";

function compareNames(left: string, right: string): number {
  if (left === right) {
    return 0;
  }

  return left < right ? -1 : 1;
}

function formatQuotes(points: EvidencePoint[]): string {
  if (points.length === 0) {
    return "";
  }

  return `\nRelevant quotes:\n${points.map((point, index) => `quote${index + 1}: "${point.quote}"`).join("\n")}`;
}

/**
 * Evidence gathered for one question. Batches are appended whole, after their
 * summarization has joined.
 */
export class EvidenceCache {
  private summaries: EvidenceSummary[] = [];

  get size(): number {
    return this.summaries.length;
  }

  addBatch(batch: readonly EvidenceSummary[]) {
    this.summaries = [...this.summaries, ...batch];
  }

  all(): EvidenceSummary[] {
    return [...this.summaries];
  }

  /** Relevant summaries, best first; ties ordered by name. */
  filtered(maxSources?: number): EvidenceSummary[] {
    const relevant = this.summaries
      .filter((summary) => summary.relevanceScore > 0)
      .sort(
        (left, right) =>
          right.relevanceScore - left.relevanceScore || compareNames(left.chunk.name, right.chunk.name)
      );

    return maxSources === undefined ? relevant : relevant.slice(0, Math.max(0, maxSources));
  }

  validKeys(maxSources?: number): string[] {
    return this.filtered(maxSources).map((summary) => summary.chunk.name);
  }

  renderContext(maxSources?: number): string {
    const filtered = this.filtered(maxSources);
    const entries = filtered.map(
      (summary) =>
        `${summary.chunk.name}:\n${summary.summary}${formatQuotes(summary.points)}\nFrom ${summary.chunk.document.citation}`
    );

    return `${entries.join("\n\n")}\n\nValid Keys: ${filtered.map((summary) => summary.chunk.name).join(", ")}`;
  }

  reset() {
    this.summaries = [];
  }
}
