import { mapWithConcurrency } from "@/lib/concurrency";
import { toErrorMessage } from "@/lib/errors";
import type { ChatModel } from "@/lib/llm";
import { parseLlmJson } from "@/lib/llmJson";
import { buildSummarySystemPrompt, buildSummaryUserPrompt } from "@/lib/prompts";
import { type EvidencePoint, verifyPoints } from "@/lib/quoteCheck";
import { stripInlineCitations } from "@/lib/textNormalization";
import type { Chunk } from "@/lib/vectorStore";

export const DEFAULT_SUMMARY_CONCURRENCY = 4;
export const MAX_POINTS_PER_SUMMARY = 10;
const DEFAULT_PARSED_SCORE = 5;

export type EvidenceSummary = {
  chunk: Chunk;
  summary: string;
  /** Integer in [0, 10]. */
  relevanceScore: number;
  points: EvidencePoint[];
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function toStringOrNull(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function clampScore(value: number): number {
  return Math.min(10, Math.max(0, Math.trunc(value)));
}

// Models sometimes score out of 100.
function normalizeOutOfHundred(value: number): number {
  return value > 10 ? Math.trunc(value / 10) : value;
}

/**
 * Reads a relevance signal out of free text. Returns null when the text holds
 * none, so callers can pick their own default.
 */
export function extractScore(text: string): number | null {
  const lines = text.split("\n");
  const lastLine = lines[lines.length - 1] ?? "";
  if (/N\/A|n\/a|\bNA\b/.test(lastLine)) {
    return 0;
  }

  const lowered = text.toLowerCase();
  if (lowered.includes("not applicable") || lowered.includes("not relevant")) {
    return 0;
  }

  const match =
    /[sS]core[:is\s]+([0-9]+)/.exec(text) ?? /\(([0-9])\w*\//.exec(text) ?? /([0-9]+)\w*\//.exec(text);
  if (match) {
    return clampScore(normalizeOutOfHundred(Number(match[1])));
  }

  const trailingNumbers = text.slice(-15).match(/[0-9]+/g);
  if (trailingNumbers && trailingNumbers.length > 0) {
    return clampScore(normalizeOutOfHundred(Number(trailingNumbers[trailingNumbers.length - 1])));
  }

  return null;
}

/** Score for output that could not be parsed as JSON. */
export function scoreFromRawText(text: string): number {
  return extractScore(text) ?? (text.length < 100 ? 1 : DEFAULT_PARSED_SCORE);
}

function readRelevanceScore(raw: unknown, summary: string): number {
  if (typeof raw === "number" && Number.isFinite(raw)) {
    return clampScore(normalizeOutOfHundred(raw));
  }

  const asString = toStringOrNull(raw);
  if (asString) {
    const numeric = Number(asString);
    if (Number.isFinite(numeric)) {
      return clampScore(normalizeOutOfHundred(numeric));
    }

    const fromText = extractScore(asString);
    if (fromText !== null) {
      return fromText;
    }
  }

  return extractScore(summary) ?? DEFAULT_PARSED_SCORE;
}

function readPoints(raw: unknown): EvidencePoint[] {
  if (!Array.isArray(raw)) {
    return [];
  }

  const points: EvidencePoint[] = [];
  for (const item of raw) {
    if (!isRecord(item)) {
      continue;
    }

    const quote = toStringOrNull(item.quote);
    const point = toStringOrNull(item.point);
    if (quote && point) {
      points.push({ quote, point });
    }
  }

  return points;
}

/**
 * Turns one model reply into a summary. Never throws: unparseable output is
 * kept as raw text and scored heuristically.
 */
export function parseSummaryOutput(chunk: Chunk, output: string): EvidenceSummary {
  let parsed: unknown = null;
  try {
    parsed = parseLlmJson(output);
  } catch {
    parsed = null;
  }

  const summaryText = isRecord(parsed) ? toStringOrNull(parsed.summary) : null;
  if (!isRecord(parsed) || summaryText === null) {
    const text = stripInlineCitations(output);
    return { chunk, summary: text.trim(), relevanceScore: scoreFromRawText(text), points: [] };
  }

  const summary = stripInlineCitations(summaryText).trim();
  const { kept } = verifyPoints(readPoints(parsed.points), chunk.text);

  return {
    chunk,
    summary,
    relevanceScore: readRelevanceScore(parsed.relevance_score, summary),
    points: kept.slice(0, MAX_POINTS_PER_SUMMARY)
  };
}

export async function summarizeChunk(params: {
  question: string;
  chunk: Chunk;
  chatModel: ChatModel;
  summaryLength?: string;
}): Promise<EvidenceSummary> {
  const { chunk } = params;
  const completion = await params.chatModel.chat(
    [
      { role: "system", content: buildSummarySystemPrompt(params.summaryLength) },
      {
        role: "user",
        content: buildSummaryUserPrompt({
          citation: `${chunk.name}: ${chunk.document.citation}`,
          text: chunk.text,
          question: params.question
        })
      }
    ],
    { jsonMode: true }
  );

  return parseSummaryOutput(chunk, completion.text);
}

/**
 * Summarizes and scores every chunk with at most `concurrency` model calls in
 * flight. A chunk whose call fails gets a zero-score placeholder instead of
 * failing the batch.
 */
export async function summarizeEvidence(params: {
  question: string;
  chunks: Chunk[];
  chatModel: ChatModel;
  concurrency?: number;
  summaryLength?: string;
}): Promise<EvidenceSummary[]> {
  return mapWithConcurrency(params.chunks, params.concurrency ?? DEFAULT_SUMMARY_CONCURRENCY, async (chunk) => {
    try {
      return await summarizeChunk({
        question: params.question,
        chunk,
        chatModel: params.chatModel,
        summaryLength: params.summaryLength
      });
    } catch (error) {
      console.error("Failed to summarize evidence chunk", { chunk: chunk.name, error: toErrorMessage(error) });
      return { chunk, summary: "", relevanceScore: 0, points: [] };
    }
  });
}
