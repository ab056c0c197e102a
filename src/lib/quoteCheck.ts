import { normalizeWhitespace } from "@/lib/textNormalization";

export type EvidencePoint = {
  quote: string;
  point: string;
};

function normalizeSearchText(value: string): string {
  return normalizeWhitespace(value)
    .replace(/[“”]/g, "\"")
    .replace(/[‘’]/g, "'");
}

function stripWrappingQuotes(value: string): string {
  return value.replace(/^["'“”‘’]+/, "").replace(/["'“”‘’]+$/, "").trim();
}

export function isVerbatimQuote(quote: string, chunkText: string): boolean {
  const needle = normalizeSearchText(stripWrappingQuotes(quote));
  if (!needle) {
    return false;
  }

  return normalizeSearchText(chunkText).includes(needle);
}

/**
 * Keeps the points whose quote appears verbatim in the chunk (modulo
 * whitespace and typographic quotes). Quote text is stored unwrapped.
 */
export function verifyPoints(points: EvidencePoint[], chunkText: string) {
  const kept: EvidencePoint[] = [];
  const rejected: EvidencePoint[] = [];

  for (const point of points) {
    if (point.point.trim() && isVerbatimQuote(point.quote, chunkText)) {
      kept.push({ quote: stripWrappingQuotes(point.quote), point: point.point.trim() });
    } else {
      rejected.push(point);
    }
  }

  return { kept, rejected };
}
