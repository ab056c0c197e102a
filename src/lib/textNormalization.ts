// Author-year parentheticals and "Smith et al. (2020)" style references.
const INLINE_CITATION_PATTERN =
  /\b[\w-]+\set\sal\.\s\([0-9]{4}\)|\((?:[^)]*?[a-zA-Z][^)]*?[0-9]{4}[^)]*?)\)/gm;

export function sanitizeExtractedText(value: string): string {
  return value
    .replace(/\uFEFF/g, "")
    .replace(/\u00A0/g, " ")
    .replace(/(\d)\s*\uFFFD\s*(\d)/g, "$1-$2")
    .replace(/\uFFFD/g, "-")
    .replace(/[\u2010-\u2015\u2212]/g, "-");
}

export function normalizeWhitespace(value: string): string {
  return sanitizeExtractedText(value).replace(/\s+/g, " ").trim();
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Removes citation-looking text from a model-written summary so the answering
 * model never cites the source's own references instead of our keys.
 */
export function stripInlineCitations(value: string): string {
  return value.replace(INLINE_CITATION_PATTERN, "");
}

/**
 * Position of `name` as a whole key in `text`, or -1. `Callahan2019` does not
 * match inside `Callahan2019a`.
 */
export function findNamePosition(name: string, text: string): number {
  const trimmed = name.trim();
  if (!trimmed) {
    return -1;
  }

  const match = new RegExp(`(?<![\\w])${escapeRegExp(trimmed)}(?![\\w])`).exec(text);
  return match ? match.index : -1;
}
