import { EngineError } from "@/lib/errors";
import type { EvidenceSummary } from "@/lib/evidenceSummarizer";
import { EXAMPLE_CITATION, EXAMPLE_CITATION_QUOTE } from "@/lib/prompts";
import { escapeRegExp, findNamePosition } from "@/lib/textNormalization";

export const MAX_REFERENCE_LIST_CHARS = 4000;

export type Reference = {
  /** Tag text: `<name>` or `<name> quoteN`. */
  id: string;
  filepath: string;
  citation: string;
  pages: number[];
  quote: string | null;
};

export type NormalizedAnswer = {
  text: string;
  references: Reference[];
};

type CitationUnit = {
  docname: string;
  pageStart: string;
  pageEnd: string;
  quotes: number[];
};

type CitationGroup = {
  end: number;
  units: CitationUnit[];
};

// Any key-like token followed by " pages S-E" is read as a unit; unlisted ones are dropped.
const DOCNAME_SHAPE = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;
const PAGES_PATTERN = / pages (\d+)-(\d+)/y;
const FIRST_QUOTE_PATTERN = /,? quote(\d+)/y;
const NEXT_QUOTE_PATTERN = /[,;] quote(\d+)/y;
const UNIT_SEPARATOR_PATTERN = /[,;] /y;
const CITE_SPAN_PATTERN = /<cite>.*?<\/cite>/g;
const PERIOD_BEFORE_CITE_PATTERN = /\.\s*?(<cite>.*?<\/cite>)/g;
const EXAMPLE_CITATIONS_PATTERN = new RegExp(
  `\\s?(?:${escapeRegExp(EXAMPLE_CITATION_QUOTE)}|${escapeRegExp(EXAMPLE_CITATION)})`,
  "g"
);

function matchAt(pattern: RegExp, text: string, position: number): RegExpExecArray | null {
  pattern.lastIndex = position;
  return pattern.exec(text);
}

/**
 * Reads a docname at `position`: the longest known name followed by " pages ",
 * otherwise a key-like token.
 */
function readDocname(text: string, position: number, knownByLength: string[]): string | null {
  for (const name of knownByLength) {
    if (text.startsWith(`${name} pages `, position)) {
      return name;
    }
  }

  let end = position;
  while (end < text.length && /[A-Za-z0-9_.-]/.test(text[end])) {
    end += 1;
  }

  const token = text.slice(position, end);
  return DOCNAME_SHAPE.test(token) ? token : null;
}

function readUnit(text: string, position: number, knownByLength: string[]): { unit: CitationUnit; end: number } | null {
  const docname = readDocname(text, position, knownByLength);
  if (!docname) {
    return null;
  }

  const pages = matchAt(PAGES_PATTERN, text, position + docname.length);
  if (!pages) {
    return null;
  }

  let cursor = PAGES_PATTERN.lastIndex;
  const quotes: number[] = [];
  const firstQuote = matchAt(FIRST_QUOTE_PATTERN, text, cursor);
  if (firstQuote) {
    quotes.push(Number(firstQuote[1]));
    cursor = FIRST_QUOTE_PATTERN.lastIndex;

    let nextQuote = matchAt(NEXT_QUOTE_PATTERN, text, cursor);
    while (nextQuote) {
      quotes.push(Number(nextQuote[1]));
      cursor = NEXT_QUOTE_PATTERN.lastIndex;
      nextQuote = matchAt(NEXT_QUOTE_PATTERN, text, cursor);
    }
  }

  return { unit: { docname, pageStart: pages[1], pageEnd: pages[2], quotes }, end: cursor };
}

/** Parses `(unit[, unit...])` starting at the opening parenthesis, or null. */
function readGroup(text: string, open: number, knownByLength: string[]): CitationGroup | null {
  const units: CitationUnit[] = [];
  let cursor = open + 1;

  while (true) {
    const parsed = readUnit(text, cursor, knownByLength);
    if (!parsed) {
      return null;
    }

    units.push(parsed.unit);
    cursor = parsed.end;

    if (text[cursor] === ")") {
      return { end: cursor + 1, units };
    }

    const separator = matchAt(UNIT_SEPARATOR_PATTERN, text, cursor);
    if (!separator) {
      return null;
    }

    cursor = UNIT_SEPARATOR_PATTERN.lastIndex;
  }
}

function toReference(id: string, summary: EvidenceSummary, quote: string | null): Reference {
  return {
    id,
    filepath: summary.chunk.document.filepath,
    citation: summary.chunk.document.citation,
    pages: summary.chunk.pages,
    quote
  };
}

function renderUnit(
  unit: CitationUnit,
  summaryByName: Map<string, EvidenceSummary>,
  addReference: (reference: Reference) => void
): string {
  const name = `${unit.docname} pages ${unit.pageStart}-${unit.pageEnd}`;
  const summary = summaryByName.get(name);
  if (!summary) {
    return "";
  }

  const quoteTags = unit.quotes
    .filter((index) => index >= 1 && index <= summary.points.length)
    .map((index) => {
      const id = `${name} quote${index}`;
      addReference(toReference(id, summary, summary.points[index - 1].quote));
      return `<doc>${id}</doc>`;
    });

  if (quoteTags.length > 0) {
    return quoteTags.join("");
  }

  addReference(toReference(name, summary, null));
  return `<doc>${name}</doc>`;
}

function movePeriodsAfterCitations(text: string): string {
  let current = text;
  let previous = "";
  while (current !== previous) {
    previous = current;
    current = current.replace(PERIOD_BEFORE_CITE_PATTERN, "$1.");
  }

  return current.replace(/\.+/g, ".");
}

function assertNoLeaks(text: string, docnames: Iterable<string>) {
  if (text.includes("Thought:")) {
    throw new EngineError({
      code: "CITATION_FORMAT",
      message: "Answer contains leaked reasoning (\"Thought:\")."
    });
  }

  const outsideCitations = text.replace(CITE_SPAN_PATTERN, " ");
  for (const docname of docnames) {
    if (findNamePosition(docname, outsideCitations) >= 0) {
      throw new EngineError({
        code: "CITATION_FORMAT",
        message: `Answer mentions ${docname} outside a citation.`,
        details: { docname }
      });
    }
  }
}

/**
 * Rewrites `(Name pages S-E[ quoteN, ...][; ...])` citations into
 * `<cite><doc>...</doc></cite>` tags and resolves each tag against the
 * summaries it was answered from. Units naming no known summary are dropped.
 * Throws `CITATION_FORMAT` when the answer leaks reasoning or mentions a
 * document key outside a citation.
 */
export function normalizeCitations(params: { answer: string; summaries: readonly EvidenceSummary[] }): NormalizedAnswer {
  const summaryByName = new Map<string, EvidenceSummary>();
  for (const summary of params.summaries) {
    if (!summaryByName.has(summary.chunk.name)) {
      summaryByName.set(summary.chunk.name, summary);
    }
  }

  const docnames = new Set(params.summaries.map((summary) => summary.chunk.document.docname));
  const knownByLength = [...docnames].sort((left, right) => right.length - left.length);

  const references: Reference[] = [];
  const seenReferenceIds = new Set<string>();
  const addReference = (reference: Reference) => {
    if (!seenReferenceIds.has(reference.id)) {
      seenReferenceIds.add(reference.id);
      references.push(reference);
    }
  };

  const source = params.answer.replace(EXAMPLE_CITATIONS_PATTERN, "").trim();
  let output = "";
  let cursor = 0;

  while (cursor < source.length) {
    const open = source.indexOf("(", cursor);
    if (open < 0) {
      output += source.slice(cursor);
      break;
    }

    output += source.slice(cursor, open);
    const group = readGroup(source, open, knownByLength);
    if (!group) {
      output += "(";
      cursor = open + 1;
      continue;
    }

    const tags = group.units.map((unit) => renderUnit(unit, summaryByName, addReference)).join("");
    if (tags) {
      output += `<cite>${tags}</cite>`;
    } else {
      output = output.replace(/\s$/, "");
    }
    cursor = group.end;
  }

  const text = movePeriodsAfterCitations(output);
  assertNoLeaks(text, docnames);

  return { text, references };
}

/** Numbered bibliography, one entry per cited key. */
export function formatReferenceList(references: readonly Reference[]): string {
  const lines: string[] = [];
  const seen = new Set<string>();

  for (const reference of references) {
    const key = reference.id.replace(/ quote\d+$/, "");
    if (seen.has(key)) {
      continue;
    }

    seen.add(key);
    lines.push(`${lines.length + 1}. (${key}): ${reference.citation}`);
  }

  const result = lines.join("\n\n");
  if (result.length <= MAX_REFERENCE_LIST_CHARS) {
    return result;
  }

  return `${result.slice(0, MAX_REFERENCE_LIST_CHARS - 1).trimEnd()}…`;
}
