import pg from "pg";
import type { Pool } from "pg";
import { EngineError } from "@/lib/errors";
import { type Chunk, type ChunkFilter, type ChunkStore, type ScoredChunk, toChunk } from "@/lib/vectorStore";

export const SEARCH_SQL = `
SELECT
  c."id" AS "id",
  c."pages" AS "pages",
  c."text" AS "text",
  c."text_emb"::text AS "embedding",
  d."id" AS "dockey",
  d."docname" AS "docname",
  d."citation" AS "citation",
  d."filepath" AS "filepath",
  1 - (c."text_emb" <=> $1::vector) AS "similarity"
FROM "chunks" c
JOIN "documents" d ON d."id" = c."document"
WHERE c."text_emb" IS NOT NULL
  AND ($3::uuid[] IS NULL OR c."document" = ANY($3::uuid[]))
ORDER BY c."text_emb" <=> $1::vector ASC, c."id" ASC
LIMIT $2
`;

export const BULK_FETCH_SQL = `
SELECT
  c."id" AS "id",
  c."pages" AS "pages",
  c."text" AS "text",
  c."text_emb"::text AS "embedding",
  d."id" AS "dockey",
  d."docname" AS "docname",
  d."citation" AS "citation",
  d."filepath" AS "filepath"
FROM "chunks" c
JOIN "documents" d ON d."id" = c."document"
WHERE ($1::uuid[] IS NULL OR c."document" = ANY($1::uuid[]))
ORDER BY d."id" ASC, c."pages"[1] ASC NULLS LAST, c."id" ASC
`;

export type QueryClient = {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
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

export function embeddingToVectorLiteral(embedding: number[]): string {
  return `[${embedding.join(",")}]`;
}

/** pgvector renders vectors as `[0.1,0.2]`; some drivers hand back arrays. */
export function parseVectorLiteral(value: unknown): number[] {
  if (Array.isArray(value)) {
    return value.map((item) => Number(item));
  }

  if (typeof value === "string") {
    const parsed: unknown = JSON.parse(value);
    if (Array.isArray(parsed)) {
      return parsed.map((item) => Number(item));
    }
  }

  return [];
}

function toPages(value: unknown): number[] {
  if (!Array.isArray(value)) {
    return [];
  }

  return value.map((page) => Number(page)).filter((page) => Number.isFinite(page));
}

function rowToChunk(row: unknown, docnamePrefix: string): Chunk {
  if (!isRecord(row)) {
    throw new EngineError({ code: "UPSTREAM_ERROR", message: "Chunk row is not an object" });
  }

  const id = toStringOrNull(row.id);
  const citation = toStringOrNull(row.citation);
  if (!id || !citation) {
    throw new EngineError({
      code: "UPSTREAM_ERROR",
      message: "Chunk row is missing its id or document citation",
      details: { id: row.id }
    });
  }

  return toChunk({
    id,
    text: typeof row.text === "string" ? row.text : "",
    embedding: parseVectorLiteral(row.embedding),
    pages: toPages(row.pages),
    document: {
      dockey: toStringOrNull(row.dockey),
      docname: toStringOrNull(row.docname),
      citation,
      filepath: toStringOrNull(row.filepath)
    },
    docnamePrefix
  });
}

function toDocumentIds(filter: ChunkFilter | undefined): string[] | null {
  return filter?.documentIds ? [...filter.documentIds] : null;
}

/**
 * Chunk store over the `documents` / `chunks` tables with a pgvector
 * `text_emb` column.
 */
export class PgChunkStore implements ChunkStore {
  private readonly db: QueryClient;
  private readonly docnamePrefix: string;

  constructor(params: { db: QueryClient; docnamePrefix?: string }) {
    this.db = params.db;
    this.docnamePrefix = params.docnamePrefix ?? "";
  }

  async search(vector: number[], k: number, filter?: ChunkFilter): Promise<ScoredChunk[]> {
    if (k <= 0 || filter?.documentIds?.length === 0) {
      return [];
    }

    const { rows } = await this.db.query(SEARCH_SQL, [embeddingToVectorLiteral(vector), k, toDocumentIds(filter)]);

    return rows.map((row) => {
      const similarity = isRecord(row) ? Number(row.similarity) : Number.NaN;
      return {
        chunk: rowToChunk(row, this.docnamePrefix),
        score: Number.isNaN(similarity) ? Number.NEGATIVE_INFINITY : similarity
      };
    });
  }

  async bulkFetch(filter?: ChunkFilter): Promise<Chunk[]> {
    if (filter?.documentIds?.length === 0) {
      return [];
    }

    const { rows } = await this.db.query(BULK_FETCH_SQL, [toDocumentIds(filter)]);
    return rows.map((row) => rowToChunk(row, this.docnamePrefix));
  }
}

export function createPool(databaseUrl: string): Pool {
  return new pg.Pool({ connectionString: databaseUrl });
}
