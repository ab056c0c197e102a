import { createHash } from "node:crypto";
import { EngineError, contractViolation } from "@/lib/errors";
import type { EmbeddingModel } from "@/lib/llm";
import { maxMarginalRelevance, rankBySimilarity } from "@/lib/similarity";

export const DEFAULT_MMR_LAMBDA = 0.9;

export type PolicyDocument = {
  dockey: string;
  docname: string;
  citation: string;
  filepath: string;
};

export type Chunk = {
  id: string;
  /** `<docname> pages <first>-<last>` */
  name: string;
  document: PolicyDocument;
  text: string;
  embedding: number[];
  pages: number[];
};

export type ChunkFilter = {
  documentIds?: string[];
};

export type ScoredChunk = {
  chunk: Chunk;
  score: number;
};

export type ChunkStore = {
  /** Top `k` chunks by cosine similarity to `vector`, best first. */
  search(vector: number[], k: number, filter?: ChunkFilter): Promise<ScoredChunk[]>;
  bulkFetch(filter?: ChunkFilter): Promise<Chunk[]>;
};

export function computeDockey(citation: string): string {
  return createHash("md5").update(citation).digest("hex");
}

/**
 * Short key for a document: first capitalized word of the citation followed by
 * the first four-digit year, e.g. "Shield Plan Policy Wording 2024" -> "Shield2024".
 */
export function deriveDocname(citation: string, prefix = ""): string {
  const word = /([A-Z][a-z]+)/.exec(citation);
  if (!word) {
    throw contractViolation(`Could not derive a document name from citation "${citation}"`);
  }

  const year = /(\d{4})/.exec(citation);
  return `${prefix}${word[1]}${year ? year[1] : ""}`;
}

export function formatChunkName(docname: string, pages: number[]): string {
  if (pages.length === 0) {
    return docname;
  }

  return `${docname} pages ${pages[0]}-${pages[pages.length - 1]}`;
}

export function toChunk(params: {
  id: string;
  text: string;
  embedding: number[];
  pages: number[];
  document: { dockey?: string | null; citation: string; filepath?: string | null; docname?: string | null };
  docnamePrefix?: string;
}): Chunk {
  const citation = params.document.citation;
  const docname = params.document.docname?.trim() || deriveDocname(citation, params.docnamePrefix);

  return {
    id: params.id,
    name: formatChunkName(docname, params.pages),
    document: {
      dockey: params.document.dockey?.trim() || computeDockey(citation),
      docname,
      citation,
      filepath: params.document.filepath ?? ""
    },
    text: params.text,
    embedding: params.embedding,
    pages: params.pages
  };
}

function matchesFilter(chunk: Chunk, filter: ChunkFilter | undefined): boolean {
  if (!filter?.documentIds) {
    return true;
  }

  return filter.documentIds.includes(chunk.document.dockey);
}

export class InMemoryChunkStore implements ChunkStore {
  private readonly chunks: Chunk[] = [];

  constructor(chunks: Chunk[] = []) {
    this.add(chunks);
  }

  add(chunks: Chunk[]) {
    const known = new Set(this.chunks.map((chunk) => chunk.id));
    for (const chunk of chunks) {
      if (!known.has(chunk.id)) {
        known.add(chunk.id);
        this.chunks.push(chunk);
      }
    }
  }

  get size(): number {
    return this.chunks.length;
  }

  async search(vector: number[], k: number, filter?: ChunkFilter): Promise<ScoredChunk[]> {
    const pool = this.chunks.filter((chunk) => matchesFilter(chunk, filter));
    if (pool.length === 0 || k <= 0) {
      return [];
    }

    return rankBySimilarity(
      vector,
      pool.map((chunk) => chunk.embedding)
    )
      .slice(0, k)
      .map(({ index, score }) => ({ chunk: pool[index], score }));
  }

  async bulkFetch(filter?: ChunkFilter): Promise<Chunk[]> {
    return this.chunks.filter((chunk) => matchesFilter(chunk, filter));
  }
}

export async function maxMarginalRelevanceSearch(params: {
  query: string;
  k: number;
  fetchK: number;
  lambda?: number;
  embeddingModel: EmbeddingModel;
  store: ChunkStore;
  filter?: ChunkFilter;
}): Promise<ScoredChunk[]> {
  const lambda = params.lambda ?? DEFAULT_MMR_LAMBDA;
  if (!Number.isInteger(params.k) || params.k < 0) {
    throw contractViolation("k must be a non-negative integer", { k: params.k });
  }

  if (params.fetchK < params.k) {
    throw contractViolation("fetchK must be greater than or equal to k", { k: params.k, fetchK: params.fetchK });
  }

  if (params.k === 0) {
    return [];
  }

  const [queryVector] = await params.embeddingModel.embed([params.query]);
  if (!queryVector) {
    throw new EngineError({ code: "UPSTREAM_ERROR", message: "Embedding model returned no vector for the query" });
  }

  const candidates = await params.store.search(queryVector, params.fetchK, params.filter);

  if (params.fetchK === params.k || lambda >= 1 || candidates.length <= params.k) {
    return candidates.slice(0, params.k);
  }

  const selected = maxMarginalRelevance({
    relevance: candidates.map((candidate) => candidate.score),
    embeddings: candidates.map((candidate) => candidate.chunk.embedding),
    k: params.k,
    lambda
  });

  return selected.map((index) => candidates[index]);
}
