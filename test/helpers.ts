import { vi } from "vitest";
import type { EvidenceSummary } from "@/lib/evidenceSummarizer";
import type { ChatModel } from "@/lib/llm";
import type { Chunk } from "@/lib/vectorStore";

export function makeChunk(params: {
  id: string;
  docname: string;
  pages?: number[];
  text?: string;
  embedding?: number[];
  dockey?: string;
  citation?: string;
}): Chunk {
  const pages = params.pages ?? [1, 2];
  return {
    id: params.id,
    name: `${params.docname} pages ${pages[0]}-${pages[pages.length - 1]}`,
    document: {
      dockey: params.dockey ?? `doc-${params.docname}`,
      docname: params.docname,
      citation: params.citation ?? `${params.docname} policy wording`,
      filepath: `${params.docname}.pdf`
    },
    text: params.text ?? `Text of ${params.id}.`,
    embedding: params.embedding ?? [1, 0],
    pages
  };
}

export function makeSummary(params: {
  chunk: Chunk;
  score: number;
  summary?: string;
  points?: Array<{ quote: string; point: string }>;
}): EvidenceSummary {
  return {
    chunk: params.chunk,
    summary: params.summary ?? `Summary of ${params.chunk.name}.`,
    relevanceScore: params.score,
    points: params.points ?? []
  };
}

export function fakeEmbeddingModel(vector: number[]) {
  return {
    model: "fake-embedding",
    embed: vi.fn(async (texts: string[]) => texts.map(() => vector))
  };
}

/** Chat model whose `streamChat` replays one scripted reply per call. */
export function scriptedChatModel(params: {
  streams?: Array<string[] | Error>;
  chat?: (prompt: string) => string | Promise<string>;
}) {
  const streams = [...(params.streams ?? [])];
  const streamCalls: string[][] = [];
  const chat = vi.fn(async (messages: Array<{ role: string; content: string }>) => {
    const prompt = messages.map((message) => message.content).join("\n");
    const text = params.chat ? await params.chat(prompt) : "";
    return { text, model: "fake-chat", usage: null };
  });

  const model: ChatModel = {
    model: "fake-chat",
    chat,
    async *streamChat(messages) {
      streamCalls.push(messages.map((message) => message.content));
      const next = streams.shift();
      if (next === undefined) {
        throw new Error("No scripted stream left");
      }

      if (next instanceof Error) {
        throw next;
      }

      for (const delta of next) {
        yield delta;
      }
    }
  };

  return { model, chat, streamCalls };
}
