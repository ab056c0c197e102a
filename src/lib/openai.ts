import type { EngineConfig } from "@/lib/config";
import type { CostCollector } from "@/lib/costCollector";
import { EngineError, isEngineError } from "@/lib/errors";
import type { ChatMessage, ChatModel, ChatOptions, EmbeddingModel, TokenUsage } from "@/lib/llm";

const EMBEDDING_BATCH_SIZE = 16;
// Roughly 8k tokens at three characters per token.
const MAX_EMBEDDING_INPUT_CHARS = 24_000;
const TRANSIENT_STATUS_CODES = new Set([502, 503, 504]);

type OpenAIConnection = Pick<EngineConfig, "openaiApiKey" | "openaiBaseUrl">;

type ChatCompletionPayload = {
  model?: string;
  choices?: Array<{ message?: { content?: string | null }; delta?: { content?: string | null } }>;
  usage?: { prompt_tokens?: number; completion_tokens?: number } | null;
};

type EmbeddingPayload = {
  data?: Array<{ index?: number; embedding?: number[] }>;
  usage?: { prompt_tokens?: number } | null;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function getApiKey(connection: OpenAIConnection): string {
  if (!connection.openaiApiKey) {
    throw new EngineError({ code: "CONTRACT_VIOLATION", message: "OPENAI_API_KEY is required" });
  }

  return connection.openaiApiKey;
}

function toUsage(raw: ChatCompletionPayload["usage"]): TokenUsage | null {
  if (!raw) {
    return null;
  }

  return {
    promptTokens: typeof raw.prompt_tokens === "number" ? raw.prompt_tokens : 0,
    completionTokens: typeof raw.completion_tokens === "number" ? raw.completion_tokens : 0
  };
}

async function requestOpenAI(params: {
  connection: OpenAIConnection;
  path: string;
  payload: Record<string, unknown>;
  signal?: AbortSignal;
}): Promise<Response> {
  let response: Response;
  try {
    response = await fetch(`${params.connection.openaiBaseUrl}${params.path}`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${getApiKey(params.connection)}`,
        "Content-Type": "application/json"
      },
      body: JSON.stringify(params.payload),
      signal: params.signal
    });
  } catch (error) {
    if (isEngineError(error) || (error instanceof Error && error.name === "AbortError")) {
      throw error;
    }

    throw new EngineError({
      code: "TRANSIENT_IO",
      message: `OpenAI request to ${params.path} failed before a response arrived`,
      cause: error
    });
  }

  if (!response.ok) {
    const errorText = await response.text();
    throw new EngineError({
      code: TRANSIENT_STATUS_CODES.has(response.status) ? "TRANSIENT_IO" : "UPSTREAM_ERROR",
      message: `OpenAI request failed (${response.status}): ${errorText}`,
      status: response.status
    });
  }

  return response;
}

/**
 * Splits a server-sent-events body into parsed `data:` payloads. Stops at the
 * `[DONE]` sentinel.
 */
export async function* readServerSentEvents(body: ReadableStream<Uint8Array>): AsyncGenerator<unknown> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffered = "";
  let finished = false;

  try {
    while (true) {
      const { done, value } = await reader.read();
      buffered += done ? decoder.decode() : decoder.decode(value, { stream: true });

      let newline = buffered.indexOf("\n");
      while (newline >= 0) {
        const line = buffered.slice(0, newline).trim();
        buffered = buffered.slice(newline + 1);
        newline = buffered.indexOf("\n");

        if (!line.startsWith("data:")) {
          continue;
        }

        const data = line.slice("data:".length).trim();
        if (data === "[DONE]") {
          finished = true;
          return;
        }

        yield JSON.parse(data);
      }

      if (done) {
        finished = true;
        return;
      }
    }
  } finally {
    // Consumer stopped early or parsing failed: stop the body from draining.
    if (!finished) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}

export function createOpenAIChatModel(params: {
  config: OpenAIConnection;
  model: string;
  label: string;
  costs?: CostCollector;
}): ChatModel {
  const recordUsage = (model: string, usage: TokenUsage | null) => {
    if (usage && params.costs) {
      params.costs.record({ model, label: params.label, usage });
    }
  };

  const buildPayload = (messages: ChatMessage[], options: ChatOptions | undefined) => ({
    model: params.model,
    temperature: options?.temperature ?? 0,
    ...(options?.jsonMode ? { response_format: { type: "json_object" } } : {}),
    messages
  });

  return {
    model: params.model,

    async chat(messages, options) {
      const response = await requestOpenAI({
        connection: params.config,
        path: "/chat/completions",
        payload: buildPayload(messages, options),
        signal: options?.signal
      });

      const payload = (await response.json()) as ChatCompletionPayload;
      const content = payload.choices?.[0]?.message?.content;
      if (typeof content !== "string") {
        throw new EngineError({
          code: "UPSTREAM_ERROR",
          message: "Chat completion response did not include content"
        });
      }

      const usage = toUsage(payload.usage);
      const model = payload.model ?? params.model;
      recordUsage(model, usage);

      return { text: content, model, usage };
    },

    async *streamChat(messages, options) {
      const response = await requestOpenAI({
        connection: params.config,
        path: "/chat/completions",
        payload: {
          ...buildPayload(messages, options),
          stream: true,
          stream_options: { include_usage: true }
        },
        signal: options?.signal
      });

      if (!response.body) {
        throw new EngineError({ code: "TRANSIENT_IO", message: "Streaming response had no body" });
      }

      let model = params.model;
      let usage: TokenUsage | null = null;

      try {
        for await (const event of readServerSentEvents(response.body)) {
          if (!isRecord(event)) {
            continue;
          }

          const chunk = event as ChatCompletionPayload;
          if (typeof chunk.model === "string") {
            model = chunk.model;
          }

          usage = toUsage(chunk.usage) ?? usage;
          const delta = chunk.choices?.[0]?.delta?.content;
          if (typeof delta === "string" && delta.length > 0) {
            yield delta;
          }
        }
      } catch (error) {
        if (isEngineError(error) || (error instanceof Error && error.name === "AbortError")) {
          throw error;
        }

        throw new EngineError({ code: "TRANSIENT_IO", message: "Stream interrupted", cause: error });
      }

      recordUsage(model, usage);
    }
  };
}

export function createOpenAIEmbeddingModel(params: {
  config: OpenAIConnection;
  model: string;
  costs?: CostCollector;
}): EmbeddingModel {
  return {
    model: params.model,

    async embed(texts) {
      const vectors: number[][] = [];

      for (let start = 0; start < texts.length; start += EMBEDDING_BATCH_SIZE) {
        const batch = texts
          .slice(start, start + EMBEDDING_BATCH_SIZE)
          .map((text) => text.slice(0, MAX_EMBEDDING_INPUT_CHARS));

        const response = await requestOpenAI({
          connection: params.config,
          path: "/embeddings",
          payload: { model: params.model, input: batch }
        });
        const payload = (await response.json()) as EmbeddingPayload;

        const data = [...(payload.data ?? [])].sort((left, right) => (left.index ?? 0) - (right.index ?? 0));
        if (data.length !== batch.length || data.some((item) => !Array.isArray(item.embedding))) {
          throw new EngineError({
            code: "UPSTREAM_ERROR",
            message: "Embedding response is missing vectors",
            details: { expected: batch.length, received: data.length }
          });
        }

        for (const item of data) {
          vectors.push(item.embedding ?? []);
        }

        if (payload.usage && params.costs) {
          params.costs.record({
            model: params.model,
            label: "embedding",
            usage: { promptTokens: payload.usage.prompt_tokens ?? 0, completionTokens: 0 }
          });
        }
      }

      return vectors;
    }
  };
}
