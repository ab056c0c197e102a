export type ChatRole = "system" | "user" | "assistant";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export type TokenUsage = {
  promptTokens: number;
  completionTokens: number;
};

export type ChatCompletion = {
  text: string;
  model: string;
  usage: TokenUsage | null;
};

export type ChatOptions = {
  temperature?: number;
  jsonMode?: boolean;
  signal?: AbortSignal;
};

export type ChatModel = {
  readonly model: string;
  chat(messages: ChatMessage[], options?: ChatOptions): Promise<ChatCompletion>;
  /** Yields text deltas in arrival order. */
  streamChat(messages: ChatMessage[], options?: ChatOptions): AsyncIterable<string>;
};

export type EmbeddingModel = {
  readonly model: string;
  embed(texts: string[]): Promise<number[][]>;
};
