import { normalizeCitations, type Reference } from "@/lib/citations";
import type { EngineConfig } from "@/lib/config";
import { CostCollector } from "@/lib/costCollector";
import { isEngineError, toErrorMessage } from "@/lib/errors";
import { EvidenceCache } from "@/lib/evidenceCache";
import type { EvidenceSummary } from "@/lib/evidenceSummarizer";
import type { ChatMessage, ChatModel, EmbeddingModel } from "@/lib/llm";
import type { PolicyCatalog } from "@/lib/policies";
import { FALLBACK_RESPONSE_CONTENT, buildCitationRetryInstruction } from "@/lib/prompts";
import { extractAnswerText } from "@/lib/reasoning";
import { suggestFollowUps } from "@/lib/suggest";
import { createEvidenceTools } from "@/lib/tools";
import type { ChunkStore } from "@/lib/vectorStore";
import { runAnswerLoop, type AnswerLoopEvent, type SleepFn } from "@/server/answerEngine";

export type ChatTurn = {
  question: string;
  text: string;
  references: Reference[];
};

export type ChatSessionEvent =
  | AnswerLoopEvent
  | { type: "citation_retry"; attempt: number; problem: string }
  | { type: "turn_complete"; turn: ChatTurn };

export type ChatSessionSettings = Pick<
  EngineConfig,
  | "maxIterations"
  | "streamMaxRetries"
  | "streamRetryDelayMs"
  | "summaryConcurrency"
  | "evidenceK"
  | "mmrLambda"
  | "citationMaxRetries"
>;

export type ChatSessionDeps = {
  chatModel: ChatModel;
  summaryModel?: ChatModel;
  embeddingModel: EmbeddingModel;
  store: ChunkStore;
  catalog: PolicyCatalog;
  settings: ChatSessionSettings;
  /** Shared with the models so their usage lands in this session's totals. */
  costs?: CostCollector;
  sleep?: SleepFn;
};

function referenceKey(reference: Reference): string {
  return reference.id.replace(/ quote\d+$/, "");
}

/**
 * One user's conversation. Evidence is gathered afresh for every question;
 * summaries that an answer cited stay resolvable in later turns.
 */
export class ChatSession {
  readonly cache = new EvidenceCache();
  readonly costs: CostCollector;
  private history: ChatMessage[] = [];
  private carriedSummaries: EvidenceSummary[] = [];
  private policy: string | null = null;

  constructor(private readonly deps: ChatSessionDeps) {
    this.costs = deps.costs ?? new CostCollector();
  }

  get messages(): ChatMessage[] {
    return [...this.history];
  }

  get currentPolicy(): string | null {
    return this.policy;
  }

  /** Scopes `gather_evidence` to one policy's documents; null searches all of them. */
  setPolicy(policy: string | null) {
    if (policy === null) {
      this.policy = null;
      return;
    }

    const resolved = this.deps.catalog.resolve(policy);
    if (!resolved) {
      throw new Error(`Unknown policy "${policy}". Valid policies are: ${this.deps.catalog.policies.join(", ")}`);
    }

    this.policy = resolved;
  }

  async *ask(question: string, options: { signal?: AbortSignal } = {}): AsyncGenerator<ChatSessionEvent, ChatTurn, undefined> {
    const { settings } = this.deps;
    const tools = createEvidenceTools({
      store: this.deps.store,
      embeddingModel: this.deps.embeddingModel,
      summaryModel: this.deps.summaryModel ?? this.deps.chatModel,
      cache: this.cache,
      catalog: this.deps.catalog,
      evidenceK: settings.evidenceK,
      mmrLambda: settings.mmrLambda,
      summaryConcurrency: settings.summaryConcurrency,
      defaultPolicy: this.policy
    });

    let prompt = question;
    let turn: ChatTurn | null = null;
    let rawAnswer = "";

    for (let attempt = 0; turn === null; attempt += 1) {
      // Every attempt gathers its own evidence.
      this.cache.reset();
      let final: Extract<AnswerLoopEvent, { type: "final_answer" }> | null = null;

      for await (const event of runAnswerLoop({
        question: prompt,
        history: this.history,
        chatModel: this.deps.chatModel,
        tools,
        policies: this.deps.catalog.policies,
        maxIterations: settings.maxIterations,
        maxRetries: settings.streamMaxRetries,
        retryDelayMs: settings.streamRetryDelayMs,
        sleep: this.deps.sleep,
        signal: options.signal
      })) {
        if (event.type === "final_answer") {
          final = event;
        }
        yield event;
      }

      if (!final) {
        throw new Error("Reasoning loop ended without an answer");
      }

      if (final.reason === "fallback" || final.reason === "cancelled") {
        rawAnswer = final.text;
        turn = { question, text: final.text, references: [] };
        break;
      }

      // A loop cut off mid-reasoning has no answer a retry could repair.
      const exhausted = final.reason === "iteration_limit";
      rawAnswer = exhausted ? extractAnswerText(final.text) : final.text;
      try {
        const normalized = normalizeCitations({
          answer: rawAnswer,
          summaries: [...this.cache.filtered(), ...this.carriedSummaries]
        });
        turn = { question, ...normalized };
      } catch (error) {
        if (!isEngineError(error, "CITATION_FORMAT")) {
          throw error;
        }

        if (exhausted || attempt >= settings.citationMaxRetries) {
          console.error("Failed to produce a well-cited answer", { question, error: toErrorMessage(error) });
          rawAnswer = FALLBACK_RESPONSE_CONTENT;
          turn = { question, text: FALLBACK_RESPONSE_CONTENT, references: [] };
          break;
        }

        console.warn("Retrying answer with malformed citations", { attempt: attempt + 1, error: error.message });
        yield { type: "citation_retry", attempt: attempt + 1, problem: error.message };
        prompt = `${question}\n\n${buildCitationRetryInstruction(error.message)}`;
      }
    }

    this.carryCitedSummaries(turn.references);
    this.history.push({ role: "user", content: question }, { role: "assistant", content: rawAnswer });

    yield { type: "turn_complete", turn };
    return turn;
  }

  /** Runs `ask` to completion. */
  async answer(question: string, options: { signal?: AbortSignal } = {}): Promise<ChatTurn> {
    const iterator = this.ask(question, options);
    for (;;) {
      const next = await iterator.next();
      if (next.done) {
        return next.value;
      }
    }
  }

  async suggestFollowUps(): Promise<string[]> {
    return suggestFollowUps({
      chatModel: this.deps.chatModel,
      history: this.history,
      policies: this.deps.catalog.policies
    });
  }

  reset() {
    this.history = [];
    this.carriedSummaries = [];
    this.cache.reset();
  }

  private carryCitedSummaries(references: Reference[]) {
    const cited = new Set(references.map(referenceKey));
    const known = new Set(this.carriedSummaries.map((summary) => summary.chunk.name));

    for (const summary of this.cache.filtered()) {
      if (cited.has(summary.chunk.name) && !known.has(summary.chunk.name)) {
        known.add(summary.chunk.name);
        this.carriedSummaries.push(summary);
      }
    }
  }
}
