import { setTimeout as delay } from "node:timers/promises";
import { isEngineError, isTransientError, toErrorMessage } from "@/lib/errors";
import type { ChatMessage, ChatModel } from "@/lib/llm";
import { FALLBACK_RESPONSE_CONTENT, PARSE_FAILURE_MESSAGE, buildAgentSystemPrompt } from "@/lib/prompts";
import {
  extractAnswerText,
  formatChatInput,
  inferStreamIsFinal,
  parseReasoningOutput,
  type ActionStep,
  type ReasoningStep,
  type ResponseStep
} from "@/lib/reasoning";
import { describeToolCall, formatToolDescriptions, type Tool, type ToolKwargs } from "@/lib/tools";

export const DEFAULT_MAX_ITERATIONS = 10;
export const DEFAULT_STREAM_MAX_RETRIES = 3;
export const DEFAULT_STREAM_RETRY_DELAY_MS = 5000;

export type LoopState =
  | "AWAIT_INPUT"
  | "STREAMING"
  | "CLASSIFY_TOOL_CALL"
  | "CLASSIFY_FINAL"
  | "DISPATCH_TOOL"
  | "DONE";

export type FinalReason = "answer" | "return_direct" | "iteration_limit" | "fallback" | "cancelled";

export type AnswerLoopEvent =
  | { type: "token"; delta: string; iteration: number }
  /** Tokens streamed since the last `retry` belong to a failed attempt. */
  | { type: "retry"; attempt: number; delayMs: number; error: string }
  | { type: "tool_started"; tool: string; input: ToolKwargs; description: string }
  | { type: "tool_finished"; tool: string; output: string; isError: boolean }
  | { type: "final_answer"; text: string; reason: FinalReason; reasoning: ReasoningStep[] };

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export type RunAnswerLoopParams = {
  question: string;
  history: readonly ChatMessage[];
  chatModel: ChatModel;
  tools: readonly Tool[];
  policies: string[];
  maxIterations?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  sleep?: SleepFn;
  signal?: AbortSignal;
};

type TaskStep = {
  /** The user's question on the first step, null afterwards. */
  input: string | null;
};

type StreamOutcome =
  | { kind: "complete"; buffer: string; isFinal: boolean }
  | { kind: "cancelled"; buffer: string }
  | { kind: "failed"; buffer: string };

const defaultSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

function unknownToolMessage(name: string): string {
  return `Error: No such tool named \`${name}\`.`;
}

function toResponseStep(buffer: string): ResponseStep {
  try {
    const parsed = parseReasoningOutput(buffer);
    if (parsed.kind === "response") {
      return parsed;
    }
  } catch (error) {
    if (!isEngineError(error, "PARSE_ERROR")) {
      throw error;
    }
  }

  return { kind: "response", thought: "", response: extractAnswerText(buffer) };
}

/**
 * Runs one question through the reasoning loop:
 * AWAIT_INPUT -> STREAMING -> CLASSIFY_FINAL | CLASSIFY_TOOL_CALL -> DISPATCH_TOOL -> AWAIT_INPUT | DONE.
 *
 * Every streamed delta is yielded as a `token` event. The generator always
 * ends with exactly one `final_answer` event unless a contract violation is
 * thrown. Provider errors that are not worth retrying end in the fallback.
 */
export async function* runAnswerLoop(params: RunAnswerLoopParams): AsyncGenerator<AnswerLoopEvent, void, undefined> {
  const maxIterations = params.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  const maxRetries = params.maxRetries ?? DEFAULT_STREAM_MAX_RETRIES;
  const retryDelayMs = params.retryDelayMs ?? DEFAULT_STREAM_RETRY_DELAY_MS;
  const sleep = params.sleep ?? defaultSleep;
  const { signal } = params;

  const toolsByName = new Map(params.tools.map((tool) => [tool.name, tool]));
  const systemPrompt = buildAgentSystemPrompt({
    toolDescriptions: formatToolDescriptions(params.tools),
    toolNames: params.tools.map((tool) => tool.name),
    policies: params.policies
  });

  const memory: ChatMessage[] = [...params.history];
  const reasoning: ReasoningStep[] = [];
  const queue: TaskStep[] = [{ input: params.question }];

  let state: LoopState = "AWAIT_INPUT";
  let iterations = 0;
  let buffer = "";
  let pendingAction: ActionStep | null = null;

  const finalAnswer = (text: string, reason: FinalReason): AnswerLoopEvent => ({
    type: "final_answer",
    text,
    reason,
    reasoning: [...reasoning]
  });

  // Queues the next step, or returns the partial buffer once the iteration budget is spent.
  const nextStep = (): AnswerLoopEvent | null => {
    if (iterations >= maxIterations) {
      console.warn("Reasoning loop reached its iteration limit", { maxIterations });
      return finalAnswer(buffer.trim(), "iteration_limit");
    }

    queue.push({ input: null });
    return null;
  };

  async function* streamAttempts(messages: ChatMessage[]): AsyncGenerator<AnswerLoopEvent, StreamOutcome, undefined> {
    for (let attempt = 0; ; attempt += 1) {
      let attemptBuffer = "";
      let isFinal = false;

      try {
        for await (const delta of params.chatModel.streamChat(messages, { signal })) {
          attemptBuffer += delta;
          yield { type: "token", delta, iteration: iterations };

          if (signal?.aborted) {
            return { kind: "cancelled", buffer: attemptBuffer };
          }

          isFinal = isFinal || inferStreamIsFinal(attemptBuffer);
        }

        return { kind: "complete", buffer: attemptBuffer, isFinal };
      } catch (error) {
        if (signal?.aborted) {
          return { kind: "cancelled", buffer: attemptBuffer };
        }

        if (isEngineError(error, "CONTRACT_VIOLATION")) {
          throw error;
        }

        if (!isTransientError(error)) {
          console.error("Failed to stream chat completion", { error: toErrorMessage(error) });
          return { kind: "failed", buffer: attemptBuffer };
        }

        if (attempt >= maxRetries) {
          console.error("Failed to stream chat completion", { attempts: attempt + 1, error: toErrorMessage(error) });
          return { kind: "failed", buffer: attemptBuffer };
        }

        console.warn("Retrying chat stream after transient failure", {
          attempt: attempt + 1,
          error: toErrorMessage(error)
        });
        yield { type: "retry", attempt: attempt + 1, delayMs: retryDelayMs, error: toErrorMessage(error) };

        try {
          await sleep(retryDelayMs, signal);
        } catch (sleepError) {
          if (signal?.aborted) {
            return { kind: "cancelled", buffer: attemptBuffer };
          }

          throw sleepError;
        }
      }
    }
  }

  while (state !== "DONE") {
    switch (state) {
      case "AWAIT_INPUT": {
        const step = queue.shift();
        if (!step) {
          state = "DONE";
          yield finalAnswer(buffer.trim(), "iteration_limit");
          break;
        }

        if (signal?.aborted) {
          state = "DONE";
          yield finalAnswer(extractAnswerText(buffer), "cancelled");
          break;
        }

        if (step.input !== null) {
          memory.push({ role: "user", content: step.input });
        }

        state = "STREAMING";
        break;
      }

      case "STREAMING": {
        iterations += 1;
        const messages = formatChatInput({ systemPrompt, history: memory, reasoning });
        const outcome: StreamOutcome = yield* streamAttempts(messages);
        buffer = outcome.buffer;

        if (outcome.kind === "cancelled") {
          state = "DONE";
          yield finalAnswer(extractAnswerText(buffer), "cancelled");
        } else if (outcome.kind === "failed") {
          state = "DONE";
          yield finalAnswer(FALLBACK_RESPONSE_CONTENT, "fallback");
        } else {
          state = outcome.isFinal ? "CLASSIFY_FINAL" : "CLASSIFY_TOOL_CALL";
        }
        break;
      }

      case "CLASSIFY_FINAL": {
        const response = toResponseStep(buffer);
        reasoning.push(response);
        state = "DONE";
        yield finalAnswer(response.response, "answer");
        break;
      }

      case "CLASSIFY_TOOL_CALL": {
        let parsed: ActionStep | ResponseStep;
        try {
          parsed = parseReasoningOutput(buffer);
        } catch (error) {
          if (!isEngineError(error, "PARSE_ERROR")) {
            throw error;
          }

          console.warn("Could not parse reasoning step", { error: toErrorMessage(error) });
          reasoning.push({ kind: "observation", observation: PARSE_FAILURE_MESSAGE, isError: true, returnDirect: false });
          const limited = nextStep();
          state = limited ? "DONE" : "AWAIT_INPUT";
          if (limited) {
            yield limited;
          }
          break;
        }

        if (parsed.kind === "response") {
          reasoning.push(parsed);
          state = "DONE";
          yield finalAnswer(parsed.response, "answer");
          break;
        }

        reasoning.push(parsed);
        pendingAction = parsed;
        state = "DISPATCH_TOOL";
        break;
      }

      case "DISPATCH_TOOL": {
        if (!pendingAction) {
          state = "AWAIT_INPUT";
          break;
        }

        const action: ActionStep = pendingAction;
        pendingAction = null;
        const tool = toolsByName.get(action.action);

        let output: string;
        let isError: boolean;
        if (!tool) {
          output = unknownToolMessage(action.action);
          isError = true;
        } else {
          const kwargs = { ...tool.defaultKwargs, ...action.actionInput };
          yield { type: "tool_started", tool: tool.name, input: kwargs, description: describeToolCall(tool, kwargs) };

          try {
            output = await tool.call(kwargs);
            isError = false;
          } catch (error) {
            if (isEngineError(error, "CONTRACT_VIOLATION")) {
              throw error;
            }

            console.error("Failed to run tool", { tool: tool.name, error: toErrorMessage(error) });
            output = `Error: ${toErrorMessage(error)}`;
            isError = true;
          }

          yield { type: "tool_finished", tool: tool.name, output, isError };
        }

        const returnDirect = Boolean(tool?.returnDirect) && !isError;
        reasoning.push({ kind: "observation", observation: output, isError, returnDirect });

        if (returnDirect) {
          state = "DONE";
          yield finalAnswer(output, "return_direct");
          break;
        }

        const limited = nextStep();
        state = limited ? "DONE" : "AWAIT_INPUT";
        if (limited) {
          yield limited;
        }
        break;
      }
    }
  }
}
