import { EngineError } from "@/lib/errors";
import type { ChatMessage } from "@/lib/llm";

export type ActionStep = {
  kind: "action";
  thought: string;
  action: string;
  actionInput: Record<string, unknown>;
};

export type ObservationStep = {
  kind: "observation";
  observation: string;
  isError: boolean;
  returnDirect: boolean;
};

export type ResponseStep = {
  kind: "response";
  thought: string;
  response: string;
};

export type ReasoningStep = ActionStep | ObservationStep | ResponseStep;

const THOUGHT_KEYWORD = "Thought";
const IMPLICIT_THOUGHT = "(Implicit) I can answer without any more tools!";
const ACTION_PATTERN = /(?:\s*Thought: (.*?)|(.+))\n+Action: ([^\n() ]+).*?\n+Action Input: .*?(\{.*\})/s;
const ANSWER_PATTERN = /\s*Thought:(.*?)Answer:(.*)$/s;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Decides, from the text streamed so far, whether the model has started its
 * final answer. Returns false while the buffer is still too short to tell.
 */
export function inferStreamIsFinal(buffer: string): boolean {
  if (buffer.length < THOUGHT_KEYWORD.length) {
    return false;
  }

  if (!buffer.startsWith(THOUGHT_KEYWORD) && !buffer.includes(`\n${THOUGHT_KEYWORD}:`)) {
    return true;
  }

  return buffer.includes("Answer:");
}

/** Text after the last `Answer:` marker, or the whole buffer when there is none. */
export function extractAnswerText(buffer: string): string {
  const index = buffer.lastIndexOf("Answer:");
  if (index < 0) {
    return buffer.trim();
  }

  return buffer.slice(index + "Answer:".length).trim();
}

function parseActionInput(raw: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new EngineError({
      code: "PARSE_ERROR",
      message: `Action Input is not valid JSON: ${raw}`,
      cause: error
    });
  }

  if (!isRecord(parsed)) {
    throw new EngineError({ code: "PARSE_ERROR", message: `Action Input must be a JSON object: ${raw}` });
  }

  return parsed;
}

/**
 * Parses one complete model turn into an action or a response step.
 * Throws `PARSE_ERROR` when the turn follows neither format.
 */
export function parseReasoningOutput(output: string): ActionStep | ResponseStep {
  if (!output.includes(`${THOUGHT_KEYWORD}:`)) {
    return { kind: "response", thought: IMPLICIT_THOUGHT, response: output.trim() };
  }

  if (output.includes("Answer:")) {
    const match = ANSWER_PATTERN.exec(output);
    if (!match) {
      throw new EngineError({ code: "PARSE_ERROR", message: `Could not extract final answer from: ${output}` });
    }

    return { kind: "response", thought: match[1].trim(), response: match[2].trim() };
  }

  if (output.includes("Action:")) {
    const match = ACTION_PATTERN.exec(output);
    if (!match) {
      throw new EngineError({ code: "PARSE_ERROR", message: `Could not extract tool use from: ${output}` });
    }

    return {
      kind: "action",
      thought: (match[1] ?? match[2] ?? "").trim(),
      action: match[3].trim(),
      actionInput: parseActionInput(match[4])
    };
  }

  throw new EngineError({ code: "PARSE_ERROR", message: `Could not parse output: ${output}` });
}

export function formatReasoningStep(step: ReasoningStep): ChatMessage {
  switch (step.kind) {
    case "action":
      return {
        role: "assistant",
        content: `Thought: ${step.thought}\nAction: ${step.action}\nAction Input: ${JSON.stringify(step.actionInput)}`
      };
    case "observation":
      return { role: "user", content: `Observation: ${step.observation}` };
    case "response":
      return { role: "assistant", content: `Thought: ${step.thought}\nAnswer: ${step.response}` };
  }
}

/** System prompt, then the conversation so far, then this turn's reasoning trace. */
export function formatChatInput(params: {
  systemPrompt: string;
  history: readonly ChatMessage[];
  reasoning: readonly ReasoningStep[];
}): ChatMessage[] {
  return [
    { role: "system", content: params.systemPrompt },
    ...params.history,
    ...params.reasoning.map(formatReasoningStep)
  ];
}
