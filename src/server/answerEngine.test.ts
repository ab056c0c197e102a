import { beforeEach, describe, expect, it, vi } from "vitest";
import { EngineError, contractViolation } from "@/lib/errors";
import { FALLBACK_RESPONSE_CONTENT, PARSE_FAILURE_MESSAGE } from "@/lib/prompts";
import type { Tool } from "@/lib/tools";
import { runAnswerLoop, type AnswerLoopEvent, type RunAnswerLoopParams } from "./answerEngine";
import { scriptedChatModel } from "../../test/helpers";

const GATHER_CALL = "Thought: I need evidence.\nAction: gather_evidence\nAction Input: {\"query\": \"ward\"}";

function fakeTool(params: { name: string; returnDirect?: boolean; call: Tool["call"] }): Tool {
  return {
    name: params.name,
    description: `Fake ${params.name}.`,
    arguments: [{ name: "query", type: "string", description: "the query", required: true }],
    outputDescription: "Running {query}",
    defaultKwargs: { k: 5 },
    returnDirect: params.returnDirect ?? false,
    call: params.call
  };
}

async function run(params: Omit<RunAnswerLoopParams, "question" | "history" | "policies">) {
  const events: AnswerLoopEvent[] = [];
  for await (const event of runAnswerLoop({
    question: "Are ward charges capped?",
    history: [],
    policies: ["Harbor Shield"],
    ...params
  })) {
    events.push(event);
  }

  const last = events[events.length - 1];
  if (!last || last.type !== "final_answer") {
    throw new Error("loop did not end with a final answer");
  }

  return { events, final: last };
}

describe("runAnswerLoop", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  it("dispatches a tool call with default kwargs, then streams the answer", async () => {
    const call = vi.fn().mockResolvedValue("Found 2 pieces of evidence.");
    const { model, streamCalls } = scriptedChatModel({
      streams: [
        ["Thought: I need evidence.\nAction: gather_", "evidence\nAction Input: {\"query\": \"ward\"}"],
        ["Thought: I can answer.\n", "Answer: Ward charges are capped."]
      ]
    });

    const { events, final } = await run({ chatModel: model, tools: [fakeTool({ name: "gather_evidence", call })] });

    expect(events.map((event) => event.type)).toEqual([
      "token",
      "token",
      "tool_started",
      "tool_finished",
      "token",
      "token",
      "final_answer"
    ]);
    expect(call).toHaveBeenCalledWith({ k: 5, query: "ward" });
    expect(events[2]).toEqual({
      type: "tool_started",
      tool: "gather_evidence",
      input: { k: 5, query: "ward" },
      description: "Running ward"
    });
    expect(final.text).toBe("Ward charges are capped.");
    expect(final.reason).toBe("answer");

    expect(streamCalls[1][1]).toBe("Are ward charges capped?");
    expect(streamCalls[1][2]).toBe(
      "Thought: I need evidence.\nAction: gather_evidence\nAction Input: {\"query\":\"ward\"}"
    );
    expect(streamCalls[1][3]).toBe("Observation: Found 2 pieces of evidence.");
  });

  it("treats output without the reasoning format as a bare answer", async () => {
    const { model } = scriptedChatModel({ streams: [["The deductible ", "is yearly."]] });

    const { final } = await run({ chatModel: model, tools: [] });

    expect(final.text).toBe("The deductible is yearly.");
    expect(final.reason).toBe("answer");
  });

  it("feeds unknown tools and malformed input back as observations", async () => {
    const { model, streamCalls } = scriptedChatModel({
      streams: [
        ["Thought: search the web\nAction: search_web\nAction Input: {\"query\": \"ward\"}"],
        ["Thought: search\nAction: gather_evidence\nAction Input: {'query': 'ward'}"],
        ["Thought: done\nAnswer: ok"]
      ]
    });
    const call = vi.fn().mockResolvedValue("unused");

    const { final } = await run({ chatModel: model, tools: [fakeTool({ name: "gather_evidence", call })] });

    expect(call).not.toHaveBeenCalled();
    expect(final.text).toBe("ok");
    expect(final.reasoning.map((step) => step.kind)).toEqual(["action", "observation", "observation", "response"]);
    expect(final.reasoning[1]).toEqual({
      kind: "observation",
      observation: "Error: No such tool named `search_web`.",
      isError: true,
      returnDirect: false
    });
    expect(streamCalls[2][streamCalls[2].length - 1]).toBe(`Observation: ${PARSE_FAILURE_MESSAGE}`);
  });

  it("reports tool failures as error observations and keeps going", async () => {
    const call = vi.fn().mockRejectedValue(new Error("store offline"));
    const { model } = scriptedChatModel({ streams: [[GATHER_CALL], ["Thought: stuck\nAnswer: I cannot answer."]] });

    const { events, final } = await run({ chatModel: model, tools: [fakeTool({ name: "gather_evidence", call })] });

    expect(events).toContainEqual({
      type: "tool_finished",
      tool: "gather_evidence",
      output: "Error: store offline",
      isError: true
    });
    expect(final.text).toBe("I cannot answer.");
  });

  it("ends with the tool output when a tool returns directly", async () => {
    const call = vi.fn().mockResolvedValue("Direct output");
    const { model, streamCalls } = scriptedChatModel({ streams: [[GATHER_CALL]] });

    const { final } = await run({
      chatModel: model,
      tools: [fakeTool({ name: "gather_evidence", returnDirect: true, call })]
    });

    expect(final).toMatchObject({ text: "Direct output", reason: "return_direct" });
    expect(streamCalls).toHaveLength(1);
  });

  it("does not return directly when the direct tool fails", async () => {
    const call = vi.fn().mockRejectedValue(new Error("boom"));
    const { model } = scriptedChatModel({ streams: [[GATHER_CALL], ["Thought: ok\nAnswer: Fallback answer."]] });

    const { final } = await run({
      chatModel: model,
      tools: [fakeTool({ name: "gather_evidence", returnDirect: true, call })]
    });

    expect(final).toMatchObject({ text: "Fallback answer.", reason: "answer" });
  });

  it("stops at the iteration limit with the last partial buffer", async () => {
    const call = vi.fn().mockResolvedValue("Found 0 pieces of evidence.");
    const { model, streamCalls } = scriptedChatModel({
      streams: [[GATHER_CALL], [GATHER_CALL], [GATHER_CALL], [GATHER_CALL]]
    });

    const { final } = await run({
      chatModel: model,
      tools: [fakeTool({ name: "gather_evidence", call })],
      maxIterations: 3
    });

    expect(streamCalls).toHaveLength(3);
    expect(call).toHaveBeenCalledTimes(3);
    expect(final).toMatchObject({ text: GATHER_CALL, reason: "iteration_limit" });
  });

  it("retries transient stream failures with a fixed delay", async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const { model } = scriptedChatModel({
      streams: [
        new EngineError({ code: "TRANSIENT_IO", message: "socket closed" }),
        new EngineError({ code: "UPSTREAM_ERROR", message: "unavailable", status: 503 }),
        ["Riders cost extra."]
      ]
    });

    const { events, final } = await run({ chatModel: model, tools: [], sleep });

    expect(events.filter((event) => event.type === "retry")).toEqual([
      { type: "retry", attempt: 1, delayMs: 5000, error: "socket closed" },
      { type: "retry", attempt: 2, delayMs: 5000, error: "unavailable" }
    ]);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(5000, undefined);
    expect(final.text).toBe("Riders cost extra.");
  });

  it("falls back to the canned response once retries run out", async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const transient = () => new EngineError({ code: "TRANSIENT_IO", message: "socket closed" });
    const { model, streamCalls } = scriptedChatModel({ streams: [transient(), transient(), transient()] });

    const { final } = await run({ chatModel: model, tools: [], sleep, maxRetries: 2, retryDelayMs: 10 });

    expect(streamCalls).toHaveLength(3);
    expect(sleep).toHaveBeenCalledWith(10, undefined);
    expect(final).toMatchObject({ text: FALLBACK_RESPONSE_CONTENT, reason: "fallback" });
  });

  it("falls back without retrying when the provider rejects the request", async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const { model, streamCalls } = scriptedChatModel({
      streams: [new EngineError({ code: "UPSTREAM_ERROR", message: "bad request", status: 400 })]
    });

    const { final } = await run({ chatModel: model, tools: [], sleep });

    expect(streamCalls).toHaveLength(1);
    expect(sleep).not.toHaveBeenCalled();
    expect(final).toMatchObject({ text: FALLBACK_RESPONSE_CONTENT, reason: "fallback" });
    expect(console.error).toHaveBeenCalledWith("Failed to stream chat completion", { error: "bad request" });
  });

  it("raises contract violations from the model", async () => {
    const { model } = scriptedChatModel({ streams: [contractViolation("messages must not be empty")] });

    await expect(run({ chatModel: model, tools: [] })).rejects.toThrow("messages must not be empty");
  });

  it("stops between tokens once cancelled", async () => {
    const controller = new AbortController();
    const { model } = scriptedChatModel({ streams: [["The ded", "uctible", " is yearly."]] });

    const events: AnswerLoopEvent[] = [];
    for await (const event of runAnswerLoop({
      question: "q",
      history: [],
      policies: [],
      chatModel: model,
      tools: [],
      signal: controller.signal
    })) {
      events.push(event);
      if (event.type === "token") {
        controller.abort();
      }
    }

    expect(events).toHaveLength(2);
    expect(events[1]).toMatchObject({ type: "final_answer", text: "The ded", reason: "cancelled" });
  });
});
