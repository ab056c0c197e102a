import { describe, expect, it } from "vitest";
import { EvidenceCache } from "@/lib/evidenceCache";
import { parsePolicyCatalog } from "@/lib/policies";
import { InMemoryChunkStore } from "@/lib/vectorStore";
import { createEvidenceTools, describeToolCall, formatToolDescriptions, type Tool } from "./tools";
import { fakeEmbeddingModel, makeChunk, scriptedChatModel } from "../../test/helpers";

const catalog = parsePolicyCatalog({
  policiesCsv: "policy,document_id\nHarbor Shield,doc-Harbor2024\nCare Plus,doc-Care2023\n",
  plansCsv: "policy,plan,coverage,riders\nHarbor Shield,Standard,Class A,Harbor Care\nCare Plus,Basic,Basic,\n"
});

function setup(defaultPolicy?: string) {
  const store = new InMemoryChunkStore([
    makeChunk({ id: "h1", docname: "Harbor2024", pages: [1, 2], embedding: [1, 0] }),
    makeChunk({ id: "h2", docname: "Harbor2024", pages: [3, 4], embedding: [0.9, 0.1] }),
    makeChunk({ id: "c1", docname: "Care2023", pages: [1, 2], embedding: [1, 0] })
  ]);
  const prompts: string[] = [];
  const { model } = scriptedChatModel({
    chat: (prompt) => {
      prompts.push(prompt);
      return "{\"summary\": \"Ward charges are capped.\", \"relevance_score\": 6}";
    }
  });
  const cache = new EvidenceCache();
  const tools = createEvidenceTools({
    store,
    embeddingModel: fakeEmbeddingModel([1, 0]),
    summaryModel: model,
    cache,
    catalog,
    evidenceK: 5,
    mmrLambda: 0.9,
    summaryConcurrency: 2,
    defaultPolicy
  });

  const byName = (name: string): Tool => {
    const tool = tools.find((candidate) => candidate.name === name);
    if (!tool) {
      throw new Error(`missing tool ${name}`);
    }
    return tool;
  };

  return { cache, prompts, tools, byName };
}

describe("evidence tools", () => {
  it("gathers evidence for one policy into the cache", async () => {
    const { cache, byName } = setup();

    const output = await byName("gather_evidence").call({ query: "ward charges", policy: "harbor shield", k: 2 });

    expect(output).toBe("Found 2 pieces of evidence. Call retrieve_evidence to view the evidence.");
    expect(cache.validKeys()).toEqual(["Harbor2024 pages 1-2", "Harbor2024 pages 3-4"]);
  });

  it("searches the default policy when none is given", async () => {
    const { cache, byName } = setup("Care Plus");
    const tool = byName("gather_evidence");

    expect(tool.defaultKwargs).toEqual({ k: 5, policy: "Care Plus" });
    await tool.call({ ...tool.defaultKwargs, query: "ward charges" });
    expect(cache.validKeys()).toEqual(["Care2023 pages 1-2"]);
  });

  it("rejects unknown policies", async () => {
    const { byName } = setup();

    await expect(byName("gather_evidence").call({ query: "ward", policy: "Gold Shield", k: 2 })).rejects.toThrow(
      'Unknown policy "Gold Shield". Valid policies are: Harbor Shield, Care Plus'
    );
  });

  it("summarizes every chunk of a policy for an overview", async () => {
    const { cache, prompts, byName } = setup();

    const output = await byName("gather_policy_overview").call({ policy: "Care Plus" });

    expect(output).toBe("Found 1 pieces of evidence about Care Plus. Call retrieve_evidence to view the evidence.");
    expect(cache.size).toBe(1);
    expect(prompts[0]).toContain("Question: Give an overview of the Care Plus policy.");
  });

  it("turns the cache into an answering instruction", async () => {
    const { byName } = setup();
    await byName("gather_evidence").call({ query: "ward charges", policy: "Harbor Shield", k: 2 });

    const output = await byName("retrieve_evidence").call({ question: "Are ward charges capped?" });

    expect(output).toContain("Valid Keys: Harbor2024 pages 1-2, Harbor2024 pages 3-4\n\n----\n\n");
    expect(output).toContain("Question: Are ward charges capped?\n\n");
  });

  it("lists plans and riders for one or more policies", async () => {
    const { byName } = setup();

    const output = await byName("retrieve_policy_plans_and_riders").call({ policies: ["Harbor Shield", "Care Plus"] });

    expect(output).toContain("\nThe Harbor Shield policy comprises the following.\n");
    expect(output).toContain("\nPlan: Basic\nCoverage: Basic (basic coverage sized for subsidised wards in public hospitals)\nRiders:\nNone\n");
    await expect(byName("retrieve_policy_plans_and_riders").call({ policies: [] })).rejects.toThrow(
      "Missing required argument `policies` (expected a list of strings)."
    );
  });
});

describe("tool metadata", () => {
  it("fills progress templates from arguments and defaults", () => {
    const { byName } = setup();

    expect(describeToolCall(byName("gather_evidence"), { query: "day surgery" })).toBe(
      "Searching for evidence about day surgery"
    );
    expect(describeToolCall(byName("retrieve_policy_plans_and_riders"), { policies: ["A", "B"] })).toBe(
      "Looking up plans and riders for A, B"
    );
  });

  it("describes arguments with their defaults", () => {
    const { tools } = setup();

    expect(formatToolDescriptions(tools)).toContain(
      "> Tool Name: gather_evidence\n" +
        "Tool Description: Find and return pieces of evidence that are relevant to a given query. " +
        "This can be called multiple times with varying search terms if insufficient information was found. " +
        "Pass `policy` to search a single policy only.\n" +
        'Tool Args: {"type":"object","properties":{"query":{"type":"string","description":"the query to be used"},' +
        '"policy":{"type":"string","description":"restrict the search to this policy"},' +
        '"k":{"type":"integer","description":"number of pieces of evidence to gather","default":5}},' +
        '"required":["query"]}\n'
    );
  });
});
