import type { EvidenceCache } from "@/lib/evidenceCache";
import { summarizeEvidence } from "@/lib/evidenceSummarizer";
import type { ChatModel, EmbeddingModel } from "@/lib/llm";
import type { PolicyCatalog } from "@/lib/policies";
import { buildQaPrompt } from "@/lib/prompts";
import { maxMarginalRelevanceSearch, type ChunkFilter, type ChunkStore } from "@/lib/vectorStore";

export type ToolArgumentType = "string" | "integer" | "string[]";

export type ToolArgument = {
  name: string;
  type: ToolArgumentType;
  description: string;
  required: boolean;
};

export type ToolKwargs = Record<string, unknown>;

export type Tool = {
  name: string;
  description: string;
  arguments: ToolArgument[];
  /** Progress line with `{argument}` placeholders, e.g. "Searching for {query}". */
  outputDescription: string;
  defaultKwargs: ToolKwargs;
  /** When set, a successful call ends the loop with the tool's output as the answer. */
  returnDirect: boolean;
  call(kwargs: ToolKwargs): Promise<string>;
};

export const GATHER_EVIDENCE_TOOL = "gather_evidence";
export const GATHER_POLICY_OVERVIEW_TOOL = "gather_policy_overview";
export const RETRIEVE_EVIDENCE_TOOL = "retrieve_evidence";
export const RETRIEVE_POLICY_PLANS_TOOL = "retrieve_policy_plans_and_riders";

function readString(kwargs: ToolKwargs, name: string): string {
  const value = kwargs[name];
  if (typeof value !== "string" || !value.trim()) {
    throw new Error(`Missing required argument \`${name}\` (expected a non-empty string).`);
  }

  return value.trim();
}

function readOptionalString(kwargs: ToolKwargs, name: string): string | null {
  const value = kwargs[name];
  if (value === undefined || value === null || value === "") {
    return null;
  }

  return readString(kwargs, name);
}

function readPositiveInteger(kwargs: ToolKwargs, name: string): number {
  const value = kwargs[name];
  const parsed = typeof value === "string" ? Number(value) : value;
  if (typeof parsed !== "number" || !Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`Argument \`${name}\` must be a positive integer.`);
  }

  return parsed;
}

function readStringList(kwargs: ToolKwargs, name: string): string[] {
  const value = kwargs[name];
  if (typeof value === "string") {
    return [readString(kwargs, name)];
  }

  if (!Array.isArray(value) || value.length === 0 || !value.every((item): item is string => typeof item === "string")) {
    throw new Error(`Missing required argument \`${name}\` (expected a list of strings).`);
  }

  return value.map((item) => item.trim());
}

function formatArgumentValue(value: unknown): string {
  if (Array.isArray(value)) {
    return value.map(formatArgumentValue).join(", ");
  }

  return value === undefined || value === null ? "" : String(value);
}

/** Fills the tool's output-description template from the call's arguments. */
export function describeToolCall(tool: Tool, kwargs: ToolKwargs): string {
  const merged = { ...tool.defaultKwargs, ...kwargs };
  return tool.outputDescription.replace(/\{(\w+)\}/g, (_, name: string) => formatArgumentValue(merged[name]));
}

function formatToolArgs(tool: Tool): string {
  const properties: Record<string, { type: string; description: string; default?: unknown }> = {};
  for (const argument of tool.arguments) {
    const type = argument.type === "string[]" ? "array" : argument.type;
    properties[argument.name] =
      argument.name in tool.defaultKwargs
        ? { type, description: argument.description, default: tool.defaultKwargs[argument.name] }
        : { type, description: argument.description };
  }

  return JSON.stringify({
    type: "object",
    properties,
    required: tool.arguments.filter((argument) => argument.required).map((argument) => argument.name)
  });
}

export function formatToolDescriptions(tools: readonly Tool[]): string {
  return tools
    .map((tool) => `> Tool Name: ${tool.name}\nTool Description: ${tool.description}\nTool Args: ${formatToolArgs(tool)}\n`)
    .join("\n");
}

export type EvidenceToolsParams = {
  store: ChunkStore;
  embeddingModel: EmbeddingModel;
  summaryModel: ChatModel;
  cache: EvidenceCache;
  catalog: PolicyCatalog;
  evidenceK: number;
  mmrLambda: number;
  summaryConcurrency: number;
  /** Policy searched when `gather_evidence` is called without one. */
  defaultPolicy?: string | null;
};

function policyFilter(catalog: PolicyCatalog, policy: string | null): { policy: string | null; filter?: ChunkFilter } {
  if (policy === null) {
    return { policy: null };
  }

  const resolved = catalog.resolve(policy);
  if (!resolved) {
    throw new Error(`Unknown policy "${policy}". Valid policies are: ${catalog.policies.join(", ")}`);
  }

  return { policy: resolved, filter: { documentIds: catalog.documentIds(resolved) } };
}

export function createEvidenceTools(params: EvidenceToolsParams): Tool[] {
  const { cache, catalog } = params;

  const gatherEvidence: Tool = {
    name: GATHER_EVIDENCE_TOOL,
    description:
      "Find and return pieces of evidence that are relevant to a given query. " +
      "This can be called multiple times with varying search terms if insufficient information was found. " +
      "Pass `policy` to search a single policy only.",
    arguments: [
      { name: "query", type: "string", description: "the query to be used", required: true },
      { name: "policy", type: "string", description: "restrict the search to this policy", required: false },
      { name: "k", type: "integer", description: "number of pieces of evidence to gather", required: false }
    ],
    outputDescription: "Searching for evidence about {query}",
    defaultKwargs: params.defaultPolicy ? { k: params.evidenceK, policy: params.defaultPolicy } : { k: params.evidenceK },
    returnDirect: false,
    async call(kwargs) {
      const query = readString(kwargs, "query");
      const k = readPositiveInteger(kwargs, "k");
      const { filter } = policyFilter(catalog, readOptionalString(kwargs, "policy"));

      const matches = await maxMarginalRelevanceSearch({
        query,
        k,
        fetchK: 2 * k,
        lambda: params.mmrLambda,
        embeddingModel: params.embeddingModel,
        store: params.store,
        filter
      });
      const summaries = await summarizeEvidence({
        question: query,
        chunks: matches.map((match) => match.chunk),
        chatModel: params.summaryModel,
        concurrency: params.summaryConcurrency
      });
      cache.addBatch(summaries);

      return `Found ${matches.length} pieces of evidence. Call retrieve_evidence to view the evidence.`;
    }
  };

  const gatherPolicyOverview: Tool = {
    name: GATHER_POLICY_OVERVIEW_TOOL,
    description:
      "Summarize every section of one policy's documents. " +
      "Use this when the user asks for an overview of a policy rather than a specific detail.",
    arguments: [{ name: "policy", type: "string", description: "the policy to summarize", required: true }],
    outputDescription: "Reading the {policy} policy documents",
    defaultKwargs: {},
    returnDirect: false,
    async call(kwargs) {
      const { policy, filter } = policyFilter(catalog, readString(kwargs, "policy"));
      const chunks = await params.store.bulkFetch(filter);
      const summaries = await summarizeEvidence({
        question: `Give an overview of the ${policy} policy.`,
        chunks,
        chatModel: params.summaryModel,
        concurrency: params.summaryConcurrency
      });
      cache.addBatch(summaries);

      return `Found ${chunks.length} pieces of evidence about ${policy}. Call retrieve_evidence to view the evidence.`;
    }
  };

  const retrieveEvidence: Tool = {
    name: RETRIEVE_EVIDENCE_TOOL,
    description:
      "Retrieves the evidence and summaries from earlier steps and combine them with the user's question " +
      "to form an instruction to generate the final response.",
    arguments: [{ name: "question", type: "string", description: "the question to be answered", required: true }],
    outputDescription: "Reviewing the evidence",
    defaultKwargs: {},
    returnDirect: false,
    async call(kwargs) {
      return buildQaPrompt({ context: cache.renderContext(), question: readString(kwargs, "question") });
    }
  };

  const retrievePlans: Tool = {
    name: RETRIEVE_POLICY_PLANS_TOOL,
    description:
      "Lists the plans of each given policy with their ward coverage and the riders that can be added to them.",
    arguments: [{ name: "policies", type: "string[]", description: "the policies to look up", required: true }],
    outputDescription: "Looking up plans and riders for {policies}",
    defaultKwargs: {},
    returnDirect: false,
    async call(kwargs) {
      return catalog.renderPlansAndRiders(readStringList(kwargs, "policies"));
    }
  };

  return [gatherEvidence, gatherPolicyOverview, retrieveEvidence, retrievePlans];
}
