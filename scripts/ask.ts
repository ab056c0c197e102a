import { createInterface } from "node:readline/promises";
import { formatReferenceList } from "@/lib/citations";
import { loadConfig } from "@/lib/config";
import { CostCollector } from "@/lib/costCollector";
import { toErrorMessage } from "@/lib/errors";
import { createOpenAIChatModel, createOpenAIEmbeddingModel } from "@/lib/openai";
import { loadPolicyCatalog } from "@/lib/policies";
import { PgChunkStore, createPool } from "@/lib/retrieval";
import { ChatSession } from "@/server/chatSession";

const HELP = [
  "Commands:",
  "  /policy <name>  search only this policy",
  "  /policy         search every policy",
  "  /reset          start a new conversation",
  "  /quit           exit"
].join("\n");

async function askOnce(session: ChatSession, question: string, signal: AbortSignal) {
  for await (const event of session.ask(question, { signal })) {
    switch (event.type) {
      case "tool_started":
        console.log(`... ${event.description}`);
        break;
      case "retry":
        console.log(`... model stream failed (${event.error}), retrying in ${event.delayMs / 1000}s`);
        break;
      case "citation_retry":
        console.log("... answer had malformed citations, asking again");
        break;
      case "turn_complete": {
        console.log(`\n${event.turn.text}\n`);
        const references = formatReferenceList(event.turn.references);
        if (references) {
          console.log(`References:\n\n${references}\n`);
        }
        break;
      }
      default:
        break;
    }
  }

  const suggestions = await session.suggestFollowUps();
  if (suggestions.length > 0) {
    console.log(`You could ask:\n${suggestions.map((suggestion) => `- ${suggestion}`).join("\n")}\n`);
  }
}

async function run() {
  const config = loadConfig();
  if (!config.openaiApiKey) {
    console.error("OPENAI_API_KEY is required.");
    process.exit(1);
  }

  if (!config.databaseUrl) {
    console.error("DATABASE_URL is required.");
    process.exit(1);
  }

  const costs = new CostCollector({ logCosts: config.logCosts });
  const connection = { openaiApiKey: config.openaiApiKey, openaiBaseUrl: config.openaiBaseUrl };
  const pool = createPool(config.databaseUrl);
  const catalog = loadPolicyCatalog();

  const session = new ChatSession({
    chatModel: createOpenAIChatModel({ config: connection, model: config.chatModel, label: "agent", costs }),
    summaryModel: createOpenAIChatModel({ config: connection, model: config.summaryModel, label: "summary", costs }),
    embeddingModel: createOpenAIEmbeddingModel({ config: connection, model: config.embeddingsModel, costs }),
    store: new PgChunkStore({ db: pool }),
    catalog,
    settings: config,
    costs
  });

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  let current: AbortController | null = null;
  rl.on("SIGINT", () => {
    if (current) {
      current.abort();
      return;
    }

    rl.close();
  });

  console.log(`Policies: ${catalog.policies.join(", ")}\n${HELP}\n`);

  try {
    for (;;) {
      let line: string;
      try {
        line = (await rl.question("> ")).trim();
      } catch {
        // Closed by Ctrl-C or end of input.
        break;
      }

      if (!line) {
        continue;
      }

      if (line === "/quit") {
        break;
      }

      if (line === "/reset") {
        session.reset();
        console.log("Started a new conversation.");
        continue;
      }

      if (line === "/policy" || line.startsWith("/policy ")) {
        const name = line.slice("/policy".length).trim();
        try {
          session.setPolicy(name || null);
          console.log(session.currentPolicy ? `Searching ${session.currentPolicy} only.` : "Searching every policy.");
        } catch (error) {
          console.error(toErrorMessage(error));
        }
        continue;
      }

      if (line.startsWith("/")) {
        console.log(HELP);
        continue;
      }

      current = new AbortController();
      try {
        await askOnce(session, line, current.signal);
      } catch (error) {
        console.error("Failed to answer question", { error: toErrorMessage(error) });
      } finally {
        current = null;
      }
    }
  } finally {
    rl.close();
    await pool.end();
    if (config.logCosts) {
      console.info(`[cost] session total $${costs.totalUsd().toFixed(6)}`);
    }
  }
}

run().catch((error: unknown) => {
  console.error("Failed to run ask", { error: toErrorMessage(error) });
  process.exitCode = 1;
});
