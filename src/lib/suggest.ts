import { toErrorMessage } from "@/lib/errors";
import type { ChatMessage, ChatModel } from "@/lib/llm";
import { parseLlmJson } from "@/lib/llmJson";
import { buildSuggestFollowUpPrompt } from "@/lib/prompts";

export const MAX_FOLLOW_UPS = 2;

/**
 * Up to two replies the user could send next, given the conversation so far.
 * Returns an empty list when the model's reply holds no usable JSON array.
 */
export async function suggestFollowUps(params: {
  chatModel: ChatModel;
  history: readonly ChatMessage[];
  policies: string[];
}): Promise<string[]> {
  const messages: ChatMessage[] = [
    ...params.history,
    { role: "user", content: buildSuggestFollowUpPrompt(params.policies) }
  ];

  try {
    const completion = await params.chatModel.chat(messages, { temperature: 0.2 });
    const parsed = parseLlmJson(completion.text);
    if (!Array.isArray(parsed)) {
      return [];
    }

    return parsed
      .filter((item): item is string => typeof item === "string")
      .map((item) => item.trim())
      .filter(Boolean)
      .slice(0, MAX_FOLLOW_UPS);
  } catch (error) {
    console.warn("Failed to suggest follow-up responses", { error: toErrorMessage(error) });
    return [];
  }
}
