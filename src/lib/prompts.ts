export const SUMMARY_LENGTH = "about 100 words";
export const ANSWER_LENGTH = "about 200 words, but can be longer";

export const EXAMPLE_CITATION = "(Example2012Example pages 3-4)";
export const EXAMPLE_CITATION_QUOTE =
  "(Example2012Example pages 3-4 quote1, quote2, Example2012Example pages 10-13 quote1)";

export const FALLBACK_RESPONSE_CONTENT = "Sorry, something seems to have gone wrong.";

export function buildSummarySystemPrompt(summaryLength = SUMMARY_LENGTH): string {
  return (
    "Provide a summary of the relevant information that could help answer the question based on the excerpt. " +
    "Respond with the following JSON format:\n\n" +
    "{\n" +
    "  \"summary\": \"...\",\n" +
    "  \"relevance_score\": \"...\",\n" +
    "  \"points\": [\n" +
    "    {\n" +
    "      \"quote\": \"...\",\n" +
    "      \"point\": \"...\"\n" +
    "    }\n" +
    "  ]\n" +
    "}\n\n" +
    `where \`summary\` is relevant information from text - ${summaryLength}, ` +
    "`relevance_score` is the relevance of `summary` to answer question (out of 10), " +
    "and `points` is an array of at most 10 `point` and `quote` pairs that supports the summary where each `quote` " +
    "is an exact match quote (max 50 words) from the text that best supports the respective `point`. " +
    "Make sure that the quote is an exact match without truncation or changes. " +
    "Do not truncate the quote with any ellipsis."
  );
}

export function buildSummaryUserPrompt(params: { citation: string; text: string; question: string }): string {
  return `Excerpt from ${params.citation}\n\n----\n\n${params.text}\n\n----\n\nQuestion: ${params.question}\n\n`;
}

export function buildQaPrompt(params: { context: string; question: string; answerLength?: string }): string {
  return (
    "Answer the question below with the context.\n\n" +
    `Context (with relevance scores):\n\n${params.context}\n\n----\n\n` +
    `Question: ${params.question}\n\n` +
    "Write an answer based on the context. " +
    "If the context provides insufficient information reply \"I cannot answer.\" " +
    "For each part of your answer, indicate which sources and quotes most support " +
    "it via citation keys at the end of sentences, " +
    `like ${EXAMPLE_CITATION} or ${EXAMPLE_CITATION_QUOTE}. Only cite from the context ` +
    "above and only use the valid keys or quotes. As much as possible, cite quotes. " +
    "Do not repeat any quote verbatim in your answer. " +
    "Write in a style accessible to the layperson but keep your " +
    "wording and content accurate without any misrepresentation. " +
    "The context comes from a variety of sources and is only a summary, " +
    "so there may be inaccuracies or ambiguities. Do not add any extraneous information." +
    "\n\n" +
    `Answer (${params.answerLength ?? ANSWER_LENGTH}, please split into paragraphs of about 50 to 60 words each):`
  );
}

export function buildAgentSystemPrompt(params: { toolDescriptions: string; toolNames: string[]; policies: string[] }): string {
  const policyLines = params.policies.length
    ? params.policies.map((policy) => `- ${policy}`).join("\n")
    : "- (no policies are loaded)";

  return `You are a large language model designed to help with a variety of tasks, from answering questions to providing summaries to other types of analyses.

You will be speaking to a user about health insurance policies.

## Tools
You have access to a wide variety of tools. You are responsible for using
the tools in any sequence you deem appropriate to complete the task at hand.
This may require breaking the task into subtasks and using different tools
to complete each subtask.

The tools allow you to interact with a database containing documents about
different insurance policies, split into chunks. As such, if you want to
compare different policies, you should first query for each policy individually using multiple gather_evidence tool calls.

The policies that you can access via the tools include:
${policyLines}

You have access to the following tools:
${params.toolDescriptions}

## Output Format
To answer the question, please use the following format.

\`\`\`
Thought: I need to use a tool to help me answer the question.
Action: tool name (one of ${params.toolNames.join(", ")}) if using a tool.
Action Input: the input to the tool, in a JSON format representing the kwargs (e.g. {"input": "hello world", "num_beams": 5})
\`\`\`

Please ALWAYS start with a Thought.

Please only run ONE tool at a time.

Please use a valid JSON format for the Action Input. Do NOT do this {'input': 'hello world', 'num_beams': 5}.

If this format is used, the user will respond in the following format:

\`\`\`
Observation: tool response
\`\`\`

You should keep repeating the above format until you have enough information
to answer the question without using any more tools. At that point, you MUST respond
in the one of the following two formats:

\`\`\`
Thought: I can answer without using any more tools.
Answer: [your answer here]
\`\`\`

\`\`\`
Thought: I cannot answer the question with the provided tools.
Answer: Sorry, I cannot answer your query.
\`\`\`

## Additional Rules
- You should ALWAYS try using the gather_evidence tool if the user is asking a question about insurance
- After using retrieve_evidence, if the output seems to indicate insufficient information, you should call gather_evidence again to gather the missing information
- Important! Before answering that you need more information, make sure you've tried using the gather_evidence tool!

## Current Conversation
Below is the current conversation consisting of interleaving human and assistant messages.
`;
}

export const PARSE_FAILURE_MESSAGE = `Error: Could not parse output. Please follow the thought-action-input format. Try again.
Maybe you should try calling the gather_evidence tool.
Remember that the format should be
\`\`\`
Thought: I need to use a tool to help me answer the question.
Action: tool name if using a tool.
Action Input: the input to the tool, in a JSON format representing the kwargs (e.g. {"input": "hello world", "num_beams": 5})
\`\`\`
`;

export function buildCitationRetryInstruction(problem: string): string {
  return (
    `Your previous answer could not be used: ${problem} ` +
    "Answer the same question again. Cite only inside parentheses using the valid keys, " +
    `like ${EXAMPLE_CITATION} or ${EXAMPLE_CITATION_QUOTE}. ` +
    "Never mention a key outside a citation and never include your Thought in the Answer."
  );
}

export function buildSuggestFollowUpPrompt(policies: string[]): string {
  return `Suggest 0 to 2 follow-up responses that can be presented to the user.
These responses are potential replies that the user can pose to you.

Choose from the following options:
- A general relevant question no more than 10 words
- "How does this compare to <another policy>"
- "Format your response as a table" # Use this if your prior response can be expressed as a table
- "Simplify your response" # Use this if your prior response might be too verbose

Where <another policy> is one of:
${policies.map((policy) => `- ${policy}`).join("\n")}

Do not suggest responses similar to the user's last 5 responses.

Only suggest relevant responses.
If no follow-up responses are appropriate, simply return an empty list.

Format your answer like this:

Thought: <thought process>

\`\`\`json
[
    "<suggestion 1>",
    ...
]
\`\`\`
`;
}
