import { EngineError } from "@/lib/errors";

function stripCodeFence(value: string): string {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(value);
  return fenced ? fenced[1] : value;
}

function sliceOutermost(value: string): string {
  const start = value.search(/[[{]/);
  if (start < 0) {
    return value;
  }

  const closer = value[start] === "{" ? "}" : "]";
  const end = value.lastIndexOf(closer);
  return end > start ? value.slice(start, end + 1) : value.slice(start);
}

// Models sometimes emit raw newlines inside string literals.
function escapeNewlinesInStrings(value: string): string {
  let output = "";
  let inString = false;
  let escaped = false;

  for (const char of value) {
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === "\"") {
        inString = false;
      } else if (char === "\n") {
        output += "\\n";
        continue;
      } else if (char === "\r") {
        continue;
      }
    } else if (char === "\"") {
      inString = true;
    }

    output += char;
  }

  return output;
}

/**
 * Parses JSON written by a model: tolerates code fences, prose around the
 * object, and raw newlines inside strings.
 */
export function parseLlmJson(raw: string): unknown {
  const candidate = escapeNewlinesInStrings(sliceOutermost(stripCodeFence(raw).trim()));

  try {
    const parsed: unknown = JSON.parse(candidate);
    return parsed;
  } catch (error) {
    throw new EngineError({
      code: "PARSE_ERROR",
      message: "Model output is not valid JSON",
      details: { raw: raw.slice(0, 500) },
      cause: error
    });
  }
}
