/**
 * LLM JSON response parsing
 *
 * Models wrap JSON in code fences or surround it with prose. Strip the fence,
 * try the whole text, then fall back to the outermost `{...}`; the result is
 * validated against the analyzer's zod schema.
 */

import type { z } from "zod";

export class ResponseFormatError extends Error {
  constructor(
    message: string,
    public readonly raw: string
  ) {
    super(message);
    this.name = "ResponseFormatError";
  }
}

export function stripCodeFence(text: string): string {
  let result = text.trim();
  const fence = result.match(/^```[a-zA-Z]*\s*\n?/);
  if (fence) {
    result = result.slice(fence[0].length);
  }
  if (result.endsWith("```")) {
    result = result.slice(0, -3);
  }
  return result.trim();
}

type ParseAttempt = { ok: true; value: unknown } | { ok: false; reason: string };

function tryParse(text: string): ParseAttempt {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : String(error) };
  }
}

export function extractJson(text: string): unknown {
  const cleaned = stripCodeFence(text);

  let attempt = tryParse(cleaned);
  if (!attempt.ok) {
    const start = cleaned.indexOf("{");
    const end = cleaned.lastIndexOf("}");
    if (start >= 0 && end > start) {
      attempt = tryParse(cleaned.slice(start, end + 1));
    }
  }

  if (attempt.ok) {
    return attempt.value;
  }

  throw new ResponseFormatError(`Response is not JSON (${attempt.reason}): ${cleaned.slice(0, 200)}`, text);
}

export function parseJsonResponse<S extends z.ZodTypeAny>(text: string, schema: S): z.output<S> {
  const payload = extractJson(text);
  const result = schema.safeParse(payload);

  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ResponseFormatError(`Response does not match schema: ${issues}`, text);
  }

  return result.data;
}
