/**
 * Completion text -> JSON value.
 *
 * Models asked for strict JSON still wrap it in a Markdown fence now and
 * then ("```json ... ```"); the fence is removed before parsing.
 */

const FENCE_PATTERN = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?\s*```$/;

export function stripCodeFence(content: string): string {
  const trimmed = content.trim();
  const match = trimmed.match(FENCE_PATTERN);
  return match ? match[1].trim() : trimmed;
}

/**
 * Throws SyntaxError when the (unfenced) text is not JSON.
 */
export function parseCompletionJson(content: string): unknown {
  return JSON.parse(stripCodeFence(content));
}
