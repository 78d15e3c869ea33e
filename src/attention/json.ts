import { DecisionParseError } from './errors.js';

const FENCED_BLOCK = /```[A-Za-z]*[ \t]*\r?\n?([\s\S]*?)```/u;

const parseOrError = (candidate: string): { value: unknown } | { error: string } => {
  try {
    return { value: JSON.parse(candidate) as unknown };
  } catch (err) {
    return { error: err instanceof Error ? err.message : String(err) };
  }
};

/**
 * Pulls the JSON object out of model output. A fenced code block wins when it
 * parses; otherwise the widest `{ ... }` span (first `{` to last `}`) is tried.
 */
export const extractJsonObject = (text: string): unknown => {
  const t = text.trim();
  let lastError: string | undefined;

  const fenced = FENCED_BLOCK.exec(t)?.[1]?.trim();
  if (fenced) {
    const result = parseOrError(fenced);
    if ('value' in result) return result.value;
    lastError = result.error;
  }

  const start = t.indexOf('{');
  const end = t.lastIndexOf('}');
  if (start >= 0 && end > start) {
    const result = parseOrError(t.slice(start, end + 1));
    if ('value' in result) return result.value;
    lastError = result.error;
  }

  const detail = lastError ? ` (${lastError})` : '';
  throw new DecisionParseError(`No JSON object found in model output${detail}.`, text);
};
