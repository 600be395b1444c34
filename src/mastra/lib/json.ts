import { err, ok, type Result } from './result';

const FENCE = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * Pulls a JSON object out of model output: bare, inside a ``` fence, or embedded in prose
 * (outermost braces).
 */
export function extractJsonObject(text: string): Result<unknown, string> {
  const fenced = FENCE.exec(text);
  const candidate = (fenced ? fenced[1] : text).trim();

  const attempts = [candidate];
  const first = candidate.indexOf('{');
  const last = candidate.lastIndexOf('}');
  if (first > 0 || (first >= 0 && last >= 0 && last < candidate.length - 1)) {
    attempts.push(candidate.slice(first, last + 1));
  }

  for (const attempt of attempts) {
    try {
      const value: unknown = JSON.parse(attempt);
      if (typeof value === 'object' && value !== null && !Array.isArray(value)) return ok(value);
    } catch {
      // try the next candidate
    }
  }
  return err(candidate ? 'response is not a JSON object' : 'response is empty');
}
