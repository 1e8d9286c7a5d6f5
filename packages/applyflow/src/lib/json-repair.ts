/**
 * Pull a JSON value out of LLM output that may carry markdown fences,
 * surrounding prose or trailing commas. Returns undefined when nothing parses.
 */
export function extractJson(text: string): unknown {
  if (!text) return undefined;

  let cleaned = text.replace(/^```(?:json)?\s*\n?/i, '').replace(/\n?```\s*$/i, '').trim();
  const direct = tryParse(cleaned);
  if (direct !== undefined) return direct;

  const firstBrace = cleaned.indexOf('{');
  const firstBracket = cleaned.indexOf('[');
  let start = -1;
  let closeChar = '';
  if (firstBrace >= 0 && (firstBracket < 0 || firstBrace < firstBracket)) {
    start = firstBrace;
    closeChar = '}';
  } else if (firstBracket >= 0) {
    start = firstBracket;
    closeChar = ']';
  }

  if (start >= 0) {
    const lastClose = cleaned.lastIndexOf(closeChar);
    if (lastClose > start) {
      cleaned = cleaned.slice(start, lastClose + 1);
      const extracted = tryParse(cleaned);
      if (extracted !== undefined) return extracted;
    }
  }

  return tryParse(cleaned.replace(/,\s*([\]}])/g, '$1'));
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
