/**
 * JSON extraction from model text.
 */

/**
 * Extract JSON from text that may contain markdown code blocks or prose.
 */
export function extractJSON(text: string): string {
  // Try to extract from markdown code blocks (with or without language tag)
  const mdMatch = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (mdMatch?.[1]) {
    return mdMatch[1].trim();
  }

  // First balanced object, ignoring braces inside strings
  const start = text.indexOf('{');
  if (start >= 0) {
    let depth = 0;
    let inString = false;
    let escaped = false;

    for (let i = start; i < text.length; i++) {
      const ch = text[i];
      if (inString) {
        if (escaped) escaped = false;
        else if (ch === '\\') escaped = true;
        else if (ch === '"') inString = false;
        continue;
      }
      if (ch === '"') inString = true;
      else if (ch === '{') depth++;
      else if (ch === '}') {
        depth--;
        if (depth === 0) {
          return text.substring(start, i + 1).trim();
        }
      }
    }
  }

  return text.trim();
}

/**
 * Parse the JSON contained in model text. Returns undefined when nothing parses.
 */
export function parseModelJSON(text: string): unknown {
  try {
    return JSON.parse(extractJSON(text));
  } catch {
    return undefined;
  }
}
