const FENCE_PATTERN = /```([\w+-]*)[^\S\n]*\n([\s\S]*?)\n?```/g;

export interface CodeFence {
  language: string;
  body: string;
}

export function findCodeFences(text: string): CodeFence[] {
  const fences: CodeFence[] = [];
  for (const match of text.matchAll(FENCE_PATTERN)) {
    fences.push({ language: match[1].toLowerCase(), body: match[2] });
  }
  return fences;
}

/**
 * Code from a model response: the first fence tagged with one of
 * `preferredLanguages`, else the first fence, else the whole trimmed text.
 */
export function extractCodeBlock(text: string, preferredLanguages: string[] = []): string {
  const fences = findCodeFences(text);
  const preferred = fences.find((fence) => preferredLanguages.includes(fence.language));
  const chosen = preferred ?? fences[0];
  return chosen ? chosen.body : text.trim();
}

/**
 * Parse the JSON object in a model response. Fenced blocks are tried first,
 * then the span from the first `{` to the last `}`. Returns null when
 * nothing parses.
 */
export function extractJsonObject(text: string): unknown {
  const candidates = findCodeFences(text).map((fence) => fence.body);
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start >= 0 && end > start) candidates.push(text.slice(start, end + 1));

  for (const candidate of candidates) {
    try {
      const value: unknown = JSON.parse(candidate);
      if (typeof value === 'object' && value !== null && !Array.isArray(value)) return value;
    } catch {
      // try the next candidate
    }
  }
  return null;
}
