// ── JSON extraction ─────────────────────────────────────────

/**
 * Pull the JSON object out of an LLM reply: fenced block first, then the
 * outermost braces, else the trimmed text unchanged.
 */
export function extractJSON(raw: string): string {
  const fenced = /```(?:json)?\s*\n?([\s\S]*?)```/.exec(raw);
  if (fenced?.[1]) return fenced[1].trim();

  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start !== -1 && end > start) return raw.slice(start, end + 1);

  return raw.trim();
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(value: unknown, indent?: number): string {
  return JSON.stringify(value, sortedReplacer, indent);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  const source: Record<string, unknown> = { ...value };
  const sorted: Record<string, unknown> = {};
  for (const k of Object.keys(source).sort()) {
    sorted[k] = source[k];
  }
  return sorted;
}
