/**
 * Fenced code block extraction from model responses.
 */

const FENCE = "```";

/**
 * Return the content of the first block fenced with `lang`; failing that,
 * the first fenced block of any kind; failing that, the trimmed text.
 *
 * @example
 * ```typescript
 * extractFencedBlock("Here:\n```lean\ntheorem t : 1 = 1 := rfl\n```", "lean");
 * // "theorem t : 1 = 1 := rfl"
 * ```
 */
export function extractFencedBlock(text: string, lang: string): string {
  const tagged = new RegExp(`${FENCE}${escapeRegExp(lang)}(?![\\w+#.-])[^\\S\\n]*\\n?([\\s\\S]*?)${FENCE}`);
  const match = tagged.exec(text);
  if (match) {
    return (match[1] ?? "").trim();
  }

  const start = text.indexOf(FENCE);
  if (start !== -1) {
    const end = text.indexOf(FENCE, start + FENCE.length);
    const body = text.slice(start + FENCE.length, end === -1 ? undefined : end);
    // Drop the info string of the opening fence, if any
    const newline = body.indexOf("\n");
    const firstLine = newline === -1 ? body : body.slice(0, newline);
    const content = /^[\w+#.-]+$/.test(firstLine.trim()) && newline !== -1 ? body.slice(newline + 1) : body;
    return content.trim();
  }

  return text.trim();
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
