export function normalizeText(s: string): string {
  return s
    .replace(/\r\n?/g, "\n")
    .replace(/\t/g, "  ")
    .replace(/[ \u00A0]+/g, " ")
    .replace(/ *\n */g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

/** Keeps head and tail of very long text so prompts stay within budget. */
export function clipText(t: string, maxChars = 60000): string {
  if (t.length <= maxChars) return t;
  const head = t.slice(0, Math.floor(maxChars * 0.6));
  const tail = t.slice(-Math.floor(maxChars * 0.4));
  return `${head}\n...\n${tail}`;
}
