function normalize(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9@\s]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function wordCount(text: string): number {
  return normalize(text).split(" ").filter(Boolean).length;
}

/**
 * Weak signal that the other side is automated: the last three messages all
 * have the same word count. Never feeds the scam verdict.
 */
export function detectBotPattern(history: readonly string[]): boolean {
  if (history.length < 3) return false;
  const counts = history.slice(-3).map(wordCount);
  return counts.every((count) => count === counts[0]);
}
