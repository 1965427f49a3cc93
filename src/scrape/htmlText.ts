export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

export function containsAny(haystack: string, needles: readonly string[]): boolean {
  const lowered = haystack.toLowerCase();
  return needles.some((needle) => needle.length > 0 && lowered.includes(needle.toLowerCase()));
}
