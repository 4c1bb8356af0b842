export function normalizeTechName(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9+#.]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

// Lowercased words joined by single spaces, so multi-word terms can be found as phrases.
export function phraseOf(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9+#.]/g, " ")
    .split(/\s+/)
    .map((token) => token.replace(/^\.+|\.+$/g, ""))
    .filter((token) => token.length > 0)
    .join(" ");
}

export function tokenize(text: string): Set<string> {
  return new Set(
    phraseOf(text)
      .split(" ")
      .filter((token) => token.length >= 3),
  );
}

export function countOverlap(left: ReadonlySet<string>, right: ReadonlySet<string>): number {
  let total = 0;
  for (const token of left) {
    if (right.has(token)) {
      total += 1;
    }
  }
  return total;
}

export function clampScore(value: number): number {
  return clampToRange(value, 0, 100);
}

export function clampToRange(value: number, min: number, max: number): number {
  if (value < min) {
    return min;
  }
  if (value > max) {
    return max;
  }
  return value;
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
