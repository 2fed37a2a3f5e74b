/**
 * Next number in a `PREFIX-NNN` style sequence, given the identifiers already issued.
 * Gaps left by deletions are never reused.
 */
export function nextSequence(existing: string[], pattern: RegExp): number {
  let max = 0;
  for (const value of existing) {
    const match = pattern.exec(value);
    if (match) {
      max = Math.max(max, parseInt(match[1], 10));
    }
  }
  return max + 1;
}

export function pad3(n: number): string {
  return String(n).padStart(3, '0');
}
