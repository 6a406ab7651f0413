/** Split narrative text into lines without trailing whitespace or blank edges. */
export function normalizeDocText(text: string): string[] {
  return trimBlankEdges(text.split(/\r?\n/).map((line) => line.trimEnd()));
}

/**
 * Docstring-style cleanup: the first line loses leading whitespace, the rest
 * lose their common indentation, blank edges are dropped.
 */
export function dedentDocLines(lines: readonly string[]): string[] {
  if (lines.length === 0) return [];
  const [first, ...rest] = lines;
  let margin = Number.POSITIVE_INFINITY;
  for (const line of rest) {
    if (line.trim().length === 0) continue;
    margin = Math.min(margin, line.length - line.trimStart().length);
  }
  const cut = Number.isFinite(margin) ? margin : 0;
  const cleaned = [first.trim(), ...rest.map((line) => line.slice(cut).trimEnd())];
  return trimBlankEdges(cleaned);
}

export function trimBlankEdges(lines: readonly string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && lines[start].trim().length === 0) start += 1;
  while (end > start && lines[end - 1].trim().length === 0) end -= 1;
  return lines.slice(start, end).map((line) => (line.trim().length === 0 ? '' : line));
}
