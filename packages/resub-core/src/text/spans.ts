export type ReplacementSpan = {
  start: number;
  end: number;
  replacement: string;
};

/** Splices non-overlapping spans into `source`, in start order. */
export function applyReplacementSpans(source: string, spans: readonly ReplacementSpan[]): string {
  if (spans.length === 0) {
    return source;
  }

  const ordered = [...spans].sort((left, right) => left.start - right.start || left.end - right.end);

  const parts: string[] = [];
  let cursor = 0;

  for (const span of ordered) {
    if (span.start < 0 || span.end < span.start || span.end > source.length) {
      throw new Error("Invalid replacement spans: out-of-bounds span.");
    }
    if (span.start < cursor) {
      throw new Error("Invalid replacement spans: overlapping spans.");
    }

    parts.push(source.slice(cursor, span.start), span.replacement);
    cursor = span.end;
  }

  parts.push(source.slice(cursor));
  return parts.join("");
}

/** Offsets at which each line of `text` begins. */
export function createLineStarts(text: string): number[] {
  const starts = [0];
  for (let index = text.indexOf("\n"); index >= 0; index = text.indexOf("\n", index + 1)) {
    starts.push(index + 1);
  }
  return starts;
}

/** 1-based line and column for `offset`. */
export function toLineColumn(
  lineStarts: readonly number[],
  offset: number,
): { line: number; column: number } {
  let low = 0;
  let high = lineStarts.length - 1;
  while (low < high) {
    const middle = Math.ceil((low + high) / 2);
    if ((lineStarts[middle] ?? 0) <= offset) {
      low = middle;
    } else {
      high = middle - 1;
    }
  }
  return { line: low + 1, column: offset - (lineStarts[low] ?? 0) + 1 };
}
