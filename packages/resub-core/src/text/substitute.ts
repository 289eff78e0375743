import { compilePattern, type CompiledPattern } from "./pattern.ts";
import {
  applyReplacementSpans,
  createLineStarts,
  toLineColumn,
  type ReplacementSpan,
} from "./spans.ts";
import {
  compileReplacementTemplate,
  renderReplacementTemplate,
  type CompiledReplacementTemplate,
} from "./template.ts";

export type Substitution = {
  pattern: CompiledPattern;
  template: CompiledReplacementTemplate;
};

export type SubstitutionMatch = {
  start: number;
  end: number;
  line: number;
  column: number;
  matched: string;
  /**
   * `matched` run through the substitution on its own, outside the file.
   * Lookaround that depends on surrounding text is evaluated without it, so
   * this can differ from what the file receives at that position.
   */
  replacement: string;
};

export type SubstitutionResult = {
  matches: SubstitutionMatch[];
  content: string;
};

/** Compiles pattern and template together; throws before any file is read. */
export function compileSubstitution(pattern: string, replacement: string): Substitution {
  const compiledPattern = compilePattern(pattern);
  return {
    pattern: compiledPattern,
    template: compileReplacementTemplate(replacement, compiledPattern),
  };
}

export function substitute(content: string, substitution: Substitution): SubstitutionResult {
  const found = [...content.matchAll(substitution.pattern.regex)];
  if (found.length === 0) {
    return { matches: [], content };
  }

  const lineStarts = createLineStarts(content);
  const spans: ReplacementSpan[] = [];
  const matches: SubstitutionMatch[] = [];
  for (const match of found) {
    const span = toReplacementSpan(match, substitution);
    const { line, column } = toLineColumn(lineStarts, span.start);
    spans.push(span);
    matches.push({
      start: span.start,
      end: span.end,
      line,
      column,
      matched: match[0],
      replacement: substituteAll(match[0], substitution),
    });
  }

  return { matches, content: applyReplacementSpans(content, spans) };
}

/** Replaces every match in `text`; `text` is unchanged when nothing matches. */
export function substituteAll(text: string, substitution: Substitution): string {
  const spans = [...text.matchAll(substitution.pattern.regex)].map((match) =>
    toReplacementSpan(match, substitution),
  );
  return applyReplacementSpans(text, spans);
}

function toReplacementSpan(match: RegExpMatchArray, substitution: Substitution): ReplacementSpan {
  const start = match.index ?? 0;
  return {
    start,
    end: start + match[0].length,
    replacement: renderReplacementTemplate(substitution.template, match),
  };
}
