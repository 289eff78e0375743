import type { CompiledPattern } from "./pattern.ts";

export type ReplacementToken =
  | { kind: "text"; value: string }
  | { kind: "group"; ref: number | string };

export type CompiledReplacementTemplate = {
  source: string;
  tokens: ReplacementToken[];
};

/** The subset of a regex match a template renders from. */
export type TemplateMatch = {
  [index: number]: string | undefined;
  groups?: Record<string, string | undefined>;
};

const CHARACTER_ESCAPES: Record<string, string> = {
  a: "\x07",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
  v: "\v",
  "\\": "\\",
};

const OCTAL_DIGIT = /[0-7]/;
const DIGIT = /[0-9]/;
const ASCII_LETTER = /[A-Za-z]/;
const GROUP_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Compiles a replacement template in backslash syntax: `\1`..`\99`,
 * `\g<1>`, `\g<name>`, and the usual character escapes. A `$` is literal.
 *
 * Group references are checked against `pattern` so a bad template fails
 * before any file is read.
 */
export function compileReplacementTemplate(
  source: string,
  pattern: CompiledPattern,
): CompiledReplacementTemplate {
  const tokens: ReplacementToken[] = [];
  let text = "";

  const pushGroup = (ref: number | string) => {
    if (text.length > 0) {
      tokens.push({ kind: "text", value: text });
      text = "";
    }
    tokens.push({ kind: "group", ref: validateGroupRef(ref, pattern) });
  };

  for (let index = 0; index < source.length; index += 1) {
    const char = source.charAt(index);
    if (char !== "\\") {
      text += char;
      continue;
    }

    const next = source.charAt(index + 1);
    if (next.length === 0) {
      throw new Error("Invalid replacement template: bad escape (end of template)");
    }

    if (next === "g") {
      const close = source.indexOf(">", index + 2);
      if (source.charAt(index + 2) !== "<" || close < 0) {
        throw new Error("Invalid replacement template: missing group name after \\g");
      }
      const name = source.slice(index + 3, close);
      pushGroup(/^[0-9]+$/.test(name) ? Number(name) : name);
      index = close;
      continue;
    }

    if (next === "0") {
      const octal = readOctal(source, index + 1, 3);
      text += String.fromCharCode(Number.parseInt(octal, 8));
      index += octal.length;
      continue;
    }

    if (DIGIT.test(next)) {
      const threeOctal = readOctal(source, index + 1, 3);
      if (threeOctal.length === 3) {
        const code = Number.parseInt(threeOctal, 8);
        if (code > 0o377) {
          throw new Error(
            `Invalid replacement template: octal escape value \\${threeOctal} outside of range 0-0o377`,
          );
        }
        text += String.fromCharCode(code);
        index += 3;
        continue;
      }

      const second = source.charAt(index + 2);
      const digits = DIGIT.test(second) ? `${next}${second}` : next;
      pushGroup(Number(digits));
      index += digits.length;
      continue;
    }

    const escaped = CHARACTER_ESCAPES[next];
    if (escaped !== undefined) {
      text += escaped;
      index += 1;
      continue;
    }

    if (ASCII_LETTER.test(next)) {
      throw new Error(`Invalid replacement template: bad escape \\${next}`);
    }

    text += `\\${next}`;
    index += 1;
  }

  if (text.length > 0) {
    tokens.push({ kind: "text", value: text });
  }

  return { source, tokens };
}

export function renderReplacementTemplate(
  template: CompiledReplacementTemplate,
  match: TemplateMatch,
): string {
  let rendered = "";
  for (const token of template.tokens) {
    if (token.kind === "text") {
      rendered += token.value;
      continue;
    }

    // Groups that did not participate in the match render as "".
    const value = typeof token.ref === "number" ? match[token.ref] : match.groups?.[token.ref];
    rendered += value ?? "";
  }
  return rendered;
}

function validateGroupRef(ref: number | string, pattern: CompiledPattern): number | string {
  if (typeof ref === "number") {
    if (ref > pattern.groupCount) {
      throw new Error(`Invalid replacement template: invalid group reference ${ref}`);
    }
    return ref;
  }

  if (!GROUP_NAME.test(ref)) {
    throw new Error(`Invalid replacement template: bad character in group name "${ref}"`);
  }
  if (!pattern.groupNames.includes(ref)) {
    throw new Error(`Invalid replacement template: unknown group name "${ref}"`);
  }
  return ref;
}

function readOctal(source: string, start: number, maxLength: number): string {
  let digits = "";
  for (let index = start; index < source.length && digits.length < maxLength; index += 1) {
    const char = source.charAt(index);
    if (!OCTAL_DIGIT.test(char)) {
      break;
    }
    digits += char;
  }
  return digits;
}
