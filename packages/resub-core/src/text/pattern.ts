export type CompiledPattern = {
  source: string;
  /** Global regex; callers must not rely on its `lastIndex` between calls. */
  regex: RegExp;
  groupCount: number;
  groupNames: readonly string[];
};

const INLINE_FLAGS = new Map([
  ["i", "i"],
  ["m", "m"],
  ["s", "s"],
]);

const START_OF_INPUT = "(?<![\\s\\S])";
const END_OF_INPUT = "(?![\\s\\S])";
const END_OR_BEFORE_FINAL_NEWLINE = "(?=\\n?(?![\\s\\S]))";

/**
 * Compiles a search pattern. Accepts JavaScript regex syntax plus the
 * `(?P<name>...)` / `(?P=name)` named group forms, a leading inline flag
 * group such as `(?i)` or `(?ms)`, and the `\A` / `\Z` anchors.
 *
 * Without the `m` flag a bare `$` also matches just before a final newline.
 */
export function compilePattern(source: string): CompiledPattern {
  const { body, flags } = extractInlineFlags(source);
  const translated = translatePatternSyntax(body, flags.includes("m"));

  let regex: RegExp;
  try {
    regex = new RegExp(translated, `${flags}g`);
  } catch (error) {
    throw new Error(`Invalid regex pattern: ${describeError(error)}`);
  }

  // The empty alternative always matches, exposing every group slot.
  const probe = new RegExp(`(?:${translated})|`, flags).exec("");
  const groupCount = probe ? probe.length - 1 : 0;
  const groupNames = probe?.groups ? Object.keys(probe.groups) : [];

  return { source, regex, groupCount, groupNames };
}

function extractInlineFlags(source: string): { body: string; flags: string } {
  const leading = /^\(\?([A-Za-z]+)\)/.exec(source);
  if (!leading) {
    return { body: source, flags: "" };
  }

  const flags = new Set<string>();
  for (const letter of leading[1] ?? "") {
    const flag = INLINE_FLAGS.get(letter);
    if (!flag) {
      throw new Error(`Invalid regex pattern: unsupported inline flag "${letter}"`);
    }
    flags.add(flag);
  }

  return { body: source.slice(leading[0].length), flags: [...flags].join("") };
}

function translatePatternSyntax(source: string, multiline: boolean): string {
  let translated = "";
  let inCharacterClass = false;

  for (let index = 0; index < source.length; index += 1) {
    const char = source.charAt(index);

    if (char === "\\") {
      const escape = source.slice(index, index + 2);
      if (!inCharacterClass && escape === "\\A") {
        translated += START_OF_INPUT;
      } else if (!inCharacterClass && escape === "\\Z") {
        translated += END_OF_INPUT;
      } else {
        translated += escape;
      }
      index += 1;
      continue;
    }

    if (inCharacterClass) {
      if (char === "]") {
        inCharacterClass = false;
      }
      translated += char;
      continue;
    }

    if (char === "[") {
      inCharacterClass = true;
      translated += char;
      continue;
    }

    if (char === "$" && !multiline) {
      translated += END_OR_BEFORE_FINAL_NEWLINE;
      continue;
    }

    if (source.startsWith("(?P<", index)) {
      translated += "(?<";
      index += 3;
      continue;
    }

    if (source.startsWith("(?P=", index)) {
      const close = source.indexOf(")", index);
      if (close < 0) {
        throw new Error("Invalid regex pattern: unterminated (?P= backreference");
      }
      translated += `\\k<${source.slice(index + 4, close)}>`;
      index = close;
      continue;
    }

    translated += char;
  }

  return translated;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
