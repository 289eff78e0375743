type ListFlag = {
  /** Whether the flag may be given with no values at all. */
  allowEmpty: boolean;
};

const LIST_FLAGS: ReadonlyMap<string, ListFlag> = new Map([
  ["--paths", { allowEmpty: false }],
  ["--files", { allowEmpty: true }],
  ["--files-exclude", { allowEmpty: true }],
]);

/**
 * Spreads the space-separated values of list flags into one occurrence per
 * value, the form the stricli scanner reads: `--paths a b` becomes
 * `--paths a --paths b`. Values run up to the next option-like argument.
 *
 * A bare `--files` or `--files-exclude` is dropped, leaving the defaults. A
 * bare `--paths` is kept so the scanner reports the missing value. Everything
 * after `--` passes through untouched.
 */
export function expandListFlagValues(argv: readonly string[]): string[] {
  const out: string[] = [];
  let index = 0;

  while (index < argv.length) {
    const arg = argv[index] ?? "";
    index += 1;

    if (arg === "--") {
      out.push(arg, ...argv.slice(index));
      break;
    }

    const listFlag = LIST_FLAGS.get(arg);
    if (!listFlag) {
      out.push(arg);
      continue;
    }

    const values: string[] = [];
    for (let next = argv[index]; next !== undefined && !isOptionLike(next); next = argv[index]) {
      values.push(next);
      index += 1;
    }

    if (values.length === 0) {
      if (!listFlag.allowEmpty) {
        out.push(arg);
      }
      continue;
    }
    for (const value of values) {
      out.push(arg, value);
    }
  }

  return out;
}

function isOptionLike(arg: string): boolean {
  return arg.length > 1 && arg.startsWith("-");
}
