/**
 * Command-line argument parsing
 *
 * `--flag` alone is a boolean; `--flag value` a string; `--flag a b c` a list.
 * Tokens starting with a single dash (e.g. `-0.120`) are values.
 */

export type FlagValue = string | string[] | true;

export interface ParsedArgs {
  positionals: string[];
  flags: Record<string, FlagValue>;
}

export function parseArgv(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags: Record<string, FlagValue> = {};
  let currentFlag: string | undefined;
  let values: string[] = [];

  const closeFlag = () => {
    if (currentFlag === undefined) return;
    flags[currentFlag] = values.length === 0 ? true : values.length === 1 ? values[0] : values;
    currentFlag = undefined;
    values = [];
  };

  for (const token of argv) {
    if (token.startsWith("--")) {
      closeFlag();
      const body = token.slice(2);
      const eq = body.indexOf("=");
      if (eq >= 0) {
        flags[body.slice(0, eq)] = body.slice(eq + 1);
      } else {
        currentFlag = body;
      }
    } else if (currentFlag !== undefined) {
      values.push(token);
    } else {
      positionals.push(token);
    }
  }
  closeFlag();

  return { positionals, flags };
}
