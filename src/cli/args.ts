export type ParsedArgs = Record<string, string | boolean>;

export class UsageError extends Error {
  override name = "UsageError";
}

/**
 * `--key value` pairs plus the named boolean switches. Anything else is a
 * usage error.
 */
export function parseArgs(argv: readonly string[], switches: readonly string[] = []): ParsedArgs {
  const booleans = new Set(["help", ...switches]);
  const out: ParsedArgs = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a) continue;
    if (!a.startsWith("--")) throw new UsageError(`unexpected arg: ${a}`);
    const key = a.slice(2);
    if (booleans.has(key)) {
      out[key] = true;
      continue;
    }
    const next = argv[i + 1];
    if (next === undefined || next.startsWith("--")) throw new UsageError(`missing value for --${key}`);
    out[key] = next;
    i++;
  }
  return out;
}

export function assertKnownFlags(args: ParsedArgs, known: readonly string[]): void {
  const allowed = new Set(["help", ...known]);
  for (const key of Object.keys(args)) {
    if (!allowed.has(key)) throw new UsageError(`unknown flag: --${key}`);
  }
}

export function stringFlag(args: ParsedArgs, key: string): string | undefined {
  const v = args[key];
  if (v === undefined) return undefined;
  if (typeof v !== "string") throw new UsageError(`--${key} takes a value`);
  return v;
}

export function intFlag(args: ParsedArgs, key: string): number | undefined {
  const v = stringFlag(args, key);
  if (v === undefined) return undefined;
  if (!/^[0-9]+$/.test(v)) throw new UsageError(`invalid --${key}: ${v}`);
  return Number(v);
}

export function numberFlag(args: ParsedArgs, key: string): number | undefined {
  const v = stringFlag(args, key);
  if (v === undefined) return undefined;
  const n = Number(v);
  if (!v.trim() || !Number.isFinite(n)) throw new UsageError(`invalid --${key}: ${v}`);
  return n;
}

// Comma separated; empty entries are dropped.
export function listFlag(args: ParsedArgs, key: string): string[] | undefined {
  const v = stringFlag(args, key);
  if (v === undefined) return undefined;
  return v
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export function booleanFlag(args: ParsedArgs, key: string): boolean | undefined {
  return args[key] === true ? true : undefined;
}
