export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface ParsedArgs {
  positional: string[];
  /** Every value given per flag, in order; boolean flags hold "true". */
  flags: Record<string, string[]>;
}

/**
 * Split argv into positionals and `--flag value` pairs. Flags may repeat
 * (`--tag a --tag b`) and accept `--flag=value`. Names in `booleans` never
 * take a value.
 */
export function parseArgs(args: string[], booleans: readonly string[] = []): ParsedArgs {
  const positional: string[] = [];
  const flags: Record<string, string[]> = {};
  const push = (key: string, value: string) => {
    (flags[key] ??= []).push(value);
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (arg === '--') {
      positional.push(...args.slice(i + 1));
      break;
    }
    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const key = eq >= 0 ? arg.slice(2, eq) : arg.slice(2);
    if (!key) throw new UsageError(`Malformed flag: ${arg}`);

    if (booleans.includes(key)) {
      if (eq >= 0) throw new UsageError(`--${key} takes no value`);
      push(key, 'true');
    } else if (eq >= 0) {
      push(key, arg.slice(eq + 1));
    } else {
      const next = args[i + 1];
      if (next === undefined || next.startsWith('--')) throw new UsageError(`--${key} needs a value`);
      push(key, next);
      i++;
    }
  }
  return { positional, flags };
}

/** Last value given for the flag. */
export function flagValue(parsed: ParsedArgs, key: string): string | undefined {
  return parsed.flags[key]?.at(-1);
}

export function flagValues(parsed: ParsedArgs, key: string): string[] {
  return parsed.flags[key] ?? [];
}

export function hasFlag(parsed: ParsedArgs, key: string): boolean {
  return key in parsed.flags;
}

export function intFlag(parsed: ParsedArgs, key: string): number | undefined {
  const raw = flagValue(parsed, key);
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n)) throw new UsageError(`--${key} expects an integer, got "${raw}"`);
  return n;
}

export function rejectUnknownFlags(parsed: ParsedArgs, allowed: readonly string[]): void {
  const unknown = Object.keys(parsed.flags).filter((k) => !allowed.includes(k));
  if (unknown.length > 0) throw new UsageError(`Unknown option: --${unknown[0]}`);
}
