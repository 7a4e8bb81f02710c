export class CliUsageError extends Error {
  public readonly exitCode = 2;
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

/** Splits `--flag=value` into `--flag value`. */
export function normalizeArgv(argv: string[]): string[] {
  const out: string[] = [];
  for (const a of argv) {
    if (a.startsWith("--") && a.includes("=")) {
      const idx = a.indexOf("=");
      out.push(a.slice(0, idx));
      const val = a.slice(idx + 1);
      if (val.length) out.push(val);
    } else {
      out.push(a);
    }
  }
  return out;
}

/**
 * Flag readers over a full `process.argv`-style array (the first two entries
 * are skipped when checking for unknown options). Usage problems throw
 * CliUsageError with the help text appended.
 */
export function makeArgvHelpers(argv: string[], helpText: string) {
  const ARGV = normalizeArgv(argv);

  function usage(message: string): CliUsageError {
    return new CliUsageError(`${message}\n\n${helpText}`);
  }

  function hasFlag(...names: string[]): boolean {
    return names.some((n) => ARGV.includes(n));
  }

  function getArg(name: string): string | null {
    const idx = ARGV.indexOf(name);
    if (idx === -1) return null;
    const v = ARGV[idx + 1];
    if (!v || v.startsWith("--")) return null;
    return v;
  }

  function requireArg(name: string): string {
    const v = getArg(name);
    if (v === null) throw usage(`Missing required argument: ${name}`);
    return v;
  }

  function assertNoUnknownOptions(allowed: Set<string>): void {
    for (const a of ARGV.slice(2)) {
      if (a.startsWith("--") && !allowed.has(a)) {
        throw usage(`Unknown option: ${a}`);
      }
    }
  }

  function assertHasValue(...flags: string[]): void {
    for (const flag of flags) {
      const idx = ARGV.indexOf(flag);
      if (idx === -1) continue;
      const next = ARGV[idx + 1];
      if (!next || next.startsWith("--")) {
        throw usage(`Missing value for ${flag}`);
      }
    }
  }

  function parseIntFlag(name: string, opts: { min?: number } = {}): number | null {
    const raw = getArg(name);
    if (raw === null) return null;
    if (!/^-?\d+$/.test(raw)) {
      throw usage(`Invalid integer for ${name}: ${raw}`);
    }
    const n = Number.parseInt(raw, 10);
    if (opts.min !== undefined && n < opts.min) {
      throw usage(`${name} must be >= ${opts.min}: ${raw}`);
    }
    return n;
  }

  return { ARGV, hasFlag, getArg, requireArg, assertNoUnknownOptions, assertHasValue, parseIntFlag };
}
