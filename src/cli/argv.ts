/**
 * cli/argv.ts — Minimal argv helpers
 * Flags take `--name value` or `--name=value`; everything else is positional.
 */

export function hasFlag(argv: string[], flag: string): boolean {
  return argv.includes(flag);
}

export function getFlagValue(argv: string[], flag: string): string | null {
  const i = argv.indexOf(flag);
  if (i >= 0) {
    const next = argv[i + 1];
    return next !== undefined && !next.startsWith('--') ? next : null;
  }
  const prefix = `${flag}=`;
  const inline = argv.find(a => a.startsWith(prefix));
  return inline !== undefined ? inline.slice(prefix.length) : null;
}

/** Arguments that are neither flags nor the value of a value-taking flag */
export function positionals(argv: string[], valueFlags: readonly string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i]!;
    if (a.startsWith('--')) {
      if (valueFlags.includes(a)) i++;
      continue;
    }
    out.push(a);
  }
  return out;
}

export function unknownFlags(argv: string[], known: readonly string[]): string[] {
  return argv
    .filter(a => a.startsWith('--'))
    .map(a => a.split('=')[0] ?? a)
    .filter(name => !known.includes(name));
}

/** Value-taking flags given without a value (`--variant --dry-run`, `--out` last, `--end=`) */
export function missingValues(argv: string[], valueFlags: readonly string[]): string[] {
  return valueFlags.filter(flag =>
    (argv.includes(flag) || argv.some(a => a.startsWith(`${flag}=`))) && !getFlagValue(argv, flag));
}
