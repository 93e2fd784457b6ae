export function getArg(name: string): string | null {
  const idx = process.argv.indexOf(`--${name}`);
  if (idx === -1) return null;
  return process.argv[idx + 1] ?? null;
}

/**
 * Pass WITHOUT the leading "--"
 * Example: hasFlag("json") checks for "--json"
 */
export function hasFlag(flag: string): boolean {
  return process.argv.includes(`--${flag}`);
}

export function getArgNumber(name: string, fallback: number): number {
  const v = getArg(name);
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? n : fallback;
}
