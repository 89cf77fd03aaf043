/**
 * German number formats: "." groups thousands, "," is the decimal mark
 */

const SCALE_SUFFIXES: Array<{ pattern: RegExp; factor: number }> = [
  { pattern: /\b(mrd|milliarden?)\.?/i, factor: 1_000_000_000 },
  { pattern: /\b(mio|millionen?)\.?/i, factor: 1_000_000 },
  { pattern: /\b(tsd|tausend)\.?/i, factor: 1_000 },
];

/**
 * Parse a German-formatted number
 *
 * @example
 * parseGermanNumber("11.100.000,00") // 11100000
 * parseGermanNumber("24,1") // 24.1
 * parseGermanNumber("-1.500") // -1500
 */
export function parseGermanNumber(raw: string): number | null {
  const match = raw.match(/-?\d[\d.]*(?:,\d+)?/);
  if (!match) return null;

  const value = Number(match[0].replace(/\./g, "").replace(",", "."));
  return Number.isFinite(value) ? value : null;
}

/**
 * Parse a German money amount with an optional scale word
 *
 * @example
 * parseGermanAmount("24,1 Mio. €") // 24100000
 * parseGermanAmount("1,2 Mrd.") // 1200000000
 */
export function parseGermanAmount(raw: string): number | null {
  const base = parseGermanNumber(raw);
  if (base === null) return null;

  const scale = SCALE_SUFFIXES.find(({ pattern }) => pattern.test(raw));
  const value = base * (scale?.factor ?? 1);
  return Math.round(value * 100) / 100;
}

/**
 * Parse an integer count ("1.234 Mitarbeiter" → 1234)
 */
export function parseGermanInteger(raw: string): number | null {
  const value = parseGermanNumber(raw);
  return value === null ? null : Math.round(value);
}
