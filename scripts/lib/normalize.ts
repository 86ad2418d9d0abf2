/**
 * Shared name and identifier normalization used across all build scripts and the API.
 * This is the single source of truth for commune lookup keys and INSEE codes.
 */

export function normalizeCommuneName(s: string): string {
  if (!s || typeof s !== 'string') return '';
  return s
    .toLowerCase()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[-–—'’]/g, ' ')
    .replace(/\s*\([^)]*\)\s*/g, ' ')
    .replace(/[^\w\s]/g, '')
    .replace(/\bste\b/g, 'sainte')
    .replace(/\bst\b/g, 'saint')
    .replace(/\s+/g, ' ')
    .trim();
}

/** Known aliases: alternate name -> canonical key */
export const COMMUNE_ALIASES: Record<string, string> = {
  'sables d olonne': 'les sables d olonne',
  'nantes cedex': 'nantes',
};

export function communeKey(name: string): string {
  const k = normalizeCommuneName(name);
  return COMMUNE_ALIASES[k] ?? k;
}

/** "044" -> "44", "7" -> "07", "2A" stays "2A". */
export function normalizeDepartmentCode(code: string): string {
  const t = code.trim().toUpperCase();
  if (/^0\d\d$/.test(t)) return t.slice(1);
  if (/^\d$/.test(t)) return t.padStart(2, '0');
  return t;
}

/** Full 5-character INSEE code, or null when the value cannot be one. */
export function normalizeInseeCode(code: string): string | null {
  const t = code.trim().toUpperCase();
  if (/^\d{4}$/.test(t)) return t.padStart(5, '0');
  if (/^(\d{5}|2[AB]\d{3})$/.test(t)) return t;
  return null;
}

/**
 * Builds an INSEE code from a department code and a commune code local to that
 * department ("44" + "109" -> "44109"). Only for sources whose commune column is
 * the local part; a column that already holds the full code goes through
 * normalizeInseeCode instead.
 */
export function inseeFromParts(department: string, localCommune: string): string | null {
  const dep = normalizeDepartmentCode(department);
  const local = localCommune.trim();
  if (!/^\d{1,3}$/.test(local) || !/^(\d{2}|2[AB])$/.test(dep)) return null;
  return dep + local.padStart(3, '0');
}

/**
 * Parses a French-formatted number: "94,20%", "1 234", "12.5".
 * Returns null for empty or non-numeric input; never coerces to zero.
 */
export function parseFrenchNumber(val: unknown): number | null {
  if (typeof val === 'number') return Number.isFinite(val) ? val : null;
  if (typeof val !== 'string') return null;
  const t = val.replace(/[\s\u00a0\u202f%]/g, '').replace(',', '.');
  if (t === '' || !/^-?\d+(\.\d+)?$/.test(t)) return null;
  return parseFloat(t);
}

/** Non-negative integer count; null when the value is not one. */
export function parseCount(val: unknown): number | null {
  const n = parseFrenchNumber(val);
  if (n == null || n < 0 || !Number.isInteger(n)) return null;
  return n;
}

export function roundPct(x: number): number {
  return Math.round(x * 10) / 10;
}

export function fullName(first: string, last: string): string {
  return [first.trim(), last.trim()].filter(Boolean).join(' ');
}
