const DECIMAL_ID = /^\d+$/;

/**
 * Total order over opaque identifiers.
 *
 * Decimal ids (account numbers) compare numerically without converting to
 * number, so ids wider than 2^53 keep their order. Decimal ids sort before
 * any non-decimal id; non-decimal ids compare by UTF-16 code units.
 */
export function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  const aNumeric = DECIMAL_ID.test(a);
  const bNumeric = DECIMAL_ID.test(b);

  if (aNumeric && bNumeric) {
    if (a.length !== b.length) return a.length - b.length;
    return a < b ? -1 : 1;
  }
  if (aNumeric) return -1;
  if (bNumeric) return 1;
  return a < b ? -1 : 1;
}

/** Sorted copy of the given ids in canonical order. */
export function sortIds(ids: Iterable<string>): string[] {
  return Array.from(ids).sort(compareIds);
}

/** Normalize a raw id; returns undefined for missing or blank ids. */
export function normalizeId(raw: string | number | null | undefined): string | undefined {
  if (raw === null || raw === undefined) return undefined;
  if (typeof raw === 'number' && !Number.isFinite(raw)) return undefined;
  const value = String(raw).trim();
  return value.length > 0 ? value : undefined;
}
