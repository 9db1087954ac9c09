const MS_PER_DAY = 24 * 60 * 60 * 1000;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Calendar date as `YYYY-MM-DD`, without a time or timezone component. */
export type IsoDate = string;

export function parseIsoDate(ymd: string): Date | null {
  const match = ISO_DATE.exec(ymd);
  if (!match) return null;
  const [, y, m, d] = match.map(Number);
  const dt = new Date(Date.UTC(y, m - 1, d));
  // Rejects rollovers such as 2025-02-30
  if (dt.getUTCFullYear() !== y || dt.getUTCMonth() !== m - 1 || dt.getUTCDate() !== d) {
    return null;
  }
  return dt;
}

export function isIsoDate(value: string): boolean {
  return parseIsoDate(value) !== null;
}

export function formatIsoDate(date: Date): IsoDate {
  const yy = String(date.getUTCFullYear()).padStart(4, '0');
  const mm = String(date.getUTCMonth() + 1).padStart(2, '0');
  const dd = String(date.getUTCDate()).padStart(2, '0');
  return `${yy}-${mm}-${dd}`;
}

function requireDate(ymd: IsoDate): Date {
  const date = parseIsoDate(ymd);
  if (!date) throw new RangeError(`Invalid calendar date: ${ymd}`);
  return date;
}

export function addDays(ymd: IsoDate, days: number): IsoDate {
  const date = requireDate(ymd);
  date.setUTCDate(date.getUTCDate() + days);
  return formatIsoDate(date);
}

/** Whole calendar days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: IsoDate, to: IsoDate): number {
  return Math.round((requireDate(to).getTime() - requireDate(from).getTime()) / MS_PER_DAY);
}

export function yearOf(ymd: IsoDate): number {
  return requireDate(ymd).getUTCFullYear();
}

