const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface Clock {
  now(): Date;
}

export const CLOCK = Symbol('CLOCK');

export const systemClock: Clock = {
  now: () => new Date(),
};

// Local calendar date as YYYY-MM-DD
export function toIsoDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

export function addDays(date: Date, days: number): Date {
  const shifted = new Date(date.getTime());
  shifted.setDate(shifted.getDate() + days);
  return shifted;
}

/**
 * Returns the input when it is a real calendar date in strict YYYY-MM-DD form,
 * otherwise undefined (2026-02-30 is rejected).
 */
export function parseIsoDate(raw: string): string | undefined {
  const match = ISO_DATE.exec(raw);
  if (!match) {
    return undefined;
  }
  const [, year, month, day] = match;
  const date = new Date(Number(year), Number(month) - 1, Number(day));
  if (
    date.getFullYear() !== Number(year) ||
    date.getMonth() !== Number(month) - 1 ||
    date.getDate() !== Number(day)
  ) {
    return undefined;
  }
  return raw;
}
