const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

// Rejects overflow such as 02/30.
function isCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

// Midnight of the date's local calendar day, expressed in UTC so that day
// differences never see a daylight-saving shift.
function localDay(date: Date): number {
  return Date.UTC(date.getFullYear(), date.getMonth(), date.getDate());
}

/** Whole calendar days from one local date to another. Time of day is ignored. */
export function daysBetween(from: Date, to: Date): number {
  return (localDay(to) - localDay(from)) / MS_PER_DAY;
}

/**
 * Parses purchase dates written as MM/DD/YYYY into local midnight, the same
 * calendar the evaluation clock reads. Month and day may be unpadded ("8/1/2017").
 * Returns undefined for anything else.
 */
export function parseUsDate(text: string): Date | undefined {
  const match = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(text.trim());
  if (!match) {
    return undefined;
  }
  const [year, month, day] = [Number(match[3]), Number(match[1]), Number(match[2])];
  return isCalendarDate(year, month, day) ? new Date(year, month - 1, day) : undefined;
}

/**
 * Parses price-history dates written as DD-Mon-YY ("07-Mar-19").
 * Two-digit years 69-99 map to 19xx, 00-68 to 20xx.
 */
export function parseShortDate(text: string): Date | undefined {
  const match = /^(\d{1,2})-([A-Za-z]{3})-(\d{2})$/.exec(text.trim());
  if (!match) {
    return undefined;
  }
  const month = MONTHS.indexOf(match[2].toLowerCase()) + 1;
  const shortYear = Number(match[3]);
  const year = shortYear >= 69 ? 1900 + shortYear : 2000 + shortYear;
  const day = Number(match[1]);
  return isCalendarDate(year, month, day) ? new Date(Date.UTC(year, month - 1, day)) : undefined;
}
