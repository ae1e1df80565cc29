const MS_PER_DAY = 24 * 60 * 60 * 1000;
const MS_PER_HOUR = 60 * 60 * 1000;

function utcMidnight(date: Date): number {
     return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

/**
 * Whole calendar days from `from` to `to` (UTC dates, time of day ignored).
 * Negative when `to` lies before `from`.
 */
export function daysBetween(from: Date, to: Date): number {
     return Math.round((utcMidnight(to) - utcMidnight(from)) / MS_PER_DAY);
}

/**
 * Lead days until departure, or null when the unit has no departure date.
 */
export function leadDaysUntil(departureDate: Date | undefined, referenceTime: Date): number | null {
     if (!departureDate) return null;
     return daysBetween(referenceTime, departureDate);
}

export function hoursBefore(time: Date, hours: number): Date {
     return new Date(time.getTime() - hours * MS_PER_HOUR);
}

export function daysBefore(time: Date, days: number): Date {
     return new Date(time.getTime() - days * MS_PER_DAY);
}

/** YYYY-MM-DD of the UTC date. */
export function isoDate(date: Date): string {
     return date.toISOString().slice(0, 10);
}
