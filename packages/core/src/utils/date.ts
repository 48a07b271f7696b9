/**
 * Calendar-day utilities.
 * Calendar days are carried as UTC midnights (00:00:00Z). A wall-clock instant
 * enters through localCalendarDay, which reads the host's local date.
 */

const MONTH_ABBREVIATIONS = [
    'Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun',
    'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec',
] as const;

/**
 * Parse YYYY-MM-DD date string to Date (UTC).
 * Rejects impossible days such as 2026-02-30.
 */
export function parseIsoDate(value: string): Date | null {
    const match = value.match(/^(\d{4})-(\d{2})-(\d{2})$/);
    if (!match) return null;

    const year = parseInt(match[1], 10);
    const month = parseInt(match[2], 10);
    const day = parseInt(match[3], 10);

    const date = new Date(Date.UTC(year, month - 1, day));
    if (!isValidDate(date)) return null;

    if (date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day) {
        return null;
    }

    return date;
}

/**
 * Format Date as ISO YYYY-MM-DD string (UTC).
 */
export function formatIsoDate(date: Date): string {
    const year = date.getUTCFullYear();
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

/**
 * The host-local calendar day of an instant, as a UTC midnight.
 * 2026-10-18T19:30Z in Asia/Kolkata (01:00 on Oct 19) -> 2026-10-19T00:00Z.
 */
export function localCalendarDay(instant: Date): Date {
    return new Date(Date.UTC(
        instant.getFullYear(),
        instant.getMonth(),
        instant.getDate()
    ));
}

/**
 * Shift a date by whole days (UTC). Does not mutate the input.
 */
export function addDays(date: Date, days: number): Date {
    return new Date(Date.UTC(
        date.getUTCFullYear(),
        date.getUTCMonth(),
        date.getUTCDate() + days
    ));
}

/**
 * Format an ISO date for replies: "2026-10-18" -> "Oct 18, 2026".
 * Unparseable input is returned unchanged.
 */
export function formatDisplayDate(isoDate: string): string {
    const date = parseIsoDate(isoDate);
    if (!date) return isoDate;

    const month = MONTH_ABBREVIATIONS[date.getUTCMonth()];
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${month} ${day}, ${date.getUTCFullYear()}`;
}

/**
 * Check if date is valid.
 */
export function isValidDate(date: Date): boolean {
    return !isNaN(date.getTime());
}
