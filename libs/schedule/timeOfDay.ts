/**
 * Zoned wall-clock helpers.
 *
 * Resolves an (hour, minute) on a calendar date in an IANA timezone to an
 * absolute instant, using the runtime's Intl tz database.
 */

import type { TimeOfDay } from './types.js';

export interface CalendarDate {
    readonly year: number;
    readonly month: number;
    readonly day: number;
}

interface ZonedParts extends CalendarDate {
    readonly hour: number;
    readonly minute: number;
    readonly second: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

const TIME_OF_DAY_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
    let formatter = formatters.get(timeZone);
    if (!formatter) {
        formatter = new Intl.DateTimeFormat('en-US', {
            timeZone,
            hourCycle: 'h23',
            year: 'numeric',
            month: '2-digit',
            day: '2-digit',
            hour: '2-digit',
            minute: '2-digit',
            second: '2-digit'
        });
        formatters.set(timeZone, formatter);
    }
    return formatter;
}

export function isValidTimeZone(timeZone: string): boolean {
    if (timeZone.trim() === '') return false;
    try {
        formatterFor(timeZone);
        return true;
    } catch (error: unknown) {
        if (error instanceof RangeError) return false;
        throw error;
    }
}

function zonedParts(instant: Date, timeZone: string): ZonedParts {
    const parts = formatterFor(timeZone).formatToParts(instant);
    const read = (type: Intl.DateTimeFormatPartTypes): number => {
        const part = parts.find(p => p.type === type);
        return part ? Number(part.value) : 0;
    };
    return {
        year: read('year'),
        month: read('month'),
        day: read('day'),
        // some ICU builds still print midnight as 24
        hour: read('hour') % 24,
        minute: read('minute'),
        second: read('second')
    };
}

/**
 * Offset of the zone from UTC at the given instant, in milliseconds.
 */
function zoneOffsetMs(instant: Date, timeZone: string): number {
    const p = zonedParts(instant, timeZone);
    const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
    const truncated = Math.floor(instant.getTime() / 1000) * 1000;
    return asUtc - truncated;
}

/**
 * Calendar date of an instant as seen in the timezone.
 */
export function calendarDateIn(instant: Date, timeZone: string): CalendarDate {
    const { year, month, day } = zonedParts(instant, timeZone);
    return { year, month, day };
}

/**
 * Instant at which the zone's wall clock reads `time` on `date`.
 * A repeated wall time (DST fall-back) takes the earlier instant; one
 * skipped by a DST jump moves forward by the size of the gap.
 */
export function atTimeOfDay(date: CalendarDate, time: TimeOfDay, timeZone: string): Date {
    const naiveUtc = Date.UTC(date.year, date.month - 1, date.day, time.hour, time.minute);
    // Offsets in force on either side of any transition near the wall time
    const offsets = new Set(
        [naiveUtc - DAY_MS, naiveUtc, naiveUtc + DAY_MS].map(at => zoneOffsetMs(new Date(at), timeZone))
    );
    const candidates = [...offsets].map(offset => naiveUtc - offset).sort((a, b) => a - b);

    const earliest = candidates.find(at => readsAs(new Date(at), time, timeZone));
    if (earliest !== undefined) return new Date(earliest);

    // Skipped: the pre-jump offset lands the same distance past the gap
    return new Date(Math.max(...candidates));
}

function readsAs(instant: Date, time: TimeOfDay, timeZone: string): boolean {
    const parts = zonedParts(instant, timeZone);
    return parts.hour === time.hour && parts.minute === time.minute;
}

export function parseTimeOfDay(value: string): TimeOfDay | undefined {
    const match = TIME_OF_DAY_PATTERN.exec(value.trim());
    if (!match) return undefined;
    return { hour: Number(match[1]), minute: Number(match[2]) };
}

export function formatTimeOfDay(time: TimeOfDay): string {
    return `${String(time.hour).padStart(2, '0')}:${String(time.minute).padStart(2, '0')}`;
}

export function isValidTimeOfDay(time: TimeOfDay): boolean {
    return Number.isInteger(time.hour) && Number.isInteger(time.minute)
        && time.hour >= 0 && time.hour <= 23
        && time.minute >= 0 && time.minute <= 59;
}
