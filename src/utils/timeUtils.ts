/**
 * Calendar helpers for epoch timestamps.
 *
 * Year boundaries depend on the zone a timestamp is read in, so every
 * conversion takes the IANA zone explicitly instead of using the host's.
 */

import {InvalidTimeZoneError} from './errors';

const yearFormatters = new Map<string, Intl.DateTimeFormat>();

// Zone names are case-insensitive, so variants of one zone share an entry
const yearFormatter = (timeZone: string): Intl.DateTimeFormat => {
    const key = timeZone.toUpperCase();
    const cached = yearFormatters.get(key);
    if (cached) return cached;

    let formatter: Intl.DateTimeFormat;
    try {
        formatter = new Intl.DateTimeFormat('en-US', {timeZone, year: 'numeric', era: 'short', calendar: 'gregory'});
    } catch {
        throw new InvalidTimeZoneError(timeZone);
    }
    yearFormatters.set(key, formatter);
    return formatter;
};

export const isValidTimeZone = (timeZone: string): boolean => {
    try {
        yearFormatter(timeZone);
        return true;
    } catch {
        return false;
    }
};

export const cachedTimeZoneCount = (): number => yearFormatters.size;

/**
 * Calendar year of an epoch-seconds instant in the given zone, numbered
 * astronomically: 1 BC is year 0, 2 BC is year -1.
 */
export const calendarYear = (epochSeconds: number, timeZone: string): number => {
    const parts = yearFormatter(timeZone).formatToParts(new Date(epochSeconds * 1000));
    const year = parts.find(part => part.type === 'year');
    if (!year) {
        throw new RangeError(`No year for timestamp ${epochSeconds}`);
    }
    const era = parts.find(part => part.type === 'era');
    const yearOfEra = parseInt(year.value, 10);
    return era?.value === 'BC' ? 1 - yearOfEra : yearOfEra;
};
