/**
 * Collection-level statistics over feed records.
 *
 * Everything here is pure: inputs are never mutated and every call returns
 * fresh structures. Malformed records surface as MalformedRecordError from
 * the field accessors and are never skipped.
 */

import type {MaxResult, QuakeFeature, QuakeFeed, YearlyGrouping, YearlySeries} from '../types/quake';
import {EmptyCollectionError} from '../utils/errors';
import {locationOf, magnitudeOf, yearOf} from '../utils/fieldAccessors';

/**
 * Total number of events, taken from the feed metadata when it carries a
 * usable count.
 */
export function countOf(feed: QuakeFeed): number {
    const count = feed.metadata?.count;
    if (typeof count === 'number' && Number.isInteger(count) && count >= 0) {
        return count;
    }
    return feed.features.length;
}

/**
 * Strongest event. Ties keep the first record in input order.
 */
export function maxRecord(records: readonly QuakeFeature[]): MaxResult {
    if (records.length === 0) {
        throw new EmptyCollectionError('maxRecord');
    }

    let magnitude = magnitudeOf(records[0]);
    let location = locationOf(records[0]);
    for (let i = 1; i < records.length; i++) {
        const current = magnitudeOf(records[i]);
        if (current > magnitude) {
            magnitude = current;
            location = locationOf(records[i]);
        }
    }
    return {magnitude, location};
}

export function groupByYear(records: readonly QuakeFeature[], timeZone = 'UTC'): YearlyGrouping {
    const grouping: YearlyGrouping = new Map();
    for (const record of records) {
        const year = yearOf(record, timeZone);
        const magnitude = magnitudeOf(record);
        const magnitudes = grouping.get(year);
        if (magnitudes) {
            magnitudes.push(magnitude);
        } else {
            grouping.set(year, [magnitude]);
        }
    }
    return grouping;
}

const sortedYears = (grouping: ReadonlyMap<number, readonly number[]>): number[] =>
    Array.from(grouping.keys()).sort((a, b) => a - b);

export function averageMagnitudePerYear(grouping: ReadonlyMap<number, readonly number[]>): YearlySeries {
    if (grouping.size === 0) {
        throw new EmptyCollectionError('averageMagnitudePerYear');
    }

    const years = sortedYears(grouping);
    const values = years.map(year => {
        const magnitudes = grouping.get(year) ?? [];
        if (magnitudes.length === 0) {
            throw new EmptyCollectionError(`averageMagnitudePerYear for ${year}`);
        }
        let sum = 0;
        for (const magnitude of magnitudes) {
            sum += magnitude;
        }
        return sum / magnitudes.length;
    });
    return {years, values};
}

export function countPerYear(grouping: ReadonlyMap<number, readonly number[]>): YearlySeries {
    const years = sortedYears(grouping);
    return {
        years,
        values: years.map(year => grouping.get(year)?.length ?? 0)
    };
}
