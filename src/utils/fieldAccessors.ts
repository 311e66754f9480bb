import type {Location, QuakeFeature, QuakeRecord} from '../types/quake';
import {MalformedRecordError} from './errors';
import {calendarYear} from './timeUtils';

const recordId = (record: QuakeFeature): string | null =>
    typeof record.id === 'string' ? record.id : null;

const isFiniteNumber = (value: unknown): value is number =>
    typeof value === 'number' && Number.isFinite(value);

export const magnitudeOf = (record: QuakeFeature): number => {
    const mag = record.properties?.mag;
    if (mag === undefined || mag === null) {
        throw new MalformedRecordError('properties.mag', recordId(record), 'is missing');
    }
    if (!isFiniteNumber(mag)) {
        throw new MalformedRecordError('properties.mag', recordId(record), 'is not a number');
    }
    return mag;
};

/**
 * Longitude and latitude of the epicentre. The feed's third coordinate
 * (depth) is dropped.
 */
export const locationOf = (record: QuakeFeature): Location => {
    const coordinates = record.geometry?.coordinates;
    if (!Array.isArray(coordinates) || coordinates.length < 2) {
        throw new MalformedRecordError('geometry.coordinates', recordId(record), 'needs at least two entries');
    }
    const [longitude, latitude] = coordinates;
    if (!isFiniteNumber(longitude) || !isFiniteNumber(latitude)) {
        throw new MalformedRecordError('geometry.coordinates', recordId(record), 'are not numbers');
    }
    return {longitude, latitude};
};

export const timeOf = (record: QuakeFeature): number => {
    const time = record.properties?.time;
    if (time === undefined || time === null) {
        throw new MalformedRecordError('properties.time', recordId(record), 'is missing');
    }
    if (!isFiniteNumber(time)) {
        throw new MalformedRecordError('properties.time', recordId(record), 'is not a number');
    }
    if (Number.isNaN(new Date(time).getTime())) {
        throw new MalformedRecordError('properties.time', recordId(record), 'is out of range');
    }
    return time;
};

/**
 * Calendar year of the event. The millisecond timestamp is truncated to
 * whole epoch seconds and read in `timeZone`.
 */
export const yearOf = (record: QuakeFeature, timeZone = 'UTC'): number =>
    calendarYear(Math.floor(timeOf(record) / 1000), timeZone);

export const decodeRecord = (record: QuakeFeature, timeZone = 'UTC'): QuakeRecord => {
    const {longitude, latitude} = locationOf(record);
    const depth = record.geometry?.coordinates?.[2];
    const place = record.properties?.place;

    return {
        id: recordId(record),
        magnitude: magnitudeOf(record),
        longitude,
        latitude,
        depth: isFiniteNumber(depth) ? depth : null,
        timeMillis: timeOf(record),
        year: yearOf(record, timeZone),
        place: typeof place === 'string' ? place : null
    };
};
