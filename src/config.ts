import dotenv from 'dotenv';
import {isValidTimeZone} from './utils/timeUtils';

dotenv.config();

export interface FeedQuery {
    starttime: string;
    endtime: string;
    minlatitude: number;
    maxlatitude: number;
    minlongitude: number;
    maxlongitude: number;
    minmagnitude: number;
    orderby: 'time' | 'time-asc' | 'magnitude' | 'magnitude-asc';
}

export interface Config {
    port: number;
    feedUrl: string;
    feedTimeoutMs: number;
    feedQuery: FeedQuery;
    snapshotPath: string;
    saveSnapshot: boolean;
    offline: boolean;
    timeZone: string;
    chartDir: string;
    logLevel: string;
    nodeEnv: string;
}

const parseNumber = (name: string, raw: string): number => {
    const value = Number(raw);
    if (raw.trim() === '' || !Number.isFinite(value)) {
        throw new Error(`Invalid number for ${name}: "${raw}"`);
    }
    return value;
};

const parseFlag = (raw: string | undefined, fallback: boolean): boolean => {
    if (raw === undefined || raw === '') return fallback;
    return ['1', 'true', 'yes'].includes(raw.toLowerCase());
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config => {
    const loaded: Config = {
        port: parseInt(env.QUAKE_PORT || '8004', 10),
        feedUrl: env.FEED_URL || 'https://earthquake.usgs.gov/fdsnws/event/1/query.geojson',
        feedTimeoutMs: parseInt(env.FEED_TIMEOUT_MS || '30000', 10),
        // Defaults cover the British Isles from 2000 up to October 2018
        feedQuery: {
            starttime: env.FEED_STARTTIME || '2000-01-01',
            endtime: env.FEED_ENDTIME || '2018-10-11',
            minlatitude: parseNumber('FEED_MIN_LATITUDE', env.FEED_MIN_LATITUDE || '50.008'),
            maxlatitude: parseNumber('FEED_MAX_LATITUDE', env.FEED_MAX_LATITUDE || '58.723'),
            minlongitude: parseNumber('FEED_MIN_LONGITUDE', env.FEED_MIN_LONGITUDE || '-9.756'),
            maxlongitude: parseNumber('FEED_MAX_LONGITUDE', env.FEED_MAX_LONGITUDE || '1.67'),
            minmagnitude: parseNumber('FEED_MIN_MAGNITUDE', env.FEED_MIN_MAGNITUDE || '1'),
            orderby: 'time-asc',
        },
        snapshotPath: env.SNAPSHOT_PATH || 'quakesinfo.json',
        saveSnapshot: parseFlag(env.SAVE_SNAPSHOT, true),
        offline: parseFlag(env.QUAKE_OFFLINE, false),
        timeZone: env.QUAKE_TIME_ZONE || 'UTC',
        chartDir: env.CHART_DIR || 'charts',
        logLevel: env.LOG_LEVEL || 'info',
        nodeEnv: env.NODE_ENV || 'production',
    };

    // Validate configuration
    if (isNaN(loaded.port) || loaded.port <= 0) {
        throw new Error('Invalid port number in configuration');
    }

    if (isNaN(loaded.feedTimeoutMs) || loaded.feedTimeoutMs <= 0) {
        throw new Error('Invalid feed timeout in configuration');
    }

    if (!loaded.feedUrl) {
        throw new Error('Feed URL must be defined in configuration');
    }

    if (loaded.feedQuery.minlatitude > loaded.feedQuery.maxlatitude
        || loaded.feedQuery.minlongitude > loaded.feedQuery.maxlongitude) {
        throw new Error('Feed bounding box minimum exceeds maximum');
    }

    if (!isValidTimeZone(loaded.timeZone)) {
        throw new Error(`Unknown time zone in configuration: ${loaded.timeZone}`);
    }

    return loaded;
};

export const config: Config = loadConfig();

export default config;
