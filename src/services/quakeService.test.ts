import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest';
import {type FeedFetcher, QuakeService} from './quakeService';
import type {FeedQuery} from '../config';
import {FeedRequestError, MalformedRecordError, SnapshotError} from '../utils/errors';
import type {QuakeFeed} from '../types/quake';
import {feature, feed, scenarioFeatures} from '../test/quakeFixtures';

const query: FeedQuery = {
    starttime: '2000-01-01',
    endtime: '2018-10-11',
    minlatitude: 50.008,
    maxlatitude: 58.723,
    minlongitude: -9.756,
    maxlongitude: 1.67,
    minmagnitude: 1,
    orderby: 'time-asc'
};

const fetcherFor = (document: QuakeFeed) => {
    const fetchFeed = vi.fn<FeedFetcher['fetchFeed']>(async () => ({feed: document, raw: document}));
    return {fetchFeed};
};

describe('QuakeService', () => {
    let workDir: string;
    let snapshotPath: string;

    beforeEach(async () => {
        workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'quake-service-'));
        snapshotPath = path.join(workDir, 'snapshots', 'quakesinfo.json');
    });

    afterEach(async () => {
        await fs.rm(workDir, {recursive: true, force: true});
    });

    const serviceWith = (client: FeedFetcher, overrides: {saveSnapshot?: boolean; offline?: boolean} = {}) =>
        new QuakeService({
            client,
            query,
            snapshotPath,
            saveSnapshot: overrides.saveSnapshot ?? false,
            offline: overrides.offline ?? false
        });

    it('fetches the feed only once', async () => {
        const client = fetcherFor(feed(scenarioFeatures(), 3));
        const service = serviceWith(client);

        await service.report('UTC');
        await service.countSeries('UTC');
        await service.averageSeries('UTC');

        expect(client.fetchFeed).toHaveBeenCalledTimes(1);
        expect(client.fetchFeed).toHaveBeenCalledWith(query);
    });

    it('reports the count and the strongest earthquake', async () => {
        const service = serviceWith(fetcherFor(feed(scenarioFeatures(), 3)));

        expect(await service.report('UTC')).toEqual({
            count: 3,
            strongest: {magnitude: 4.1, location: {longitude: -1.5, latitude: 51.8}},
            years: 2,
            timeZone: 'UTC'
        });
    });

    it('builds the yearly series and chart descriptions', async () => {
        const service = serviceWith(fetcherFor(feed(scenarioFeatures())));

        expect(await service.countSeries('UTC')).toEqual({years: [2001, 2002], values: [2, 1]});

        const countLine = await service.chart('count-line', 'UTC');
        expect(countLine.kind).toBe('line');
        expect(countLine.series).toEqual({years: [2001, 2002], values: [2, 1]});

        const average = await service.chart('average-magnitude', 'UTC');
        expect(average.title).toBe('Average Magnitude per Year');
        expect(average.series.years).toEqual([2001, 2002]);
    });

    it('decodes the records in the requested time zone', async () => {
        const service = serviceWith(fetcherFor(feed(scenarioFeatures())));

        const records = await service.records('UTC');

        expect(records.map(record => record.id)).toEqual(['q1', 'q2', 'q3']);
        expect(records.map(record => record.year)).toEqual([2001, 2001, 2002]);
        expect(records[2].depth).toBe(7);
    });

    it('writes the raw feed to the snapshot file, pretty-printed', async () => {
        const document = feed(scenarioFeatures(), 3);
        const service = serviceWith(fetcherFor(document), {saveSnapshot: true});

        await service.load();

        const written = await fs.readFile(snapshotPath, 'utf-8');
        expect(written).toBe(JSON.stringify(document, null, 4));
    });

    it('reads the snapshot instead of the feed when offline', async () => {
        const document = feed(scenarioFeatures(), 3);
        await fs.mkdir(path.dirname(snapshotPath), {recursive: true});
        await fs.writeFile(snapshotPath, JSON.stringify(document, null, 4), 'utf-8');
        const client = fetcherFor(feed([]));
        const service = serviceWith(client, {offline: true});

        expect((await service.report('UTC')).count).toBe(3);
        expect(client.fetchFeed).not.toHaveBeenCalled();
    });

    it('fails offline when no snapshot exists', async () => {
        const service = serviceWith(fetcherFor(feed([])), {offline: true});

        await expect(service.load()).rejects.toBeInstanceOf(SnapshotError);
    });

    it('retries the feed after a failed load', async () => {
        const document = feed(scenarioFeatures());
        const fetchFeed = vi.fn<FeedFetcher['fetchFeed']>()
            .mockRejectedValueOnce(new FeedRequestError('Feed request failed: 503 Service Unavailable'))
            .mockResolvedValueOnce({feed: document, raw: document});
        const service = serviceWith({fetchFeed});

        await expect(service.load()).rejects.toThrow('Feed request failed: 503 Service Unavailable');
        expect(service.isLoaded()).toBe(false);
        expect((await service.load()).features).toHaveLength(3);
        expect(service.isLoaded()).toBe(true);
        expect(fetchFeed).toHaveBeenCalledTimes(2);
    });

    it('surfaces malformed records from the aggregations', async () => {
        const broken = feed([...scenarioFeatures(), feature({id: 'q4', time: Date.UTC(2002, 4, 4)})]);
        const service = serviceWith(fetcherFor(broken));

        await expect(service.countSeries('UTC')).rejects.toBeInstanceOf(MalformedRecordError);
    });
});
