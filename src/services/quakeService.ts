import type {FeedQuery} from '../config';
import {decodeFeed, type FeedResponse} from '../clients/feedClient';
import {logger} from '../middleware/logger';
import type {QuakeFeed, QuakeRecord, QuakeReport, YearlySeries} from '../types/quake';
import {decodeRecord} from '../utils/fieldAccessors';
import {readJsonFile, writeJsonFile} from '../utils/fileUtils';
import {averageMagnitudePerYear, countOf, countPerYear, groupByYear, maxRecord} from './aggregator';
import {averageMagnitudeChart, type ChartId, type ChartSpec, countPerYearChart} from './chartService';

export interface FeedFetcher {
    fetchFeed(query: FeedQuery): Promise<FeedResponse>;
}

export interface QuakeServiceOptions {
    client: FeedFetcher;
    query: FeedQuery;
    snapshotPath: string;
    saveSnapshot: boolean;
    offline: boolean;
}

/**
 * Loads the feed once per process, live or from the snapshot file, and
 * answers report, series and chart requests from it.
 */
export class QuakeService {
    private readonly options: QuakeServiceOptions;
    private feedPromise: Promise<QuakeFeed> | null = null;
    private loaded = false;

    constructor(options: QuakeServiceOptions) {
        this.options = options;
    }

    load(): Promise<QuakeFeed> {
        if (!this.feedPromise) {
            this.feedPromise = this.loadFeed().then(feed => {
                this.loaded = true;
                return feed;
            }, (error: unknown) => {
                // A failed load is not cached
                this.feedPromise = null;
                throw error;
            });
        }
        return this.feedPromise;
    }

    isLoaded(): boolean {
        return this.loaded;
    }

    private async loadFeed(): Promise<QuakeFeed> {
        const {client, query, snapshotPath, saveSnapshot, offline} = this.options;

        if (offline) {
            logger.info(`Reading earthquake snapshot from ${snapshotPath}`);
            return decodeFeed(await readJsonFile(snapshotPath));
        }

        logger.info(`Fetching earthquakes ${query.starttime}..${query.endtime} (M${query.minmagnitude}+)`);
        const {feed, raw} = await client.fetchFeed(query);
        logger.info(`Feed returned ${feed.features.length} earthquakes`);

        if (saveSnapshot) {
            await writeJsonFile(snapshotPath, raw);
            logger.info(`Snapshot written to ${snapshotPath}`);
        }
        return feed;
    }

    async report(timeZone: string): Promise<QuakeReport> {
        const feed = await this.load();
        return {
            count: countOf(feed),
            strongest: maxRecord(feed.features),
            years: groupByYear(feed.features, timeZone).size,
            timeZone
        };
    }

    async records(timeZone: string): Promise<QuakeRecord[]> {
        const feed = await this.load();
        return feed.features.map(feature => decodeRecord(feature, timeZone));
    }

    async averageSeries(timeZone: string): Promise<YearlySeries> {
        const feed = await this.load();
        return averageMagnitudePerYear(groupByYear(feed.features, timeZone));
    }

    async countSeries(timeZone: string): Promise<YearlySeries> {
        const feed = await this.load();
        return countPerYear(groupByYear(feed.features, timeZone));
    }

    async chart(id: ChartId, timeZone: string): Promise<ChartSpec> {
        switch (id) {
            case 'average-magnitude':
                return averageMagnitudeChart(await this.averageSeries(timeZone));
            case 'count-bar':
                return countPerYearChart(await this.countSeries(timeZone), 'bar');
            case 'count-line':
                return countPerYearChart(await this.countSeries(timeZone), 'line');
        }
    }
}
