import axios, {AxiosError, type AxiosInstance, type InternalAxiosRequestConfig} from 'axios';
import {describe, expect, it} from 'vitest';
import {decodeFeed, FeedClient} from './feedClient';
import type {FeedQuery} from '../config';
import {FeedRequestError} from '../utils/errors';
import {feed, scenarioFeatures} from '../test/quakeFixtures';

const FEED_URL = 'https://feed.test/fdsnws/event/1/query.geojson';

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

// Axios instance answered in process by the given adapter
const stubHttp = (
    respond: (request: InternalAxiosRequestConfig) => unknown,
    seen: InternalAxiosRequestConfig[] = []
): AxiosInstance => axios.create({
    adapter: async (request) => {
        seen.push(request);
        return {data: respond(request), status: 200, statusText: 'OK', headers: {}, config: request};
    }
});

describe('decodeFeed', () => {
    it('accepts a feature collection', () => {
        const document = feed(scenarioFeatures(), 3);
        expect(decodeFeed(document)).toEqual(document);
    });

    it('rejects a document that is not a feature collection', () => {
        expect(() => decodeFeed({type: 'Feature', features: []})).toThrow(FeedRequestError);
        expect(() => decodeFeed({type: 'FeatureCollection'})).toThrow('Unexpected feed document: "features" is required');
        expect(() => decodeFeed(null)).toThrow(FeedRequestError);
    });
});

describe('FeedClient', () => {
    it('sends the query as request parameters', async () => {
        const seen: InternalAxiosRequestConfig[] = [];
        const client = new FeedClient(FEED_URL, stubHttp(() => feed(scenarioFeatures(), 3), seen));

        await client.fetchFeed(query);

        expect(seen).toHaveLength(1);
        expect(seen[0].url).toBe(FEED_URL);
        expect(seen[0].method).toBe('get');
        expect(seen[0].params).toEqual(query);
    });

    it('returns the decoded feed and the raw document', async () => {
        const document = feed(scenarioFeatures(), 3);
        const client = new FeedClient(FEED_URL, stubHttp(() => document));

        const {feed: decoded, raw} = await client.fetchFeed(query);

        expect(decoded.features).toHaveLength(3);
        expect(decoded.metadata?.count).toBe(3);
        expect(raw).toEqual(document);
    });

    it('reports an error status from the feed', async () => {
        const http = axios.create({
            adapter: async (request) => {
                throw new AxiosError('Request failed with status code 503', AxiosError.ERR_BAD_RESPONSE, request, null, {
                    data: '',
                    status: 503,
                    statusText: 'Service Unavailable',
                    headers: {},
                    config: request
                });
            }
        });
        const client = new FeedClient(FEED_URL, http);

        await expect(client.fetchFeed(query)).rejects.toBeInstanceOf(FeedRequestError);
        await expect(client.fetchFeed(query)).rejects.toThrow('Feed request failed: 503 Service Unavailable');
    });

    it('reports a transport failure', async () => {
        const http = axios.create({
            adapter: async (request) => {
                throw new AxiosError('connect ECONNREFUSED 127.0.0.1:80', 'ECONNREFUSED', request);
            }
        });
        const client = new FeedClient(FEED_URL, http);

        await expect(client.fetchFeed(query)).rejects.toThrow('Feed request failed: connect ECONNREFUSED 127.0.0.1:80');
    });

    it('rejects a response body that is not a feature collection', async () => {
        const client = new FeedClient(FEED_URL, stubHttp(() => ({type: 'FeatureCollection', features: 'none'})));

        await expect(client.fetchFeed(query)).rejects.toThrow('Unexpected feed document: "features" must be an array');
    });
});
