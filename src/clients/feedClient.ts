import axios, {type AxiosInstance} from 'axios';
import Joi from 'joi';
import {config, type FeedQuery} from '../config';
import {feedLatency, feedRequests} from '../metrics';
import type {QuakeFeed} from '../types/quake';
import {FeedRequestError} from '../utils/errors';

export interface FeedResponse {
    feed: QuakeFeed;
    // Parsed body as received, kept for the snapshot file
    raw: unknown;
}

// Only the envelope is checked; features are read through the field accessors.
const feedSchema = Joi.object<QuakeFeed>({
    type: Joi.string().valid('FeatureCollection').required(),
    metadata: Joi.object({
        count: Joi.number().integer().min(0)
    }).unknown(true),
    features: Joi.array().items(Joi.object().unknown(true)).required()
}).unknown(true);

/**
 * Decode a parsed feed document, live or from a snapshot.
 */
export const decodeFeed = (raw: unknown): QuakeFeed => {
    const result = feedSchema.validate(raw, {convert: false});
    if (result.error) {
        throw new FeedRequestError(`Unexpected feed document: ${result.error.message}`);
    }
    return result.value;
};

const describeError = (error: unknown): string => {
    if (axios.isAxiosError(error)) {
        if (error.response) {
            return `Feed request failed: ${error.response.status} ${error.response.statusText}`;
        }
        return `Feed request failed: ${error.message}`;
    }
    return error instanceof Error ? error.message : String(error);
};

export class FeedClient {
    private readonly feedUrl: string;
    private readonly http: AxiosInstance;

    constructor(feedUrl: string = config.feedUrl, http?: AxiosInstance) {
        this.feedUrl = feedUrl;
        this.http = http ?? axios.create({timeout: config.feedTimeoutMs});
    }

    async fetchFeed(query: FeedQuery): Promise<FeedResponse> {
        const started = Date.now();
        try {
            const response = await this.http.get<unknown>(this.feedUrl, {params: query});
            const feed = decodeFeed(response.data);
            feedRequests.inc({outcome: 'success'});
            return {feed, raw: response.data};
        } catch (error) {
            feedRequests.inc({outcome: 'error'});
            if (error instanceof FeedRequestError) throw error;
            throw new FeedRequestError(describeError(error), {cause: error});
        } finally {
            feedLatency.observe(Date.now() - started);
        }
    }
}
