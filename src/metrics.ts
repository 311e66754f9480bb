import {Registry, Counter, Histogram} from 'prom-client';

export const register = new Registry();

export const feedRequests = new Counter({
    name: 'quake_feed_requests_total',
    help: 'Total number of requests made to the earthquake feed',
    labelNames: ['outcome'],
    registers: [register]
});

export const feedLatency = new Histogram({
    name: 'quake_feed_latency_ms',
    help: 'Latency of earthquake feed requests',
    buckets: [50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000],
    registers: [register]
});

export const httpRequests = new Counter({
    name: 'quake_http_requests_total',
    help: 'Total number of HTTP requests served',
    labelNames: ['method', 'status'],
    registers: [register]
});
