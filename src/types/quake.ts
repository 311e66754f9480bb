// ─── Feed GeoJSON shapes ───────────────────────────────────
// Fields are optional here: the feed is not schema-checked per feature,
// the field accessors reject malformed records when they are read.

export interface QuakeProperties {
    mag?: number | null;
    place?: string | null;
    time?: number | null;     // Unix ms, UTC
    updated?: number | null;
    url?: string | null;
    type?: string | null;
    [key: string]: unknown;
}

export interface QuakeGeometry {
    type?: string;
    coordinates?: number[];   // [lng, lat, depth_km]
}

export interface QuakeFeature {
    type?: string;
    id?: string;
    properties?: QuakeProperties | null;
    geometry?: QuakeGeometry | null;
}

export interface FeedMetadata {
    generated?: number;
    url?: string;
    title?: string;
    status?: number;
    count?: number;
    [key: string]: unknown;
}

export interface QuakeFeed {
    type: 'FeatureCollection';
    metadata?: FeedMetadata;
    features: QuakeFeature[];
    [key: string]: unknown;
}

// ─── Derived shapes ────────────────────────────────────────

export interface Location {
    longitude: number;
    latitude: number;
}

export interface QuakeRecord extends Location {
    id: string | null;
    magnitude: number;
    depth: number | null;
    timeMillis: number;
    year: number;
    place: string | null;
}

export interface MaxResult {
    magnitude: number;
    location: Location;
}

/** Magnitudes per calendar year, in input order within each year. */
export type YearlyGrouping = Map<number, number[]>;

export interface YearlySeries {
    years: number[];
    values: number[];
}

export interface QuakeReport {
    count: number;
    strongest: MaxResult;
    years: number;
    timeZone: string;
}
