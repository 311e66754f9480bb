export class AppError extends Error {
    readonly statusCode: number;
    readonly isOperational: boolean;

    constructor(message: string, statusCode = 500, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
        this.statusCode = statusCode;
        this.isOperational = true;
    }
}

/** A feed record is missing a field or carries it with the wrong shape. */
export class MalformedRecordError extends AppError {
    readonly field: string;
    readonly recordId: string | null;

    constructor(field: string, recordId: string | null, detail: string) {
        super(`Malformed record${recordId ? ` ${recordId}` : ''}: ${field} ${detail}`, 502);
        this.field = field;
        this.recordId = recordId;
    }
}

/** An aggregation that needs at least one element got none. */
export class EmptyCollectionError extends AppError {
    constructor(operation: string) {
        super(`${operation} requires at least one record`, 422);
    }
}

export class InvalidTimeZoneError extends AppError {
    constructor(timeZone: string) {
        super(`Unknown time zone: ${timeZone}`, 400);
    }
}

export class FeedRequestError extends AppError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 502, options);
    }
}

export class SnapshotError extends AppError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 500, options);
    }
}
