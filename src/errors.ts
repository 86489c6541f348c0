export type PipelineErrorCode =
    | 'PARSE_ERROR'
    | 'RECORD_DROPPED'
    | 'SCHEMA_VIOLATION'
    | 'GEO_NOT_FOUND'
    | 'ROUTE_NOT_FOUND'
    | 'RATE_LIMIT_EXCEEDED'
    | 'TRANSIENT_SERVICE_ERROR'
    | 'DEADLINE_EXCEEDED'
    | 'INSUFFICIENT_TRAINING_DATA'
    | 'INVALID_INPUT'
    | 'RUN_EXISTS';

export class PipelineError extends Error {
    readonly code: PipelineErrorCode;

    constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/** Malformed run key. Fatal for the operation that received it. */
export class ParseError extends PipelineError {
    constructor(message: string) {
        super('PARSE_ERROR', message);
    }
}

/** A raw listing that cannot become a normalized one. Counted, never fatal. */
export class RecordDropped extends PipelineError {
    readonly reason: string;

    constructor(reason: string, message: string) {
        super('RECORD_DROPPED', message);
        this.reason = reason;
    }
}

export interface SchemaIssue {
    rowIndex: number | null; // null = the issue concerns the column set
    field: string;
    message: string;
}

export class SchemaViolation extends PipelineError {
    readonly runKey: string;
    readonly issues: SchemaIssue[];

    constructor(runKey: string, issues: SchemaIssue[]) {
        const details = issues
            .slice(0, 5)
            .map(({ rowIndex, field, message }) => `${field}${rowIndex === null ? '' : `[row ${rowIndex}]`}: ${message}`);
        const more = issues.length > 5 ? `; ${issues.length - 5} more` : '';
        super('SCHEMA_VIOLATION', `Combined table of run ${runKey} violates the schema: ${details.join('; ')}${more}`);
        this.runKey = runKey;
        this.issues = issues;
    }
}

export class GeoNotFound extends PipelineError {
    constructor(address: string, options?: { cause?: unknown }) {
        super('GEO_NOT_FOUND', `No coordinates found for "${address}"`, options);
    }
}

export class RouteNotFound extends PipelineError {
    constructor(origin: string, destination: string, options?: { cause?: unknown }) {
        super('ROUTE_NOT_FOUND', `No route found from ${origin} to ${destination}`, options);
    }
}

/** Timeout, 5xx or outage of an external service. Retried with backoff. */
export class TransientServiceError extends PipelineError {
    readonly statusCode: number | null;

    constructor(message: string, statusCode: number | null = null, options?: { cause?: unknown }) {
        super('TRANSIENT_SERVICE_ERROR', message, options);
        this.statusCode = statusCode;
    }
}

/** The service rejected the call for exceeding its quota (HTTP 429). Retried with backoff, never surfaces. */
export class RateLimitExceeded extends PipelineError {
    constructor(service: string) {
        super('RATE_LIMIT_EXCEEDED', `${service} rejected the request with a rate limit`);
    }
}

export class DeadlineExceeded extends PipelineError {
    constructor(message = 'Global pipeline deadline reached') {
        super('DEADLINE_EXCEEDED', message);
    }
}

export class InsufficientTrainingData extends PipelineError {
    constructor(usableRows: number, required: number) {
        super('INSUFFICIENT_TRAINING_DATA', `Only ${usableRows} usable rows for training, ${required} required`);
    }
}

export class InvalidInput extends PipelineError {
    constructor(details: string) {
        super('INVALID_INPUT', `Invalid Actor input:\n${details}`);
    }
}

/** A run with the same key (location and second) already stored artifacts. */
export class RunAlreadyExists extends PipelineError {
    constructor(runKey: string) {
        super('RUN_EXISTS', `Run ${runKey} already has stored artifacts, start it again in a later second`);
    }
}
