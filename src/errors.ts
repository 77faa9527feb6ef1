export class WatcherError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export type NetworkFailureReason = 'timeout' | 'connection' | 'http_status' | 'aborted' | 'too_large';

export class NetworkFailure extends WatcherError {
    constructor(
        readonly reason: NetworkFailureReason,
        message: string,
        readonly status?: number,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

export class StorageFailure extends WatcherError {
    constructor(operation: string, cause: unknown) {
        super(`Storage operation "${operation}" failed: ${describeError(cause)}`, { cause });
    }
}

// Rejected input at the registry boundary; surfaced to the caller as a 400
export class ConfigurationError extends WatcherError {}

export class SubscriberOverload extends WatcherError {
    constructor(readonly capacity: number) {
        super(`Subscriber queue exceeded ${capacity} pending events`);
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
