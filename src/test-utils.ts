import { DataSource } from 'typeorm';
import { entities } from './config/database';
import { fingerprint } from './services/ContentHasher';
import { NetworkFailure, NetworkFailureReason } from './errors';
import { ContentFetcher, FetchOptions, FetchResult, Sleep } from './types';

export async function createTestDataSource(): Promise<DataSource> {
    const dataSource = new DataSource({
        type: 'better-sqlite3',
        database: ':memory:',
        synchronize: true,
        logging: false,
        entities,
    });
    await dataSource.initialize();
    return dataSource;
}

export function flushPromises(): Promise<void> {
    return new Promise((resolve) => setImmediate(resolve));
}

export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
    const started = Date.now();
    while (!condition()) {
        if (Date.now() - started > timeoutMs) {
            throw new Error('Timed out waiting for condition');
        }
        await flushPromises();
    }
}

export function ok(content: string): FetchResult {
    return { success: true, content, status: 200, fingerprint: fingerprint(content) };
}

export function failed(reason: NetworkFailureReason = 'connection'): FetchResult {
    return { success: false, error: new NetworkFailure(reason, `simulated ${reason} failure`) };
}

/** Sleep that only returns when the test calls `wake()`; records every requested delay. */
export class ManualSleep {
    readonly delays: number[] = [];
    private waiting: Array<() => void> = [];

    readonly sleep: Sleep = (ms, signal) =>
        new Promise<void>((resolve, reject) => {
            this.delays.push(ms);
            if (signal.aborted) {
                reject(new Error('aborted'));
                return;
            }
            const entry = () => {
                signal.removeEventListener('abort', onAbort);
                resolve();
            };
            const onAbort = () => {
                this.waiting = this.waiting.filter((waiting) => waiting !== entry);
                reject(new Error('aborted'));
            };
            signal.addEventListener('abort', onAbort, { once: true });
            this.waiting.push(entry);
        });

    get pending(): number {
        return this.waiting.length;
    }

    wake(): void {
        for (const resolve of this.waiting.splice(0)) {
            resolve();
        }
    }
}

type Scripted = FetchResult | (() => Promise<FetchResult>);

/** Fetcher with scripted responses per URL; the last scripted response repeats. */
export class StubFetcher implements ContentFetcher {
    readonly calls: Array<{ url: string; options: FetchOptions }> = [];
    private readonly scripts = new Map<string, Scripted[]>();

    respond(url: string, ...responses: Scripted[]): this {
        this.scripts.set(url, responses);
        return this;
    }

    callsFor(url: string): number {
        return this.calls.filter((call) => call.url === url).length;
    }

    async fetch(url: string, options: FetchOptions): Promise<FetchResult> {
        this.calls.push({ url, options });
        const queue = this.scripts.get(url) ?? [];
        const next = queue.length > 1 ? queue.shift() : queue[0];
        if (next === undefined) return failed();
        return typeof next === 'function' ? next() : next;
    }
}

/** A fetch that stays in flight until the test settles it. */
export function deferredFetch(): { promise: () => Promise<FetchResult>; resolve: (result: FetchResult) => void } {
    let settle: (result: FetchResult) => void = () => undefined;
    const pending = new Promise<FetchResult>((resolve) => {
        settle = resolve;
    });
    return { promise: () => pending, resolve: (result) => settle(result) };
}
