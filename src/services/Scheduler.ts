import { setTimeout as delay } from 'timers/promises';
import { Update } from '../entities/Update';
import { NetworkFailure, describeError } from '../errors';
import { ContentFetcher, CycleOutcome, FetchResult, SchedulerSettings, SiteRecord, Sleep } from '../types';
import { Broadcaster } from './Broadcaster';
import { nextDelay } from './DelayPolicy';
import { extractPreview } from './preview';
import { SiteState } from './SiteState';
import { UpdateStore } from './UpdateStore';

export interface SchedulerDeps {
    fetcher: ContentFetcher;
    store: UpdateStore;
    broadcaster: Broadcaster;
    settings: SchedulerSettings;
    sleep?: Sleep;
    random?: () => number;
    now?: () => Date;
}

type TaskDeps = Required<SchedulerDeps>;

export const abortableSleep: Sleep = (ms, signal) => delay(ms, undefined, { signal });

const ABORTED: unique symbol = Symbol('aborted');

function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T | typeof ABORTED> {
    if (signal.aborted) return Promise.resolve(ABORTED);
    return new Promise((resolve, reject) => {
        const onAbort = () => resolve(ABORTED);
        signal.addEventListener('abort', onAbort, { once: true });
        work.then(
            (value) => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            }
        );
    });
}

/**
 * The polling loop of one site:
 * Scheduled(delay) -> Fetching -> Changed | Unchanged | Failed -> Scheduled(next),
 * until cancelled. The first cycle runs without waiting.
 */
export class SiteTask {
    private readonly controller = new AbortController();
    private running: Promise<void> | null = null;
    private finished = false;
    private cycleCount = 0;

    constructor(readonly state: SiteState, private readonly deps: TaskDeps) {}

    get id(): number {
        return this.state.id;
    }

    get cycles(): number {
        return this.cycleCount;
    }

    get active(): boolean {
        return this.running !== null && !this.finished && !this.controller.signal.aborted;
    }

    start(): void {
        if (this.running) return;
        this.running = this.loop()
            .catch((error: unknown) => {
                console.error(`[scheduler] task for site ${this.id} stopped unexpectedly:`, error);
            })
            .finally(() => {
                this.finished = true;
            });
    }

    /** Aborts the sleep or fetch in progress and resolves once the loop has exited. */
    async cancel(): Promise<void> {
        this.controller.abort();
        await this.running;
    }

    private async loop(): Promise<void> {
        const { signal } = this.controller;
        const { store, settings } = this.deps;

        try {
            this.state.lastHash = await store.latestHash(this.id);
        } catch (error) {
            console.error(`[scheduler] could not load last hash for site ${this.id}: ${describeError(error)}`);
        }

        let delayMs = 0;
        while (!signal.aborted) {
            if (delayMs > 0) {
                try {
                    await this.deps.sleep(delayMs, signal);
                } catch (error) {
                    if (signal.aborted) break;
                    throw error;
                }
            }

            const outcome = await this.runCycle(signal);
            this.cycleCount++;
            if (outcome === 'cancelled' || signal.aborted) break;

            const next = nextDelay(this.state.style, this.state, outcome !== 'failed', {
                intervalJitterMaxMs: settings.intervalJitterMaxMs,
                maxBackoffSecs: settings.maxBackoffSecs,
                random: this.deps.random,
            });
            this.state.currentBackoffSecs = next.backoffSecs;
            delayMs = next.delayMs;
        }
    }

    private async runCycle(signal: AbortSignal): Promise<CycleOutcome> {
        const { fetcher, store, broadcaster, settings } = this.deps;
        const { id, url } = this.state;

        const fetching: Promise<FetchResult> = fetcher
            .fetch(url, { timeoutMs: settings.fetchTimeoutMs, signal })
            .catch((error: unknown): FetchResult => ({
                success: false,
                error: new NetworkFailure('connection', describeError(error), undefined, { cause: error }),
            }));
        const result = await untilAborted(fetching, signal);
        if (result === ABORTED || signal.aborted) return 'cancelled';

        const fetchedAt = this.deps.now();
        if (!result.success) {
            console.error(`[scheduler] site ${id} (${url}): ${result.error.message}`);
            return this.fail(fetchedAt, result.error.message);
        }

        const hash = result.fingerprint;
        let update: Update | null;
        try {
            if (hash === this.state.lastHash) {
                if (!(await store.recordCheck(id, 'ok', fetchedAt))) return this.orphaned();
                this.state.markUnchanged(fetchedAt);
                return 'unchanged';
            }

            update = await store.appendUpdate(id, {
                timestamp: fetchedAt,
                contentHash: hash,
                content: result.content,
            });
        } catch (error) {
            console.error(`[scheduler] storage error for site ${id}: ${describeError(error)}`);
            return this.fail(fetchedAt, describeError(error));
        }
        if (!update) return this.orphaned();

        // The update is committed along with the site's status and timestamps
        this.state.markChanged(fetchedAt, hash);
        if (signal.aborted) return 'cancelled';

        broadcaster.publish({
            siteId: id,
            url,
            updateId: update.id,
            timestamp: fetchedAt,
            contentHash: hash,
            contentPreview: await extractPreview(result.content, settings.previewLength),
            hasFullContent: true,
        });
        console.log(`[scheduler] change detected on ${url} (update ${update.id})`);
        return 'changed';
    }

    private async fail(at: Date, reason: string): Promise<CycleOutcome> {
        this.state.markFailed(at, reason);
        try {
            if (!(await this.deps.store.recordCheck(this.id, 'error', at))) return this.orphaned();
        } catch (error) {
            console.error(`[scheduler] could not record error status for site ${this.id}: ${describeError(error)}`);
        }
        return 'failed';
    }

    private orphaned(): CycleOutcome {
        console.log(`[scheduler] site ${this.id} is no longer stored; stopping its task`);
        return 'cancelled';
    }
}

export class Scheduler {
    private readonly deps: TaskDeps;

    constructor(deps: SchedulerDeps) {
        this.deps = {
            ...deps,
            sleep: deps.sleep ?? abortableSleep,
            random: deps.random ?? Math.random,
            now: deps.now ?? (() => new Date()),
        };
    }

    spawn(record: SiteRecord): SiteTask {
        const task = new SiteTask(new SiteState(record), this.deps);
        task.start();
        return task;
    }
}
