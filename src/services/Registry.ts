import pLimit from 'p-limit';
import { MAX_INTERVAL_SECS, MIN_INTERVAL_SECS } from '../config';
import { ConfigurationError, describeError } from '../errors';
import { NewSite, SITE_STYLES, SiteRecord, SiteStyle, SiteView } from '../types';
import { isValidHttpUrl } from '../utils';
import { Scheduler, SiteTask } from './Scheduler';
import { UpdateStore } from './UpdateStore';

export interface RegistryOptions {
    defaultIntervalSecs: number;
    defaultSites?: NewSite[];
}

export interface ValidSite {
    url: string;
    intervalSecs: number;
    style: SiteStyle;
}

function isSiteStyle(value: string): value is SiteStyle {
    return SITE_STYLES.some((style) => style === value);
}

export function validateNewSite(input: NewSite, defaultIntervalSecs: number): ValidSite {
    const url = typeof input.url === 'string' ? input.url.trim() : '';
    if (!isValidHttpUrl(url)) {
        throw new ConfigurationError(`Invalid URL: ${input.url}`);
    }

    const intervalSecs = input.intervalSecs ?? defaultIntervalSecs;
    if (!Number.isInteger(intervalSecs) || intervalSecs < MIN_INTERVAL_SECS || intervalSecs > MAX_INTERVAL_SECS) {
        throw new ConfigurationError(
            `interval_secs must be an integer between ${MIN_INTERVAL_SECS} and ${MAX_INTERVAL_SECS}, got ${intervalSecs}`
        );
    }

    const style = input.style ?? 'random';
    if (!isSiteStyle(style)) {
        throw new ConfigurationError(`style must be one of ${SITE_STYLES.join(', ')}, got ${style}`);
    }

    return { url, intervalSecs, style };
}

/**
 * The live set of scheduled sites: one task per site id. Every change to the
 * set goes through a single queue, so add, remove, reset and shutdown never
 * interleave.
 */
export class Registry {
    private readonly tasks = new Map<number, SiteTask>();
    private readonly lifecycle = pLimit(1);

    constructor(
        private readonly store: UpdateStore,
        private readonly scheduler: Scheduler,
        private readonly options: RegistryOptions
    ) {}

    get size(): number {
        return this.tasks.size;
    }

    isScheduled(id: number): boolean {
        return this.tasks.get(id)?.active ?? false;
    }

    /** Loads persisted sites, seeds defaults into an empty store, and starts a task for each. */
    start(): Promise<void> {
        return this.lifecycle(async () => {
            let records = await this.store.listSites();
            if (records.length === 0 && this.options.defaultSites?.length) {
                await this.seedDefaults();
                records = await this.store.listSites();
            }
            for (const record of records) {
                this.spawn(record);
            }
            console.log(`[registry] scheduling ${this.tasks.size} site(s)`);
        });
    }

    stop(): Promise<void> {
        return this.lifecycle(() => this.cancelAll());
    }

    async addSite(input: NewSite): Promise<SiteView> {
        const site = validateNewSite(input, this.options.defaultIntervalSecs);
        return this.lifecycle(async () => {
            for (const task of this.tasks.values()) {
                if (task.state.url === site.url) {
                    throw new ConfigurationError(`Site with URL ${site.url} already exists`);
                }
            }

            const id = await this.store.upsertSite(site);
            const task = this.spawn({
                id,
                ...site,
                status: 'pending',
                lastChecked: null,
                lastUpdated: null,
            });
            console.log(`[registry] added site ${id}: ${site.url} (${site.style}, every ${site.intervalSecs}s)`);
            return task.state.view(true);
        });
    }

    /**
     * Cancels the site's task, waits for it to exit, then deletes the site and
     * its updates. Unknown ids are ignored.
     */
    removeSite(id: number): Promise<void> {
        return this.lifecycle(async () => {
            const task = this.tasks.get(id);
            this.tasks.delete(id);
            if (task) {
                await task.cancel();
            }
            await this.store.deleteSite(id);
            if (task) {
                console.log(`[registry] removed site ${id}`);
            }
        });
    }

    async listSites(): Promise<SiteView[]> {
        try {
            const records = await this.store.listSites();
            return records.map((record) => this.view(record));
        } catch (error) {
            console.error(`[registry] listing from storage failed, using in-memory sites: ${describeError(error)}`);
            return Array.from(this.tasks.values(), (task) => task.state.view(task.active));
        }
    }

    async getSite(id: number): Promise<SiteView | null> {
        const task = this.tasks.get(id);
        try {
            const record = await this.store.getSite(id);
            return record ? this.view(record) : null;
        } catch (error) {
            if (task) return task.state.view(task.active);
            throw error;
        }
    }

    /** Operator recovery: stops every task, wipes storage, then reseeds the defaults. */
    reset(): Promise<void> {
        return this.lifecycle(async () => {
            await this.cancelAll();
            await this.store.resetAll();
            console.log('[registry] storage reset');
            if (this.options.defaultSites?.length) {
                await this.seedDefaults();
                for (const record of await this.store.listSites()) {
                    this.spawn(record);
                }
            }
        });
    }

    private spawn(record: SiteRecord): SiteTask {
        const task = this.scheduler.spawn(record);
        this.tasks.set(record.id, task);
        return task;
    }

    private view(record: SiteRecord): SiteView {
        const task = this.tasks.get(record.id);
        if (!task) {
            return { ...record, currentBackoffSecs: record.intervalSecs, scheduled: false };
        }
        return { ...task.state.view(task.active), url: record.url };
    }

    private async cancelAll(): Promise<void> {
        const tasks = Array.from(this.tasks.values());
        this.tasks.clear();
        await Promise.all(tasks.map((task) => task.cancel()));
    }

    private async seedDefaults(): Promise<void> {
        let added = 0;
        for (const input of this.options.defaultSites ?? []) {
            try {
                await this.store.upsertSite(validateNewSite(input, this.options.defaultIntervalSecs));
                added++;
            } catch (error) {
                if (!(error instanceof ConfigurationError)) throw error;
                console.error(`[registry] skipping default site ${input.url}: ${error.message}`);
            }
        }
        console.log(`[registry] seeded ${added} default site(s)`);
    }
}
