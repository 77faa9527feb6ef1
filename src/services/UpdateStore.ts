import { DataSource, In, QueryFailedError, Repository } from 'typeorm';
import { Site } from '../entities/Site';
import { Update } from '../entities/Update';
import { ConfigurationError, StorageFailure, WatcherError } from '../errors';
import { SiteRecord, SiteStatus, SiteStyle, UpdateSummary } from '../types';
import { KeyedSerializer } from '../utils';

export interface UpdateStoreOptions {
    updateCacheSize: number;
    // Single-connection engines (SQLite) cannot run two transactions at once
    serializeAllWrites?: boolean;
}

export interface SiteInput {
    id?: number;
    url: string;
    intervalSecs: number;
    style: SiteStyle;
}

export interface NewUpdate {
    timestamp: Date;
    contentHash: string;
    content: string;
}

const UNIQUE_VIOLATION_CODES = new Set(['23505', 'SQLITE_CONSTRAINT_UNIQUE']);

function isUniqueViolation(error: unknown): boolean {
    if (!(error instanceof QueryFailedError)) return false;
    const code: unknown = error.driverError?.code;
    return (typeof code === 'string' && UNIQUE_VIOLATION_CODES.has(code)) || /unique/i.test(error.message);
}

export function toSiteRecord(site: Site): SiteRecord {
    return {
        id: site.id,
        url: site.url,
        intervalSecs: site.intervalSecs,
        style: site.style,
        status: site.status,
        lastChecked: site.lastChecked,
        lastUpdated: site.lastUpdated,
    };
}

/**
 * Persistence for sites and their capped update history. Writes that touch
 * one site run one at a time; appends evict past `updateCacheSize` inside
 * the same transaction as the insert.
 */
export class UpdateStore {
    private readonly writes = new KeyedSerializer<string>();
    private readonly siteRepo: Repository<Site>;
    private readonly updateRepo: Repository<Update>;

    constructor(private readonly dataSource: DataSource, private readonly options: UpdateStoreOptions) {
        if (!Number.isInteger(options.updateCacheSize) || options.updateCacheSize < 1) {
            throw new ConfigurationError(`update cache size must be a positive integer, got ${options.updateCacheSize}`);
        }
        this.siteRepo = dataSource.getRepository(Site);
        this.updateRepo = dataSource.getRepository(Update);
    }

    get updateCacheSize(): number {
        return this.options.updateCacheSize;
    }

    async upsertSite(input: SiteInput): Promise<number> {
        return this.write(input.id !== undefined ? `site:${input.id}` : `url:${input.url}`, 'upsertSite', async () => {
            const sameUrl = await this.findSiteByUrl(input.url);
            if (sameUrl && sameUrl.id !== input.id) {
                throw new ConfigurationError(`Site with URL ${input.url} already exists`);
            }

            const existing = input.id !== undefined ? await this.siteRepo.findOneBy({ id: input.id }) : null;
            if (existing) {
                await this.siteRepo.update(
                    { id: existing.id },
                    { url: input.url, intervalSecs: input.intervalSecs, style: input.style }
                );
                return existing.id;
            }

            try {
                const saved = await this.siteRepo.save(
                    this.siteRepo.create({
                        url: input.url,
                        intervalSecs: input.intervalSecs,
                        style: input.style,
                        status: 'pending',
                        lastChecked: null,
                        lastUpdated: null,
                    })
                );
                return saved.id;
            } catch (error) {
                if (isUniqueViolation(error)) {
                    throw new ConfigurationError(`Site with URL ${input.url} already exists`);
                }
                throw error;
            }
        });
    }

    async deleteSite(id: number): Promise<void> {
        await this.write(`site:${id}`, 'deleteSite', () =>
            this.dataSource.transaction(async (manager) => {
                await manager.delete(Update, { siteId: id });
                await manager.delete(Site, { id });
            })
        );
    }

    async listSites(): Promise<SiteRecord[]> {
        return this.read('listSites', async () => {
            const sites = await this.siteRepo.find({ order: { id: 'ASC' } });
            return sites.map(toSiteRecord);
        });
    }

    async getSite(id: number): Promise<SiteRecord | null> {
        return this.read('getSite', async () => {
            const site = await this.siteRepo.findOneBy({ id });
            return site ? toSiteRecord(site) : null;
        });
    }

    async findSiteByUrl(url: string): Promise<SiteRecord | null> {
        return this.read('findSiteByUrl', async () => {
            const site = await this.siteRepo.findOneBy({ url });
            return site ? toSiteRecord(site) : null;
        });
    }

    /** Resolves to false when the site no longer exists. */
    async recordCheck(id: number, status: SiteStatus, timestamp: Date): Promise<boolean> {
        return this.write(`site:${id}`, 'recordCheck', async () => {
            const result = await this.siteRepo.update({ id }, { status, lastChecked: timestamp });
            // not every driver reports affected rows
            return result.affected !== undefined ? result.affected > 0 : this.siteRepo.existsBy({ id });
        });
    }

    async recordChange(id: number, timestamp: Date): Promise<void> {
        await this.write(`site:${id}`, 'recordChange', () => this.siteRepo.update({ id }, { lastUpdated: timestamp }));
    }

    /**
     * Inserts an update, marks the site checked and updated at its timestamp,
     * and evicts the oldest updates past the cache size, all in one
     * transaction. Resolves to null without writing when the site has been
     * deleted.
     */
    async appendUpdate(siteId: number, update: NewUpdate): Promise<Update | null> {
        const cap = this.options.updateCacheSize;
        return this.write(`site:${siteId}`, 'appendUpdate', () =>
            this.dataSource.transaction(async (manager) => {
                const site = await manager.findOne(Site, { select: { id: true }, where: { id: siteId } });
                if (!site) return null;

                const saved = await manager.save(manager.create(Update, { siteId, ...update }));
                await manager.update(
                    Site,
                    { id: siteId },
                    { status: 'ok', lastChecked: update.timestamp, lastUpdated: update.timestamp }
                );

                const ids = await manager.find(Update, {
                    select: { id: true },
                    where: { siteId },
                    order: { id: 'DESC' },
                });
                const stale = ids.slice(cap).map((row) => row.id);
                if (stale.length > 0) {
                    await manager.delete(Update, { id: In(stale) });
                }
                return saved;
            })
        );
    }

    async getUpdate(siteId: number, key: number | Date): Promise<Update | null> {
        return this.read('getUpdate', async () => {
            if (typeof key === 'number') {
                return this.updateRepo.findOneBy({ id: key, siteId });
            }
            // at most updateCacheSize rows per site
            const updates = await this.updateRepo.find({ where: { siteId }, order: { id: 'DESC' } });
            return updates.find((update) => update.timestamp.getTime() === key.getTime()) ?? null;
        });
    }

    async listUpdates(siteId: number): Promise<UpdateSummary[]> {
        return this.read('listUpdates', () =>
            this.updateRepo.find({
                select: { id: true, siteId: true, timestamp: true, contentHash: true },
                where: { siteId },
                order: { id: 'DESC' },
            })
        );
    }

    async latestHash(siteId: number): Promise<string | null> {
        return this.read('latestHash', async () => {
            const latest = await this.updateRepo.findOne({
                select: { id: true, contentHash: true },
                where: { siteId },
                order: { id: 'DESC' },
            });
            return latest?.contentHash ?? null;
        });
    }

    async countUpdates(siteId: number): Promise<number> {
        return this.read('countUpdates', () => this.updateRepo.countBy({ siteId }));
    }

    async resetAll(): Promise<void> {
        await this.write('all', 'resetAll', () =>
            this.dataSource.transaction(async (manager) => {
                await manager.createQueryBuilder().delete().from(Update).execute();
                await manager.createQueryBuilder().delete().from(Site).execute();
            })
        );
    }

    private write<T>(key: string, operation: string, task: () => Promise<T>): Promise<T> {
        const lane = this.options.serializeAllWrites ? 'all' : key;
        return this.writes.run(lane, () => this.read(operation, task));
    }

    private async read<T>(operation: string, task: () => Promise<T>): Promise<T> {
        try {
            return await task();
        } catch (error) {
            if (error instanceof WatcherError) throw error;
            throw new StorageFailure(operation, error);
        }
    }
}
