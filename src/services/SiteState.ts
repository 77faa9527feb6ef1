import { SiteRecord, SiteStatus, SiteStyle, SiteView } from '../types';

/**
 * Runtime status of one monitored site. Owned by exactly one task, which is
 * the only writer; readers get copies through `view()`.
 */
export class SiteState {
    status: SiteStatus;
    lastChecked: Date | null;
    lastUpdated: Date | null;
    lastHash: string | null = null;
    lastError: string | null = null;
    currentBackoffSecs: number;

    constructor(readonly record: Pick<SiteRecord, 'id' | 'url' | 'intervalSecs' | 'style'> & Partial<SiteRecord>) {
        this.status = record.status ?? 'pending';
        this.lastChecked = record.lastChecked ?? null;
        this.lastUpdated = record.lastUpdated ?? null;
        this.currentBackoffSecs = record.intervalSecs;
    }

    get id(): number {
        return this.record.id;
    }

    get url(): string {
        return this.record.url;
    }

    get intervalSecs(): number {
        return this.record.intervalSecs;
    }

    get style(): SiteStyle {
        return this.record.style;
    }

    markUnchanged(at: Date): void {
        this.status = 'ok';
        this.lastChecked = at;
        this.lastError = null;
    }

    markChanged(at: Date, hash: string): void {
        this.markUnchanged(at);
        this.lastUpdated = at;
        this.lastHash = hash;
    }

    markFailed(at: Date, reason: string): void {
        this.status = 'error';
        this.lastChecked = at;
        this.lastError = reason;
    }

    view(scheduled: boolean): SiteView {
        return {
            id: this.id,
            url: this.url,
            intervalSecs: this.intervalSecs,
            style: this.style,
            status: this.status,
            lastChecked: this.lastChecked,
            lastUpdated: this.lastUpdated,
            currentBackoffSecs: this.currentBackoffSecs,
            scheduled,
        };
    }
}
