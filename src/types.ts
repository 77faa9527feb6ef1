import { NetworkFailure } from './errors';

export const SITE_STYLES = ['random', 'exponential', 'none'] as const;
export type SiteStyle = (typeof SITE_STYLES)[number];

export type SiteStatus = 'pending' | 'ok' | 'error';

export interface NewSite {
    url: string;
    intervalSecs?: number;
    style?: string;
}

export interface SiteRecord {
    id: number;
    url: string;
    intervalSecs: number;
    style: SiteStyle;
    status: SiteStatus;
    lastChecked: Date | null;
    lastUpdated: Date | null;
}

// Persisted record plus the runtime scheduling state
export interface SiteView extends SiteRecord {
    currentBackoffSecs: number;
    scheduled: boolean;
}

export interface UpdateSummary {
    id: number;
    siteId: number;
    timestamp: Date;
    contentHash: string;
}

export interface UpdateEvent {
    siteId: number;
    url: string;
    updateId: number;
    timestamp: Date;
    contentHash: string;
    contentPreview: string;
    hasFullContent: boolean;
}

export type FetchResult =
    | { success: true; content: string; status: number; fingerprint: string }
    | { success: false; error: NetworkFailure };

export interface FetchOptions {
    timeoutMs: number;
    signal?: AbortSignal;
}

export interface ContentFetcher {
    fetch(url: string, options: FetchOptions): Promise<FetchResult>;
}

export type CycleOutcome = 'changed' | 'unchanged' | 'failed' | 'cancelled';

export interface SchedulerSettings {
    intervalJitterMaxMs: number;
    maxBackoffSecs: number;
    fetchTimeoutMs: number;
    previewLength: number;
}

export interface Sleep {
    (ms: number, signal: AbortSignal): Promise<void>;
}
