import { SiteStyle } from '../types';

// Node timers fire after 1ms when given more than 2^31-1 ms
export const MAX_SLEEP_MS = 2 ** 31 - 1;
export const MAX_SLEEP_SECS = Math.floor(MAX_SLEEP_MS / 1000);

export interface DelayOptions {
    intervalJitterMaxMs: number;
    maxBackoffSecs: number;
    random?: () => number;
}

export interface DelayState {
    intervalSecs: number;
    currentBackoffSecs: number;
}

export interface NextDelay {
    delayMs: number;
    backoffSecs: number;
}

/**
 * Computes how long a site's task sleeps before its next fetch.
 *
 * - `none`: always the base interval.
 * - `random`: base interval plus a uniform jitter in [0, intervalJitterMaxMs].
 * - `exponential`: base interval after a success; after a failure the previous
 *   delay doubles, capped at maxBackoffSecs.
 *
 * No delay exceeds MAX_SLEEP_MS, whatever the settings.
 */
export function nextDelay(
    style: SiteStyle,
    state: DelayState,
    succeeded: boolean,
    options: DelayOptions
): NextDelay {
    const base = state.intervalSecs;

    switch (style) {
        case 'random': {
            const random = options.random ?? Math.random;
            const jitterMs = Math.floor(random() * (options.intervalJitterMaxMs + 1));
            return { delayMs: Math.min(base * 1000 + jitterMs, MAX_SLEEP_MS), backoffSecs: base };
        }
        case 'exponential': {
            if (succeeded) {
                return { delayMs: base * 1000, backoffSecs: base };
            }
            const previous = Math.max(state.currentBackoffSecs, base);
            const cap = Math.min(Math.max(options.maxBackoffSecs, base), MAX_SLEEP_SECS);
            const backoffSecs = Math.min(previous * 2, cap);
            return { delayMs: backoffSecs * 1000, backoffSecs };
        }
        case 'none':
            return { delayMs: base * 1000, backoffSecs: base };
    }
}
