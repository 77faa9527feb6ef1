import { MAX_SLEEP_MS, MAX_SLEEP_SECS, nextDelay } from './DelayPolicy';

const options = { intervalJitterMaxMs: 1500, maxBackoffSecs: 86400 };

describe('nextDelay', () => {
    it('should always use the base interval for style none', () => {
        for (const intervalSecs of [1, 5, 3000]) {
            const state = { intervalSecs, currentBackoffSecs: intervalSecs };
            expect(nextDelay('none', state, true, options)).toEqual({ delayMs: intervalSecs * 1000, backoffSecs: intervalSecs });
            expect(nextDelay('none', state, false, options)).toEqual({ delayMs: intervalSecs * 1000, backoffSecs: intervalSecs });
        }
    });

    it('should add jitter within [0, intervalJitterMaxMs] for style random', () => {
        const state = { intervalSecs: 5, currentBackoffSecs: 5 };

        expect(nextDelay('random', state, true, { ...options, random: () => 0 }).delayMs).toBe(5000);
        expect(nextDelay('random', state, true, { ...options, random: () => 0.5 }).delayMs).toBe(5750);
        expect(nextDelay('random', state, false, { ...options, random: () => 0.999999 }).delayMs).toBe(6500);

        for (let i = 0; i < 200; i++) {
            const { delayMs } = nextDelay('random', state, i % 2 === 0, options);
            expect(delayMs).toBeGreaterThanOrEqual(5000);
            expect(delayMs).toBeLessThanOrEqual(6500);
        }
    });

    it('should double on failure and reset on success for style exponential', () => {
        let state = { intervalSecs: 5, currentBackoffSecs: 5 };

        const first = nextDelay('exponential', state, false, options);
        expect(first).toEqual({ delayMs: 10000, backoffSecs: 10 });

        state = { ...state, currentBackoffSecs: first.backoffSecs };
        const second = nextDelay('exponential', state, false, options);
        expect(second).toEqual({ delayMs: 20000, backoffSecs: 20 });

        state = { ...state, currentBackoffSecs: second.backoffSecs };
        expect(nextDelay('exponential', state, true, options)).toEqual({ delayMs: 5000, backoffSecs: 5 });
    });

    it('should cap exponential backoff at maxBackoffSecs', () => {
        let state = { intervalSecs: 3000, currentBackoffSecs: 3000 };
        const delays: number[] = [];
        for (let i = 0; i < 6; i++) {
            const next = nextDelay('exponential', state, false, options);
            delays.push(next.delayMs);
            state = { ...state, currentBackoffSecs: next.backoffSecs };
        }

        expect(delays).toEqual([6000000, 12000000, 24000000, 48000000, 86400000, 86400000]);
    });

    it('should never exceed the longest delay a timer accepts', () => {
        let state = { intervalSecs: 3000, currentBackoffSecs: 3000 };
        const uncapped = { intervalJitterMaxMs: 1500, maxBackoffSecs: 3000000 };
        let last = { delayMs: 0, backoffSecs: 0 };
        for (let i = 0; i < 12; i++) {
            last = nextDelay('exponential', state, false, uncapped);
            state = { ...state, currentBackoffSecs: last.backoffSecs };
        }

        expect(last).toEqual({ delayMs: 2147483000, backoffSecs: MAX_SLEEP_SECS });
        expect(last.delayMs).toBeLessThanOrEqual(MAX_SLEEP_MS);

        const jittered = nextDelay('random', state, true, { intervalJitterMaxMs: 3000000000, maxBackoffSecs: 86400, random: () => 1 });
        expect(jittered.delayMs).toBe(MAX_SLEEP_MS);
    });
});
