import pLimit from 'p-limit';

/**
 * Runs tasks one at a time per key; tasks under different keys run
 * concurrently. Idle queues are dropped so the map tracks only busy keys.
 */
export class KeyedSerializer<K> {
    private readonly queues = new Map<K, pLimit.Limit>();

    run<T>(key: K, task: () => Promise<T>): Promise<T> {
        let queue = this.queues.get(key);
        if (!queue) {
            queue = pLimit(1);
            this.queues.set(key, queue);
        }
        const limit = queue;
        return limit(task).finally(() => {
            if (limit.activeCount === 0 && limit.pendingCount === 0 && this.queues.get(key) === limit) {
                this.queues.delete(key);
            }
        });
    }

    get size(): number {
        return this.queues.size;
    }
}

export function isValidHttpUrl(value: string): boolean {
    try {
        const url = new URL(value);
        return url.protocol === 'http:' || url.protocol === 'https:';
    } catch {
        return false;
    }
}
