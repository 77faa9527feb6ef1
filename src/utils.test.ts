import { KeyedSerializer, isValidHttpUrl } from './utils';

describe('KeyedSerializer', () => {
    it('should run tasks under one key one at a time, in order', async () => {
        const serializer = new KeyedSerializer<string>();
        const log: string[] = [];
        let release: () => void = () => undefined;
        const gate = new Promise<void>((resolve) => {
            release = resolve;
        });

        const first = serializer.run('a', async () => {
            log.push('first:start');
            await gate;
            log.push('first:end');
        });
        const second = serializer.run('a', async () => {
            log.push('second');
        });

        await new Promise((resolve) => setImmediate(resolve));
        expect(log).toEqual(['first:start']);

        release();
        await Promise.all([first, second]);
        expect(log).toEqual(['first:start', 'first:end', 'second']);
        expect(serializer.size).toBe(0);
    });

    it('should not hold back tasks under other keys', async () => {
        const serializer = new KeyedSerializer<number>();
        serializer.run(1, () => new Promise<void>(() => undefined));

        await expect(serializer.run(2, async () => 'done')).resolves.toBe('done');
        expect(serializer.size).toBe(1);
    });

    it('should keep serving a key after a task rejects', async () => {
        const serializer = new KeyedSerializer<string>();
        await expect(serializer.run('a', async () => { throw new Error('boom'); })).rejects.toThrow('boom');
        await expect(serializer.run('a', async () => 42)).resolves.toBe(42);
    });
});

describe('isValidHttpUrl', () => {
    it('should accept http and https URLs only', () => {
        expect(isValidHttpUrl('https://example.com/feed')).toBe(true);
        expect(isValidHttpUrl('http://localhost:8080')).toBe(true);
        expect(isValidHttpUrl('ftp://example.com')).toBe(false);
        expect(isValidHttpUrl('not a url')).toBe(false);
    });
});
