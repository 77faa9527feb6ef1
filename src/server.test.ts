import axios, { AxiosInstance } from 'axios';
import { Server } from 'http';
import { Readable } from 'stream';
import { DataSource } from 'typeorm';
import { createApp } from './server';
import { Broadcaster } from './services/Broadcaster';
import { Registry } from './services/Registry';
import { Scheduler } from './services/Scheduler';
import { UpdateStore } from './services/UpdateStore';
import { ManualSleep, StubFetcher, createTestDataSource, ok, waitFor } from './test-utils';

describe('HTTP API', () => {
    let dataSource: DataSource;
    let store: UpdateStore;
    let registry: Registry;
    let broadcaster: Broadcaster;
    let fetcher: StubFetcher;
    let sleeper: ManualSleep;
    let server: Server;
    let client: AxiosInstance;

    beforeEach(async () => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);

        dataSource = await createTestDataSource();
        store = new UpdateStore(dataSource, { updateCacheSize: 5, serializeAllWrites: true });
        broadcaster = new Broadcaster(10);
        fetcher = new StubFetcher();
        sleeper = new ManualSleep();
        const scheduler = new Scheduler({
            fetcher,
            store,
            broadcaster,
            settings: { intervalJitterMaxMs: 0, maxBackoffSecs: 86400, fetchTimeoutMs: 1000, previewLength: 400 },
            sleep: sleeper.sleep,
            now: () => new Date('2024-01-01T00:00:00.000Z'),
        });
        registry = new Registry(store, scheduler, { defaultIntervalSecs: 60 });

        const app = createApp({ registry, store, broadcaster });
        server = await new Promise<Server>((resolve) => {
            const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
        });
        const address = server.address();
        if (address === null || typeof address === 'string') throw new Error('server has no port');
        client = axios.create({ baseURL: `http://127.0.0.1:${address.port}`, validateStatus: () => true });
    });

    afterEach(async () => {
        await registry.stop();
        broadcaster.close();
        await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
        await dataSource.destroy();
        jest.restoreAllMocks();
    });

    it('should add a site with defaults and list it', async () => {
        fetcher.respond('https://example.com/a', ok('<main>a</main>'));

        const created = await client.post('/api/sites', { url: 'https://example.com/a' });
        expect(created.status).toBe(201);
        expect(created.data).toMatchObject({ url: 'https://example.com/a', intervalSecs: 60, style: 'random' });

        const listed = await client.get('/api/sites');
        expect(listed.status).toBe(200);
        expect(listed.data).toHaveLength(1);
    });

    it('should answer 400 for invalid sites', async () => {
        const badInterval = await client.post('/api/sites', { url: 'https://example.com/a', interval_secs: 0 });
        expect(badInterval.status).toBe(400);
        expect(badInterval.data).toEqual({ error: 'interval_secs must be an integer between 1 and 3000, got 0' });

        const badBody = await client.post('/api/sites', { interval_secs: 10 });
        expect(badBody.status).toBe(400);
        expect(badBody.data).toEqual({ error: 'Expected { url, interval_secs?, style? }' });
    });

    it('should delete a site idempotently', async () => {
        fetcher.respond('https://example.com/a', ok('<main>a</main>'));
        const created = await client.post('/api/sites', { url: 'https://example.com/a', style: 'none' });

        expect((await client.delete(`/api/sites/${created.data.id}`)).status).toBe(204);
        expect((await client.delete(`/api/sites/${created.data.id}`)).status).toBe(204);
        expect((await client.get(`/api/sites/${created.data.id}`)).status).toBe(404);
    });

    it('should serve stored content by update id and by timestamp', async () => {
        fetcher.respond('https://example.com/a', ok('<main>hello</main>'));
        const created = await client.post('/api/sites', { url: 'https://example.com/a', style: 'none' });
        const siteId: number = created.data.id;
        await waitFor(() => sleeper.pending === 1);

        const updates = await client.get(`/api/sites/${siteId}/updates`);
        expect(updates.data).toHaveLength(1);
        const updateId: number = updates.data[0].id;

        const byId = await client.get(`/api/content/${siteId}/${updateId}`);
        expect(byId.status).toBe(200);
        expect(byId.data.content).toBe('<main>hello</main>');

        const byTimestamp = await client.get(`/api/content/${siteId}/2024-01-01T00:00:00.000Z`);
        expect(byTimestamp.status).toBe(200);
        expect(byTimestamp.data.id).toBe(updateId);

        expect((await client.get(`/api/content/${siteId}/999`)).status).toBe(404);
        expect((await client.get(`/api/content/${siteId}/yesterday`)).status).toBe(400);
    });

    it('should stream each published update as one SSE message', async () => {
        const response = await client.get('/api/updates/stream', { responseType: 'stream' });
        const stream: Readable = response.data;
        let received = '';
        stream.on('data', (chunk: Buffer) => {
            received += chunk.toString('utf8');
        });
        expect(response.headers['content-type']).toBe('text/event-stream');
        await waitFor(() => broadcaster.subscriberCount === 1);

        const event = {
            siteId: 1,
            url: 'https://example.com/a',
            updateId: 7,
            timestamp: new Date('2024-01-01T00:00:00.000Z'),
            contentHash: 'test-hash',
            contentPreview: 'preview',
            hasFullContent: true,
        };
        expect(broadcaster.publish(event)).toBe(1);
        await waitFor(() => /data: .*\n\n/.test(received));

        const messages = received.split('\n\n').filter((block) => block.startsWith('data: '));
        expect(messages).toHaveLength(1);
        expect(JSON.parse(messages[0].slice('data: '.length))).toEqual({
            ...event,
            timestamp: '2024-01-01T00:00:00.000Z',
        });

        stream.destroy();
        await waitFor(() => broadcaster.subscriberCount === 0);
    });

    it('should wipe sites and stop their tasks on reset', async () => {
        fetcher.respond('https://example.com/a', ok('<main>a</main>'));
        const created = await client.post('/api/sites', { url: 'https://example.com/a', style: 'none' });
        const siteId: number = created.data.id;
        await waitFor(() => sleeper.pending === 1);

        const reset = await client.post('/api/reset-db');
        expect(reset.status).toBe(200);
        expect(reset.data).toEqual({ status: 'reset' });

        expect(registry.size).toBe(0);
        expect(registry.isScheduled(siteId)).toBe(false);
        expect(sleeper.pending).toBe(0);
        expect((await client.get('/api/sites')).data).toEqual([]);
        await expect(store.countUpdates(siteId)).resolves.toBe(0);
    });
});
