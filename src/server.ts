import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import moment from 'moment';
import { once } from 'events';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import { Broadcaster } from './services/Broadcaster';
import { Registry } from './services/Registry';
import { UpdateStore } from './services/UpdateStore';

export interface AppContext {
    registry: Registry;
    store: UpdateStore;
    broadcaster: Broadcaster;
}

const newSiteBody = z.object({
    url: z.string(),
    interval_secs: z.number().optional(),
    style: z.string().optional(),
});

function parseId(value: string): number | null {
    const id = Number(value);
    return Number.isInteger(id) && id > 0 ? id : null;
}

// An update is addressed either by its id or by its ISO-8601 timestamp
function parseUpdateKey(value: string): number | Date | null {
    if (/^\d+$/.test(value)) return parseId(value);
    const timestamp = moment(value, moment.ISO_8601, true);
    return timestamp.isValid() ? timestamp.toDate() : null;
}

function sendError(res: Response, error: unknown, message: string): void {
    if (error instanceof ConfigurationError) {
        res.status(400).json({ error: error.message });
        return;
    }
    console.error(`[server] ${message}:`, error);
    res.status(500).json({ error: message });
}

export function createApp({ registry, store, broadcaster }: AppContext): Express {
    const app = express();

    app.use(cors());
    app.use(express.json());

    app.get('/api/sites', async (req: Request, res: Response) => {
        try {
            res.json(await registry.listSites());
        } catch (error) {
            sendError(res, error, 'Failed to list sites');
        }
    });

    app.post('/api/sites', async (req: Request, res: Response) => {
        const body = newSiteBody.safeParse(req.body);
        if (!body.success) {
            res.status(400).json({ error: 'Expected { url, interval_secs?, style? }' });
            return;
        }
        try {
            const site = await registry.addSite({
                url: body.data.url,
                intervalSecs: body.data.interval_secs,
                style: body.data.style,
            });
            res.status(201).json(site);
        } catch (error) {
            sendError(res, error, 'Failed to add site');
        }
    });

    app.get('/api/sites/:id', async (req: Request, res: Response) => {
        const id = parseId(req.params.id);
        if (id === null) {
            res.status(400).json({ error: 'Invalid site id' });
            return;
        }
        try {
            const site = await registry.getSite(id);
            if (!site) {
                res.status(404).json({ error: `Site ${id} not found` });
                return;
            }
            res.json(site);
        } catch (error) {
            sendError(res, error, 'Failed to fetch site');
        }
    });

    app.delete('/api/sites/:id', async (req: Request, res: Response) => {
        const id = parseId(req.params.id);
        if (id === null) {
            res.status(400).json({ error: 'Invalid site id' });
            return;
        }
        try {
            await registry.removeSite(id);
            res.status(204).end();
        } catch (error) {
            sendError(res, error, 'Failed to delete site');
        }
    });

    app.get('/api/sites/:id/updates', async (req: Request, res: Response) => {
        const id = parseId(req.params.id);
        if (id === null) {
            res.status(400).json({ error: 'Invalid site id' });
            return;
        }
        try {
            res.json(await store.listUpdates(id));
        } catch (error) {
            sendError(res, error, 'Failed to list updates');
        }
    });

    app.get('/api/content/:siteId/:key', async (req: Request, res: Response) => {
        const siteId = parseId(req.params.siteId);
        const key = parseUpdateKey(req.params.key);
        if (siteId === null || key === null) {
            res.status(400).json({ error: 'Expected /api/content/:siteId/:updateId or an ISO-8601 timestamp' });
            return;
        }
        try {
            const update = await store.getUpdate(siteId, key);
            if (!update) {
                res.status(404).json({ error: 'Content not found' });
                return;
            }
            res.json({
                id: update.id,
                siteId: update.siteId,
                timestamp: update.timestamp,
                contentHash: update.contentHash,
                content: update.content,
            });
        } catch (error) {
            sendError(res, error, 'Failed to fetch content');
        }
    });

    app.post('/api/reset-db', async (req: Request, res: Response) => {
        console.log('[server] database reset requested');
        try {
            await registry.reset();
            res.json({ status: 'reset' });
        } catch (error) {
            sendError(res, error, 'Failed to reset database');
        }
    });

    // Live updates over SSE, one `data:` message per event
    app.get('/api/updates/stream', async (req: Request, res: Response) => {
        res.setHeader('Content-Type', 'text/event-stream');
        res.setHeader('Cache-Control', 'no-cache');
        res.setHeader('Connection', 'keep-alive');
        res.flushHeaders();
        res.write(': connected\n\n');

        const subscription = broadcaster.subscribe();
        res.on('close', () => subscription.close());

        try {
            for await (const event of subscription) {
                if (!res.write(`data: ${JSON.stringify(event)}\n\n`)) {
                    await Promise.race([once(res, 'drain'), once(res, 'close')]);
                }
            }
        } catch (error) {
            console.error('[server] update stream failed:', error);
        } finally {
            subscription.close();
            res.end();
        }
    });

    return app;
}
