import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { z } from 'zod';
import { ValidationError, createWatcher, describeError, loadClientConfig, logger } from '@beaker-watch/client';
import { WatchManager } from './watchManager';

const WatchRequestBody = z.object({
    jobIds: z.array(z.string()).min(1),
    failFast: z.boolean().optional(),
    timeoutMs: z.number().positive().optional(),
});

export function createApp(manager: WatchManager): express.Express {
    const app = express();

    app.use(cors());
    app.use(express.json());

    app.use((req, _res, next) => {
        logger.debug(`REQ ${req.method} ${req.originalUrl}`);
        next();
    });

    // Health
    app.get('/api/health', (_req: Request, res: Response) => {
        res.json({ ok: true });
    });

    app.post('/api/watches', (req: Request, res: Response) => {
        const parsed = WatchRequestBody.safeParse(req.body);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            return res.status(400).json({ error: issue ? `${issue.path.join('.') || 'body'}: ${issue.message}` : 'invalid body' });
        }
        try {
            const watch = manager.startWatch(parsed.data);
            return res.status(202).json({ id: watch.id });
        } catch (error) {
            if (error instanceof ValidationError) {
                return res.status(400).json({ error: error.message });
            }
            throw error;
        }
    });

    app.get('/api/watches/:id', (req: Request, res: Response) => {
        const watch = manager.getWatch(req.params.id);
        if (!watch) return res.status(404).json({ error: 'watch not found' });
        return res.json(watch);
    });

    app.get('/api/watches/:id/events', (req: Request, res: Response) => {
        if (!manager.getWatch(req.params.id)) {
            return res.status(404).json({ error: 'watch not found' });
        }
        res.setHeader('Content-Type', 'text/event-stream');
        res.setHeader('Cache-Control', 'no-cache');
        res.setHeader('Connection', 'keep-alive');
        res.flushHeaders();
        manager.attachStream(req.params.id, res);
        return undefined;
    });

    app.delete('/api/watches/:id', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const canceled = await manager.cancelWatch(req.params.id);
            if (!canceled) return res.status(404).json({ error: 'watch not found' });
            return res.json(manager.getWatch(req.params.id));
        } catch (error) {
            return next(error);
        }
    });

    app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
        logger.error(`Handler error on ${req.method} ${req.originalUrl}: ${describeError(error)}`);
        res.status(500).json({ error: describeError(error) });
    });

    return app;
}

function start(): void {
    const port = process.env.PORT ? Number(process.env.PORT) : 3001;
    const { aggregator } = createWatcher(loadClientConfig());
    const app = createApp(new WatchManager(aggregator));

    process.on('unhandledRejection', (reason) => {
        logger.error(`unhandledRejection: ${describeError(reason)}`);
    });

    app.listen(port, () => {
        logger.info(`API listening on http://localhost:${port}`);
    });
}

if (require.main === module) {
    start();
}
