import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import { createV1Router } from './routes/v1/index.js';
import { requestContextMiddleware } from './middleware/requestContext.middleware.js';
import { httpLoggingMiddleware } from './middleware/httpLogging.middleware.js';
import type { DialogueRuntime } from './services/dialogue/dialogue.factory.js';

export function createApp(runtime: DialogueRuntime) {
    const app = express();
    // Request context first: body-parser errors reach the error handler with req.log set
    app.use(requestContextMiddleware);
    app.use(httpLoggingMiddleware);

    app.use(helmet());
    app.use(compression());
    app.use(express.json({ limit: '1mb' }));
    app.use(cors());

    app.use('/api/v1', createV1Router(runtime));

    app.get('/healthz', (_req, res) => res.status(200).send('ok'));

    // Malformed JSON bodies and anything a route did not handle
    app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
        const status = typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number'
            ? err.status
            : 500;
        req.log.error({ error: err instanceof Error ? err.message : String(err), statusCode: status }, 'Unhandled request error');
        res.status(status).json({ error: status < 500 ? 'Invalid request' : 'Internal error', traceId: req.traceId });
    });

    return app;
}
