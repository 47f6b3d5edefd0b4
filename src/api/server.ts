// src/api/server.ts
import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { Server } from 'http';
import { z } from 'zod';
import { createContextLogger } from '../utils/logger.js';
import { AnalyzerService } from '../analyzer/analyzer-service.js';
import { LANGUAGE_TAGS } from '../analyzer/language-detector.js';
import config from '../config/index.js';

const logger = createContextLogger('CodescopeAPI');

const AnalyzeRequestSchema = z.object({
    sourceText: z.string(),
    language: z.string().min(1),
    excludeEntryPoints: z.boolean().optional(),
});

export function createApp(
    service: AnalyzerService = new AnalyzerService(undefined, { excludeEntryPoints: config.excludeEntryPoints }),
): express.Application {
    const app = express();

    app.use(cors());
    app.use(express.json({ limit: config.maxRequestBody }));

    // Request logging middleware
    app.use((req: Request, _res: Response, next: NextFunction) => {
        logger.info(`${req.method} ${req.path}`);
        next();
    });

    app.get('/health', (_req: Request, res: Response) => {
        res.json({ status: 'ok' });
    });

    app.get('/', (_req: Request, res: Response) => {
        res.json({
            name: 'codescope API',
            version: '0.1.0',
            endpoints: {
                'GET /health': 'Health check',
                'GET /api/languages': 'Accepted language tags',
                'POST /api/analyze': 'Analyze one source text',
            },
        });
    });

    app.get('/api/languages', (_req: Request, res: Response) => {
        res.json({ languages: Object.keys(LANGUAGE_TAGS) });
    });

    app.post('/api/analyze', (req: Request, res: Response) => {
        const parsed = AnalyzeRequestSchema.safeParse(req.body);
        if (!parsed.success) {
            res.status(400).json({ error: 'Invalid request', details: parsed.error.issues });
            return;
        }
        const body = parsed.data;

        const outcome = service.analyze(
            { sourceText: body.sourceText, languageTag: body.language },
            { excludeEntryPoints: body.excludeEntryPoints },
        );
        if (!outcome.ok) {
            res.status(422).json({ error: outcome.error });
            return;
        }
        res.json(outcome.result);
    });

    // Error handling middleware
    app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
        logger.error('Unhandled error', { error: err.message, stack: err.stack });
        res.status(500).json({ error: 'Internal server error' });
    });

    return app;
}

export function startServer(port: number = config.apiPort): Promise<Server> {
    const app = createApp();

    return new Promise((resolve, reject) => {
        const server = app.listen(port, '0.0.0.0', () => {
            logger.info(`codescope API server running on http://0.0.0.0:${port}`);
            resolve(server);
        });
        server.on('error', reject);

        const shutdown = (signal: string): void => {
            logger.info(`Received ${signal}, shutting down...`);
            server.close(() => process.exit(0));
        };
        process.once('SIGTERM', () => shutdown('SIGTERM'));
        process.once('SIGINT', () => shutdown('SIGINT'));
    });
}
