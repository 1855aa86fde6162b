import express, { Express, Request, Response, NextFunction } from 'express';
import rateLimit from 'express-rate-limit';
import type { Services } from '../services/container';
import { logger } from '../services/logging';
import { requireAuth } from './middleware/auth';
import { errorHandler } from './middleware/error-handler';
import { createAppointmentsRouter } from './routes/appointments';
import { createHelpRequestsRouter } from './routes/help-requests';
import { createKnowledgeRouter } from './routes/knowledge';
import { createSessionsRouter } from './routes/sessions';

export interface AppOptions {
    apiKey: string;
    logRequests?: boolean;
    rateLimitPerWindow?: number;
}

export function createApp(services: Services, options: AppOptions): Express {
    const app = express();

    app.set('trust proxy', 1);
    app.use(express.json());

    const apiLimiter = rateLimit({
        windowMs: 15 * 60 * 1000,
        max: options.rateLimitPerWindow ?? 1000,
        standardHeaders: true,
        legacyHeaders: false,
    });
    app.use('/api/', apiLimiter);

    if (options.logRequests) {
        app.use((req: Request, _res: Response, next: NextFunction) => {
            logger.info('HTTP Request', { method: req.method, path: req.path, ip: req.ip });
            next();
        });
    }

    // Public health check (no auth, no secrets)
    app.get('/health', (_req: Request, res: Response) => {
        res.setHeader('Cache-Control', 'no-store');
        try {
            services.db.prepare('SELECT 1').get();
            res.json({
                status: 'healthy',
                database: 'connected',
                notifications: services.outbox.stats(),
                timestamp: new Date().toISOString()
            });
        } catch (error) {
            logger.error('Health check failed', { error });
            res.status(503).json({
                status: 'unhealthy',
                database: 'disconnected',
                timestamp: new Date().toISOString()
            });
        }
    });

    const auth = requireAuth(options.apiKey);
    app.use('/api', auth, createSessionsRouter(services));
    app.use('/api/help-requests', auth, createHelpRequestsRouter(services));
    app.use('/api/appointments', auth, createAppointmentsRouter(services));
    app.use('/api/knowledge', auth, createKnowledgeRouter(services));

    // Error handling middleware (must be last)
    app.use(errorHandler);

    return app;
}
