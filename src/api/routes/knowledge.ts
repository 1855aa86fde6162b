import { Router, Request, Response } from 'express';
import type { Services } from '../../services/container';
import { asyncHandler } from '../middleware/error-handler';

export function createKnowledgeRouter(services: Pick<Services, 'knowledgeBase'>): Router {
    const router = Router();

    router.get('/', asyncHandler(async (_req: Request, res: Response) => {
        const kb = services.knowledgeBase;
        res.json({
            collection: kb.collection,
            faqCount: kb.getFaqs().length,
            itemCount: await kb.itemCount(),
            lastUpdated: kb.lastUpdated ? kb.lastUpdated.toISOString() : null,
        });
    }));

    router.post('/sync', asyncHandler(async (_req: Request, res: Response) => {
        const synced = await services.knowledgeBase.loadFaq();
        res.json({ synced });
    }));

    return router;
}
