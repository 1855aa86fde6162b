import { Router, Request, Response } from 'express';
import { z } from 'zod';
import type { Services } from '../../services/container';
import type { ResolutionResult } from '../../models/help-request';
import { logger } from '../../services/logging';
import { ConflictError } from '../../utils/errors';
import { asyncHandler } from '../middleware/error-handler';

const ListQuery = z.object({
    status: z.enum(['pending', 'all']).default('pending'),
    limit: z.coerce.number().int().min(1).max(500).default(100),
});

const ResolveBody = z.object({
    answer: z.string().trim().min(1, 'answer is required'),
    resolution_notes: z.string().nullish(),
    add_to_knowledge_base: z.boolean().default(true),
    kb_category: z.string().trim().min(1).default('general'),
    resolved_by: z.string().trim().min(1).default('supervisor'),
});

export function createHelpRequestsRouter(services: Pick<Services, 'escalation' | 'idempotency'>): Router {
    const router = Router();

    router.get('/', asyncHandler(async (req: Request, res: Response) => {
        const { status, limit } = ListQuery.parse(req.query);
        const requests = status === 'pending'
            ? await services.escalation.listPending(limit)
            : await services.escalation.listRecent(limit);
        res.json({ count: requests.length, requests });
    }));

    router.get('/:id', asyncHandler(async (req: Request, res: Response) => {
        res.json(await services.escalation.getById(req.params.id));
    }));

    router.post('/:id/resolve', asyncHandler(async (req: Request, res: Response) => {
        const body = ResolveBody.parse(req.body);

        const { id } = req.params;
        const idempotencyKey = req.get('Idempotency-Key');
        // Keys are scoped to the request they resolve.
        const claim = idempotencyKey ? `${id}:${idempotencyKey}` : null;
        if (claim && !(await services.idempotency.markResolutionProcessed(claim))) {
            throw new ConflictError('Duplicate resolution request', { idempotencyKey });
        }

        let result: ResolutionResult;
        try {
            result = await services.escalation.resolve(id, {
                answer: body.answer,
                resolutionNotes: body.resolution_notes ?? null,
                addToKnowledgeBase: body.add_to_knowledge_base,
                kbCategory: body.kb_category,
            }, body.resolved_by);
        } catch (error) {
            if (claim) {
                await services.idempotency.releaseResolution(claim).catch((releaseError) => {
                    logger.error('Failed to release idempotency key', { idempotencyKey, error: releaseError });
                });
            }
            throw error;
        }

        res.json(result);
    }));

    return router;
}
