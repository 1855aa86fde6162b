import { Router, Request, Response } from 'express';
import { TOOLS } from '../../functions/tools';
import type { Services } from '../../services/container';
import { asyncHandler } from '../middleware/error-handler';

function splitToolBody(body: unknown): { roomName: string | null; args: Record<string, unknown> } {
    if (typeof body !== 'object' || body === null || Array.isArray(body)) {
        return { roomName: null, args: {} };
    }
    const { roomName, ...args } = Object.fromEntries(Object.entries(body));
    return { roomName: typeof roomName === 'string' && roomName ? roomName : null, args };
}

export function createSessionsRouter(services: Pick<Services, 'sessions' | 'tools'>): Router {
    const router = Router();

    router.get('/tools', (_req: Request, res: Response) => {
        res.json({ tools: TOOLS });
    });

    router.post('/sessions/:sessionId/tools/:toolName', asyncHandler(async (req: Request, res: Response) => {
        const { sessionId, toolName } = req.params;
        const { roomName, args } = splitToolBody(req.body);

        const session = services.sessions.get(sessionId, roomName);
        const result = await services.tools.execute(toolName, args, session);

        res.json({
            result,
            conversationState: session.conversationState,
            waitingForConfirmation: session.waitingForConfirmation,
        });
    }));

    router.delete('/sessions/:sessionId', (req: Request, res: Response) => {
        if (!services.sessions.end(req.params.sessionId)) {
            res.status(404).json({ status: 'error', code: 'not_found', message: 'Session not found' });
            return;
        }
        res.status(204).end();
    });

    return router;
}
