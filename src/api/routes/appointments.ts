import { Router, Request, Response } from 'express';
import { z } from 'zod';
import type { Services } from '../../services/container';
import { DateTimeUtils } from '../../utils/date-time';
import { NotFoundError, ValidationError } from '../../utils/errors';
import { asyncHandler } from '../middleware/error-handler';

const DateQuery = z.object({ date: z.string().min(1, 'date is required') });

const CancelBody = z.object({ reason: z.string().trim().min(1).optional() });

function canonicalDate(raw: string): string {
    const parsed = DateTimeUtils.parseDate(raw);
    if (!parsed) {
        throw new ValidationError(`Unrecognized date: ${raw}`, { date: raw });
    }
    return DateTimeUtils.formatLongDate(parsed);
}

export function createAppointmentsRouter(services: Pick<Services, 'ledger'>): Router {
    const router = Router();

    router.get('/', asyncHandler(async (req: Request, res: Response) => {
        const date = canonicalDate(DateQuery.parse(req.query).date);
        const appointments = await services.ledger.listByDate(date);
        res.json({ date, count: appointments.length, appointments });
    }));

    router.get('/availability', asyncHandler(async (req: Request, res: Response) => {
        const date = canonicalDate(DateQuery.parse(req.query).date);
        const available = await services.ledger.available(date);
        res.json({ date, capacityPerSlot: services.ledger.capacity, available });
    }));

    router.get('/:confirmationNumber', asyncHandler(async (req: Request, res: Response) => {
        const { confirmationNumber } = req.params;
        const record = await services.ledger.findByConfirmation(confirmationNumber);
        if (!record) {
            throw new NotFoundError(`Appointment ${confirmationNumber} not found`, { confirmationNumber });
        }
        res.json(record);
    }));

    router.post('/:confirmationNumber/cancel', asyncHandler(async (req: Request, res: Response) => {
        const { reason } = CancelBody.parse(req.body ?? {});
        res.json(await services.ledger.cancel(req.params.confirmationNumber, reason ?? null));
    }));

    return router;
}
