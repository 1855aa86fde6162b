import { z } from 'zod';
import { BookingSession } from '../../models/booking-session';
import { CustomerContext } from '../../models/help-request';
import { SalonConfig } from '../../models/salon-config';
import { ConflictError, NotFoundError } from '../../utils/errors';
import { DateTimeUtils } from '../../utils/date-time';
import { BookingLifecycle } from '../booking/booking-lifecycle';
import { SlotLedger } from '../booking/slot-ledger';
import { copy } from '../conversation/copy';
import { EscalationManager } from '../escalation/escalation-manager';
import { KnowledgeResolver } from '../knowledge/knowledge-resolver';
import { logger } from '../logging';

const NoArgs = z.object({}).passthrough();

const UpdateBookingArgs = z.object({
    customerName: z.string().optional(),
    phoneNumber: z.string().optional(),
    service: z.string().optional(),
    appointmentDate: z.string().optional(),
    appointmentTime: z.string().optional(),
});

const CheckAvailabilityArgs = z.object({
    date: z.string().min(1),
    time: z.string().optional(),
});

const CancelArgs = z.object({
    confirmationNumber: z.string().trim().min(1),
    reason: z.string().optional(),
});

const RequestHelpArgs = z.object({
    question: z.string(),
});

export interface ToolExecutorDeps {
    lifecycle: BookingLifecycle;
    ledger: SlotLedger;
    resolver: KnowledgeResolver;
    escalation: EscalationManager;
    salon: SalonConfig;
    now?: () => Date;
}

/** Snapshot attached to a help request so the supervisor sees where the caller was. */
export function buildCustomerContext(session: BookingSession, now: Date): CustomerContext {
    const booking = session.booking;
    return {
        timestamp: now.toISOString(),
        roomName: session.roomName,
        bookingProgress: {
            customerName: booking.customerName ?? null,
            service: booking.service ?? null,
            appointmentDate: booking.appointmentDate ?? null,
            appointmentTime: booking.appointmentTime ?? null,
            isComplete: session.isComplete(),
        },
        conversationState: session.conversationState,
        previousQueries: session.previousQueries.slice(-3).map(q => ({ ...q })),
    };
}

/**
 * Entry point for the conversational runtime. Every outcome, including
 * failures, comes back as a sentence the runtime can speak.
 */
export class ToolExecutor {
    private readonly now: () => Date;

    constructor(private readonly deps: ToolExecutorDeps) {
        this.now = deps.now ?? (() => new Date());
    }

    async execute(name: string, args: unknown, session: BookingSession): Promise<string> {
        logger.info('Executing tool', { tool: name, sessionId: session.sessionId });
        session.lastToolCalled = name;

        try {
            switch (name) {
                case 'get_current_date_and_time': {
                    NoArgs.parse(args ?? {});
                    const current = DateTimeUtils.describeCurrent(this.now(), this.deps.salon.timezone);
                    return copy.currentDateTime(current.humanReadable);
                }

                case 'update_booking_context': {
                    const fields = UpdateBookingArgs.parse(args ?? {});
                    const result = this.deps.lifecycle.updateFields(session, fields);
                    session.lastToolResult = result.ok ? 'updated' : `rejected:${result.field}`;
                    return result.message;
                }

                case 'get_booking_summary': {
                    NoArgs.parse(args ?? {});
                    return this.deps.lifecycle.summarize(session).message;
                }

                case 'book_appointment': {
                    NoArgs.parse(args ?? {});
                    const result = await this.deps.lifecycle.confirm(session);
                    if (!result.ok) {
                        session.lastToolResult = result.reason;
                    }
                    return result.message;
                }

                case 'check_availability': {
                    const { date, time } = CheckAvailabilityArgs.parse(args);
                    const result = await this.deps.lifecycle.checkAvailability(session, date, time);
                    return result.message;
                }

                case 'cancel_appointment': {
                    const { confirmationNumber, reason } = CancelArgs.parse(args);
                    return await this.cancel(confirmationNumber, reason ?? null);
                }

                case 'request_help': {
                    const { question } = RequestHelpArgs.parse(args);
                    return await this.requestHelp(session, question);
                }

                default:
                    logger.warn('Unknown tool requested', { tool: name });
                    return copy.unknownTool(name);
            }
        } catch (error) {
            if (error instanceof z.ZodError) {
                logger.warn('Tool arguments rejected', {
                    tool: name,
                    issues: error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
                });
                return copy.invalidArguments(name);
            }
            logger.error('Tool execution error', { tool: name, sessionId: session.sessionId, error });
            return copy.technicalIssue;
        }
    }

    private async cancel(confirmationNumber: string, reason: string | null): Promise<string> {
        try {
            const record = await this.deps.ledger.cancel(confirmationNumber, reason);
            return copy.cancelled(record.confirmationNumber, record.appointmentDate, record.appointmentTime);
        } catch (error) {
            if (error instanceof NotFoundError) return copy.cancelNotFound(confirmationNumber);
            if (error instanceof ConflictError) return copy.alreadyCancelled(confirmationNumber);
            logger.error('Cancellation failed', { confirmationNumber, error });
            return copy.cancelFailed;
        }
    }

    /** Curated FAQ, then learned knowledge; a human only when both miss. */
    private async requestHelp(session: BookingSession, rawQuestion: string): Promise<string> {
        const question = rawQuestion.trim();
        if (!question) return copy.emptyQuestion;

        session.addQuery(question, this.now());
        if (session.conversationState === 'greeting') {
            session.transitionTo('inquiry');
        }

        const resolution = await this.deps.resolver.resolve(question);
        if (resolution.tier !== 'unresolved') {
            session.lastToolResult = resolution.tier === 'faq' ? 'faq_found' : 'kb_found';
            return resolution.answer;
        }

        try {
            const requestId = await this.deps.escalation.create(
                question,
                session.roomName,
                buildCustomerContext(session, this.now())
            );
            session.lastToolResult = `help_requested:${requestId}`;
            return copy.escalated;
        } catch (error) {
            logger.error('Failed to create help request', { sessionId: session.sessionId, error });
            return copy.technicalIssue;
        }
    }
}
