import crypto from 'crypto';
import { z } from 'zod';
import { HelpRequestRow, HelpRequestStore } from '../../db/repositories/help-request-repository';
import {
    CustomerContext,
    HelpRequest,
    HelpRequestCreatedEvent,
    HelpRequestResolvedEvent,
    HelpRequestStatus,
    ResolutionResult,
    SupervisorResponse,
} from '../../models/help-request';
import { ConflictError, CorruptRecordError, NotFoundError, ValidationError } from '../../utils/errors';
import { logger } from '../logging';
import { NotificationIntent, NotificationOutbox } from '../notifications/outbox';

export interface KnowledgeSink {
    addLearnedItem(question: string, answer: string, category?: string): Promise<string>;
}

export interface NotificationTargets {
    supervisorWebhookUrl?: string;
    aiCallbackUrl?: string;
    supervisorPhone?: string;
}

export interface EscalationManagerOptions {
    store: HelpRequestStore;
    knowledge: KnowledgeSink;
    outbox: NotificationOutbox;
    targets: NotificationTargets;
    now?: () => Date;
}

const STATUSES = Object.values(HelpRequestStatus);

const StoredContextSchema = z.object({
    timestamp: z.string(),
    roomName: z.string().nullable(),
    bookingProgress: z.object({
        customerName: z.string().nullable(),
        service: z.string().nullable(),
        appointmentDate: z.string().nullable(),
        appointmentTime: z.string().nullable(),
        isComplete: z.boolean(),
    }),
    conversationState: z.string(),
    previousQueries: z.array(z.object({ query: z.string(), timestamp: z.string() })),
});

function parseStatus(raw: string | null): HelpRequestStatus | undefined {
    return STATUSES.find(status => status === raw);
}

function parseContext(raw: string | null, id: string): CustomerContext | null {
    if (raw === null) return null;
    let data: unknown;
    try {
        data = JSON.parse(raw);
    } catch (error) {
        throw new CorruptRecordError(`Help request ${id} has unreadable customer context`, { id });
    }
    const parsed = StoredContextSchema.safeParse(data);
    if (!parsed.success) {
        throw new CorruptRecordError(`Help request ${id} has malformed customer context`, { id });
    }
    return parsed.data;
}

/** Turns a stored row into a `HelpRequest`, rejecting rows that break the record's invariants. */
export function parseHelpRequest(row: HelpRequestRow): HelpRequest {
    const status = parseStatus(row.status);
    if (!row.question || !row.created_at || !status || Number.isNaN(Date.parse(row.created_at))) {
        throw new CorruptRecordError(`Help request ${row.id} is unreadable`, { id: row.id });
    }

    const resolved = status === HelpRequestStatus.RESOLVED;
    const hasAnswer = row.answer !== null && row.response_time_seconds !== null;
    if (resolved !== hasAnswer) {
        throw new CorruptRecordError(`Help request ${row.id} has inconsistent resolution fields`, { id: row.id, status });
    }

    return {
        id: row.id,
        question: row.question,
        answer: row.answer,
        status,
        roomName: row.room_name,
        customerContext: parseContext(row.customer_context, row.id),
        createdAt: row.created_at,
        updatedAt: row.updated_at ?? row.created_at,
        resolutionNotes: row.resolution_notes,
        responseTimeSeconds: row.response_time_seconds,
        resolvedBy: row.resolved_by,
        resolvedAt: row.resolved_at,
    };
}

/**
 * Help-request state machine: pending → resolved. Callers run the knowledge
 * resolver first; this class never does. State changes commit before any
 * notification is queued, and a queueing failure never undoes them.
 */
export class EscalationManager {
    private readonly now: () => Date;

    constructor(private readonly options: EscalationManagerOptions) {
        this.now = options.now ?? (() => new Date());
    }

    private queue(intents: NotificationIntent[], requestId: string): void {
        for (const intent of intents) {
            try {
                this.options.outbox.enqueue(intent, this.now());
            } catch (error) {
                logger.error('Failed to queue notification', { requestId, kind: intent.kind, channel: intent.channel, error });
            }
        }
    }

    async create(question: string, roomName: string | null, context: CustomerContext | null = null): Promise<string> {
        const text = question.trim();
        if (!text) {
            throw new ValidationError('Question is required');
        }

        const id = crypto.randomUUID();
        const createdAt = this.now().toISOString();

        await this.options.store.insert({
            id,
            question: text,
            roomName,
            customerContext: context ? JSON.stringify(context) : null,
            createdAt,
        });
        logger.info('Help request created', { requestId: id, roomName });

        const event: HelpRequestCreatedEvent = {
            event: 'help_request_created',
            request_id: id,
            question: text,
            room_name: roomName,
            created_at: createdAt,
        };

        const intents: NotificationIntent[] = [];
        const { supervisorWebhookUrl, supervisorPhone } = this.options.targets;
        if (supervisorWebhookUrl) {
            intents.push({ kind: 'help_request_created', channel: 'webhook', target: supervisorWebhookUrl, payload: { ...event } });
        }
        if (supervisorPhone) {
            intents.push({
                kind: 'help_request_created',
                channel: 'sms',
                target: supervisorPhone,
                payload: { message: `New help request ${id}: ${text.slice(0, 120)}` },
            });
        }
        this.queue(intents, id);

        return id;
    }

    async getById(id: string): Promise<HelpRequest> {
        const row = await this.options.store.findById(id);
        if (!row) {
            throw new NotFoundError(`Help request ${id} not found`, { id });
        }
        return parseHelpRequest(row);
    }

    async resolve(id: string, response: SupervisorResponse, resolvedBy = 'supervisor'): Promise<ResolutionResult> {
        const answer = response.answer.trim();
        if (!answer) {
            throw new ValidationError('Answer is required');
        }

        const request = await this.getById(id);
        if (request.status !== HelpRequestStatus.PENDING) {
            throw new ConflictError(`Help request ${id} is already ${request.status}`, { id, status: request.status });
        }

        const resolvedAt = this.now();
        const responseTimeSeconds = Math.max(0, (resolvedAt.getTime() - Date.parse(request.createdAt)) / 1000);

        const applied = await this.options.store.markResolved(id, {
            answer,
            resolutionNotes: response.resolutionNotes ?? null,
            responseTimeSeconds,
            resolvedBy,
            resolvedAt: resolvedAt.toISOString(),
        });
        if (!applied) {
            throw new ConflictError(`Help request ${id} was resolved concurrently`, { id });
        }
        logger.info('Help request resolved', { requestId: id, resolvedBy, responseTimeSeconds });

        let addedToKnowledgeBase = false;
        if (response.addToKnowledgeBase) {
            try {
                await this.options.knowledge.addLearnedItem(request.question, answer, response.kbCategory);
                addedToKnowledgeBase = true;
            } catch (error) {
                logger.error('Failed to add resolution to knowledge base', { requestId: id, error });
            }
        }

        const event: HelpRequestResolvedEvent = {
            event: 'help_request_resolved',
            request_id: id,
            room_name: request.roomName,
            original_question: request.question,
            answer,
        };

        const { aiCallbackUrl } = this.options.targets;
        if (aiCallbackUrl) {
            this.queue([{ kind: 'help_request_resolved', channel: 'webhook', target: aiCallbackUrl, payload: { ...event } }], id);
        }

        return {
            ...event,
            response_time_seconds: responseTimeSeconds,
            added_to_knowledge_base: addedToKnowledgeBase,
        };
    }

    async listPending(limit = 100): Promise<HelpRequest[]> {
        return this.parseRows(await this.options.store.listByStatus(HelpRequestStatus.PENDING, limit));
    }

    async listRecent(limit = 100): Promise<HelpRequest[]> {
        return this.parseRows(await this.options.store.listRecent(limit));
    }

    /** Queue views skip unreadable rows instead of failing the whole list. */
    private parseRows(rows: HelpRequestRow[]): HelpRequest[] {
        const requests: HelpRequest[] = [];
        for (const row of rows) {
            try {
                requests.push(parseHelpRequest(row));
            } catch (error) {
                logger.warn('Skipping unreadable help request', { id: row.id, error });
            }
        }
        return requests;
    }
}
