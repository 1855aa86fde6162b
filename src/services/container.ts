import type { Config } from '../config';
import type { SqliteDatabase } from '../db/client';
import { AppointmentRepository } from '../db/repositories/appointment-repository';
import { HelpRequestRepository } from '../db/repositories/help-request-repository';
import { SqliteVectorIndex } from '../db/repositories/knowledge-item-repository';
import { OutboxRepository } from '../db/repositories/outbox-repository';
import { SalonConfig } from '../models/salon-config';
import { ToolExecutor } from './ai/tool-executor';
import { BookingLifecycle } from './booking/booking-lifecycle';
import { SlotLedger } from './booking/slot-ledger';
import { SessionStore } from './conversation/session-store';
import { IdempotencyGuard, RedisCoordinator } from './coordination/redis-coordinator';
import { EscalationManager } from './escalation/escalation-manager';
import { Embedder, OpenAIEmbedder } from './knowledge/embedder';
import { KnowledgeBase } from './knowledge/knowledge-base';
import { KnowledgeResolver } from './knowledge/knowledge-resolver';
import { OutboxDispatcher } from './notifications/dispatcher';
import { NotificationOutbox } from './notifications/outbox';
import { SmsSender, TwilioSmsSender } from './notifications/sms-sender';
import { WebhookClient, WebhookSender } from './notifications/webhook-client';

export interface Services {
    db: SqliteDatabase;
    salon: SalonConfig;
    sessions: SessionStore;
    ledger: SlotLedger;
    lifecycle: BookingLifecycle;
    knowledgeBase: KnowledgeBase;
    resolver: KnowledgeResolver;
    escalation: EscalationManager;
    outbox: NotificationOutbox;
    dispatcher: OutboxDispatcher;
    tools: ToolExecutor;
    idempotency: IdempotencyGuard;
    redis: RedisCoordinator | null;
}

/** Replacements for the outward-facing collaborators, used by tests and tooling. */
export interface ServiceOverrides {
    embedder?: Embedder;
    webhook?: WebhookSender;
    sms?: SmsSender;
    idempotency?: IdempotencyGuard;
    now?: () => Date;
}

function buildSmsSender(cfg: Readonly<Config>): SmsSender | undefined {
    const { accountSid, authToken, phoneNumber } = cfg.twilio;
    if (!cfg.features.smsNotifications || !accountSid || !authToken || !phoneNumber) {
        return undefined;
    }
    return new TwilioSmsSender(accountSid, authToken, phoneNumber);
}

/**
 * The composition root: the only place that decides which implementation
 * backs each seam. Nothing here connects to anything; `server.ts` does that.
 */
export function createServices(
    cfg: Readonly<Config>,
    db: SqliteDatabase,
    salon: SalonConfig,
    overrides: ServiceOverrides = {}
): Services {
    const now = overrides.now ?? (() => new Date());

    const ledger = new SlotLedger(new AppointmentRepository(db), salon, { now });
    const lifecycle = new BookingLifecycle(ledger, salon);

    const knowledgeBase = new KnowledgeBase({
        index: new SqliteVectorIndex(db, cfg.knowledge.collection),
        embedder: overrides.embedder ?? new OpenAIEmbedder({
            apiKey: cfg.openai.apiKey,
            model: cfg.openai.embeddingModel,
            dimensions: cfg.openai.embeddingDimensions,
        }),
        faqFilePath: cfg.paths.faqFile,
        similarityThreshold: cfg.knowledge.similarityThreshold,
        topK: cfg.knowledge.topK,
    });
    const resolver = new KnowledgeResolver(knowledgeBase, knowledgeBase);

    const outboxRepo = new OutboxRepository(db);
    const outbox = new NotificationOutbox(outboxRepo);
    const sms = overrides.sms ?? buildSmsSender(cfg);
    const dispatcher = new OutboxDispatcher(
        outboxRepo,
        { webhook: overrides.webhook ?? new WebhookClient(cfg.notifications.timeoutMs), sms },
        {
            maxAttempts: cfg.notifications.maxAttempts,
            backoffMs: cfg.notifications.backoffMs,
            pollIntervalMs: cfg.notifications.pollIntervalMs,
            now,
        }
    );
    outbox.onEnqueued(() => dispatcher.kick());

    const escalation = new EscalationManager({
        store: new HelpRequestRepository(db),
        knowledge: knowledgeBase,
        outbox,
        targets: {
            supervisorWebhookUrl: cfg.notifications.supervisorWebhookUrl,
            aiCallbackUrl: cfg.notifications.aiCallbackUrl,
            supervisorPhone: sms ? cfg.twilio.supervisorPhone : undefined,
        },
        now,
    });

    const tools = new ToolExecutor({ lifecycle, ledger, resolver, escalation, salon, now });

    const redis = overrides.idempotency ? null : new RedisCoordinator(cfg.redis.url, cfg.redis.idempotencyTtlSeconds);
    const idempotency: IdempotencyGuard = overrides.idempotency
        ?? redis
        ?? { markResolutionProcessed: async () => true, releaseResolution: async () => undefined };

    return {
        db,
        salon,
        sessions: new SessionStore(),
        ledger,
        lifecycle,
        knowledgeBase,
        resolver,
        escalation,
        outbox,
        dispatcher,
        tools,
        idempotency,
        redis,
    };
}
