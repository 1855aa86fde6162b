import { OutboxEntry, OutboxRepository } from '../../db/repositories/outbox-repository';
import { WebhookSender } from './webhook-client';
import { SmsSender } from './sms-sender';
import { logger } from '../logging';
import { errorMessage } from '../../utils/errors';

export interface DispatcherOptions {
    maxAttempts: number;
    backoffMs: number;
    maxBackoffMs?: number;
    pollIntervalMs: number;
    batchSize?: number;
    now?: () => Date;
}

export interface DrainSummary {
    delivered: number;
    retried: number;
    failed: number;
}

export interface DispatcherSenders {
    webhook: WebhookSender;
    sms?: SmsSender;
}

export function computeBackoff(attempts: number, base: number, max: number): number {
    return Math.min(max, base * 2 ** Math.max(0, attempts - 1));
}

function readMessage(payload: unknown): string {
    if (typeof payload === 'object' && payload !== null && 'message' in payload && typeof payload.message === 'string') {
        return payload.message;
    }
    throw new Error('SMS payload has no message');
}

export class OutboxDispatcher {
    private timer: NodeJS.Timeout | null = null;
    private inFlight: Promise<DrainSummary> | null = null;
    private rerun = false;
    private stopped = false;

    constructor(
        private readonly repo: OutboxRepository,
        private readonly senders: DispatcherSenders,
        private readonly options: DispatcherOptions
    ) {}

    private now(): Date {
        return this.options.now ? this.options.now() : new Date();
    }

    private async deliver(entry: OutboxEntry): Promise<void> {
        const payload: unknown = JSON.parse(entry.payload);

        if (entry.channel === 'webhook') {
            await this.senders.webhook.postJson(entry.target, payload);
            return;
        }

        if (!this.senders.sms) {
            throw new Error('SMS channel is not configured');
        }
        await this.senders.sms.send(entry.target, readMessage(payload));
    }

    private async runDrain(): Promise<DrainSummary> {
        const summary: DrainSummary = { delivered: 0, retried: 0, failed: 0 };
        const due = this.repo.findDue(this.now().toISOString(), this.options.batchSize ?? 50);

        for (const entry of due) {
            const attempts = entry.attempts + 1;
            try {
                await this.deliver(entry);
                this.repo.markDelivered(entry.id, attempts, this.now().toISOString());
                summary.delivered++;
                logger.info('Notification delivered', { id: entry.id, kind: entry.kind, channel: entry.channel, attempts });
            } catch (error) {
                const reason = errorMessage(error);
                const now = this.now();
                if (attempts >= this.options.maxAttempts) {
                    this.repo.markFailed(entry.id, attempts, reason, now.toISOString());
                    summary.failed++;
                    logger.error('Notification abandoned', { id: entry.id, kind: entry.kind, attempts, error: reason });
                } else {
                    const delay = computeBackoff(attempts, this.options.backoffMs, this.options.maxBackoffMs ?? 5 * 60 * 1000);
                    const next = new Date(now.getTime() + delay).toISOString();
                    this.repo.markRetry(entry.id, attempts, next, reason, now.toISOString());
                    summary.retried++;
                    logger.warn('Notification failed, will retry', { id: entry.id, kind: entry.kind, attempts, nextAttemptAt: next, error: reason });
                }
            }
        }

        return summary;
    }

    /** Delivers every due intent once. Overlapping calls share one pass and schedule a follow-up. */
    drain(): Promise<DrainSummary> {
        if (this.inFlight) {
            this.rerun = true;
            return this.inFlight;
        }

        this.inFlight = this.runDrain().finally(() => {
            this.inFlight = null;
            if (this.rerun) {
                this.rerun = false;
                if (!this.stopped) this.kick();
            }
        });
        return this.inFlight;
    }

    /** Background drain; does nothing once the dispatcher is stopped. */
    kick(): void {
        if (this.stopped) return;
        this.drain().catch((error) => {
            logger.error('Outbox drain failed', { error });
        });
    }

    start(): void {
        if (this.timer) return;
        this.stopped = false;
        this.timer = setInterval(() => this.kick(), this.options.pollIntervalMs);
        this.timer.unref();
        logger.info('Outbox dispatcher started', { pollIntervalMs: this.options.pollIntervalMs });
    }

    async stop(): Promise<void> {
        this.stopped = true;
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
        if (this.inFlight) {
            await this.inFlight;
        }
    }
}
