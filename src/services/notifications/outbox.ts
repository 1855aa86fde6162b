import {
    NotificationChannel,
    NotificationKind,
    OutboxRepository,
} from '../../db/repositories/outbox-repository';
import { logger } from '../logging';

export interface NotificationIntent {
    kind: NotificationKind;
    channel: NotificationChannel;
    target: string;
    payload: Record<string, unknown>;
}

/**
 * Notification intents are written only after the state change they describe
 * has committed. Delivery is the dispatcher's job.
 */
export class NotificationOutbox {
    private listener: (() => void) | null = null;

    constructor(private readonly repo: OutboxRepository) {}

    onEnqueued(listener: () => void): void {
        this.listener = listener;
    }

    enqueue(intent: NotificationIntent, now: Date = new Date()): number {
        const id = this.repo.insert({
            kind: intent.kind,
            channel: intent.channel,
            target: intent.target,
            payload: JSON.stringify(intent.payload),
            createdAt: now.toISOString(),
        });
        logger.debug('Notification queued', { id, kind: intent.kind, channel: intent.channel });
        this.listener?.();
        return id;
    }

    stats() {
        return this.repo.countByStatus();
    }
}
