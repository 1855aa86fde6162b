import type { SqliteDatabase } from '../client';

export type NotificationKind = 'help_request_created' | 'help_request_resolved';
export type NotificationChannel = 'webhook' | 'sms';
export type OutboxStatus = 'pending' | 'delivered' | 'failed';

export interface OutboxEntry {
    id: number;
    kind: NotificationKind;
    channel: NotificationChannel;
    target: string;
    payload: string;
    status: OutboxStatus;
    attempts: number;
    nextAttemptAt: string;
    lastError: string | null;
    createdAt: string;
    updatedAt: string;
}

export interface NewOutboxEntry {
    kind: NotificationKind;
    channel: NotificationChannel;
    target: string;
    payload: string;
    createdAt: string;
}

interface OutboxRow {
    id: number;
    kind: NotificationKind;
    channel: NotificationChannel;
    target: string;
    payload: string;
    status: OutboxStatus;
    attempts: number;
    next_attempt_at: string;
    last_error: string | null;
    created_at: string;
    updated_at: string;
}

function toEntry(row: OutboxRow): OutboxEntry {
    return {
        id: row.id,
        kind: row.kind,
        channel: row.channel,
        target: row.target,
        payload: row.payload,
        status: row.status,
        attempts: row.attempts,
        nextAttemptAt: row.next_attempt_at,
        lastError: row.last_error,
        createdAt: row.created_at,
        updatedAt: row.updated_at,
    };
}

export class OutboxRepository {
    constructor(private readonly db: SqliteDatabase) {}

    insert(entry: NewOutboxEntry): number {
        const result = this.db.prepare(`
            INSERT INTO notification_outbox (
                kind, channel, target, payload, status, attempts, next_attempt_at, created_at, updated_at
            ) VALUES (?, ?, ?, ?, 'pending', 0, ?, ?, ?)
        `).run(entry.kind, entry.channel, entry.target, entry.payload, entry.createdAt, entry.createdAt, entry.createdAt);
        return Number(result.lastInsertRowid);
    }

    findDue(now: string, limit: number): OutboxEntry[] {
        const rows = this.db.prepare(`
            SELECT * FROM notification_outbox
            WHERE status = 'pending' AND next_attempt_at <= ?
            ORDER BY next_attempt_at ASC, id ASC
            LIMIT ?
        `).all(now, limit) as OutboxRow[];
        return rows.map(toEntry);
    }

    findById(id: number): OutboxEntry | null {
        const row = this.db.prepare('SELECT * FROM notification_outbox WHERE id = ?').get(id) as OutboxRow | undefined;
        return row ? toEntry(row) : null;
    }

    markDelivered(id: number, attempts: number, now: string): void {
        this.db.prepare(`
            UPDATE notification_outbox
            SET status = 'delivered', attempts = ?, last_error = NULL, updated_at = ?
            WHERE id = ?
        `).run(attempts, now, id);
    }

    markRetry(id: number, attempts: number, nextAttemptAt: string, error: string, now: string): void {
        this.db.prepare(`
            UPDATE notification_outbox
            SET attempts = ?, next_attempt_at = ?, last_error = ?, updated_at = ?
            WHERE id = ?
        `).run(attempts, nextAttemptAt, error, now, id);
    }

    markFailed(id: number, attempts: number, error: string, now: string): void {
        this.db.prepare(`
            UPDATE notification_outbox
            SET status = 'failed', attempts = ?, last_error = ?, updated_at = ?
            WHERE id = ?
        `).run(attempts, error, now, id);
    }

    countByStatus(): Record<OutboxStatus, number> {
        const rows = this.db.prepare(`
            SELECT status, COUNT(*) AS total FROM notification_outbox GROUP BY status
        `).all() as { status: OutboxStatus; total: number }[];
        const counts: Record<OutboxStatus, number> = { pending: 0, delivered: 0, failed: 0 };
        for (const row of rows) {
            counts[row.status] = row.total;
        }
        return counts;
    }
}
