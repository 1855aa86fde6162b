import type { SqliteDatabase } from '../client';
import { HelpRequestStatus } from '../../models/help-request';

/** Raw stored shape. Parsing into a `HelpRequest` happens in the escalation layer. */
export interface HelpRequestRow {
    id: string;
    question: string | null;
    answer: string | null;
    status: string | null;
    room_name: string | null;
    customer_context: string | null;
    created_at: string | null;
    updated_at: string | null;
    resolution_notes: string | null;
    response_time_seconds: number | null;
    resolved_by: string | null;
    resolved_at: string | null;
}

export interface NewHelpRequestRow {
    id: string;
    question: string;
    roomName: string | null;
    customerContext: string | null;
    createdAt: string;
}

export interface ResolutionUpdate {
    answer: string;
    resolutionNotes: string | null;
    responseTimeSeconds: number;
    resolvedBy: string;
    resolvedAt: string;
}

export interface HelpRequestStore {
    insert(row: NewHelpRequestRow): Promise<void>;
    findById(id: string): Promise<HelpRequestRow | null>;
    /** Returns false when the request was no longer pending. */
    markResolved(id: string, update: ResolutionUpdate): Promise<boolean>;
    listByStatus(status: HelpRequestStatus, limit: number): Promise<HelpRequestRow[]>;
    listRecent(limit: number): Promise<HelpRequestRow[]>;
}

export class HelpRequestRepository implements HelpRequestStore {
    constructor(private readonly db: SqliteDatabase) {}

    async insert(row: NewHelpRequestRow): Promise<void> {
        this.db.prepare(`
            INSERT INTO help_requests (
                id, question, answer, status, room_name, customer_context,
                created_at, updated_at, resolution_notes, response_time_seconds,
                resolved_by, resolved_at
            ) VALUES (?, ?, NULL, ?, ?, ?, ?, ?, NULL, NULL, NULL, NULL)
        `).run(
            row.id,
            row.question,
            HelpRequestStatus.PENDING,
            row.roomName,
            row.customerContext,
            row.createdAt,
            row.createdAt
        );
    }

    async findById(id: string): Promise<HelpRequestRow | null> {
        const row = this.db.prepare('SELECT * FROM help_requests WHERE id = ?').get(id) as HelpRequestRow | undefined;
        return row ?? null;
    }

    async markResolved(id: string, update: ResolutionUpdate): Promise<boolean> {
        const result = this.db.prepare(`
            UPDATE help_requests
            SET status = ?, answer = ?, resolution_notes = ?, response_time_seconds = ?,
                resolved_by = ?, resolved_at = ?, updated_at = ?
            WHERE id = ? AND status = ?
        `).run(
            HelpRequestStatus.RESOLVED,
            update.answer,
            update.resolutionNotes,
            update.responseTimeSeconds,
            update.resolvedBy,
            update.resolvedAt,
            update.resolvedAt,
            id,
            HelpRequestStatus.PENDING
        );
        return result.changes > 0;
    }

    async listByStatus(status: HelpRequestStatus, limit: number): Promise<HelpRequestRow[]> {
        return this.db.prepare(`
            SELECT * FROM help_requests WHERE status = ? ORDER BY created_at DESC LIMIT ?
        `).all(status, limit) as HelpRequestRow[];
    }

    async listRecent(limit: number): Promise<HelpRequestRow[]> {
        return this.db.prepare(`
            SELECT * FROM help_requests ORDER BY created_at DESC LIMIT ?
        `).all(limit) as HelpRequestRow[];
    }
}
