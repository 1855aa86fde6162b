import { BookingSession } from '../../models/booking-session';
import { logger } from '../logging';

/**
 * In-process registry of booking sessions keyed by the runtime's opaque
 * session handle. Idle sessions are dropped by `sweep`.
 */
export class SessionStore {
    private sessions = new Map<string, { session: BookingSession; lastSeen: number }>();

    constructor(
        private readonly idleTtlMs = 60 * 60 * 1000,
        private readonly clock: () => number = () => Date.now()
    ) {}

    get(sessionId: string, roomName: string | null = null): BookingSession {
        const existing = this.sessions.get(sessionId);
        if (existing) {
            existing.lastSeen = this.clock();
            if (roomName && existing.session.roomName !== roomName) {
                existing.session.roomName = roomName;
            }
            return existing.session;
        }

        const session = new BookingSession(sessionId, roomName);
        this.sessions.set(sessionId, { session, lastSeen: this.clock() });
        logger.debug('Session started', { sessionId, roomName });
        return session;
    }

    has(sessionId: string): boolean {
        return this.sessions.has(sessionId);
    }

    end(sessionId: string): boolean {
        const removed = this.sessions.delete(sessionId);
        if (removed) {
            logger.debug('Session ended', { sessionId });
        }
        return removed;
    }

    sweep(): number {
        const cutoff = this.clock() - this.idleTtlMs;
        let removed = 0;
        for (const [id, entry] of this.sessions) {
            if (entry.lastSeen < cutoff) {
                this.sessions.delete(id);
                removed++;
            }
        }
        if (removed > 0) {
            logger.info('Idle sessions removed', { removed });
        }
        return removed;
    }

    get size(): number {
        return this.sessions.size;
    }
}
