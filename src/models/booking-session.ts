import { logger } from '../services/logging';

export type ConversationState = 'greeting' | 'inquiry' | 'booking' | 'ready_for_confirmation' | 'completed';

export type BookingFieldKey = 'customerName' | 'phoneNumber' | 'service' | 'appointmentDate' | 'appointmentTime';

export interface RequiredField {
    key: BookingFieldKey;
    label: string;
}

/** Order matters: it drives update order and the "still need" list. */
export const REQUIRED_FIELDS: readonly RequiredField[] = [
    { key: 'customerName', label: 'name' },
    { key: 'phoneNumber', label: 'phone number' },
    { key: 'service', label: 'service' },
    { key: 'appointmentDate', label: 'date' },
    { key: 'appointmentTime', label: 'time' },
];

export interface BookingDraft {
    customerName?: string;
    phoneNumber?: string;
    service?: string;
    appointmentDate?: string;
    appointmentTime?: string;
    price?: number;
    confirmed: boolean;
}

export interface QueryLogEntry {
    query: string;
    timestamp: string;
}

export interface AvailabilityCheckEntry {
    date: string;
    time: string;
    timestamp: string;
}

export const MAX_PREVIOUS_QUERIES = 10;
export const MAX_VALIDATION_ERRORS = 10;

/**
 * Per-conversation booking state. Only the owning conversation's turn
 * processing touches an instance, so nothing here is synchronized.
 */
export class BookingSession {
    private draft: BookingDraft = { confirmed: false };
    private state: ConversationState = 'greeting';
    private awaitingConfirmation = false;
    private queries: QueryLogEntry[] = [];
    private checks: AvailabilityCheckEntry[] = [];
    private errors: string[] = [];

    public retryCount = 0;
    public lastToolCalled: string | null = null;
    public lastToolResult: unknown = null;

    constructor(
        public readonly sessionId: string,
        public roomName: string | null = null
    ) {}

    get booking(): Readonly<BookingDraft> {
        return this.draft;
    }

    get conversationState(): ConversationState {
        return this.state;
    }

    get waitingForConfirmation(): boolean {
        return this.awaitingConfirmation;
    }

    get previousQueries(): readonly QueryLogEntry[] {
        return this.queries;
    }

    get availabilityChecks(): readonly AvailabilityCheckEntry[] {
        return this.checks;
    }

    get validationErrors(): readonly string[] {
        return this.errors;
    }

    /** Any change after a summary invalidates it: the caller must summarize again. */
    setField(key: BookingFieldKey, value: string): void {
        if (this.draft[key] !== value) {
            this.awaitingConfirmation = false;
        }
        this.draft[key] = value;
    }

    setPrice(price: number): void {
        this.draft.price = price;
    }

    isComplete(): boolean {
        return REQUIRED_FIELDS.every(field => Boolean(this.draft[field.key]));
    }

    missingFields(): string[] {
        return REQUIRED_FIELDS.filter(field => !this.draft[field.key]).map(field => field.label);
    }

    /** Returns false, and leaves the flag alone, while fields are still missing. */
    markAwaitingConfirmation(): boolean {
        if (!this.isComplete()) return false;
        this.awaitingConfirmation = true;
        return true;
    }

    markConfirmed(): boolean {
        if (!this.isComplete() || !this.awaitingConfirmation) return false;
        this.draft.confirmed = true;
        return true;
    }

    transitionTo(newState: ConversationState): void {
        if (this.state === newState) return;

        logger.debug(`Conversation state: ${this.state} -> ${newState}`, {
            sessionId: this.sessionId,
            from: this.state,
            to: newState,
        });

        this.state = newState;
    }

    addQuery(query: string, now: Date = new Date()): void {
        this.queries.push({ query, timestamp: now.toISOString() });
        if (this.queries.length > MAX_PREVIOUS_QUERIES) {
            this.queries.shift();
        }
    }

    recordValidationError(message: string): void {
        this.errors.push(message);
        if (this.errors.length > MAX_VALIDATION_ERRORS) {
            this.errors.shift();
        }
    }

    recordAvailabilityCheck(date: string, time: string, now: Date = new Date()): void {
        this.checks.push({ date, time, timestamp: now.toISOString() });
    }

    resetBooking(): void {
        this.draft = { confirmed: false };
        this.awaitingConfirmation = false;
        this.errors = [];
        this.retryCount = 0;
    }
}
