import { AppointmentStore } from '../../db/repositories/appointment-repository';
import { AppointmentRecord, ConfirmationNumberGenerator } from '../../models/appointment';
import { SalonConfig } from '../../models/salon-config';
import { CapacityError, ConflictError, NotFoundError, ValidationError } from '../../utils/errors';
import { logger } from '../logging';

export type SlotCheck =
    | { status: 'available' }
    | { status: 'full'; alternatives: string[] }
    | { status: 'outside_hours'; slots: string[] };

export interface ReservationDraft {
    customerName: string;
    phoneNumber: string;
    service: string;
    price: number;
    appointmentDate: string;
    appointmentTime: string;
}

export interface SlotLedgerOptions {
    confirmationNumbers?: ConfirmationNumberGenerator;
    now?: () => Date;
}

/**
 * Capacity-bounded view over the appointments collection. Dates are the
 * canonical long form produced by the booking fields ("March 3, 2025").
 */
export class SlotLedger {
    private readonly numbers: ConfirmationNumberGenerator;
    private readonly now: () => Date;

    constructor(
        private readonly store: AppointmentStore,
        private readonly salon: SalonConfig,
        options: SlotLedgerOptions = {}
    ) {
        this.numbers = options.confirmationNumbers ?? new ConfirmationNumberGenerator();
        this.now = options.now ?? (() => new Date());
    }

    get slots(): readonly string[] {
        return this.salon.slots;
    }

    get capacity(): number {
        return this.salon.maxBookingsPerSlot;
    }

    isSlot(time: string): boolean {
        return this.salon.slots.includes(time);
    }

    async count(date: string, slot: string): Promise<number> {
        return this.store.countActive(date, slot);
    }

    /** Slots still under capacity, in the catalog's slot order. */
    async available(date: string): Promise<string[]> {
        const counts = await this.store.countActiveByTime(date);
        return this.salon.slots.filter(slot => (counts.get(slot) ?? 0) < this.capacity);
    }

    async check(date: string, slot: string): Promise<SlotCheck> {
        if (!this.isSlot(slot)) {
            return { status: 'outside_hours', slots: [...this.salon.slots] };
        }

        const taken = await this.count(date, slot);
        if (taken < this.capacity) {
            return { status: 'available' };
        }

        const alternatives = (await this.available(date)).filter(s => s !== slot);
        return { status: 'full', alternatives };
    }

    /** Count and insert happen in one transaction; a full slot raises `CapacityError`. */
    async reserve(draft: ReservationDraft): Promise<AppointmentRecord> {
        if (!this.isSlot(draft.appointmentTime)) {
            throw new ValidationError(`${draft.appointmentTime} is not a bookable slot`, { time: draft.appointmentTime });
        }

        const timestamp = this.now().toISOString();
        const record = await this.store.insertIfBelowCapacity({
            ...draft,
            confirmationNumber: this.numbers.next(),
            createdAt: timestamp,
            updatedAt: timestamp,
        }, this.capacity);

        if (!record) {
            throw new CapacityError(`${draft.appointmentTime} on ${draft.appointmentDate} is fully booked`, {
                date: draft.appointmentDate,
                time: draft.appointmentTime,
            });
        }

        logger.info('Appointment reserved', {
            confirmationNumber: record.confirmationNumber,
            date: record.appointmentDate,
            time: record.appointmentTime,
            service: record.service,
        });
        return record;
    }

    async cancel(confirmationNumber: string, reason: string | null = null): Promise<AppointmentRecord> {
        const cancelled = await this.store.markCancelled(confirmationNumber, reason, this.now().toISOString());
        if (cancelled) {
            logger.info('Appointment cancelled', { confirmationNumber, reason });
            return cancelled;
        }

        const existing = await this.store.findByConfirmation(confirmationNumber);
        if (!existing) {
            throw new NotFoundError(`Appointment ${confirmationNumber} not found`, { confirmationNumber });
        }
        throw new ConflictError(`Appointment ${confirmationNumber} is already cancelled`, { confirmationNumber });
    }

    async findByConfirmation(confirmationNumber: string): Promise<AppointmentRecord | null> {
        return this.store.findByConfirmation(confirmationNumber);
    }

    async listByDate(date: string): Promise<AppointmentRecord[]> {
        return this.store.findByDate(date);
    }
}
