import { BookingFieldKey, BookingSession } from '../../models/booking-session';
import { AppointmentRecord } from '../../models/appointment';
import { SalonConfig } from '../../models/salon-config';
import { CapacityError } from '../../utils/errors';
import { DateTimeUtils } from '../../utils/date-time';
import { PhoneFormatter } from '../../utils/phone-formatter';
import { copy } from '../conversation/copy';
import { logger } from '../logging';
import { buildFieldDescriptors, closedDayMessage, FieldDescriptor } from './booking-fields';
import { SlotLedger } from './slot-ledger';

export type BookingFieldInput = Partial<Record<BookingFieldKey, string>>;

export type UpdateResult =
    | { ok: true; updated: string[]; missing: string[]; message: string }
    | { ok: false; updated: string[]; field: BookingFieldKey; message: string };

export type SummaryResult =
    | { ok: true; message: string }
    | { ok: false; missing: string[]; message: string };

export type ConfirmFailure = 'incomplete' | 'not_summarized' | 'outside_hours' | 'fully_booked' | 'persistence_failed';

export type ConfirmResult =
    | { ok: true; record: AppointmentRecord; message: string }
    | { ok: false; reason: ConfirmFailure; alternatives: string[]; message: string };

export type AvailabilityResult =
    | { status: 'available' | 'full' | 'outside_hours' | 'open_slots'; slots: string[]; message: string }
    | { status: 'invalid' | 'closed' | 'failed'; slots: []; message: string };

/**
 * Drives a booking from field collection to a persisted appointment. One
 * instance serves every conversation; per-conversation state lives on the
 * `BookingSession` passed in.
 */
export class BookingLifecycle {
    private readonly fields: FieldDescriptor[];

    constructor(
        private readonly ledger: SlotLedger,
        private readonly salon: SalonConfig
    ) {
        this.fields = buildFieldDescriptors(salon);
    }

    /**
     * Applies fields in collection order. The first rejection stops the update;
     * fields applied before it stay applied.
     */
    updateFields(session: BookingSession, input: BookingFieldInput): UpdateResult {
        const updated: string[] = [];

        for (const field of this.fields) {
            const raw = input[field.key];
            if (raw === undefined || !raw.trim()) continue;

            const outcome = field.validate(raw);
            if (!outcome.ok) {
                session.recordValidationError(outcome.message);
                this.settleState(session);
                logger.debug('Booking field rejected', { sessionId: session.sessionId, field: field.key });
                return { ok: false, updated, field: field.key, message: outcome.message };
            }

            session.setField(field.key, outcome.value);
            if (outcome.price !== undefined) {
                session.setPrice(outcome.price);
            }
            updated.push(field.label);
        }

        this.settleState(session);
        const missing = session.missingFields();
        const message = updated.length > 0 ? copy.fieldsUpdated(updated, missing) : copy.nothingToUpdate(missing);
        return { ok: true, updated, missing, message };
    }

    private settleState(session: BookingSession): void {
        session.transitionTo(session.isComplete() ? 'ready_for_confirmation' : 'booking');
    }

    summarize(session: BookingSession): SummaryResult {
        const booking = session.booking;
        if (!session.markAwaitingConfirmation()) {
            const missing = session.missingFields();
            return { ok: false, missing, message: copy.incomplete(missing) };
        }

        session.transitionTo('ready_for_confirmation');
        return {
            ok: true,
            message: copy.summary({
                name: booking.customerName ?? '',
                phone: PhoneFormatter.format(booking.phoneNumber ?? ''),
                service: booking.service ?? '',
                price: `${this.salon.currency}${booking.price ?? 0}`,
                date: booking.appointmentDate ?? '',
                time: booking.appointmentTime ?? '',
            }),
        };
    }

    async confirm(session: BookingSession): Promise<ConfirmResult> {
        const {
            customerName,
            phoneNumber,
            service,
            price,
            appointmentDate,
            appointmentTime,
        } = session.booking;

        if (!customerName || !phoneNumber || !service || !appointmentDate || !appointmentTime || price === undefined) {
            return { ok: false, reason: 'incomplete', alternatives: [], message: copy.cannotBookIncomplete };
        }
        if (!session.waitingForConfirmation) {
            return { ok: false, reason: 'not_summarized', alternatives: [], message: copy.summarizeFirst };
        }

        let record: AppointmentRecord;
        try {
            const check = await this.ledger.check(appointmentDate, appointmentTime);
            if (check.status === 'outside_hours') {
                return {
                    ok: false,
                    reason: 'outside_hours',
                    alternatives: check.slots,
                    message: copy.outsideHours(appointmentTime, check.slots),
                };
            }
            if (check.status === 'full') {
                return {
                    ok: false,
                    reason: 'fully_booked',
                    alternatives: check.alternatives,
                    message: copy.slotTaken(appointmentTime, appointmentDate, check.alternatives),
                };
            }

            record = await this.ledger.reserve({
                customerName,
                phoneNumber,
                service,
                price,
                appointmentDate,
                appointmentTime,
            });
        } catch (error) {
            if (error instanceof CapacityError) {
                const alternatives = await this.alternativesAfterRace(appointmentDate, appointmentTime);
                return {
                    ok: false,
                    reason: 'fully_booked',
                    alternatives,
                    message: copy.slotTaken(appointmentTime, appointmentDate, alternatives),
                };
            }

            session.retryCount++;
            logger.error('Booking failed', { sessionId: session.sessionId, retryCount: session.retryCount, error });
            return { ok: false, reason: 'persistence_failed', alternatives: [], message: copy.bookingFailed };
        }

        session.markConfirmed();
        session.transitionTo('completed');
        session.lastToolResult = record.confirmationNumber;
        session.resetBooking();

        return {
            ok: true,
            record,
            message: copy.bookingConfirmed(record.service, record.appointmentDate, record.appointmentTime, record.confirmationNumber),
        };
    }

    private async alternativesAfterRace(date: string, time: string): Promise<string[]> {
        try {
            return (await this.ledger.available(date)).filter(slot => slot !== time);
        } catch (error) {
            logger.warn('Could not list alternatives after a lost reservation', { date, time, error });
            return [];
        }
    }

    async checkAvailability(session: BookingSession, date: string, time?: string): Promise<AvailabilityResult> {
        session.recordAvailabilityCheck(date, time ?? '');

        const parsedDate = DateTimeUtils.parseDate(date);
        if (!parsedDate) {
            return { status: 'invalid', slots: [], message: copy.invalidDate(date) };
        }
        const day = DateTimeUtils.formatLongDate(parsedDate);

        if (DateTimeUtils.isClosedDay(parsedDate, this.salon.closedWeekdays)) {
            return { status: 'closed', slots: [], message: closedDayMessage(this.salon) };
        }

        try {
            if (time && time.trim()) {
                const slot = DateTimeUtils.parseTime(time);
                if (!slot) {
                    return { status: 'invalid', slots: [], message: copy.invalidTime(time, this.ledger.slots) };
                }

                const check = await this.ledger.check(day, slot);
                session.lastToolResult = check;
                switch (check.status) {
                    case 'available':
                        return { status: 'available', slots: [slot], message: copy.slotAvailable(slot, day) };
                    case 'full':
                        return { status: 'full', slots: check.alternatives, message: copy.slotFull(slot, day, check.alternatives) };
                    case 'outside_hours':
                        return { status: 'outside_hours', slots: check.slots, message: copy.outsideHours(slot, check.slots) };
                }
            }

            const open = await this.ledger.available(day);
            session.lastToolResult = open;
            return { status: 'open_slots', slots: open, message: copy.availableTimes(day, open) };
        } catch (error) {
            logger.error('Availability check failed', { sessionId: session.sessionId, date: day, time, error });
            return { status: 'failed', slots: [], message: copy.availabilityFailed };
        }
    }
}
