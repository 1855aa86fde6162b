import { BookingFieldKey, REQUIRED_FIELDS } from '../../models/booking-session';
import { findService, SalonConfig, WEEKDAYS } from '../../models/salon-config';
import { DateTimeUtils } from '../../utils/date-time';
import { PhoneFormatter } from '../../utils/phone-formatter';
import { copy } from '../conversation/copy';

export type FieldOutcome =
    | { ok: true; value: string; price?: number }
    | { ok: false; message: string };

export interface FieldDescriptor {
    key: BookingFieldKey;
    label: string;
    validate(input: string): FieldOutcome;
}

function validateName(input: string): FieldOutcome {
    const value = input.trim();
    return value ? { ok: true, value } : { ok: false, message: copy.emptyName };
}

function validatePhone(input: string): FieldOutcome {
    const digits = PhoneFormatter.normalize(input);
    return digits ? { ok: true, value: digits } : { ok: false, message: copy.invalidPhone(input) };
}

export function closedDayMessage(salon: SalonConfig): string {
    const openDays = WEEKDAYS.filter(day => !salon.closedWeekdays.includes(day)).map(DateTimeUtils.weekdayLabel);
    return copy.closedDay(salon.closedWeekdays.map(DateTimeUtils.weekdayLabel), openDays);
}

/**
 * One descriptor per required field, in collection order. Validators close over
 * the salon catalog so the lifecycle never looks fields up by name.
 */
export function buildFieldDescriptors(salon: SalonConfig): FieldDescriptor[] {
    const closedMessage = closedDayMessage(salon);

    const validators: Record<BookingFieldKey, (input: string) => FieldOutcome> = {
        customerName: validateName,

        phoneNumber: validatePhone,

        service: (input) => {
            const offering = findService(salon, input);
            if (!offering) {
                return { ok: false, message: copy.unknownService(input, salon.services) };
            }
            return { ok: true, value: offering.displayName, price: offering.price };
        },

        appointmentDate: (input) => {
            const date = DateTimeUtils.parseDate(input);
            if (!date) {
                return { ok: false, message: copy.invalidDate(input) };
            }
            if (DateTimeUtils.isClosedDay(date, salon.closedWeekdays)) {
                return { ok: false, message: closedMessage };
            }
            return { ok: true, value: DateTimeUtils.formatLongDate(date) };
        },

        appointmentTime: (input) => {
            const time = DateTimeUtils.parseTime(input);
            if (!time) {
                return { ok: false, message: copy.invalidTime(input, salon.slots) };
            }
            if (!salon.slots.includes(time)) {
                return { ok: false, message: copy.outsideHours(time, salon.slots) };
            }
            return { ok: true, value: time };
        },
    };

    return REQUIRED_FIELDS.map(field => ({ ...field, validate: validators[field.key] }));
}
