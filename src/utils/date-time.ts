import { DateTime } from 'luxon';
import { Weekday, WEEKDAYS } from '../models/salon-config';

const LOCALE = 'en-US';

const DATE_FORMATS = [
    'MMMM d, yyyy',
    'MMMM d yyyy',
    'MMM d, yyyy',
    'MMM d yyyy',
    'cccc, MMMM d, yyyy',
    'cccc MMMM d, yyyy',
    'yyyy-MM-dd',
    'M/d/yyyy',
];

const TIME_FORMATS = ['h:mm a', 'h a', 'H:mm'];

function capitalizeWords(value: string): string {
    return value.replace(/[a-z]+/gi, word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

export class DateTimeUtils {
    /**
     * Parses the spoken/written date forms the runtime passes through
     * ("March 3, 2025", "march 3rd 2025", "2025-03-03", "3/3/2025").
     */
    static parseDate(input: string): DateTime | null {
        const cleaned = capitalizeWords(
            input.trim()
                .replace(/(\d+)(st|nd|rd|th)\b/gi, '$1')
                .replace(/\s+/g, ' ')
        );
        if (!cleaned) return null;

        for (const format of DATE_FORMATS) {
            const parsed = DateTime.fromFormat(cleaned, format, { locale: LOCALE });
            if (parsed.isValid) return parsed;
        }
        return null;
    }

    /** "10am", "10 a.m.", "10:00 am" and "14:00" all become "h:mm AM" form. */
    static parseTime(input: string): string | null {
        const cleaned = input.trim()
            .toUpperCase()
            .replace(/\./g, '')
            .replace(/\s*(AM|PM)$/, ' $1')
            .replace(/\s+/g, ' ');
        if (!cleaned) return null;

        for (const format of TIME_FORMATS) {
            const parsed = DateTime.fromFormat(cleaned, format, { locale: LOCALE });
            if (parsed.isValid) return parsed.toFormat('h:mm a');
        }
        return null;
    }

    static formatLongDate(date: DateTime): string {
        return date.setLocale(LOCALE).toFormat('MMMM d, yyyy');
    }

    static weekdayOf(date: DateTime): Weekday {
        return WEEKDAYS[date.weekday - 1];
    }

    static isClosedDay(date: DateTime, closedWeekdays: readonly Weekday[]): boolean {
        return closedWeekdays.includes(this.weekdayOf(date));
    }

    static weekdayLabel(day: Weekday): string {
        return day.charAt(0).toUpperCase() + day.slice(1);
    }

    static describeCurrent(now: Date, timezone: string): { day: string; date: string; time: string; humanReadable: string; iso: string } {
        const local = DateTime.fromJSDate(now, { zone: timezone }).setLocale(LOCALE);
        const day = local.toFormat('cccc');
        const date = local.toFormat('MMMM d, yyyy');
        const time = local.toFormat('h:mm a');
        return {
            day,
            date,
            time,
            humanReadable: `${day}, ${date} at ${time}`,
            iso: local.toISO() ?? now.toISOString(),
        };
    }
}
