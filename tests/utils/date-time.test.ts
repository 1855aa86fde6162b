import { DateTimeUtils } from '../../src/utils/date-time';

describe('DateTimeUtils', () => {
    test('parses the written date forms into one canonical form', () => {
        const inputs = ['March 3, 2025', 'march 3rd 2025', 'Mar 3, 2025', '2025-03-03', '3/3/2025', 'Monday, March 3, 2025'];
        for (const input of inputs) {
            const parsed = DateTimeUtils.parseDate(input);
            expect(parsed).not.toBeNull();
            if (parsed) {
                expect(DateTimeUtils.formatLongDate(parsed)).toBe('March 3, 2025');
            }
        }
    });

    test('returns null for text that is not a date', () => {
        expect(DateTimeUtils.parseDate('someday soon')).toBeNull();
        expect(DateTimeUtils.parseDate('')).toBeNull();
        expect(DateTimeUtils.parseDate('February 30, 2025')).toBeNull();
    });

    test('normalizes spoken times to h:mm AM', () => {
        expect(DateTimeUtils.parseTime('10:00 AM')).toBe('10:00 AM');
        expect(DateTimeUtils.parseTime('10 am')).toBe('10:00 AM');
        expect(DateTimeUtils.parseTime('10am')).toBe('10:00 AM');
        expect(DateTimeUtils.parseTime('2 p.m.')).toBe('2:00 PM');
        expect(DateTimeUtils.parseTime('14:00')).toBe('2:00 PM');
        expect(DateTimeUtils.parseTime('noonish')).toBeNull();
    });

    test('computes weekdays and closed days', () => {
        const monday = DateTimeUtils.parseDate('March 3, 2025');
        const thursday = DateTimeUtils.parseDate('March 6, 2025');
        expect(monday && DateTimeUtils.weekdayOf(monday)).toBe('monday');
        expect(thursday && DateTimeUtils.isClosedDay(thursday, ['thursday'])).toBe(true);
        expect(monday && DateTimeUtils.isClosedDay(monday, ['thursday'])).toBe(false);
    });

    test('describes the current moment in the salon timezone', () => {
        // 15:30 UTC is 10:30 AM in New York on this date (EST)
        const now = new Date('2025-03-03T15:30:00Z');
        const current = DateTimeUtils.describeCurrent(now, 'America/New_York');
        expect(current.humanReadable).toBe('Monday, March 3, 2025 at 10:30 AM');
        expect(current.day).toBe('Monday');
    });
});
