import { describe, it, expect } from 'vitest';
import {
    parseDate,
    parseDateTime,
    parseDateInput,
    formatDateKey,
    formatSynopticTimestamp,
    parseObservationTime,
    formatTableTime,
    formatAxisTime,
    toDateInputValue
} from './timeUtils';

describe('timeUtils', () => {
    describe('parsing', () => {
        it('should parse picker date strings', () => {
            expect(parseDate('2025-02-06')).toEqual({
                year: 2025,
                month: 2,
                day: 6
            });
            expect(parseDate('invalid')).toBeNull();
        });

        it('should reject impossible calendar dates', () => {
            expect(parseDate('2025-02-30')).toBeNull();
            expect(parseDate('2025-13-01')).toBeNull();
            expect(parseDate('2024-02-29')).toEqual({ year: 2024, month: 2, day: 29 });
        });

        it('should parse local datetime strings', () => {
            expect(parseDateTime('2025-02-06T14:30')).toEqual({
                year: 2025,
                month: 2,
                day: 6,
                hour: 14,
                minute: 30
            });
            expect(parseDateTime('2025-02-06 14:30:15')).toEqual({
                year: 2025,
                month: 2,
                day: 6,
                hour: 14,
                minute: 30
            });
            expect(parseDateTime('2025-02-06T24:00')).toBeNull();
        });

        it('reads Date inputs through their local wall-clock fields', () => {
            expect(parseDateInput(new Date(2025, 1, 6, 7, 45))).toEqual({
                year: 2025,
                month: 2,
                day: 6,
                hour: 7,
                minute: 45
            });
            expect(parseDateInput(new Date('nope'))).toBeNull();
            expect(parseDateInput(' 2025-02-07 ')).toEqual({ year: 2025, month: 2, day: 7 });
        });
    });

    describe('observation timestamps', () => {
        it('parses UTC timestamps', () => {
            expect(parseObservationTime('2025-02-06T00:00:00Z')).toBe(Date.UTC(2025, 1, 6, 0, 0, 0));
            expect(parseObservationTime('2025-02-06T00:15Z')).toBe(Date.UTC(2025, 1, 6, 0, 15));
        });

        it('applies explicit offsets with or without a colon', () => {
            expect(parseObservationTime('2025-02-06T00:00:00-0700')).toBe(Date.UTC(2025, 1, 6, 7, 0));
            expect(parseObservationTime('2025-02-06T00:00:00+01:30')).toBe(Date.UTC(2025, 1, 5, 22, 30));
        });

        it('reads offset-less timestamps as UTC', () => {
            expect(parseObservationTime('2025-02-06T12:00:00')).toBe(Date.UTC(2025, 1, 6, 12));
        });

        it('coerces invalid entries to null', () => {
            expect(parseObservationTime('garbage')).toBeNull();
            expect(parseObservationTime('2025-02-30T00:00:00Z')).toBeNull();
            expect(parseObservationTime(null)).toBeNull();
            expect(parseObservationTime(1738800000000)).toBeNull();
        });
    });

    describe('formatting', () => {
        it('should format date keys correctly', () => {
            expect(formatDateKey({ year: 2025, month: 2, day: 6 })).toBe('2025-02-06');
            expect(formatDateKey({ year: 2024, month: 12, day: 25 })).toBe('2024-12-25');
        });

        it('formats Synoptic request timestamps', () => {
            expect(formatSynopticTimestamp({ year: 2025, month: 2, day: 6 })).toBe('202502060000');
            expect(formatSynopticTimestamp({ year: 2025, month: 2, day: 6, hour: 9, minute: 5 })).toBe('202502060905');
        });

        it('formats table and axis times in UTC', () => {
            const ms = Date.UTC(2025, 1, 6, 9, 5, 7);
            expect(formatTableTime(ms)).toBe('2025-02-06 09:05:07');
            expect(formatAxisTime(ms)).toBe('02-06 09:05');
        });

        it('produces date input values', () => {
            expect(toDateInputValue('2025-02-06')).toBe('2025-02-06');
            expect(toDateInputValue(new Date(2025, 1, 7, 23))).toBe('2025-02-07');
            expect(toDateInputValue(null)).toBe('');
            expect(toDateInputValue('bad')).toBe('');
            expect(toDateInputValue(new Date(2025, 1, 7))).toBe('2025-02-07');
        });
    });
});
