import { describe, expect, it } from 'vitest';
import { Duration } from 'luxon';
import { PatientStatus } from '../models/Patient';
import { makePatient } from '../testing/fixtures';
import { computeWaitTime, formatWaitTime, waitTimeFor } from './waitTimeCalculator';

describe('computeWaitTime', () => {
    it('measures the time since joining', () => {
        const wait = computeWaitTime(new Date('2024-06-01T09:00:00Z'), new Date('2024-06-01T10:30:00Z'));

        expect(wait.as('minutes')).toBe(90);
    });

    it('clamps to zero when the clock is behind joinedAt', () => {
        const wait = computeWaitTime(new Date('2024-06-01T09:00:00Z'), new Date('2024-06-01T08:59:00Z'));

        expect(wait.toMillis()).toBe(0);
    });
});

describe('waitTimeFor', () => {
    const now = new Date('2024-06-03T09:00:00Z');

    it('keeps growing while the patient is waiting', () => {
        const patient = makePatient({ joinedAt: new Date('2024-06-01T09:00:00Z') });

        expect(waitTimeFor(patient, now).as('days')).toBe(2);
        expect(waitTimeFor(patient, new Date('2024-06-04T09:00:00Z')).as('days')).toBe(3);
    });

    it('is frozen once the patient is pending', () => {
        const patient = makePatient({
            status: PatientStatus.PENDING,
            proposedSlotId: 's1',
            joinedAt: new Date('2024-06-01T09:00:00Z'),
            waitFrozenAt: new Date('2024-06-02T09:00:00Z')
        });

        expect(waitTimeFor(patient, now).as('days')).toBe(1);
        expect(waitTimeFor(patient, new Date('2024-07-01T09:00:00Z')).as('days')).toBe(1);
    });

    it('ignores waitFrozenAt while waiting', () => {
        const patient = makePatient({
            joinedAt: new Date('2024-06-01T09:00:00Z'),
            waitFrozenAt: new Date('2024-06-02T09:00:00Z')
        });

        expect(waitTimeFor(patient, now).as('days')).toBe(2);
    });
});

describe('formatWaitTime', () => {
    it('shows days and hours', () => {
        expect(formatWaitTime(Duration.fromObject({ days: 5, hours: 3, minutes: 20 }))).toBe('5 days, 3 hours');
    });

    it('uses singular units', () => {
        expect(formatWaitTime(Duration.fromObject({ days: 1, hours: 1 }))).toBe('1 day, 1 hour');
    });

    it('drops zero hours', () => {
        expect(formatWaitTime(Duration.fromObject({ days: 2, minutes: 10 }))).toBe('2 days');
    });

    it('shows minutes under an hour', () => {
        expect(formatWaitTime(Duration.fromMillis(42 * 60_000 + 30_000))).toBe('42 minutes');
        expect(formatWaitTime(Duration.fromMillis(0))).toBe('0 minutes');
    });

    it('normalises large minute counts', () => {
        expect(formatWaitTime(Duration.fromObject({ minutes: 1500 }))).toBe('1 day, 1 hour');
    });
});
