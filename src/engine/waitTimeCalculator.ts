// src/engine/waitTimeCalculator.ts

import { Duration } from 'luxon';
import { Patient, PatientStatus } from '../models/Patient';

/**
 * Elapsed wait between joining the waitlist and now
 *
 * Pure function - same input always produces same output
 * Clamped to zero when the clock reads earlier than joinedAt (skew)
 *
 * @param joinedAt When the patient joined the waitlist
 * @param now Current time
 */
export function computeWaitTime(joinedAt: Date, now: Date): Duration {
    return Duration.fromMillis(Math.max(0, now.getTime() - joinedAt.getTime()));
}

/**
 * Wait time of a patient as displayed and ranked
 *
 * Keeps growing while the patient is WAITING; once the patient leaves
 * WAITING it is frozen at waitFrozenAt.
 */
export function waitTimeFor(patient: Patient, now: Date): Duration {
    if (patient.status !== PatientStatus.WAITING && patient.waitFrozenAt !== null) {
        return computeWaitTime(patient.joinedAt, patient.waitFrozenAt);
    }

    return computeWaitTime(patient.joinedAt, now);
}

function plural(count: number, unit: string): string {
    return `${count} ${unit}${count === 1 ? '' : 's'}`;
}

/**
 * Human readable wait, e.g. "5 days, 3 hours" or "42 minutes"
 *
 * Minutes are only shown while the wait is under an hour.
 */
export function formatWaitTime(wait: Duration): string {
    const { days, hours, minutes } = wait
        .shiftTo('days', 'hours', 'minutes', 'seconds', 'milliseconds')
        .toObject();

    const parts: string[] = [];
    if (days !== undefined && days > 0) {
        parts.push(plural(days, 'day'));
    }
    if (hours !== undefined && hours > 0) {
        parts.push(plural(hours, 'hour'));
    }
    if (parts.length === 0) {
        parts.push(plural(minutes ?? 0, 'minute'));
    }

    return parts.join(', ');
}
