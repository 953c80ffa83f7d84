// src/routes/presenters.ts

import type { Patient } from '../models/Patient';
import type { IneligibilityReason } from '../engine/availabilityMatcher';
import { formatWaitTime, waitTimeFor } from '../engine/waitTimeCalculator';
import { AvailabilityLists, availabilityToLists } from '../engine/weeklyAvailability';

/**
 * Patient as sent over HTTP: grid flattened to lists, wait time attached
 */
export interface PatientView extends Omit<Patient, 'availability' | 'joinedAt' | 'waitFrozenAt'> {
    availability: AvailabilityLists;
    joinedAt: string;
    waitFrozenAt: string | null;
    waitMinutes: number;
    waitTime: string;
}

export function presentPatient(patient: Patient, now: Date): PatientView {
    const wait = waitTimeFor(patient, now);

    return {
        ...patient,
        availability: availabilityToLists(patient.availability),
        joinedAt: patient.joinedAt.toISOString(),
        waitFrozenAt: patient.waitFrozenAt?.toISOString() ?? null,
        waitMinutes: Math.floor(wait.as('minutes')),
        waitTime: formatWaitTime(wait)
    };
}

export function presentIneligible(
    patient: Patient,
    reasons: IneligibilityReason[],
    now: Date
): PatientView & { reasons: IneligibilityReason[] } {
    return { ...presentPatient(patient, now), reasons };
}
