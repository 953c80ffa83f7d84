// src/engine/availabilityMatcher.ts

import {
    AvailabilityMode,
    NO_PREFERENCE,
    Patient,
    PatientStatus,
    Urgency
} from '../models/Patient';
import { Period, Slot, SlotStatus } from '../models/Slot';
import { waitTimeFor } from './waitTimeCalculator';
import { hasAnyListed, isListed, weekdayOf } from './weeklyAvailability';

/**
 * Hard constraint a candidate failed for a slot
 */
export type IneligibilityReason =
    | 'provider'
    | 'duration'
    | 'appointment_type'
    | 'availability'
    | 'status';

export interface IneligibleCandidate {
    patient: Patient;
    reasons: IneligibilityReason[];
}

export interface MatchPartition {
    eligible: Patient[];
    ineligible: IneligibleCandidate[];
}

const URGENCY_RANK: Record<Urgency, number> = {
    [Urgency.HIGH]: 0,
    [Urgency.MEDIUM]: 1,
    [Urgency.LOW]: 2
};

const PERIOD_RANK: Record<Period, number> = {
    [Period.AM]: 0,
    [Period.PM]: 1
};

function compareStrings(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Availability matcher - decides which waiting patients fit an open slot
 *
 * Stateless: every call is a pure function of (slot, candidates, now), so the
 * same inputs give the same ordered result whatever the call order.
 *
 * Eligibility is a conjunction of hard constraints:
 * 1. Provider: preference equals slot provider, or "no preference"
 * 2. Duration: exact equality, no rounding
 * 3. Availability: slot weekday/period against the patient's grid and mode
 * 4. Status: WAITING only
 * 5. Appointment type: only when the slot names one
 *
 * Ranking (presentation only, never affects eligibility):
 * urgency high → low, wait time longest first, joinedAt earliest first, id
 */
export class AvailabilityMatcher {
    /**
     * Ranked list of candidates eligible for the slot
     *
     * @param slot Open slot
     * @param candidates Waitlist entries to consider
     * @param now Current time, for wait-time ranking
     * @returns Eligible candidates, highest ranked first (possibly empty)
     */
    findEligible(slot: Slot, candidates: readonly Patient[], now: Date): Patient[] {
        return this.rank(
            candidates.filter(candidate => this.assess(slot, candidate).length === 0),
            now
        );
    }

    /**
     * Split candidates into ranked eligible and ineligible-with-reasons
     *
     * Ineligible candidates are ordered by wait time, longest first.
     */
    partition(slot: Slot, candidates: readonly Patient[], now: Date): MatchPartition {
        const eligible: Patient[] = [];
        const ineligible: IneligibleCandidate[] = [];

        for (const patient of candidates) {
            const reasons = this.assess(slot, patient);
            if (reasons.length === 0) {
                eligible.push(patient);
            } else {
                ineligible.push({ patient, reasons });
            }
        }

        ineligible.sort((a, b) => this.compareByWait(a.patient, b.patient, now));

        return { eligible: this.rank(eligible, now), ineligible };
    }

    /**
     * Every hard constraint the candidate fails for the slot
     *
     * @returns Empty array when the candidate is eligible
     */
    assess(slot: Slot, candidate: Patient): IneligibilityReason[] {
        const reasons: IneligibilityReason[] = [];

        if (
            candidate.providerPreference !== NO_PREFERENCE &&
            candidate.providerPreference !== slot.provider
        ) {
            reasons.push('provider');
        }

        if (candidate.duration !== slot.duration) {
            reasons.push('duration');
        }

        if (slot.appointmentType !== null && candidate.appointmentType !== slot.appointmentType) {
            reasons.push('appointment_type');
        }

        if (!this.isAvailableFor(slot, candidate)) {
            reasons.push('availability');
        }

        if (candidate.status !== PatientStatus.WAITING) {
            reasons.push('status');
        }

        return reasons;
    }

    /**
     * Available slots a patient could be offered, soonest first
     *
     * @param patient Waitlist entry
     * @param slots Slots to consider; non-AVAILABLE slots are skipped
     */
    findSlotsForPatient(patient: Patient, slots: readonly Slot[]): Slot[] {
        return slots
            .filter(slot => slot.status === SlotStatus.AVAILABLE)
            .filter(slot => this.assess(slot, patient).length === 0)
            .sort((a, b) =>
                compareStrings(a.date, b.date) ||
                PERIOD_RANK[a.period] - PERIOD_RANK[b.period] ||
                compareStrings(a.time ?? '', b.time ?? '') ||
                compareStrings(a.id, b.id)
            );
    }

    /**
     * Availability predicate for the slot's weekday and period
     *
     * - Nothing listed: available any time
     * - AVAILABLE mode: passes only if the half-day is listed
     * - UNAVAILABLE mode: passes unless the half-day is listed
     */
    private isAvailableFor(slot: Slot, candidate: Patient): boolean {
        if (!hasAnyListed(candidate.availability)) {
            return true;
        }

        const weekday = weekdayOf(slot.date);
        if (weekday === null) {
            // Slot dates are validated on intake; an unreadable date matches no listing
            return candidate.availabilityMode === AvailabilityMode.UNAVAILABLE;
        }

        const listed = isListed(candidate.availability, weekday, slot.period);

        return candidate.availabilityMode === AvailabilityMode.AVAILABLE ? listed : !listed;
    }

    private rank(patients: Patient[], now: Date): Patient[] {
        return [...patients].sort((a, b) =>
            URGENCY_RANK[a.urgency] - URGENCY_RANK[b.urgency] ||
            this.compareByWait(a, b, now)
        );
    }

    // Longest wait first, then earliest joinedAt, then id
    private compareByWait(a: Patient, b: Patient, now: Date): number {
        return (
            waitTimeFor(b, now).toMillis() - waitTimeFor(a, now).toMillis() ||
            a.joinedAt.getTime() - b.joinedAt.getTime() ||
            compareStrings(a.id, b.id)
        );
    }
}
