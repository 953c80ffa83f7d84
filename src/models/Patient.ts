// src/models/Patient.ts

import type { WeeklyAvailability } from './Availability';

/**
 * Sentinel provider preference: any provider will do
 */
export const NO_PREFERENCE = 'no preference';

/**
 * Clinical urgency, highest first when ranking
 */
export enum Urgency {
    LOW = 'low',
    MEDIUM = 'medium',
    HIGH = 'high'
}

/**
 * How the availability grid is read
 *
 * - AVAILABLE: listed times are the only acceptable times
 * - UNAVAILABLE: listed times are excluded, everything else is acceptable
 */
export enum AvailabilityMode {
    AVAILABLE = 'available',
    UNAVAILABLE = 'unavailable'
}

/**
 * Waitlist entry lifecycle states
 *
 * Valid transitions:
 * - WAITING → PENDING (slot proposed)
 * - PENDING → WAITING (proposal cancelled)
 * - PENDING → CONFIRMED (booking confirmed, terminal)
 * - WAITING → CANCELLED (patient withdrew from the waitlist)
 */
export enum PatientStatus {
    WAITING = 'waiting',
    PENDING = 'pending',
    CONFIRMED = 'confirmed',
    CANCELLED = 'cancelled'
}

/**
 * Patient model - one entry on the clinic waitlist
 *
 * Data only, no methods. State mutations handled by the proposal state machine
 * and the intake/withdrawal handlers.
 *
 * Invariant: proposedSlotId !== null iff status === PENDING
 * Invariant: joinedAt never changes after creation
 */
export interface Patient {
    id: string;
    name: string;
    phone: string;
    email: string | null;
    reason: string;

    // Hard matching constraints
    appointmentType: string;
    duration: number;           // Minutes
    providerPreference: string; // Provider id or NO_PREFERENCE
    availability: WeeklyAvailability;
    availabilityMode: AvailabilityMode;

    urgency: Urgency;
    status: PatientStatus;

    // Pairing tracking
    proposedSlotId: string | null;
    bookedSlotId: string | null;

    // Wait time
    joinedAt: Date;
    waitFrozenAt: Date | null;  // Set when the patient stops waiting
}
