// src/models/Slot.ts

/**
 * Half-day a slot falls in
 */
export enum Period {
    AM = 'AM',
    PM = 'PM'
}

/**
 * Slot lifecycle states
 *
 * Valid transitions:
 * - AVAILABLE → PENDING (proposed to a waiting patient)
 * - PENDING → AVAILABLE (proposal cancelled)
 * - PENDING → CONFIRMED (booking confirmed, terminal)
 */
export enum SlotStatus {
    AVAILABLE = 'available',
    PENDING = 'pending',
    CONFIRMED = 'confirmed'
}

/**
 * Slot model - an opened appointment (usually left behind by a cancellation)
 *
 * Data only, no methods. State mutations handled by the proposal state machine.
 *
 * Invariant: proposedPatientId !== null iff status === PENDING
 * Invariant: bookedPatientId !== null iff status === CONFIRMED
 */
export interface Slot {
    id: string;
    provider: string;              // Always a concrete provider id
    date: string;                  // YYYY-MM-DD
    time: string | null;           // HH:mm, when the clinic recorded one
    period: Period;
    duration: number;              // Minutes
    appointmentType: string | null; // null accepts any appointment type
    notes: string;
    status: SlotStatus;

    // Pairing tracking
    proposedPatientId: string | null;
    proposedPatientName: string | null; // Display only
    bookedPatientId: string | null;
}
