// src/testing/fixtures.ts

import type { Clock } from '../clock';
import { emptyAvailability } from '../engine/weeklyAvailability';
import { AvailabilityMode, NO_PREFERENCE, Patient, PatientStatus, Urgency } from '../models/Patient';
import { Period, Slot, SlotStatus } from '../models/Slot';

export function makePatient(overrides: Partial<Patient> = {}): Patient {
    return {
        id: 'p1',
        name: 'Test Patient',
        phone: '555-0100',
        email: null,
        reason: '',
        appointmentType: 'hygiene',
        duration: 30,
        providerPreference: NO_PREFERENCE,
        availability: emptyAvailability(),
        availabilityMode: AvailabilityMode.AVAILABLE,
        urgency: Urgency.MEDIUM,
        status: PatientStatus.WAITING,
        proposedSlotId: null,
        bookedSlotId: null,
        joinedAt: new Date('2024-06-01T09:00:00Z'),
        waitFrozenAt: null,
        ...overrides
    };
}

// Defaults to a Tuesday morning
export function makeSlot(overrides: Partial<Slot> = {}): Slot {
    return {
        id: 's1',
        provider: 'dr-a',
        date: '2024-06-04',
        time: '09:00',
        period: Period.AM,
        duration: 30,
        appointmentType: null,
        notes: '',
        status: SlotStatus.AVAILABLE,
        proposedPatientId: null,
        proposedPatientName: null,
        bookedPatientId: null,
        ...overrides
    };
}

export function fixedClock(iso: string): Clock {
    return () => new Date(iso);
}
