// src/store/waitlistStore.ts

import type { Patient, PatientStatus } from '../models/Patient';
import type { Slot, SlotStatus } from '../models/Slot';

/**
 * Unit of work handed to runTransaction
 *
 * Reads return copies. Writes and deletes are staged and only become visible
 * when the transaction commits; a record must be read in the same transaction
 * before it is written or deleted, so the store can tell whether it changed
 * underneath.
 */
export interface WaitlistTransaction {
    getSlot(id: string): Promise<Slot | null>;
    getPatient(id: string): Promise<Patient | null>;
    putSlot(slot: Slot): void;
    putPatient(patient: Patient): void;
    deleteSlot(id: string): void;
    deletePatient(id: string): void;
}

export interface SlotFilter {
    status?: SlotStatus;
}

export interface PatientFilter {
    status?: PatientStatus;
}

/**
 * Transactional record store for slots and waitlist entries
 *
 * runTransaction commits all staged writes at once, or none of them:
 * if any written record changed since it was read, it rejects with
 * ConflictError. It never retries.
 */
export interface WaitlistStore {
    runTransaction<T>(work: (tx: WaitlistTransaction) => Promise<T>): Promise<T>;

    getSlot(id: string): Promise<Slot | null>;
    getPatient(id: string): Promise<Patient | null>;
    listSlots(filter?: SlotFilter): Promise<Slot[]>;
    listPatients(filter?: PatientFilter): Promise<Patient[]>;

    // Intake; existing records only change inside transactions
    insertSlot(slot: Slot): Promise<void>;
    insertPatient(patient: Patient): Promise<void>;
}
