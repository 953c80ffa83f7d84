// src/engine/proposalStateMachine.ts

import { Clock, systemClock } from '../clock';
import { ConflictError, ValidationError } from '../errors';
import { logger } from '../logger';
import { Patient, PatientStatus } from '../models/Patient';
import { Slot, SlotStatus } from '../models/Slot';
import type { WaitlistStore, WaitlistTransaction } from '../store/waitlistStore';

const log = logger.child({ module: 'proposalStateMachine' });

/**
 * A slot and a patient as they stand after a transition
 */
export interface Pairing {
    slot: Slot;
    patient: Patient;
}

/**
 * Joint state of a (slot, patient) pair
 *
 * - OPEN: slot available, patient waiting, not paired
 * - PROPOSED: both pending and pointing at each other
 * - CONFIRMED: both confirmed and booked to each other (terminal)
 * - UNRELATED: anything else (paired elsewhere, withdrawn, torn)
 */
export enum PairingState {
    OPEN = 'OPEN',
    PROPOSED = 'PROPOSED',
    CONFIRMED = 'CONFIRMED',
    UNRELATED = 'UNRELATED'
}

/**
 * Classify the joint state of a slot and a patient
 *
 * Pure function
 */
export function pairingStateOf(slot: Slot, patient: Patient): PairingState {
    if (
        slot.status === SlotStatus.AVAILABLE &&
        slot.proposedPatientId === null &&
        patient.status === PatientStatus.WAITING &&
        patient.proposedSlotId === null
    ) {
        return PairingState.OPEN;
    }

    if (
        slot.status === SlotStatus.PENDING &&
        slot.proposedPatientId === patient.id &&
        patient.status === PatientStatus.PENDING &&
        patient.proposedSlotId === slot.id
    ) {
        return PairingState.PROPOSED;
    }

    if (
        slot.status === SlotStatus.CONFIRMED &&
        slot.bookedPatientId === patient.id &&
        patient.status === PatientStatus.CONFIRMED &&
        patient.bookedSlotId === slot.id
    ) {
        return PairingState.CONFIRMED;
    }

    return PairingState.UNRELATED;
}

/**
 * Proposal state machine - owns the lifecycle of a (slot, patient) pairing
 *
 * OPEN → PROPOSED → CONFIRMED (terminal)
 *               ↘ OPEN (cancel)
 *
 * Every transition runs in one store transaction that re-reads both records,
 * checks the precondition and writes both sides together. A precondition
 * that no longer holds is a ConflictError; nothing is retried.
 */
export class ProposalStateMachine {
    private store: WaitlistStore;
    private clock: Clock;

    constructor(store: WaitlistStore, clock: Clock = systemClock) {
        this.store = store;
        this.clock = clock;
    }

    /**
     * Offer an available slot to a waiting patient
     *
     * State transition: OPEN → PROPOSED
     *
     * @param slotId Slot to offer
     * @param patientId Patient to offer it to
     * @returns Both records after the transition
     */
    async propose(slotId: string, patientId: string): Promise<Pairing> {
        assertIds(slotId, patientId);

        const pairing = await this.store.runTransaction(async tx => {
            const { slot, patient } = await loadPair(tx, slotId, patientId);

            if (slot.status !== SlotStatus.AVAILABLE) {
                throw new ConflictError(`Slot ${slotId} is ${slot.status}, not available`, {
                    slotId,
                    slotStatus: slot.status,
                    proposedPatientId: slot.proposedPatientId
                });
            }
            if (patient.status !== PatientStatus.WAITING) {
                throw new ConflictError(`Patient ${patientId} is ${patient.status}, not waiting`, {
                    patientId,
                    patientStatus: patient.status,
                    proposedSlotId: patient.proposedSlotId
                });
            }

            const proposedSlot: Slot = {
                ...slot,
                status: SlotStatus.PENDING,
                proposedPatientId: patient.id,
                proposedPatientName: patient.name
            };
            const proposedPatient: Patient = {
                ...patient,
                status: PatientStatus.PENDING,
                proposedSlotId: slot.id,
                waitFrozenAt: this.clock()
            };

            tx.putSlot(proposedSlot);
            tx.putPatient(proposedPatient);

            return { slot: proposedSlot, patient: proposedPatient };
        }).catch(rejected('propose', slotId, patientId));

        log.info({ slotId, patientId }, 'slot proposed');
        return pairing;
    }

    /**
     * Book a proposed slot for the patient it was proposed to
     *
     * State transition: PROPOSED → CONFIRMED (terminal)
     * The caller is expected to archive both records afterwards.
     */
    async confirm(slotId: string, patientId: string): Promise<Pairing> {
        assertIds(slotId, patientId);

        const pairing = await this.store.runTransaction(async tx => {
            const { slot, patient } = await loadProposedPair(tx, slotId, patientId);

            const bookedSlot: Slot = {
                ...slot,
                status: SlotStatus.CONFIRMED,
                proposedPatientId: null,
                proposedPatientName: null,
                bookedPatientId: patient.id
            };
            const bookedPatient: Patient = {
                ...patient,
                status: PatientStatus.CONFIRMED,
                proposedSlotId: null,
                bookedSlotId: slot.id
            };

            tx.putSlot(bookedSlot);
            tx.putPatient(bookedPatient);

            return { slot: bookedSlot, patient: bookedPatient };
        }).catch(rejected('confirm', slotId, patientId));

        log.info({ slotId, patientId }, 'booking confirmed');
        return pairing;
    }

    /**
     * Withdraw a proposal, returning both sides to the pool
     *
     * State transition: PROPOSED → OPEN
     * joinedAt is untouched, so the patient keeps their place by wait time.
     */
    async cancel(slotId: string, patientId: string): Promise<Pairing> {
        assertIds(slotId, patientId);

        const pairing = await this.store.runTransaction(async tx => {
            const { slot, patient } = await loadProposedPair(tx, slotId, patientId);

            const reopenedSlot: Slot = {
                ...slot,
                status: SlotStatus.AVAILABLE,
                proposedPatientId: null,
                proposedPatientName: null
            };
            const waitingPatient: Patient = {
                ...patient,
                status: PatientStatus.WAITING,
                proposedSlotId: null,
                waitFrozenAt: null
            };

            tx.putSlot(reopenedSlot);
            tx.putPatient(waitingPatient);

            return { slot: reopenedSlot, patient: waitingPatient };
        }).catch(rejected('cancel', slotId, patientId));

        log.info({ slotId, patientId }, 'proposal cancelled');
        return pairing;
    }
}

function assertIds(slotId: string, patientId: string): void {
    const fieldErrors: Record<string, string[]> = {};
    if (slotId.trim() === '') {
        fieldErrors.slotId = ['Required'];
    }
    if (patientId.trim() === '') {
        fieldErrors.patientId = ['Required'];
    }
    if (Object.keys(fieldErrors).length > 0) {
        throw new ValidationError('Slot and patient ids are required', { formErrors: [], fieldErrors });
    }
}

async function loadPair(tx: WaitlistTransaction, slotId: string, patientId: string): Promise<Pairing> {
    const slot = await tx.getSlot(slotId);
    if (!slot) {
        throw new ConflictError(`Slot ${slotId} does not exist`, { slotId });
    }

    const patient = await tx.getPatient(patientId);
    if (!patient) {
        throw new ConflictError(`Patient ${patientId} does not exist`, { patientId });
    }

    return { slot, patient };
}

/**
 * Load a pair and require that it is PROPOSED to each other exactly
 */
async function loadProposedPair(
    tx: WaitlistTransaction,
    slotId: string,
    patientId: string
): Promise<Pairing> {
    const pair = await loadPair(tx, slotId, patientId);

    if (pairingStateOf(pair.slot, pair.patient) !== PairingState.PROPOSED) {
        throw new ConflictError(`Slot ${slotId} is not proposed to patient ${patientId}`, {
            slotId,
            patientId,
            slotStatus: pair.slot.status,
            proposedPatientId: pair.slot.proposedPatientId,
            patientStatus: pair.patient.status,
            proposedSlotId: pair.patient.proposedSlotId
        });
    }

    return pair;
}

// Log rejected transitions and pass the error on unchanged
function rejected(action: string, slotId: string, patientId: string) {
    return (err: unknown): never => {
        if (err instanceof ConflictError) {
            log.warn({ action, slotId, patientId, details: err.details }, err.message);
        }
        throw err;
    };
}
