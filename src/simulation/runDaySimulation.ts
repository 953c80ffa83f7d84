// src/simulation/runDaySimulation.ts

import { DateTime } from 'luxon';
import type { Clock } from '../clock';
import { InMemoryProviderDirectory } from '../directory/providerDirectory';
import { AvailabilityMatcher } from '../engine/availabilityMatcher';
import { ProposalStateMachine } from '../engine/proposalStateMachine';
import { formatWaitTime, waitTimeFor } from '../engine/waitTimeCalculator';
import { ConflictError } from '../errors';
import { handleBookingConfirmed } from '../events/bookingConfirmedHandler';
import type { HandlerDeps } from '../events/handlerDeps';
import { handlePatientJoined } from '../events/patientJoinedHandler';
import { handleSlotOpened } from '../events/slotOpenedHandler';
import { logger } from '../logger';
import { Patient, PatientStatus } from '../models/Patient';
import { SlotStatus } from '../models/Slot';
import { InMemoryWaitlistStore } from '../store/inMemoryWaitlistStore';
import type { WaitlistStore } from '../store/waitlistStore';

/**
 * Full clinic day simulation
 *
 * Demonstrates:
 * - Patients joining with mixed constraints (provider, duration, availability mode)
 * - Slots opening after cancellations
 * - Ranked matching with exclusion reasons
 * - Propose / cancel / confirm, including a proposal race on one slot
 * - Invariant checks on the slot ↔ patient cross references
 */

export interface SimulationSummary {
    patientsByStatus: Record<PatientStatus, number>;
    slotsByStatus: Record<SlotStatus, number>;
    confirmedBookings: number;
    conflicts: number;
    invariantsHold: boolean;
}

const log = logger.child({ module: 'simulation' });

function logSection(title: string): void {
    log.info('='.repeat(60));
    log.info(title);
    log.info('='.repeat(60));
}

/**
 * Clock the simulation moves forward by hand
 */
function simulatedClock(start: DateTime): { clock: Clock; advance: (minutes: number) => void } {
    let current = start;
    return {
        clock: () => current.toJSDate(),
        advance: minutes => {
            current = current.plus({ minutes });
        }
    };
}

/**
 * Check the pairing invariants across the whole store
 *
 * - A slot has proposedPatientId iff it is PENDING, and that patient points back
 * - A patient has proposedSlotId iff it is PENDING, and that slot points back
 */
export async function checkPairingInvariants(store: WaitlistStore): Promise<string[]> {
    const violations: string[] = [];
    const slots = await store.listSlots();
    const patients = await store.listPatients();
    const slotsById = new Map(slots.map(s => [s.id, s]));
    const patientsById = new Map(patients.map(p => [p.id, p]));

    for (const slot of slots) {
        if ((slot.proposedPatientId !== null) !== (slot.status === SlotStatus.PENDING)) {
            violations.push(`slot ${slot.id}: status ${slot.status} with proposedPatientId ${slot.proposedPatientId}`);
            continue;
        }
        if (slot.proposedPatientId !== null) {
            const patient = patientsById.get(slot.proposedPatientId);
            if (!patient || patient.status !== PatientStatus.PENDING || patient.proposedSlotId !== slot.id) {
                violations.push(`slot ${slot.id}: proposed patient ${slot.proposedPatientId} does not point back`);
            }
        }
    }

    for (const patient of patients) {
        if ((patient.proposedSlotId !== null) !== (patient.status === PatientStatus.PENDING)) {
            violations.push(`patient ${patient.id}: status ${patient.status} with proposedSlotId ${patient.proposedSlotId}`);
            continue;
        }
        if (patient.proposedSlotId !== null) {
            const slot = slotsById.get(patient.proposedSlotId);
            if (!slot || slot.status !== SlotStatus.PENDING || slot.proposedPatientId !== patient.id) {
                violations.push(`patient ${patient.id}: proposed slot ${patient.proposedSlotId} does not point back`);
            }
        }
    }

    return violations;
}

export async function runDaySimulation(): Promise<SimulationSummary> {
    logSection('CLINIC WAITLIST SIMULATION - START');

    // Initialize system
    const { clock, advance } = simulatedClock(DateTime.fromISO('2024-06-03T08:00:00Z'));
    const store = new InMemoryWaitlistStore();
    const providers = new InMemoryProviderDirectory([
        { id: 'dr-adams', name: 'Dr. Adams' },
        { id: 'dr-baker', name: 'Dr. Baker' }
    ]);
    const proposals = new ProposalStateMachine(store, clock);
    const deps: HandlerDeps = { store, providers, proposals, clock };
    const matcher = new AvailabilityMatcher();

    let conflicts = 0;
    let confirmedBookings = 0;

    const expectConflict = async (label: string, attempt: Promise<unknown>): Promise<void> => {
        try {
            await attempt;
            log.warn({ label }, 'expected a conflict but the operation succeeded');
        } catch (err) {
            if (!(err instanceof ConflictError)) {
                throw err;
            }
            conflicts++;
            log.info({ label, reason: err.message }, 'rejected as expected');
        }
    };

    // ========== STEP 1: Patients join the waitlist ==========
    logSection('STEP 1: Patients join the waitlist');

    const join = async (input: Record<string, unknown>, waitMinutes: number): Promise<Patient> => {
        const patient = await handlePatientJoined(input, deps);
        log.info({ name: patient.name, urgency: patient.urgency }, 'joined');
        advance(waitMinutes);
        return patient;
    };

    const alice = await join({
        name: 'Alice', phone: '555-0101', appointmentType: 'hygiene', duration: 30, urgency: 'high'
    }, 24 * 60);
    const ben = await join({
        name: 'Ben', phone: '555-0102', appointmentType: 'hygiene', duration: 30,
        providerPreference: 'dr-adams', urgency: 'medium', availability: { Tuesday: ['AM'] }
    }, 12 * 60);
    const carla = await join({
        name: 'Carla', phone: '555-0103', appointmentType: 'hygiene', duration: 30,
        providerPreference: 'dr-baker', urgency: 'high'
    }, 60);
    await join({
        name: 'Dev', phone: '555-0104', appointmentType: 'hygiene', duration: 60, urgency: 'low'
    }, 30);
    const erin = await join({
        name: 'Erin', phone: '555-0105', appointmentType: 'hygiene', duration: 30, urgency: 'medium',
        availability: { Tuesday: ['AM'] }, availabilityMode: 'unavailable'
    }, 15);
    await join({
        name: 'Farah', phone: '555-0106', appointmentType: 'hygiene', duration: 30, urgency: 'low'
    }, 45);

    // ========== STEP 2: Cancellations open slots ==========
    logSection('STEP 2: Cancellations open slots');

    const morningSlot = await handleSlotOpened(
        { provider: 'dr-adams', date: '2024-06-04', time: '09:00', duration: 30 },
        deps
    );
    const afternoonSlot = await handleSlotOpened(
        { provider: 'dr-baker', date: '2024-06-04', time: '14:00', duration: 30 },
        deps
    );
    log.info({ morning: morningSlot.id, afternoon: afternoonSlot.id }, 'slots opened');

    // ========== STEP 3: Match the morning slot ==========
    logSection('STEP 3: Ranked matches for the Tuesday morning slot');

    const waiting = await store.listPatients({ status: PatientStatus.WAITING });
    const { eligible, ineligible } = matcher.partition(morningSlot, waiting, clock());
    eligible.forEach((p, rank) => {
        log.info({ rank: rank + 1, name: p.name, urgency: p.urgency, wait: formatWaitTime(waitTimeFor(p, clock())) }, 'eligible');
    });
    ineligible.forEach(c => log.info({ name: c.patient.name, reasons: c.reasons }, 'not eligible'));

    // ========== STEP 4: Propose to the top candidate ==========
    logSection('STEP 4: Propose the morning slot to the top candidate');

    await proposals.propose(morningSlot.id, eligible[0].id);
    await expectConflict('propose same slot twice', proposals.propose(morningSlot.id, ben.id));

    // ========== STEP 5: Two staff members race for the afternoon slot ==========
    logSection('STEP 5: Concurrent proposals for the afternoon slot');

    const race = await Promise.allSettled([
        proposals.propose(afternoonSlot.id, carla.id),
        proposals.propose(afternoonSlot.id, erin.id)
    ]);
    for (const outcome of race) {
        if (outcome.status === 'fulfilled') {
            log.info({ winner: outcome.value.patient.name }, 'race won');
        } else {
            await expectConflict('race lost', Promise.reject(outcome.reason));
        }
    }

    // ========== STEP 6: Patient declines, offer the next one ==========
    logSection('STEP 6: Top candidate declines, next candidate is offered');

    advance(30);
    await proposals.cancel(morningSlot.id, alice.id);
    await proposals.propose(morningSlot.id, ben.id);

    // ========== STEP 7: Confirm the booking ==========
    logSection('STEP 7: Booking confirmed and archived');

    advance(30);
    await handleBookingConfirmed(morningSlot.id, ben.id, deps);
    confirmedBookings++;
    await expectConflict('cancel after confirm', proposals.cancel(morningSlot.id, ben.id));

    // ========== STEP 8: Invariant Verification ==========
    logSection('STEP 8: Invariant Verification');

    const violations = await checkPairingInvariants(store);
    violations.forEach(v => log.error({ violation: v }, 'invariant violated'));
    log.info({ holds: violations.length === 0 }, 'pairing invariants checked');

    // Final summary
    logSection('SIMULATION SUMMARY');

    const patientsByStatus: Record<PatientStatus, number> = {
        [PatientStatus.WAITING]: 0,
        [PatientStatus.PENDING]: 0,
        [PatientStatus.CONFIRMED]: 0,
        [PatientStatus.CANCELLED]: 0
    };
    for (const patient of await store.listPatients()) {
        patientsByStatus[patient.status]++;
    }

    const slotsByStatus: Record<SlotStatus, number> = {
        [SlotStatus.AVAILABLE]: 0,
        [SlotStatus.PENDING]: 0,
        [SlotStatus.CONFIRMED]: 0
    };
    for (const slot of await store.listSlots()) {
        slotsByStatus[slot.status]++;
    }

    const summary: SimulationSummary = {
        patientsByStatus,
        slotsByStatus,
        confirmedBookings,
        conflicts,
        invariantsHold: violations.length === 0
    };
    log.info(summary, 'simulation complete');

    return summary;
}
