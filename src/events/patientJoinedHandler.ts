// src/events/patientJoinedHandler.ts

import { randomUUID } from 'node:crypto';
import { logger } from '../logger';
import { NO_PREFERENCE, Patient, PatientStatus } from '../models/Patient';
import { availabilityFromLists } from '../engine/weeklyAvailability';
import { PatientIntakeSchema, parseInput } from '../validation/schemas';
import type { HandlerDeps } from './handlerDeps';
import { assertKnownProvider } from './knownProvider';

const log = logger.child({ module: 'patientJoinedHandler' });

/**
 * Handle a patient joining the waitlist
 *
 * State: created in WAITING, joinedAt fixed to the clock for good
 *
 * @param input Raw waitlist entry fields
 * @param deps Store, provider directory and clock
 * @returns The stored patient
 */
export async function handlePatientJoined(
    input: unknown,
    deps: Pick<HandlerDeps, 'store' | 'providers' | 'clock'>
): Promise<Patient> {
    const intake = parseInput(PatientIntakeSchema, input, 'patient');

    if (intake.providerPreference !== NO_PREFERENCE) {
        await assertKnownProvider(deps.providers, intake.providerPreference, 'providerPreference');
    }

    const patient: Patient = {
        id: randomUUID(),
        name: intake.name,
        phone: intake.phone,
        email: intake.email ?? null,
        reason: intake.reason,
        appointmentType: intake.appointmentType,
        duration: intake.duration,
        providerPreference: intake.providerPreference,
        availability: availabilityFromLists(intake.availability),
        availabilityMode: intake.availabilityMode,
        urgency: intake.urgency,
        status: PatientStatus.WAITING,
        proposedSlotId: null,
        bookedSlotId: null,
        joinedAt: deps.clock(),
        waitFrozenAt: null
    };

    await deps.store.insertPatient(patient);
    log.info({ patientId: patient.id, urgency: patient.urgency }, 'patient joined waitlist');

    return patient;
}
