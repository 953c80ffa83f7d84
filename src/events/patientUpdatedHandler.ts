// src/events/patientUpdatedHandler.ts

import { ConflictError } from '../errors';
import { logger } from '../logger';
import { NO_PREFERENCE, Patient, PatientStatus } from '../models/Patient';
import { availabilityFromLists, availabilityToLists } from '../engine/weeklyAvailability';
import { PatientIntakeSchema, PatientUpdateSchema, parseInput } from '../validation/schemas';
import type { HandlerDeps } from './handlerDeps';
import { assertKnownProvider } from './knownProvider';

const log = logger.child({ module: 'patientUpdatedHandler' });

/**
 * Handle staff edits to a waitlist entry
 *
 * Only WAITING patients can be edited; a PENDING patient's proposal was made
 * against the constraints as they stood. Status, joinedAt and the pairing
 * fields are never touched here.
 *
 * @param input Intake fields to change
 * @returns The patient after the edit
 */
export async function handlePatientUpdated(
    patientId: string,
    input: unknown,
    deps: Pick<HandlerDeps, 'store' | 'providers'>
): Promise<Patient> {
    const changes = parseInput(PatientUpdateSchema, input, 'patient update');

    const updated = await deps.store.runTransaction(async tx => {
        const patient = await tx.getPatient(patientId);
        if (!patient) {
            throw new ConflictError(`Patient ${patientId} does not exist`, { patientId });
        }

        if (patient.status !== PatientStatus.WAITING) {
            throw new ConflictError(`Patient ${patientId} is ${patient.status}, only waiting patients can be edited`, {
                patientId,
                patientStatus: patient.status,
                proposedSlotId: patient.proposedSlotId
            });
        }

        const intake = parseInput(PatientIntakeSchema, {
            name: patient.name,
            phone: patient.phone,
            email: patient.email ?? undefined,
            reason: patient.reason,
            appointmentType: patient.appointmentType,
            duration: patient.duration,
            providerPreference: patient.providerPreference,
            urgency: patient.urgency,
            availability: availabilityToLists(patient.availability),
            availabilityMode: patient.availabilityMode,
            ...changes
        }, 'patient');

        if (intake.providerPreference !== NO_PREFERENCE) {
            await assertKnownProvider(deps.providers, intake.providerPreference, 'providerPreference');
        }

        const edited: Patient = {
            ...patient,
            name: intake.name,
            phone: intake.phone,
            email: intake.email ?? null,
            reason: intake.reason,
            appointmentType: intake.appointmentType,
            duration: intake.duration,
            providerPreference: intake.providerPreference,
            availability: availabilityFromLists(intake.availability),
            availabilityMode: intake.availabilityMode,
            urgency: intake.urgency
        };
        tx.putPatient(edited);

        return edited;
    });

    log.info({ patientId, fields: Object.keys(changes) }, 'patient updated');
    return updated;
}
