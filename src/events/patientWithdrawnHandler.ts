// src/events/patientWithdrawnHandler.ts

import { ConflictError } from '../errors';
import { logger } from '../logger';
import { Patient, PatientStatus } from '../models/Patient';
import type { HandlerDeps } from './handlerDeps';

const log = logger.child({ module: 'patientWithdrawnHandler' });

/**
 * Handle a patient leaving the waitlist on their own
 *
 * State transition: WAITING → CANCELLED
 * A PENDING patient has a slot held for them; that proposal has to be
 * cancelled first so the slot is released with it.
 */
export async function handlePatientWithdrawn(
    patientId: string,
    deps: Pick<HandlerDeps, 'store' | 'clock'>
): Promise<Patient> {
    const withdrawn = await deps.store.runTransaction(async tx => {
        const patient = await tx.getPatient(patientId);
        if (!patient) {
            throw new ConflictError(`Patient ${patientId} does not exist`, { patientId });
        }

        if (patient.status !== PatientStatus.WAITING) {
            throw new ConflictError(`Patient ${patientId} is ${patient.status}, not waiting`, {
                patientId,
                patientStatus: patient.status,
                proposedSlotId: patient.proposedSlotId
            });
        }

        const updated: Patient = {
            ...patient,
            status: PatientStatus.CANCELLED,
            waitFrozenAt: deps.clock()
        };
        tx.putPatient(updated);

        return updated;
    });

    log.info({ patientId }, 'patient withdrew from waitlist');
    return withdrawn;
}
