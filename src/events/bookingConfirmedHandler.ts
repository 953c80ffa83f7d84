// src/events/bookingConfirmedHandler.ts

import { ConflictError } from '../errors';
import { logger } from '../logger';
import { Pairing, PairingState, pairingStateOf } from '../engine/proposalStateMachine';
import type { HandlerDeps } from './handlerDeps';

const log = logger.child({ module: 'bookingConfirmedHandler' });

/**
 * Handle staff confirming a proposed booking
 *
 * State transition: PROPOSED → CONFIRMED, then both records are archived
 * (removed from the store) so they never show up in matching again.
 *
 * Side effects:
 * 1. Confirm the pairing atomically
 * 2. Remove the booked slot and patient together
 *
 * @returns The pairing as confirmed, before removal
 */
export async function handleBookingConfirmed(
    slotId: string,
    patientId: string,
    deps: Pick<HandlerDeps, 'store' | 'proposals'>
): Promise<Pairing> {
    const pairing = await deps.proposals.confirm(slotId, patientId);

    await deps.store.runTransaction(async tx => {
        const slot = await tx.getSlot(slotId);
        const patient = await tx.getPatient(patientId);

        if (!slot || !patient || pairingStateOf(slot, patient) !== PairingState.CONFIRMED) {
            throw new ConflictError(`Booking of slot ${slotId} for patient ${patientId} changed before archival`, {
                slotId,
                patientId
            });
        }

        tx.deleteSlot(slotId);
        tx.deletePatient(patientId);
    });

    log.info({ slotId, patientId }, 'confirmed booking archived');
    return pairing;
}
