// src/events/slotRemovedHandler.ts

import { ConflictError } from '../errors';
import { logger } from '../logger';
import { Slot, SlotStatus } from '../models/Slot';
import type { HandlerDeps } from './handlerDeps';

const log = logger.child({ module: 'slotRemovedHandler' });

/**
 * Handle an open slot being filled outside the waitlist
 *
 * Only AVAILABLE slots can be removed; a PENDING slot is held for a patient
 * and its proposal has to be cancelled first.
 *
 * @returns The slot as it was before removal
 */
export async function handleSlotRemoved(
    slotId: string,
    deps: Pick<HandlerDeps, 'store'>
): Promise<Slot> {
    const removed = await deps.store.runTransaction(async tx => {
        const slot = await tx.getSlot(slotId);
        if (!slot) {
            throw new ConflictError(`Slot ${slotId} does not exist`, { slotId });
        }

        if (slot.status !== SlotStatus.AVAILABLE) {
            throw new ConflictError(`Slot ${slotId} is ${slot.status}, only available slots can be removed`, {
                slotId,
                slotStatus: slot.status,
                proposedPatientId: slot.proposedPatientId
            });
        }

        tx.deleteSlot(slotId);
        return slot;
    });

    log.info({ slotId }, 'slot removed');
    return removed;
}
