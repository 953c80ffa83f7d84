// src/events/slotUpdatedHandler.ts

import { ConflictError } from '../errors';
import { logger } from '../logger';
import { Slot, SlotStatus } from '../models/Slot';
import { SlotIntakeSchema, SlotUpdateSchema, parseInput } from '../validation/schemas';
import type { HandlerDeps } from './handlerDeps';
import { assertKnownProvider } from './knownProvider';
import { slotPeriod } from './slotOpenedHandler';

const log = logger.child({ module: 'slotUpdatedHandler' });

/**
 * Handle front desk edits to an open slot
 *
 * Only AVAILABLE slots can be edited, so a slot held for a patient never
 * changes under its proposal. The edited slot is validated as a whole, the
 * same way a new slot is; a new time brings its own period.
 *
 * @param input Intake fields to change
 * @returns The slot after the edit
 */
export async function handleSlotUpdated(
    slotId: string,
    input: unknown,
    deps: Pick<HandlerDeps, 'store' | 'providers'>
): Promise<Slot> {
    const changes = parseInput(SlotUpdateSchema, input, 'slot update');

    const updated = await deps.store.runTransaction(async tx => {
        const slot = await tx.getSlot(slotId);
        if (!slot) {
            throw new ConflictError(`Slot ${slotId} does not exist`, { slotId });
        }

        if (slot.status !== SlotStatus.AVAILABLE) {
            throw new ConflictError(`Slot ${slotId} is ${slot.status}, only available slots can be edited`, {
                slotId,
                slotStatus: slot.status,
                proposedPatientId: slot.proposedPatientId
            });
        }

        const intake = parseInput(SlotIntakeSchema, {
            provider: slot.provider,
            date: slot.date,
            time: slot.time ?? undefined,
            period: changes.time !== undefined ? undefined : slot.period,
            duration: slot.duration,
            appointmentType: slot.appointmentType ?? undefined,
            notes: slot.notes,
            ...changes
        }, 'slot');
        await assertKnownProvider(deps.providers, intake.provider, 'provider');

        const edited: Slot = {
            ...slot,
            provider: intake.provider,
            date: intake.date,
            time: intake.time ?? null,
            period: slotPeriod(intake),
            duration: intake.duration,
            appointmentType: intake.appointmentType ?? null,
            notes: intake.notes
        };
        tx.putSlot(edited);

        return edited;
    });

    log.info({ slotId, fields: Object.keys(changes) }, 'slot updated');
    return updated;
}
