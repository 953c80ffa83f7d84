// src/events/slotOpenedHandler.ts

import { randomUUID } from 'node:crypto';
import { ValidationError } from '../errors';
import { logger } from '../logger';
import { Period, Slot, SlotStatus } from '../models/Slot';
import { periodOf } from '../engine/weeklyAvailability';
import { SlotIntake, SlotIntakeSchema, parseInput } from '../validation/schemas';
import type { HandlerDeps } from './handlerDeps';
import { assertKnownProvider } from './knownProvider';

const log = logger.child({ module: 'slotOpenedHandler' });

/**
 * Handle an appointment opening up (cancellation at the front desk)
 *
 * Creates the slot in AVAILABLE so it can be matched against the waitlist.
 * Validation happens before anything is written.
 *
 * @param input Raw slot fields (provider, date, time and/or period, duration...)
 * @param deps Store and provider directory
 * @returns The stored slot
 */
export async function handleSlotOpened(
    input: unknown,
    deps: Pick<HandlerDeps, 'store' | 'providers'>
): Promise<Slot> {
    const intake = parseInput(SlotIntakeSchema, input, 'slot');

    await assertKnownProvider(deps.providers, intake.provider, 'provider');
    const period = slotPeriod(intake);

    const slot: Slot = {
        id: randomUUID(),
        provider: intake.provider,
        date: intake.date,
        time: intake.time ?? null,
        period,
        duration: intake.duration,
        appointmentType: intake.appointmentType ?? null,
        notes: intake.notes,
        status: SlotStatus.AVAILABLE,
        proposedPatientId: null,
        proposedPatientName: null,
        bookedPatientId: null
    };

    await deps.store.insertSlot(slot);
    log.info({ slotId: slot.id, provider: slot.provider, date: slot.date, period: slot.period }, 'slot opened');

    return slot;
}

/**
 * Half-day of validated slot fields
 *
 * The schema guarantees one of time/period; time wins when both agree.
 */
export function slotPeriod(intake: SlotIntake): Period {
    const period = intake.time !== undefined ? periodOf(intake.time) : intake.period;
    if (period === undefined) {
        throw new ValidationError('Either time or period is required', {
            formErrors: [],
            fieldErrors: { period: ['Either time or period is required'] }
        });
    }

    return period;
}
