// src/routes/slotRoutes.ts

import { Router, Request, Response } from 'express';
import { PatientStatus } from '../models/Patient';
import type { AvailabilityMatcher } from '../engine/availabilityMatcher';
import { handleSlotOpened } from '../events/slotOpenedHandler';
import { handleBookingConfirmed } from '../events/bookingConfirmedHandler';
import { handleSlotRemoved } from '../events/slotRemovedHandler';
import { handleSlotUpdated } from '../events/slotUpdatedHandler';
import type { HandlerDeps } from '../events/handlerDeps';
import { SlotQuerySchema, parseInput } from '../validation/schemas';
import { asyncRoute } from './asyncRoute';
import { presentIneligible, presentPatient } from './presenters';

/**
 * Slot routes - HTTP mapping only
 * Business logic delegated to engine/events
 */
export function createSlotRoutes(deps: HandlerDeps, matcher: AvailabilityMatcher): Router {
    const router = Router();

    /**
     * List slots
     * GET /slots?status=available
     */
    router.get('/', asyncRoute(async (req: Request, res: Response) => {
        const { status } = parseInput(SlotQuerySchema, req.query, 'slot query');
        res.json({ slots: await deps.store.listSlots({ status }) });
    }));

    /**
     * Open a slot
     * POST /slots
     * Body: { provider, date, time?, period?, duration, appointmentType?, notes? }
     */
    router.post('/', asyncRoute(async (req: Request, res: Response) => {
        const slot = await handleSlotOpened(req.body, deps);
        res.status(201).json({ slot });
    }));

    /**
     * Get a slot
     * GET /slots/:id
     */
    router.get('/:id', asyncRoute(async (req: Request, res: Response) => {
        const slot = await deps.store.getSlot(req.params.id);
        if (!slot) {
            res.status(404).json({ error: 'Slot not found' });
            return;
        }

        res.json({ slot });
    }));

    /**
     * Edit an open slot
     * PATCH /slots/:id
     * Body: any of { provider, date, time, period, duration, appointmentType, notes }
     */
    router.patch('/:id', asyncRoute(async (req: Request, res: Response) => {
        const slot = await handleSlotUpdated(req.params.id, req.body, deps);
        res.json({ slot });
    }));

    /**
     * Waiting patients ranked for a slot, plus who is excluded and why
     * GET /slots/:id/matches
     */
    router.get('/:id/matches', asyncRoute(async (req: Request, res: Response) => {
        const slot = await deps.store.getSlot(req.params.id);
        if (!slot) {
            res.status(404).json({ error: 'Slot not found' });
            return;
        }

        const now = deps.clock();
        const waiting = await deps.store.listPatients({ status: PatientStatus.WAITING });
        const { eligible, ineligible } = matcher.partition(slot, waiting, now);

        res.json({
            slot,
            eligible: eligible.map(p => presentPatient(p, now)),
            ineligible: ineligible.map(c => presentIneligible(c.patient, c.reasons, now))
        });
    }));

    /**
     * Propose a slot to a patient
     * POST /slots/:slotId/propose/:patientId
     */
    router.post('/:slotId/propose/:patientId', asyncRoute(async (req: Request, res: Response) => {
        const { slotId, patientId } = req.params;
        const { slot, patient } = await deps.proposals.propose(slotId, patientId);

        res.json({ slot, patient: presentPatient(patient, deps.clock()), message: 'Slot proposed, awaiting confirmation' });
    }));

    /**
     * Confirm a proposed booking and archive both records
     * POST /slots/:slotId/confirm/:patientId
     */
    router.post('/:slotId/confirm/:patientId', asyncRoute(async (req: Request, res: Response) => {
        const { slotId, patientId } = req.params;
        const { slot, patient } = await handleBookingConfirmed(slotId, patientId, deps);

        res.json({ slot, patient: presentPatient(patient, deps.clock()), message: 'Booking confirmed' });
    }));

    /**
     * Cancel a proposal
     * POST /slots/:slotId/cancel/:patientId
     */
    router.post('/:slotId/cancel/:patientId', asyncRoute(async (req: Request, res: Response) => {
        const { slotId, patientId } = req.params;
        const { slot, patient } = await deps.proposals.cancel(slotId, patientId);

        res.json({ slot, patient: presentPatient(patient, deps.clock()), message: 'Proposal cancelled' });
    }));

    /**
     * Remove an open slot that was filled elsewhere
     * DELETE /slots/:id
     */
    router.delete('/:id', asyncRoute(async (req: Request, res: Response) => {
        const slot = await handleSlotRemoved(req.params.id, deps);
        res.json({ slot, message: 'Slot removed' });
    }));

    return router;
}
