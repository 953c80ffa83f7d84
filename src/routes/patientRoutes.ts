// src/routes/patientRoutes.ts

import { Router, Request, Response } from 'express';
import { SlotStatus } from '../models/Slot';
import type { AvailabilityMatcher } from '../engine/availabilityMatcher';
import { handlePatientJoined } from '../events/patientJoinedHandler';
import { handlePatientUpdated } from '../events/patientUpdatedHandler';
import { handlePatientWithdrawn } from '../events/patientWithdrawnHandler';
import type { HandlerDeps } from '../events/handlerDeps';
import { PatientQuerySchema, parseInput } from '../validation/schemas';
import { asyncRoute } from './asyncRoute';
import { presentPatient } from './presenters';

/**
 * Waitlist routes - HTTP mapping only
 * Business logic delegated to engine/events
 */
export function createPatientRoutes(deps: HandlerDeps, matcher: AvailabilityMatcher): Router {
    const router = Router();

    /**
     * List waitlist entries, longest waiting first
     * GET /patients?status=waiting
     */
    router.get('/', asyncRoute(async (req: Request, res: Response) => {
        const { status } = parseInput(PatientQuerySchema, req.query, 'patient query');
        const now = deps.clock();
        const patients = await deps.store.listPatients({ status });

        patients.sort((a, b) => a.joinedAt.getTime() - b.joinedAt.getTime());

        res.json({ patients: patients.map(p => presentPatient(p, now)) });
    }));

    /**
     * Add a patient to the waitlist
     * POST /patients
     * Body: { name, phone, email?, appointmentType, duration, providerPreference?,
     *         urgency?, availability?, availabilityMode? }
     */
    router.post('/', asyncRoute(async (req: Request, res: Response) => {
        const patient = await handlePatientJoined(req.body, deps);
        res.status(201).json({ patient: presentPatient(patient, deps.clock()) });
    }));

    /**
     * Get a waitlist entry
     * GET /patients/:id
     */
    router.get('/:id', asyncRoute(async (req: Request, res: Response) => {
        const patient = await deps.store.getPatient(req.params.id);
        if (!patient) {
            res.status(404).json({ error: 'Patient not found' });
            return;
        }

        res.json({ patient: presentPatient(patient, deps.clock()) });
    }));

    /**
     * Edit a waiting patient's entry
     * PATCH /patients/:id
     * Body: any of the POST /patients fields
     */
    router.patch('/:id', asyncRoute(async (req: Request, res: Response) => {
        const patient = await handlePatientUpdated(req.params.id, req.body, deps);
        res.json({ patient: presentPatient(patient, deps.clock()) });
    }));

    /**
     * Open slots this patient could be offered
     * GET /patients/:id/matches
     */
    router.get('/:id/matches', asyncRoute(async (req: Request, res: Response) => {
        const patient = await deps.store.getPatient(req.params.id);
        if (!patient) {
            res.status(404).json({ error: 'Patient not found' });
            return;
        }

        const slots = await deps.store.listSlots({ status: SlotStatus.AVAILABLE });
        res.json({ slots: matcher.findSlotsForPatient(patient, slots) });
    }));

    /**
     * Take a waiting patient off the waitlist
     * POST /patients/:id/withdraw
     */
    router.post('/:id/withdraw', asyncRoute(async (req: Request, res: Response) => {
        const patient = await handlePatientWithdrawn(req.params.id, deps);
        res.json({ patient: presentPatient(patient, deps.clock()), message: 'Patient withdrawn from waitlist' });
    }));

    return router;
}
