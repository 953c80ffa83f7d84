import { beforeEach, describe, expect, it } from 'vitest';
import { InMemoryProviderDirectory } from '../directory/providerDirectory';
import { ValidationError } from '../errors';
import { isListed } from '../engine/weeklyAvailability';
import { PatientStatus, Urgency } from '../models/Patient';
import { Period } from '../models/Slot';
import { InMemoryWaitlistStore } from '../store/inMemoryWaitlistStore';
import { makePatient } from '../testing/fixtures';
import { handlePatientUpdated } from './patientUpdatedHandler';

describe('handlePatientUpdated', () => {
    let store: InMemoryWaitlistStore;
    const providers = InMemoryProviderDirectory.fromIds(['dr-a']);

    beforeEach(async () => {
        store = new InMemoryWaitlistStore();
        await store.insertPatient(makePatient({ id: 'p1', name: 'Jo' }));
    });

    it('changes the given fields and leaves the rest', async () => {
        const patient = await handlePatientUpdated('p1', {
            urgency: 'high',
            providerPreference: 'dr-a',
            availability: { Friday: ['AM'] }
        }, { store, providers });

        expect(patient).toMatchObject({
            id: 'p1',
            name: 'Jo',
            email: null,
            duration: 30,
            urgency: Urgency.HIGH,
            providerPreference: 'dr-a',
            status: PatientStatus.WAITING
        });
        expect(patient.joinedAt).toEqual(new Date('2024-06-01T09:00:00Z'));
        expect(isListed(patient.availability, 'Friday', Period.AM)).toBe(true);
        expect(isListed(patient.availability, 'Friday', Period.PM)).toBe(false);
        expect(await store.getPatient('p1')).toEqual(patient);
    });

    it('refuses a patient with a pending proposal', async () => {
        await store.insertPatient(makePatient({ id: 'p2', status: PatientStatus.PENDING, proposedSlotId: 's1' }));

        await expect(handlePatientUpdated('p2', { duration: 60 }, { store, providers })).rejects.toThrow(
            'Patient p2 is pending, only waiting patients can be edited'
        );
        expect((await store.getPatient('p2'))?.duration).toBe(30);
    });

    it('rejects an unknown provider preference', async () => {
        await expect(
            handlePatientUpdated('p1', { providerPreference: 'dr-z' }, { store, providers })
        ).rejects.toBeInstanceOf(ValidationError);
        expect((await store.getPatient('p1'))?.providerPreference).toBe('no preference');
    });

    it('rejects fields outside the intake form', async () => {
        await expect(
            handlePatientUpdated('p1', { status: 'confirmed' }, { store, providers })
        ).rejects.toThrow('Invalid patient update');
        await expect(
            handlePatientUpdated('p1', { duration: 0 }, { store, providers })
        ).rejects.toThrow('Invalid patient update');
    });

    it('treats an unknown patient as a conflict', async () => {
        await expect(
            handlePatientUpdated('ghost', { name: 'X' }, { store, providers })
        ).rejects.toThrow('Patient ghost does not exist');
    });
});
