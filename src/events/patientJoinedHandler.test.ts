import { describe, expect, it } from 'vitest';
import { ValidationError } from '../errors';
import { InMemoryProviderDirectory } from '../directory/providerDirectory';
import { isListed } from '../engine/weeklyAvailability';
import { AvailabilityMode, NO_PREFERENCE, PatientStatus, Urgency } from '../models/Patient';
import { Period } from '../models/Slot';
import { InMemoryWaitlistStore } from '../store/inMemoryWaitlistStore';
import { fixedClock } from '../testing/fixtures';
import { handlePatientJoined } from './patientJoinedHandler';

function setup() {
    return {
        store: new InMemoryWaitlistStore(),
        providers: InMemoryProviderDirectory.fromIds(['dr-a']),
        clock: fixedClock('2024-06-01T09:00:00Z')
    };
}

describe('handlePatientJoined', () => {
    it('creates a waiting entry stamped with the clock', async () => {
        const deps = setup();

        const patient = await handlePatientJoined({
            name: 'Jo',
            phone: '555-0100',
            email: 'jo@example.com',
            appointmentType: 'hygiene',
            duration: 30,
            providerPreference: 'dr-a',
            urgency: 'high',
            availability: { Tuesday: ['PM'] },
            availabilityMode: 'unavailable'
        }, deps);

        expect(patient).toMatchObject({
            name: 'Jo',
            email: 'jo@example.com',
            providerPreference: 'dr-a',
            urgency: Urgency.HIGH,
            availabilityMode: AvailabilityMode.UNAVAILABLE,
            status: PatientStatus.WAITING,
            proposedSlotId: null,
            bookedSlotId: null,
            waitFrozenAt: null
        });
        expect(patient.joinedAt).toEqual(new Date('2024-06-01T09:00:00Z'));
        expect(isListed(patient.availability, 'Tuesday', Period.PM)).toBe(true);
        expect(isListed(patient.availability, 'Tuesday', Period.AM)).toBe(false);
        expect(await deps.store.getPatient(patient.id)).toEqual(patient);
    });

    it('defaults to no provider preference', async () => {
        const patient = await handlePatientJoined(
            { name: 'Jo', phone: '555-0100', appointmentType: 'hygiene', duration: 30 },
            setup()
        );

        expect(patient.providerPreference).toBe(NO_PREFERENCE);
        expect(patient.email).toBeNull();
    });

    it('rejects an unknown provider preference', async () => {
        const deps = setup();

        await expect(handlePatientJoined({
            name: 'Jo', phone: '555-0100', appointmentType: 'hygiene', duration: 30, providerPreference: 'dr-z'
        }, deps)).rejects.toBeInstanceOf(ValidationError);
        expect(await deps.store.listPatients()).toEqual([]);
    });
});
