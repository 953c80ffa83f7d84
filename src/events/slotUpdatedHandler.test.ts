import { beforeEach, describe, expect, it } from 'vitest';
import { InMemoryProviderDirectory } from '../directory/providerDirectory';
import { ConflictError, ValidationError } from '../errors';
import { Period, SlotStatus } from '../models/Slot';
import { InMemoryWaitlistStore } from '../store/inMemoryWaitlistStore';
import { makeSlot } from '../testing/fixtures';
import { handleSlotUpdated } from './slotUpdatedHandler';

describe('handleSlotUpdated', () => {
    let store: InMemoryWaitlistStore;
    const providers = InMemoryProviderDirectory.fromIds(['dr-a', 'dr-b']);

    beforeEach(async () => {
        store = new InMemoryWaitlistStore();
        await store.insertSlot(makeSlot({ id: 's1', notes: 'front desk' }));
    });

    it('re-derives the period from a new time and keeps the other fields', async () => {
        const slot = await handleSlotUpdated('s1', { time: '15:30', provider: 'dr-b' }, { store, providers });

        expect(slot).toMatchObject({
            id: 's1',
            provider: 'dr-b',
            date: '2024-06-04',
            time: '15:30',
            period: Period.PM,
            duration: 30,
            notes: 'front desk',
            status: SlotStatus.AVAILABLE
        });
        expect(await store.getSlot('s1')).toEqual(slot);
    });

    it('moves a slot without a time to another half-day', async () => {
        await store.insertSlot(makeSlot({ id: 's2', time: null, period: Period.AM }));

        const slot = await handleSlotUpdated('s2', { period: 'PM' }, { store, providers });

        expect(slot.time).toBeNull();
        expect(slot.period).toBe(Period.PM);
    });

    it('refuses a slot that is held for a patient', async () => {
        await store.insertSlot(makeSlot({ id: 's2', status: SlotStatus.PENDING, proposedPatientId: 'p1' }));

        await expect(handleSlotUpdated('s2', { duration: 60 }, { store, providers })).rejects.toThrow(
            'Slot s2 is pending, only available slots can be edited'
        );
        expect((await store.getSlot('s2'))?.duration).toBe(30);
    });

    it('rejects an unknown provider without writing', async () => {
        await expect(
            handleSlotUpdated('s1', { provider: 'dr-z' }, { store, providers })
        ).rejects.toBeInstanceOf(ValidationError);
        expect((await store.getSlot('s1'))?.provider).toBe('dr-a');
    });

    it('rejects fields that are not slot intake fields', async () => {
        await expect(
            handleSlotUpdated('s1', { status: 'confirmed' }, { store, providers })
        ).rejects.toThrow('Invalid slot update');
        expect((await store.getSlot('s1'))?.status).toBe(SlotStatus.AVAILABLE);
    });

    it('rejects a period that contradicts the stored time', async () => {
        await expect(handleSlotUpdated('s1', { period: 'PM' }, { store, providers })).rejects.toThrow('Invalid slot');
    });

    it('treats an unknown slot as a conflict', async () => {
        await expect(
            handleSlotUpdated('ghost', { notes: 'x' }, { store, providers })
        ).rejects.toBeInstanceOf(ConflictError);
    });
});
