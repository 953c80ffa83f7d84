import { describe, expect, it } from 'vitest';
import { SlotStatus } from '../models/Slot';
import { InMemoryWaitlistStore } from '../store/inMemoryWaitlistStore';
import { makeSlot } from '../testing/fixtures';
import { handleSlotRemoved } from './slotRemovedHandler';

describe('handleSlotRemoved', () => {
    it('removes an available slot', async () => {
        const store = new InMemoryWaitlistStore();
        await store.insertSlot(makeSlot({ id: 's1' }));

        const removed = await handleSlotRemoved('s1', { store });

        expect(removed.id).toBe('s1');
        expect(await store.getSlot('s1')).toBeNull();
    });

    it('refuses a slot that is held for a patient', async () => {
        const store = new InMemoryWaitlistStore();
        await store.insertSlot(makeSlot({ id: 's1', status: SlotStatus.PENDING, proposedPatientId: 'p1' }));

        await expect(handleSlotRemoved('s1', { store })).rejects.toThrow(
            'Slot s1 is pending, only available slots can be removed'
        );
        expect(await store.getSlot('s1')).not.toBeNull();
    });
});
