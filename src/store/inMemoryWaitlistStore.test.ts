import { beforeEach, describe, expect, it } from 'vitest';
import { ConflictError } from '../errors';
import { PatientStatus } from '../models/Patient';
import { SlotStatus } from '../models/Slot';
import { makePatient, makeSlot } from '../testing/fixtures';
import { InMemoryWaitlistStore } from './inMemoryWaitlistStore';

describe('InMemoryWaitlistStore', () => {
    let store: InMemoryWaitlistStore;

    beforeEach(async () => {
        store = new InMemoryWaitlistStore();
        await store.insertSlot(makeSlot({ id: 's1' }));
        await store.insertPatient(makePatient({ id: 'p1' }));
    });

    it('returns copies that callers cannot mutate in place', async () => {
        const slot = await store.getSlot('s1');
        expect(slot).not.toBeNull();
        if (slot) {
            slot.status = SlotStatus.CONFIRMED;
        }

        expect((await store.getSlot('s1'))?.status).toBe(SlotStatus.AVAILABLE);
    });

    it('rejects duplicate ids on insert', async () => {
        await expect(store.insertSlot(makeSlot({ id: 's1' }))).rejects.toBeInstanceOf(ConflictError);
    });

    it('filters lists by status', async () => {
        await store.insertPatient(makePatient({ id: 'p2', status: PatientStatus.CANCELLED }));

        expect((await store.listPatients({ status: PatientStatus.WAITING })).map(p => p.id)).toEqual(['p1']);
        expect((await store.listPatients()).map(p => p.id)).toEqual(['p1', 'p2']);
    });

    describe('runTransaction', () => {
        it('commits staged writes together', async () => {
            await store.runTransaction(async tx => {
                const slot = await tx.getSlot('s1');
                const patient = await tx.getPatient('p1');
                if (slot && patient) {
                    tx.putSlot({ ...slot, status: SlotStatus.PENDING, proposedPatientId: 'p1' });
                    tx.putPatient({ ...patient, status: PatientStatus.PENDING, proposedSlotId: 's1' });
                }
            });

            expect((await store.getSlot('s1'))?.status).toBe(SlotStatus.PENDING);
            expect((await store.getPatient('p1'))?.status).toBe(PatientStatus.PENDING);
        });

        it('keeps staged writes invisible until commit', async () => {
            let seenDuring: SlotStatus | undefined;

            await store.runTransaction(async tx => {
                const slot = await tx.getSlot('s1');
                if (slot) {
                    tx.putSlot({ ...slot, status: SlotStatus.PENDING });
                }
                seenDuring = (await store.getSlot('s1'))?.status;
                expect((await tx.getSlot('s1'))?.status).toBe(SlotStatus.PENDING);
            });

            expect(seenDuring).toBe(SlotStatus.AVAILABLE);
        });

        it('writes nothing when the work throws', async () => {
            await expect(store.runTransaction(async tx => {
                const slot = await tx.getSlot('s1');
                if (slot) {
                    tx.putSlot({ ...slot, status: SlotStatus.PENDING });
                }
                throw new ConflictError('changed my mind');
            })).rejects.toThrow('changed my mind');

            expect((await store.getSlot('s1'))?.status).toBe(SlotStatus.AVAILABLE);
        });

        it('rejects the whole commit when a record changed since it was read', async () => {
            await expect(store.runTransaction(async tx => {
                const slot = await tx.getSlot('s1');
                const patient = await tx.getPatient('p1');

                // Another request commits in between
                await store.runTransaction(async other => {
                    const theirs = await other.getSlot('s1');
                    if (theirs) {
                        other.putSlot({ ...theirs, notes: 'edited elsewhere' });
                    }
                });

                if (slot && patient) {
                    tx.putPatient({ ...patient, status: PatientStatus.PENDING });
                    tx.putSlot({ ...slot, status: SlotStatus.PENDING });
                }
            })).rejects.toThrow('slot s1 was modified by another request');

            expect((await store.getPatient('p1'))?.status).toBe(PatientStatus.WAITING);
            expect(await store.getSlot('s1')).toMatchObject({ status: SlotStatus.AVAILABLE, notes: 'edited elsewhere' });
        });

        it('rejects a commit when a record was removed meanwhile', async () => {
            await expect(store.runTransaction(async tx => {
                const slot = await tx.getSlot('s1');

                await store.runTransaction(async other => {
                    await other.getSlot('s1');
                    other.deleteSlot('s1');
                });

                if (slot) {
                    tx.putSlot({ ...slot, status: SlotStatus.PENDING });
                }
            })).rejects.toThrow('slot s1 was removed by another request');

            expect(await store.getSlot('s1')).toBeNull();
        });

        it('rejects a commit when the record was removed and inserted again meanwhile', async () => {
            await expect(store.runTransaction(async tx => {
                const slot = await tx.getSlot('s1');

                await store.runTransaction(async other => {
                    await other.getSlot('s1');
                    other.deleteSlot('s1');
                });
                await store.insertSlot(makeSlot({ id: 's1', notes: 'replacement', duration: 60 }));

                if (slot) {
                    tx.putSlot({ ...slot, status: SlotStatus.PENDING });
                }
            })).rejects.toThrow('slot s1 was modified by another request');

            expect(await store.getSlot('s1')).toMatchObject({
                status: SlotStatus.AVAILABLE,
                notes: 'replacement',
                duration: 60
            });
        });

        it('deletes records read in the transaction', async () => {
            await store.runTransaction(async tx => {
                await tx.getPatient('p1');
                tx.deletePatient('p1');
                expect(await tx.getPatient('p1')).toBeNull();
            });

            expect(await store.getPatient('p1')).toBeNull();
        });

        it('refuses writes to records the transaction did not read', async () => {
            await expect(store.runTransaction(async tx => {
                tx.putSlot(makeSlot({ id: 's1' }));
            })).rejects.toThrow('slot s1 must be read before it is changed in a transaction');
        });
    });
});
