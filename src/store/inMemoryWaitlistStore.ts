// src/store/inMemoryWaitlistStore.ts

import { ConflictError } from '../errors';
import type { Patient } from '../models/Patient';
import type { Slot } from '../models/Slot';
import type {
    PatientFilter,
    SlotFilter,
    WaitlistStore,
    WaitlistTransaction
} from './waitlistStore';

interface Versioned<T> {
    record: T;
    version: number;
}

type RecordKind = 'slot' | 'patient';

/**
 * One table of versioned records
 *
 * Every insert and committed write takes the next version of the table, so a
 * version is never reused, not even for an id that was deleted and inserted
 * again. Transactions compare the version they read against the current one
 * at commit time.
 */
class VersionedTable<T extends { id: string }> {
    private rows = new Map<string, Versioned<T>>();
    private lastVersion = 0;

    constructor(readonly kind: RecordKind) {}

    get(id: string): Versioned<T> | undefined {
        const row = this.rows.get(id);
        return row ? { record: structuredClone(row.record), version: row.version } : undefined;
    }

    list(): T[] {
        return Array.from(this.rows.values(), row => structuredClone(row.record));
    }

    versionOf(id: string): number | undefined {
        return this.rows.get(id)?.version;
    }

    insert(record: T): void {
        if (this.rows.has(record.id)) {
            throw new ConflictError(`${this.kind} ${record.id} already exists`, { id: record.id });
        }
        this.rows.set(record.id, { record: structuredClone(record), version: ++this.lastVersion });
    }

    replace(record: T): void {
        this.rows.set(record.id, { record: structuredClone(record), version: ++this.lastVersion });
    }

    delete(id: string): void {
        this.rows.delete(id);
    }
}

/**
 * Reads and staged changes of one transaction against one table
 *
 * A staged value of null is a delete.
 */
class TableChanges<T extends { id: string }> {
    private readVersions = new Map<string, number>();
    private staged = new Map<string, T | null>();

    constructor(private readonly table: VersionedTable<T>) {}

    read(id: string): T | null {
        const staged = this.staged.get(id);
        if (staged !== undefined) {
            return staged === null ? null : structuredClone(staged);
        }

        const row = this.table.get(id);
        if (!row) {
            return null;
        }
        if (!this.readVersions.has(id)) {
            this.readVersions.set(id, row.version);
        }

        return row.record;
    }

    stage(id: string, record: T | null): void {
        if (!this.readVersions.has(id)) {
            throw new Error(`${this.table.kind} ${id} must be read before it is changed in a transaction`);
        }
        this.staged.set(id, record === null ? null : structuredClone(record));
    }

    assertUnchanged(): void {
        for (const id of this.staged.keys()) {
            const currentVersion = this.table.versionOf(id);
            const details = { [`${this.table.kind}Id`]: id };

            if (currentVersion === undefined) {
                throw new ConflictError(`${this.table.kind} ${id} was removed by another request`, details);
            }
            if (currentVersion !== this.readVersions.get(id)) {
                throw new ConflictError(`${this.table.kind} ${id} was modified by another request`, details);
            }
        }
    }

    apply(): void {
        for (const [id, record] of this.staged) {
            if (record === null) {
                this.table.delete(id);
            } else {
                this.table.replace(record);
            }
        }
    }
}

class StagedTransaction implements WaitlistTransaction {
    readonly slots: TableChanges<Slot>;
    readonly patients: TableChanges<Patient>;

    constructor(slots: VersionedTable<Slot>, patients: VersionedTable<Patient>) {
        this.slots = new TableChanges(slots);
        this.patients = new TableChanges(patients);
    }

    async getSlot(id: string): Promise<Slot | null> {
        return this.slots.read(id);
    }

    async getPatient(id: string): Promise<Patient | null> {
        return this.patients.read(id);
    }

    putSlot(slot: Slot): void {
        this.slots.stage(slot.id, slot);
    }

    putPatient(patient: Patient): void {
        this.patients.stage(patient.id, patient);
    }

    deleteSlot(id: string): void {
        this.slots.stage(id, null);
    }

    deletePatient(id: string): void {
        this.patients.stage(id, null);
    }

    /**
     * Check every change, then apply them all in one synchronous step:
     * no other caller can observe half a commit
     */
    commit(): void {
        this.slots.assertUnchanged();
        this.patients.assertUnchanged();

        this.slots.apply();
        this.patients.apply();
    }
}

/**
 * In-process WaitlistStore with optimistic concurrency
 *
 * Transactions never lock: unrelated slots and patients proceed in parallel,
 * and only the loser of a race on the same record is rejected.
 */
export class InMemoryWaitlistStore implements WaitlistStore {
    private slots = new VersionedTable<Slot>('slot');
    private patients = new VersionedTable<Patient>('patient');

    async runTransaction<T>(work: (tx: WaitlistTransaction) => Promise<T>): Promise<T> {
        const tx = new StagedTransaction(this.slots, this.patients);
        const result = await work(tx);
        tx.commit();
        return result;
    }

    async getSlot(id: string): Promise<Slot | null> {
        return this.slots.get(id)?.record ?? null;
    }

    async getPatient(id: string): Promise<Patient | null> {
        return this.patients.get(id)?.record ?? null;
    }

    async listSlots(filter: SlotFilter = {}): Promise<Slot[]> {
        return this.slots
            .list()
            .filter(slot => filter.status === undefined || slot.status === filter.status);
    }

    async listPatients(filter: PatientFilter = {}): Promise<Patient[]> {
        return this.patients
            .list()
            .filter(patient => filter.status === undefined || patient.status === filter.status);
    }

    async insertSlot(slot: Slot): Promise<void> {
        this.slots.insert(slot);
    }

    async insertPatient(patient: Patient): Promise<void> {
        this.patients.insert(patient);
    }
}
