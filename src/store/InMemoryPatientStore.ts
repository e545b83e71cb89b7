import type { LocalPatientRecord, PatientStore } from '../types.js';

/**
 * Map-backed `PatientStore`. Records go in and come out as clones so callers
 * never share state with the store.
 */
export class InMemoryPatientStore implements PatientStore {
    private records: Map<string, LocalPatientRecord> = new Map();

    upsert(record: LocalPatientRecord): void {
        if (record.serverId) {
            const owner = this.getByServerId(record.serverId);
            if (owner && owner.localKey !== record.localKey) {
                throw new Error(`Server id ${record.serverId} already belongs to local record ${owner.localKey}`);
            }
        }
        console.log(`[InMemoryStore] Upserting ${record.localKey}`);
        this.records.set(record.localKey, structuredClone(record));
    }

    get(localKey: string): LocalPatientRecord | null {
        const record = this.records.get(localKey);
        return record ? structuredClone(record) : null;
    }

    getByServerId(serverId: string): LocalPatientRecord | null {
        for (const record of this.records.values()) {
            if (record.serverId === serverId) return structuredClone(record);
        }
        return null;
    }

    list(): LocalPatientRecord[] {
        return [...this.records.values()].map(record => structuredClone(record));
    }
}
