import Database from 'better-sqlite3';
import { PatientSchema, type LocalPatientRecord, type PatientStore } from './types.js';

interface PatientRow {
    local_key: string;
    server_id: string | null;
    json: string;
    version: number;
    updated_at: string;
}

/**
 * Opens (creating if needed) a SQLite database and ensures the local patient
 * table exists. Pass ':memory:' for a throwaway store.
 */
export function openPatientDatabase(dbPath: string): Database.Database {
    const db = new Database(dbPath);
    db.pragma('journal_mode = WAL');
    db.exec(`
        CREATE TABLE IF NOT EXISTS local_patients (
            local_key TEXT PRIMARY KEY,
            server_id TEXT UNIQUE,
            json TEXT NOT NULL,
            version INTEGER NOT NULL,
            updated_at TEXT NOT NULL
        );

        CREATE INDEX IF NOT EXISTS idx_local_patients_updated ON local_patients(updated_at);
    `);
    return db;
}

function rowToRecord(row: PatientRow): LocalPatientRecord {
    return {
        localKey: row.local_key,
        serverId: row.server_id,
        resource: PatientSchema.parse(JSON.parse(row.json)),
        version: row.version,
        updatedAt: row.updated_at,
    };
}

/**
 * `PatientStore` over a better-sqlite3 connection. The caller owns the
 * connection and closes it.
 */
export class SqlitePatientStore implements PatientStore {
    private readonly upsertStmt: Database.Statement<[string, string | null, string, number, string]>;
    private readonly byKeyStmt: Database.Statement<[string], PatientRow>;
    private readonly byServerIdStmt: Database.Statement<[string], PatientRow>;
    private readonly listStmt: Database.Statement<[], PatientRow>;

    constructor(private readonly db: Database.Database) {
        this.upsertStmt = db.prepare<[string, string | null, string, number, string]>(`
            INSERT INTO local_patients (local_key, server_id, json, version, updated_at)
            VALUES (?, ?, ?, ?, ?)
            ON CONFLICT(local_key) DO UPDATE SET
                server_id = excluded.server_id,
                json = excluded.json,
                version = excluded.version,
                updated_at = excluded.updated_at
        `);
        this.byKeyStmt = db.prepare<[string], PatientRow>('SELECT * FROM local_patients WHERE local_key = ?');
        this.byServerIdStmt = db.prepare<[string], PatientRow>('SELECT * FROM local_patients WHERE server_id = ?');
        this.listStmt = db.prepare<[], PatientRow>('SELECT * FROM local_patients ORDER BY updated_at DESC, local_key');
    }

    upsert(record: LocalPatientRecord): void {
        this.upsertStmt.run(
            record.localKey,
            record.serverId,
            JSON.stringify(record.resource),
            record.version,
            record.updatedAt,
        );
        console.log(`[STORE] Upserted ${record.localKey} (server id: ${record.serverId ?? 'none'}, version ${record.version})`);
    }

    get(localKey: string): LocalPatientRecord | null {
        const row = this.byKeyStmt.get(localKey);
        return row ? rowToRecord(row) : null;
    }

    getByServerId(serverId: string): LocalPatientRecord | null {
        const row = this.byServerIdStmt.get(serverId);
        return row ? rowToRecord(row) : null;
    }

    list(): LocalPatientRecord[] {
        return this.listStmt.all().map(rowToRecord);
    }

    close(): void {
        this.db.close();
    }
}
